import pino, { type Logger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/** Log level from LOG_LEVEL, defaulting to info. */
export function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return level && isLogLevel(level) ? level : "info";
}

export function isPrettyEnabled(): boolean {
  return process.env.LOG_PRETTY === "true";
}

export interface LoggerSettings {
  level: LogLevel;
  pretty: boolean;
}

let rootLogger: Logger | null = null;

function buildRootLogger(settings: LoggerSettings): Logger {
  const options: pino.LoggerOptions = {
    level: settings.level,
    base: { service: "parchi-agent" },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return settings.pretty
    ? pino({
        ...options,
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname" },
        },
      })
    : pino(options);
}

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = buildRootLogger({ level: getLogLevel(), pretty: isPrettyEnabled() });
  }
  return rootLogger;
}

/**
 * Module-scoped logger.
 *
 * @example
 * const log = createLogger("agent/negotiation");
 * log.info({ sessionId }, "turn started");
 */
export function createLogger(moduleName?: string): Logger {
  const root = getRootLogger();
  return moduleName ? root.child({ module: moduleName }) : root;
}

/**
 * Rebuilds the root logger from loaded config. Loggers created afterwards
 * pick up the new settings; call it before constructing services.
 */
export function configureLogger(settings: LoggerSettings): Logger {
  rootLogger = buildRootLogger(settings);
  return rootLogger;
}

export type { Logger };
