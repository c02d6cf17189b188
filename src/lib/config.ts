import { z } from "zod";
import { ConfigError } from "./errors";
import { SUPPORTED_LANGUAGES, type LanguageCode } from "./agent/language";
import type { LogLevel } from "./logger";

// ─── Env parsing helpers ──────────────────────────────────────────────────────
const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== "" ? v.trim() : undefined));

const intFromEnv = (fallback: number, min = 0) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === "" ? String(fallback) : v))
    .pipe(z.coerce.number().int().min(min));

const floatFromEnv = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === "" ? String(fallback) : v))
    .pipe(z.coerce.number().min(0).max(1));

const languageFromEnv = (fallback: LanguageCode) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === "" ? fallback : v.trim().toLowerCase()))
    .pipe(z.enum(SUPPORTED_LANGUAGES));

// Comma-separated language codes; unset means every supported language.
const languageListFromEnv = () =>
  z
    .string()
    .optional()
    .transform((v): string[] =>
      v === undefined || v.trim() === ""
        ? [...SUPPORTED_LANGUAGES]
        : v
            .split(",")
            .map((code) => code.trim().toLowerCase())
            .filter((code) => code !== "")
    )
    .pipe(z.array(z.enum(SUPPORTED_LANGUAGES)).min(1));

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).optional().default("development"),

  ANTHROPIC_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  LLM_PRIMARY_MODEL: z.string().optional().default("claude-3-haiku-20240307"),
  LLM_FALLBACK_MODEL: z.string().optional().default("gpt-4o"),
  LLM_MAX_RETRIES: intFromEnv(3, 1),
  LLM_RETRY_DELAY_MS: intFromEnv(1000),
  LLM_TIMEOUT_MS: intFromEnv(20000, 1),

  DEFAULT_LANGUAGE: languageFromEnv("hi"),
  PIVOT_LANGUAGE: languageFromEnv("en"),
  SUPPORTED_LANGUAGES: languageListFromEnv(),
  MAX_EXTRACTION_ATTEMPTS: intFromEnv(3, 1),
  EXTRACTION_RETRIES_PER_TURN: intFromEnv(1),
  LANGUAGE_CONFIDENCE_THRESHOLD: floatFromEnv(0.6),
  AGENT_CALL_TIMEOUT_MS: intFromEnv(30000, 1),

  STORAGE_BACKEND: z.enum(["memory", "sqlite"]).optional().default("sqlite"),
  SQLITE_PATH: z.string().optional().default("data/parchis.db"),

  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .optional()
    .default("info"),
  LOG_PRETTY: z
    .string()
    .optional()
    .transform((v) => v === "true"),
});

export type Environment = "development" | "test" | "production";
export type StorageBackend = "memory" | "sqlite";

export interface LLMConfig {
  anthropicApiKey?: string;
  openaiApiKey?: string;
  primaryModel: string;
  fallbackModel: string;
  maxRetriesPerProvider: number;
  retryDelayMs: number;
  timeoutMs: number;
}

export interface AgentConfig {
  defaultLanguage: LanguageCode;
  pivotLanguage: LanguageCode;
  supportedLanguages: readonly LanguageCode[];
  maxExtractionAttempts: number;
  retriesPerTurn: number;
  languageConfidenceThreshold: number;
  callTimeoutMs: number;
}

export interface StorageConfig {
  backend: StorageBackend;
  sqlitePath: string;
}

export interface AppConfig {
  environment: Environment;
  llm: LLMConfig;
  agent: AgentConfig;
  storage: StorageConfig;
  log: {
    level: LogLevel;
    pretty: boolean;
  };
  isDevelopment(): boolean;
  isProduction(): boolean;
}

export const DEFAULT_AGENT_CONFIG: AgentConfig = {
  defaultLanguage: "hi",
  pivotLanguage: "en",
  supportedLanguages: SUPPORTED_LANGUAGES,
  maxExtractionAttempts: 3,
  retriesPerTurn: 1,
  languageConfidenceThreshold: 0.6,
  callTimeoutMs: 30000,
};

/**
 * Builds the typed application config from environment variables.
 * Every invalid key is reported at once in a ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  const e = parsed.data;
  if (!e.SUPPORTED_LANGUAGES.includes(e.DEFAULT_LANGUAGE)) {
    throw new ConfigError([
      `DEFAULT_LANGUAGE: "${e.DEFAULT_LANGUAGE}" is not one of SUPPORTED_LANGUAGES (${e.SUPPORTED_LANGUAGES.join(", ")})`,
    ]);
  }
  const environment: Environment = e.NODE_ENV;

  return {
    environment,
    llm: {
      anthropicApiKey: e.ANTHROPIC_API_KEY,
      openaiApiKey: e.OPENAI_API_KEY,
      primaryModel: e.LLM_PRIMARY_MODEL,
      fallbackModel: e.LLM_FALLBACK_MODEL,
      maxRetriesPerProvider: e.LLM_MAX_RETRIES,
      retryDelayMs: e.LLM_RETRY_DELAY_MS,
      timeoutMs: e.LLM_TIMEOUT_MS,
    },
    agent: {
      defaultLanguage: e.DEFAULT_LANGUAGE,
      pivotLanguage: e.PIVOT_LANGUAGE,
      supportedLanguages: e.SUPPORTED_LANGUAGES,
      maxExtractionAttempts: e.MAX_EXTRACTION_ATTEMPTS,
      retriesPerTurn: e.EXTRACTION_RETRIES_PER_TURN,
      languageConfidenceThreshold: e.LANGUAGE_CONFIDENCE_THRESHOLD,
      callTimeoutMs: e.AGENT_CALL_TIMEOUT_MS,
    },
    storage: {
      backend: e.STORAGE_BACKEND,
      sqlitePath: e.SQLITE_PATH,
    },
    log: {
      level: e.LOG_LEVEL,
      pretty: e.LOG_PRETTY,
    },
    isDevelopment: () => environment === "development",
    isProduction: () => environment === "production",
  };
}
