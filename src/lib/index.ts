export * from "./agent";
export * from "./trade";
export * from "./llm";
export * from "./storage";
export { TradeDesk, type Ledger, type SaveOutcome, type SubmitResult } from "./trade-desk";
export {
  loadConfig,
  DEFAULT_AGENT_CONFIG,
  type AppConfig,
  type AgentConfig,
  type LLMConfig,
  type StorageConfig,
  type StorageBackend,
} from "./config";
export {
  ValidationError,
  InvalidTransitionError,
  SessionBusyError,
  SessionClosedError,
  StorageError,
  ConfigError,
} from "./errors";
export { configureLogger, createLogger, type Logger, type LoggerSettings, type LogLevel } from "./logger";
