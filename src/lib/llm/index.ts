export { LLMService } from "./service";
export { ClaudeProvider } from "./providers/claude";
export { OpenAIProvider } from "./providers/openai";
export { LLMError, errorKindOf, errorMessageOf } from "./errors";
export { withTimeout } from "./timeout";
export type {
  JsonObjectSchema,
  LLMClient,
  LLMErrorKind,
  LLMProvider,
  LLMRequest,
  LLMResponse,
  LLMServiceConfig,
  LLMServiceResult,
  LLMAttemptLog,
} from "./types";
