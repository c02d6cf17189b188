// Extraction
export { Extractor } from "./extractor";
export { buildExtractionPrompt, buildTranslationPrompt, type ExtractionPromptInput } from "./prompts";
export {
  parseTradeExtractionOutput,
  parseTranslationOutput,
  extractJson,
  type ParseResult,
  type TradeExtraction,
} from "./output-parser";
export { TradeExtractionOutputSchema, TRADE_EXTRACTION_JSON_SCHEMA } from "./types";

// Negotiation
export {
  NegotiationAgent,
  type NegotiationAgentOptions,
  type StartSessionOptions,
  type TradeExtractor,
  type TurnOptions,
} from "./negotiation-agent";
export { ConversationContext, mergeTradeDraft } from "./conversation-context";

// Language
export {
  SUPPORTED_LANGUAGES,
  LANGUAGE_NAMES,
  detectLanguage,
  resolveLanguage,
  isSupportedLanguage,
  type LanguageCode,
  type LanguageDetection,
  type ResolvedLanguage,
} from "./language";
export { LLMTranslator, IdentityTranslator, type Translator, type TranslationResult } from "./translator";
export {
  messagesFor,
  buildClarificationText,
  buildRetryText,
  buildFailureText,
  buildBusyText,
  buildCompletionText,
  type LocaleMessages,
} from "./messages";

// Types
export type {
  ConversationMessage,
  ExtractionFailure,
  ExtractionFailureKind,
  ExtractionMeta,
  ExtractionOutcome,
  ExtractionResult,
  NegotiationState,
  TradeExtractionOutput,
} from "./types";
