/** JSON Schema for a structured-output object. */
export type JsonObjectSchema = {
  type: "object";
  properties: Record<string, unknown>;
  required?: string[];
};

export interface OutputSchema {
  name: string;
  description: string;
  schema: JsonObjectSchema;
}

export interface LLMRequest {
  systemPrompt: string;
  userMessage: string;
  maxTokens?: number;
  temperature?: number;
  outputSchema?: OutputSchema;
}

export interface LLMResponse {
  content: string;
  provider: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  latencyMs: number;
}

export interface LLMProvider {
  name: string;
  call(request: LLMRequest): Promise<LLMResponse>;
}

export interface LLMServiceConfig {
  primaryProvider: LLMProvider;
  fallbackProvider?: LLMProvider;
  maxRetriesPerProvider: number;
  retryDelayMs: number;
  /** Upper bound for a single provider call. No bound when omitted. */
  timeoutMs?: number;
}

export interface LLMAttemptLog {
  provider: string;
  model: string;
  latencyMs: number;
  success: boolean;
  error?: string;
  errorKind?: LLMErrorKind;
}

export type LLMErrorKind = "timeout" | "rate_limited" | "provider";

export interface LLMServiceResult {
  response: LLMResponse;
  attempts: LLMAttemptLog[];
}

/** The one call the extraction and translation layers need from a language model. */
export interface LLMClient {
  call(request: LLMRequest): Promise<LLMServiceResult>;
}
