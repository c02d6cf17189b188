import OpenAI from "openai";
import type { LLMErrorKind, LLMProvider, LLMRequest, LLMResponse } from "../types";
import { LLMError } from "../errors";

export class OpenAIProvider implements LLMProvider {
  public readonly name = "openai";
  private client: OpenAI;
  private model: string;

  constructor(apiKey: string, model: string) {
    this.client = new OpenAI({ apiKey });
    this.model = model;
  }

  async call(request: LLMRequest): Promise<LLMResponse> {
    const start = Date.now();

    // JSON mode has no schema slot, so the contract rides in the system prompt
    const systemPrompt = request.outputSchema
      ? `${request.systemPrompt}\n\nRespond with a single JSON object matching this schema:\n${JSON.stringify(request.outputSchema.schema)}`
      : request.systemPrompt;

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        max_tokens: request.maxTokens ?? 1024,
        temperature: request.temperature ?? 0,
        messages: [
          { role: "system", content: systemPrompt },
          { role: "user", content: request.userMessage },
        ],
        ...(request.outputSchema ? { response_format: { type: "json_object" as const } } : {}),
      });

      const latencyMs = Date.now() - start;

      return {
        content: response.choices[0]?.message?.content ?? "",
        provider: this.name,
        model: response.model,
        inputTokens: response.usage?.prompt_tokens ?? 0,
        outputTokens: response.usage?.completion_tokens ?? 0,
        latencyMs,
      };
    } catch (error) {
      throw new LLMError(
        `OpenAI API error: ${error instanceof Error ? error.message : String(error)}`,
        classifyError(error)
      );
    }
  }
}

function classifyError(error: unknown): LLMErrorKind {
  if (error instanceof OpenAI.RateLimitError) return "rate_limited";
  if (error instanceof OpenAI.APIConnectionTimeoutError) return "timeout";
  return "provider";
}
