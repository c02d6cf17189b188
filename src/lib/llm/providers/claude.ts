import Anthropic from "@anthropic-ai/sdk";
import type { LLMErrorKind, LLMProvider, LLMRequest, LLMResponse } from "../types";
import { LLMError } from "../errors";

export class ClaudeProvider implements LLMProvider {
  public readonly name = "claude";
  private client: Anthropic;
  private model: string;

  constructor(apiKey: string, model: string) {
    this.client = new Anthropic({ apiKey });
    this.model = model;
  }

  async call(request: LLMRequest): Promise<LLMResponse> {
    const start = Date.now();

    try {
      const params: Anthropic.MessageCreateParamsNonStreaming = {
        model: this.model,
        max_tokens: request.maxTokens ?? 1024,
        temperature: request.temperature ?? 0,
        system: request.systemPrompt,
        messages: [{ role: "user", content: request.userMessage }],
      };

      // Structured output: force a single tool_use block shaped by the schema
      if (request.outputSchema) {
        params.tools = [
          {
            name: request.outputSchema.name,
            description: request.outputSchema.description,
            input_schema: request.outputSchema.schema,
          },
        ];
        params.tool_choice = { type: "tool", name: request.outputSchema.name };
      }

      const response = await this.client.messages.create(params);
      const latencyMs = Date.now() - start;

      let content: string;
      if (request.outputSchema) {
        const toolBlock = response.content.find((b) => b.type === "tool_use");
        content = toolBlock && "input" in toolBlock ? JSON.stringify(toolBlock.input) : "";
      } else {
        const textBlock = response.content.find((b) => b.type === "text");
        content = textBlock && "text" in textBlock ? textBlock.text : "";
      }

      return {
        content,
        provider: this.name,
        model: response.model,
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        latencyMs,
      };
    } catch (error) {
      throw new LLMError(
        `Claude API error: ${error instanceof Error ? error.message : String(error)}`,
        classifyError(error)
      );
    }
  }
}

function classifyError(error: unknown): LLMErrorKind {
  if (error instanceof Anthropic.RateLimitError) return "rate_limited";
  if (error instanceof Anthropic.APIConnectionTimeoutError) return "timeout";
  return "provider";
}
