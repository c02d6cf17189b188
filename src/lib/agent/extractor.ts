import type { LLMClient, LLMServiceResult } from "../llm/types";
import { errorKindOf, errorMessageOf } from "../llm/errors";
import type { ExtractionOutcome } from "./types";
import { parseTradeExtractionOutput } from "./output-parser";
import { buildExtractionPrompt, type ExtractionPromptInput } from "./prompts";

/**
 * One structured-extraction call. Provider errors and unparseable output
 * come back as a typed failure; extract() does not throw.
 */
export class Extractor {
  private llm: LLMClient;

  constructor(llm: LLMClient) {
    this.llm = llm;
  }

  async extract(input: ExtractionPromptInput): Promise<ExtractionOutcome> {
    const prompt = buildExtractionPrompt(input);

    let llmResult: LLMServiceResult;
    try {
      llmResult = await this.llm.call(prompt);
    } catch (error) {
      return {
        ok: false,
        failure: { kind: errorKindOf(error), message: errorMessageOf(error) },
      };
    }

    const parsed = parseTradeExtractionOutput(llmResult.response.content);
    if (!parsed.success) {
      return { ok: false, failure: { kind: "malformed", message: parsed.error } };
    }

    return {
      ok: true,
      draft: parsed.data.draft,
      confidence: parsed.data.confidence,
      notes: parsed.data.notes,
      meta: {
        provider: llmResult.response.provider,
        model: llmResult.response.model,
        latencyMs: llmResult.response.latencyMs,
        inputTokens: llmResult.response.inputTokens,
        outputTokens: llmResult.response.outputTokens,
        retryCount: llmResult.attempts.length - 1,
      },
    };
  }
}
