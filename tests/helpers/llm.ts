import type { LLMClient, LLMRequest, LLMServiceResult } from "@/lib/llm/types";

export function llmResult(content: string): LLMServiceResult {
  return {
    response: {
      content,
      provider: "claude",
      model: "claude-3-haiku-20240307",
      inputTokens: 100,
      outputTokens: 50,
      latencyMs: 200,
    },
    attempts: [
      {
        provider: "claude",
        model: "claude-3-haiku-20240307",
        latencyMs: 200,
        success: true,
      },
    ],
  };
}

export function tradeJson(fields: Partial<Record<string, unknown>> = {}): string {
  return JSON.stringify({
    productName: null,
    quantity: null,
    unit: null,
    unitPrice: null,
    confidence: 0.9,
    notes: [],
    ...fields,
  });
}

/** An LLMClient whose call() is a jest mock, for asserting on requests. */
export function createMockLLMClient(impl: (req: LLMRequest) => Promise<LLMServiceResult>) {
  const call = jest.fn(impl);
  const client: LLMClient = { call };
  return { client, call };
}
