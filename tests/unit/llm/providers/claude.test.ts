import { ClaudeProvider } from "@/lib/llm/providers/claude";
import { LLMError } from "@/lib/llm/errors";
import type { LLMRequest } from "@/lib/llm/types";

// Mock the Anthropic SDK, including the error classes the provider classifies
jest.mock("@anthropic-ai/sdk", () => {
  const mockCreate = jest.fn();
  class RateLimitError extends Error {}
  class APIConnectionTimeoutError extends Error {}
  const Anthropic = Object.assign(
    jest.fn().mockImplementation(() => ({
      messages: { create: mockCreate },
    })),
    { RateLimitError, APIConnectionTimeoutError }
  );
  return {
    __esModule: true,
    default: Anthropic,
    _mockCreate: mockCreate,
  };
});

function getSdk() {
  // eslint-disable-next-line @typescript-eslint/no-require-imports
  return require("@anthropic-ai/sdk");
}

function getMockCreate() {
  return getSdk()._mockCreate as jest.Mock;
}

const TEST_REQUEST: LLMRequest = {
  systemPrompt: "You are a helpful assistant.",
  userMessage: "Extract the trade from this message.",
  maxTokens: 1024,
  temperature: 0,
};

const SCHEMA_REQUEST: LLMRequest = {
  ...TEST_REQUEST,
  outputSchema: {
    name: "record_trade",
    description: "Record a trade",
    schema: {
      type: "object",
      properties: { productName: { type: ["string", "null"] } },
      required: ["productName"],
    },
  },
};

describe("ClaudeProvider", () => {
  let provider: ClaudeProvider;
  let mockCreate: jest.Mock;

  beforeEach(() => {
    jest.clearAllMocks();
    provider = new ClaudeProvider("test-api-key", "claude-3-haiku-20240307");
    mockCreate = getMockCreate();
  });

  it("sends correct parameters to Anthropic SDK", async () => {
    mockCreate.mockResolvedValue({
      content: [{ type: "text", text: '{"result": true}' }],
      model: "claude-3-haiku-20240307",
      usage: { input_tokens: 100, output_tokens: 50 },
    });

    await provider.call(TEST_REQUEST);

    expect(mockCreate).toHaveBeenCalledWith({
      model: "claude-3-haiku-20240307",
      max_tokens: 1024,
      temperature: 0,
      system: "You are a helpful assistant.",
      messages: [{ role: "user", content: "Extract the trade from this message." }],
    });
  });

  it("maps Anthropic response to LLMResponse", async () => {
    mockCreate.mockResolvedValue({
      content: [{ type: "text", text: '{"unitPrice": 25.5}' }],
      model: "claude-3-haiku-20240307",
      usage: { input_tokens: 150, output_tokens: 75 },
    });

    const response = await provider.call(TEST_REQUEST);

    expect(response.content).toBe('{"unitPrice": 25.5}');
    expect(response.provider).toBe("claude");
    expect(response.model).toBe("claude-3-haiku-20240307");
    expect(response.inputTokens).toBe(150);
    expect(response.outputTokens).toBe(75);
    expect(typeof response.latencyMs).toBe("number");
    expect(response.latencyMs).toBeGreaterThanOrEqual(0);
  });

  it("forces the schema tool and returns its input as JSON", async () => {
    mockCreate.mockResolvedValue({
      content: [{ type: "tool_use", id: "tu_1", name: "record_trade", input: { productName: "wheat" } }],
      model: "claude-3-haiku-20240307",
      usage: { input_tokens: 10, output_tokens: 5 },
    });

    const response = await provider.call(SCHEMA_REQUEST);

    expect(response.content).toBe('{"productName":"wheat"}');
    const params = mockCreate.mock.calls[0][0];
    expect(params.tools).toEqual([
      {
        name: "record_trade",
        description: "Record a trade",
        input_schema: SCHEMA_REQUEST.outputSchema?.schema,
      },
    ]);
    expect(params.tool_choice).toEqual({ type: "tool", name: "record_trade" });
  });

  it("returns empty content when the forced tool block is missing", async () => {
    mockCreate.mockResolvedValue({
      content: [{ type: "text", text: "I cannot help with that" }],
      model: "claude-3-haiku-20240307",
      usage: { input_tokens: 10, output_tokens: 5 },
    });

    const response = await provider.call(SCHEMA_REQUEST);

    expect(response.content).toBe("");
  });

  it("throws on API error with descriptive message", async () => {
    mockCreate.mockRejectedValue(new Error("401 Unauthorized"));

    await expect(provider.call(TEST_REQUEST)).rejects.toThrow(
      "Claude API error: 401 Unauthorized"
    );
  });

  it("classifies rate limits and connection timeouts", async () => {
    const sdk = getSdk();
    mockCreate.mockRejectedValueOnce(new sdk.default.RateLimitError("429 Too Many Requests"));
    mockCreate.mockRejectedValueOnce(new sdk.default.APIConnectionTimeoutError("Request timed out."));
    mockCreate.mockRejectedValueOnce(new Error("500 Internal Server Error"));

    const kinds: string[] = [];
    for (let i = 0; i < 3; i++) {
      try {
        await provider.call(TEST_REQUEST);
      } catch (error) {
        expect(error).toBeInstanceOf(LLMError);
        if (error instanceof LLMError) kinds.push(error.kind);
      }
    }

    expect(kinds).toEqual(["rate_limited", "timeout", "provider"]);
  });

  it("measures latency accurately", async () => {
    mockCreate.mockImplementation(
      () =>
        new Promise((resolve) =>
          setTimeout(
            () =>
              resolve({
                content: [{ type: "text", text: "ok" }],
                model: "claude-3-haiku-20240307",
                usage: { input_tokens: 10, output_tokens: 5 },
              }),
            50
          )
        )
    );

    const response = await provider.call(TEST_REQUEST);

    expect(response.latencyMs).toBeGreaterThanOrEqual(40);
    expect(response.latencyMs).toBeLessThan(200);
  });
});
