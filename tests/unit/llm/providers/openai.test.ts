import { OpenAIProvider } from "@/lib/llm/providers/openai";
import { LLMError } from "@/lib/llm/errors";
import type { LLMRequest } from "@/lib/llm/types";

jest.mock("openai", () => {
  const mockCreate = jest.fn();
  class RateLimitError extends Error {}
  class APIConnectionTimeoutError extends Error {}
  const OpenAI = Object.assign(
    jest.fn().mockImplementation(() => ({
      chat: { completions: { create: mockCreate } },
    })),
    { RateLimitError, APIConnectionTimeoutError }
  );
  return {
    __esModule: true,
    default: OpenAI,
    _mockCreate: mockCreate,
  };
});

function getSdk() {
  // eslint-disable-next-line @typescript-eslint/no-require-imports
  return require("openai");
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

describe("OpenAIProvider", () => {
  let provider: OpenAIProvider;
  let mockCreate: jest.Mock;

  beforeEach(() => {
    jest.clearAllMocks();
    provider = new OpenAIProvider("test-api-key", "gpt-4o");
    mockCreate = getMockCreate();
  });

  it("sends correct parameters to OpenAI SDK", async () => {
    mockCreate.mockResolvedValue({
      choices: [{ message: { content: '{"result": true}' } }],
      model: "gpt-4o",
      usage: { prompt_tokens: 100, completion_tokens: 50 },
    });

    await provider.call(TEST_REQUEST);

    expect(mockCreate).toHaveBeenCalledWith({
      model: "gpt-4o",
      max_tokens: 1024,
      temperature: 0,
      messages: [
        { role: "system", content: "You are a helpful assistant." },
        { role: "user", content: "Extract the trade from this message." },
      ],
    });
  });

  it("uses JSON mode and carries the schema in the system prompt", async () => {
    mockCreate.mockResolvedValue({
      choices: [{ message: { content: '{"translatedText": "hello"}' } }],
      model: "gpt-4o",
      usage: { prompt_tokens: 10, completion_tokens: 5 },
    });

    await provider.call({
      ...TEST_REQUEST,
      outputSchema: {
        name: "translate_text",
        description: "Return the translated text",
        schema: { type: "object", properties: { translatedText: { type: "string" } }, required: ["translatedText"] },
      },
    });

    const params = mockCreate.mock.calls[0][0];
    expect(params.response_format).toEqual({ type: "json_object" });
    expect(params.messages[0].content).toBe(
      'You are a helpful assistant.\n\nRespond with a single JSON object matching this schema:\n{"type":"object","properties":{"translatedText":{"type":"string"}},"required":["translatedText"]}'
    );
  });

  it("maps OpenAI response to LLMResponse", async () => {
    mockCreate.mockResolvedValue({
      choices: [{ message: { content: '{"unitPrice": 25.5}' } }],
      model: "gpt-4o",
      usage: { prompt_tokens: 150, completion_tokens: 75 },
    });

    const response = await provider.call(TEST_REQUEST);

    expect(response.content).toBe('{"unitPrice": 25.5}');
    expect(response.provider).toBe("openai");
    expect(response.model).toBe("gpt-4o");
    expect(response.inputTokens).toBe(150);
    expect(response.outputTokens).toBe(75);
    expect(typeof response.latencyMs).toBe("number");
    expect(response.latencyMs).toBeGreaterThanOrEqual(0);
  });

  it("throws on API error with descriptive message", async () => {
    mockCreate.mockRejectedValue(new Error("503 Service Unavailable"));

    await expect(provider.call(TEST_REQUEST)).rejects.toThrow(
      "OpenAI API error: 503 Service Unavailable"
    );
  });

  it("classifies a rate limit error", async () => {
    mockCreate.mockRejectedValue(new (getSdk().default.RateLimitError)("429 Rate limit exceeded"));

    const error = await provider.call(TEST_REQUEST).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LLMError);
    expect(error).toMatchObject({ kind: "rate_limited", message: "OpenAI API error: 429 Rate limit exceeded" });
  });

  it("classifies a connection timeout", async () => {
    mockCreate.mockRejectedValue(new (getSdk().default.APIConnectionTimeoutError)("Request timed out."));

    const error = await provider.call(TEST_REQUEST).catch((e: unknown) => e);

    expect(error).toMatchObject({ kind: "timeout" });
  });

  it("measures latency accurately", async () => {
    mockCreate.mockImplementation(
      () =>
        new Promise((resolve) =>
          setTimeout(
            () =>
              resolve({
                choices: [{ message: { content: "ok" } }],
                model: "gpt-4o",
                usage: { prompt_tokens: 10, completion_tokens: 5 },
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
