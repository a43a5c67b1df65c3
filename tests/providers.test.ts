import { AnthropicProvider } from "../providers/anthropic";
import { GeminiProvider } from "../providers/gemini";
import { OpenAIProvider } from "../providers/openai";
import { createProvider, DEFAULT_MODELS, resolveOpenAIBaseUrl } from "../providers/index";
import { splitConversation } from "../providers/turns";
import type { ChatRequest, ResponseFormat } from "../providers/types";

// ---------------------------------------------------------------------------
// Mock @anthropic-ai/sdk
// ---------------------------------------------------------------------------
const mockAnthropicCreate = jest.fn();
jest.mock("@anthropic-ai/sdk", () => {
  return {
    __esModule: true,
    default: jest.fn().mockImplementation(() => ({
      messages: { create: mockAnthropicCreate },
    })),
  };
});

// ---------------------------------------------------------------------------
// Mock @google/genai
// ---------------------------------------------------------------------------
const mockGeminiGenerateContent = jest.fn();
jest.mock("@google/genai", () => {
  return {
    GoogleGenAI: jest.fn().mockImplementation(() => ({
      models: { generateContent: mockGeminiGenerateContent },
    })),
  };
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------
const FORMAT: ResponseFormat = {
  name: "agent_step",
  description: "Next step",
  schema: {
    type: "object",
    properties: { step: { type: "string" } },
    required: ["step"],
    additionalProperties: false,
  },
};

function makeRequest(overrides: Partial<ChatRequest> = {}): ChatRequest {
  return {
    model: "test-model",
    messages: [{ role: "user", content: "Hi" }],
    responseFormat: FORMAT,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// splitConversation
// ---------------------------------------------------------------------------
describe("splitConversation", () => {
  it("pulls system messages out and merges same-role neighbours", () => {
    expect(
      splitConversation([
        { role: "system", content: "SYS" },
        { role: "user", content: "q" },
        { role: "assistant", content: "a1" },
        { role: "assistant", content: "a2" },
        { role: "user", content: "obs" },
      ])
    ).toEqual({
      system: "SYS",
      turns: [
        { role: "user", content: "q" },
        { role: "assistant", content: "a1\n\na2" },
        { role: "user", content: "obs" },
      ],
    });
  });

  it("adds a continue turn after a trailing assistant message", () => {
    expect(
      splitConversation([
        { role: "user", content: "q" },
        { role: "assistant", content: "a" },
      ])
    ).toEqual({
      system: undefined,
      turns: [
        { role: "user", content: "q" },
        { role: "assistant", content: "a" },
        { role: "user", content: "Continue." },
      ],
    });
  });

  it("does not mutate the input messages", () => {
    const messages = [
      { role: "assistant" as const, content: "a1" },
      { role: "assistant" as const, content: "a2" },
    ];
    splitConversation(messages);
    expect(messages[0].content).toBe("a1");
  });
});

// ---------------------------------------------------------------------------
// AnthropicProvider
// ---------------------------------------------------------------------------
describe("AnthropicProvider", () => {
  beforeEach(() => {
    mockAnthropicCreate.mockReset();
  });

  it("forces the reply through the response-format tool", async () => {
    mockAnthropicCreate.mockResolvedValue({
      content: [
        { type: "tool_use", id: "t1", name: "agent_step", input: { step: "PLAN", content: "x" } },
      ],
      stop_reason: "tool_use",
      usage: { input_tokens: 7, output_tokens: 3 },
    });

    const provider = new AnthropicProvider("claude-test", "test-key");
    const result = await provider.complete(
      makeRequest({
        messages: [
          { role: "system", content: "SYS" },
          { role: "user", content: "Hi" },
        ],
        maxTokens: 512,
      })
    );

    expect(result).toEqual({
      text: '{"step":"PLAN","content":"x"}',
      usage: { inputTokens: 7, outputTokens: 3 },
    });

    const call = mockAnthropicCreate.mock.calls[0][0];
    expect(call.model).toBe("test-model");
    expect(call.max_tokens).toBe(512);
    expect(call.system).toBe("SYS");
    expect(call.messages).toEqual([{ role: "user", content: "Hi" }]);
    expect(call.tools).toEqual([
      {
        name: "agent_step",
        description: "Next step",
        input_schema: FORMAT.schema,
      },
    ]);
    expect(call.tool_choice).toEqual({ type: "tool", name: "agent_step" });
  });

  it("defaults max_tokens to 4096", async () => {
    mockAnthropicCreate.mockResolvedValue({
      content: [{ type: "text", text: '{"step":"START"}' }],
      stop_reason: "end_turn",
      usage: { input_tokens: 1, output_tokens: 1 },
    });

    const provider = new AnthropicProvider("claude-test");
    const result = await provider.complete(makeRequest());

    expect(mockAnthropicCreate.mock.calls[0][0].max_tokens).toBe(4096);
    expect(result.text).toBe('{"step":"START"}');
  });

  it("sends max_tokens from the request when set", async () => {
    mockAnthropicCreate.mockResolvedValue({
      content: [{ type: "text", text: "{}" }],
      stop_reason: "end_turn",
      usage: { input_tokens: 1, output_tokens: 1 },
    });

    const provider = new AnthropicProvider("claude-test");
    await provider.complete(makeRequest({ maxTokens: 16000 }));

    expect(mockAnthropicCreate.mock.calls[0][0].max_tokens).toBe(16000);
  });

  it("throws on an empty reply", async () => {
    mockAnthropicCreate.mockResolvedValue({
      content: [],
      stop_reason: "max_tokens",
      usage: { input_tokens: 1, output_tokens: 0 },
    });

    const provider = new AnthropicProvider("claude-test");
    await expect(provider.complete(makeRequest())).rejects.toThrow(
      "Empty model response from Anthropic (stop_reason: max_tokens)"
    );
  });
});

// ---------------------------------------------------------------------------
// GeminiProvider
// ---------------------------------------------------------------------------
describe("GeminiProvider", () => {
  beforeEach(() => {
    mockGeminiGenerateContent.mockReset();
  });

  it("maps roles and requests JSON output with the schema", async () => {
    mockGeminiGenerateContent.mockResolvedValue({
      candidates: [
        {
          content: { parts: [{ text: '{"step":' }, { text: '"OUTPUT"}' }] },
          finishReason: "STOP",
        },
      ],
      usageMetadata: { promptTokenCount: 12, candidatesTokenCount: 4 },
    });

    const provider = new GeminiProvider("gemini-test", "test-key");
    const result = await provider.complete(
      makeRequest({
        messages: [
          { role: "system", content: "SYS" },
          { role: "user", content: "q" },
          { role: "assistant", content: "a" },
          { role: "user", content: "obs" },
        ],
        maxTokens: 256,
      })
    );

    expect(result).toEqual({
      text: '{"step":"OUTPUT"}',
      usage: { inputTokens: 12, outputTokens: 4 },
    });

    const call = mockGeminiGenerateContent.mock.calls[0][0];
    expect(call.model).toBe("test-model");
    expect(call.contents).toEqual([
      { role: "user", parts: [{ text: "q" }] },
      { role: "model", parts: [{ text: "a" }] },
      { role: "user", parts: [{ text: "obs" }] },
    ]);
    expect(call.config).toEqual({
      responseMimeType: "application/json",
      responseJsonSchema: FORMAT.schema,
      systemInstruction: "SYS",
      maxOutputTokens: 256,
    });
  });

  it("leaves the output limit unset when the request has none", async () => {
    mockGeminiGenerateContent.mockResolvedValue({
      candidates: [{ content: { parts: [{ text: "{}" }] }, finishReason: "STOP" }],
    });

    const provider = new GeminiProvider("gemini-test");
    await provider.complete(makeRequest());

    expect(mockGeminiGenerateContent.mock.calls[0][0].config).toEqual({
      responseMimeType: "application/json",
      responseJsonSchema: FORMAT.schema,
    });
  });

  it("throws when no text comes back", async () => {
    mockGeminiGenerateContent.mockResolvedValue({
      candidates: [{ content: { parts: [] }, finishReason: "SAFETY" }],
    });

    const provider = new GeminiProvider("gemini-test");
    await expect(provider.complete(makeRequest())).rejects.toThrow(
      "Empty model response from Gemini (finishReason: SAFETY)"
    );
  });
});

// ---------------------------------------------------------------------------
// OpenAIProvider
// ---------------------------------------------------------------------------
describe("OpenAIProvider", () => {
  let fetchSpy: jest.SpyInstance;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, "fetch");
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  function mockFetchResponse(data: unknown, ok = true, status = 200) {
    fetchSpy.mockResolvedValue({
      ok,
      status,
      json: () => Promise.resolve(data),
      text: () => Promise.resolve(JSON.stringify(data)),
    } as Response);
  }

  it("posts a strict json_schema request", async () => {
    mockFetchResponse({
      choices: [{ message: { content: '{"step":"START"}' }, finish_reason: "stop" }],
      usage: { prompt_tokens: 5, completion_tokens: 2 },
    });

    const provider = new OpenAIProvider("gpt-test", "test-key", "https://llm.local/v1/");
    const result = await provider.complete(makeRequest({ maxTokens: 100 }));

    expect(result).toEqual({
      text: '{"step":"START"}',
      usage: { inputTokens: 5, outputTokens: 2 },
    });
    expect(fetchSpy.mock.calls[0][0]).toBe("https://llm.local/v1/chat/completions");
    const init = fetchSpy.mock.calls[0][1];
    expect(init.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-key",
    });
    const body = JSON.parse(init.body as string);
    expect(body).toEqual({
      model: "test-model",
      messages: [{ role: "user", content: "Hi" }],
      response_format: {
        type: "json_schema",
        json_schema: {
          name: "agent_step",
          description: "Next step",
          strict: true,
          schema: FORMAT.schema,
        },
      },
      max_completion_tokens: 100,
    });
  });

  it("sends no token limit when the request has none", async () => {
    mockFetchResponse({
      choices: [{ message: { content: "{}" }, finish_reason: "stop" }],
    });

    const provider = new OpenAIProvider("gpt-test", "test-key");
    await provider.complete(makeRequest());

    expect(fetchSpy.mock.calls[0][0]).toBe("https://api.openai.com/v1/chat/completions");
    const body = JSON.parse(fetchSpy.mock.calls[0][1].body as string);
    expect(body).not.toHaveProperty("max_completion_tokens");
  });

  it("surfaces HTTP errors with status and body", async () => {
    mockFetchResponse({ error: "bad key" }, false, 401);

    const provider = new OpenAIProvider("gpt-test", "test-key");
    await expect(provider.complete(makeRequest())).rejects.toThrow(
      'OpenAI API error 401: {"error":"bad key"}'
    );
  });

  it("surfaces refusals", async () => {
    mockFetchResponse({
      choices: [{ message: { content: null, refusal: "no" }, finish_reason: "stop" }],
    });

    const provider = new OpenAIProvider("gpt-test", "test-key");
    await expect(provider.complete(makeRequest())).rejects.toThrow(
      "OpenAI refused the request: no"
    );
  });

  it("throws on an empty reply", async () => {
    mockFetchResponse({
      choices: [{ message: { content: "" }, finish_reason: "length" }],
    });

    const provider = new OpenAIProvider("gpt-test", "test-key");
    await expect(provider.complete(makeRequest())).rejects.toThrow(
      "Empty model response from OpenAI (finish_reason: length)"
    );
  });
});

// ---------------------------------------------------------------------------
// createProvider factory
// ---------------------------------------------------------------------------
describe("createProvider factory", () => {
  const savedEnv = { ...process.env };

  beforeEach(() => {
    delete process.env.OPENAI_BASE_URL;
    delete process.env.OPENROUTER_BASE_URL;
    delete process.env.OPENAI_API_KEY;
  });

  afterEach(() => {
    process.env = { ...savedEnv };
  });

  it("creates each provider type", () => {
    expect(createProvider({ type: "anthropic", model: "m", apiKey: "test-key" }).name).toBe("anthropic");
    expect(createProvider({ type: "gemini", model: "m", apiKey: "test-key" }).name).toBe("gemini");
    expect(createProvider({ type: "openai", model: "m", apiKey: "test-key" }).name).toBe("openai");
  });

  it("falls back to the provider's default model", async () => {
    mockAnthropicCreate.mockReset();
    mockAnthropicCreate.mockResolvedValue({
      content: [{ type: "text", text: "{}" }],
      stop_reason: "end_turn",
      usage: { input_tokens: 1, output_tokens: 1 },
    });

    const provider = createProvider({ type: "anthropic", apiKey: "test-key" });
    await provider.complete(makeRequest({ model: "" }));

    expect(mockAnthropicCreate.mock.calls[0][0].model).toBe(DEFAULT_MODELS.anthropic);
    expect(DEFAULT_MODELS.anthropic).toBe("claude-sonnet-4-20250514");
  });

  it("throws for unknown provider type", () => {
    expect(() =>
      createProvider({ type: "unknown" as never, model: "x" })
    ).toThrow("Unknown provider type: unknown");
  });

  it("resolves the OpenAI endpoint in order of precedence", () => {
    expect(
      resolveOpenAIBaseUrl("sk-or-test", "https://explicit/v1", {
        OPENAI_BASE_URL: "https://env/v1",
      })
    ).toBe("https://explicit/v1");
    expect(
      resolveOpenAIBaseUrl("sk-or-test", undefined, {
        OPENAI_BASE_URL: "https://env/v1",
        OPENROUTER_BASE_URL: "https://router/v1",
      })
    ).toBe("https://env/v1");
    expect(
      resolveOpenAIBaseUrl("test-key", undefined, { OPENROUTER_BASE_URL: "https://router/v1" })
    ).toBe("https://router/v1");
    expect(resolveOpenAIBaseUrl("sk-or-test", undefined, {})).toBe(
      "https://openrouter.ai/api/v1"
    );
    expect(resolveOpenAIBaseUrl("test-key", undefined, {})).toBeUndefined();
  });

  it("defaults OpenAI baseUrl to OpenRouter when API key looks like sk-or-*", async () => {
    const fetchSpy = jest.spyOn(global, "fetch").mockResolvedValue({
      ok: true,
      status: 200,
      json: () =>
        Promise.resolve({
          choices: [{ message: { content: "{}" }, finish_reason: "stop" }],
        }),
      text: () => Promise.resolve(""),
    } as Response);

    try {
      const provider = createProvider({
        type: "openai",
        model: "openai/gpt-4o-mini",
        apiKey: "sk-or-test",
      });
      await provider.complete(makeRequest());
      expect(fetchSpy.mock.calls[0][0]).toBe(
        "https://openrouter.ai/api/v1/chat/completions"
      );
    } finally {
      fetchSpy.mockRestore();
    }
  });
});
