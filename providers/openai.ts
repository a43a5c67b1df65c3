import type {
  ChatRequest,
  ChatResponse,
  LLMProvider,
  ResponseFormat,
} from "./types";

interface OpenAIMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

interface OpenAIResponseFormat {
  type: "json_schema";
  json_schema: {
    name: string;
    description?: string;
    strict: true;
    schema: Record<string, unknown>;
  };
}

interface OpenAIResponse {
  choices: Array<{
    message: {
      content: string | null;
      refusal?: string | null;
    };
    finish_reason: string;
  }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
  };
}

export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";

/**
 * Chat Completions provider with strict JSON-schema structured output.
 * Also works against OpenAI-compatible gateways such as OpenRouter.
 */
export class OpenAIProvider implements LLMProvider {
  readonly name = "openai";
  private baseUrl: string;

  constructor(
    private model: string,
    private apiKey?: string,
    baseUrl?: string
  ) {
    this.baseUrl = (baseUrl ?? DEFAULT_OPENAI_BASE_URL).replace(/\/+$/, "");
  }

  async complete(params: ChatRequest): Promise<ChatResponse> {
    const { messages, responseFormat, maxTokens, signal } = params;

    const openaiMessages: OpenAIMessage[] = messages.map((msg) => ({
      role: msg.role,
      content: msg.content,
    }));

    const body: Record<string, unknown> = {
      model: params.model || this.model,
      messages: openaiMessages,
      response_format: convertResponseFormat(responseFormat),
    };
    if (maxTokens) body.max_completion_tokens = maxTokens;

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.apiKey) headers["Authorization"] = `Bearer ${this.apiKey}`;

    const res = await fetch(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal,
    });

    if (!res.ok) {
      const text = await res.text();
      throw new Error(`OpenAI API error ${res.status}: ${text}`);
    }

    const data = (await res.json()) as OpenAIResponse;
    const choice = data.choices[0];
    if (!choice) {
      throw new Error("OpenAI response contained no choices");
    }

    const { content, refusal } = choice.message;
    if (refusal) {
      throw new Error(`OpenAI refused the request: ${refusal}`);
    }
    if (!content) {
      throw new Error(
        `Empty model response from OpenAI (finish_reason: ${choice.finish_reason})`
      );
    }

    const usage = data.usage
      ? {
          inputTokens: data.usage.prompt_tokens,
          outputTokens: data.usage.completion_tokens,
        }
      : undefined;

    return { text: content, usage };
  }
}

function convertResponseFormat(format: ResponseFormat): OpenAIResponseFormat {
  return {
    type: "json_schema",
    json_schema: {
      name: format.name,
      description: format.description,
      strict: true,
      schema: format.schema,
    },
  };
}
