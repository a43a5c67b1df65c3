import Anthropic from "@anthropic-ai/sdk";
import type {
  ChatRequest,
  ChatResponse,
  LLMProvider,
  ResponseFormat,
} from "./types";
import { splitConversation } from "./turns";

/** The Messages API requires `max_tokens`; used when a request sets none. */
export const DEFAULT_ANTHROPIC_MAX_TOKENS = 4096;

/**
 * Anthropic Messages provider.
 *
 * The response schema is exposed as a single tool and `tool_choice` forces
 * the model to call it, so the tool input is the structured reply.
 */
export class AnthropicProvider implements LLMProvider {
  readonly name = "anthropic";
  private client: Anthropic;

  constructor(private model: string, apiKey?: string) {
    this.client = new Anthropic({ apiKey });
  }

  async complete(params: ChatRequest): Promise<ChatResponse> {
    const {
      messages,
      responseFormat,
      maxTokens = DEFAULT_ANTHROPIC_MAX_TOKENS,
      signal,
    } = params;
    const { system, turns } = splitConversation(messages);
    const tool = convertResponseFormat(responseFormat);

    const response = await this.client.messages.create(
      {
        model: params.model || this.model,
        max_tokens: maxTokens,
        system,
        messages: turns,
        tools: [tool],
        tool_choice: { type: "tool", name: tool.name },
      },
      { signal }
    );

    return toChatResponse(response);
  }
}

function toChatResponse(response: Anthropic.Message): ChatResponse {
  const textBlocks: string[] = [];
  let structured: string | undefined;

  for (const block of response.content) {
    if (block.type === "tool_use" && structured === undefined) {
      structured = JSON.stringify(block.input);
    } else if (block.type === "text") {
      textBlocks.push(block.text);
    }
  }

  const text = structured ?? textBlocks.join("\n");
  if (!text) {
    throw new Error(
      `Empty model response from Anthropic (stop_reason: ${response.stop_reason})`
    );
  }

  return {
    text,
    usage: {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    },
  };
}

function convertResponseFormat(format: ResponseFormat): Anthropic.Tool {
  return {
    name: format.name,
    description:
      format.description ?? "Reply with the next step as structured data.",
    input_schema: { ...format.schema, type: "object" },
  };
}
