import { GoogleGenAI } from "@google/genai";
import type {
  Content,
  GenerateContentConfig,
  GenerateContentResponse,
} from "@google/genai";
import type { ChatRequest, ChatResponse, LLMProvider } from "./types";
import { splitConversation } from "./turns";

export class GeminiProvider implements LLMProvider {
  readonly name = "gemini";
  private genai: GoogleGenAI;

  constructor(private model: string, apiKey?: string) {
    this.genai = new GoogleGenAI({ apiKey: apiKey ?? "" });
  }

  async complete(params: ChatRequest): Promise<ChatResponse> {
    const { messages, responseFormat, maxTokens, signal } = params;
    const { system, turns } = splitConversation(messages);

    const contents: Content[] = turns.map((turn) => ({
      role: turn.role === "assistant" ? "model" : "user",
      parts: [{ text: turn.content }],
    }));

    const config: GenerateContentConfig = {
      responseMimeType: "application/json",
      responseJsonSchema: responseFormat.schema,
    };
    if (system) config.systemInstruction = system;
    if (maxTokens) config.maxOutputTokens = maxTokens;
    if (signal) config.abortSignal = signal;

    const response = await this.genai.models.generateContent({
      model: params.model || this.model,
      contents,
      config,
    });

    return toChatResponse(response);
  }
}

function toChatResponse(response: GenerateContentResponse): ChatResponse {
  const candidate = response.candidates?.[0];
  const text = (candidate?.content?.parts ?? [])
    .map((part) => part.text ?? "")
    .join("");

  if (!text) {
    throw new Error(
      `Empty model response from Gemini (finishReason: ${candidate?.finishReason ?? "unknown"})`
    );
  }

  const usage = response.usageMetadata
    ? {
        inputTokens: response.usageMetadata.promptTokenCount ?? 0,
        outputTokens: response.usageMetadata.candidatesTokenCount ?? 0,
      }
    : undefined;

  return { text, usage };
}
