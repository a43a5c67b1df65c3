/** Role of a single transcript message. */
export type ChatRole = "system" | "user" | "assistant";

/** Unified chat message across all providers */
export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * JSON schema that constrains the shape of a reply.
 * Providers translate it into their own structured-output mechanism.
 */
export interface ResponseFormat {
  name: string;
  description?: string;
  schema: Record<string, unknown>;
}

/** Token accounting reported by a provider, when available. */
export interface Usage {
  inputTokens: number;
  outputTokens: number;
}

/** Unified request to any LLM */
export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  responseFormat: ResponseFormat;
  maxTokens?: number;
  signal?: AbortSignal;
}

/** Unified response from any LLM: the raw JSON text of the reply. */
export interface ChatResponse {
  text: string;
  usage?: Usage;
}

/** The provider interface: all LLM backends implement this */
export interface LLMProvider {
  name: string;
  complete(params: ChatRequest): Promise<ChatResponse>;
}

export const PROVIDER_TYPES = ["openai", "anthropic", "gemini"] as const;

export type ProviderType = typeof PROVIDER_TYPES[number];

/** Config for creating a provider via factory */
export interface ProviderConfig {
  type: ProviderType;
  /** Defaults per provider type when omitted. */
  model?: string;
  apiKey?: string;
  baseUrl?: string;
}
