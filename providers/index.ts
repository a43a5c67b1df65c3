export { AnthropicProvider, DEFAULT_ANTHROPIC_MAX_TOKENS } from "./anthropic";
export { GeminiProvider } from "./gemini";
export { OpenAIProvider, DEFAULT_OPENAI_BASE_URL } from "./openai";
export { splitConversation, CONTINUE_PROMPT } from "./turns";
export type { ConversationTurn, SplitConversation } from "./turns";
export * from "./types";

import { AnthropicProvider } from "./anthropic";
import { GeminiProvider } from "./gemini";
import { OpenAIProvider } from "./openai";
import type { LLMProvider, ProviderConfig, ProviderType } from "./types";

/** Model used for each provider when none is configured. */
export const DEFAULT_MODELS: Record<ProviderType, string> = {
  openai: "gpt-5-mini",
  anthropic: "claude-sonnet-4-20250514",
  gemini: "gemini-2.0-flash",
};

const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

/**
 * Endpoint for the OpenAI provider: explicit value, then the environment,
 * then OpenRouter for `sk-or-` keys. Undefined means api.openai.com.
 */
export function resolveOpenAIBaseUrl(
  apiKey: string | undefined,
  baseUrl: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  if (baseUrl) return baseUrl;
  if (env.OPENAI_BASE_URL) return env.OPENAI_BASE_URL;
  if (env.OPENROUTER_BASE_URL) return env.OPENROUTER_BASE_URL;
  return apiKey?.startsWith("sk-or-") ? OPENROUTER_BASE_URL : undefined;
}

/**
 * Build the provider for a config. Keys not given explicitly are read from
 * the provider's usual environment variables.
 */
export function createProvider(config: ProviderConfig): LLMProvider {
  const env = process.env;
  const model = config.model || DEFAULT_MODELS[config.type];

  switch (config.type) {
    case "openai": {
      const apiKey = config.apiKey ?? env.OPENAI_API_KEY;
      return new OpenAIProvider(
        model,
        apiKey,
        resolveOpenAIBaseUrl(apiKey, config.baseUrl, env)
      );
    }
    case "anthropic":
      return new AnthropicProvider(model, config.apiKey ?? env.ANTHROPIC_API_KEY);
    case "gemini":
      return new GeminiProvider(
        model,
        config.apiKey ?? env.GEMINI_API_KEY ?? env.GOOGLE_API_KEY
      );
    default: {
      const exhaustive: never = config.type;
      throw new Error(`Unknown provider type: ${exhaustive}`);
    }
  }
}
