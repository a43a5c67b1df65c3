import { z } from "zod";
import { DEFAULT_MODELS } from "../providers";
import { PROVIDER_TYPES } from "../providers/types";
import type { ProviderType } from "../providers/types";
import { DEFAULT_COMMAND_TIMEOUT_MS } from "../tools/shell";

export const DEFAULT_MAX_STEPS = 50;

export interface AppConfig {
  provider: ProviderType;
  model: string;
  maxSteps: number;
  /** Unset means no reply limit is sent, except where a provider needs one. */
  maxTokens?: number;
  commandTimeoutMs: number;
  eventLogPath?: string;
}

export class ConfigError extends Error {
  constructor(message: string, readonly key: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const positiveInt = (fallback: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined))
    .pipe(z.coerce.number().int().positive().default(fallback));

const optionalPositiveInt = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined))
  .pipe(z.coerce.number().int().positive().optional());

const EnvSchema = z.object({
  AGENT_PROVIDER: z
    .string()
    .trim()
    .toLowerCase()
    .optional()
    .transform((value) => (value ? value : undefined))
    .pipe(z.enum(PROVIDER_TYPES).default("openai")),
  AGENT_MODEL: optionalText,
  AGENT_MAX_STEPS: positiveInt(DEFAULT_MAX_STEPS),
  AGENT_MAX_TOKENS: optionalPositiveInt,
  AGENT_COMMAND_TIMEOUT_MS: positiveInt(DEFAULT_COMMAND_TIMEOUT_MS),
  AGENT_EVENT_LOG: optionalText,
});

/** Values given on the command line; they win over the environment. */
export type ConfigOverrides = Partial<AppConfig>;

/**
 * Build the process-wide configuration from environment variables and
 * command-line overrides. The model defaults per provider.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue ? String(issue.path[0] ?? "") : "";
    throw new ConfigError(
      `Invalid ${key || "configuration"}: ${issue?.message ?? "unknown error"}`,
      key
    );
  }

  const values = parsed.data;
  const provider = overrides.provider ?? values.AGENT_PROVIDER;
  return {
    provider,
    model: overrides.model ?? values.AGENT_MODEL ?? DEFAULT_MODELS[provider],
    maxSteps: overrides.maxSteps ?? values.AGENT_MAX_STEPS,
    maxTokens: overrides.maxTokens ?? values.AGENT_MAX_TOKENS,
    commandTimeoutMs:
      overrides.commandTimeoutMs ?? values.AGENT_COMMAND_TIMEOUT_MS,
    eventLogPath: overrides.eventLogPath ?? values.AGENT_EVENT_LOG,
  };
}
