import { z } from "zod";
import type {
  ChatMessage,
  LLMProvider,
  ResponseFormat,
  Usage,
} from "../providers/types";
import { errorMessage } from "../tools/text";

export const STEP_KINDS = ["START", "PLAN", "TOOL", "OUTPUT"] as const;

export type StepKind = typeof STEP_KINDS[number];

export const StartStepSchema = z.object({
  step: z.literal("START"),
  content: z.string(),
});

export const PlanStepSchema = z.object({
  step: z.literal("PLAN"),
  content: z.string(),
});

export const ToolStepSchema = z.object({
  step: z.literal("TOOL"),
  tool: z.string().min(1),
  input: z.string(),
});

export const OutputStepSchema = z.object({
  step: z.literal("OUTPUT"),
  content: z.string(),
});

export const StepSchema = z.discriminatedUnion("step", [
  StartStepSchema,
  PlanStepSchema,
  ToolStepSchema,
  OutputStepSchema,
]);

export type StartStep = z.infer<typeof StartStepSchema>;
export type PlanStep = z.infer<typeof PlanStepSchema>;
export type ToolStep = z.infer<typeof ToolStepSchema>;
export type OutputStep = z.infer<typeof OutputStepSchema>;
export type Step = z.infer<typeof StepSchema>;

/**
 * Wire shape the model is asked to produce.
 *
 * Strict structured-output modes need every key present, so the variants
 * are flattened into one object with nullable fields and narrowed back into
 * {@link Step} by {@link parseStep}.
 */
export const STEP_RESPONSE_FORMAT: ResponseFormat = {
  name: "agent_step",
  description: "The next step of the agent: START, PLAN, TOOL or OUTPUT.",
  schema: {
    type: "object",
    properties: {
      step: { type: "string", enum: [...STEP_KINDS] },
      content: { type: ["string", "null"] },
      tool: { type: ["string", "null"] },
      input: { type: ["string", "null"] },
    },
    required: ["step", "content", "tool", "input"],
    additionalProperties: false,
  },
};

export class StepParseError extends Error {
  constructor(message: string, readonly raw: string) {
    super(message);
    this.name = "StepParseError";
  }
}

/** Parse a raw model reply into a validated {@link Step}. */
export function parseStep(raw: string): Step {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new StepParseError(
      `Model reply is not valid JSON: ${errorMessage(err)}`,
      raw
    );
  }

  const result = StepSchema.safeParse(dropNullFields(parsed));
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new StepParseError(`Model reply is not a valid step: ${issues}`, raw);
  }
  return result.data;
}

function dropNullFields(value: unknown): unknown {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).filter(([, field]) => field !== null)
  );
}

export interface StepRequest {
  model: string;
  transcript: ChatMessage[];
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface StepReply {
  step: Step;
  rawText: string;
  usage?: Usage;
}

/**
 * Ask the provider for the next step, constrained to the step schema.
 * Provider failures and unparseable replies both reject.
 */
export async function completeStep(
  provider: LLMProvider,
  request: StepRequest
): Promise<StepReply> {
  const response = await provider.complete({
    model: request.model,
    messages: request.transcript,
    responseFormat: STEP_RESPONSE_FORMAT,
    maxTokens: request.maxTokens,
    signal: request.signal,
  });

  return {
    step: parseStep(response.text),
    rawText: response.text,
    usage: response.usage,
  };
}
