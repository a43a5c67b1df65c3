import type { ChatMessage, LLMProvider, Usage } from "../providers/types";
import type { EventLogger } from "../runtime/events";
import type { Step } from "./steps";

/**
 * Message in the agent transcript.
 * Provider-agnostic; same shape as ChatMessage.
 */
export type Message = ChatMessage;

/** Result of one tool step, fed back to the model as an OBSERVE message. */
export interface Observation {
  tool: string;
  input: string;
  output: string;
}

/**
 * Configuration for creating an agent.
 */
export interface AgentConfig {
  /** LLM provider to use (required). */
  provider: LLMProvider;
  /** Model identifier (passed to provider). */
  model: string;
  maxTokens?: number;
  /**
   * Upper bound on model replies per run. Unbounded when omitted: the loop
   * then only ends on an OUTPUT step or a provider failure.
   */
  maxSteps?: number;
  systemPrompt?: string;
  /** Timeout for execute_command. Default: 30s. */
  commandTimeoutMs?: number;
  /** AbortSignal that cancels the agent loop mid-execution. */
  signal?: AbortSignal;
  /** Logger for structured run events. Defaults to an in-memory logger. */
  eventLogger?: EventLogger;
  /** Called with every step as soon as it is parsed. */
  onStep?: (step: Step) => void;
  /** Called after every tool step with the observation sent back. */
  onObservation?: (observation: Observation) => void;
}

export type RunStatus = "completed" | "failed" | "max_steps" | "cancelled";

/**
 * Result of one `run(query)`.
 */
export interface RunResult {
  status: RunStatus;
  /** OUTPUT content when completed; a sentinel message otherwise. */
  response: string;
  runId: string;
  steps: Step[];
  toolsUsed: string[];
  usage: Usage;
  /** Snapshot of the transcript at the end of the run. */
  transcript: Message[];
  reason?: string;
}
