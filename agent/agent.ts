import type { LLMProvider, Usage } from "../providers/types";
import { EventLogger } from "../runtime/events";
import { decodeToolCall, invokeTool } from "../tools/registry";
import { errorMessage } from "../tools/text";
import { buildSystemPrompt } from "./prompt";
import { completeStep, Step, StepReply, ToolStep } from "./steps";
import type {
  AgentConfig,
  Message,
  Observation,
  RunResult,
  RunStatus,
} from "./types";

/** Returned when the provider call fails; the run is abandoned. */
export const PROVIDER_FAILURE_RESPONSE =
  "Error: Failed to get response from LLM";

export const CANCELLED_RESPONSE = "(agent cancelled)";

/**
 * Agent: drives the model through START → PLAN → TOOL → OBSERVE → OUTPUT.
 *
 * Every run starts a fresh transcript:
 *   1. system prompt + user query
 *   2. ask the provider for the next step (full transcript, step schema)
 *   3. append the raw reply as an assistant message
 *   4. TOOL: run the tool, append the OBSERVE message, loop
 *   5. OUTPUT: return its content
 *
 * There is no retry: a failed provider call ends the run with
 * {@link PROVIDER_FAILURE_RESPONSE}.
 */
export class Agent {
  private provider: LLMProvider;
  private model: string;
  private maxTokens?: number;
  private maxSteps?: number;
  private systemPrompt: string;
  private commandTimeoutMs?: number;
  private signal?: AbortSignal;
  private eventLogger: EventLogger;
  private onStep?: (step: Step) => void;
  private onObservation?: (observation: Observation) => void;

  constructor(config: AgentConfig) {
    if (config.maxSteps !== undefined && config.maxSteps < 1) {
      throw new Error("maxSteps must be at least 1");
    }
    this.provider = config.provider;
    this.model = config.model;
    this.maxTokens = config.maxTokens;
    this.maxSteps = config.maxSteps;
    this.systemPrompt = config.systemPrompt ?? buildSystemPrompt();
    this.commandTimeoutMs = config.commandTimeoutMs;
    this.signal = config.signal;
    this.eventLogger = config.eventLogger ?? new EventLogger();
    this.onStep = config.onStep;
    this.onObservation = config.onObservation;
  }

  async run(query: string): Promise<RunResult> {
    const runId = createRunId();
    const transcript: Message[] = [
      { role: "system", content: this.systemPrompt },
      { role: "user", content: query },
    ];
    const steps: Step[] = [];
    const toolsUsed: string[] = [];
    const usage: Usage = { inputTokens: 0, outputTokens: 0 };

    this.eventLogger.log("query", runId, { query, model: this.model });

    const finalize = (
      status: RunStatus,
      response: string,
      reason?: string
    ): RunResult => {
      this.eventLogger.log("run_result", runId, {
        status,
        reason,
        steps: steps.length,
        toolsUsed: [...toolsUsed],
      });
      return {
        status,
        response,
        runId,
        steps,
        toolsUsed,
        usage,
        transcript: [...transcript],
        reason,
      };
    };

    while (this.maxSteps === undefined || steps.length < this.maxSteps) {
      if (this.signal?.aborted) {
        return finalize("cancelled", CANCELLED_RESPONSE, "signal_aborted");
      }

      let reply: StepReply;
      try {
        reply = await completeStep(this.provider, {
          model: this.model,
          transcript: [...transcript],
          maxTokens: this.maxTokens,
          signal: this.signal,
        });
      } catch (err) {
        const message = errorMessage(err);
        this.eventLogger.log("provider_error", runId, {
          provider: this.provider.name,
          message,
        });
        return finalize("failed", PROVIDER_FAILURE_RESPONSE, message);
      }

      transcript.push({ role: "assistant", content: reply.rawText });
      steps.push(reply.step);
      if (reply.usage) {
        usage.inputTokens += reply.usage.inputTokens;
        usage.outputTokens += reply.usage.outputTokens;
      }
      this.eventLogger.log("step", runId, { ...reply.step });
      this.onStep?.(reply.step);

      const step = reply.step;
      switch (step.step) {
        case "START":
        case "PLAN":
          break;
        case "TOOL": {
          toolsUsed.push(step.tool);
          const observation = this.observe(runId, step);
          transcript.push({
            role: "user",
            content: JSON.stringify({
              step: "OBSERVE",
              tool: observation.tool,
              input: observation.input,
              output: observation.output,
            }),
          });
          this.onObservation?.(observation);
          break;
        }
        case "OUTPUT":
          return finalize("completed", step.content);
        default: {
          const exhaustive: never = step;
          throw new Error(`Unhandled step: ${JSON.stringify(exhaustive)}`);
        }
      }
    }

    return finalize(
      "max_steps",
      `Error: Agent stopped after ${steps.length} steps without producing an OUTPUT step`,
      "max_steps_reached"
    );
  }

  /** Run the tool named by a TOOL step. Never throws. */
  private observe(runId: string, step: ToolStep): Observation {
    this.eventLogger.log("tool_call", runId, {
      tool: step.tool,
      input: step.input,
    });

    let output: string;
    const decoded = decodeToolCall(step.tool, step.input);
    if (!decoded.ok) {
      output = decoded.error;
    } else {
      try {
        output = invokeTool(decoded.invocation, {
          commandTimeoutMs: this.commandTimeoutMs,
        });
      } catch (err) {
        output = `Error executing tool: ${errorMessage(err)}`;
      }
    }

    this.eventLogger.log("tool_result", runId, {
      tool: step.tool,
      isError: output.startsWith("Error"),
      outputLength: output.length,
    });

    return { tool: step.tool, input: step.input, output };
  }
}

function createRunId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}
