import type { Observation } from "../agent/types";
import type { Step } from "../agent/steps";

const color = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  magenta: "\x1b[35m",
  red: "\x1b[31m",
};

export type Tone = Exclude<keyof typeof color, "reset">;

export const TOOL_INPUT_PREVIEW = 50;
export const TOOL_OUTPUT_PREVIEW = 200;

export function paint(text: string, tone: Tone, enabled = true): string {
  return enabled ? `${color[tone]}${text}${color.reset}` : text;
}

export function preview(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export function formatStep(step: Step, useColor = true): string {
  switch (step.step) {
    case "START":
      return `${paint("start>", "magenta", useColor)} ${step.content}`;
    case "PLAN":
      return `${paint("plan>", "dim", useColor)} ${step.content}`;
    case "TOOL":
      return `${paint("tool>", "yellow", useColor)} ${step.tool}(${preview(step.input, TOOL_INPUT_PREVIEW)})`;
    case "OUTPUT":
      return `${paint("assistant>", "cyan", useColor)} ${step.content}`;
    default: {
      const exhaustive: never = step;
      return JSON.stringify(exhaustive);
    }
  }
}

export function formatObservation(
  observation: Observation,
  useColor = true
): string {
  const tone: Tone = observation.output.startsWith("Error") ? "red" : "green";
  return `${paint("result>", tone, useColor)} ${preview(observation.output, TOOL_OUTPUT_PREVIEW)}`;
}

/**
 * Final output of a query: the OUTPUT content, or the reason it has none.
 * A provider failure also gets a line with its cause.
 */
export function formatResult(
  result: { status: string; response: string; reason?: string },
  useColor = true
): string {
  if (result.status === "completed") {
    return `${paint("assistant>", "cyan", useColor)} ${result.response}`;
  }
  const error = paint("error>", "red", useColor);
  const lines = [`${error} ${result.response}`];
  if (result.status === "failed" && result.reason) {
    lines.unshift(`${error} Error calling LLM: ${result.reason}`);
  }
  return lines.join("\n");
}

export function formatBanner(
  provider: string,
  model: string,
  useColor = true
): string {
  const rule = paint("═".repeat(60), "dim", useColor);
  return [
    rule,
    `  ${paint("stepwise-agent", "bold", useColor)} ${paint("coding agent", "dim", useColor)}`,
    `  provider=${paint(provider, "cyan", useColor)}  model=${paint(model, "cyan", useColor)}`,
    `  Type ${paint("quit", "magenta", useColor)}, ${paint("exit", "magenta", useColor)} or ${paint("q", "magenta", useColor)} to leave.`,
    rule,
  ].join("\n");
}
