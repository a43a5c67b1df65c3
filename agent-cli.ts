#!/usr/bin/env node
/**
 * agent-cli: interactive REPL for the stepwise coding agent.
 *
 * Usage:
 *   stepwise-agent
 *   stepwise-agent --provider anthropic --model claude-sonnet-4-20250514
 *   stepwise-agent --provider gemini --max-steps 30
 *   stepwise-agent --event-log ./agent-events.jsonl
 *
 * Configuration also comes from the environment (and .env): AGENT_PROVIDER,
 * AGENT_MODEL, AGENT_MAX_STEPS, AGENT_MAX_TOKENS, AGENT_COMMAND_TIMEOUT_MS,
 * AGENT_EVENT_LOG, plus the provider API keys.
 */
import "dotenv/config";
import { Agent } from "./agent/agent";
import { createProvider } from "./providers";
import { loadConfig } from "./runtime/config";
import { EventLogger } from "./runtime/events";
import { parseArgs, USAGE } from "./cli/args";
import { formatBanner, formatObservation, formatStep } from "./cli/render";
import { startRepl } from "./cli/repl";
import { errorMessage } from "./tools/text";

async function main(): Promise<void> {
  const { overrides, help } = parseArgs(process.argv.slice(2));
  if (help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig(process.env, overrides);
  const provider = createProvider({ type: config.provider, model: config.model });
  const useColor = Boolean(process.stdout.isTTY);

  const agent = new Agent({
    provider,
    model: config.model,
    maxTokens: config.maxTokens,
    maxSteps: config.maxSteps,
    commandTimeoutMs: config.commandTimeoutMs,
    eventLogger: new EventLogger({ filePath: config.eventLogPath }),
    onStep: (step) => {
      // The REPL prints the final answer itself.
      if (step.step !== "OUTPUT") console.log(formatStep(step, useColor));
    },
    onObservation: (observation) => {
      console.log(formatObservation(observation, useColor));
    },
  });

  await startRepl({
    runner: agent,
    input: process.stdin,
    output: process.stdout,
    banner: formatBanner(provider.name, config.model, useColor),
    useColor,
  });
}

main().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
