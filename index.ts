/**
 * stepwise-agent: a coding agent that drives an LLM through
 * START → PLAN → TOOL → OBSERVE → OUTPUT.
 *
 *   const provider = createProvider({ type: "openai", model: "gpt-5-mini" });
 *   const agent = new Agent({ provider, model: "gpt-5-mini", maxSteps: 50 });
 *   const result = await agent.run("List the files in the current directory");
 *   console.log(result.response);
 */
export * from "./agent";
export * from "./tools";
export * from "./providers";
export { EventLogger, AGENT_EVENT_TYPES } from "./runtime/events";
export type { AgentEvent, AgentEventType } from "./runtime/events";
export { loadConfig, ConfigError, DEFAULT_MAX_STEPS } from "./runtime/config";
export type { AppConfig, ConfigOverrides } from "./runtime/config";
