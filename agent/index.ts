export { Agent, PROVIDER_FAILURE_RESPONSE, CANCELLED_RESPONSE } from "./agent";
export { buildSystemPrompt } from "./prompt";
export {
  completeStep,
  parseStep,
  StepParseError,
  StepSchema,
  STEP_KINDS,
  STEP_RESPONSE_FORMAT,
} from "./steps";
export type {
  Step,
  StepKind,
  StartStep,
  PlanStep,
  ToolStep,
  OutputStep,
  StepReply,
  StepRequest,
} from "./steps";
export type {
  AgentConfig,
  Message,
  Observation,
  RunResult,
  RunStatus,
} from "./types";
