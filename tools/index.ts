export { readFile, writeFile, createDirectory, listFiles } from "./filesystem";
export {
  executeCommand,
  isBlockedCommand,
  BLOCKED_COMMAND_PATTERNS,
  DEFAULT_COMMAND_TIMEOUT_MS,
} from "./shell";
export type { ExecuteCommandOptions } from "./shell";
export { searchCode, MAX_SEARCH_RESULTS } from "./search";
export type { SearchCodeOptions } from "./search";
export {
  decodeToolCall,
  invokeTool,
  isToolName,
  INPUT_DELIMITER,
  TOOL_NAMES,
  TOOL_DESCRIPTIONS,
} from "./registry";
export type {
  DecodeResult,
  ToolDescription,
  ToolInvocation,
  ToolName,
  ToolRuntimeOptions,
} from "./registry";
