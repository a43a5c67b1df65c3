import { spawnSync } from "child_process";
import { errorMessage } from "./text";

/**
 * Substrings that reject a command before it runs, matched case-insensitively.
 *
 * This is a coarse filter, not a security boundary: "dd" also rejects
 * `echo add`, and a rephrased destructive command passes.
 */
export const BLOCKED_COMMAND_PATTERNS = [
  "rm -rf /",
  "dd",
  "mkfs",
  "format",
  ":(){:|:&};:",
] as const;

export const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;

export interface ExecuteCommandOptions {
  timeoutMs?: number;
  cwd?: string;
}

export function isBlockedCommand(command: string): boolean {
  const lowered = command.toLowerCase();
  return BLOCKED_COMMAND_PATTERNS.some((pattern) => lowered.includes(pattern));
}

/**
 * Run a command through the shell, capturing stdout and stderr separately.
 *
 *   STDOUT:
 *   <stdout>
 *   STDERR:
 *   <stderr>
 *   Exit code: <n>
 *
 * Sections are omitted when empty; "(No output)" when all are.
 */
export function executeCommand(
  command: string,
  options: ExecuteCommandOptions = {}
): string {
  const timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;

  if (isBlockedCommand(command)) {
    return "Error: Command blocked for safety reasons";
  }

  try {
    const result = spawnSync(command, {
      shell: true,
      cwd: options.cwd,
      encoding: "utf-8",
      timeout: timeoutMs,
      maxBuffer: 16 * 1024 * 1024,
    });

    if (result.error) {
      if (isTimeout(result.error)) {
        return `Error: Command timed out after ${timeoutMs / 1000} seconds`;
      }
      return `Error executing command: ${result.error.message}`;
    }

    const output: string[] = [];
    if (result.stdout) output.push(`STDOUT:\n${result.stdout}`);
    if (result.stderr) output.push(`STDERR:\n${result.stderr}`);
    if (result.status !== null && result.status !== 0) {
      output.push(`Exit code: ${result.status}`);
    } else if (result.status === null && result.signal) {
      output.push(`Terminated by signal ${result.signal}`);
    }

    return output.length > 0 ? output.join("\n") : "(No output)";
  } catch (err) {
    return `Error executing command: ${errorMessage(err)}`;
  }
}

function isTimeout(error: Error): boolean {
  return "code" in error && error.code === "ETIMEDOUT";
}
