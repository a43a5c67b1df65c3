import { createDirectory, listFiles, readFile, writeFile } from "./filesystem";
import { searchCode } from "./search";
import { executeCommand } from "./shell";

/** Separator for tools that pack several fields into one input string. */
export const INPUT_DELIMITER = "|||";

export const TOOL_NAMES = [
  "read_file",
  "write_file",
  "create_directory",
  "list_files",
  "execute_command",
  "search_code",
] as const;

export type ToolName = typeof TOOL_NAMES[number];

/** A decoded tool call, one variant per tool. */
export type ToolInvocation =
  | { tool: "read_file"; path: string }
  | { tool: "write_file"; path: string; content: string }
  | { tool: "create_directory"; path: string }
  | { tool: "list_files"; path: string }
  | { tool: "execute_command"; command: string }
  | {
      tool: "search_code";
      pattern: string;
      directory: string;
      extension: string;
    };

export type DecodeResult =
  | { ok: true; invocation: ToolInvocation }
  | { ok: false; error: string };

export interface ToolDescription {
  description: string;
  input: string;
}

/** What the system prompt tells the model about each tool. */
export const TOOL_DESCRIPTIONS: Record<ToolName, ToolDescription> = {
  read_file: {
    description: "Read the contents of a file.",
    input: "file_path",
  },
  write_file: {
    description:
      "Write content to a file, creating it or overwriting it. Missing parent directories are created.",
    input: `file_path${INPUT_DELIMITER}content`,
  },
  create_directory: {
    description: "Create a directory and any missing parent directories.",
    input: "directory_path",
  },
  list_files: {
    description: "List the files and directories directly inside a directory.",
    input: 'directory_path (defaults to ".")',
  },
  execute_command: {
    description: "Run a shell command and return its output.",
    input: "command",
  },
  search_code: {
    description:
      "Search files recursively for lines containing a pattern (case-insensitive).",
    input: `pattern${INPUT_DELIMITER}directory_path${INPUT_DELIMITER}file_extension (the last two are optional)`,
  },
};

export interface ToolRuntimeOptions {
  /** Timeout for execute_command. */
  commandTimeoutMs?: number;
}

export function isToolName(name: string): name is ToolName {
  return (TOOL_NAMES as readonly string[]).includes(name);
}

/**
 * Turn a tool name and its packed string input into a typed invocation.
 * Malformed input and unknown names come back as error text for the
 * observation rather than as exceptions.
 */
export function decodeToolCall(name: string, input: string): DecodeResult {
  if (!isToolName(name)) {
    return {
      ok: false,
      error: `Error executing tool: unknown tool "${name}". Available tools: ${TOOL_NAMES.join(", ")}`,
    };
  }

  switch (name) {
    case "read_file":
    case "create_directory":
      return { ok: true, invocation: { tool: name, path: input } };
    case "list_files":
      return { ok: true, invocation: { tool: name, path: input || "." } };
    case "execute_command":
      return { ok: true, invocation: { tool: name, command: input } };
    case "write_file": {
      const at = input.indexOf(INPUT_DELIMITER);
      if (at === -1) {
        return {
          ok: false,
          error: `Error executing tool: write_file expects input as file_path${INPUT_DELIMITER}content`,
        };
      }
      return {
        ok: true,
        invocation: {
          tool: name,
          path: input.slice(0, at),
          content: input.slice(at + INPUT_DELIMITER.length),
        },
      };
    }
    case "search_code": {
      const fields = input.split(INPUT_DELIMITER);
      if (fields.length > 3) {
        return {
          ok: false,
          error: `Error executing tool: search_code takes at most 3 fields separated by ${INPUT_DELIMITER}, got ${fields.length}`,
        };
      }
      const [pattern, directory, extension] = fields;
      return {
        ok: true,
        invocation: {
          tool: name,
          pattern,
          directory: directory || ".",
          extension: extension ?? "",
        },
      };
    }
    default: {
      const exhaustive: never = name;
      throw new Error(`Unhandled tool: ${exhaustive}`);
    }
  }
}

export function invokeTool(
  invocation: ToolInvocation,
  options: ToolRuntimeOptions = {}
): string {
  switch (invocation.tool) {
    case "read_file":
      return readFile(invocation.path);
    case "write_file":
      return writeFile(invocation.path, invocation.content);
    case "create_directory":
      return createDirectory(invocation.path);
    case "list_files":
      return listFiles(invocation.path);
    case "execute_command":
      return executeCommand(invocation.command, {
        timeoutMs: options.commandTimeoutMs,
      });
    case "search_code":
      return searchCode(invocation.pattern, {
        directory: invocation.directory,
        extension: invocation.extension,
      });
    default: {
      const exhaustive: never = invocation;
      throw new Error(`Unhandled tool invocation: ${JSON.stringify(exhaustive)}`);
    }
  }
}
