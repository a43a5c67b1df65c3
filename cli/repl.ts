import * as readline from "readline";
import type { RunResult } from "../agent/types";
import { errorMessage } from "../tools/text";
import { formatResult, paint } from "./render";

export const QUIT_COMMANDS = ["quit", "exit", "q"] as const;

export type InputAction =
  | { kind: "empty" }
  | { kind: "quit" }
  | { kind: "query"; query: string };

export function classifyInput(line: string): InputAction {
  const trimmed = line.trim();
  if (!trimmed) return { kind: "empty" };
  if ((QUIT_COMMANDS as readonly string[]).includes(trimmed.toLowerCase())) {
    return { kind: "quit" };
  }
  return { kind: "query", query: trimmed };
}

export interface QueryRunner {
  run(query: string): Promise<Pick<RunResult, "status" | "response" | "reason">>;
}

export interface ReplOptions {
  runner: QueryRunner;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  prompt?: string;
  banner?: string;
  useColor?: boolean;
}

/**
 * Read queries line by line and run them one at a time.
 * Resolves once input is closed (quit keyword or end of input) and the
 * query in flight has finished.
 */
export function startRepl(options: ReplOptions): Promise<void> {
  const { runner, input, output } = options;
  const useColor = options.useColor ?? true;
  const rl = readline.createInterface({ input, output });
  const write = (text: string): void => {
    output.write(text + "\n");
  };

  let closed = false;
  let quitting = false;
  let queue: Promise<void> = Promise.resolve();

  const prompt = (): void => {
    if (!closed) rl.prompt();
  };

  const handleLine = async (line: string): Promise<void> => {
    if (quitting) return;
    const action = classifyInput(line);
    switch (action.kind) {
      case "empty":
        prompt();
        return;
      case "quit":
        quitting = true;
        write("Goodbye!");
        rl.close();
        return;
      case "query":
        try {
          const result = await runner.run(action.query);
          write(formatResult(result, useColor));
        } catch (err) {
          write(`${paint("Error:", "red", useColor)} ${errorMessage(err)}`);
        }
        prompt();
        return;
      default: {
        const exhaustive: never = action;
        throw new Error(`Unhandled input: ${JSON.stringify(exhaustive)}`);
      }
    }
  };

  return new Promise((resolve) => {
    rl.on("close", () => {
      closed = true;
      resolve(queue);
    });
    rl.on("line", (line) => {
      queue = queue.then(() => handleLine(line));
    });

    rl.setPrompt(options.prompt ?? paint("you> ", "green", useColor));
    if (options.banner) write(options.banner);
    prompt();
  });
}
