import * as fs from "fs";
import * as path from "path";

export const AGENT_EVENT_TYPES = [
  "query",
  "step",
  "tool_call",
  "tool_result",
  "provider_error",
  "run_result",
] as const;

export type AgentEventType = typeof AGENT_EVENT_TYPES[number];

export interface AgentEvent {
  timestamp: string;
  type: AgentEventType;
  runId: string;
  data: Record<string, unknown>;
}

/**
 * Simple JSONL event logger.
 * Always keeps events in memory; appends each one to a file when given a path.
 */
export class EventLogger {
  private filePath?: string;
  private buffer: AgentEvent[] = [];

  constructor(options?: { filePath?: string }) {
    this.filePath = options?.filePath;
    if (this.filePath) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    }
  }

  log(type: AgentEventType, runId: string, data: Record<string, unknown>): void {
    const event: AgentEvent = {
      timestamp: new Date().toISOString(),
      type,
      runId,
      data,
    };
    this.buffer.push(event);
    if (this.filePath) {
      fs.appendFileSync(this.filePath, JSON.stringify(event) + "\n", "utf8");
    }
  }

  /** Get all events (from memory buffer) */
  getEvents(): AgentEvent[] {
    return [...this.buffer];
  }

  /** Events of one run, in order. */
  getRunEvents(runId: string): AgentEvent[] {
    return this.buffer.filter((event) => event.runId === runId);
  }
}
