import type { ChatMessage } from "./types";

export interface ConversationTurn {
  role: "user" | "assistant";
  content: string;
}

export interface SplitConversation {
  system?: string;
  turns: ConversationTurn[];
}

/** Appended when a transcript ends on an assistant turn. */
export const CONTINUE_PROMPT = "Continue.";

/**
 * Split a transcript for providers that take the system prompt out of band
 * and expect alternating user/assistant turns.
 *
 * Consecutive turns with the same role are joined with a blank line, and a
 * transcript that ends on the assistant gets a short user turn so the model
 * produces the next reply instead of continuing its last one.
 */
export function splitConversation(messages: ChatMessage[]): SplitConversation {
  const systemParts: string[] = [];
  const turns: ConversationTurn[] = [];

  for (const msg of messages) {
    if (msg.role === "system") {
      systemParts.push(msg.content);
      continue;
    }
    const previous = turns[turns.length - 1];
    if (previous && previous.role === msg.role) {
      previous.content = `${previous.content}\n\n${msg.content}`;
    } else {
      turns.push({ role: msg.role, content: msg.content });
    }
  }

  const last = turns[turns.length - 1];
  if (last && last.role === "assistant") {
    turns.push({ role: "user", content: CONTINUE_PROMPT });
  }

  return {
    system: systemParts.length > 0 ? systemParts.join("\n\n") : undefined,
    turns,
  };
}
