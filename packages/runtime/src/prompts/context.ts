import type { Message } from "@colloquy/types";

const RECENT_WINDOW = 6;
const MAX_CONTEXT_CHARS = 300;

function mentionsSummary(message: Message): boolean {
  return message.content.toLowerCase().includes("summary");
}

function truncate(content: string): string {
  return content.length > MAX_CONTEXT_CHARS ? `${content.slice(0, MAX_CONTEXT_CHARS)}...` : content;
}

/**
 * Lines describing earlier conversation for an agent prompt: rolling
 * summaries first, then a short window of recent turns. The newest
 * user/agent message is left out since the prompt restates it.
 */
export function conversationContextLines(history: ReadonlyArray<Message>): string[] {
  const lines: string[] = [];

  const summaries = history.filter((m) => m.role === "system" && mentionsSummary(m));
  if (summaries.length > 0) {
    lines.push("Previous conversation summary:");
    for (const summary of summaries) lines.push(`  ${summary.content}`);
    lines.push("");
  }

  if (history.length > 2) {
    const recent = history.filter(
      (m) => (m.role === "user" || m.role === "agent") && !mentionsSummary(m)
    );
    const included =
      recent.length > RECENT_WINDOW ? recent.slice(-RECENT_WINDOW, -1) : recent.slice(0, -1);
    if (included.length > 0) {
      lines.push("Recent conversation context:");
      for (const m of included) {
        lines.push(`  ${m.role === "user" ? "User" : "Assistant"}: ${truncate(m.content)}`);
      }
      lines.push("");
    }
  }

  return lines;
}

export function isOngoing(history: ReadonlyArray<Message> | undefined): boolean {
  return history !== undefined && history.length > 2;
}
