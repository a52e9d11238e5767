import type { Message, MessageRole } from "@colloquy/types";

/** Content of the most recent message with `role`, or "". */
export function lastContent(messages: ReadonlyArray<Message>, role: MessageRole): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message && message.role === role) return message.content;
  }
  return "";
}
