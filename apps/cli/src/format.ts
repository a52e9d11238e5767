import type { ConversationState, Message, StageOutput } from "@colloquy/types";

const LABELS: Record<Message["role"], string> = {
  user: "You",
  agent: "Agent",
  system: "Summary",
};

/** Earlier turns of a thread, one line per message. */
export function formatTranscript(messages: ReadonlyArray<Message>): string {
  return messages.map((m) => `${LABELS[m.role]}: ${m.content}`).join("\n\n");
}

export function stageTitle(output: StageOutput): string {
  return output.agent === "researcher" ? "Researcher" : "Validator";
}

/** Confidence line shown after a completed turn. */
export function formatVerdict(state: ConversationState): string {
  const { confidenceScore, isValidated } = state.metadata;
  if (confidenceScore === undefined) return "No validation score recorded.";
  return `Confidence: ${confidenceScore}% · ${isValidated ? "Validated" : "Needs review"}`;
}
