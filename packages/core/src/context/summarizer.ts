import type { LanguageModel, Message } from "@colloquy/types";
import { ColloquyError } from "../errors.js";

export const SUMMARY_PREFIX = "Previous conversation summary: ";

const SUMMARIZER_SYSTEM_PROMPT = `You are a conversation summarizer. Your job is to create a concise
summary of the conversation, focusing on:
- Main topics and questions discussed
- Key findings and research results
- General themes and direction of the conversation

Keep the summary brief (200-300 tokens). Focus on high-level topics and findings, not
specific validation scores or detailed assessments. This summary will be used to provide
context for future exchanges.`;

export function formatTranscript(messages: ReadonlyArray<Message>): string {
  return messages
    .map((m) => `${m.role === "user" ? "User" : "Assistant"}: ${m.content}`)
    .join("\n\n");
}

export function buildSummaryPrompt(messages: ReadonlyArray<Message>): string {
  return `${SUMMARIZER_SYSTEM_PROMPT}

Please summarize this conversation:

${formatTranscript(messages)}

Provide a concise summary focusing on topics discussed and key findings.`;
}

/**
 * Reduce a slice of transcript to summary text.
 * LLM failures propagate as-is; there is no fallback summary.
 */
export async function summarizeConversation(
  messages: ReadonlyArray<Message>,
  llm: LanguageModel
): Promise<string> {
  if (messages.length === 0) {
    throw new ColloquyError("INTERNAL_ERROR", "Refusing to summarize an empty transcript");
  }
  const summary = await llm.generate(buildSummaryPrompt(messages));
  return summary.trim();
}

export function createSummaryMessage(summaryText: string): Message {
  return { role: "system", content: `${SUMMARY_PREFIX}${summaryText}` };
}
