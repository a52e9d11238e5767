import type { Message } from "@colloquy/types";
import { conversationContextLines, isOngoing } from "./context.js";

export const RESEARCH_SYNTHESIS_SYSTEM_PROMPT = `You are a research assistant in an ongoing conversation. Your job is to analyze search
results and provide clear, concise answers to the user's questions.

When responding:
- If this is a follow-up question, reference previous findings naturally (e.g., "Building on what
  we discussed earlier...")
- If the user asks for clarification or more details, expand on relevant points from previous
  answers
- Always be factual and cite key information
- Maintain conversation continuity when appropriate

Reply with a JSON object with the fields "answer" (string), "key_facts" (array of strings)
and "sources" (array of strings).`;

export function researchSynthesisUserPrompt(
  query: string,
  searchResults: string,
  history: ReadonlyArray<Message> = []
): string {
  return [
    ...conversationContextLines(history),
    `Current User Question: ${query}`,
    "",
    "Search Results:",
    searchResults,
    "",
    "Please provide a well-structured answer based on these search results. " +
      "If this is a follow-up question, reference the previous conversation naturally. " +
      "Be factual and cite key information.",
  ].join("\n");
}

export const RESEARCHER_SPOKEN_SYSTEM_PROMPT = `You are a research assistant having a conversation with colleagues.
Your job is to verbally present your research findings in a natural, conversational way.
Speak as if you're talking to someone, not reading a report.
Keep it concise (2-3 sentences) but informative.
Use natural speech patterns like "I found that...", "It turns out...", "Interestingly..."
If this is part of an ongoing conversation, reference previous points naturally when relevant.
`;

export function researcherSpokenUserPrompt(
  query: string,
  detailedContent: string,
  history?: ReadonlyArray<Message>
): string {
  const lines = [`You just researched: "${query}"`, ""];
  if (isOngoing(history)) lines.push("This is part of an ongoing conversation.", "");
  lines.push(
    "Your detailed findings:",
    detailedContent,
    "",
    "Now, verbally share your key findings in a natural, conversational way (2-3 sentences). " +
      "If this continues a previous topic, reference it naturally."
  );
  return lines.join("\n");
}
