import type { Message, ValidationRecord } from "@colloquy/types";
import { conversationContextLines, isOngoing } from "./context.js";

const RULE = "=".repeat(80);

export const VALIDATION_SYSTEM_PROMPT = `You are a validation expert in an ongoing conversation. Your job is to analyze
research findings and assess their accuracy, completeness, and relevance to the user's question.
Identify any potential issues, missing information, or areas that need clarification.

When validating:
- Consider the conversation context - is this a follow-up question building on previous answers?
- If previous information was discussed, check for consistency with earlier findings
- Assess whether the research addresses the current question appropriately in the conversation
  flow
- CRITICAL: If previous validation results are provided, carefully check if this research
  addresses the gaps or missing information identified in previous validations. If gaps are
  now covered, you MUST increase the confidence score accordingly (typically 5-15 points
  improvement). This is important for tracking learning and improvement.

You must provide:
1. A confidence score (0-100) where:
   - 0-40: Poor quality, significant issues
   - 41-70: Acceptable but has issues
   - 71-85: Good quality, minor issues
   - 86-100: Excellent quality
2. A detailed assessment explaining your score, explicitly mentioning if previously identified
   gaps have been addressed and how this affects the score.

Reply with a JSON object with the fields "confidence_score" (integer) and "assessment" (string).`;

function previousValidationLines(previous: ReadonlyArray<ValidationRecord>): string[] {
  const lines = [RULE, "PREVIOUS VALIDATION HISTORY - CRITICAL FOR SCORE IMPROVEMENT", RULE];
  previous.slice(-2).forEach((record, i) => {
    lines.push(
      `\nPrevious Validation ${i + 1}:`,
      `  Score: ${record.confidenceScore}%`,
      `  Assessment: ${record.assessment}`,
      ""
    );
  });
  lines.push(
    "IMPORTANT INSTRUCTIONS:",
    "1. Carefully read the previous validation assessments above.",
    "2. Identify what information was MISSING or identified as needing improvement.",
    "3. Check if the current research findings address those missing elements.",
    "4. If gaps are now covered, you MUST increase the confidence score " +
      "(typically 5-15 points higher than the previous score).",
    "5. Explicitly state in your assessment which previously missing information " +
      "is now included and how this improves the answer quality.",
    RULE,
    ""
  );
  return lines;
}

export function validationUserPrompt(
  query: string,
  research: string,
  history: ReadonlyArray<Message> = [],
  previous: ReadonlyArray<ValidationRecord> = []
): string {
  const context = conversationContextLines(history);
  // Summaries lead, then the validation history, then the recent turns.
  const summaryEnd = context.indexOf("Recent conversation context:");
  const summaryLines = summaryEnd === -1 ? context : context.slice(0, summaryEnd);
  const recentLines = summaryEnd === -1 ? [] : context.slice(summaryEnd);

  const lines = [
    ...summaryLines,
    ...(previous.length > 0 ? previousValidationLines(previous) : []),
    ...recentLines,
    `Current User Question: ${query}`,
    "",
    "Research Findings:",
    research,
    "",
    "Please validate these research findings. Address:",
    "1. Is the information accurate and relevant to the question?",
    "2. Are there any factual errors or inconsistencies?",
    "3. Is any critical information missing?",
    "4. Overall assessment: Does this adequately answer the user's question?",
  ];
  if (previous.length > 0) {
    lines.push(
      "",
      "5. IMPROVEMENT CHECK (CRITICAL): Compare this research with previous validation assessments:",
      "   a. What specific information was missing or identified as needing improvement in the previous validation(s)?",
      "   b. Does the current research findings include that missing information?",
      "   c. If yes, how much does this improve the answer quality? (This should result in a higher confidence score)",
      "   d. Explicitly state the improvement in your assessment and adjust the score accordingly."
    );
  }
  return lines.join("\n");
}

export const VALIDATOR_SPOKEN_SYSTEM_PROMPT = `You are a validator having a conversation with colleagues.
Your job is to verbally present your validation findings in a natural, conversational way.
Speak as if you're talking to someone, not reading a report.
Keep it concise (2-3 sentences) but informative.
Use natural speech patterns like "I checked...", "I noticed...", "Overall..."
Mention your confidence level naturally.
If this is part of an ongoing conversation, reference previous points naturally when relevant.`;

export function validatorSpokenUserPrompt(
  query: string,
  assessment: string,
  confidenceScore: number,
  history?: ReadonlyArray<Message>
): string {
  const lines = [`You just validated research about: "${query}"`, ""];
  if (isOngoing(history)) lines.push("This is part of an ongoing conversation.", "");
  lines.push(
    `Your confidence score: ${confidenceScore}/100`,
    "",
    "Your detailed validation:",
    assessment,
    "",
    "Now, verbally share your validation assessment in a natural, conversational way " +
      "(2-3 sentences). Include your confidence level naturally in the conversation. " +
      "If this continues a previous topic, reference it naturally."
  );
  return lines.join("\n");
}
