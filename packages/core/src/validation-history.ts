import type { ConversationMetadata, ValidationRecord } from "@colloquy/types";
import { ColloquyError } from "./errors.js";

/** Maximum number of prior validator outcomes kept in thread metadata. */
export const VALIDATION_WINDOW = 2;

/**
 * Prior validator outcomes for a thread, oldest first.
 *
 * Threads saved before `validationHistory` existed only carry the last
 * turn's scalar fields; those are lifted into a one-entry history.
 */
export function readValidationHistory(metadata: ConversationMetadata): ValidationRecord[] {
  if (metadata.validationHistory) {
    return metadata.validationHistory.slice(-VALIDATION_WINDOW);
  }
  if (metadata.confidenceScore !== undefined) {
    return [
      {
        confidenceScore: metadata.confidenceScore,
        assessment: metadata.assessment ?? "",
        isValidated: metadata.isValidated ?? false,
      },
    ];
  }
  return [];
}

export function assertValidScore(score: number): void {
  if (!Number.isInteger(score) || score < 0 || score > 100) {
    throw new ColloquyError(
      "CONTRACT_VIOLATION",
      `Confidence score must be an integer in [0, 100], got ${score}`
    );
  }
}

/** Append the newest outcome and keep only the last two. Never mutates `history`. */
export function appendValidation(
  history: ReadonlyArray<ValidationRecord>,
  record: ValidationRecord
): ValidationRecord[] {
  assertValidScore(record.confidenceScore);
  return [...history, record].slice(-VALIDATION_WINDOW);
}

export type ScoreChange = "first" | "improved" | "unchanged" | "declined";

export function describeScoreChange(
  history: ReadonlyArray<ValidationRecord>,
  newScore: number
): ScoreChange {
  const previous = history[history.length - 1];
  if (!previous) return "first";
  if (newScore > previous.confidenceScore) return "improved";
  if (newScore === previous.confidenceScore) return "unchanged";
  return "declined";
}
