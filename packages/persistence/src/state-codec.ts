import { z } from "zod";
import type { ConversationState } from "@colloquy/types";

/*
 * Stored states use snake_case keys. These schemas are the only place
 * that knows the stored shape.
 */

const StoredMessageSchema = z.object({
  role: z.enum(["user", "agent", "system"]),
  content: z.string(),
});

const StoredValidationSchema = z.object({
  confidence_score: z.number().int().min(0).max(100),
  assessment: z.string(),
  is_validated: z.boolean(),
});

const StoredMetadataSchema = z.object({
  validation_history: z.array(StoredValidationSchema).optional(),
  confidence_score: z.number().int().min(0).max(100).optional(),
  assessment: z.string().optional(),
  is_validated: z.boolean().optional(),
  agent: z.enum(["researcher", "validator"]).optional(),
  query: z.string().optional(),
});

export const StoredStateSchema = z.object({
  messages: z.array(StoredMessageSchema),
  metadata: StoredMetadataSchema.default({}),
});

export type StoredState = z.infer<typeof StoredStateSchema>;

export function encodeState(state: ConversationState): StoredState {
  const m = state.metadata;
  return {
    messages: state.messages.map(({ role, content }) => ({ role, content })),
    metadata: {
      ...(m.validationHistory
        ? {
            validation_history: m.validationHistory.map((v) => ({
              confidence_score: v.confidenceScore,
              assessment: v.assessment,
              is_validated: v.isValidated,
            })),
          }
        : {}),
      ...(m.confidenceScore !== undefined ? { confidence_score: m.confidenceScore } : {}),
      ...(m.assessment !== undefined ? { assessment: m.assessment } : {}),
      ...(m.isValidated !== undefined ? { is_validated: m.isValidated } : {}),
      ...(m.agent !== undefined ? { agent: m.agent } : {}),
      ...(m.query !== undefined ? { query: m.query } : {}),
    },
  };
}

export function decodeState(stored: StoredState): ConversationState {
  const m = stored.metadata;
  return {
    messages: stored.messages,
    metadata: {
      ...(m.validation_history
        ? {
            validationHistory: m.validation_history.map((v) => ({
              confidenceScore: v.confidence_score,
              assessment: v.assessment,
              isValidated: v.is_validated,
            })),
          }
        : {}),
      ...(m.confidence_score !== undefined ? { confidenceScore: m.confidence_score } : {}),
      ...(m.assessment !== undefined ? { assessment: m.assessment } : {}),
      ...(m.is_validated !== undefined ? { isValidated: m.is_validated } : {}),
      ...(m.agent !== undefined ? { agent: m.agent } : {}),
      ...(m.query !== undefined ? { query: m.query } : {}),
    },
  };
}
