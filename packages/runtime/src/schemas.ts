import { z } from "zod";

/** Researcher structured reply. Keys arrive in snake_case from the model. */
export const ResearchSynthesisSchema = z
  .object({
    answer: z.string(),
    key_facts: z.array(z.string()).default([]),
    sources: z.array(z.string()).default([]),
  })
  .transform(({ answer, key_facts, sources }) => ({ answer, keyFacts: key_facts, sources }));

export type ResearchSynthesis = z.infer<typeof ResearchSynthesisSchema>;

/**
 * Validator structured reply. The score range is enforced by the
 * validation history tracker, not here, so out-of-range scores surface
 * as contract violations.
 */
export const ValidationResultSchema = z
  .object({
    confidence_score: z.number(),
    assessment: z.string(),
  })
  .transform(({ confidence_score, assessment }) => ({
    confidenceScore: confidence_score,
    assessment,
  }));

export type ValidationResult = z.infer<typeof ValidationResultSchema>;
