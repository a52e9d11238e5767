import type { ZodType, ZodTypeDef } from "zod";

/** Web search returning already-formatted result text. */
export interface SearchService {
  search(query: string): Promise<string>;
}

/**
 * A zod schema used to validate structured model output.
 * Input is left open so schemas with transforms or defaults are accepted.
 */
export type OutputSchema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * Abstraction over the underlying LLM.
 *
 * `generate()` is used for free-text completions (spoken summaries,
 * conversation summaries). `generateStructured()` must either return a value
 * that satisfies `schema` or throw; it never returns a default.
 */
export interface LanguageModel {
  generate(prompt: string): Promise<string>;
  generateStructured<T>(
    systemPrompt: string,
    userPrompt: string,
    schema: OutputSchema<T>,
    schemaName: string
  ): Promise<T>;
}

export type AudioFormat = "mp3" | "wav";

/** Text-to-speech. The byte format is fixed per instance by configuration. */
export interface SpeechSynthesizer {
  readonly format: AudioFormat;
  synthesize(text: string): Promise<Uint8Array>;
}
