import { getEncoding, type Tiktoken, type TiktokenEncoding } from "js-tiktoken";
import type { Message } from "@colloquy/types";

/**
 * Shared token-estimation contract for the context manager.
 */
export interface TokenEstimator {
  readonly encoding: TiktokenEncoding;
  estimateText(text: string): number;
  estimateMessage(message: Message): number;
  estimateMessages(messages: ReadonlyArray<Message>): number;
}

export const DEFAULT_TOKENIZER_MODEL = "gpt-4o";
export const FALLBACK_ENCODING: TiktokenEncoding = "cl100k_base";

/** Checked in order, so longer prefixes must precede shorter ones. */
const MODEL_PREFIX_ENCODINGS: ReadonlyArray<readonly [string, TiktokenEncoding]> = [
  ["gpt-4o", "o200k_base"],
  ["gpt-4.1", "o200k_base"],
  ["o1", "o200k_base"],
  ["o3", "o200k_base"],
  ["o4", "o200k_base"],
  ["gpt-4", "cl100k_base"],
  ["gpt-3.5", "cl100k_base"],
  ["text-embedding", "cl100k_base"],
];

const encoders = new Map<TiktokenEncoding, Tiktoken>();

/**
 * Pick the sub-word encoding for a model name.
 * Unknown names get the generic cl100k_base encoding.
 */
export function encodingForModelName(model: string): TiktokenEncoding {
  const normalized = model.trim().toLowerCase();
  for (const [prefix, encoding] of MODEL_PREFIX_ENCODINGS) {
    if (normalized.startsWith(prefix)) return encoding;
  }
  return FALLBACK_ENCODING;
}

function encoderFor(encoding: TiktokenEncoding): Tiktoken {
  let encoder = encoders.get(encoding);
  if (!encoder) {
    encoder = getEncoding(encoding);
    encoders.set(encoding, encoder);
  }
  return encoder;
}

/**
 * Tokenizer-backed estimator. Each message is costed as `"{role}: {content}"`,
 * so the total only grows as messages are appended.
 */
export class TiktokenEstimator implements TokenEstimator {
  readonly encoding: TiktokenEncoding;
  private readonly encoder: Tiktoken;

  constructor(model: string = DEFAULT_TOKENIZER_MODEL) {
    this.encoding = encodingForModelName(model);
    this.encoder = encoderFor(this.encoding);
  }

  estimateText(text: string): number {
    if (!text) return 0;
    // Markers such as "<|endoftext|>" in user text are plain text here, never rejected.
    return this.encoder.encode(text, [], []).length;
  }

  estimateMessage(message: Message): number {
    return this.estimateText(`${message.role}: ${message.content}`);
  }

  estimateMessages(messages: ReadonlyArray<Message>): number {
    let total = 0;
    for (const message of messages) {
      total += this.estimateMessage(message);
    }
    return total;
  }
}

export function estimateMessageTokens(
  messages: ReadonlyArray<Message>,
  model: string = DEFAULT_TOKENIZER_MODEL
): number {
  return new TiktokenEstimator(model).estimateMessages(messages);
}
