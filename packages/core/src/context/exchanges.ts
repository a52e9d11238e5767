import type { Message } from "@colloquy/types";
import { TiktokenEstimator, type TokenEstimator } from "./token-estimator.js";

/**
 * Number of exchanges (completed or in progress) in a transcript.
 * One exchange starts at each user message.
 */
export function countExchanges(messages: ReadonlyArray<Message>): number {
  let count = 0;
  for (const message of messages) {
    if (message.role === "user") count++;
  }
  return count;
}

export interface SummarizationThresholds {
  readonly maxExchanges: number;
  readonly maxTokens: number;
}

/**
 * Whether the transcript has outgrown either threshold.
 *
 * Either condition alone fires the trigger. Both comparisons are strict:
 * exactly `maxExchanges` exchanges does not summarize.
 */
export function shouldSummarize(
  messages: ReadonlyArray<Message>,
  thresholds: SummarizationThresholds,
  estimator: TokenEstimator = new TiktokenEstimator()
): boolean {
  if (countExchanges(messages) > thresholds.maxExchanges) return true;
  return estimator.estimateMessages(messages) > thresholds.maxTokens;
}

export interface HistoryPartition {
  /** Everything before the retained exchanges. Empty when nothing is old enough. */
  readonly toSummarize: Message[];
  /** The last `numExchanges` exchanges, verbatim. */
  readonly toKeep: Message[];
}

/**
 * Split a transcript at the start of its last `numExchanges` exchanges.
 * `[...toSummarize, ...toKeep]` always equals the input.
 */
export function partitionHistory(
  messages: ReadonlyArray<Message>,
  numExchanges: number
): HistoryPartition {
  const userIndices: number[] = [];
  messages.forEach((message, index) => {
    if (message.role === "user") userIndices.push(index);
  });

  if (userIndices.length <= numExchanges) {
    return { toSummarize: [], toKeep: [...messages] };
  }

  const keepCount = Math.max(0, numExchanges);
  const splitAt = keepCount === 0 ? messages.length : userIndices[userIndices.length - keepCount];
  return {
    toSummarize: messages.slice(0, splitAt),
    toKeep: messages.slice(splitAt),
  };
}
