import type { LanguageModel, Message } from "@colloquy/types";
import { silentLogger, type Logger } from "../logger.js";
import { countExchanges, partitionHistory, shouldSummarize } from "./exchanges.js";
import { createSummaryMessage, summarizeConversation } from "./summarizer.js";
import {
  DEFAULT_TOKENIZER_MODEL,
  TiktokenEstimator,
  type TokenEstimator,
} from "./token-estimator.js";

export const DEFAULT_MAX_EXCHANGES = 5;
export const DEFAULT_MAX_TOKENS = 10_000;

/** FRESH: below both thresholds. COMPACTING: the trigger fired this turn. */
export type ContextState = "FRESH" | "COMPACTING";

export interface CompactionOutcome {
  readonly state: ContextState;
  /** True only when old history was actually replaced by a summary. */
  readonly compacted: boolean;
  readonly messages: Message[];
  readonly summarizedCount: number;
}

export interface ContextManagerOptions {
  llm: LanguageModel;
  maxExchanges?: number;
  maxTokens?: number;
  /** Model name used to pick the tokenizer. */
  tokenizerModel?: string;
  logger?: Logger;
}

/**
 * Keeps a transcript within bounds by folding old exchanges into one
 * system-role summary while the most recent `maxExchanges` stay verbatim.
 *
 * Summaries are only ever taken over whole exchanges. When the token limit
 * fires but every message still belongs to a retained exchange, the
 * transcript is returned unchanged.
 */
export class ContextManager {
  readonly maxExchanges: number;
  readonly maxTokens: number;
  private readonly llm: LanguageModel;
  private readonly estimator: TokenEstimator;
  private readonly log: Logger;

  constructor(opts: ContextManagerOptions) {
    this.llm = opts.llm;
    this.maxExchanges = opts.maxExchanges ?? DEFAULT_MAX_EXCHANGES;
    this.maxTokens = opts.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.estimator = new TiktokenEstimator(opts.tokenizerModel ?? DEFAULT_TOKENIZER_MODEL);
    this.log = opts.logger ?? silentLogger;
  }

  needsCompaction(messages: ReadonlyArray<Message>): boolean {
    return shouldSummarize(
      messages,
      { maxExchanges: this.maxExchanges, maxTokens: this.maxTokens },
      this.estimator
    );
  }

  async manage(messages: ReadonlyArray<Message>): Promise<CompactionOutcome> {
    if (!this.needsCompaction(messages)) {
      return { state: "FRESH", compacted: false, messages: [...messages], summarizedCount: 0 };
    }

    const { toSummarize, toKeep } = partitionHistory(messages, this.maxExchanges);
    if (toSummarize.length === 0) {
      this.log.debug("Token limit reached but no exchange is old enough to summarize", {
        exchanges: countExchanges(messages),
        maxExchanges: this.maxExchanges,
      });
      return { state: "COMPACTING", compacted: false, messages: [...messages], summarizedCount: 0 };
    }

    const summaryText = await summarizeConversation(toSummarize, this.llm);
    this.log.info("Compacted conversation history", {
      summarizedCount: toSummarize.length,
      keptCount: toKeep.length,
    });

    return {
      state: "COMPACTING",
      compacted: true,
      messages: [createSummaryMessage(summaryText), ...toKeep],
      summarizedCount: toSummarize.length,
    };
  }
}
