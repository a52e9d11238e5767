export {
  TiktokenEstimator,
  estimateMessageTokens,
  encodingForModelName,
  DEFAULT_TOKENIZER_MODEL,
  FALLBACK_ENCODING,
} from "./token-estimator.js";
export type { TokenEstimator } from "./token-estimator.js";
export { countExchanges, shouldSummarize, partitionHistory } from "./exchanges.js";
export type { SummarizationThresholds, HistoryPartition } from "./exchanges.js";
export {
  summarizeConversation,
  createSummaryMessage,
  buildSummaryPrompt,
  formatTranscript,
  SUMMARY_PREFIX,
} from "./summarizer.js";
export {
  ContextManager,
  DEFAULT_MAX_EXCHANGES,
  DEFAULT_MAX_TOKENS,
} from "./context-manager.js";
export type { CompactionOutcome, ContextManagerOptions, ContextState } from "./context-manager.js";
