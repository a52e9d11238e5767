export { InMemoryEventBus, createEvent, createTraceContext } from "./bus.js";
export { ColloquyError, isColloquyError, describeError } from "./errors.js";
export { createLogger, parseLogLevel, silentLogger } from "./logger.js";
export type { Logger, LoggerOptions, LogSink } from "./logger.js";
export {
  ConfigSchema,
  loadConfig,
  parseConfig,
  DEFAULT_CONFIG_PATH,
} from "./config.js";
export type { ColloquyConfig, Environment } from "./config.js";
export {
  normalizeThreadId,
  parseThreadId,
  listUsers,
  listTopicsForUser,
  findThreadId,
  THREAD_ID_DELIMITER,
  DEFAULT_USER,
  DEFAULT_TOPIC,
  MAX_TOPIC_LENGTH,
} from "./thread-id.js";
export {
  readValidationHistory,
  appendValidation,
  assertValidScore,
  describeScoreChange,
  VALIDATION_WINDOW,
} from "./validation-history.js";
export type { ScoreChange } from "./validation-history.js";
export * from "./context/index.js";
