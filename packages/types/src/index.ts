export type { ThreadId, TraceId, SpanId, EventId, Timestamp } from "./foundational.js";
export type { TraceContext, LogLevel, LogEntry } from "./observability.js";
export type { ColloquyErrorCode } from "./error.js";
export type {
  MessageRole,
  Message,
  ValidationRecord,
  AgentName,
  ConversationMetadata,
  ConversationState,
  ConversationStore,
} from "./conversation.js";
export type {
  SearchService,
  OutputSchema,
  LanguageModel,
  AudioFormat,
  SpeechSynthesizer,
} from "./collaborators.js";
export type {
  AgentInput,
  AgentResponse,
  ConversationAgent,
  StageOutput,
  TurnResult,
} from "./agent.js";
export type {
  ColloquyEvent,
  EventTopic,
  EventFilter,
  EventHandler,
  Subscription,
  EventBus,
  TurnStartedPayload,
  CompactionPayload,
  TurnFailedPayload,
} from "./event-bus.js";
