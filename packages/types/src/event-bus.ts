import type { EventId, ThreadId, Timestamp } from "./foundational.js";
import type { TraceContext } from "./observability.js";

/**
 * Every notification the pipeline emits is a `ColloquyEvent`.
 *
 * @typeParam T - The topic-specific payload type.
 */
export interface ColloquyEvent<T = unknown> {
  readonly id: EventId;
  readonly topic: EventTopic;
  readonly payload: T;
  readonly traceCtx: TraceContext;
  readonly timestamp: Timestamp;
  /** Thread the event belongs to. Absent for system events. */
  readonly threadId?: ThreadId;
}

/**
 * Enumerated event topics.
 * Using a string union rather than a numeric enum for debuggability.
 */
export type EventTopic =
  // Turn lifecycle
  | "turn.started"
  | "turn.complete"
  | "turn.failed"
  // Stages
  | "stage.complete"
  // Context management
  | "context.compacted";

/**
 * Predicate for filtering which events a subscriber receives.
 */
export interface EventFilter {
  /** Match specific topics. If empty, matches all topics. */
  readonly topics?: EventTopic[];
  /** Only events for this thread. */
  readonly threadId?: ThreadId;
  /** Custom predicate for advanced filtering. */
  readonly predicate?: (event: ColloquyEvent) => boolean;
}

/** Callback signature for event subscribers. */
export type EventHandler<T = unknown> = (event: ColloquyEvent<T>) => void | Promise<void>;

/** Returned when subscribing; used to unsubscribe. */
export interface Subscription {
  readonly id: string;
  unsubscribe(): void;
}

/**
 * In-process notification channel between the pipeline and front ends.
 */
export interface EventBus {
  /** Publish an event to all matching subscribers and wait for their handlers. */
  publish<T>(event: ColloquyEvent<T>): Promise<void>;

  /** Subscribe to events matching the filter. */
  subscribe<T>(filter: EventFilter, handler: EventHandler<T>): Subscription;
}

/** Payload of "turn.started". */
export interface TurnStartedPayload {
  readonly userMessage: string;
  readonly priorMessageCount: number;
}

/** Payload of "context.compacted". */
export interface CompactionPayload {
  readonly summarizedCount: number;
  readonly keptCount: number;
}

/** Payload of "turn.failed". */
export interface TurnFailedPayload {
  readonly error: string;
  readonly code?: string;
}
