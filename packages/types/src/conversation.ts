import type { ThreadId } from "./foundational.js";

export type MessageRole = "user" | "agent" | "system";

/** A single transcript entry. Order within a transcript is chronological. */
export interface Message {
  readonly role: MessageRole;
  readonly content: string;
}

/** One validator outcome, as kept in the rolling validation window. */
export interface ValidationRecord {
  /** Integer in [0, 100]. */
  readonly confidenceScore: number;
  readonly assessment: string;
  readonly isValidated: boolean;
}

export type AgentName = "researcher" | "validator";

/**
 * Per-thread metadata carried alongside the transcript.
 *
 * `validationHistory` holds at most two records, most recent last.
 * The scalar fields describe the last stage that ran.
 */
export interface ConversationMetadata {
  readonly validationHistory?: ReadonlyArray<ValidationRecord>;
  readonly confidenceScore?: number;
  readonly assessment?: string;
  readonly isValidated?: boolean;
  readonly agent?: AgentName;
  readonly query?: string;
}

/** The unit of persistence for one conversation thread. */
export interface ConversationState {
  readonly messages: ReadonlyArray<Message>;
  readonly metadata: ConversationMetadata;
}

/**
 * Durable keyed store of conversation states.
 * The store is the sole owner of durable state; callers hold transient copies.
 */
export interface ConversationStore {
  /** Latest saved state for the thread, or undefined on cold start. */
  load(threadId: ThreadId): Promise<ConversationState | undefined>;
  save(threadId: ThreadId, state: ConversationState): Promise<void>;
  /** Every thread id that has at least one saved state, sorted. */
  listAllThreadIds(): Promise<string[]>;
}
