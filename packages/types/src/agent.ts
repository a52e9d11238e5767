import type { ThreadId } from "./foundational.js";
import type {
  AgentName,
  ConversationMetadata,
  ConversationState,
  Message,
  ValidationRecord,
} from "./conversation.js";

/** What a stage hands to its agent. */
export interface AgentInput {
  readonly messages: ReadonlyArray<Message>;
  /** Prior validator outcomes, oldest first. Only the validator reads this. */
  readonly previousValidations?: ReadonlyArray<ValidationRecord>;
}

/**
 * The final response from an agent after processing a turn.
 */
export interface AgentResponse {
  /** Detailed text output (synthesis or assessment). */
  readonly content: string;
  /** Short conversational version; this is what enters the transcript. */
  readonly audioSummary: string;
  /** Synthesized speech for `audioSummary`, or null when TTS produced nothing. */
  readonly audio: Uint8Array | null;
  /** Fields merged into the thread metadata. */
  readonly metadata: ConversationMetadata;
}

/**
 * The agent contract shared by the researcher and the validator.
 *
 * Agents are passive: the pipeline hands them the transcript and merges
 * what they return. They never touch the store or each other.
 */
export interface ConversationAgent {
  readonly name: AgentName;
  process(input: AgentInput): Promise<AgentResponse>;
}

/** Transient per-stage result surfaced to front ends. Never persisted. */
export interface StageOutput {
  readonly agent: AgentName;
  readonly content: string;
  readonly audioSummary: string;
  readonly audio: Uint8Array | null;
}

/** Everything a front end needs after one researcher → validator turn. */
export interface TurnResult {
  readonly threadId: ThreadId;
  /** The state as persisted at the end of the turn. */
  readonly state: ConversationState;
  readonly research: StageOutput;
  readonly validation: StageOutput;
  /** Whether the context manager replaced old history with a summary. */
  readonly compacted: boolean;
}
