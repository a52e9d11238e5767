import type { SpanId, Timestamp, TraceId } from "./foundational.js";

/**
 * Attached to every ColloquyEvent and every log line of a turn.
 *
 * Compatible with OpenTelemetry W3C Trace Context.
 */
export interface TraceContext {
  /** Unique per conversation turn. All descendant spans share this. */
  readonly traceId: TraceId;
  /** Unique per event/operation. */
  readonly spanId: SpanId;
  /** The span that caused this event. Absent for root spans. */
  readonly parentSpanId?: SpanId;
}

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Structured log entry emitted by any component. */
export interface LogEntry {
  readonly timestamp: Timestamp;
  readonly level: LogLevel;
  readonly message: string;
  /** Dotted component path, e.g. "runtime.validator". */
  readonly component: string;
  readonly traceCtx?: TraceContext;
  readonly data?: Record<string, unknown>;
}
