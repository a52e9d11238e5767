import { v7 as uuidv7 } from "uuid";
import type {
  EventBus,
  ColloquyEvent,
  EventFilter,
  EventHandler,
  Subscription,
  EventTopic,
  TraceContext,
  EventId,
  SpanId,
  ThreadId,
  TraceId,
} from "@colloquy/types";
import { silentLogger, type Logger } from "./logger.js";

/**
 * In-memory implementation of the Colloquy event bus.
 *
 * Handlers run concurrently; `publish` resolves once all of them have settled.
 * A failing handler is logged and never affects the publisher.
 */
export class InMemoryEventBus implements EventBus {
  private subscribers = new Set<{
    filter: EventFilter;
    handler: EventHandler<unknown>;
    id: string;
  }>();

  constructor(private readonly log: Logger = silentLogger) {}

  async publish<T>(event: ColloquyEvent<T>): Promise<void> {
    const promises: Promise<void>[] = [];

    for (const sub of this.subscribers) {
      if (!this.matches(event, sub.filter)) continue;
      promises.push(this.dispatch(sub.handler, event));
    }

    const results = await Promise.allSettled(promises);
    for (const result of results) {
      if (result.status === "rejected") {
        this.log.error("Event handler failed", {
          topic: event.topic,
          eventId: event.id,
          error: String(result.reason),
        });
      }
    }
  }

  subscribe<T>(filter: EventFilter, handler: EventHandler<T>): Subscription {
    const id = uuidv7();
    const sub = {
      filter,
      handler: (event: ColloquyEvent<unknown>) => handler(event as ColloquyEvent<T>),
      id,
    };
    this.subscribers.add(sub);

    return {
      id,
      unsubscribe: () => {
        this.subscribers.delete(sub);
      },
    };
  }

  /** Number of live subscriptions. */
  get size(): number {
    return this.subscribers.size;
  }

  private async dispatch(handler: EventHandler<unknown>, event: ColloquyEvent): Promise<void> {
    await handler(event);
  }

  private matches(event: ColloquyEvent, filter: EventFilter): boolean {
    if (filter.topics && filter.topics.length > 0 && !filter.topics.includes(event.topic)) {
      return false;
    }
    if (filter.threadId && event.threadId !== filter.threadId) {
      return false;
    }
    if (filter.predicate && !filter.predicate(event)) {
      return false;
    }
    return true;
  }
}

/**
 * Helper to create a new event with a fresh ID and timestamp.
 */
export function createEvent<T>(
  topic: EventTopic,
  payload: T,
  traceCtx: TraceContext,
  threadId?: ThreadId
): ColloquyEvent<T> {
  return {
    id: uuidv7() as EventId,
    topic,
    payload,
    traceCtx,
    timestamp: new Date().toISOString(),
    ...(threadId ? { threadId } : {}),
  };
}

/**
 * Helper to create a root trace context, or a child span of `parent`.
 */
export function createTraceContext(parent?: TraceContext): TraceContext {
  if (parent) {
    return {
      traceId: parent.traceId,
      spanId: uuidv7() as SpanId,
      parentSpanId: parent.spanId,
    };
  }
  return {
    traceId: uuidv7() as TraceId,
    spanId: uuidv7() as SpanId,
  };
}
