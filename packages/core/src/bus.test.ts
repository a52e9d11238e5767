import { describe, it, expect, vi } from "vitest";
import { normalizeThreadId } from "./thread-id.js";
import { InMemoryEventBus, createEvent, createTraceContext } from "./bus.js";
import { createLogger } from "./logger.js";

describe("InMemoryEventBus", () => {
  it("delivers events and propagates trace context", async () => {
    const bus = new InMemoryEventBus();
    const handler = vi.fn();
    const sub = bus.subscribe({ topics: ["turn.started"] }, handler);

    const traceCtx = createTraceContext();
    const event = createEvent("turn.started", { userMessage: "hi", priorMessageCount: 0 }, traceCtx);
    await bus.publish(event);

    expect(handler).toHaveBeenCalledWith(event);
    expect(handler.mock.calls[0][0].traceCtx.traceId).toBe(traceCtx.traceId);

    sub.unsubscribe();
    await bus.publish(event);
    expect(handler).toHaveBeenCalledTimes(1);
    expect(bus.size).toBe(0);
  });

  it("filters by topic and thread", async () => {
    const bus = new InMemoryEventBus();
    const handler = vi.fn();
    const ada = normalizeThreadId("ada", "quantum");
    bus.subscribe({ topics: ["stage.complete"], threadId: ada }, handler);

    const trace = createTraceContext();
    await bus.publish(createEvent("stage.complete", {}, trace, normalizeThreadId("bob", "rust")));
    await bus.publish(createEvent("turn.complete", {}, trace, ada));
    await bus.publish(createEvent("stage.complete", { n: 1 }, trace, ada));

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0][0].payload).toEqual({ n: 1 });
  });

  it("waits for async handlers and isolates failures", async () => {
    const lines: string[] = [];
    const bus = new InMemoryEventBus(createLogger("core.bus", { sink: (l) => lines.push(l) }));
    const order: string[] = [];

    bus.subscribe({}, async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      order.push("slow");
    });
    bus.subscribe({}, () => {
      throw new Error("handler exploded");
    });

    await expect(
      bus.publish(createEvent("turn.started", {}, createTraceContext()))
    ).resolves.toBeUndefined();

    expect(order).toEqual(["slow"]);
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: "error",
      message: "Event handler failed",
      data: { topic: "turn.started", error: "Error: handler exploded" },
    });
  });
});

describe("createTraceContext", () => {
  it("derives child spans within the same trace", () => {
    const root = createTraceContext();
    const child = createTraceContext(root);
    expect(root.parentSpanId).toBeUndefined();
    expect(child.traceId).toBe(root.traceId);
    expect(child.parentSpanId).toBe(root.spanId);
    expect(child.spanId).not.toBe(root.spanId);
  });
});
