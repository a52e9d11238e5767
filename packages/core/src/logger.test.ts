import { describe, it, expect } from "vitest";
import { createLogger, parseLogLevel, type LoggerOptions } from "./logger.js";
import { createTraceContext } from "./bus.js";

function capture(options: LoggerOptions) {
  const lines: string[] = [];
  const log = createLogger("runtime", { ...options, sink: (line) => lines.push(line) });
  const entries = () => lines.map((line) => JSON.parse(line) as Record<string, unknown>);
  return { log, entries };
}

describe("createLogger", () => {
  it("writes one JSON entry per call", () => {
    const { log, entries } = capture({});
    log.info("Turn complete", { exchanges: 3 });

    const [entry] = entries();
    expect(entry).toMatchObject({
      level: "info",
      message: "Turn complete",
      component: "runtime",
      data: { exchanges: 3 },
    });
    expect(typeof entry.timestamp).toBe("string");
  });

  it("drops entries below the configured level", () => {
    const { log, entries } = capture({ level: "warn" });
    log.debug("noise");
    log.info("still noise");
    log.warn("kept");
    log.error("kept too");
    expect(entries().map((e) => e.message)).toEqual(["kept", "kept too"]);
  });

  it("redacts secrets but keeps token counts", () => {
    const { log, entries } = capture({});
    log.info("Calling provider", { apiKey: "test-secret", authorization: "Bearer x", maxTokens: 2000 });
    expect(entries()[0].data).toEqual({
      apiKey: "[redacted]",
      authorization: "[redacted]",
      maxTokens: 2000,
    });
  });

  it("truncates long strings", () => {
    const { log, entries } = capture({});
    log.info("Long", { text: "a".repeat(400) });
    expect(entries()[0].data).toEqual({ text: `${"a".repeat(300)}...[truncated]` });
  });

  it("derives child components and trace-bound loggers", () => {
    const { log, entries } = capture({});
    const trace = createTraceContext();
    log.child("validator").withTrace(trace).warn("Score declined");

    expect(entries()[0]).toMatchObject({
      component: "runtime.validator",
      traceCtx: { traceId: trace.traceId, spanId: trace.spanId },
    });
  });
});

describe("parseLogLevel", () => {
  it("accepts known levels in any case and defaults to info", () => {
    expect(parseLogLevel(" DEBUG ")).toBe("debug");
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(undefined)).toBe("info");
  });
});
