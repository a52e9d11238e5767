import type { LogEntry, LogLevel, TraceContext } from "@colloquy/types";

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const SENSITIVE_KEY_PATTERN = /(api[_-]?key|authorization|token|secret|password)/i;
const TOKEN_COUNT_KEYS = new Set(["tokens", "estimatedtokens", "maxtokens"]);
const MAX_STRING_LENGTH = 300;
const MAX_DEPTH = 4;

const sanitize = (value: unknown, depth = 0): unknown => {
  if (depth > MAX_DEPTH) return "[truncated-depth]";

  if (typeof value === "string") {
    if (value.length <= MAX_STRING_LENGTH) return value;
    return `${value.slice(0, MAX_STRING_LENGTH)}...[truncated]`;
  }

  if (
    typeof value === "number" ||
    typeof value === "boolean" ||
    value === null ||
    value === undefined
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => sanitize(item, depth + 1));
  }

  if (typeof value === "object") {
    return sanitizeRecord(Object.entries(value), depth);
  }

  return "[unsupported-type]";
};

function sanitizeRecord(
  entries: Array<[string, unknown]>,
  depth: number
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, raw] of entries) {
    const isTokenCount = TOKEN_COUNT_KEYS.has(key.toLowerCase()) && typeof raw === "number";
    result[key] =
      !isTokenCount && SENSITIVE_KEY_PATTERN.test(key) ? "[redacted]" : sanitize(raw, depth + 1);
  }
  return result;
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  switch (normalized) {
    case "trace":
    case "debug":
    case "info":
    case "warn":
    case "error":
    case "fatal":
      return normalized;
    default:
      return "info";
  }
}

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  /** Receives one JSON line per entry. Defaults to console.log. */
  sink?: LogSink;
  traceCtx?: TraceContext;
}

type LogMethod = (message: string, data?: Record<string, unknown>) => void;

export interface Logger {
  readonly component: string;
  readonly level: LogLevel;
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
  /** Logger for a sub-component, e.g. `log.child("validator")` → "runtime.validator". */
  child(component: string): Logger;
  /** Same logger, stamping every entry with the given trace context. */
  withTrace(traceCtx: TraceContext): Logger;
}

/**
 * Structured JSON-lines logger. Each entry follows the `LogEntry` shape.
 */
export function createLogger(component: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const sink = options.sink ?? ((line: string) => console.log(line));

  const emit = (entryLevel: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (LOG_LEVEL_ORDER[entryLevel] < LOG_LEVEL_ORDER[level]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: entryLevel,
      message,
      component,
      ...(options.traceCtx ? { traceCtx: options.traceCtx } : {}),
      ...(data ? { data: sanitizeRecord(Object.entries(data), 0) } : {}),
    };
    sink(JSON.stringify(entry));
  };

  return {
    component,
    level,
    trace: (message, data) => emit("trace", message, data),
    debug: (message, data) => emit("debug", message, data),
    info: (message, data) => emit("info", message, data),
    warn: (message, data) => emit("warn", message, data),
    error: (message, data) => emit("error", message, data),
    fatal: (message, data) => emit("fatal", message, data),
    child: (sub) => createLogger(`${component}.${sub}`, options),
    withTrace: (traceCtx) => createLogger(component, { ...options, traceCtx }),
  };
}

/** A logger that drops everything. Default for library code constructed without one. */
export const silentLogger: Logger = createLogger("silent", { sink: () => {} });
