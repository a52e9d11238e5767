import type { LanguageModel, OutputSchema } from "@colloquy/types";
import { ColloquyError } from "@colloquy/core";

/** One recorded call to a MockLanguageModel. */
export type MockCall =
  | { kind: "generate"; prompt: string }
  | { kind: "structured"; schemaName: string; systemPrompt: string; userPrompt: string };

type TextHandler = (prompt: string) => string | Promise<string>;
type StructuredHandler = (userPrompt: string) => unknown;

/**
 * A scripted LanguageModel for tests.
 *
 * Queued replies are used first, then the standing handler if one is set.
 * Free-text calls fall back to `defaultText`. Structured replies are keyed
 * by schema name and still go through the schema, so a bad script fails
 * the same way a bad model reply would.
 */
export class MockLanguageModel implements LanguageModel {
  readonly calls: MockCall[] = [];
  private readonly textQueue: string[] = [];
  private textHandler?: TextHandler;
  private readonly structuredQueues = new Map<string, unknown[]>();
  private readonly structuredHandlers = new Map<string, StructuredHandler>();

  constructor(private readonly defaultText = "Mock reply.") {}

  queueText(...replies: string[]): this {
    this.textQueue.push(...replies);
    return this;
  }

  onText(handler: TextHandler): this {
    this.textHandler = handler;
    return this;
  }

  queueStructured(schemaName: string, ...replies: unknown[]): this {
    const queue = this.structuredQueues.get(schemaName) ?? [];
    queue.push(...replies);
    this.structuredQueues.set(schemaName, queue);
    return this;
  }

  onStructured(schemaName: string, handler: StructuredHandler): this {
    this.structuredHandlers.set(schemaName, handler);
    return this;
  }

  async generate(prompt: string): Promise<string> {
    this.calls.push({ kind: "generate", prompt });
    const queued = this.textQueue.shift();
    if (queued !== undefined) return queued;
    return this.textHandler ? this.textHandler(prompt) : this.defaultText;
  }

  async generateStructured<T>(
    systemPrompt: string,
    userPrompt: string,
    schema: OutputSchema<T>,
    schemaName: string
  ): Promise<T> {
    this.calls.push({ kind: "structured", schemaName, systemPrompt, userPrompt });
    const queue = this.structuredQueues.get(schemaName);
    if (queue && queue.length > 0) {
      return parseStructured(queue.shift(), schema, schemaName);
    }
    const handler = this.structuredHandlers.get(schemaName);
    if (!handler) {
      throw new ColloquyError(
        "STRUCTURED_OUTPUT_ERROR",
        `No scripted ${schemaName} reply left in MockLanguageModel`
      );
    }
    return parseStructured(handler(userPrompt), schema, schemaName);
  }

  structuredCalls(schemaName: string): Extract<MockCall, { kind: "structured" }>[] {
    return this.calls.filter(
      (call): call is Extract<MockCall, { kind: "structured" }> =>
        call.kind === "structured" && call.schemaName === schemaName
    );
  }

  textCalls(): Extract<MockCall, { kind: "generate" }>[] {
    return this.calls.filter(
      (call): call is Extract<MockCall, { kind: "generate" }> => call.kind === "generate"
    );
  }
}

/**
 * Validate a decoded model reply. Schema violations are contract violations
 * by the collaborator and are never defaulted.
 */
export function parseStructured<T>(raw: unknown, schema: OutputSchema<T>, schemaName: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ColloquyError(
      "STRUCTURED_OUTPUT_ERROR",
      `Model reply does not match ${schemaName}: ${issues}`
    );
  }
  return result.data;
}

/**
 * Decode JSON text from a model and validate it.
 */
export function parseStructuredText<T>(
  text: string | null | undefined,
  schema: OutputSchema<T>,
  schemaName: string
): T {
  if (!text || !text.trim()) {
    throw new ColloquyError("STRUCTURED_OUTPUT_ERROR", `Model returned an empty ${schemaName}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ColloquyError("STRUCTURED_OUTPUT_ERROR", `Model returned invalid JSON for ${schemaName}`, {
      cause: err,
    });
  }
  return parseStructured(raw, schema, schemaName);
}
