import type { ColloquyErrorCode } from "@colloquy/types";

/**
 * Base error for every failure Colloquy raises itself.
 * Collaborator errors are wrapped with `cause` set to the original.
 */
export class ColloquyError extends Error {
  readonly code: ColloquyErrorCode;

  constructor(code: ColloquyErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ColloquyError";
    this.code = code;
  }
}

export function isColloquyError(err: unknown, code?: ColloquyErrorCode): err is ColloquyError {
  return err instanceof ColloquyError && (code === undefined || err.code === code);
}

/** Human-readable message for any thrown value. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
