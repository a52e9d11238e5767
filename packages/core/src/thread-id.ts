import type { ThreadId } from "@colloquy/types";

export const THREAD_ID_DELIMITER = ":";
export const DEFAULT_USER = "default-user";
export const DEFAULT_TOPIC = "general";
export const MAX_TOPIC_LENGTH = 50;

function normalizeComponent(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/\s+/g, "-")
    .replace(/[^a-z0-9_-]/g, "");
}

/**
 * Build the thread identifier for a `(user, topic)` pair.
 *
 * Lowercases, turns each whitespace run into a hyphen, strips anything outside
 * `[a-z0-9_-]` and caps the topic at 50 characters. Empty components fall
 * back to "default-user" / "general", so this always yields a usable key.
 *
 * @example normalizeThreadId("Ada Lovelace", "Quantum Computing!!") // "ada-lovelace:quantum-computing"
 */
export function normalizeThreadId(user: string, topic: string): ThreadId {
  const normalizedUser = normalizeComponent(user) || DEFAULT_USER;
  const normalizedTopic = normalizeComponent(topic).slice(0, MAX_TOPIC_LENGTH) || DEFAULT_TOPIC;
  return `${normalizedUser}${THREAD_ID_DELIMITER}${normalizedTopic}` as ThreadId;
}

/**
 * Split a thread id on its first colon. Topics may themselves contain colons
 * when ids were written by something other than `normalizeThreadId`.
 */
export function parseThreadId(threadId: string): { user: string; topic: string } | null {
  const index = threadId.indexOf(THREAD_ID_DELIMITER);
  if (index === -1) return null;
  return {
    user: threadId.slice(0, index),
    topic: threadId.slice(index + THREAD_ID_DELIMITER.length),
  };
}

/** Unique users across all thread ids, sorted. */
export function listUsers(threadIds: Iterable<string>): string[] {
  const users = new Set<string>();
  for (const threadId of threadIds) {
    const parsed = parseThreadId(threadId);
    if (parsed) users.add(parsed.user);
  }
  return [...users].sort();
}

/** Topics for one user (matched case-insensitively), sorted. */
export function listTopicsForUser(threadIds: Iterable<string>, user: string): string[] {
  const wanted = user.toLowerCase();
  const topics = new Set<string>();
  for (const threadId of threadIds) {
    const parsed = parseThreadId(threadId);
    if (parsed && parsed.user.toLowerCase() === wanted) topics.add(parsed.topic);
  }
  return [...topics].sort();
}

export function findThreadId(
  threadIds: Iterable<string>,
  user: string,
  topic: string
): string | undefined {
  const wantedUser = user.toLowerCase();
  const wantedTopic = topic.toLowerCase();
  for (const threadId of threadIds) {
    const parsed = parseThreadId(threadId);
    if (
      parsed &&
      parsed.user.toLowerCase() === wantedUser &&
      parsed.topic.toLowerCase() === wantedTopic
    ) {
      return threadId;
    }
  }
  return undefined;
}
