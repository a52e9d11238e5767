import { cancel, isCancel, select, text } from "@clack/prompts";
import type { ThreadId } from "@colloquy/types";
import {
  DEFAULT_TOPIC,
  findThreadId,
  listTopicsForUser,
  listUsers,
  normalizeThreadId,
} from "@colloquy/core";

const CREATE_NEW = "__new__";

async function ask(message: string, placeholder: string): Promise<string | null> {
  const answer = await text({ message, placeholder });
  return isCancel(answer) ? null : answer;
}

async function choose(
  message: string,
  existing: string[],
  createLabel: string
): Promise<string | null> {
  if (existing.length === 0) return CREATE_NEW;
  const choice = await select<{ value: string; label: string }[], string>({
    message,
    options: [
      ...existing.map((value) => ({ value, label: value })),
      { value: CREATE_NEW, label: createLabel },
    ],
  });
  return isCancel(choice) ? null : choice;
}

/**
 * Pick an existing (user, topic) thread or start a new one.
 * Returns null when the user cancels.
 */
export async function pickThread(threadIds: string[]): Promise<ThreadId | null> {
  let user = await choose("Who is asking?", listUsers(threadIds), "Create new user");
  if (user === CREATE_NEW) user = await ask("Your name", "ada lovelace");
  if (user === null) {
    cancel("Cancelled.");
    return null;
  }

  let topic = await choose(
    "Which topic?",
    listTopicsForUser(threadIds, user),
    "Start a new topic"
  );
  if (topic === CREATE_NEW) topic = await ask("Topic", DEFAULT_TOPIC);
  if (topic === null) {
    cancel("Cancelled.");
    return null;
  }

  return findThreadId(threadIds, user, topic) ?? normalizeThreadId(user, topic);
}
