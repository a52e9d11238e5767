import type { AudioFormat, ThreadId, TurnResult } from "@colloquy/types";
import { describeError, type Logger } from "@colloquy/core";

/** Telegram rejects messages longer than this. */
export const TELEGRAM_MESSAGE_LIMIT = 4096;

export function fitMessage(text: string, limit = TELEGRAM_MESSAGE_LIMIT): string {
  if (text.length <= limit) return text;
  let end = limit - 1;
  // Never split a surrogate pair: Telegram rejects the lone half.
  if (isHighSurrogate(text.charCodeAt(end - 1))) end -= 1;
  return `${text.slice(0, end)}…`;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

export function researchReply(result: TurnResult): string {
  return fitMessage(`🔎 Research\n\n${result.research.content}`);
}

export function validationReply(result: TurnResult): string {
  const { confidenceScore, isValidated } = result.state.metadata;
  const verdict = isValidated ? "validated" : "needs review";
  const header =
    confidenceScore === undefined ? "✅ Validation" : `✅ Validation (${confidenceScore}%, ${verdict})`;
  return fitMessage(`${header}\n\n${result.validation.content}`);
}

export function topicsReply(topics: string[], current: string): string {
  if (topics.length === 0) return `No saved topics yet. Current topic: ${current}`;
  return ["Your topics:", ...topics.map((t) => (t === current ? `• ${t} (current)` : `• ${t}`))].join(
    "\n"
  );
}

/** Text after a bot command, e.g. "/topic quantum computing" → "quantum computing". */
export function commandArgument(text: string): string {
  const space = text.indexOf(" ");
  return space === -1 ? "" : text.slice(space + 1).trim();
}

export function turnFailedReply(err: unknown): string {
  return `Sorry, that didn't work: ${describeError(err)}\nYour conversation is unchanged, so you can ask again.`;
}

export function undeliveredReply(err: unknown): string {
  return (
    `Your answer was saved, but I couldn't send all of it: ${describeError(err)}\n` +
    "No need to ask again. Your next question continues from it."
  );
}

/** The parts of a Telegram context a turn replies through. */
export interface ReplyChannel {
  reply(text: string): Promise<unknown>;
  replyWithAudio(audio: Uint8Array, filename: string): Promise<unknown>;
}

export type TurnOutcome = "answered" | "failed" | "undelivered";

export interface AnswerOptions {
  threadId: ThreadId;
  audioFormat: AudioFormat;
  logger: Logger;
}

/**
 * Runs a turn and sends its replies. A failed turn leaves the stored
 * conversation untouched; a failed reply comes after the turn was saved,
 * so the two are reported differently.
 */
export async function answerTurn(
  chat: ReplyChannel,
  runTurn: () => Promise<TurnResult>,
  { threadId, audioFormat, logger }: AnswerOptions
): Promise<TurnOutcome> {
  let result: TurnResult;
  try {
    result = await runTurn();
  } catch (err) {
    logger.error("Turn failed", { threadId, error: describeError(err) });
    await chat.reply(turnFailedReply(err));
    return "failed";
  }

  try {
    await chat.reply(researchReply(result));
    if (result.research.audio) {
      await chat.replyWithAudio(result.research.audio, `research.${audioFormat}`);
    }
    await chat.reply(validationReply(result));
    if (result.validation.audio) {
      await chat.replyWithAudio(result.validation.audio, `validation.${audioFormat}`);
    }
  } catch (err) {
    logger.error("Reply delivery failed", { threadId, error: describeError(err) });
    await chat.reply(undeliveredReply(err));
    return "undelivered";
  }
  return "answered";
}
