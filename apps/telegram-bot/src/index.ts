import { Input, Telegraf } from "telegraf";

import {
  DEFAULT_TOPIC,
  createLogger,
  describeError,
  listTopicsForUser,
  loadConfig,
  normalizeThreadId,
  parseThreadId,
} from "@colloquy/core";
import { createColloquy } from "@colloquy/runtime";

import { answerTurn, commandArgument, topicsReply } from "./replies.js";

// ─── Configuration ──────────────────────────────────────────────────────────

const config = await loadConfig(process.env.COLLOQUY_CONFIG);
const log = createLogger("telegram-bot", { level: config.logging.level });

if (!config.telegram.botToken) {
  log.fatal("BOT_TOKEN is missing");
  process.exit(1);
}

// ─── Initialize Components ─────────────────────────────────────────

const { pipeline, store, audioFormat } = createColloquy(config, log);

// ─── Topic Tracking ─────────────────────────────────────────────────

/** Current topic per Telegram chat. Chats start on the default topic. */
const chatTopics = new Map<number, string>();

function topicFor(chatId: number): string {
  return chatTopics.get(chatId) ?? DEFAULT_TOPIC;
}

function userOf(from: { username?: string; first_name: string }): string {
  return from.username ?? from.first_name;
}

/** The user part exactly as it appears in stored thread ids. */
function normalizeUser(user: string): string {
  return parseThreadId(normalizeThreadId(user, DEFAULT_TOPIC))?.user ?? user;
}

// ─── Telegram Bot ───────────────────────────────────────────────────

const bot = new Telegraf(config.telegram.botToken);

bot.start(async (ctx) => {
  await ctx.reply(
    "Ask me anything. I research it, then a validator scores the answer.\n" +
      "/topic <name> switches topic, /topics lists yours."
  );
});

bot.command("topic", async (ctx) => {
  const requested = commandArgument(ctx.message.text);
  const threadId = normalizeThreadId(userOf(ctx.from), requested);
  const topic = parseThreadId(threadId)?.topic ?? DEFAULT_TOPIC;
  chatTopics.set(ctx.chat.id, topic);
  await ctx.reply(`Topic set to "${topic}".`);
});

bot.command("topics", async (ctx) => {
  const topics = listTopicsForUser(await store.listAllThreadIds(), normalizeUser(userOf(ctx.from)));
  await ctx.reply(topicsReply(topics, topicFor(ctx.chat.id)));
});

bot.on("text", async (ctx) => {
  const question = ctx.message.text.trim();
  if (!question || question.startsWith("/")) return;

  const threadId = normalizeThreadId(userOf(ctx.from), topicFor(ctx.chat.id));
  log.info("Question received", { threadId, chars: question.length });

  await ctx.sendChatAction("typing");
  await answerTurn(
    {
      reply: (text) => ctx.reply(text),
      replyWithAudio: (audio, filename) =>
        ctx.replyWithAudio(Input.fromBuffer(Buffer.from(audio), filename)),
    },
    () => pipeline.runTurn(threadId, question),
    { threadId, audioFormat, logger: log }
  );
});

// Graceful shutdown
process.once("SIGINT", () => {
  bot.stop("SIGINT");
  store.close();
});
process.once("SIGTERM", () => {
  bot.stop("SIGTERM");
  store.close();
});

log.info("Colloquy Telegram bot is ready");
try {
  await bot.launch();
} catch (err) {
  log.fatal("Bot launch failed", { error: describeError(err) });
  process.exit(1);
}
