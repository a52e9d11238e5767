import { intro, isCancel, log as ui, note, outro, spinner, text } from "@clack/prompts";
import type { StageOutput, TurnResult } from "@colloquy/types";
import { createLogger, describeError, loadConfig, parseThreadId } from "@colloquy/core";
import { createColloquy } from "@colloquy/runtime";
import { playAudio } from "./audio.js";
import { formatTranscript, formatVerdict, stageTitle } from "./format.js";
import { pickThread } from "./thread-picker.js";

const EXIT_WORDS = new Set(["exit", "quit", "q"]);

async function main(): Promise<void> {
  const config = await loadConfig(process.env.COLLOQUY_CONFIG);
  // Keep the terminal readable: diagnostics go to stderr.
  const log = createLogger("cli", {
    level: config.logging.level,
    sink: (line) => process.stderr.write(`${line}\n`),
  });
  const { pipeline, store, bus, audioFormat } = createColloquy(config, log);

  intro("colloquy");
  const threadId = await pickThread(await store.listAllThreadIds());
  if (!threadId) {
    store.close();
    return;
  }

  const parsed = parseThreadId(threadId);
  const previous = await store.load(threadId);
  if (previous && previous.messages.length > 0) {
    note(formatTranscript(previous.messages), "Previous conversation");
  }
  ui.info(`Thread ${parsed ? `${parsed.user} / ${parsed.topic}` : threadId}. Type "exit" to leave.`);

  const progress = spinner();
  bus.subscribe<StageOutput>({ topics: ["stage.complete"], threadId }, async (event) => {
    const output = event.payload;
    progress.stop(`${stageTitle(output)} finished`);
    note(output.content, stageTitle(output));
    if (output.audio) {
      const played = await playAudio(output.audio, audioFormat);
      if (!played) ui.warn("No audio player found (install mpv or ffplay).");
    }
    if (output.agent === "researcher") progress.start("Validating");
  });

  for (;;) {
    const question = await text({ message: "Your question" });
    if (isCancel(question) || EXIT_WORDS.has(question.trim().toLowerCase())) break;
    if (!question.trim()) continue;

    progress.start("Researching");
    try {
      const result: TurnResult = await pipeline.runTurn(threadId, question.trim());
      ui.success(formatVerdict(result.state));
      if (result.compacted) ui.info("Older exchanges were summarized.");
    } catch (err) {
      progress.stop("Turn failed");
      ui.error(describeError(err));
    }
  }

  store.close();
  outro("Goodbye.");
}

main().catch((err: unknown) => {
  console.error(describeError(err));
  process.exit(1);
});
