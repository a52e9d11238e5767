import { describe, it, expect, vi } from "vitest";
import type { LanguageModel } from "@colloquy/types";
import {
  buildSummaryPrompt,
  createSummaryMessage,
  formatTranscript,
  summarizeConversation,
} from "./summarizer.js";
import { isColloquyError } from "../errors.js";

describe("summarizer", () => {
  it("labels user turns and everything else as the assistant", () => {
    expect(
      formatTranscript([
        { role: "user", content: "Why is the sky blue?" },
        { role: "agent", content: "Rayleigh scattering." },
        { role: "system", content: "Previous conversation summary: optics" },
      ])
    ).toBe(
      "User: Why is the sky blue?\n\nAssistant: Rayleigh scattering.\n\nAssistant: Previous conversation summary: optics"
    );
  });

  it("asks for a brief summary without validation scores", () => {
    const prompt = buildSummaryPrompt([{ role: "user", content: "hi" }]);
    expect(prompt).toContain("Keep the summary brief (200-300 tokens)");
    expect(prompt).toContain("not\nspecific validation scores or detailed assessments");
    expect(prompt).toContain("Please summarize this conversation:\n\nUser: hi\n\n");
  });

  it("returns the trimmed model output", async () => {
    const llm: LanguageModel = {
      generate: vi.fn(async () => "\n  A short recap.\n"),
      generateStructured: vi.fn(),
    };
    await expect(summarizeConversation([{ role: "user", content: "hi" }], llm)).resolves.toBe(
      "A short recap."
    );
  });

  it("refuses an empty transcript without calling the model", async () => {
    const generate = vi.fn(async () => "unused");
    const llm: LanguageModel = { generate, generateStructured: vi.fn() };

    const error = await summarizeConversation([], llm).catch((err: unknown) => err);

    expect(isColloquyError(error, "INTERNAL_ERROR")).toBe(true);
    expect(generate).not.toHaveBeenCalled();
  });

  it("wraps summary text as a system message", () => {
    expect(createSummaryMessage("recap")).toEqual({
      role: "system",
      content: "Previous conversation summary: recap",
    });
  });
});
