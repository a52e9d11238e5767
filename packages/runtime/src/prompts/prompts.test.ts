import { describe, it, expect } from "vitest";
import type { Message } from "@colloquy/types";
import { conversationContextLines } from "./context.js";
import { validationUserPrompt } from "./validator.js";
import { researchSynthesisUserPrompt } from "./researcher.js";

describe("conversationContextLines", () => {
  it("adds nothing for a first question", () => {
    expect(conversationContextLines([{ role: "user", content: "What is a qubit?" }])).toEqual([]);
  });

  it("puts summaries first and leaves out the newest message", () => {
    const history: Message[] = [
      { role: "system", content: "Previous conversation summary: Talked about qubits." },
      { role: "user", content: "q1" },
      { role: "agent", content: "a1" },
      { role: "user", content: "q2" },
    ];

    expect(conversationContextLines(history)).toEqual([
      "Previous conversation summary:",
      "  Previous conversation summary: Talked about qubits.",
      "",
      "Recent conversation context:",
      "  User: q1",
      "  Assistant: a1",
      "",
    ]);
  });

  it("keeps only the five messages before the newest when there are more than six", () => {
    const history: Message[] = [];
    for (let i = 1; i <= 4; i++) {
      history.push({ role: "user", content: `u${i}` }, { role: "agent", content: `a${i}` });
    }

    expect(conversationContextLines(history)).toEqual([
      "Recent conversation context:",
      "  User: u2",
      "  Assistant: a2",
      "  User: u3",
      "  Assistant: a3",
      "  User: u4",
      "",
    ]);
  });

  it("truncates long messages to 300 characters", () => {
    const history: Message[] = [
      { role: "user", content: "q1" },
      { role: "agent", content: "x".repeat(301) },
      { role: "user", content: "q2" },
    ];

    expect(conversationContextLines(history)).toContain(`  Assistant: ${"x".repeat(300)}...`);
  });

  it("skips turns that mention a summary", () => {
    const history: Message[] = [
      { role: "user", content: "Give me a summary" },
      { role: "agent", content: "a1" },
      { role: "user", content: "q2" },
    ];

    expect(conversationContextLines(history)).toEqual([
      "Recent conversation context:",
      "  Assistant: a1",
      "",
    ]);
  });
});

describe("researchSynthesisUserPrompt", () => {
  it("ends with the question, the results and the instructions", () => {
    const prompt = researchSynthesisUserPrompt("What is a qubit?", "1. Qubits\n");

    expect(prompt.startsWith("Current User Question: What is a qubit?\n\nSearch Results:\n1. Qubits\n")).toBe(
      true
    );
  });
});

describe("validationUserPrompt", () => {
  it("lists prior scores and assessments verbatim", () => {
    const prompt = validationUserPrompt("What is a qubit?", "It is a two-state system.", [], [
      { confidenceScore: 60, assessment: "Missing the error rates.", isValidated: false },
    ]);

    expect(prompt).toContain(
      "PREVIOUS VALIDATION HISTORY - CRITICAL FOR SCORE IMPROVEMENT\n" +
        "=".repeat(80) +
        "\n\nPrevious Validation 1:\n  Score: 60%\n  Assessment: Missing the error rates.\n"
    );
    expect(prompt).toContain("5. IMPROVEMENT CHECK (CRITICAL)");
  });

  it("omits the history block without prior validations", () => {
    const prompt = validationUserPrompt("What is a qubit?", "It is a two-state system.");

    expect(prompt).not.toContain("PREVIOUS VALIDATION HISTORY");
    expect(prompt).not.toContain("IMPROVEMENT CHECK");
    expect(prompt.split("\n").slice(0, 4)).toEqual([
      "Current User Question: What is a qubit?",
      "",
      "Research Findings:",
      "It is a two-state system.",
    ]);
  });

  it("shows only the last two prior validations", () => {
    const prompt = validationUserPrompt("q", "r", [], [
      { confidenceScore: 40, assessment: "first", isValidated: false },
      { confidenceScore: 55, assessment: "second", isValidated: false },
      { confidenceScore: 65, assessment: "third", isValidated: false },
    ]);

    expect(prompt).not.toContain("Assessment: first");
    expect(prompt).toContain("Previous Validation 1:\n  Score: 55%\n  Assessment: second");
    expect(prompt).toContain("Previous Validation 2:\n  Score: 65%\n  Assessment: third");
  });
});
