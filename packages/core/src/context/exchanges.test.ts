import { describe, it, expect } from "vitest";
import type { Message } from "@colloquy/types";
import { countExchanges, partitionHistory, shouldSummarize } from "./exchanges.js";
import type { TokenEstimator } from "./token-estimator.js";

function conversation(exchanges: number): Message[] {
  const messages: Message[] = [];
  for (let i = 1; i <= exchanges; i++) {
    messages.push({ role: "user", content: `question ${i}` });
    messages.push({ role: "agent", content: `research ${i}` });
    messages.push({ role: "agent", content: `validation ${i}` });
  }
  return messages;
}

/** Ten tokens per message, regardless of content. */
const flatEstimator: TokenEstimator = {
  encoding: "cl100k_base",
  estimateText: () => 10,
  estimateMessage: () => 10,
  estimateMessages: (messages) => messages.length * 10,
};

describe("countExchanges", () => {
  it("counts user messages only", () => {
    expect(countExchanges([])).toBe(0);
    expect(countExchanges(conversation(4))).toBe(4);
  });

  it("is unchanged by appending agent or system messages", () => {
    const base = conversation(3);
    const extended: Message[] = [
      ...base,
      { role: "agent", content: "late reply" },
      { role: "system", content: "Previous conversation summary: earlier" },
    ];
    expect(countExchanges(extended)).toBe(countExchanges(base));
  });

  it("counts a trailing user message with no reply yet", () => {
    expect(countExchanges([...conversation(2), { role: "user", content: "next?" }])).toBe(3);
  });
});

describe("shouldSummarize", () => {
  it("fires when exchanges strictly exceed the limit", () => {
    const thresholds = { maxExchanges: 5, maxTokens: 1_000_000 };
    expect(shouldSummarize(conversation(5), thresholds, flatEstimator)).toBe(false);
    expect(shouldSummarize(conversation(6), thresholds, flatEstimator)).toBe(true);
  });

  it("fires on tokens alone", () => {
    // 2 exchanges = 6 messages = 60 tokens
    const messages = conversation(2);
    expect(shouldSummarize(messages, { maxExchanges: 5, maxTokens: 60 }, flatEstimator)).toBe(false);
    expect(shouldSummarize(messages, { maxExchanges: 5, maxTokens: 59 }, flatEstimator)).toBe(true);
  });

  it("stays true when either threshold is lowered", () => {
    const messages = conversation(4); // 4 exchanges, 120 tokens
    for (let e = 0; e <= 6; e++) {
      for (let t = 0; t <= 150; t += 10) {
        if (!shouldSummarize(messages, { maxExchanges: e, maxTokens: t }, flatEstimator)) continue;
        for (let e2 = 0; e2 <= e; e2++) {
          for (let t2 = 0; t2 <= t; t2 += 10) {
            expect(
              shouldSummarize(messages, { maxExchanges: e2, maxTokens: t2 }, flatEstimator)
            ).toBe(true);
          }
        }
      }
    }
  });

  it("uses the real tokenizer by default", () => {
    expect(shouldSummarize(conversation(1), { maxExchanges: 5, maxTokens: 10_000 })).toBe(false);
  });
});

describe("partitionHistory", () => {
  it("reconstructs the input for any k", () => {
    const messages = [{ role: "agent", content: "greeting" } as const, ...conversation(6)];
    for (let k = 0; k <= 8; k++) {
      const { toSummarize, toKeep } = partitionHistory(messages, k);
      expect([...toSummarize, ...toKeep]).toEqual(messages);
    }
  });

  it("summarizes nothing when there are at most k exchanges", () => {
    const messages = conversation(5);
    for (const k of [5, 6, 10]) {
      const { toSummarize, toKeep } = partitionHistory(messages, k);
      expect(toSummarize).toEqual([]);
      expect(toKeep).toEqual(messages);
    }
  });

  it("keeps the last five exchanges of six and summarizes the first", () => {
    const messages = conversation(6);
    const { toSummarize, toKeep } = partitionHistory(messages, 5);

    expect(toSummarize).toEqual([
      { role: "user", content: "question 1" },
      { role: "agent", content: "research 1" },
      { role: "agent", content: "validation 1" },
    ]);
    expect(toKeep).toHaveLength(15);
    expect(toKeep[0]).toEqual({ role: "user", content: "question 2" });
    expect(countExchanges(toKeep)).toBe(5);
  });

  it("puts leading system messages in the summarized part", () => {
    const summary: Message = { role: "system", content: "Previous conversation summary: old" };
    const { toSummarize, toKeep } = partitionHistory([summary, ...conversation(3)], 2);
    expect(toSummarize[0]).toBe(summary);
    expect(toSummarize).toHaveLength(4);
    expect(toKeep[0]).toEqual({ role: "user", content: "question 2" });
  });

  it("keeps nothing when k is zero", () => {
    const messages = conversation(2);
    const { toSummarize, toKeep } = partitionHistory(messages, 0);
    expect(toSummarize).toEqual(messages);
    expect(toKeep).toEqual([]);
  });

  it("does not alias the input array", () => {
    const messages = conversation(1);
    const { toKeep } = partitionHistory(messages, 3);
    expect(toKeep).not.toBe(messages);
  });
});
