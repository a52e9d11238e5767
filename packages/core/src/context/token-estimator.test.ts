import { describe, it, expect } from "vitest";
import type { Message } from "@colloquy/types";
import {
  TiktokenEstimator,
  encodingForModelName,
  estimateMessageTokens,
} from "./token-estimator.js";

const transcript: Message[] = [
  { role: "user", content: "What is a qubit?" },
  { role: "agent", content: "A qubit is the basic unit of quantum information." },
  { role: "agent", content: "The explanation is accurate but brief." },
];

describe("encodingForModelName", () => {
  it("maps known model families", () => {
    expect(encodingForModelName("gpt-4o")).toBe("o200k_base");
    expect(encodingForModelName("GPT-4o-mini")).toBe("o200k_base");
    expect(encodingForModelName("gpt-4-turbo")).toBe("cl100k_base");
    expect(encodingForModelName("gpt-3.5-turbo")).toBe("cl100k_base");
  });

  it("falls back to cl100k_base for unknown models", () => {
    expect(encodingForModelName("llama3.2:latest")).toBe("cl100k_base");
    expect(encodingForModelName("")).toBe("cl100k_base");
  });
});

describe("TiktokenEstimator", () => {
  it("returns zero for an empty transcript", () => {
    expect(estimateMessageTokens([])).toBe(0);
  });

  it("never decreases as messages are appended", () => {
    const estimator = new TiktokenEstimator();
    let previous = 0;
    for (let i = 1; i <= transcript.length; i++) {
      const current = estimator.estimateMessages(transcript.slice(0, i));
      expect(current).toBeGreaterThan(previous);
      previous = current;
    }
  });

  it("costs each message with its role prefix", () => {
    const estimator = new TiktokenEstimator("gpt-4");
    const message: Message = { role: "user", content: "hello there" };
    expect(estimator.estimateMessage(message)).toBe(estimator.estimateText("user: hello there"));
  });

  it("treats an unknown model exactly like the fallback encoding", () => {
    const unknown = new TiktokenEstimator("some-local-model");
    const fallback = new TiktokenEstimator("gpt-4");
    expect(unknown.encoding).toBe("cl100k_base");
    expect(unknown.estimateMessages(transcript)).toBe(fallback.estimateMessages(transcript));
  });

  it("encodes special-token markers as ordinary text", () => {
    const estimator = new TiktokenEstimator();
    expect(estimator.estimateText("<|endoftext|>")).toBeGreaterThan(1);
    expect(estimator.estimateText("before <|endoftext|> after")).toBeGreaterThan(
      estimator.estimateText("before  after")
    );
  });
});
