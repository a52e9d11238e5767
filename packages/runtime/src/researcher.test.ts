import { describe, it, expect, vi } from "vitest";
import type { SearchService, SpeechSynthesizer } from "@colloquy/types";
import { MockLanguageModel } from "./model-adapter.js";
import { ResearcherAgent } from "./researcher.js";
import { RESEARCHER_SPOKEN_SYSTEM_PROMPT } from "./prompts/index.js";

function collaborators(audioBytes: number[] = [1, 2, 3]) {
  const search = vi.fn(async (_query: string) => "1. Qubit basics\n   URL: https://example.test/qubits\n   Two-state systems.\n");
  const synthesize = vi.fn(async (_text: string) => new Uint8Array(audioBytes));
  const searchService: SearchService = { search };
  const speech: SpeechSynthesizer = { format: "mp3", synthesize };
  return { search, synthesize, searchService, speech };
}

describe("ResearcherAgent", () => {
  it("formats the synthesis and speaks a short version", async () => {
    const { search, synthesize, searchService, speech } = collaborators();
    const llm = new MockLanguageModel()
      .queueStructured("ResearchSynthesis", {
        answer: "A qubit is a two-state quantum system.",
        key_facts: ["Superposition", "Entanglement"],
        sources: ["https://example.test/qubits"],
      })
      .queueText("I found that a qubit can be in superposition.");
    const agent = new ResearcherAgent({ search: searchService, llm, speech });

    const response = await agent.process({
      messages: [{ role: "user", content: "What is a qubit?" }],
    });

    expect(search).toHaveBeenCalledWith("What is a qubit?");
    expect(response.content).toBe(
      "A qubit is a two-state quantum system.\n\n\nKey Facts:\n  • Superposition\n  • Entanglement\n\n\nSources:\n  • https://example.test/qubits"
    );
    expect(response.audioSummary).toBe("I found that a qubit can be in superposition.");
    expect(synthesize).toHaveBeenCalledWith("I found that a qubit can be in superposition.");
    expect(response.audio).toEqual(new Uint8Array([1, 2, 3]));
    expect(response.metadata).toEqual({ agent: "researcher", query: "What is a qubit?" });
  });

  it("passes the question and search results to the synthesis call", async () => {
    const { searchService, speech } = collaborators();
    const llm = new MockLanguageModel().queueStructured("ResearchSynthesis", { answer: "Answer." });
    const agent = new ResearcherAgent({ search: searchService, llm, speech });

    await agent.process({ messages: [{ role: "user", content: "What is a qubit?" }] });

    const [call] = llm.structuredCalls("ResearchSynthesis");
    expect(call.userPrompt).toContain("Current User Question: What is a qubit?");
    expect(call.userPrompt).toContain("Search Results:\n1. Qubit basics");
    const [spoken] = llm.textCalls();
    expect(spoken.prompt.startsWith(RESEARCHER_SPOKEN_SYSTEM_PROMPT)).toBe(true);
    expect(spoken.prompt).toContain('You just researched: "What is a qubit?"');
  });

  it("omits empty fact and source sections", async () => {
    const { searchService, speech } = collaborators();
    const llm = new MockLanguageModel().queueStructured("ResearchSynthesis", {
      answer: "Only an answer.",
    });
    const agent = new ResearcherAgent({ search: searchService, llm, speech });

    const response = await agent.process({ messages: [{ role: "user", content: "q" }] });

    expect(response.content).toBe("Only an answer.");
  });

  it("reports no audio when synthesis returns nothing", async () => {
    const { searchService, speech } = collaborators([]);
    const llm = new MockLanguageModel().queueStructured("ResearchSynthesis", { answer: "A." });
    const agent = new ResearcherAgent({ search: searchService, llm, speech });

    const response = await agent.process({ messages: [{ role: "user", content: "q" }] });

    expect(response.audio).toBeNull();
  });

  it("searches with an empty query when there is no user message", async () => {
    const { search, searchService, speech } = collaborators();
    const llm = new MockLanguageModel().queueStructured("ResearchSynthesis", { answer: "A." });
    const agent = new ResearcherAgent({ search: searchService, llm, speech });

    await agent.process({ messages: [] });

    expect(search).toHaveBeenCalledWith("");
  });

  it("fails on a synthesis that does not match the schema", async () => {
    const { synthesize, searchService, speech } = collaborators();
    const llm = new MockLanguageModel().queueStructured("ResearchSynthesis", { answer: 42 });
    const agent = new ResearcherAgent({ search: searchService, llm, speech });

    await expect(
      agent.process({ messages: [{ role: "user", content: "q" }] })
    ).rejects.toMatchObject({ code: "STRUCTURED_OUTPUT_ERROR" });
    expect(synthesize).not.toHaveBeenCalled();
  });

  it("lets search failures propagate", async () => {
    const { speech } = collaborators();
    const failing: SearchService = {
      search: async () => {
        throw new Error("search unavailable");
      },
    };
    const agent = new ResearcherAgent({ search: failing, llm: new MockLanguageModel(), speech });

    await expect(agent.process({ messages: [{ role: "user", content: "q" }] })).rejects.toThrow(
      "search unavailable"
    );
  });
});
