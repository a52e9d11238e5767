import type {
  AgentInput,
  AgentResponse,
  ConversationAgent,
  LanguageModel,
  SearchService,
  SpeechSynthesizer,
} from "@colloquy/types";
import { silentLogger, type Logger } from "@colloquy/core";
import {
  RESEARCH_SYNTHESIS_SYSTEM_PROMPT,
  RESEARCHER_SPOKEN_SYSTEM_PROMPT,
  researchSynthesisUserPrompt,
  researcherSpokenUserPrompt,
} from "./prompts/index.js";
import { ResearchSynthesisSchema, type ResearchSynthesis } from "./schemas.js";
import { lastContent } from "./transcript.js";
import { toAudio } from "./speech.js";

export interface ResearcherAgentOptions {
  search: SearchService;
  llm: LanguageModel;
  speech: SpeechSynthesizer;
  logger?: Logger;
}

export function formatResearch(synthesis: ResearchSynthesis): string {
  const parts = [synthesis.answer];
  if (synthesis.keyFacts.length > 0) {
    parts.push("\n\nKey Facts:", ...synthesis.keyFacts.map((fact) => `  • ${fact}`));
  }
  if (synthesis.sources.length > 0) {
    parts.push("\n\nSources:", ...synthesis.sources.map((source) => `  • ${source}`));
  }
  return parts.join("\n");
}

/**
 * Searches for the latest user question and turns the results into a
 * detailed answer plus a short spoken version.
 */
export class ResearcherAgent implements ConversationAgent {
  readonly name = "researcher" as const;
  private readonly search: SearchService;
  private readonly llm: LanguageModel;
  private readonly speech: SpeechSynthesizer;
  private readonly log: Logger;

  constructor(opts: ResearcherAgentOptions) {
    this.search = opts.search;
    this.llm = opts.llm;
    this.speech = opts.speech;
    this.log = opts.logger ?? silentLogger;
  }

  async process({ messages }: AgentInput): Promise<AgentResponse> {
    const query = lastContent(messages, "user");

    const searchResults = await this.search.search(query);
    this.log.debug("Search finished", { query, resultChars: searchResults.length });

    const synthesis = await this.llm.generateStructured(
      RESEARCH_SYNTHESIS_SYSTEM_PROMPT,
      researchSynthesisUserPrompt(query, searchResults, messages),
      ResearchSynthesisSchema,
      "ResearchSynthesis"
    );
    const content = formatResearch(synthesis);

    const audioSummary = await this.llm.generate(
      `${RESEARCHER_SPOKEN_SYSTEM_PROMPT}\n\n${researcherSpokenUserPrompt(query, content, messages)}`
    );
    const audio = toAudio(await this.speech.synthesize(audioSummary));

    return {
      content,
      audioSummary,
      audio,
      metadata: { agent: "researcher", query },
    };
  }
}
