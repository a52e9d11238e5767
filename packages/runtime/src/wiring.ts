import type { AudioFormat } from "@colloquy/types";
import type { ColloquyConfig, Logger } from "@colloquy/core";
import { ContextManager, InMemoryEventBus } from "@colloquy/core";
import { SQLiteConversationStore } from "@colloquy/persistence";
import { createSearchService, createSpeechSynthesizer } from "@colloquy/services";
import { createLanguageModel } from "./factory.js";
import { ResearchValidationPipeline } from "./pipeline.js";
import { ResearcherAgent } from "./researcher.js";
import { ValidatorAgent } from "./validator.js";

export interface Colloquy {
  pipeline: ResearchValidationPipeline;
  store: SQLiteConversationStore;
  bus: InMemoryEventBus;
  /** Container format of the synthesized speech. */
  audioFormat: AudioFormat;
}

/** Assemble the pipeline from configuration. Shared by every front end. */
export function createColloquy(config: ColloquyConfig, log: Logger): Colloquy {
  const llm = createLanguageModel(config.llm, log.child("llm"));
  const store = new SQLiteConversationStore(config.persistence.dbPath, {
    logger: log.child("store"),
  });
  const bus = new InMemoryEventBus(log.child("bus"));
  const researcherSpeech = createSpeechSynthesizer(config.tts, "researcher");

  const pipeline = new ResearchValidationPipeline({
    researcher: new ResearcherAgent({
      search: createSearchService(config.search, log.child("search")),
      llm,
      speech: researcherSpeech,
      logger: log.child("researcher"),
    }),
    validator: new ValidatorAgent({
      llm,
      speech: createSpeechSynthesizer(config.tts, "validator"),
      confidenceThreshold: config.validator.confidenceThreshold,
      logger: log.child("validator"),
    }),
    contextManager: new ContextManager({
      llm,
      maxExchanges: config.context.maxExchanges,
      maxTokens: config.context.maxTokens,
      tokenizerModel: config.context.tokenizerModel,
      logger: log.child("context"),
    }),
    store,
    bus,
    logger: log.child("pipeline"),
  });

  return { pipeline, store, bus, audioFormat: researcherSpeech.format };
}
