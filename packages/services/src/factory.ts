import type { AgentName, SearchService, SpeechSynthesizer } from "@colloquy/types";
import type { ColloquyConfig, Logger } from "@colloquy/core";
import { TavilySearch } from "./search/tavily.js";
import { ElevenLabsSpeech } from "./speech/elevenlabs.js";
import { GroqSpeech } from "./speech/groq.js";
import { SilentSpeech } from "./speech/silent.js";

export function createSearchService(config: ColloquyConfig["search"], logger?: Logger): SearchService {
  return new TavilySearch({
    apiKey: config.apiKey,
    maxResults: config.maxResults,
    searchDepth: config.searchDepth,
    logger,
  });
}

/** Each agent speaks with its own voice. */
export function createSpeechSynthesizer(
  config: ColloquyConfig["tts"],
  agent: AgentName
): SpeechSynthesizer {
  switch (config.provider) {
    case "elevenlabs": {
      const { apiKey, researcherVoiceId, validatorVoiceId, modelId, outputFormat } = config.elevenlabs;
      return new ElevenLabsSpeech({
        apiKey,
        voiceId: agent === "researcher" ? researcherVoiceId : validatorVoiceId,
        modelId,
        outputFormat,
      });
    }
    case "groq": {
      const { apiKey, researcherVoiceId, validatorVoiceId, modelId, outputFormat } = config.groq;
      return new GroqSpeech({
        apiKey,
        voiceId: agent === "researcher" ? researcherVoiceId : validatorVoiceId,
        modelId,
        outputFormat,
      });
    }
    case "none":
      return new SilentSpeech();
  }
}
