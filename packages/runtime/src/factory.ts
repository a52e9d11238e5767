import type { LanguageModel } from "@colloquy/types";
import type { ColloquyConfig, Logger } from "@colloquy/core";
import { OllamaAdapter } from "./ollama-adapter.js";
import { OpenAIAdapter } from "./openai-adapter.js";

/** Build the configured LanguageModel. */
export function createLanguageModel(config: ColloquyConfig["llm"], logger?: Logger): LanguageModel {
  switch (config.provider) {
    case "ollama":
      return new OllamaAdapter({
        model: config.model,
        temperature: config.temperature,
        logger,
        ...(config.baseUrl ? { baseUrl: config.baseUrl } : {}),
      });
    case "openai":
      return new OpenAIAdapter({
        apiKey: config.apiKey,
        model: config.model,
        temperature: config.temperature,
        maxOutputTokens: config.maxOutputTokens,
        structuredMaxOutputTokens: config.structuredMaxOutputTokens,
        logger,
        ...(config.baseUrl ? { baseUrl: config.baseUrl } : {}),
      });
  }
}
