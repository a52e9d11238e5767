export {
  ResearchValidationPipeline,
  runResearchStage,
  runValidationStage,
  EMPTY_STATE,
} from "./pipeline.js";
export type { PipelineOptions, StateUpdate } from "./pipeline.js";
export { ResearcherAgent, formatResearch } from "./researcher.js";
export type { ResearcherAgentOptions } from "./researcher.js";
export { ValidatorAgent, DEFAULT_CONFIDENCE_THRESHOLD } from "./validator.js";
export type { ValidatorAgentOptions } from "./validator.js";
export { ResearchSynthesisSchema, ValidationResultSchema } from "./schemas.js";
export type { ResearchSynthesis, ValidationResult } from "./schemas.js";
export { MockLanguageModel, parseStructured, parseStructuredText } from "./model-adapter.js";
export type { MockCall } from "./model-adapter.js";
export { OllamaAdapter } from "./ollama-adapter.js";
export type { OllamaAdapterOptions } from "./ollama-adapter.js";
export { OpenAIAdapter } from "./openai-adapter.js";
export type { OpenAIAdapterOptions } from "./openai-adapter.js";
export { createLanguageModel } from "./factory.js";
export * from "./prompts/index.js";
export { createColloquy } from "./wiring.js";
export type { Colloquy } from "./wiring.js";
