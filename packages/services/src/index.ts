export { TavilySearch, formatSearchResults } from "./search/tavily.js";
export type { TavilySearchOptions, TavilyResult } from "./search/tavily.js";
export { ElevenLabsSpeech, audioFormatOf } from "./speech/elevenlabs.js";
export type { ElevenLabsSpeechOptions } from "./speech/elevenlabs.js";
export { GroqSpeech } from "./speech/groq.js";
export type { GroqSpeechOptions } from "./speech/groq.js";
export { SilentSpeech } from "./speech/silent.js";
export { createSearchService, createSpeechSynthesizer } from "./factory.js";
