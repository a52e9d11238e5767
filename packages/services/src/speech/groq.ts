import type { AudioFormat, SpeechSynthesizer } from "@colloquy/types";
import { ColloquyError } from "@colloquy/core";
import { postJson, readBytes } from "../http.js";

export interface GroqSpeechOptions {
  apiKey: string;
  voiceId: string;
  modelId?: string;
  outputFormat?: AudioFormat;
  baseUrl?: string;
}

/** Groq's OpenAI-compatible speech endpoint. */
export class GroqSpeech implements SpeechSynthesizer {
  readonly format: AudioFormat;
  private readonly apiKey: string;
  private readonly voiceId: string;
  private readonly modelId: string;
  private readonly baseUrl: string;

  constructor(opts: GroqSpeechOptions) {
    if (!opts.apiKey) throw new ColloquyError("CONFIG_ERROR", "Groq API key is required");
    this.apiKey = opts.apiKey;
    this.voiceId = opts.voiceId;
    this.modelId = opts.modelId ?? "playai-tts";
    this.format = opts.outputFormat ?? "wav";
    this.baseUrl = opts.baseUrl ?? "https://api.groq.com";
  }

  async synthesize(text: string): Promise<Uint8Array> {
    const response = await postJson(
      "Groq",
      `${this.baseUrl}/openai/v1/audio/speech`,
      { model: this.modelId, voice: this.voiceId, input: text, response_format: this.format },
      { Authorization: `Bearer ${this.apiKey}` }
    );
    return readBytes(response);
  }
}
