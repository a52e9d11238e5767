import type { AudioFormat, SpeechSynthesizer } from "@colloquy/types";
import { ColloquyError } from "@colloquy/core";
import { postJson, readBytes } from "../http.js";

export interface ElevenLabsSpeechOptions {
  apiKey: string;
  voiceId: string;
  modelId?: string;
  /** ElevenLabs output format, e.g. "mp3_44100_128". */
  outputFormat?: string;
  baseUrl?: string;
}

/** The container format named by an ElevenLabs output format string. */
export function audioFormatOf(outputFormat: string): AudioFormat {
  return outputFormat.startsWith("mp3") ? "mp3" : "wav";
}

export class ElevenLabsSpeech implements SpeechSynthesizer {
  readonly format: AudioFormat;
  private readonly apiKey: string;
  private readonly voiceId: string;
  private readonly modelId: string;
  private readonly outputFormat: string;
  private readonly baseUrl: string;

  constructor(opts: ElevenLabsSpeechOptions) {
    if (!opts.apiKey) throw new ColloquyError("CONFIG_ERROR", "ElevenLabs API key is required");
    this.apiKey = opts.apiKey;
    this.voiceId = opts.voiceId;
    this.modelId = opts.modelId ?? "eleven_flash_v2_5";
    this.outputFormat = opts.outputFormat ?? "mp3_44100_128";
    this.baseUrl = opts.baseUrl ?? "https://api.elevenlabs.io";
    this.format = audioFormatOf(this.outputFormat);
  }

  async synthesize(text: string): Promise<Uint8Array> {
    const url =
      `${this.baseUrl}/v1/text-to-speech/${encodeURIComponent(this.voiceId)}` +
      `?output_format=${encodeURIComponent(this.outputFormat)}`;
    const response = await postJson(
      "ElevenLabs",
      url,
      { text, model_id: this.modelId },
      { "xi-api-key": this.apiKey }
    );
    return readBytes(response);
  }
}
