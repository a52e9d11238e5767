import type { AudioFormat, SpeechSynthesizer } from "@colloquy/types";

/** Used when speech is switched off. Always returns empty audio. */
export class SilentSpeech implements SpeechSynthesizer {
  constructor(readonly format: AudioFormat = "mp3") {}

  async synthesize(_text: string): Promise<Uint8Array> {
    return new Uint8Array();
  }
}
