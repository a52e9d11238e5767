import { spawn } from "node:child_process";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { AudioFormat } from "@colloquy/types";

export interface AudioPlayer {
  command: string;
  args: (file: string) => string[];
}

/** Tried in order; the first one found on PATH plays the file. */
export const AUDIO_PLAYERS: ReadonlyArray<AudioPlayer> = [
  { command: "mpv", args: (file) => ["--no-video", "--really-quiet", file] },
  { command: "ffplay", args: (file) => ["-nodisp", "-autoexit", "-loglevel", "quiet", file] },
];

function run(command: string, args: string[]): Promise<"played" | "missing"> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: "ignore" });
    proc.on("error", (err: NodeJS.ErrnoException) => {
      if (err.code === "ENOENT") resolve("missing");
      else reject(err);
    });
    proc.on("close", (code) => {
      if (code === 0) resolve("played");
      else reject(new Error(`${command} exited with code ${code}`));
    });
  });
}

/**
 * Play synthesized speech through the first available player.
 * Returns false when no player is installed.
 */
export async function playAudio(
  audio: Uint8Array,
  format: AudioFormat,
  players: ReadonlyArray<AudioPlayer> = AUDIO_PLAYERS
): Promise<boolean> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "colloquy-audio-"));
  const file = path.join(dir, `speech.${format}`);
  try {
    await fs.writeFile(file, audio);
    for (const player of players) {
      if ((await run(player.command, player.args(file))) === "played") return true;
    }
    return false;
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}
