/** Empty synthesis output means there is nothing to play. */
export function toAudio(bytes: Uint8Array): Uint8Array | null {
  return bytes.byteLength > 0 ? bytes : null;
}
