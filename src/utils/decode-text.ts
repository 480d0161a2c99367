/**
 * Decode a buffer with the first encoding that accepts it
 * Returns null when none of the encodings can decode the bytes
 *
 * Labels follow the WHATWG Encoding Standard: "latin1" and "iso-8859-1"
 * select the windows-1252 decoder, so 0x80-0x9F map to its punctuation
 * (0x80 is "€") rather than to C1 controls.
 *
 * @example
 * decodeText(buffer, ["utf-8", "latin1"]) // falls back to latin1 for invalid UTF-8
 */
export function decodeText(buffer: Uint8Array, encodings: string[]): string | null {
  for (const encoding of encodings) {
    let decoder: TextDecoder;
    try {
      decoder = new TextDecoder(encoding, { fatal: true, ignoreBOM: true });
    } catch {
      // Unknown encoding label, try the next one
      continue;
    }

    try {
      return decoder.decode(buffer);
    } catch {
      continue;
    }
  }

  return null;
}
