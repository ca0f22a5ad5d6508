// String.fromCodePoint spreads its arguments onto the stack
const FROM_CODEPOINT_CHUNK = 8192;

// ignoreBOM keeps a leading U+FEFF as a codepoint instead of dropping it
const utf8Decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
const utf8Encoder = new TextEncoder();

/**
 * Unicode-aware text reader that yields codepoints instead of UTF-16 units
 */
export class Unicode {
  /**
   * Convert a text string into an array of Unicode codepoints
   * Each codepoint is a number that represents one logical character
   */
  static fromString(text: string): number[] {
    const codepoints: number[] = [];
    for (const char of text) {
      codepoints.push(char.codePointAt(0) ?? 0);
    }
    return codepoints;
  }

  /**
   * Convert an array of Unicode codepoints back to a string
   */
  static toString(codepoints: readonly number[]): string {
    let out = "";
    for (let i = 0; i < codepoints.length; i += FROM_CODEPOINT_CHUNK) {
      out += String.fromCodePoint(
        ...codepoints.slice(i, i + FROM_CODEPOINT_CHUNK)
      );
    }
    return out;
  }

  /**
   * Decode UTF-8 bytes into codepoints; malformed input throws instead of
   * turning into U+FFFD.
   */
  static fromUtf8Bytes(bytes: Uint8Array): number[] {
    return Unicode.fromString(utf8Decoder.decode(bytes));
  }

  static toUtf8Bytes(codepoints: readonly number[]): Uint8Array {
    return utf8Encoder.encode(Unicode.toString(codepoints));
  }
}
