/**
 * A sequence of binary digits spelled out as the characters "0" and "1".
 * Bit strings are the unit of exchange between the code table, the encoder
 * and the decoder; bytes are only produced at the packing boundary.
 */
export type BitString = string;

export const BITS_PER_BYTE = 8;

const BIT_STRING = /^[01]*$/;

// byte value -> its 8-character MSB-first spelling
const BYTE_TO_BITS: readonly string[] = Array.from({ length: 256 }, (_, b) =>
  b.toString(2).padStart(BITS_PER_BYTE, "0")
);

export function isBitString(value: string): value is BitString {
  return BIT_STRING.test(value);
}

/**
 * Number of zero bits needed to bring `bitLength` up to a byte boundary (0..7).
 */
export function paddingFor(bitLength: number): number {
  return (BITS_PER_BYTE - (bitLength % BITS_PER_BYTE)) % BITS_PER_BYTE;
}

export function byteToBits(byte: number): BitString {
  if (!Number.isInteger(byte) || byte < 0 || byte > 0xff) {
    throw new RangeError(`Not a byte: ${byte}`);
  }
  return BYTE_TO_BITS[byte];
}

/**
 * Packs a byte-aligned bit string into bytes, most significant bit first.
 */
export function packBits(bits: BitString): Uint8Array {
  if (bits.length % BITS_PER_BYTE !== 0) {
    throw new RangeError(
      `Bit string length ${bits.length} is not a multiple of ${BITS_PER_BYTE}`
    );
  }
  if (!isBitString(bits)) {
    throw new RangeError("Bit string may only contain '0' and '1'");
  }

  const out = new Uint8Array(bits.length / BITS_PER_BYTE);
  for (let i = 0; i < out.length; i++) {
    let byte = 0;
    const offset = i * BITS_PER_BYTE;
    for (let b = 0; b < BITS_PER_BYTE; b++) {
      byte = (byte << 1) | (bits.charCodeAt(offset + b) - 48);
    }
    out[i] = byte;
  }
  return out;
}

/**
 * Expands bytes back into their bit string, most significant bit first.
 */
export function unpackBits(bytes: Uint8Array): BitString {
  const parts = new Array<string>(bytes.length);
  for (let i = 0; i < bytes.length; i++) {
    parts[i] = BYTE_TO_BITS[bytes[i]];
  }
  return parts.join("");
}
