import { BITS_PER_BYTE, unpackBits } from "@huffpack/serializers";
import { TruncatedOrCorruptPayloadError } from "./errors";
import type { HuffmanSymbol, ReverseCodeTable } from "./huffman.domain";

/**
 * Decodes an EncodedPayload by greedy prefix matching against `reverse`.
 * Because the codes are prefix-free the first match is the only match.
 *
 * @throws TruncatedOrCorruptPayloadError when the header is missing or
 *   describes more padding than there are bits, or when bits are left that no
 *   code matches. No partial output is returned.
 */
export function decodeSymbols<S extends HuffmanSymbol>(
  payload: Uint8Array,
  reverse: ReverseCodeTable<S>
): S[] {
  if (payload.length === 0) {
    throw new TruncatedOrCorruptPayloadError("missing padding header");
  }

  const bits = unpackBits(payload);
  const padding = payload[0];
  const bodyLength = bits.length - BITS_PER_BYTE;

  if (padding >= BITS_PER_BYTE) {
    throw new TruncatedOrCorruptPayloadError(
      `padding header ${padding} is larger than 7`
    );
  }
  if (padding > bodyLength) {
    throw new TruncatedOrCorruptPayloadError(
      `padding header ${padding} exceeds the ${bodyLength} payload bits`
    );
  }

  let maxCodeLength = 0;
  for (const code of reverse.keys()) {
    if (code.length > maxCodeLength) maxCodeLength = code.length;
  }

  const end = bits.length - padding;
  const out: S[] = [];
  let current = "";

  for (let i = BITS_PER_BYTE; i < end; i++) {
    current += bits[i];
    const symbol = reverse.get(current);
    if (symbol !== undefined) {
      out.push(symbol);
      current = "";
    } else if (current.length >= maxCodeLength) {
      throw new TruncatedOrCorruptPayloadError(
        `no code matches the bits starting at offset ${
          i + 1 - current.length - BITS_PER_BYTE
        }`
      );
    }
  }

  if (current.length > 0) {
    throw new TruncatedOrCorruptPayloadError(
      `${current.length} trailing bits match no code`
    );
  }

  return out;
}
