import {
  BITS_PER_BYTE,
  byteToBits,
  packBits,
  paddingFor,
} from "@huffpack/serializers";
import { MisalignedPayloadError, UnknownSymbolError } from "./errors";
import type { CodeTable, HuffmanSymbol } from "./huffman.domain";

/**
 * Encodes a symbol sequence into an EncodedPayload:
 *
 *   byte 0      number of zero bits padded onto the end (0..7)
 *   bytes 1..N  the concatenated codes plus padding, MSB first
 *
 * @throws UnknownSymbolError when a symbol has no forward code; nothing is
 *   emitted in that case
 */
export function encodeSymbols<S extends HuffmanSymbol>(
  symbols: Iterable<S>,
  table: Pick<CodeTable<S>, "forward">
): Uint8Array {
  const codes: string[] = [];
  let bitLength = 0;
  let position = 0;

  for (const symbol of symbols) {
    const code = table.forward.get(symbol);
    if (code === undefined) throw new UnknownSymbolError(symbol, position);
    codes.push(code);
    bitLength += code.length;
    position++;
  }

  const padding = paddingFor(bitLength);
  const bits = byteToBits(padding) + codes.join("") + "0".repeat(padding);

  if (bits.length % BITS_PER_BYTE !== 0) {
    throw new MisalignedPayloadError(bits.length);
  }

  return packBits(bits);
}
