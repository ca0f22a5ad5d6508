import type { BitString } from "@huffpack/serializers";
import { UnknownSymbolError } from "./errors";
import type {
  CodeTable,
  FrequencyTable,
  HuffmanNode,
  HuffmanSymbol,
} from "./huffman.domain";

// An empty code cannot be matched by the decoder, so a one-leaf tree gets a bit
export const SINGLE_SYMBOL_CODE: BitString = "0";

/**
 * Walks the tree depth-first, appending "0" on left descents and "1" on
 * right descents, and records each leaf's path as its code.
 */
export function generateCodeTable<S extends HuffmanSymbol>(
  root: HuffmanNode<S> | null
): CodeTable<S> {
  const forward = new Map<S, BitString>();
  const reverse = new Map<BitString, S>();
  let maxCodeLength = 0;

  const record = (symbol: S, code: BitString) => {
    forward.set(symbol, code);
    reverse.set(code, symbol);
    if (code.length > maxCodeLength) maxCodeLength = code.length;
  };

  const walk = (node: HuffmanNode<S>, path: BitString) => {
    if (node.kind === "leaf") {
      record(node.symbol, path);
      return;
    }
    walk(node.left, path + "0");
    walk(node.right, path + "1");
  };

  if (root !== null) {
    if (root.kind === "leaf") {
      record(root.symbol, SINGLE_SYMBOL_CODE);
    } else {
      walk(root, "");
    }
  }

  return { forward, reverse, maxCodeLength };
}

/**
 * Sum of `frequency * codeLength` over the frequency table
 * @throws UnknownSymbolError when a counted symbol has no code
 */
export function weightedPathLength<S extends HuffmanSymbol>(
  table: Pick<CodeTable<S>, "forward">,
  frequencies: FrequencyTable<S>
): number {
  let total = 0;
  let position = 0;
  for (const [symbol, frequency] of frequencies) {
    const code = table.forward.get(symbol);
    if (code === undefined) throw new UnknownSymbolError(symbol, position);
    total += frequency * code.length;
    position++;
  }
  return total;
}

/**
 * True when no code in the table is a prefix of another.
 */
export function isPrefixFree<S extends HuffmanSymbol>(
  table: Pick<CodeTable<S>, "forward">
): boolean {
  // after sorting, a code that prefixes another also prefixes its successor
  const codes = Array.from(table.forward.values()).sort();
  for (let i = 1; i < codes.length; i++) {
    if (codes[i].startsWith(codes[i - 1])) return false;
  }
  return true;
}
