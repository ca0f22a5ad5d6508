import type { FrequencyTable, HuffmanSymbol } from "./huffman.domain";

/**
 * Counts the occurrences of each distinct symbol. Keys appear in order of
 * first occurrence.
 *
 * @example
 * ```typescript
 * countFrequencies("hello");
 * // Map { 'h' => 1, 'e' => 1, 'l' => 2, 'o' => 1 }
 * ```
 */
export function countFrequencies<S extends HuffmanSymbol>(
  symbols: Iterable<S>
): FrequencyTable<S> {
  const frequency = new Map<S, number>();
  for (const symbol of symbols) {
    frequency.set(symbol, (frequency.get(symbol) ?? 0) + 1);
  }
  return frequency;
}
