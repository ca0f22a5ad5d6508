import type { BitString } from "@huffpack/serializers";
import type { ICodecMonitor, ICodecStats, StatsMode } from "./monitor.domain";

/**
 * An atomic unit of the alphabet: a character, a codepoint or a byte.
 * Only equality matters.
 */
export type HuffmanSymbol = string | number;

/**
 * Occurrence count per distinct symbol. Iteration order is first-occurrence
 * order and decides how equal frequencies are tie-broken.
 */
export type FrequencyTable<S extends HuffmanSymbol> = ReadonlyMap<S, number>;

export interface HuffmanLeaf<S extends HuffmanSymbol> {
  readonly kind: "leaf";
  readonly symbol: S;
  readonly frequency: number;
}

export interface HuffmanInternal<S extends HuffmanSymbol> {
  readonly kind: "internal";
  /** Always the sum of the children's frequencies */
  readonly frequency: number;
  readonly left: HuffmanNode<S>;
  readonly right: HuffmanNode<S>;
}

export type HuffmanNode<S extends HuffmanSymbol> =
  | HuffmanLeaf<S>
  | HuffmanInternal<S>;

export type ReverseCodeTable<S extends HuffmanSymbol> = ReadonlyMap<
  BitString,
  S
>;

/**
 * Forward and reverse code maps produced by one traversal of a tree.
 * The forward codes are prefix-free and the two maps are exact inverses.
 */
export interface CodeTable<S extends HuffmanSymbol> {
  readonly forward: ReadonlyMap<S, BitString>;
  readonly reverse: ReverseCodeTable<S>;
  /** Length of the longest code, 0 for an empty table */
  readonly maxCodeLength: number;
}

export interface CodeTableBuild<S extends HuffmanSymbol> {
  frequencies: FrequencyTable<S>;
  table: CodeTable<S>;
}

export interface CompressResult<S extends HuffmanSymbol> {
  /** Padding header byte followed by the packed code bits */
  payload: Uint8Array;
  table: CodeTable<S>;
  /** Present when the table was built from the input itself */
  frequencies?: FrequencyTable<S>;
}

/**
 * Configuration interface for HuffmanCodec instances
 */
export interface IHuffmanCodecConfig {
  stats?: {
    mode?: StatsMode;
    monitor?: ICodecMonitor;
  };
}

/**
 * Static Huffman codec: frequency analysis, tree construction, code table
 * derivation, bit packing and greedy prefix decoding.
 */
export interface IHuffmanCodec<S extends HuffmanSymbol> {
  /**
   * Current codec statistics, null if monitoring is disabled or nothing ran
   */
  readonly stats: ICodecStats | null;

  /**
   * Counts the input's symbols and derives a code table from the counts
   */
  buildCodeTable(symbols: Iterable<S>): CodeTableBuild<S>;

  /**
   * Derives the code table for an existing frequency table
   */
  tableFor(frequencies: FrequencyTable<S>): CodeTable<S>;

  /**
   * Encodes `symbols`. Without a `table` one is built from the input's own
   * frequencies.
   */
  compress(symbols: readonly S[], table?: CodeTable<S>): CompressResult<S>;

  /**
   * Reconstructs the symbol sequence; `reverse` must come from the table the
   * payload was encoded with.
   */
  decompress(payload: Uint8Array, reverse: ReverseCodeTable<S>): S[];

  /**
   * Resets the statistics
   */
  clear(): void;
}
