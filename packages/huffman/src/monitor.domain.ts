export type StatsMode = "disabled" | "performance-only" | "extended";

/**
 * Counter types for codec monitoring
 */
export type CounterType =
  // Compression
  | "symbolsIn"
  | "bitsOut"
  | "bytesOut"

  // Decompression
  | "bytesIn"
  | "symbolsOut"

  // Tables
  | "tablesBuilt"

  // Extended only
  | "paddingBits"
  | "alphabetSizeSum"
  | "codeLengthSum";

/**
 * Derived codec statistics
 */
export interface ICodecStats {
  durationMS: number;

  symbolsIn: number;
  bytesOut: number;
  bytesIn: number;
  symbolsOut: number;
  tablesBuilt: number;

  // bytesOut / symbolsIn
  compressionRatio: number;
  // code bits (without header or padding) per input symbol
  bitsPerSymbol: number;

  // extended
  paddingBits: number;
  avgAlphabetSize: number;
  // mean code length over table entries, unweighted
  avgCodeLength: number;
}

export interface ICodecMonitor {
  readonly mode: StatsMode;

  /**
   * Increment a counter by the specified amount
   */
  increment(counter: CounterType, amount?: number): void;

  getCounters(): Record<CounterType, number>;

  /**
   * Reset all counters and the timer
   */
  reset(): void;

  /**
   * Start tracking time. Skips if a timer is already running
   */
  start(): void;

  readonly stats: ICodecStats | null;
}

export interface ICodecMonitorConfig {
  mode?: StatsMode;
}
