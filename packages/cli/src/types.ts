import type { SymbolKind } from "@huffpack/huffman";

export type CliCommand = "compress" | "decompress" | "help";

export interface CliOptions {
  command: CliCommand;
  /** Files or glob patterns, as given on the command line */
  patterns: string[];
  out: string | null;
  binary: boolean;
  trim: boolean;
  verbose: boolean;
}

export const DEFAULT_OPTIONS: CliOptions = {
  command: "help",
  patterns: [],
  out: null,
  binary: false,
  trim: false,
  verbose: false,
};

export interface ProcessingStats {
  input: string;
  output: string;
  kind: SymbolKind;
  symbols: number;
  bytesIn: number;
  bytesOut: number;
}
