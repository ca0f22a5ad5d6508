import { createStructuredLogger } from "@huffpack/shared";
import { generateCodeTable } from "./code-table";
import { decodeSymbols } from "./decoder";
import { encodeSymbols } from "./encoder";
import { countFrequencies } from "./frequency";
import { buildHuffmanTree } from "./huffman-tree";
import type {
  CodeTable,
  CodeTableBuild,
  CompressResult,
  FrequencyTable,
  HuffmanSymbol,
  IHuffmanCodec,
  IHuffmanCodecConfig,
  ReverseCodeTable,
} from "./huffman.domain";
import { CodecMonitor, NoOpCodecMonitor } from "./monitor";
import type { ICodecMonitor, ICodecStats } from "./monitor.domain";

const log = createStructuredLogger("codec");

/**
 * Static Huffman codec.
 *
 * Compression: symbols → frequency table → tree → code table → payload.
 * Decompression: payload → bits → padding stripped → symbols.
 *
 * Instances hold no state besides their monitor; trees and tables are built
 * per call and never shared.
 */
export class HuffmanCodec<S extends HuffmanSymbol> implements IHuffmanCodec<S> {
  private _monitor: ICodecMonitor;
  private _enableMonitoring: boolean;

  // ---------- Tables ----------
  buildCodeTable(symbols: Iterable<S>): CodeTableBuild<S> {
    const frequencies = countFrequencies(symbols);
    return { frequencies, table: this.tableFor(frequencies) };
  }

  tableFor(frequencies: FrequencyTable<S>): CodeTable<S> {
    this.monitorStart();
    const table = generateCodeTable(buildHuffmanTree(frequencies));
    this.monitorTable(table);

    log.debug("Built code table", {
      alphabetSize: table.forward.size,
      maxCodeLength: table.maxCodeLength,
    });
    return table;
  }

  // ---------- Core ----------
  compress(symbols: readonly S[], table?: CodeTable<S>): CompressResult<S> {
    this.monitorStart();

    let codeTable: CodeTable<S>;
    let frequencies: FrequencyTable<S> | undefined;
    if (table) {
      codeTable = table;
    } else {
      const built = this.buildCodeTable(symbols);
      codeTable = built.table;
      frequencies = built.frequencies;
    }

    const payload = encodeSymbols(symbols, codeTable);
    this.monitorCompressed(symbols.length, payload);

    log.debug("Compressed symbols", {
      symbols: symbols.length,
      alphabetSize: codeTable.forward.size,
      bytes: payload.length,
      padding: payload[0],
    });

    return { payload, table: codeTable, frequencies };
  }

  decompress(payload: Uint8Array, reverse: ReverseCodeTable<S>): S[] {
    this.monitorStart();
    const symbols = decodeSymbols(payload, reverse);
    this.monitorDecompressed(payload.length, symbols.length);

    log.debug("Decompressed payload", {
      bytes: payload.length,
      symbols: symbols.length,
    });
    return symbols;
  }

  // ---------- Monitor helpers ----------
  private monitorStart() {
    if (!this._enableMonitoring) return;
    this._monitor.start();
  }
  private monitorTable(table: CodeTable<S>) {
    if (!this._enableMonitoring) return;
    let codeLengthSum = 0;
    for (const code of table.forward.values()) codeLengthSum += code.length;

    this._monitor.increment("tablesBuilt");
    this._monitor.increment("alphabetSizeSum", table.forward.size);
    this._monitor.increment("codeLengthSum", codeLengthSum);
  }
  private monitorCompressed(symbolCount: number, payload: Uint8Array) {
    if (!this._enableMonitoring) return;
    const padding = payload[0];
    this._monitor.increment("symbolsIn", symbolCount);
    this._monitor.increment("bytesOut", payload.length);
    this._monitor.increment("bitsOut", (payload.length - 1) * 8 - padding);
    this._monitor.increment("paddingBits", padding);
  }
  private monitorDecompressed(byteCount: number, symbolCount: number) {
    if (!this._enableMonitoring) return;
    this._monitor.increment("bytesIn", byteCount);
    this._monitor.increment("symbolsOut", symbolCount);
  }

  // ---------- Management API ----------
  get stats(): ICodecStats | null {
    return this._monitor.stats;
  }

  clear() {
    this._monitor.reset();
  }

  // ---------- Ctor ----------
  constructor({ stats }: IHuffmanCodecConfig = {}) {
    if (!stats || stats.mode === "disabled") {
      this._monitor = new NoOpCodecMonitor();
      this._enableMonitoring = false;
    } else if (stats.monitor) {
      this._monitor = stats.monitor;
      this._enableMonitoring = true;
    } else {
      this._monitor = new CodecMonitor({ mode: stats.mode });
      this._enableMonitoring = true;
    }
  }
}
