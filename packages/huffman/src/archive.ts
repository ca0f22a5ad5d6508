import { createStructuredLogger } from "@huffpack/shared";
import { HuffmanCodec } from "./codec";
import { InvalidArchiveError } from "./errors";
import type { FrequencyTable } from "./huffman.domain";

export const ARCHIVE_MAGIC = "HUF1";
export const ARCHIVE_VERSION = 1;
export const ARCHIVE_EXTENSION = ".huffman";

const HEADER_SIZE = 10; // 4 magic + 1 version + 1 symbol kind + uint32 entry count
const ENTRY_SIZE = 8; // uint32 symbol + uint32 frequency
const MAX_UINT32 = 0xffff_ffff;

export type SymbolKind = "codepoint" | "byte";

const SYMBOL_KIND_CODES: Record<SymbolKind, number> = {
  codepoint: 0,
  byte: 1,
};

const MAX_SYMBOL: Record<SymbolKind, number> = {
  codepoint: 0x10ffff,
  byte: 0xff,
};

function symbolKindFromCode(code: number): SymbolKind | null {
  switch (code) {
    case SYMBOL_KIND_CODES.codepoint:
      return "codepoint";
    case SYMBOL_KIND_CODES.byte:
      return "byte";
    default:
      return null;
  }
}

/**
 * A frequency table shipped alongside the payload it produced, so that a
 * separate process can rebuild the exact code table.
 */
export interface Archive {
  kind: SymbolKind;
  frequencies: FrequencyTable<number>;
  payload: Uint8Array;
}

const log = createStructuredLogger("archive");

const isSurrogate = (symbol: number) => symbol >= 0xd800 && symbol <= 0xdfff;

function checkSymbol(kind: SymbolKind, symbol: number): void {
  if (
    !Number.isInteger(symbol) ||
    symbol < 0 ||
    symbol > MAX_SYMBOL[kind] ||
    (kind === "codepoint" && isSurrogate(symbol))
  ) {
    throw new InvalidArchiveError(`symbol ${symbol} is not a valid ${kind}`);
  }
}

/**
 * Layout, integers big-endian:
 *
 *   0      4    magic "HUF1"
 *   4      1    version
 *   5      1    symbol kind (0 codepoint, 1 byte)
 *   6      4    entry count n
 *   10     8n   n × (symbol uint32, frequency uint32) in table order
 *   10+8n  ...  EncodedPayload
 */
export const packArchive = ({
  kind,
  frequencies,
  payload,
}: Archive): Uint8Array => {
  const tableSize = frequencies.size * ENTRY_SIZE;
  const totalSize = HEADER_SIZE + tableSize + payload.length;
  const buffer = new ArrayBuffer(totalSize);
  const view = new DataView(buffer);
  let offset = 0;

  for (let i = 0; i < ARCHIVE_MAGIC.length; i++) {
    view.setUint8(offset++, ARCHIVE_MAGIC.charCodeAt(i));
  }
  view.setUint8(offset++, ARCHIVE_VERSION);
  view.setUint8(offset++, SYMBOL_KIND_CODES[kind]);
  view.setUint32(offset, frequencies.size, false);
  offset += 4;

  for (const [symbol, frequency] of frequencies) {
    checkSymbol(kind, symbol);
    if (!Number.isInteger(frequency) || frequency < 1 || frequency > MAX_UINT32) {
      throw new InvalidArchiveError(
        `frequency ${frequency} of symbol ${symbol} does not fit the table`
      );
    }
    view.setUint32(offset, symbol, false);
    offset += 4;
    view.setUint32(offset, frequency, false);
    offset += 4;
  }

  const out = new Uint8Array(buffer);
  out.set(payload, offset);
  return out;
};

export const parseArchive = (bytes: Uint8Array): Archive => {
  if (bytes.length < HEADER_SIZE) {
    throw new InvalidArchiveError(
      `${bytes.length} bytes is shorter than the ${HEADER_SIZE} byte header`
    );
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  let offset = 0;

  let magic = "";
  for (let i = 0; i < ARCHIVE_MAGIC.length; i++) {
    magic += String.fromCharCode(view.getUint8(offset++));
  }
  if (magic !== ARCHIVE_MAGIC) {
    throw new InvalidArchiveError("bad magic");
  }

  const version = view.getUint8(offset++);
  if (version !== ARCHIVE_VERSION) {
    throw new InvalidArchiveError(`unsupported version ${version}`);
  }

  const kindCode = view.getUint8(offset++);
  const kind = symbolKindFromCode(kindCode);
  if (kind === null) {
    throw new InvalidArchiveError(`unknown symbol kind ${kindCode}`);
  }

  const count = view.getUint32(offset, false);
  offset += 4;

  // the payload needs at least its padding header byte
  if (bytes.length < HEADER_SIZE + count * ENTRY_SIZE + 1) {
    throw new InvalidArchiveError(
      `truncated: ${count} table entries do not fit in ${bytes.length} bytes`
    );
  }

  const frequencies = new Map<number, number>();
  for (let i = 0; i < count; i++) {
    const symbol = view.getUint32(offset, false);
    offset += 4;
    const frequency = view.getUint32(offset, false);
    offset += 4;

    checkSymbol(kind, symbol);
    if (frequency === 0) {
      throw new InvalidArchiveError(`symbol ${symbol} has a zero frequency`);
    }
    if (frequencies.has(symbol)) {
      throw new InvalidArchiveError(`symbol ${symbol} appears twice`);
    }
    frequencies.set(symbol, frequency);
  }

  return { kind, frequencies, payload: bytes.slice(offset) };
};

/**
 * Compresses `symbols` and ships the frequency table with the payload.
 */
export function compressToArchive(
  symbols: readonly number[],
  kind: SymbolKind,
  codec: HuffmanCodec<number> = new HuffmanCodec<number>()
): Uint8Array {
  for (let i = 0; i < symbols.length; i++) checkSymbol(kind, symbols[i]);

  const { payload, frequencies } = codec.compress(symbols);
  const archive = packArchive({
    kind,
    frequencies: frequencies ?? new Map<number, number>(),
    payload,
  });

  log.debug("Packed archive", {
    kind,
    entries: frequencies?.size ?? 0,
    payloadBytes: payload.length,
    archiveBytes: archive.length,
  });
  return archive;
}

/**
 * Rebuilds the code table from the archived frequencies and decodes the
 * payload with it.
 */
export function decompressArchive(
  bytes: Uint8Array,
  codec: HuffmanCodec<number> = new HuffmanCodec<number>()
): { kind: SymbolKind; symbols: number[] } {
  const { kind, frequencies, payload } = parseArchive(bytes);
  const table = codec.tableFor(frequencies);
  const symbols = codec.decompress(payload, table.reverse);

  log.debug("Unpacked archive", {
    kind,
    entries: frequencies.size,
    symbols: symbols.length,
  });
  return { kind, symbols };
}
