import { readFile, writeFile } from "fs/promises";
import { relative } from "path";
import {
  compressToArchive,
  decompressArchive,
  type HuffmanCodec,
  type ICodecStats,
} from "@huffpack/huffman";
import { createStructuredLogger } from "@huffpack/shared";
import {
  compressedPathFor,
  decompressedPathFor,
  readSymbols,
  writeSymbols,
} from "./file-utils";
import type { CliOptions, ProcessingStats } from "./types";

const log = createStructuredLogger("cli");

type FileOptions = Pick<CliOptions, "out" | "binary" | "trim">;

export async function compressFile(
  filePath: string,
  codec: HuffmanCodec<number>,
  options: FileOptions
): Promise<ProcessingStats> {
  return log.timed(
    "compress",
    async () => {
      const { kind, symbols, bytes } = await readSymbols(filePath, options);
      const archive = compressToArchive(symbols, kind, codec);
      const output = options.out ?? compressedPathFor(filePath);
      await writeFile(output, archive);

      return {
        input: filePath,
        output,
        kind,
        symbols: symbols.length,
        bytesIn: bytes,
        bytesOut: archive.length,
      };
    },
    { file: filePath }
  );
}

export async function decompressFile(
  filePath: string,
  codec: HuffmanCodec<number>,
  options: Pick<CliOptions, "out">
): Promise<ProcessingStats> {
  return log.timed(
    "decompress",
    async () => {
      const archive = new Uint8Array(await readFile(filePath));
      const { kind, symbols } = decompressArchive(archive, codec);
      const output = options.out ?? decompressedPathFor(filePath, kind);
      const written = await writeSymbols(output, kind, symbols);

      return {
        input: filePath,
        output,
        kind,
        symbols: symbols.length,
        bytesIn: archive.length,
        bytesOut: written,
      };
    },
    { file: filePath }
  );
}

export function printFileResult(result: ProcessingStats): void {
  const ratio = result.bytesIn ? result.bytesOut / result.bytesIn : 0;
  console.log(
    `${relative(process.cwd(), result.input)} → ${relative(
      process.cwd(),
      result.output
    )} (${result.bytesIn} → ${result.bytesOut} bytes, ${(ratio * 100).toFixed(
      1
    )}%)`
  );
}

export function printSummary(
  results: ProcessingStats[],
  elapsed: number,
  stats: ICodecStats | null
): void {
  const bytesIn = results.reduce((sum, r) => sum + r.bytesIn, 0);
  const bytesOut = results.reduce((sum, r) => sum + r.bytesOut, 0);

  console.log(`\nComplete!`);
  console.log(`  Files processed: ${results.length}`);
  console.log(`  Bytes in: ${bytesIn.toLocaleString()}`);
  console.log(`  Bytes out: ${bytesOut.toLocaleString()}`);
  console.log(`  Time elapsed: ${elapsed.toFixed(2)}s`);

  if (!stats) return;
  console.log(`  Symbols in: ${stats.symbolsIn}`);
  console.log(`  Symbols out: ${stats.symbolsOut}`);
  console.log(`  Tables built: ${stats.tablesBuilt}`);
  console.log(`  Bytes per symbol: ${stats.compressionRatio.toFixed(3)}`);
  console.log(`  Bits per symbol: ${stats.bitsPerSymbol.toFixed(3)}`);
  if (stats.avgAlphabetSize > 0) {
    console.log(`  Padding bits: ${stats.paddingBits}`);
    console.log(`  Avg alphabet size: ${stats.avgAlphabetSize.toFixed(1)}`);
    console.log(`  Avg code length: ${stats.avgCodeLength.toFixed(2)}`);
  }
}
