import { HuffmanCodec, type StatsMode } from "@huffpack/huffman";
import { createStructuredLogger, variables } from "@huffpack/shared";
import { CliUsageError, parseCliArgs, printUsage } from "./args";
import { resolveInputs } from "./file-utils";
import {
  compressFile,
  decompressFile,
  printFileResult,
  printSummary,
} from "./processor";
import type { CliOptions, ProcessingStats } from "./types";

const log = createStructuredLogger("cli");

function statsModeFor(options: CliOptions): StatsMode {
  const mode = variables.HUFF_STATS_MODE;
  if (options.verbose && mode === "disabled") return "performance-only";
  return mode;
}

async function run(options: CliOptions): Promise<void> {
  const files = await resolveInputs(options.patterns);
  if (options.out !== null && files.length > 1) {
    throw new CliUsageError(
      `--out needs a single input, got ${files.length} files`
    );
  }

  const codec = new HuffmanCodec<number>({
    stats: { mode: statsModeFor(options) },
  });
  const trim = options.trim || variables.HUFF_TRIM_TRAILING_WHITESPACE;
  const startTime = performance.now();
  const results: ProcessingStats[] = [];

  for (const file of files) {
    const result =
      options.command === "compress"
        ? await compressFile(file, codec, { ...options, trim })
        : await decompressFile(file, codec, options);
    results.push(result);
    printFileResult(result);
  }

  if (options.verbose) {
    const elapsed = (performance.now() - startTime) / 1000;
    printSummary(results, elapsed, codec.stats);
  }
}

async function main(): Promise<void> {
  const options = parseCliArgs();

  switch (options.command) {
    case "compress":
    case "decompress":
      await run(options);
      break;
    case "help":
      printUsage();
      break;
  }
}

main().catch((error: unknown) => {
  if (error instanceof CliUsageError) {
    console.error(error.message);
    printUsage();
  } else {
    log.error(
      "huffpack failed",
      error instanceof Error ? error : new Error(String(error))
    );
    console.error(error instanceof Error ? error.message : String(error));
  }
  process.exitCode = 1;
});
