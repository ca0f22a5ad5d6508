import { parseArgs } from "util";
import type { CliCommand, CliOptions } from "./types";
import { DEFAULT_OPTIONS } from "./types";

const COMMANDS: readonly CliCommand[] = ["compress", "decompress", "help"];

export class CliUsageError extends Error {
  name = "CliUsageError";
}

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some((command) => command === value);
}

export function printUsage(): void {
  console.log(`
huffpack - Compress files with static Huffman coding

Usage:
  huffpack <command> <file-or-glob>... [options]

Commands:
  compress <file>       Write <name>_huffman.huffman next to each input
  decompress <file>     Write <name>_decompressed.txt (or .bin) next to each archive
  help                  Show this help

Options:
  --out <path>          Output path (only with a single input)
  --binary              Compress raw bytes instead of UTF-8 text
  --trim                Drop trailing whitespace before compressing text
  --verbose             Print codec statistics
  --help                Show this help

Environment Variables:
  HUFF_STATS_MODE                 disabled | performance-only | extended
  HUFF_TRIM_TRAILING_WHITESPACE   Same as --trim when "true" or "1"
  LOG_LEVEL                       pino log level, or "silent"

Examples:
  huffpack compress notes.txt
  huffpack compress "logs/*.log" --trim --verbose
  huffpack decompress notes_huffman.huffman --out notes.txt
`);
}

export function parseCliArgs(
  args: string[] = process.argv.slice(2)
): CliOptions {
  const { values, positionals } = parseArgs({
    args,
    options: {
      out: { type: "string", short: "o" },
      binary: { type: "boolean", default: false },
      trim: { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  const [command = "help", ...patterns] = positionals;

  if (values.help || command === "help") {
    return { ...DEFAULT_OPTIONS };
  }
  if (!isCommand(command)) {
    throw new CliUsageError(`Unknown command "${command}"`);
  }
  if (patterns.length === 0) {
    throw new CliUsageError(`${command} needs at least one file`);
  }

  return {
    command,
    patterns,
    out: values.out ?? DEFAULT_OPTIONS.out,
    binary: values.binary ?? DEFAULT_OPTIONS.binary,
    trim: values.trim ?? DEFAULT_OPTIONS.trim,
    verbose: values.verbose ?? DEFAULT_OPTIONS.verbose,
  };
}
