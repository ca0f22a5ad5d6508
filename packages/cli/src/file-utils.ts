import { readFile, writeFile } from "fs/promises";
import { basename, dirname, extname, join } from "path";
import fg from "fast-glob";
import { ARCHIVE_EXTENSION, type SymbolKind } from "@huffpack/huffman";
import { Unicode } from "@huffpack/serializers";

const COMPRESSED_SUFFIX = "_huffman";
const DECOMPRESSED_SUFFIX = "_decompressed";

const DECOMPRESSED_EXTENSIONS: Record<SymbolKind, string> = {
  codepoint: ".txt",
  byte: ".bin",
};

function stem(filePath: string): string {
  return basename(filePath, extname(filePath));
}

/**
 * `notes/todo.txt` → `notes/todo_huffman.huffman`
 */
export function compressedPathFor(filePath: string): string {
  return join(
    dirname(filePath),
    `${stem(filePath)}${COMPRESSED_SUFFIX}${ARCHIVE_EXTENSION}`
  );
}

/**
 * `notes/todo_huffman.huffman` → `notes/todo_decompressed.txt`, or `.bin`
 * for byte archives
 */
export function decompressedPathFor(filePath: string, kind: SymbolKind): string {
  let name = stem(filePath);
  if (name.endsWith(COMPRESSED_SUFFIX) && name !== COMPRESSED_SUFFIX) {
    name = name.slice(0, -COMPRESSED_SUFFIX.length);
  }
  return join(
    dirname(filePath),
    `${name}${DECOMPRESSED_SUFFIX}${DECOMPRESSED_EXTENSIONS[kind]}`
  );
}

export function trimTrailingWhitespace(text: string): string {
  return text.trimEnd();
}

/**
 * Expands each pattern with fast-glob. A pattern that matches nothing is kept
 * as a literal path so that reading it reports the missing file.
 */
export async function resolveInputs(patterns: string[]): Promise<string[]> {
  const files: string[] = [];
  for (const pattern of patterns) {
    const matches = fg.isDynamicPattern(pattern)
      ? await fg(pattern, { onlyFiles: true })
      : [];
    files.push(...(matches.length > 0 ? matches.sort() : [pattern]));
  }
  return Array.from(new Set(files));
}

export interface SymbolFile {
  kind: SymbolKind;
  symbols: number[];
  bytes: number;
}

export async function readSymbols(
  filePath: string,
  { binary, trim }: { binary: boolean; trim: boolean }
): Promise<SymbolFile> {
  const raw = new Uint8Array(await readFile(filePath));
  if (binary) {
    return { kind: "byte", symbols: Array.from(raw), bytes: raw.length };
  }

  let symbols = Unicode.fromUtf8Bytes(raw);
  if (trim) {
    symbols = Unicode.fromString(
      trimTrailingWhitespace(Unicode.toString(symbols))
    );
  }
  return { kind: "codepoint", symbols, bytes: raw.length };
}

export async function writeSymbols(
  filePath: string,
  kind: SymbolKind,
  symbols: number[]
): Promise<number> {
  const bytes =
    kind === "byte" ? Uint8Array.from(symbols) : Unicode.toUtf8Bytes(symbols);
  await writeFile(filePath, bytes);
  return bytes.length;
}
