import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { HuffmanCodec, InvalidArchiveError } from "@huffpack/huffman";
import { compressFile, decompressFile } from "../processor";

describe("compressFile / decompressFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "huffpack-cli-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("round-trips a text file", async () => {
    const input = join(dir, "notes.txt");
    const text = "the quick brown fox\njumps over the lazy dog ✓\n";
    await writeFile(input, text);

    const codec = new HuffmanCodec<number>();
    const compressed = await compressFile(input, codec, {
      out: null,
      binary: false,
      trim: false,
    });
    expect(compressed).toMatchObject({
      input,
      output: join(dir, "notes_huffman.huffman"),
      kind: "codepoint",
      symbols: Array.from(text).length,
      bytesIn: Buffer.byteLength(text),
    });

    const decompressed = await decompressFile(compressed.output, codec, {
      out: null,
    });
    expect(decompressed.output).toBe(join(dir, "notes_decompressed.txt"));
    expect(decompressed.bytesOut).toBe(Buffer.byteLength(text));
    expect(await readFile(decompressed.output, "utf8")).toBe(text);
  });

  test("keeps a byte order mark in text mode", async () => {
    const input = join(dir, "bom.txt");
    const bytes = [0xef, 0xbb, 0xbf, 0x68, 0x69];
    await writeFile(input, new Uint8Array(bytes));

    const codec = new HuffmanCodec<number>();
    const compressed = await compressFile(input, codec, {
      out: null,
      binary: false,
      trim: false,
    });
    expect(compressed.symbols).toBe(3);

    const decompressed = await decompressFile(compressed.output, codec, {
      out: null,
    });
    expect(decompressed.bytesOut).toBe(5);
    expect(Array.from(await readFile(decompressed.output))).toEqual(bytes);
  });

  test("trims trailing whitespace when asked", async () => {
    const input = join(dir, "padded.txt");
    await writeFile(input, "aaabbc \n\n");

    const codec = new HuffmanCodec<number>();
    const { output } = await compressFile(input, codec, {
      out: join(dir, "padded.huffman"),
      binary: false,
      trim: true,
    });
    const archive = await readFile(output);
    expect(Array.from(archive.subarray(archive.length - 3))).toEqual([
      0x07, 0x1f, 0x00,
    ]);

    const restored = join(dir, "restored.txt");
    await decompressFile(output, codec, { out: restored });
    expect(await readFile(restored, "utf8")).toBe("aaabbc");
  });

  test("round-trips a binary file", async () => {
    const input = join(dir, "blob.dat");
    const bytes = new Uint8Array([0, 0, 0, 1, 2, 255, 254, 0, 10, 13]);
    await writeFile(input, bytes);

    const codec = new HuffmanCodec<number>({ stats: { mode: "extended" } });
    const compressed = await compressFile(input, codec, {
      out: null,
      binary: true,
      trim: true,
    });
    const decompressed = await decompressFile(compressed.output, codec, {
      out: null,
    });

    expect(decompressed.kind).toBe("byte");
    expect(decompressed.output).toBe(join(dir, "blob_decompressed.bin"));
    expect(new Uint8Array(await readFile(decompressed.output))).toEqual(bytes);
    expect(codec.stats).toMatchObject({
      symbolsIn: 10,
      symbolsOut: 10,
      tablesBuilt: 2,
    });
  });

  test("rejects a file that is not an archive", async () => {
    const input = join(dir, "plain.huffman");
    await writeFile(input, "not an archive at all");

    await expect(
      decompressFile(input, new HuffmanCodec<number>(), { out: null })
    ).rejects.toThrow(InvalidArchiveError);
  });
});
