import { test, expect, describe } from "vitest";
import {
  generateCodeTable,
  isPrefixFree,
  weightedPathLength,
} from "../code-table";
import { UnknownSymbolError } from "../errors";
import { countFrequencies } from "../frequency";
import { buildHuffmanTree, treeWeightedPathLength } from "../huffman-tree";
import type { FrequencyTable } from "../huffman.domain";

function tableFor<S extends string | number>(frequencies: FrequencyTable<S>) {
  return generateCodeTable(buildHuffmanTree(frequencies));
}

// Total cost of the classical merge procedure, computed without a tree
function mergeCost(frequencies: Iterable<number>): number {
  const weights = Array.from(frequencies);
  let cost = 0;
  while (weights.length > 1) {
    weights.sort((a, b) => a - b);
    const [first, second] = weights.splice(0, 2);
    cost += first + second;
    weights.push(first + second);
  }
  return cost;
}

const CLASSIC = new Map([
  ["a", 5],
  ["b", 9],
  ["c", 12],
  ["d", 13],
  ["e", 16],
  ["f", 45],
]);

describe("generateCodeTable", () => {
  test("assigns 0 on left edges and 1 on right edges", () => {
    const table = tableFor(countFrequencies("aaabbc"));

    expect(Object.fromEntries(table.forward)).toEqual({
      a: "0",
      c: "10",
      b: "11",
    });
    expect(Object.fromEntries(table.reverse)).toEqual({
      "0": "a",
      "10": "c",
      "11": "b",
    });
    expect(table.maxCodeLength).toBe(2);
  });

  test("derives the textbook codes", () => {
    const table = tableFor(CLASSIC);

    expect(Object.fromEntries(table.forward)).toEqual({
      f: "0",
      c: "100",
      d: "101",
      a: "1100",
      b: "1101",
      e: "111",
    });
    expect(table.maxCodeLength).toBe(4);
  });

  test("gives a lone symbol a one-bit code", () => {
    const table = tableFor(new Map([["x", 7]]));

    expect(Object.fromEntries(table.forward)).toEqual({ x: "0" });
    expect(Object.fromEntries(table.reverse)).toEqual({ "0": "x" });
    expect(table.maxCodeLength).toBe(1);
  });

  test("returns an empty table for an empty tree", () => {
    const table = generateCodeTable(null);

    expect(table.forward.size).toBe(0);
    expect(table.reverse.size).toBe(0);
    expect(table.maxCodeLength).toBe(0);
  });

  test("builds forward and reverse maps that invert each other", () => {
    const table = tableFor(
      countFrequencies("pack my box with five dozen liquor jugs")
    );

    expect(table.forward.size).toBe(table.reverse.size);
    for (const [symbol, code] of table.forward) {
      expect(table.reverse.get(code)).toBe(symbol);
    }
  });

  test("produces prefix-free codes", () => {
    for (const text of ["aaabbc", "abracadabra", "zyx", "aaaaaaaab"]) {
      expect(isPrefixFree(tableFor(countFrequencies(text)))).toBe(true);
    }
    expect(isPrefixFree(tableFor(CLASSIC))).toBe(true);
  });
});

describe("isPrefixFree", () => {
  test("detects a code that prefixes another", () => {
    const forward = new Map([
      ["a", "0"],
      ["b", "01"],
      ["c", "11"],
    ]);
    expect(isPrefixFree({ forward })).toBe(false);
  });

  test("detects duplicate codes", () => {
    const forward = new Map([
      ["a", "10"],
      ["b", "10"],
    ]);
    expect(isPrefixFree({ forward })).toBe(false);
  });
});

describe("weightedPathLength", () => {
  test("matches the tree's weighted path length", () => {
    const frequencies = countFrequencies("she sells sea shells by the sea shore");
    const tree = buildHuffmanTree(frequencies);

    expect(weightedPathLength(generateCodeTable(tree), frequencies)).toBe(
      treeWeightedPathLength(tree)
    );
  });

  test("reaches the optimal merge cost", () => {
    expect(weightedPathLength(tableFor(CLASSIC), CLASSIC)).toBe(224);
    expect(mergeCost(CLASSIC.values())).toBe(224);

    const frequencies = countFrequencies(
      "it was the best of times, it was the worst of times"
    );
    expect(weightedPathLength(tableFor(frequencies), frequencies)).toBe(
      mergeCost(frequencies.values())
    );
  });

  test("throws for a counted symbol without a code", () => {
    const table = tableFor(countFrequencies("ab"));
    expect(() =>
      weightedPathLength(table, new Map([["a", 1], ["z", 2]]))
    ).toThrow(UnknownSymbolError);
  });
});
