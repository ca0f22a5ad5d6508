import { test, expect, describe } from "vitest";
import { MinHeap } from "../min-heap";

describe("MinHeap", () => {
  test("pops items in ascending order", () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    for (const n of [5, 3, 8, 1, 9, 2, 7]) heap.push(n);

    const out: number[] = [];
    while (heap.size > 0) out.push(heap.pop());

    expect(out).toEqual([1, 2, 3, 5, 7, 8, 9]);
  });

  test("peek returns the smallest item without removing it", () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    expect(heap.peek()).toBeUndefined();
    heap.push(4);
    heap.push(2);
    expect(heap.peek()).toBe(2);
    expect(heap.size).toBe(2);
  });

  test("resolves ties through the comparator", () => {
    const heap = new MinHeap<{ key: number; order: number }>(
      (a, b) => a.key - b.key || a.order - b.order
    );
    heap.push({ key: 1, order: 2 });
    heap.push({ key: 1, order: 0 });
    heap.push({ key: 0, order: 3 });
    heap.push({ key: 1, order: 1 });

    expect([heap.pop(), heap.pop(), heap.pop(), heap.pop()]).toEqual([
      { key: 0, order: 3 },
      { key: 1, order: 0 },
      { key: 1, order: 1 },
      { key: 1, order: 2 },
    ]);
  });

  test("throws when popping an empty heap", () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    expect(() => heap.pop()).toThrow(RangeError);
  });
});
