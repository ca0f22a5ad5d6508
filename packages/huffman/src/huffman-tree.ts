import { InvalidFrequencyTableError } from "./errors";
import type {
  FrequencyTable,
  HuffmanNode,
  HuffmanSymbol,
} from "./huffman.domain";
import { MinHeap } from "./min-heap";

interface QueuedNode<S extends HuffmanSymbol> {
  node: HuffmanNode<S>;
  // insertion sequence, breaks frequency ties
  order: number;
}

function compareQueued<S extends HuffmanSymbol>(
  a: QueuedNode<S>,
  b: QueuedNode<S>
): number {
  return a.node.frequency - b.node.frequency || a.order - b.order;
}

/**
 * Builds a Huffman tree by repeatedly merging the two lightest nodes.
 *
 * The first node popped becomes the left child and the second the right.
 * Equal frequencies are resolved by insertion order (leaves in table order,
 * then merged nodes in creation order), so the same table always yields the
 * same tree.
 *
 * Returns `null` for an empty table and the lone leaf when the table has a
 * single symbol.
 */
export function buildHuffmanTree<S extends HuffmanSymbol>(
  frequencies: FrequencyTable<S>
): HuffmanNode<S> | null {
  const heap = new MinHeap<QueuedNode<S>>(compareQueued);
  let order = 0;

  for (const [symbol, frequency] of frequencies) {
    if (!Number.isSafeInteger(frequency) || frequency <= 0) {
      throw new InvalidFrequencyTableError(symbol, frequency);
    }
    heap.push({ node: { kind: "leaf", symbol, frequency }, order: order++ });
  }

  if (heap.size === 0) return null;

  while (heap.size > 1) {
    const left = heap.pop().node;
    const right = heap.pop().node;
    heap.push({
      node: {
        kind: "internal",
        frequency: left.frequency + right.frequency,
        left,
        right,
      },
      order: order++,
    });
  }

  return heap.pop().node;
}

/**
 * Sum of `frequency * depth` over the leaves. A lone leaf root counts as
 * depth 1, the length of the code it is given.
 */
export function treeWeightedPathLength<S extends HuffmanSymbol>(
  root: HuffmanNode<S> | null
): number {
  if (root === null) return 0;
  if (root.kind === "leaf") return root.frequency;

  const walk = (node: HuffmanNode<S>, depth: number): number =>
    node.kind === "leaf"
      ? node.frequency * depth
      : walk(node.left, depth + 1) + walk(node.right, depth + 1);

  return walk(root, 0);
}

export function countLeaves<S extends HuffmanSymbol>(
  root: HuffmanNode<S> | null
): number {
  if (root === null) return 0;
  return root.kind === "leaf"
    ? 1
    : countLeaves(root.left) + countLeaves(root.right);
}
