export * from "./huffman.domain";
export * from "./monitor.domain";
export * from "./errors";
export { countFrequencies } from "./frequency";
export { MinHeap } from "./min-heap";
export {
  buildHuffmanTree,
  countLeaves,
  treeWeightedPathLength,
} from "./huffman-tree";
export {
  SINGLE_SYMBOL_CODE,
  generateCodeTable,
  isPrefixFree,
  weightedPathLength,
} from "./code-table";
export { encodeSymbols } from "./encoder";
export { decodeSymbols } from "./decoder";
export { CodecMonitor, NoOpCodecMonitor } from "./monitor";
export { HuffmanCodec } from "./codec";
export * from "./archive";
