/**
 * @bytepair/encoders -- merge strategies, decoder, encoder facade and the
 * batch driver.
 */
export {
  LinearRescanMerge,
  ParallelRankMerge,
  HeapListMerge,
  HybridMerge,
  HYBRID_SWEEP_THRESHOLD,
  PairHeap,
  RankLanePool,
  laneRange,
  linearSweep,
  mergeStrategyRegistry,
  makeMergeStrategy,
  type MergeStrategyArgs,
} from "./merge/index.js";
export { Decoder } from "./decoder.js";
export { Encoder, type EncodedSpan } from "./encoder.js";
export { runBatch, partition, type BatchSource, type Slice } from "./batch/driver.js";
export { encodeItem, cancelledAt, type ItemEncoder } from "./batch/outcome.js";
export { toWire, fromWire, type WireOutcome, type WireError } from "./batch/protocol.js";
