import { Registry, type ConfigError, type MergeStrategy, type MergeStrategyName } from "@bytepair/core";
import type { Effect } from "effect";
import { LinearRescanMerge } from "./linear-rescan.js";
import { ParallelRankMerge } from "./parallel-rank.js";
import { HeapListMerge } from "./heap-list.js";
import { HybridMerge } from "./hybrid.js";

export { LinearRescanMerge, linearSweep } from "./linear-rescan.js";
export { ParallelRankMerge } from "./parallel-rank.js";
export { HeapListMerge } from "./heap-list.js";
export { HybridMerge, HYBRID_SWEEP_THRESHOLD } from "./hybrid.js";
export { PairHeap } from "./pair-heap.js";
export { RankLanePool } from "./rank-lanes.js";
export { laneRange } from "./lane-protocol.js";

export interface MergeStrategyArgs {
  readonly lanes: number;
}

export const mergeStrategyRegistry = new Registry<MergeStrategy, MergeStrategyArgs>("merge");

mergeStrategyRegistry.register("linearRescan", () => new LinearRescanMerge());
mergeStrategyRegistry.register("parallelRank", ({ lanes }) => new ParallelRankMerge(lanes));
mergeStrategyRegistry.register("heapAndList", () => new HeapListMerge());
mergeStrategyRegistry.register("hybrid", () => new HybridMerge());

export function makeMergeStrategy(
  name: MergeStrategyName,
  args: MergeStrategyArgs = { lanes: 4 },
): Effect.Effect<MergeStrategy, ConfigError> {
  return mergeStrategyRegistry.get(name, args);
}
