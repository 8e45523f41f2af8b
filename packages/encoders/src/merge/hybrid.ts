/**
 * Picks a strategy by span length: short spans use the in-place sweep,
 * long spans use the heap. Most words are a handful of bytes, where the
 * sweep's lower constant factor wins.
 */
import type { MergeStrategy, VocabularyReader } from "@bytepair/core";
import { HeapListMerge } from "./heap-list.js";
import { linearSweep } from "./linear-rescan.js";

export const HYBRID_SWEEP_THRESHOLD = 16;

export class HybridMerge implements MergeStrategy {
  readonly name = "hybrid";
  readonly threshold: number;
  private readonly _heap = new HeapListMerge();

  constructor(threshold = HYBRID_SWEEP_THRESHOLD) {
    this.threshold = threshold;
  }

  merge(vocab: VocabularyReader, ids: Int32Array): Int32Array {
    if (ids.length > this.threshold) return this._heap.merge(vocab, ids);
    if (ids.length <= 1) return ids.slice();
    const tokens = Array.from(ids);
    linearSweep(vocab, tokens);
    return Int32Array.from(tokens);
  }
}
