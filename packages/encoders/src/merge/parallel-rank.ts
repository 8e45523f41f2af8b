/**
 * Rescan strategy with the rank lookups split across worker-thread lanes.
 *
 * Each rescan partitions the adjacent pairs into `lanes` contiguous slices.
 * Every lane writes ranks only into its own slots of the shared rank array,
 * then the calling thread reduces left to right, so ties stay on the
 * leftmost pair whatever order the lanes finish in.
 *
 * With one lane the lookups run on the calling thread. Lane threads are
 * started on first use and rebuilt when the vocabulary changes.
 */
import type { MergeStrategy, VocabularyReader } from "@bytepair/core";
import { NO_RANK } from "./lane-protocol.js";
import { RankLanePool } from "./rank-lanes.js";

export class ParallelRankMerge implements MergeStrategy {
  readonly name = "parallelRank";
  readonly lanes: number;
  private _pool: RankLanePool | undefined;
  private _poolVocab: VocabularyReader | undefined;

  constructor(lanes = 4) {
    this.lanes = Math.max(1, Math.floor(lanes));
  }

  merge(vocab: VocabularyReader, ids: Int32Array): Int32Array {
    if (ids.length <= 1) return ids.slice();
    if (this.lanes === 1) return mergeInline(vocab, ids);

    const pool = this._poolFor(vocab);
    pool.reserve(ids.length);
    pool.tokens.set(ids);
    let len = ids.length;

    while (len >= 2) {
      const pairs = len - 1;
      pool.fill(pairs);
      const best = leftmostMin(pool.ranks, pairs);
      if (best < 0) break;
      const tokens = pool.tokens;
      tokens[best] = pool.merged[best];
      tokens.copyWithin(best + 1, best + 2, len);
      len--;
    }

    return pool.tokens.slice(0, len);
  }

  close(): void {
    this._pool?.close();
    this._pool = undefined;
    this._poolVocab = undefined;
  }

  private _poolFor(vocab: VocabularyReader): RankLanePool {
    if (this._pool && this._poolVocab === vocab) return this._pool;
    this._pool?.close();
    this._pool = new RankLanePool(vocab.merges(), this.lanes);
    this._poolVocab = vocab;
    return this._pool;
  }
}

function leftmostMin(ranks: Int32Array, pairs: number): number {
  let bestPos = -1;
  let bestRank = 0;
  for (let i = 0; i < pairs; i++) {
    const r = ranks[i];
    if (r !== NO_RANK && (bestPos < 0 || r < bestRank)) {
      bestRank = r;
      bestPos = i;
    }
  }
  return bestPos;
}

function mergeInline(vocab: VocabularyReader, ids: Int32Array): Int32Array {
  let len = ids.length;
  const tokens = ids.slice();
  const ranks = new Int32Array(len - 1);
  const merged = new Int32Array(len - 1);

  while (len >= 2) {
    const pairs = len - 1;
    for (let i = 0; i < pairs; i++) {
      const rule = vocab.mergeOf(tokens[i], tokens[i + 1]);
      if (rule) {
        ranks[i] = rule.rank;
        merged[i] = rule.merged;
      } else {
        ranks[i] = NO_RANK;
      }
    }
    const best = leftmostMin(ranks, pairs);
    if (best < 0) break;
    tokens[best] = merged[best];
    tokens.copyWithin(best + 1, best + 2, len);
    len--;
  }

  return tokens.slice(0, len);
}
