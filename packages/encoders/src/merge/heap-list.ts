/**
 * Heap-and-list merge strategy.
 *
 * Uses a min-heap keyed by merge rank over a doubly-linked list of token
 * nodes. Nodes live in an arena addressed by index (`prev`/`next` typed
 * arrays), so a merge relinks in O(1). Every node carries a generation
 * counter; a merge bumps the generation of both consumed nodes, and heap
 * entries whose generation no longer matches are dropped when popped.
 *
 * Complexity: O(n log n) per span. Initial pairs (<= n-1) plus at most two
 * pushes per merge (< n merges) bound the heap at 3n entries.
 */
import type { MergeStrategy, VocabularyReader } from "@bytepair/core";
import { PairHeap } from "./pair-heap.js";

const NONE = -1;

export class HeapListMerge implements MergeStrategy {
  readonly name = "heapAndList";

  merge(vocab: VocabularyReader, ids: Int32Array): Int32Array {
    const n = ids.length;
    if (n <= 1) return ids.slice();

    // ── Node arena ──
    const token = ids.slice();
    const prev = new Int32Array(n);
    const next = new Int32Array(n);
    const generation = new Uint32Array(n);
    for (let i = 0; i < n; i++) {
      prev[i] = i - 1;
      next[i] = i + 1;
    }
    next[n - 1] = NONE;

    // ── Seed the heap with every mergeable adjacent pair ──
    const heap = new PairHeap(3 * n);
    for (let i = 0; i < n - 1; i++) {
      const rank = vocab.rankOf(token[i], token[i + 1]);
      if (rank !== undefined) heap.push(rank, i, 0);
    }

    // ── Process merges in rank order ──
    while (heap.pop()) {
      const pos = heap.topPos;
      // Stale: the left node was merged into or away since this push.
      if (heap.topGen !== generation[pos]) continue;
      const right = next[pos];
      if (right === NONE) continue;
      const rule = vocab.mergeOf(token[pos], token[right]);
      if (!rule || rule.rank !== heap.topRank) continue;

      // The left slot becomes the merged node; the right node leaves the list.
      token[pos] = rule.merged;
      generation[pos]++;
      generation[right]++;
      const after = next[right];
      next[pos] = after;
      if (after !== NONE) prev[after] = pos;
      next[right] = NONE;
      prev[right] = NONE;

      // New pair with the left neighbour; its old entry is now stale.
      const before = prev[pos];
      if (before !== NONE) {
        generation[before]++;
        const rank = vocab.rankOf(token[before], token[pos]);
        if (rank !== undefined) heap.push(rank, before, generation[before]);
      }

      // New pair with the right neighbour.
      if (after !== NONE) {
        const rank = vocab.rankOf(token[pos], token[after]);
        if (rank !== undefined) heap.push(rank, pos, generation[pos]);
      }
    }

    // ── Collect surviving tokens; node 0 is never removed ──
    const out: number[] = [];
    for (let cur = 0; cur !== NONE; cur = next[cur]) {
      out.push(token[cur]);
    }
    return Int32Array.from(out);
  }
}
