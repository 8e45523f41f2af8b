import { afterAll, describe, it, expect } from "vitest";
import { Effect, Either } from "effect";
import { toBytes, type MergeStrategy } from "@bytepair/core";
import {
  HeapListMerge,
  HybridMerge,
  LinearRescanMerge,
  PairHeap,
  ParallelRankMerge,
  RankLanePool,
  laneRange,
  makeMergeStrategy,
  mergeStrategyRegistry,
} from "@bytepair/encoders";
import { abcVocabulary, helloVocabulary, makeRandom, randomText } from "./fixtures.js";

const strategies: MergeStrategy[] = [
  new LinearRescanMerge(),
  new ParallelRankMerge(4),
  new ParallelRankMerge(1),
  new ParallelRankMerge(3),
  new HeapListMerge(),
  new HybridMerge(),
  new HybridMerge(2),
];

afterAll(() => {
  for (const strategy of strategies) strategy.close?.();
});

function ids(text: string): Int32Array {
  return Int32Array.from(toBytes(text));
}

describe("PairHeap", () => {
  it("pops by rank, then by position", () => {
    const heap = new PairHeap(8);
    heap.push(3, 0, 0);
    heap.push(1, 5, 0);
    heap.push(1, 2, 7);
    heap.push(2, 1, 0);
    const popped: [number, number, number][] = [];
    while (heap.pop()) popped.push([heap.topRank, heap.topPos, heap.topGen]);
    expect(popped).toEqual([
      [1, 2, 7],
      [1, 5, 0],
      [2, 1, 0],
      [3, 0, 0],
    ]);
    expect(heap.size).toBe(0);
  });
});

describe.each(strategies.map((s) => [s.name, s] as const))("%s", (_name, strategy) => {
  const hello = helloVocabulary();
  const abc = abcVocabulary();

  it("merges h e l l o into a single token", () => {
    expect(Array.from(strategy.merge(hello, ids("hello")))).toEqual([259]);
  });

  it("stops when no adjacent pair has a rank", () => {
    expect(Array.from(strategy.merge(hello, ids("hex")))).toEqual([256, 120]);
  });

  it("returns an empty array for empty input", () => {
    expect(strategy.merge(hello, new Int32Array(0)).length).toBe(0);
  });

  it("returns a single element unchanged", () => {
    expect(Array.from(strategy.merge(hello, ids("h")))).toEqual([104]);
  });

  it("breaks ties on the leftmost pair", () => {
    // aa has rank 4; only the first two a's merge in "aaa"
    expect(Array.from(strategy.merge(abc, ids("aaa")))).toEqual([260, 97]);
    expect(Array.from(strategy.merge(abc, ids("aaaa")))).toEqual([260, 260]);
  });

  it("does not modify its input", () => {
    const input = ids("hello");
    strategy.merge(hello, input);
    expect(Array.from(input)).toEqual([104, 101, 108, 108, 111]);
  });

  it("matches the linear rescan on random spans", () => {
    const reference = new LinearRescanMerge();
    const random = makeRandom(42);
    for (let i = 0; i < 200; i++) {
      const input = ids(randomText(random, ["a", "b", "c"], 40));
      expect(Array.from(strategy.merge(abc, input))).toEqual(Array.from(reference.merge(abc, input)));
    }
  });
});

describe("rank lanes", () => {
  it("splits pairs into contiguous slices, one per lane", () => {
    expect([0, 1, 2].map((lane) => laneRange(7, 3, lane))).toEqual([
      [0, 3],
      [3, 6],
      [6, 7],
    ]);
  });

  it("leaves trailing lanes empty when there are fewer pairs than lanes", () => {
    expect([0, 1, 2, 3].map((lane) => laneRange(2, 4, lane))).toEqual([
      [0, 1],
      [1, 2],
      [2, 2],
      [2, 2],
    ]);
  });

  it("fills ranks and merged ids on worker threads", () => {
    const pool = new RankLanePool(helloVocabulary().merges(), 2);
    try {
      pool.tokens.set(ids("hello"));
      pool.fill(4);
      expect(Array.from(pool.ranks.subarray(0, 4))).toEqual([0, -1, 1, -1]);
      expect(pool.merged[0]).toBe(256);
      expect(pool.merged[2]).toBe(257);
    } finally {
      pool.close();
    }
  });

  it("grows the shared arrays past their first capacity", () => {
    const pool = new RankLanePool(abcVocabulary().merges(), 3);
    try {
      expect(pool.capacity).toBe(1024);
      pool.reserve(1500);
      expect(pool.capacity).toBe(2048);
      pool.tokens.set(ids("ab".repeat(750)));
      pool.fill(1499);
      expect(pool.ranks[0]).toBe(0);
      expect(pool.ranks[1]).toBe(-1);
      expect(pool.ranks[1498]).toBe(0);
    } finally {
      pool.close();
    }
  });

  it("merges a span longer than the first capacity like the linear rescan", () => {
    const strategy = new ParallelRankMerge(4);
    try {
      const input = ids(randomText(makeRandom(3), ["a", "b", "c"], 3000).padEnd(1200, "c"));
      const abc = abcVocabulary();
      expect(Array.from(strategy.merge(abc, input))).toEqual(Array.from(new LinearRescanMerge().merge(abc, input)));
    } finally {
      strategy.close();
    }
  });

  it("starts fresh lanes after close", () => {
    const strategy = new ParallelRankMerge(2);
    const hello = helloVocabulary();
    expect(Array.from(strategy.merge(hello, ids("hello")))).toEqual([259]);
    strategy.close();
    expect(Array.from(strategy.merge(hello, ids("hell")))).toEqual([258]);
    strategy.close();
  });
});

describe("merge strategy registry", () => {
  it("lists every strategy", () => {
    expect(mergeStrategyRegistry.list()).toEqual(["linearRescan", "parallelRank", "heapAndList", "hybrid"]);
  });

  it("passes the lane count to the parallel-rank factory", async () => {
    const strategy = await Effect.runPromise(makeMergeStrategy("parallelRank", { lanes: 3 }));
    expect(strategy).toBeInstanceOf(ParallelRankMerge);
    expect(strategy instanceof ParallelRankMerge && strategy.lanes).toBe(3);
  });

  it("fails on an unknown name", async () => {
    const result = await Effect.runPromise(Effect.either(mergeStrategyRegistry.get("quantum", { lanes: 1 })));
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left.message).toBe(
        '[merge] Unknown implementation "quantum". Available: linearRescan, parallelRank, heapAndList, hybrid',
      );
    }
  });
});
