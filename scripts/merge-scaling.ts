/**
 * Time the linear rescan against the heap-and-list merge on long spans.
 *
 * The vocabulary doubles a run of "a": a+a, aa+aa, ... so an n-byte span
 * takes n-1 merges. The rescan should grow roughly quadratically and the
 * heap roughly as n log n; both must produce the same ids.
 *
 *   npm run scaling
 */
import { Effect } from "effect";
import { byteLevelVocabulary } from "@bytepair/vocab";
import { HeapListMerge, HybridMerge, LinearRescanMerge } from "@bytepair/encoders";

const SIZES = [256, 1024, 4096, 16384];

function doublingMerges(levels: number): [string, string][] {
  const merges: [string, string][] = [];
  let unit = "a";
  for (let i = 0; i < levels; i++) {
    merges.push([unit, unit]);
    unit += unit;
  }
  return merges;
}

function time(run: () => Int32Array): { ms: number; ids: Int32Array } {
  const t0 = performance.now();
  const ids = run();
  return { ms: performance.now() - t0, ids };
}

async function main() {
  const vocab = await Effect.runPromise(byteLevelVocabulary(doublingMerges(14)));
  const linear = new LinearRescanMerge();
  const heap = new HeapListMerge();
  const hybrid = new HybridMerge();

  console.log("     n   linear(ms)   heap(ms)  hybrid(ms)   ratio");
  let previousHeap = 0;
  for (const n of SIZES) {
    const input = new Int32Array(n).fill(0x61);
    const a = time(() => linear.merge(vocab, input));
    const b = time(() => heap.merge(vocab, input));
    const c = time(() => hybrid.merge(vocab, input));
    if (a.ids.join(",") !== b.ids.join(",") || a.ids.join(",") !== c.ids.join(",")) {
      throw new Error(`strategies disagree at n=${n}`);
    }
    const ratio = a.ms / Math.max(b.ms, 1e-3);
    console.log(
      `${String(n).padStart(6)} ${a.ms.toFixed(2).padStart(12)} ${b.ms.toFixed(2).padStart(10)} ` +
        `${c.ms.toFixed(2).padStart(11)} ${ratio.toFixed(1).padStart(7)}x`,
    );
    if (previousHeap > 0 && b.ms / previousHeap > 16) {
      console.warn(`  heap time grew ${(b.ms / previousHeap).toFixed(1)}x for a 4x larger span`);
    }
    previousHeap = b.ms;
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
