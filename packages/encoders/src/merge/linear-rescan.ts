/**
 * Reference merge strategy: rescan every adjacent pair before each merge.
 *
 * O(n) per merge, O(n^2) per span. The other strategies are checked
 * against this one.
 */
import type { MergeStrategy, VocabularyReader } from "@bytepair/core";

export class LinearRescanMerge implements MergeStrategy {
  readonly name = "linearRescan";

  merge(vocab: VocabularyReader, ids: Int32Array): Int32Array {
    if (ids.length <= 1) return ids.slice();
    const tokens = Array.from(ids);
    linearSweep(vocab, tokens);
    return Int32Array.from(tokens);
  }
}

/**
 * Merge `tokens` in place until no adjacent pair has a rank.
 * Ties go to the leftmost pair: only a strictly lower rank replaces the best.
 */
export function linearSweep(vocab: VocabularyReader, tokens: number[]): void {
  while (tokens.length >= 2) {
    let bestRank = Infinity;
    let bestPos = -1;
    let bestMerged = 0;
    for (let i = 0; i < tokens.length - 1; i++) {
      const rule = vocab.mergeOf(tokens[i], tokens[i + 1]);
      if (rule && rule.rank < bestRank) {
        bestRank = rule.rank;
        bestPos = i;
        bestMerged = rule.merged;
      }
    }
    if (bestPos < 0) break;
    tokens[bestPos] = bestMerged;
    tokens.splice(bestPos + 1, 1);
  }
}
