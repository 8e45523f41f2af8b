/**
 * Rank-table builders for byte-level vocabularies.
 */
import { Effect } from "effect";
import { VocabularyConstructionError, toBytes } from "@bytepair/core";
import type { MergeEntry, RankTable, SpecialEntry, TokenEntry } from "./rank-table.js";
import { Vocabulary } from "./vocabulary.js";

export interface ByteLevelOptions {
  /** Special token text -> id. Ids must not collide with regular tokens. */
  readonly specials?: Readonly<Record<string, number>>;
}

/**
 * Build a byte-level rank table.
 *
 * Ids 0..255 are the single-byte tokens. Merge `i` creates token `256 + i`
 * with rank `i`; its operands are named by their text and resolved through
 * their UTF-8 bytes, so they must be a byte or an earlier merge result.
 *
 * ```ts
 * const table = byteLevelTable([["h", "e"], ["he", "l"]]);
 * ```
 */
export function byteLevelTable(
  merges: readonly (readonly [string, string])[],
  options: ByteLevelOptions = {},
): RankTable {
  const tokens: TokenEntry[] = [];
  const ids = new Map<string, number>();

  for (let b = 0; b < 256; b++) {
    tokens.push({ id: b, bytes: Uint8Array.of(b) });
    ids.set(String.fromCharCode(b), b);
  }

  const key = (bytes: Uint8Array) => String.fromCharCode(...bytes);
  const mergeEntries: MergeEntry[] = [];

  merges.forEach(([leftText, rightText], rank) => {
    const left = ids.get(key(toBytes(leftText)));
    const right = ids.get(key(toBytes(rightText)));
    if (left === undefined || right === undefined) {
      throw new VocabularyConstructionError({
        message: `Merge ${rank} ("${leftText}", "${rightText}") names an operand that is not a byte or an earlier merge`,
        reason: "dangling-operand",
      });
    }
    const leftBytes = toBytes(leftText);
    const rightBytes = toBytes(rightText);
    const bytes = new Uint8Array(leftBytes.length + rightBytes.length);
    bytes.set(leftBytes, 0);
    bytes.set(rightBytes, leftBytes.length);

    const merged = 256 + rank;
    tokens.push({ id: merged, bytes });
    ids.set(key(bytes), merged);
    mergeEntries.push({ left, right, merged, rank });
  });

  const specials: SpecialEntry[] = Object.entries(options.specials ?? {}).map(
    ([text, id]) => ({ id, text }),
  );

  return { tokens, merges: mergeEntries, specials };
}

/** `byteLevelTable` followed by validation. */
export function byteLevelVocabulary(
  merges: readonly (readonly [string, string])[],
  options: ByteLevelOptions = {},
): Effect.Effect<Vocabulary, VocabularyConstructionError> {
  return Effect.suspend(() => {
    try {
      return Vocabulary.fromTable(byteLevelTable(merges, options));
    } catch (err) {
      if (err instanceof VocabularyConstructionError) return Effect.fail(err);
      throw err;
    }
  });
}
