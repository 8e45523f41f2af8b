/**
 * In-memory rank table: the already-parsed form of a vocabulary file.
 *
 * Plain data only, so it can be structured-cloned into worker threads.
 */

export interface TokenEntry {
  readonly id: number;
  readonly bytes: Uint8Array;
}

/** `(left, right) -> merged`, applied in ascending `rank` order. */
export interface MergeEntry {
  readonly left: number;
  readonly right: number;
  readonly merged: number;
  readonly rank: number;
}

/** Out-of-band token matched verbatim before word spanning. */
export interface SpecialEntry {
  readonly id: number;
  readonly text: string;
}

export interface RankTable {
  readonly tokens: readonly TokenEntry[];
  readonly merges: readonly MergeEntry[];
  readonly specials?: readonly SpecialEntry[];
}
