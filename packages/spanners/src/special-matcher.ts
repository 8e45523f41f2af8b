/**
 * Exact-match search for special token texts inside UTF-8 bytes.
 */
import { toBytes } from "@bytepair/core";

export interface SpecialMatch {
  readonly start: number;
  readonly end: number;
}

export class SpecialMatcher {
  /** first byte -> candidate byte sequences, longest first */
  private readonly _byLead = new Map<number, Uint8Array[]>();

  constructor(specials: readonly string[]) {
    for (const text of specials) {
      const bytes = toBytes(text);
      if (bytes.length === 0) continue;
      const bucket = this._byLead.get(bytes[0]);
      if (bucket) bucket.push(bytes);
      else this._byLead.set(bytes[0], [bytes]);
    }
    for (const bucket of this._byLead.values()) {
      bucket.sort((a, b) => b.length - a.length);
    }
  }

  get isEmpty(): boolean {
    return this._byLead.size === 0;
  }

  /** Leftmost occurrence in `bytes[from, to)`; the longest special wins at a position. */
  find(bytes: Uint8Array, from: number, to: number): SpecialMatch | undefined {
    if (this.isEmpty) return undefined;
    for (let i = from; i < to; i++) {
      const bucket = this._byLead.get(bytes[i]);
      if (!bucket) continue;
      for (const candidate of bucket) {
        if (i + candidate.length <= to && matchesAt(bytes, i, candidate)) {
          return { start: i, end: i + candidate.length };
        }
      }
    }
    return undefined;
  }
}

function matchesAt(bytes: Uint8Array, at: number, candidate: Uint8Array): boolean {
  for (let k = 1; k < candidate.length; k++) {
    if (bytes[at + k] !== candidate[k]) return false;
  }
  return true;
}
