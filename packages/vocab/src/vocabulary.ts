/**
 * Immutable BPE vocabulary.
 *
 * Holds the byte-sequence <-> id tables, the pair -> (merged, rank) table and
 * the special tokens. All validation happens in `fromTable`, so a
 * `Vocabulary` value is always consistent; nothing mutates it afterwards.
 */
import { Effect } from "effect";
import {
  MAX_TOKEN_ID,
  VocabularyConstructionError,
  pairKey,
  toBytes,
  type MergeRule,
  type PairMerge,
  type VocabularyDefect,
  type VocabularyReader,
} from "@bytepair/core";
import type { RankTable, SpecialEntry, TokenEntry } from "./rank-table.js";

/** Binary-string key for a byte sequence. */
function bytesKey(bytes: Uint8Array): string {
  let key = "";
  for (let i = 0; i < bytes.length; i++) key += String.fromCharCode(bytes[i]);
  return key;
}

function isTokenId(id: number): boolean {
  return Number.isInteger(id) && id >= 0 && id <= MAX_TOKEN_ID;
}

class Rejected extends Error {
  constructor(
    readonly reason: VocabularyDefect,
    message: string,
  ) {
    super(message);
  }
}

export class Vocabulary implements VocabularyReader {
  /** Private copies of the table rows; callers never see these arrays. */
  private readonly _tokens: readonly TokenEntry[];
  private readonly _mergeList: readonly PairMerge[];
  private readonly _specialList: readonly SpecialEntry[];

  /** id -> bytes */
  private readonly _bytesById: ReadonlyMap<number, Uint8Array>;

  /** bytesKey -> id */
  private readonly _idByBytes: ReadonlyMap<string, number>;

  /** byte value -> single-byte token id, -1 when absent */
  private readonly _byteTokens: Int32Array;

  /** pairKey(left, right) -> merge rule */
  private readonly _merges: ReadonlyMap<number, MergeRule>;

  private readonly _specialByText: ReadonlyMap<string, number>;
  private readonly _specialBytes: ReadonlyMap<number, Uint8Array>;

  private constructor(table: RankTable) {
    const bytesById = new Map<number, Uint8Array>();
    const idByBytes = new Map<string, number>();
    const byteTokens = new Int32Array(256).fill(-1);
    const tokens: TokenEntry[] = [];

    for (const { id, bytes } of table.tokens) {
      if (!isTokenId(id)) {
        throw new Rejected("malformed-id", `Token id ${id} is not an integer in [0, ${MAX_TOKEN_ID}]`);
      }
      if (bytesById.has(id)) {
        throw new Rejected("duplicate-id", `Token id ${id} appears more than once`);
      }
      if (bytes.length === 0) {
        throw new Rejected("empty-bytes", `Token ${id} has an empty byte sequence`);
      }
      const key = bytesKey(bytes);
      const existing = idByBytes.get(key);
      if (existing !== undefined) {
        throw new Rejected("duplicate-bytes", `Tokens ${existing} and ${id} share the same bytes`);
      }
      const own = bytes.slice();
      bytesById.set(id, own);
      idByBytes.set(key, id);
      if (own.length === 1) byteTokens[own[0]] = id;
      tokens.push({ id, bytes: own });
    }

    // Operands and targets must name existing tokens.
    for (const m of table.merges) {
      if (!bytesById.has(m.left) || !bytesById.has(m.right)) {
        throw new Rejected(
          "dangling-operand",
          `Merge (${m.left}, ${m.right}) references a token that does not exist`,
        );
      }
      if (!bytesById.has(m.merged)) {
        throw new Rejected(
          "dangling-target",
          `Merge (${m.left}, ${m.right}) targets token ${m.merged}, which does not exist`,
        );
      }
    }

    detectCycle(table);

    const merges = new Map<number, MergeRule>();
    const seenRanks = new Set<number>();
    const mergeList: PairMerge[] = [];
    const mergeCount = table.merges.length;
    for (const m of table.merges) {
      const left = bytesById.get(m.left);
      const right = bytesById.get(m.right);
      const merged = bytesById.get(m.merged);
      if (!left || !right || !merged || !isConcat(merged, left, right)) {
        throw new Rejected(
          "inconsistent-merge",
          `Token ${m.merged} is not the concatenation of tokens ${m.left} and ${m.right}`,
        );
      }
      const key = pairKey(m.left, m.right);
      if (merges.has(key)) {
        throw new Rejected("duplicate-pair", `Pair (${m.left}, ${m.right}) has more than one merge`);
      }
      if (!Number.isInteger(m.rank) || m.rank < 0 || m.rank >= mergeCount || seenRanks.has(m.rank)) {
        throw new Rejected(
          "malformed-rank",
          `Rank ${m.rank} of pair (${m.left}, ${m.right}) is out of range or repeated; ranks must be exactly 0..${mergeCount - 1}`,
        );
      }
      seenRanks.add(m.rank);
      merges.set(key, { rank: m.rank, merged: m.merged });
      mergeList.push(Object.freeze({ left: m.left, right: m.right, merged: m.merged, rank: m.rank }));
    }
    mergeList.sort((x, y) => x.rank - y.rank);

    const specialByText = new Map<string, number>();
    const specialBytes = new Map<number, Uint8Array>();
    const specialList: SpecialEntry[] = [];
    for (const { id, text } of table.specials ?? []) {
      if (!isTokenId(id)) {
        throw new Rejected("malformed-id", `Special token id ${id} is not an integer in [0, ${MAX_TOKEN_ID}]`);
      }
      if (bytesById.has(id) || specialBytes.has(id)) {
        throw new Rejected("duplicate-id", `Special token id ${id} collides with another token`);
      }
      if (text.length === 0 || specialByText.has(text)) {
        throw new Rejected("invalid-special", `Special token text "${text}" is empty or repeated`);
      }
      specialByText.set(text, id);
      specialBytes.set(id, toBytes(text));
      specialList.push(Object.freeze({ id, text }));
    }

    this._tokens = tokens;
    this._mergeList = Object.freeze(mergeList);
    this._specialList = Object.freeze(specialList);
    this._bytesById = bytesById;
    this._idByBytes = idByBytes;
    this._byteTokens = byteTokens;
    this._merges = merges;
    this._specialByText = specialByText;
    this._specialBytes = specialBytes;
  }

  /**
   * Build a vocabulary from a rank table, rejecting malformed tables before
   * any encoder can see them.
   */
  static fromTable(table: RankTable): Effect.Effect<Vocabulary, VocabularyConstructionError> {
    return Effect.try({
      try: () => new Vocabulary(table),
      catch: (cause) =>
        cause instanceof Rejected
          ? new VocabularyConstructionError({ message: cause.message, reason: cause.reason })
          : new VocabularyConstructionError({
              message: `Malformed rank table: ${String(cause)}`,
              reason: "malformed-table",
            }),
    });
  }

  // ── Lookups ──────────────────────────────────────────────────────────────

  get size(): number {
    return this._bytesById.size;
  }

  /** A fresh copy of the validated table, e.g. for cloning into a worker. */
  get table(): RankTable {
    return {
      tokens: this._tokens.map(({ id, bytes }) => ({ id, bytes: bytes.slice() })),
      merges: this._mergeList,
      specials: this._specialList,
    };
  }

  get mergeCount(): number {
    return this._merges.size;
  }

  /** Special token texts, longest first. */
  get specials(): string[] {
    return [...this._specialByText.keys()].sort((a, b) => b.length - a.length);
  }

  rankOf(left: number, right: number): number | undefined {
    return this._merges.get(pairKey(left, right))?.rank;
  }

  mergeOf(left: number, right: number): MergeRule | undefined {
    return this._merges.get(pairKey(left, right));
  }

  merges(): readonly PairMerge[] {
    return this._mergeList;
  }

  idOf(bytes: Uint8Array): number | undefined {
    return this._idByBytes.get(bytesKey(bytes));
  }

  bytesOf(id: number): Uint8Array | undefined {
    return this._bytes(id)?.slice();
  }

  byteLength(id: number): number | undefined {
    return this._bytes(id)?.length;
  }

  copyBytes(id: number, target: Uint8Array, offset: number): number {
    const bytes = this._bytes(id);
    if (!bytes) return 0;
    target.set(bytes, offset);
    return bytes.length;
  }

  private _bytes(id: number): Uint8Array | undefined {
    return this._bytesById.get(id) ?? this._specialBytes.get(id);
  }

  byteToken(byte: number): number | undefined {
    const id = this._byteTokens[byte];
    return id === undefined || id < 0 ? undefined : id;
  }

  specialId(text: string): number | undefined {
    return this._specialByText.get(text);
  }
}

function isConcat(merged: Uint8Array, left: Uint8Array, right: Uint8Array): boolean {
  if (merged.length !== left.length + right.length) return false;
  for (let i = 0; i < left.length; i++) {
    if (merged[i] !== left[i]) return false;
  }
  for (let i = 0; i < right.length; i++) {
    if (merged[left.length + i] !== right[i]) return false;
  }
  return true;
}

/**
 * Reject tables where a token is derived, directly or transitively, from
 * itself. Edges run from each merge target to its two operands.
 */
function detectCycle(table: RankTable): void {
  const edges = new Map<number, number[]>();
  for (const m of table.merges) {
    const out = edges.get(m.merged);
    if (out) out.push(m.left, m.right);
    else edges.set(m.merged, [m.left, m.right]);
  }

  const DONE = 2;
  const ACTIVE = 1;
  const state = new Map<number, number>();

  for (const root of edges.keys()) {
    if (state.get(root) === DONE) continue;
    // Iterative DFS: stack of (node, next edge index).
    const stack: [number, number][] = [[root, 0]];
    state.set(root, ACTIVE);
    while (stack.length > 0) {
      const top = stack[stack.length - 1];
      const [node, edge] = top;
      const out = edges.get(node) ?? [];
      if (edge >= out.length) {
        state.set(node, DONE);
        stack.pop();
        continue;
      }
      top[1] = edge + 1;
      const child = out[edge];
      const s = state.get(child);
      if (s === ACTIVE) {
        throw new Rejected("cyclic-merge", `Token ${child} is derived from itself through merges`);
      }
      if (s === undefined) {
        state.set(child, ACTIVE);
        stack.push([child, 0]);
      }
    }
  }
}
