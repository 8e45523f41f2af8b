/**
 * Subsystem interfaces (ports). Every subsystem implements one of these.
 */
import { Context, Effect, Either } from "effect";
import type { BatchError, EncodeError, UnknownTokenError } from "./errors.js";
import type { MergeStrategyName, Span, SpannerStrategy, TextInput } from "./types.js";

// ── Vocabulary ─────────────────────────────────────────────────────────────

/** Result of looking up a mergeable pair. */
export interface MergeRule {
  readonly rank: number;
  readonly merged: number;
}

/** One pair merge as listed in a rank table. */
export interface PairMerge {
  readonly left: number;
  readonly right: number;
  readonly merged: number;
  readonly rank: number;
}

/** Read-only view of a vocabulary; safe to share between callers. */
export interface VocabularyReader {
  /** Number of regular (non-special) tokens. */
  readonly size: number;
  rankOf(left: number, right: number): number | undefined;
  mergeOf(left: number, right: number): MergeRule | undefined;
  /** Every merge, in rank order. */
  merges(): readonly PairMerge[];
  idOf(bytes: Uint8Array): number | undefined;
  /** A copy of the token's bytes, special tokens included. */
  bytesOf(id: number): Uint8Array | undefined;
  byteLength(id: number): number | undefined;
  /** Write the token's bytes at `target[offset]`; returns the count written, 0 for an unknown id. */
  copyBytes(id: number, target: Uint8Array, offset: number): number;
  byteToken(byte: number): number | undefined;
  specialId(text: string): number | undefined;
}

// ── Spanning ───────────────────────────────────────────────────────────────

/** Splits well-formed UTF-8 into word spans. */
export interface SpanLexer {
  readonly name: SpannerStrategy;
  /**
   * Word spans covering `bytes[start, end)` exactly, in order, with
   * absolute offsets. The range must be well-formed UTF-8.
   */
  words(bytes: Uint8Array, start: number, end: number): IterableIterator<Span>;
}

/** Splits raw text into ordered, exhaustive, independently encodable spans. */
export interface Spanner {
  spans(text: TextInput): IterableIterator<Span>;
}

// ── Merging ────────────────────────────────────────────────────────────────

/** Reduces one span's token ids by applying pair merges lowest rank first. */
export interface MergeStrategy {
  readonly name: MergeStrategyName;
  merge(vocab: VocabularyReader, ids: Int32Array): Int32Array;
  /** Release threads or other resources the strategy holds. */
  close?(): void;
}

// ── Encoder ────────────────────────────────────────────────────────────────

export type BatchOutcome = Either.Either<Int32Array, EncodeError>;

export interface BatchOptions {
  /** Checked between items; unprocessed items become CancelledError outcomes. */
  readonly signal?: AbortSignal;
}

export interface TokenEncoder {
  encode(text: TextInput): Int32Array;
  decode(ids: ArrayLike<number>): Uint8Array;
  tryEncode(text: TextInput): Effect.Effect<Int32Array, EncodeError>;
  tryDecode(ids: ArrayLike<number>): Effect.Effect<Uint8Array, UnknownTokenError>;
  tryEncodeBatch(
    inputs: readonly TextInput[],
    options?: BatchOptions,
  ): Effect.Effect<BatchOutcome[], BatchError>;
}

export class EncoderService extends Context.Tag("EncoderService")<
  EncoderService,
  TokenEncoder
>() {}
