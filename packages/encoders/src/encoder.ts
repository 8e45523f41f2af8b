/**
 * Encoder facade: spanning, per-span merging, decoding and batches behind
 * one value built from a vocabulary and a configuration.
 *
 * ```ts
 * const vocab = yield* byteLevelVocabulary([["h", "e"], ["l", "l"]]);
 * const encoder = yield* Encoder.make(vocab, { mergeStrategy: "hybrid" });
 * const ids = encoder.encode("hello");
 * ```
 */
import { Effect, type Either } from "effect";
import {
  SpanningError,
  UnmappedByteError,
  bytesToString,
  resolveEncoderConfig,
  toBytes,
  type BatchError,
  type BatchOptions,
  type BatchOutcome,
  type ConfigError,
  type EncodeError,
  type EncoderConfig,
  type MergeStrategy,
  type Span,
  type TextInput,
  type TokenEncoder,
  type UnknownTokenError,
} from "@bytepair/core";
import type { Vocabulary } from "@bytepair/vocab";
import { makeSpanner, type TextSpanner } from "@bytepair/spanners";
import { makeMergeStrategy } from "./merge/index.js";
import { Decoder } from "./decoder.js";
import { runBatch } from "./batch/driver.js";

/** Token ids of one span. */
export interface EncodedSpan {
  readonly span: Span;
  readonly ids: Int32Array;
}

export class Encoder implements TokenEncoder {
  readonly vocab: Vocabulary;
  readonly config: EncoderConfig;
  readonly spanner: TextSpanner;
  readonly merger: MergeStrategy;
  private readonly _decoder: Decoder;

  private constructor(
    vocab: Vocabulary,
    config: EncoderConfig,
    spanner: TextSpanner,
    merger: MergeStrategy,
  ) {
    this.vocab = vocab;
    this.config = config;
    this.spanner = spanner;
    this.merger = merger;
    this._decoder = new Decoder(vocab);
  }

  static make(
    vocab: Vocabulary,
    overrides: Partial<EncoderConfig> = {},
  ): Effect.Effect<Encoder, ConfigError> {
    return Effect.gen(function* () {
      const config = yield* resolveEncoderConfig(overrides);
      const spanner = yield* makeSpanner(config.spannerStrategy, {
        specials: vocab.specials,
        strict: config.strictSpanning,
      });
      const merger = yield* makeMergeStrategy(config.mergeStrategy, { lanes: config.rankLanes });
      return new Encoder(vocab, config, spanner, merger);
    });
  }

  // ── Encoding ─────────────────────────────────────────────────────────────

  /** Token ids of each span, in span order. */
  encodeSpans(text: TextInput): EncodedSpan[] {
    const bytes = toBytes(text);
    const out: EncodedSpan[] = [];
    for (const span of this.spanner.spans(bytes)) {
      out.push({ span, ids: this._encodeSpan(bytes, span) });
    }
    return out;
  }

  /** Throws `SpanningError` or `UnmappedByteError`. */
  encode(text: TextInput): Int32Array {
    const parts = this.encodeSpans(text);
    let total = 0;
    for (const p of parts) total += p.ids.length;
    const out = new Int32Array(total);
    let offset = 0;
    for (const p of parts) {
      out.set(p.ids, offset);
      offset += p.ids.length;
    }
    return out;
  }

  tryEncode(text: TextInput): Effect.Effect<Int32Array, EncodeError> {
    return Effect.suspend(() => {
      try {
        return Effect.succeed(this.encode(text));
      } catch (err) {
        if (err instanceof SpanningError || err instanceof UnmappedByteError) {
          return Effect.fail(err);
        }
        throw err;
      }
    });
  }

  tryEncodeBatch(
    inputs: readonly TextInput[],
    options: BatchOptions = {},
  ): Effect.Effect<BatchOutcome[], BatchError> {
    return runBatch(this, inputs, options);
  }

  private _encodeSpan(bytes: Uint8Array, span: Span): Int32Array {
    if (span.kind === "special") {
      const id = this.vocab.specialId(bytesToString(bytes.subarray(span.start, span.end)));
      if (id !== undefined) return Int32Array.of(id);
    }
    const ids = new Int32Array(span.end - span.start);
    for (let i = span.start; i < span.end; i++) {
      const id = this.vocab.byteToken(bytes[i]);
      if (id === undefined) {
        throw new UnmappedByteError({
          message: `Byte 0x${bytes[i].toString(16).padStart(2, "0")} at offset ${i} has no token`,
          byte: bytes[i],
          offset: i,
        });
      }
      ids[i - span.start] = id;
    }
    return this.merger.merge(this.vocab, ids);
  }

  /** Stop any threads held by the merge strategy. */
  close(): void {
    this.merger.close?.();
  }

  // ── Decoding ─────────────────────────────────────────────────────────────

  /** Throws `UnknownTokenError`. */
  decode(ids: ArrayLike<number>): Uint8Array {
    return this._decoder.decode(ids);
  }

  decodeToString(ids: ArrayLike<number>): string {
    return this._decoder.decodeToString(ids);
  }

  tryDecode(ids: ArrayLike<number>): Effect.Effect<Uint8Array, UnknownTokenError> {
    return this._decoder.tryDecode(ids);
  }

  tryDecodeBatch(
    batch: readonly ArrayLike<number>[],
  ): Effect.Effect<Array<Either.Either<Uint8Array, UnknownTokenError>>> {
    return this._decoder.tryDecodeBatch(batch);
  }
}
