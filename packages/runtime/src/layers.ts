/**
 * Effect layers for dependency injection.
 *
 * `EncoderService` gets a Layer that constructs it from a rank table and
 * config, closing it with the layer's scope, and one that wraps an encoder
 * built elsewhere.
 */
import { Effect, Layer } from "effect";
import {
  EncoderService,
  type ConfigError,
  type EncoderConfig,
  type TokenEncoder,
  type VocabularyConstructionError,
} from "@bytepair/core";
import { Vocabulary, type RankTable } from "@bytepair/vocab";
import { Encoder } from "@bytepair/encoders";

// ── Encoder Layer ──────────────────────────────────────────────────────────

export const EncoderLive = (
  table: RankTable,
  config: Partial<EncoderConfig> = {},
): Layer.Layer<EncoderService, VocabularyConstructionError | ConfigError> =>
  Layer.scoped(
    EncoderService,
    Effect.gen(function* () {
      const vocab = yield* Vocabulary.fromTable(table);
      const encoder: TokenEncoder = yield* Effect.acquireRelease(Encoder.make(vocab, config), (e) =>
        Effect.sync(() => e.close()),
      );
      yield* Effect.logDebug(`encoder ready: ${vocab.size} tokens, ${vocab.mergeCount} merges`);
      return encoder;
    }),
  );

export const EncoderFrom = (encoder: TokenEncoder) =>
  Layer.succeed(EncoderService, encoder);
