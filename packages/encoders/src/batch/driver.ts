/**
 * Batch encoding over a pool of workers.
 *
 * Inputs are cut into `min(workerCount, n)` contiguous slices, one per
 * worker. Outcomes are written into a pre-sized array by input index, so
 * output order matches input order whatever order workers finish in.
 */
import { Effect, Either, Logger } from "effect";
import {
  BatchError,
  logLevelOf,
  type BatchOptions,
  type BatchOutcome,
  type EncoderConfig,
  type TextInput,
} from "@bytepair/core";
import type { Vocabulary } from "@bytepair/vocab";
import { runOnFibers } from "./fiber-pool.js";
import { runOnThreads } from "./thread-pool.js";

/** Half-open range of batch indices. */
export type Slice = readonly [start: number, end: number];

export interface BatchSource {
  readonly vocab: Vocabulary;
  readonly config: EncoderConfig;
  encode(text: TextInput): Int32Array;
}

/** Split `n` items into at most `workers` contiguous, near-equal slices. */
export function partition(n: number, workers: number): Slice[] {
  const count = Math.min(workers, n);
  const slices: Slice[] = [];
  const base = Math.floor(n / count);
  const extra = n % count;
  let start = 0;
  for (let w = 0; w < count; w++) {
    const end = start + base + (w < extra ? 1 : 0);
    slices.push([start, end]);
    start = end;
  }
  return slices;
}

export function runBatch(
  source: BatchSource,
  inputs: readonly TextInput[],
  options: BatchOptions = {},
): Effect.Effect<BatchOutcome[], BatchError> {
  const { config } = source;
  const program = Effect.gen(function* () {
    if (source.vocab.size === 0) {
      return yield* Effect.fail(new BatchError({ message: "Cannot encode a batch with an empty vocabulary" }));
    }
    if (inputs.length === 0) return [];

    const slices = partition(inputs.length, config.workerCount);
    yield* Effect.logDebug("batch start").pipe(
      Effect.annotateLogs({
        inputs: inputs.length,
        workers: slices.length,
        executor: config.batchExecutor,
      }),
    );

    const outcomes =
      config.batchExecutor === "threads"
        ? yield* runOnThreads(source, inputs, slices, options.signal)
        : yield* runOnFibers(source, inputs, slices, options.signal);

    let cancelled = 0;
    for (let i = 0; i < outcomes.length; i++) {
      const outcome = outcomes[i];
      if (Either.isRight(outcome)) continue;
      if (outcome.left._tag === "CancelledError") {
        cancelled++;
        continue;
      }
      yield* Effect.logDebug("batch item failed").pipe(
        Effect.annotateLogs({ index: i, error: outcome.left._tag }),
      );
    }
    if (cancelled > 0) {
      yield* Effect.logWarning(`batch cancelled; ${cancelled} of ${outcomes.length} items not encoded`);
    }
    return outcomes;
  });
  return program.pipe(
    Effect.withLogSpan("encodeBatch"),
    Effect.withSpan("encodeBatch", { attributes: { inputs: inputs.length, executor: config.batchExecutor } }),
    Logger.withMinimumLogLevel(logLevelOf(config.logLevel)),
  );
}
