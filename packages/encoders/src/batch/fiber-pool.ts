/**
 * In-process executor: one fiber per slice on the calling thread.
 */
import { Effect } from "effect";
import { BatchError, type BatchOutcome, type TextInput } from "@bytepair/core";
import { cancelledAt, encodeItem, type ItemEncoder } from "./outcome.js";
import type { Slice } from "./driver.js";

export function runOnFibers(
  encoder: ItemEncoder,
  inputs: readonly TextInput[],
  slices: readonly Slice[],
  signal: AbortSignal | undefined,
): Effect.Effect<BatchOutcome[], BatchError> {
  return Effect.gen(function* () {
    const outcomes = new Array<BatchOutcome>(inputs.length);
    yield* Effect.forEach(
      slices,
      ([start, end]) =>
        Effect.gen(function* () {
          for (let i = start; i < end; i++) {
            if (signal?.aborted) {
              outcomes[i] = cancelledAt(i);
              continue;
            }
            outcomes[i] = yield* Effect.try({
              try: () => encodeItem(encoder, inputs[i]),
              catch: (cause) =>
                new BatchError({ message: `Batch item ${i} failed unexpectedly: ${String(cause)}`, cause }),
            });
            yield* Effect.yieldNow();
          }
        }),
      { concurrency: slices.length, discard: true },
    );
    return outcomes;
  });
}
