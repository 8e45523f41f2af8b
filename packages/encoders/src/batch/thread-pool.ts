/**
 * Worker-thread executor. Workers are started for one batch call and
 * terminated when its scope closes. Each rebuilds the vocabulary from a
 * structured-clone copy of the rank table.
 */
import type { Worker } from "node:worker_threads";
import { Effect } from "effect";
import { BatchError, type BatchOutcome, type EncoderConfig, type TextInput } from "@bytepair/core";
import type { Vocabulary } from "@bytepair/vocab";
import {
  fromWire,
  isWorkerReply,
  type EncodeRequest,
  type WorkerDone,
  type WorkerInit,
} from "./protocol.js";
import type { Slice } from "./driver.js";
import { startWorker } from "../workers.js";

export interface ThreadSource {
  readonly vocab: Vocabulary;
  readonly config: EncoderConfig;
}

function spawn(init: WorkerInit): Effect.Effect<Worker, BatchError> {
  return Effect.try({
    try: () => startWorker("batch/batch-worker", init),
    catch: (cause) => new BatchError({ message: `Failed to start batch worker: ${String(cause)}`, cause }),
  });
}

function request(worker: Worker, req: EncodeRequest): Effect.Effect<WorkerDone, BatchError> {
  return Effect.async<WorkerDone, BatchError>((resume) => {
    const cleanup = () => {
      worker.off("message", onMessage);
      worker.off("error", onError);
      worker.off("exit", onExit);
    };
    const settle = (effect: Effect.Effect<WorkerDone, BatchError>) => {
      cleanup();
      resume(effect);
    };
    const onMessage = (msg: unknown) => {
      if (!isWorkerReply(msg)) {
        settle(Effect.fail(new BatchError({ message: "Batch worker sent a malformed reply" })));
      } else if (msg.type === "fatal") {
        settle(Effect.fail(new BatchError({ message: `Batch worker failed to start: ${msg.message}` })));
      } else {
        settle(Effect.succeed(msg));
      }
    };
    const onError = (err: Error) => {
      settle(Effect.fail(new BatchError({ message: `Batch worker crashed: ${err.message}`, cause: err })));
    };
    const onExit = (code: number) => {
      settle(Effect.fail(new BatchError({ message: `Batch worker exited early with code ${code}` })));
    };
    worker.on("message", onMessage);
    worker.on("error", onError);
    worker.on("exit", onExit);
    worker.postMessage(req);
    return Effect.sync(cleanup);
  });
}

export function runOnThreads(
  source: ThreadSource,
  inputs: readonly TextInput[],
  slices: readonly Slice[],
  signal: AbortSignal | undefined,
): Effect.Effect<BatchOutcome[], BatchError> {
  return Effect.scoped(
    Effect.gen(function* () {
      const cancel = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
      const flag = new Int32Array(cancel);
      const onAbort = () => {
        Atomics.store(flag, 0, 1);
      };
      yield* Effect.acquireRelease(
        Effect.sync(() => {
          if (signal?.aborted) onAbort();
          signal?.addEventListener("abort", onAbort, { once: true });
        }),
        () => Effect.sync(() => signal?.removeEventListener("abort", onAbort)),
      );

      const init: WorkerInit = { table: source.vocab.table, config: source.config, cancel };
      const outcomes = new Array<BatchOutcome>(inputs.length);

      yield* Effect.forEach(
        slices,
        ([start, end]) =>
          Effect.gen(function* () {
            const worker = yield* Effect.acquireRelease(spawn(init), (w) =>
              Effect.promise(() => w.terminate()),
            );
            const reply = yield* request(worker, {
              type: "encode",
              start,
              items: inputs.slice(start, end),
            });
            for (const wire of reply.outcomes) outcomes[wire.index] = fromWire(wire);
          }),
        { concurrency: "unbounded", discard: true },
      );
      return outcomes;
    }),
  );
}
