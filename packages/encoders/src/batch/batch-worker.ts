/**
 * Worker-thread entry for the `threads` batch executor.
 */
import { parentPort } from "node:worker_threads";
import { Effect, Either } from "effect";
import { Vocabulary } from "@bytepair/vocab";
import { Encoder } from "../encoder.js";
import { workerPayload } from "../workers.js";
import { cancelledAt, encodeItem } from "./outcome.js";
import { isEncodeRequest, isWorkerInit, toWire, type WorkerReply } from "./protocol.js";

const port = parentPort;
if (!port) throw new Error("batch-worker must run inside a worker thread");

const init = workerPayload();
if (!isWorkerInit(init)) throw new Error("batch-worker received malformed workerData");

const flag = new Int32Array(init.cancel);

const built = Effect.runSync(
  Effect.either(
    Vocabulary.fromTable(init.table).pipe(
      Effect.flatMap((vocab) => Encoder.make(vocab, { ...init.config, batchExecutor: "fibers" })),
    ),
  ),
);

port.on("message", (msg: unknown) => {
  if (!isEncodeRequest(msg)) return;
  if (Either.isLeft(built)) {
    port.postMessage({ type: "fatal", message: built.left.message } satisfies WorkerReply);
    return;
  }
  const encoder = built.right;
  const outcomes = msg.items.map((text, k) => {
    const index = msg.start + k;
    const outcome = Atomics.load(flag, 0) !== 0 ? cancelledAt(index) : encodeItem(encoder, text);
    return toWire(index, outcome);
  });
  port.postMessage({ type: "done", outcomes } satisfies WorkerReply);
});
