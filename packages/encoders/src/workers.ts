/**
 * Worker-thread startup shared by the batch pool and the rank lanes.
 *
 * From sources, a worker starts in `worker-bootstrap.mjs`, which registers
 * tsx inside the new thread before importing the `.ts` entry; `execArgv`
 * loaders do not carry over to worker threads. Built output starts the
 * `.js` entry directly.
 */
import { Worker, workerData, type TransferListItem } from "node:worker_threads";

interface WorkerEnvelope {
  readonly entry: string;
  readonly data: unknown;
}

function isEnvelope(value: unknown): value is WorkerEnvelope {
  return typeof value === "object" && value !== null && "entry" in value && "data" in value;
}

/** `entry` is a path relative to this package's `src`, without extension. */
export function startWorker(entry: string, data: unknown, transferList: TransferListItem[] = []): Worker {
  const fromSource = import.meta.url.endsWith(".ts");
  const target = new URL(`./${entry}${fromSource ? ".ts" : ".js"}`, import.meta.url);
  const envelope: WorkerEnvelope = { entry: target.href, data };
  const script = fromSource ? new URL("./worker-bootstrap.mjs", import.meta.url) : target;
  return new Worker(script, { workerData: envelope, transferList });
}

/** The `data` passed to `startWorker`, read inside the worker. */
export function workerPayload(): unknown {
  const envelope: unknown = workerData;
  return isEnvelope(envelope) ? envelope.data : undefined;
}
