/**
 * A fixed set of rank-lane worker threads sharing one token array.
 *
 * `fill(pairs)` wakes every lane through the control word and blocks the
 * caller with `Atomics.wait` until all lanes have written their slices of
 * `ranks` and `merged`.
 */
import { MessageChannel, type MessagePort, type Worker } from "node:worker_threads";
import type { PairMerge } from "@bytepair/core";
import { startWorker } from "../workers.js";
import {
  CMD,
  CMD_FILL,
  CMD_RESIZE,
  CMD_STOP,
  CONTROL_SLOTS,
  GEN,
  PAIRS,
  PENDING,
  type LaneBuffers,
  type LaneInit,
} from "./lane-protocol.js";

const INITIAL_CAPACITY = 1024;
const JOIN_TIMEOUT_MS = 30_000;

function allocate(capacity: number): LaneBuffers {
  return {
    tokens: new SharedArrayBuffer(capacity * Int32Array.BYTES_PER_ELEMENT),
    ranks: new SharedArrayBuffer(capacity * Int32Array.BYTES_PER_ELEMENT),
    merged: new SharedArrayBuffer(capacity * Int32Array.BYTES_PER_ELEMENT),
  };
}

function nextPowerOfTwo(n: number): number {
  let cap = INITIAL_CAPACITY;
  while (cap < n) cap *= 2;
  return cap;
}

export class RankLanePool {
  readonly lanes: number;
  tokens: Int32Array;
  ranks: Int32Array;
  merged: Int32Array;

  private readonly _control = new Int32Array(
    new SharedArrayBuffer(CONTROL_SLOTS * Int32Array.BYTES_PER_ELEMENT),
  );
  private readonly _workers: Worker[] = [];
  private readonly _ports: MessagePort[] = [];
  private _closed = false;
  private _failure: Error | undefined;

  constructor(merges: readonly PairMerge[], lanes: number) {
    this.lanes = lanes;
    const buffers = allocate(INITIAL_CAPACITY);
    this.tokens = new Int32Array(buffers.tokens);
    this.ranks = new Int32Array(buffers.ranks);
    this.merged = new Int32Array(buffers.merged);

    for (let lane = 0; lane < lanes; lane++) {
      const { port1, port2 } = new MessageChannel();
      const init: LaneInit = {
        lane,
        lanes,
        merges,
        control: this._control.buffer,
        buffers,
        port: port2,
      };
      const worker = startWorker("merge/rank-lane-worker", init, [port2]);
      worker.on("error", (err) => {
        this._failure = err;
      });
      worker.unref();
      this._workers.push(worker);
      this._ports.push(port1);
    }
  }

  get capacity(): number {
    return this.tokens.length;
  }

  /** Grow the shared arrays so they hold at least `n` tokens. Contents are not kept. */
  reserve(n: number): void {
    if (n <= this.capacity) return;
    const buffers = allocate(nextPowerOfTwo(n));
    for (const port of this._ports) port.postMessage(buffers);
    this._command(CMD_RESIZE);
    this.tokens = new Int32Array(buffers.tokens);
    this.ranks = new Int32Array(buffers.ranks);
    this.merged = new Int32Array(buffers.merged);
  }

  /** Rank every adjacent pair of `tokens[0..pairs]` across the lanes. */
  fill(pairs: number): void {
    Atomics.store(this._control, PAIRS, pairs);
    this._command(CMD_FILL);
  }

  /** Lanes leave their loop and exit. */
  close(): void {
    if (this._closed) return;
    this._closed = true;
    Atomics.store(this._control, CMD, CMD_STOP);
    Atomics.add(this._control, GEN, 1);
    Atomics.notify(this._control, GEN);
    for (const port of this._ports) port.close();
  }

  private _command(cmd: number): void {
    if (this._closed) throw new Error("RankLanePool is closed");
    if (this._failure) throw this._failure;
    Atomics.store(this._control, CMD, cmd);
    Atomics.store(this._control, PENDING, this.lanes);
    Atomics.add(this._control, GEN, 1);
    Atomics.notify(this._control, GEN);
    this._join();
  }

  private _join(): void {
    const deadline = Date.now() + JOIN_TIMEOUT_MS;
    for (;;) {
      const pending = Atomics.load(this._control, PENDING);
      if (pending === 0) return;
      const wait = deadline - Date.now();
      if (wait <= 0 || Atomics.wait(this._control, PENDING, pending, wait) === "timed-out") {
        throw new Error(`Rank lanes did not finish within ${JOIN_TIMEOUT_MS}ms (${pending} pending)`);
      }
    }
  }
}
