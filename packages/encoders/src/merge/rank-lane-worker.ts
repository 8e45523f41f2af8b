/**
 * One rank lane. Blocks on the control word, fills its slice of the shared
 * rank and merged arrays on every FILL, and exits on STOP.
 */
import { receiveMessageOnPort } from "node:worker_threads";
import { pairKey, type MergeRule } from "@bytepair/core";
import { workerPayload } from "../workers.js";
import {
  CMD,
  CMD_RESIZE,
  CMD_STOP,
  GEN,
  NO_RANK,
  PAIRS,
  PENDING,
  isLaneBuffers,
  isLaneInit,
  laneRange,
  type LaneBuffers,
} from "./lane-protocol.js";

const init = workerPayload();
if (!isLaneInit(init)) throw new Error("rank-lane-worker received malformed workerData");

const rules = new Map<number, MergeRule>();
for (const m of init.merges) rules.set(pairKey(m.left, m.right), { rank: m.rank, merged: m.merged });

const control = new Int32Array(init.control);
let tokens = new Int32Array(init.buffers.tokens);
let ranks = new Int32Array(init.buffers.ranks);
let merged = new Int32Array(init.buffers.merged);

function attach(buffers: LaneBuffers): void {
  tokens = new Int32Array(buffers.tokens);
  ranks = new Int32Array(buffers.ranks);
  merged = new Int32Array(buffers.merged);
}

let seen = 0;
for (;;) {
  Atomics.wait(control, GEN, seen);
  seen = Atomics.load(control, GEN);
  const cmd = Atomics.load(control, CMD);
  if (cmd === CMD_STOP) break;

  if (cmd === CMD_RESIZE) {
    const received = receiveMessageOnPort(init.port);
    if (received && isLaneBuffers(received.message)) attach(received.message);
  } else {
    const [lo, hi] = laneRange(Atomics.load(control, PAIRS), init.lanes, init.lane);
    for (let i = lo; i < hi; i++) {
      const rule = rules.get(pairKey(tokens[i], tokens[i + 1]));
      if (rule) {
        ranks[i] = rule.rank;
        merged[i] = rule.merged;
      } else {
        ranks[i] = NO_RANK;
      }
    }
  }

  if (Atomics.sub(control, PENDING, 1) === 1) Atomics.notify(control, PENDING);
}
init.port.close();
