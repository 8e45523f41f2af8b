/**
 * Shared-memory layout between `RankLanePool` and its lane workers.
 *
 * `control` is an Int32Array of four slots. The pool writes a command and
 * bumps `GEN`; every lane wakes, does its part and decrements `PENDING`; the
 * last one notifies the pool.
 */
import type { MessagePort } from "node:worker_threads";
import type { PairMerge } from "@bytepair/core";

export const GEN = 0;
export const PENDING = 1;
export const PAIRS = 2;
export const CMD = 3;
export const CONTROL_SLOTS = 4;

export const CMD_FILL = 0;
/** New buffers wait on each lane's port. */
export const CMD_RESIZE = 1;
export const CMD_STOP = 2;

export const NO_RANK = -1;

export interface LaneBuffers {
  readonly tokens: SharedArrayBuffer;
  readonly ranks: SharedArrayBuffer;
  readonly merged: SharedArrayBuffer;
}

export interface LaneInit {
  readonly lane: number;
  readonly lanes: number;
  readonly merges: readonly PairMerge[];
  readonly control: SharedArrayBuffer;
  readonly buffers: LaneBuffers;
  readonly port: MessagePort;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function isLaneBuffers(value: unknown): value is LaneBuffers {
  return (
    isRecord(value) &&
    value["tokens"] instanceof SharedArrayBuffer &&
    value["ranks"] instanceof SharedArrayBuffer &&
    value["merged"] instanceof SharedArrayBuffer
  );
}

export function isLaneInit(value: unknown): value is LaneInit {
  return (
    isRecord(value) &&
    typeof value["lane"] === "number" &&
    typeof value["lanes"] === "number" &&
    Array.isArray(value["merges"]) &&
    value["control"] instanceof SharedArrayBuffer &&
    isLaneBuffers(value["buffers"]) &&
    isRecord(value["port"])
  );
}

/** Pairs `[lo, hi)` owned by `lane` when `pairs` pairs are split across `lanes`. */
export function laneRange(pairs: number, lanes: number, lane: number): readonly [number, number] {
  const width = Math.ceil(pairs / lanes);
  const lo = Math.min(pairs, lane * width);
  return [lo, Math.min(pairs, lo + width)];
}
