/**
 * Messages between the batch driver and its worker threads. Everything here
 * survives structured clone; tagged errors travel as plain records.
 */
import { Either } from "effect";
import {
  CancelledError,
  SpanningError,
  UnmappedByteError,
  type BatchOutcome,
  type EncoderConfig,
  type TextInput,
} from "@bytepair/core";
import type { RankTable } from "@bytepair/vocab";

/** `workerData` of every batch worker. */
export interface WorkerInit {
  readonly table: RankTable;
  readonly config: EncoderConfig;
  /** One Int32 slot; non-zero once the batch is cancelled. */
  readonly cancel: SharedArrayBuffer;
}

export interface EncodeRequest {
  readonly type: "encode";
  /** Batch index of `items[0]`. */
  readonly start: number;
  readonly items: readonly TextInput[];
}

export type WireError =
  | { readonly tag: "SpanningError"; readonly message: string; readonly offset: number }
  | { readonly tag: "UnmappedByteError"; readonly message: string; readonly byte: number; readonly offset: number }
  | { readonly tag: "CancelledError"; readonly message: string };

export type WireOutcome =
  | { readonly index: number; readonly ok: true; readonly ids: Int32Array }
  | { readonly index: number; readonly ok: false; readonly error: WireError };

export interface WorkerDone {
  readonly type: "done";
  readonly outcomes: readonly WireOutcome[];
}

/** The worker could not build its encoder. */
export interface WorkerFatal {
  readonly type: "fatal";
  readonly message: string;
}

export type WorkerReply = WorkerDone | WorkerFatal;

// ── Conversions ────────────────────────────────────────────────────────────

export function toWire(index: number, outcome: BatchOutcome): WireOutcome {
  if (Either.isRight(outcome)) return { index, ok: true, ids: outcome.right };
  const err = outcome.left;
  switch (err._tag) {
    case "SpanningError":
      return { index, ok: false, error: { tag: err._tag, message: err.message, offset: err.offset } };
    case "UnmappedByteError":
      return {
        index,
        ok: false,
        error: { tag: err._tag, message: err.message, byte: err.byte, offset: err.offset },
      };
    case "CancelledError":
      return { index, ok: false, error: { tag: err._tag, message: err.message } };
  }
}

export function fromWire(wire: WireOutcome): BatchOutcome {
  if (wire.ok) return Either.right(wire.ids);
  const e = wire.error;
  switch (e.tag) {
    case "SpanningError":
      return Either.left(new SpanningError({ message: e.message, offset: e.offset }));
    case "UnmappedByteError":
      return Either.left(new UnmappedByteError({ message: e.message, byte: e.byte, offset: e.offset }));
    case "CancelledError":
      return Either.left(new CancelledError({ message: e.message }));
  }
}

// ── Guards ─────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isTextInput(value: unknown): value is TextInput {
  return typeof value === "string" || value instanceof Uint8Array;
}

function isWireError(value: unknown): value is WireError {
  if (!isRecord(value) || typeof value["message"] !== "string") return false;
  switch (value["tag"]) {
    case "SpanningError":
      return typeof value["offset"] === "number";
    case "UnmappedByteError":
      return typeof value["byte"] === "number" && typeof value["offset"] === "number";
    case "CancelledError":
      return true;
    default:
      return false;
  }
}

function isWireOutcome(value: unknown): value is WireOutcome {
  if (!isRecord(value) || typeof value["index"] !== "number") return false;
  return value["ok"] === true
    ? value["ids"] instanceof Int32Array
    : value["ok"] === false && isWireError(value["error"]);
}

export function isWorkerReply(value: unknown): value is WorkerReply {
  if (!isRecord(value)) return false;
  if (value["type"] === "fatal") return typeof value["message"] === "string";
  const outcomes = value["outcomes"];
  return value["type"] === "done" && Array.isArray(outcomes) && outcomes.every(isWireOutcome);
}

export function isEncodeRequest(value: unknown): value is EncodeRequest {
  if (!isRecord(value) || value["type"] !== "encode") return false;
  const items = value["items"];
  return typeof value["start"] === "number" && Array.isArray(items) && items.every(isTextInput);
}

export function isWorkerInit(value: unknown): value is WorkerInit {
  if (!isRecord(value)) return false;
  const table = value["table"];
  const config = value["config"];
  return (
    isRecord(table) &&
    Array.isArray(table["tokens"]) &&
    Array.isArray(table["merges"]) &&
    isRecord(config) &&
    typeof config["spannerStrategy"] === "string" &&
    typeof config["mergeStrategy"] === "string" &&
    value["cancel"] instanceof SharedArrayBuffer
  );
}
