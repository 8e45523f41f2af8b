/**
 * Per-item outcomes shared by both executors.
 */
import { Either } from "effect";
import {
  CancelledError,
  SpanningError,
  UnmappedByteError,
  type BatchOutcome,
  type TextInput,
} from "@bytepair/core";

export interface ItemEncoder {
  encode(text: TextInput): Int32Array;
}

/**
 * Encode one input. Encode failures become a `Left`; anything else is a
 * defect and propagates.
 */
export function encodeItem(encoder: ItemEncoder, text: TextInput): BatchOutcome {
  try {
    return Either.right(encoder.encode(text));
  } catch (err) {
    if (err instanceof SpanningError || err instanceof UnmappedByteError) return Either.left(err);
    throw err;
  }
}

export function cancelledAt(index: number): BatchOutcome {
  return Either.left(new CancelledError({ message: `Batch cancelled before item ${index}` }));
}
