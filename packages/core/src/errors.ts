/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

/** Why a rank table was rejected. */
export type VocabularyDefect =
  | "malformed-id"
  | "duplicate-id"
  | "duplicate-bytes"
  | "empty-bytes"
  | "dangling-operand"
  | "dangling-target"
  | "cyclic-merge"
  | "inconsistent-merge"
  | "duplicate-pair"
  | "malformed-rank"
  | "invalid-special"
  | "malformed-table";

export class VocabularyConstructionError extends Data.TaggedError("VocabularyConstructionError")<{
  readonly message: string;
  readonly reason: VocabularyDefect;
}> {}

export class SpanningError extends Data.TaggedError("SpanningError")<{
  readonly message: string;
  /** Byte offset of the first malformed sequence. */
  readonly offset: number;
}> {}

export class UnmappedByteError extends Data.TaggedError("UnmappedByteError")<{
  readonly message: string;
  readonly byte: number;
  readonly offset: number;
}> {}

export class UnknownTokenError extends Data.TaggedError("UnknownTokenError")<{
  readonly message: string;
  readonly id: number;
  readonly position: number;
}> {}

export class CancelledError extends Data.TaggedError("CancelledError")<{
  readonly message: string;
}> {}

export class BatchError extends Data.TaggedError("BatchError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Per-input failures of an encode call. */
export type EncodeError = SpanningError | UnmappedByteError | CancelledError;
