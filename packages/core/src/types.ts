/**
 * Core types for the bytepair system.
 */
import { availableParallelism } from "node:os";

// ── Token ids ──────────────────────────────────────────────────────────────

/** Token ids must stay below 2^21 so a pair packs into one safe integer. */
export const MAX_TOKEN_ID = 0x1f_ffff;

const PAIR_SHIFT = 0x20_0000;

/** Pack an ordered pair of token ids into a single map key. */
export function pairKey(left: number, right: number): number {
  return left * PAIR_SHIFT + right;
}

// ── Spans ──────────────────────────────────────────────────────────────────

/**
 * - `word`: a run produced by the word rules
 * - `special`: the literal text of a special token
 * - `remainder`: trailing bytes after the first malformed UTF-8 sequence
 */
export type SpanKind = "word" | "special" | "remainder";

/** A half-open byte range `[start, end)` of the source text. */
export interface Span {
  readonly start: number;
  readonly end: number;
  readonly kind: SpanKind;
}

/** Text accepted by the spanners and encoders. Strings are encoded as UTF-8. */
export type TextInput = string | Uint8Array;

// ── Encoder config ─────────────────────────────────────────────────────────

export const spannerStrategies = ["pattern", "automaton"] as const;
export type SpannerStrategy = (typeof spannerStrategies)[number];

export const mergeStrategies = ["linearRescan", "parallelRank", "heapAndList", "hybrid"] as const;
export type MergeStrategyName = (typeof mergeStrategies)[number];

export const batchExecutors = ["threads", "fibers"] as const;
export type BatchExecutor = (typeof batchExecutors)[number];

export const logLevels = ["debug", "info", "warn", "error"] as const;
export type LogLevelName = (typeof logLevels)[number];

export interface EncoderConfig {
  readonly spannerStrategy: SpannerStrategy;
  readonly mergeStrategy: MergeStrategyName;
  /** Size of the batch worker pool. */
  readonly workerCount: number;
  /** Reject malformed UTF-8 instead of emitting a remainder span. */
  readonly strictSpanning: boolean;
  readonly batchExecutor: BatchExecutor;
  /** Lane count of the parallel-rank merge strategy. */
  readonly rankLanes: number;
  readonly logLevel: LogLevelName;
}

export const defaultEncoderConfig: EncoderConfig = {
  spannerStrategy: "automaton",
  mergeStrategy: "heapAndList",
  workerCount: availableParallelism(),
  strictSpanning: false,
  batchExecutor: "threads",
  rankLanes: 4,
  logLevel: "info",
};
