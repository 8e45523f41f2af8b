/**
 * Resolve and validate EncoderConfig, merging partial overrides with defaults.
 */
import { Effect, LogLevel } from "effect";
import { ConfigError } from "./errors.js";
import {
  batchExecutors,
  defaultEncoderConfig,
  logLevels,
  mergeStrategies,
  spannerStrategies,
  type EncoderConfig,
  type LogLevelName,
} from "./types.js";

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

function oneOf<T extends string>(allowed: readonly T[], value: string): value is T {
  const names: readonly string[] = allowed;
  return names.includes(value);
}

/** Merge `overrides` over the defaults and validate the result. */
export function resolveEncoderConfig(
  overrides: Partial<EncoderConfig> = {},
): Effect.Effect<EncoderConfig, ConfigError> {
  return Effect.suspend(() => {
    const config: EncoderConfig = { ...defaultEncoderConfig, ...overrides };
    const problem = validateEncoderConfig(config);
    return problem === undefined
      ? Effect.succeed(config)
      : Effect.fail(new ConfigError({ message: problem }));
  });
}

/** Returns a description of the first invalid field, or undefined. */
export function validateEncoderConfig(config: EncoderConfig): string | undefined {
  if (!oneOf(spannerStrategies, config.spannerStrategy)) {
    return `spannerStrategy must be one of ${spannerStrategies.join(", ")}, got "${config.spannerStrategy}"`;
  }
  if (!oneOf(mergeStrategies, config.mergeStrategy)) {
    return `mergeStrategy must be one of ${mergeStrategies.join(", ")}, got "${config.mergeStrategy}"`;
  }
  if (!oneOf(batchExecutors, config.batchExecutor)) {
    return `batchExecutor must be one of ${batchExecutors.join(", ")}, got "${config.batchExecutor}"`;
  }
  if (!oneOf(logLevels, config.logLevel)) {
    return `logLevel must be one of ${logLevels.join(", ")}, got "${config.logLevel}"`;
  }
  if (!Number.isInteger(config.workerCount) || config.workerCount < 1) {
    return `workerCount must be an integer >= 1, got ${config.workerCount}`;
  }
  if (!Number.isInteger(config.rankLanes) || config.rankLanes < 1) {
    return `rankLanes must be an integer >= 1, got ${config.rankLanes}`;
  }
  return undefined;
}

/**
 * Parse `--key=value` style pairs (or environment entries) into a partial
 * config. Unknown keys are ignored; string enums are checked later by
 * `resolveEncoderConfig`.
 */
export function encoderConfigFromRecord(
  kv: Readonly<Record<string, string | undefined>>,
): Effect.Effect<Partial<EncoderConfig>, ConfigError> {
  return Effect.try({
    try: () => {
      const out: Partial<Mutable<EncoderConfig>> = {};
      const spanner = kv["spannerStrategy"];
      if (spanner !== undefined) {
        if (!oneOf(spannerStrategies, spanner)) throw new Error(`unknown spannerStrategy "${spanner}"`);
        out.spannerStrategy = spanner;
      }
      const merge = kv["mergeStrategy"];
      if (merge !== undefined) {
        if (!oneOf(mergeStrategies, merge)) throw new Error(`unknown mergeStrategy "${merge}"`);
        out.mergeStrategy = merge;
      }
      const executor = kv["batchExecutor"];
      if (executor !== undefined) {
        if (!oneOf(batchExecutors, executor)) throw new Error(`unknown batchExecutor "${executor}"`);
        out.batchExecutor = executor;
      }
      const level = kv["logLevel"];
      if (level !== undefined) {
        if (!oneOf(logLevels, level)) throw new Error(`unknown logLevel "${level}"`);
        out.logLevel = level;
      }
      const workers = kv["workerCount"];
      if (workers !== undefined) out.workerCount = parseIntStrict("workerCount", workers);
      const lanes = kv["rankLanes"];
      if (lanes !== undefined) out.rankLanes = parseIntStrict("rankLanes", lanes);
      const strict = kv["strictSpanning"];
      if (strict !== undefined) out.strictSpanning = parseBool("strictSpanning", strict);
      return out;
    },
    catch: (cause) =>
      new ConfigError({
        message: cause instanceof Error ? cause.message : String(cause),
        cause,
      }),
  });
}

function parseIntStrict(key: string, raw: string): number {
  if (!/^\d+$/.test(raw)) throw new Error(`${key} must be a non-negative integer, got "${raw}"`);
  return parseInt(raw, 10);
}

function parseBool(key: string, raw: string): boolean {
  switch (raw.toLowerCase()) {
    case "true":
    case "1":
      return true;
    case "false":
    case "0":
      return false;
    default:
      throw new Error(`${key} must be a boolean, got "${raw}"`);
  }
}

/** Effect log level for a configured level name. */
export function logLevelOf(name: LogLevelName): LogLevel.LogLevel {
  switch (name) {
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn": return LogLevel.Warning;
    case "error": return LogLevel.Error;
  }
}
