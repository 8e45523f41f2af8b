/**
 * Structured logging and tracing integration.
 *
 * Provides a console logger with annotations and level handling for the
 * encode paths.
 */
import { Effect, HashMap, Logger, LogLevel } from "effect";
import { logLevelOf, logLevels, type LogLevelName } from "@bytepair/core";

// ── Pretty logger ──────────────────────────────────────────────────────────

/** Render a log line as `[HH:MM:SS.mmm] LEVEL message key=value ...`. */
export function formatLogLine(
  date: Date,
  level: LogLevel.LogLevel,
  message: unknown,
  annotations: ReadonlyArray<readonly [string, unknown]>,
): string {
  const ts = date.toISOString().slice(11, 23);
  const lvl = level.label.toUpperCase().padEnd(5);
  const text = Array.isArray(message) ? message.map(render).join(" ") : render(message);
  const extra = annotations.map(([k, v]) => ` ${k}=${render(v)}`).join("");
  return `[${ts}] ${lvl} ${text}${extra}`;
}

function render(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

export const prettyLogger = Logger.make(({ logLevel, message, date, annotations }) => {
  console.log(formatLogLine(date, logLevel, message, [...HashMap.toEntries(annotations)]));
});

// ── Log level from string ──────────────────────────────────────────────────

/** Lenient level parsing for CLI flags and environment values; unknown names mean info. */
export function parseLogLevel(level: string): LogLevel.LogLevel {
  const name = level.trim().toLowerCase();
  if (name === "warning") return LogLevel.Warning;
  const known = logLevels.find((l) => l === name);
  return known ? logLevelOf(known) : LogLevel.Info;
}

/** Run `effect` with the pretty logger installed at the given minimum level. */
export function withLogging<A, E, R>(
  effect: Effect.Effect<A, E, R>,
  level: LogLevelName | LogLevel.LogLevel = "info",
): Effect.Effect<A, E, R> {
  const min = typeof level === "string" ? logLevelOf(level) : level;
  return effect.pipe(
    Logger.withMinimumLogLevel(min),
    Effect.provide(Logger.replace(Logger.defaultLogger, prettyLogger)),
  );
}
