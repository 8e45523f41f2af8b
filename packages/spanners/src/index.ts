/**
 * @bytepair/spanners -- pre-tokenizers that split text into encodable spans.
 *
 * Two interchangeable word lexers share one rule set:
 * - `"pattern"`   -- a Unicode RegExp
 * - `"automaton"` -- a compiled transition table, single pass over bytes
 */
import { Effect } from "effect";
import { Registry, type ConfigError, type SpanLexer, type SpannerStrategy } from "@bytepair/core";
import { PatternLexer } from "./pattern-lexer.js";
import { AutomatonLexer } from "./automaton-lexer.js";
import { TextSpanner, type TextSpannerOptions } from "./text-spanner.js";

// ── Re-exports ────────────────────────────────────────────────────────────
export { PatternLexer, WORD_PATTERN_SOURCE } from "./pattern-lexer.js";
export { AutomatonLexer } from "./automaton-lexer.js";
export { TextSpanner, type TextSpannerOptions } from "./text-spanner.js";
export { SpecialMatcher, type SpecialMatch } from "./special-matcher.js";
export { CharClass, charClass } from "./char-class.js";

// ── Lexer registry ────────────────────────────────────────────────────────

export const spannerRegistry = new Registry<SpanLexer>("spanner");

spannerRegistry.register("pattern", () => new PatternLexer());
spannerRegistry.register("automaton", () => new AutomatonLexer());

/** Build a `TextSpanner` over the named lexer. */
export function makeSpanner(
  strategy: SpannerStrategy,
  options: TextSpannerOptions = {},
): Effect.Effect<TextSpanner, ConfigError> {
  return Effect.map(spannerRegistry.get(strategy), (lexer) => new TextSpanner(lexer, options));
}
