/**
 * RegExp-driven word lexer.
 *
 * Evaluates the word rules with one Unicode-aware pattern and maps the
 * UTF-16 match positions back to byte offsets.
 */
import { bytesToString, utf8Length, type Span, type SpanLexer } from "@bytepair/core";

/**
 * Contractions, then an optional leading space before a letter, digit or
 * symbol run, then whitespace not followed by non-whitespace, then any
 * remaining whitespace.
 */
export const WORD_PATTERN_SOURCE =
  "'s|'t|'re|'ve|'m|'ll|'d| ?\\p{L}+| ?\\p{N}+| ?[^\\s\\p{L}\\p{N}]+|\\s+(?!\\S)|\\s+";

export class PatternLexer implements SpanLexer {
  readonly name = "pattern";

  private readonly _source: string;

  constructor(source: string = WORD_PATTERN_SOURCE) {
    this._source = source;
  }

  *words(bytes: Uint8Array, start: number, end: number): IterableIterator<Span> {
    if (start >= end) return;
    const text = bytesToString(bytes.subarray(start, end));
    // A fresh RegExp per call keeps `lastIndex` state local to this scan.
    const re = new RegExp(this._source, "gu");

    let charPos = 0;
    let bytePos = start;
    for (const m of text.matchAll(re)) {
      const at = m.index ?? charPos;
      if (at > charPos) {
        // Text the rules did not claim still becomes a span of its own.
        const gapEnd = bytePos + utf8Length(text, charPos, at);
        yield { start: bytePos, end: gapEnd, kind: "word" };
        bytePos = gapEnd;
      }
      const matchEnd = at + m[0].length;
      const spanEnd = bytePos + utf8Length(text, at, matchEnd);
      yield { start: bytePos, end: spanEnd, kind: "word" };
      bytePos = spanEnd;
      charPos = matchEnd;
    }
    if (bytePos < end) {
      yield { start: bytePos, end, kind: "word" };
    }
  }
}
