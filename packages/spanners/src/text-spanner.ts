/**
 * Spanner composed from a word lexer and a special-token matcher.
 *
 * The input is split around special tokens first; the text between them is
 * handed to the lexer. Bytes from the first malformed UTF-8 sequence onward
 * either fail the call (strict) or become one trailing `remainder` span.
 */
import { Effect } from "effect";
import {
  SpanningError,
  toBytes,
  validUtf8Prefix,
  type Span,
  type SpanLexer,
  type Spanner,
  type TextInput,
} from "@bytepair/core";
import { SpecialMatcher } from "./special-matcher.js";

export interface TextSpannerOptions {
  /** Special token texts matched verbatim before word spanning. */
  readonly specials?: readonly string[];
  /** Fail on malformed UTF-8 instead of emitting a remainder span. */
  readonly strict?: boolean;
}

export class TextSpanner implements Spanner {
  readonly lexer: SpanLexer;
  readonly strict: boolean;
  private readonly _specials: SpecialMatcher;

  constructor(lexer: SpanLexer, options: TextSpannerOptions = {}) {
    this.lexer = lexer;
    this.strict = options.strict ?? false;
    this._specials = new SpecialMatcher(options.specials ?? []);
  }

  /**
   * Lazily yield the spans of `text` in order. Each call starts a new scan.
   * Throws `SpanningError` in strict mode when the bytes are malformed.
   */
  *spans(text: TextInput): IterableIterator<Span> {
    const bytes = toBytes(text);
    const valid = validUtf8Prefix(bytes);
    if (valid < bytes.length && this.strict) {
      throw new SpanningError({
        message: `Malformed UTF-8 sequence at byte ${valid}`,
        offset: valid,
      });
    }

    let pos = 0;
    while (pos < valid) {
      const special = this._specials.find(bytes, pos, valid);
      const wordsEnd = special ? special.start : valid;
      yield* this.lexer.words(bytes, pos, wordsEnd);
      if (!special) break;
      yield { start: special.start, end: special.end, kind: "special" };
      pos = special.end;
    }

    if (valid < bytes.length) {
      yield { start: valid, end: bytes.length, kind: "remainder" };
    }
  }

  /** All spans of `text`, with strict-mode failures in the error channel. */
  split(text: TextInput): Effect.Effect<Span[], SpanningError> {
    return Effect.suspend(() => {
      try {
        return Effect.succeed([...this.spans(text)]);
      } catch (err) {
        if (err instanceof SpanningError) return Effect.fail(err);
        throw err;
      }
    });
  }
}
