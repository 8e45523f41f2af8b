/**
 * Table-driven word lexer.
 *
 * The word rules are compiled once into a transition table over character
 * classes and scanned in a single pass over the UTF-8 bytes, no RegExp
 * involved. Span boundaries match `PatternLexer` exactly.
 */
import { codePointAt, sequenceWidth, type Span, type SpanLexer } from "@bytepair/core";
import { CHAR_CLASS_COUNT, CharClass, charClass } from "./char-class.js";

// ── States ─────────────────────────────────────────────────────────────────

const START = 0;
/** Consumed a single U+0020 that may lead a run. */
const LEAD = 1;
const LETTERS = 2;
const DIGITS = 3;
const OTHERS = 4;
const SPACES = 5;
const STATE_COUNT = 6;
const STOP = 0xff;

function compileTransitions(): Uint8Array {
  const table = new Uint8Array(STATE_COUNT * CHAR_CLASS_COUNT).fill(STOP);
  const on = (from: number, cls: CharClass, to: number) => {
    table[from * CHAR_CLASS_COUNT + cls] = to;
  };

  on(START, CharClass.Space, LEAD);
  on(START, CharClass.Whitespace, SPACES);
  on(START, CharClass.Letter, LETTERS);
  on(START, CharClass.Number, DIGITS);
  on(START, CharClass.Other, OTHERS);

  on(LEAD, CharClass.Space, SPACES);
  on(LEAD, CharClass.Whitespace, SPACES);
  on(LEAD, CharClass.Letter, LETTERS);
  on(LEAD, CharClass.Number, DIGITS);
  on(LEAD, CharClass.Other, OTHERS);

  on(LETTERS, CharClass.Letter, LETTERS);
  on(DIGITS, CharClass.Number, DIGITS);
  on(OTHERS, CharClass.Other, OTHERS);

  on(SPACES, CharClass.Space, SPACES);
  on(SPACES, CharClass.Whitespace, SPACES);
  return table;
}

const TRANSITIONS = compileTransitions();

const APOSTROPHE = 0x27;

/** Length of the contraction suffix (`s t m d` or `re ve ll`) after an apostrophe. */
function contractionLength(bytes: Uint8Array, at: number, end: number): number {
  if (at >= end) return 0;
  const a = bytes[at];
  // s t m d
  if (a === 0x73 || a === 0x74 || a === 0x6d || a === 0x64) return 1;
  if (at + 1 >= end) return 0;
  const b = bytes[at + 1];
  if ((a === 0x72 || a === 0x76) && b === 0x65) return 2; // re ve
  if (a === 0x6c && b === 0x6c) return 2; // ll
  return 0;
}

export class AutomatonLexer implements SpanLexer {
  readonly name = "automaton";

  *words(bytes: Uint8Array, start: number, end: number): IterableIterator<Span> {
    let pos = start;
    while (pos < end) {
      const next = pos + this.scan(bytes, pos, end);
      yield { start: pos, end: next, kind: "word" };
      pos = next;
    }
  }

  /** Byte length of the word starting at `pos`; always at least one character. */
  scan(bytes: Uint8Array, pos: number, end: number): number {
    if (bytes[pos] === APOSTROPHE) {
      const suffix = contractionLength(bytes, pos + 1, end);
      if (suffix > 0) return 1 + suffix;
    }

    let state = START;
    let p = pos;
    let spaceCount = 0;
    let lastSpace = pos;

    while (p < end) {
      const cls = charClass(codePointAt(bytes, p));
      const next = TRANSITIONS[state * CHAR_CLASS_COUNT + cls];
      if (next === STOP) break;
      if (next === LEAD || next === SPACES) {
        spaceCount++;
        lastSpace = p;
      }
      state = next;
      p += sequenceWidth(bytes[p]);
    }

    // A whitespace run followed by non-whitespace gives up its last
    // character so that character can lead the next word.
    if (state === SPACES && p < end && spaceCount >= 2) {
      return lastSpace - pos;
    }
    return p - pos;
  }
}
