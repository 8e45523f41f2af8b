/**
 * Code point classification for the word rules.
 *
 * Classes mirror the RegExp categories used by the pattern lexer: `\s`,
 * `\p{L}`, `\p{N}` and everything else. U+0020 gets its own class because
 * only a plain space may lead a letter, digit or symbol run.
 */

export const CharClass = {
  Space: 0,
  Whitespace: 1,
  Letter: 2,
  Number: 3,
  Other: 4,
} as const;
export type CharClass = (typeof CharClass)[keyof typeof CharClass];

export const CHAR_CLASS_COUNT = 5;

const WHITESPACE = /^\s$/u;
const LETTER = /^\p{L}$/u;
const NUMBER = /^\p{N}$/u;

function classifySlow(cp: number): CharClass {
  if (cp === 0x20) return CharClass.Space;
  const ch = String.fromCodePoint(cp);
  if (WHITESPACE.test(ch)) return CharClass.Whitespace;
  if (LETTER.test(ch)) return CharClass.Letter;
  if (NUMBER.test(ch)) return CharClass.Number;
  return CharClass.Other;
}

/** Basic Multilingual Plane class table, built once on first use. */
let bmpTable: Uint8Array | null = null;

/** Astral code points are rare; classify on demand and remember. */
const astralCache = new Map<number, CharClass>();

function buildBmpTable(): Uint8Array {
  const table = new Uint8Array(0x1_0000);
  for (let cp = 0; cp < 0x1_0000; cp++) {
    // Lone surrogates never come out of well-formed UTF-8.
    table[cp] = cp >= 0xd800 && cp <= 0xdfff ? CharClass.Other : classifySlow(cp);
  }
  return table;
}

const CLASS_BY_VALUE: readonly CharClass[] = [
  CharClass.Space,
  CharClass.Whitespace,
  CharClass.Letter,
  CharClass.Number,
  CharClass.Other,
];

export function charClass(cp: number): CharClass {
  if (cp < 0x1_0000) {
    if (!bmpTable) bmpTable = buildBmpTable();
    return CLASS_BY_VALUE[bmpTable[cp]] ?? CharClass.Other;
  }
  let cls = astralCache.get(cp);
  if (cls === undefined) {
    cls = classifySlow(cp);
    astralCache.set(cp, cls);
  }
  return cls;
}
