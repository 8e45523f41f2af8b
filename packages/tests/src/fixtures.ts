/**
 * Shared vocabularies and inputs for the suites.
 */
import { Effect } from "effect";
import { byteLevelTable, byteLevelVocabulary, type Vocabulary } from "@bytepair/vocab";

/** he=256, ll=257, hell=258, hello=259 */
export const HELLO_MERGES = [
  ["h", "e"],
  ["l", "l"],
  ["he", "ll"],
  ["hell", "o"],
] as const;

/** ab=256, bc=257, abc=258, ca=259, aa=260, bca=261, aab=262 */
export const ABC_MERGES = [
  ["a", "b"],
  ["b", "c"],
  ["ab", "c"],
  ["c", "a"],
  ["a", "a"],
  ["bc", "a"],
  ["aa", "b"],
] as const;

export const END_TOKEN = "<|end|>";
export const END_ID = 1000;

export function helloVocabulary(): Vocabulary {
  return Effect.runSync(byteLevelVocabulary(HELLO_MERGES, { specials: { [END_TOKEN]: END_ID } }));
}

export function helloTable() {
  return byteLevelTable(HELLO_MERGES, { specials: { [END_TOKEN]: END_ID } });
}

export function abcVocabulary(): Vocabulary {
  return Effect.runSync(byteLevelVocabulary(ABC_MERGES));
}

/** Deterministic LCG so property checks are repeatable. */
export function makeRandom(seed: number): (bound: number) => number {
  let state = seed >>> 0;
  return (bound) => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state % bound;
  };
}

export function randomText(random: (bound: number) => number, alphabet: readonly string[], maxParts: number): string {
  const parts = random(maxParts + 1);
  let text = "";
  for (let i = 0; i < parts; i++) text += alphabet[random(alphabet.length)];
  return text;
}
