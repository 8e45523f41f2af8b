import { describe, it, expect } from "vitest";
import { Effect, Either } from "effect";
import { bytesToString, toBytes, type Span } from "@bytepair/core";
import { AutomatonLexer, PatternLexer, TextSpanner, SpecialMatcher, charClass, CharClass, makeSpanner } from "@bytepair/spanners";
import { makeRandom, randomText } from "./fixtures.js";

function words(spanner: TextSpanner, text: string): string[] {
  const bytes = toBytes(text);
  return [...spanner.spans(bytes)].map((s) => bytesToString(bytes.subarray(s.start, s.end)));
}

const automaton = new TextSpanner(new AutomatonLexer());
const pattern = new TextSpanner(new PatternLexer());

describe("charClass", () => {
  it("classifies representative code points", () => {
    expect(charClass(0x20)).toBe(CharClass.Space);
    expect(charClass(0x09)).toBe(CharClass.Whitespace);
    expect(charClass(0x61)).toBe(CharClass.Letter);
    expect(charClass(0xe9)).toBe(CharClass.Letter);
    expect(charClass(0x37)).toBe(CharClass.Number);
    expect(charClass(0x21)).toBe(CharClass.Other);
    expect(charClass(0x1f600)).toBe(CharClass.Other);
  });
});

describe("word spanning", () => {
  it("splits words, contractions, numbers and symbols", () => {
    const expected = ["Hello", " world", "'s", " 42", "!!", " ", " ok"];
    expect(words(automaton, "Hello world's 42!!  ok")).toEqual(expected);
    expect(words(pattern, "Hello world's 42!!  ok")).toEqual(expected);
  });

  it("reports byte offsets for multi-byte text", () => {
    const spans = [...automaton.spans("café au")];
    expect(spans).toEqual([
      { start: 0, end: 5, kind: "word" },
      { start: 5, end: 8, kind: "word" },
    ]);
  });

  it("keeps trailing whitespace as one span", () => {
    expect(words(automaton, "a  ")).toEqual(["a", "  "]);
    expect(words(pattern, "a  ")).toEqual(["a", "  "]);
  });

  it("gives a run of mixed whitespace up to the following word", () => {
    expect(words(automaton, "x\t\t b")).toEqual(["x", "\t\t", " b"]);
    expect(words(pattern, "x\t\t b")).toEqual(["x", "\t\t", " b"]);
  });

  it("keeps a leading byte order mark in the byte offsets", () => {
    const expected = [
      { start: 0, end: 3, kind: "word" },
      { start: 3, end: 8, kind: "word" },
    ];
    expect([...automaton.spans("\uFEFFhello")]).toEqual(expected);
    expect([...pattern.spans("\uFEFFhello")]).toEqual(expected);
  });

  it("does not treat an unknown suffix as a contraction", () => {
    expect(words(automaton, "x'y")).toEqual(["x", "'", "y"]);
  });

  it("yields nothing for empty input", () => {
    expect([...automaton.spans("")]).toEqual([]);
  });

  it("restarts from the beginning on every call", () => {
    const first = [...automaton.spans("ab cd")];
    const second = [...automaton.spans("ab cd")];
    expect(second).toEqual(first);
  });

  it("agrees between the pattern and automaton lexers", () => {
    const alphabet = [
      "a", "Z", "é", " ", "  ", "\t", "\n", "\r\n", "\u00a0", "\u3000", "\uFEFF",
      "1", "'", "s", "ll", "re", "!", "?", "😀", "日本",
    ];
    const random = makeRandom(7);
    for (let i = 0; i < 300; i++) {
      const text = randomText(random, alphabet, 12);
      expect([...automaton.spans(text)], JSON.stringify(text)).toEqual([...pattern.spans(text)]);
    }
  });
});

describe("special tokens", () => {
  const spanner = new TextSpanner(new AutomatonLexer(), { specials: ["<|end|>", "<|end|>!"] });

  it("splits around specials before word spanning", () => {
    const spans: Span[] = [...spanner.spans("hi<|end|>there")];
    expect(spans).toEqual([
      { start: 0, end: 2, kind: "word" },
      { start: 2, end: 9, kind: "special" },
      { start: 9, end: 14, kind: "word" },
    ]);
  });

  it("prefers the longest special at a position", () => {
    expect(words(spanner, "a<|end|>!b")).toEqual(["a", "<|end|>!", "b"]);
  });

  it("finds the leftmost occurrence", () => {
    const matcher = new SpecialMatcher(["bc", "ab"]);
    expect(matcher.find(toBytes("xabc"), 0, 4)).toEqual({ start: 1, end: 3 });
  });
});

describe("malformed UTF-8", () => {
  const bytes = Uint8Array.of(0x61, 0xff, 0x62);

  it("emits a remainder span in lenient mode", () => {
    expect([...automaton.spans(bytes)]).toEqual([
      { start: 0, end: 1, kind: "word" },
      { start: 1, end: 3, kind: "remainder" },
    ]);
  });

  it("fails with the offset in strict mode", async () => {
    const strict = await Effect.runPromise(makeSpanner("automaton", { strict: true }));
    const result = await Effect.runPromise(Effect.either(strict.split(bytes)));
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("SpanningError");
      expect(result.left.offset).toBe(1);
    }
  });

  it("treats a truncated sequence as malformed", async () => {
    const strict = await Effect.runPromise(makeSpanner("pattern", { strict: true }));
    const result = await Effect.runPromise(Effect.either(strict.split(Uint8Array.of(0x61, 0xe6, 0x97))));
    expect(Either.isLeft(result) && result.left.offset).toBe(1);
  });
});
