import { describe, it, expect } from "vitest";
import { Effect, Either } from "effect";
import { toBytes, bytesToString, type VocabularyDefect } from "@bytepair/core";
import { Vocabulary, byteLevelVocabulary, type RankTable } from "@bytepair/vocab";
import { Encoder } from "@bytepair/encoders";
import { helloVocabulary, END_ID } from "./fixtures.js";

const a = { id: 0, bytes: toBytes("a") };
const b = { id: 1, bytes: toBytes("b") };
const ab = { id: 2, bytes: toBytes("ab") };

function rejection(table: RankTable): VocabularyDefect | undefined {
  const result = Effect.runSync(Effect.either(Vocabulary.fromTable(table)));
  return Either.isLeft(result) ? result.left.reason : undefined;
}

describe("Vocabulary lookups", () => {
  const vocab = helloVocabulary();

  it("counts regular tokens and merges", () => {
    expect(vocab.size).toBe(260);
    expect(vocab.mergeCount).toBe(4);
  });

  it("maps pairs to rank and merged id", () => {
    expect(vocab.rankOf(104, 101)).toBe(0);
    expect(vocab.mergeOf(256, 257)).toEqual({ rank: 2, merged: 258 });
    expect(vocab.rankOf(101, 104)).toBeUndefined();
  });

  it("maps bytes to ids and back", () => {
    expect(vocab.idOf(toBytes("hell"))).toBe(258);
    expect(bytesToString(vocab.bytesOf(259) ?? new Uint8Array())).toBe("hello");
    expect(vocab.bytesOf(5000)).toBeUndefined();
    expect(vocab.byteToken(0x41)).toBe(65);
  });

  it("exposes special tokens", () => {
    expect(vocab.specialId("<|end|>")).toBe(END_ID);
    expect(bytesToString(vocab.bytesOf(END_ID) ?? new Uint8Array())).toBe("<|end|>");
    expect(vocab.specials).toEqual(["<|end|>"]);
  });

  it("lists specials longest first", async () => {
    const v = await Effect.runPromise(
      byteLevelVocabulary([], { specials: { "<s>": 300, "<|pad|>": 301 } }),
    );
    expect(v.specials).toEqual(["<|pad|>", "<s>"]);
  });
});

describe("Vocabulary immutability", () => {
  it("hands out copies of token bytes", async () => {
    const vocab = helloVocabulary();
    const bytes = vocab.bytesOf(259) ?? new Uint8Array();
    bytes[0] = 0x6a;
    const encoder = await Effect.runPromise(Encoder.make(vocab));
    expect(encoder.decodeToString(encoder.encode("hello"))).toBe("hello");
    expect(vocab.idOf(toBytes("hello"))).toBe(259);
    expect(vocab.idOf(toBytes("jello"))).toBeUndefined();
  });

  it("does not share byte arrays with the source table", async () => {
    const source = toBytes("ab");
    const vocab = await Effect.runPromise(
      Vocabulary.fromTable({ tokens: [a, b, { id: 2, bytes: source }], merges: [{ left: 0, right: 1, merged: 2, rank: 0 }] }),
    );
    source[0] = 0x7a;
    expect(bytesToString(vocab.bytesOf(2) ?? new Uint8Array())).toBe("ab");
    expect(vocab.idOf(toBytes("ab"))).toBe(2);
  });

  it("returns a fresh table copy", () => {
    const vocab = helloVocabulary();
    const first = vocab.table;
    first.tokens[104].bytes[0] = 0x6a;
    expect(Array.from(vocab.table.tokens[104].bytes)).toEqual([104]);
    expect(vocab.merges().map((m) => m.merged)).toEqual([256, 257, 258, 259]);
  });

  it("copies bytes into a caller buffer", () => {
    const vocab = helloVocabulary();
    const out = new Uint8Array(6);
    expect(vocab.copyBytes(258, out, 1)).toBe(4);
    expect(vocab.copyBytes(9999, out, 0)).toBe(0);
    expect(vocab.byteLength(END_ID)).toBe(7);
    expect(bytesToString(out.subarray(1, 5))).toBe("hell");
  });
});

describe("Vocabulary validation", () => {
  it("accepts a consistent table", () => {
    expect(rejection({ tokens: [a, b, ab], merges: [{ left: 0, right: 1, merged: 2, rank: 0 }] })).toBeUndefined();
  });

  it("rejects an out-of-range id", () => {
    expect(rejection({ tokens: [{ id: -1, bytes: toBytes("a") }], merges: [] })).toBe("malformed-id");
  });

  it("rejects a repeated id", () => {
    expect(rejection({ tokens: [a, { id: 0, bytes: toBytes("b") }], merges: [] })).toBe("duplicate-id");
  });

  it("rejects empty bytes", () => {
    expect(rejection({ tokens: [{ id: 0, bytes: new Uint8Array(0) }], merges: [] })).toBe("empty-bytes");
  });

  it("rejects two ids for the same bytes", () => {
    expect(rejection({ tokens: [a, { id: 1, bytes: toBytes("a") }], merges: [] })).toBe("duplicate-bytes");
  });

  it("rejects a merge over a missing operand", () => {
    expect(rejection({ tokens: [a, b, ab], merges: [{ left: 0, right: 5, merged: 2, rank: 0 }] })).toBe(
      "dangling-operand",
    );
  });

  it("rejects a merge into a missing token", () => {
    expect(rejection({ tokens: [a, b, ab], merges: [{ left: 0, right: 1, merged: 9, rank: 0 }] })).toBe(
      "dangling-target",
    );
  });

  it("rejects a token derived from itself", () => {
    expect(rejection({ tokens: [a, b, ab], merges: [{ left: 0, right: 1, merged: 0, rank: 0 }] })).toBe(
      "cyclic-merge",
    );
  });

  it("rejects a merge whose target is not the concatenation", () => {
    const x = { id: 2, bytes: toBytes("x") };
    expect(rejection({ tokens: [a, b, x], merges: [{ left: 0, right: 1, merged: 2, rank: 0 }] })).toBe(
      "inconsistent-merge",
    );
  });

  it("rejects a pair with two merges", () => {
    const table: RankTable = {
      tokens: [a, b, ab],
      merges: [
        { left: 0, right: 1, merged: 2, rank: 0 },
        { left: 0, right: 1, merged: 2, rank: 1 },
      ],
    };
    expect(rejection(table)).toBe("duplicate-pair");
  });

  it("rejects ranks that are not dense", () => {
    expect(rejection({ tokens: [a, b, ab], merges: [{ left: 0, right: 1, merged: 2, rank: 1 }] })).toBe(
      "malformed-rank",
    );
  });

  it("rejects an empty special text", () => {
    expect(rejection({ tokens: [a], merges: [], specials: [{ id: 10, text: "" }] })).toBe("invalid-special");
  });

  it("rejects a special id that collides with a token", () => {
    expect(rejection({ tokens: [a], merges: [], specials: [{ id: 0, text: "<s>" }] })).toBe("duplicate-id");
  });
});

describe("byteLevelVocabulary", () => {
  it("assigns ids after the 256 byte tokens", async () => {
    const vocab = await Effect.runPromise(byteLevelVocabulary([["a", "b"]]));
    expect(vocab.idOf(toBytes("ab"))).toBe(256);
    expect(vocab.mergeOf(97, 98)).toEqual({ rank: 0, merged: 256 });
  });

  it("fails on an operand that is neither a byte nor an earlier merge", async () => {
    const result = await Effect.runPromise(Effect.either(byteLevelVocabulary([["x", "yz"]])));
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) expect(result.left.reason).toBe("dangling-operand");
  });
});
