import { describe, it, expect } from "vitest";
import { Effect, Either } from "effect";
import { toBytes, mergeStrategies, spannerStrategies, UnmappedByteError } from "@bytepair/core";
import { Vocabulary, byteLevelVocabulary } from "@bytepair/vocab";
import { Encoder } from "@bytepair/encoders";
import { END_ID, HELLO_MERGES, helloVocabulary, makeRandom } from "./fixtures.js";

const vocab = helloVocabulary();

function make(overrides: Parameters<typeof Encoder.make>[1] = {}): Encoder {
  return Effect.runSync(Encoder.make(vocab, overrides));
}

describe("Encoder", () => {
  it("encodes each word span separately", () => {
    // "hello" | " hello": the space blocks merges across the boundary
    expect(Array.from(make().encode("hello hello"))).toEqual([259, 32, 259]);
  });

  it("gives identical ids for every strategy combination", () => {
    const text = "hello, hell's bells! he llo\thello";
    const reference = Array.from(make({ spannerStrategy: "pattern", mergeStrategy: "linearRescan" }).encode(text));
    for (const spannerStrategy of spannerStrategies) {
      for (const mergeStrategy of mergeStrategies) {
        const encoder = make({ spannerStrategy, mergeStrategy });
        expect(Array.from(encoder.encode(text))).toEqual(reference);
        encoder.close();
      }
    }
  });

  it("returns per-span ids", () => {
    const spans = make().encodeSpans("hell o");
    expect(spans.map((s) => [s.span.start, s.span.end, Array.from(s.ids)])).toEqual([
      [0, 4, [258]],
      [4, 6, [32, 111]],
    ]);
  });

  it("encodes special tokens to their ids", () => {
    expect(Array.from(make().encode("hello<|end|>he"))).toEqual([259, END_ID, 256]);
  });

  it("round-trips through decode", () => {
    const encoder = make();
    const text = "hello<|end|> wörld 😀";
    expect(encoder.decodeToString(encoder.encode(text))).toBe(text);
  });

  it("encodes a leading byte order mark the same under both spanners", () => {
    const expected = [239, 187, 191, 259];
    expect(Array.from(make({ spannerStrategy: "automaton" }).encode("\uFEFFhello"))).toEqual(expected);
    expect(Array.from(make({ spannerStrategy: "pattern" }).encode("\uFEFFhello"))).toEqual(expected);
  });

  it("matches a special token that starts with a byte order mark", async () => {
    const bom = await Effect.runPromise(byteLevelVocabulary(HELLO_MERGES, { specials: { "\uFEFF<s>": 900 } }));
    const encoder = await Effect.runPromise(Encoder.make(bom));
    expect(Array.from(encoder.encode("\uFEFF<s>"))).toEqual([900]);
    expect(encoder.decodeToString([900, 259])).toBe("\uFEFF<s>hello");
  });

  it.each(spannerStrategies)("round-trips random bytes under the %s spanner", (spannerStrategy) => {
    const encoder = make({ spannerStrategy });
    const random = makeRandom(7);
    const every = Uint8Array.from({ length: 256 }, (_, i) => i);
    expect(Array.from(encoder.decode(encoder.encode(every)))).toEqual(Array.from(every));
    for (let i = 0; i < 300; i++) {
      const bytes = Uint8Array.from({ length: random(64) }, () => random(256));
      expect(Array.from(encoder.decode(encoder.encode(bytes)))).toEqual(Array.from(bytes));
    }
    // truncated multi-byte sequences at the end of the input
    for (const tail of [[0xe2, 0x82], [0xf0, 0x9f, 0x98], [0xc3]]) {
      const bytes = Uint8Array.from([...toBytes("hello "), ...tail]);
      expect(Array.from(encoder.decode(encoder.encode(bytes)))).toEqual(Array.from(bytes));
    }
  });

  it("encodes the empty string to no tokens", () => {
    expect(make().encode("").length).toBe(0);
  });

  it("encodes a lenient remainder as byte tokens", () => {
    expect(Array.from(make().encode(Uint8Array.of(0x68, 0x65, 0xff, 0x68, 0x65)))).toEqual([256, 255, 256]);
  });

  it("fails strict encoding of malformed bytes", async () => {
    const result = await Effect.runPromise(
      Effect.either(make({ strictSpanning: true }).tryEncode(Uint8Array.of(0x68, 0xc3))),
    );
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("SpanningError");
      expect(result.left._tag === "SpanningError" && result.left.offset).toBe(1);
    }
  });

  it("fails on a byte without a token", async () => {
    const partial = await Effect.runPromise(
      Vocabulary.fromTable({
        tokens: [
          { id: 0, bytes: toBytes("a") },
          { id: 1, bytes: toBytes("b") },
        ],
        merges: [],
      }),
    );
    const encoder = await Effect.runPromise(Encoder.make(partial));
    expect(Array.from(encoder.encode("ab"))).toEqual([0, 1]);
    expect(() => encoder.encode("abc")).toThrow(UnmappedByteError);

    const result = await Effect.runPromise(Effect.either(encoder.tryEncode("abc")));
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result) && result.left._tag === "UnmappedByteError") {
      expect(result.left.byte).toBe(0x63);
      expect(result.left.offset).toBe(2);
    }
  });

  it("rejects an invalid configuration", async () => {
    const result = await Effect.runPromise(Effect.either(Encoder.make(vocab, { workerCount: 0 })));
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) expect(result.left._tag).toBe("ConfigError");
  });
});
