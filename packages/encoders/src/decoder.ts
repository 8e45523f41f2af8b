/**
 * Token ids -> bytes.
 */
import { Effect, type Either } from "effect";
import { UnknownTokenError, bytesToString, type VocabularyReader } from "@bytepair/core";

export class Decoder {
  readonly vocab: VocabularyReader;

  constructor(vocab: VocabularyReader) {
    this.vocab = vocab;
  }

  /**
   * Concatenate the bytes of every id, special tokens included.
   * Throws `UnknownTokenError` naming the first id the vocabulary lacks.
   */
  decode(ids: ArrayLike<number>): Uint8Array {
    let total = 0;
    for (let i = 0; i < ids.length; i++) {
      const id = ids[i];
      const len = this.vocab.byteLength(id);
      if (len === undefined) {
        throw new UnknownTokenError({
          message: `Unknown token id ${id} at position ${i}`,
          id,
          position: i,
        });
      }
      total += len;
    }
    const out = new Uint8Array(total);
    let offset = 0;
    for (let i = 0; i < ids.length; i++) {
      offset += this.vocab.copyBytes(ids[i], out, offset);
    }
    return out;
  }

  /** `decode`, then UTF-8 with U+FFFD for malformed sequences. */
  decodeToString(ids: ArrayLike<number>): string {
    return bytesToString(this.decode(ids));
  }

  tryDecode(ids: ArrayLike<number>): Effect.Effect<Uint8Array, UnknownTokenError> {
    return Effect.suspend(() => {
      try {
        return Effect.succeed(this.decode(ids));
      } catch (err) {
        if (err instanceof UnknownTokenError) return Effect.fail(err);
        throw err;
      }
    });
  }

  /** Decode each sequence independently; one bad id fails only its own entry. */
  tryDecodeBatch(
    batch: readonly ArrayLike<number>[],
  ): Effect.Effect<Array<Either.Either<Uint8Array, UnknownTokenError>>> {
    return Effect.forEach(batch, (ids) => Effect.either(this.tryDecode(ids)));
  }
}
