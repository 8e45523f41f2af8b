/**
 * UTF-8 helpers shared by the spanners, the encoder and the decoder.
 */
import type { TextInput } from "./types.js";

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { ignoreBOM: true });

/** Bytes of `input`; strings are UTF-8 encoded, byte arrays pass through. */
export function toBytes(input: TextInput): Uint8Array {
  return typeof input === "string" ? textEncoder.encode(input) : input;
}

/** Decode UTF-8, replacing malformed sequences with U+FFFD. */
export function bytesToString(bytes: Uint8Array): string {
  return textDecoder.decode(bytes);
}

/** Width in bytes of the sequence introduced by `lead`, or 0 if it cannot lead one. */
export function sequenceWidth(lead: number): number {
  if (lead < 0x80) return 1;
  if (lead >= 0xc2 && lead <= 0xdf) return 2;
  if (lead >= 0xe0 && lead <= 0xef) return 3;
  if (lead >= 0xf0 && lead <= 0xf4) return 4;
  return 0;
}

/**
 * Length of the longest prefix of `bytes` that is well-formed UTF-8.
 *
 * Rejects overlong forms, surrogates, code points above U+10FFFF and
 * sequences truncated by the end of input.
 */
export function validUtf8Prefix(bytes: Uint8Array): number {
  const n = bytes.length;
  let i = 0;
  while (i < n) {
    const b0 = bytes[i];
    if (b0 < 0x80) {
      i++;
      continue;
    }
    const width = sequenceWidth(b0);
    if (width === 0 || i + width > n) return i;

    const b1 = bytes[i + 1];
    // Second-byte ranges exclude overlongs (E0, F0), surrogates (ED) and > U+10FFFF (F4).
    let lo = 0x80;
    let hi = 0xbf;
    if (b0 === 0xe0) lo = 0xa0;
    else if (b0 === 0xed) hi = 0x9f;
    else if (b0 === 0xf0) lo = 0x90;
    else if (b0 === 0xf4) hi = 0x8f;
    if (b1 < lo || b1 > hi) return i;

    for (let k = 2; k < width; k++) {
      const b = bytes[i + k];
      if (b < 0x80 || b > 0xbf) return i;
    }
    i += width;
  }
  return n;
}

/** Code point starting at `i`. `bytes` must be well-formed at that position. */
export function codePointAt(bytes: Uint8Array, i: number): number {
  const b0 = bytes[i];
  if (b0 < 0x80) return b0;
  if (b0 < 0xe0) return ((b0 & 0x1f) << 6) | (bytes[i + 1] & 0x3f);
  if (b0 < 0xf0) {
    return ((b0 & 0x0f) << 12) | ((bytes[i + 1] & 0x3f) << 6) | (bytes[i + 2] & 0x3f);
  }
  return (
    ((b0 & 0x07) << 18) |
    ((bytes[i + 1] & 0x3f) << 12) |
    ((bytes[i + 2] & 0x3f) << 6) |
    (bytes[i + 3] & 0x3f)
  );
}

/** Number of UTF-8 bytes needed for the UTF-16 range `text[from, to)`. */
export function utf8Length(text: string, from: number, to: number): number {
  let len = 0;
  for (let i = from; i < to; i++) {
    const c = text.charCodeAt(i);
    if (c < 0x80) len += 1;
    else if (c < 0x800) len += 2;
    else if (c >= 0xd800 && c <= 0xdbff && i + 1 < to) {
      const d = text.charCodeAt(i + 1);
      if (d >= 0xdc00 && d <= 0xdfff) {
        len += 4;
        i++;
      } else {
        len += 3;
      }
    } else len += 3;
  }
  return len;
}
