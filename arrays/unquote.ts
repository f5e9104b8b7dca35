/**
 * Unquoting of double-quoted array elements.
 *
 * Inside quotes a backslash escapes the next byte, which is how `"`, `\`,
 * `{` and `}` survive without ending the literal or being read as array
 * structure. `\uXXXX` escapes are also decoded.
 */

import { Char, Unicode } from "./constants.ts";
import { TEXT_DECODER, TEXT_ENCODER } from "./types.ts";

// Worst case growth: one invalid UTF-8 byte becomes a 3-byte U+FFFD.
const MAX_EXPANSION = 3;

function hexValue(c: number): number {
  if (c >= 0x30 && c <= 0x39) return c - 0x30; // 0-9
  if (c >= 0x61 && c <= 0x66) return c - 0x57; // a-f
  if (c >= 0x41 && c <= 0x46) return c - 0x37; // A-F
  return -1;
}

/** Decode `\uXXXX` at `i`, or return -1. */
function readUnicodeEscape(s: Uint8Array, i: number): number {
  if (i + 6 > s.length || s[i] !== Char.BACKSLASH || s[i + 1] !== Char.LOWER_U) {
    return -1;
  }
  let r = 0;
  for (let k = 2; k < 6; k++) {
    const h = hexValue(s[i + k]);
    if (h < 0) return -1;
    r = r * 16 + h;
  }
  return r;
}

function isSurrogate(r: number): boolean {
  return r >= Unicode.SURROGATE_MIN && r <= Unicode.SURROGATE_MAX;
}

function decodeSurrogatePair(hi: number, lo: number): number {
  if (
    hi >= Unicode.SURROGATE_MIN &&
    hi <= Unicode.HIGH_SURROGATE_MAX &&
    lo >= Unicode.LOW_SURROGATE_MIN &&
    lo <= Unicode.SURROGATE_MAX
  ) {
    return ((hi - Unicode.SURROGATE_MIN) << 10) + (lo - Unicode.LOW_SURROGATE_MIN) + 0x10000;
  }
  return Unicode.REPLACEMENT_CHAR;
}

function writeText(out: Uint8Array, w: number, text: string): number {
  return TEXT_ENCODER.encodeInto(text, out.subarray(w)).written;
}

/**
 * Strip the surrounding quotes from `s` and resolve escapes.
 * Returns null when `s` is not a well-formed quoted literal.
 * Without escapes or non-ASCII bytes the result is a view of `s`.
 */
export function unquoteBytes(s: Uint8Array): Uint8Array | null {
  if (s.length < 2 || s[0] !== Char.QUOTE || s[s.length - 1] !== Char.QUOTE) {
    return null;
  }
  const body = s.subarray(1, s.length - 1);

  let r = 0;
  while (r < body.length) {
    const c = body[r];
    if (c === Char.BACKSLASH || c === Char.QUOTE || c < Char.FIRST_PRINTABLE || c >= Char.NON_ASCII) {
      break;
    }
    r++;
  }
  if (r === body.length) return body;

  const out = new Uint8Array(body.length * MAX_EXPANSION);
  out.set(body.subarray(0, r));
  let w = r;

  while (r < body.length) {
    const c = body[r];

    if (c === Char.BACKSLASH) {
      if (r + 1 >= body.length) return null;
      const e = body[r + 1];
      if (e === Char.LOWER_U) {
        let cp = readUnicodeEscape(body, r);
        if (cp < 0) return null;
        r += 6;
        if (isSurrogate(cp)) {
          const pair = decodeSurrogatePair(cp, readUnicodeEscape(body, r));
          if (pair !== Unicode.REPLACEMENT_CHAR) {
            r += 6;
            w += writeText(out, w, String.fromCodePoint(pair));
            continue;
          }
          cp = Unicode.REPLACEMENT_CHAR;
        }
        w += writeText(out, w, String.fromCodePoint(cp));
        continue;
      }
      r++;
      if (e < Char.NON_ASCII) {
        out[w++] = e;
        r++;
        continue;
      }
      // escaped multi-byte character: copied whole below
    } else if (c === Char.QUOTE || c < Char.FIRST_PRINTABLE) {
      return null;
    } else if (c < Char.NON_ASCII) {
      out[w++] = c;
      r++;
      continue;
    }

    // Run of non-ASCII bytes; malformed UTF-8 becomes U+FFFD.
    let end = r;
    while (end < body.length && body[end] >= Char.NON_ASCII) end++;
    w += writeText(out, w, TEXT_DECODER.decode(body.subarray(r, end)));
    r = end;
  }
  return out.subarray(0, w);
}

/** Like unquoteBytes, decoded as UTF-8. */
export function unquote(s: Uint8Array): string | null {
  const bytes = unquoteBytes(s);
  return bytes === null ? null : TEXT_DECODER.decode(bytes);
}
