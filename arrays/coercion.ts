/**
 * Coercion of literal text into numeric and binary values.
 * Returns an ArrayTypeError for text that cannot be represented in the
 * destination type; the decoder records it and moves on.
 */

import { ArrayTypeError } from "./errors.ts";
import { TEXT_DECODER } from "./types.ts";

// --- Range constants ---

export const INT16_MIN = -0x8000;
export const INT16_MAX = 0x7fff;
export const INT32_MIN = -0x80000000;
export const INT32_MAX = 0x7fffffff;
export const UINT32_MAX = 0xffffffff;

export const INT64_MIN = -(1n << 63n);
export const INT64_MAX = (1n << 63n) - 1n;

// --- Literal syntax ---

const SIGNED_INT_REGEX = /^[+-]?\d+$/;
const UNSIGNED_INT_REGEX = /^\d+$/;
const FLOAT_REGEX = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INFINITY_REGEX = /^[+-]?inf(?:inity)?$/i;
const NAN_REGEX = /^nan$/i;
const BASE64_REGEX = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

function numberError(text: string, typeName: string): ArrayTypeError {
  return new ArrayTypeError(`number ${text}`, typeName);
}

// --- Range-checked converters ---

/** Parse a decimal integer that must fit in [min, max]. Unsigned ranges reject a sign. */
export function parseIntLiteral(
  text: string,
  typeName: string,
  min: number,
  max: number,
): number | ArrayTypeError {
  const syntax = min < 0 ? SIGNED_INT_REGEX : UNSIGNED_INT_REGEX;
  if (!syntax.test(text)) return numberError(text, typeName);
  const n = Number(text);
  if (n < min || n > max) return numberError(text, typeName);
  return n === 0 ? 0 : n; // no -0
}

export function parseBigIntLiteral(
  text: string,
  typeName: string,
  min: bigint,
  max: bigint,
): bigint | ArrayTypeError {
  const syntax = min < 0n ? SIGNED_INT_REGEX : UNSIGNED_INT_REGEX;
  if (!syntax.test(text)) return numberError(text, typeName);
  const b = BigInt(text);
  if (b < min || b > max) return numberError(text, typeName);
  return b;
}

/**
 * Parse a floating-point literal at 32 or 64 bits. NaN and Infinity are
 * accepted by name; a finite literal that overflows the width is an error.
 */
export function parseFloatLiteral(
  text: string,
  typeName: string,
  bits: 32 | 64,
): number | ArrayTypeError {
  let n: number;
  if (FLOAT_REGEX.test(text)) {
    n = Number(text);
    if (!Number.isFinite(n)) return numberError(text, typeName);
  } else if (INFINITY_REGEX.test(text)) {
    n = text.startsWith("-") ? -Infinity : Infinity;
  } else if (NAN_REGEX.test(text)) {
    n = NaN;
  } else {
    return numberError(text, typeName);
  }

  if (bits === 32) {
    const f = Math.fround(n);
    if (Number.isFinite(n) && !Number.isFinite(f)) return numberError(text, typeName);
    return f;
  }
  return n;
}

// --- Binary ---

/** Strict standard-alphabet base64 with padding. */
export function decodeBase64(bytes: Uint8Array, typeName: string): Uint8Array | ArrayTypeError {
  const text = TEXT_DECODER.decode(bytes);
  if (!BASE64_REGEX.test(text)) {
    return new ArrayTypeError("invalid base64 string", typeName);
  }
  return new Uint8Array(Buffer.from(text, "base64"));
}

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
}
