/**
 * Array literal encoder, the inverse of the decoder for dynamic values.
 *
 * Strings are always quoted so that `NULL`, `t` and `f` stay strings on
 * the way back in. Control characters are written as `\uXXXX` escapes
 * because the scanner rejects them inside quotes.
 */

import { encodeBase64 } from "./coercion.ts";
import { TEXT_ENCODER } from "./types.ts";

export type EncodableValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | readonly EncodableValue[];

const ESCAPE_REGEX = /["\\\x00-\x1f]/g;

function escapeChar(c: string): string {
  if (c === '"' || c === "\\") return `\\${c}`;
  return `\\u${c.charCodeAt(0).toString(16).padStart(4, "0")}`;
}

function quote(s: string): string {
  return `"${s.replace(ESCAPE_REGEX, escapeChar)}"`;
}

function encodeValue(value: EncodableValue, parts: string[]): void {
  if (value === null) {
    parts.push("NULL");
  } else if (typeof value === "boolean") {
    parts.push(value ? "t" : "f");
  } else if (typeof value === "number" || typeof value === "bigint") {
    // String() spells NaN, Infinity and -Infinity the way the parser reads them
    parts.push(String(value));
  } else if (typeof value === "string") {
    parts.push(quote(value));
  } else if (value instanceof Uint8Array) {
    parts.push(quote(encodeBase64(value)));
  } else {
    parts.push("{");
    for (let i = 0; i < value.length; i++) {
      if (i > 0) parts.push(",");
      encodeValue(value[i], parts);
    }
    parts.push("}");
  }
}

/**
 * Serialize a value as an array literal.
 *
 * @example
 * encodeArrayLiteral([1, null, "a b"]) // '{1,NULL,"a b"}'
 */
export function encodeArrayLiteral(value: EncodableValue): string {
  const parts: string[] = [];
  encodeValue(value, parts);
  return parts.join("");
}

export function encodeArrayLiteralBytes(value: EncodableValue): Uint8Array {
  return TEXT_ENCODER.encode(encodeArrayLiteral(value));
}
