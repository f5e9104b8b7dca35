/**
 * Destination shapes for array literal decoding.
 *
 * A target describes what the caller wants a literal decoded into. The
 * decoder inspects the target's kind to choose between array
 * materialization, a dynamic value tree and scalar coercion. Scalar-like
 * targets turn a single literal into a value through coerce().
 */

import {
  INT16_MAX,
  INT16_MIN,
  INT32_MAX,
  INT32_MIN,
  INT64_MAX,
  INT64_MIN,
  UINT32_MAX,
  decodeBase64,
  parseBigIntLiteral,
  parseFloatLiteral,
  parseIntLiteral,
} from "./coercion.ts";
import { ArrayTypeError } from "./errors.ts";
import { type DynamicValue, TEXT_DECODER } from "./types.ts";

/** One scanned literal, classified by its lexical form. */
export type Literal =
  | { kind: "null" }
  | { kind: "bool"; value: boolean }
  /** Quoted literal after unquoting. */
  | { kind: "quoted"; bytes: Uint8Array }
  | { kind: "bare"; text: string };

/**
 * Result of coercing a literal: the new value, a type error, or undefined
 * to leave the destination untouched (null into a non-nullable scalar).
 */
export type Coerced<T> = { value: T } | ArrayTypeError | undefined;

export type TargetKind = "scalar" | "sequence" | "fixed" | "dynamic" | "nullable";

export abstract class Target<T> {
  abstract readonly kind: TargetKind;
  /** Type name used in error messages, e.g. "int4[]". */
  abstract readonly type: string;
  abstract zeroValue(): T;
  abstract coerce(lit: Literal): Coerced<T>;
}

/** Value type a target decodes into. */
export type TargetValue<X> = X extends Target<infer T> ? T : never;

export function describeLiteral(lit: Literal): string {
  switch (lit.kind) {
    case "null":
      return "null";
    case "bool":
      return "bool";
    case "quoted":
      return "string";
    case "bare":
      return `literal ${lit.text}`;
  }
}

// --- Scalars ---

class IntTarget extends Target<number> {
  readonly kind = "scalar";
  readonly type: string;
  private min: number;
  private max: number;

  constructor(type: string, min: number, max: number) {
    super();
    this.type = type;
    this.min = min;
    this.max = max;
  }

  zeroValue() {
    return 0;
  }

  coerce(lit: Literal): Coerced<number> {
    if (lit.kind === "null") return undefined;
    if (lit.kind !== "bare") return new ArrayTypeError(describeLiteral(lit), this.type);
    const n = parseIntLiteral(lit.text, this.type, this.min, this.max);
    return n instanceof ArrayTypeError ? n : { value: n };
  }
}

class BigIntTarget extends Target<bigint> {
  readonly kind = "scalar";
  readonly type: string;
  private min: bigint;
  private max: bigint;

  constructor(type: string, min: bigint, max: bigint) {
    super();
    this.type = type;
    this.min = min;
    this.max = max;
  }

  zeroValue() {
    return 0n;
  }

  coerce(lit: Literal): Coerced<bigint> {
    if (lit.kind === "null") return undefined;
    if (lit.kind !== "bare") return new ArrayTypeError(describeLiteral(lit), this.type);
    const b = parseBigIntLiteral(lit.text, this.type, this.min, this.max);
    return b instanceof ArrayTypeError ? b : { value: b };
  }
}

class FloatTarget extends Target<number> {
  readonly kind = "scalar";
  readonly type: string;
  private bits: 32 | 64;

  constructor(type: string, bits: 32 | 64) {
    super();
    this.type = type;
    this.bits = bits;
  }

  zeroValue() {
    return 0;
  }

  coerce(lit: Literal): Coerced<number> {
    if (lit.kind === "null") return undefined;
    if (lit.kind !== "bare") return new ArrayTypeError(describeLiteral(lit), this.type);
    const n = parseFloatLiteral(lit.text, this.type, this.bits);
    return n instanceof ArrayTypeError ? n : { value: n };
  }
}

class BoolTarget extends Target<boolean> {
  readonly kind = "scalar";
  readonly type = "bool";

  zeroValue() {
    return false;
  }

  coerce(lit: Literal): Coerced<boolean> {
    if (lit.kind === "null") return undefined;
    if (lit.kind === "bool") return { value: lit.value };
    return new ArrayTypeError(describeLiteral(lit), this.type);
  }
}

class StringTarget extends Target<string> {
  readonly kind = "scalar";
  readonly type: string;

  constructor(type: string) {
    super();
    this.type = type;
  }

  zeroValue() {
    return "";
  }

  coerce(lit: Literal): Coerced<string> {
    switch (lit.kind) {
      case "null":
        return undefined;
      case "bool":
        return { value: lit.value ? "t" : "f" };
      case "quoted":
        return { value: TEXT_DECODER.decode(lit.bytes) };
      case "bare":
        return { value: lit.text };
    }
  }
}

/** Binary data, transported as base64 inside a quoted literal. */
class BytesTarget extends Target<Uint8Array> {
  readonly kind = "scalar";
  readonly type = "bytea";

  zeroValue() {
    return new Uint8Array(0);
  }

  coerce(lit: Literal): Coerced<Uint8Array> {
    if (lit.kind === "null") return { value: this.zeroValue() };
    if (lit.kind !== "quoted") return new ArrayTypeError(describeLiteral(lit), this.type);
    const bytes = decodeBase64(lit.bytes, this.type);
    return bytes instanceof ArrayTypeError ? bytes : { value: bytes };
  }
}

/** A composite row. Not array-shaped: only NULL is accepted, and ignored. */
class RecordTarget extends Target<Record<string, unknown>> {
  readonly kind = "scalar";
  readonly type: string;

  constructor(type: string) {
    super();
    this.type = type;
  }

  zeroValue(): Record<string, unknown> {
    return {};
  }

  coerce(lit: Literal): Coerced<Record<string, unknown>> {
    if (lit.kind === "null") return undefined;
    return new ArrayTypeError(describeLiteral(lit), this.type);
  }
}

// --- Containers ---

const TRAILING_DIMENSIONS_REGEX = /^(.*?)((?:\[\d*\])+)$/;

// Outer dimensions are written first: element "int4[]" in a [3] array is "int4[3][]".
function arrayTypeName(elementType: string, dimension: string): string {
  const m = TRAILING_DIMENSIONS_REGEX.exec(elementType);
  if (m === null) return `${elementType}${dimension}`;
  return `${m[1]}${dimension}${m[2]}`;
}

/** Value tree whose element types come from each literal's own form. */
export class DynamicTarget extends Target<DynamicValue> {
  readonly kind = "dynamic";
  readonly type = "any";

  zeroValue(): DynamicValue {
    return null;
  }

  coerce(lit: Literal): Coerced<DynamicValue> {
    switch (lit.kind) {
      case "null":
        return { value: null };
      case "bool":
        return { value: lit.value };
      case "quoted":
        return { value: TEXT_DECODER.decode(lit.bytes) };
      case "bare": {
        const n = parseFloatLiteral(lit.text, this.type, 64);
        return n instanceof ArrayTypeError ? n : { value: n };
      }
    }
  }
}

/** Growable sequence. The decoder manages capacity and length. */
export class SequenceTarget<E> extends Target<E[]> {
  readonly kind = "sequence";
  readonly type: string;
  readonly element: Target<E>;

  constructor(element: Target<E>) {
    super();
    this.element = element;
    this.type = arrayTypeName(element.type, "[]");
  }

  zeroValue(): E[] {
    return [];
  }

  coerce(lit: Literal): Coerced<E[]> {
    if (lit.kind === "null") return { value: this.zeroValue() };
    return new ArrayTypeError(describeLiteral(lit), this.type);
  }
}

/** Fixed-length array: extra elements are discarded, missing ones zeroed. */
export class FixedArrayTarget<E> extends Target<E[]> {
  readonly kind = "fixed";
  readonly type: string;
  readonly element: Target<E>;
  readonly length: number;

  constructor(element: Target<E>, length: number) {
    super();
    if (!Number.isInteger(length) || length < 0) {
      throw new RangeError(`Invalid fixed array length: ${length}`);
    }
    this.element = element;
    this.length = length;
    this.type = arrayTypeName(element.type, `[${length}]`);
  }

  zeroValue(): E[] {
    const arr = new Array<E>(this.length);
    for (let i = 0; i < this.length; i++) arr[i] = this.element.zeroValue();
    return arr;
  }

  coerce(lit: Literal): Coerced<E[]> {
    if (lit.kind === "null") return undefined;
    return new ArrayTypeError(describeLiteral(lit), this.type);
  }
}

/** Optional value: NULL sets it to null, anything else decodes into the inner target. */
export class NullableTarget<T> extends Target<T | null> {
  readonly kind = "nullable";
  readonly type: string;
  readonly inner: Target<T>;

  constructor(inner: Target<T>) {
    super();
    this.inner = inner;
    this.type = `Nullable(${inner.type})`;
  }

  zeroValue(): T | null {
    return null;
  }

  coerce(lit: Literal): Coerced<T | null> {
    if (lit.kind === "null") return { value: null };
    return this.inner.coerce(lit);
  }
}

// --- Builders ---

export const int2 = (): Target<number> => new IntTarget("int2", INT16_MIN, INT16_MAX);
export const int4 = (): Target<number> => new IntTarget("int4", INT32_MIN, INT32_MAX);
export const int8 = (): Target<bigint> => new BigIntTarget("int8", INT64_MIN, INT64_MAX);
export const oid = (): Target<number> => new IntTarget("oid", 0, UINT32_MAX);
export const float4 = (): Target<number> => new FloatTarget("float4", 32);
export const float8 = (): Target<number> => new FloatTarget("float8", 64);
export const bool = (): Target<boolean> => new BoolTarget();
export const text = (type = "text"): Target<string> => new StringTarget(type);
export const bytea = (): Target<Uint8Array> => new BytesTarget();
export const record = (type = "record"): Target<Record<string, unknown>> => new RecordTarget(type);
export const dynamic = (): DynamicTarget => new DynamicTarget();

export function array<E>(element: Target<E>): SequenceTarget<E> {
  return new SequenceTarget(element);
}

export function fixedArray<E>(element: Target<E>, length: number): FixedArrayTarget<E> {
  return new FixedArrayTarget(element, length);
}

export function nullable<T>(inner: Target<T>): NullableTarget<T> {
  return new NullableTarget(inner);
}

// --- Type names ---

const TEXT_TYPES = new Set([
  "text",
  "varchar",
  "character varying",
  "char",
  "character",
  "bpchar",
  "name",
  "citext",
  "uuid",
  "numeric",
  "decimal",
  "money",
  "date",
  "time",
  "timetz",
  "timestamp",
  "timestamptz",
  "interval",
  "json",
  "jsonb",
  "inet",
  "cidr",
  "macaddr",
  "xml",
]);

// LRU target cache. Deleting and re-inserting moves a key to the end;
// evicting keys().next() drops the oldest.
const TARGET_CACHE = new Map<string, Target<unknown>>();
const TARGET_CACHE_LIMIT = 1024;

/**
 * Target for a database type name: "int4", "integer", "text[]",
 * "int4[][]", "float8[3]" (fixed length), "any" (dynamic).
 */
export function getTarget(type: string): Target<unknown> {
  const key = type.trim().toLowerCase();
  const cached = TARGET_CACHE.get(key);
  if (cached !== undefined) {
    TARGET_CACHE.delete(key);
    TARGET_CACHE.set(key, cached);
    return cached;
  }

  const target = createTarget(key);
  TARGET_CACHE.set(key, target);

  if (TARGET_CACHE.size > TARGET_CACHE_LIMIT) {
    const oldest = TARGET_CACHE.keys().next();
    if (!oldest.done) TARGET_CACHE.delete(oldest.value);
  }
  return target;
}

// "int4[3][]" -> base "int4", dimensions [3, null], outermost first
const DIMENSIONS_REGEX = /\[(\d*)\]/g;

function createTarget(type: string): Target<unknown> {
  const bracket = type.indexOf("[");
  if (bracket >= 0) {
    const base = type.substring(0, bracket).trim();
    const suffix = type.substring(bracket);
    const dims = [...suffix.matchAll(DIMENSIONS_REGEX)];
    if (dims.map((m) => m[0]).join("") !== suffix) {
      throw new Error(`Unknown type: ${type}`);
    }
    let target: Target<unknown> = getTarget(base);
    for (let i = dims.length - 1; i >= 0; i--) {
      const size = dims[i][1];
      target = size === "" ? array(target) : fixedArray(target, parseInt(size, 10));
    }
    return target;
  }

  switch (type) {
    case "int2":
    case "smallint":
      return int2();
    case "int4":
    case "int":
    case "integer":
      return int4();
    case "int8":
    case "bigint":
      return int8();
    case "oid":
      return oid();
    case "float4":
    case "real":
      return float4();
    case "float8":
    case "double precision":
      return float8();
    case "bool":
    case "boolean":
      return bool();
    case "bytea":
      return bytea();
    case "record":
      return record();
    case "any":
    case "anyarray":
    case "unknown":
      return dynamic();
  }

  if (TEXT_TYPES.has(type)) return text(type);

  throw new Error(`Unknown type: ${type}`);
}
