/**
 * Type-directed decoding of array literals.
 *
 * The decoder drives a Scanner over the input and writes into a destination
 * whose shape is described by a Target. Syntax and phase errors stop the
 * decode and are returned up through every call. Type errors are recorded
 * (the first one is reported) and decoding of the remaining elements
 * continues, so the destination ends in a best-effort state.
 */

import { Char, Growth, Op } from "./constants.ts";
import {
  ArraySyntaxError,
  ArrayTypeError,
  type DecodeError,
  DecoderPhaseError,
  InvalidDestinationError,
} from "./errors.ts";
import { LiteralReader } from "./io.ts";
import {
  DynamicTarget,
  FixedArrayTarget,
  type Literal,
  NullableTarget,
  SequenceTarget,
  Target,
} from "./targets.ts";
import {
  createStats,
  type DecodeOptions,
  type DecodeStats,
  type Ref,
  TEXT_DECODER,
  TEXT_ENCODER,
} from "./types.ts";
import { unquoteBytes } from "./unquote.ts";

/** Errors that abort a decode call. */
type Fatal = ArraySyntaxError | DecoderPhaseError;

const NULL_REGEX = /^null$/i;

// Arrays inside a dynamic value decode as sequences of dynamic values.
const DYNAMIC_SEQUENCE = new SequenceTarget(new DynamicTarget());
// Zero-length fixed array: every element is scanned and dropped.
const DISCARD_ARRAY = new FixedArrayTarget(new DynamicTarget(), 0);

/** Replace holes in a caller-supplied array with element zero values. */
function fillHoles(items: unknown[], element: Target<unknown>): void {
  for (let k = 0; k < items.length; k++) {
    if (items[k] === undefined) items[k] = element.zeroValue();
  }
}

function elementRef(items: unknown[], index: number): Ref<unknown> {
  return {
    get value() {
      return items[index];
    },
    set value(v: unknown) {
      items[index] = v;
    },
  };
}

/** Capacity after growing a sequence of capacity `cap`: 1.5x, at least 4. */
export function growCapacity(cap: number): number {
  return Math.max(cap + (cap >> 1), Growth.MIN_CAPACITY);
}

/** Decodes one top-level literal. Create one per call. */
export class ArrayDecoder {
  private reader: LiteralReader;
  private savedError: ArrayTypeError | null = null;
  private debug: boolean;
  readonly stats: DecodeStats;

  constructor(data: Uint8Array, options: DecodeOptions = {}) {
    this.reader = new LiteralReader(data);
    this.debug = options.debug ?? false;
    this.stats = options.stats ?? createStats();
  }

  private log(...args: unknown[]) {
    if (this.debug) {
      console.log("[ArrayDecoder]", ...args);
    }
  }

  /** Decode the whole input into `ref`. Returns the first error, if any. */
  decode(target: Target<unknown>, ref: Ref<unknown>): DecodeError | null {
    const err = this.value(ref, target) ?? this.trailing();
    if (err !== null) {
      this.log(`${err.name} at offset ${this.reader.offset}: ${err.message}`);
      return err;
    }
    return this.savedError;
  }

  private saveError(err: ArrayTypeError): void {
    this.stats.typeErrors++;
    this.log(`type error at offset ${this.reader.offset}: ${err.message}`);
    if (this.savedError === null) {
      this.savedError = err;
    }
  }

  private syntaxError(): Fatal {
    return this.reader.scanner.error ?? new DecoderPhaseError();
  }

  /** Only spaces may follow the top-level value. */
  private trailing(): Fatal | null {
    while (!this.reader.atEnd) {
      if (this.reader.next() === Op.Error) return this.syntaxError();
    }
    return null;
  }

  /** Decode the next value (array or literal) into `ref`. */
  private value(ref: Ref<unknown>, target: Target<unknown>): Fatal | null {
    switch (this.reader.scanWhile(Op.SkipSpace)) {
      case Op.BeginArray:
        return this.array(ref, target);
      case Op.BeginLiteral:
        return this.literal(ref, target);
      case Op.Error:
        return this.syntaxError();
      default:
        return new DecoderPhaseError();
    }
  }

  /** Consume the next value without storing it. */
  private skip(): Fatal | null {
    switch (this.reader.scanWhile(Op.SkipSpace)) {
      case Op.BeginArray:
        return this.fixed({ value: [] }, DISCARD_ARRAY);
      case Op.BeginLiteral: {
        const start = this.reader.offset - 1;
        const raw = this.literalBytes();
        if (!(raw instanceof Uint8Array)) return raw;
        // dropped, but a malformed quoted literal is still a syntax error
        const lit = this.classify(raw, start);
        return lit instanceof ArraySyntaxError ? lit : null;
      }
      case Op.Error:
        return this.syntaxError();
      default:
        return new DecoderPhaseError();
    }
  }

  /** Array body after its `{`. */
  private array(ref: Ref<unknown>, target: Target<unknown>): Fatal | null {
    if (target instanceof NullableTarget) {
      const inner: Ref<unknown> = {
        value: ref.value === null ? target.inner.zeroValue() : ref.value,
      };
      ref.value = inner.value;
      const err = this.array(inner, target.inner);
      ref.value = inner.value;
      return err;
    }
    if (target instanceof SequenceTarget) {
      return this.sequence(ref, target);
    }
    if (target instanceof FixedArrayTarget) {
      return this.fixed(ref, target);
    }
    if (target instanceof DynamicTarget) {
      // always a fresh tree, never reused
      const tree: Ref<unknown> = { value: [] };
      const err = this.sequence(tree, DYNAMIC_SEQUENCE);
      ref.value = tree.value;
      return err;
    }

    this.saveError(new ArrayTypeError("array", target.type));
    return this.fixed({ value: [] }, DISCARD_ARRAY);
  }

  /**
   * Look ahead for the `}` of an empty array, or put the byte back for the
   * element decode. Returns true at the end of the array.
   */
  private beginElement(): boolean | Fatal {
    const op = this.reader.scanWhile(Op.SkipSpace);
    if (op === Op.EndArray) return true;
    if (op === Op.Error) return this.syntaxError();
    this.reader.unread(op);
    return false;
  }

  /** After an element the next token must be `,` or `}`. Returns true at `}`. */
  private endElement(): boolean | Fatal {
    const op = this.reader.scanWhile(Op.SkipSpace);
    if (op === Op.EndArray) return true;
    if (op === Op.ArrayValue) return false;
    if (op === Op.Error) return this.syntaxError();
    return new DecoderPhaseError();
  }

  private sequence(ref: Ref<unknown>, target: SequenceTarget<unknown>): Fatal | null {
    const current = ref.value;
    let items: unknown[] = Array.isArray(current) ? current : [];
    fillHoles(items, target.element);
    let capacity = items.length;
    let i = 0;

    for (;;) {
      const done = this.beginElement();
      if (done === true) break;
      if (done !== false) return done;

      if (i >= capacity) {
        const grown = new Array<unknown>(growCapacity(capacity));
        for (let k = 0; k < i; k++) grown[k] = items[k];
        for (let k = i; k < grown.length; k++) grown[k] = target.element.zeroValue();
        this.log(`grow ${target.type}: ${capacity} -> ${grown.length}`);
        items = grown;
        capacity = grown.length;
        ref.value = items;
        this.stats.reallocations++;
        this.stats.peakCapacity = Math.max(this.stats.peakCapacity, capacity);
      }

      this.stats.elements++;
      const err = this.value(elementRef(items, i), target.element);
      if (err !== null) return err;
      i++;

      const end = this.endElement();
      if (end === true) break;
      if (end !== false) return end;
    }

    if (i === 0) {
      ref.value = [];
    } else {
      items.length = i;
      ref.value = items;
    }
    return null;
  }

  private fixed(ref: Ref<unknown>, target: FixedArrayTarget<unknown>): Fatal | null {
    const current = ref.value;
    const items: unknown[] =
      Array.isArray(current) && current.length === target.length ? current : target.zeroValue();
    fillHoles(items, target.element);
    ref.value = items;
    let i = 0;

    for (;;) {
      const done = this.beginElement();
      if (done === true) break;
      if (done !== false) return done;

      this.stats.elements++;
      // past the fixed length: scan and drop
      const err = i < target.length ? this.value(elementRef(items, i), target.element) : this.skip();
      if (err !== null) return err;
      i++;

      const end = this.endElement();
      if (end === true) break;
      if (end !== false) return end;
    }

    for (; i < target.length; i++) {
      items[i] = target.element.zeroValue();
    }
    return null;
  }

  /**
   * Bytes of the literal whose first byte was just read. The scan reads one
   * byte past the literal, which is put back for the caller.
   */
  private literalBytes(): Uint8Array | Fatal {
    const start = this.reader.offset - 1;
    const op = this.reader.scanWhile(Op.Continue);
    if (op === Op.Error) return this.syntaxError();
    this.reader.unread(op);
    return this.reader.slice(start, this.reader.offset);
  }

  private literal(ref: Ref<unknown>, target: Target<unknown>): Fatal | null {
    const start = this.reader.offset - 1;
    const raw = this.literalBytes();
    if (!(raw instanceof Uint8Array)) return raw;

    const lit = this.classify(raw, start);
    if (lit instanceof ArraySyntaxError) return lit;

    const coerced = target.coerce(lit);
    if (coerced instanceof ArrayTypeError) {
      this.saveError(coerced);
    } else if (coerced !== undefined) {
      ref.value = coerced.value;
    }
    return null;
  }

  private classify(raw: Uint8Array, start: number): Literal | ArraySyntaxError {
    if (raw[0] === Char.QUOTE) {
      const bytes = unquoteBytes(raw);
      if (bytes === null) {
        return new ArraySyntaxError("malformed quoted literal", start, Char.QUOTE, "in string literal");
      }
      return { kind: "quoted", bytes };
    }
    const text = TEXT_DECODER.decode(raw);
    if (NULL_REGEX.test(text)) return { kind: "null" };
    if (text === "t" || text === "f") return { kind: "bool", value: text === "t" };
    return { kind: "bare", text };
  }
}

function describeDestination(ref: unknown): string {
  if (ref === null) return "null";
  return typeof ref;
}

/**
 * Decode one array (or scalar) literal into `ref.value`, shaped by `target`.
 *
 * Returns null on success, otherwise the first error. After an error the
 * destination may be partially populated.
 *
 * @example
 * const ref: Ref<number[]> = { value: [] };
 * const err = decodeInto("{1,2,3}", array(int4()), ref);
 */
export function decodeInto<T>(
  data: Uint8Array | string,
  target: Target<T>,
  ref: Ref<T>,
  options?: DecodeOptions,
): DecodeError | null {
  if (ref === null || typeof ref !== "object") {
    return new InvalidDestinationError(`decodeInto(non-reference ${describeDestination(ref)})`);
  }
  if (Object.isFrozen(ref)) {
    return new InvalidDestinationError("decodeInto(frozen reference)");
  }
  if (!(target instanceof Target)) {
    return new InvalidDestinationError("decodeInto(unsupported destination shape)");
  }
  const bytes = typeof data === "string" ? TEXT_ENCODER.encode(data) : data;
  return new ArrayDecoder(bytes, options).decode(target, ref);
}

/**
 * Decode a literal into a fresh value of `target`'s type.
 * Throws the decode error.
 */
export function parseArray<T>(input: Uint8Array | string, target: Target<T>, options?: DecodeOptions): T {
  const ref: Ref<T> = { value: target.zeroValue() };
  const err = decodeInto(input, target, ref, options);
  if (err !== null) throw err;
  return ref.value;
}
