/**
 * Error types reported by the array literal decoder.
 *
 * Data errors (syntax, type, destination, phase) are returned from a decode
 * call. ScannerMisuseError is thrown: it means the calling code is wrong.
 */

/** Base class for every error a decode call can return. */
export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

/** Grammar violation. Aborts the decode call. */
export class ArraySyntaxError extends DecodeError {
  /** Bytes consumed when the error occurred. */
  readonly offset: number;
  /** Offending byte, or null when the input ended early. */
  readonly char: number | null;
  readonly context: string;

  constructor(message: string, offset: number, char: number | null, context: string) {
    super(message);
    this.name = "ArraySyntaxError";
    this.offset = offset;
    this.char = char;
    this.context = context;
  }
}

/**
 * A well-formed literal the destination cannot hold.
 * Recorded; decoding of sibling elements continues.
 */
export class ArrayTypeError extends DecodeError {
  /** Description of the value: "bool", "string", "array", "number 300". */
  readonly value: string;
  /** Type name of the destination. */
  readonly targetType: string;

  constructor(value: string, targetType: string) {
    super(`cannot decode ${value} into value of type ${targetType}`);
    this.name = "ArrayTypeError";
    this.value = value;
    this.targetType = targetType;
  }
}

/** The destination reference or shape is unusable; nothing was decoded. */
export class InvalidDestinationError extends DecodeError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidDestinationError";
  }
}

/**
 * Scanner and decoder disagree about the buffer position.
 * Unreachable unless the decoder has a bug or the input changed mid-call.
 */
export class DecoderPhaseError extends DecodeError {
  constructor(message = "decoder out of sync - data changing underfoot?") {
    super(message);
    this.name = "DecoderPhaseError";
  }
}

/** Programming-contract violation, e.g. a second pending undo. */
export class ScannerMisuseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScannerMisuseError";
  }
}

/** Render a byte for an error message: 'x', '"', '\x0a'. */
export function quoteChar(c: number): string {
  if (c === 0x27) return "'\\''";
  if (c >= 0x20 && c < 0x7f) return `'${String.fromCharCode(c)}'`;
  return `'\\x${c.toString(16).padStart(2, "0")}'`;
}
