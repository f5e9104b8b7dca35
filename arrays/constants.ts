/**
 * Constants for the array literal scanner.
 */

/**
 * Scanner opcodes. Values at or above `End` stop a scan.
 */
export const Op = {
  /** Uninteresting byte. */
  Continue: 0,
  /** First byte of a literal; its end is implied by the next non-Continue result. */
  BeginLiteral: 1,
  BeginArray: 2,
  /** A `,` completed the previous array element. */
  ArrayValue: 3,
  /** A `}` closed the current level (implies ArrayValue when an element was open). */
  EndArray: 4,
  /** Space outside a literal. Last of the "continue" codes. */
  SkipSpace: 5,

  /** Top-level value ended *before* this byte. First of the "stop" codes. */
  End: 6,
  Error: 7,
} as const;

export type Op = (typeof Op)[keyof typeof Op];

export const ScanState = {
  BeginValue: 0,
  /** After `{`: a `}` here closes an empty array. */
  BeginValueOrEmpty: 1,
  EndValue: 2,
  EndTop: 3,
  InString: 4,
  InStringEsc: 5,
  InBare: 6,
  Error: 7,
  /** One-shot state installed by undo. */
  Redo: 8,
} as const;

export type ScanState = (typeof ScanState)[keyof typeof ScanState];

export const Char = {
  SPACE: 0x20,
  QUOTE: 0x22,
  COMMA: 0x2c,
  BACKSLASH: 0x5c,
  OPEN_BRACE: 0x7b,
  CLOSE_BRACE: 0x7d,
  /** Bytes below this are control characters. */
  FIRST_PRINTABLE: 0x20,
  /** Bytes at or above this belong to multi-byte UTF-8 sequences. */
  NON_ASCII: 0x80,
  LOWER_U: 0x75,
} as const;

export const Growth = {
  /** Smallest capacity allocated for a growable sequence. */
  MIN_CAPACITY: 4,
} as const;

export const Unicode = {
  REPLACEMENT_CHAR: 0xfffd,
  SURROGATE_MIN: 0xd800,
  HIGH_SURROGATE_MAX: 0xdbff,
  LOW_SURROGATE_MIN: 0xdc00,
  SURROGATE_MAX: 0xdfff,
} as const;
