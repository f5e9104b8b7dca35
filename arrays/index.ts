/**
 * Decoder for the text form of database array literals: `{1,2,3}`,
 * `{{a,b},{c,NULL}}`, `{"quoted \"text\""}`.
 *
 * Decoding is directed by a target describing the destination shape. Use
 * the builders (int4(), array(text()), fixedArray(float8(), 3)) or
 * getTarget() with a type name.
 */

export { ArrayDecoder, growCapacity, parseArray, decodeInto } from "./decoder.ts";
export { type EncodableValue, encodeArrayLiteral, encodeArrayLiteralBytes } from "./encoder.ts";
export {
  ArraySyntaxError,
  ArrayTypeError,
  DecodeError,
  DecoderPhaseError,
  InvalidDestinationError,
  ScannerMisuseError,
} from "./errors.ts";
export { LiteralReader } from "./io.ts";
export { Scanner } from "./scanner.ts";
export { Op } from "./constants.ts";
export {
  type Coerced,
  type Literal,
  type TargetKind,
  type TargetValue,
  DynamicTarget,
  FixedArrayTarget,
  NullableTarget,
  SequenceTarget,
  Target,
  array,
  bool,
  bytea,
  dynamic,
  fixedArray,
  float4,
  float8,
  getTarget,
  int2,
  int4,
  int8,
  nullable,
  oid,
  record,
  text,
} from "./targets.ts";
export {
  createStats,
  type DecodeOptions,
  type DecodeStats,
  type DynamicValue,
  type Ref,
} from "./types.ts";
export { unquote, unquoteBytes } from "./unquote.ts";
