export {
  parseArray,
  decodeInto,
  getTarget,
  encodeArrayLiteral,
  encodeArrayLiteralBytes,
  array,
  fixedArray,
  nullable,
  dynamic,
  int2,
  int4,
  int8,
  oid,
  float4,
  float8,
  bool,
  text,
  bytea,
  record,
  createStats,
  DecodeError,
  ArraySyntaxError,
  ArrayTypeError,
  InvalidDestinationError,
  DecoderPhaseError,
  ScannerMisuseError,
  Target,
  type DecodeOptions,
  type DecodeStats,
  type DynamicValue,
  type EncodableValue,
  type Ref,
  type TargetValue,
} from "./arrays/index.ts";
