// @scale-metadata/codec - SCALE primitives and schema-driven encoding.

export type { DecodeResult } from "./primitives.ts";
export {
  encodeBool,
  decodeBool,
  encodeU8,
  decodeU8,
  encodeU16,
  decodeU16,
  encodeU32,
  decodeU32,
  encodeU64,
  decodeU64,
  encodeU128,
  decodeU128,
  encodeCompact,
  decodeCompact,
  decodeCompactNumber,
  encodeCompactU32,
  decodeCompactU32,
  decodeLength,
  encodeString,
  decodeString,
  encodeBytes,
  decodeBytes,
  decodeFixedBytes,
  concat,
} from "./primitives.ts";
export { toHex, fromHex, compareBytes } from "./binary/bytes.ts";

export type {
  PrimitiveKind,
  VecSchema,
  OptionSchema,
  MapSchema,
  StructSchema,
  TupleSchema,
  FixedBytesSchema,
  EnumVariant,
  EnumSchema,
  UnitEnumSchema,
  SymbolSchema,
  RefSchema,
  Schema,
  SchemaRegistry,
} from "./schema.ts";
export {
  resolveSchema,
  findVariantByDiscriminant,
  findVariantByName,
  getVariantDiscriminant,
  getVariantFieldSchemas,
  getVariantFieldNames,
  isNewtypeVariant,
  isRefSchema,
} from "./schema.ts";

export type { SymbolSink, CodecOptions } from "./schema_codec.ts";
export { encodeWithSchema, decodeWithSchema } from "./schema_codec.ts";

export { ScaleDecodeError, ScaleEncodeError } from "./errors.ts";
