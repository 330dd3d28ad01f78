// Schema-driven encoding/decoding for the SCALE format.
//
// This module provides generic encode/decode functions that use runtime
// schema information to serialize/deserialize values.

import type {
  Schema,
  SchemaRegistry,
  EnumSchema,
  StructSchema,
  TupleSchema,
  VecSchema,
  OptionSchema,
  MapSchema,
  UnitEnumSchema,
  FixedBytesSchema,
} from "./schema.ts";
import {
  resolveSchema,
  findVariantByDiscriminant,
  findVariantByName,
  getVariantDiscriminant,
  getVariantFieldSchemas,
  getVariantFieldNames,
  isNewtypeVariant,
} from "./schema.ts";
import {
  type DecodeResult,
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
  encodeCompactU32,
  decodeCompactU32,
  encodeString,
  decodeString,
  encodeBytes,
  decodeBytes,
  decodeFixedBytes,
  decodeLength,
  encodeCompact,
  concat,
} from "./primitives.ts";
import { compareBytes } from "./binary/bytes.ts";
import { ScaleDecodeError, ScaleEncodeError } from "./errors.ts";

/** Receives every registry symbol the codec reads or writes, with its path. */
export type SymbolSink = (id: number, path: string) => void;

export interface CodecOptions {
  onSymbol?: SymbolSink;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function messageOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Convert schema to a readable string (abbreviated) */
function schemaToString(schema: Schema): string {
  switch (schema.kind) {
    case "enum": {
      const variants = schema.variants.map((v) => v.name).join(" | ");
      return `enum { ${variants} }`;
    }
    case "unit_enum":
      return `enum { ${schema.variants.join(" | ")} }`;
    case "struct": {
      const fields = Object.keys(schema.fields).join(", ");
      return `struct { ${fields} }`;
    }
    case "vec":
      return `vec<${schemaToString(schema.element)}>`;
    case "option":
      return `option<${schemaToString(schema.inner)}>`;
    case "map":
      return `map<${schemaToString(schema.key)}, ${schemaToString(schema.value)}>`;
    case "tuple":
      return `tuple(${schema.elements.length} elements)`;
    case "fixed_bytes":
      return `[u8; ${schema.length}]`;
    case "ref":
      return `ref ${schema.name}`;
    default:
      return schema.kind;
  }
}

// ============================================================================
// Decode Context - tracks path and buffer for error reporting
// ============================================================================

/**
 * Context for decode operations - tracks the path through the schema
 * and provides rich error messages when decoding fails.
 */
class DecodeContext {
  private path: string[] = [];

  constructor(
    public readonly buf: Uint8Array,
    private readonly onSymbol: SymbolSink | undefined,
  ) {}

  /** Push a path segment (entering a field, element, or variant) */
  push(segment: string): void {
    this.path.push(segment);
  }

  /** Pop a path segment (leaving a field, element, or variant) */
  pop(): void {
    this.path.pop();
  }

  /** Get the current path as a string */
  currentPath(): string {
    return this.path.length === 0 ? "<root>" : this.path.join(".");
  }

  symbol(id: number): void {
    this.onSymbol?.(id, this.currentPath());
  }

  /** Create a rich error with context */
  error(reason: string, offset: number, schema: Schema): ScaleDecodeError {
    const details = [
      `Error: ${reason}`,
      `Path: ${this.currentPath()}`,
      `Offset: ${offset} (0x${offset.toString(16)})`,
      `Buffer length: ${this.buf.length}`,
      `Schema: ${schemaToString(schema)}`,
      `Bytes around offset:`,
      this.hexDumpAround(offset, 32),
    ].join("\n  ");

    return new ScaleDecodeError(reason, this.currentPath(), offset, details);
  }

  /** Hex dump of buffer around an offset */
  private hexDumpAround(offset: number, windowSize: number): string {
    const start = Math.max(0, offset - 8);
    const end = Math.min(this.buf.length, offset + windowSize - 8);

    const lines: string[] = [];
    for (let i = start; i < end; i += 16) {
      const lineEnd = Math.min(i + 16, end);
      const bytes: string[] = [];
      const chars: string[] = [];

      for (let j = i; j < lineEnd; j++) {
        const byte = this.buf[j];
        // Highlight the error offset
        if (j === offset) {
          bytes.push(`[${byte.toString(16).padStart(2, "0")}]`);
        } else {
          bytes.push(byte.toString(16).padStart(2, "0"));
        }
        chars.push(byte >= 32 && byte < 127 ? String.fromCharCode(byte) : ".");
      }

      const addr = i.toString(16).padStart(4, "0");
      lines.push(`    ${addr}: ${bytes.join(" ").padEnd(52)} ${chars.join("")}`);
    }

    return lines.join("\n");
  }
}

// ============================================================================
// Encode Context
// ============================================================================

class EncodeContext {
  private path: string[] = [];

  constructor(private readonly onSymbol: SymbolSink | undefined) {}

  push(segment: string): void {
    this.path.push(segment);
  }

  pop(): void {
    this.path.pop();
  }

  currentPath(): string {
    return this.path.length === 0 ? "<root>" : this.path.join(".");
  }

  symbol(id: number): void {
    this.onSymbol?.(id, this.currentPath());
  }

  error(reason: string): ScaleEncodeError {
    return new ScaleEncodeError(reason, this.currentPath());
  }
}

// ============================================================================
// Schema-driven Encoding
// ============================================================================

/**
 * Encode a value according to its schema.
 *
 * @param value - The value to encode
 * @param schema - Schema describing the value's type
 * @param registry - Optional registry for resolving named refs
 * @param options - Optional symbol sink
 * @throws ScaleEncodeError when the value does not fit the schema
 */
export function encodeWithSchema(
  value: unknown,
  schema: Schema,
  registry?: SchemaRegistry,
  options: CodecOptions = {},
): Uint8Array {
  return encodeImpl(value, schema, registry, new EncodeContext(options.onSymbol));
}

function encodeImpl(
  value: unknown,
  schema: Schema,
  registry: SchemaRegistry | undefined,
  ctx: EncodeContext,
): Uint8Array {
  try {
    if (schema.kind === "ref" && !registry) {
      throw new Error(`Unresolved ref: ${schema.name} - provide a registry`);
    }
    const resolved = registry ? resolveSchema(schema, registry) : schema;

    switch (resolved.kind) {
      // Primitives
      case "bool":
        if (typeof value !== "boolean") throw ctx.error(`expected boolean, got ${typeof value}`);
        return encodeBool(value);
      case "u8":
      case "u16":
      case "u32":
      case "compact": {
        if (typeof value !== "number") throw ctx.error(`expected number, got ${typeof value}`);
        if (resolved.kind === "u8") return encodeU8(value);
        if (resolved.kind === "u16") return encodeU16(value);
        if (resolved.kind === "u32") return encodeU32(value);
        return encodeCompactU32(value);
      }
      case "u64":
      case "u128":
        if (typeof value !== "bigint") throw ctx.error(`expected bigint, got ${typeof value}`);
        return resolved.kind === "u64" ? encodeU64(value) : encodeU128(value);
      case "string":
        if (typeof value !== "string") throw ctx.error(`expected string, got ${typeof value}`);
        return encodeString(value);
      case "bytes":
        if (!(value instanceof Uint8Array)) throw ctx.error("expected Uint8Array");
        return encodeBytes(value);
      case "fixed_bytes":
        return encodeFixedBytes(value, resolved, ctx);
      case "symbol":
        if (typeof value !== "number") throw ctx.error(`expected type id, got ${value === null ? "null" : typeof value}`);
        ctx.symbol(value);
        return encodeCompactU32(value);

      // Containers
      case "vec":
        return encodeVecWithSchema(value, resolved, registry, ctx);
      case "option":
        return encodeOptionWithSchema(value, resolved, registry, ctx);
      case "map":
        return encodeMapWithSchema(value, resolved, registry, ctx);

      // Composites
      case "struct":
        return encodeStructWithSchema(value, resolved, registry, ctx);
      case "tuple":
        return encodeTupleWithSchema(value, resolved, registry, ctx);
      case "enum":
        return encodeEnumWithSchema(value, resolved, registry, ctx);
      case "unit_enum":
        return encodeUnitEnum(value, resolved, ctx);

      // Ref should have been resolved above
      case "ref":
        throw new Error(`Unresolved ref: ${resolved.name}`);
    }
  } catch (e) {
    if (e instanceof ScaleEncodeError) throw e;
    throw ctx.error(messageOf(e));
  }
}

function encodeFixedBytes(
  value: unknown,
  schema: FixedBytesSchema,
  ctx: EncodeContext,
): Uint8Array {
  if (!(value instanceof Uint8Array)) throw ctx.error("expected Uint8Array");
  if (value.length !== schema.length) {
    throw ctx.error(`expected ${schema.length} bytes, got ${value.length}`);
  }
  return value.slice();
}

function encodeVecWithSchema(
  value: unknown,
  schema: VecSchema,
  registry: SchemaRegistry | undefined,
  ctx: EncodeContext,
): Uint8Array {
  if (!Array.isArray(value)) throw ctx.error("expected array");
  const parts: Uint8Array[] = [encodeCompact(value.length)];
  value.forEach((item, i) => {
    ctx.push(`[${i}]`);
    parts.push(encodeImpl(item, schema.element, registry, ctx));
    ctx.pop();
  });
  return concat(...parts);
}

function encodeOptionWithSchema(
  value: unknown,
  schema: OptionSchema,
  registry: SchemaRegistry | undefined,
  ctx: EncodeContext,
): Uint8Array {
  if (value === null || value === undefined) {
    return Uint8Array.of(0);
  }
  ctx.push("Some");
  const inner = encodeImpl(value, schema.inner, registry, ctx);
  ctx.pop();
  return concat(Uint8Array.of(1), inner);
}

function toOrderedKey(key: unknown): bigint | string | null {
  if (typeof key === "number" && Number.isInteger(key)) return BigInt(key);
  if (typeof key === "bigint" || typeof key === "string") return key;
  return null;
}

/** BTreeMap order: numeric for integer keys, UTF-8 byte order for strings. */
function compareMapKeys(
  a: { key: unknown; bytes: Uint8Array },
  b: { key: unknown; bytes: Uint8Array },
): number {
  const ka = toOrderedKey(a.key);
  const kb = toOrderedKey(b.key);
  if (typeof ka === "bigint" && typeof kb === "bigint") {
    return ka < kb ? -1 : ka > kb ? 1 : 0;
  }
  if (typeof ka === "string" && typeof kb === "string") {
    const encoder = new TextEncoder();
    return compareBytes(encoder.encode(ka), encoder.encode(kb));
  }
  return compareBytes(a.bytes, b.bytes);
}

function encodeMapWithSchema(
  value: unknown,
  schema: MapSchema,
  registry: SchemaRegistry | undefined,
  ctx: EncodeContext,
): Uint8Array {
  if (!(value instanceof Map)) throw ctx.error("expected Map");
  const entries: Array<{ key: unknown; bytes: Uint8Array; value: Uint8Array }> = [];
  let i = 0;
  for (const [k, v] of value) {
    ctx.push(`{key ${i}}`);
    const bytes = encodeImpl(k, schema.key, registry, ctx);
    ctx.pop();
    ctx.push(`{value ${i}}`);
    const encodedValue = encodeImpl(v, schema.value, registry, ctx);
    ctx.pop();
    entries.push({ key: k, bytes, value: encodedValue });
    i++;
  }
  entries.sort(compareMapKeys);

  const parts: Uint8Array[] = [encodeCompact(entries.length)];
  for (const entry of entries) {
    parts.push(entry.bytes, entry.value);
  }
  return concat(...parts);
}

function encodeStructWithSchema(
  value: unknown,
  schema: StructSchema,
  registry: SchemaRegistry | undefined,
  ctx: EncodeContext,
): Uint8Array {
  if (!isRecord(value)) throw ctx.error("expected object");
  const parts: Uint8Array[] = [];
  // Encode fields in schema order (Object.entries preserves insertion order)
  for (const [fieldName, fieldSchema] of Object.entries(schema.fields)) {
    ctx.push(fieldName);
    parts.push(encodeImpl(value[fieldName], fieldSchema, registry, ctx));
    ctx.pop();
  }
  return concat(...parts);
}

function encodeTupleWithSchema(
  value: unknown,
  schema: TupleSchema,
  registry: SchemaRegistry | undefined,
  ctx: EncodeContext,
): Uint8Array {
  if (!Array.isArray(value)) throw ctx.error("expected array");
  if (value.length !== schema.elements.length) {
    throw ctx.error(
      `Tuple length mismatch: got ${value.length}, expected ${schema.elements.length}`,
    );
  }
  const parts: Uint8Array[] = [];
  for (let i = 0; i < value.length; i++) {
    ctx.push(`${i}`);
    parts.push(encodeImpl(value[i], schema.elements[i], registry, ctx));
    ctx.pop();
  }
  return concat(...parts);
}

function encodeEnumWithSchema(
  value: unknown,
  schema: EnumSchema,
  registry: SchemaRegistry | undefined,
  ctx: EncodeContext,
): Uint8Array {
  if (!isRecord(value) || typeof value.tag !== "string") {
    throw ctx.error("expected tagged object");
  }
  const variant = findVariantByName(schema, value.tag);
  if (!variant) {
    throw ctx.error(`Unknown variant: ${value.tag}`);
  }

  const parts: Uint8Array[] = [encodeU8(getVariantDiscriminant(schema, variant))];

  // Encode variant fields
  const fieldSchemas = getVariantFieldSchemas(variant);
  const fieldNames = getVariantFieldNames(variant);

  ctx.push(variant.name);
  if (fieldSchemas.length === 0) {
    // Unit variant - no fields
  } else if (isNewtypeVariant(variant)) {
    // Newtype variant - value is in `value` field
    parts.push(encodeImpl(value.value, fieldSchemas[0], registry, ctx));
  } else if (fieldNames === null) {
    // Tuple variant - values are indexed (0, 1, 2, ...)
    for (let i = 0; i < fieldSchemas.length; i++) {
      parts.push(encodeImpl(value[i.toString()], fieldSchemas[i], registry, ctx));
    }
  } else {
    // Struct variant - values are by field name
    for (let i = 0; i < fieldNames.length; i++) {
      ctx.push(fieldNames[i]);
      parts.push(encodeImpl(value[fieldNames[i]], fieldSchemas[i], registry, ctx));
      ctx.pop();
    }
  }
  ctx.pop();

  return concat(...parts);
}

function encodeUnitEnum(value: unknown, schema: UnitEnumSchema, ctx: EncodeContext): Uint8Array {
  const index = typeof value === "string" ? schema.variants.indexOf(value) : -1;
  if (index === -1) {
    throw ctx.error(`Unknown variant: ${String(value)} (valid: ${schema.variants.join(", ")})`);
  }
  return encodeU8(index);
}

// ============================================================================
// Schema-driven Decoding
// ============================================================================

/**
 * Decode a value according to its schema.
 *
 * @param buf - Buffer to decode from
 * @param offset - Starting offset in buffer
 * @param schema - Schema describing the expected type
 * @param registry - Optional registry for resolving named refs
 * @param options - Optional symbol sink
 * @returns Decoded value and next offset
 * @throws ScaleDecodeError on any structural failure
 */
export function decodeWithSchema(
  buf: Uint8Array,
  offset: number,
  schema: Schema,
  registry?: SchemaRegistry,
  options: CodecOptions = {},
): DecodeResult<unknown> {
  const ctx = new DecodeContext(buf, options.onSymbol);
  return decodeWithSchemaImpl(buf, offset, schema, registry, ctx);
}

function decodeWithSchemaImpl(
  buf: Uint8Array,
  offset: number,
  schema: Schema,
  registry: SchemaRegistry | undefined,
  ctx: DecodeContext,
): DecodeResult<unknown> {
  let resolved = schema;

  try {
    if (schema.kind === "ref" && !registry) {
      throw new Error(`Unresolved ref: ${schema.name} - provide a registry`);
    }
    resolved = registry ? resolveSchema(schema, registry) : schema;

    switch (resolved.kind) {
      // Primitives
      case "bool":
        return decodeBool(buf, offset);
      case "u8":
        return decodeU8(buf, offset);
      case "u16":
        return decodeU16(buf, offset);
      case "u32":
        return decodeU32(buf, offset);
      case "u64":
        return decodeU64(buf, offset);
      case "u128":
        return decodeU128(buf, offset);
      case "compact":
        return decodeCompactU32(buf, offset);
      case "string":
        return decodeString(buf, offset);
      case "bytes":
        return decodeBytes(buf, offset);
      case "fixed_bytes":
        return decodeFixedBytes(buf, offset, resolved.length);
      case "symbol": {
        const id = decodeCompactU32(buf, offset);
        ctx.symbol(id.value);
        return id;
      }

      // Containers
      case "vec":
        return decodeVecWithSchemaImpl(buf, offset, resolved, registry, ctx);
      case "option":
        return decodeOptionWithSchemaImpl(buf, offset, resolved, registry, ctx);
      case "map":
        return decodeMapWithSchemaImpl(buf, offset, resolved, registry, ctx);

      // Composites
      case "struct":
        return decodeStructWithSchemaImpl(buf, offset, resolved, registry, ctx);
      case "tuple":
        return decodeTupleWithSchemaImpl(buf, offset, resolved, registry, ctx);
      case "enum":
        return decodeEnumWithSchemaImpl(buf, offset, resolved, registry, ctx);
      case "unit_enum":
        return decodeUnitEnumImpl(buf, offset, resolved, ctx);

      // Ref should have been resolved above
      case "ref":
        throw new Error(`Unresolved ref: ${resolved.name}`);
    }
  } catch (e) {
    // If it's already a decode error with context, re-throw
    if (e instanceof ScaleDecodeError) {
      throw e;
    }
    // Otherwise wrap it with context
    throw ctx.error(messageOf(e), offset, resolved);
  }
}

/**
 * Elements are assumed to take at least one byte each, so a length prefix
 * larger than the remaining input is rejected before any element is read.
 */
function decodeVecWithSchemaImpl(
  buf: Uint8Array,
  offset: number,
  schema: VecSchema,
  registry: SchemaRegistry | undefined,
  ctx: DecodeContext,
): DecodeResult<unknown[]> {
  const len = decodeLength(buf, offset, "vec");
  let pos = len.next;
  const items: unknown[] = [];
  for (let i = 0; i < len.value; i++) {
    ctx.push(`[${i}]`);
    const item = decodeWithSchemaImpl(buf, pos, schema.element, registry, ctx);
    items.push(item.value);
    pos = item.next;
    ctx.pop();
  }
  return { value: items, next: pos };
}

function decodeOptionWithSchemaImpl(
  buf: Uint8Array,
  offset: number,
  schema: OptionSchema,
  registry: SchemaRegistry | undefined,
  ctx: DecodeContext,
): DecodeResult<unknown> {
  if (offset >= buf.length) {
    throw ctx.error("unexpected end of buffer reading option discriminant", offset, schema);
  }
  const variant = buf[offset];
  if (variant === 0) {
    return { value: null, next: offset + 1 };
  } else if (variant === 1) {
    ctx.push("Some");
    const inner = decodeWithSchemaImpl(buf, offset + 1, schema.inner, registry, ctx);
    ctx.pop();
    return { value: inner.value, next: inner.next };
  } else {
    throw ctx.error(`invalid option discriminant: ${variant} (expected 0 or 1)`, offset, schema);
  }
}

function decodeMapWithSchemaImpl(
  buf: Uint8Array,
  offset: number,
  schema: MapSchema,
  registry: SchemaRegistry | undefined,
  ctx: DecodeContext,
): DecodeResult<Map<unknown, unknown>> {
  const len = decodeLength(buf, offset, "map");
  let pos = len.next;
  const map = new Map<unknown, unknown>();
  for (let i = 0; i < len.value; i++) {
    ctx.push(`{key ${i}}`);
    const k = decodeWithSchemaImpl(buf, pos, schema.key, registry, ctx);
    if (map.has(k.value)) {
      throw ctx.error(`duplicate map key: ${String(k.value)}`, pos, schema.key);
    }
    ctx.pop();
    ctx.push(`{value ${i}}`);
    const v = decodeWithSchemaImpl(buf, k.next, schema.value, registry, ctx);
    ctx.pop();
    map.set(k.value, v.value);
    pos = v.next;
  }
  return { value: map, next: pos };
}

function decodeStructWithSchemaImpl(
  buf: Uint8Array,
  offset: number,
  schema: StructSchema,
  registry: SchemaRegistry | undefined,
  ctx: DecodeContext,
): DecodeResult<Record<string, unknown>> {
  const obj: Record<string, unknown> = {};
  let pos = offset;
  for (const [fieldName, fieldSchema] of Object.entries(schema.fields)) {
    ctx.push(fieldName);
    const field = decodeWithSchemaImpl(buf, pos, fieldSchema, registry, ctx);
    obj[fieldName] = field.value;
    pos = field.next;
    ctx.pop();
  }
  return { value: obj, next: pos };
}

function decodeTupleWithSchemaImpl(
  buf: Uint8Array,
  offset: number,
  schema: TupleSchema,
  registry: SchemaRegistry | undefined,
  ctx: DecodeContext,
): DecodeResult<unknown[]> {
  const values: unknown[] = [];
  let pos = offset;
  for (let i = 0; i < schema.elements.length; i++) {
    ctx.push(`${i}`);
    const element = decodeWithSchemaImpl(buf, pos, schema.elements[i], registry, ctx);
    values.push(element.value);
    pos = element.next;
    ctx.pop();
  }
  return { value: values, next: pos };
}

function decodeEnumWithSchemaImpl(
  buf: Uint8Array,
  offset: number,
  schema: EnumSchema,
  registry: SchemaRegistry | undefined,
  ctx: DecodeContext,
): DecodeResult<{ tag: string; [key: string]: unknown }> {
  const disc = decodeU8(buf, offset);
  const variant = findVariantByDiscriminant(schema, disc.value);
  if (!variant) {
    const validVariants = schema.variants
      .map((v, i) => `${v.discriminant ?? i}=${v.name}`)
      .join(", ");
    throw ctx.error(
      `unknown enum discriminant: ${disc.value} (valid: ${validVariants})`,
      offset,
      schema,
    );
  }

  ctx.push(variant.name);
  let pos = disc.next;
  const result: { tag: string; [key: string]: unknown } = { tag: variant.name };

  // Decode variant fields
  const fieldSchemas = getVariantFieldSchemas(variant);
  const fieldNames = getVariantFieldNames(variant);

  if (fieldSchemas.length === 0) {
    // Unit variant - no fields
  } else if (isNewtypeVariant(variant)) {
    // Newtype variant - store in `value` field
    ctx.push("value");
    const field = decodeWithSchemaImpl(buf, pos, fieldSchemas[0], registry, ctx);
    result.value = field.value;
    pos = field.next;
    ctx.pop();
  } else if (fieldNames === null) {
    // Tuple variant - store indexed (0, 1, 2, ...)
    for (let i = 0; i < fieldSchemas.length; i++) {
      ctx.push(`${i}`);
      const field = decodeWithSchemaImpl(buf, pos, fieldSchemas[i], registry, ctx);
      result[i.toString()] = field.value;
      pos = field.next;
      ctx.pop();
    }
  } else {
    // Struct variant - store by field name
    for (let i = 0; i < fieldNames.length; i++) {
      ctx.push(fieldNames[i]);
      const field = decodeWithSchemaImpl(buf, pos, fieldSchemas[i], registry, ctx);
      result[fieldNames[i]] = field.value;
      pos = field.next;
      ctx.pop();
    }
  }

  ctx.pop();
  return { value: result, next: pos };
}

function decodeUnitEnumImpl(
  buf: Uint8Array,
  offset: number,
  schema: UnitEnumSchema,
  ctx: DecodeContext,
): DecodeResult<string> {
  const disc = decodeU8(buf, offset);
  const name = schema.variants[disc.value];
  if (name === undefined) {
    throw ctx.error(
      `unknown enum discriminant: ${disc.value} (valid: 0..${schema.variants.length - 1})`,
      offset,
      schema,
    );
  }
  return { value: name, next: disc.next };
}
