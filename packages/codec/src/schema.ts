// Schema types for runtime type description and encoding/decoding.
//
// This module provides schema types that describe the structure of values
// for schema-driven SCALE serialization. It supports:
// - Primitive types (bool, fixed-width unsigned integers, compact, string, bytes)
// - Container types (vec, option, map)
// - Composite types (struct, enum, tuple, fixed byte arrays)
// - Registry symbols (compact type handles reported to the caller)
// - Named references (ref) for deduplication

// ============================================================================
// Primitive Schema Kinds
// ============================================================================

/**
 * Primitive types that map directly to SCALE encoding.
 *
 * `compact` is `Compact<u32>`; `bytes` is `Vec<u8>`.
 */
export type PrimitiveKind =
  | "bool"
  | "u8"
  | "u16"
  | "u32"
  | "u64"
  | "u128"
  | "compact"
  | "string"
  | "bytes";

// ============================================================================
// Container Schemas
// ============================================================================

/** Schema for Vec<T>. */
export interface VecSchema {
  kind: "vec";
  element: Schema;
}

/** Schema for Option<T>. Absent values are `null`. */
export interface OptionSchema {
  kind: "option";
  inner: Schema;
}

/** Schema for BTreeMap<K, V>, decoded into a JS `Map`. */
export interface MapSchema {
  kind: "map";
  key: Schema;
  value: Schema;
}

// ============================================================================
// Composite Schemas
// ============================================================================

/** Schema for a struct with named fields. */
export interface StructSchema {
  kind: "struct";
  /** Fields in declaration order. Order is significant for encoding! */
  fields: Record<string, Schema>;
}

/**
 * Schema for fixed-size tuples.
 *
 * SCALE encodes tuples by concatenating elements in order (no length prefix).
 */
export interface TupleSchema {
  kind: "tuple";
  elements: Schema[];
}

/** Schema for `[u8; N]`: exactly `length` raw bytes. */
export interface FixedBytesSchema {
  kind: "fixed_bytes";
  length: number;
}

/**
 * A variant in an enum.
 */
export interface EnumVariant {
  /** Variant name, stored in the decoded value's `tag`. */
  name: string;

  /**
   * Wire discriminant (a single byte).
   * If omitted, defaults to the variant's index in the variants array.
   */
  discriminant?: number;

  /**
   * Variant fields. Can be:
   * - null/undefined: unit variant (no fields)
   * - Schema: newtype variant (single unnamed field, stored under `value`)
   * - Schema[]: tuple variant (multiple unnamed fields)
   * - Record<string, Schema>: struct variant (named fields, encoded in key order)
   */
  fields?: null | Schema | Schema[] | Record<string, Schema>;
}

/**
 * Enum schema with variants.
 *
 * The discriminant is one byte, followed by the variant fields.
 */
export interface EnumSchema {
  kind: "enum";
  /** Variants in declaration order. */
  variants: EnumVariant[];
}

/**
 * Fieldless enum decoded to its variant name.
 *
 * The discriminant is the name's position in `variants`.
 */
export interface UnitEnumSchema {
  kind: "unit_enum";
  variants: readonly string[];
}

// ============================================================================
// Symbol Schema
// ============================================================================

/**
 * Handle into an external type registry, encoded as `Compact<u32>`.
 *
 * The codec does not interpret symbols; it reports every one it reads or
 * writes to the caller's symbol sink so the caller can check that the
 * registry defines them.
 */
export interface SymbolSchema {
  kind: "symbol";
}

// ============================================================================
// Reference Schema
// ============================================================================

/**
 * Reference to a named schema defined in a `SchemaRegistry`.
 *
 * Used for deduplication: a struct shared by several parents is declared
 * once and referred to by name.
 */
export interface RefSchema {
  kind: "ref";
  /** Schema name to look up in the schema registry. */
  name: string;
}

// ============================================================================
// Union Type
// ============================================================================

/** Union of all schema types. */
export type Schema =
  | { kind: PrimitiveKind }
  | VecSchema
  | OptionSchema
  | MapSchema
  | StructSchema
  | TupleSchema
  | FixedBytesSchema
  | EnumSchema
  | UnitEnumSchema
  | SymbolSchema
  | RefSchema;

// ============================================================================
// Schema Registry
// ============================================================================

/**
 * Registry of named schemas.
 *
 * Maps schema names to their schemas. Used to resolve RefSchema references.
 */
export type SchemaRegistry = ReadonlyMap<string, Schema>;

/**
 * Resolve a schema, following refs to get the actual schema.
 *
 * @throws Error if ref points to unknown type
 */
export function resolveSchema(schema: Schema, registry: SchemaRegistry): Schema {
  if (schema.kind === "ref") {
    const resolved = registry.get(schema.name);
    if (!resolved) {
      throw new Error(`Unknown type ref: ${schema.name}`);
    }
    // Don't recursively resolve - the resolved schema may itself contain refs
    // that should only be resolved when actually encoding/decoding those fields
    return resolved;
  }
  return schema;
}

// ============================================================================
// Enum Helper Functions
// ============================================================================

/**
 * Find a variant by discriminant value (for decoding).
 *
 * @returns The variant, or undefined if not found
 */
export function findVariantByDiscriminant(
  schema: EnumSchema,
  discriminant: number,
): EnumVariant | undefined {
  return schema.variants.find((v, index) => (v.discriminant ?? index) === discriminant);
}

/**
 * Find a variant by name (for encoding).
 *
 * @param name - The variant name (from the `tag` field)
 */
export function findVariantByName(schema: EnumSchema, name: string): EnumVariant | undefined {
  return schema.variants.find((v) => v.name === name);
}

/**
 * Get the discriminant for a variant (explicit or index-based).
 */
export function getVariantDiscriminant(schema: EnumSchema, variant: EnumVariant): number {
  if (variant.discriminant !== undefined) {
    return variant.discriminant;
  }
  const index = schema.variants.indexOf(variant);
  if (index === -1) {
    throw new Error(`Variant "${variant.name}" not found in schema`);
  }
  return index;
}

function isSchema(fields: Schema | Schema[] | Record<string, Schema>): fields is Schema {
  return !Array.isArray(fields) && typeof fields.kind === "string";
}

/**
 * Get the field schemas for a variant as an ordered array.
 */
export function getVariantFieldSchemas(variant: EnumVariant): Schema[] {
  if (variant.fields === null || variant.fields === undefined) {
    // Unit variant
    return [];
  }
  if (isSchema(variant.fields)) {
    // Newtype variant - single schema
    return [variant.fields];
  }
  if (Array.isArray(variant.fields)) {
    // Tuple variant
    return variant.fields;
  }
  // Struct variant - return schemas in key order
  return Object.values(variant.fields);
}

/**
 * Get the field names for a struct variant (for decoding into object).
 *
 * @returns Array of field names, or null if not a struct variant
 */
export function getVariantFieldNames(variant: EnumVariant): string[] | null {
  if (variant.fields === null || variant.fields === undefined) {
    return null;
  }
  if (isSchema(variant.fields) || Array.isArray(variant.fields)) {
    // Newtype and tuple variants have no field names
    return null;
  }
  return Object.keys(variant.fields);
}

/**
 * Check if variant fields represent a newtype (single Schema, not array/record).
 */
export function isNewtypeVariant(variant: EnumVariant): boolean {
  return variant.fields !== null && variant.fields !== undefined && isSchema(variant.fields);
}

/**
 * Check if a schema is a reference.
 */
export function isRefSchema(schema: Schema): schema is RefSchema {
  return schema.kind === "ref";
}
