// Human-readable JSON projection of decoded metadata, and the reader that
// turns the projection back into a tree.

import {
  findVariantByName,
  fromHex,
  getVariantFieldNames,
  getVariantFieldSchemas,
  isNewtypeVariant,
  resolveSchema,
  toHex,
  type EnumSchema,
  type MapSchema,
  type Schema,
  type SchemaRegistry,
} from "@scale-metadata/codec";
import { resolveOptions, type MetadataCodecOptions } from "./config.ts";
import { MetadataError, MetadataErrorKind } from "./errors.ts";
import { LEGACY_ROOT, legacySchemas } from "./legacy/schemas.ts";
import type { LegacyMetadataByVersion, LegacyVersion, StorageLayout } from "./legacy/types.ts";
import { BODY_ROOT, REGISTRY_ROOT, modernSchemas } from "./modern/schemas.ts";
import type {
  ModernVersion,
  RuntimeMetadataV14,
  RuntimeMetadataV15,
  RuntimeMetadataV16,
} from "./modern/types.ts";
import { TypeRegistry } from "./registry/registry.ts";
import type { PortableType } from "./registry/types.ts";
import { isLegacyVersion, isMetadataVersion, type MetadataVersion, type RuntimeMetadata } from "./versions.ts";

// ============================================================================
// Writing
// ============================================================================

function replacer(_key: string, value: unknown): unknown {
  if (value instanceof Uint8Array) return toHex(value);
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Map) {
    return Object.fromEntries(Array.from(value, ([k, v]) => [String(k), v]));
  }
  return value;
}

/**
 * Render metadata (or any part of it) as JSON. Byte strings become `0x` hex,
 * big integers decimal strings, maps objects and registries
 * `{ types: [{ id, type }] }`.
 */
export function metadataToJson(value: unknown, space?: number | string): string {
  return JSON.stringify(value, replacer, space);
}

// ============================================================================
// Reading
// ============================================================================

type SymbolRef = [id: number, path: string];

const INTEGER_MAX: Record<string, number> = {
  u8: 0xff,
  u16: 0xffff,
  u32: 0xffffffff,
  compact: 0xffffffff,
  "type id": 0xffffffff,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function kindOf(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function messageOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Walks a parsed JSON value along a schema, restoring bytes, bigints and maps. */
class JsonReader {
  private readonly segments: string[] = [];
  readonly symbols: SymbolRef[] = [];

  constructor(
    private readonly version: MetadataVersion,
    private readonly schemas: SchemaRegistry,
  ) {}

  get path(): string {
    return this.segments.length === 0 ? "<root>" : this.segments.join(".");
  }

  error(reason: string): MetadataError {
    return new MetadataError(
      MetadataErrorKind.MALFORMED_PAYLOAD,
      `invalid V${this.version} JSON at ${this.path}: ${reason}`,
      { version: this.version, path: this.path },
    );
  }

  at<T>(segment: string, fn: () => T): T {
    this.segments.push(segment);
    try {
      return fn();
    } finally {
      this.segments.pop();
    }
  }

  record(value: unknown): Record<string, unknown> {
    if (!isRecord(value)) throw this.error(`expected object, got ${kindOf(value)}`);
    return value;
  }

  read(value: unknown, schema: Schema): unknown {
    const resolved = resolveSchema(schema, this.schemas);
    switch (resolved.kind) {
      case "bool":
        if (typeof value !== "boolean") throw this.error(`expected boolean, got ${kindOf(value)}`);
        return value;
      case "u8":
      case "u16":
      case "u32":
      case "compact":
        return this.integer(value, resolved.kind);
      case "symbol": {
        const id = this.integer(value, "type id");
        this.symbols.push([id, this.path]);
        return id;
      }
      case "u64":
      case "u128":
        if (typeof value !== "string" || !/^\d+$/.test(value)) {
          throw this.error(`expected decimal string, got ${kindOf(value)}`);
        }
        return BigInt(value);
      case "string":
        if (typeof value !== "string") throw this.error(`expected string, got ${kindOf(value)}`);
        return value;
      case "bytes":
        return this.hex(value);
      case "fixed_bytes": {
        const bytes = this.hex(value);
        if (bytes.length !== resolved.length) {
          throw this.error(`expected ${resolved.length} bytes, got ${bytes.length}`);
        }
        return bytes;
      }
      case "vec":
        if (!Array.isArray(value)) throw this.error(`expected array, got ${kindOf(value)}`);
        return value.map((item, i) => this.at(`[${i}]`, () => this.read(item, resolved.element)));
      case "option":
        return value === null ? null : this.at("Some", () => this.read(value, resolved.inner));
      case "map":
        return this.map(value, resolved);
      case "struct": {
        const record = this.record(value);
        const out: Record<string, unknown> = {};
        for (const [name, field] of Object.entries(resolved.fields)) {
          out[name] = this.at(name, () => this.read(record[name], field));
        }
        return out;
      }
      case "tuple": {
        if (!Array.isArray(value) || value.length !== resolved.elements.length) {
          throw this.error(`expected ${resolved.elements.length}-element array, got ${kindOf(value)}`);
        }
        const items = value;
        return resolved.elements.map((element, i) => this.at(`${i}`, () => this.read(items[i], element)));
      }
      case "enum":
        return this.enumValue(value, resolved);
      case "unit_enum":
        if (typeof value !== "string" || !resolved.variants.includes(value)) {
          throw this.error(`unknown variant ${typeof value === "string" ? value : kindOf(value)}`);
        }
        return value;
      case "ref":
        throw this.error(`unresolved schema ${resolved.name}`);
    }
  }

  private integer(value: unknown, kind: string): number {
    if (typeof value !== "number" || !Number.isInteger(value)) {
      throw this.error(`expected ${kind}, got ${kindOf(value)}`);
    }
    const max = INTEGER_MAX[kind] ?? Number.MAX_SAFE_INTEGER;
    if (value < 0 || value > max) throw this.error(`${kind} ${value} out of range`);
    return value;
  }

  private hex(value: unknown): Uint8Array {
    if (typeof value !== "string") throw this.error(`expected hex string, got ${kindOf(value)}`);
    try {
      return fromHex(value);
    } catch (e) {
      throw this.error(messageOf(e));
    }
  }

  private map(value: unknown, schema: MapSchema): Map<unknown, unknown> {
    const record = this.record(value);
    const out = new Map<unknown, unknown>();
    Object.entries(record).forEach(([key, item], i) => {
      const k = this.at(`{key ${i}}`, () => this.mapKey(key, schema.key));
      out.set(k, this.at(`{value ${i}}`, () => this.read(item, schema.value)));
    });
    return out;
  }

  /** Object keys are strings; numeric key schemas read them back as numbers. */
  private mapKey(key: string, schema: Schema): unknown {
    const resolved = resolveSchema(schema, this.schemas);
    switch (resolved.kind) {
      case "string":
      case "u64":
      case "u128":
        return this.read(key, resolved);
      case "u8":
      case "u16":
      case "u32":
      case "compact":
        return this.read(/^\d+$/.test(key) ? Number(key) : key, resolved);
      default:
        throw this.error(`unsupported map key kind ${resolved.kind}`);
    }
  }

  private enumValue(value: unknown, schema: EnumSchema): Record<string, unknown> {
    const record = this.record(value);
    const tag = record.tag;
    if (typeof tag !== "string") throw this.error(`expected string tag, got ${kindOf(tag)}`);
    const variant = findVariantByName(schema, tag);
    if (variant === undefined) throw this.error(`unknown variant ${tag}`);

    const out: Record<string, unknown> = { tag: variant.name };
    const fieldSchemas = getVariantFieldSchemas(variant);
    const names = getVariantFieldNames(variant);
    this.at(variant.name, () => {
      if (isNewtypeVariant(variant)) {
        out.value = this.at("value", () => this.read(record.value, fieldSchemas[0]));
      } else if (names === null) {
        fieldSchemas.forEach((field, i) => {
          out[`${i}`] = this.at(`${i}`, () => this.read(record[`${i}`], field));
        });
      } else {
        names.forEach((name, i) => {
          out[name] = this.at(name, () => this.read(record[name], fieldSchemas[i]));
        });
      }
    });
    return out;
  }
}

// Legacy trees hold the unified storage shape, not the wire enum.
const legacyJsonCache = new Map<LegacyVersion, SchemaRegistry>();

function legacyJsonSchemas(version: LegacyVersion): SchemaRegistry {
  const cached = legacyJsonCache.get(version);
  if (cached !== undefined) return cached;

  const str: Schema = { kind: "string" };
  const layouts: StorageLayout[] = version >= 13 ? ["map", "doubleMap", "nMap"] : ["map", "doubleMap"];
  const unified: Schema = {
    kind: "enum",
    variants: [
      { name: "Plain", fields: str },
      {
        name: "Map",
        fields: {
          layout: { kind: "unit_enum", variants: layouts },
          keys: {
            kind: "vec",
            element: { kind: "struct", fields: { hasher: { kind: "ref", name: "Hasher" }, key: str } },
          },
          value: str,
          linked: { kind: "bool" },
        },
      },
    ],
  };
  const schemas = new Map<string, Schema>([...legacySchemas(version), ["StorageEntryType", unified]]);
  legacyJsonCache.set(version, schemas);
  return schemas;
}

function readLegacy<V extends LegacyVersion>(version: V, json: unknown): LegacyMetadataByVersion[V] {
  // The schemas gate hashers, layouts and fields per version, so the result
  // matches the version's type.
  return new JsonReader(version, legacyJsonSchemas(version)).read(json, LEGACY_ROOT) as LegacyMetadataByVersion[V];
}

type Body<T> = Omit<T, "types">;

function readModern(
  version: ModernVersion,
  json: unknown,
  symbols: SymbolRef[],
): { types: TypeRegistry; body: unknown } {
  const reader = new JsonReader(version, modernSchemas(version));
  const record = reader.record(json);
  // `{ types: { types: [...] } }` from the registry's toJSON
  const portable = reader.at("types", () => {
    const wrapped = reader.record(record.types);
    return reader.read(wrapped.types, REGISTRY_ROOT) as PortableType[];
  });
  const types = TypeRegistry.fromPortable(portable);
  const body = reader.read(record, BODY_ROOT);
  symbols.push(...reader.symbols);
  return { types, body };
}

function readTree(version: MetadataVersion, json: unknown, symbols: SymbolRef[]): RuntimeMetadata {
  switch (version) {
    case 8:
      return { version, metadata: readLegacy(8, json) };
    case 9:
      return { version, metadata: readLegacy(9, json) };
    case 10:
      return { version, metadata: readLegacy(10, json) };
    case 11:
      return { version, metadata: readLegacy(11, json) };
    case 12:
      return { version, metadata: readLegacy(12, json) };
    case 13:
      return { version, metadata: readLegacy(13, json) };
    case 14: {
      const { types, body } = readModern(14, json, symbols);
      return { version, metadata: { types, ...(body as Body<RuntimeMetadataV14>) } };
    }
    case 15: {
      const { types, body } = readModern(15, json, symbols);
      return { version, metadata: { types, ...(body as Body<RuntimeMetadataV15>) } };
    }
    case 16: {
      const { types, body } = readModern(16, json, symbols);
      return { version, metadata: { types, ...(body as Body<RuntimeMetadataV16>) } };
    }
  }
}

/**
 * Read metadata back from its JSON projection. Hex strings become bytes,
 * decimal strings bigints and objects maps wherever the version's schema
 * expects them; `{ types: [...] }` becomes a {@link TypeRegistry}.
 *
 * Only `versions` and `validateTypes` are taken from the options.
 *
 * @throws MetadataError (MALFORMED_PAYLOAD) for text that is not JSON or does
 * not fit the version's shape, with the path of the offending value
 * @throws MetadataError (UNSUPPORTED_VERSION) for a version the options leave out
 * @throws MetadataError (DANGLING_TYPE_REFERENCE) for a type id missing from
 * the registry
 */
export function metadataFromJson(text: string, options: MetadataCodecOptions = {}): RuntimeMetadata {
  const resolved = resolveOptions(options);
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new MetadataError(MetadataErrorKind.MALFORMED_PAYLOAD, `invalid JSON: ${messageOf(e)}`, { cause: e });
  }
  if (!isRecord(parsed) || typeof parsed.version !== "number") {
    throw new MetadataError(MetadataErrorKind.MALFORMED_PAYLOAD, "expected an object with a numeric version", {
      path: "version",
    });
  }

  const tag = parsed.version;
  if (!isMetadataVersion(tag) || !resolved.versions.has(tag)) {
    throw MetadataError.unsupportedVersion(tag);
  }

  const symbols: SymbolRef[] = [];
  const value = readTree(tag, parsed.metadata, symbols);
  if (resolved.validateTypes && !isLegacyVersion(value.version) && "types" in value.metadata) {
    const registry = value.metadata.types;
    for (const [id, path] of symbols) {
      if (!registry.has(id)) throw MetadataError.danglingTypeReference(id, path);
    }
  }
  return value;
}
