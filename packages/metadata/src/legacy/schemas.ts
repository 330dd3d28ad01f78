// Wire schemas for legacy metadata, one registry per version.

import type { Schema, SchemaRegistry, EnumVariant, StructSchema } from "@scale-metadata/codec";
import { STORAGE_MODIFIERS, hashersFor, type LegacyVersion } from "./types.ts";

export const LEGACY_ROOT: Schema = { kind: "ref", name: "Metadata" };

const str: Schema = { kind: "string" };
const docs: Schema = { kind: "ref", name: "Docs" };
const hasher: Schema = { kind: "ref", name: "Hasher" };

function vecOf(name: string): Schema {
  return { kind: "vec", element: { kind: "ref", name } };
}

function storageEntryTypeVariants(version: LegacyVersion): EnumVariant[] {
  const variants: EnumVariant[] = [
    { name: "Plain", fields: str },
    { name: "Map", fields: { hasher, key: str, value: str, linked: { kind: "bool" } } },
    {
      name: "DoubleMap",
      fields: { hasher, key1: str, key2: str, value: str, key2Hasher: hasher },
    },
  ];
  if (version >= 13) {
    variants.push({
      name: "NMap",
      fields: { keys: { kind: "vec", element: str }, hashers: { kind: "vec", element: hasher }, value: str },
    });
  }
  return variants;
}

function moduleSchema(version: LegacyVersion): StructSchema {
  const fields: Record<string, Schema> = {
    name: str,
    storage: { kind: "option", inner: { kind: "ref", name: "Storage" } },
    calls: { kind: "option", inner: vecOf("Function") },
    event: { kind: "option", inner: vecOf("Event") },
    constants: vecOf("Constant"),
    errors: vecOf("Error"),
  };
  if (version >= 12) fields.index = { kind: "u8" };
  return { kind: "struct", fields };
}

function metadataSchema(version: LegacyVersion): StructSchema {
  const fields: Record<string, Schema> = { modules: vecOf("Module") };
  if (version >= 11) fields.extrinsic = { kind: "ref", name: "Extrinsic" };
  return { kind: "struct", fields };
}

function buildLegacySchemas(version: LegacyVersion): SchemaRegistry {
  return new Map<string, Schema>([
    ["Docs", { kind: "vec", element: str }],
    ["Hasher", { kind: "unit_enum", variants: hashersFor(version) }],
    ["Modifier", { kind: "unit_enum", variants: STORAGE_MODIFIERS }],
    ["StorageEntryType", { kind: "enum", variants: storageEntryTypeVariants(version) }],
    [
      "StorageEntry",
      {
        kind: "struct",
        fields: {
          name: str,
          modifier: { kind: "ref", name: "Modifier" },
          type: { kind: "ref", name: "StorageEntryType" },
          default: { kind: "bytes" },
          docs,
        },
      },
    ],
    ["Storage", { kind: "struct", fields: { prefix: str, entries: vecOf("StorageEntry") } }],
    [
      "Function",
      {
        kind: "struct",
        fields: {
          name: str,
          arguments: { kind: "vec", element: { kind: "struct", fields: { name: str, type: str } } },
          docs,
        },
      },
    ],
    ["Event", { kind: "struct", fields: { name: str, arguments: { kind: "vec", element: str }, docs } }],
    [
      "Constant",
      { kind: "struct", fields: { name: str, type: str, value: { kind: "bytes" }, docs } },
    ],
    ["Error", { kind: "struct", fields: { name: str, docs } }],
    ["Module", moduleSchema(version)],
    [
      "Extrinsic",
      {
        kind: "struct",
        fields: { version: { kind: "u8" }, signedExtensions: { kind: "vec", element: str } },
      },
    ],
    ["Metadata", metadataSchema(version)],
  ]);
}

const cache = new Map<LegacyVersion, SchemaRegistry>();

export function legacySchemas(version: LegacyVersion): SchemaRegistry {
  let schemas = cache.get(version);
  if (schemas === undefined) {
    schemas = buildLegacySchemas(version);
    cache.set(version, schemas);
  }
  return schemas;
}
