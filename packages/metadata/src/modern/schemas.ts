// Wire schemas for modern metadata.
//
// A payload is the portable registry followed by the version's body; both
// are described in one schema registry per version.

import type { Schema, SchemaRegistry, StructSchema } from "@scale-metadata/codec";
import { registrySchemas } from "../registry/schemas.ts";
import { STORAGE_HASHERS, STORAGE_MODIFIERS, type ModernVersion } from "./types.ts";

export const REGISTRY_ROOT: Schema = { kind: "ref", name: "PortableRegistry" };
export const BODY_ROOT: Schema = { kind: "ref", name: "Body" };

const str: Schema = { kind: "string" };
const bytes: Schema = { kind: "bytes" };
const ty: Schema = { kind: "symbol" };
const docs: Schema = { kind: "ref", name: "Docs" };

function ref(name: string): Schema {
  return { kind: "ref", name };
}

function vecOf(name: string): Schema {
  return { kind: "vec", element: ref(name) };
}

function optionOf(name: string): Schema {
  return { kind: "option", inner: ref(name) };
}

function struct(fields: Record<string, Schema>): StructSchema {
  return { kind: "struct", fields };
}

/** Extends a struct's fields. Later fields are appended in order. */
function extend(base: StructSchema, fields: Record<string, Schema>): StructSchema {
  return struct({ ...base.fields, ...fields });
}

// ============================================================================
// Common
// ============================================================================

const storageEntry = struct({
  name: str,
  modifier: ref("Modifier"),
  type: ref("StorageEntryType"),
  default: bytes,
  docs,
});

const constant = struct({ name: str, type: ty, value: bytes, docs });

const commonSchemas: ReadonlyArray<readonly [string, Schema]> = [
  ["Hasher", { kind: "unit_enum", variants: STORAGE_HASHERS }],
  ["Modifier", { kind: "unit_enum", variants: STORAGE_MODIFIERS }],
  [
    "StorageEntryType",
    {
      kind: "enum",
      variants: [
        { name: "Plain", fields: ty },
        { name: "Map", fields: { hashers: vecOf("Hasher"), key: ty, value: ty } },
      ],
    },
  ],
  ["TypeRef", struct({ type: ty })],
  [
    "SignedExtension",
    struct({ identifier: str, type: ty, additionalSigned: ty }),
  ],
  ["FunctionParam", struct({ name: str, type: ty })],
  ["OuterEnums", struct({ callEnumType: ty, eventEnumType: ty, errorEnumType: ty })],
  [
    "Custom",
    { kind: "map", key: str, value: struct({ type: ty, value: bytes }) },
  ],
];

// ============================================================================
// V14
// ============================================================================

const palletV14 = struct({
  name: str,
  storage: optionOf("Storage"),
  calls: optionOf("TypeRef"),
  event: optionOf("TypeRef"),
  constants: { kind: "vec", element: constant },
  error: optionOf("TypeRef"),
  index: { kind: "u8" },
});

const v14Schemas: ReadonlyArray<readonly [string, Schema]> = [
  ["Storage", struct({ prefix: str, entries: { kind: "vec", element: storageEntry } })],
  ["Pallet", palletV14],
  [
    "Extrinsic",
    struct({ type: ty, version: { kind: "u8" }, signedExtensions: vecOf("SignedExtension") }),
  ],
  ["Body", struct({ pallets: vecOf("Pallet"), extrinsic: ref("Extrinsic"), type: ty })],
];

// ============================================================================
// V15
// ============================================================================

const apiMethodV15 = struct({ name: str, inputs: vecOf("FunctionParam"), output: ty, docs });

const v15Schemas: ReadonlyArray<readonly [string, Schema]> = [
  ["Storage", struct({ prefix: str, entries: { kind: "vec", element: storageEntry } })],
  ["Pallet", extend(palletV14, { docs })],
  [
    "Extrinsic",
    struct({
      version: { kind: "u8" },
      addressType: ty,
      callType: ty,
      signatureType: ty,
      extraType: ty,
      signedExtensions: vecOf("SignedExtension"),
    }),
  ],
  ["RuntimeApi", struct({ name: str, methods: { kind: "vec", element: apiMethodV15 }, docs })],
  [
    "Body",
    struct({
      pallets: vecOf("Pallet"),
      extrinsic: ref("Extrinsic"),
      type: ty,
      apis: vecOf("RuntimeApi"),
      outerEnums: ref("OuterEnums"),
      custom: ref("Custom"),
    }),
  ],
];

// ============================================================================
// V16
// ============================================================================

const deprecationStatus = ref("DeprecationStatus");

const v16Schemas: ReadonlyArray<readonly [string, Schema]> = [
  [
    "DeprecationStatus",
    {
      kind: "enum",
      variants: [
        { name: "NotDeprecated", fields: null },
        { name: "DeprecatedWithoutNote", fields: null },
        {
          name: "Deprecated",
          fields: { note: str, since: { kind: "option", inner: str } },
        },
      ],
    },
  ],
  [
    "DeprecationInfo",
    {
      kind: "enum",
      variants: [
        { name: "NotDeprecated", fields: null },
        { name: "ItemDeprecated", fields: deprecationStatus },
        {
          name: "VariantsDeprecated",
          fields: { kind: "map", key: { kind: "u8" }, value: deprecationStatus },
        },
      ],
    },
  ],
  ["DeprecatedTypeRef", struct({ type: ty, deprecationInfo: ref("DeprecationInfo") })],
  [
    "Storage",
    struct({
      prefix: str,
      entries: { kind: "vec", element: extend(storageEntry, { deprecationInfo: deprecationStatus }) },
    }),
  ],
  [
    "Pallet",
    struct({
      name: str,
      storage: optionOf("Storage"),
      calls: optionOf("DeprecatedTypeRef"),
      event: optionOf("DeprecatedTypeRef"),
      constants: {
        kind: "vec",
        element: extend(constant, { deprecationInfo: deprecationStatus }),
      },
      error: optionOf("DeprecatedTypeRef"),
      associatedTypes: { kind: "vec", element: struct({ name: str, type: ty, docs }) },
      viewFunctions: {
        kind: "vec",
        element: struct({
          name: str,
          id: { kind: "fixed_bytes", length: 32 },
          inputs: vecOf("FunctionParam"),
          output: ty,
          docs,
          deprecationInfo: deprecationStatus,
        }),
      },
      index: { kind: "u8" },
      docs,
      deprecationInfo: deprecationStatus,
    }),
  ],
  [
    "Extrinsic",
    struct({
      versions: { kind: "vec", element: { kind: "u8" } },
      addressType: ty,
      signatureType: ty,
      transactionExtensionsByVersion: {
        kind: "map",
        key: { kind: "u8" },
        value: { kind: "vec", element: { kind: "compact" } },
      },
      transactionExtensions: {
        kind: "vec",
        element: struct({ identifier: str, type: ty, implicit: ty }),
      },
    }),
  ],
  [
    "RuntimeApi",
    struct({
      name: str,
      methods: {
        kind: "vec",
        element: extend(apiMethodV15, { deprecationInfo: deprecationStatus }),
      },
      docs,
      deprecationInfo: deprecationStatus,
      version: { kind: "compact" },
    }),
  ],
  [
    "Body",
    struct({
      pallets: vecOf("Pallet"),
      extrinsic: ref("Extrinsic"),
      apis: vecOf("RuntimeApi"),
      outerEnums: ref("OuterEnums"),
      custom: ref("Custom"),
    }),
  ],
];

const byVersion: Record<ModernVersion, ReadonlyArray<readonly [string, Schema]>> = {
  14: v14Schemas,
  15: v15Schemas,
  16: v16Schemas,
};

const cache = new Map<ModernVersion, SchemaRegistry>();

export function modernSchemas(version: ModernVersion): SchemaRegistry {
  let schemas = cache.get(version);
  if (schemas === undefined) {
    schemas = new Map<string, Schema>([...registrySchemas, ...commonSchemas, ...byVersion[version]]);
    cache.set(version, schemas);
  }
  return schemas;
}
