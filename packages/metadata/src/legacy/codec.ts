// Legacy metadata payload encoding/decoding (V8..V13).

import {
  decodeWithSchema,
  encodeWithSchema,
  type DecodeResult,
} from "@scale-metadata/codec";
import { LEGACY_ROOT, legacySchemas } from "./schemas.ts";
import { splitStorageEntryType, unifyStorageEntryType, type WireStorageEntryType } from "./storage.ts";
import type {
  LegacyExtrinsic,
  LegacyMetadata,
  LegacyMetadataByVersion,
  LegacyModule,
  LegacyStorageEntry,
  LegacyVersion,
} from "./types.ts";

// ============================================================================
// Wire shapes
// ============================================================================

type WireStorageEntry = Omit<LegacyStorageEntry, "type"> & { type: WireStorageEntryType };

type WireModule = Omit<LegacyModule, "storage"> & {
  storage: { prefix: string; entries: WireStorageEntry[] } | null;
  index?: number;
};

interface WireLegacyMetadata {
  modules: WireModule[];
  extrinsic?: LegacyExtrinsic;
}

function fromWire(wire: WireLegacyMetadata): LegacyMetadata {
  return {
    ...wire,
    modules: wire.modules.map((module, m) => {
      const { storage } = module;
      if (storage === null) return { ...module, storage: null };
      return {
        ...module,
        storage: {
          prefix: storage.prefix,
          entries: storage.entries.map((entry, e) => ({
            ...entry,
            type: unifyStorageEntryType(entry.type, `modules.[${m}].storage.entries.[${e}].type`),
          })),
        },
      };
    }),
  };
}

function toWire(metadata: LegacyMetadata, version: LegacyVersion): WireLegacyMetadata {
  return {
    ...metadata,
    modules: metadata.modules.map((module, m) => {
      const { storage } = module;
      if (storage === null) return { ...module, storage: null };
      return {
        ...module,
        storage: {
          prefix: storage.prefix,
          entries: storage.entries.map((entry, e) => ({
            ...entry,
            type: splitStorageEntryType(
              entry.type,
              version,
              `modules.[${m}].storage.entries.[${e}].type`,
            ),
          })),
        },
      };
    }),
  };
}

// ============================================================================
// Payload codec
// ============================================================================

/**
 * Decode a legacy payload (everything after the version byte).
 *
 * @throws ScaleDecodeError on structural failure
 * @throws MetadataError (MALFORMED_PAYLOAD) on an inconsistent NMap
 */
export function decodeLegacy<V extends LegacyVersion>(
  version: V,
  buf: Uint8Array,
  offset: number,
): DecodeResult<LegacyMetadataByVersion[V]> {
  const wire = decodeWithSchema(buf, offset, LEGACY_ROOT, legacySchemas(version)) as DecodeResult<WireLegacyMetadata>;
  // Layouts and hasher sets follow the version's schema, so the unified
  // tree matches the version's type.
  const value = fromWire(wire.value) as LegacyMetadataByVersion[V];
  return { value, next: wire.next };
}

/**
 * Encode a legacy payload.
 *
 * @throws ScaleEncodeError when the tree does not fit the version's schema
 * @throws MetadataError (UNENCODABLE_VALUE) on a storage layout or hasher the
 * version cannot carry
 */
export function encodeLegacy(version: LegacyVersion, metadata: LegacyMetadata): Uint8Array {
  return encodeWithSchema(toWire(metadata, version), LEGACY_ROOT, legacySchemas(version));
}
