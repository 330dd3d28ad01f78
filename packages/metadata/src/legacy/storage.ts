// Storage entry type unification for legacy metadata.
//
// The wire has three keyed shapes (Map, DoubleMap and, from V13, NMap). In
// memory they are one `Map` with an ordered key list plus the layout needed
// to write the value back out unchanged.

import { MetadataError, MetadataErrorKind } from "../errors.ts";
import {
  HASHERS_V11,
  hashersFor,
  type LegacyStorageEntryType,
  type LegacyStorageHasher,
  type LegacyVersion,
} from "./types.ts";

/** Storage entry type exactly as the wire carries it. */
export type WireStorageEntryType =
  | { tag: "Plain"; value: string }
  | { tag: "Map"; hasher: string; key: string; value: string; linked: boolean }
  | { tag: "DoubleMap"; hasher: string; key1: string; key2: string; value: string; key2Hasher: string }
  | { tag: "NMap"; keys: string[]; hashers: string[]; value: string };

function isLegacyHasher(name: string): name is LegacyStorageHasher {
  return HASHERS_V11.some((h) => h === name);
}

function hasherAt(name: string, path: string): LegacyStorageHasher {
  if (!isLegacyHasher(name)) {
    throw new MetadataError(MetadataErrorKind.MALFORMED_PAYLOAD, `unknown storage hasher ${name}`, {
      path,
    });
  }
  return name;
}

/**
 * Wire shape to unified shape.
 *
 * @param path - Location of the entry, for error reporting
 * @throws MetadataError (MALFORMED_PAYLOAD) when an NMap's key and hasher
 * lists differ in length
 */
export function unifyStorageEntryType(
  wire: WireStorageEntryType,
  path: string,
): LegacyStorageEntryType {
  switch (wire.tag) {
    case "Plain":
      return wire;
    case "Map":
      return {
        tag: "Map",
        layout: "map",
        keys: [{ hasher: hasherAt(wire.hasher, path), key: wire.key }],
        value: wire.value,
        linked: wire.linked,
      };
    case "DoubleMap":
      return {
        tag: "Map",
        layout: "doubleMap",
        keys: [
          { hasher: hasherAt(wire.hasher, path), key: wire.key1 },
          { hasher: hasherAt(wire.key2Hasher, path), key: wire.key2 },
        ],
        value: wire.value,
        linked: false,
      };
    case "NMap":
      if (wire.keys.length !== wire.hashers.length) {
        throw new MetadataError(
          MetadataErrorKind.MALFORMED_PAYLOAD,
          `NMap has ${wire.keys.length} keys but ${wire.hashers.length} hashers`,
          { path },
        );
      }
      return {
        tag: "Map",
        layout: "nMap",
        keys: wire.keys.map((key, i) => ({ hasher: hasherAt(wire.hashers[i], path), key })),
        value: wire.value,
        linked: false,
      };
  }
}

function unencodable(message: string, path: string): MetadataError {
  return new MetadataError(MetadataErrorKind.UNENCODABLE_VALUE, message, { path });
}

/**
 * Unified shape back to the wire shape for one version.
 *
 * @throws MetadataError (UNENCODABLE_VALUE) when the layout does not fit the
 * key count or the version, or a hasher is not available in the version
 */
export function splitStorageEntryType(
  entry: LegacyStorageEntryType,
  version: LegacyVersion,
  path: string,
): WireStorageEntryType {
  if (entry.tag === "Plain") return entry;

  const available = hashersFor(version);
  for (const { hasher } of entry.keys) {
    if (!available.includes(hasher)) {
      throw unencodable(`hasher ${hasher} does not exist in V${version}`, path);
    }
  }
  if (entry.linked && entry.layout !== "map") {
    throw unencodable(`linked flag is only carried by the map layout`, path);
  }

  const { keys, value } = entry;
  switch (entry.layout) {
    case "map":
      if (keys.length !== 1) {
        throw unencodable(`map layout needs 1 key, got ${keys.length}`, path);
      }
      return { tag: "Map", hasher: keys[0].hasher, key: keys[0].key, value, linked: entry.linked };
    case "doubleMap":
      if (keys.length !== 2) {
        throw unencodable(`doubleMap layout needs 2 keys, got ${keys.length}`, path);
      }
      return {
        tag: "DoubleMap",
        hasher: keys[0].hasher,
        key1: keys[0].key,
        key2: keys[1].key,
        value,
        key2Hasher: keys[1].hasher,
      };
    case "nMap":
      if (version < 13) {
        throw unencodable(`nMap layout does not exist in V${version}`, path);
      }
      return {
        tag: "NMap",
        keys: keys.map((k) => k.key),
        hashers: keys.map((k) => k.hasher),
        value,
      };
  }
}
