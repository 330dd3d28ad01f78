import { MetadataError, MetadataErrorKind } from "../errors.ts";
import type { TypeRegistry } from "../registry/registry.ts";
import type { TypeId } from "../registry/types.ts";
import type { StorageEntryType, StorageHasher } from "./types.ts";

export interface StorageKey {
  hasher: StorageHasher;
  type: TypeId;
}

/**
 * Ordered `(hasher, key type)` pairs of a storage entry. A map with several
 * hashers has a tuple key whose components pair up with the hashers in
 * order. Plain entries have no keys.
 *
 * @throws MetadataError (MALFORMED_PAYLOAD) when the hashers and key
 * components do not pair up
 * @throws MetadataError (DANGLING_TYPE_REFERENCE) when the key type is absent
 */
export function storageKeys(registry: TypeRegistry, entryType: StorageEntryType): StorageKey[] {
  if (entryType.tag === "Plain") return [];

  const { hashers, key } = entryType;
  if (hashers.length === 1) {
    return [{ hasher: hashers[0], type: key }];
  }

  const def = registry.resolve(key).def;
  const components = def.tag === "Tuple" ? def.fields : [key];
  if (hashers.length === 0 || components.length !== hashers.length) {
    throw new MetadataError(
      MetadataErrorKind.MALFORMED_PAYLOAD,
      `storage map has ${hashers.length} hashers but its key has ${components.length} components`,
      { typeId: key },
    );
  }
  return hashers.map((hasher, i) => ({ hasher, type: components[i] }));
}
