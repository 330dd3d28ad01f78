// Legacy (V8..V13) metadata trees.
//
// Types are inline descriptive strings such as "T::AccountId"; there is no
// registry. One in-memory shape serves every legacy version, with the
// hasher set, the module index and the extrinsic record gated per version.

export type LegacyVersion = 8 | 9 | 10 | 11 | 12 | 13;

export const LEGACY_VERSIONS: readonly LegacyVersion[] = [8, 9, 10, 11, 12, 13];

/** Storage hashers in wire order for V8 and V9. */
export const HASHERS_V8 = ["Blake2_128", "Blake2_256", "Twox128", "Twox256", "Twox64Concat"] as const;

/** V10 inserts `Blake2_128Concat` at index 2. */
export const HASHERS_V10 = [
  "Blake2_128",
  "Blake2_256",
  "Blake2_128Concat",
  "Twox128",
  "Twox256",
  "Twox64Concat",
] as const;

/** V11 onwards appends `Identity`. */
export const HASHERS_V11 = [...HASHERS_V10, "Identity"] as const;

export type StorageHasherV8 = (typeof HASHERS_V8)[number];
export type StorageHasherV10 = (typeof HASHERS_V10)[number];
export type StorageHasherV11 = (typeof HASHERS_V11)[number];
export type LegacyStorageHasher = StorageHasherV11;

export function hashersFor(version: LegacyVersion): readonly LegacyStorageHasher[] {
  if (version < 10) return HASHERS_V8;
  if (version === 10) return HASHERS_V10;
  return HASHERS_V11;
}

/** `Optional` yields nothing for a missing value; `Default` yields `default`. */
export type StorageModifier = "Optional" | "Default";

export const STORAGE_MODIFIERS = ["Optional", "Default"] as const satisfies readonly StorageModifier[];

/** Which of the three keyed wire shapes a unified map re-encodes to. */
export type StorageLayout = "map" | "doubleMap" | "nMap";

export interface LegacyStorageKey<H extends string = LegacyStorageHasher> {
  hasher: H;
  key: string;
}

/**
 * Storage entry type. `Map`, `DoubleMap` and `NMap` on the wire all become
 * one `Map` with an ordered key list; hasher order is never normalized.
 */
export type LegacyStorageEntryType<
  H extends string = LegacyStorageHasher,
  L extends StorageLayout = StorageLayout,
> =
  | { tag: "Plain"; value: string }
  | {
      tag: "Map";
      layout: L;
      keys: LegacyStorageKey<H>[];
      value: string;
      /** `is_linked` before V11, unused afterwards; only carried by `map` layout. */
      linked: boolean;
    };

export interface LegacyStorageEntry<H extends string = LegacyStorageHasher, L extends StorageLayout = StorageLayout> {
  name: string;
  modifier: StorageModifier;
  type: LegacyStorageEntryType<H, L>;
  /**
   * Encoded default value. Kept even for `Optional` entries, which some
   * runtimes ship with non-empty fallback bytes.
   */
  default: Uint8Array;
  docs: string[];
}

export interface LegacyStorage<H extends string = LegacyStorageHasher, L extends StorageLayout = StorageLayout> {
  prefix: string;
  entries: LegacyStorageEntry<H, L>[];
}

export interface LegacyFunctionArgument {
  name: string;
  type: string;
}

export interface LegacyFunction {
  name: string;
  arguments: LegacyFunctionArgument[];
  docs: string[];
}

export interface LegacyEvent {
  name: string;
  arguments: string[];
  docs: string[];
}

export interface LegacyConstant {
  name: string;
  type: string;
  value: Uint8Array;
  docs: string[];
}

export interface LegacyError {
  name: string;
  docs: string[];
}

export interface LegacyModule<H extends string = LegacyStorageHasher, L extends StorageLayout = StorageLayout> {
  name: string;
  storage: LegacyStorage<H, L> | null;
  calls: LegacyFunction[] | null;
  event: LegacyEvent[] | null;
  constants: LegacyConstant[];
  errors: LegacyError[];
}

export type IndexedLegacyModule<L extends StorageLayout = StorageLayout> = LegacyModule<StorageHasherV11, L> & {
  /** Stable module index used in call and event encoding. */
  index: number;
};

export interface LegacyExtrinsic {
  /** Extrinsic format version; 0 means unspecified. */
  version: number;
  signedExtensions: string[];
}

type MapLayouts = "map" | "doubleMap";

export interface RuntimeMetadataV8 {
  modules: LegacyModule<StorageHasherV8, MapLayouts>[];
}

export type RuntimeMetadataV9 = RuntimeMetadataV8;

export interface RuntimeMetadataV10 {
  modules: LegacyModule<StorageHasherV10, MapLayouts>[];
}

export interface RuntimeMetadataV11 {
  modules: LegacyModule<StorageHasherV11, MapLayouts>[];
  extrinsic: LegacyExtrinsic;
}

export interface RuntimeMetadataV12 {
  modules: IndexedLegacyModule<MapLayouts>[];
  extrinsic: LegacyExtrinsic;
}

export interface RuntimeMetadataV13 {
  modules: IndexedLegacyModule[];
  extrinsic: LegacyExtrinsic;
}

export interface LegacyMetadataByVersion {
  8: RuntimeMetadataV8;
  9: RuntimeMetadataV9;
  10: RuntimeMetadataV10;
  11: RuntimeMetadataV11;
  12: RuntimeMetadataV12;
  13: RuntimeMetadataV13;
}

/** Widest legacy shape; every version's tree is assignable to it. */
export interface LegacyMetadata {
  modules: Array<LegacyModule & { index?: number }>;
  extrinsic?: LegacyExtrinsic;
}
