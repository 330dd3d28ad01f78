// Modern (V14..V16) metadata trees.
//
// Every type is a `TypeId` into the embedded registry; the tree itself holds
// no type descriptions.

import type { TypeRegistry } from "../registry/registry.ts";
import type { TypeId } from "../registry/types.ts";

export type ModernVersion = 14 | 15 | 16;

export const MODERN_VERSIONS: readonly ModernVersion[] = [14, 15, 16];

// ============================================================================
// Common
// ============================================================================

/** Storage hashers in wire order. */
export const STORAGE_HASHERS = [
  "Blake2_128",
  "Blake2_256",
  "Blake2_128Concat",
  "Twox128",
  "Twox256",
  "Twox64Concat",
  "Identity",
] as const;

export type StorageHasher = (typeof STORAGE_HASHERS)[number];

export const STORAGE_MODIFIERS = ["Optional", "Default"] as const;

export type StorageModifier = (typeof STORAGE_MODIFIERS)[number];

/**
 * A `Map` has one hasher per key component; with more than one hasher `key`
 * is a tuple type.
 */
export type StorageEntryType =
  | { tag: "Plain"; value: TypeId }
  | { tag: "Map"; hashers: StorageHasher[]; key: TypeId; value: TypeId };

export interface StorageEntry {
  name: string;
  modifier: StorageModifier;
  type: StorageEntryType;
  default: Uint8Array;
  docs: string[];
}

export interface PalletStorage<E extends StorageEntry = StorageEntry> {
  prefix: string;
  entries: E[];
}

/** Calls, event or error enum of a pallet. */
export interface PalletTypeRef {
  type: TypeId;
}

export interface PalletConstant {
  name: string;
  type: TypeId;
  value: Uint8Array;
  docs: string[];
}

export interface SignedExtension {
  identifier: string;
  type: TypeId;
  additionalSigned: TypeId;
}

export interface FunctionParam {
  name: string;
  type: TypeId;
}

/**
 * `null` marks an enum left unspecified by an upgrade from V14; decoded trees
 * always carry ids, and a `null` cannot be encoded.
 */
export interface OuterEnums {
  callEnumType: TypeId;
  eventEnumType: TypeId | null;
  errorEnumType: TypeId | null;
}

/** Opaque SCALE-encoded value of a custom entry, typed by `type`. */
export interface CustomValue {
  type: TypeId;
  value: Uint8Array;
}

// ============================================================================
// V14
// ============================================================================

export interface PalletV14 {
  name: string;
  storage: PalletStorage | null;
  calls: PalletTypeRef | null;
  event: PalletTypeRef | null;
  constants: PalletConstant[];
  error: PalletTypeRef | null;
  index: number;
}

export interface ExtrinsicV14 {
  /** The extrinsic type, with generic params Address, Call, Signature, Extra. */
  type: TypeId;
  version: number;
  signedExtensions: SignedExtension[];
}

export interface RuntimeMetadataV14 {
  types: TypeRegistry;
  pallets: PalletV14[];
  extrinsic: ExtrinsicV14;
  /** The runtime type. */
  type: TypeId;
}

// ============================================================================
// V15
// ============================================================================

export interface PalletV15 extends PalletV14 {
  docs: string[];
}

export interface ExtrinsicV15 {
  version: number;
  addressType: TypeId;
  callType: TypeId;
  signatureType: TypeId;
  extraType: TypeId;
  signedExtensions: SignedExtension[];
}

export interface RuntimeApiMethodV15 {
  name: string;
  inputs: FunctionParam[];
  output: TypeId;
  docs: string[];
}

export interface RuntimeApiV15 {
  name: string;
  methods: RuntimeApiMethodV15[];
  docs: string[];
}

export interface RuntimeMetadataV15 {
  types: TypeRegistry;
  pallets: PalletV15[];
  extrinsic: ExtrinsicV15;
  type: TypeId;
  apis: RuntimeApiV15[];
  outerEnums: OuterEnums;
  custom: Map<string, CustomValue>;
}

// ============================================================================
// V16
// ============================================================================

export type DeprecationStatus =
  | { tag: "NotDeprecated" }
  | { tag: "DeprecatedWithoutNote" }
  | { tag: "Deprecated"; note: string; since: string | null };

/**
 * Deprecation of an enum-like item (calls, event, error): the whole item,
 * or individual variants keyed by variant index.
 */
export type DeprecationInfo =
  | { tag: "NotDeprecated" }
  | { tag: "ItemDeprecated"; value: DeprecationStatus }
  | { tag: "VariantsDeprecated"; value: Map<number, DeprecationStatus> };

export interface PalletTypeRefV16 extends PalletTypeRef {
  deprecationInfo: DeprecationInfo;
}

export interface StorageEntryV16 extends StorageEntry {
  deprecationInfo: DeprecationStatus;
}

export interface PalletConstantV16 extends PalletConstant {
  deprecationInfo: DeprecationStatus;
}

export interface AssociatedType {
  name: string;
  type: TypeId;
  docs: string[];
}

export interface ViewFunction {
  name: string;
  /** 32-byte query id. */
  id: Uint8Array;
  inputs: FunctionParam[];
  output: TypeId;
  docs: string[];
  deprecationInfo: DeprecationStatus;
}

export interface PalletV16 {
  name: string;
  storage: PalletStorage<StorageEntryV16> | null;
  calls: PalletTypeRefV16 | null;
  event: PalletTypeRefV16 | null;
  constants: PalletConstantV16[];
  error: PalletTypeRefV16 | null;
  associatedTypes: AssociatedType[];
  viewFunctions: ViewFunction[];
  index: number;
  docs: string[];
  deprecationInfo: DeprecationStatus;
}

export interface TransactionExtension {
  identifier: string;
  type: TypeId;
  /** Implicit data signed alongside the extrinsic. */
  implicit: TypeId;
}

export interface ExtrinsicV16 {
  versions: number[];
  addressType: TypeId;
  signatureType: TypeId;
  /** Extrinsic version -> indices into `transactionExtensions`. */
  transactionExtensionsByVersion: Map<number, number[]>;
  transactionExtensions: TransactionExtension[];
}

export interface RuntimeApiMethodV16 extends RuntimeApiMethodV15 {
  deprecationInfo: DeprecationStatus;
}

export interface RuntimeApiV16 {
  name: string;
  methods: RuntimeApiMethodV16[];
  docs: string[];
  deprecationInfo: DeprecationStatus;
  version: number;
}

export interface RuntimeMetadataV16 {
  types: TypeRegistry;
  pallets: PalletV16[];
  extrinsic: ExtrinsicV16;
  apis: RuntimeApiV16[];
  outerEnums: OuterEnums;
  custom: Map<string, CustomValue>;
}

export interface ModernMetadataByVersion {
  14: RuntimeMetadataV14;
  15: RuntimeMetadataV15;
  16: RuntimeMetadataV16;
}
