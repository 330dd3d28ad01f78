// @scale-metadata/metadata - versioned runtime metadata decoding, encoding
// and conversion.

// Errors
export { MetadataError, MetadataErrorKind, isMetadataError } from "./errors.ts";
export type { MetadataErrorDetails } from "./errors.ts";

// Versions
export type { MetadataVersion, MetadataByVersion, RuntimeMetadata, RuntimeMetadataOf } from "./versions.ts";
export { SUPPORTED_VERSIONS, LATEST_VERSION, isMetadataVersion, isLegacyVersion } from "./versions.ts";

// Envelope
export type { MetadataCodec } from "./envelope.ts";
export {
  MAGIC,
  versionOf,
  isSupportedVersion,
  decodeMetadata,
  encodeMetadata,
  createMetadataCodec,
} from "./envelope.ts";

// Options and logging
export type { MetadataCodecOptions, ResolvedOptions } from "./config.ts";
export { resolveOptions } from "./config.ts";
export type { Logger } from "./logging.ts";
export { createLogger, isEnabled, DECODE_NAMESPACE, ENCODE_NAMESPACE, CONVERT_NAMESPACE } from "./logging.ts";

// Type registry
export type {
  TypeId,
  PrimitiveType,
  Field,
  Variant,
  TypeDef,
  TypeParameter,
  TypeDescriptor,
  PortableType,
} from "./registry/types.ts";
export { PRIMITIVE_TYPES } from "./registry/types.ts";
export { TypeRegistry, TypeRegistryBuilder, referencedIds, typeName } from "./registry/registry.ts";

// Legacy trees (V8..V13)
export type {
  LegacyVersion,
  StorageHasherV8,
  StorageHasherV10,
  StorageHasherV11,
  LegacyStorageHasher,
  StorageLayout,
  LegacyStorageKey,
  LegacyStorageEntryType,
  LegacyStorageEntry,
  LegacyStorage,
  LegacyFunctionArgument,
  LegacyFunction,
  LegacyEvent,
  LegacyConstant,
  LegacyError,
  LegacyModule,
  IndexedLegacyModule,
  LegacyExtrinsic,
  RuntimeMetadataV8,
  RuntimeMetadataV9,
  RuntimeMetadataV10,
  RuntimeMetadataV11,
  RuntimeMetadataV12,
  RuntimeMetadataV13,
  LegacyMetadataByVersion,
  LegacyMetadata,
} from "./legacy/types.ts";
export { LEGACY_VERSIONS, HASHERS_V8, HASHERS_V10, HASHERS_V11, hashersFor } from "./legacy/types.ts";

// Modern trees (V14..V16)
export type {
  ModernVersion,
  StorageHasher,
  StorageModifier,
  StorageEntryType,
  StorageEntry,
  PalletStorage,
  PalletTypeRef,
  PalletConstant,
  SignedExtension,
  FunctionParam,
  OuterEnums,
  CustomValue,
  PalletV14,
  ExtrinsicV14,
  RuntimeMetadataV14,
  PalletV15,
  ExtrinsicV15,
  RuntimeApiMethodV15,
  RuntimeApiV15,
  RuntimeMetadataV15,
  DeprecationStatus,
  DeprecationInfo,
  PalletTypeRefV16,
  StorageEntryV16,
  PalletConstantV16,
  AssociatedType,
  ViewFunction,
  PalletV16,
  TransactionExtension,
  ExtrinsicV16,
  RuntimeApiMethodV16,
  RuntimeApiV16,
  RuntimeMetadataV16,
  ModernMetadataByVersion,
} from "./modern/types.ts";
export { MODERN_VERSIONS, STORAGE_HASHERS, STORAGE_MODIFIERS } from "./modern/types.ts";
export type { StorageKey } from "./modern/storage.ts";
export { storageKeys } from "./modern/storage.ts";

// Extension slots
export type { OuterEnumTypes } from "./extensions.ts";
export {
  customValue,
  outerEnums,
  extrinsicExtensions,
  transactionExtensionsForVersion,
  palletNames,
  palletIndex,
} from "./extensions.ts";

// Conversion
export type { UpgradeOptions } from "./convert.ts";
export { upgradeMetadata, v14ToV15 } from "./convert.ts";

// JSON
export { metadataToJson, metadataFromJson } from "./json.ts";
