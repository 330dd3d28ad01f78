// Version tags and the closed union of decoded metadata.

import type { LegacyMetadataByVersion, LegacyVersion } from "./legacy/types.ts";
import type { ModernMetadataByVersion, ModernVersion } from "./modern/types.ts";

export type MetadataVersion = LegacyVersion | ModernVersion;

/** Decodable versions. 0..7 are deprecated and never decodable. */
export const SUPPORTED_VERSIONS: readonly MetadataVersion[] = [8, 9, 10, 11, 12, 13, 14, 15, 16];

export const LATEST_VERSION = 16 satisfies MetadataVersion;

export function isMetadataVersion(tag: number): tag is MetadataVersion {
  return SUPPORTED_VERSIONS.some((v) => v === tag);
}

export function isLegacyVersion(version: MetadataVersion): version is LegacyVersion {
  return version <= 13;
}

export interface MetadataByVersion extends LegacyMetadataByVersion, ModernMetadataByVersion {}

/** Decoded metadata, discriminated by `version`. */
export type RuntimeMetadata = {
  [V in MetadataVersion]: { version: V; metadata: MetadataByVersion[V] };
}[MetadataVersion];

export type RuntimeMetadataOf<V extends MetadataVersion> = Extract<RuntimeMetadata, { version: V }>;
