// Versioned envelope: "meta" magic, one version byte, then the payload.

import {
  ScaleDecodeError,
  ScaleEncodeError,
  concat,
  type CodecOptions,
  type DecodeResult,
} from "@scale-metadata/codec";
import { resolveOptions, type MetadataCodecOptions, type ResolvedOptions } from "./config.ts";
import { upgradeMetadata } from "./convert.ts";
import { MetadataError, MetadataErrorKind } from "./errors.ts";
import { decodeLegacy, encodeLegacy } from "./legacy/codec.ts";
import { decodeV14, decodeV15, decodeV16, encodeModern } from "./modern/codec.ts";
import type { TypeRegistry } from "./registry/registry.ts";
import { isMetadataVersion, type MetadataVersion, type RuntimeMetadata } from "./versions.ts";

/** `meta`, the little-endian bytes of 0x6174656d. */
export const MAGIC = Uint8Array.of(0x6d, 0x65, 0x74, 0x61);

const PAYLOAD_OFFSET = MAGIC.length + 1;

type SymbolRef = [id: number, path: string];

// ============================================================================
// Helpers
// ============================================================================

function checkMagic(bytes: Uint8Array): void {
  if (bytes.length < MAGIC.length || MAGIC.some((b, i) => bytes[i] !== b)) {
    throw MetadataError.badMagic(bytes.subarray(0, MAGIC.length));
  }
}

function readVersionByte(bytes: Uint8Array): number {
  checkMagic(bytes);
  if (bytes.length < PAYLOAD_OFFSET) {
    throw new MetadataError(MetadataErrorKind.MALFORMED_PAYLOAD, "missing version byte", {
      offset: MAGIC.length,
    });
  }
  return bytes[MAGIC.length];
}

function symbolCollector(enabled: boolean): { symbols: SymbolRef[]; options: CodecOptions } {
  const symbols: SymbolRef[] = [];
  return {
    symbols,
    options: enabled ? { onSymbol: (id, path) => symbols.push([id, path]) } : {},
  };
}

function checkClosure(registry: TypeRegistry, symbols: readonly SymbolRef[]): void {
  for (const [id, path] of symbols) {
    if (!registry.has(id)) {
      throw MetadataError.danglingTypeReference(id, path);
    }
  }
}

function registryOf(value: RuntimeMetadata): TypeRegistry | null {
  const tree = value.metadata;
  return "types" in tree ? tree.types : null;
}

/** Attach the version to payload errors raised below the envelope. */
function payloadError(e: unknown, version: MetadataVersion): unknown {
  if (e instanceof ScaleDecodeError) {
    return new MetadataError(
      MetadataErrorKind.MALFORMED_PAYLOAD,
      `malformed V${version} payload at ${e.path} (offset ${e.offset}): ${e.reason}`,
      { version, offset: e.offset, path: e.path, cause: e },
    );
  }
  if (e instanceof ScaleEncodeError) {
    return new MetadataError(
      MetadataErrorKind.UNENCODABLE_VALUE,
      `cannot encode V${version} metadata at ${e.path}: ${e.reason}`,
      { version, path: e.path, cause: e },
    );
  }
  if (e instanceof MetadataError && e.version === undefined) {
    return new MetadataError(e.kind, e.message, {
      version,
      offset: e.offset,
      path: e.path,
      typeId: e.typeId,
      cause: e.cause,
    });
  }
  return e;
}

// ============================================================================
// Payload dispatch
// ============================================================================

function decodePayload(
  version: MetadataVersion,
  bytes: Uint8Array,
  options: CodecOptions,
): DecodeResult<RuntimeMetadata> {
  const offset = PAYLOAD_OFFSET;
  switch (version) {
    case 8: {
      const { value, next } = decodeLegacy(8, bytes, offset);
      return { value: { version, metadata: value }, next };
    }
    case 9: {
      const { value, next } = decodeLegacy(9, bytes, offset);
      return { value: { version, metadata: value }, next };
    }
    case 10: {
      const { value, next } = decodeLegacy(10, bytes, offset);
      return { value: { version, metadata: value }, next };
    }
    case 11: {
      const { value, next } = decodeLegacy(11, bytes, offset);
      return { value: { version, metadata: value }, next };
    }
    case 12: {
      const { value, next } = decodeLegacy(12, bytes, offset);
      return { value: { version, metadata: value }, next };
    }
    case 13: {
      const { value, next } = decodeLegacy(13, bytes, offset);
      return { value: { version, metadata: value }, next };
    }
    case 14: {
      const { value, next } = decodeV14(bytes, offset, options);
      return { value: { version, metadata: value }, next };
    }
    case 15: {
      const { value, next } = decodeV15(bytes, offset, options);
      return { value: { version, metadata: value }, next };
    }
    case 16: {
      const { value, next } = decodeV16(bytes, offset, options);
      return { value: { version, metadata: value }, next };
    }
  }
}

function encodePayload(value: RuntimeMetadata, options: CodecOptions): Uint8Array {
  switch (value.version) {
    case 8:
    case 9:
    case 10:
    case 11:
    case 12:
    case 13:
      return encodeLegacy(value.version, value.metadata);
    case 14:
      return encodeModern(14, value.metadata, options);
    case 15:
      return encodeModern(15, value.metadata, options);
    case 16:
      return encodeModern(16, value.metadata, options);
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Read the version tag without decoding the payload. The tag is returned
 * as is, whether or not it is supported.
 *
 * @throws MetadataError (BAD_MAGIC) or (MALFORMED_PAYLOAD) when the version
 * byte is missing
 */
export function versionOf(bytes: Uint8Array): number {
  return readVersionByte(bytes);
}

/** Whether a tag is supported and enabled. */
export function isSupportedVersion(
  tag: number,
  options: MetadataCodecOptions = {},
): tag is MetadataVersion {
  return isMetadataVersion(tag) && resolveOptions(options).versions.has(tag);
}

function decodeResolved(bytes: Uint8Array, options: ResolvedOptions): RuntimeMetadata {
  const tag = readVersionByte(bytes);
  if (!isMetadataVersion(tag) || !options.versions.has(tag)) {
    throw MetadataError.unsupportedVersion(tag);
  }

  const collector = symbolCollector(options.validateTypes);
  let decoded: DecodeResult<RuntimeMetadata>;
  try {
    decoded = decodePayload(tag, bytes, collector.options);
  } catch (e) {
    throw payloadError(e, tag);
  }

  if (decoded.next !== bytes.length) {
    throw new MetadataError(
      MetadataErrorKind.MALFORMED_PAYLOAD,
      `${bytes.length - decoded.next} trailing bytes after V${tag} payload`,
      { version: tag, offset: decoded.next },
    );
  }

  const registry = registryOf(decoded.value);
  if (registry !== null) {
    checkClosure(registry, collector.symbols);
  }
  return decoded.value;
}

function encodeResolved(value: RuntimeMetadata, options: ResolvedOptions): Uint8Array {
  if (!options.versions.has(value.version)) {
    throw MetadataError.unsupportedVersion(value.version);
  }

  const registry = registryOf(value);
  const collector = symbolCollector(options.validateTypes && registry !== null);
  let payload: Uint8Array;
  try {
    payload = encodePayload(value, collector.options);
  } catch (e) {
    throw payloadError(e, value.version);
  }
  if (registry !== null) {
    checkClosure(registry, collector.symbols);
  }
  return concat(MAGIC, Uint8Array.of(value.version), payload);
}

function describeFailure(e: unknown): Record<string, unknown> {
  if (e instanceof MetadataError) return { ok: false, kind: e.kind, message: e.message };
  if (e instanceof Error) return { ok: false, name: e.name, message: e.message };
  return { ok: false, error: e };
}

/**
 * Decode prefixed metadata. All-or-nothing: on failure no partial tree is
 * returned.
 *
 * Checks run in order: magic, version byte, version support, payload,
 * trailing bytes, then (modern versions) type closure.
 */
export function decodeMetadata(
  bytes: Uint8Array,
  options: MetadataCodecOptions = {},
): RuntimeMetadata {
  return decodeWith(bytes, resolveOptions(options));
}

/**
 * Encode metadata with its magic and version prefix.
 *
 * @throws MetadataError (UNENCODABLE_VALUE) when the tree does not fit its
 * version, (DANGLING_TYPE_REFERENCE) when a modern tree refers to a type its
 * registry lacks
 */
export function encodeMetadata(
  value: RuntimeMetadata,
  options: MetadataCodecOptions = {},
): Uint8Array {
  return encodeWith(value, resolveOptions(options));
}

function decodeWith(bytes: Uint8Array, options: ResolvedOptions): RuntimeMetadata {
  const log = options.loggers.decode;
  const start = performance.now();
  try {
    const value = decodeResolved(bytes, options);
    const duration = performance.now() - start;
    log(`V${value.version} ${bytes.length} bytes ✓ ${duration.toFixed(2)}ms`, {
      type: "decode",
      version: value.version,
      bytes: bytes.length,
      duration: `${duration.toFixed(2)}ms`,
    });
    return value;
  } catch (e) {
    log(`✗ ${bytes.length} bytes`, { type: "decode", ...describeFailure(e) });
    throw e;
  }
}

function encodeWith(value: RuntimeMetadata, options: ResolvedOptions): Uint8Array {
  const log = options.loggers.encode;
  const start = performance.now();
  try {
    const bytes = encodeResolved(value, options);
    const duration = performance.now() - start;
    log(`V${value.version} ${bytes.length} bytes ✓ ${duration.toFixed(2)}ms`, {
      type: "encode",
      version: value.version,
      bytes: bytes.length,
      duration: `${duration.toFixed(2)}ms`,
    });
    return bytes;
  } catch (e) {
    log(`✗ V${value.version}`, { type: "encode", ...describeFailure(e) });
    throw e;
  }
}

export interface MetadataCodec {
  readonly options: ResolvedOptions;
  decode(bytes: Uint8Array): RuntimeMetadata;
  encode(value: RuntimeMetadata): Uint8Array;
  versionOf(bytes: Uint8Array): number;
  isSupported(tag: number): tag is MetadataVersion;
  /** `upgradeMetadata` to an enabled version, logged on the convert logger. */
  upgrade(value: RuntimeMetadata, targetVersion: MetadataVersion): RuntimeMetadata;
}

/** Bundle the envelope operations with fixed options. */
export function createMetadataCodec(options: MetadataCodecOptions = {}): MetadataCodec {
  const resolved = resolveOptions(options);
  return {
    options: resolved,
    decode: (bytes) => decodeWith(bytes, resolved),
    encode: (value) => encodeWith(value, resolved),
    versionOf,
    isSupported: (tag): tag is MetadataVersion => isMetadataVersion(tag) && resolved.versions.has(tag),
    upgrade: (value, targetVersion) => {
      if (!resolved.versions.has(targetVersion)) {
        throw MetadataError.unsupportedVersion(targetVersion);
      }
      return upgradeMetadata(value, targetVersion, { logger: resolved.loggers.convert });
    },
  };
}
