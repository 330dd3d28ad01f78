// Modern metadata payload encoding/decoding (V14..V16).

import {
  concat,
  decodeWithSchema,
  encodeWithSchema,
  type CodecOptions,
  type DecodeResult,
} from "@scale-metadata/codec";
import { TypeRegistry } from "../registry/registry.ts";
import type { PortableType } from "../registry/types.ts";
import { BODY_ROOT, REGISTRY_ROOT, modernSchemas } from "./schemas.ts";
import type {
  ModernMetadataByVersion,
  ModernVersion,
  RuntimeMetadataV14,
  RuntimeMetadataV15,
  RuntimeMetadataV16,
} from "./types.ts";

type Body<T> = Omit<T, "types">;

function decodeRegistry(
  version: ModernVersion,
  buf: Uint8Array,
  offset: number,
  options: CodecOptions,
): DecodeResult<TypeRegistry> {
  const { value, next } = decodeWithSchema(
    buf,
    offset,
    REGISTRY_ROOT,
    modernSchemas(version),
    withPrefix("types", options),
  ) as DecodeResult<PortableType[]>;
  return { value: TypeRegistry.fromPortable(value), next };
}

/** Report symbol paths relative to the tree root. */
function withPrefix(prefix: string, options: CodecOptions): CodecOptions {
  const { onSymbol } = options;
  if (onSymbol === undefined) return options;
  return {
    onSymbol: (id, path) => onSymbol(id, path === "<root>" ? prefix : `${prefix}.${path}`),
  };
}

function decodeBody(
  version: ModernVersion,
  buf: Uint8Array,
  offset: number,
  options: CodecOptions,
): DecodeResult<unknown> {
  return decodeWithSchema(buf, offset, BODY_ROOT, modernSchemas(version), options);
}

/**
 * Decode a V14 payload.
 *
 * Symbols are reported to `options.onSymbol`; the registry's closure is
 * the caller's concern.
 *
 * @throws ScaleDecodeError on structural failure
 * @throws MetadataError (MALFORMED_PAYLOAD) on duplicate registry ids
 */
export function decodeV14(
  buf: Uint8Array,
  offset: number,
  options: CodecOptions = {},
): DecodeResult<RuntimeMetadataV14> {
  const types = decodeRegistry(14, buf, offset, options);
  const body = decodeBody(14, buf, types.next, options) as DecodeResult<Body<RuntimeMetadataV14>>;
  return { value: { types: types.value, ...body.value }, next: body.next };
}

export function decodeV15(
  buf: Uint8Array,
  offset: number,
  options: CodecOptions = {},
): DecodeResult<RuntimeMetadataV15> {
  const types = decodeRegistry(15, buf, offset, options);
  const body = decodeBody(15, buf, types.next, options) as DecodeResult<Body<RuntimeMetadataV15>>;
  return { value: { types: types.value, ...body.value }, next: body.next };
}

export function decodeV16(
  buf: Uint8Array,
  offset: number,
  options: CodecOptions = {},
): DecodeResult<RuntimeMetadataV16> {
  const types = decodeRegistry(16, buf, offset, options);
  const body = decodeBody(16, buf, types.next, options) as DecodeResult<Body<RuntimeMetadataV16>>;
  return { value: { types: types.value, ...body.value }, next: body.next };
}

/**
 * Encode a modern payload: the registry, then the body.
 *
 * @throws ScaleEncodeError when the tree does not fit the version's schema
 */
export function encodeModern<V extends ModernVersion>(
  version: V,
  metadata: ModernMetadataByVersion[V],
  options: CodecOptions = {},
): Uint8Array {
  const schemas = modernSchemas(version);
  return concat(
    encodeWithSchema(metadata.types.toPortable(), REGISTRY_ROOT, schemas, withPrefix("types", options)),
    encodeWithSchema(metadata, BODY_ROOT, schemas, options),
  );
}
