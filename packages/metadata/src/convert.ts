// Lossless upgrades between metadata versions.
//
// Legacy versions step forward one at a time up to V13. Among modern
// versions only V14 -> V15 is supported; nothing converts legacy metadata
// to a registry-backed version.

import { MetadataError } from "./errors.ts";
import { createLogger, CONVERT_NAMESPACE, type Logger } from "./logging.ts";
import type { RuntimeMetadataV14, RuntimeMetadataV15 } from "./modern/types.ts";
import type { TypeId } from "./registry/types.ts";
import { isLegacyVersion, type MetadataVersion, type RuntimeMetadata } from "./versions.ts";

export interface UpgradeOptions {
  logger?: Logger;
}

const MAX_MODULE_INDEX = 0xff;

function extrinsicParam(metadata: RuntimeMetadataV14, name: string): TypeId {
  const extrinsic = metadata.types.resolve(metadata.extrinsic.type);
  const param = extrinsic.params.find((p) => p.name === name);
  if (param === undefined || param.type === null) {
    throw MetadataError.unsupportedConversion(14, 15, `extrinsic type has no ${name} parameter`);
  }
  return param.type;
}

/** The single registry type whose path ends in `name`; null when absent or ambiguous. */
function uniqueTypeNamed(metadata: RuntimeMetadataV14, name: string): TypeId | null {
  const matches = metadata.types
    .toPortable()
    .filter(({ type }) => type.path[type.path.length - 1] === name);
  return matches.length === 1 ? matches[0].id : null;
}

/**
 * V14 -> V15. New fields take empty defaults; the extrinsic's type references
 * and the outer enums are read off the registry, never invented. An event or
 * error enum the registry does not single out is left `null`.
 */
export function v14ToV15(metadata: RuntimeMetadataV14): RuntimeMetadataV15 {
  const callType = extrinsicParam(metadata, "Call");
  return {
    types: metadata.types,
    pallets: metadata.pallets.map((pallet) => ({ ...pallet, docs: [] })),
    extrinsic: {
      version: metadata.extrinsic.version,
      addressType: extrinsicParam(metadata, "Address"),
      callType,
      signatureType: extrinsicParam(metadata, "Signature"),
      extraType: extrinsicParam(metadata, "Extra"),
      signedExtensions: metadata.extrinsic.signedExtensions,
    },
    type: metadata.type,
    apis: [],
    outerEnums: {
      callEnumType: callType,
      eventEnumType: uniqueTypeNamed(metadata, "RuntimeEvent"),
      errorEnumType: uniqueTypeNamed(metadata, "RuntimeError"),
    },
    custom: new Map(),
  };
}

/** One version forward. */
function step(value: RuntimeMetadata): RuntimeMetadata {
  switch (value.version) {
    case 8:
      return { version: 9, metadata: value.metadata };
    case 9:
      // Every V9 hasher exists in V10 under the same name.
      return { version: 10, metadata: value.metadata };
    case 10:
      return {
        version: 11,
        metadata: { ...value.metadata, extrinsic: { version: 0, signedExtensions: [] } },
      };
    case 11: {
      const { modules } = value.metadata;
      if (modules.length - 1 > MAX_MODULE_INDEX) {
        throw MetadataError.unsupportedConversion(11, 12, `${modules.length} modules do not fit a u8 index`);
      }
      return {
        version: 12,
        metadata: { ...value.metadata, modules: modules.map((module, index) => ({ ...module, index })) },
      };
    }
    case 12:
      return { version: 13, metadata: value.metadata };
    case 14:
      return { version: 15, metadata: v14ToV15(value.metadata) };
    case 13:
    case 15:
    case 16:
      throw MetadataError.unsupportedConversion(value.version, value.version + 1);
  }
}

function reachable(from: MetadataVersion, to: MetadataVersion): boolean {
  if (isLegacyVersion(from)) return isLegacyVersion(to);
  return from === 14 && to === 15;
}

/**
 * Upgrade to `targetVersion`. The same version is returned unchanged.
 *
 * @throws MetadataError (UNSUPPORTED_DOWNGRADE) when the target is older
 * @throws MetadataError (UNSUPPORTED_CONVERSION) when no lossless path
 * exists, or a V14 registry lacks what V15 needs
 */
export function upgradeMetadata(
  value: RuntimeMetadata,
  targetVersion: MetadataVersion,
  options: UpgradeOptions = {},
): RuntimeMetadata {
  const from = value.version;
  if (targetVersion === from) return value;
  if (targetVersion < from) {
    throw MetadataError.unsupportedDowngrade(from, targetVersion);
  }
  if (!reachable(from, targetVersion)) {
    throw MetadataError.unsupportedConversion(from, targetVersion);
  }

  const log = options.logger ?? createLogger(CONVERT_NAMESPACE);
  let current = value;
  while (current.version < targetVersion) {
    const next = step(current);
    log(`V${current.version} → V${next.version}`, {
      type: "convert",
      from: current.version,
      to: next.version,
    });
    current = next;
  }
  return current;
}
