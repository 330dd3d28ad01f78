// Accessors over decoded metadata: pallet lookup, and the extension slots of
// modern versions (custom values, outer enums, extrinsic extensions).

import { MetadataError, MetadataErrorKind } from "./errors.ts";
import type { TypeId } from "./registry/types.ts";
import type { CustomValue, RuntimeMetadataV16, TransactionExtension } from "./modern/types.ts";
import type { RuntimeMetadata } from "./versions.ts";

/** Pallet (module, before V14) names in declaration order. */
export function palletNames(metadata: RuntimeMetadata): string[] {
  const tree = metadata.metadata;
  if ("pallets" in tree) return tree.pallets.map((pallet) => pallet.name);
  return tree.modules.map((module) => module.name);
}

function asciiLowerCase(s: string): string {
  return s.replace(/[A-Z]/g, (c) => c.toLowerCase());
}

/**
 * Position of a pallet in declaration order, matching names ASCII
 * case-insensitively. This is the list position, not the pallet's encoded
 * `index`.
 */
export function palletIndex(metadata: RuntimeMetadata, name: string): number | undefined {
  const wanted = asciiLowerCase(name);
  const position = palletNames(metadata).findIndex((n) => asciiLowerCase(n) === wanted);
  return position === -1 ? undefined : position;
}

/** Custom value by key. Versions before V15 have no custom map. */
export function customValue(metadata: RuntimeMetadata, key: string): CustomValue | undefined {
  const tree = metadata.metadata;
  if (!("custom" in tree)) return undefined;
  return tree.custom.get(key);
}

export interface OuterEnumTypes {
  call: TypeId;
  event: TypeId | null;
  error: TypeId | null;
}

/** Runtime-wide call, event and error enums; null before V15. */
export function outerEnums(metadata: RuntimeMetadata): OuterEnumTypes | null {
  const tree = metadata.metadata;
  if (!("outerEnums" in tree)) return null;
  const { callEnumType, eventEnumType, errorEnumType } = tree.outerEnums;
  return { call: callEnumType, event: eventEnumType, error: errorEnumType };
}

/**
 * Extrinsic extensions of any modern version in one shape. V14/V15 signed
 * extensions report their additional signed data as `implicit`. Empty for
 * legacy versions, which only name their extensions.
 */
export function extrinsicExtensions(metadata: RuntimeMetadata): TransactionExtension[] {
  switch (metadata.version) {
    case 14:
    case 15:
      return metadata.metadata.extrinsic.signedExtensions.map((ext) => ({
        identifier: ext.identifier,
        type: ext.type,
        implicit: ext.additionalSigned,
      }));
    case 16:
      return metadata.metadata.extrinsic.transactionExtensions;
    default:
      return [];
  }
}

/**
 * Transaction extensions used by one extrinsic version, in order.
 *
 * @returns undefined when the extrinsic version is not listed
 * @throws MetadataError (MALFORMED_PAYLOAD) for an index past the end of
 * `transactionExtensions`
 */
export function transactionExtensionsForVersion(
  metadata: RuntimeMetadataV16,
  version: number,
): TransactionExtension[] | undefined {
  const { transactionExtensions, transactionExtensionsByVersion } = metadata.extrinsic;
  const indices = transactionExtensionsByVersion.get(version);
  if (indices === undefined) return undefined;
  return indices.map((index, i) => {
    const extension = transactionExtensions[index];
    if (extension === undefined) {
      throw new MetadataError(
        MetadataErrorKind.MALFORMED_PAYLOAD,
        `transaction extension index ${index} out of range (${transactionExtensions.length} extensions)`,
        { version: 16, path: `extrinsic.transactionExtensionsByVersion.{${version}}.[${i}]` },
      );
    }
    return extension;
  });
}
