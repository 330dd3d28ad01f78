// Errors raised while decoding, encoding and converting runtime metadata.

/** Failure classes. */
export const MetadataErrorKind = {
  /** First four bytes are not `meta`. */
  BAD_MAGIC: "BAD_MAGIC",
  /** Version discriminant is deprecated, unknown or not enabled. */
  UNSUPPORTED_VERSION: "UNSUPPORTED_VERSION",
  /** Structural decode failure inside the payload. */
  MALFORMED_PAYLOAD: "MALFORMED_PAYLOAD",
  /** A type id is used that the registry does not define. */
  DANGLING_TYPE_REFERENCE: "DANGLING_TYPE_REFERENCE",
  /** Upgrade asked to go to an older version. */
  UNSUPPORTED_DOWNGRADE: "UNSUPPORTED_DOWNGRADE",
  /** No lossless conversion between the two versions. */
  UNSUPPORTED_CONVERSION: "UNSUPPORTED_CONVERSION",
  /** Value handed to the encoder does not fit its version's schema. */
  UNENCODABLE_VALUE: "UNENCODABLE_VALUE",
} as const;

export type MetadataErrorKind = (typeof MetadataErrorKind)[keyof typeof MetadataErrorKind];

export interface MetadataErrorDetails {
  version?: number;
  offset?: number;
  path?: string;
  typeId?: number;
  cause?: unknown;
}

/**
 * Metadata failure with structured context.
 *
 * Decoding is all-or-nothing: when one of these is thrown no partial value
 * has been returned.
 */
export class MetadataError extends Error {
  readonly kind: MetadataErrorKind;
  /** Version tag involved, when known. */
  readonly version: number | undefined;
  /** Byte offset of the failing value, for payload failures. */
  readonly offset: number | undefined;
  /** Path from the tree root to the failing value. */
  readonly path: string | undefined;
  /** The dangling type id. */
  readonly typeId: number | undefined;

  constructor(kind: MetadataErrorKind, message: string, details: MetadataErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "MetadataError";
    this.kind = kind;
    this.version = details.version;
    this.offset = details.offset;
    this.path = details.path;
    this.typeId = details.typeId;
  }

  static badMagic(found: Uint8Array): MetadataError {
    const hex = Array.from(found, (b) => b.toString(16).padStart(2, "0")).join(" ");
    return new MetadataError(
      MetadataErrorKind.BAD_MAGIC,
      `bad magic: expected 6d 65 74 61, found ${hex || "<empty>"}`,
    );
  }

  static unsupportedVersion(version: number): MetadataError {
    const reason = version < 8 ? "deprecated" : version > 16 ? "unknown" : "not enabled";
    return new MetadataError(
      MetadataErrorKind.UNSUPPORTED_VERSION,
      `unsupported metadata version ${version} (${reason})`,
      { version },
    );
  }

  static danglingTypeReference(typeId: number, path?: string): MetadataError {
    const where = path === undefined ? "" : ` at ${path}`;
    return new MetadataError(
      MetadataErrorKind.DANGLING_TYPE_REFERENCE,
      `type id ${typeId} is not defined in the registry${where}`,
      { typeId, path },
    );
  }

  static unsupportedDowngrade(from: number, to: number): MetadataError {
    return new MetadataError(
      MetadataErrorKind.UNSUPPORTED_DOWNGRADE,
      `cannot convert metadata V${from} to older V${to}`,
      { version: from },
    );
  }

  static unsupportedConversion(from: number, to: number, reason?: string): MetadataError {
    const suffix = reason === undefined ? "" : `: ${reason}`;
    return new MetadataError(
      MetadataErrorKind.UNSUPPORTED_CONVERSION,
      `no lossless conversion from V${from} to V${to}${suffix}`,
      { version: from },
    );
  }
}

/** Type guard, optionally narrowed to one failure class. */
export function isMetadataError(e: unknown, kind?: MetadataErrorKind): e is MetadataError {
  return e instanceof MetadataError && (kind === undefined || e.kind === kind);
}
