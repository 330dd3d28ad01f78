// Codec options and their defaults.

import { createLogger, CONVERT_NAMESPACE, DECODE_NAMESPACE, ENCODE_NAMESPACE, type Logger } from "./logging.ts";
import { SUPPORTED_VERSIONS, isMetadataVersion, type MetadataVersion } from "./versions.ts";

export interface MetadataCodecOptions {
  /**
   * Versions the codec accepts. Defaults to every supported version.
   * Others fail with UNSUPPORTED_VERSION as if unknown.
   */
  versions?: readonly MetadataVersion[];

  /**
   * Check that every type id in a modern tree resolves in its registry.
   * Defaults to true.
   */
  validateTypes?: boolean;

  /**
   * Replaces the namespace debug loggers.
   */
  logger?: Logger;
}

export interface ResolvedOptions {
  readonly versions: ReadonlySet<MetadataVersion>;
  readonly validateTypes: boolean;
  readonly loggers: Readonly<{ decode: Logger; encode: Logger; convert: Logger }>;
}

/**
 * Fill defaults. The result is frozen.
 *
 * @throws RangeError for a version number that is not supported
 */
export function resolveOptions(options: MetadataCodecOptions = {}): ResolvedOptions {
  const versions = options.versions ?? SUPPORTED_VERSIONS;
  for (const version of versions) {
    if (!isMetadataVersion(version)) {
      throw new RangeError(`metadata version ${version} is not supported`);
    }
  }

  const { logger } = options;
  return Object.freeze({
    versions: new Set(versions),
    validateTypes: options.validateTypes ?? true,
    loggers: Object.freeze({
      decode: logger ?? createLogger(DECODE_NAMESPACE),
      encode: logger ?? createLogger(ENCODE_NAMESPACE),
      convert: logger ?? createLogger(CONVERT_NAMESPACE),
    }),
  });
}
