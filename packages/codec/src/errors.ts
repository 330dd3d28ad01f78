// Errors raised by the schema-driven codec.

/**
 * Structural decode failure: truncated input, unknown discriminant,
 * non-canonical compact, length prefix overrunning the buffer, and so on.
 */
export class ScaleDecodeError extends Error {
  /** Dotted path from the root schema to the failing value. */
  readonly path: string;
  /** Byte offset where decoding of the failing value started. */
  readonly offset: number;
  /** The primitive-level reason, without context. */
  readonly reason: string;

  constructor(reason: string, path: string, offset: number, details: string) {
    super(`Decode error:\n  ${details}`);
    this.name = "ScaleDecodeError";
    this.reason = reason;
    this.path = path;
    this.offset = offset;
  }
}

/** A value that does not fit its schema. */
export class ScaleEncodeError extends Error {
  readonly path: string;
  readonly reason: string;

  constructor(reason: string, path: string) {
    super(`Encode error at ${path}: ${reason}`);
    this.name = "ScaleEncodeError";
    this.reason = reason;
    this.path = path;
  }
}
