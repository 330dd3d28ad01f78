// SCALE primitive encoding for TypeScript
//
// Fixed-width integers are little-endian, lengths are compact-prefixed,
// booleans and option markers are a single byte.

import { encodeCompact, decodeCompact, decodeCompactNumber } from "./binary/compact.ts";
import { concat } from "./binary/bytes.ts";

// ============================================================================
// Decode result type
// ============================================================================

export interface DecodeResult<T> {
  value: T;
  next: number; // offset after this value
}

// ============================================================================
// Fixed-width integers
// ============================================================================

function encodeUnsigned(value: bigint, bytes: number, label: string): Uint8Array {
  if (value < 0n || value >= 1n << BigInt(bytes * 8)) {
    throw new Error(`${label}: value ${value} out of range`);
  }
  const out = new Uint8Array(bytes);
  let remaining = value;
  for (let i = 0; i < bytes; i++) {
    out[i] = Number(remaining & 0xffn);
    remaining >>= 8n;
  }
  return out;
}

function decodeUnsigned(
  buf: Uint8Array,
  offset: number,
  bytes: number,
  label: string,
): DecodeResult<bigint> {
  if (offset + bytes > buf.length) throw new Error(`${label}: eof`);
  let value = 0n;
  for (let i = bytes - 1; i >= 0; i--) {
    value = (value << 8n) | BigInt(buf[offset + i]);
  }
  return { value, next: offset + bytes };
}

function encodeSmall(value: number, bytes: number, label: string): Uint8Array {
  if (!Number.isInteger(value)) throw new Error(`${label}: ${value} is not an integer`);
  return encodeUnsigned(BigInt(value), bytes, label);
}

function decodeSmall(
  buf: Uint8Array,
  offset: number,
  bytes: number,
  label: string,
): DecodeResult<number> {
  const { value, next } = decodeUnsigned(buf, offset, bytes, label);
  return { value: Number(value), next };
}

/** Encode a boolean (1 byte: 0x00 or 0x01). */
export function encodeBool(value: boolean): Uint8Array {
  return Uint8Array.of(value ? 1 : 0);
}

/** Decode a boolean. */
export function decodeBool(buf: Uint8Array, offset: number): DecodeResult<boolean> {
  if (offset >= buf.length) throw new Error("bool: eof");
  const byte = buf[offset];
  if (byte > 1) throw new Error(`bool: invalid value ${byte}`);
  return { value: byte === 1, next: offset + 1 };
}

/** Encode a u8 (1 byte). */
export function encodeU8(value: number): Uint8Array {
  return encodeSmall(value, 1, "u8");
}

/** Decode a u8. */
export function decodeU8(buf: Uint8Array, offset: number): DecodeResult<number> {
  if (offset >= buf.length) throw new Error("u8: eof");
  return { value: buf[offset], next: offset + 1 };
}

/** Encode a u16 (2 bytes little-endian). */
export function encodeU16(value: number): Uint8Array {
  return encodeSmall(value, 2, "u16");
}

export function decodeU16(buf: Uint8Array, offset: number): DecodeResult<number> {
  return decodeSmall(buf, offset, 2, "u16");
}

/** Encode a u32 (4 bytes little-endian). */
export function encodeU32(value: number): Uint8Array {
  return encodeSmall(value, 4, "u32");
}

export function decodeU32(buf: Uint8Array, offset: number): DecodeResult<number> {
  return decodeSmall(buf, offset, 4, "u32");
}

/** Encode a u64 (8 bytes little-endian). */
export function encodeU64(value: bigint): Uint8Array {
  return encodeUnsigned(value, 8, "u64");
}

export function decodeU64(buf: Uint8Array, offset: number): DecodeResult<bigint> {
  return decodeUnsigned(buf, offset, 8, "u64");
}

/** Encode a u128 (16 bytes little-endian). */
export function encodeU128(value: bigint): Uint8Array {
  return encodeUnsigned(value, 16, "u128");
}

export function decodeU128(buf: Uint8Array, offset: number): DecodeResult<bigint> {
  return decodeUnsigned(buf, offset, 16, "u128");
}

// ============================================================================
// Compact u32
// ============================================================================

/** Encode a `Compact<u32>`. */
export function encodeCompactU32(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
    throw new Error(`compact u32: value ${value} out of range`);
  }
  return encodeCompact(value);
}

/** Decode a `Compact<u32>`. */
export function decodeCompactU32(buf: Uint8Array, offset: number): DecodeResult<number> {
  const result = decodeCompactNumber(buf, offset);
  if (result.value > 0xffffffff) throw new Error("compact u32: overflow");
  return result;
}

// ============================================================================
// Length-prefixed data
// ============================================================================

/** Read a compact length prefix and check it against the remaining bytes. */
export function decodeLength(buf: Uint8Array, offset: number, label: string): DecodeResult<number> {
  const len = decodeCompactNumber(buf, offset);
  const remaining = buf.length - len.next;
  if (len.value > remaining) {
    throw new Error(`${label}: length prefix ${len.value} exceeds remaining ${remaining} bytes`);
  }
  return len;
}

/** Encode a string (compact-length-prefixed UTF-8). */
export function encodeString(value: string): Uint8Array {
  const bytes = new TextEncoder().encode(value);
  return concat(encodeCompact(bytes.length), bytes);
}

/** Decode a string. */
export function decodeString(buf: Uint8Array, offset: number): DecodeResult<string> {
  const len = decodeLength(buf, offset, "string");
  const end = len.next + len.value;
  let s: string;
  try {
    s = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(buf.subarray(len.next, end));
  } catch {
    throw new Error("string: invalid utf-8");
  }
  return { value: s, next: end };
}

/** Encode bytes (compact-length-prefixed). */
export function encodeBytes(value: Uint8Array): Uint8Array {
  return concat(encodeCompact(value.length), value);
}

/** Decode bytes into a fresh copy. */
export function decodeBytes(buf: Uint8Array, offset: number): DecodeResult<Uint8Array> {
  const len = decodeLength(buf, offset, "bytes");
  const end = len.next + len.value;
  return { value: buf.slice(len.next, end), next: end };
}

/** Decode exactly `length` raw bytes (a `[u8; N]` array). */
export function decodeFixedBytes(
  buf: Uint8Array,
  offset: number,
  length: number,
): DecodeResult<Uint8Array> {
  if (offset + length > buf.length) throw new Error(`[u8; ${length}]: eof`);
  return { value: buf.slice(offset, offset + length), next: offset + length };
}

// ============================================================================
// Re-export for convenience
// ============================================================================

export { encodeCompact, decodeCompact, decodeCompactNumber };
export { concat };
