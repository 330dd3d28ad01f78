// SCALE compact integers.
//
// The two low bits of the first byte select the mode:
//   0b00 single byte   (value < 2^6)
//   0b01 two bytes     (value < 2^14)
//   0b10 four bytes    (value < 2^30)
//   0b11 big integer   ((len - 4) << 2 | 0b11, then len little-endian bytes)

const SINGLE_BYTE_LIMIT = 1n << 6n;
const TWO_BYTE_LIMIT = 1n << 14n;
const FOUR_BYTE_LIMIT = 1n << 30n;
const MAX_BIG_BYTES = 67;

function littleEndian(value: bigint, length: number): Uint8Array {
  const out = new Uint8Array(length);
  let remaining = value;
  for (let i = 0; i < length; i++) {
    out[i] = Number(remaining & 0xffn);
    remaining >>= 8n;
  }
  return out;
}

function readLittleEndian(buf: Uint8Array, offset: number, length: number): bigint {
  let value = 0n;
  for (let i = length - 1; i >= 0; i--) {
    value = (value << 8n) | BigInt(buf[offset + i]);
  }
  return value;
}

export function encodeCompact(value: number | bigint): Uint8Array {
  const n = typeof value === "bigint" ? value : BigInt(value);
  if (n < 0n) throw new Error("compact: negative value");
  if (n < SINGLE_BYTE_LIMIT) return littleEndian(n << 2n, 1);
  if (n < TWO_BYTE_LIMIT) return littleEndian((n << 2n) | 0b01n, 2);
  if (n < FOUR_BYTE_LIMIT) return littleEndian((n << 2n) | 0b10n, 4);

  let length = 0;
  for (let rest = n; rest > 0n; rest >>= 8n) length++;
  if (length > MAX_BIG_BYTES) throw new Error("compact: value too large");
  length = Math.max(length, 4);

  const out = new Uint8Array(1 + length);
  out[0] = ((length - 4) << 2) | 0b11;
  out.set(littleEndian(n, length), 1);
  return out;
}

export function decodeCompact(
  buf: Uint8Array,
  offset: number,
): { value: bigint; next: number } {
  if (offset >= buf.length) throw new Error("compact: eof");
  const first = buf[offset];

  switch (first & 0b11) {
    case 0b00:
      return { value: BigInt(first >> 2), next: offset + 1 };
    case 0b01: {
      if (offset + 2 > buf.length) throw new Error("compact: eof");
      const value = readLittleEndian(buf, offset, 2) >> 2n;
      if (value < SINGLE_BYTE_LIMIT) throw new Error("compact: non-canonical encoding");
      return { value, next: offset + 2 };
    }
    case 0b10: {
      if (offset + 4 > buf.length) throw new Error("compact: eof");
      const value = readLittleEndian(buf, offset, 4) >> 2n;
      if (value < TWO_BYTE_LIMIT) throw new Error("compact: non-canonical encoding");
      return { value, next: offset + 4 };
    }
    default: {
      const length = (first >> 2) + 4;
      const start = offset + 1;
      if (start + length > buf.length) throw new Error("compact: eof");
      // Canonical big-integer form has no zero high byte and needs more than 30 bits.
      if (buf[start + length - 1] === 0) throw new Error("compact: non-canonical encoding");
      const value = readLittleEndian(buf, start, length);
      if (value < FOUR_BYTE_LIMIT) throw new Error("compact: non-canonical encoding");
      return { value, next: start + length };
    }
  }
}

export function decodeCompactNumber(
  buf: Uint8Array,
  offset: number,
): { value: number; next: number } {
  const { value, next } = decodeCompact(buf, offset);
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) throw new Error("compact: value too large");
  return { value: Number(value), next };
}
