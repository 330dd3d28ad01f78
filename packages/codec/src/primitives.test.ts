import { describe, it, expect } from "vitest";
import {
  encodeBool,
  decodeBool,
  encodeU16,
  decodeU16,
  encodeU32,
  decodeU32,
  encodeU64,
  decodeU64,
  encodeU128,
  decodeU128,
  encodeU8,
  encodeCompactU32,
  decodeCompactU32,
  encodeString,
  decodeString,
  encodeBytes,
  decodeBytes,
  decodeFixedBytes,
  decodeLength,
} from "./primitives.ts";

describe("fixed-width integers", () => {
  it("encodes little-endian", () => {
    expect(Array.from(encodeU16(0x1234))).toEqual([0x34, 0x12]);
    expect(Array.from(encodeU32(0x01020304))).toEqual([0x04, 0x03, 0x02, 0x01]);
    expect(Array.from(encodeU64(1n))).toEqual([1, 0, 0, 0, 0, 0, 0, 0]);
  });

  it("decodes at an offset", () => {
    const buf = Uint8Array.of(0xff, 0x34, 0x12);
    expect(decodeU16(buf, 1)).toEqual({ value: 0x1234, next: 3 });
  });

  it("decodes u32 max", () => {
    expect(decodeU32(Uint8Array.of(0xff, 0xff, 0xff, 0xff), 0).value).toBe(0xffffffff);
  });

  it("handles u128 as bigint", () => {
    const value = 10n ** 30n;
    const bytes = encodeU128(value);
    expect(bytes.length).toBe(16);
    expect(decodeU128(bytes, 0)).toEqual({ value, next: 16 });
  });

  it("rejects values out of range", () => {
    expect(() => encodeU8(256)).toThrow("u8: value 256 out of range");
    expect(() => encodeU16(-1)).toThrow("u16: value -1 out of range");
    expect(() => encodeU64(1n << 64n)).toThrow("out of range");
    expect(() => encodeU32(1.5)).toThrow("u32: 1.5 is not an integer");
  });

  it("reports eof", () => {
    expect(() => decodeU64(new Uint8Array(7), 0)).toThrow("u64: eof");
  });
});

describe("bool", () => {
  it("encodes and decodes both values", () => {
    expect(Array.from(encodeBool(true))).toEqual([1]);
    expect(decodeBool(Uint8Array.of(0), 0)).toEqual({ value: false, next: 1 });
  });

  it("rejects bytes other than 0 and 1", () => {
    expect(() => decodeBool(Uint8Array.of(2), 0)).toThrow("bool: invalid value 2");
  });
});

describe("compact u32", () => {
  it("accepts the full u32 range", () => {
    const bytes = encodeCompactU32(0xffffffff);
    expect(decodeCompactU32(bytes, 0)).toEqual({ value: 0xffffffff, next: 5 });
  });

  it("rejects values above u32", () => {
    expect(() => encodeCompactU32(2 ** 32)).toThrow("compact u32: value 4294967296 out of range");
    // 2^32 in big-integer mode
    const wide = Uint8Array.of(0x07, 0x00, 0x00, 0x00, 0x00, 0x01);
    expect(() => decodeCompactU32(wide, 0)).toThrow("compact u32: overflow");
  });
});

describe("length-prefixed data", () => {
  it("encodes strings as UTF-8 with a compact length", () => {
    expect(Array.from(encodeString("hé"))).toEqual([0x0c, 0x68, 0xc3, 0xa9]);
    expect(decodeString(Uint8Array.of(0x0c, 0x68, 0xc3, 0xa9), 0)).toEqual({
      value: "hé",
      next: 4,
    });
  });

  it("keeps a leading byte order mark", () => {
    const bytes = Uint8Array.of(0x14, 0xef, 0xbb, 0xbf, 0x61, 0x62);
    expect(encodeString("\uFEFFab")).toEqual(bytes);
    expect(decodeString(bytes, 0)).toEqual({ value: "\uFEFFab", next: 6 });
  });

  it("rejects invalid UTF-8", () => {
    expect(() => decodeString(Uint8Array.of(0x04, 0xff), 0)).toThrow("string: invalid utf-8");
  });

  it("rejects a length prefix past the end of the buffer", () => {
    expect(() => decodeLength(Uint8Array.of(0x0c, 0x01), 0, "vec")).toThrow(
      "vec: length prefix 3 exceeds remaining 1 bytes",
    );
    expect(() => decodeBytes(Uint8Array.of(0x08, 0x01), 0)).toThrow(
      "bytes: length prefix 2 exceeds remaining 1 bytes",
    );
  });

  it("copies decoded bytes out of the input", () => {
    const buf = encodeBytes(Uint8Array.of(1, 2, 3));
    const { value } = decodeBytes(buf, 0);
    buf[1] = 9;
    expect(Array.from(value)).toEqual([1, 2, 3]);
  });

  it("reads fixed byte arrays without a prefix", () => {
    const buf = Uint8Array.of(1, 2, 3, 4);
    expect(decodeFixedBytes(buf, 1, 3)).toEqual({ value: Uint8Array.of(2, 3, 4), next: 4 });
    expect(() => decodeFixedBytes(buf, 2, 3)).toThrow("[u8; 3]: eof");
  });
});
