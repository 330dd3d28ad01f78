// Tests for schema-driven encoding/decoding

import { describe, it, expect } from "vitest";
import { encodeWithSchema, decodeWithSchema } from "./schema_codec.ts";
import { ScaleDecodeError, ScaleEncodeError } from "./errors.ts";
import type { Schema, SchemaRegistry, EnumSchema, StructSchema, UnitEnumSchema } from "./schema.ts";

// ============================================================================
// Test Schemas
// ============================================================================

const ConstantSchema: StructSchema = {
  kind: "struct",
  fields: {
    name: { kind: "string" },
    value: { kind: "bytes" },
  },
};

const HasherSchema: UnitEnumSchema = {
  kind: "unit_enum",
  variants: ["Blake2_128", "Blake2_256", "Twox128"],
};

const EntryTypeSchema: EnumSchema = {
  kind: "enum",
  variants: [
    { name: "Plain", fields: { kind: "string" } },
    {
      name: "Map",
      fields: { hasher: { kind: "ref", name: "Hasher" }, key: { kind: "string" } },
    },
    { name: "Pair", fields: [{ kind: "u8" }, { kind: "u8" }] },
    { name: "Empty", discriminant: 7, fields: null },
  ],
};

const registry: SchemaRegistry = new Map<string, Schema>([
  ["Constant", ConstantSchema],
  ["Hasher", HasherSchema],
  ["EntryType", EntryTypeSchema],
]);

function roundtrip(value: unknown, schema: Schema, reg?: SchemaRegistry): unknown {
  const encoded = encodeWithSchema(value, schema, reg);
  const decoded = decodeWithSchema(encoded, 0, schema, reg);
  expect(decoded.next).toBe(encoded.length);
  return decoded.value;
}

// ============================================================================
// Wire Layout Tests
// ============================================================================

describe("encodeWithSchema wire layout", () => {
  it("writes struct fields in declaration order", () => {
    const bytes = encodeWithSchema({ value: Uint8Array.of(7), name: "A" }, ConstantSchema);
    expect(Array.from(bytes)).toEqual([0x04, 0x41, 0x04, 0x07]);
  });

  it("writes a one-byte enum discriminant", () => {
    const bytes = encodeWithSchema({ tag: "Plain", value: "u32" }, EntryTypeSchema);
    expect(Array.from(bytes)).toEqual([0x00, 0x0c, 0x75, 0x33, 0x32]);
  });

  it("honors explicit discriminants", () => {
    expect(Array.from(encodeWithSchema({ tag: "Empty" }, EntryTypeSchema))).toEqual([7]);
  });

  it("writes unit enums as their index", () => {
    expect(Array.from(encodeWithSchema("Twox128", HasherSchema))).toEqual([2]);
  });

  it("writes options as 0 or 1 plus value", () => {
    const schema: Schema = { kind: "option", inner: { kind: "u8" } };
    expect(Array.from(encodeWithSchema(null, schema))).toEqual([0]);
    expect(Array.from(encodeWithSchema(5, schema))).toEqual([1, 5]);
  });

  it("writes vec with a compact length", () => {
    const schema: Schema = { kind: "vec", element: { kind: "u16" } };
    expect(Array.from(encodeWithSchema([1, 2], schema))).toEqual([0x08, 1, 0, 2, 0]);
  });

  it("sorts integer map keys numerically", () => {
    const schema: Schema = { kind: "map", key: { kind: "u8" }, value: { kind: "bool" } };
    const value = new Map<number, boolean>([
      [3, true],
      [1, false],
      [2, true],
    ]);
    expect(Array.from(encodeWithSchema(value, schema))).toEqual([0x0c, 1, 0, 2, 1, 3, 1]);
  });

  it("sorts string map keys by UTF-8 bytes, not by length prefix", () => {
    const schema: Schema = { kind: "map", key: { kind: "string" }, value: { kind: "u8" } };
    const value = new Map<string, number>([
      ["b", 1],
      ["aa", 2],
    ]);
    // "aa" < "b" even though its length prefix is larger
    expect(Array.from(encodeWithSchema(value, schema))).toEqual([
      0x08, 0x08, 0x61, 0x61, 2, 0x04, 0x62, 1,
    ]);
  });
});

// ============================================================================
// Roundtrip Tests
// ============================================================================

describe("encodeWithSchema/decodeWithSchema roundtrips", () => {
  it("roundtrips struct, tuple and newtype variants", () => {
    expect(roundtrip({ tag: "Pair", 0: 1, 1: 2 }, EntryTypeSchema, registry)).toEqual({
      tag: "Pair",
      0: 1,
      1: 2,
    });
    expect(
      roundtrip({ tag: "Map", hasher: "Blake2_256", key: "AccountId" }, EntryTypeSchema, registry),
    ).toEqual({ tag: "Map", hasher: "Blake2_256", key: "AccountId" });
  });

  it("roundtrips a vec of refs", () => {
    const schema: Schema = { kind: "vec", element: { kind: "ref", name: "Constant" } };
    const value = [
      { name: "Existential", value: Uint8Array.of(1, 0) },
      { name: "MaxLocks", value: new Uint8Array(0) },
    ];
    expect(roundtrip(value, schema, registry)).toEqual(value);
  });

  it("roundtrips fixed byte arrays", () => {
    const schema: Schema = { kind: "fixed_bytes", length: 4 };
    expect(roundtrip(Uint8Array.of(1, 2, 3, 4), schema)).toEqual(Uint8Array.of(1, 2, 3, 4));
  });

  it("roundtrips u128 values", () => {
    expect(roundtrip(2n ** 100n, { kind: "u128" })).toBe(2n ** 100n);
  });

  it("roundtrips maps with integer keys", () => {
    const schema: Schema = { kind: "map", key: { kind: "u8" }, value: { kind: "string" } };
    const value = new Map<number, string>([[4, "four"]]);
    expect(roundtrip(value, schema)).toEqual(value);
  });
});

// ============================================================================
// Symbol Tests
// ============================================================================

describe("symbols", () => {
  const schema: StructSchema = {
    kind: "struct",
    fields: {
      ty: { kind: "symbol" },
      params: { kind: "vec", element: { kind: "option", inner: { kind: "symbol" } } },
    },
  };

  it("reports every symbol with its path on encode and decode", () => {
    const value = { ty: 70, params: [null, 3] };
    const written: Array<[number, string]> = [];
    const encoded = encodeWithSchema(value, schema, undefined, {
      onSymbol: (id, path) => written.push([id, path]),
    });
    expect(Array.from(encoded)).toEqual([0x19, 0x01, 0x08, 0x00, 0x01, 0x0c]);

    const read: Array<[number, string]> = [];
    decodeWithSchema(encoded, 0, schema, undefined, {
      onSymbol: (id, path) => read.push([id, path]),
    });
    const expected: Array<[number, string]> = [
      [70, "ty"],
      [3, "params.[1].Some"],
    ];
    expect(written).toEqual(expected);
    expect(read).toEqual(expected);
  });
});

// ============================================================================
// Error Tests
// ============================================================================

describe("decode errors", () => {
  it("rejects unknown enum discriminants with the path", () => {
    const schema: StructSchema = { kind: "struct", fields: { entry: EntryTypeSchema } };
    try {
      decodeWithSchema(Uint8Array.of(5), 0, schema, registry);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ScaleDecodeError);
      if (e instanceof ScaleDecodeError) {
        expect(e.path).toBe("entry");
        expect(e.offset).toBe(0);
        expect(e.reason).toBe("unknown enum discriminant: 5 (valid: 0=Plain, 1=Map, 2=Pair, 7=Empty)");
      }
    }
  });

  it("rejects unknown unit enum indices", () => {
    expect(() => decodeWithSchema(Uint8Array.of(3), 0, HasherSchema)).toThrow(
      "unknown enum discriminant: 3 (valid: 0..2)",
    );
  });

  it("rejects invalid option markers", () => {
    const schema: Schema = { kind: "option", inner: { kind: "u8" } };
    expect(() => decodeWithSchema(Uint8Array.of(2, 0), 0, schema)).toThrow(
      "invalid option discriminant: 2",
    );
  });

  it("wraps primitive failures with the innermost path", () => {
    const schema: Schema = { kind: "vec", element: ConstantSchema };
    // one element whose name claims 5 bytes but only 1 follows
    const buf = Uint8Array.of(0x04, 0x14, 0x41);
    try {
      decodeWithSchema(buf, 0, schema);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ScaleDecodeError);
      if (e instanceof ScaleDecodeError) {
        expect(e.path).toBe("[0].name");
        expect(e.offset).toBe(1);
        expect(e.reason).toBe("string: length prefix 5 exceeds remaining 1 bytes");
        expect(e.message).toContain("Buffer length: 3");
      }
    }
  });

  it("rejects a vec length larger than the remaining input", () => {
    const schema: Schema = { kind: "vec", element: { kind: "u8" } };
    expect(() => decodeWithSchema(Uint8Array.of(0xfc), 0, schema)).toThrow(
      "vec: length prefix 63 exceeds remaining 0 bytes",
    );
  });

  it("rejects duplicate map keys", () => {
    const schema: Schema = { kind: "map", key: { kind: "u8" }, value: { kind: "u8" } };
    try {
      decodeWithSchema(Uint8Array.of(0x08, 1, 0, 1, 0), 0, schema);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ScaleDecodeError);
      if (e instanceof ScaleDecodeError) {
        expect(e.reason).toBe("duplicate map key: 1");
        expect(e.path).toBe("{key 1}");
        expect(e.offset).toBe(3);
      }
    }
  });

  it("rejects non-canonical compact symbols", () => {
    expect(() => decodeWithSchema(Uint8Array.of(0x01, 0x00), 0, { kind: "symbol" })).toThrow(
      "compact: non-canonical encoding",
    );
  });
});

describe("encode errors", () => {
  it("reports wrong JS types with the path", () => {
    const schema: StructSchema = { kind: "struct", fields: { inner: ConstantSchema } };
    try {
      encodeWithSchema({ inner: { name: 5, value: new Uint8Array(0) } }, schema);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ScaleEncodeError);
      if (e instanceof ScaleEncodeError) {
        expect(e.path).toBe("inner.name");
        expect(e.reason).toBe("expected string, got number");
      }
    }
  });

  it("reports out of range integers", () => {
    expect(() => encodeWithSchema(300, { kind: "u8" })).toThrow(
      "Encode error at <root>: u8: value 300 out of range",
    );
  });

  it("reports unknown variants", () => {
    expect(() => encodeWithSchema({ tag: "Nope" }, EntryTypeSchema)).toThrow(
      "Unknown variant: Nope",
    );
    expect(() => encodeWithSchema("Sha", HasherSchema)).toThrow("Unknown variant: Sha");
  });

  it("reports fixed array length mismatches", () => {
    expect(() =>
      encodeWithSchema(Uint8Array.of(1), { kind: "fixed_bytes", length: 32 }),
    ).toThrow("expected 32 bytes, got 1");
  });

  it("reports tuple length mismatches", () => {
    const schema: Schema = { kind: "tuple", elements: [{ kind: "u8" }, { kind: "u8" }] };
    expect(() => encodeWithSchema([1], schema)).toThrow("Tuple length mismatch: got 1, expected 2");
  });

  it("throws on unresolved ref without registry", () => {
    expect(() => encodeWithSchema({}, { kind: "ref", name: "Constant" })).toThrow(
      /Unresolved ref/,
    );
  });

  it("throws on unknown ref", () => {
    expect(() => encodeWithSchema({}, { kind: "ref", name: "Unknown" }, registry)).toThrow(
      /Unknown type ref/,
    );
  });
});
