import { describe, it, expect } from "vitest";
import {
  resolveSchema,
  findVariantByDiscriminant,
  findVariantByName,
  getVariantDiscriminant,
  getVariantFieldSchemas,
  getVariantFieldNames,
  isNewtypeVariant,
  isRefSchema,
  type EnumSchema,
  type Schema,
  type SchemaRegistry,
} from "./schema.ts";

const StatusSchema: EnumSchema = {
  kind: "enum",
  variants: [
    { name: "Active", fields: null },
    { name: "Note", fields: { kind: "string" } },
    { name: "Range", fields: [{ kind: "u32" }, { kind: "u32" }] },
    { name: "Named", discriminant: 9, fields: { note: { kind: "string" }, since: { kind: "u32" } } },
  ],
};

describe("resolveSchema", () => {
  const registry: SchemaRegistry = new Map<string, Schema>([["Status", StatusSchema]]);

  it("follows refs one level", () => {
    expect(resolveSchema({ kind: "ref", name: "Status" }, registry)).toBe(StatusSchema);
  });

  it("returns non-ref schemas unchanged", () => {
    const schema: Schema = { kind: "u8" };
    expect(resolveSchema(schema, registry)).toBe(schema);
  });

  it("throws on unknown names", () => {
    expect(() => resolveSchema({ kind: "ref", name: "Missing" }, registry)).toThrow(
      "Unknown type ref: Missing",
    );
  });
});

describe("enum variant helpers", () => {
  it("finds variants by index or explicit discriminant", () => {
    expect(findVariantByDiscriminant(StatusSchema, 2)?.name).toBe("Range");
    expect(findVariantByDiscriminant(StatusSchema, 9)?.name).toBe("Named");
    expect(findVariantByDiscriminant(StatusSchema, 3)).toBeUndefined();
  });

  it("finds variants by name", () => {
    const variant = findVariantByName(StatusSchema, "Note");
    expect(variant).toBeDefined();
    if (variant) expect(getVariantDiscriminant(StatusSchema, variant)).toBe(1);
  });

  it("classifies variant field shapes", () => {
    const [active, note, range, named] = StatusSchema.variants;
    expect(getVariantFieldSchemas(active)).toEqual([]);
    expect(isNewtypeVariant(note)).toBe(true);
    expect(getVariantFieldNames(note)).toBeNull();
    expect(getVariantFieldSchemas(range)).toHaveLength(2);
    expect(getVariantFieldNames(range)).toBeNull();
    expect(getVariantFieldNames(named)).toEqual(["note", "since"]);
    expect(isNewtypeVariant(named)).toBe(false);
  });

  it("detects refs", () => {
    expect(isRefSchema({ kind: "ref", name: "Status" })).toBe(true);
    expect(isRefSchema({ kind: "symbol" })).toBe(false);
  });
});
