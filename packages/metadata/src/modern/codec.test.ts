import { describe, it, expect } from "vitest";
import { decodeU128 } from "@scale-metadata/codec";
import { decodeV14, decodeV15, decodeV16, encodeModern } from "./codec.ts";
import { TypeRegistry } from "../registry/registry.ts";
import { T, sampleV14, sampleV15, sampleV16 } from "../test_support.ts";

describe("V14 payload", () => {
  it("roundtrips the sample tree", () => {
    const tree = sampleV14();
    const bytes = encodeModern(14, tree);
    const { value, next } = decodeV14(bytes, 0);
    expect(next).toBe(bytes.length);
    expect(value).toEqual(tree);
    expect(value.types).toBeInstanceOf(TypeRegistry);
  });

  it("ends with the runtime type id", () => {
    const bytes = encodeModern(14, sampleV14());
    // compact(11)
    expect(bytes[bytes.length - 1]).toBe(0x2c);
  });

  it("resolves a plain storage entry to its primitive type", () => {
    const tree = sampleV14();
    const { value } = decodeV14(encodeModern(14, tree), 0);
    const balances = value.pallets.find((p) => p.name === "Balances");
    const entry = balances?.storage?.entries.find((e) => e.name === "TotalIssuance");
    expect(entry?.type).toEqual({ tag: "Plain", value: T.u128 });
    if (entry?.type.tag !== "Plain") throw new Error("expected a plain entry");
    expect(value.types.resolve(entry.type.value).def).toEqual({ tag: "Primitive", value: "u128" });
    expect(decodeU128(entry.default, 0).value).toBe(0n);
  });

  it("starts at the given offset", () => {
    const body = encodeModern(14, sampleV14());
    const buf = new Uint8Array(body.length + 3);
    buf.set(body, 3);
    expect(decodeV14(buf, 3).next).toBe(buf.length);
  });

  it("reports body symbols with their paths", () => {
    const seen: Array<[number, string]> = [];
    decodeV14(encodeModern(14, sampleV14()), 0, { onSymbol: (id, path) => seen.push([id, path]) });
    expect(seen).toContainEqual([T.extrinsic, "extrinsic.type"]);
    expect(seen).toContainEqual([T.runtime, "type"]);
    expect(seen.some(([, path]) => path.startsWith("types."))).toBe(true);
  });

  it("reports the same symbols when encoding", () => {
    const decoded: Array<[number, string]> = [];
    const encoded: Array<[number, string]> = [];
    const bytes = encodeModern(14, sampleV14(), { onSymbol: (id, path) => encoded.push([id, path]) });
    decodeV14(bytes, 0, { onSymbol: (id, path) => decoded.push([id, path]) });
    expect(encoded.map(([id]) => id)).toEqual(decoded.map(([id]) => id));
  });
});

describe("V15 payload", () => {
  it("roundtrips the sample tree", () => {
    const tree = sampleV15();
    const bytes = encodeModern(15, tree);
    const { value, next } = decodeV15(bytes, 0);
    expect(next).toBe(bytes.length);
    expect(value).toEqual(tree);
  });

  it("writes custom entries in key order", () => {
    const { value } = decodeV15(encodeModern(15, sampleV15()), 0);
    expect(Array.from(value.custom.keys())).toEqual(["alpha", "zeta"]);
    expect(value.custom.get("alpha")).toEqual({ type: T.u32, value: Uint8Array.of(2, 0, 0, 0) });
  });

  it("keeps the outer enums", () => {
    const { value } = decodeV15(encodeModern(15, sampleV15()), 0);
    expect(value.outerEnums).toEqual({ callEnumType: 6, eventEnumType: 7, errorEnumType: 8 });
  });
});

describe("V16 payload", () => {
  it("roundtrips the sample tree", () => {
    const tree = sampleV16();
    const bytes = encodeModern(16, tree);
    const { value, next } = decodeV16(bytes, 0);
    expect(next).toBe(bytes.length);
    expect(value).toEqual(tree);
  });

  it("decodes deprecation markers", () => {
    const { value } = decodeV16(encodeModern(16, sampleV16()), 0);
    const [balances] = value.pallets;
    expect(balances.calls?.deprecationInfo).toEqual({
      tag: "VariantsDeprecated",
      value: new Map([[5, { tag: "Deprecated", note: "use transfer_keep_alive", since: "v2" }]]),
    });
    expect(balances.error?.deprecationInfo).toEqual({
      tag: "ItemDeprecated",
      value: { tag: "Deprecated", note: "gone", since: null },
    });
    expect(balances.constants[0].deprecationInfo).toEqual({ tag: "DeprecatedWithoutNote" });
  });

  it("decodes per-version transaction extensions", () => {
    const { value } = decodeV16(encodeModern(16, sampleV16()), 0);
    expect(value.extrinsic.versions).toEqual([4, 5]);
    expect(value.extrinsic.transactionExtensionsByVersion.get(5)).toEqual([1, 0]);
  });

  it("encodes an empty tree as a zero byte per collection and id", () => {
    const bytes = encodeModern(16, {
      types: TypeRegistry.empty(),
      pallets: [],
      extrinsic: {
        versions: [],
        addressType: 0,
        signatureType: 0,
        transactionExtensionsByVersion: new Map(),
        transactionExtensions: [],
      },
      apis: [],
      outerEnums: { callEnumType: 0, eventEnumType: 0, errorEnumType: 0 },
      custom: new Map(),
    });
    expect(bytes).toEqual(new Uint8Array(12));
  });

  it("rejects a view function id of the wrong length", () => {
    const tree = sampleV16();
    tree.pallets[0].viewFunctions[0].id = Uint8Array.of(1);
    expect(() => encodeModern(16, tree)).toThrow(/expected 32 bytes, got 1/);
  });
});
