import { describe, it, expect } from "vitest";
import { concat, encodeString } from "@scale-metadata/codec";
import { decodeLegacy, encodeLegacy } from "./codec.ts";
import {
  LEGACY_VERSIONS,
  type LegacyMetadata,
  type LegacyStorageEntryType,
  type LegacyVersion,
} from "./types.ts";
import { MetadataErrorKind, isMetadataError } from "../errors.ts";

const s = encodeString;
const b = (...bytes: number[]): Uint8Array => Uint8Array.from(bytes);

/** One module with a single storage entry, no calls, events, constants or errors. */
function singleEntryModule(entry: Uint8Array): Uint8Array {
  return concat(
    b(0x04), // one module
    s("M"),
    b(1), // storage: Some
    s("M"),
    b(0x04), // one entry
    entry,
    b(0, 0, 0, 0), // calls, event, constants, errors
  );
}

function sampleTree(version: LegacyVersion): LegacyMetadata {
  const tree: LegacyMetadata = {
    modules: [
      {
        name: "Balances",
        storage: {
          prefix: "Balances",
          entries: [
            {
              name: "TotalIssuance",
              modifier: "Default",
              type: { tag: "Plain", value: "T::Balance" },
              default: new Uint8Array(16),
              docs: ["Total issuance."],
            },
            {
              name: "Locks",
              modifier: "Optional",
              type: {
                tag: "Map",
                layout: "doubleMap",
                keys: [
                  { hasher: "Blake2_256", key: "T::AccountId" },
                  { hasher: "Twox64Concat", key: "LockId" },
                ],
                value: "Vec<u8>",
                linked: false,
              },
              // fallback bytes kept even though the entry is Optional
              default: b(0x2a),
              docs: [],
            },
          ],
        },
        calls: [{ name: "transfer", arguments: [{ name: "dest", type: "Address" }], docs: [] }],
        event: [{ name: "Transfer", arguments: ["AccountId", "Balance"], docs: ["Moved."] }],
        constants: [{ name: "ExistentialDeposit", type: "T::Balance", value: b(1, 0), docs: [] }],
        errors: [{ name: "InsufficientBalance", docs: [] }],
      },
      { name: "Timestamp", storage: null, calls: null, event: null, constants: [], errors: [] },
    ],
  };
  if (version >= 11) tree.extrinsic = { version: 4, signedExtensions: ["CheckNonce"] };
  if (version >= 12) {
    tree.modules = tree.modules.map((m, i) => ({ ...m, index: i + 3 }));
  }
  return tree;
}

describe("legacy roundtrip", () => {
  for (const version of LEGACY_VERSIONS) {
    it(`roundtrips a V${version} tree`, () => {
      const tree = sampleTree(version);
      const bytes = encodeLegacy(version, tree);
      const decoded = decodeLegacy(version, bytes, 0);
      expect(decoded.next).toBe(bytes.length);
      expect(decoded.value).toEqual(tree);
    });
  }

  it("keeps a byte order mark at the start of a name", () => {
    const tree = sampleTree(8);
    tree.modules[0].name = "\uFEFFBalances";
    const bytes = encodeLegacy(8, tree);
    const decoded = decodeLegacy(8, bytes, 0);
    expect(decoded.value.modules[0].name).toBe("\uFEFFBalances");
    expect(encodeLegacy(8, decoded.value)).toEqual(bytes);
  });

  it("preserves module indices", () => {
    const decoded = decodeLegacy(12, encodeLegacy(12, sampleTree(12)), 0);
    expect(decoded.value.modules.map((m) => m.index)).toEqual([3, 4]);
  });

  it("writes the module index after errors from V12", () => {
    const tree: LegacyMetadata = {
      modules: [{ name: "M", storage: null, calls: null, event: null, constants: [], errors: [], index: 9 }],
      extrinsic: { version: 0, signedExtensions: [] },
    };
    expect(Array.from(encodeLegacy(12, tree))).toEqual([0x04, 0x04, 0x4d, 0, 0, 0, 0, 0, 9, 0, 0]);
    expect(Array.from(encodeLegacy(11, tree))).toEqual([0x04, 0x04, 0x4d, 0, 0, 0, 0, 0, 0, 0]);
  });
});

describe("legacy storage unification", () => {
  it("decodes DoubleMap into an ordered key list", () => {
    const entry = concat(
      s("Pair"),
      b(1), // Default
      b(2), // DoubleMap
      b(0), // Blake2_128
      s("K1"),
      s("K2"),
      s("V"),
      b(4), // Twox64Concat in V8
      b(0), // empty default
      b(0), // no docs
    );
    const { value } = decodeLegacy(8, singleEntryModule(entry), 0);
    expect(value.modules[0].storage?.entries[0].type).toEqual({
      tag: "Map",
      layout: "doubleMap",
      keys: [
        { hasher: "Blake2_128", key: "K1" },
        { hasher: "Twox64Concat", key: "K2" },
      ],
      value: "V",
      linked: false,
    });
  });

  it("keeps the linked flag of a single map", () => {
    const entry = concat(s("L"), b(0), b(1), b(3), s("K"), s("V"), b(1), b(0), b(0));
    const { value } = decodeLegacy(9, singleEntryModule(entry), 0);
    const type = value.modules[0].storage?.entries[0].type;
    expect(type).toEqual({
      tag: "Map",
      layout: "map",
      keys: [{ hasher: "Twox256", key: "K" }],
      value: "V",
      linked: true,
    });
    expect(encodeLegacy(9, value)).toEqual(singleEntryModule(entry));
  });

  it("maps hasher indices per version", () => {
    const entry = concat(s("E"), b(0), b(1), b(2), s("K"), s("V"), b(0), b(0), b(0));
    const v8 = decodeLegacy(8, singleEntryModule(entry), 0).value;
    const v10 = decodeLegacy(10, singleEntryModule(entry), 0).value;
    const hasherOf = (tree: LegacyMetadata): string | undefined => {
      const type = tree.modules[0].storage?.entries[0].type;
      return type?.tag === "Map" ? type.keys[0].hasher : undefined;
    };
    expect(hasherOf(v8)).toBe("Twox128");
    expect(hasherOf(v10)).toBe("Blake2_128Concat");
  });

  it("rejects an NMap whose keys and hashers differ in length", () => {
    const entry = concat(
      s("E"),
      b(0),
      b(3), // NMap
      b(0x08),
      s("A"),
      s("B"),
      b(0x04, 6), // one hasher: Identity
      s("V"),
      b(0),
      b(0),
    );
    const payload = concat(singleEntryModule(entry), b(0), b(4, 0));
    try {
      decodeLegacy(13, payload, 0);
      expect.unreachable();
    } catch (e) {
      expect(isMetadataError(e, MetadataErrorKind.MALFORMED_PAYLOAD)).toBe(true);
      if (isMetadataError(e)) expect(e.path).toBe("modules.[0].storage.entries.[0].type");
    }
  });

  it("decodes an NMap into the same shape as other maps", () => {
    const entry = concat(s("E"), b(0), b(3), b(0x04), s("A"), b(0x04, 6), s("V"), b(0), b(0));
    const payload = concat(singleEntryModule(entry), b(0), b(4, 0));
    const { value } = decodeLegacy(13, payload, 0);
    expect(value.modules[0].storage?.entries[0].type).toEqual({
      tag: "Map",
      layout: "nMap",
      keys: [{ hasher: "Identity", key: "A" }],
      value: "V",
      linked: false,
    });
  });
});

describe("legacy encode validation", () => {
  function treeWith(type: LegacyStorageEntryType): LegacyMetadata {
    return {
      modules: [
        {
          name: "M",
          storage: {
            prefix: "M",
            entries: [{ name: "E", modifier: "Optional", type, default: new Uint8Array(0), docs: [] }],
          },
          calls: null,
          event: null,
          constants: [],
          errors: [],
          index: 0,
        },
      ],
      extrinsic: { version: 4, signedExtensions: [] },
    };
  }

  function expectUnencodable(version: LegacyVersion, tree: LegacyMetadata, message: string): void {
    try {
      encodeLegacy(version, tree);
      expect.unreachable();
    } catch (e) {
      expect(isMetadataError(e, MetadataErrorKind.UNENCODABLE_VALUE)).toBe(true);
      if (isMetadataError(e)) {
        expect(e.message).toBe(message);
        expect(e.path).toBe("modules.[0].storage.entries.[0].type");
      }
    }
  }

  it("rejects hashers the version does not have", () => {
    const tree = treeWith({
      tag: "Map",
      layout: "map",
      keys: [{ hasher: "Identity", key: "K" }],
      value: "V",
      linked: false,
    });
    expectUnencodable(10, tree, "hasher Identity does not exist in V10");
    expect(() => encodeLegacy(11, tree)).not.toThrow();
  });

  it("rejects a layout that does not fit the key count", () => {
    const tree = treeWith({
      tag: "Map",
      layout: "map",
      keys: [
        { hasher: "Twox128", key: "A" },
        { hasher: "Twox128", key: "B" },
      ],
      value: "V",
      linked: false,
    });
    expectUnencodable(12, tree, "map layout needs 1 key, got 2");
  });

  it("rejects the nMap layout before V13", () => {
    const tree = treeWith({
      tag: "Map",
      layout: "nMap",
      keys: [{ hasher: "Twox128", key: "A" }],
      value: "V",
      linked: false,
    });
    expectUnencodable(12, tree, "nMap layout does not exist in V12");
  });

  it("rejects a linked multi-key map", () => {
    const tree = treeWith({
      tag: "Map",
      layout: "doubleMap",
      keys: [
        { hasher: "Twox128", key: "A" },
        { hasher: "Twox128", key: "B" },
      ],
      value: "V",
      linked: true,
    });
    expectUnencodable(12, tree, "linked flag is only carried by the map layout");
  });
});
