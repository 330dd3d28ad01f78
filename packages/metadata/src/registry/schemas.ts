// Wire schemas for the portable type registry.

import type { Schema } from "@scale-metadata/codec";
import { PRIMITIVE_TYPES } from "./types.ts";

const strings: Schema = { kind: "vec", element: { kind: "string" } };

export const registrySchemas: ReadonlyArray<readonly [string, Schema]> = [
  ["Docs", strings],
  [
    "Field",
    {
      kind: "struct",
      fields: {
        name: { kind: "option", inner: { kind: "string" } },
        type: { kind: "symbol" },
        typeName: { kind: "option", inner: { kind: "string" } },
        docs: { kind: "ref", name: "Docs" },
      },
    },
  ],
  [
    "Variant",
    {
      kind: "struct",
      fields: {
        name: { kind: "string" },
        fields: { kind: "vec", element: { kind: "ref", name: "Field" } },
        index: { kind: "u8" },
        docs: { kind: "ref", name: "Docs" },
      },
    },
  ],
  [
    "TypeDef",
    {
      kind: "enum",
      variants: [
        { name: "Composite", fields: { fields: { kind: "vec", element: { kind: "ref", name: "Field" } } } },
        { name: "Variant", fields: { variants: { kind: "vec", element: { kind: "ref", name: "Variant" } } } },
        { name: "Sequence", fields: { type: { kind: "symbol" } } },
        { name: "Array", fields: { len: { kind: "u32" }, type: { kind: "symbol" } } },
        { name: "Tuple", fields: { fields: { kind: "vec", element: { kind: "symbol" } } } },
        { name: "Primitive", fields: { kind: "unit_enum", variants: PRIMITIVE_TYPES } },
        { name: "Compact", fields: { type: { kind: "symbol" } } },
        {
          name: "BitSequence",
          fields: { bitStoreType: { kind: "symbol" }, bitOrderType: { kind: "symbol" } },
        },
      ],
    },
  ],
  [
    "TypeDescriptor",
    {
      kind: "struct",
      fields: {
        path: strings,
        params: {
          kind: "vec",
          element: {
            kind: "struct",
            fields: {
              name: { kind: "string" },
              type: { kind: "option", inner: { kind: "symbol" } },
            },
          },
        },
        def: { kind: "ref", name: "TypeDef" },
        docs: { kind: "ref", name: "Docs" },
      },
    },
  ],
  [
    "PortableRegistry",
    {
      kind: "vec",
      element: {
        kind: "struct",
        fields: {
          id: { kind: "compact" },
          type: { kind: "ref", name: "TypeDescriptor" },
        },
      },
    },
  ],
];
