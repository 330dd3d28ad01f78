// Portable type registry model.
//
// Modern metadata describes every type structurally in a registry and refers
// to types by id everywhere else in the tree.

/** Registry handle. Unique within one registry and never reused. */
export type TypeId = number;

/** Primitive types, in wire order. */
export const PRIMITIVE_TYPES = [
  "bool",
  "char",
  "str",
  "u8",
  "u16",
  "u32",
  "u64",
  "u128",
  "u256",
  "i8",
  "i16",
  "i32",
  "i64",
  "i128",
  "i256",
] as const;

export type PrimitiveType = (typeof PRIMITIVE_TYPES)[number];

export interface Field {
  name: string | null;
  type: TypeId;
  /** Source-level type name, for display only. */
  typeName: string | null;
  docs: string[];
}

export interface Variant {
  name: string;
  fields: Field[];
  /** Wire discriminant of this variant (u8). */
  index: number;
  docs: string[];
}

export type TypeDef =
  | { tag: "Composite"; fields: Field[] }
  | { tag: "Variant"; variants: Variant[] }
  | { tag: "Sequence"; type: TypeId }
  | { tag: "Array"; len: number; type: TypeId }
  | { tag: "Tuple"; fields: TypeId[] }
  | { tag: "Primitive"; value: PrimitiveType }
  | { tag: "Compact"; type: TypeId }
  | { tag: "BitSequence"; bitStoreType: TypeId; bitOrderType: TypeId };

/** Generic parameter. `type` is null when the parameter is erased. */
export interface TypeParameter {
  name: string;
  type: TypeId | null;
}

export interface TypeDescriptor {
  /** Qualified name segments, empty for anonymous types. */
  path: string[];
  params: TypeParameter[];
  def: TypeDef;
  docs: string[];
}

/** One registry entry as it appears on the wire. */
export interface PortableType {
  id: TypeId;
  type: TypeDescriptor;
}
