// Type registry: id -> descriptor lookup, construction and display names.

import { MetadataError, MetadataErrorKind } from "../errors.ts";
import type { PortableType, TypeDescriptor, TypeId } from "./types.ts";

/**
 * Ids a descriptor refers to directly (params, fields, element types).
 * Does not follow the referenced types.
 */
export function referencedIds(descriptor: TypeDescriptor): TypeId[] {
  const ids: TypeId[] = [];
  for (const param of descriptor.params) {
    if (param.type !== null) ids.push(param.type);
  }
  const def = descriptor.def;
  switch (def.tag) {
    case "Composite":
      for (const field of def.fields) ids.push(field.type);
      break;
    case "Variant":
      for (const variant of def.variants) {
        for (const field of variant.fields) ids.push(field.type);
      }
      break;
    case "Sequence":
    case "Array":
    case "Compact":
      ids.push(def.type);
      break;
    case "Tuple":
      ids.push(...def.fields);
      break;
    case "BitSequence":
      ids.push(def.bitStoreType, def.bitOrderType);
      break;
    case "Primitive":
      break;
  }
  return ids;
}

/**
 * Immutable registry of type descriptors keyed by id.
 *
 * Iterates in insertion order. Cycles between descriptors are allowed;
 * nothing here expands a type recursively.
 */
export class TypeRegistry implements Iterable<PortableType> {
  private readonly byId: ReadonlyMap<TypeId, TypeDescriptor>;

  private constructor(byId: ReadonlyMap<TypeId, TypeDescriptor>) {
    this.byId = byId;
  }

  static empty(): TypeRegistry {
    return new TypeRegistry(new Map());
  }

  /**
   * Build from wire entries. Does not check that referenced ids exist;
   * call `validate()` for that.
   *
   * @throws MetadataError (MALFORMED_PAYLOAD) on a duplicate id
   */
  static fromPortable(types: readonly PortableType[]): TypeRegistry {
    const byId = new Map<TypeId, TypeDescriptor>();
    types.forEach((entry, i) => {
      if (byId.has(entry.id)) {
        throw new MetadataError(
          MetadataErrorKind.MALFORMED_PAYLOAD,
          `duplicate type id ${entry.id} in registry`,
          { path: `types.[${i}].id` },
        );
      }
      byId.set(entry.id, entry.type);
    });
    return new TypeRegistry(byId);
  }

  get size(): number {
    return this.byId.size;
  }

  has(id: TypeId): boolean {
    return this.byId.has(id);
  }

  /**
   * @throws MetadataError (DANGLING_TYPE_REFERENCE) when the id is absent
   */
  resolve(id: TypeId): TypeDescriptor {
    const descriptor = this.byId.get(id);
    if (descriptor === undefined) {
      throw MetadataError.danglingTypeReference(id);
    }
    return descriptor;
  }

  ids(): TypeId[] {
    return Array.from(this.byId.keys());
  }

  toPortable(): PortableType[] {
    return Array.from(this.byId, ([id, type]) => ({ id, type }));
  }

  /** Check that every referenced id is defined. */
  validate(): void {
    for (const [id, descriptor] of this.byId) {
      for (const ref of referencedIds(descriptor)) {
        if (!this.byId.has(ref)) {
          throw MetadataError.danglingTypeReference(ref, `types[${id}]`);
        }
      }
    }
  }

  toJSON(): { types: PortableType[] } {
    return { types: this.toPortable() };
  }

  [Symbol.iterator](): Iterator<PortableType> {
    return this.toPortable()[Symbol.iterator]();
  }
}

/**
 * Assigns fresh ids to descriptors. No structural deduplication: registering
 * the same descriptor twice yields two ids.
 *
 * Self-referential types are built in two steps with `reserve()` and
 * `define()`.
 */
export class TypeRegistryBuilder {
  private nextId: TypeId = 0;
  private readonly defined = new Map<TypeId, TypeDescriptor>();
  private readonly reserved = new Set<TypeId>();

  register(descriptor: TypeDescriptor): TypeId {
    const id = this.nextId++;
    this.defined.set(id, descriptor);
    return id;
  }

  reserve(): TypeId {
    const id = this.nextId++;
    this.reserved.add(id);
    return id;
  }

  define(id: TypeId, descriptor: TypeDescriptor): void {
    if (!this.reserved.delete(id)) {
      throw new Error(`type id ${id} was not reserved or is already defined`);
    }
    this.defined.set(id, descriptor);
  }

  /**
   * @throws MetadataError (DANGLING_TYPE_REFERENCE) for a reserved id that
   * was never defined or a reference to an unknown id
   */
  build(): TypeRegistry {
    const [unfilled] = this.reserved;
    if (unfilled !== undefined) {
      throw new MetadataError(
        MetadataErrorKind.DANGLING_TYPE_REFERENCE,
        `type id ${unfilled} was reserved but never defined`,
        { typeId: unfilled },
      );
    }
    const entries = Array.from(this.defined, ([id, type]) => ({ id, type }));
    entries.sort((a, b) => a.id - b.id);
    const registry = TypeRegistry.fromPortable(entries);
    registry.validate();
    return registry;
  }
}

const MAX_NAME_DEPTH = 8;

/**
 * Display name for a type: its path joined with `::` plus generic
 * arguments, or a structural rendering for anonymous types.
 */
export function typeName(registry: TypeRegistry, id: TypeId, depth = MAX_NAME_DEPTH): string {
  if (depth <= 0) return "…";
  const descriptor = registry.resolve(id);
  const inner = (ref: TypeId): string => typeName(registry, ref, depth - 1);

  if (descriptor.path.length > 0) {
    const name = descriptor.path.join("::");
    const args = descriptor.params.filter((p) => p.type !== null);
    if (args.length === 0) return name;
    return `${name}<${args.map((p) => (p.type === null ? p.name : inner(p.type))).join(", ")}>`;
  }

  const def = descriptor.def;
  switch (def.tag) {
    case "Primitive":
      return def.value;
    case "Sequence":
      return `Vec<${inner(def.type)}>`;
    case "Array":
      return `[${inner(def.type)}; ${def.len}]`;
    case "Tuple":
      return `(${def.fields.map(inner).join(", ")})`;
    case "Compact":
      return `Compact<${inner(def.type)}>`;
    case "BitSequence":
      return `BitSequence<${inner(def.bitStoreType)}, ${inner(def.bitOrderType)}>`;
    case "Composite":
    case "Variant":
      return `#${id}`;
  }
}
