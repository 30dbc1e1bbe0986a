/**
 * Schema type model
 *
 * Types describe the shape of a value tree. `dynamic` only appears in
 * declarations (e.g. an attribute whose shape is decided by the data); values
 * always carry a concrete type.
 */

export type PrimitiveType =
  | { readonly kind: 'string' }
  | { readonly kind: 'number' }
  | { readonly kind: 'bool' };

export interface DynamicType {
  readonly kind: 'dynamic';
}

export interface ObjectType {
  readonly kind: 'object';
  readonly attributes: ReadonlyMap<string, Type>;
}

export interface MapType {
  readonly kind: 'map';
  readonly element: Type;
}

export interface ListType {
  readonly kind: 'list';
  readonly element: Type;
}

export interface TupleType {
  readonly kind: 'tuple';
  readonly elements: readonly Type[];
}

export type Type = PrimitiveType | DynamicType | ObjectType | MapType | ListType | TupleType;

// =============================================================================
// Constructors
// =============================================================================

export const Types = {
  string: { kind: 'string' },
  number: { kind: 'number' },
  bool: { kind: 'bool' },
  dynamic: { kind: 'dynamic' },
} as const satisfies Record<string, Type>;

export function objectType(attributes: Record<string, Type>): ObjectType {
  return { kind: 'object', attributes: new Map(Object.entries(attributes)) };
}

export function objectTypeFromEntries(entries: Iterable<readonly [string, Type]>): ObjectType {
  return { kind: 'object', attributes: new Map(entries) };
}

export function mapType(element: Type): MapType {
  return { kind: 'map', element };
}

export function listType(element: Type): ListType {
  return { kind: 'list', element };
}

export function tupleType(elements: readonly Type[]): TupleType {
  return { kind: 'tuple', elements: [...elements] };
}

// =============================================================================
// Predicates
// =============================================================================

export function isPrimitiveType(type: Type): type is PrimitiveType {
  return type.kind === 'string' || type.kind === 'number' || type.kind === 'bool';
}

export function typeEquals(a: Type, b: Type): boolean {
  switch (a.kind) {
    case 'string':
    case 'number':
    case 'bool':
    case 'dynamic':
      return a.kind === b.kind;
    case 'map':
      return b.kind === 'map' && typeEquals(a.element, b.element);
    case 'list':
      return b.kind === 'list' && typeEquals(a.element, b.element);
    case 'tuple': {
      if (b.kind !== 'tuple' || a.elements.length !== b.elements.length) return false;
      const others = b.elements;
      return a.elements.every((t, i) => typeEquals(t, others[i]));
    }
    case 'object': {
      if (b.kind !== 'object' || a.attributes.size !== b.attributes.size) return false;
      for (const [name, t] of a.attributes) {
        const other = b.attributes.get(name);
        if (!other || !typeEquals(t, other)) return false;
      }
      return true;
    }
  }
}

/**
 * Printable form, e.g. `object({ name: string, ports: list(number) })`
 */
export function typeToString(type: Type): string {
  switch (type.kind) {
    case 'string':
    case 'number':
    case 'bool':
    case 'dynamic':
      return type.kind;
    case 'map':
    case 'list':
      return `${type.kind}(${typeToString(type.element)})`;
    case 'tuple':
      return `tuple([${type.elements.map(typeToString).join(', ')}])`;
    case 'object': {
      const attrs = Array.from(type.attributes, ([name, t]) => `${name}: ${typeToString(t)}`);
      return `object({ ${attrs.join(', ')} })`;
    }
  }
}
