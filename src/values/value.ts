/**
 * Typed value trees
 *
 * Every node is Null, Unknown or Known. Known nodes carry a scalar (primitive
 * types), an ordered list of children (list/tuple) or an insertion-ordered
 * map of children (object/map). Null and Unknown carry no data.
 */

import { AttributePath } from './path.js';
import {
  Types,
  objectTypeFromEntries,
  tupleType,
  typeEquals,
  type ListType,
  type MapType,
  type ObjectType,
  type PrimitiveType,
  type TupleType,
  type Type,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export type Scalar = string | number | boolean;

export interface NullValue {
  readonly state: 'null';
  readonly type: Type;
}

export interface UnknownValue {
  readonly state: 'unknown';
  readonly type: Type;
}

export interface KnownScalar {
  readonly state: 'known';
  readonly type: PrimitiveType;
  readonly value: Scalar;
}

export interface KnownList {
  readonly state: 'known';
  readonly type: ListType | TupleType;
  readonly value: readonly Value[];
}

export interface KnownRecord {
  readonly state: 'known';
  readonly type: ObjectType | MapType;
  readonly value: ReadonlyMap<string, Value>;
}

export type KnownValue = KnownScalar | KnownList | KnownRecord;

export type Value = NullValue | UnknownValue | KnownValue;

// =============================================================================
// Constructors
// =============================================================================

export function nullValue(type: Type): NullValue {
  return { state: 'null', type };
}

export function unknownValue(type: Type): UnknownValue {
  return { state: 'unknown', type };
}

export function stringValue(value: string): KnownScalar {
  return { state: 'known', type: Types.string, value };
}

export function numberValue(value: number): KnownScalar {
  return { state: 'known', type: Types.number, value };
}

export function boolValue(value: boolean): KnownScalar {
  return { state: 'known', type: Types.bool, value };
}

/**
 * Object value whose type is derived from its attribute values
 */
export function objectValue(
  attributes: Record<string, Value> | ReadonlyMap<string, Value>
): KnownRecord {
  const entries = isValueMap(attributes)
    ? new Map(attributes)
    : new Map(Object.entries(attributes));
  const type = objectTypeFromEntries(Array.from(entries, ([name, v]) => [name, v.type] as const));
  return { state: 'known', type, value: entries };
}

export function mapValue(type: MapType, entries: ReadonlyMap<string, Value>): KnownRecord {
  return { state: 'known', type, value: new Map(entries) };
}

export function listValue(type: ListType, items: readonly Value[]): KnownList {
  return { state: 'known', type, value: [...items] };
}

/**
 * Tuple value whose type is derived from its elements
 */
export function tupleValue(items: readonly Value[]): KnownList {
  return { state: 'known', type: tupleType(items.map((v) => v.type)), value: [...items] };
}

function isValueMap(
  input: Record<string, Value> | ReadonlyMap<string, Value>
): input is ReadonlyMap<string, Value> {
  return input instanceof Map;
}

// =============================================================================
// Predicates
// =============================================================================

export function isKnownScalar(value: Value): value is KnownScalar {
  return (
    value.state === 'known' &&
    (value.type.kind === 'string' || value.type.kind === 'number' || value.type.kind === 'bool')
  );
}

export function isKnownList(value: Value): value is KnownList {
  return value.state === 'known' && (value.type.kind === 'list' || value.type.kind === 'tuple');
}

export function isKnownRecord(value: Value): value is KnownRecord {
  return value.state === 'known' && (value.type.kind === 'object' || value.type.kind === 'map');
}

/**
 * Known string at a nested attribute, or undefined
 */
export function getString(value: Value, ...names: string[]): string | undefined {
  const result = walkPath(value, AttributePath.of(...names));
  if (!result.found || !isKnownScalar(result.value)) return undefined;
  return typeof result.value.value === 'string' ? result.value.value : undefined;
}

// =============================================================================
// Traversal
// =============================================================================

export type WalkResult =
  | { readonly found: true; readonly value: Value }
  | { readonly found: false; readonly reached: Value; readonly remaining: AttributePath };

/**
 * Follow a path from `value`.
 *
 * Attribute and key steps both select by name, on objects and maps alike.
 * When a step cannot be taken the walk stops and reports the last value
 * reached together with the steps left over.
 */
export function walkPath(value: Value, path: AttributePath): WalkResult {
  let current = value;

  for (let i = 0; i < path.steps.length; i++) {
    const step = path.steps[i];
    let next: Value | undefined;

    if (step.kind === 'index') {
      if (isKnownList(current)) next = current.value[step.index];
    } else if (isKnownRecord(current)) {
      next = current.value.get(step.kind === 'attribute' ? step.name : step.key);
    }

    if (!next) {
      return { found: false, reached: current, remaining: path.slice(i) };
    }
    current = next;
  }

  return { found: true, value: current };
}

export type TransformFn = (path: AttributePath, value: Value) => Value;

/**
 * Rebuild a value bottom-up. Children are transformed before their parent
 * and `fn` sees each node with its already-transformed children. Container
 * types are kept as declared.
 */
export function transformValue(
  value: Value,
  fn: TransformFn,
  path: AttributePath = AttributePath.root()
): Value {
  if (isKnownRecord(value)) {
    const next = new Map<string, Value>();
    const objectTyped = value.type.kind === 'object';
    for (const [name, child] of value.value) {
      const childPath = objectTyped ? path.withAttribute(name) : path.withKey(name);
      next.set(name, transformValue(child, fn, childPath));
    }
    return fn(path, { state: 'known', type: value.type, value: next });
  }

  if (isKnownList(value)) {
    const next = value.value.map((child, i) => transformValue(child, fn, path.withIndex(i)));
    return fn(path, { state: 'known', type: value.type, value: next });
  }

  return fn(path, value);
}

/**
 * Structural equality, types included
 */
export function valueEquals(a: Value, b: Value): boolean {
  if (a.state !== b.state || !typeEquals(a.type, b.type)) return false;

  if (isKnownScalar(a)) {
    return isKnownScalar(b) && a.value === b.value;
  }

  if (isKnownList(a)) {
    if (!isKnownList(b) || a.value.length !== b.value.length) return false;
    const others = b.value;
    return a.value.every((child, i) => valueEquals(child, others[i]));
  }

  if (isKnownRecord(a)) {
    if (!isKnownRecord(b) || a.value.size !== b.value.size) return false;
    for (const [name, child] of a.value) {
      const other = b.value.get(name);
      if (!other || !valueEquals(child, other)) return false;
    }
  }

  return true;
}
