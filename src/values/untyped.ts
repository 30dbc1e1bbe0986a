/**
 * Untyped objects: the store's native representation
 *
 * A JSON-compatible tree with no schema attached. Absent keys and explicit
 * null are distinct; map entries keep their insertion order.
 */

import { AttributePath } from './path.js';
import { ConversionError } from '../errors.js';

// =============================================================================
// Types
// =============================================================================

export type Untyped =
  | { readonly kind: 'null' }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | UntypedList
  | UntypedMap;

export interface UntypedList {
  readonly kind: 'list';
  readonly items: readonly Untyped[];
}

export interface UntypedMap {
  readonly kind: 'map';
  readonly entries: ReadonlyMap<string, Untyped>;
}

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export const UNTYPED_NULL: Untyped = { kind: 'null' };

// =============================================================================
// Constructors
// =============================================================================

export function untypedMap(entries: Iterable<readonly [string, Untyped]>): UntypedMap {
  return { kind: 'map', entries: new Map(entries) };
}

export function untypedList(items: readonly Untyped[]): UntypedList {
  return { kind: 'list', items: [...items] };
}

// =============================================================================
// JSON conversion
// =============================================================================

/**
 * Finite, and exact when integral: integers past 2^53 - 1 have already been
 * rounded by the time they reach a JS number
 */
export function isExactNumber(value: number): boolean {
  return Number.isFinite(value) && (!Number.isInteger(value) || Number.isSafeInteger(value));
}

/**
 * Build an untyped tree from a parsed JSON (or YAML) document
 */
export function fromJson(input: unknown, path: AttributePath = AttributePath.root()): Untyped {
  if (input === null) return UNTYPED_NULL;

  switch (typeof input) {
    case 'boolean':
      return { kind: 'bool', value: input };
    case 'number':
      if (!Number.isFinite(input)) {
        throw new ConversionError(path, `non-finite number ${input} is not representable`);
      }
      if (!isExactNumber(input)) {
        throw new ConversionError(path, `integer ${input} is outside the exactly representable range`);
      }
      return { kind: 'number', value: input };
    case 'string':
      return { kind: 'string', value: input };
    case 'object': {
      if (Array.isArray(input)) {
        const items: unknown[] = input;
        return untypedList(items.map((item, i) => fromJson(item, path.withIndex(i))));
      }
      if (input instanceof Date) {
        return { kind: 'string', value: input.toISOString() };
      }
      const entries: [string, unknown][] = Object.entries(input);
      return untypedMap(
        entries.map(([key, item]): [string, Untyped] => [key, fromJson(item, path.withKey(key))])
      );
    }
    default:
      throw new ConversionError(path, `unsupported ${typeof input} value`);
  }
}

export function toJson(value: Untyped): JsonValue {
  switch (value.kind) {
    case 'null':
      return null;
    case 'bool':
    case 'number':
    case 'string':
      return value.value;
    case 'list':
      return value.items.map(toJson);
    case 'map':
      return Object.fromEntries(Array.from(value.entries, ([key, item]) => [key, toJson(item)]));
  }
}

export function parseUntyped(text: string): Untyped {
  const parsed: unknown = JSON.parse(text);
  return fromJson(parsed);
}

export function serializeUntyped(value: Untyped): string {
  return JSON.stringify(toJson(value));
}

// =============================================================================
// Accessors
// =============================================================================

/**
 * Nested map lookup; undefined when any key is absent or a step is not a map
 */
export function getField(value: Untyped, ...keys: string[]): Untyped | undefined {
  let current: Untyped | undefined = value;
  for (const key of keys) {
    if (!current || current.kind !== 'map') return undefined;
    current = current.entries.get(key);
  }
  return current;
}

export function getStringField(value: Untyped, ...keys: string[]): string | undefined {
  const field = getField(value, ...keys);
  return field?.kind === 'string' ? field.value : undefined;
}

/**
 * Drop null-valued map entries at every depth. List positions are kept since
 * they are meaningful; maps nested inside lists are still cleaned.
 */
export function removeNulls(value: Untyped): Untyped {
  switch (value.kind) {
    case 'map': {
      const entries: [string, Untyped][] = [];
      for (const [key, item] of value.entries) {
        if (item.kind === 'null') continue;
        entries.push([key, removeNulls(item)]);
      }
      return untypedMap(entries);
    }
    case 'list':
      return untypedList(value.items.map(removeNulls));
    default:
      return value;
  }
}

/**
 * Copy of a map without the given keys
 */
export function omitFields(value: UntypedMap, keys: readonly string[]): UntypedMap {
  const drop = new Set(keys);
  return untypedMap(Array.from(value.entries).filter(([key]) => !drop.has(key)));
}
