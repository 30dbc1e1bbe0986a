/**
 * Value bridge between typed value trees and untyped store objects
 *
 * `toUntyped` produces what the store accepts; `fromUntyped` reads what the
 * store returns back into the shape of a schema type. Both are pure and
 * report failures as ConversionError carrying the offending path.
 */

import { ConversionError } from '../errors.js';
import { AttributePath } from '../values/path.js';
import {
  Types,
  objectTypeFromEntries,
  tupleType,
  typeToString,
  type Type,
} from '../values/types.js';
import {
  UNTYPED_NULL,
  untypedList,
  untypedMap,
  type Untyped,
} from '../values/untyped.js';
import {
  isKnownList,
  isKnownRecord,
  nullValue,
  objectValue,
  tupleValue,
  type Value,
} from '../values/value.js';
import { coerceScalar } from './coerce.js';

// =============================================================================
// Typed → untyped
// =============================================================================

/**
 * Convert a typed value to an untyped object. Null becomes explicit null;
 * Unknown cannot be represented and fails.
 */
export function toUntyped(value: Value, path: AttributePath = AttributePath.root()): Untyped {
  if (value.state === 'null') return UNTYPED_NULL;
  if (value.state === 'unknown') {
    throw new ConversionError(path, 'unknown values cannot be sent to the store');
  }

  if (isKnownRecord(value)) {
    const objectTyped = value.type.kind === 'object';
    return untypedMap(
      Array.from(value.value, ([name, child]): [string, Untyped] => [
        name,
        toUntyped(child, objectTyped ? path.withAttribute(name) : path.withKey(name)),
      ])
    );
  }

  if (isKnownList(value)) {
    return untypedList(value.value.map((child, i) => toUntyped(child, path.withIndex(i))));
  }

  const scalar = value.value;
  if (typeof scalar === 'string') return { kind: 'string', value: scalar };
  if (typeof scalar === 'number') return { kind: 'number', value: scalar };
  return { kind: 'bool', value: scalar };
}

// =============================================================================
// Untyped → typed
// =============================================================================

/**
 * Infer the concrete type of untyped data: maps become objects and lists
 * become tuples, so heterogeneous data keeps every element's own type.
 */
export function inferType(data: Untyped): Type {
  switch (data.kind) {
    case 'null':
      return Types.dynamic;
    case 'bool':
      return Types.bool;
    case 'number':
      return Types.number;
    case 'string':
      return Types.string;
    case 'list':
      return tupleType(data.items.map(inferType));
    case 'map':
      return objectTypeFromEntries(
        Array.from(data.entries, ([key, item]) => [key, inferType(item)] as const)
      );
  }
}

/**
 * Read untyped data into the shape of `type`.
 *
 * Object attributes missing from the data become Null; keys the type does not
 * declare are dropped. A `dynamic` target takes the inferred type of the data.
 */
export function fromUntyped(
  data: Untyped,
  type: Type,
  path: AttributePath = AttributePath.root()
): Value {
  if (data.kind === 'null') return nullValue(type);

  switch (type.kind) {
    case 'dynamic':
      return fromUntyped(data, inferType(data), path);

    case 'string':
    case 'number':
    case 'bool':
      if (data.kind === 'list' || data.kind === 'map') break;
      return coerceScalar(data.value, type, path);

    case 'object': {
      if (data.kind !== 'map') break;
      const attributes = new Map<string, Value>();
      for (const [name, attrType] of type.attributes) {
        const item = data.entries.get(name);
        attributes.set(
          name,
          item ? fromUntyped(item, attrType, path.withAttribute(name)) : nullValue(attrType)
        );
      }
      return objectValue(attributes);
    }

    case 'map': {
      if (data.kind !== 'map') break;
      const entries = new Map<string, Value>();
      for (const [key, item] of data.entries) {
        entries.set(key, fromUntyped(item, type.element, path.withKey(key)));
      }
      return { state: 'known', type, value: entries };
    }

    case 'list': {
      if (data.kind !== 'list') break;
      const element = type.element;
      return {
        state: 'known',
        type,
        value: data.items.map((item, i) => fromUntyped(item, element, path.withIndex(i))),
      };
    }

    case 'tuple': {
      if (data.kind !== 'list') break;
      if (data.items.length !== type.elements.length) {
        throw new ConversionError(
          path,
          `tuple expects ${type.elements.length} elements, got ${data.items.length}`
        );
      }
      const elements = type.elements;
      return tupleValue(data.items.map((item, i) => fromUntyped(item, elements[i], path.withIndex(i))));
    }
  }

  throw new ConversionError(path, `cannot convert ${data.kind} to ${typeToString(type)}`);
}
