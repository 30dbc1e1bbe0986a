/**
 * Retyping values
 *
 * `coerceValue` converts a typed value into the shape of another type,
 * keeping Null and Unknown wherever they appear. Scalars follow the same
 * conversions the payload bridge applies to store data.
 *
 * Object and tuple results take their type from their converted children, so
 * attributes declared `dynamic` end up carrying the child's concrete type.
 */

import { ConversionError } from '../errors.js';
import { AttributePath } from '../values/path.js';
import { typeToString, type PrimitiveType, type Type } from '../values/types.js';
import { isExactNumber } from '../values/untyped.js';
import {
  boolValue,
  isKnownList,
  isKnownRecord,
  nullValue,
  numberValue,
  objectValue,
  stringValue,
  tupleValue,
  unknownValue,
  type KnownScalar,
  type Scalar,
  type Value,
} from '../values/value.js';

/**
 * Convert a scalar to a primitive type.
 *
 * - string: numbers and booleans are printed
 * - number: numeric strings are parsed
 * - bool: "true" / "false" are accepted
 */
export function coerceScalar(scalar: Scalar, type: PrimitiveType, path: AttributePath): KnownScalar {
  switch (type.kind) {
    case 'string':
      return stringValue(typeof scalar === 'string' ? scalar : String(scalar));

    case 'number': {
      if (typeof scalar === 'number') return numberValue(scalar);
      if (typeof scalar === 'string' && scalar.trim() !== '') {
        const parsed = Number(scalar);
        if (isExactNumber(parsed)) return numberValue(parsed);
      }
      break;
    }

    case 'bool': {
      if (typeof scalar === 'boolean') return boolValue(scalar);
      if (scalar === 'true' || scalar === 'false') return boolValue(scalar === 'true');
      break;
    }
  }

  throw new ConversionError(path, `cannot convert ${JSON.stringify(scalar)} to ${type.kind}`);
}

export function coerceValue(
  value: Value,
  type: Type,
  path: AttributePath = AttributePath.root()
): Value {
  if (type.kind === 'dynamic') return value;
  if (value.state === 'null') return nullValue(type);
  if (value.state === 'unknown') return unknownValue(type);

  switch (type.kind) {
    case 'string':
    case 'number':
    case 'bool': {
      if (isKnownList(value) || isKnownRecord(value)) break;
      return coerceScalar(value.value, type, path);
    }

    case 'object': {
      if (!isKnownRecord(value)) break;
      const source = value.value;
      const attributes = new Map<string, Value>();
      for (const [name, attrType] of type.attributes) {
        const child = source.get(name);
        attributes.set(
          name,
          child ? coerceValue(child, attrType, path.withAttribute(name)) : nullValue(attrType)
        );
      }
      return objectValue(attributes);
    }

    case 'map': {
      if (!isKnownRecord(value)) break;
      const entries = new Map<string, Value>();
      for (const [key, child] of value.value) {
        entries.set(key, coerceValue(child, type.element, path.withKey(key)));
      }
      return { state: 'known', type, value: entries };
    }

    case 'list': {
      if (!isKnownList(value)) break;
      const element = type.element;
      const items = value.value.map((child, i) => coerceValue(child, element, path.withIndex(i)));
      return { state: 'known', type, value: items };
    }

    case 'tuple': {
      if (!isKnownList(value)) break;
      if (value.value.length !== type.elements.length) {
        throw new ConversionError(
          path,
          `tuple expects ${type.elements.length} elements, got ${value.value.length}`
        );
      }
      const elements = type.elements;
      return tupleValue(
        value.value.map((child, i) => coerceValue(child, elements[i], path.withIndex(i)))
      );
    }
  }

  throw new ConversionError(
    path,
    `cannot convert ${typeToString(value.type)} to ${typeToString(type)}`
  );
}
