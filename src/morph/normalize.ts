/**
 * Unknown/Null normalization over value trees
 */

import { ConversionError } from '../errors.js';
import { AttributePath } from '../values/path.js';
import { isPrimitiveType, typeToString, type Type } from '../values/types.js';
import {
  isKnownList,
  isKnownRecord,
  isKnownScalar,
  nullValue,
  objectValue,
  transformValue,
  tupleValue,
  unknownValue,
  type Value,
} from '../values/value.js';

/**
 * Replace every Unknown node with Null of the same type
 */
export function collapseUnknownToNull(value: Value): Value {
  return transformValue(value, (_path, node) =>
    node.state === 'unknown' ? nullValue(node.type) : node
  );
}

/**
 * Shape `value` like `type`, marking every position the source does not
 * resolve as Unknown.
 *
 * Absent or null positions become Unknown; a null object expands into an
 * object of Unknown attributes. Known scalars of the wrong primitive kind
 * become Unknown as well. A scalar where a container is required (or the
 * reverse) cannot be reconciled and fails.
 */
export function expandToUnknown(
  type: Type,
  value: Value,
  path: AttributePath = AttributePath.root()
): Value {
  if (value.state === 'unknown') return unknownValue(type);

  if (type.kind === 'dynamic') {
    return value.state === 'null' ? unknownValue(type) : value;
  }

  if (isPrimitiveType(type)) {
    if (value.state === 'null') return unknownValue(type);
    if (!isKnownScalar(value)) {
      throw new ConversionError(path, `expected ${type.kind}, got ${typeToString(value.type)}`);
    }
    return value.type.kind === type.kind ? value : unknownValue(type);
  }

  if (type.kind === 'object') {
    if (value.state !== 'null' && !isKnownRecord(value)) {
      throw new ConversionError(path, `expected an object, got ${typeToString(value.type)}`);
    }
    const source = isKnownRecord(value) ? value.value : new Map<string, Value>();
    const attributes = new Map<string, Value>();
    for (const [name, attrType] of type.attributes) {
      const child = source.get(name) ?? unknownValue(attrType);
      attributes.set(name, expandToUnknown(attrType, child, path.withAttribute(name)));
    }
    return objectValue(attributes);
  }

  if (value.state === 'null') return unknownValue(type);

  if (type.kind === 'map') {
    if (!isKnownRecord(value)) {
      throw new ConversionError(path, `expected a map, got ${typeToString(value.type)}`);
    }
    const entries = new Map<string, Value>();
    for (const [key, child] of value.value) {
      entries.set(key, expandToUnknown(type.element, child, path.withKey(key)));
    }
    return { state: 'known', type, value: entries };
  }

  if (!isKnownList(value)) {
    throw new ConversionError(path, `expected a ${type.kind}, got ${typeToString(value.type)}`);
  }

  if (type.kind === 'list') {
    const element = type.element;
    return {
      state: 'known',
      type,
      value: value.value.map((child, i) => expandToUnknown(element, child, path.withIndex(i))),
    };
  }

  if (value.value.length !== type.elements.length) {
    throw new ConversionError(
      path,
      `tuple expects ${type.elements.length} elements, got ${value.value.length}`
    );
  }
  const elements = type.elements;
  return tupleValue(value.value.map((child, i) => expandToUnknown(elements[i], child, path.withIndex(i))));
}
