/**
 * Resource state shape for the `manifest` resource type
 */

import { ValidationError } from '../../errors.js';
import {
  Types,
  listType,
  mapType,
  objectType,
  type ObjectType,
} from '../../values/types.js';
import {
  isKnownList,
  isKnownRecord,
  isKnownScalar,
  nullValue,
  objectValue,
  type Value,
} from '../../values/value.js';

export const MANIFEST_RESOURCE_TYPE = 'manifest';

export const WAIT_FOR_TYPE: ObjectType = objectType({
  fields: mapType(Types.string),
});

/**
 * - `manifest`: the object as the user declared it
 * - `object`: the object as last applied, with computed fields resolved
 * - `computed_fields`: field paths the store may compute
 * - `wait_for`: completion condition checked after each write
 */
export const MANIFEST_STATE_TYPE: ObjectType = objectType({
  manifest: Types.dynamic,
  object: Types.dynamic,
  computed_fields: listType(Types.string),
  wait_for: WAIT_FOR_TYPE,
});

/**
 * State type for a resource type ID
 */
export function getResourceType(typeName: string): ObjectType {
  if (typeName !== MANIFEST_RESOURCE_TYPE) {
    throw new ValidationError(
      `unknown resource type "${typeName}"`,
      'VALIDATION',
      `The only supported resource type is "${MANIFEST_RESOURCE_TYPE}"`
    );
  }
  return MANIFEST_STATE_TYPE;
}

/**
 * Attribute of a state value; Null of the declared type when absent
 */
export function stateAttribute(state: Value, name: string): Value {
  const declared = MANIFEST_STATE_TYPE.attributes.get(name) ?? Types.dynamic;
  if (!isKnownRecord(state)) return nullValue(declared);
  return state.value.get(name) ?? nullValue(declared);
}

/**
 * Copy of a state value with one attribute replaced
 */
export function withStateAttribute(state: Value, name: string, value: Value): Value {
  const attributes = new Map(isKnownRecord(state) ? state.value : []);
  attributes.set(name, value);
  return objectValue(attributes);
}

/**
 * Field path strings from `computed_fields`, or undefined when the attribute
 * is Null or Unknown. Elements that are not known strings are skipped.
 */
export function readComputedFieldConfig(state: Value): string[] | undefined {
  const attr = stateAttribute(state, 'computed_fields');
  if (!isKnownList(attr)) return undefined;

  const fields: string[] = [];
  for (const item of attr.value) {
    if (isKnownScalar(item) && typeof item.value === 'string') {
      fields.push(item.value);
    }
  }
  return fields;
}

/**
 * Build a state value from its parts; omitted parts are Null
 */
export function manifestState(parts: {
  manifest?: Value;
  object?: Value;
  computedFields?: Value;
  waitFor?: Value;
}): Value {
  return objectValue({
    manifest: parts.manifest ?? nullValue(Types.dynamic),
    object: parts.object ?? nullValue(Types.dynamic),
    computed_fields: parts.computedFields ?? nullValue(listType(Types.string)),
    wait_for: parts.waitFor ?? nullValue(WAIT_FOR_TYPE),
  });
}
