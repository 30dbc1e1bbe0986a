/**
 * Planning for manifest resources
 *
 * Produces the planned state that apply consumes: the declared manifest,
 * the proposed object shaped like the resource type with every position the
 * manifest leaves open marked Unknown, and computed paths marked Unknown.
 */

import { ConversionError } from '../../errors.js';
import { coerceValue } from '../../morph/coerce.js';
import { expandToUnknown } from '../../morph/normalize.js';
import { Types, listType, mapType, type Type } from '../../values/types.js';
import {
  listValue,
  mapValue,
  nullValue,
  objectValue,
  stringValue,
  type Value,
} from '../../values/value.js';
import { markComputedUnknown, resolveComputedFields } from './computed.js';
import { errorDiagnostic } from './diagnostics.js';
import { WAIT_FOR_TYPE, manifestState } from './state.js';
import type { Diagnostic } from './types.js';

export interface PlanInput {
  /** The object as declared */
  manifest: Value;
  /** Write variant of the resource type */
  objectType: Type;
  computedFields?: readonly string[];
  /** Completion condition: field path → expected value */
  waitFor?: Readonly<Record<string, string>>;
}

export interface PlanResult {
  plannedState?: Value;
  diagnostics: Diagnostic[];
}

/**
 * `wait_for` attribute from a field → value record
 */
export function waitForValue(fields: Readonly<Record<string, string>> | undefined): Value {
  if (!fields) return nullValue(WAIT_FOR_TYPE);
  const entries = new Map<string, Value>(
    Object.entries(fields).map(([path, expected]): [string, Value] => [path, stringValue(expected)])
  );
  return objectValue({ fields: mapValue(mapType(Types.string), entries) });
}

/**
 * Planned state for creating or updating a resource from its manifest
 */
export function planResourceState(input: PlanInput): PlanResult {
  const { fields, issues } = resolveComputedFields(input.computedFields);
  if (issues.length > 0) {
    return {
      diagnostics: issues.map((issue) =>
        errorDiagnostic(`Cannot parse computed field path: ${issue.field}`, issue.error.message)
      ),
    };
  }

  let object: Value;
  try {
    object = expandToUnknown(input.objectType, coerceValue(input.manifest, input.objectType));
  } catch (error) {
    if (!(error instanceof ConversionError)) throw error;
    return {
      diagnostics: [errorDiagnostic('Manifest does not match the resource type', error.message)],
    };
  }

  const computedFields = input.computedFields
    ? listValue(listType(Types.string), input.computedFields.map(stringValue))
    : undefined;

  return {
    plannedState: manifestState({
      manifest: input.manifest,
      object: markComputedUnknown(object, fields),
      computedFields,
      waitFor: waitForValue(input.waitFor),
    }),
    diagnostics: [],
  };
}

/**
 * Planned state for removing a resource
 */
export function planDestroy(): Value {
  return nullValue(Types.dynamic);
}
