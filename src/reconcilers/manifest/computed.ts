/**
 * Computed fields
 *
 * Paths the store may fill in itself. Planning marks them Unknown so a
 * store-assigned value does not show up as drift; apply puts back whatever
 * the user did declare at those paths before writing.
 */

import { PathParseError } from '../../errors.js';
import { coerceValue } from '../../morph/coerce.js';
import { AttributePath, parseFieldPath } from '../../values/path.js';
import {
  transformValue,
  unknownValue,
  walkPath,
  type Value,
} from '../../values/value.js';

/**
 * Computed paths keyed by their canonical string form
 */
export type ComputedFieldSet = ReadonlyMap<string, AttributePath>;

export const DEFAULT_COMPUTED_FIELDS: readonly string[] = [
  'metadata.annotations',
  'metadata.labels',
];

export interface ComputedFieldIssue {
  field: string;
  error: PathParseError;
}

export interface ResolvedComputedFields {
  fields: ComputedFieldSet;
  /** One entry per field path that failed to parse */
  issues: ComputedFieldIssue[];
}

/**
 * Build the computed-field set from configured field paths. Absent or empty
 * configuration selects DEFAULT_COMPUTED_FIELDS.
 */
export function resolveComputedFields(config?: readonly string[]): ResolvedComputedFields {
  const source = config && config.length > 0 ? config : DEFAULT_COMPUTED_FIELDS;
  const fields = new Map<string, AttributePath>();
  const issues: ComputedFieldIssue[] = [];

  for (const field of source) {
    try {
      const path = parseFieldPath(field);
      fields.set(path.toString(), path);
    } catch (error) {
      if (!(error instanceof PathParseError)) throw error;
      issues.push({ field, error });
    }
  }

  return { fields, issues };
}

/**
 * Restore user-declared values at computed paths.
 *
 * A node is replaced only when its path is computed and it is not Known.
 * The same path is then looked up in `manifest`: when the manifest does not
 * reach it the node stays as it is, otherwise the manifest value is coerced
 * to the node's type and substituted. A failed coercion throws
 * ConversionError for that path.
 */
export function backfillComputedFields(
  planned: Value,
  manifest: Value,
  computed: ComputedFieldSet
): Value {
  return transformValue(planned, (path, node) => {
    if (!computed.has(path.toString())) return node;
    if (node.state === 'known') return node;

    const found = walkPath(manifest, path);
    if (!found.found) return node;

    return coerceValue(found.value, node.type, path);
  });
}

/**
 * Mark every computed path present in `value` as Unknown
 */
export function markComputedUnknown(value: Value, computed: ComputedFieldSet): Value {
  return transformValue(value, (path, node) =>
    computed.has(path.toString()) ? unknownValue(node.type) : node
  );
}
