/**
 * Server-side bookkeeping fields
 *
 * Fields the store maintains for its own use. They are dropped from write
 * responses before the object enters state.
 */

import { omitFields, untypedMap, type Untyped } from '../../values/untyped.js';

export const SERVER_SIDE_ROOT_FIELDS: readonly string[] = ['status'];

export const SERVER_SIDE_METADATA_FIELDS: readonly string[] = [
  'uid',
  'creationTimestamp',
  'resourceVersion',
  'generation',
  'selfLink',
  'managedFields',
];

/**
 * Copy of `object` without server-side fields. Non-map input is returned
 * unchanged.
 */
export function removeServerSideFields(object: Untyped): Untyped {
  if (object.kind !== 'map') return object;

  const root = omitFields(object, SERVER_SIDE_ROOT_FIELDS);
  const metadata = root.entries.get('metadata');
  if (metadata?.kind !== 'map') return root;

  return untypedMap(
    Array.from(root.entries, ([key, item]): [string, Untyped] => [
      key,
      key === 'metadata' ? omitFields(metadata, SERVER_SIDE_METADATA_FIELDS) : item,
    ])
  );
}
