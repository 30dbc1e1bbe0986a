/**
 * Resource identity
 *
 * Identity is read from the object's own `apiVersion`, `kind` and
 * `metadata` fields so a stored object always describes itself.
 */

import { parseGroupVersion } from '../../api/client.js';
import { InternalError } from '../../errors.js';
import { getStringField, type Untyped } from '../../values/untyped.js';
import { getString, type Value } from '../../values/value.js';
import type { GroupVersionKind } from './types.js';

export interface ResourceIdentity extends GroupVersionKind {
  namespace?: string;
  name: string;
}

function toGvk(apiVersion: string | undefined, kind: string | undefined): GroupVersionKind {
  if (!apiVersion || !kind) {
    throw new InternalError(
      `failed to determine resource GVK: object needs both apiVersion and kind (got apiVersion=${
        apiVersion ?? '<none>'
      }, kind=${kind ?? '<none>'})`
    );
  }
  return { ...parseGroupVersion(apiVersion), kind };
}

/**
 * Group, version and kind of a typed object
 */
export function gvkFromValue(object: Value): GroupVersionKind {
  return toGvk(getString(object, 'apiVersion'), getString(object, 'kind'));
}

/**
 * Group, version and kind of an untyped object
 */
export function gvkFromUntyped(object: Untyped): GroupVersionKind {
  return toGvk(getStringField(object, 'apiVersion'), getStringField(object, 'kind'));
}

/**
 * Full identity of an untyped object. An empty namespace counts as none.
 */
export function identityFromUntyped(object: Untyped): ResourceIdentity {
  const name = getStringField(object, 'metadata', 'name');
  if (!name) {
    throw new InternalError('failed to determine resource name: metadata.name is not set');
  }
  const namespace = getStringField(object, 'metadata', 'namespace') || undefined;
  return { ...gvkFromUntyped(object), namespace, name };
}

/**
 * "apps/v1, Kind=Deployment"
 */
export function formatGvk(gvk: GroupVersionKind): string {
  const groupVersion = gvk.group === '' ? gvk.version : `${gvk.group}/${gvk.version}`;
  return `${groupVersion}, Kind=${gvk.kind}`;
}

/**
 * "namespace/name", or just "name" for cluster-scoped objects
 */
export function namespacedName(identity: Pick<ResourceIdentity, 'namespace' | 'name'>): string {
  return identity.namespace ? `${identity.namespace}/${identity.name}` : identity.name;
}
