/**
 * Discovery-backed scope resolution
 *
 * Maps a kind to its resource plural and scope by reading the group
 * version's resource list. Lists are cached per group version in a
 * process-wide cache that apply invalidates after every store write.
 */

import type { StoreClient } from './client.js';
import type { APIResource, GroupVersionKind, RequestOptions } from './types.js';
import type { ResolvedScope, ScopeResolver, TypeCache } from '../reconcilers/manifest/types.js';
import { InternalError } from '../errors.js';

/**
 * Key of a group version ("v1", "apps/v1")
 */
export function groupVersionKey(group: string, version: string): string {
  return group === '' ? version : `${group}/${version}`;
}

/**
 * Cache of discovery results, one pending lookup per group version.
 *
 * Concurrent readers of the same group version share one request. The
 * shared request runs without any reader's signal; each reader only stops
 * waiting on it when its own signal aborts. `invalidate` replaces the whole
 * map at once; a lookup that fails is dropped so the next reader fetches
 * again.
 */
export class DiscoveryCache implements TypeCache {
  private entries = new Map<string, Promise<APIResource[]>>();

  constructor(
    private readonly fetchResources: (groupVersion: string) => Promise<APIResource[]>
  ) {}

  resources(groupVersion: string, options?: RequestOptions): Promise<APIResource[]> {
    const signal = options?.signal;
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }
    return untilAborted(this.shared(groupVersion), signal);
  }

  private shared(groupVersion: string): Promise<APIResource[]> {
    const existing = this.entries.get(groupVersion);
    if (existing) return existing;

    const entries = this.entries;
    const pending = this.fetchResources(groupVersion);
    entries.set(groupVersion, pending);
    void pending.catch(() => {
      if (entries.get(groupVersion) === pending) entries.delete(groupVersion);
    });
    return pending;
  }

  invalidate(): void {
    this.entries = new Map();
  }

  get size(): number {
    return this.entries.size;
  }
}

function abortReason(signal: AbortSignal): unknown {
  const reason: unknown = signal.reason;
  return reason ?? new Error('discovery lookup aborted');
}

/**
 * Settle with `pending`, or reject as soon as `signal` aborts
 */
function untilAborted<T>(pending: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return pending;

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    void pending.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Scope resolver that looks kinds up in discovery
 */
export class DiscoveryScopeResolver implements ScopeResolver {
  constructor(
    private readonly client: StoreClient,
    private readonly cache: DiscoveryCache,
    private readonly defaultNamespace = 'default'
  ) {}

  async resolve(
    gvk: GroupVersionKind,
    namespace: string | undefined,
    options?: RequestOptions
  ): Promise<ResolvedScope> {
    const groupVersion = groupVersionKey(gvk.group, gvk.version);
    const resources = await this.cache.resources(groupVersion, options);

    // Subresources ("deployments/status") share the kind of their parent
    const match = resources.find((r) => r.kind === gvk.kind && !r.name.includes('/'));
    if (!match) {
      throw new InternalError(`kind ${gvk.kind} is not served by ${groupVersion}`);
    }

    const gvr = { group: gvk.group, version: gvk.version, resource: match.name };
    if (!match.namespaced) {
      return { handle: this.client.resource(gvr), namespaced: false };
    }
    return {
      handle: this.client.resource(gvr, namespace ?? this.defaultNamespace),
      namespaced: true,
    };
  }
}
