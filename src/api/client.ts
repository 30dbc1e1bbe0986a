/**
 * Resource store API client
 *
 * Typed access to a Kubernetes-style API server:
 * - GET / server-side apply PATCH / DELETE on named resources
 * - Discovery of the resource types served under a group version
 * - Structured `Status` decoding of failures
 * - JSON logging with secret redaction
 *
 * Requests are not retried; a failure surfaces as a StoreApiError.
 */

import type {
  APIResource,
  GroupVersionResource,
  HttpMethod,
  RequestOptions,
  ResourceHandle,
  StoreClientConfig,
} from './types.js';
import { StoreApiError, parseStatus } from './errors.js';
import { Logger, logger, redactString } from './logger.js';
import { UNTYPED_NULL, fromJson, type Untyped } from '../values/untyped.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Store client
 */
export interface StoreClient {
  /**
   * Handle for one resource type. `namespace` is ignored by the server for
   * cluster-scoped types, so pass it only for namespaced ones.
   */
  resource(gvr: GroupVersionResource, namespace?: string): ResourceHandle;

  /**
   * List the resource types served under `groupVersion` ("v1", "apps/v1")
   */
  discover(groupVersion: string, options?: RequestOptions): Promise<APIResource[]>;

  /**
   * Get current configuration (with token redacted)
   */
  getConfig(): { server: string; token?: string; timeout: number };
}

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_TIMEOUT_MS = 30000;

export const APPLY_PATCH_CONTENT_TYPE = 'application/apply-patch+yaml';

const MAX_ERROR_TEXT = 200;

// =============================================================================
// URL construction
// =============================================================================

/**
 * Split "apps/v1" into group and version; the core group is ""
 */
export function parseGroupVersion(groupVersion: string): { group: string; version: string } {
  const slash = groupVersion.indexOf('/');
  if (slash < 0) {
    return { group: '', version: groupVersion };
  }
  return { group: groupVersion.slice(0, slash), version: groupVersion.slice(slash + 1) };
}

/**
 * API root for a group version: `/api/v1` for the core group,
 * `/apis/<group>/<version>` otherwise
 */
export function groupVersionPath(group: string, version: string): string {
  return group === '' ? `/api/${version}` : `/apis/${group}/${version}`;
}

/**
 * Path of a named resource
 *
 * @example
 * resourcePath({ group: 'apps', version: 'v1', resource: 'deployments' }, 'web', 'default')
 * // '/apis/apps/v1/namespaces/default/deployments/web'
 */
export function resourcePath(gvr: GroupVersionResource, name: string, namespace?: string): string {
  const scope = namespace ? `/namespaces/${encodeURIComponent(namespace)}` : '';
  return `${groupVersionPath(gvr.group, gvr.version)}${scope}/${gvr.resource}/${encodeURIComponent(name)}`;
}

// =============================================================================
// Response parsing
// =============================================================================

function parseJsonText(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the `resources` of an APIResourceList document
 */
export function parseResourceList(body: unknown): APIResource[] {
  if (!isRecord(body) || !Array.isArray(body.resources)) {
    return [];
  }
  const items: unknown[] = body.resources;
  return items.flatMap((item) => {
    if (!isRecord(item) || typeof item.name !== 'string' || typeof item.kind !== 'string') {
      return [];
    }
    return [{ name: item.name, kind: item.kind, namespaced: item.namespaced === true }];
  });
}

// =============================================================================
// Client Implementation
// =============================================================================

/**
 * Create a store API client
 */
export function createStoreClient(config: StoreClientConfig): StoreClient {
  const server = config.server.replace(/\/+$/, '');
  const timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
  const log = config.debug ? logger : new Logger({ level: 'error' });

  const defaultHeaders: Record<string, string> = {
    Accept: 'application/json',
  };

  if (config.token) {
    defaultHeaders['Authorization'] = `Bearer ${config.token}`;
  }

  /**
   * Make an API request and return the raw response text
   */
  async function request(
    method: HttpMethod,
    path: string,
    options: {
      params?: Record<string, string | undefined>;
      body?: string;
      headers?: Record<string, string>;
      signal?: AbortSignal;
    } = {}
  ): Promise<string> {
    const url = new URL(`${server}${path}`);
    if (options.params) {
      for (const [key, value] of Object.entries(options.params)) {
        if (value !== undefined) {
          url.searchParams.set(key, value);
        }
      }
    }

    const headers = { ...defaultHeaders, ...options.headers };

    log.request(method, url.toString(), { headers });

    const controller = new AbortController();
    const timeoutId = setTimeout(
      () => controller.abort(new Error(`request timed out after ${timeout}ms`)),
      timeout
    );
    const caller = options.signal;
    const forwardAbort = (): void => controller.abort(caller?.reason);
    if (caller?.aborted) {
      forwardAbort();
    } else {
      caller?.addEventListener('abort', forwardAbort, { once: true });
    }

    try {
      const startTime = Date.now();
      const response = await fetch(url.toString(), {
        method,
        headers,
        body: options.body,
        signal: controller.signal,
      });

      const durationMs = Date.now() - startTime;
      log.response(response.status, url.toString(), { durationMs });

      const text = await response.text();

      if (!response.ok) {
        const status = parseStatus(parseJsonText(text));
        const message =
          status?.message ??
          (text ? text.substring(0, MAX_ERROR_TEXT) : `Store API error (${response.status})`);
        throw new StoreApiError(message, response.status, { body: status });
      }

      return text;
    } finally {
      clearTimeout(timeoutId);
      caller?.removeEventListener('abort', forwardAbort);
    }
  }

  /**
   * Request and decode a JSON object body
   */
  async function requestObject(
    method: HttpMethod,
    path: string,
    options: Parameters<typeof request>[2] = {}
  ): Promise<Untyped> {
    const text = await request(method, path, options);
    if (text.trim() === '') {
      return UNTYPED_NULL;
    }
    try {
      return fromJson(JSON.parse(text));
    } catch (error) {
      throw new StoreApiError(`invalid JSON in response from ${path}`, 200, { cause: error });
    }
  }

  function resource(gvr: GroupVersionResource, namespace?: string): ResourceHandle {
    return {
      async get(name: string, options: RequestOptions = {}): Promise<Untyped> {
        return requestObject('GET', resourcePath(gvr, name, namespace), {
          signal: options.signal,
        });
      },

      async applyPatch(
        name: string,
        body: string,
        fieldManager: string,
        options: RequestOptions = {}
      ): Promise<Untyped> {
        return requestObject('PATCH', resourcePath(gvr, name, namespace), {
          params: { fieldManager },
          body,
          headers: { 'Content-Type': APPLY_PATCH_CONTENT_TYPE },
          signal: options.signal,
        });
      },

      async delete(name: string, options: RequestOptions = {}): Promise<void> {
        await request('DELETE', resourcePath(gvr, name, namespace), {
          signal: options.signal,
        });
      },
    };
  }

  async function discover(
    groupVersion: string,
    options: RequestOptions = {}
  ): Promise<APIResource[]> {
    const { group, version } = parseGroupVersion(groupVersion);
    const text = await request('GET', groupVersionPath(group, version), {
      signal: options.signal,
    });
    return parseResourceList(parseJsonText(text));
  }

  return {
    resource,
    discover,
    getConfig() {
      return {
        server,
        token: config.token ? redactString(config.token) : undefined,
        timeout,
      };
    },
  };
}
