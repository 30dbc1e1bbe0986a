/**
 * Wire types for the resource store API
 *
 * The store speaks the Kubernetes API conventions: resources addressed by
 * group/version/resource, structured `Status` bodies on failure and
 * `APIResourceList` discovery documents.
 */

import type { Untyped } from '../values/untyped.js';

// =============================================================================
// Status
// =============================================================================

/**
 * One reason a request was rejected (e.g. a field that failed validation)
 */
export interface StatusCause {
  reason?: string;
  message?: string;
  field?: string;
}

export interface StatusDetails {
  name?: string;
  group?: string;
  kind?: string;
  causes?: StatusCause[];
}

/**
 * Structured error body returned by the store
 */
export interface StoreStatus {
  status?: string;
  message?: string;
  reason?: string;
  code?: number;
  details?: StatusDetails;
}

// =============================================================================
// Discovery
// =============================================================================

/**
 * A resource type served under a group version
 */
export interface APIResource {
  /** Plural resource name, e.g. "deployments" (or "deployments/status") */
  name: string;
  kind: string;
  namespaced: boolean;
}

export interface GroupVersionResource {
  group: string;
  version: string;
  resource: string;
}

// =============================================================================
// Client
// =============================================================================

export type HttpMethod = 'GET' | 'PATCH' | 'DELETE';

/**
 * Store client configuration
 */
export interface StoreClientConfig {
  /** Base URL of the API server */
  server: string;
  /** Bearer token */
  token?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Enable debug logging of requests and responses */
  debug?: boolean;
}

/**
 * Per-request options
 */
export interface RequestOptions {
  /** Aborts the request when fired */
  signal?: AbortSignal;
}

/**
 * Operations on one resource type, bound to a namespace when the type is
 * namespaced
 */
export interface ResourceHandle {
  get(name: string, options?: RequestOptions): Promise<Untyped>;
  /**
   * Server-side apply: `body` is the serialized object, `fieldManager`
   * names the owner of the fields it sets
   */
  applyPatch(
    name: string,
    body: string,
    fieldManager: string,
    options?: RequestOptions
  ): Promise<Untyped>;
  delete(name: string, options?: RequestOptions): Promise<void>;
}

/**
 * Group, version and kind of a resource, e.g. apps/v1 Deployment
 */
export interface GroupVersionKind {
  group: string;
  version: string;
  kind: string;
}
