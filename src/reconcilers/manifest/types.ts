/**
 * Types for manifest reconciliation
 *
 * The engine is written against these contracts only; the HTTP client,
 * discovery resolver and schema registry are one implementation of them and
 * tests supply fakes.
 */

import type { Logger } from '../../api/logger.js';
import type {
  GroupVersionKind,
  RequestOptions,
  ResourceHandle,
} from '../../api/types.js';
import type { Type } from '../../values/types.js';
import type { Value } from '../../values/value.js';

export type { GroupVersionKind, RequestOptions, ResourceHandle };

// =============================================================================
// Diagnostics
// =============================================================================

export type DiagnosticSeverity = 'error' | 'warning';

/**
 * A user-facing problem report attached to an apply response
 */
export interface Diagnostic {
  severity: DiagnosticSeverity;
  summary: string;
  detail?: string;
}

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Resolves resource types to their schema type trees
 */
export interface SchemaProvider {
  /**
   * Type of `gvk`. The write variant (`forWrite`) describes what may be sent
   * and can differ from the type the store returns.
   */
  typeForKind(gvk: GroupVersionKind, forWrite: boolean, options?: RequestOptions): Promise<Type>;
}

/**
 * Result of scope resolution
 */
export interface ResolvedScope {
  handle: ResourceHandle;
  namespaced: boolean;
}

/**
 * Resolves a kind to a resource handle bound to the right scope
 */
export interface ScopeResolver {
  resolve(gvk: GroupVersionKind, namespace: string | undefined, options?: RequestOptions): Promise<ResolvedScope>;
}

/**
 * Process-wide type-discovery cache
 */
export interface TypeCache {
  /** Drop every cached entry; later readers rebuild */
  invalidate(): void;
}

/**
 * Arguments for a completion wait
 */
export interface WaitRequest {
  handle: ResourceHandle;
  name: string;
  /** `wait_for` attribute of the planned state */
  waitFor: Value;
  /** Write variant of the resource type */
  schema: Type;
  signal?: AbortSignal;
}

/**
 * Blocks until a written resource satisfies its completion condition
 */
export interface CompletionWaiter {
  waitForCompletion(request: WaitRequest): Promise<void>;
}

// =============================================================================
// Engine I/O
// =============================================================================

export interface ApplyDependencies {
  schema: SchemaProvider;
  scope: ScopeResolver;
  typeCache: TypeCache;
  waiter?: CompletionWaiter;
  logger?: Logger;
}

export interface ApplyOptions {
  /** Field manager for server-side apply (default: manifest-reconciler) */
  fieldManager?: string;
}

export interface ApplyRequest {
  /** Resource type ID; only `manifest` is accepted */
  typeName: string;
  priorState: Value;
  plannedState: Value;
  signal?: AbortSignal;
}

export interface ApplyResponse {
  /** Absent when diagnostics report a failure before a state was produced */
  newState?: Value;
  diagnostics: Diagnostic[];
}

/**
 * What an apply does for a prior/planned pair
 */
export type ChangeAction = 'create' | 'update' | 'delete' | 'noop';
