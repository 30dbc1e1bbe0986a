/**
 * Manifest apply
 *
 * Carries one planned change for a `manifest` resource to the store:
 *
 * - create: prior Null, planned set. Fails if the object already exists.
 * - update: both set. Server-side apply merges with other field managers.
 * - delete: planned Null. Identity comes from the prior `object`.
 * - noop: both Null. No store I/O.
 *
 * Problems found before or at the write are returned as diagnostics.
 * Failures after the write (response conversion, completion wait) and
 * schema or identity resolution failures are thrown.
 */

import { isNotFound } from '../../api/errors.js';
import { logger as defaultLogger, type Logger } from '../../api/logger.js';
import {
  ApplyCancelledError,
  ConflictError,
  ConversionError,
  InternalError,
  ValidationError,
  WaitError,
  errorMessage,
} from '../../errors.js';
import { collapseUnknownToNull, expandToUnknown } from '../../morph/normalize.js';
import { fromUntyped, toUntyped } from '../../morph/payload.js';
import type { Type } from '../../values/types.js';
import {
  removeNulls,
  serializeUntyped,
  toJson,
  type JsonValue,
  type Untyped,
} from '../../values/untyped.js';
import { isKnownRecord, type Value } from '../../values/value.js';
import { backfillComputedFields, resolveComputedFields } from './computed.js';
import { errorDiagnostic, writeErrorToDiagnostics } from './diagnostics.js';
import {
  formatGvk,
  gvkFromValue,
  identityFromUntyped,
  namespacedName,
  type ResourceIdentity,
} from './identity.js';
import { removeServerSideFields } from './server-fields.js';
import {
  getResourceType,
  readComputedFieldConfig,
  stateAttribute,
  withStateAttribute,
} from './state.js';
import type {
  ApplyDependencies,
  ApplyOptions,
  ApplyRequest,
  ApplyResponse,
  ChangeAction,
  Diagnostic,
  GroupVersionKind,
  ResolvedScope,
} from './types.js';

export const DEFAULT_FIELD_MANAGER = 'manifest-reconciler';

// =============================================================================
// Helpers
// =============================================================================

/**
 * Decide what an apply does from the prior and planned states
 */
export function classifyChange(prior: Value, planned: Value): ChangeAction {
  const priorNull = prior.state === 'null';
  const plannedNull = planned.state === 'null';

  if (priorNull && plannedNull) return 'noop';
  if (plannedNull) return 'delete';
  return priorNull ? 'create' : 'update';
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new ApplyCancelledError({ cause: signal.reason });
  }
}

function failed(...diagnostics: Diagnostic[]): ApplyResponse {
  return { diagnostics };
}

/**
 * JSON form of a state value for debug logs; Unknown shows as null
 */
function stateForLog(value: Value): JsonValue {
  return toJson(toUntyped(collapseUnknownToNull(value)));
}

interface ApplyContext {
  request: ApplyRequest;
  deps: ApplyDependencies;
  fieldManager: string;
  log: Logger;
}

async function resolveType(
  ctx: ApplyContext,
  gvk: GroupVersionKind,
  forWrite: boolean
): Promise<Type> {
  const signal = ctx.request.signal;
  try {
    return await ctx.deps.schema.typeForKind(gvk, forWrite, { signal });
  } catch (error) {
    throwIfCancelled(signal);
    throw new InternalError(
      `failed to determine resource type for ${formatGvk(gvk)}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

/**
 * Resolve the resource handle; a failure becomes a diagnostic
 */
async function resolveScope(
  ctx: ApplyContext,
  identity: ResourceIdentity
): Promise<ResolvedScope | Diagnostic> {
  const signal = ctx.request.signal;
  const gvk = { group: identity.group, version: identity.version, kind: identity.kind };
  try {
    return await ctx.deps.scope.resolve(gvk, identity.namespace, { signal });
  } catch (error) {
    throwIfCancelled(signal);
    return errorDiagnostic(
      `Failed to discover scope of resource '${namespacedName(identity)}'`,
      errorMessage(error)
    );
  }
}

function isDiagnostic(value: ResolvedScope | Diagnostic): value is Diagnostic {
  return 'severity' in value;
}

// =============================================================================
// Create / update
// =============================================================================

async function applyObject(ctx: ApplyContext, action: 'create' | 'update'): Promise<ApplyResponse> {
  const { request, deps, log } = ctx;
  const { plannedState, signal } = request;

  const { fields, issues } = resolveComputedFields(readComputedFieldConfig(plannedState));
  if (issues.length > 0) {
    return failed(
      ...issues.map((issue) =>
        errorDiagnostic(`Cannot parse computed field path: ${issue.field}`, issue.error.message)
      )
    );
  }

  const object = stateAttribute(plannedState, 'object');
  if (!isKnownRecord(object)) {
    return failed(errorDiagnostic('Failed to find object value in planned resource state'));
  }
  const manifest = stateAttribute(plannedState, 'manifest');

  const gvk = gvkFromValue(object);
  const baseType = await resolveType(ctx, gvk, false);

  // Planning left computed paths Unknown; restore what the user declared there
  let proposed: Value;
  try {
    proposed = backfillComputedFields(object, manifest, fields);
  } catch (error) {
    if (!(error instanceof ConversionError)) throw error;
    return failed(
      errorDiagnostic('Failed to backfill computed values in proposed object', error.message)
    );
  }

  const payload = removeNulls(toUntyped(collapseUnknownToNull(proposed)));
  const identity = identityFromUntyped(payload);
  const subject = namespacedName(identity);
  log.debug('Write payload', { resource: subject, payload: toJson(payload) });

  throwIfCancelled(signal);
  const scope = await resolveScope(ctx, identity);
  if (isDiagnostic(scope)) return failed(scope);

  if (action === 'create') {
    throwIfCancelled(signal);
    const conflict = await checkAbsent(ctx, scope, identity.name, subject);
    if (conflict) return failed(conflict);
  }

  throwIfCancelled(signal);
  let response: Untyped;
  try {
    response = await scope.handle.applyPatch(
      identity.name,
      serializeUntyped(payload),
      ctx.fieldManager,
      { signal }
    );
  } catch (error) {
    throwIfCancelled(signal);
    log.error(`PATCH for resource ${subject} failed`, error instanceof Error ? error : undefined, {
      fieldManager: ctx.fieldManager,
    });
    return failed(
      ...writeErrorToDiagnostics(error, subject, `PATCH for resource "${subject}" failed to apply`)
    );
  }

  // The write has landed; from here on failures are thrown
  let applied: Value;
  try {
    applied = fromUntyped(removeServerSideFields(response), baseType);
  } catch (error) {
    throw appliedButFailed(subject, 'reading the response', error);
  }

  let writeType: Type;
  try {
    writeType = await resolveType(ctx, gvk, true);
  } catch (error) {
    if (error instanceof ApplyCancelledError) throw error;
    throw appliedButFailed(subject, 'resolving the write type', error);
  }

  const waitFor = stateAttribute(plannedState, 'wait_for');
  if (waitFor.state !== 'null') {
    if (!deps.waiter) {
      throw new WaitError(subject, 'no completion waiter is configured');
    }
    throwIfCancelled(signal);
    try {
      await deps.waiter.waitForCompletion({
        handle: scope.handle,
        name: identity.name,
        waitFor,
        schema: writeType,
        signal,
      });
    } catch (error) {
      throwIfCancelled(signal);
      throw new WaitError(subject, errorMessage(error), { cause: error });
    }
  }

  // Fields the store may still populate stay open until the final collapse
  let expanded: Value;
  try {
    expanded = expandToUnknown(writeType, applied);
  } catch (error) {
    throw appliedButFailed(subject, 'shaping the applied object', error);
  }

  const newState = withStateAttribute(plannedState, 'object', collapseUnknownToNull(expanded));
  log.debug('New state', { resource: subject, newState: stateForLog(newState) });
  return { newState, diagnostics: [] };
}

function appliedButFailed(subject: string, step: string, error: unknown): InternalError {
  return new InternalError(
    `resource "${subject}" was applied to the store, but ${step} failed: ${errorMessage(error)}`,
    { cause: error }
  );
}

/**
 * Existence check before a create. Only "not found" lets the create go on.
 */
async function checkAbsent(
  ctx: ApplyContext,
  scope: ResolvedScope,
  name: string,
  subject: string
): Promise<Diagnostic | undefined> {
  const signal = ctx.request.signal;
  try {
    await scope.handle.get(name, { signal });
  } catch (error) {
    throwIfCancelled(signal);
    if (isNotFound(error)) return undefined;
    return errorDiagnostic(`Failed to determine if resource "${subject}" exists`, errorMessage(error));
  }

  const conflict = new ConflictError(subject);
  return errorDiagnostic('Cannot create resource that already exists', conflict.message);
}

// =============================================================================
// Delete
// =============================================================================

async function deleteObject(ctx: ApplyContext): Promise<ApplyResponse> {
  const { request, log } = ctx;
  const { priorState, plannedState, signal } = request;

  const object = stateAttribute(priorState, 'object');
  if (!isKnownRecord(object)) {
    return failed(errorDiagnostic('Failed to find object value in prior resource state'));
  }

  let data: Untyped;
  try {
    data = toUntyped(object);
  } catch (error) {
    throw new InternalError(`prior object cannot be read: ${errorMessage(error)}`, { cause: error });
  }
  const identity = identityFromUntyped(data);
  const subject = namespacedName(identity);

  throwIfCancelled(signal);
  const scope = await resolveScope(ctx, identity);
  if (isDiagnostic(scope)) return failed(scope);

  throwIfCancelled(signal);
  try {
    await scope.handle.delete(identity.name, { signal });
  } catch (error) {
    throwIfCancelled(signal);
    log.error(`DELETE for resource ${subject} failed`, error instanceof Error ? error : undefined);
    const message = errorMessage(error);
    return failed(errorDiagnostic(`DELETE resource ${subject} failed: ${message}`, message));
  }

  return { newState: plannedState, diagnostics: [] };
}

// =============================================================================
// Entry point
// =============================================================================

/**
 * Apply one planned change to the store
 */
export async function applyResourceChange(
  request: ApplyRequest,
  deps: ApplyDependencies,
  options: ApplyOptions = {}
): Promise<ApplyResponse> {
  const log = (deps.logger ?? defaultLogger).child({ resourceType: request.typeName });

  try {
    getResourceType(request.typeName);
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error;
    return failed(errorDiagnostic('Failed to determine planned resource type', error.message));
  }

  throwIfCancelled(request.signal);

  const action = classifyChange(request.priorState, request.plannedState);
  log.debug('Applying resource change', {
    action,
    priorState: stateForLog(request.priorState),
    plannedState: stateForLog(request.plannedState),
  });

  if (action === 'noop') {
    return { newState: request.plannedState, diagnostics: [] };
  }

  const ctx: ApplyContext = {
    request,
    deps,
    fieldManager: options.fieldManager ?? DEFAULT_FIELD_MANAGER,
    log,
  };

  try {
    return action === 'delete' ? await deleteObject(ctx) : await applyObject(ctx, action);
  } finally {
    // The change may have added or removed a resource type
    deps.typeCache.invalidate();
  }
}
