/**
 * Unit Tests: Manifest Apply
 *
 * Tests the apply engine against fake schema, scope and store collaborators:
 * - create / update / delete / noop selection
 * - existence check before create
 * - computed-field backfill and payload construction
 * - store Status causes as diagnostics
 * - completion waits, cancellation and cache invalidation
 *
 * @see src/reconcilers/manifest/apply.ts
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  DEFAULT_FIELD_MANAGER,
  applyResourceChange,
  classifyChange,
} from '../../src/reconcilers/manifest/apply.js';
import { planResourceState, waitForValue } from '../../src/reconcilers/manifest/plan.js';
import {
  MANIFEST_RESOURCE_TYPE,
  MANIFEST_STATE_TYPE,
  manifestState,
  stateAttribute,
} from '../../src/reconcilers/manifest/state.js';
import type {
  ApplyRequest,
  CompletionWaiter,
  GroupVersionKind,
  RequestOptions,
  ResolvedScope,
  WaitRequest,
} from '../../src/reconcilers/manifest/types.js';
import { StoreApiError } from '../../src/api/errors.js';
import { Logger } from '../../src/api/logger.js';
import {
  ApplyCancelledError,
  InternalError,
  WaitError,
} from '../../src/errors.js';
import { toUntyped } from '../../src/morph/payload.js';
import { Types, listType, mapType, objectType, type Type } from '../../src/values/types.js';
import {
  UNTYPED_NULL,
  fromJson,
  parseUntyped,
  toJson,
  type Untyped,
} from '../../src/values/untyped.js';
import {
  listValue,
  nullValue,
  numberValue,
  objectValue,
  stringValue,
  unknownValue,
  valueEquals,
  type Value,
} from '../../src/values/value.js';

// =============================================================================
// Test Helpers
// =============================================================================

const DEPLOYMENT_GVK: GroupVersionKind = { group: 'apps', version: 'v1', kind: 'Deployment' };

const NOT_FOUND = new StoreApiError('deployments.apps "web" not found', 404);

/**
 * Resource handle whose PATCH echoes the payload back
 */
function createMockHandle() {
  return {
    get: vi.fn(async (_name: string, _options?: RequestOptions): Promise<Untyped> => UNTYPED_NULL),
    applyPatch: vi.fn(
      async (_name: string, body: string, _fieldManager: string, _options?: RequestOptions): Promise<Untyped> =>
        parseUntyped(body)
    ),
    delete: vi.fn(async (_name: string, _options?: RequestOptions): Promise<void> => undefined),
  };
}

type MockHandle = ReturnType<typeof createMockHandle>;

function createMockDeps(
  handle: MockHandle,
  options: { baseType?: Type; writeType?: Type; waiter?: CompletionWaiter } = {}
) {
  const baseType = options.baseType ?? Types.dynamic;
  const writeType = options.writeType ?? baseType;
  return {
    schema: {
      typeForKind: vi.fn(
        async (_gvk: GroupVersionKind, forWrite: boolean, _options?: RequestOptions): Promise<Type> =>
          forWrite ? writeType : baseType
      ),
    },
    scope: {
      resolve: vi.fn(
        async (
          _gvk: GroupVersionKind,
          _namespace: string | undefined,
          _options?: RequestOptions
        ): Promise<ResolvedScope> => ({ handle, namespaced: true })
      ),
    },
    typeCache: { invalidate: vi.fn() },
    waiter: options.waiter,
    logger: new Logger({ level: 'error' }),
  };
}

function createManifest(metadata: Record<string, Value> = {}): Value {
  return objectValue({
    apiVersion: stringValue('apps/v1'),
    kind: stringValue('Deployment'),
    metadata: objectValue({ name: stringValue('web'), namespace: stringValue('prod'), ...metadata }),
    spec: objectValue({ replicas: numberValue(3) }),
  });
}

/**
 * Planned state as the planner leaves it: labels are computed by default
 */
function createPlannedState(parts: { waitFor?: Value } = {}): Value {
  return manifestState({
    manifest: createManifest(),
    object: createManifest({ labels: unknownValue(mapType(Types.string)) }),
    waitFor: parts.waitFor,
  });
}

function createRequest(overrides: Partial<ApplyRequest> = {}): ApplyRequest {
  return {
    typeName: MANIFEST_RESOURCE_TYPE,
    priorState: nullValue(MANIFEST_STATE_TYPE),
    plannedState: createPlannedState(),
    ...overrides,
  };
}

function objectJson(state: Value | undefined): unknown {
  if (!state) return undefined;
  return toJson(toUntyped(stateAttribute(state, 'object')));
}

const EXPECTED_PAYLOAD =
  '{"apiVersion":"apps/v1","kind":"Deployment","metadata":{"name":"web","namespace":"prod"},"spec":{"replicas":3}}';

// =============================================================================
// Tests
// =============================================================================

describe('classifyChange', () => {
  const set = createPlannedState();
  const unset = nullValue(MANIFEST_STATE_TYPE);

  it.each([
    ['create', unset, set],
    ['update', set, set],
    ['delete', set, unset],
    ['noop', unset, unset],
  ])('classifies %s', (action, prior, planned) => {
    expect(classifyChange(prior, planned)).toBe(action);
  });
});

describe('applyResourceChange', () => {
  let handle: MockHandle;

  beforeEach(() => {
    handle = createMockHandle();
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // ---------------------------------------------------------------------------
  // Create
  // ---------------------------------------------------------------------------

  describe('create', () => {
    beforeEach(() => {
      handle.get.mockRejectedValue(NOT_FOUND);
    });

    it('creates an absent resource with server-side apply', async () => {
      handle.applyPatch.mockResolvedValueOnce(
        fromJson({
          apiVersion: 'apps/v1',
          kind: 'Deployment',
          metadata: {
            name: 'web',
            namespace: 'prod',
            uid: 'uid-1',
            resourceVersion: '7',
            labels: { app: 'web' },
          },
          spec: { replicas: 3 },
          status: { readyReplicas: 0 },
        })
      );
      const deps = createMockDeps(handle);

      const response = await applyResourceChange(createRequest(), deps);

      expect(response.diagnostics).toEqual([]);
      expect(deps.scope.resolve).toHaveBeenCalledWith(DEPLOYMENT_GVK, 'prod', { signal: undefined });
      expect(handle.get).toHaveBeenCalledWith('web', { signal: undefined });
      expect(handle.applyPatch).toHaveBeenCalledWith('web', EXPECTED_PAYLOAD, DEFAULT_FIELD_MANAGER, {
        signal: undefined,
      });
      expect(objectJson(response.newState)).toEqual({
        apiVersion: 'apps/v1',
        kind: 'Deployment',
        metadata: { name: 'web', namespace: 'prod', labels: { app: 'web' } },
        spec: { replicas: 3 },
      });
      expect(deps.typeCache.invalidate).toHaveBeenCalledTimes(1);
    });

    it('keeps the manifest and other planned attributes in the new state', async () => {
      const deps = createMockDeps(handle);
      const response = await applyResourceChange(createRequest(), deps);

      if (!response.newState) throw new Error('expected a new state');
      expect(valueEquals(stateAttribute(response.newState, 'manifest'), createManifest())).toBe(true);
      expect(stateAttribute(response.newState, 'wait_for').state).toBe('null');
    });

    it('refuses to create a resource that already exists', async () => {
      handle.get.mockResolvedValueOnce(fromJson({ metadata: { name: 'web' } }));
      const deps = createMockDeps(handle);

      const response = await applyResourceChange(createRequest(), deps);

      expect(response.newState).toBeUndefined();
      expect(response.diagnostics).toEqual([
        {
          severity: 'error',
          summary: 'Cannot create resource that already exists',
          detail: 'resource "prod/web" already exists',
        },
      ]);
      expect(handle.applyPatch).not.toHaveBeenCalled();
      expect(deps.typeCache.invalidate).toHaveBeenCalledTimes(1);
    });

    it('reports a failed existence check', async () => {
      handle.get.mockRejectedValueOnce(new StoreApiError('forbidden', 403));

      const response = await applyResourceChange(createRequest(), createMockDeps(handle));

      expect(response.diagnostics).toEqual([
        {
          severity: 'error',
          summary: 'Failed to determine if resource "prod/web" exists',
          detail: 'forbidden',
        },
      ]);
      expect(handle.applyPatch).not.toHaveBeenCalled();
    });

    it('sends the values declared at computed paths', async () => {
      const manifest = createManifest({ labels: objectValue({ app: stringValue('web') }) });
      const { plannedState } = planResourceState({ manifest, objectType: Types.dynamic });
      if (!plannedState) throw new Error('expected a planned state');
      const deps = createMockDeps(handle);

      const response = await applyResourceChange(createRequest({ plannedState }), deps);

      expect(response.diagnostics).toEqual([]);
      expect(handle.applyPatch).toHaveBeenCalledWith(
        'web',
        '{"apiVersion":"apps/v1","kind":"Deployment","metadata":{"name":"web","namespace":"prod","labels":{"app":"web"}},"spec":{"replicas":3}}',
        DEFAULT_FIELD_MANAGER,
        { signal: undefined }
      );
      expect(objectJson(response.newState)).toEqual(toJson(toUntyped(manifest)));
    });

    it('reports a declared value that cannot fill a computed path', async () => {
      const plannedState = manifestState({
        manifest: createManifest({ labels: stringValue('oops') }),
        object: createManifest({ labels: unknownValue(mapType(Types.string)) }),
      });
      const deps = createMockDeps(handle);

      const response = await applyResourceChange(createRequest({ plannedState }), deps);

      expect(response.diagnostics).toEqual([
        {
          severity: 'error',
          summary: 'Failed to backfill computed values in proposed object',
          detail: 'metadata.labels: cannot convert string to map(string)',
        },
      ]);
      expect(deps.scope.resolve).not.toHaveBeenCalled();
    });
  });

  // ---------------------------------------------------------------------------
  // Update
  // ---------------------------------------------------------------------------

  describe('update', () => {
    const priorState = manifestState({ manifest: createManifest(), object: createManifest() });

    it('patches without an existence check', async () => {
      const deps = createMockDeps(handle);

      const response = await applyResourceChange(createRequest({ priorState }), deps);

      expect(response.diagnostics).toEqual([]);
      expect(handle.get).not.toHaveBeenCalled();
      expect(handle.applyPatch).toHaveBeenCalledWith('web', EXPECTED_PAYLOAD, DEFAULT_FIELD_MANAGER, {
        signal: undefined,
      });
    });

    it('uses the configured field manager', async () => {
      await applyResourceChange(createRequest({ priorState }), createMockDeps(handle), {
        fieldManager: 'ci-bot',
      });

      expect(handle.applyPatch).toHaveBeenCalledWith('web', EXPECTED_PAYLOAD, 'ci-bot', {
        signal: undefined,
      });
    });

    it('turns each status cause into a diagnostic', async () => {
      handle.applyPatch.mockRejectedValueOnce(
        new StoreApiError('Deployment.apps "web" is invalid', 422, {
          body: {
            status: 'Failure',
            reason: 'Invalid',
            message: 'Deployment.apps "web" is invalid',
            details: {
              causes: [
                { reason: 'FieldValueRequired', field: 'spec.selector', message: 'Required value' },
                {
                  reason: 'FieldValueInvalid',
                  field: 'spec.replicas',
                  message: 'must be greater than or equal to 0',
                },
              ],
            },
          },
        })
      );

      const response = await applyResourceChange(createRequest({ priorState }), createMockDeps(handle));

      expect(response.newState).toBeUndefined();
      expect(response.diagnostics).toEqual([
        { severity: 'error', summary: 'FieldValueRequired: spec.selector', detail: 'Required value' },
        {
          severity: 'error',
          summary: 'FieldValueInvalid: spec.replicas',
          detail: 'must be greater than or equal to 0',
        },
      ]);
    });

    it('reports a write failure without a status body', async () => {
      handle.applyPatch.mockRejectedValueOnce(new Error('socket hang up'));

      const response = await applyResourceChange(createRequest({ priorState }), createMockDeps(handle));

      expect(response.diagnostics).toEqual([
        {
          severity: 'error',
          summary: 'PATCH for resource "prod/web" failed to apply',
          detail: 'socket hang up',
        },
      ]);
    });

    it('reports a scope that cannot be discovered', async () => {
      const deps = createMockDeps(handle);
      deps.scope.resolve.mockRejectedValueOnce(new Error('kind Deployment is not served by apps/v1'));

      const response = await applyResourceChange(createRequest({ priorState }), deps);

      expect(response.diagnostics).toEqual([
        {
          severity: 'error',
          summary: "Failed to discover scope of resource 'prod/web'",
          detail: 'kind Deployment is not served by apps/v1',
        },
      ]);
      expect(handle.applyPatch).not.toHaveBeenCalled();
    });

    it('shapes the applied object with the write type', async () => {
      const writeType = objectType({
        apiVersion: Types.string,
        kind: Types.string,
        metadata: objectType({ name: Types.string, namespace: Types.string, uid: Types.string }),
        spec: Types.dynamic,
      });
      const deps = createMockDeps(handle, { writeType });

      const response = await applyResourceChange(createRequest({ priorState }), deps);

      expect(deps.schema.typeForKind).toHaveBeenCalledWith(DEPLOYMENT_GVK, false, { signal: undefined });
      expect(deps.schema.typeForKind).toHaveBeenCalledWith(DEPLOYMENT_GVK, true, { signal: undefined });
      expect(objectJson(response.newState)).toEqual({
        apiVersion: 'apps/v1',
        kind: 'Deployment',
        metadata: { name: 'web', namespace: 'prod', uid: null },
        spec: { replicas: 3 },
      });
    });

    it('wraps schema failures as internal errors', async () => {
      const deps = createMockDeps(handle);
      deps.schema.typeForKind.mockRejectedValueOnce(new Error('schema unavailable'));

      await expect(applyResourceChange(createRequest({ priorState }), deps)).rejects.toThrow(
        'failed to determine resource type for apps/v1, Kind=Deployment: schema unavailable'
      );
      expect(deps.typeCache.invalidate).toHaveBeenCalledTimes(1);
    });

    it('says the resource was applied when the response does not fit the type', async () => {
      const baseType = objectType({ spec: objectType({ replicas: listType(Types.number) }) });
      const deps = createMockDeps(handle, { baseType });

      const result = applyResourceChange(createRequest({ priorState }), deps);

      await expect(result).rejects.toBeInstanceOf(InternalError);
      await expect(result).rejects.toThrow(
        'resource "prod/web" was applied to the store, but reading the response failed: ' +
          'spec.replicas: cannot convert number to list(number)'
      );
      expect(handle.applyPatch).toHaveBeenCalledTimes(1);
      expect(deps.typeCache.invalidate).toHaveBeenCalledTimes(1);
    });

    it('says the resource was applied when the write type cannot be resolved', async () => {
      const deps = createMockDeps(handle);
      deps.schema.typeForKind.mockImplementation(
        async (_gvk: GroupVersionKind, forWrite: boolean): Promise<Type> => {
          if (forWrite) throw new Error('schema unavailable');
          return Types.dynamic;
        }
      );

      await expect(applyResourceChange(createRequest({ priorState }), deps)).rejects.toThrow(
        'resource "prod/web" was applied to the store, but resolving the write type failed: ' +
          'failed to determine resource type for apps/v1, Kind=Deployment: schema unavailable'
      );
      expect(handle.applyPatch).toHaveBeenCalledTimes(1);
    });

    it('says the resource was applied when the write type cannot shape it', async () => {
      const writeType = objectType({ spec: objectType({ replicas: listType(Types.number) }) });
      const deps = createMockDeps(handle, { writeType });

      await expect(applyResourceChange(createRequest({ priorState }), deps)).rejects.toThrow(
        'resource "prod/web" was applied to the store, but shaping the applied object failed: ' +
          'spec.replicas: expected a list, got number'
      );
      expect(handle.applyPatch).toHaveBeenCalledTimes(1);
    });

    it('throws when the object carries no name', async () => {
      const unnamed = objectValue({
        apiVersion: stringValue('apps/v1'),
        kind: stringValue('Deployment'),
        metadata: objectValue({ namespace: stringValue('prod') }),
      });
      const plannedState = manifestState({ manifest: unnamed, object: unnamed });

      await expect(
        applyResourceChange(createRequest({ priorState, plannedState }), createMockDeps(handle))
      ).rejects.toBeInstanceOf(InternalError);
    });
  });

  // ---------------------------------------------------------------------------
  // Completion wait
  // ---------------------------------------------------------------------------

  describe('wait_for', () => {
    const priorState = manifestState({ manifest: createManifest(), object: createManifest() });
    const waitFor = waitForValue({ 'status.readyReplicas': '3' });

    it('waits on the written resource with the write type', async () => {
      const waiter = { waitForCompletion: vi.fn(async (_request: WaitRequest): Promise<void> => undefined) };
      const deps = createMockDeps(handle, { waiter });

      const response = await applyResourceChange(
        createRequest({ priorState, plannedState: createPlannedState({ waitFor }) }),
        deps
      );

      expect(response.diagnostics).toEqual([]);
      expect(waiter.waitForCompletion).toHaveBeenCalledTimes(1);
      const [request] = waiter.waitForCompletion.mock.calls[0];
      expect(request.name).toBe('web');
      expect(request.handle).toBe(handle);
      expect(request.schema).toBe(Types.dynamic);
      expect(valueEquals(request.waitFor, waitFor)).toBe(true);
    });

    it('throws a wait error after the write landed', async () => {
      const waiter = {
        waitForCompletion: vi.fn(async (_request: WaitRequest): Promise<void> => {
          throw new Error('timed out');
        }),
      };

      await expect(
        applyResourceChange(
          createRequest({ priorState, plannedState: createPlannedState({ waitFor }) }),
          createMockDeps(handle, { waiter })
        )
      ).rejects.toThrow(
        'resource "prod/web" was applied to the store, but waiting for completion failed: timed out'
      );
      expect(handle.applyPatch).toHaveBeenCalledTimes(1);
    });

    it('throws when no waiter is configured', async () => {
      await expect(
        applyResourceChange(
          createRequest({ priorState, plannedState: createPlannedState({ waitFor }) }),
          createMockDeps(handle)
        )
      ).rejects.toBeInstanceOf(WaitError);
    });
  });

  // ---------------------------------------------------------------------------
  // Delete
  // ---------------------------------------------------------------------------

  describe('delete', () => {
    const configMap = objectValue({
      apiVersion: stringValue('v1'),
      kind: stringValue('ConfigMap'),
      metadata: objectValue({ name: stringValue('settings'), namespace: stringValue('prod') }),
    });
    const priorState = manifestState({ manifest: configMap, object: configMap });
    const plannedState = nullValue(MANIFEST_STATE_TYPE);

    it('deletes the resource named by the prior object', async () => {
      const deps = createMockDeps(handle);

      const response = await applyResourceChange(createRequest({ priorState, plannedState }), deps);

      expect(response.diagnostics).toEqual([]);
      expect(response.newState).toBe(plannedState);
      expect(deps.scope.resolve).toHaveBeenCalledWith(
        { group: '', version: 'v1', kind: 'ConfigMap' },
        'prod',
        { signal: undefined }
      );
      expect(handle.delete).toHaveBeenCalledWith('settings', { signal: undefined });
      expect(deps.typeCache.invalidate).toHaveBeenCalledTimes(1);
    });

    it('passes no namespace for cluster-scoped objects', async () => {
      const namespace = objectValue({
        apiVersion: stringValue('v1'),
        kind: stringValue('Namespace'),
        metadata: objectValue({ name: stringValue('team-a') }),
      });
      const deps = createMockDeps(handle);

      await applyResourceChange(
        createRequest({ priorState: manifestState({ object: namespace }), plannedState }),
        deps
      );

      expect(deps.scope.resolve).toHaveBeenCalledWith(
        { group: '', version: 'v1', kind: 'Namespace' },
        undefined,
        { signal: undefined }
      );
      expect(handle.delete).toHaveBeenCalledWith('team-a', { signal: undefined });
    });

    it('reports a failed delete', async () => {
      handle.delete.mockRejectedValueOnce(new StoreApiError('configmaps "settings" not found', 404));

      const response = await applyResourceChange(
        createRequest({ priorState, plannedState }),
        createMockDeps(handle)
      );

      expect(response.newState).toBeUndefined();
      expect(response.diagnostics).toEqual([
        {
          severity: 'error',
          summary: 'DELETE resource prod/settings failed: configmaps "settings" not found',
          detail: 'configmaps "settings" not found',
        },
      ]);
    });

    it('reports a prior state without an object', async () => {
      const response = await applyResourceChange(
        createRequest({ priorState: manifestState({ manifest: configMap }), plannedState }),
        createMockDeps(handle)
      );

      expect(response.diagnostics).toEqual([
        { severity: 'error', summary: 'Failed to find object value in prior resource state' },
      ]);
      expect(handle.delete).not.toHaveBeenCalled();
    });
  });

  // ---------------------------------------------------------------------------
  // Request handling
  // ---------------------------------------------------------------------------

  describe('request handling', () => {
    it('does nothing when both states are null', async () => {
      const plannedState = nullValue(MANIFEST_STATE_TYPE);
      const deps = createMockDeps(handle);

      const response = await applyResourceChange(createRequest({ plannedState }), deps);

      expect(response).toEqual({ newState: plannedState, diagnostics: [] });
      expect(deps.scope.resolve).not.toHaveBeenCalled();
      expect(deps.typeCache.invalidate).not.toHaveBeenCalled();
    });

    it('reports an unknown resource type', async () => {
      const response = await applyResourceChange(
        createRequest({ typeName: 'deployment' }),
        createMockDeps(handle)
      );

      expect(response.diagnostics).toEqual([
        {
          severity: 'error',
          summary: 'Failed to determine planned resource type',
          detail: 'unknown resource type "deployment"',
        },
      ]);
    });

    it('reports computed field paths that do not parse', async () => {
      const plannedState = manifestState({
        manifest: createManifest(),
        object: createManifest(),
        computedFields: listValue(listType(Types.string), [stringValue('metadata..labels')]),
      });
      const deps = createMockDeps(handle);

      const response = await applyResourceChange(createRequest({ plannedState }), deps);

      expect(response.diagnostics).toHaveLength(1);
      expect(response.diagnostics[0].summary).toBe('Cannot parse computed field path: metadata..labels');
      expect(deps.schema.typeForKind).not.toHaveBeenCalled();
    });

    it('reports a planned state without an object', async () => {
      const response = await applyResourceChange(
        createRequest({ plannedState: manifestState({ manifest: createManifest() }) }),
        createMockDeps(handle)
      );

      expect(response.diagnostics).toEqual([
        { severity: 'error', summary: 'Failed to find object value in planned resource state' },
      ]);
    });

    it('does not start when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      const deps = createMockDeps(handle);

      await expect(
        applyResourceChange(createRequest({ signal: controller.signal }), deps)
      ).rejects.toBeInstanceOf(ApplyCancelledError);
      expect(deps.schema.typeForKind).not.toHaveBeenCalled();
    });

    it('reports cancellation during the write as an error', async () => {
      const controller = new AbortController();
      handle.get.mockRejectedValueOnce(NOT_FOUND);
      handle.applyPatch.mockImplementationOnce(async () => {
        controller.abort();
        throw new Error('This operation was aborted');
      });

      await expect(
        applyResourceChange(createRequest({ signal: controller.signal }), createMockDeps(handle))
      ).rejects.toBeInstanceOf(ApplyCancelledError);
    });
  });
});

