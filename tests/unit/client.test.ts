/**
 * Unit Tests: Store API Client
 *
 * Requests go through a stubbed global fetch; nothing leaves the process.
 *
 * @see src/api/client.ts
 * @see src/api/errors.ts
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  APPLY_PATCH_CONTENT_TYPE,
  createStoreClient,
  groupVersionPath,
  parseGroupVersion,
  parseResourceList,
  resourcePath,
} from '../../src/api/client.js';
import { StoreApiError, isNotFound, parseStatus } from '../../src/api/errors.js';
import { toJson } from '../../src/values/untyped.js';

// =============================================================================
// Test Helpers
// =============================================================================

const DEPLOYMENTS = { group: 'apps', version: 'v1', resource: 'deployments' };

function createFetchMock(status: number, body: string) {
  return vi.fn(
    async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> =>
      new Response(body, { status })
  );
}

function createClient() {
  return createStoreClient({ server: 'http://store.test/', token: 'test-secret' });
}

// =============================================================================
// URL construction
// =============================================================================

describe('URL construction', () => {
  it('splits group versions', () => {
    expect(parseGroupVersion('v1')).toEqual({ group: '', version: 'v1' });
    expect(parseGroupVersion('apps/v1')).toEqual({ group: 'apps', version: 'v1' });
  });

  it('roots the core group under /api', () => {
    expect(groupVersionPath('', 'v1')).toBe('/api/v1');
    expect(groupVersionPath('apps', 'v1')).toBe('/apis/apps/v1');
  });

  it('builds namespaced and cluster-scoped resource paths', () => {
    expect(resourcePath(DEPLOYMENTS, 'web', 'prod')).toBe(
      '/apis/apps/v1/namespaces/prod/deployments/web'
    );
    expect(resourcePath({ group: '', version: 'v1', resource: 'namespaces' }, 'team-a')).toBe(
      '/api/v1/namespaces/team-a'
    );
  });
});

describe('parseResourceList', () => {
  it('reads well-formed resource entries', () => {
    const body = {
      kind: 'APIResourceList',
      resources: [
        { name: 'deployments', kind: 'Deployment', namespaced: true },
        { name: 'broken' },
        { name: 'namespaces', kind: 'Namespace' },
      ],
    };
    expect(parseResourceList(body)).toEqual([
      { name: 'deployments', kind: 'Deployment', namespaced: true },
      { name: 'namespaces', kind: 'Namespace', namespaced: false },
    ]);
  });

  it('returns nothing for other documents', () => {
    expect(parseResourceList('nope')).toEqual([]);
    expect(parseResourceList({ resources: 'x' })).toEqual([]);
  });
});

describe('parseStatus', () => {
  it('reads a Status document and its causes', () => {
    const status = parseStatus({
      kind: 'Status',
      status: 'Failure',
      reason: 'Invalid',
      code: 422,
      details: { causes: [{ field: 'spec.replicas', message: 'must be positive' }, 'junk'] },
    });
    expect(status).toEqual({
      status: 'Failure',
      message: undefined,
      reason: 'Invalid',
      code: 422,
      details: {
        name: undefined,
        group: undefined,
        kind: undefined,
        causes: [{ reason: undefined, field: 'spec.replicas', message: 'must be positive' }],
      },
    });
  });

  it('ignores documents that are not a Status', () => {
    expect(parseStatus({ kind: 'Deployment' })).toBeUndefined();
    expect(parseStatus(undefined)).toBeUndefined();
  });
});

// =============================================================================
// Requests
// =============================================================================

describe('createStoreClient', () => {
  let fetchMock: ReturnType<typeof createFetchMock>;

  beforeEach(() => {
    fetchMock = createFetchMock(200, '{}');
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('gets a named resource', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(JSON.stringify({ metadata: { name: 'web' }, spec: { replicas: 2 } }), { status: 200 })
    );

    const object = await createClient().resource(DEPLOYMENTS, 'prod').get('web');

    expect(toJson(object)).toEqual({ metadata: { name: 'web' }, spec: { replicas: 2 } });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://store.test/apis/apps/v1/namespaces/prod/deployments/web');
    expect(init).toMatchObject({
      method: 'GET',
      headers: { Accept: 'application/json', Authorization: 'Bearer test-secret' },
    });
  });

  it('sends server-side apply patches', async () => {
    const body = '{"metadata":{"name":"web"}}';

    await createClient().resource(DEPLOYMENTS, 'prod').applyPatch('web', body, 'ci-bot');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(
      'http://store.test/apis/apps/v1/namespaces/prod/deployments/web?fieldManager=ci-bot'
    );
    expect(init).toMatchObject({
      method: 'PATCH',
      body,
      headers: { 'Content-Type': APPLY_PATCH_CONTENT_TYPE },
    });
  });

  it('deletes a named resource', async () => {
    await createClient().resource({ group: '', version: 'v1', resource: 'namespaces' }).delete('team-a');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://store.test/api/v1/namespaces/team-a');
    expect(init).toMatchObject({ method: 'DELETE' });
  });

  it('reads an empty body as null', async () => {
    fetchMock.mockResolvedValueOnce(new Response('', { status: 200 }));

    const object = await createClient().resource(DEPLOYMENTS, 'prod').get('web');

    expect(object).toEqual({ kind: 'null' });
  });

  it('lists the resources of a group version', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(
        JSON.stringify({ resources: [{ name: 'configmaps', kind: 'ConfigMap', namespaced: true }] }),
        { status: 200 }
      )
    );

    const resources = await createClient().discover('v1');

    expect(fetchMock.mock.calls[0][0]).toBe('http://store.test/api/v1');
    expect(resources).toEqual([{ name: 'configmaps', kind: 'ConfigMap', namespaced: true }]);
  });

  it('raises Status failures as StoreApiError', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(
        JSON.stringify({
          kind: 'Status',
          status: 'Failure',
          reason: 'NotFound',
          message: 'deployments.apps "web" not found',
          code: 404,
        }),
        { status: 404 }
      )
    );

    const error = await createClient()
      .resource(DEPLOYMENTS, 'prod')
      .get('web')
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(StoreApiError);
    expect(isNotFound(error)).toBe(true);
    expect(error).toMatchObject({
      message: 'deployments.apps "web" not found',
      status: 404,
      reason: 'NotFound',
    });
  });

  it('uses the response text when the body is not a Status', async () => {
    fetchMock.mockResolvedValueOnce(new Response('upstream unavailable', { status: 503 }));

    await expect(createClient().resource(DEPLOYMENTS, 'prod').get('web')).rejects.toThrow(
      'upstream unavailable'
    );
  });

  it('reports the status code when the failure has no body', async () => {
    fetchMock.mockResolvedValueOnce(new Response('', { status: 500 }));

    const error = await createClient()
      .resource(DEPLOYMENTS, 'prod')
      .get('web')
      .catch((err: unknown) => err);

    expect(error).toMatchObject({ message: 'Store API error (500)', status: 500 });
    expect(isNotFound(error)).toBe(false);
  });

  it('rejects invalid JSON bodies', async () => {
    fetchMock.mockResolvedValueOnce(new Response('{not json', { status: 200 }));

    await expect(createClient().resource(DEPLOYMENTS, 'prod').get('web')).rejects.toThrow(
      'invalid JSON in response from /apis/apps/v1/namespaces/prod/deployments/web'
    );
  });

  it('aborts when the caller signal is already aborted', async () => {
    fetchMock.mockImplementationOnce(async (_input, init) => {
      expect(init?.signal?.aborted).toBe(true);
      throw new Error('aborted');
    });
    const controller = new AbortController();
    controller.abort();

    await expect(
      createClient().resource(DEPLOYMENTS, 'prod').get('web', { signal: controller.signal })
    ).rejects.toThrow('aborted');
  });

  it('redacts the token in its configuration', () => {
    expect(createClient().getConfig()).toEqual({
      server: 'http://store.test',
      token: 'test...cret',
      timeout: 30000,
    });
  });
});
