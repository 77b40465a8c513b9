import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { decodeDocument } from '../../src/apis/v1/bundle.js';
import { CustomObjectsClient, KubernetesResourceStore } from '../../src/services/resource-store.js';
import { ConflictError, DecodeError, NotFoundError, StoreError } from '../../src/types/index.js';
import { silentLogger } from '../helpers/logger.js';

const options = { group: 'automationbroker.io', version: 'v1', plural: 'bundles', namespace: 'default' };

const stored = {
  apiVersion: 'automationbroker.io/v1',
  kind: 'Bundle',
  metadata: { name: 'db', namespace: 'apps', resourceVersion: '7' },
  spec: { replicas: 1 },
};

function apiError(code: number): Error {
  return Object.assign(new Error(`HTTP-Code: ${code}`), { code });
}

interface Recorded {
  method: string;
  param: unknown;
}

function stubClient(overrides: Partial<CustomObjectsClient> = {}) {
  const calls: Recorded[] = [];
  const client: CustomObjectsClient = {
    getNamespacedCustomObject: async (param) => {
      calls.push({ method: 'get', param });
      return structuredClone(stored);
    },
    replaceNamespacedCustomObject: async (param) => {
      calls.push({ method: 'replace', param });
      return param.body;
    },
    replaceNamespacedCustomObjectStatus: async (param) => {
      calls.push({ method: 'replaceStatus', param });
      return param.body;
    },
    ...overrides,
  };
  return { client, calls };
}

describe('KubernetesResourceStore', () => {
  it('gets a resource as stored', async () => {
    const { client, calls } = stubClient();
    const store = new KubernetesResourceStore(client, options, silentLogger());

    const bundle = await store.get({ namespace: 'apps', name: 'db' });

    assert.equal(bundle?.metadata.resourceVersion, '7');
    assert.deepEqual(bundle?.spec, { replicas: 1 });
    assert.equal(bundle?.status, undefined);
    assert.deepEqual(calls, [
      {
        method: 'get',
        param: { group: 'automationbroker.io', version: 'v1', namespace: 'apps', plural: 'bundles', name: 'db' },
      },
    ]);
  });

  it('falls back to the configured namespace', async () => {
    const { client, calls } = stubClient();
    const store = new KubernetesResourceStore(client, options, silentLogger());

    await store.get({ namespace: '', name: 'db' });

    assert.deepEqual(calls[0]?.param, {
      group: 'automationbroker.io',
      version: 'v1',
      namespace: 'default',
      plural: 'bundles',
      name: 'db',
    });
  });

  it('fills in nothing the stored document leaves out', async () => {
    const { client } = stubClient({
      getNamespacedCustomObject: async () => ({ metadata: { name: 'db', resourceVersion: '3' }, spec: null }),
    });
    const store = new KubernetesResourceStore(client, options, silentLogger());

    const document = await store.get({ namespace: 'apps', name: 'db' });

    assert.deepEqual(document, { metadata: { name: 'db', resourceVersion: '3' }, spec: null });
  });

  it('returns null for a missing resource', async () => {
    const { client } = stubClient({
      getNamespacedCustomObject: async () => {
        throw apiError(404);
      },
    });
    const store = new KubernetesResourceStore(client, options, silentLogger());

    assert.equal(await store.get({ namespace: 'apps', name: 'db' }), null);
  });

  it('wraps other read failures in StoreError', async () => {
    const { client } = stubClient({
      getNamespacedCustomObject: async () => {
        throw apiError(500);
      },
    });
    const store = new KubernetesResourceStore(client, options, silentLogger());

    await assert.rejects(store.get({ namespace: 'apps', name: 'db' }), (error: unknown) => {
      assert.ok(error instanceof StoreError);
      assert.equal(error.statusCode, 500);
      return true;
    });
  });

  it('rejects a malformed resource with DecodeError', async () => {
    const { client } = stubClient({
      getNamespacedCustomObject: async () => ({ metadata: {} }),
    });
    const store = new KubernetesResourceStore(client, options, silentLogger());

    await assert.rejects(store.get({ namespace: 'apps', name: 'db' }), DecodeError);
  });

  it('replaces the whole object by default', async () => {
    const { client, calls } = stubClient();
    const store = new KubernetesResourceStore(client, options, silentLogger());
    const bundle = decodeDocument(stored);

    const updated = await store.update({ ...bundle, status: { messages: [] } });

    assert.deepEqual(updated.status, { messages: [] });
    assert.deepEqual(
      calls.map((call) => call.method),
      ['replace'],
    );
  });

  it('writes through the status subresource when configured', async () => {
    const { client, calls } = stubClient();
    const store = new KubernetesResourceStore(
      client,
      { ...options, useStatusSubresource: true },
      silentLogger(),
    );

    await store.update(decodeDocument(stored));

    assert.deepEqual(
      calls.map((call) => call.method),
      ['replaceStatus'],
    );
  });

  it('maps 409 to ConflictError and 404 to NotFoundError', async () => {
    let code = 409;
    const { client } = stubClient({
      replaceNamespacedCustomObject: async () => {
        throw apiError(code);
      },
    });
    const store = new KubernetesResourceStore(client, options, silentLogger());
    const bundle = decodeDocument(stored);

    await assert.rejects(store.update(bundle), ConflictError);
    code = 404;
    await assert.rejects(store.update(bundle), NotFoundError);
    code = 422;
    await assert.rejects(store.update(bundle), StoreError);
  });
});
