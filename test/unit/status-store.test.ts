import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { StatusStore } from '../../src/services/status-store.js';
import { ConflictError, NotFoundError } from '../../src/types/index.js';
import { InMemoryResourceStore } from '../helpers/in-memory-store.js';
import { silentLogger } from '../helpers/logger.js';

const identity = { namespace: 'default', name: 'r1' };

describe('StatusStore', () => {
  let store: InMemoryResourceStore;
  let statusStore: StatusStore;

  beforeEach(() => {
    store = new InMemoryResourceStore();
    store.seed({
      metadata: { name: 'r1', namespace: 'default', labels: { team: 'data' } },
      spec: { replicas: 1 },
      status: { previous: 'value' },
    });
    statusStore = new StatusStore(store, silentLogger());
  });

  it('overlays the status and leaves spec and metadata alone', async () => {
    await statusStore.write(identity, { parameterHash: '06a0f69ed6cbcc3a0a6006261211af7f350b7122' });

    const stored = store.current(identity);
    assert.deepEqual(stored?.status, {
      previous: 'value',
      parameterHash: '06a0f69ed6cbcc3a0a6006261211af7f350b7122',
      statusVersion: 1,
    });
    assert.deepEqual(stored?.spec, { replicas: 1 });
    assert.deepEqual(stored?.metadata.labels, { team: 'data' });
    assert.equal(stored?.metadata.resourceVersion, '2');
  });

  it('writes every other field back as stored', async () => {
    const bare = { namespace: 'default', name: 'bare' };
    store.seed({ metadata: { name: 'bare' }, spec: null });

    await statusStore.write(bare, { messages: [] });

    assert.deepEqual(store.raw(bare), {
      metadata: { name: 'bare', namespace: 'default', resourceVersion: '3' },
      spec: null,
      status: { messages: [], statusVersion: 1 },
    });
  });

  it('writes over a stored status that does not decode', async () => {
    const broken = { namespace: 'default', name: 'broken' };
    store.seed({
      metadata: { name: 'broken' },
      spec: { replicas: 1 },
      status: { serviceInstanceID: 'not-a-uuid', parameterHash: 'stale' },
    });

    await statusStore.write(broken, {
      serviceInstanceID: '11111111-2222-4333-8444-555555555555',
      parameterHash: '06a0f69ed6cbcc3a0a6006261211af7f350b7122',
    });

    assert.deepEqual(store.current(broken)?.status, {
      serviceInstanceID: '11111111-2222-4333-8444-555555555555',
      parameterHash: '06a0f69ed6cbcc3a0a6006261211af7f350b7122',
      statusVersion: 1,
    });
  });

  it('does one read and one write per call', async () => {
    await statusStore.write(identity, { messages: [{ step: 1 }] });
    await statusStore.write(identity, { messages: [{ step: 1 }, { step: 2 }] });

    assert.deepEqual(store.calls, { get: 2, update: 2 });
  });

  it('fails with NotFoundError once the resource is gone', async () => {
    store.remove(identity);

    await assert.rejects(statusStore.write(identity, { messages: [] }), NotFoundError);
    assert.equal(store.calls.update, 0);
  });

  it('surfaces a conflict from a concurrent writer', async () => {
    store.beforeNextUpdate((s) => s.touch(identity));

    await assert.rejects(statusStore.write(identity, { messages: [] }), ConflictError);
  });

  it('re-reads and retries after a conflict', async () => {
    store.beforeNextUpdate((s) => s.touch(identity));

    await statusStore.writeWithRetry(identity, { messages: [{ step: 1 }] }, 2);

    assert.deepEqual(store.calls, { get: 2, update: 2 });
    assert.deepEqual(store.current(identity)?.status.messages, [{ step: 1 }]);
  });

  it('keeps the fields another writer changed before the retry', async () => {
    store.beforeNextUpdate((s) => s.patchStatus(identity, { previous: 'changed', observedBy: 'other' }));

    await statusStore.writeWithRetry(identity, { messages: [{ step: 1 }] }, 2);

    assert.deepEqual(store.current(identity)?.status, {
      previous: 'changed',
      observedBy: 'other',
      messages: [{ step: 1 }],
      statusVersion: 1,
    });
  });

  it('gives up once the retries are spent', async () => {
    store.beforeNextUpdate((s) => s.touch(identity));
    store.beforeNextUpdate((s) => s.touch(identity));

    await assert.rejects(statusStore.writeWithRetry(identity, { messages: [] }, 1), ConflictError);
    assert.deepEqual(store.calls, { get: 2, update: 2 });
  });
});
