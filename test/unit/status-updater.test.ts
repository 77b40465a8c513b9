import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { BundleStatus } from '../../src/apis/v1/bundle.js';
import { StatusUpdater } from '../../src/utils/status-updater.js';

const base: BundleStatus = { parameterHash: '06a0f69ed6cbcc3a0a6006261211af7f350b7122', messages: [] };

function recorder() {
  const writes: BundleStatus[] = [];
  return {
    writes,
    write: async (status: BundleStatus) => {
      writes.push(status);
    },
  };
}

describe('StatusUpdater', () => {
  it('writes the whole sequence once per message by default', async () => {
    const { writes, write } = recorder();
    const updater = new StatusUpdater(base, write);

    await updater.append({ n: 1 });
    await updater.append({ n: 2 });
    await updater.append({ n: 3 });
    await updater.close();

    assert.equal(writes.length, 3);
    assert.deepEqual(
      writes.map((w) => w.messages),
      [[{ n: 1 }], [{ n: 1 }, { n: 2 }], [{ n: 1 }, { n: 2 }, { n: 3 }]],
    );
    assert.equal(writes[2]?.parameterHash, base.parameterHash);
    assert.equal(updater.count, 3);
  });

  it('coalesces a burst into a single write', async () => {
    const { writes, write } = recorder();
    const updater = new StatusUpdater(base, write, 20);

    for (let n = 1; n <= 5; n++) {
      await updater.append({ n });
    }
    await updater.close();

    assert.equal(writes.length, 1);
    assert.deepEqual(writes[0]?.messages, [{ n: 1 }, { n: 2 }, { n: 3 }, { n: 4 }, { n: 5 }]);
  });

  it('flushes on the interval while the operation keeps running', async () => {
    const { writes, write } = recorder();
    const updater = new StatusUpdater(base, write, 5);

    await updater.append({ n: 1 });
    await new Promise((resolve) => setTimeout(resolve, 30));
    await updater.append({ n: 2 });
    await updater.close();

    assert.equal(writes.length, 2);
    assert.deepEqual(writes[0]?.messages, [{ n: 1 }]);
    assert.deepEqual(writes[1]?.messages, [{ n: 1 }, { n: 2 }]);
  });

  it('reports a failed background write from close', async () => {
    const updater = new StatusUpdater(
      base,
      async () => {
        throw new Error('store down');
      },
      5,
    );

    await updater.append({ n: 1 });
    await new Promise((resolve) => setTimeout(resolve, 30));
    await assert.rejects(updater.close(), /store down/);
  });

  it('refuses appends after close', async () => {
    const { write } = recorder();
    const updater = new StatusUpdater(base, write);
    await updater.close();

    await assert.rejects(updater.append({ n: 1 }), /closed status updater/);
  });

  it('persists pending messages on close after the producer stopped early', async () => {
    const { writes, write } = recorder();
    const updater = new StatusUpdater(base, write, 50);

    await updater.append({ n: 1 });
    await updater.append({ n: 2 });
    assert.equal(writes.length, 0);
    await updater.close();

    assert.equal(writes.length, 1);
    assert.deepEqual(writes[0]?.messages, [{ n: 1 }, { n: 2 }]);
  });
});
