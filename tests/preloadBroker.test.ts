import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

test('drain yields payloads in order and stops at the end marker', async () => {
  const { PreloadQueue } = await import('../src/calls/preloadBroker');
  const queue = new PreloadQueue('c1');
  queue.push(Buffer.from([1]));
  queue.push(Buffer.from([2]));

  const drained: number[] = [];
  const draining = (async () => {
    for await (const payload of queue.drain()) {
      drained.push(payload[0]);
    }
  })();

  queue.push(Buffer.from([3]));
  queue.close();
  await draining;

  assert.deepEqual(drained, [1, 2, 3]);
  assert.throws(() => queue.push(Buffer.from([4])), /preload queue closed/);
});

test('a queue has a single consumer', async () => {
  const { PreloadQueue } = await import('../src/calls/preloadBroker');
  const queue = new PreloadQueue('c1');
  queue.close();

  for await (const _payload of queue.drain()) {
    assert.fail('closed queue yielded');
  }
  await assert.rejects(async () => {
    for await (const _payload of queue.drain()) {
      assert.fail('second drain yielded');
    }
  }, /already draining/);
});

test('next rejects when the signal aborts', async () => {
  const { PreloadQueue } = await import('../src/calls/preloadBroker');
  const queue = new PreloadQueue('c1');
  const controller = new AbortController();

  const pending = queue.next(controller.signal);
  controller.abort(new Error('stop'));
  await assert.rejects(pending, /stop/);
});

test('the broker keeps one queue per call', async () => {
  const { PreloadBroker, PreloadQueueError } = await import('../src/calls/preloadBroker');
  const broker = new PreloadBroker();
  try {
    const queue = broker.create('c1');
    assert.equal(broker.get('c1'), queue);
    assert.throws(() => broker.create('c1'), PreloadQueueError);

    broker.discard('c1');
    assert.equal(broker.get('c1'), null);
    assert.equal(queue.isClosed, true);
  } finally {
    broker.stop();
  }
});

test('discard with a stale queue leaves the current one alone', async () => {
  const { PreloadBroker, PreloadQueue } = await import('../src/calls/preloadBroker');
  const broker = new PreloadBroker();
  try {
    const current = broker.create('c1');
    broker.discard('c1', new PreloadQueue('c1'));
    assert.equal(broker.get('c1'), current);
  } finally {
    broker.stop();
  }
});

test('adopt registers a queue filled before the call id existed', async () => {
  const { PreloadBroker, PreloadQueue } = await import('../src/calls/preloadBroker');
  const broker = new PreloadBroker();
  try {
    const queue = new PreloadQueue('pending:s1');
    queue.setGreetingText('Hello there');
    queue.push(Buffer.from([9]));
    queue.close();

    broker.adopt('c7', queue);
    const found = broker.get('c7');
    assert.equal(found, queue);
    assert.equal(found?.callControlId, 'c7');
    assert.equal(found?.greetingText, 'Hello there');
    assert.equal(found?.pendingCount, 1);
  } finally {
    broker.stop();
  }
});

test('waitFor finds a queue created later and gives up after maxWaitMs', async () => {
  const { PreloadBroker } = await import('../src/calls/preloadBroker');
  const broker = new PreloadBroker();
  try {
    const waiting = broker.waitFor('c2', { maxWaitMs: 1000, pollIntervalMs: 5 });
    setTimeout(() => broker.create('c2'), 20);
    const found = await waiting;
    assert.equal(found?.callControlId, 'c2');

    assert.equal(await broker.waitFor('never', { maxWaitMs: 30, pollIntervalMs: 5 }), null);
  } finally {
    broker.stop();
  }
});

test('sweep closes queues past their TTL', async () => {
  const { PreloadBroker } = await import('../src/calls/preloadBroker');
  let now = 0;
  const broker = new PreloadBroker({ ttlMs: 100, now: () => now });
  try {
    const queue = broker.create('c1');
    now = 99;
    assert.equal(broker.sweep(), 0);
    now = 100;
    assert.equal(broker.sweep(), 1);
    assert.equal(queue.isClosed, true);
    assert.equal(broker.size, 0);
  } finally {
    broker.stop();
  }
});
