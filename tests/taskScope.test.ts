import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTimeout as delay } from 'node:timers/promises';
import { setTestEnv } from './testEnv';

setTestEnv();

test('cancelAll aborts live tasks and waits for them to unwind', async () => {
  const { TaskScope } = await import('../src/calls/taskScope');
  const scope = new TaskScope('test');
  const events: string[] = [];

  scope.spawn('sleeper', async (signal) => {
    try {
      await delay(10_000, undefined, { signal });
    } finally {
      await delay(5);
      events.push('unwound');
    }
  });
  assert.equal(scope.size, 1);

  await scope.cancelAll();
  assert.deepEqual(events, ['unwound']);
  assert.equal(scope.size, 0);
});

test('a failing task settles without rejecting', async () => {
  const { TaskScope } = await import('../src/calls/taskScope');
  const scope = new TaskScope('test');

  const task = scope.spawn('boom', async () => {
    throw new Error('boom');
  });
  await task.done;
  assert.equal(task.settled, true);
  assert.equal(task.signal.aborted, false);
});

test('cancelling a finished task is harmless', async () => {
  const { TaskScope } = await import('../src/calls/taskScope');
  const scope = new TaskScope('test');

  const task = scope.spawn('quick', async () => undefined);
  await task.done;
  await task.cancel();
  assert.equal(task.signal.aborted, false);
});

test('speaking gate releases are bound to their acquisition', async () => {
  const { SpeakingGate } = await import('../src/calls/speakingGate');
  const gate = new SpeakingGate();
  assert.equal(gate.state, 'idle');

  const releaseSender = gate.acquire('sender');
  const releaseTurn = gate.acquire('turn');
  assert.equal(gate.owner, 'turn');

  releaseSender();
  assert.equal(gate.isHeld, true);

  releaseTurn();
  releaseTurn();
  assert.equal(gate.state, 'idle');
});
