import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { RecordHashStore } from '../src/calls/callRecords';
import { setTestEnv } from './testEnv';

setTestEnv();

class MapRedis implements RecordHashStore {
  readonly hashes = new Map<string, Record<string, string>>();
  readonly strings = new Map<string, string>();

  async incr(key: string): Promise<number> {
    const next = Number(this.strings.get(key) ?? '0') + 1;
    this.strings.set(key, String(next));
    return next;
  }

  async hset(key: string, fields: Record<string, string>): Promise<number> {
    const existing = this.hashes.get(key) ?? {};
    const added = Object.keys(fields).filter((field) => !(field in existing)).length;
    this.hashes.set(key, { ...existing, ...fields });
    return added;
  }

  async hgetall(key: string): Promise<Record<string, string>> {
    return { ...this.hashes.get(key) };
  }

  async get(key: string): Promise<string | null> {
    return this.strings.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<'OK'> {
    this.strings.set(key, value);
    return 'OK';
  }
}

async function buildStore() {
  const { RedisCallRecordStore } = await import('../src/calls/callRecords');
  const redis = new MapRedis();
  return { redis, store: new RedisCallRecordStore(redis, 'callrec') };
}

test('create stores the record as a hash and indexes the call id', async () => {
  const { redis, store } = await buildStore();
  const created = await store.create({
    callControlId: 'ccid-1',
    direction: 'inbound',
    from: '+15550000001',
    to: '+15550000002',
    status: 'ringing',
    assignedUserId: 'user-1',
  });

  assert.equal(created.id, '1');
  assert.equal(redis.strings.get('callrec:ctl:ccid-1'), '1');
  assert.equal(redis.hashes.get('callrec:1')?.status, 'ringing');
  assert.deepEqual(await store.get('1'), created);
});

test('update merges the patch and numbers survive the round trip', async () => {
  const { store } = await buildStore();
  const created = await store.create({ direction: 'outbound', from: '+1', to: '+2', status: 'initiated' });

  const updated = await store.update(created.id, {
    status: 'completed',
    durationSeconds: 90,
    transcript: 'User: hi\nAssistant: Hello!',
    cost: 0.0075,
  });
  const stored = await store.get(created.id);

  assert.equal(updated?.status, 'completed');
  assert.equal(stored?.status, 'completed');
  assert.equal(stored?.durationSeconds, 90);
  assert.equal(stored?.cost, 0.0075);
  assert.equal(stored?.transcript, 'User: hi\nAssistant: Hello!');
  assert.equal(stored?.from, '+1');
});

test('the newest record wins the call id lookup', async () => {
  const { store } = await buildStore();
  await store.create({ callControlId: 'ccid-1', direction: 'outbound', from: '+1', to: '+2', status: 'failed' });
  const second = await store.create({ callControlId: 'ccid-1', direction: 'outbound', from: '+1', to: '+2', status: 'initiated' });

  assert.equal((await store.findLatestByCallControlId('ccid-1'))?.id, second.id);
  assert.equal(await store.findLatestByCallControlId('ccid-unknown'), null);
});

test('missing or corrupt records read as null', async () => {
  const { redis, store } = await buildStore();
  assert.equal(await store.get('404'), null);
  assert.equal(await store.update('404', { status: 'completed' }), null);

  redis.hashes.set('callrec:9', { id: '9', direction: 'sideways' });
  assert.equal(await store.get('9'), null);
});
