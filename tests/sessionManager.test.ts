import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { CallContext } from '../src/calls/types';
import type { VoiceConfig } from '../src/config/voiceConfig';
import {
  FakeCallControl,
  FakeChat,
  FakeMediaSocket,
  FakeSpeech,
  FakeTranscriber,
  InMemoryCallRecords,
  testVoiceConfig,
  waitUntil,
} from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

const CONTEXT: CallContext = {
  callControlId: 'call-1',
  direction: 'outbound',
  maxDurationMs: 60_000,
  limitMessage: 'Goodbye.',
  initialDelayMs: 0,
  expectsGreeting: false,
};

async function buildManager(loadConfig: () => Promise<Readonly<VoiceConfig>> = async () => testVoiceConfig()) {
  const { SessionManager } = await import('../src/calls/sessionManager');
  const { PreloadBroker } = await import('../src/calls/preloadBroker');
  const preloads = new PreloadBroker();
  const manager = new SessionManager({
    preloads,
    callControl: new FakeCallControl(),
    records: new InMemoryCallRecords(),
    loadConfig,
    createBackends: () => ({
      stt: new FakeTranscriber([]),
      tts: new FakeSpeech(),
      chat: new FakeChat(() => 'ok'),
    }),
    timing: { handshakeTimeoutMs: 500, connectedSilenceMs: 0, senderSilenceMs: 0, framePacingMs: 0, senderTailMs: 0 },
  });
  return { manager, preloads };
}

test('sessionManager runs one session per call and refuses a second socket', async () => {
  const { manager, preloads } = await buildManager();
  try {
    const first = new FakeMediaSocket();
    const running = manager.attach(first, 'stream-1', CONTEXT);
    assert.equal(manager.size, 1);
    assert.equal(manager.has('call-1'), true);

    const second = new FakeMediaSocket();
    assert.equal(await manager.attach(second, 'stream-2', CONTEXT), null);
    assert.deepEqual(second.closeCalls, [{ code: 1008, reason: 'session_exists' }]);

    first.emit({ event: 'start', stream_id: 'media-1' });
    await waitUntil(() => manager.get('call-1')?.state === 'active');
    first.emit({ event: 'stop' });

    const summary = await running;
    assert.equal(summary?.reason, 'stop_event');
    assert.equal(manager.size, 0);
    assert.equal(manager.get('call-1'), null);
  } finally {
    preloads.stop();
  }
});

test('shutdown stops live sessions and refuses new ones', async () => {
  const { manager, preloads } = await buildManager();
  try {
    const socket = new FakeMediaSocket();
    const running = manager.attach(socket, 'stream-1', CONTEXT);
    socket.emit({ event: 'start', stream_id: 'media-1' });
    await waitUntil(() => manager.get('call-1')?.state === 'active');

    await manager.shutdown();
    assert.equal((await running)?.reason, 'shutdown');

    const late = new FakeMediaSocket();
    assert.equal(await manager.attach(late, 'stream-9', { ...CONTEXT, callControlId: 'call-9' }), null);
    assert.equal(late.closeCalls[0]?.code, 1008);
  } finally {
    preloads.stop();
  }
});

test('a session whose configuration cannot load is closed', async () => {
  const { manager, preloads } = await buildManager(async () => {
    throw new Error('redis unavailable');
  });
  try {
    const socket = new FakeMediaSocket();
    assert.equal(await manager.attach(socket, 'stream-1', CONTEXT), null);
    assert.deepEqual(socket.closeCalls, [{ code: 1011, reason: 'config_unavailable' }]);
    assert.equal(manager.size, 0);
  } finally {
    preloads.stop();
  }
});
