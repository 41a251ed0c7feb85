import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { OutboundCallDeps } from '../src/calls/outboundCalls';
import type { VoiceConfig } from '../src/config/voiceConfig';
import {
  FakeCallControl,
  FakeChat,
  FakeSpeech,
  FakeTranscriber,
  InMemoryCallRecords,
  testVoiceConfig,
} from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

async function buildDeps(options: { chat?: FakeChat; config?: Partial<VoiceConfig> } = {}) {
  const { StreamRegistry } = await import('../src/calls/streamRegistry');
  const { PreloadBroker } = await import('../src/calls/preloadBroker');
  const chat = options.chat ?? new FakeChat(() => 'Hello, this is the clinic calling.');
  const callControl = new FakeCallControl('ccid-out-1');
  const records = new InMemoryCallRecords();
  const deps: OutboundCallDeps = {
    registry: new StreamRegistry(),
    preloads: new PreloadBroker(),
    callControl,
    records,
    loadConfig: async () => testVoiceConfig(options.config),
    createBackends: () => ({ stt: new FakeTranscriber([]), tts: new FakeSpeech(1600), chat }),
    buildStreamUrl: (streamId) => `wss://voice.test/v1/voice/stream/${streamId}?token=test-secret`,
    connectionId: 'conn-1',
    defaultFrom: '+15550000000',
  };
  const stop = (): void => {
    deps.registry.stop();
    deps.preloads.stop();
  };
  return { deps, chat, callControl, records, stop };
}

test('a prompted call preloads the greeting before dialling', async () => {
  const { initiateCall } = await import('../src/calls/outboundCalls');
  const { deps, chat, callControl, records, stop } = await buildDeps();

  try {
    const result = await initiateCall(
      { to: '+15550000002', prompt: 'Confirm tomorrow at 9am', delayMs: 250, userId: 'user-7' },
      deps,
    );

    assert.equal(result.status, 'initiated');
    assert.equal(result.callControlId, 'ccid-out-1');
    assert.equal(result.recordId, '1');

    assert.equal(chat.requests.length, 1);
    assert.deepEqual(callControl.dials, [
      {
        to: '+15550000002',
        from: '+15550000000',
        connectionId: 'conn-1',
        streamUrl: `wss://voice.test/v1/voice/stream/${result.streamId}?token=test-secret`,
        codec: 'PCMU',
      },
    ]);

    const queue = deps.preloads.get('ccid-out-1');
    assert.ok(queue);
    assert.equal(queue.callControlId, 'ccid-out-1');
    assert.equal(queue.greetingText, 'Hello, this is the clinic calling.');
    assert.equal(queue.isClosed, true);
    assert.equal(queue.pendingCount, 2);

    const context = await deps.registry.resolve(result.streamId);
    assert.deepEqual(context, {
      callControlId: 'ccid-out-1',
      recordId: '1',
      direction: 'outbound',
      initialPrompt: 'Confirm tomorrow at 9am',
      maxDurationMs: 600_000,
      limitMessage: 'This call has reached its time limit. Goodbye.',
      initialDelayMs: 250,
      expectsGreeting: true,
      userId: 'user-7',
      chatId: undefined,
    });

    const record = await records.get('1');
    assert.equal(record?.status, 'initiated');
    assert.equal(record?.callControlId, 'ccid-out-1');
    assert.equal(record?.assignedUserId, 'user-7');
  } finally {
    stop();
  }
});

test('a call without a prompt expects no greeting', async () => {
  const { initiateCall } = await import('../src/calls/outboundCalls');
  const { deps, chat, stop } = await buildDeps();

  try {
    const result = await initiateCall({ to: '+15550000002', from: '+15550000009' }, deps);
    const context = await deps.registry.resolve(result.streamId);

    assert.equal(chat.requests.length, 0);
    assert.equal(deps.preloads.size, 0);
    assert.equal(context?.expectsGreeting, false);
    assert.equal(context?.initialDelayMs, 0);
  } finally {
    stop();
  }
});

test('a failed greeting does not stop the call', async () => {
  const { initiateCall } = await import('../src/calls/outboundCalls');
  const { deps, stop } = await buildDeps({
    chat: new FakeChat(() => {
      throw new Error('llm down');
    }),
  });

  try {
    const result = await initiateCall({ to: '+15550000002', prompt: 'Say hi' }, deps);
    const context = await deps.registry.resolve(result.streamId);

    assert.equal(deps.preloads.get('ccid-out-1'), null);
    assert.equal(context?.expectsGreeting, false);
  } finally {
    stop();
  }
});

test('a dial failure releases the stream id and records the failure', async () => {
  const { initiateCall, CallInitiationError } = await import('../src/calls/outboundCalls');
  const { deps, callControl, records, stop } = await buildDeps();
  callControl.dialError = new Error('number unreachable');

  try {
    await assert.rejects(initiateCall({ to: '+15550000002', prompt: 'Say hi' }, deps), (error: unknown) => {
      assert.ok(error instanceof CallInitiationError);
      assert.equal(error.status, 502);
      assert.equal(error.message, 'dial_failed');
      return true;
    });

    assert.equal(deps.registry.size, 0);
    assert.equal(deps.preloads.size, 0);
    const record = await records.get('1');
    assert.equal(record?.status, 'failed');
    assert.equal(record?.error, 'number unreachable');
    assert.equal(record?.callControlId, undefined);
  } finally {
    stop();
  }
});

test('missing caller id or connection is refused before dialling', async () => {
  const { initiateCall } = await import('../src/calls/outboundCalls');
  const { deps, callControl, stop } = await buildDeps();

  try {
    await assert.rejects(initiateCall({ to: '+15550000002' }, { ...deps, defaultFrom: undefined }), {
      message: 'from_number_missing',
      status: 400,
    });
    await assert.rejects(initiateCall({ to: '+15550000002' }, { ...deps, connectionId: undefined }), {
      message: 'connection_id_missing',
      status: 503,
    });
    assert.equal(callControl.dials.length, 0);
  } finally {
    stop();
  }
});

test('the request schema bounds the initial delay', async () => {
  const { OutboundCallRequestSchema } = await import('../src/calls/outboundCalls');
  assert.equal(OutboundCallRequestSchema.safeParse({ to: '+1555', delayMs: 60_000 }).success, true);
  assert.equal(OutboundCallRequestSchema.safeParse({ to: '+1555', delayMs: 60_001 }).success, false);
  assert.equal(OutboundCallRequestSchema.safeParse({ to: '' }).success, false);
});
