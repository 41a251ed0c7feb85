import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

function source(value: string | null | Error) {
  const keys: string[] = [];
  return {
    keys,
    get: async (key: string): Promise<string | null> => {
      keys.push(key);
      if (value instanceof Error) throw value;
      return value;
    },
  };
}

test('without an override the environment defaults are used', async () => {
  const { loadVoiceConfig } = await import('../src/config/voiceConfig');
  const store = source(null);
  const config = await loadVoiceConfig(store);

  assert.deepEqual(store.keys, ['voicecfg']);
  assert.equal(config.sttUrl, 'http://stt.test');
  assert.equal(config.llmModel, 'test-model');
  assert.equal(config.codec, 'PCMU');
  assert.equal(config.sttTimeoutMs, 10000);
  assert.deepEqual(config.vad, { rmsThreshold: 500, silenceMs: 1200, minUtteranceMs: 500, maxUtteranceMs: 15000 });
  assert.equal(config.maxCallDurationSeconds, 600);
  assert.equal(Object.isFrozen(config), true);
  assert.equal(Object.isFrozen(config.vad), true);
});

test('a partial override replaces only the fields it names', async () => {
  const { loadVoiceConfig } = await import('../src/config/voiceConfig');
  const config = await loadVoiceConfig(
    source(JSON.stringify({ codec: 'PCMA', voiceId: 'alto', vad: { silenceMs: 800 } })),
    'cfg:test',
  );

  assert.equal(config.codec, 'PCMA');
  assert.equal(config.voiceId, 'alto');
  assert.equal(config.sttUrl, 'http://stt.test');
  assert.deepEqual(config.vad, { rmsThreshold: 500, silenceMs: 800, minUtteranceMs: 500, maxUtteranceMs: 15000 });
});

test('an unreadable or invalid override falls back to the defaults', async () => {
  const { loadVoiceConfig } = await import('../src/config/voiceConfig');

  const badJson = await loadVoiceConfig(source('{not json'));
  assert.equal(badJson.codec, 'PCMU');

  const invalid = await loadVoiceConfig(source(JSON.stringify({ codec: 'G722', sttTimeoutMs: 5 })));
  assert.equal(invalid.codec, 'PCMU');
  assert.equal(invalid.sttTimeoutMs, 10000);

  const unreachable = await loadVoiceConfig(source(new Error('connection refused')));
  assert.equal(unreachable.sttUrl, 'http://stt.test');
});
