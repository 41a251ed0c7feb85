import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { ChatBackend } from '../src/ai/chatClient';
import type { CallContext } from '../src/calls/types';
import { FakeCallControl, FakeChat, FakeSpeech, testVoiceConfig } from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

const CONTEXT: CallContext = {
  callControlId: 'ccid-1',
  direction: 'outbound',
  initialPrompt: 'Confirm the appointment',
  maxDurationMs: 600_000,
  limitMessage: 'Goodbye.',
  initialDelayMs: 0,
  expectsGreeting: false,
};

async function buildEngine(options: {
  chat: ChatBackend;
  tts?: FakeSpeech;
  sendConversationContext?: boolean;
  sinkError?: Error;
  timing?: { prePadMs: number; echoTailMs: number; hangupBufferMs: number };
  now?: () => number;
}) {
  const { ConversationEngine } = await import('../src/calls/conversationEngine');
  const payloads: Buffer[] = [];
  const closeReasons: string[] = [];
  const callControl = new FakeCallControl();
  const engine = new ConversationEngine({
    config: testVoiceConfig({ sendConversationContext: options.sendConversationContext ?? true }),
    context: CONTEXT,
    chat: options.chat,
    tts: options.tts ?? new FakeSpeech(1600),
    callControl,
    sink: {
      send: async (payload) => {
        if (options.sinkError) throw options.sinkError;
        payloads.push(payload);
      },
    },
    closeCall: async (reason) => {
      closeReasons.push(reason);
    },
    timing: options.timing ?? { prePadMs: 0, echoTailMs: 0, hangupBufferMs: 0 },
    now: options.now ?? (() => 1000),
  });
  return { engine, payloads, closeReasons, callControl };
}

test('a spoken turn streams the reply and records both sides', async () => {
  const chat = new FakeChat(() => 'Hi there.');
  const { engine, payloads } = await buildEngine({ chat });

  const outcome = await engine.runTurn('hello', new AbortController().signal);

  assert.deepEqual(outcome, { kind: 'spoken', text: 'Hi there.', emittedBytes: 800 });
  assert.deepEqual(
    payloads.map((payload) => payload.length),
    [480, 320],
  );
  assert.equal(engine.transcript, 'User: hello\nAssistant: Hi there.');
  assert.equal(engine.turns, 1);
  assert.equal(chat.requests[0].length, 2);
  assert.equal(chat.requests[0][0].role, 'system');
  assert.match(chat.requests[0][0].content, /Current Call Goal: Confirm the appointment/);
  assert.deepEqual(chat.requests[0][1], { role: 'user', content: 'hello' });
});

test('later turns carry the conversation history', async () => {
  const replies = ['First answer.', 'Second answer.'];
  const chat = new FakeChat(() => replies.shift() ?? '');
  const { engine } = await buildEngine({ chat });
  const signal = new AbortController().signal;

  await engine.runTurn('one', signal);
  await engine.runTurn('two', signal);

  assert.deepEqual(
    chat.requests[1].slice(1),
    [
      { role: 'user', content: 'one' },
      { role: 'assistant', content: 'First answer.' },
      { role: 'user', content: 'two' },
    ],
  );
  assert.deepEqual(
    engine.getHistory().map((turn) => `${turn.role}: ${turn.content}`),
    ['user: one', 'assistant: First answer.', 'user: two', 'assistant: Second answer.'],
  );
});

test('a spoken turn lasts until the far end has heard the reply plus the echo tail', async () => {
  // 16000 bytes of 8 kHz PCM is one second of audio, sent in well under that.
  const { engine, payloads } = await buildEngine({
    chat: new FakeChat(() => 'This reply takes a full second to play.'),
    tts: new FakeSpeech(16_000),
    timing: { prePadMs: 0, echoTailMs: 50, hangupBufferMs: 0 },
    now: Date.now,
  });

  const startedAt = Date.now();
  const outcome = await engine.runTurn('hello', new AbortController().signal);
  const elapsedMs = Date.now() - startedAt;

  assert.deepEqual(outcome, { kind: 'spoken', text: 'This reply takes a full second to play.', emittedBytes: 8000 });
  assert.equal(payloads.length, 17);
  assert.ok(elapsedMs >= 1040, `turn ended after ${elapsedMs}ms, before playback and echo tail`);
  assert.ok(elapsedMs < 1500, `turn held for ${elapsedMs}ms`);
});

test('stateless mode sends only the system prompt and the latest utterance', async () => {
  const chat = new FakeChat(() => 'Okay.');
  const { engine } = await buildEngine({ chat, sendConversationContext: false });
  const signal = new AbortController().signal;

  await engine.runTurn('one', signal);
  await engine.runTurn('two', signal);

  assert.equal(chat.requests[1].length, 2);
  assert.deepEqual(chat.requests[1][1], { role: 'user', content: 'two' });
});

test('a failed text generation leaves the turn silent', async () => {
  const chat = new FakeChat(() => {
    throw new Error('backend down');
  });
  const { engine, payloads } = await buildEngine({ chat });

  const outcome = await engine.runTurn('hello', new AbortController().signal);
  assert.deepEqual(outcome, { kind: 'silent', reason: 'llm_failed' });
  assert.equal(payloads.length, 0);
  assert.equal(engine.transcript, 'User: hello');
});

test('an empty reply produces no audio', async () => {
  const { engine, payloads } = await buildEngine({ chat: new FakeChat(() => '   ') });
  const outcome = await engine.runTurn('hello', new AbortController().signal);
  assert.deepEqual(outcome, { kind: 'silent', reason: 'empty_reply' });
  assert.equal(payloads.length, 0);
});

test('a failed synthesis ends the turn silently', async () => {
  const { engine, payloads } = await buildEngine({
    chat: new FakeChat(() => 'You will not hear this.'),
    tts: new FakeSpeech(1600, new Error('tts down')),
  });
  const outcome = await engine.runTurn('hello', new AbortController().signal);
  assert.deepEqual(outcome, { kind: 'silent', reason: 'tts_failed' });
  assert.equal(payloads.length, 0);
});

test('a hangup directive plays the sign-off then ends the call', async () => {
  const chat = new FakeChat(() => 'Goodbye! {"action":"hangup"}');
  const { engine, closeReasons, callControl } = await buildEngine({ chat });

  const outcome = await engine.runTurn('bye', new AbortController().signal);

  assert.deepEqual(outcome, { kind: 'hangup', text: 'Goodbye!', emittedBytes: 800, delayMs: 100 });
  assert.deepEqual(callControl.hangups, ['ccid-1']);
  assert.deepEqual(closeReasons, ['hangup_directive']);
  assert.equal(engine.transcript, 'User: bye\nAssistant: Goodbye!');
});

test('a bare directive hangs up without speaking', async () => {
  const tts = new FakeSpeech(1600);
  const { engine, callControl, payloads } = await buildEngine({
    chat: new FakeChat(() => '{"action":"hangup"}'),
    tts,
  });

  const outcome = await engine.runTurn('bye', new AbortController().signal);
  assert.deepEqual(outcome, { kind: 'hangup', text: '', emittedBytes: 0, delayMs: 0 });
  assert.deepEqual(tts.texts, []);
  assert.equal(payloads.length, 0);
  assert.deepEqual(callControl.hangups, ['ccid-1']);
});

test('a closed socket ends the turn', async () => {
  const { SocketClosedError } = await import('../src/media/mediaSocket');
  const { engine } = await buildEngine({
    chat: new FakeChat(() => 'Hello?'),
    sinkError: new SocketClosedError(),
  });
  const outcome = await engine.runTurn('hi', new AbortController().signal);
  assert.deepEqual(outcome, { kind: 'socket_closed' });
});

test('cancellation propagates out of the turn', async () => {
  const controller = new AbortController();
  const chat: ChatBackend = {
    complete: (_messages, options) =>
      new Promise<string>((_resolve, reject) => {
        options?.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      }),
  };
  const { engine } = await buildEngine({ chat });

  const running = engine.runTurn('hello', controller.signal);
  controller.abort(new Error('cancelled'));
  await assert.rejects(running);
});
