import assert from 'node:assert/strict';
import { test } from 'node:test';
import { computeHangupDelayMs, estimatePlaybackMs } from '../src/calls/playbackTiming';

test('nothing emitted waits only the buffer', () => {
  assert.equal(computeHangupDelayMs({ codec: 'PCMU', emittedBytes: 0, speechStartedAt: null, now: 0 }), 100);
});

test('remaining playback plus buffer', () => {
  assert.equal(
    computeHangupDelayMs({ codec: 'PCMU', emittedBytes: 8000, speechStartedAt: 1000, now: 1400 }),
    700,
  );
});

test('L16 plays twice as many bytes per second', () => {
  assert.equal(estimatePlaybackMs('L16', 16000), 1000);
  assert.equal(
    computeHangupDelayMs({ codec: 'L16', emittedBytes: 16000, speechStartedAt: null, now: 5000 }),
    1100,
  );
});

test('playback already finished waits only the buffer', () => {
  assert.equal(
    computeHangupDelayMs({ codec: 'PCMA', emittedBytes: 800, speechStartedAt: 0, now: 500, bufferMs: 250 }),
    250,
  );
});
