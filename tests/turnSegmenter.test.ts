import assert from 'node:assert/strict';
import { test } from 'node:test';
import { TurnSegmenter, type SegmentDecision } from '../src/audio/turnSegmenter';

const VAD = { rmsThreshold: 500, silenceMs: 1200, minUtteranceMs: 500, maxUtteranceMs: 15000 };

function frame(amplitude: number): Buffer {
  const pcm = Buffer.alloc(320);
  for (let i = 0; i < 160; i += 1) {
    pcm.writeInt16LE(amplitude, i * 2);
  }
  return pcm;
}

function feed(segmenter: TurnSegmenter, frames: Buffer[]): Array<{ index: number; decision: SegmentDecision }> {
  const decisions: Array<{ index: number; decision: SegmentDecision }> = [];
  frames.forEach((pcm, index) => {
    const decision = segmenter.push(pcm);
    if (decision) decisions.push({ index, decision });
  });
  return decisions;
}

test('speech followed by enough silence dispatches one utterance', () => {
  const segmenter = new TurnSegmenter(VAD);
  const frames = [...Array.from({ length: 25 }, () => frame(2000)), ...Array.from({ length: 70 }, () => frame(0))];

  const decisions = feed(segmenter, frames);
  assert.equal(decisions.length, 1);
  const [{ index, decision }] = decisions;
  assert.equal(index, 25 + 60);
  assert.equal(decision.kind, 'dispatch');
  if (decision.kind !== 'dispatch') return;
  assert.equal(decision.reason, 'silence_detected');
  assert.equal(decision.durationMs, 1720);
  assert.equal(decision.wav.length, 27564);
  assert.equal(decision.wav.toString('ascii', 0, 4), 'RIFF');
  assert.equal(decision.wav.readUInt32LE(24), 8000);
});

test('silence alone is discarded repeatedly', () => {
  const segmenter = new TurnSegmenter(VAD);
  const decisions = feed(
    segmenter,
    Array.from({ length: 183 }, () => frame(0)),
  );

  assert.deepEqual(
    decisions.map(({ index, decision }) => [index + 1, decision.kind, decision.durationMs]),
    [
      [61, 'discard', 1220],
      [122, 'discard', 1220],
      [183, 'discard', 1220],
    ],
  );
});

test('continuous speech is cut at the maximum utterance length', () => {
  const segmenter = new TurnSegmenter(VAD);
  const decisions = feed(
    segmenter,
    Array.from({ length: 760 }, () => frame(3000)),
  );

  assert.equal(decisions.length, 1);
  assert.equal(decisions[0].index + 1, 751);
  assert.equal(decisions[0].decision.kind, 'dispatch');
  assert.equal(decisions[0].decision.durationMs, 15020);
  if (decisions[0].decision.kind === 'dispatch') {
    assert.equal(decisions[0].decision.reason, 'max_duration');
  }
});

test('short utterances wait for the minimum length', () => {
  const segmenter = new TurnSegmenter({ ...VAD, silenceMs: 100 });
  const decisions = feed(segmenter, [frame(2000), ...Array.from({ length: 40 }, () => frame(0))]);

  assert.equal(decisions.length, 1);
  assert.equal(decisions[0].index + 1, 26);
  assert.equal(decisions[0].decision.durationMs, 520);
});

test('reset clears buffered audio', () => {
  const segmenter = new TurnSegmenter(VAD);
  segmenter.push(frame(2000));
  assert.equal(segmenter.bufferedMs, 20);
  assert.equal(segmenter.speechDetected, true);

  segmenter.reset();
  assert.equal(segmenter.bufferedMs, 0);
  assert.equal(segmenter.speechDetected, false);
  assert.equal(segmenter.push(Buffer.alloc(0)), null);
});
