import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  aLawToLinear,
  codecByteRate,
  computeRms,
  decodeInboundPayload,
  encodePcm16,
  frameBytes,
  linearToALaw,
  linearToMuLaw,
  muLawToLinear,
  silenceFrames,
} from '../src/audio/codecs';

test('mu-law silence and full scale map to the expected code words', () => {
  assert.equal(linearToMuLaw(0), 0xff);
  assert.equal(muLawToLinear(0xff), 0);
  assert.equal(linearToMuLaw(32767), 0x80);
  assert.equal(muLawToLinear(0x80), 32124);
  assert.equal(linearToMuLaw(-32768), 0x00);
  assert.equal(muLawToLinear(0x00), -32124);
});

test('a-law silence encodes to 0xd5', () => {
  assert.equal(linearToALaw(0), 0xd5);
  assert.equal(aLawToLinear(0xd5), 8);
});

test('companded samples decode close to the original', () => {
  for (const sample of [-20000, -1200, -40, 40, 1200, 20000]) {
    const viaMuLaw = muLawToLinear(linearToMuLaw(sample));
    const viaALaw = aLawToLinear(linearToALaw(sample));
    assert.ok(Math.abs(viaMuLaw - sample) <= Math.abs(sample) * 0.07 + 8, `mu-law ${sample} -> ${viaMuLaw}`);
    assert.ok(Math.abs(viaALaw - sample) <= Math.abs(sample) * 0.07 + 8, `a-law ${sample} -> ${viaALaw}`);
  }
});

test('byte rates and frame sizes follow the codec', () => {
  assert.equal(codecByteRate('PCMU'), 8000);
  assert.equal(codecByteRate('PCMA'), 8000);
  assert.equal(codecByteRate('L16'), 16000);
  assert.equal(frameBytes('PCMU'), 160);
  assert.equal(frameBytes('L16'), 320);
});

test('silenceFrames emits whole 20 ms frames of codec silence', () => {
  const second = silenceFrames(1000, 'PCMU');
  assert.equal(second.length, 50);
  assert.ok(second.every((frame) => frame.length === 160 && frame.every((byte) => byte === 0xff)));

  const alaw = silenceFrames(50, 'PCMA');
  assert.equal(alaw.length, 2);
  assert.deepEqual([...alaw[0]].slice(0, 3), [0xd5, 0xd5, 0xd5]);

  const l16 = silenceFrames(20, 'L16');
  assert.equal(l16[0].length, 320);
  assert.equal(l16[0].readInt16LE(0), 0);

  assert.equal(silenceFrames(10, 'PCMU').length, 0);
});

test('L16 passes through and drops a dangling odd byte', () => {
  const pcm = Buffer.from([1, 2, 3, 4, 5]);
  assert.deepEqual(encodePcm16(pcm, 'L16'), Buffer.from([1, 2, 3, 4]));
});

test('decodeInboundPayload expands mu-law bytes to 16-bit PCM', () => {
  const pcm = decodeInboundPayload(Buffer.from([0xff, 0xff]).toString('base64'), 'PCMU');
  assert.deepEqual(pcm, Buffer.alloc(4));
});

test('computeRms measures 16-bit sample energy', () => {
  const pcm = Buffer.alloc(4);
  pcm.writeInt16LE(1000, 0);
  pcm.writeInt16LE(-1000, 2);
  assert.equal(computeRms(pcm), 1000);
  assert.equal(computeRms(Buffer.alloc(0)), 0);
});
