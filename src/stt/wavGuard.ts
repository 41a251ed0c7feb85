import { WIRE_SAMPLE_RATE_HZ } from '../audio/codecs';
import { WAV_HEADER_BYTES } from '../audio/wav';
import { log } from '../log';

export type WavProblem =
  | 'not_wav'
  | 'not_pcm16_mono'
  | 'sample_rate_mismatch'
  | 'data_length_mismatch'
  | 'empty';

export interface UtteranceWavInfo {
  sampleRateHz: number;
  dataBytes: number;
  durationMs: number;
}

export type UtteranceWavCheck = { ok: true; info: UtteranceWavInfo } | { ok: false; problem: WavProblem };

/**
 * Checks an utterance against the canonical 44-byte layout the segmenter
 * writes: PCM, 16-bit, mono, at the expected rate, with RIFF and data sizes
 * that match the buffer.
 */
export function inspectUtteranceWav(buf: Buffer, expectedRateHz = WIRE_SAMPLE_RATE_HZ): UtteranceWavCheck {
  if (
    buf.length < WAV_HEADER_BYTES ||
    buf.toString('ascii', 0, 4) !== 'RIFF' ||
    buf.toString('ascii', 8, 12) !== 'WAVE' ||
    buf.toString('ascii', 36, 40) !== 'data'
  ) {
    return { ok: false, problem: 'not_wav' };
  }

  const format = buf.readUInt16LE(20);
  const channels = buf.readUInt16LE(22);
  const bitsPerSample = buf.readUInt16LE(34);
  if (format !== 1 || channels !== 1 || bitsPerSample !== 16) {
    return { ok: false, problem: 'not_pcm16_mono' };
  }

  const sampleRateHz = buf.readUInt32LE(24);
  if (sampleRateHz !== expectedRateHz) {
    return { ok: false, problem: 'sample_rate_mismatch' };
  }

  const dataBytes = buf.readUInt32LE(40);
  if (
    dataBytes !== buf.length - WAV_HEADER_BYTES ||
    buf.readUInt32LE(4) !== 36 + dataBytes ||
    dataBytes % 2 !== 0
  ) {
    return { ok: false, problem: 'data_length_mismatch' };
  }
  if (dataBytes === 0) {
    return { ok: false, problem: 'empty' };
  }

  return { ok: true, info: { sampleRateHz, dataBytes, durationMs: (dataBytes / 2 / sampleRateHz) * 1000 } };
}

export function assertUtteranceWav(
  buf: Buffer,
  context: Record<string, unknown> = {},
  expectedRateHz = WIRE_SAMPLE_RATE_HZ,
): UtteranceWavInfo {
  const check = inspectUtteranceWav(buf, expectedRateHz);
  if (check.ok) return check.info;

  log.error(
    {
      event: 'stt_invalid_wav_payload',
      problem: check.problem,
      buf_len: buf.length,
      first_bytes_hex: buf.subarray(0, 32).toString('hex'),
      ...context,
    },
    'invalid wav payload',
  );
  throw new Error(`invalid_wav_payload: ${check.problem}`);
}
