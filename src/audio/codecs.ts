import { clampInt16 } from './wav';

export type WireCodec = 'PCMU' | 'PCMA' | 'L16';

export const WIRE_SAMPLE_RATE_HZ = 8000;
export const FRAME_MS = 20;

const MULAW_BIAS = 0x84;
const MULAW_CLIP = 32635;

// A-law segment end points on the 13-bit magnitude scale.
const ALAW_SEG_END = [0x1f, 0x3f, 0x7f, 0xff, 0x1ff, 0x3ff, 0x7ff, 0xfff];

const SILENCE_BYTE: Record<WireCodec, number> = {
  PCMU: 0xff,
  PCMA: 0xd5,
  L16: 0x00,
};

/** Bytes per second on the wire at 8 kHz. */
export function codecByteRate(codec: WireCodec): number {
  return codec === 'L16' ? WIRE_SAMPLE_RATE_HZ * 2 : WIRE_SAMPLE_RATE_HZ;
}

export function frameBytes(codec: WireCodec): number {
  return (codecByteRate(codec) * FRAME_MS) / 1000;
}

export function linearToMuLaw(sample: number): number {
  let magnitude = clampInt16(sample);
  const sign = magnitude < 0 ? 0x80 : 0;
  if (sign) magnitude = -magnitude;
  if (magnitude > MULAW_CLIP) magnitude = MULAW_CLIP;
  magnitude += MULAW_BIAS;

  let exponent = 7;
  for (let mask = 0x4000; (magnitude & mask) === 0 && exponent > 0; mask >>= 1) {
    exponent -= 1;
  }
  const mantissa = (magnitude >> (exponent + 3)) & 0x0f;
  return ~(sign | (exponent << 4) | mantissa) & 0xff;
}

export function muLawToLinear(uLawByte: number): number {
  const u = ~uLawByte & 0xff;
  const sign = u & 0x80;
  const exponent = (u >> 4) & 0x07;
  const mantissa = u & 0x0f;
  let sample = ((mantissa << 3) + MULAW_BIAS) << exponent;
  sample -= MULAW_BIAS;
  return clampInt16(sign ? -sample : sample);
}

export function linearToALaw(sample: number): number {
  let value = clampInt16(sample) >> 3;
  let mask: number;
  if (value >= 0) {
    mask = 0xd5;
  } else {
    mask = 0x55;
    value = -value - 1;
  }

  let seg = 0;
  while (seg < ALAW_SEG_END.length && value > ALAW_SEG_END[seg]) {
    seg += 1;
  }
  if (seg >= ALAW_SEG_END.length) {
    return 0x7f ^ mask;
  }

  let aval = seg << 4;
  aval |= seg < 2 ? (value >> 1) & 0x0f : (value >> seg) & 0x0f;
  return aval ^ mask;
}

export function aLawToLinear(aLawByte: number): number {
  const a = aLawByte ^ 0x55;
  let t = (a & 0x0f) << 4;
  const seg = (a & 0x70) >> 4;
  switch (seg) {
    case 0:
      t += 8;
      break;
    case 1:
      t += 0x108;
      break;
    default:
      t += 0x108;
      t <<= seg - 1;
      break;
  }
  return clampInt16(a & 0x80 ? t : -t);
}

function evenLength(buffer: Buffer): Buffer {
  return buffer.length % 2 === 0 ? buffer : buffer.subarray(0, buffer.length - 1);
}

/** Encodes 16-bit little-endian PCM (8 kHz) to the wire codec. */
export function encodePcm16(pcm: Buffer, codec: WireCodec): Buffer {
  const source = evenLength(pcm);
  if (codec === 'L16') {
    return Buffer.from(source);
  }

  const samples = source.length / 2;
  const out = Buffer.alloc(samples);
  const encode = codec === 'PCMU' ? linearToMuLaw : linearToALaw;
  for (let i = 0; i < samples; i += 1) {
    out[i] = encode(source.readInt16LE(i * 2));
  }
  return out;
}

/** Decodes a wire payload to 16-bit little-endian PCM at the same rate. */
export function decodeToPcm16(payload: Buffer, codec: WireCodec): Buffer {
  if (codec === 'L16') {
    return Buffer.from(evenLength(payload));
  }

  const out = Buffer.alloc(payload.length * 2);
  const decode = codec === 'PCMU' ? muLawToLinear : aLawToLinear;
  for (let i = 0; i < payload.length; i += 1) {
    out.writeInt16LE(decode(payload[i] ?? 0), i * 2);
  }
  return out;
}

export function decodeInboundPayload(base64Payload: string, codec: WireCodec): Buffer {
  return decodeToPcm16(Buffer.from(base64Payload, 'base64'), codec);
}

/** 20 ms frames of codec-specific silence covering durationMs (whole frames only). */
export function silenceFrames(durationMs: number, codec: WireCodec): Buffer[] {
  const count = Math.max(0, Math.floor(durationMs / FRAME_MS));
  const bytes = frameBytes(codec);
  const frames: Buffer[] = [];
  for (let i = 0; i < count; i += 1) {
    frames.push(Buffer.alloc(bytes, SILENCE_BYTE[codec]));
  }
  return frames;
}

export function computeRms(pcm: Buffer): number {
  const samples = Math.floor(pcm.length / 2);
  if (samples === 0) return 0;
  let sumSquares = 0;
  for (let i = 0; i < samples; i += 1) {
    const s = pcm.readInt16LE(i * 2);
    sumSquares += s * s;
  }
  return Math.sqrt(sumSquares / samples);
}
