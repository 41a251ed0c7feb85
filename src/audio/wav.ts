export const WAV_HEADER_BYTES = 44;

export function clampInt16(n: number): number {
  if (n > 32767) return 32767;
  if (n < -32768) return -32768;
  return n | 0;
}

export function isRiffHeader(buffer: Buffer): boolean {
  return buffer.length >= 4 && buffer.toString('ascii', 0, 4) === 'RIFF';
}

export function wavHeader(pcmDataBytes: number, sampleRate: number, channels = 1): Buffer {
  const bytesPerSample = 2;
  const blockAlign = channels * bytesPerSample;
  const byteRate = sampleRate * blockAlign;

  const header = Buffer.alloc(WAV_HEADER_BYTES);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + pcmDataBytes, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(16, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(pcmDataBytes, 40);
  return header;
}

/** Wraps 16-bit little-endian mono PCM in a canonical 44-byte WAV container. */
export function encodePcm16ToWav(pcm: Buffer, sampleRate: number): Buffer {
  return Buffer.concat([wavHeader(pcm.length, sampleRate, 1), pcm]);
}

/**
 * Reads the sample rate field of a canonical header (byte offset 24).
 * Returns null when the buffer does not start with a RIFF header.
 */
export function readWavSampleRate(header: Buffer): number | null {
  if (!isRiffHeader(header) || header.length < 28) {
    return null;
  }
  const rate = header.readUInt32LE(24);
  return rate > 0 ? rate : null;
}
