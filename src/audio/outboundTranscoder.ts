import { log } from '../log';
import { encodePcm16, type WireCodec, WIRE_SAMPLE_RATE_HZ } from './codecs';
import { StreamingResampler } from './streamingResampler';
import { readWavSampleRate, WAV_HEADER_BYTES, isRiffHeader } from './wav';

export const DEFAULT_SOURCE_RATE_HZ = 24000;
export const OUTBOUND_BLOCK_BYTES = 960;

export interface OutboundTranscoderOptions {
  blockBytes?: number;
  logContext?: Record<string, unknown>;
}

/**
 * Turns a header-prefixed 16-bit PCM byte stream (speech synthesis output)
 * into wire-codec payloads at 8 kHz.
 */
export class OutboundTranscoder {
  private readonly blockBytes: number;
  private readonly logContext: Record<string, unknown>;
  private headerBytes: Buffer = Buffer.alloc(0);
  private headerResolved = false;
  private sourceRateHz = DEFAULT_SOURCE_RATE_HZ;
  private resampler: StreamingResampler | null = null;
  private pending: Buffer = Buffer.alloc(0);
  private droppedBlocks = 0;

  constructor(
    private readonly codec: WireCodec,
    options: OutboundTranscoderOptions = {},
  ) {
    const blockBytes = options.blockBytes ?? OUTBOUND_BLOCK_BYTES;
    if (blockBytes <= 0 || blockBytes % 2 !== 0) {
      throw new Error(`invalid_block_bytes: ${blockBytes}`);
    }
    this.blockBytes = blockBytes;
    this.logContext = options.logContext ?? {};
  }

  get sampleRateHz(): number {
    return this.sourceRateHz;
  }

  get dropped(): number {
    return this.droppedBlocks;
  }

  push(chunk: Buffer): Buffer[] {
    if (chunk.length === 0) {
      return [];
    }

    if (!this.headerResolved) {
      this.headerBytes = Buffer.concat([this.headerBytes, chunk]);
      if (this.headerBytes.length < WAV_HEADER_BYTES) {
        return [];
      }
      const audio = this.resolveHeader(this.headerBytes);
      this.headerBytes = Buffer.alloc(0);
      return this.append(audio);
    }

    return this.append(chunk);
  }

  /** Processes the trailing partial block; a dangling odd byte is dropped. */
  flush(): Buffer[] {
    if (!this.headerResolved) {
      const buffered = this.headerBytes;
      this.headerBytes = Buffer.alloc(0);
      // a short stream that starts like a header carries no audio
      const audio = isRiffHeader(buffered) ? Buffer.alloc(0) : this.resolveHeader(buffered);
      this.headerResolved = true;
      this.pending = Buffer.concat([this.pending, audio]);
    }

    const usable = this.pending.length - (this.pending.length % 2);
    const remainder = this.pending.subarray(0, usable);
    this.pending = Buffer.alloc(0);
    if (remainder.length === 0) {
      return [];
    }
    const encoded = this.processBlock(remainder);
    return encoded ? [encoded] : [];
  }

  private resolveHeader(buffered: Buffer): Buffer {
    this.headerResolved = true;
    const rate = readWavSampleRate(buffered);
    if (rate !== null) {
      this.sourceRateHz = rate;
      this.resampler = this.createResampler();
      log.debug(
        { event: 'outbound_header_parsed', sample_rate_hz: rate, ...this.logContext },
        'outbound audio header parsed',
      );
      return buffered.subarray(WAV_HEADER_BYTES);
    }

    log.warn(
      {
        event: 'outbound_header_missing',
        assumed_sample_rate_hz: this.sourceRateHz,
        first_bytes_hex: buffered.subarray(0, 8).toString('hex'),
        ...this.logContext,
      },
      'outbound audio header missing, assuming default rate',
    );
    this.resampler = this.createResampler();
    return buffered;
  }

  private createResampler(): StreamingResampler | null {
    if (this.sourceRateHz === WIRE_SAMPLE_RATE_HZ) {
      return null;
    }
    return new StreamingResampler(this.sourceRateHz, WIRE_SAMPLE_RATE_HZ);
  }

  private append(audio: Buffer): Buffer[] {
    this.pending = this.pending.length === 0 ? audio : Buffer.concat([this.pending, audio]);
    const out: Buffer[] = [];
    while (this.pending.length >= this.blockBytes) {
      const block = this.pending.subarray(0, this.blockBytes);
      this.pending = this.pending.subarray(this.blockBytes);
      const encoded = this.processBlock(block);
      if (encoded) {
        out.push(encoded);
      }
    }
    return out;
  }

  private processBlock(block: Buffer): Buffer | null {
    try {
      const pcm8k = this.resampler ? this.resampler.process(block) : block;
      const encoded = encodePcm16(pcm8k, this.codec);
      return encoded.length > 0 ? encoded : null;
    } catch (error) {
      this.droppedBlocks += 1;
      log.warn(
        {
          event: 'outbound_block_dropped',
          block_bytes: block.length,
          codec: this.codec,
          err: error,
          ...this.logContext,
        },
        'outbound audio block dropped',
      );
      return null;
    }
  }
}

/** Wire payloads for a speech stream, in generation order. */
export async function* transcodeSpeechStream(
  stream: AsyncIterable<Buffer>,
  codec: WireCodec,
  logContext: Record<string, unknown> = {},
): AsyncGenerator<Buffer> {
  const transcoder = new OutboundTranscoder(codec, { logContext });
  for await (const chunk of stream) {
    for (const payload of transcoder.push(chunk)) {
      yield payload;
    }
  }
  for (const payload of transcoder.flush()) {
    yield payload;
  }
}

export function buildMediaMessage(mediaSessionId: string, payload: Buffer): string {
  return JSON.stringify({
    event: 'media',
    stream_id: mediaSessionId,
    media: { payload: payload.toString('base64') },
  });
}
