import { computeRms, WIRE_SAMPLE_RATE_HZ } from './codecs';
import { encodePcm16ToWav } from './wav';

export interface TurnSegmenterOptions {
  rmsThreshold: number;
  silenceMs: number;
  minUtteranceMs: number;
  maxUtteranceMs: number;
  sampleRateHz?: number;
}

export type DispatchReason = 'silence_detected' | 'max_duration';

export type SegmentDecision =
  | { kind: 'dispatch'; reason: DispatchReason; wav: Buffer; durationMs: number }
  | { kind: 'discard'; reason: 'no_speech'; durationMs: number };

/**
 * Energy-based voice activity detection over decoded 16-bit PCM.
 * Durations are tracked in whole milliseconds derived from byte counts.
 */
export class TurnSegmenter {
  private readonly sampleRateHz: number;
  private chunks: Buffer[] = [];
  private bufferedBytes = 0;
  private silenceMs = 0;
  private hasSpeech = false;

  constructor(private readonly options: TurnSegmenterOptions) {
    this.sampleRateHz = options.sampleRateHz ?? WIRE_SAMPLE_RATE_HZ;
  }

  get bufferedMs(): number {
    return this.bytesToMs(this.bufferedBytes);
  }

  get speechDetected(): boolean {
    return this.hasSpeech;
  }

  push(pcm: Buffer): SegmentDecision | null {
    if (pcm.length === 0) {
      return null;
    }

    this.chunks.push(pcm);
    this.bufferedBytes += pcm.length;

    if (computeRms(pcm) < this.options.rmsThreshold) {
      this.silenceMs += this.bytesToMs(pcm.length);
    } else {
      this.silenceMs = 0;
      this.hasSpeech = true;
    }

    const durationMs = this.bufferedMs;

    if (durationMs > this.options.maxUtteranceMs) {
      return this.dispatch('max_duration', durationMs);
    }

    if (this.silenceMs > this.options.silenceMs && durationMs > this.options.minUtteranceMs) {
      if (!this.hasSpeech) {
        this.reset();
        return { kind: 'discard', reason: 'no_speech', durationMs };
      }
      return this.dispatch('silence_detected', durationMs);
    }

    return null;
  }

  reset(): void {
    this.chunks = [];
    this.bufferedBytes = 0;
    this.silenceMs = 0;
    this.hasSpeech = false;
  }

  private dispatch(reason: DispatchReason, durationMs: number): SegmentDecision {
    const wav = encodePcm16ToWav(Buffer.concat(this.chunks), this.sampleRateHz);
    this.reset();
    return { kind: 'dispatch', reason, wav, durationMs };
  }

  private bytesToMs(bytes: number): number {
    return Math.floor((bytes * 1000) / (this.sampleRateHz * 2));
  }
}
