import { clampInt16 } from './wav';

/**
 * Linear-interpolating resampler for 16-bit little-endian mono PCM whose state
 * (low-pass value, last input sample, fractional read position) survives
 * across process() calls. Feeding a signal in chunks yields exactly the
 * samples a single call over the whole signal would.
 */
export class StreamingResampler {
  private readonly step: number;
  private readonly alpha: number | null;
  private filtered = 0;
  private prev: number | null = null;
  private phase = 0;

  constructor(
    public readonly inputRateHz: number,
    public readonly outputRateHz: number,
  ) {
    if (!(inputRateHz > 0) || !(outputRateHz > 0)) {
      throw new Error(`invalid_resample_rates: ${inputRateHz} -> ${outputRateHz}`);
    }
    this.step = inputRateHz / outputRateHz;
    // one-pole anti-alias filter, only when decimating
    this.alpha =
      outputRateHz < inputRateHz
        ? 1 - Math.exp((-2 * Math.PI * 0.45 * outputRateHz) / inputRateHz)
        : null;
  }

  process(pcm: Buffer): Buffer {
    const samples = Math.floor(pcm.length / 2);
    const out: number[] = [];

    for (let i = 0; i < samples; i += 1) {
      let x = pcm.readInt16LE(i * 2);
      if (this.alpha !== null) {
        this.filtered += this.alpha * (x - this.filtered);
        x = this.filtered;
      }

      if (this.prev === null) {
        this.prev = x;
        continue;
      }

      while (this.phase < 1) {
        out.push(this.prev + (x - this.prev) * this.phase);
        this.phase += this.step;
      }
      this.phase -= 1;
      this.prev = x;
    }

    const buffer = Buffer.alloc(out.length * 2);
    for (let i = 0; i < out.length; i += 1) {
      buffer.writeInt16LE(clampInt16(Math.round(out[i] ?? 0)), i * 2);
    }
    return buffer;
  }

  reset(): void {
    this.filtered = 0;
    this.prev = null;
    this.phase = 0;
  }
}
