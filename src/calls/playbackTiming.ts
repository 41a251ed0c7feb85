import { codecByteRate, type WireCodec } from '../audio/codecs';

export const HANGUP_BUFFER_MS = 100;

export interface HangupDelayInput {
  codec: WireCodec;
  emittedBytes: number;
  /** Wall-clock ms of the first emitted byte, null when nothing started. */
  speechStartedAt: number | null;
  now: number;
  bufferMs?: number;
}

export function estimatePlaybackMs(codec: WireCodec, bytes: number): number {
  return (bytes / codecByteRate(codec)) * 1000;
}

/**
 * How long to wait before hanging up so the far end hears everything already
 * sent: remaining playback time plus a small buffer, never less than the buffer.
 */
export function computeHangupDelayMs(input: HangupDelayInput): number {
  const bufferMs = input.bufferMs ?? HANGUP_BUFFER_MS;
  if (input.emittedBytes <= 0) {
    return bufferMs;
  }

  const playbackMs = estimatePlaybackMs(input.codec, input.emittedBytes);
  if (input.speechStartedAt === null) {
    return playbackMs + bufferMs;
  }

  const elapsedMs = Math.max(0, input.now - input.speechStartedAt);
  const remainingMs = playbackMs - elapsedMs;
  return remainingMs > 0 ? remainingMs + bufferMs : bufferMs;
}
