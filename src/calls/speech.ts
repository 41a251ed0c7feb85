import { silenceFrames, type WireCodec } from '../audio/codecs';
import { transcodeSpeechStream } from '../audio/outboundTranscoder';
import { log } from '../log';
import { SocketClosedError } from '../media/mediaSocket';
import { incStageError, startStageTimer } from '../metrics';
import type { TextToSpeech } from '../tts/speechStream';

/** Destination for encoded wire payloads (the session wraps them as media messages). */
export interface AudioSink {
  send(payload: Buffer): Promise<void>;
}

export interface SpeechPlayback {
  emittedBytes: number;
  frames: number;
  /** Wall-clock ms at which the first payload went out. */
  startedAt: number | null;
  /** Set when synthesis failed; whatever was sent before the failure still counts. */
  error?: unknown;
}

export interface PlaySpeechOptions {
  text: string;
  tts: TextToSpeech;
  sink: AudioSink;
  codec: WireCodec;
  voiceId: string;
  timeoutMs: number;
  prePadMs?: number;
  signal?: AbortSignal;
  logContext?: Record<string, unknown>;
  now?: () => number;
}

/**
 * Synthesizes text and streams it to the sink in generation order, preceded
 * by a short silence pad. Cancellation and a closed socket propagate;
 * synthesis failures are reported on the result.
 */
export async function playSpeech(options: PlaySpeechOptions): Promise<SpeechPlayback> {
  const now = options.now ?? Date.now;
  const logContext = options.logContext ?? {};
  const playback: SpeechPlayback = { emittedBytes: 0, frames: 0, startedAt: null };

  const emit = async (payload: Buffer): Promise<void> => {
    if (playback.startedAt === null) {
      playback.startedAt = now();
    }
    await options.sink.send(payload);
    playback.emittedBytes += payload.length;
    playback.frames += 1;
  };

  for (const frame of silenceFrames(options.prePadMs ?? 0, options.codec)) {
    await emit(frame);
  }

  const endTimer = startStageTimer('tts');
  try {
    const speech = options.tts.synthesize(options.text, {
      voiceId: options.voiceId,
      timeoutMs: options.timeoutMs,
      signal: options.signal,
      logContext,
    });
    for await (const payload of transcodeSpeechStream(speech, options.codec, logContext)) {
      options.signal?.throwIfAborted();
      await emit(payload);
    }
  } catch (error) {
    if (options.signal?.aborted || error instanceof SocketClosedError) {
      throw error;
    }
    incStageError('tts');
    log.warn(
      { event: 'tts_playback_failed', err: error, emitted_bytes: playback.emittedBytes, ...logContext },
      'speech playback failed',
    );
    return { ...playback, error };
  } finally {
    endTimer();
  }

  return playback;
}
