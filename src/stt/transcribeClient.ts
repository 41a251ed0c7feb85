import { z } from 'zod';
import { log } from '../log';
import { linkSignal } from '../utils/abort';
import { assertUtteranceWav } from './wavGuard';

export interface TranscribeOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  logContext?: Record<string, unknown>;
}

export interface SpeechToText {
  transcribe(wav: Buffer, options: TranscribeOptions): Promise<string>;
}

const TranscriptionSchema = z.object({ text: z.string().nullish() }).passthrough();

export function buildTranscribeUrl(base: string): string {
  const trimmed = base.replace(/\/+$/, '');
  return trimmed.endsWith('/transcribe') ? trimmed : `${trimmed}/transcribe`;
}

/** Posts a WAV utterance as multipart `file` and reads `{ text }` back. */
export class HttpTranscribeClient implements SpeechToText {
  private readonly url: string;

  constructor(baseUrl: string) {
    this.url = buildTranscribeUrl(baseUrl);
  }

  public async transcribe(wav: Buffer, options: TranscribeOptions): Promise<string> {
    const logContext = options.logContext ?? {};
    const audio = assertUtteranceWav(wav, { wav_bytes: wav.length, ...logContext });

    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(wav)], { type: 'audio/wav' }), 'audio.wav');

    const linked = linkSignal(options.signal, options.timeoutMs);
    const startedAt = Date.now();
    try {
      const response = await fetch(this.url, {
        method: 'POST',
        body: form,
        signal: linked.signal,
      });

      if (!response.ok) {
        const body = await response.text();
        const preview = body.length > 500 ? `${body.slice(0, 500)}...` : body;
        log.error(
          { event: 'stt_request_failed', status: response.status, body_preview: preview, ...logContext },
          'stt request failed',
        );
        throw new Error(`stt error ${response.status}: ${preview}`);
      }

      const parsed = TranscriptionSchema.safeParse(await response.json());
      const text = parsed.success ? (parsed.data.text ?? '').trim() : '';
      log.info(
        {
          event: 'stt_transcribed',
          wav_bytes: wav.length,
          audio_ms: audio.durationMs,
          text_len: text.length,
          duration_ms: Date.now() - startedAt,
          ...logContext,
        },
        'stt transcribed',
      );
      return text;
    } finally {
      linked.dispose();
    }
  }
}
