import { log } from '../log';
import { linkSignal } from '../utils/abort';

export interface SynthesizeOptions {
  voiceId: string;
  timeoutMs: number;
  signal?: AbortSignal;
  logContext?: Record<string, unknown>;
}

/** Streaming speech synthesis: header-prefixed 16-bit PCM, chunk by chunk. */
export interface TextToSpeech {
  synthesize(text: string, options: SynthesizeOptions): AsyncIterable<Buffer>;
}

export function buildSpeechStreamUrl(base: string): string {
  const trimmed = base.replace(/\/+$/, '');
  return trimmed.endsWith('/v1/audio/speech/stream') ? trimmed : `${trimmed}/v1/audio/speech/stream`;
}

export class HttpSpeechStreamClient implements TextToSpeech {
  private readonly url: string;

  constructor(baseUrl: string) {
    this.url = buildSpeechStreamUrl(baseUrl);
  }

  /** The timeout bounds the whole stream, not only the response headers. */
  public async *synthesize(text: string, options: SynthesizeOptions): AsyncGenerator<Buffer> {
    const logContext = options.logContext ?? {};
    const linked = linkSignal(options.signal, options.timeoutMs);
    const startedAt = Date.now();
    let totalBytes = 0;

    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ input: text, voice: options.voiceId, response_format: 'wav' }),
        signal: linked.signal,
      });

      if (!response.ok) {
        const body = await response.text();
        log.error(
          { event: 'tts_request_failed', status: response.status, body: body.slice(0, 500), ...logContext },
          'tts request failed',
        );
        throw new Error(`tts error ${response.status}`);
      }
      if (!response.body) {
        throw new Error('tts response missing body');
      }

      const reader = response.body.getReader();
      let finished = false;
      try {
        while (true) {
          const { value, done } = await reader.read();
          if (done) {
            finished = true;
            break;
          }
          if (value && value.byteLength > 0) {
            totalBytes += value.byteLength;
            yield Buffer.from(value);
          }
        }
      } finally {
        if (finished) {
          reader.releaseLock();
        } else {
          // consumer stopped early or the read failed
          await reader.cancel().catch((error: unknown) => {
            log.debug({ event: 'tts_stream_cancel_failed', err: error, ...logContext }, 'tts stream cancel failed');
          });
        }
      }

      log.info(
        {
          event: 'tts_stream_done',
          text_len: text.length,
          audio_bytes: totalBytes,
          duration_ms: Date.now() - startedAt,
          ...logContext,
        },
        'tts stream done',
      );
    } finally {
      linked.dispose();
    }
  }
}
