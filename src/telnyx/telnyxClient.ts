import { env } from '../env';
import { log } from '../log';
import { isAbortError } from '../utils/abort';
import {
  type AnswerRequest,
  type CallControl,
  type DialRequest,
  type DialResult,
  DialResponseSchema,
  type StreamTrack,
} from './types';

const TELNYX_BASE_URL = 'https://api.telnyx.com/v2';
const TELNYX_TIMEOUT_MS = 8000;
const TELNYX_MAX_RETRIES = 2;

// Retry backoff tuning (keep small; call-control is latency-sensitive)
const TELNYX_RETRY_BASE_MS = 250;
const TELNYX_RETRY_MAX_MS = 1500;

export type CallControlError = Error & { status?: number; responseBody?: unknown };

export interface TelnyxClientOptions {
  apiKey?: string;
  baseUrl?: string;
  streamTrack?: StreamTrack;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseMs?: number;
  logContext?: Record<string, unknown>;
}

function maskTelnyxKey(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length <= 8) {
    return `${trimmed.slice(0, 2)}...${trimmed.slice(-2)}`;
  }
  return `${trimmed.slice(0, 4)}...${trimmed.slice(-4)}`;
}

function shouldRetry(status: number): boolean {
  return status === 429 || status >= 500;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function truncateForLog(value: unknown, max = 800): string {
  try {
    const s = typeof value === 'string' ? value : JSON.stringify(value);
    if (s.length <= max) return s;
    return `${s.slice(0, max)}…(truncated)`;
  } catch {
    return '[unserializable]';
  }
}

export function isCallEndedResponse(status: number, body: unknown): boolean {
  if (status !== 422) {
    return false;
  }
  return /already ended|no longer active/i.test(truncateForLog(body, 4000));
}

function callControlError(message: string, status: number, body: unknown): CallControlError {
  const error: CallControlError = new Error(message);
  error.status = status;
  error.responseBody = body;
  return error;
}

async function safeReadBody(response: Response): Promise<unknown> {
  const contentType = response.headers.get('content-type') ?? '';
  if (contentType.includes('application/json')) {
    try {
      return await response.json();
    } catch (error) {
      log.debug({ event: 'telnyx_body_not_json', err: error }, 'telnyx body not json, reading text');
    }
  }
  try {
    return await response.text();
  } catch (e) {
    return `<<failed to read response body: ${String(e)}>>`;
  }
}

export function redactStreamUrl(streamUrl: string): string {
  try {
    const parsed = new URL(streamUrl);
    if (parsed.searchParams.has('token')) {
      parsed.searchParams.set('token', '[redacted]');
    }
    return parsed.toString();
  } catch {
    return streamUrl.replace(/token=[^&]+/g, 'token=[redacted]');
  }
}

export class TelnyxClient implements CallControl {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly streamTrack: StreamTrack;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;
  private readonly logContext: Record<string, unknown>;

  constructor(options: TelnyxClientOptions = {}) {
    this.apiKey = options.apiKey ?? env.TELNYX_API_KEY;
    this.baseUrl = (options.baseUrl ?? TELNYX_BASE_URL).replace(/\/+$/, '');
    this.streamTrack = options.streamTrack ?? env.TELNYX_STREAM_TRACK;
    this.timeoutMs = options.timeoutMs ?? TELNYX_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? TELNYX_MAX_RETRIES;
    this.retryBaseMs = options.retryBaseMs ?? TELNYX_RETRY_BASE_MS;
    this.logContext = options.logContext ?? {};
  }

  public async dial(request: DialRequest): Promise<DialResult> {
    const body: Record<string, unknown> = {
      connection_id: request.connectionId,
      to: request.to,
      from: request.from,
    };
    if (request.streamUrl) {
      Object.assign(body, this.streamParams(request.streamUrl, 'rtp', request.codec));
    }

    const responseBody = await this.requestWithRetry('/calls', body, 'dial', {});
    const parsed = DialResponseSchema.safeParse(responseBody);
    if (!parsed.success) {
      throw new Error(`Telnyx dial response missing call_control_id: ${truncateForLog(responseBody)}`);
    }

    const callControlId = parsed.data.data.call_control_id;
    log.info(
      { event: 'telnyx_dial', call_control_id: callControlId, to: request.to, ...this.logContext },
      'telnyx call dialed',
    );
    return { callControlId };
  }

  public async answer(callControlId: string, request: AnswerRequest = {}): Promise<void> {
    const body = request.streamUrl
      ? this.streamParams(request.streamUrl, request.mode ?? 'rtp', request.codec)
      : undefined;
    await this.callControlAction(callControlId, 'answer', body);
    log.info(
      { event: 'telnyx_answer_call', call_control_id: callControlId, ...this.logContext },
      'telnyx call answered',
    );
  }

  public async hangup(callControlId: string): Promise<void> {
    await this.callControlAction(callControlId, 'hangup', undefined);
    log.info(
      { event: 'telnyx_hangup_call', call_control_id: callControlId, ...this.logContext },
      'telnyx call hangup',
    );
  }

  private streamParams(
    streamUrl: string,
    mode: 'rtp' | 'mp3',
    codec: AnswerRequest['codec'],
  ): Record<string, unknown> {
    const params: Record<string, unknown> = {
      stream_url: streamUrl,
      stream_track: this.streamTrack,
      stream_bidirectional_mode: mode,
    };
    if (codec) {
      params.stream_bidirectional_codec = codec;
    }
    return params;
  }

  private async callControlAction(
    callControlId: string,
    action: string,
    body: Record<string, unknown> | undefined,
  ): Promise<unknown> {
    const path = `/calls/${encodeURIComponent(callControlId)}/actions/${action}`;
    try {
      return await this.requestWithRetry(path, body, action, { call_control_id: callControlId });
    } catch (error) {
      const status = error instanceof Error && 'status' in error ? error.status : undefined;
      const responseBody = error instanceof Error && 'responseBody' in error ? error.responseBody : undefined;
      if (typeof status === 'number' && isCallEndedResponse(status, responseBody)) {
        log.warn(
          {
            event: 'telnyx_call_control_ignored_post_end',
            action,
            call_control_id: callControlId,
            status,
            ...this.logContext,
          },
          'telnyx call-control ignored post end',
        );
        return responseBody;
      }
      throw error;
    }
  }

  private backoffMs(attempt: number): number {
    const exp = Math.min(TELNYX_RETRY_MAX_MS, this.retryBaseMs * Math.pow(2, attempt));
    const jitter = Math.floor(Math.random() * Math.min(120, this.retryBaseMs));
    return exp + jitter;
  }

  private async requestWithRetry(
    path: string,
    body: Record<string, unknown> | undefined,
    action: string,
    context: Record<string, unknown>,
    attempt = 0,
  ): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const startedAt = Date.now();
    const logContext = { action, attempt, ...context, ...this.logContext };

    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.apiKey}`,
      Accept: 'application/json',
      'User-Agent': 'voice-bridge-runtime/0.1.0',
    };
    let payload: string | undefined;
    if (body && Object.keys(body).length > 0) {
      headers['Content-Type'] = 'application/json';
      payload = JSON.stringify(body);
    }

    log.info(
      {
        event: 'telnyx_call_control_request',
        telnyx_api_key_fingerprint: maskTelnyxKey(this.apiKey),
        stream_url: typeof body?.stream_url === 'string' ? redactStreamUrl(body.stream_url) : undefined,
        ...logContext,
      },
      'telnyx call-control request',
    );

    try {
      let response: Response;
      try {
        response = await fetch(url, { method: 'POST', headers, body: payload, signal: controller.signal });
      } catch (error) {
        // Abort should NOT be retried (usually means the API is slow or our timeout too low)
        if (!isAbortError(error) && attempt < this.maxRetries) {
          const waitMs = this.backoffMs(attempt);
          log.warn(
            { event: 'telnyx_call_control_error_retry', wait_ms: waitMs, err: error, ...logContext },
            'telnyx call-control error retry',
          );
          await sleep(waitMs);
          return this.requestWithRetry(path, body, action, context, attempt + 1);
        }
        log.error({ event: 'telnyx_call_control_error', err: error, ...logContext }, 'telnyx call-control error');
        throw error;
      }

      const responseBody = await safeReadBody(response);
      const durationMs = Date.now() - startedAt;

      if (!response.ok) {
        const logBody = truncateForLog(responseBody, 1000);

        if (shouldRetry(response.status) && attempt < this.maxRetries) {
          const waitMs = this.backoffMs(attempt);
          log.warn(
            {
              event: 'telnyx_call_control_retry',
              status: response.status,
              duration_ms: durationMs,
              wait_ms: waitMs,
              body: logBody,
              ...logContext,
            },
            'telnyx call-control retry',
          );
          await sleep(waitMs);
          return this.requestWithRetry(path, body, action, context, attempt + 1);
        }

        log.error(
          {
            event: 'telnyx_call_control_failed',
            status: response.status,
            duration_ms: durationMs,
            body: logBody,
            ...logContext,
          },
          'telnyx call-control failed',
        );
        throw callControlError(
          `Telnyx ${action} failed: ${response.status} ${truncateForLog(responseBody, 1200)}`,
          response.status,
          responseBody,
        );
      }

      log.info(
        { event: 'telnyx_call_control_completed', status: response.status, duration_ms: durationMs, ...logContext },
        'telnyx call-control completed',
      );
      return responseBody;
    } finally {
      clearTimeout(timer);
    }
  }
}
