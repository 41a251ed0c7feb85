import { z } from 'zod';
import type { CallRecord } from '../calls/callRecords';
import { log } from '../log';

const ALERT_TIMEOUT_MS = 5000;

/** Out-of-band notice for a finished inbound call. Must never throw. */
export interface AlertNotifier {
  notifyInboundCall(record: CallRecord): Promise<boolean>;
}

/** Where resolved channel ids are remembered between calls. */
export interface ChannelIdCache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
}

export interface ChannelAlertOptions {
  baseUrl: string;
  adminToken: string;
  channelName: string;
  cache: ChannelIdCache;
  cachePrefix: string;
  timeoutMs?: number;
}

const ChannelSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().default(''),
    user_id: z.string().nullish(),
    user_ids: z.array(z.string()).nullish(),
  })
  .passthrough();

const ChannelListSchema = z.array(ChannelSchema);
const CreatedChannelSchema = z.object({ id: z.string().min(1) }).passthrough();

export function formatInboundAlert(record: CallRecord): string {
  return [
    '**Inbound Call Alert**',
    '',
    `**From:** ${record.from}`,
    `**To:** ${record.to}`,
    `**Duration:** ${record.durationSeconds ?? 0}s`,
    `**Status:** ${record.status}`,
    '',
    '**Transcription:**',
    record.transcript && record.transcript.trim() !== '' ? record.transcript : '(No transcription available)',
  ].join('\n');
}

/**
 * Posts call summaries into a per-user chat channel, finding or creating a
 * private channel with the configured name the first time.
 */
export class ChannelAlertNotifier implements AlertNotifier {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly options: ChannelAlertOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? ALERT_TIMEOUT_MS;
  }

  public async notifyInboundCall(record: CallRecord): Promise<boolean> {
    const userId = record.assignedUserId;
    if (!userId) {
      return false;
    }
    const logContext = { record_id: record.id, call_control_id: record.callControlId, user_id: userId };

    try {
      const channelId = await this.resolveChannel(userId);
      if (!channelId) {
        log.warn({ event: 'alert_channel_unavailable', ...logContext }, 'alert channel unavailable');
        return false;
      }

      await this.request('POST', `/api/v1/channels/${encodeURIComponent(channelId)}/messages/post`, {
        content: formatInboundAlert(record),
      });
      log.info({ event: 'alert_sent', channel_id: channelId, ...logContext }, 'inbound call alert sent');
      return true;
    } catch (error) {
      log.warn({ event: 'alert_failed', err: error, ...logContext }, 'inbound call alert failed');
      return false;
    }
  }

  private async resolveChannel(userId: string): Promise<string | null> {
    const cacheKey = `${this.options.cachePrefix}:${userId}:${this.options.channelName.toLowerCase()}`;
    const cached = await this.options.cache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const channelId = (await this.findChannel(userId)) ?? (await this.createChannel(userId));
    if (channelId) {
      await this.options.cache.set(cacheKey, channelId);
    }
    return channelId;
  }

  private async findChannel(userId: string): Promise<string | null> {
    const parsed = ChannelListSchema.safeParse(await this.request('GET', '/api/v1/channels/'));
    if (!parsed.success) {
      return null;
    }
    const wanted = this.options.channelName.toLowerCase();
    const match = parsed.data.find(
      (channel) =>
        channel.name.toLowerCase() === wanted &&
        ((channel.user_ids ?? []).includes(userId) || channel.user_id === userId),
    );
    return match?.id ?? null;
  }

  private async createChannel(userId: string): Promise<string | null> {
    const created = CreatedChannelSchema.safeParse(
      await this.request('POST', '/api/v1/channels/create', {
        name: this.options.channelName,
        description: 'Phone call alerts',
        is_private: true,
        user_ids: [userId],
        access_control: {},
      }),
    );
    return created.success ? created.data.id : null;
  }

  private async request(method: 'GET' | 'POST', path: string, body?: unknown): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: {
          Authorization: `Bearer ${this.options.adminToken}`,
          'Content-Type': 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      if (!response.ok) {
        const text = await response.text();
        throw new Error(`alert ${method} ${path} failed ${response.status}: ${text.slice(0, 300)}`);
      }
      return await response.json();
    } finally {
      clearTimeout(timer);
    }
  }
}
