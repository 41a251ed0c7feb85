import { Router } from 'express';
import type { CallRecordStore } from '../calls/callRecords';
import type { SessionBackends } from '../calls/callSession';
import { generateGreeting } from '../calls/greeting';
import type { PreloadBroker, PreloadQueue } from '../calls/preloadBroker';
import { generateStreamId, type StreamRegistry } from '../calls/streamRegistry';
import type { VoiceConfig } from '../config/voiceConfig';
import { log } from '../log';
import { CallWebhookSchema, type CallControl, type CallWebhook } from '../telnyx/types';

export interface VoiceWebhookDeps {
  token: string;
  registry: StreamRegistry;
  preloads: PreloadBroker;
  callControl: CallControl;
  records: CallRecordStore;
  loadConfig: () => Promise<Readonly<VoiceConfig>>;
  createBackends: (config: Readonly<VoiceConfig>) => SessionBackends;
  buildStreamUrl: (streamId: string) => string;
  /** How long a handled inbound call id answers repeats with `duplicate` when no hangup arrives. */
  dedupeWindowMs?: number;
  now?: () => number;
}

const DEFAULT_DEDUPE_WINDOW_MS = 60 * 60_000;

export type WebhookStatus = 'answered' | 'rejected' | 'answer_failed' | 'duplicate' | 'ok' | 'ignored';

type CallPayload = CallWebhook['data']['payload'];

function isInbound(direction: string | undefined): boolean {
  return direction === undefined || direction === 'incoming' || direction === 'inbound';
}

export function createVoiceWebhookRouter(deps: VoiceWebhookDeps): Router {
  const router = Router();
  const now = deps.now ?? Date.now;
  const dedupeWindowMs = deps.dedupeWindowMs ?? DEFAULT_DEDUPE_WINDOW_MS;
  // inbound call id -> when its call.initiated was taken
  const handledCalls = new Map<string, number>();

  function claimInboundCall(callControlId: string): boolean {
    const at = now();
    for (const [id, handledAt] of handledCalls) {
      if (at - handledAt >= dedupeWindowMs) {
        handledCalls.delete(id);
      }
    }
    if (handledCalls.has(callControlId)) {
      return false;
    }
    handledCalls.set(callControlId, at);
    return true;
  }

  async function handleInboundCall(payload: CallPayload, requestId: string | undefined): Promise<WebhookStatus> {
    const callControlId = payload.call_control_id;
    const logContext = { call_control_id: callControlId, requestId };
    if (!claimInboundCall(callControlId)) {
      log.warn({ event: 'inbound_call_duplicate', ...logContext }, 'call.initiated already handled');
      return 'duplicate';
    }

    let answered = false;
    try {
      const status = await answerInboundCall(payload, logContext);
      answered = status === 'answered';
      return status;
    } finally {
      if (!answered) {
        handledCalls.delete(callControlId);
      }
    }
  }

  async function answerInboundCall(payload: CallPayload, logContext: Record<string, unknown>): Promise<WebhookStatus> {
    const callControlId = payload.call_control_id;
    const config = await deps.loadConfig();

    if (!config.inboundEnabled) {
      log.info({ event: 'inbound_call_rejected', ...logContext }, 'inbound calls disabled');
      return 'rejected';
    }

    const prompt = config.inboundSystemPrompt;
    let queue: PreloadQueue | null = null;
    if (prompt) {
      queue = deps.preloads.create(callControlId);
      const backends = deps.createBackends(config);
      generateGreeting({
        config,
        callGoal: prompt,
        userId: config.assignedUserId,
        chat: backends.chat,
        tts: backends.tts,
        queue,
        logContext,
      }).catch((error: unknown) => {
        log.error({ event: 'greeting_task_failed', err: error, ...logContext }, 'inbound greeting task failed');
      });
    }

    let recordId: string | undefined;
    try {
      const record = await deps.records.create({
        callControlId,
        direction: 'inbound',
        from: payload.from ?? 'unknown',
        to: payload.to ?? 'unknown',
        status: 'ringing',
        assignedUserId: config.assignedUserId,
      });
      recordId = record.id;
    } catch (error) {
      log.error({ event: 'call_record_create_failed', err: error, ...logContext }, 'call record create failed');
    }

    const streamId = generateStreamId();
    deps.registry.register(streamId, {
      callControlId,
      recordId,
      direction: 'inbound',
      initialPrompt: prompt,
      maxDurationMs: config.maxCallDurationSeconds * 1000,
      limitMessage: config.callLimitMessage,
      initialDelayMs: 0,
      expectsGreeting: queue !== null,
      userId: config.assignedUserId,
    });

    try {
      await deps.callControl.answer(callControlId, {
        streamUrl: deps.buildStreamUrl(streamId),
        mode: 'rtp',
        codec: config.codec,
      });
    } catch (error) {
      log.error({ event: 'inbound_answer_failed', err: error, stream_id: streamId, ...logContext }, 'inbound answer failed');
      deps.registry.release(streamId);
      deps.preloads.discard(callControlId, queue ?? undefined);
      if (recordId) {
        await deps.records
          .update(recordId, { status: 'failed', error: error instanceof Error ? error.message : String(error) })
          .catch((updateError: unknown) => {
            log.error({ event: 'call_record_update_failed', err: updateError, ...logContext }, 'call record update failed');
          });
      }
      return 'answer_failed';
    }

    log.info(
      { event: 'inbound_call_answered', stream_id: streamId, record_id: recordId, greeting: queue !== null, ...logContext },
      'inbound call answered',
    );
    return 'answered';
  }

  async function dispatch(body: unknown, requestId: string | undefined): Promise<WebhookStatus> {
    const parsed = CallWebhookSchema.safeParse(body);
    if (!parsed.success) {
      log.warn({ event: 'webhook_unparsed', requestId }, 'webhook payload not understood');
      return 'ignored';
    }

    const { event_type: eventType, payload } = parsed.data.data;
    const callControlId = payload.call_control_id;

    switch (eventType) {
      case 'call.initiated':
        if (isInbound(payload.direction)) {
          return handleInboundCall(payload, requestId);
        }
        return 'ok';
      case 'call.answered':
        log.info({ event: 'call_answered', call_control_id: callControlId, requestId }, 'call answered');
        return 'ok';
      case 'call.hangup':
        log.info(
          { event: 'call_hangup', call_control_id: callControlId, hangup_cause: payload.hangup_cause, requestId },
          'call hung up',
        );
        deps.preloads.discard(callControlId);
        handledCalls.delete(callControlId);
        return 'ok';
      default:
        return 'ignored';
    }
  }

  router.post('/', (req, res, next) => {
    const token = typeof req.query.token === 'string' ? req.query.token : undefined;
    const requestId = typeof res.locals.requestId === 'string' ? res.locals.requestId : undefined;
    if (token !== deps.token) {
      log.warn({ event: 'webhook_unauthorized', requestId }, 'webhook token rejected');
      res.status(403).json({ error: 'unauthorized' });
      return;
    }

    dispatch(req.body, requestId)
      .then((status) => {
        log.info({ event: 'webhook_ack', status, requestId }, 'voice webhook ack');
        res.status(200).json({ status });
      })
      .catch(next);
  });

  return router;
}
