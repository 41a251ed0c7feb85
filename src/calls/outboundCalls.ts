import { z } from 'zod';
import type { VoiceConfig } from '../config/voiceConfig';
import { log } from '../log';
import type { CallControl, DialResult } from '../telnyx/types';
import type { CallRecordStore } from './callRecords';
import type { SessionBackends } from './callSession';
import { generateGreeting } from './greeting';
import { PreloadQueue, type PreloadBroker } from './preloadBroker';
import { generateStreamId, type StreamRegistry } from './streamRegistry';

export const OutboundCallRequestSchema = z.object({
  to: z.string().min(1),
  from: z.string().min(1).optional(),
  prompt: z.string().min(1).optional(),
  delayMs: z.number().int().nonnegative().max(60_000).optional(),
  userId: z.string().min(1).optional(),
  chatId: z.string().min(1).optional(),
});

export type OutboundCallRequest = z.infer<typeof OutboundCallRequestSchema>;

export interface OutboundCallResult {
  status: 'initiated';
  callControlId: string;
  recordId: string | null;
  streamId: string;
}

export class CallInitiationError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'CallInitiationError';
  }
}

export interface OutboundCallDeps {
  registry: StreamRegistry;
  preloads: PreloadBroker;
  callControl: CallControl;
  records: CallRecordStore;
  loadConfig: () => Promise<Readonly<VoiceConfig>>;
  createBackends: (config: Readonly<VoiceConfig>) => SessionBackends;
  buildStreamUrl: (streamId: string) => string;
  connectionId?: string;
  defaultFrom?: string;
}

/**
 * Places a call whose media stream connects back to this service. The
 * greeting (when a prompt is given) is generated before dialling so it is
 * ready the moment the stream starts.
 */
export async function initiateCall(request: OutboundCallRequest, deps: OutboundCallDeps): Promise<OutboundCallResult> {
  const from = request.from ?? deps.defaultFrom;
  if (!from) {
    throw new CallInitiationError('from_number_missing', 400);
  }
  if (!deps.connectionId) {
    throw new CallInitiationError('connection_id_missing', 503);
  }

  const config = await deps.loadConfig();
  const reservation = deps.registry.reserve(generateStreamId());
  const streamId = reservation.streamId;
  const logContext = { stream_id: streamId, to: request.to };

  let queue: PreloadQueue | null = null;
  if (request.prompt) {
    queue = new PreloadQueue(`pending:${streamId}`);
    const backends = deps.createBackends(config);
    const ready = await generateGreeting({
      config,
      callGoal: request.prompt,
      userId: request.userId,
      chatId: request.chatId,
      chat: backends.chat,
      tts: backends.tts,
      queue,
      logContext,
    });
    if (!ready && queue.pendingCount === 0) {
      queue = null;
    }
  }

  let dial: DialResult;
  try {
    dial = await deps.callControl.dial({
      to: request.to,
      from,
      connectionId: deps.connectionId,
      streamUrl: deps.buildStreamUrl(streamId),
      codec: config.codec,
    });
  } catch (error) {
    reservation.cancel();
    queue?.close();
    log.error({ event: 'outbound_dial_failed', err: error, ...logContext }, 'outbound dial failed');
    try {
      await deps.records.create({
        direction: 'outbound',
        from,
        to: request.to,
        status: 'failed',
        assignedUserId: request.userId,
        error: error instanceof Error ? error.message : String(error),
      });
    } catch (recordError) {
      log.error({ event: 'call_record_create_failed', err: recordError, ...logContext }, 'call record create failed');
    }
    throw new CallInitiationError('dial_failed', 502, { cause: error });
  }

  const callControlId = dial.callControlId;
  if (queue) {
    try {
      deps.preloads.adopt(callControlId, queue);
    } catch (error) {
      log.error({ event: 'preload_adopt_failed', err: error, call_control_id: callControlId }, 'greeting not registered');
      queue = null;
    }
  }

  let recordId: string | null = null;
  try {
    const record = await deps.records.create({
      callControlId,
      direction: 'outbound',
      from,
      to: request.to,
      status: 'initiated',
      assignedUserId: request.userId,
    });
    recordId = record.id;
  } catch (error) {
    log.error({ event: 'call_record_create_failed', err: error, call_control_id: callControlId }, 'call record create failed');
  }

  reservation.commit({
    callControlId,
    recordId: recordId ?? undefined,
    direction: 'outbound',
    initialPrompt: request.prompt,
    maxDurationMs: config.maxCallDurationSeconds * 1000,
    limitMessage: config.callLimitMessage,
    initialDelayMs: request.delayMs ?? 0,
    expectsGreeting: queue !== null,
    userId: request.userId,
    chatId: request.chatId,
  });

  log.info(
    { event: 'outbound_call_initiated', call_control_id: callControlId, record_id: recordId, greeting: queue !== null, ...logContext },
    'outbound call initiated',
  );
  return { status: 'initiated', callControlId, recordId, streamId };
}
