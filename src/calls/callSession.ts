import { setTimeout as delay } from 'timers/promises';
import type { ChatBackend } from '../ai/chatClient';
import { decodeInboundPayload, silenceFrames } from '../audio/codecs';
import { buildMediaMessage } from '../audio/outboundTranscoder';
import { TurnSegmenter } from '../audio/turnSegmenter';
import type { AlertNotifier } from '../alerts/channelAlerts';
import type { VoiceConfig } from '../config/voiceConfig';
import { log } from '../log';
import { SocketClosedError, type MediaSocket } from '../media/mediaSocket';
import { normalizeTelnyxTrack, parseStreamEvent, type MediaEvent } from '../media/streamEvents';
import {
  incInboundAudioFrames,
  incInboundAudioFramesDropped,
  incOutboundAudioFrames,
  incStageError,
  recordCallMetrics,
  startStageTimer,
} from '../metrics';
import type { SpeechToText } from '../stt/transcribeClient';
import type { CallControl } from '../telnyx/types';
import type { TextToSpeech } from '../tts/speechStream';
import { linkSignal } from '../utils/abort';
import type { CallRecord, CallRecordStore } from './callRecords';
import { ConversationEngine, type TurnTiming } from './conversationEngine';
import { computeHangupDelayMs } from './playbackTiming';
import type { PreloadBroker } from './preloadBroker';
import { SpeakingGate } from './speakingGate';
import { playSpeech, type AudioSink } from './speech';
import { TaskScope } from './taskScope';
import type { CallContext, CallSessionState, CloseReason } from './types';

export interface SessionTiming {
  handshakeTimeoutMs: number;
  /** Silence answered to the provider's `connected` event. */
  connectedSilenceMs: number;
  /** Silence the sender emits before any delay or greeting. */
  senderSilenceMs: number;
  /** Spacing between paced silence frames; 0 sends them back to back. */
  framePacingMs: number;
  preloadPollIntervalMs: number;
  /** Kept after the greeting's estimated playback before the caller may speak. */
  senderTailMs: number;
  /** Buffer after the limit message's estimated playback before hanging up. */
  limitBufferMs: number;
  turn: Partial<TurnTiming>;
}

export const DEFAULT_SESSION_TIMING: SessionTiming = {
  handshakeTimeoutMs: 10_000,
  connectedSilenceMs: 1000,
  senderSilenceMs: 500,
  framePacingMs: 20,
  preloadPollIntervalMs: 100,
  senderTailMs: 2000,
  limitBufferMs: 100,
  turn: {},
};

export interface SessionBackends {
  stt: SpeechToText;
  tts: TextToSpeech;
  chat: ChatBackend;
}

export interface CallSessionDeps {
  socket: MediaSocket;
  streamId: string;
  context: CallContext;
  config: Readonly<VoiceConfig>;
  backends: SessionBackends;
  callControl: CallControl;
  preloads: PreloadBroker;
  records: CallRecordStore;
  alerts?: AlertNotifier | null;
  timing?: Partial<SessionTiming>;
  now?: () => number;
}

export interface SessionStats {
  framesReceived: number;
  framesDropped: number;
  framesSegmented: number;
  framesSent: number;
  malformedFrames: number;
  utterancesDiscarded: number;
  turnsSpawned: number;
}

export interface SessionSummary {
  reason: CloseReason;
  activated: boolean;
  durationSeconds: number | null;
  turns: number;
  record: CallRecord | null;
}

/**
 * Supervises one media socket: handshake, the receive loop, the initial-audio
 * sender, the duration monitor and conversation turns, then teardown and
 * persistence. run() never rejects.
 */
export class CallSession {
  public readonly callControlId: string;
  private readonly deps: CallSessionDeps;
  private readonly timing: SessionTiming;
  private readonly now: () => number;
  private readonly gate = new SpeakingGate();
  private readonly segmenter: TurnSegmenter;
  private readonly engine: ConversationEngine;
  private readonly workers: TaskScope;
  private readonly monitor: TaskScope;
  private readonly lifetime = new AbortController();
  private readonly counters: SessionStats = {
    framesReceived: 0,
    framesDropped: 0,
    framesSegmented: 0,
    framesSent: 0,
    malformedFrames: 0,
    utterancesDiscarded: 0,
    turnsSpawned: 0,
  };
  private sessionState: CallSessionState = 'handshaking';
  private closeReason: CloseReason | null = null;
  private mediaSessionId: string | null = null;
  private activeAt: number | null = null;
  private limitReached = false;
  private readonly sink: AudioSink = { send: (payload) => this.sendPayload(payload) };

  constructor(deps: CallSessionDeps) {
    this.deps = deps;
    this.callControlId = deps.context.callControlId;
    this.timing = { ...DEFAULT_SESSION_TIMING, ...deps.timing };
    this.now = deps.now ?? Date.now;
    this.segmenter = new TurnSegmenter(deps.config.vad);
    this.workers = new TaskScope('session_workers', this.logContext);
    this.monitor = new TaskScope('session_monitor', this.logContext);
    this.engine = new ConversationEngine({
      config: deps.config,
      context: deps.context,
      chat: deps.backends.chat,
      tts: deps.backends.tts,
      callControl: deps.callControl,
      sink: this.sink,
      closeCall: (reason) => this.closeSocket(reason),
      timing: this.timing.turn,
      logContext: this.logContext,
      now: this.now,
    });
  }

  get state(): CallSessionState {
    return this.sessionState;
  }

  get stats(): Readonly<SessionStats> {
    return { ...this.counters };
  }

  get speakingState(): SpeakingGate['state'] {
    return this.gate.state;
  }

  get transcript(): string {
    return this.engine.transcript;
  }

  get logContext(): Record<string, unknown> {
    return {
      call_control_id: this.callControlId,
      stream_id: this.deps.streamId,
      media_session_id: this.mediaSessionId ?? undefined,
      direction: this.deps.context.direction,
    };
  }

  /** Asks a running session to end; run() settles once teardown is done. */
  async stop(reason: CloseReason = 'shutdown'): Promise<void> {
    await this.closeSocket(reason);
  }

  async run(): Promise<SessionSummary> {
    let started = false;
    try {
      started = await this.handshake();
      if (started) {
        this.activate();
        await this.receiveLoop();
      }
    } catch (error) {
      this.closeReason ??= 'error';
      log.error({ event: 'session_failed', err: error, ...this.logContext }, 'call session failed');
    }

    if (!started) {
      this.lifetime.abort();
      await this.deps.socket.close(1000, this.closeReason ?? 'handshake_failed');
      this.sessionState = 'closed';
      log.info(
        { event: 'session_closed_before_active', reason: this.closeReason, ...this.logContext },
        'session closed before media became active',
      );
      return {
        reason: this.closeReason ?? 'handshake_failed',
        activated: false,
        durationSeconds: null,
        turns: 0,
        record: null,
      };
    }

    return this.terminate();
  }

  private async handshake(): Promise<boolean> {
    const deadline = linkSignal(undefined, this.timing.handshakeTimeoutMs);
    try {
      while (true) {
        const text = await this.deps.socket.receive(deadline.signal);
        if (text === null) {
          this.closeReason ??= 'socket_closed';
          return false;
        }

        const parsed = parseStreamEvent(text);
        if (!parsed.ok) {
          this.closeReason = 'handshake_failed';
          log.warn({ event: 'handshake_invalid_frame', error: parsed.error, ...this.logContext }, 'handshake frame invalid');
          return false;
        }

        const event = parsed.event;
        if (event.event === 'connected') {
          await this.sendSilence(this.timing.connectedSilenceMs, deadline.signal);
          continue;
        }
        if (event.event === 'start') {
          if (!event.stream_id) {
            this.closeReason = 'handshake_failed';
            log.warn({ event: 'handshake_start_missing_id', ...this.logContext }, 'start event without stream id');
            return false;
          }
          this.mediaSessionId = event.stream_id;
          log.info({ event: 'handshake_complete', ...this.logContext }, 'media handshake complete');
          return true;
        }
        if (event.event === 'media' && event.stream_id) {
          // the frame that carried the id is not processed
          this.mediaSessionId = event.stream_id;
          log.info({ event: 'handshake_media_before_start', ...this.logContext }, 'media before start, assuming started');
          return true;
        }
        if (event.event === 'stop') {
          this.closeReason = 'stop_event';
          return false;
        }
      }
    } catch (error) {
      if (deadline.signal.aborted) {
        this.closeReason = 'handshake_timeout';
        log.warn({ event: 'handshake_timeout', ...this.logContext }, 'media handshake timed out');
        return false;
      }
      if (error instanceof SocketClosedError) {
        this.closeReason = 'socket_closed';
        return false;
      }
      throw error;
    } finally {
      deadline.dispose();
    }
  }

  private activate(): void {
    this.sessionState = 'active';
    this.activeAt = this.now();

    const releaseSender = this.gate.acquire('sender');
    this.workers.spawn('sender', async (signal) => {
      try {
        await this.runSender(signal);
      } finally {
        releaseSender();
      }
    });
    this.monitor.spawn('duration_monitor', (signal) => this.runMonitor(signal));

    log.info(
      { event: 'session_active', max_duration_ms: this.deps.context.maxDurationMs, ...this.logContext },
      'call session active',
    );
  }

  private async receiveLoop(): Promise<void> {
    while (true) {
      const text = await this.deps.socket.receive();
      if (text === null) {
        this.closeReason ??= 'socket_closed';
        return;
      }

      const parsed = parseStreamEvent(text);
      if (!parsed.ok) {
        this.counters.malformedFrames += 1;
        log.debug({ event: 'media_frame_invalid', error: parsed.error, ...this.logContext }, 'media frame invalid');
        continue;
      }

      const event = parsed.event;
      if (event.event === 'stop') {
        this.closeReason ??= 'stop_event';
        log.info({ event: 'media_stop', ...this.logContext }, 'media stop received');
        return;
      }
      if (event.event === 'media') {
        await this.onMedia(event);
      }
    }
  }

  private async onMedia(event: MediaEvent): Promise<void> {
    if (normalizeTelnyxTrack(event.media.track) === 'outbound') {
      incInboundAudioFramesDropped('outbound_track');
      return;
    }

    this.counters.framesReceived += 1;
    incInboundAudioFrames();

    if (this.gate.isHeld || this.limitReached) {
      this.counters.framesDropped += 1;
      incInboundAudioFramesDropped('bot_speaking');
      return;
    }

    let pcm: Buffer;
    try {
      pcm = decodeInboundPayload(event.media.payload, this.deps.config.codec);
    } catch (error) {
      incInboundAudioFramesDropped('decode_error');
      log.debug({ event: 'media_decode_failed', err: error, ...this.logContext }, 'media decode failed');
      return;
    }

    this.counters.framesSegmented += 1;
    const decision = this.segmenter.push(pcm);
    if (!decision) {
      return;
    }
    if (decision.kind === 'discard') {
      this.counters.utterancesDiscarded += 1;
      log.debug({ event: 'vad_discard', duration_ms: decision.durationMs, ...this.logContext }, 'noise discarded');
      return;
    }

    log.info(
      { event: 'vad_dispatch', reason: decision.reason, duration_ms: decision.durationMs, ...this.logContext },
      'utterance detected',
    );
    await this.handleUtterance(decision.wav);
  }

  private async handleUtterance(wav: Buffer): Promise<void> {
    let text: string;
    const endTimer = startStageTimer('stt');
    try {
      text = await this.deps.backends.stt.transcribe(wav, {
        timeoutMs: this.deps.config.sttTimeoutMs,
        signal: this.lifetime.signal,
        logContext: this.logContext,
      });
    } catch (error) {
      if (!this.lifetime.signal.aborted) {
        incStageError('stt');
        log.warn({ event: 'stt_failed', err: error, ...this.logContext }, 'transcription failed');
      }
      return;
    } finally {
      endTimer();
    }

    if (!text) {
      log.info({ event: 'stt_empty', ...this.logContext }, 'transcription empty');
      return;
    }
    if (this.sessionState !== 'active' || this.lifetime.signal.aborted || this.limitReached) {
      log.info({ event: 'stt_after_close', ...this.logContext }, 'transcript arrived after close, ignored');
      return;
    }

    log.info(
      { event: 'stt_transcript', transcript_preview: text.slice(0, 160), ...this.logContext },
      'caller transcript',
    );
    this.spawnTurn(text);
  }

  private spawnTurn(text: string): void {
    const release = this.gate.acquire('turn');
    this.counters.turnsSpawned += 1;
    const turnNumber = this.counters.turnsSpawned;

    this.workers.spawn(`turn_${turnNumber}`, async (signal) => {
      try {
        const outcome = await this.engine.runTurn(text, signal);
        log.info({ event: 'turn_complete', outcome: outcome.kind, turn: turnNumber, ...this.logContext }, 'turn complete');
      } finally {
        release();
      }
    });
  }

  private async runSender(signal: AbortSignal): Promise<void> {
    const { context, config } = this.deps;
    await this.sendSilence(this.timing.senderSilenceMs, signal);
    if (context.initialDelayMs > 0) {
      await this.sendSilence(context.initialDelayMs, signal);
    }
    if (!context.expectsGreeting) {
      return;
    }

    const queue = await this.deps.preloads.waitFor(this.callControlId, {
      maxWaitMs: config.llmTimeoutMs + config.ttsTimeoutMs,
      pollIntervalMs: this.timing.preloadPollIntervalMs,
      signal,
    });
    if (!queue) {
      log.warn({ event: 'preload_not_found', ...this.logContext }, 'greeting never arrived');
      return;
    }

    let emittedBytes = 0;
    let frames = 0;
    let startedAt: number | null = null;
    try {
      for await (const payload of queue.drain(signal)) {
        startedAt ??= this.now();
        await this.sendPayload(payload);
        emittedBytes += payload.length;
        frames += 1;
      }
    } finally {
      this.deps.preloads.discard(this.callControlId, queue);
    }

    log.info({ event: 'preload_drained', frames, audio_bytes: emittedBytes, ...this.logContext }, 'greeting played');
    if (frames > 0 && queue.greetingText) {
      this.engine.recordAssistantSpeech(queue.greetingText);
    }

    const waitMs = computeHangupDelayMs({
      codec: config.codec,
      emittedBytes,
      speechStartedAt: startedAt,
      now: this.now(),
      bufferMs: this.timing.senderTailMs,
    });
    await delay(waitMs, undefined, { signal });
  }

  private async runMonitor(signal: AbortSignal): Promise<void> {
    const { context, config } = this.deps;
    await delay(context.maxDurationMs, undefined, { signal });

    this.limitReached = true;
    this.closeReason ??= 'max_duration';
    log.warn({ event: 'call_duration_limit', max_duration_ms: context.maxDurationMs, ...this.logContext }, 'call duration limit reached');

    await this.workers.cancelAll();
    const release = this.gate.acquire('monitor');
    try {
      let waitMs = this.timing.limitBufferMs;
      try {
        const playback = await playSpeech({
          text: context.limitMessage,
          tts: this.deps.backends.tts,
          sink: this.sink,
          codec: config.codec,
          voiceId: config.voiceId,
          timeoutMs: config.ttsTimeoutMs,
          signal,
          logContext: this.logContext,
          now: this.now,
        });
        waitMs = computeHangupDelayMs({
          codec: config.codec,
          emittedBytes: playback.emittedBytes,
          speechStartedAt: playback.startedAt,
          now: this.now(),
          bufferMs: this.timing.limitBufferMs,
        });
      } catch (error) {
        signal.throwIfAborted();
        log.warn({ event: 'limit_message_failed', err: error, ...this.logContext }, 'limit message not played');
      }
      await delay(waitMs, undefined, { signal });

      try {
        await this.deps.callControl.hangup(this.callControlId);
      } catch (error) {
        log.warn({ event: 'limit_hangup_failed', err: error, ...this.logContext }, 'provider hangup failed');
      }
    } finally {
      release();
    }
    await this.closeSocket('max_duration');
  }

  private async terminate(): Promise<SessionSummary> {
    this.sessionState = 'terminating';
    const reason = this.closeReason ?? 'socket_closed';
    log.info({ event: 'session_terminating', reason, ...this.logContext }, 'call session terminating');

    this.lifetime.abort();
    await this.workers.cancelAll();
    await this.monitor.cancelAll();
    await this.deps.socket.close(1000, reason);
    this.sessionState = 'closed';

    const activeAt = this.activeAt ?? this.now();
    const durationMs = Math.max(0, this.now() - activeAt);
    const durationSeconds = Math.floor(durationMs / 1000);

    const record = await this.persist(durationSeconds);
    if (record) {
      await this.alert(record);
    }

    recordCallMetrics({
      direction: this.deps.context.direction,
      reason,
      durationMs,
      turns: this.engine.turns,
    });
    log.info(
      { event: 'session_closed', reason, duration_s: durationSeconds, turns: this.engine.turns, ...this.logContext },
      'call session closed',
    );

    return { reason, activated: true, durationSeconds, turns: this.engine.turns, record };
  }

  private async persist(durationSeconds: number): Promise<CallRecord | null> {
    const { records, context, config } = this.deps;
    const cost = Math.round(((durationSeconds / 60) * config.costPerMinute) * 1e6) / 1e6;

    try {
      const byId = context.recordId ? await records.get(context.recordId) : null;
      const record = byId ?? (await records.findLatestByCallControlId(this.callControlId));
      if (!record) {
        log.warn({ event: 'call_record_missing', record_id: context.recordId, ...this.logContext }, 'call record not found');
        return null;
      }

      const updated = await records.update(record.id, {
        status: 'completed',
        durationSeconds,
        transcript: this.engine.transcript,
        cost,
      });
      log.info(
        { event: 'call_record_completed', record_id: record.id, duration_s: durationSeconds, cost, ...this.logContext },
        'call record completed',
      );
      return updated;
    } catch (error) {
      log.error({ event: 'call_record_update_failed', err: error, ...this.logContext }, 'call record update failed');
      return null;
    }
  }

  private async alert(record: CallRecord): Promise<void> {
    const alerts = this.deps.alerts;
    if (!alerts || record.direction !== 'inbound' || !record.assignedUserId) {
      return;
    }
    try {
      await alerts.notifyInboundCall(record);
    } catch (error) {
      log.warn({ event: 'alert_failed', err: error, ...this.logContext }, 'inbound call alert failed');
    }
  }

  private async closeSocket(reason: CloseReason): Promise<void> {
    this.closeReason ??= reason;
    this.lifetime.abort();
    await this.deps.socket.close(1000, reason);
  }

  private async sendPayload(payload: Buffer): Promise<void> {
    await this.deps.socket.send(buildMediaMessage(this.mediaSessionId ?? this.deps.streamId, payload));
    this.counters.framesSent += 1;
    incOutboundAudioFrames();
  }

  private async sendSilence(durationMs: number, signal: AbortSignal): Promise<void> {
    for (const frame of silenceFrames(durationMs, this.deps.config.codec)) {
      signal.throwIfAborted();
      await this.sendPayload(frame);
      if (this.timing.framePacingMs > 0) {
        await delay(this.timing.framePacingMs, undefined, { signal });
      }
    }
  }
}
