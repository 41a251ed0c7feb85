import { setTimeout as delay } from 'timers/promises';
import type { ChatBackend, ChatMessage } from '../ai/chatClient';
import { extractHangupDirective } from '../ai/hangupDirective';
import { composeSystemPrompt } from '../ai/prompts';
import type { VoiceConfig } from '../config/voiceConfig';
import { log } from '../log';
import { SocketClosedError } from '../media/mediaSocket';
import { incStageError, startStageTimer } from '../metrics';
import type { CallControl } from '../telnyx/types';
import type { TextToSpeech } from '../tts/speechStream';
import { computeHangupDelayMs } from './playbackTiming';
import { playSpeech, type AudioSink } from './speech';
import type { CallContext, ConversationTurn } from './types';

export interface TurnTiming {
  prePadMs: number;
  echoTailMs: number;
  hangupBufferMs: number;
}

export const DEFAULT_TURN_TIMING: TurnTiming = {
  prePadMs: 100,
  echoTailMs: 1000,
  hangupBufferMs: 100,
};

export type TurnOutcome =
  | { kind: 'spoken'; text: string; emittedBytes: number }
  | { kind: 'silent'; reason: 'llm_failed' | 'empty_reply' | 'tts_failed' }
  | { kind: 'hangup'; text: string; emittedBytes: number; delayMs: number }
  | { kind: 'socket_closed' };

export interface ConversationEngineDeps {
  config: Readonly<VoiceConfig>;
  context: CallContext;
  chat: ChatBackend;
  tts: TextToSpeech;
  callControl: CallControl;
  sink: AudioSink;
  /** Closes the media socket once the far end has heard the sign-off. */
  closeCall: (reason: 'hangup_directive') => Promise<void>;
  timing?: Partial<TurnTiming>;
  logContext?: Record<string, unknown>;
  now?: () => number;
}

/**
 * One call's conversation: history, transcript and the per-turn
 * listen → think → speak cycle. Only ever driven by its session.
 */
export class ConversationEngine {
  private readonly history: ConversationTurn[] = [];
  private readonly transcriptLines: string[] = [];
  private readonly systemPrompt: string;
  private readonly timing: TurnTiming;
  private readonly logContext: Record<string, unknown>;
  private readonly now: () => number;
  private turnCount = 0;

  constructor(private readonly deps: ConversationEngineDeps) {
    this.timing = { ...DEFAULT_TURN_TIMING, ...deps.timing };
    this.logContext = deps.logContext ?? {};
    this.now = deps.now ?? Date.now;
    this.systemPrompt = composeSystemPrompt({
      systemPrompt: deps.config.systemPrompt,
      callGoal: deps.context.initialPrompt,
      userId: deps.context.userId,
      chatId: deps.context.chatId,
    });
  }

  get turns(): number {
    return this.turnCount;
  }

  get transcript(): string {
    return this.transcriptLines.join('\n');
  }

  getHistory(): readonly ConversationTurn[] {
    return this.history;
  }

  /** Records speech the caller heard outside a turn (the preloaded greeting). */
  recordAssistantSpeech(text: string): void {
    const trimmed = text.trim();
    if (!trimmed) return;
    this.history.push({ role: 'assistant', content: trimmed, timestamp: new Date() });
    this.transcriptLines.push(`Assistant: ${trimmed}`);
  }

  buildMessages(userText: string): ChatMessage[] {
    const system: ChatMessage = { role: 'system', content: this.systemPrompt };
    if (!this.deps.config.sendConversationContext) {
      return [system, { role: 'user', content: userText }];
    }
    return [
      system,
      ...this.history
        .filter((turn) => turn.role !== 'system')
        .map((turn): ChatMessage => ({ role: turn.role, content: turn.content })),
    ];
  }

  async runTurn(userText: string, signal: AbortSignal): Promise<TurnOutcome> {
    const { config } = this.deps;
    this.turnCount += 1;
    const turnContext = { turn: this.turnCount, ...this.logContext };

    this.history.push({ role: 'user', content: userText, timestamp: new Date() });
    this.transcriptLines.push(`User: ${userText}`);

    let reply: string;
    const endLlm = startStageTimer('llm');
    try {
      reply = await this.deps.chat.complete(this.buildMessages(userText), { signal, logContext: turnContext });
    } catch (error) {
      signal.throwIfAborted();
      incStageError('llm');
      log.warn({ event: 'turn_llm_failed', err: error, ...turnContext }, 'text generation failed, turn silent');
      return { kind: 'silent', reason: 'llm_failed' };
    } finally {
      endLlm();
    }

    const { spokenText, shouldHangup, directive } = extractHangupDirective(reply);
    log.info(
      {
        event: 'turn_reply',
        reply_len: reply.length,
        spoken_len: spokenText.length,
        directive_action: directive?.action,
        should_hangup: shouldHangup,
        ...turnContext,
      },
      'turn reply received',
    );

    let emittedBytes = 0;
    let speechStartedAt: number | null = null;

    if (spokenText) {
      try {
        const playback = await playSpeech({
          text: spokenText,
          tts: this.deps.tts,
          sink: this.deps.sink,
          codec: config.codec,
          voiceId: config.voiceId,
          timeoutMs: config.ttsTimeoutMs,
          prePadMs: this.timing.prePadMs,
          signal,
          logContext: turnContext,
          now: this.now,
        });
        emittedBytes = playback.emittedBytes;
        speechStartedAt = playback.startedAt;
        if (playback.error !== undefined && !shouldHangup) {
          this.recordAssistantSpeech(spokenText);
          await this.awaitPlaybackEnd(emittedBytes, speechStartedAt, signal);
          return { kind: 'silent', reason: 'tts_failed' };
        }
      } catch (error) {
        if (error instanceof SocketClosedError) {
          log.info({ event: 'turn_socket_closed', ...turnContext }, 'socket closed during turn');
          return { kind: 'socket_closed' };
        }
        throw error;
      }
      this.recordAssistantSpeech(spokenText);
    } else if (!shouldHangup) {
      return { kind: 'silent', reason: 'empty_reply' };
    }

    if (shouldHangup) {
      const delayMs = computeHangupDelayMs({
        codec: config.codec,
        emittedBytes,
        speechStartedAt,
        now: this.now(),
        bufferMs: this.timing.hangupBufferMs,
      });
      log.info({ event: 'turn_hangup_scheduled', delay_ms: delayMs, ...turnContext }, 'hangup scheduled');
      await delay(delayMs, undefined, { signal });

      try {
        await this.deps.callControl.hangup(this.deps.context.callControlId);
      } catch (error) {
        log.warn({ event: 'turn_hangup_failed', err: error, ...turnContext }, 'provider hangup failed');
      }
      await this.deps.closeCall('hangup_directive');
      return { kind: 'hangup', text: spokenText, emittedBytes, delayMs };
    }

    await this.awaitPlaybackEnd(emittedBytes, speechStartedAt, signal);
    return { kind: 'spoken', text: spokenText, emittedBytes };
  }

  /** Frames leave faster than real time; hold until the far end has heard them, then the echo tail. */
  private async awaitPlaybackEnd(
    emittedBytes: number,
    speechStartedAt: number | null,
    signal: AbortSignal,
  ): Promise<void> {
    const waitMs = computeHangupDelayMs({
      codec: this.deps.config.codec,
      emittedBytes,
      speechStartedAt,
      now: this.now(),
      bufferMs: this.timing.echoTailMs,
    });
    await delay(waitMs, undefined, { signal });
  }
}
