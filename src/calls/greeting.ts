import type { ChatBackend } from '../ai/chatClient';
import { extractHangupDirective } from '../ai/hangupDirective';
import { composeSystemPrompt, GREETING_USER_MESSAGE } from '../ai/prompts';
import type { VoiceConfig } from '../config/voiceConfig';
import { log } from '../log';
import { incStageError, startStageTimer } from '../metrics';
import type { TextToSpeech } from '../tts/speechStream';
import { playSpeech } from './speech';
import type { PreloadQueue } from './preloadBroker';

export interface GreetingRequest {
  config: Readonly<VoiceConfig>;
  callGoal?: string;
  userId?: string;
  chatId?: string;
  chat: ChatBackend;
  tts: TextToSpeech;
  queue: PreloadQueue;
  signal?: AbortSignal;
  logContext?: Record<string, unknown>;
}

/**
 * Generates the opening line and fills the preload queue with its encoded
 * audio. The queue is always closed on return; failures leave it empty.
 */
export async function generateGreeting(request: GreetingRequest): Promise<boolean> {
  const { config, queue } = request;
  const logContext = { call_control_id: queue.callControlId, ...request.logContext };
  const endTimer = startStageTimer('greeting');

  try {
    const reply = await request.chat.complete(
      [
        {
          role: 'system',
          content: composeSystemPrompt({
            systemPrompt: config.systemPrompt,
            callGoal: request.callGoal,
            userId: request.userId,
            chatId: request.chatId,
          }),
        },
        { role: 'user', content: GREETING_USER_MESSAGE },
      ],
      { signal: request.signal, logContext },
    );

    const { spokenText } = extractHangupDirective(reply);
    if (!spokenText) {
      log.warn({ event: 'greeting_empty', ...logContext }, 'greeting reply empty');
      return false;
    }
    queue.setGreetingText(spokenText);

    const playback = await playSpeech({
      text: spokenText,
      tts: request.tts,
      sink: { send: async (payload) => queue.push(payload) },
      codec: config.codec,
      voiceId: config.voiceId,
      timeoutMs: config.ttsTimeoutMs,
      signal: request.signal,
      logContext,
    });
    log.info(
      {
        event: 'greeting_preloaded',
        frames: playback.frames,
        audio_bytes: playback.emittedBytes,
        text_len: spokenText.length,
        ...logContext,
      },
      'greeting preloaded',
    );
    return playback.error === undefined;
  } catch (error) {
    incStageError('greeting');
    log.warn({ event: 'greeting_failed', err: error, ...logContext }, 'greeting generation failed');
    return false;
  } finally {
    endTimer();
    queue.close();
  }
}
