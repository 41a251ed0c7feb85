import { ChatCompletionsClient } from '../ai/chatClient';
import type { VoiceConfig } from '../config/voiceConfig';
import { HttpTranscribeClient } from '../stt/transcribeClient';
import { HttpSpeechStreamClient } from '../tts/speechStream';
import type { SessionBackends } from './callSession';

export function createSessionBackends(config: Readonly<VoiceConfig>): SessionBackends {
  return {
    stt: new HttpTranscribeClient(config.sttUrl),
    tts: new HttpSpeechStreamClient(config.ttsUrl),
    chat: new ChatCompletionsClient({
      baseUrl: config.llmUrl,
      apiKey: config.llmApiKey,
      model: config.llmModel,
      timeoutMs: config.llmTimeoutMs,
      streaming: config.llmStreaming,
    }),
  };
}
