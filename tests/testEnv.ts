const defaults: Record<string, string> = {
  PORT: '3000',
  PUBLIC_BASE_URL: 'https://voice.test',
  MEDIA_STREAM_TOKEN: 'test-secret',
  TELNYX_API_KEY: 'test',
  TELNYX_CONNECTION_ID: 'conn-test',
  TELNYX_FROM_NUMBER: '+15550000000',
  REDIS_URL: 'redis://localhost:6379',
  STT_URL: 'http://stt.test',
  TTS_URL: 'http://tts.test',
  LLM_URL: 'http://llm.test/v1',
  LLM_MODEL: 'test-model',
  VOICE_ID: 'test-voice',
  LOG_LEVEL: 'silent',
};

export function setTestEnv(): void {
  for (const [key, value] of Object.entries(defaults)) {
    if (!process.env[key]) {
      process.env[key] = value;
    }
  }
}
