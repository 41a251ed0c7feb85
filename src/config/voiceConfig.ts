import { z } from 'zod';
import type { WireCodec } from '../audio/codecs';
import { env } from '../env';
import { log } from '../log';
import { getRedisClient } from '../redis/client';

export interface VadConfig {
  rmsThreshold: number;
  silenceMs: number;
  minUtteranceMs: number;
  maxUtteranceMs: number;
}

export interface VoiceConfig {
  sttUrl: string;
  ttsUrl: string;
  llmUrl: string;
  llmApiKey?: string;
  llmModel: string;
  llmStreaming: boolean;
  voiceId: string;
  sttTimeoutMs: number;
  ttsTimeoutMs: number;
  llmTimeoutMs: number;
  codec: WireCodec;
  systemPrompt?: string;
  sendConversationContext: boolean;
  vad: VadConfig;
  maxCallDurationSeconds: number;
  callLimitMessage: string;
  inboundEnabled: boolean;
  inboundSystemPrompt?: string;
  assignedUserId?: string;
  costPerMinute: number;
}

/** Anything that can read a string key; the Redis client in production. */
export interface VoiceConfigSource {
  get(key: string): Promise<string | null>;
}

const positiveInt = z.number().int().positive();

const VoiceConfigOverrideSchema = z
  .object({
    sttUrl: z.string().min(1),
    ttsUrl: z.string().min(1),
    llmUrl: z.string().min(1),
    llmApiKey: z.string().min(1),
    llmModel: z.string().min(1),
    llmStreaming: z.boolean(),
    voiceId: z.string().min(1),
    sttTimeoutMs: positiveInt,
    ttsTimeoutMs: positiveInt,
    llmTimeoutMs: positiveInt,
    codec: z.enum(['PCMU', 'PCMA', 'L16']),
    systemPrompt: z.string().min(1),
    sendConversationContext: z.boolean(),
    vad: z
      .object({
        rmsThreshold: positiveInt,
        silenceMs: positiveInt,
        minUtteranceMs: positiveInt,
        maxUtteranceMs: positiveInt,
      })
      .partial(),
    maxCallDurationSeconds: positiveInt,
    callLimitMessage: z.string().min(1),
    inboundEnabled: z.boolean(),
    inboundSystemPrompt: z.string().min(1),
    assignedUserId: z.string().min(1),
    costPerMinute: z.number().nonnegative(),
  })
  .partial();

export type VoiceConfigOverride = z.infer<typeof VoiceConfigOverrideSchema>;

export function buildEnvVoiceConfig(): VoiceConfig {
  return {
    sttUrl: env.STT_URL,
    ttsUrl: env.TTS_URL,
    llmUrl: env.LLM_URL,
    llmApiKey: env.LLM_API_KEY,
    llmModel: env.LLM_MODEL,
    llmStreaming: env.LLM_STREAMING_ENABLED,
    voiceId: env.VOICE_ID,
    sttTimeoutMs: env.STT_TIMEOUT_MS,
    ttsTimeoutMs: env.TTS_TIMEOUT_MS,
    llmTimeoutMs: env.LLM_TIMEOUT_MS,
    codec: env.RTP_CODEC,
    systemPrompt: env.SYSTEM_PROMPT,
    sendConversationContext: env.SEND_CONVERSATION_CONTEXT,
    vad: {
      rmsThreshold: env.VAD_RMS_THRESHOLD,
      silenceMs: env.VAD_SILENCE_MS,
      minUtteranceMs: env.VAD_MIN_UTTERANCE_MS,
      maxUtteranceMs: env.VAD_MAX_UTTERANCE_MS,
    },
    maxCallDurationSeconds: env.MAX_CALL_DURATION_SECONDS,
    callLimitMessage: env.CALL_LIMIT_MESSAGE,
    inboundEnabled: env.INBOUND_ENABLED,
    inboundSystemPrompt: env.INBOUND_SYSTEM_PROMPT,
    assignedUserId: env.ASSIGNED_USER_ID,
    costPerMinute: env.COST_PER_MINUTE,
  };
}

export function freezeVoiceConfig(config: VoiceConfig): Readonly<VoiceConfig> {
  Object.freeze(config.vad);
  return Object.freeze(config);
}

export function mergeVoiceConfig(base: VoiceConfig, override: VoiceConfigOverride): Readonly<VoiceConfig> {
  const { vad, ...rest } = override;
  return freezeVoiceConfig({
    ...base,
    ...rest,
    vad: { ...base.vad, ...vad },
  });
}

/**
 * Resolves the configuration for one session: environment defaults with an
 * optional JSON override stored under VOICECFG_KEY. Any problem with the
 * override is logged and the defaults are used.
 */
export async function loadVoiceConfig(
  source: VoiceConfigSource = getRedisClient(),
  key: string = env.VOICECFG_KEY,
): Promise<Readonly<VoiceConfig>> {
  const base = buildEnvVoiceConfig();
  let raw: string | null;

  try {
    raw = await source.get(key);
  } catch (error) {
    log.error({ err: error, key }, 'voice config fetch failed');
    return freezeVoiceConfig(base);
  }

  if (!raw) {
    return freezeVoiceConfig(base);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    log.error({ err: error, key }, 'voice config json parse failed');
    return freezeVoiceConfig(base);
  }

  const result = VoiceConfigOverrideSchema.safeParse(parsed);
  if (!result.success) {
    log.error({ key, issues: result.error.issues }, 'voice config invalid');
    return freezeVoiceConfig(base);
  }

  return mergeVoiceConfig(base, result.data);
}

export { VoiceConfigOverrideSchema };
