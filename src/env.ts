import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const stringToBoolean = (value: unknown): unknown => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === '') {
      return undefined;
    }
    if (normalized === 'true') {
      return true;
    }
    if (normalized === 'false') {
      return false;
    }
  }
  return value;
};

const optionalString = () => z.preprocess(emptyToUndefined, z.string().min(1).optional());

const positiveInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive(),
  PUBLIC_BASE_URL: z.string().min(1),
  MEDIA_STREAM_TOKEN: z.string().min(1),
  API_TOKEN: optionalString(),

  TELNYX_API_KEY: z.string().min(1),
  TELNYX_CONNECTION_ID: optionalString(),
  TELNYX_FROM_NUMBER: optionalString(),
  TELNYX_STREAM_TRACK: z
    .enum(['inbound_track', 'outbound_track', 'both_tracks'])
    .default('inbound_track'),

  REDIS_URL: z.string().min(1),
  VOICECFG_KEY: z.preprocess(emptyToUndefined, z.string().min(1).default('voicecfg')),
  CALLREC_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default('callrec')),
  ALERTCHAN_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default('alertchan')),

  STT_URL: z.string().min(1),
  TTS_URL: z.string().min(1),
  LLM_URL: z.string().min(1),
  LLM_API_KEY: optionalString(),
  LLM_MODEL: z.preprocess(emptyToUndefined, z.string().min(1).default('default')),
  LLM_STREAMING_ENABLED: z.preprocess(stringToBoolean, z.boolean().default(true)),
  VOICE_ID: z.preprocess(emptyToUndefined, z.string().min(1).default('default')),
  STT_TIMEOUT_MS: positiveInt(10000),
  TTS_TIMEOUT_MS: positiveInt(15000),
  LLM_TIMEOUT_MS: positiveInt(15000),
  RTP_CODEC: z.preprocess(emptyToUndefined, z.enum(['PCMU', 'PCMA', 'L16']).default('PCMU')),
  SYSTEM_PROMPT: optionalString(),
  SEND_CONVERSATION_CONTEXT: z.preprocess(stringToBoolean, z.boolean().default(true)),

  VAD_RMS_THRESHOLD: positiveInt(500),
  VAD_SILENCE_MS: positiveInt(1200),
  VAD_MIN_UTTERANCE_MS: positiveInt(500),
  VAD_MAX_UTTERANCE_MS: positiveInt(15000),

  MAX_CALL_DURATION_SECONDS: positiveInt(600),
  CALL_LIMIT_MESSAGE: z.preprocess(
    emptyToUndefined,
    z.string().min(1).default('This call has reached its time limit. Goodbye.'),
  ),
  HANDSHAKE_TIMEOUT_MS: positiveInt(10000),
  COST_PER_MINUTE: z.preprocess(emptyToUndefined, z.coerce.number().nonnegative().default(0.005)),

  INBOUND_ENABLED: z.preprocess(stringToBoolean, z.boolean().default(false)),
  INBOUND_SYSTEM_PROMPT: optionalString(),
  ASSIGNED_USER_ID: optionalString(),

  STREAM_REGISTRATION_TTL_SECONDS: positiveInt(300),
  PRELOAD_TTL_SECONDS: positiveInt(300),

  ALERT_BASE_URL: optionalString(),
  ALERT_ADMIN_TOKEN: optionalString(),
  ALERT_CHANNEL_NAME: z.preprocess(emptyToUndefined, z.string().min(1).default('Phone Calls')),
});

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join(', ');
  throw new Error(`Invalid environment variables: ${issues}`);
}

export const env = parsed.data;
export type Env = typeof env;
