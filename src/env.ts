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
    if (normalized === 'true' || normalized === '1' || normalized === 'yes') {
      return true;
    }
    if (normalized === 'false' || normalized === '0' || normalized === 'no') {
      return false;
    }
  }
  return value;
};

const positiveInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback));

const nonNegativeInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().nonnegative().default(fallback));

const optionalString = () => z.preprocess(emptyToUndefined, z.string().min(1).optional());

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive(),
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ),
  PUBLIC_BASE_URL: z.string().min(1),
  MEDIA_STREAM_TOKEN: z.string().min(1),

  TWILIO_ACCOUNT_SID: z.string().min(1),
  TWILIO_AUTH_TOKEN: z.string().min(1),
  TWILIO_PHONE_NUMBER: optionalString(),
  TWILIO_API_BASE_URL: z.preprocess(
    emptyToUndefined,
    z.string().min(1).default('https://api.twilio.com/2010-04-01'),
  ),
  TWILIO_SKIP_SIGNATURE: z.preprocess(stringToBoolean, z.boolean().default(false)),
  TRANSFER_NUMBER: optionalString(),

  AGENT_URL: optionalString(),
  AGENT_API_KEY: optionalString(),
  AGENT_ASSISTANT_ID: z.preprocess(emptyToUndefined, z.string().min(1).default('voice_agent')),
  AGENT_TIMEOUT_MS: positiveInt(8000),
  AGENT_MAX_RETRIES: nonNegativeInt(1),
  AGENT_RETRY_BACKOFF_MS: nonNegativeInt(400),
  AGENT_MAX_TOOL_ROUNDS: positiveInt(4),
  TOOL_TIMEOUT_MS: positiveInt(5000),

  STT_PROVIDER: z.preprocess(emptyToUndefined, z.enum(['whisper_http', 'disabled']).default('whisper_http')),
  WHISPER_URL: z.string().min(1),
  STT_LANGUAGE: optionalString(),
  STT_SAMPLE_RATE: positiveInt(16000),
  STT_SILENCE_END_MS: positiveInt(700),
  STT_MIN_UTTERANCE_MS: positiveInt(300),
  STT_MAX_UTTERANCE_MS: positiveInt(15000),
  STT_PRE_ROLL_MS: nonNegativeInt(200),
  STT_TIMEOUT_MS: positiveInt(6000),
  VAD_RMS_THRESHOLD: positiveInt(500),
  VAD_SPEECH_FRAMES_REQUIRED: positiveInt(2),
  VAD_ADAPTIVE: z.preprocess(stringToBoolean, z.boolean().default(true)),
  BARGE_IN_MIN_SPEECH_MS: nonNegativeInt(200),
  BARGE_IN_ECHO_GUARD_MS: nonNegativeInt(3000),

  TTS_URL: z.string().min(1),
  TTS_VOICE: optionalString(),
  TTS_SAMPLE_RATE: positiveInt(24000),
  TTS_TIMEOUT_MS: positiveInt(6000),
  TTS_MAX_CHUNK_CHARS: positiveInt(200),
  TTS_APOLOGY_TEXT: z.preprocess(
    emptyToUndefined,
    z.string().min(1).default('Sorry, I missed that. Could you say it again?'),
  ),
  GREETING_TEXT: optionalString(),

  DEAD_AIR_MS: positiveInt(8000),
  DEAD_AIR_MAX_REPROMPTS: nonNegativeInt(2),
  MAX_CALL_DURATION_MS: positiveInt(300000),
  MONITOR_MAX_EMPTY_SEGMENTS: positiveInt(5),
  MONITOR_MAX_CONFUSIONS: positiveInt(3),
  VOICEMAIL_MESSAGE: optionalString(),
  OUTBOUND_QUEUE_FRAMES: positiveInt(500),
  INBOUND_QUEUE_FRAMES: positiveInt(250),
  SEGMENT_QUEUE_SIZE: positiveInt(8),
  SESSION_IDLE_TTL_MINUTES: positiveInt(10),

  REDIS_URL: z.string().min(1),
  GLOBAL_CONCURRENCY_CAP: positiveInt(20),
  LINE_CONCURRENCY_CAP_DEFAULT: positiveInt(5),
  LINE_CALLS_PER_MIN_CAP_DEFAULT: positiveInt(30),
  CAPACITY_TTL_SECONDS: positiveInt(3600),
  CAP_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default('cap')),
  OUTCOME_LIST_KEY: z.preprocess(emptyToUndefined, z.string().min(1).default('calllog:outcomes')),
});

export type Env = z.infer<typeof EnvSchema>;

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join(', ');
  throw new Error(`Invalid environment variables: ${issues}`);
}

export const env: Env = parsed.data;
