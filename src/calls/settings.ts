import { env } from '../env';
import type { CallSessionSettings } from './types';

export function sessionSettingsFromEnv(): CallSessionSettings {
  return {
    silenceEndMs: env.STT_SILENCE_END_MS,
    minUtteranceMs: env.STT_MIN_UTTERANCE_MS,
    maxUtteranceMs: env.STT_MAX_UTTERANCE_MS,
    preRollMs: env.STT_PRE_ROLL_MS,
    speechFramesRequired: env.VAD_SPEECH_FRAMES_REQUIRED,
    segmentQueueSize: env.SEGMENT_QUEUE_SIZE,
    vadThreshold: env.VAD_RMS_THRESHOLD,
    vadAdaptive: env.VAD_ADAPTIVE,
    language: env.STT_LANGUAGE,
    bargeInMinSpeechMs: env.BARGE_IN_MIN_SPEECH_MS,
    bargeInEchoGuardMs: env.BARGE_IN_ECHO_GUARD_MS,
    deadAirMs: env.DEAD_AIR_MS,
    deadAirMaxReprompts: env.DEAD_AIR_MAX_REPROMPTS,
    maxCallDurationMs: env.MAX_CALL_DURATION_MS,
    monitorMaxEmptySegments: env.MONITOR_MAX_EMPTY_SEGMENTS,
    monitorMaxConfusions: env.MONITOR_MAX_CONFUSIONS,
    voicemailMessage: env.VOICEMAIL_MESSAGE,
    sttFlushTimeoutMs: env.STT_TIMEOUT_MS,
    maxToolRounds: env.AGENT_MAX_TOOL_ROUNDS,
    toolTimeoutMs: env.TOOL_TIMEOUT_MS,
    ttsRequestSampleRateHz: env.TTS_SAMPLE_RATE,
    ttsMaxChunkChars: env.TTS_MAX_CHUNK_CHARS,
    ttsVoice: env.TTS_VOICE,
    apologyText: env.TTS_APOLOGY_TEXT,
    greetingText: env.GREETING_TEXT,
    transferNumber: env.TRANSFER_NUMBER,
  };
}
