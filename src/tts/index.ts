import { env } from '../env';
import { HttpTtsProvider } from './httpTtsProvider';
import type { TtsProvider } from './types';

export function createTtsProvider(): TtsProvider {
  return new HttpTtsProvider({ url: env.TTS_URL, voice: env.TTS_VOICE, timeoutMs: env.TTS_TIMEOUT_MS });
}
