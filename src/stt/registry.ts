import { env } from '../env';
import { log } from '../log';
import { DisabledSttProvider } from './providers/disabled';
import { WhisperHttpProvider } from './providers/whisperHttp';
import type { SttProvider, SttProviderId } from './types';

const factories: Record<SttProviderId, () => SttProvider> = {
  disabled: () => new DisabledSttProvider(),
  whisper_http: () => new WhisperHttpProvider({ url: env.WHISPER_URL, timeoutMs: env.STT_TIMEOUT_MS }),
};

export function getSttProvider(id: SttProviderId = env.STT_PROVIDER): SttProvider {
  const provider = factories[id]();
  log.info({ event: 'stt_provider_selected', provider_id: provider.id }, 'stt provider selected');
  return provider;
}
