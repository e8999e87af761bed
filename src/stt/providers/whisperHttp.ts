import { fetch } from 'undici';

import { encodePcm16ToWav } from '../../audio/wav';
import { RecognitionError, errorMessage, isAbortError } from '../../errors';
import { log } from '../../log';
import type { RecognitionRequest, RecognitionResult, SttProvider } from '../types';

export interface WhisperHttpProviderOptions {
  url: string;
  timeoutMs: number;
}

/**
 * Whisper servers vary a lot:
 * - { text: "..." }
 * - { transcription: "..." }
 * - { result: { text: "..." } }
 * - { segments: [{ text: "..." }, ...] }
 */
export function extractWhisperText(result: unknown): string {
  if (!isRecord(result)) return '';

  if (typeof result.text === 'string') return result.text;
  if (typeof result.transcription === 'string') return result.transcription;

  const nested = result.result;
  if (isRecord(nested)) {
    if (typeof nested.text === 'string') return nested.text;
    if (typeof nested.transcription === 'string') return nested.transcription;
  }

  const segments = result.segments;
  if (Array.isArray(segments)) {
    const parts: string[] = [];
    for (const seg of segments) {
      if (isRecord(seg) && typeof seg.text === 'string' && seg.text.trim() !== '') {
        parts.push(seg.text.trim());
      }
    }
    return parts.join(' ').trim();
  }

  return '';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function buildWhisperUrl(whisperUrl: string, language?: string): string {
  if (!language) return whisperUrl;
  const separator = whisperUrl.includes('?') ? '&' : '?';
  return `${whisperUrl}${separator}language=${encodeURIComponent(language)}`;
}

export class WhisperHttpProvider implements SttProvider {
  public readonly id = 'whisper_http';
  private readonly url: string;
  private readonly timeoutMs: number;

  constructor(options: WhisperHttpProviderOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs;
  }

  public async recognize(request: RecognitionRequest): Promise<RecognitionResult> {
    const wav = encodePcm16ToWav(request.audio.samples, request.audio.sampleRateHz);
    const url = buildWhisperUrl(this.url, request.language);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = (): void => controller.abort();
    request.signal?.addEventListener('abort', onAbort, { once: true });

    const startedAt = Date.now();
    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'audio/wav',
          Accept: 'application/json, text/plain;q=0.9, */*;q=0.1',
        },
        body: wav,
        signal: controller.signal,
      });

      const contentType = response.headers.get('content-type') ?? '';
      const body = await response.text();

      log.debug(
        {
          event: 'whisper_fetch_done',
          status: response.status,
          wav_bytes: wav.length,
          elapsed_ms: Date.now() - startedAt,
          ...(request.logContext ?? {}),
        },
        'whisper responded',
      );

      if (!response.ok) {
        const preview = body.length > 300 ? `${body.slice(0, 300)}...` : body;
        throw new RecognitionError(`whisper error ${response.status}: ${preview}`);
      }

      if (!contentType.includes('application/json')) {
        return { text: body };
      }

      let data: unknown;
      try {
        data = JSON.parse(body);
      } catch (error) {
        throw new RecognitionError('whisper returned invalid json', { cause: error });
      }
      const confidence = isRecord(data) && typeof data.confidence === 'number' ? data.confidence : undefined;
      return { text: extractWhisperText(data), confidence };
    } catch (error) {
      if (error instanceof RecognitionError) throw error;
      if (isAbortError(error)) {
        throw new RecognitionError(`whisper request aborted after ${Date.now() - startedAt}ms`, { cause: error });
      }
      throw new RecognitionError(`whisper request failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timeout);
      request.signal?.removeEventListener('abort', onAbort);
    }
  }
}
