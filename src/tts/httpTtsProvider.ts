import { parseWavHeader } from '../audio/wav';
import { SynthesisError, errorMessage, isAbortError } from '../errors';
import { log } from '../log';
import type { SynthesisRequest, SynthesizedAudio, TtsProvider } from './types';

export interface HttpTtsProviderOptions {
  url: string;
  voice?: string;
  /** Bounds the wait for the first audio bytes; a stream already playing is not cut off. */
  timeoutMs: number;
}

interface PcmFormat {
  sampleRateHz: number;
  channels: number;
}

function parseRateFromContentType(contentType: string): number | undefined {
  const match = /rate=(\d+)/i.exec(contentType);
  return match ? Number(match[1]) : undefined;
}

/**
 * Decodes an interleaved little-endian PCM16 byte stream to mono, holding back bytes that
 * do not yet form a whole frame.
 */
class Pcm16Decoder {
  private pending: Buffer = Buffer.alloc(0);

  constructor(private readonly channels: number) {}

  public push(bytes: Buffer): Int16Array {
    const data = this.pending.length > 0 ? Buffer.concat([this.pending, bytes]) : bytes;
    const bytesPerFrame = 2 * this.channels;
    const frames = Math.floor(data.length / bytesPerFrame);
    this.pending = Buffer.from(data.subarray(frames * bytesPerFrame));

    const out = new Int16Array(frames);
    for (let i = 0; i < frames; i += 1) {
      let sum = 0;
      for (let ch = 0; ch < this.channels; ch += 1) {
        sum += data.readInt16LE(i * bytesPerFrame + ch * 2);
      }
      out[i] = Math.round(sum / this.channels);
    }
    return out;
  }
}

export class HttpTtsProvider implements TtsProvider {
  public readonly id = 'tts_http';
  private readonly options: HttpTtsProviderOptions;

  constructor(options: HttpTtsProviderOptions) {
    this.options = options;
  }

  public async *synthesize(request: SynthesisRequest): AsyncGenerator<SynthesizedAudio> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    if (request.signal.aborted) controller.abort();
    request.signal.addEventListener('abort', onAbort, { once: true });
    let timer: NodeJS.Timeout | undefined = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const clearTimer = (): void => {
      if (timer) clearTimeout(timer);
      timer = undefined;
    };

    try {
      let response: Response;
      try {
        response = await fetch(this.options.url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', Accept: 'audio/wav, audio/pcm, audio/l16' },
          body: JSON.stringify({
            text: request.text,
            voice: request.voice ?? this.options.voice,
            sample_rate: request.sampleRateHz,
            format: 'pcm',
          }),
          signal: controller.signal,
        });
      } catch (error) {
        if (request.signal.aborted) return;
        throw new SynthesisError(
          isAbortError(error) ? `tts timed out after ${this.options.timeoutMs}ms` : `tts request failed: ${errorMessage(error)}`,
          { cause: error },
        );
      }

      if (!response.ok) {
        const body = await response.text().catch((error: unknown) => `<<unreadable body: ${errorMessage(error)}>>`);
        log.error(
          { event: 'tts_http_error', status: response.status, body: body.slice(0, 300), ...(request.logContext ?? {}) },
          'tts error',
        );
        throw new SynthesisError(`tts error ${response.status}`);
      }
      if (!response.body) {
        throw new SynthesisError('tts response has no body');
      }

      const contentType = response.headers.get('content-type') ?? '';
      const reader = response.body.getReader();
      let head: Buffer = Buffer.alloc(0);
      let format: PcmFormat | undefined;
      let decoder: Pcm16Decoder | undefined;
      let isWav: boolean | undefined = contentType.includes('wav') ? true : undefined;

      try {
        while (true) {
          const chunk = await reader.read().then(
            (result) => result,
            (error: unknown) => {
              if (request.signal.aborted) return null;
              throw new SynthesisError(`tts stream failed: ${errorMessage(error)}`, { cause: error });
            },
          );
          if (chunk === null) return;
          if (chunk.done) break;
          clearTimer();
          if (request.signal.aborted) return;

          let bytes = Buffer.from(chunk.value);
          if (!decoder) {
            head = Buffer.concat([head, bytes]);
            if (isWav === undefined && head.length >= 4) {
              isWav = head.toString('ascii', 0, 4) === 'RIFF';
            }
            if (isWav === undefined) continue;

            if (isWav) {
              const header = parseWavHeader(head);
              if (!header) {
                if (head.length > 4096) throw new SynthesisError('tts wav header not found');
                continue;
              }
              if (header.audioFormat !== 1 || header.bitsPerSample !== 16) {
                throw new SynthesisError(`unsupported tts wav format ${header.audioFormat}/${header.bitsPerSample}`);
              }
              format = { sampleRateHz: header.sampleRateHz, channels: Math.max(1, header.channels) };
              bytes = Buffer.from(head.subarray(header.dataOffset));
            } else {
              format = {
                sampleRateHz: parseRateFromContentType(contentType) ?? request.sampleRateHz,
                channels: 1,
              };
              bytes = head;
            }
            decoder = new Pcm16Decoder(format.channels);
          }

          if (!format) continue;
          const samples = decoder.push(bytes);
          if (samples.length > 0) {
            yield { samples, sampleRateHz: format.sampleRateHz };
          }
        }
      } finally {
        reader.releaseLock();
      }

      if (!decoder && !request.signal.aborted) {
        throw new SynthesisError('tts returned no audio');
      }
    } finally {
      clearTimer();
      request.signal.removeEventListener('abort', onAbort);
      controller.abort();
    }
  }
}
