import { StreamResampler } from '../audio/pcm';
import { errorMessage } from '../errors';
import { log } from '../log';
import { incStageError, observeStageDuration } from '../metrics';
import type { AudioFrame } from '../transport/types';
import { splitForSpeech } from './sentenceSplitter';
import type { TtsProvider } from './types';

export interface TtsStreamerOptions {
  provider: TtsProvider;
  outputSampleRateHz: number;
  frameMs?: number;
  /** Rate asked of the provider; it may answer at another rate. */
  requestSampleRateHz: number;
  maxChunkChars: number;
  apologyText: string;
  voice?: string;
  logContext?: Record<string, unknown>;
  now?: () => number;
}

/** Cuts a stream of samples into fixed-size frames, carrying the remainder forward. */
class Framer {
  private carry: Int16Array = new Int16Array(0);
  private seq = 0;

  constructor(
    private readonly samplesPerFrame: number,
    private readonly sampleRateHz: number,
    private readonly frameMs: number,
  ) {}

  public push(samples: Int16Array): AudioFrame[] {
    const data = new Int16Array(this.carry.length + samples.length);
    data.set(this.carry, 0);
    data.set(samples, this.carry.length);

    const frames: AudioFrame[] = [];
    let offset = 0;
    while (offset + this.samplesPerFrame <= data.length) {
      frames.push(this.frame(data.slice(offset, offset + this.samplesPerFrame)));
      offset += this.samplesPerFrame;
    }
    this.carry = data.slice(offset);
    return frames;
  }

  /** Zero-pads whatever is left into one last frame. */
  public flush(): AudioFrame | null {
    if (this.carry.length === 0) return null;
    const padded = new Int16Array(this.samplesPerFrame);
    padded.set(this.carry, 0);
    this.carry = new Int16Array(0);
    return this.frame(padded);
  }

  private frame(pcm16: Int16Array): AudioFrame {
    const seq = this.seq++;
    return {
      seq,
      direction: 'outbound',
      pcm16,
      sampleRateHz: this.sampleRateHz,
      timestampMs: seq * this.frameMs,
      durationMs: this.frameMs,
    };
  }
}

/**
 * Text to transport-rate frames. Text is synthesized one sentence chunk at a time so the
 * first frame leaves as soon as the first chunk's audio starts arriving.
 */
export class TtsStreamer {
  private readonly options: TtsStreamerOptions;
  private readonly frameMs: number;
  private readonly samplesPerFrame: number;
  private readonly logContext: Record<string, unknown>;
  private readonly now: () => number;

  constructor(options: TtsStreamerOptions) {
    this.options = options;
    this.frameMs = options.frameMs ?? 20;
    this.samplesPerFrame = Math.round((options.outputSampleRateHz * this.frameMs) / 1000);
    this.logContext = options.logContext ?? {};
    this.now = options.now ?? Date.now;
  }

  public async *stream(text: string, signal: AbortSignal): AsyncGenerator<AudioFrame> {
    const chunks = splitForSpeech(text, this.options.maxChunkChars);
    if (chunks.length === 0) return;

    const framer = new Framer(this.samplesPerFrame, this.options.outputSampleRateHz, this.frameMs);
    const startedAt = this.now();
    let firstFrameSent = false;
    let apologyUsed = false;
    let resampler: StreamResampler | undefined;
    const queue = [...chunks];

    while (queue.length > 0) {
      const chunk = queue.shift();
      if (chunk === undefined || signal.aborted) return;

      try {
        for await (const audio of this.options.provider.synthesize({
          text: chunk,
          voice: this.options.voice,
          sampleRateHz: this.options.requestSampleRateHz,
          signal,
          logContext: this.logContext,
        })) {
          if (signal.aborted) return;
          const pending: Int16Array[] = [];
          let active = resampler;
          if (!active || active.inputRate !== audio.sampleRateHz) {
            if (active) pending.push(active.flush());
            active = new StreamResampler(audio.sampleRateHz, this.options.outputSampleRateHz);
            resampler = active;
          }
          pending.push(active.push(audio.samples));
          for (const frame of pending.flatMap((samples) => framer.push(samples))) {
            if (signal.aborted) return;
            if (!firstFrameSent) {
              firstFrameSent = true;
              const elapsedMs = this.now() - startedAt;
              observeStageDuration('tts_first_audio', elapsedMs);
              log.debug({ ...this.logContext, event: 'tts_first_audio', elapsed_ms: elapsedMs }, 'first tts frame');
            }
            yield frame;
          }
        }
      } catch (error) {
        if (signal.aborted) return;
        incStageError('tts');
        log.warn(
          {
            ...this.logContext,
            event: 'tts_degraded',
            err: error,
            error_message: errorMessage(error),
            chunk_chars: chunk.length,
            apology: !apologyUsed,
          },
          'synthesis failed',
        );
        if (apologyUsed) return;
        apologyUsed = true;
        queue.length = 0;
        queue.push(this.options.apologyText);
      }
    }

    if (signal.aborted) return;
    if (resampler) {
      for (const frame of framer.push(resampler.flush())) yield frame;
    }
    const tail = framer.flush();
    if (tail) yield tail;
  }
}
