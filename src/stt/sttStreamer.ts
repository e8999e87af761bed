import { randomUUID } from 'crypto';

import { concatPcm16 } from '../audio/pcm';
import { errorMessage } from '../errors';
import { log } from '../log';
import { incStageError, startStageTimer } from '../metrics';
import { AsyncQueue } from '../pipeline/asyncQueue';
import type { AudioFrame } from '../transport/types';
import type { FrameAnalysis, SegmentReason, SttProvider, TranscriptSegment } from './types';
import { EnergyVad } from './vad';

const BLANK_TRANSCRIPTS = new Set(
  [
    '[BLANK_AUDIO]',
    '[BLANK AUDIO]',
    '[ Silence ]',
    '[Silence]',
    '[ Pause ]',
    '[Pause]',
    '...',
    '(silence)',
    '(no speech)',
    '[inaudible]',
  ].map((marker) => marker.toLowerCase()),
);

export function normalizeTranscript(text: string): string {
  const trimmed = text.replace(/\s+/g, ' ').trim();
  return BLANK_TRANSCRIPTS.has(trimmed.toLowerCase()) ? '' : trimmed;
}

export interface SttStreamerOptions {
  provider: SttProvider;
  frameMs?: number;
  silenceEndMs: number;
  minUtteranceMs: number;
  maxUtteranceMs: number;
  preRollMs: number;
  speechFramesRequired: number;
  segmentQueueSize: number;
  vadThreshold: number;
  vadAdaptive: boolean;
  language?: string;
  logContext?: Record<string, unknown>;
}

interface Utterance {
  frames: AudioFrame[];
  firstSpeechMs: number;
  lastSpeechEndMs: number;
  speechMs: number;
  trailingSilenceMs: number;
  durationMs: number;
}

/**
 * Turns a stream of inbound frames into transcript segments. `ingest` is synchronous; the
 * recognition requests run on a promise chain so segments come out in finalize order.
 */
export class SttStreamer {
  private readonly provider: SttProvider;
  private readonly vad: EnergyVad;
  private readonly frameMs: number;
  private readonly silenceEndMs: number;
  private readonly minUtteranceMs: number;
  private readonly maxUtteranceMs: number;
  private readonly speechFramesRequired: number;
  private readonly preRollCapacity: number;
  private readonly language?: string;
  private readonly logContext: Record<string, unknown>;
  private readonly segmentQueue: AsyncQueue<TranscriptSegment>;
  private readonly idPrefix = randomUUID().slice(0, 8);
  private readonly stopController = new AbortController();

  private preRoll: AudioFrame[] = [];
  private utterance?: Utterance;
  private speechStreak = 0;
  private streakStartMs = 0;
  private segmentCounter = 0;
  private recognitionChain: Promise<void> = Promise.resolve();
  private stopped = false;

  constructor(options: SttStreamerOptions) {
    this.provider = options.provider;
    this.frameMs = options.frameMs ?? 20;
    this.silenceEndMs = options.silenceEndMs;
    this.minUtteranceMs = options.minUtteranceMs;
    this.maxUtteranceMs = options.maxUtteranceMs;
    this.speechFramesRequired = Math.max(1, options.speechFramesRequired);
    this.preRollCapacity = Math.ceil(options.preRollMs / this.frameMs) + this.speechFramesRequired;
    this.language = options.language;
    this.logContext = options.logContext ?? {};
    this.vad = new EnergyVad({
      threshold: options.vadThreshold,
      adaptive: options.vadAdaptive,
      frameMs: this.frameMs,
    });
    this.segmentQueue = new AsyncQueue<TranscriptSegment>({
      capacity: options.segmentQueueSize,
      overflow: 'drop_oldest',
      onDrop: (segment) => {
        log.warn(
          { ...this.logContext, event: 'stt_segment_dropped', segment_id: segment.id },
          'segment queue full, oldest segment dropped',
        );
      },
    });
  }

  public ingest(frame: AudioFrame): FrameAnalysis {
    const { rms, threshold, isSpeech } = this.vad.classify(frame.pcm16);

    if (isSpeech) {
      if (this.speechStreak === 0) this.streakStartMs = frame.timestampMs;
      this.speechStreak += 1;
    } else {
      this.speechStreak = 0;
    }

    if (!this.stopped) {
      if (this.utterance) {
        this.extendUtterance(frame, isSpeech);
      } else {
        this.preRoll.push(frame);
        if (this.preRoll.length > this.preRollCapacity) this.preRoll.shift();
        if (this.speechStreak >= this.speechFramesRequired) {
          this.beginUtterance(frame);
        }
      }
    }

    return {
      rms,
      threshold,
      isSpeech,
      speechRunMs: this.speechStreak * this.frameMs,
      inUtterance: this.utterance !== undefined,
    };
  }

  /**
   * Finalizes the utterance in progress without waiting for silence. An onset that has not
   * yet reached the minimum utterance length keeps buffering.
   */
  public cancel(): void {
    const current = this.utterance;
    if (!current || current.speechMs < this.minUtteranceMs) return;
    this.finalize('cancelled');
  }

  /** Flushes whatever is buffered, waits for pending recognitions and closes the segment queue. */
  public async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    if (this.utterance) this.finalize('stopped');
    await this.recognitionChain;
    this.segmentQueue.close();
  }

  /** Aborts in-flight recognition and closes the segment queue without flushing. */
  public abort(): void {
    this.stopped = true;
    this.utterance = undefined;
    this.preRoll = [];
    this.stopController.abort();
    this.segmentQueue.close();
  }

  public nextSegment(signal?: AbortSignal): Promise<TranscriptSegment | null> {
    return this.segmentQueue.shift(signal);
  }

  public isInUtterance(): boolean {
    return this.utterance !== undefined;
  }

  private beginUtterance(frame: AudioFrame): void {
    const frames = this.preRoll;
    this.preRoll = [];
    const first = frames[0];
    const bufferedMs = frames.reduce((total, item) => total + item.durationMs, 0);
    // After a max-length split the streak runs on, but only the buffered frames belong here.
    const streakFrames = Math.min(this.speechStreak, frames.length);
    this.streakStartMs = Math.max(this.streakStartMs, frame.timestampMs - (streakFrames - 1) * this.frameMs);
    this.utterance = {
      frames,
      firstSpeechMs: this.streakStartMs,
      lastSpeechEndMs: frame.timestampMs + frame.durationMs,
      speechMs: streakFrames * this.frameMs,
      trailingSilenceMs: 0,
      durationMs: bufferedMs,
    };

    log.debug(
      {
        ...this.logContext,
        event: 'stt_speech_start',
        at_ms: this.streakStartMs,
        buffer_start_ms: first ? first.timestampMs : frame.timestampMs,
        threshold: this.vad.currentThreshold(),
      },
      'speech onset',
    );
  }

  private extendUtterance(frame: AudioFrame, isSpeech: boolean): void {
    const current = this.utterance;
    if (!current) return;

    current.frames.push(frame);
    current.durationMs += frame.durationMs;
    if (isSpeech) {
      current.trailingSilenceMs = 0;
      current.speechMs += frame.durationMs;
      current.lastSpeechEndMs = frame.timestampMs + frame.durationMs;
    } else {
      current.trailingSilenceMs += frame.durationMs;
    }

    if (current.trailingSilenceMs >= this.silenceEndMs) {
      this.finalize('silence');
    } else if (current.durationMs >= this.maxUtteranceMs) {
      this.finalize('max_utterance');
    }
  }

  private finalize(reason: SegmentReason): void {
    const current = this.utterance;
    this.utterance = undefined;
    if (!current) return;

    if (current.speechMs < this.minUtteranceMs) {
      log.debug(
        { ...this.logContext, event: 'stt_utterance_discarded', speech_ms: current.speechMs, reason },
        'utterance below minimum length discarded',
      );
      return;
    }

    this.segmentCounter += 1;
    const id = `${this.idPrefix}-${this.segmentCounter}`;
    const first = current.frames[0];
    const sampleRateHz = first ? first.sampleRateHz : 16000;
    const samples = concatPcm16(current.frames.map((frame) => frame.pcm16));
    const base = {
      id,
      startMs: current.firstSpeechMs,
      endMs: current.lastSpeechEndMs,
      reason,
    };

    this.recognitionChain = this.recognitionChain.then(() =>
      this.recognize(base, { samples, sampleRateHz }),
    );
  }

  private async recognize(
    base: Pick<TranscriptSegment, 'id' | 'startMs' | 'endMs' | 'reason'>,
    audio: { samples: Int16Array; sampleRateHz: number },
  ): Promise<void> {
    const end = startStageTimer('stt');
    try {
      const result = await this.provider.recognize({
        audio,
        language: this.language,
        signal: this.stopController.signal,
        logContext: this.logContext,
      });
      const elapsedMs = end();
      const text = normalizeTranscript(result.text);

      log.info(
        {
          ...this.logContext,
          event: 'stt_segment',
          segment_id: base.id,
          reason: base.reason,
          start_ms: base.startMs,
          end_ms: base.endMs,
          elapsed_ms: Math.round(elapsedMs),
          text_length: text.length,
        },
        'transcript segment',
      );

      // Blank recognitions still come out, as empty segments, so callers can count them.
      const confidence = text === '' ? null : (result.confidence ?? null);
      this.segmentQueue.push({ ...base, text, confidence, degraded: false });
    } catch (error) {
      end();
      incStageError('stt');
      if (this.stopController.signal.aborted) return;
      log.warn(
        {
          ...this.logContext,
          event: 'stt_degraded',
          segment_id: base.id,
          provider: this.provider.id,
          err: error,
          error_message: errorMessage(error),
        },
        'recognition failed, emitting empty segment',
      );
      this.segmentQueue.push({ ...base, text: '', confidence: null, degraded: true });
    }
  }
}
