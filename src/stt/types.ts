import type { Pcm16Data } from '../audio/wav';

export type SttProviderId = 'whisper_http' | 'disabled';

/** Why the buffered utterance was closed. */
export type SegmentReason = 'silence' | 'max_utterance' | 'cancelled' | 'stopped';

export interface TranscriptSegment {
  id: string;
  text: string;
  /** Stream time of the first speech frame. */
  startMs: number;
  /** Stream time at the end of the last speech frame. */
  endMs: number;
  confidence: number | null;
  reason: SegmentReason;
  degraded: boolean;
}

export interface RecognitionRequest {
  audio: Pcm16Data;
  language?: string;
  signal?: AbortSignal;
  logContext?: Record<string, unknown>;
}

export interface RecognitionResult {
  text: string;
  confidence?: number;
}

export interface SttProvider {
  readonly id: SttProviderId;
  recognize(request: RecognitionRequest): Promise<RecognitionResult>;
}

export interface FrameAnalysis {
  rms: number;
  threshold: number;
  isSpeech: boolean;
  /** Length of the current run of consecutive speech frames. */
  speechRunMs: number;
  inUtterance: boolean;
}
