import { computePcmStats } from '../audio/pcm';

export interface EnergyVadOptions {
  threshold: number;
  adaptive: boolean;
  frameMs: number;
  historyMs?: number;
  minHistoryMs?: number;
}

const ADAPTIVE_PERCENTILE = 0.85;
const ADAPTIVE_MULTIPLIER = 1.5;
const ADAPTIVE_MIN = 300;
const ADAPTIVE_MAX = 2000;
const RECOMPUTE_EVERY_FRAMES = 25;

/**
 * RMS energy detector. In adaptive mode the threshold tracks the line's noise floor: the
 * 85th percentile of recent frame energy times 1.5, clamped to [300, 2000]. The fixed
 * threshold applies until `minHistoryMs` of audio has been seen.
 */
export class EnergyVad {
  private readonly fixedThreshold: number;
  private readonly adaptive: boolean;
  private readonly maxHistoryFrames: number;
  private readonly minHistoryFrames: number;
  private readonly history: number[] = [];
  private adaptiveThreshold?: number;
  private framesSinceRecompute = 0;

  constructor(options: EnergyVadOptions) {
    const frameMs = Math.max(1, options.frameMs);
    this.fixedThreshold = options.threshold;
    this.adaptive = options.adaptive;
    this.maxHistoryFrames = Math.max(1, Math.round((options.historyMs ?? 30_000) / frameMs));
    this.minHistoryFrames = Math.max(1, Math.round((options.minHistoryMs ?? 1000) / frameMs));
  }

  public classify(pcm16: Int16Array): { rms: number; threshold: number; isSpeech: boolean } {
    const { rms } = computePcmStats(pcm16);
    const threshold = this.currentThreshold();
    if (this.adaptive) {
      this.record(rms);
    }
    return { rms, threshold, isSpeech: rms > threshold };
  }

  public currentThreshold(): number {
    return this.adaptiveThreshold ?? this.fixedThreshold;
  }

  private record(rms: number): void {
    this.history.push(rms);
    if (this.history.length > this.maxHistoryFrames) {
      this.history.shift();
    }
    if (this.history.length < this.minHistoryFrames) return;

    this.framesSinceRecompute += 1;
    if (this.adaptiveThreshold !== undefined && this.framesSinceRecompute < RECOMPUTE_EVERY_FRAMES) return;
    this.framesSinceRecompute = 0;

    const sorted = [...this.history].sort((a, b) => a - b);
    const index = Math.min(sorted.length - 1, Math.floor(ADAPTIVE_PERCENTILE * sorted.length));
    const candidate = Math.round(sorted[index] * ADAPTIVE_MULTIPLIER);
    this.adaptiveThreshold = Math.min(ADAPTIVE_MAX, Math.max(ADAPTIVE_MIN, candidate));
  }
}
