export interface SynthesisRequest {
  text: string;
  voice?: string;
  sampleRateHz: number;
  signal: AbortSignal;
  logContext?: Record<string, unknown>;
}

export interface SynthesizedAudio {
  samples: Int16Array;
  sampleRateHz: number;
}

export interface TtsProvider {
  readonly id: string;
  /** Yields mono PCM16 in order as the provider produces it. */
  synthesize(request: SynthesisRequest): AsyncIterable<SynthesizedAudio>;
}
