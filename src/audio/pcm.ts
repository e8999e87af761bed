export function clampInt16(n: number): number {
  if (n > 32767) return 32767;
  if (n < -32768) return -32768;
  return n | 0;
}

export function resamplePcm16(input: Int16Array, inputRate: number, outputRate: number): Int16Array {
  if (inputRate <= 0 || outputRate <= 0 || input.length === 0) return input;
  if (inputRate === outputRate) return input;

  const outputLength = Math.max(1, Math.round(input.length * (outputRate / inputRate)));
  const output = new Int16Array(outputLength);
  const ratio = inputRate / outputRate;

  for (let i = 0; i < outputLength; i += 1) {
    const position = i * ratio;
    const index = Math.floor(position);
    const nextIndex = Math.min(index + 1, input.length - 1);
    const frac = position - index;
    const sample0 = input[Math.min(index, input.length - 1)] ?? 0;
    const sample1 = input[nextIndex] ?? sample0;
    output[i] = clampInt16(Math.round(sample0 + (sample1 - sample0) * frac));
  }

  return output;
}

/**
 * Linear resampler for audio that arrives in pieces. The read position and the last input
 * sample carry over between `push` calls, so chunk boundaries neither drop nor repeat samples.
 */
export class StreamResampler {
  private readonly step: number;
  /** Where the next output sample sits, in input samples from the start of the next push. */
  private position = 0;
  private previous?: number;

  constructor(
    public readonly inputRate: number,
    public readonly outputRate: number,
  ) {
    this.step = inputRate / outputRate;
  }

  public push(input: Int16Array): Int16Array {
    if (this.inputRate === this.outputRate || input.length === 0) return input;

    const output: number[] = [];
    while (this.position < input.length - 1) {
      const index = Math.floor(this.position);
      const frac = this.position - index;
      const sample0 = index < 0 ? (this.previous ?? input[0] ?? 0) : (input[index] ?? 0);
      const sample1 = input[index + 1] ?? sample0;
      output.push(clampInt16(Math.round(sample0 + (sample1 - sample0) * frac)));
      this.position += this.step;
    }

    this.position -= input.length;
    this.previous = input[input.length - 1];
    return Int16Array.from(output);
  }

  /** Emits the samples still waiting on input that will never come. */
  public flush(): Int16Array {
    const output: number[] = [];
    if (this.previous !== undefined) {
      while (this.position < 0) {
        output.push(this.previous);
        this.position += this.step;
      }
    }
    this.position = 0;
    this.previous = undefined;
    return Int16Array.from(output);
  }
}

export function computePcmStats(pcm16: Int16Array, stride = 1): { peak: number; rms: number } {
  let peak = 0;
  let sumSquares = 0;
  let count = 0;

  for (let i = 0; i < pcm16.length; i += stride) {
    const sample = pcm16[i];
    const abs = Math.abs(sample);
    if (abs > peak) peak = abs;
    sumSquares += sample * sample;
    count += 1;
  }

  const rms = count > 0 ? Math.round(Math.sqrt(sumSquares / count)) : 0;
  return { peak, rms };
}

export function pcmDurationMs(samples: number, sampleRateHz: number): number {
  if (samples <= 0 || sampleRateHz <= 0) return 0;
  return (samples / sampleRateHz) * 1000;
}

export function concatPcm16(chunks: Int16Array[]): Int16Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const out = new Int16Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

/** Copies little-endian PCM16 bytes into samples; a trailing odd byte is ignored. */
export function bufferToPcm16(buf: Buffer): Int16Array {
  const count = Math.floor(buf.length / 2);
  const out = new Int16Array(count);
  for (let i = 0; i < count; i += 1) {
    out[i] = buf.readInt16LE(i * 2);
  }
  return out;
}

export function pcm16ToBuffer(samples: Int16Array): Buffer {
  const out = Buffer.alloc(samples.length * 2);
  for (let i = 0; i < samples.length; i += 1) {
    out.writeInt16LE(samples[i], i * 2);
  }
  return out;
}
