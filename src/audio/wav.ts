import { clampInt16, pcm16ToBuffer } from './pcm';

export interface Pcm16Data {
  samples: Int16Array;
  sampleRateHz: number;
}

export interface WavHeaderInfo {
  sampleRateHz: number;
  channels: number;
  bitsPerSample: number;
  audioFormat: number;
  dataOffset: number;
  dataSize: number;
}

export function looksLikeWav(buf: Buffer): boolean {
  if (buf.length < 12) return false;
  return buf.toString('ascii', 0, 4) === 'RIFF' && buf.toString('ascii', 8, 12) === 'WAVE';
}

function wavHeader(pcmDataBytes: number, sampleRate: number, numChannels: number): Buffer {
  const bytesPerSample = 2;
  const blockAlign = numChannels * bytesPerSample;
  const byteRate = sampleRate * blockAlign;

  const header = Buffer.alloc(44);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + pcmDataBytes, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(numChannels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(16, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(pcmDataBytes, 40);
  return header;
}

export function encodePcm16ToWav(samples: Int16Array, sampleRateHz: number): Buffer {
  const pcmBuffer = pcm16ToBuffer(samples);
  return Buffer.concat([wavHeader(pcmBuffer.length, sampleRateHz, 1), pcmBuffer]);
}

/**
 * Walks RIFF chunks up to the start of `data`. Returns null while the buffer is too short
 * to contain the data chunk header, so streamed responses can call it again with more bytes.
 */
export function parseWavHeader(wav: Buffer): WavHeaderInfo | null {
  if (!looksLikeWav(wav)) {
    return null;
  }

  let offset = 12;
  let fmt: Omit<WavHeaderInfo, 'dataOffset' | 'dataSize'> | null = null;

  while (offset + 8 <= wav.length) {
    const chunkId = wav.toString('ascii', offset, offset + 4);
    const chunkSize = wav.readUInt32LE(offset + 4);
    const chunkStart = offset + 8;

    if (chunkId === 'fmt ') {
      if (chunkStart + 16 > wav.length) {
        return null;
      }
      fmt = {
        audioFormat: wav.readUInt16LE(chunkStart),
        channels: wav.readUInt16LE(chunkStart + 2),
        sampleRateHz: wav.readUInt32LE(chunkStart + 4),
        bitsPerSample: wav.readUInt16LE(chunkStart + 14),
      };
    } else if (chunkId === 'data') {
      if (!fmt) {
        return null;
      }
      return { ...fmt, dataOffset: chunkStart, dataSize: chunkSize };
    }

    offset = chunkStart + chunkSize + (chunkSize % 2);
  }

  return null;
}

/** Decodes 16-bit PCM WAV to mono samples, averaging channels. */
export function decodeWavToPcm16(wav: Buffer): Pcm16Data | null {
  const header = parseWavHeader(wav);
  if (!header || header.audioFormat !== 1 || header.bitsPerSample !== 16) {
    return null;
  }

  const channels = Math.max(1, header.channels);
  const bytesPerFrame = 2 * channels;
  const availableBytes = Math.min(header.dataSize, Math.max(0, wav.length - header.dataOffset));
  const frameCount = Math.floor(availableBytes / bytesPerFrame);
  if (frameCount <= 0) {
    return null;
  }

  const samples = new Int16Array(frameCount);
  for (let i = 0; i < frameCount; i += 1) {
    let sum = 0;
    for (let ch = 0; ch < channels; ch += 1) {
      sum += wav.readInt16LE(header.dataOffset + i * bytesPerFrame + ch * 2);
    }
    samples[i] = clampInt16(Math.round(sum / channels));
  }

  return { samples, sampleRateHz: header.sampleRateHz };
}
