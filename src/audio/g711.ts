// G.711 mu-law codec. Twilio media streams carry mono 8 kHz mu-law, one byte per sample.

const BIAS = 0x84;
const CLIP = 32635;

function clampInt16(n: number): number {
  if (n > 32767) return 32767;
  if (n < -32768) return -32768;
  return n | 0;
}

export function muLawToPcmSample(uLawByte: number): number {
  const u = ~uLawByte & 0xff;

  const sign = u & 0x80;
  const exponent = (u >> 4) & 0x07;
  const mantissa = u & 0x0f;

  let sample = ((mantissa << 3) + BIAS) << exponent;
  sample -= BIAS;

  if (sign) sample = -sample;

  return clampInt16(sample);
}

export function pcmToMuLawSample(pcm: number): number {
  let sample = clampInt16(pcm);
  const sign = (sample >> 8) & 0x80;
  if (sign) sample = -sample;
  if (sample > CLIP) sample = CLIP;
  sample += BIAS;

  let exponent = 7;
  let mask = 0x4000;
  while ((sample & mask) === 0 && exponent > 0) {
    exponent -= 1;
    mask >>= 1;
  }

  const mantissa = (sample >> (exponent + 3)) & 0x0f;
  return ~(sign | (exponent << 4) | mantissa) & 0xff;
}

export function decodeMuLaw(muLaw: Buffer): Int16Array {
  const out = new Int16Array(muLaw.length);
  for (let i = 0; i < muLaw.length; i += 1) {
    out[i] = muLawToPcmSample(muLaw[i]);
  }
  return out;
}

export function encodeMuLaw(pcm16: Int16Array): Buffer {
  const out = Buffer.alloc(pcm16.length);
  for (let i = 0; i < pcm16.length; i += 1) {
    out[i] = pcmToMuLawSample(pcm16[i]);
  }
  return out;
}

/** mu-law byte for digital silence */
export const MULAW_SILENCE = 0xff;
