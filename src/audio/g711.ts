// G.711 companding (PCMU / PCMA) <-> PCM16 little-endian.

export type CompandingLaw = 'mulaw' | 'alaw';

const MULAW_BIAS = 0x84;
const MULAW_CLIP = 32635;

const ALAW_SEGMENT_END = [0x1f, 0x3f, 0x7f, 0xff, 0x1ff, 0x3ff, 0x7ff, 0xfff];

function clampInt16(value: number): number {
  if (value > 32767) return 32767;
  if (value < -32768) return -32768;
  return value | 0;
}

export function muLawToPcmSample(uLawByte: number): number {
  const u = (~uLawByte) & 0xff;
  const sign = u & 0x80;
  const exponent = (u >> 4) & 0x07;
  const mantissa = u & 0x0f;
  let sample = ((mantissa << 3) + MULAW_BIAS) << exponent;
  sample -= MULAW_BIAS;
  if (sign) sample = -sample;
  return clampInt16(sample);
}

export function pcmToMuLawSample(value: number): number {
  let pcm = clampInt16(value);
  const sign = (pcm >> 8) & 0x80;
  if (sign) pcm = -pcm;
  if (pcm > MULAW_CLIP) pcm = MULAW_CLIP;
  pcm += MULAW_BIAS;
  let exponent = 7;
  for (let expMask = 0x4000; (pcm & expMask) === 0 && exponent > 0; exponent -= 1) {
    expMask >>= 1;
  }
  const mantissa = (pcm >> (exponent + 3)) & 0x0f;
  return (~(sign | (exponent << 4) | mantissa)) & 0xff;
}

export function aLawToPcmSample(aLawByte: number): number {
  const a = (aLawByte ^ 0x55) & 0xff;
  let t = (a & 0x0f) << 4;
  const seg = (a & 0x70) >> 4;
  switch (seg) {
    case 0:
      t += 8;
      break;
    case 1:
      t += 0x108;
      break;
    default:
      t += 0x108;
      t <<= seg - 1;
      break;
  }
  return (a & 0x80) ? clampInt16(t) : clampInt16(-t);
}

export function pcmToALawSample(value: number): number {
  let pcm = clampInt16(value) >> 3;
  let mask: number;
  if (pcm >= 0) {
    mask = 0xd5;
  } else {
    mask = 0x55;
    pcm = -pcm - 1;
  }

  let seg = 0;
  while (seg < ALAW_SEGMENT_END.length && pcm > ALAW_SEGMENT_END[seg]) {
    seg += 1;
  }
  if (seg >= ALAW_SEGMENT_END.length) {
    return (0x7f ^ mask) & 0xff;
  }

  let aval = seg << 4;
  aval |= seg < 2 ? (pcm >> 1) & 0x0f : (pcm >> seg) & 0x0f;
  return (aval ^ mask) & 0xff;
}

/** One companded byte in, one PCM16LE sample (2 bytes) out. */
export function decodeG711(payload: Buffer, law: CompandingLaw): Buffer {
  const decodeSample = law === 'alaw' ? aLawToPcmSample : muLawToPcmSample;
  const out = Buffer.alloc(payload.length * 2);
  for (let i = 0; i < payload.length; i += 1) {
    out.writeInt16LE(decodeSample(payload[i]), i * 2);
  }
  return out;
}

export function encodeG711(pcm16le: Buffer, law: CompandingLaw): Buffer {
  const encodeSample = law === 'alaw' ? pcmToALawSample : pcmToMuLawSample;
  const samples = Math.floor(pcm16le.length / 2);
  const out = Buffer.alloc(samples);
  for (let i = 0; i < samples; i += 1) {
    out[i] = encodeSample(pcm16le.readInt16LE(i * 2));
  }
  return out;
}

/** The byte a silent (all-zero) PCM16 frame encodes to. */
export function g711SilenceByte(law: CompandingLaw): number {
  return law === 'alaw' ? pcmToALawSample(0) : pcmToMuLawSample(0);
}
