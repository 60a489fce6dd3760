import { CodecContractViolation } from '../calls/errors';
import { decodeG711, encodeG711, type CompandingLaw } from './g711';
import { pcm16BufferToSamples, resamplePcm16, samplesToPcm16Buffer } from './resample';

export type CompandedEncoding = 'pcmu' | 'pcma';
export type AudioEncoding = CompandedEncoding | 'pcm16le';

export interface AudioFrame {
  readonly encoding: AudioEncoding;
  readonly data: Buffer;
  readonly sampleRateHz: number;
  readonly channels: 1;
  readonly sequence?: number;
}

export function encodingForLaw(law: CompandingLaw): CompandedEncoding {
  return law === 'alaw' ? 'pcma' : 'pcmu';
}

function lawForEncoding(encoding: CompandedEncoding): CompandingLaw {
  return encoding === 'pcma' ? 'alaw' : 'mulaw';
}

export function assertSampleRate(sampleRateHz: number, label = 'sample rate'): void {
  if (!Number.isInteger(sampleRateHz) || sampleRateHz <= 0) {
    throw new CodecContractViolation(`${label} must be a positive integer, got ${sampleRateHz}`);
  }
}

function assertPcm16(frame: AudioFrame): void {
  if (frame.encoding !== 'pcm16le') {
    throw new CodecContractViolation(`expected pcm16le frame, got ${frame.encoding}`);
  }
  if (frame.data.length % 2 !== 0) {
    throw new CodecContractViolation(`pcm16le frame has odd length ${frame.data.length}`);
  }
  assertSampleRate(frame.sampleRateHz);
}

export function pcm16Frame(data: Buffer, sampleRateHz: number, sequence?: number): AudioFrame {
  const frame: AudioFrame = { encoding: 'pcm16le', data, sampleRateHz, channels: 1, sequence };
  assertPcm16(frame);
  return frame;
}

export function decodeFrame(frame: AudioFrame): AudioFrame {
  if (frame.encoding === 'pcm16le') {
    throw new CodecContractViolation('decodeFrame expects a companded frame');
  }
  assertSampleRate(frame.sampleRateHz);
  return {
    encoding: 'pcm16le',
    data: decodeG711(frame.data, lawForEncoding(frame.encoding)),
    sampleRateHz: frame.sampleRateHz,
    channels: 1,
    sequence: frame.sequence,
  };
}

export function encodeFrame(frame: AudioFrame, law: CompandingLaw): AudioFrame {
  assertPcm16(frame);
  return {
    encoding: encodingForLaw(law),
    data: encodeG711(frame.data, law),
    sampleRateHz: frame.sampleRateHz,
    channels: 1,
    sequence: frame.sequence,
  };
}

export function resampleFrame(frame: AudioFrame, toRateHz: number): AudioFrame {
  assertPcm16(frame);
  assertSampleRate(toRateHz, 'target sample rate');
  if (frame.sampleRateHz === toRateHz) {
    return frame;
  }
  const resampled = resamplePcm16(pcm16BufferToSamples(frame.data), frame.sampleRateHz, toRateHz);
  return {
    encoding: 'pcm16le',
    data: samplesToPcm16Buffer(resampled),
    sampleRateHz: toRateHz,
    channels: 1,
    sequence: frame.sequence,
  };
}

export function frameDurationMs(frame: AudioFrame): number {
  const bytesPerSample = frame.encoding === 'pcm16le' ? 2 : 1;
  return (frame.data.length / bytesPerSample / frame.sampleRateHz) * 1000;
}
