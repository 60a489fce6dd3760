// Paces bursty agent audio (PCM16LE at the telephony rate) into fixed-size frames.

import { CodecContractViolation } from '../calls/errors';

export type OverrunPolicy = 'drop_oldest' | 'drop_newest';

export type ScheduledFrameKind = 'audio' | 'silence' | 'padded';

export type ScheduledFrame = {
  pcm: Buffer;
  kind: ScheduledFrameKind;
};

export type OverrunEvent = {
  droppedBytes: number;
  bufferedBytes: number;
  policy: OverrunPolicy;
};

export type PushResult = {
  droppedBytes: number;
};

export type FrameSchedulerOptions = {
  sampleRateHz: number;
  frameMs: number;
  highWaterMs: number;
  overrunPolicy?: OverrunPolicy;
  partialHoldMs?: number;
  onOverrun?: (event: OverrunEvent) => void;
};

export class FrameScheduler {
  public readonly frameBytes: number;
  public readonly highWaterBytes: number;
  public readonly overrunPolicy: OverrunPolicy;

  private readonly sampleRateHz: number;
  private readonly partialHoldTicks: number;
  private readonly onOverrun?: (event: OverrunEvent) => void;
  private chunks: Buffer[] = [];
  private headOffset = 0;
  private buffered = 0;
  private heldTicks = 0;
  private draining = false;

  constructor(options: FrameSchedulerOptions) {
    if (!Number.isInteger(options.sampleRateHz) || options.sampleRateHz <= 0) {
      throw new CodecContractViolation(`scheduler sample rate must be a positive integer, got ${options.sampleRateHz}`);
    }
    if (!(options.frameMs > 0)) {
      throw new CodecContractViolation(`scheduler frame duration must be positive, got ${options.frameMs}`);
    }

    this.sampleRateHz = options.sampleRateHz;
    this.frameBytes = Math.max(1, Math.round((options.sampleRateHz * options.frameMs) / 1000)) * 2;
    this.highWaterBytes = Math.max(
      this.frameBytes,
      Math.floor((options.sampleRateHz * Math.max(0, options.highWaterMs)) / 1000) * 2,
    );
    this.overrunPolicy = options.overrunPolicy ?? 'drop_oldest';
    this.partialHoldTicks = Math.ceil(Math.max(0, options.partialHoldMs ?? 0) / options.frameMs);
    this.onOverrun = options.onOverrun;
  }

  public get bufferedBytes(): number {
    return this.buffered;
  }

  public get bufferedMs(): number {
    return (this.buffered / 2 / this.sampleRateHz) * 1000;
  }

  public get isDraining(): boolean {
    return this.draining;
  }

  public push(pcm: Buffer): PushResult {
    if (pcm.length % 2 !== 0) {
      throw new CodecContractViolation(`scheduler push expects whole pcm16 samples, got ${pcm.length} bytes`);
    }
    if (pcm.length === 0) {
      return { droppedBytes: 0 };
    }

    let accepted = pcm;
    let droppedBytes = 0;

    if (this.overrunPolicy === 'drop_newest') {
      const room = this.highWaterBytes - this.buffered;
      if (pcm.length > room) {
        accepted = pcm.subarray(0, Math.max(0, room));
        droppedBytes = pcm.length - accepted.length;
      }
    }

    if (accepted.length > 0) {
      this.chunks.push(accepted);
      this.buffered += accepted.length;
    }

    if (this.overrunPolicy === 'drop_oldest' && this.buffered > this.highWaterBytes) {
      const excess = this.buffered - this.highWaterBytes;
      this.discard(excess);
      droppedBytes = excess;
    }

    if (droppedBytes > 0) {
      this.onOverrun?.({
        droppedBytes,
        bufferedBytes: this.buffered,
        policy: this.overrunPolicy,
      });
    }

    return { droppedBytes };
  }

  /**
   * Called once per pacing tick. Returns null only when draining with nothing
   * left; otherwise always exactly one frame of frameBytes.
   */
  public nextFrame(): ScheduledFrame | null {
    if (this.buffered >= this.frameBytes) {
      this.heldTicks = 0;
      return { pcm: this.take(this.frameBytes), kind: 'audio' };
    }

    if (this.buffered === 0) {
      this.heldTicks = 0;
      return this.draining ? null : { pcm: Buffer.alloc(this.frameBytes), kind: 'silence' };
    }

    if (this.draining || this.heldTicks >= this.partialHoldTicks) {
      const pcm = Buffer.alloc(this.frameBytes);
      this.take(this.buffered).copy(pcm);
      this.heldTicks = 0;
      return { pcm, kind: 'padded' };
    }

    // Partial frame: wait for more audio, keep the cadence with silence.
    this.heldTicks += 1;
    return { pcm: Buffer.alloc(this.frameBytes), kind: 'silence' };
  }

  public flush(): number {
    const discarded = this.buffered;
    this.chunks = [];
    this.headOffset = 0;
    this.buffered = 0;
    this.heldTicks = 0;
    return discarded;
  }

  public startDrain(): void {
    this.draining = true;
  }

  private take(bytes: number): Buffer {
    const out = Buffer.alloc(bytes);
    let written = 0;

    while (written < bytes && this.chunks.length > 0) {
      const head = this.chunks[0];
      const available = head.length - this.headOffset;
      const count = Math.min(available, bytes - written);
      head.copy(out, written, this.headOffset, this.headOffset + count);
      written += count;
      this.consumeHead(count, available);
    }

    this.buffered -= written;
    return out;
  }

  private discard(bytes: number): void {
    let remaining = bytes;

    while (remaining > 0 && this.chunks.length > 0) {
      const head = this.chunks[0];
      const available = head.length - this.headOffset;
      const count = Math.min(available, remaining);
      remaining -= count;
      this.consumeHead(count, available);
    }

    this.buffered -= bytes - remaining;
  }

  private consumeHead(count: number, available: number): void {
    if (count === available) {
      this.chunks.shift();
      this.headOffset = 0;
    } else {
      this.headOffset += count;
    }
  }
}
