import { z } from 'zod';
import { encodingForLaw, type AudioFrame } from '../audio/frames';
import type { CompandingLaw } from '../audio/g711';
import { CodecContractViolation, TransportClosedError } from '../calls/errors';
import { log } from '../log';
import { AsyncQueue } from './asyncQueue';
import { isOrderlyCloseCode, type LinkSocket } from './linkSocket';
import type { TelephonyInbound, TelephonyLink } from './types';

const ConnectedSchema = z.object({
  event: z.literal('connected'),
  protocol: z.string().optional(),
  version: z.string().optional(),
});

const StartSchema = z.object({
  event: z.literal('start'),
  sequenceNumber: z.string().optional(),
  streamSid: z.string().optional(),
  start: z.object({
    streamSid: z.string().min(1),
    callSid: z.string().min(1),
    accountSid: z.string().optional(),
    tracks: z.array(z.string()).optional(),
    customParameters: z.record(z.string()).optional(),
    mediaFormat: z
      .object({
        encoding: z.string(),
        sampleRate: z.number().int().positive(),
        channels: z.number().int().positive(),
      })
      .optional(),
  }),
});

const MediaSchema = z.object({
  event: z.literal('media'),
  sequenceNumber: z.string().optional(),
  streamSid: z.string().optional(),
  media: z.object({
    track: z.string().optional(),
    chunk: z.string().optional(),
    timestamp: z.string().optional(),
    payload: z.string(),
  }),
});

const MarkSchema = z.object({
  event: z.literal('mark'),
  streamSid: z.string().optional(),
  mark: z.object({ name: z.string() }),
});

const DtmfSchema = z.object({
  event: z.literal('dtmf'),
  streamSid: z.string().optional(),
  dtmf: z.object({ track: z.string().optional(), digit: z.string() }),
});

const StopSchema = z.object({
  event: z.literal('stop'),
  streamSid: z.string().optional(),
  stop: z.object({ callSid: z.string().optional(), accountSid: z.string().optional() }).optional(),
});

export const TwilioInboundSchema = z.discriminatedUnion('event', [
  ConnectedSchema,
  StartSchema,
  MediaSchema,
  MarkSchema,
  DtmfSchema,
  StopSchema,
]);

export type TwilioInboundMessage = z.infer<typeof TwilioInboundSchema>;

export type TwilioStreamStart = {
  streamSid: string;
  callSid: string;
  customParameters: Record<string, string>;
  encoding?: string;
  sampleRateHz: number;
};

type StartWaiter = {
  resolve: (start: TwilioStreamStart) => void;
  reject: (error: Error) => void;
};

export function parseTwilioMessage(text: string): TwilioInboundMessage | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = TwilioInboundSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Twilio bidirectional Media Stream over a server-side WebSocket. Inbound
 * `media` payloads become companded frames; outbound frames go back as
 * `media` messages tagged with the stream SID.
 */
export class TwilioMediaLink implements TelephonyLink {
  private readonly socket: LinkSocket;
  private readonly law: CompandingLaw;
  private readonly sampleRateHz: number;
  private readonly inbound = new AsyncQueue<TelephonyInbound>();
  private readonly startWaiters: StartWaiter[] = [];
  private logContext: Record<string, unknown>;
  private startInfo?: TwilioStreamStart;
  private closedBeforeStart?: string;
  private closedLocally = false;

  constructor(socket: LinkSocket, options: { law: CompandingLaw; sampleRateHz: number; logContext?: Record<string, unknown> }) {
    this.socket = socket;
    this.law = options.law;
    this.sampleRateHz = options.sampleRateHz;
    this.logContext = { ...(options.logContext ?? {}) };

    socket.onMessage((text) => this.handleMessage(text));
    socket.onClose((code, reason) => this.handleSocketClose(code, reason));
    socket.onError((error) => {
      log.warn({ err: error, event: 'twilio_socket_error', ...this.logContext }, 'twilio media socket error');
      this.finish({ kind: 'closed', orderly: false, reason: 'socket_error' });
    });
  }

  public get streamSid(): string | undefined {
    return this.startInfo?.streamSid;
  }

  public waitForStart(timeoutMs: number): Promise<TwilioStreamStart> {
    if (this.startInfo) {
      return Promise.resolve(this.startInfo);
    }
    if (this.closedBeforeStart) {
      return Promise.reject(new TransportClosedError(`media stream closed before start: ${this.closedBeforeStart}`));
    }

    return new Promise<TwilioStreamStart>((resolve, reject) => {
      const timer = setTimeout(() => {
        const index = this.startWaiters.indexOf(waiter);
        if (index !== -1) this.startWaiters.splice(index, 1);
        reject(new TransportClosedError(`media stream start not received within ${timeoutMs}ms`));
      }, timeoutMs);

      const waiter: StartWaiter = {
        resolve: (start) => {
          clearTimeout(timer);
          resolve(start);
        },
        reject: (error) => {
          clearTimeout(timer);
          reject(error);
        },
      };
      this.startWaiters.push(waiter);
    });
  }

  public receive(): Promise<TelephonyInbound> {
    return this.inbound.next();
  }

  public async send(frame: AudioFrame): Promise<void> {
    if (frame.encoding !== encodingForLaw(this.law)) {
      throw new CodecContractViolation(`telephony link expects ${encodingForLaw(this.law)}, got ${frame.encoding}`);
    }
    const streamSid = this.requireStreamSid();
    await this.socket.send(
      JSON.stringify({
        event: 'media',
        streamSid,
        media: { payload: frame.data.toString('base64') },
      }),
    );
  }

  public async clear(): Promise<void> {
    const streamSid = this.requireStreamSid();
    await this.socket.send(JSON.stringify({ event: 'clear', streamSid }));
  }

  public async mark(name: string): Promise<void> {
    const streamSid = this.requireStreamSid();
    await this.socket.send(JSON.stringify({ event: 'mark', streamSid, mark: { name } }));
  }

  public close(reason = 'local_close'): void {
    if (this.closedLocally) {
      return;
    }
    this.closedLocally = true;
    this.socket.close(1000, reason.slice(0, 120));
    this.finish({ kind: 'closed', orderly: true, reason: 'local_close' });
  }

  private requireStreamSid(): string {
    if (!this.startInfo || this.inbound.closed) {
      throw new TransportClosedError('media stream is not open');
    }
    return this.startInfo.streamSid;
  }

  private handleMessage(text: string): void {
    const message = parseTwilioMessage(text);
    if (!message) {
      log.debug({ event: 'twilio_message_ignored', ...this.logContext }, 'unrecognised twilio media message');
      return;
    }

    switch (message.event) {
      case 'connected':
        return;
      case 'start':
        this.handleStart(message);
        return;
      case 'media':
        this.handleMedia(message);
        return;
      case 'mark':
        log.debug({ event: 'twilio_mark', name: message.mark.name, ...this.logContext }, 'twilio mark played');
        return;
      case 'dtmf':
        log.info({ event: 'twilio_dtmf', digit: message.dtmf.digit, ...this.logContext }, 'twilio dtmf received');
        return;
      case 'stop':
        this.finish({ kind: 'closed', orderly: true, reason: 'stream_stopped' });
        return;
    }
  }

  private handleStart(message: z.infer<typeof StartSchema>): void {
    if (this.startInfo) {
      log.warn({ event: 'twilio_duplicate_start', ...this.logContext }, 'duplicate twilio start event');
      return;
    }

    const format = message.start.mediaFormat;
    this.startInfo = {
      streamSid: message.start.streamSid,
      callSid: message.start.callSid,
      customParameters: message.start.customParameters ?? {},
      encoding: format?.encoding,
      sampleRateHz: format?.sampleRate ?? this.sampleRateHz,
    };
    this.logContext = { ...this.logContext, call_id: message.start.callSid, stream_sid: message.start.streamSid };

    if (format && format.sampleRate !== this.sampleRateHz) {
      log.warn(
        { event: 'twilio_sample_rate_mismatch', announced: format.sampleRate, configured: this.sampleRateHz, ...this.logContext },
        'twilio media format differs from configuration',
      );
    }

    for (const waiter of this.startWaiters.splice(0)) {
      waiter.resolve(this.startInfo);
    }
  }

  private handleMedia(message: z.infer<typeof MediaSchema>): void {
    if (!this.startInfo) {
      return;
    }
    const track = message.media.track;
    if (track && track !== 'inbound' && track !== 'inbound_track') {
      return;
    }

    const sequence = message.sequenceNumber !== undefined ? Number(message.sequenceNumber) : undefined;
    this.inbound.push({
      kind: 'audio',
      frame: {
        encoding: encodingForLaw(this.law),
        data: Buffer.from(message.media.payload, 'base64'),
        sampleRateHz: this.sampleRateHz,
        channels: 1,
        sequence: sequence !== undefined && Number.isFinite(sequence) ? sequence : undefined,
      },
    });
  }

  private handleSocketClose(code: number, reason: string): void {
    if (this.closedLocally) {
      this.finish({ kind: 'closed', orderly: true, reason: 'local_close' });
      return;
    }
    const orderly = isOrderlyCloseCode(code);
    if (!orderly) {
      log.warn({ event: 'twilio_socket_reset', code, reason, ...this.logContext }, 'twilio media socket closed abnormally');
    }
    this.finish({ kind: 'closed', orderly, reason: orderly ? 'socket_closed' : `socket_reset_${code}` });
  }

  private finish(closed: Extract<TelephonyInbound, { kind: 'closed' }>): void {
    if (!this.startInfo && !this.closedBeforeStart) {
      this.closedBeforeStart = closed.reason;
      for (const waiter of this.startWaiters.splice(0)) {
        waiter.reject(new TransportClosedError(`media stream closed before start: ${closed.reason}`));
      }
    }
    this.inbound.close(closed);
  }
}
