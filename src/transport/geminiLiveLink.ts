import { z } from 'zod';
import { HandshakeFailureError, TransportClosedError, getErrorMessage } from '../calls/errors';
import { log } from '../log';
import { AsyncQueue } from './asyncQueue';
import { connectWebSocket, isOrderlyCloseCode, type LinkSocket, type LinkSocketFactory } from './linkSocket';
import type { SpeechInbound, SpeechLink } from './types';

const DEFAULT_OUTPUT_SAMPLE_RATE = 24000;

const InlineAudioSchema = z.object({
  mimeType: z.string().optional(),
  data: z.string(),
});

const PartSchema = z
  .object({
    text: z.string().optional(),
    inlineData: InlineAudioSchema.optional(),
    audio: InlineAudioSchema.optional(),
  })
  .passthrough();

export const GeminiServerMessageSchema = z
  .object({
    setupComplete: z.object({}).passthrough().optional(),
    serverContent: z
      .object({
        modelTurn: z.object({ parts: z.array(PartSchema).optional() }).passthrough().optional(),
        turnComplete: z.boolean().optional(),
        generationComplete: z.boolean().optional(),
        interrupted: z.boolean().optional(),
      })
      .passthrough()
      .optional(),
    outputAudio: InlineAudioSchema.optional(),
    goAway: z.object({ timeLeft: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

export type GeminiServerMessage = z.infer<typeof GeminiServerMessageSchema>;

export type GeminiLiveOptions = {
  url: string;
  apiKey: string;
  model: string;
  voiceName: string;
  systemInstruction: string;
  temperature?: number;
  socketFactory?: LinkSocketFactory;
  logContext?: Record<string, unknown>;
};

type SetupWaiter = {
  resolve: () => void;
  reject: (error: Error) => void;
};

export function parseSampleRate(mimeType: string | undefined): number {
  const match = mimeType ? /rate=(\d+)/i.exec(mimeType) : null;
  const rate = match ? Number(match[1]) : NaN;
  return Number.isInteger(rate) && rate > 0 ? rate : DEFAULT_OUTPUT_SAMPLE_RATE;
}

/** Maps one server message to the relay's speech events, in the order they apply. */
export function interpretServerMessage(message: GeminiServerMessage): SpeechInbound[] {
  const events: SpeechInbound[] = [];
  const content = message.serverContent;

  if (content?.interrupted) {
    events.push({ kind: 'interrupted' });
  }

  const audioParts: Array<z.infer<typeof InlineAudioSchema>> = [];
  if (message.outputAudio) {
    audioParts.push(message.outputAudio);
  }
  for (const part of content?.modelTurn?.parts ?? []) {
    const audio = part.inlineData ?? part.audio;
    if (audio && (!audio.mimeType || audio.mimeType.startsWith('audio/'))) {
      audioParts.push(audio);
    }
  }

  for (const audio of audioParts) {
    let pcm = Buffer.from(audio.data, 'base64');
    if (pcm.length % 2 !== 0) {
      pcm = pcm.subarray(0, pcm.length - 1);
    }
    if (pcm.length > 0) {
      events.push({ kind: 'audio', pcm, sampleRateHz: parseSampleRate(audio.mimeType) });
    }
  }

  if (content?.turnComplete) {
    events.push({ kind: 'turn_complete' });
  }

  return events;
}

export function buildSetupMessage(options: Pick<GeminiLiveOptions, 'model' | 'voiceName' | 'systemInstruction' | 'temperature'>): Record<string, unknown> {
  const model = options.model.startsWith('models/') ? options.model : `models/${options.model}`;
  return {
    setup: {
      model,
      generationConfig: {
        responseModalities: ['AUDIO'],
        speechConfig: {
          voiceConfig: { prebuiltVoiceConfig: { voiceName: options.voiceName } },
        },
        temperature: options.temperature ?? 0.7,
      },
      systemInstruction: { parts: [{ text: options.systemInstruction }] },
      realtimeInputConfig: { automaticActivityDetection: {} },
    },
  };
}

/**
 * Gemini Live `BidiGenerateContent` session. `connect()` opens the socket,
 * sends the setup message and resolves on `setupComplete`.
 */
export class GeminiLiveLink implements SpeechLink {
  private readonly options: GeminiLiveOptions;
  private readonly socketFactory: LinkSocketFactory;
  private readonly inbound = new AsyncQueue<SpeechInbound>();
  private readonly logContext: Record<string, unknown>;
  private socket?: LinkSocket;
  private setupWaiter?: SetupWaiter;
  private setupFailure?: HandshakeFailureError;
  private ready = false;
  private closedLocally = false;

  constructor(options: GeminiLiveOptions) {
    this.options = options;
    this.socketFactory = options.socketFactory ?? connectWebSocket;
    this.logContext = { ...(options.logContext ?? {}), model: options.model };
  }

  public async connect(): Promise<void> {
    if (this.ready) {
      return;
    }
    if (this.closedLocally) {
      throw new HandshakeFailureError('speech link closed before connect');
    }

    const url = `${this.options.url}?key=${encodeURIComponent(this.options.apiKey)}`;
    let socket: LinkSocket;
    try {
      socket = await this.socketFactory(url, {});
    } catch (error) {
      throw new HandshakeFailureError(`speech socket failed to open: ${getErrorMessage(error)}`, { cause: error });
    }

    if (this.closedLocally) {
      socket.close(1000, 'closed_during_connect');
      throw new HandshakeFailureError('speech link closed during connect');
    }

    this.socket = socket;
    socket.onMessage((text) => this.handleMessage(text));
    socket.onClose((code, reason) => this.handleSocketClose(code, reason));
    socket.onError((error) => {
      log.warn({ err: error, event: 'gemini_socket_error', ...this.logContext }, 'gemini socket error');
      this.fail(false, 'socket_error');
    });

    try {
      await socket.send(JSON.stringify(buildSetupMessage(this.options)));
    } catch (error) {
      socket.close(1011, 'setup_send_failed');
      throw new HandshakeFailureError(`speech setup could not be sent: ${getErrorMessage(error)}`, { cause: error });
    }

    if (!this.ready) {
      await new Promise<void>((resolve, reject) => {
        if (this.setupFailure) {
          reject(this.setupFailure);
          return;
        }
        this.setupWaiter = { resolve, reject };
      });
    }
    log.info({ event: 'gemini_setup_complete', ...this.logContext }, 'gemini live session ready');
  }

  public async send(pcm: Buffer, sampleRateHz: number): Promise<void> {
    if (!this.socket || !this.ready || this.inbound.closed) {
      throw new TransportClosedError('speech link is not open');
    }
    await this.socket.send(
      JSON.stringify({
        realtimeInput: {
          audio: {
            data: pcm.toString('base64'),
            mimeType: `audio/pcm;rate=${sampleRateHz}`,
          },
        },
      }),
    );
  }

  public receive(): Promise<SpeechInbound> {
    return this.inbound.next();
  }

  public close(reason = 'local_close'): void {
    if (this.closedLocally) {
      return;
    }
    this.closedLocally = true;
    this.socket?.close(1000, reason.slice(0, 120));
    this.rejectSetup(new HandshakeFailureError('speech link closed before setup completed'));
    this.inbound.close({ kind: 'closed', orderly: true, reason: 'local_close' });
  }

  private handleMessage(text: string): void {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      log.debug({ event: 'gemini_message_unparseable', ...this.logContext }, 'gemini message is not json');
      return;
    }

    const parsed = GeminiServerMessageSchema.safeParse(raw);
    if (!parsed.success) {
      log.debug({ event: 'gemini_message_ignored', ...this.logContext }, 'unrecognised gemini message');
      return;
    }
    const message = parsed.data;

    if (message.setupComplete && !this.ready) {
      this.ready = true;
      const waiter = this.setupWaiter;
      this.setupWaiter = undefined;
      waiter?.resolve();
    }

    if (message.goAway) {
      log.warn({ event: 'gemini_go_away', time_left: message.goAway.timeLeft, ...this.logContext }, 'gemini session ending soon');
    }

    if (!this.ready) {
      return;
    }

    for (const event of interpretServerMessage(message)) {
      this.inbound.push(event);
    }
  }

  private handleSocketClose(code: number, reason: string): void {
    if (this.closedLocally) {
      return;
    }
    const orderly = isOrderlyCloseCode(code);
    log.info({ event: 'gemini_socket_closed', code, reason, ...this.logContext }, 'gemini socket closed');
    this.fail(orderly, orderly ? 'socket_closed' : `socket_reset_${code}`, reason);
  }

  private fail(orderly: boolean, closeReason: string, detail?: string): void {
    this.rejectSetup(new HandshakeFailureError(`speech socket closed during setup: ${detail || closeReason}`));
    this.inbound.close({ kind: 'closed', orderly, reason: closeReason });
  }

  private rejectSetup(error: HandshakeFailureError): void {
    if (this.ready) {
      return;
    }
    this.setupFailure ??= error;
    const waiter = this.setupWaiter;
    this.setupWaiter = undefined;
    waiter?.reject(error);
  }
}
