import { FrameScheduler, type OverrunEvent } from '../audio/frameScheduler';
import { DriftCorrectedTicker, type FrameTicker } from '../audio/frameTicker';
import { decodeFrame, encodeFrame, pcm16Frame, resampleFrame, type AudioFrame } from '../audio/frames';
import { log } from '../log';
import {
  incActiveSessions,
  incCodecViolations,
  incFramesDropped,
  incFramesSent,
  incSchedulerDroppedBytes,
  incTicksSkipped,
  recordSessionClosed,
  type RelayLeg,
} from '../metrics';
import { sendWithRetry } from '../transport/sendWithRetry';
import type { SpeechInbound, SpeechLink, TelephonyInbound, TelephonyLink } from '../transport/types';
import { CodecContractViolation, HandshakeFailureError, getErrorMessage } from './errors';
import type {
  CallIdentifier,
  RelayCloseReason,
  RelayConfig,
  RelaySessionClosed,
  RelaySessionMetrics,
  RelaySessionState,
} from './types';

/** Frames handed to the telephony link but not yet sent; beyond this, audio waits in the scheduler. */
const MAX_TELEPHONY_IN_FLIGHT = 3;

type RelayEvent =
  | { type: 'speech_ready' }
  | { type: 'handshake_failed'; timedOut: boolean; error: unknown }
  | { type: 'caller_audio'; frame: AudioFrame }
  | { type: 'telephony_closed'; orderly: boolean; detail: string; closeReason: RelayCloseReason }
  | { type: 'agent_audio'; pcm: Buffer; sampleRateHz: number }
  | { type: 'turn_complete' }
  | { type: 'interrupted' }
  | { type: 'speech_closed'; orderly: boolean; detail: string }
  | { type: 'tick' }
  | { type: 'drained' }
  | { type: 'drain_deadline' }
  | { type: 'send_fault'; error: unknown }
  | { type: 'close'; reason: RelayCloseReason };

const ALLOWED_TRANSITIONS: Record<RelaySessionState, RelaySessionState[]> = {
  CONNECTING: ['ACTIVE', 'CLOSED'],
  ACTIVE: ['DRAINING'],
  DRAINING: ['CLOSED'],
  CLOSED: [],
};

export type RelaySessionOptions = {
  callId: CallIdentifier;
  telephony: TelephonyLink;
  speech: SpeechLink;
  config: RelayConfig;
  ticker?: FrameTicker;
  onClosed?: (closed: RelaySessionClosed) => void;
  logContext?: Record<string, unknown>;
};

/**
 * One call: a telephony leg and a speech leg joined through the codec and the
 * frame scheduler. Link pumps, the pacing ticker and timers only post events;
 * a single drain loop applies them, so session state has one writer.
 */
export class RelaySession {
  public readonly callId: CallIdentifier;
  public readonly createdAt: Date;
  public readonly closed: Promise<RelaySessionClosed>;

  private readonly telephony: TelephonyLink;
  private readonly speech: SpeechLink;
  private readonly config: RelayConfig;
  private readonly scheduler: FrameScheduler;
  private readonly ticker: FrameTicker;
  private readonly onClosed?: (closed: RelaySessionClosed) => void;
  private readonly logContext: Record<string, unknown>;
  private readonly resolveClosed: (closed: RelaySessionClosed) => void;
  private readonly metrics: RelaySessionMetrics;
  private readonly stateHistory: RelaySessionState[] = ['CONNECTING'];

  private state: RelaySessionState = 'CONNECTING';
  private readonly inbox: RelayEvent[] = [];
  private processing = false;
  private started = false;
  private telephonyChain: Promise<void> = Promise.resolve();
  private speechChain: Promise<void> = Promise.resolve();
  private telephonyInFlight = 0;
  private handshakeTimer?: NodeJS.Timeout;
  private drainTimer?: NodeJS.Timeout;
  private drainingLeg?: RelayLeg;
  private drainReason: RelayCloseReason = 'caller_hangup';

  constructor(options: RelaySessionOptions) {
    this.callId = options.callId;
    this.telephony = options.telephony;
    this.speech = options.speech;
    this.config = options.config;
    this.onClosed = options.onClosed;
    this.ticker = options.ticker ?? new DriftCorrectedTicker(options.config.frameMs);
    this.createdAt = new Date();
    this.logContext = { ...(options.logContext ?? {}), call_id: options.callId };

    this.metrics = {
      createdAt: this.createdAt,
      callerFrames: 0,
      callerFramesDiscarded: 0,
      agentChunks: 0,
      turns: 0,
      interruptions: 0,
      telephonyFrames: 0,
      silenceFrames: 0,
      overrunBytes: 0,
      skippedTicks: 0,
      droppedSends: 0,
    };

    this.scheduler = new FrameScheduler({
      sampleRateHz: options.config.telephonySampleRateHz,
      frameMs: options.config.frameMs,
      highWaterMs: options.config.highWaterMs,
      overrunPolicy: options.config.overrunPolicy,
      partialHoldMs: options.config.partialHoldMs,
      onOverrun: (event) => this.handleOverrun(event),
    });

    let resolveClosed: (closed: RelaySessionClosed) => void = () => undefined;
    this.closed = new Promise<RelaySessionClosed>((resolve) => {
      resolveClosed = resolve;
    });
    this.resolveClosed = resolveClosed;
  }

  public start(): boolean {
    if (this.started || this.state !== 'CONNECTING') {
      return false;
    }
    this.started = true;
    incActiveSessions();

    log.info({ event: 'relay_session_connecting', ...this.logContext }, 'relay session connecting');

    void this.pumpTelephony();
    this.beginHandshake();
    return true;
  }

  /** The telephony side ended outside the media stream (status callback, hangup webhook). */
  public endCall(): void {
    this.post({ type: 'telephony_closed', orderly: true, detail: 'call_ended', closeReason: 'call_ended' });
  }

  public requestClose(reason: RelayCloseReason): void {
    this.post({ type: 'close', reason });
  }

  public getState(): RelaySessionState {
    return this.state;
  }

  public getStateHistory(): RelaySessionState[] {
    return [...this.stateHistory];
  }

  public getBufferedMs(): number {
    return this.scheduler.bufferedMs;
  }

  public getMetrics(): RelaySessionMetrics {
    return {
      ...this.metrics,
      createdAt: new Date(this.metrics.createdAt),
      activeAt: this.metrics.activeAt ? new Date(this.metrics.activeAt) : undefined,
      closedAt: this.metrics.closedAt ? new Date(this.metrics.closedAt) : undefined,
    };
  }

  private post(event: RelayEvent): void {
    if (this.state === 'CLOSED') {
      return;
    }
    this.inbox.push(event);
    if (this.processing) {
      return;
    }

    this.processing = true;
    try {
      while (this.inbox.length > 0) {
        const next = this.inbox.shift();
        if (!next) {
          continue;
        }
        try {
          this.handle(next);
        } catch (error) {
          this.handleFault(error, next.type);
        }
      }
    } finally {
      this.processing = false;
    }
  }

  private handle(event: RelayEvent): void {
    switch (event.type) {
      case 'speech_ready':
        this.onSpeechReady();
        return;
      case 'handshake_failed':
        this.onHandshakeFailed(event.timedOut, event.error);
        return;
      case 'caller_audio':
        this.onCallerAudio(event.frame);
        return;
      case 'agent_audio':
        this.onAgentAudio(event.pcm, event.sampleRateHz);
        return;
      case 'turn_complete':
        this.onTurnComplete();
        return;
      case 'interrupted':
        this.onInterrupted();
        return;
      case 'tick':
        this.onTick();
        return;
      case 'telephony_closed':
        this.onTelephonyClosed(event.orderly, event.detail, event.closeReason);
        return;
      case 'speech_closed':
        this.onSpeechClosed(event.orderly, event.detail);
        return;
      case 'drained':
        if (this.state === 'DRAINING') {
          this.finalize(this.drainReason);
        }
        return;
      case 'drain_deadline':
        if (this.state === 'DRAINING') {
          log.warn(
            { event: 'relay_drain_grace_expired', leg: this.drainingLeg, buffered_ms: this.scheduler.bufferedMs, ...this.logContext },
            'drain grace period expired',
          );
          this.finalize('drain_timeout');
        }
        return;
      case 'send_fault':
        this.handleFault(event.error, event.type);
        return;
      case 'close':
        this.finalize(event.reason);
        return;
    }
  }

  private beginHandshake(): void {
    const timeoutMs = this.config.handshakeTimeoutMs;
    this.handshakeTimer = setTimeout(() => {
      this.post({
        type: 'handshake_failed',
        timedOut: true,
        error: new HandshakeFailureError(`speech handshake not acknowledged within ${timeoutMs}ms`, { timedOut: true }),
      });
    }, timeoutMs);
    this.handshakeTimer.unref?.();

    void this.speech.connect().then(
      () => this.post({ type: 'speech_ready' }),
      (error: unknown) => this.post({ type: 'handshake_failed', timedOut: false, error }),
    );
  }

  private onSpeechReady(): void {
    if (this.state !== 'CONNECTING') {
      return;
    }
    this.clearHandshakeTimer();
    this.transition('ACTIVE');
    this.metrics.activeAt = new Date();

    log.info(
      { event: 'relay_session_active', handshake_ms: Date.now() - this.createdAt.getTime(), ...this.logContext },
      'relay session active',
    );

    this.ticker.start(() => this.post({ type: 'tick' }));
    void this.pumpSpeech();
  }

  private onHandshakeFailed(timedOut: boolean, error: unknown): void {
    if (this.state !== 'CONNECTING') {
      return;
    }
    log.warn(
      { event: 'relay_handshake_failed', timed_out: timedOut, error: getErrorMessage(error), ...this.logContext },
      'speech handshake failed',
    );
    this.finalize(timedOut ? 'handshake_timeout' : 'handshake_failed');
  }

  private onCallerAudio(frame: AudioFrame): void {
    if (this.state !== 'ACTIVE') {
      this.metrics.callerFramesDiscarded += 1;
      incFramesDropped('speech', this.state === 'CONNECTING' ? 'not_ready' : 'draining');
      return;
    }

    this.metrics.callerFrames += 1;
    const linear = resampleFrame(decodeFrame(frame), this.config.speechInputSampleRateHz);
    this.sendOn('speech', 'audio', () => this.speech.send(linear.data, linear.sampleRateHz));
  }

  private onAgentAudio(pcm: Buffer, sampleRateHz: number): void {
    if (this.state !== 'ACTIVE') {
      incFramesDropped('telephony', 'agent_audio_after_active');
      return;
    }

    this.metrics.agentChunks += 1;
    const frame = resampleFrame(pcm16Frame(pcm, sampleRateHz), this.config.telephonySampleRateHz);
    this.scheduler.push(frame.data);
  }

  private onTurnComplete(): void {
    if (this.state !== 'ACTIVE') {
      return;
    }
    this.metrics.turns += 1;
    log.debug(
      { event: 'relay_turn_complete', turn: this.metrics.turns, buffered_ms: this.scheduler.bufferedMs, ...this.logContext },
      'agent turn complete',
    );

    const mark = this.telephony.mark?.bind(this.telephony);
    if (mark) {
      const name = `turn-${this.metrics.turns}`;
      this.sendOn('telephony', 'mark', () => mark(name));
    }
  }

  private onInterrupted(): void {
    if (this.state !== 'ACTIVE') {
      return;
    }
    this.metrics.interruptions += 1;
    const discarded = this.scheduler.flush();
    incSchedulerDroppedBytes('barge_in', discarded);

    log.info(
      { event: 'relay_barge_in', discarded_bytes: discarded, ...this.logContext },
      'caller interrupted agent audio',
    );

    const clear = this.telephony.clear?.bind(this.telephony);
    if (clear) {
      this.sendOn('telephony', 'clear', () => clear());
    }
  }

  private onTick(): void {
    if (this.state !== 'ACTIVE' && !(this.state === 'DRAINING' && this.drainingLeg === 'speech')) {
      return;
    }

    if (this.telephonyInFlight >= MAX_TELEPHONY_IN_FLIGHT) {
      this.metrics.skippedTicks += 1;
      incTicksSkipped();
      return;
    }

    const next = this.scheduler.nextFrame();
    if (!next) {
      if (this.telephonyInFlight === 0) {
        this.finalize(this.drainReason);
      }
      return;
    }

    const frame = encodeFrame(pcm16Frame(next.pcm, this.config.telephonySampleRateHz), this.config.companding);
    this.metrics.telephonyFrames += 1;
    if (next.kind === 'silence') {
      this.metrics.silenceFrames += 1;
    }
    this.sendOn('telephony', next.kind, () => this.telephony.send(frame));
  }

  private onTelephonyClosed(orderly: boolean, detail: string, closeReason: RelayCloseReason): void {
    log.info(
      { event: 'relay_telephony_closed', orderly, detail, state: this.state, ...this.logContext },
      'telephony leg closed',
    );

    if (this.state === 'CONNECTING') {
      this.finalize(orderly ? closeReason : 'telephony_reset');
      return;
    }
    if (this.state === 'DRAINING') {
      // Both legs are gone now.
      this.finalize(this.drainReason);
      return;
    }
    if (!orderly) {
      this.finalize('telephony_reset');
      return;
    }

    this.enterDraining('telephony', closeReason);
    const discarded = this.scheduler.flush();
    if (discarded > 0) {
      log.debug({ event: 'relay_agent_audio_discarded', discarded_bytes: discarded, ...this.logContext }, 'caller gone');
    }
    this.ticker.stop();
    const pendingSpeech = this.speechChain;
    void pendingSpeech.then(() => this.post({ type: 'drained' }));
  }

  private onSpeechClosed(orderly: boolean, detail: string): void {
    log.info(
      { event: 'relay_speech_closed', orderly, detail, state: this.state, ...this.logContext },
      'speech leg closed',
    );

    if (this.state === 'DRAINING') {
      this.finalize(this.drainReason);
      return;
    }
    if (this.state !== 'ACTIVE') {
      return;
    }
    if (!orderly) {
      this.finalize('speech_reset');
      return;
    }

    this.enterDraining('speech', 'agent_closed');
    this.scheduler.startDrain();
  }

  private enterDraining(leg: RelayLeg, reason: RelayCloseReason): void {
    this.transition('DRAINING');
    this.drainingLeg = leg;
    this.drainReason = reason;
    this.drainTimer = setTimeout(() => this.post({ type: 'drain_deadline' }), this.config.drainGraceMs);
    this.drainTimer.unref?.();

    log.info(
      { event: 'relay_session_draining', leg, reason, buffered_ms: this.scheduler.bufferedMs, ...this.logContext },
      'relay session draining',
    );
  }

  private finalize(reason: RelayCloseReason): void {
    if (this.state === 'CLOSED') {
      return;
    }
    if (this.state === 'ACTIVE') {
      this.transition('DRAINING');
    }

    this.clearHandshakeTimer();
    if (this.drainTimer) {
      clearTimeout(this.drainTimer);
      this.drainTimer = undefined;
    }
    this.ticker.stop();
    this.scheduler.flush();
    this.inbox.length = 0;

    this.transition('CLOSED');
    this.metrics.closedAt = new Date();

    this.closeLink('telephony', () => this.telephony.close(reason));
    this.closeLink('speech', () => this.speech.close(reason));

    const durationMs = this.metrics.closedAt.getTime() - this.createdAt.getTime();
    if (this.started) {
      recordSessionClosed(reason, durationMs);
    }

    log.info(
      {
        event: 'relay_session_closed',
        reason,
        states: this.stateHistory.join('>'),
        session_duration_ms: durationMs,
        caller_frames: this.metrics.callerFrames,
        agent_chunks: this.metrics.agentChunks,
        telephony_frames: this.metrics.telephonyFrames,
        silence_frames: this.metrics.silenceFrames,
        turns: this.metrics.turns,
        interruptions: this.metrics.interruptions,
        overrun_bytes: this.metrics.overrunBytes,
        dropped_sends: this.metrics.droppedSends,
        ...this.logContext,
      },
      'relay session closed',
    );

    const closed: RelaySessionClosed = { callId: this.callId, reason, metrics: this.getMetrics() };
    try {
      this.onClosed?.(closed);
    } catch (error) {
      log.warn({ err: error, event: 'relay_on_closed_failed', ...this.logContext }, 'session close callback failed');
    }
    this.resolveClosed(closed);
  }

  private handleFault(error: unknown, eventType: RelayEvent['type']): void {
    if (error instanceof CodecContractViolation) {
      incCodecViolations();
      log.error(
        { err: error, event: 'relay_codec_contract_violation', during: eventType, ...this.logContext },
        'codec contract violation - aborting call',
      );
      this.finalize('codec_contract_violation');
      return;
    }

    log.error({ err: error, event: 'relay_event_failed', during: eventType, ...this.logContext }, 'relay event failed');
    this.finalize('internal_error');
  }

  private handleOverrun(event: OverrunEvent): void {
    this.metrics.overrunBytes += event.droppedBytes;
    incSchedulerDroppedBytes('overrun', event.droppedBytes);
    log.warn(
      {
        event: 'relay_scheduler_overrun',
        dropped_bytes: event.droppedBytes,
        buffered_bytes: event.bufferedBytes,
        policy: event.policy,
        ...this.logContext,
      },
      'frame scheduler over high-water mark',
    );
  }

  private transition(next: RelaySessionState): void {
    if (!ALLOWED_TRANSITIONS[this.state].includes(next)) {
      throw new Error(`invalid relay transition ${this.state} -> ${next}`);
    }
    this.state = next;
    this.stateHistory.push(next);
  }

  private sendOn(leg: RelayLeg, kind: string, send: () => Promise<void>): void {
    const step = async (): Promise<void> => {
      try {
        const outcome = await sendWithRetry(send, {
          maxRetries: this.config.sendMaxRetries,
          baseDelayMs: this.config.sendRetryBaseMs,
          label: `${leg}_${kind}`,
          logContext: this.logContext,
        });
        if (outcome.ok) {
          incFramesSent(leg, kind);
        } else {
          incFramesDropped(leg, outcome.reason);
          if (outcome.reason === 'exhausted') {
            this.metrics.droppedSends += 1;
          }
        }
      } catch (error) {
        this.post({ type: 'send_fault', error });
      }
    };

    if (leg === 'telephony') {
      this.telephonyInFlight += 1;
      this.telephonyChain = this.telephonyChain.then(step).then(() => {
        this.telephonyInFlight -= 1;
      });
    } else {
      this.speechChain = this.speechChain.then(step);
    }
  }

  private async pumpTelephony(): Promise<void> {
    while (this.state !== 'CLOSED') {
      let inbound: TelephonyInbound;
      try {
        inbound = await this.telephony.receive();
      } catch (error) {
        log.warn({ err: error, event: 'relay_telephony_receive_failed', ...this.logContext }, 'telephony receive failed');
        inbound = { kind: 'closed', orderly: false, reason: 'receive_failed' };
      }

      if (inbound.kind === 'closed') {
        this.post({
          type: 'telephony_closed',
          orderly: inbound.orderly,
          detail: inbound.reason,
          closeReason: 'caller_hangup',
        });
        return;
      }
      this.post({ type: 'caller_audio', frame: inbound.frame });
    }
  }

  private async pumpSpeech(): Promise<void> {
    while (this.state !== 'CLOSED') {
      let inbound: SpeechInbound;
      try {
        inbound = await this.speech.receive();
      } catch (error) {
        log.warn({ err: error, event: 'relay_speech_receive_failed', ...this.logContext }, 'speech receive failed');
        inbound = { kind: 'closed', orderly: false, reason: 'receive_failed' };
      }

      switch (inbound.kind) {
        case 'closed':
          this.post({ type: 'speech_closed', orderly: inbound.orderly, detail: inbound.reason });
          return;
        case 'audio':
          this.post({ type: 'agent_audio', pcm: inbound.pcm, sampleRateHz: inbound.sampleRateHz });
          break;
        case 'turn_complete':
          this.post({ type: 'turn_complete' });
          break;
        case 'interrupted':
          this.post({ type: 'interrupted' });
          break;
      }
    }
  }

  private closeLink(leg: RelayLeg, close: () => void): void {
    try {
      close();
    } catch (error) {
      log.warn({ err: error, event: 'relay_link_close_failed', leg, ...this.logContext }, 'link close failed');
    }
  }

  private clearHandshakeTimer(): void {
    if (this.handshakeTimer) {
      clearTimeout(this.handshakeTimer);
      this.handshakeTimer = undefined;
    }
  }
}
