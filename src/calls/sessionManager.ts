import type { FrameTicker } from '../audio/frameTicker';
import type { Env } from '../env';
import { log } from '../log';
import { incSessionRejected } from '../metrics';
import type { SpeechLinkFactory, TelephonyLink } from '../transport/types';
import { DuplicateCallIdentifierError } from './errors';
import { RelaySession } from './relaySession';
import { SessionRegistry } from './sessionRegistry';
import type { CallIdentifier, RelayCloseReason, RelayConfig, RelaySessionClosed } from './types';

export interface SessionLogContext {
  requestId?: string;
  streamSid?: string;
}

export interface SessionManagerOptions {
  config: RelayConfig;
  createSpeechLink: SpeechLinkFactory;
  registry?: SessionRegistry<RelaySession>;
  tickerFactory?: (frameMs: number) => FrameTicker;
}

export function buildRelayConfig(source: Env): RelayConfig {
  return {
    telephonySampleRateHz: source.TELEPHONY_SAMPLE_RATE,
    speechInputSampleRateHz: source.SPEECH_INPUT_SAMPLE_RATE,
    companding: source.TELEPHONY_COMPANDING,
    frameMs: source.TELEPHONY_FRAME_MS,
    highWaterMs: source.SCHEDULER_HIGH_WATER_MS,
    overrunPolicy: source.SCHEDULER_OVERRUN_POLICY,
    partialHoldMs: source.SCHEDULER_PARTIAL_HOLD_MS,
    drainGraceMs: source.DRAIN_GRACE_MS,
    handshakeTimeoutMs: source.HANDSHAKE_TIMEOUT_MS,
    sendMaxRetries: source.SEND_MAX_RETRIES,
    sendRetryBaseMs: source.SEND_RETRY_BASE_MS,
  };
}

export class SessionManager {
  private readonly config: RelayConfig;
  private readonly createSpeechLink: SpeechLinkFactory;
  private readonly registry: SessionRegistry<RelaySession>;
  private readonly tickerFactory?: (frameMs: number) => FrameTicker;

  constructor(options: SessionManagerOptions) {
    this.config = options.config;
    this.createSpeechLink = options.createSpeechLink;
    this.registry = options.registry ?? new SessionRegistry<RelaySession>();
    this.tickerFactory = options.tickerFactory;
  }

  /**
   * Creates and starts the relay for a call whose media stream just started.
   * Throws `DuplicateCallIdentifierError` if the call already has a session;
   * the existing session is left untouched.
   */
  public onCallStart(callId: CallIdentifier, telephony: TelephonyLink, context: SessionLogContext = {}): RelaySession {
    const result = this.registry.createOrReject(callId, () => {
      const session: RelaySession = new RelaySession({
        callId,
        telephony,
        speech: this.createSpeechLink(callId),
        config: this.config,
        ticker: this.tickerFactory?.(this.config.frameMs),
        logContext: { requestId: context.requestId, stream_sid: context.streamSid },
        onClosed: (closed) => this.onSessionClosed(session, closed),
      });
      return session;
    });

    if (!result.ok) {
      incSessionRejected(result.reason);
      log.warn(
        {
          event: 'relay_session_rejected',
          call_id: callId,
          reason: result.reason,
          requestId: context.requestId,
        },
        'relay session rejected',
      );
      throw new DuplicateCallIdentifierError(callId);
    }

    const session = result.session;
    session.start();

    log.info(
      {
        event: 'relay_session_created',
        call_id: callId,
        state: session.getState(),
        active_sessions: this.registry.size,
        requestId: context.requestId,
      },
      'relay session created',
    );

    return session;
  }

  /** Call ended outside the media stream; the session drains and closes. */
  public onCallEnd(callId: CallIdentifier, context: SessionLogContext = {}): boolean {
    const session = this.registry.lookup(callId);
    if (!session) {
      log.debug(
        { event: 'relay_call_end_missing', call_id: callId, requestId: context.requestId },
        'no relay session for ended call',
      );
      return false;
    }

    session.endCall();
    return true;
  }

  public getSession(callId: CallIdentifier): RelaySession | undefined {
    return this.registry.lookup(callId);
  }

  public get activeCount(): number {
    return this.registry.size;
  }

  public async shutdown(reason: RelayCloseReason = 'shutdown'): Promise<void> {
    const sessions = this.registry.values();
    if (sessions.length === 0) {
      return;
    }

    log.info({ event: 'relay_shutdown', sessions: sessions.length, reason }, 'closing relay sessions');
    for (const session of sessions) {
      session.requestClose(reason);
    }
    await Promise.all(sessions.map((session) => session.closed));
  }

  private onSessionClosed(session: RelaySession, closed: RelaySessionClosed): void {
    const removed = this.registry.remove(closed.callId, session);
    log.info(
      {
        event: 'relay_session_removed',
        call_id: closed.callId,
        reason: closed.reason,
        removed,
        active_sessions: this.registry.size,
      },
      'relay session removed',
    );
  }
}
