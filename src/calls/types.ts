import type { OverrunPolicy } from '../audio/frameScheduler';
import type { CompandingLaw } from '../audio/g711';

export type CallIdentifier = string;

export type RelaySessionState = 'CONNECTING' | 'ACTIVE' | 'DRAINING' | 'CLOSED';

export type RelayCloseReason =
  | 'caller_hangup'
  | 'call_ended'
  | 'agent_closed'
  | 'telephony_reset'
  | 'speech_reset'
  | 'handshake_failed'
  | 'handshake_timeout'
  | 'drain_timeout'
  | 'codec_contract_violation'
  | 'internal_error'
  | 'shutdown';

export interface RelayConfig {
  telephonySampleRateHz: number;
  speechInputSampleRateHz: number;
  companding: CompandingLaw;
  frameMs: number;
  highWaterMs: number;
  overrunPolicy: OverrunPolicy;
  partialHoldMs: number;
  drainGraceMs: number;
  handshakeTimeoutMs: number;
  sendMaxRetries: number;
  sendRetryBaseMs: number;
}

export interface RelaySessionMetrics {
  createdAt: Date;
  activeAt?: Date;
  closedAt?: Date;
  callerFrames: number;
  callerFramesDiscarded: number;
  agentChunks: number;
  turns: number;
  interruptions: number;
  telephonyFrames: number;
  silenceFrames: number;
  overrunBytes: number;
  skippedTicks: number;
  droppedSends: number;
}

export type RelaySessionClosed = {
  callId: CallIdentifier;
  reason: RelayCloseReason;
  metrics: RelaySessionMetrics;
};
