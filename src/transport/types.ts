import type { AudioFrame } from '../audio/frames';

export type LinkClosed = {
  kind: 'closed';
  /** true for a normal hang-up / close frame, false for a reset or socket error. */
  orderly: boolean;
  reason: string;
};

export type TelephonyInbound = { kind: 'audio'; frame: AudioFrame } | LinkClosed;

export type SpeechInbound =
  | { kind: 'audio'; pcm: Buffer; sampleRateHz: number }
  | { kind: 'turn_complete' }
  | { kind: 'interrupted' }
  | LinkClosed;

/** Telephony media leg: companded 8-bit frames in both directions. */
export interface TelephonyLink {
  send(frame: AudioFrame): Promise<void>;
  receive(): Promise<TelephonyInbound>;
  close(reason?: string): void;
  /** Drops audio the provider has queued but not yet played. */
  clear?(): Promise<void>;
  /** Playback marker, echoed back by the provider once played. */
  mark?(name: string): Promise<void>;
}

/** Speech-to-speech API leg: PCM16LE in both directions. */
export interface SpeechLink {
  /** Resolves once the remote side acknowledged the session setup. */
  connect(): Promise<void>;
  send(pcm: Buffer, sampleRateHz: number): Promise<void>;
  receive(): Promise<SpeechInbound>;
  close(reason?: string): void;
}

export type SpeechLinkFactory = (callId: string) => SpeechLink;
