import type { Request, Response } from 'express';
import client from 'prom-client';

/**
 * Relay Prometheus metrics. Leg labels are `telephony` (to the caller) and
 * `speech` (to the speech API).
 */

const register = new client.Registry();
const METRICS_PREFIX = 'live_call_relay_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

export type RelayLeg = 'telephony' | 'speech';

const activeSessions = new client.Gauge({
  name: `${METRICS_PREFIX}active_sessions`,
  help: 'Relay sessions not yet closed',
  registers: [register],
});

const sessionsClosedTotal = new client.Counter({
  name: `${METRICS_PREFIX}sessions_closed_total`,
  help: 'Relay sessions closed, by reason',
  labelNames: ['reason'] as const,
  registers: [register],
});

const sessionsRejectedTotal = new client.Counter({
  name: `${METRICS_PREFIX}sessions_rejected_total`,
  help: 'Call starts rejected before a session was created',
  labelNames: ['reason'] as const,
  registers: [register],
});

const sessionDurationSeconds = new client.Histogram({
  name: `${METRICS_PREFIX}session_duration_seconds`,
  help: 'Relay session lifetime in seconds',
  buckets: [5, 10, 30, 60, 120, 300, 900],
  registers: [register],
});

const framesSentTotal = new client.Counter({
  name: `${METRICS_PREFIX}frames_sent_total`,
  help: 'Audio frames handed to a transport, by leg and kind',
  labelNames: ['leg', 'kind'] as const,
  registers: [register],
});

const framesDroppedTotal = new client.Counter({
  name: `${METRICS_PREFIX}frames_dropped_total`,
  help: 'Audio frames dropped, by leg and reason',
  labelNames: ['leg', 'reason'] as const,
  registers: [register],
});

const schedulerDroppedBytesTotal = new client.Counter({
  name: `${METRICS_PREFIX}scheduler_dropped_bytes_total`,
  help: 'PCM16 bytes discarded by the frame scheduler (overrun or barge-in)',
  labelNames: ['reason'] as const,
  registers: [register],
});

const ticksSkippedTotal = new client.Counter({
  name: `${METRICS_PREFIX}ticks_skipped_total`,
  help: 'Pacing ticks skipped because telephony sends were still pending',
  registers: [register],
});

const codecViolationsTotal = new client.Counter({
  name: `${METRICS_PREFIX}codec_violations_total`,
  help: 'Codec contract violations (each aborts one session)',
  registers: [register],
});

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

export function incActiveSessions(): void {
  activeSessions.inc();
}

export function recordSessionClosed(reason: string, durationMs: number): void {
  activeSessions.dec();
  sessionsClosedTotal.inc({ reason });
  sessionDurationSeconds.observe(durationMs / 1000);
}

export function incSessionRejected(reason: string): void {
  sessionsRejectedTotal.inc({ reason });
}

export function incFramesSent(leg: RelayLeg, kind: string, count = 1): void {
  framesSentTotal.inc({ leg, kind }, count);
}

export function incFramesDropped(leg: RelayLeg, reason: string, count = 1): void {
  const label = reason && reason.trim() !== '' ? reason : 'unknown';
  framesDroppedTotal.inc({ leg, reason: label }, count);
}

export function incSchedulerDroppedBytes(reason: 'overrun' | 'barge_in', bytes: number): void {
  if (bytes > 0) {
    schedulerDroppedBytesTotal.inc({ reason }, bytes);
  }
}

export function incTicksSkipped(): void {
  ticksSkippedTotal.inc();
}

export function incCodecViolations(): void {
  codecViolationsTotal.inc();
}
