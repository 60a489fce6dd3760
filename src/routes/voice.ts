import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { SessionManager } from '../calls/sessionManager';
import { log } from '../log';

export const MEDIA_STREAM_PATH = '/media-stream';

const TERMINAL_CALL_STATUSES = new Set(['completed', 'busy', 'failed', 'no-answer', 'canceled']);

const CallStatusSchema = z
  .object({
    CallSid: z.string().min(1),
    CallStatus: z.string().min(1),
    CallDuration: z.string().optional(),
  })
  .passthrough();

const VoiceWebhookSchema = z
  .object({
    CallSid: z.string().optional(),
    From: z.string().optional(),
    To: z.string().optional(),
  })
  .passthrough();

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** `https://host` -> `wss://host/media-stream` (and http -> ws). */
export function mediaStreamUrl(publicBaseUrl: string): string {
  const base = publicBaseUrl.replace(/\/+$/, '').replace(/^http/i, 'ws');
  return `${base}${MEDIA_STREAM_PATH}`;
}

export function buildStreamTwiml(options: { greeting: string; streamUrl: string }): string {
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<Response>',
    `  <Say>${escapeXml(options.greeting)}</Say>`,
    '  <Connect>',
    `    <Stream url="${escapeXml(options.streamUrl)}" />`,
    '  </Connect>',
    '</Response>',
  ].join('\n');
}

export function createVoiceRouter(options: { publicBaseUrl: string; greeting: string }): Router {
  const router = Router();
  const twiml = buildStreamTwiml({ greeting: options.greeting, streamUrl: mediaStreamUrl(options.publicBaseUrl) });

  router.post('/', (req: Request, res: Response) => {
    const parsed = VoiceWebhookSchema.safeParse(req.body ?? {});
    const call = parsed.success ? parsed.data : undefined;
    log.info(
      { event: 'voice_webhook', call_id: call?.CallSid, from: call?.From, to: call?.To },
      'answering call with media stream',
    );
    res.type('text/xml').status(200).send(twiml);
  });

  return router;
}

/** Applies one status callback; returns the HTTP status to answer with. */
export function handleCallStatus(body: unknown, sessionManager: SessionManager): 204 | 400 {
  const parsed = CallStatusSchema.safeParse(body);
  if (!parsed.success) {
    log.warn({ event: 'call_status_invalid' }, 'invalid call status callback');
    return 400;
  }

  const { CallSid: callId, CallStatus: status } = parsed.data;
  const terminal = TERMINAL_CALL_STATUSES.has(status);
  const ended = terminal ? sessionManager.onCallEnd(callId) : false;

  log.info(
    { event: 'call_status', call_id: callId, status, terminal, session_ended: ended, duration_s: parsed.data.CallDuration },
    'call status received',
  );
  return 204;
}

export function createCallStatusRouter(sessionManager: SessionManager): Router {
  const router = Router();

  router.post('/', (req: Request, res: Response) => {
    const status = handleCallStatus(req.body, sessionManager);
    if (status === 400) {
      res.status(400).json({ error: 'invalid_call_status' });
      return;
    }
    res.status(204).end();
  });

  return router;
}
