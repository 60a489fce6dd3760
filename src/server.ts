import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import type { WebSocketServer } from 'ws';
import { SessionManager, buildRelayConfig } from './calls/sessionManager';
import { env as defaultEnv, type Env } from './env';
import { log } from './log';
import { metricsHandler } from './metrics';
import { createHealthRouter } from './routes/health';
import { attachMediaWebSocketServer } from './routes/mediaStream';
import { createCallStatusRouter, createVoiceRouter } from './routes/voice';
import { GeminiLiveLink } from './transport/geminiLiveLink';
import type { SpeechLinkFactory } from './transport/types';

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  next();
}

function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  log.error({ err }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

export function geminiSpeechLinkFactory(config: Env): SpeechLinkFactory {
  return (callId) =>
    new GeminiLiveLink({
      url: config.GEMINI_WS_URL,
      apiKey: config.GEMINI_API_KEY,
      model: config.GEMINI_MODEL,
      voiceName: config.GEMINI_VOICE,
      systemInstruction: config.GEMINI_SYSTEM_INSTRUCTION,
      logContext: { call_id: callId },
    });
}

export function buildServer(
  config: Env = defaultEnv,
  options: { createSpeechLink?: SpeechLinkFactory } = {},
): { app: express.Express; server: http.Server; wss: WebSocketServer; sessionManager: SessionManager } {
  const app = express();
  const sessionManager = new SessionManager({
    config: buildRelayConfig(config),
    createSpeechLink: options.createSpeechLink ?? geminiSpeechLinkFactory(config),
  });

  app.disable('x-powered-by');
  app.use(express.urlencoded({ extended: false }));
  app.use(express.json());
  app.use(requestIdMiddleware);

  app.use('/health', createHealthRouter(() => sessionManager.activeCount));
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });
  app.use('/voice', createVoiceRouter({ publicBaseUrl: config.PUBLIC_BASE_URL, greeting: config.GREETING_TEXT }));
  app.use('/call-status', createCallStatusRouter(sessionManager));

  app.use(errorHandler);

  const server = http.createServer(app);
  const wss = attachMediaWebSocketServer(server, sessionManager, {
    law: config.TELEPHONY_COMPANDING,
    sampleRateHz: config.TELEPHONY_SAMPLE_RATE,
    startTimeoutMs: config.START_EVENT_TIMEOUT_MS,
  });

  return { app, server, wss, sessionManager };
}
