import { randomUUID } from 'crypto';
import type http from 'http';
import { WebSocketServer } from 'ws';
import type { CompandingLaw } from '../audio/g711';
import { DuplicateCallIdentifierError, getErrorMessage } from '../calls/errors';
import type { RelaySession } from '../calls/relaySession';
import type { SessionManager } from '../calls/sessionManager';
import { log } from '../log';
import { wrapWebSocket, type LinkSocket } from '../transport/linkSocket';
import { TwilioMediaLink } from '../transport/twilioMediaLink';
import { MEDIA_STREAM_PATH } from './voice';

export type MediaStreamOptions = {
  law: CompandingLaw;
  sampleRateHz: number;
  startTimeoutMs: number;
};

/** False for any other path, and for a request target or Host that does not parse. */
export function isMediaStreamRequest(request: Pick<http.IncomingMessage, 'url' | 'headers'>): boolean {
  if (!request.url) {
    return false;
  }
  const host = request.headers.host ?? 'localhost';
  try {
    return new URL(request.url, `http://${host}`).pathname === MEDIA_STREAM_PATH;
  } catch {
    return false;
  }
}

/**
 * Runs one Twilio media connection up to session start. Resolves with the
 * session, or null when the stream never started or the call already has one.
 */
export async function acceptMediaStream(
  socket: LinkSocket,
  sessionManager: SessionManager,
  options: MediaStreamOptions,
): Promise<RelaySession | null> {
  const requestId = randomUUID();
  const link = new TwilioMediaLink(socket, {
    law: options.law,
    sampleRateHz: options.sampleRateHz,
    logContext: { requestId },
  });

  let callId: string;
  let streamSid: string;
  try {
    const start = await link.waitForStart(options.startTimeoutMs);
    callId = start.callSid;
    streamSid = start.streamSid;
  } catch (error) {
    log.warn(
      { event: 'media_stream_start_missing', error: getErrorMessage(error), requestId },
      'media stream closed without start',
    );
    link.close('start_not_received');
    return null;
  }

  try {
    return sessionManager.onCallStart(callId, link, { requestId, streamSid });
  } catch (error) {
    if (error instanceof DuplicateCallIdentifierError) {
      socket.close(1008, 'duplicate_call_identifier');
      return null;
    }
    log.error({ err: error, event: 'media_stream_session_failed', call_id: callId, requestId }, 'relay session start failed');
    socket.close(1011, 'internal_error');
    return null;
  }
}

export function attachMediaWebSocketServer(
  server: http.Server,
  sessionManager: SessionManager,
  options: MediaStreamOptions,
): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  server.on('upgrade', (request, socket, head) => {
    if (!isMediaStreamRequest(request)) {
      log.warn({ event: 'media_stream_upgrade_rejected', url: request.url }, 'upgrade rejected');
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      wss.emit('connection', ws, request);
    });
  });

  wss.on('connection', (ws) => {
    void acceptMediaStream(wrapWebSocket(ws), sessionManager, options);
  });

  return wss;
}
