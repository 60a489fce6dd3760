import WebSocket from 'ws';
import { TransportClosedError, TransportSendFailureError } from '../calls/errors';

/** The slice of a WebSocket the links use; lets tests substitute an in-process fake. */
export interface LinkSocket {
  readonly isOpen: boolean;
  send(text: string): Promise<void>;
  close(code?: number, reason?: string): void;
  onMessage(cb: (text: string) => void): void;
  onClose(cb: (code: number, reason: string) => void): void;
  onError(cb: (error: Error) => void): void;
}

export type LinkSocketFactory = (url: string, headers: Record<string, string>) => Promise<LinkSocket>;

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export function wrapWebSocket(ws: WebSocket): LinkSocket {
  return {
    get isOpen(): boolean {
      return ws.readyState === WebSocket.OPEN;
    },
    send(text: string): Promise<void> {
      if (ws.readyState !== WebSocket.OPEN) {
        return Promise.reject(new TransportClosedError());
      }
      return new Promise<void>((resolve, reject) => {
        ws.send(text, (error) => {
          if (error) {
            reject(new TransportSendFailureError(error.message, { cause: error }));
            return;
          }
          resolve();
        });
      });
    },
    close(code?: number, reason?: string): void {
      if (ws.readyState === WebSocket.CLOSING || ws.readyState === WebSocket.CLOSED) {
        return;
      }
      ws.close(code, reason);
    },
    onMessage(cb: (text: string) => void): void {
      ws.on('message', (data: WebSocket.RawData) => cb(rawDataToString(data)));
    },
    onClose(cb: (code: number, reason: string) => void): void {
      ws.on('close', (code: number, reason: Buffer) => cb(code, reason.toString('utf8')));
    },
    onError(cb: (error: Error) => void): void {
      ws.on('error', cb);
    },
  };
}

/** Opens a client WebSocket and resolves once it is open. */
export const connectWebSocket: LinkSocketFactory = (url, headers) =>
  new Promise<LinkSocket>((resolve, reject) => {
    const ws = new WebSocket(url, { headers });

    const onOpen = (): void => {
      ws.off('error', onError);
      resolve(wrapWebSocket(ws));
    };
    const onError = (error: Error): void => {
      ws.off('open', onOpen);
      reject(error);
    };

    ws.once('open', onOpen);
    ws.once('error', onError);
  });

/** Normal closure codes: an orderly hang-up rather than a reset. */
export function isOrderlyCloseCode(code: number): boolean {
  return code === 1000 || code === 1001 || code === 1005;
}
