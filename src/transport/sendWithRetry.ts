import { CodecContractViolation, TransportClosedError, getErrorMessage } from '../calls/errors';
import { log } from '../log';

export type SendRetryOptions = {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  logContext?: Record<string, unknown>;
  label: string;
};

export type SendOutcome = { ok: true; attempts: number } | { ok: false; attempts: number; reason: 'closed' | 'exhausted' };

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function backoffMs(attempt: number, baseMs: number, maxMs: number): number {
  return Math.min(maxMs, baseMs * Math.pow(2, attempt));
}

/**
 * Runs `send` with a bounded number of retries. On exhaustion the caller
 * drops the frame. A closed transport is not retried. A codec contract
 * violation is rethrown at once.
 */
export async function sendWithRetry(send: () => Promise<void>, options: SendRetryOptions): Promise<SendOutcome> {
  const maxRetries = Math.max(0, options.maxRetries);
  const maxDelayMs = options.maxDelayMs ?? 250;
  let attempt = 0;

  while (true) {
    try {
      await send();
      return { ok: true, attempts: attempt + 1 };
    } catch (error) {
      if (error instanceof CodecContractViolation) {
        throw error;
      }
      if (error instanceof TransportClosedError) {
        log.debug(
          { event: 'transport_send_closed', label: options.label, ...options.logContext },
          'send skipped - transport closed',
        );
        return { ok: false, attempts: attempt + 1, reason: 'closed' };
      }

      if (attempt >= maxRetries) {
        log.warn(
          {
            event: 'transport_send_dropped',
            label: options.label,
            attempts: attempt + 1,
            error: getErrorMessage(error),
            ...options.logContext,
          },
          'send failed - frame dropped',
        );
        return { ok: false, attempts: attempt + 1, reason: 'exhausted' };
      }

      const delay = backoffMs(attempt, options.baseDelayMs, maxDelayMs);
      attempt += 1;
      log.debug(
        { event: 'transport_send_retry', label: options.label, attempt, delay_ms: delay, ...options.logContext },
        'retrying send',
      );
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }
}
