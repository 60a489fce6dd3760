import { z } from 'zod';
import { log } from '../log';

const TWILIO_API_BASE_URL = 'https://api.twilio.com';
const TWILIO_TIMEOUT_MS = 8000;

export type OutboundCallOptions = {
  accountSid: string;
  authToken: string;
  from: string;
  to: string;
  /** TwiML webhook Twilio fetches once the callee answers. */
  voiceUrl: string;
  statusCallbackUrl?: string;
  apiBaseUrl?: string;
};

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

const CallResourceSchema = z
  .object({
    sid: z.string().min(1),
    status: z.string().optional(),
  })
  .passthrough();

export class OutboundCallError extends Error {
  public readonly status: number;
  public readonly responseBody: string;

  constructor(status: number, responseBody: string) {
    super(`twilio call create failed with status ${status}`);
    this.name = 'OutboundCallError';
    this.status = status;
    this.responseBody = responseBody;
  }
}

function maskSid(value: string): string {
  const trimmed = value.trim();
  return trimmed.length <= 8 ? `${trimmed.slice(0, 2)}...` : `${trimmed.slice(0, 6)}...${trimmed.slice(-4)}`;
}

export function buildCallRequest(options: OutboundCallOptions): { url: string; init: RequestInit } {
  const base = (options.apiBaseUrl ?? TWILIO_API_BASE_URL).replace(/\/+$/, '');
  const url = `${base}/2010-04-01/Accounts/${encodeURIComponent(options.accountSid)}/Calls.json`;

  const form = new URLSearchParams({ To: options.to, From: options.from, Url: options.voiceUrl });
  if (options.statusCallbackUrl) {
    form.set('StatusCallback', options.statusCallbackUrl);
    for (const event of ['initiated', 'ringing', 'answered', 'completed']) {
      form.append('StatusCallbackEvent', event);
    }
  }

  const credentials = Buffer.from(`${options.accountSid}:${options.authToken}`).toString('base64');
  return {
    url,
    init: {
      method: 'POST',
      headers: {
        Authorization: `Basic ${credentials}`,
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: form.toString(),
    },
  };
}

/** Creates an outbound call through the Twilio REST API; resolves with the call SID. */
export async function placeOutboundCall(
  options: OutboundCallOptions,
  fetchImpl: FetchLike = (url, init) => fetch(url, init),
): Promise<string> {
  const { url, init } = buildCallRequest(options);
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), TWILIO_TIMEOUT_MS);

  log.info(
    { event: 'outbound_call_request', account: maskSid(options.accountSid), to: options.to, voice_url: options.voiceUrl },
    'creating outbound call',
  );

  let response: Response;
  try {
    response = await fetchImpl(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timer);
  }

  const text = await response.text();
  if (!response.ok) {
    log.error(
      { event: 'outbound_call_failed', status: response.status, body: text.slice(0, 800) },
      'outbound call request failed',
    );
    throw new OutboundCallError(response.status, text);
  }

  const parsed = CallResourceSchema.safeParse(JSON.parse(text));
  if (!parsed.success) {
    throw new OutboundCallError(response.status, text);
  }

  log.info({ event: 'outbound_call_created', call_id: parsed.data.sid, status: parsed.data.status }, 'outbound call created');
  return parsed.data.sid;
}
