import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const DEFAULT_GEMINI_WS_URL =
  'wss://generativelanguage.googleapis.com/ws/google.ai.generativelanguage.v1beta.GenerativeService.BidiGenerateContent';

export const EnvSchema = z.object({
  PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(5050)),
  PUBLIC_BASE_URL: z.string().min(1),
  GEMINI_API_KEY: z.string().min(1),
  GEMINI_MODEL: z.preprocess(emptyToUndefined, z.string().min(1).default('gemini-2.0-flash-live-001')),
  GEMINI_WS_URL: z.preprocess(emptyToUndefined, z.string().url().default(DEFAULT_GEMINI_WS_URL)),
  GEMINI_VOICE: z.preprocess(emptyToUndefined, z.string().min(1).default('Charon')),
  GEMINI_SYSTEM_INSTRUCTION: z.preprocess(
    emptyToUndefined,
    z
      .string()
      .min(1)
      .default('You are a concise, polite phone agent. Keep answers to one or two sentences.'),
  ),
  GREETING_TEXT: z.preprocess(emptyToUndefined, z.string().min(1).default('Connecting you to the assistant.')),
  SPEECH_INPUT_SAMPLE_RATE: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(16000)),
  TELEPHONY_SAMPLE_RATE: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(8000)),
  TELEPHONY_COMPANDING: z.preprocess(emptyToUndefined, z.enum(['mulaw', 'alaw']).default('mulaw')),
  TELEPHONY_FRAME_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(20)),
  SCHEDULER_HIGH_WATER_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(20000)),
  SCHEDULER_OVERRUN_POLICY: z.preprocess(
    emptyToUndefined,
    z.enum(['drop_oldest', 'drop_newest']).default('drop_oldest'),
  ),
  SCHEDULER_PARTIAL_HOLD_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().nonnegative().default(60)),
  DRAIN_GRACE_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(2000)),
  HANDSHAKE_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(10000)),
  START_EVENT_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(5000)),
  SEND_MAX_RETRIES: z.preprocess(emptyToUndefined, z.coerce.number().int().nonnegative().default(2)),
  SEND_RETRY_BASE_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().nonnegative().default(20)),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid environment variables: ${issues}`);
  }

  return parsed.data;
}

export const env = parseEnv(process.env);
