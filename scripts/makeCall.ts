import dotenv from 'dotenv';
import { z } from 'zod';
import { log } from '../src/log';
import { placeOutboundCall } from '../src/telephony/outboundCall';

dotenv.config();

const ScriptEnvSchema = z.object({
  TWILIO_ACCOUNT_SID: z.string().min(1),
  TWILIO_AUTH_TOKEN: z.string().min(1),
  TWILIO_FROM: z.string().min(1),
  CALL_TO: z.string().min(1),
  PUBLIC_BASE_URL: z.string().url(),
});

async function main(): Promise<void> {
  const parsed = ScriptEnvSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    throw new Error(`Invalid environment variables: ${issues}`);
  }

  const config = parsed.data;
  const base = config.PUBLIC_BASE_URL.replace(/\/+$/, '');
  const callSid = await placeOutboundCall({
    accountSid: config.TWILIO_ACCOUNT_SID,
    authToken: config.TWILIO_AUTH_TOKEN,
    from: config.TWILIO_FROM,
    to: config.CALL_TO,
    voiceUrl: `${base}/voice`,
    statusCallbackUrl: `${base}/call-status`,
  });

  console.log(`Call SID: ${callSid}`);
}

main().catch((error: unknown) => {
  log.error({ err: error }, 'make call failed');
  process.exitCode = 1;
});
