import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';
import { parseEnv } from '../src/env';

setTestEnv();

const required = { PUBLIC_BASE_URL: 'https://relay.example.test', GEMINI_API_KEY: 'test-secret' };

test('defaults apply when only required values are set', () => {
  const parsed = parseEnv(required);

  assert.equal(parsed.PORT, 5050);
  assert.equal(parsed.TELEPHONY_COMPANDING, 'mulaw');
  assert.equal(parsed.TELEPHONY_SAMPLE_RATE, 8000);
  assert.equal(parsed.SPEECH_INPUT_SAMPLE_RATE, 16000);
  assert.equal(parsed.SCHEDULER_HIGH_WATER_MS, 20000);
  assert.equal(parsed.SCHEDULER_OVERRUN_POLICY, 'drop_oldest');
  assert.equal(parsed.GEMINI_VOICE, 'Charon');
});

test('empty strings fall back to defaults and numbers are coerced', () => {
  const parsed = parseEnv({ ...required, PORT: '', DRAIN_GRACE_MS: '750' });
  assert.equal(parsed.PORT, 5050);
  assert.equal(parsed.DRAIN_GRACE_MS, 750);
});

test('invalid values are reported by name', () => {
  assert.throws(() => parseEnv({ ...required, TELEPHONY_COMPANDING: 'ulaw' }), /Invalid environment variables: TELEPHONY_COMPANDING/);
  assert.throws(() => parseEnv({ PUBLIC_BASE_URL: 'https://relay.example.test' }), /GEMINI_API_KEY/);
});
