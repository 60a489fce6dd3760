import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';
import { DuplicateCallIdentifierError } from '../src/calls/errors';
import { SessionManager, buildRelayConfig } from '../src/calls/sessionManager';
import { parseEnv } from '../src/env';
import { FakeSpeechLink, FakeTelephonyLink, ManualTicker, settle, testRelayConfig } from './fakes';

setTestEnv();

function createManager(): { manager: SessionManager; speechLinks: FakeSpeechLink[] } {
  const speechLinks: FakeSpeechLink[] = [];
  const manager = new SessionManager({
    config: testRelayConfig,
    createSpeechLink: () => {
      const link = new FakeSpeechLink();
      speechLinks.push(link);
      return link;
    },
    tickerFactory: () => new ManualTicker(),
  });
  return { manager, speechLinks };
}

test('onCallStart creates, starts and registers a session', async () => {
  const { manager } = createManager();
  const session = manager.onCallStart('CA-1', new FakeTelephonyLink());
  await settle();

  assert.equal(manager.getSession('CA-1'), session);
  assert.equal(session.getState(), 'ACTIVE');
  assert.equal(manager.activeCount, 1);
  await manager.shutdown();
});

test('a second start for the same call is rejected and the first is unaffected', async () => {
  const { manager, speechLinks } = createManager();
  const first = manager.onCallStart('CA-1', new FakeTelephonyLink());
  await settle();

  assert.throws(() => manager.onCallStart('CA-1', new FakeTelephonyLink()), DuplicateCallIdentifierError);

  assert.equal(speechLinks.length, 1);
  assert.equal(manager.getSession('CA-1'), first);
  assert.equal(first.getState(), 'ACTIVE');
  await manager.shutdown();
});

test('a closed session is removed from the registry', async () => {
  const { manager } = createManager();
  const telephony = new FakeTelephonyLink();
  const session = manager.onCallStart('CA-1', telephony);
  await settle();

  telephony.hangUp(false, 'socket_reset_1006');
  await settle();

  assert.deepEqual(session.getStateHistory(), ['CONNECTING', 'ACTIVE', 'DRAINING', 'CLOSED']);
  assert.equal(manager.getSession('CA-1'), undefined);
  assert.equal(manager.activeCount, 0);
});

test('onCallEnd drains the session; unknown calls are ignored', async () => {
  const { manager } = createManager();
  const session = manager.onCallStart('CA-1', new FakeTelephonyLink());
  await settle();

  assert.equal(manager.onCallEnd('CA-unknown'), false);
  assert.equal(manager.onCallEnd('CA-1'), true);

  assert.equal((await session.closed).reason, 'call_ended');
  assert.equal(manager.activeCount, 0);
});

test('shutdown closes every session', async () => {
  const { manager } = createManager();
  const first = manager.onCallStart('CA-1', new FakeTelephonyLink());
  const second = manager.onCallStart('CA-2', new FakeTelephonyLink());
  await settle();

  await manager.shutdown();

  assert.equal((await first.closed).reason, 'shutdown');
  assert.equal((await second.closed).reason, 'shutdown');
  assert.equal(manager.activeCount, 0);
});

test('buildRelayConfig maps environment values', () => {
  const config = buildRelayConfig(
    parseEnv({
      PUBLIC_BASE_URL: 'https://relay.example.test',
      GEMINI_API_KEY: 'test-secret',
      TELEPHONY_COMPANDING: 'alaw',
      SCHEDULER_OVERRUN_POLICY: 'drop_newest',
      DRAIN_GRACE_MS: '500',
    }),
  );

  assert.deepEqual(config, {
    telephonySampleRateHz: 8000,
    speechInputSampleRateHz: 16000,
    companding: 'alaw',
    frameMs: 20,
    highWaterMs: 20000,
    overrunPolicy: 'drop_newest',
    partialHoldMs: 60,
    drainGraceMs: 500,
    handshakeTimeoutMs: 10000,
    sendMaxRetries: 2,
    sendRetryBaseMs: 20,
  });
});
