import assert from 'node:assert/strict';
import http from 'http';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';
import { SessionManager } from '../src/calls/sessionManager';
import { acceptMediaStream, attachMediaWebSocketServer, isMediaStreamRequest } from '../src/routes/mediaStream';
import { buildStreamTwiml, handleCallStatus, mediaStreamUrl } from '../src/routes/voice';
import { FakeSocket, FakeSpeechLink, ManualTicker, settle, testRelayConfig } from './fakes';

setTestEnv();

const streamOptions = { law: 'mulaw' as const, sampleRateHz: 8000, startTimeoutMs: 1000 };

function createManager(): SessionManager {
  return new SessionManager({
    config: testRelayConfig,
    createSpeechLink: () => new FakeSpeechLink(),
    tickerFactory: () => new ManualTicker(),
  });
}

function startMessage(callSid: string): Record<string, unknown> {
  return {
    event: 'start',
    sequenceNumber: '1',
    streamSid: `MZ-${callSid}`,
    start: { streamSid: `MZ-${callSid}`, callSid, tracks: ['inbound'] },
  };
}

test('media stream url swaps the scheme and appends the path', () => {
  assert.equal(mediaStreamUrl('https://relay.example.test/'), 'wss://relay.example.test/media-stream');
  assert.equal(mediaStreamUrl('http://localhost:5050'), 'ws://localhost:5050/media-stream');
});

test('stream twiml greets and connects the media stream', () => {
  const twiml = buildStreamTwiml({ greeting: 'Hi & welcome', streamUrl: 'wss://relay.example.test/media-stream' });

  assert.equal(
    twiml,
    [
      '<?xml version="1.0" encoding="UTF-8"?>',
      '<Response>',
      '  <Say>Hi &amp; welcome</Say>',
      '  <Connect>',
      '    <Stream url="wss://relay.example.test/media-stream" />',
      '  </Connect>',
      '</Response>',
    ].join('\n'),
  );
});

test('a media stream start creates the relay session for its call', async () => {
  const manager = createManager();
  const socket = new FakeSocket();
  const accepting = acceptMediaStream(socket, manager, streamOptions);
  socket.receive({ event: 'connected', protocol: 'Call', version: '1.0.0' });
  socket.receive(startMessage('CA-1'));

  const session = await accepting;
  assert.ok(session);
  assert.equal(session.callId, 'CA-1');
  assert.equal(manager.getSession('CA-1'), session);
  await manager.shutdown();
});

test('a second stream for the same call is closed with a policy violation', async () => {
  const manager = createManager();
  const first = new FakeSocket();
  const firstAccepting = acceptMediaStream(first, manager, streamOptions);
  first.receive(startMessage('CA-1'));
  const session = await firstAccepting;
  await settle();

  const second = new FakeSocket();
  const secondAccepting = acceptMediaStream(second, manager, streamOptions);
  second.receive(startMessage('CA-1'));

  assert.equal(await secondAccepting, null);
  assert.deepEqual(second.closed, { code: 1008, reason: 'duplicate_call_identifier' });
  assert.equal(first.closed, undefined);
  assert.equal(session?.getState(), 'ACTIVE');
  await manager.shutdown();
});

test('a stream that never starts is closed', async () => {
  const manager = createManager();
  const socket = new FakeSocket();

  assert.equal(await acceptMediaStream(socket, manager, { ...streamOptions, startTimeoutMs: 10 }), null);
  assert.deepEqual(socket.closed, { code: 1000, reason: 'start_not_received' });
  assert.equal(manager.activeCount, 0);
});

test('terminal call statuses end the session', async () => {
  const manager = createManager();
  const socket = new FakeSocket();
  const accepting = acceptMediaStream(socket, manager, streamOptions);
  socket.receive(startMessage('CA-1'));
  const session = await accepting;
  assert.ok(session);
  await settle();

  assert.equal(handleCallStatus({ CallStatus: 'completed' }, manager), 400);
  assert.equal(handleCallStatus({ CallSid: 'CA-1', CallStatus: 'in-progress' }, manager), 204);
  assert.equal(session.getState(), 'ACTIVE');

  assert.equal(handleCallStatus({ CallSid: 'CA-1', CallStatus: 'completed' }, manager), 204);
  assert.equal((await session.closed).reason, 'call_ended');
  assert.equal(manager.activeCount, 0);
});

test('only well-formed media stream upgrade targets are accepted', () => {
  assert.equal(isMediaStreamRequest({ url: '/media-stream', headers: { host: 'relay.example.test' } }), true);
  assert.equal(isMediaStreamRequest({ url: '/media-stream?x=1', headers: {} }), true);
  assert.equal(isMediaStreamRequest({ url: '/voice', headers: { host: 'relay.example.test' } }), false);
  assert.equal(isMediaStreamRequest({ url: '//', headers: { host: 'relay.example.test' } }), false);
  assert.equal(isMediaStreamRequest({ url: '/media-stream', headers: { host: 'bad host[' } }), false);
  assert.equal(isMediaStreamRequest({ url: undefined, headers: {} }), false);
});

test('a malformed upgrade request is dropped without taking the server down', () => {
  const server = http.createServer();
  const wss = attachMediaWebSocketServer(server, createManager(), streamOptions);
  let destroyed = 0;
  const socket = {
    destroy: () => {
      destroyed += 1;
    },
  };

  assert.doesNotThrow(() => server.emit('upgrade', { url: '//', headers: { host: 'localhost' } }, socket, Buffer.alloc(0)));
  assert.doesNotThrow(() =>
    server.emit('upgrade', { url: '/media-stream', headers: { host: 'bad host[' } }, socket, Buffer.alloc(0)),
  );
  assert.equal(destroyed, 2);
  wss.close();
});
