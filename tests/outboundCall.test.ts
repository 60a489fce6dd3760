import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';
import { OutboundCallError, buildCallRequest, placeOutboundCall, type FetchLike } from '../src/telephony/outboundCall';

setTestEnv();

const callOptions = {
  accountSid: 'AC-test',
  authToken: 'test-secret',
  from: '+15550000001',
  to: '+15550000002',
  voiceUrl: 'https://relay.example.test/voice',
  statusCallbackUrl: 'https://relay.example.test/call-status',
};

test('buildCallRequest posts a form with basic auth', () => {
  const { url, init } = buildCallRequest(callOptions);

  assert.equal(url, 'https://api.twilio.com/2010-04-01/Accounts/AC-test/Calls.json');
  assert.equal(init.method, 'POST');

  const headers = new Headers(init.headers);
  assert.equal(headers.get('authorization'), `Basic ${Buffer.from('AC-test:test-secret').toString('base64')}`);
  assert.equal(headers.get('content-type'), 'application/x-www-form-urlencoded');

  const form = new URLSearchParams(String(init.body));
  assert.equal(form.get('To'), '+15550000002');
  assert.equal(form.get('From'), '+15550000001');
  assert.equal(form.get('Url'), 'https://relay.example.test/voice');
  assert.equal(form.get('StatusCallback'), 'https://relay.example.test/call-status');
  assert.deepEqual(form.getAll('StatusCallbackEvent'), ['initiated', 'ringing', 'answered', 'completed']);
});

test('placeOutboundCall resolves with the new call sid', async () => {
  const calls: string[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    calls.push(url);
    assert.ok(init.signal);
    return new Response(JSON.stringify({ sid: 'CA-new', status: 'queued' }), {
      status: 201,
      headers: { 'content-type': 'application/json' },
    });
  };

  assert.equal(await placeOutboundCall(callOptions, fetchImpl), 'CA-new');
  assert.deepEqual(calls, ['https://api.twilio.com/2010-04-01/Accounts/AC-test/Calls.json']);
});

test('placeOutboundCall surfaces api errors with their status', async () => {
  const fetchImpl: FetchLike = async () => new Response('{"message":"Authenticate"}', { status: 401 });

  await assert.rejects(placeOutboundCall(callOptions, fetchImpl), (error: unknown) => {
    assert.ok(error instanceof OutboundCallError);
    assert.equal(error.status, 401);
    assert.equal(error.responseBody, '{"message":"Authenticate"}');
    return true;
  });
});
