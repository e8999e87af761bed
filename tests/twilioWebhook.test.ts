import assert from 'node:assert/strict';
import http from 'node:http';
import net from 'node:net';
import { test } from 'node:test';
import type { CapacityParams, CapacityResult, ReleaseParams } from '../src/limits/capacity';
import { MemoryOutcomeSink, closeServer, listen } from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

const VOICE_PARAMS = {
  CallSid: 'CA-hook-1',
  From: '+15550001111',
  To: '+15550002222',
  Direction: 'inbound',
};

async function startApp(capacity: (params: CapacityParams) => Promise<CapacityResult>) {
  const { buildServer } = await import('../src/server');
  const { SessionManager } = await import('../src/calls/sessionManager');
  const sink = new MemoryOutcomeSink();
  const releases: ReleaseParams[] = [];
  const acquired: CapacityParams[] = [];
  const sessionManager = new SessionManager({
    outcomeSink: sink,
    capacityRelease: async (params) => {
      releases.push(params);
    },
    createSession: () => {
      throw new Error('no media streams in webhook tests');
    },
    now: () => Date.UTC(2026, 2, 4, 15, 0, 0),
  });
  const { server } = buildServer({
    sessionManager,
    webhook: {
      acquireCapacity: async (params) => {
        acquired.push(params);
        return capacity(params);
      },
    },
  });
  const port = await listen(server);
  return { server, sessionManager, sink, releases, acquired, baseUrl: `http://127.0.0.1:${port}` };
}

async function signedPost(baseUrl: string, path: string, params: Record<string, string>, signature?: string) {
  const { computeTwilioSignature } = await import('../src/twilio/twilioVerify');
  const header = signature ?? computeTwilioSignature('test-secret', `https://voice.example.test${path}`, params);
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'X-Twilio-Signature': header },
    body: new URLSearchParams(params),
  });
}

test('the voice webhook connects the call to the media stream', async () => {
  const app = await startApp(async () => ({ ok: true }));
  try {
    const response = await signedPost(app.baseUrl, '/v1/twilio/voice?lead_id=lead-7&campaign_id=', VOICE_PARAMS);

    assert.equal(response.status, 200);
    assert.match(response.headers.get('content-type') ?? '', /^text\/xml/);
    assert.equal(
      await response.text(),
      '<?xml version="1.0" encoding="UTF-8"?><Response><Connect>' +
        '<Stream url="wss://voice.example.test/v1/twilio/media?token=test-token">' +
        '<Parameter name="from_number" value="+15550001111"/>' +
        '<Parameter name="to_number" value="+15550002222"/>' +
        '<Parameter name="direction" value="inbound"/>' +
        '<Parameter name="lead_id" value="lead-7"/>' +
        '</Stream></Connect></Response>',
    );
    assert.equal(app.acquired.length, 1);
    assert.equal(app.acquired[0]?.line, '+15550002222');
    assert.equal(app.acquired[0]?.callSid, 'CA-hook-1');
  } finally {
    await app.sessionManager.shutdown();
    await closeServer(app.server);
  }
});

test('a call over capacity is told the lines are busy', async () => {
  const app = await startApp(async () => ({ ok: false, reason: 'line_at_capacity' }));
  try {
    const response = await signedPost(app.baseUrl, '/v1/twilio/voice', VOICE_PARAMS);

    assert.equal(response.status, 200);
    assert.equal(
      await response.text(),
      '<?xml version="1.0" encoding="UTF-8"?><Response><Say>We are sorry, all of our lines are busy right now. ' +
        'Please try again later.</Say><Hangup/></Response>',
    );
  } finally {
    await app.sessionManager.shutdown();
    await closeServer(app.server);
  }
});

test('outbound calls take capacity on the calling line', async () => {
  const app = await startApp(async () => ({ ok: true }));
  try {
    const response = await signedPost(app.baseUrl, '/v1/twilio/voice', { ...VOICE_PARAMS, Direction: 'outbound-api' });

    assert.equal(response.status, 200);
    assert.match(await response.text(), /<Parameter name="direction" value="outbound"\/>/);
    assert.equal(app.acquired[0]?.line, '+15550001111');
  } finally {
    await app.sessionManager.shutdown();
    await closeServer(app.server);
  }
});

test('a bad signature is refused before capacity is touched', async () => {
  const app = await startApp(async () => ({ ok: true }));
  try {
    const response = await signedPost(app.baseUrl, '/v1/twilio/voice', VOICE_PARAMS, 'bm90LWEtc2lnbmF0dXJl');

    assert.equal(response.status, 403);
    assert.deepEqual(await response.json(), { error: 'invalid_signature' });
    assert.deepEqual(app.acquired, []);
  } finally {
    await app.sessionManager.shutdown();
    await closeServer(app.server);
  }
});

test('a capacity store failure is a server error', async () => {
  const app = await startApp(async () => {
    throw new Error('redis unavailable');
  });
  try {
    const response = await signedPost(app.baseUrl, '/v1/twilio/voice', VOICE_PARAMS);

    assert.equal(response.status, 500);
    assert.deepEqual(await response.json(), { error: 'internal_server_error' });
  } finally {
    await app.sessionManager.shutdown();
    await closeServer(app.server);
  }
});

test('a terminal status for a call that never streamed records the outcome', async () => {
  const app = await startApp(async () => ({ ok: true }));
  try {
    const response = await signedPost(app.baseUrl, '/v1/twilio/status', { ...VOICE_PARAMS, CallStatus: 'no-answer' });

    assert.equal(response.status, 204);
    assert.equal(app.sink.records.length, 1);
    assert.equal(app.sink.records[0]?.outcome, 'no_answer');
    assert.equal(app.sink.records[0]?.reason, 'call_no-answer');
    assert.equal(app.releases[0]?.line, '+15550002222');
    assert.equal(app.releases[0]?.callSid, 'CA-hook-1');
  } finally {
    await app.sessionManager.shutdown();
    await closeServer(app.server);
  }
});

test('an unknown call status is rejected', async () => {
  const app = await startApp(async () => ({ ok: true }));
  try {
    const response = await signedPost(app.baseUrl, '/v1/twilio/status', { ...VOICE_PARAMS, CallStatus: 'exploded' });

    assert.equal(response.status, 400);
    assert.deepEqual(await response.json(), { error: 'invalid_payload' });
    assert.deepEqual(app.sink.records, []);
  } finally {
    await app.sessionManager.shutdown();
    await closeServer(app.server);
  }
});

test('health reports the number of live calls', async () => {
  const app = await startApp(async () => ({ ok: true }));
  try {
    const response = await fetch(`${app.baseUrl}/health`);

    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), { status: 'ok', active_calls: 0 });
  } finally {
    await app.sessionManager.shutdown();
    await closeServer(app.server);
  }
});

test('media upgrades need the stream path and token', async () => {
  const { isAuthorizedMediaRequest } = await import('../src/server');
  const request = (url: string): http.IncomingMessage => {
    const message = new http.IncomingMessage(new net.Socket());
    message.url = url;
    message.headers = { host: 'voice.example.test' };
    return message;
  };

  assert.equal(isAuthorizedMediaRequest(request('/v1/twilio/media?token=test-token')), true);
  assert.equal(isAuthorizedMediaRequest(request('/v1/twilio/media?token=wrong')), false);
  assert.equal(isAuthorizedMediaRequest(request('/v1/twilio/media')), false);
  assert.equal(isAuthorizedMediaRequest(request('/other?token=test-token')), false);
});
