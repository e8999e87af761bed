import assert from 'node:assert/strict';
import http from 'node:http';
import { test } from 'node:test';
import { closeServer, listen } from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

interface RecordedRequest {
  url?: string;
  authorization?: string;
  form: Record<string, string>;
}

type Reply = { status: number; body: unknown };

async function startTwilioServer(replies: Reply[]) {
  const requests: RecordedRequest[] = [];
  const server = http.createServer((req, res) => {
    let raw = '';
    req.on('data', (chunk: Buffer) => {
      raw += chunk.toString('utf8');
    });
    req.on('end', () => {
      requests.push({
        url: req.url,
        authorization: req.headers.authorization,
        form: Object.fromEntries(new URLSearchParams(raw)),
      });
      const reply = replies[Math.min(requests.length - 1, replies.length - 1)] ?? { status: 500, body: {} };
      res.writeHead(reply.status, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify(reply.body));
    });
  });
  const port = await listen(server);
  return { server, requests, baseUrl: `http://127.0.0.1:${port}/2010-04-01/` };
}

async function createClient(baseUrl: string, options: { fromNumber?: string } = { fromNumber: '+15550000001' }) {
  const { TwilioClient } = await import('../src/twilio/twilioClient');
  return new TwilioClient({
    accountSid: 'AC-test',
    authToken: 'test-secret',
    baseUrl,
    fromNumber: options.fromNumber,
    maxRetries: 1,
  });
}

test('sendSms posts a form with basic auth and returns the message sid', async () => {
  const twilio = await startTwilioServer([{ status: 201, body: { sid: 'SM-1' } }]);
  try {
    const client = await createClient(twilio.baseUrl);
    const result = await client.sendSms({ to: '+15550001111', body: 'See you Thursday.' });

    assert.deepEqual(result, { sid: 'SM-1' });
    assert.equal(twilio.requests[0]?.url, '/2010-04-01/Accounts/AC-test/Messages.json');
    assert.equal(
      twilio.requests[0]?.authorization,
      `Basic ${Buffer.from('AC-test:test-secret').toString('base64')}`,
    );
    assert.deepEqual(twilio.requests[0]?.form, { To: '+15550001111', From: '+15550000001', Body: 'See you Thursday.' });
  } finally {
    await closeServer(twilio.server);
  }
});

test('transferCall redirects the live call with a Dial', async () => {
  const twilio = await startTwilioServer([{ status: 200, body: { sid: 'CA-test-call' } }]);
  try {
    const client = await createClient(twilio.baseUrl);
    await client.transferCall('CA-test-call', '+15550009999');

    assert.equal(twilio.requests[0]?.url, '/2010-04-01/Accounts/AC-test/Calls/CA-test-call.json');
    assert.deepEqual(twilio.requests[0]?.form, { Twiml: '<Response><Dial>+15550009999</Dial></Response>' });
  } finally {
    await closeServer(twilio.server);
  }
});

test('a 503 is retried', async () => {
  const twilio = await startTwilioServer([
    { status: 503, body: { message: 'unavailable' } },
    { status: 201, body: { sid: 'SM-2' } },
  ]);
  try {
    const client = await createClient(twilio.baseUrl);
    const result = await client.sendSms({ to: '+15550001111', body: 'Hello' });

    assert.deepEqual(result, { sid: 'SM-2' });
    assert.equal(twilio.requests.length, 2);
  } finally {
    await closeServer(twilio.server);
  }
});

test('client errors carry the status and Twilio error code', async () => {
  const { TwilioApiError } = await import('../src/twilio/twilioClient');
  const twilio = await startTwilioServer([{ status: 400, body: { code: 21211, message: 'invalid To' } }]);
  try {
    const client = await createClient(twilio.baseUrl);
    await assert.rejects(
      client.sendSms({ to: 'not-a-number', body: 'Hello' }),
      (error: unknown) => error instanceof TwilioApiError && error.status === 400 && error.code === 21211,
    );
    assert.equal(twilio.requests.length, 1);
  } finally {
    await closeServer(twilio.server);
  }
});

test('sendSms needs a sending number', async () => {
  const { TwilioApiError } = await import('../src/twilio/twilioClient');
  const client = await createClient('http://127.0.0.1:9/2010-04-01', {});

  await assert.rejects(
    client.sendSms({ to: '+15550001111', body: 'Hello' }),
    (error: unknown) => error instanceof TwilioApiError && error.message === 'TWILIO_PHONE_NUMBER is not set',
  );
});
