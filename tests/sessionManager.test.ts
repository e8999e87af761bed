import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { ReleaseParams } from '../src/limits/capacity';
import {
  FakeCallControl,
  FakeTransport,
  FakeTtsProvider,
  MemoryOutcomeSink,
  ScriptedAgent,
  ScriptedSttProvider,
  startInfo,
  testSettings,
  waitFor,
} from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

async function createManager(options: { now?: () => number; sweepIntervalMs?: number } = {}) {
  const { SessionManager } = await import('../src/calls/sessionManager');
  const { CallSession } = await import('../src/calls/callSession');
  const { InMemoryCalendar } = await import('../src/tools/calendar');
  const sink = new MemoryOutcomeSink();
  const releases: ReleaseParams[] = [];

  const manager = new SessionManager({
    outcomeSink: sink,
    capacityRelease: async (params) => {
      releases.push(params);
    },
    idleTtlMinutes: 1,
    sweepIntervalMs: options.sweepIntervalMs ?? 60_000,
    now: options.now,
    createSession: (transport, info) =>
      new CallSession({
        transport,
        startInfo: info,
        sttProvider: new ScriptedSttProvider([]),
        ttsProvider: new FakeTtsProvider(),
        agent: new ScriptedAgent(() => ({ text: 'Okay.', toolCalls: [] })),
        outcomeSink: sink,
        calendar: new InMemoryCalendar(),
        callControl: new FakeCallControl(),
        settings: testSettings(),
      }),
  });
  return { manager, sink, releases };
}

test('a session starts when the stream starts and releases capacity when it ends', async () => {
  const { manager, sink, releases } = await createManager();
  const transport = new FakeTransport('transport-a');

  const attached = manager.attachTransport(transport, { requestId: 'req-1' });
  assert.equal(manager.activeCount(), 0);
  transport.start(startInfo());

  const session = await attached;
  assert.ok(session);
  assert.equal(session.callSid, 'CA-test-call');
  assert.equal(manager.activeCount(), 1);
  assert.equal(manager.getByCallSid('CA-test-call'), session);
  assert.equal(manager.isCallActive('CA-test-call'), true);

  transport.disconnect();
  await waitFor(() => releases.length === 1);

  assert.deepEqual(releases, [{ line: '+15550002222', callSid: 'CA-test-call' }]);
  assert.equal(manager.activeCount(), 0);
  assert.equal(manager.getByCallSid('CA-test-call'), undefined);
  assert.equal(manager.isCallActive('CA-test-call'), false);
  assert.equal(sink.records.length, 1);
  await manager.shutdown();
});

test('outbound calls release capacity on the calling line', async () => {
  const { manager, releases } = await createManager();
  const transport = new FakeTransport('transport-out');
  transport.start(startInfo({ direction: 'outbound', from_number: '+15550003333', to_number: '+15550004444' }));

  const session = await manager.attachTransport(transport);
  assert.equal(session?.direction, 'outbound');
  transport.disconnect();
  await waitFor(() => releases.length === 1);

  assert.equal(releases[0]?.line, '+15550003333');
  await manager.shutdown();
});

test('a stream that closes before starting gets no session', async () => {
  const { manager } = await createManager();
  const transport = new FakeTransport('transport-b');

  const attached = manager.attachTransport(transport);
  transport.disconnect();

  assert.equal(await attached, null);
  assert.equal(manager.activeCount(), 0);
  await manager.shutdown();
});

test('a second stream for a live call is refused', async () => {
  const { manager } = await createManager();
  const first = new FakeTransport('transport-1');
  const second = new FakeTransport('transport-2');
  first.start(startInfo());
  second.start(startInfo());

  const session = await manager.attachTransport(first);
  const duplicate = await manager.attachTransport(second);

  assert.ok(session);
  assert.equal(duplicate, null);
  await waitFor(() => second.isClosed());
  assert.deepEqual(second.closeReasons, ['duplicate_stream']);
  assert.equal(first.isClosed(), false);
  assert.equal(manager.activeCount(), 1);
  await manager.shutdown();
});

test('a terminal status callback tears down the live session', async () => {
  const { manager, sink } = await createManager();
  const transport = new FakeTransport('transport-c');
  transport.start(startInfo());
  await manager.attachTransport(transport);

  await manager.onCallStatus({ callSid: 'CA-test-call', status: 'completed' });

  await waitFor(() => sink.records.length === 1);
  assert.equal(sink.records[0]?.reason, 'call_completed');
  assert.equal(sink.records[0]?.outcome, 'no_answer');
  assert.deepEqual(transport.closeReasons, ['call_completed']);
  await manager.shutdown();
});

test('a terminal status for a call without a stream is recorded once', async () => {
  const { manager, sink, releases } = await createManager({ now: () => Date.UTC(2026, 2, 4, 15, 0, 0) });
  const update = {
    callSid: 'CA-busy',
    status: 'busy' as const,
    from: '+15550001111',
    to: '+15550002222',
    direction: 'inbound' as const,
  };

  await manager.onCallStatus(update, { requestId: 'req-9' });
  await manager.onCallStatus(update);

  assert.deepEqual(releases, [{ line: '+15550002222', callSid: 'CA-busy', requestId: 'req-9' }]);
  assert.deepEqual(sink.records, [
    {
      sessionId: 'CA-busy',
      callSid: 'CA-busy',
      streamSid: null,
      from: '+15550001111',
      to: '+15550002222',
      direction: 'inbound',
      leadId: null,
      campaignId: null,
      outcome: 'busy',
      reason: 'call_busy',
      startedAt: '2026-03-04T15:00:00.000Z',
      endedAt: '2026-03-04T15:00:00.000Z',
      durationMs: 0,
      turns: 0,
      transcript: [],
      notes: [],
      toolInvocations: [],
    },
  ]);
  assert.equal(manager.isCallActive('CA-busy'), false);
  await manager.shutdown();
});

test('non-terminal statuses change nothing', async () => {
  const { manager, sink, releases } = await createManager();

  await manager.onCallStatus({ callSid: 'CA-ringing', status: 'ringing' });

  assert.deepEqual(sink.records, []);
  assert.deepEqual(releases, []);
  assert.equal(manager.isCallActive('CA-ringing'), true);
  await manager.shutdown();
});

test('shutdown ends every session and refuses new ones', async () => {
  const { manager, sink } = await createManager();
  const transport = new FakeTransport('transport-d');
  transport.start(startInfo());
  await manager.attachTransport(transport);

  await manager.shutdown();

  assert.equal(sink.records[0]?.outcome, 'shutdown');
  assert.equal(sink.records[0]?.reason, 'server_shutdown');

  const late = new FakeTransport('transport-e');
  late.start(startInfo({ from_number: '+15550005555' }));
  assert.equal(await manager.attachTransport(late), null);
  await waitFor(() => late.isClosed());
  assert.deepEqual(late.closeReasons, ['shutting_down']);
});

test('idle sessions are swept', async () => {
  const { manager, sink } = await createManager({ now: () => Date.now() + 120_000, sweepIntervalMs: 10 });
  const transport = new FakeTransport('transport-f');
  transport.start(startInfo());
  await manager.attachTransport(transport);

  await waitFor(() => sink.records.length === 1);

  assert.equal(sink.records[0]?.reason, 'idle_timeout');
  await manager.shutdown();
});
