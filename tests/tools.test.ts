import assert from 'node:assert/strict';
import { test } from 'node:test';
import { formatDate, formatTime, parseTimeOfDay, resolveDay } from '../src/tools/schedule';
import type { ToolContext } from '../src/tools/types';
import { FakeCallControl } from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

// Wednesday
const NOW = new Date(Date.UTC(2026, 2, 4, 15, 0, 0));

interface RecordedContext {
  ctx: ToolContext;
  outcomes: string[];
  notes: string[];
  endRequests: number;
  callControl: FakeCallControl;
}

async function createContext(overrides: Partial<ToolContext> = {}): Promise<RecordedContext> {
  const { InMemoryCalendar } = await import('../src/tools/calendar');
  const callControl = new FakeCallControl();
  const recorded: RecordedContext = {
    outcomes: [],
    notes: [],
    endRequests: 0,
    callControl,
    ctx: {
      sessionId: 'session-1',
      callSid: 'CA-test-call',
      callerNumber: '+15550001111',
      calleeNumber: '+15550002222',
      direction: 'inbound',
      calendar: new InMemoryCalendar(),
      callControl,
      now: () => NOW,
      signal: new AbortController().signal,
      logContext: {},
      recordOutcome: (outcome, notes) => {
        recorded.outcomes.push(outcome);
        if (notes) recorded.notes.push(notes);
      },
      addNote: (note) => {
        recorded.notes.push(note);
      },
      requestEnd: () => {
        recorded.endRequests += 1;
      },
      ...overrides,
    },
  };
  return recorded;
}

async function createRegistry(options: Partial<import('../src/tools/registry').ToolRegistryOptions> = {}) {
  const { ToolRegistry } = await import('../src/tools/registry');
  return new ToolRegistry({ timeoutMs: 500, ...options });
}

test('resolveDay understands relative days, weekdays and ISO dates', () => {
  assert.equal(formatDate(resolveDay('today', NOW)), '2026-03-04');
  assert.equal(formatDate(resolveDay('tomorrow', NOW)), '2026-03-05');
  assert.equal(formatDate(resolveDay('Monday', NOW)), '2026-03-09');
  assert.equal(formatDate(resolveDay('next wednesday', NOW)), '2026-03-11');
  assert.equal(formatDate(resolveDay('2026-04-01', NOW)), '2026-04-01');
  assert.equal(formatDate(resolveDay('sometime soon', NOW)), '2026-03-05');
});

test('parseTimeOfDay reads clock times and parts of the day', () => {
  assert.equal(formatTime(parseTimeOfDay('2pm')), '14:00');
  assert.equal(formatTime(parseTimeOfDay('10:30 am')), '10:30');
  assert.equal(formatTime(parseTimeOfDay('12am')), '00:00');
  assert.equal(formatTime(parseTimeOfDay('14:00')), '14:00');
  assert.equal(formatTime(parseTimeOfDay('afternoon')), '14:00');
  assert.equal(formatTime(parseTimeOfDay('whenever')), '10:00');
});

test('the registry lists every tool', async () => {
  const registry = await createRegistry();
  assert.deepEqual(registry.names(), [
    'check_availability',
    'book_meeting',
    'request_callback',
    'send_sms',
    'transfer_call',
    'add_note',
    'end_call',
  ]);
});

test('check_availability offers the first open slots', async () => {
  const registry = await createRegistry();
  const { ctx } = await createContext();

  const output = await registry.execute({ id: 'call_1', name: 'check_availability', args: { day: 'tomorrow' } }, ctx);

  assert.equal(output.message, 'Available on 2026-03-05: 09:00, 09:30, 10:00, 10:30, 11:00, 11:30');
});

test('book_meeting books once and offers alternatives afterwards', async () => {
  const registry = await createRegistry();
  const recorded = await createContext();
  const call = { id: 'call_1', name: 'book_meeting', args: { day: 'tomorrow', time: '2pm', contactName: 'Jordan Lee' } };

  const booked = await registry.execute(call, recorded.ctx);
  assert.equal(booked.message, 'Meeting booked for 2026-03-05 at 14:00 with Jordan Lee.');
  assert.deepEqual(recorded.outcomes, ['meeting_booked']);
  assert.deepEqual(recorded.notes, ['Meeting booked: 2026-03-05 14:00 with Jordan Lee']);

  const again = await registry.execute({ ...call, id: 'call_2' }, recorded.ctx);
  assert.equal(again.message, '14:00 on 2026-03-05 is not available.');
  assert.deepEqual(again.data?.alternatives, ['09:00', '09:30', '10:00']);
  assert.deepEqual(recorded.outcomes, ['meeting_booked']);
});

test('invalid arguments are rejected with a ToolError', async () => {
  const { ToolError } = await import('../src/errors');
  const registry = await createRegistry();
  const { ctx } = await createContext();

  await assert.rejects(
    registry.execute({ id: 'call_1', name: 'book_meeting', args: { day: 'tomorrow', time: '2pm' } }, ctx),
    (error: unknown) =>
      error instanceof ToolError &&
      error.toolName === 'book_meeting' &&
      error.message === 'invalid arguments: contactName: Required',
  );
});

test('unknown tools are rejected', async () => {
  const { ToolError } = await import('../src/errors');
  const registry = await createRegistry();
  const { ctx } = await createContext();

  await assert.rejects(
    registry.execute({ id: 'call_1', name: 'fly_to_moon', args: {} }, ctx),
    (error: unknown) => error instanceof ToolError && error.message === 'unknown tool "fly_to_moon"',
  );
});

test('a tool that outlives its budget fails with a timed-out ToolError', async () => {
  const { ToolError } = await import('../src/errors');
  let sawAbort = false;
  const registry = await createRegistry({
    timeoutMs: 20,
    handlers: {
      check_availability: (_args, ctx) =>
        new Promise((resolve) => {
          ctx.signal.addEventListener('abort', () => {
            sawAbort = true;
            setTimeout(() => resolve({ message: 'too late' }), 0);
          });
        }),
    },
  });
  const { ctx } = await createContext();

  await assert.rejects(
    registry.execute({ id: 'call_1', name: 'check_availability', args: {} }, ctx),
    (error: unknown) => error instanceof ToolError && error.timedOut && error.message === 'timed out after 20ms',
  );
  assert.equal(sawAbort, true);
});

test('send_sms texts the caller through call control', async () => {
  const registry = await createRegistry();
  const recorded = await createContext();

  const output = await registry.execute(
    { id: 'call_1', name: 'send_sms', args: { body: 'Your meeting is confirmed.' } },
    recorded.ctx,
  );

  assert.equal(output.message, 'Text message sent to +15550001111.');
  assert.deepEqual(recorded.callControl.sms, [{ to: '+15550001111', body: 'Your meeting is confirmed.' }]);
  assert.deepEqual(recorded.notes, ['SMS sent to +15550001111']);
});

test('send_sms needs a recipient', async () => {
  const registry = await createRegistry();
  const { ctx } = await createContext({ callerNumber: undefined });

  await assert.rejects(
    registry.execute({ id: 'call_1', name: 'send_sms', args: { body: 'hello' } }, ctx),
    /no recipient number for this call/,
  );
});

test('transfer_call transfers to the configured number and ends the conversation', async () => {
  const registry = await createRegistry();
  const recorded = await createContext({ transferNumber: '+15550009999' });

  const output = await registry.execute({ id: 'call_1', name: 'transfer_call', args: {} }, recorded.ctx);

  assert.equal(output.message, 'Transferring the call to +15550009999.');
  assert.deepEqual(recorded.callControl.transfers, [{ callSid: 'CA-test-call', to: '+15550009999' }]);
  assert.deepEqual(recorded.outcomes, ['transferred']);
  assert.equal(recorded.endRequests, 1);
});

test('end_call normalizes the outcome', async () => {
  const registry = await createRegistry();
  const recorded = await createContext();

  const known = await registry.execute({ id: 'call_1', name: 'end_call', args: { outcome: ' Voicemail ' } }, recorded.ctx);
  const unknown = await registry.execute({ id: 'call_2', name: 'end_call', args: { outcome: 'bored' } }, recorded.ctx);

  assert.equal(known.message, 'Call ended with outcome: voicemail');
  assert.equal(unknown.message, 'Call ended with outcome: not_interested');
  assert.deepEqual(recorded.outcomes, ['voicemail', 'not_interested']);
  assert.equal(recorded.endRequests, 2);
});

test('add_note and request_callback record notes', async () => {
  const registry = await createRegistry();
  const recorded = await createContext();

  await registry.execute({ id: 'call_1', name: 'add_note', args: { note: 'Prefers email' } }, recorded.ctx);
  const callback = await registry.execute(
    { id: 'call_2', name: 'request_callback', args: { day: 'friday', time: 'morning', reason: 'needs budget approval' } },
    recorded.ctx,
  );

  assert.equal(callback.message, 'Callback scheduled for 2026-03-06 at 10:00.');
  assert.deepEqual(recorded.outcomes, ['callback_requested']);
  assert.deepEqual(recorded.notes, ['Prefers email', 'Callback requested: 2026-03-06 10:00 - needs budget approval']);
});
