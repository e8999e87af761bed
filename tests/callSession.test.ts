import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { AgentRequest, AgentResponse } from '../src/agent/types';
import type { CallSessionSettings } from '../src/calls/types';
import {
  FakeCallControl,
  FakeTransport,
  FakeTtsProvider,
  MemoryOutcomeSink,
  ScriptedAgent,
  ScriptedSttProvider,
  sleep,
  startInfo,
  testSettings,
  waitFor,
} from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

interface Harness {
  transport: FakeTransport;
  stt: ScriptedSttProvider;
  tts: FakeTtsProvider;
  agent: ScriptedAgent;
  sink: MemoryOutcomeSink;
  session: import('../src/calls/callSession').CallSession;
}

async function createHarness(options: {
  transcripts?: Array<string | Error>;
  reply?: (request: AgentRequest, index: number) => AgentResponse;
  tts?: FakeTtsProvider;
  settings?: Partial<CallSessionSettings>;
  parameters?: Record<string, string>;
}): Promise<Harness> {
  const { CallSession } = await import('../src/calls/callSession');
  const { InMemoryCalendar } = await import('../src/tools/calendar');

  const transport = new FakeTransport();
  const stt = new ScriptedSttProvider(options.transcripts ?? []);
  const tts = options.tts ?? new FakeTtsProvider();
  const agent = new ScriptedAgent(options.reply ?? (() => ({ text: 'Okay.', toolCalls: [] })));
  const sink = new MemoryOutcomeSink();

  const session = new CallSession({
    transport,
    startInfo: startInfo(options.parameters),
    sttProvider: stt,
    ttsProvider: tts,
    agent,
    outcomeSink: sink,
    calendar: new InMemoryCalendar(),
    callControl: new FakeCallControl(),
    settings: testSettings(options.settings),
    sessionId: 'session-1',
  });

  return { transport, stt, tts, agent, sink, session };
}

/** 200 ms of speech, then enough silence to close the utterance. */
function speakUtterance(transport: FakeTransport): void {
  transport.pushSpeech(10);
  transport.pushSilence(6);
}

test('a caller utterance gets one agent reply and the session returns to listening', async () => {
  const h = await createHarness({
    transcripts: ['I would like to hear more'],
    reply: () => ({ text: 'Happy to help.', toolCalls: [] }),
  });
  const done = h.session.run();

  speakUtterance(h.transport);
  await waitFor(() => h.transport.marks.length === 1 && h.session.getTurnState() === 'listening');

  assert.equal(h.agent.requests.length, 1);
  assert.equal(h.agent.requests[0]?.transcript, 'I would like to hear more');
  assert.equal(h.agent.requests[0]?.sessionId, 'session-1');
  assert.equal(h.agent.requests[0]?.context.callerNumber, '+15550001111');
  assert.equal(h.agent.requests[0]?.context.turnIndex, 1);
  assert.equal(h.agent.requests[0]?.context.previousOutcome, null);
  assert.equal(h.transport.sent.length, 3);
  assert.deepEqual(h.transport.marks, ['reply-2']);
  assert.deepEqual(h.tts.texts, ['Happy to help.']);
  assert.deepEqual(h.session.getTurnStateHistory(), ['listening', 'thinking', 'speaking', 'listening']);
  assert.deepEqual(
    h.session.getOrchestrator().getHistory().map((step) => step.to),
    ['awaiting_agent', 'speaking', 'idle'],
  );

  h.transport.disconnect();
  const record = await done;

  assert.equal(record.outcome, 'disconnected');
  assert.equal(record.reason, 'transport_socket_closed');
  assert.equal(record.turns, 1);
  assert.equal(record.callSid, 'CA-test-call');
  assert.equal(record.from, '+15550001111');
  assert.deepEqual(
    record.transcript.map((entry) => [entry.role, entry.text]),
    [
      ['caller', 'I would like to hear more'],
      ['agent', 'Happy to help.'],
    ],
  );
  assert.equal(h.sink.records.length, 1);
});

test('barge-in while speaking interrupts synchronously and stops outbound audio', async () => {
  const h = await createHarness({
    transcripts: ['Tell me about pricing'],
    reply: () => ({ text: 'Let me walk you through all of our plans.', toolCalls: [] }),
    tts: new FakeTtsProvider(200, 2),
  });
  const done = h.session.run();

  speakUtterance(h.transport);
  await waitFor(() => h.session.getTurnState() === 'speaking' && h.transport.sent.length >= 3);

  h.transport.pushSpeech(3);
  await waitFor(() => h.transport.clearCount === 1);

  assert.equal(h.session.getTurnState(), 'listening');
  assert.deepEqual(h.session.getTurnStateHistory(), [
    'listening',
    'thinking',
    'speaking',
    'interrupted',
    'listening',
  ]);
  assert.equal(h.session.getOrchestrator().getState(), 'idle');
  assert.equal(h.session.getOrchestrator().getInterruptedTurnCount(), 1);
  assert.equal(h.tts.signals[0]?.aborted, true);

  const sentAtClear = h.transport.sentAtClear;
  await sleep(40);
  assert.equal(h.transport.sent.length, sentAtClear);

  h.transport.disconnect();
  const record = await done;
  assert.equal(record.outcome, 'disconnected');
});

test('transport disconnect while speaking cancels synthesis and tears down exactly once', async () => {
  const h = await createHarness({
    transcripts: ['What are your hours'],
    reply: () => ({ text: 'We are open every weekday from nine to five.', toolCalls: [] }),
    tts: new FakeTtsProvider(200, 2),
  });
  const done = h.session.run();

  speakUtterance(h.transport);
  await waitFor(() => h.session.getTurnState() === 'speaking' && h.transport.sent.length >= 2);

  h.transport.disconnect();
  const record = await done;

  assert.equal(record.outcome, 'disconnected');
  assert.equal(h.tts.signals[0]?.aborted, true);
  assert.equal(h.session.getOrchestrator().getState(), 'terminated');

  const again = await h.session.teardown('server_shutdown', 'shutdown');
  assert.equal(again, record);
  assert.equal(h.sink.records.length, 1);
  assert.deepEqual(h.transport.closeReasons, ['socket_closed']);
});

test('a call that hangs up before the caller speaks is recorded as no_answer', async () => {
  const h = await createHarness({});
  const done = h.session.run();

  h.transport.disconnect();
  const record = await done;

  assert.equal(record.outcome, 'no_answer');
  assert.equal(record.turns, 0);
  assert.deepEqual(record.transcript, []);
});

test('end_call records the agent outcome and ends the call after the goodbye', async () => {
  const h = await createHarness({
    transcripts: ['Thursday at ten works for me'],
    reply: (_request, index) =>
      index === 0
        ? {
            text: '',
            toolCalls: [{ id: 'call_1', name: 'end_call', args: { outcome: 'meeting_booked', notes: 'booked thursday' } }],
          }
        : { text: 'Thanks, talk soon.', toolCalls: [] },
  });
  const done = h.session.run();

  speakUtterance(h.transport);
  const record = await done;

  assert.equal(record.outcome, 'meeting_booked');
  assert.equal(record.reason, 'conversation_ended');
  assert.deepEqual(record.notes, ['booked thursday']);
  assert.deepEqual(
    record.toolInvocations.map((call) => [call.name, call.status]),
    [['end_call', 'ok']],
  );
  assert.deepEqual(
    record.transcript.map((entry) => entry.role),
    ['caller', 'tool', 'agent'],
  );
  assert.equal(h.agent.requests[1]?.toolResults?.[0]?.status, 'ok');
  assert.deepEqual(h.tts.texts, ['Thanks, talk soon.']);
});

test('dead air triggers a reprompt and then ends the call with no_response', async () => {
  const h = await createHarness({
    settings: { deadAirMs: 40, deadAirMaxReprompts: 1 },
  });
  const record = await h.session.run();

  assert.deepEqual(h.tts.texts, ['Are you still there?']);
  assert.equal(record.outcome, 'no_response');
  assert.equal(record.reason, 'dead_air');
});

test('a failed recognition is answered with the apology instead of an agent turn', async () => {
  const h = await createHarness({
    transcripts: [new Error('recognizer offline')],
  });
  const done = h.session.run();

  speakUtterance(h.transport);
  await waitFor(() => h.tts.texts.length === 1 && h.session.getTurnState() === 'listening');

  assert.deepEqual(h.tts.texts, ['Sorry, I missed that. Could you say it again?']);
  assert.equal(h.agent.requests.length, 0);

  h.transport.disconnect();
  await done;
});

test('speech during the greeting echo guard does not barge in', async () => {
  const h = await createHarness({
    parameters: { greeting: 'Hello, thanks for calling the test line.' },
    settings: { bargeInEchoGuardMs: 60_000 },
    tts: new FakeTtsProvider(100, 2),
  });
  const done = h.session.run();

  await waitFor(() => h.session.getTurnState() === 'speaking' && h.transport.sent.length >= 2);
  h.transport.pushSpeech(5);
  await sleep(30);

  assert.equal(h.transport.clearCount, 0);
  assert.equal(h.session.getTurnState(), 'speaking');
  assert.deepEqual(h.tts.texts, ['Hello, thanks for calling the test line.']);

  h.transport.disconnect();
  await done;
});

test('barging in on the agent-unavailable apology still records agent_unavailable', async () => {
  const { AgentServiceError } = await import('../src/errors');
  const h = await createHarness({
    transcripts: ['Can you hear me'],
    reply: () => {
      throw new AgentServiceError('agent request timed out', { retryable: true });
    },
    tts: new FakeTtsProvider(200, 2),
  });
  const done = h.session.run();

  speakUtterance(h.transport);
  await waitFor(() => h.session.getTurnState() === 'speaking' && h.transport.sent.length >= 3);
  h.transport.pushSpeech(3);
  const record = await done;

  assert.equal(h.transport.clearCount, 1);
  assert.equal(record.outcome, 'agent_unavailable');
  assert.equal(record.reason, 'conversation_ended');
  assert.deepEqual(h.transport.closeReasons, ['conversation_ended']);
});

test('speech still buffered when the caller hangs up ends up in the transcript', async () => {
  const h = await createHarness({ transcripts: ['no thanks, bye'] });
  const done = h.session.run();

  h.transport.pushSpeech(10);
  await waitFor(() => h.transport.pendingInbound === 0);
  h.transport.disconnect();
  const record = await done;

  assert.equal(h.stt.requests.length, 1);
  assert.equal(h.agent.requests.length, 0);
  assert.equal(record.outcome, 'disconnected');
  assert.deepEqual(
    record.transcript.map((entry) => [entry.role, entry.text]),
    [['caller', 'no thanks, bye']],
  );
});

test('server shutdown drops speech that is still buffered', async () => {
  const h = await createHarness({ transcripts: ['wait, one more thing'] });
  const done = h.session.run();

  h.transport.pushSpeech(10);
  await waitFor(() => h.transport.pendingInbound === 0);
  await h.session.teardown('server_shutdown', 'shutdown');
  const record = await done;

  assert.equal(h.stt.requests.length, 0);
  assert.equal(record.outcome, 'shutdown');
  assert.deepEqual(record.transcript, []);
});

test('an answering machine greeting ends the call with voicemail', async () => {
  const h = await createHarness({
    transcripts: ['Hi, you have reached Sam. Please leave a message after the beep.'],
    settings: { voicemailMessage: 'Hi Sam, sorry we missed you. We will try again tomorrow.' },
  });
  const done = h.session.run();

  speakUtterance(h.transport);
  const record = await done;

  assert.equal(record.outcome, 'voicemail');
  assert.equal(record.reason, 'monitor_voicemail');
  assert.equal(h.agent.requests.length, 0);
  assert.deepEqual(h.tts.texts, ['Hi Sam, sorry we missed you. We will try again tomorrow.']);
});

test('a do-not-call request gets a goodbye and the hostile outcome', async () => {
  const h = await createHarness({ transcripts: ['Please stop calling me'] });
  const done = h.session.run();

  speakUtterance(h.transport);
  const record = await done;

  assert.equal(record.outcome, 'hostile');
  assert.equal(record.reason, 'monitor_do_not_call');
  assert.equal(h.agent.requests.length, 0);
  assert.deepEqual(record.notes, ['Call monitor: do_not_call (Please stop calling me)']);
  assert.deepEqual(
    record.transcript.map((entry) => [entry.role, entry.text]),
    [
      ['caller', 'Please stop calling me'],
      ['agent', "Understood, we won't call you again. Goodbye."],
    ],
  );
});

test('repeated empty transcriptions end the call with audio_issues', async () => {
  const h = await createHarness({
    transcripts: ['', ''],
    settings: { monitorMaxEmptySegments: 2 },
  });
  const done = h.session.run();

  speakUtterance(h.transport);
  speakUtterance(h.transport);
  const record = await done;

  assert.equal(record.outcome, 'audio_issues');
  assert.equal(record.reason, 'monitor_audio_issues');
  assert.equal(h.stt.requests.length, 2);
  assert.equal(h.agent.requests.length, 0);
  assert.deepEqual(h.tts.texts, ["I'm having trouble hearing you, so I'll let you go. Goodbye."]);
});

test('a call over the maximum duration is wrapped up', async () => {
  const h = await createHarness({ settings: { maxCallDurationMs: 60 } });
  const record = await h.session.run();

  assert.equal(record.outcome, 'call_too_long');
  assert.equal(record.reason, 'monitor_call_too_long');
  assert.deepEqual(h.tts.texts, ['I appreciate your time, but I should let you go. Have a great day!']);
});
