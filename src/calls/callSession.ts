import { randomUUID } from 'crypto';

import { errorMessage } from '../errors';
import { log } from '../log';
import { incBargeIns, recordCallMetrics } from '../metrics';
import { ConversationOrchestrator } from '../orchestrator/conversationOrchestrator';
import type {
  AgentOutcome,
  CallDirection,
  CallOutcomeRecord,
  OutcomeCode,
  OutcomeSink,
  ToolInvocationRecord,
  TranscriptEntry,
  TranscriptRole,
} from '../outcomes/types';
import { AsyncQueue } from '../pipeline/asyncQueue';
import { SttStreamer } from '../stt/sttStreamer';
import type { FrameAnalysis, TranscriptSegment } from '../stt/types';
import { ToolRegistry } from '../tools/registry';
import type { ToolResult } from '../tools/types';
import type { MediaTransport, StreamStartInfo } from '../transport/types';
import { TtsStreamer } from '../tts/ttsStreamer';
import { CallMonitor } from './callMonitor';
import type { MonitorIssue } from './callMonitor';
import type { CallSessionDeps, CallSessionId, CallSessionSettings, SpeechKind, TurnState } from './types';

export const REPROMPT_TEXT = 'Are you still there?';

type TurnInput =
  | { kind: 'segment'; segment: TranscriptSegment }
  | { kind: 'reprompt' }
  | { kind: 'issue'; issue: MonitorIssue };

function delay(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

function parseDirection(value: string | undefined): CallDirection {
  return value === 'outbound' ? 'outbound' : 'inbound';
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * One phone call. Owns turn state, the transcript and the outcome, and runs the inbound
 * relay, the turn loop and the call watchdog (dead air, call length) until teardown.
 */
export class CallSession {
  public readonly id: CallSessionId;
  public readonly callSid: string;
  public readonly streamSid: string;
  public readonly from?: string;
  public readonly to?: string;
  public readonly direction: CallDirection;
  public readonly leadId?: string;
  public readonly campaignId?: string;
  public readonly contactName?: string;

  private readonly transport: MediaTransport;
  private readonly settings: CallSessionSettings;
  private readonly outcomeSink: OutcomeSink;
  private readonly stt: SttStreamer;
  private readonly tts: TtsStreamer;
  private readonly orchestrator: ConversationOrchestrator;
  private readonly monitor: CallMonitor;
  private readonly logContext: Record<string, unknown>;
  private readonly now: () => number;
  private readonly greetingText?: string;

  private readonly sessionController = new AbortController();
  private readonly inputs = new AsyncQueue<TurnInput>({ capacity: 16, overflow: 'drop_oldest' });
  private readonly transcript: TranscriptEntry[] = [];
  private readonly notes: string[] = [];
  private readonly toolInvocations: ToolInvocationRecord[] = [];
  private readonly turnStateHistory: TurnState[] = ['listening'];
  private readonly recordedSegments = new Set<string>();
  private readonly startedAtMs: number;

  private turnState: TurnState = 'listening';
  private utteranceController?: AbortController;
  private echoGuardUntilMs = 0;
  private lastActivityMs: number;
  private reprompts = 0;
  private repromptPending = false;
  private callerSpoke = false;
  private recordedOutcome?: OutcomeCode;
  private runPromise?: Promise<CallOutcomeRecord>;
  private teardownPromise?: Promise<CallOutcomeRecord>;
  private resolveEnded: (record: CallOutcomeRecord) => void = () => undefined;
  private readonly ended: Promise<CallOutcomeRecord>;

  constructor(deps: CallSessionDeps) {
    const start: StreamStartInfo = deps.startInfo;
    const params = start.parameters;

    this.id = deps.sessionId ?? randomUUID();
    this.callSid = start.callSid;
    this.streamSid = start.streamSid;
    this.from = nonEmpty(params.from_number);
    this.to = nonEmpty(params.to_number);
    this.direction = parseDirection(params.direction);
    this.leadId = nonEmpty(params.lead_id);
    this.campaignId = nonEmpty(params.campaign_id);
    this.contactName = nonEmpty(params.contact_name);
    this.greetingText = nonEmpty(params.greeting) ?? deps.settings.greetingText;

    this.transport = deps.transport;
    this.settings = deps.settings;
    this.outcomeSink = deps.outcomeSink;
    this.now = deps.now ?? Date.now;
    this.startedAtMs = this.now();
    this.lastActivityMs = this.startedAtMs;
    this.ended = new Promise((resolve) => {
      this.resolveEnded = resolve;
    });

    this.logContext = {
      session_id: this.id,
      call_sid: this.callSid,
      stream_sid: this.streamSid,
    };

    this.stt = new SttStreamer({
      provider: deps.sttProvider,
      frameMs: this.transport.frameMs,
      silenceEndMs: this.settings.silenceEndMs,
      minUtteranceMs: this.settings.minUtteranceMs,
      maxUtteranceMs: this.settings.maxUtteranceMs,
      preRollMs: this.settings.preRollMs,
      speechFramesRequired: this.settings.speechFramesRequired,
      segmentQueueSize: this.settings.segmentQueueSize,
      vadThreshold: this.settings.vadThreshold,
      vadAdaptive: this.settings.vadAdaptive,
      language: this.settings.language,
      logContext: this.logContext,
    });

    this.tts = new TtsStreamer({
      provider: deps.ttsProvider,
      outputSampleRateHz: this.transport.outputSampleRateHz,
      frameMs: this.transport.frameMs,
      requestSampleRateHz: this.settings.ttsRequestSampleRateHz,
      maxChunkChars: this.settings.ttsMaxChunkChars,
      apologyText: this.settings.apologyText,
      voice: this.settings.ttsVoice,
      logContext: this.logContext,
    });

    this.orchestrator = new ConversationOrchestrator({
      sessionId: this.id,
      agent: deps.agent,
      tools: new ToolRegistry({ timeoutMs: this.settings.toolTimeoutMs, handlers: deps.toolHandlers }),
      maxToolRounds: this.settings.maxToolRounds,
      apologyText: this.settings.apologyText,
      logContext: this.logContext,
      agentContext: () => ({
        callerNumber: this.remoteNumber(),
        calleeNumber: this.localNumber(),
        direction: this.direction,
        leadId: this.leadId,
        campaignId: this.campaignId,
        contactName: this.contactName,
        previousOutcome: this.recordedOutcome ?? null,
      }),
      toolContext: () => ({
        sessionId: this.id,
        callSid: this.callSid || undefined,
        callerNumber: this.remoteNumber(),
        calleeNumber: this.localNumber(),
        direction: this.direction,
        contactName: this.contactName,
        transferNumber: this.settings.transferNumber,
        calendar: deps.calendar,
        callControl: deps.callControl,
        now: () => new Date(this.now()),
        logContext: this.logContext,
        recordOutcome: (outcome: AgentOutcome | 'transferred', notes?: string) => {
          this.recordedOutcome = outcome;
          if (notes) this.notes.push(notes);
        },
        addNote: (note: string) => {
          this.notes.push(note);
        },
      }),
      onToolResult: (result, durationMs) => this.recordToolResult(result, durationMs),
    });

    this.monitor = new CallMonitor({
      maxCallDurationMs: this.settings.maxCallDurationMs,
      maxEmptySegments: this.settings.monitorMaxEmptySegments,
      maxConfusions: this.settings.monitorMaxConfusions,
      voicemailMessage: this.settings.voicemailMessage,
    });

    this.transport.onClose((reason) => {
      void this.teardown(`transport_${reason}`);
    });
    this.transport.onDtmf((digit) => {
      this.appendTranscript('system', `dtmf ${digit}`);
    });
  }

  /** Starts the session tasks; resolves with the outcome record once the call has been torn down. */
  public run(): Promise<CallOutcomeRecord> {
    if (!this.runPromise) {
      this.runPromise = this.runTasks();
    }
    return this.runPromise;
  }

  /** Ends the call. Runs once; later calls get the same record. */
  public teardown(reason: string, outcome?: OutcomeCode): Promise<CallOutcomeRecord> {
    if (!this.teardownPromise) {
      this.teardownPromise = Promise.resolve().then(() => this.performTeardown(reason, outcome));
    }
    return this.teardownPromise;
  }

  public isActive(): boolean {
    return this.teardownPromise === undefined;
  }

  public getTurnState(): TurnState {
    return this.turnState;
  }

  public getTurnStateHistory(): TurnState[] {
    return [...this.turnStateHistory];
  }

  public getTranscript(): TranscriptEntry[] {
    return [...this.transcript];
  }

  public getOrchestrator(): ConversationOrchestrator {
    return this.orchestrator;
  }

  public getLastActivityAt(): number {
    return this.lastActivityMs;
  }

  /** The party on the other end of the line, whichever side dialled. */
  private remoteNumber(): string | undefined {
    return this.direction === 'inbound' ? this.from : this.to;
  }

  private localNumber(): string | undefined {
    return this.direction === 'inbound' ? this.to : this.from;
  }

  private async runTasks(): Promise<CallOutcomeRecord> {
    const signal = this.sessionController.signal;
    log.info(
      {
        ...this.logContext,
        event: 'call_session_started',
        from: this.from,
        to: this.to,
        direction: this.direction,
        lead_id: this.leadId,
        campaign_id: this.campaignId,
      },
      'call session started',
    );

    const tasks = [
      this.guard('inbound_relay', () => this.inboundRelay(signal)),
      this.guard('segment_pump', () => this.segmentPump(signal)),
      this.guard('turn_loop', () => this.turnLoop(signal)),
      this.guard('call_watchdog', () => this.watchdog(signal)),
    ];

    const record = await this.ended;
    await Promise.all(tasks);
    return record;
  }

  private async guard(task: string, run: () => Promise<void>): Promise<void> {
    try {
      await run();
    } catch (error) {
      if (this.sessionController.signal.aborted) return;
      log.error(
        { ...this.logContext, event: 'call_session_task_failed', task, err: error },
        'session task failed',
      );
      await this.teardown(`${task}_failed`, 'failed');
    }
  }

  private async inboundRelay(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const frame = await this.transport.receive(signal);
      if (!frame) return;

      const analysis = this.stt.ingest(frame);
      if (analysis.isSpeech) {
        this.lastActivityMs = this.now();
      }
      if (this.shouldBargeIn(analysis)) {
        this.bargeIn(analysis);
      }
    }
  }

  private async segmentPump(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const segment = await this.stt.nextSegment(signal);
      if (!segment) return;
      this.inputs.push({ kind: 'segment', segment });
    }
  }

  private async turnLoop(signal: AbortSignal): Promise<void> {
    if (this.greetingText) {
      await this.speak(this.greetingText, 'greeting');
    }

    while (!signal.aborted) {
      const input = await this.inputs.shift(signal);
      if (!input) return;

      if (input.kind === 'reprompt') {
        this.repromptPending = false;
        if (this.turnState === 'listening' && this.orchestrator.getState() === 'idle') {
          await this.speak(REPROMPT_TEXT, 'reprompt');
        }
        continue;
      }

      if (input.kind === 'issue') {
        await this.endForIssue(input.issue);
        return;
      }

      await this.handleSegment(input.segment, signal);
    }
  }

  private async handleSegment(segment: TranscriptSegment, signal: AbortSignal): Promise<void> {
    this.lastActivityMs = this.now();

    if (segment.degraded || segment.text === '') {
      const issue = this.monitor.observeSegment(segment);
      if (issue) {
        await this.endForIssue(issue);
        return;
      }
      if (segment.degraded && this.turnState === 'listening' && this.orchestrator.getState() === 'idle') {
        await this.speak(this.settings.apologyText, 'apology');
      }
      return;
    }

    if (!this.recordedSegments.has(segment.id)) {
      this.recordCallerSegment(segment);
      const issue = this.monitor.observeSegment(segment);
      if (issue) {
        await this.endForIssue(issue);
        return;
      }
    }

    this.setTurnState('thinking');
    const decision = await this.orchestrator.handleSegment(segment, signal);

    if (decision.kind === 'aborted') return;
    if (decision.kind === 'ignored') {
      this.setTurnState('listening');
      return;
    }

    const completed = decision.text === '' ? true : await this.speak(decision.text, 'reply');
    if (signal.aborted) return;

    if (completed) {
      const completion = this.orchestrator.speechComplete();
      if (completion.terminated) {
        this.setTurnState('listening');
        await this.teardown('conversation_ended', completion.outcome);
        return;
      }
      this.setTurnState('listening');
      return;
    }

    if (this.orchestrator.getState() === 'terminated') {
      await this.teardown('conversation_ended', this.orchestrator.getPendingOutcome());
    }
  }

  /** Says the closing line for a monitor issue, if it has one, and hangs up. */
  private async endForIssue(issue: MonitorIssue): Promise<void> {
    log.info(
      { ...this.logContext, event: 'call_monitor_issue', issue: issue.kind, detail: issue.detail },
      'call monitor ending call',
    );
    this.notes.push(`Call monitor: ${issue.kind} (${issue.detail})`);
    // An answering machine or a do-not-call request outranks whatever the agent recorded.
    if (issue.kind === 'voicemail' || issue.kind === 'do_not_call') {
      this.recordedOutcome = issue.outcome;
    }

    const busy = this.turnState !== 'listening' || this.orchestrator.getState() !== 'idle';
    if (issue.closingText && !busy) {
      await this.speak(issue.closingText, 'closing');
    }
    await this.teardown(`monitor_${issue.kind}`, issue.outcome);
  }

  /** Plays `text` to the caller. Resolves false when barge-in or teardown cut it short. */
  private async speak(text: string, kind: SpeechKind): Promise<boolean> {
    const sessionSignal = this.sessionController.signal;
    if (sessionSignal.aborted) return false;

    const controller = new AbortController();
    const onSessionAbort = (): void => controller.abort();
    sessionSignal.addEventListener('abort', onSessionAbort, { once: true });
    this.utteranceController = controller;

    const startedAt = this.now();
    if (kind === 'greeting') {
      this.echoGuardUntilMs = startedAt + this.settings.bargeInEchoGuardMs;
    }
    this.setTurnState('speaking');
    this.appendTranscript('agent', text);

    let framesSent = 0;
    try {
      for await (const frame of this.tts.stream(text, controller.signal)) {
        if (controller.signal.aborted) break;
        await this.transport.whenWritable(controller.signal);
        if (controller.signal.aborted) break;
        this.transport.send(frame);
        framesSent += 1;
      }
      if (!controller.signal.aborted) {
        this.transport.mark(`${kind}-${this.transcript.length}`);
        await this.transport.whenDrained(controller.signal);
      }
    } finally {
      sessionSignal.removeEventListener('abort', onSessionAbort);
      if (this.utteranceController === controller) {
        this.utteranceController = undefined;
      }
    }

    log.debug(
      {
        ...this.logContext,
        event: 'speech_finished',
        kind,
        frames_sent: framesSent,
        interrupted: controller.signal.aborted,
        elapsed_ms: this.now() - startedAt,
      },
      'speech finished',
    );

    if (controller.signal.aborted) return false;
    this.setTurnState('listening');
    this.lastActivityMs = this.now();
    return true;
  }

  private shouldBargeIn(analysis: FrameAnalysis): boolean {
    if (this.turnState !== 'speaking' || !this.utteranceController) return false;
    if (analysis.speechRunMs < this.settings.bargeInMinSpeechMs || !analysis.isSpeech) return false;
    return this.now() >= this.echoGuardUntilMs;
  }

  /** Runs synchronously between two inbound frames so no further reply audio is queued. */
  private bargeIn(analysis: FrameAnalysis): void {
    this.setTurnState('interrupted');
    this.utteranceController?.abort();
    this.utteranceController = undefined;
    const clearedFrames = this.transport.clearOutbound();
    this.stt.cancel();
    const interruptedReply = this.orchestrator.interrupt();
    this.setTurnState('listening');
    this.lastActivityMs = this.now();
    incBargeIns();

    log.info(
      {
        ...this.logContext,
        event: 'barge_in',
        speech_run_ms: analysis.speechRunMs,
        rms: Math.round(analysis.rms),
        threshold: Math.round(analysis.threshold),
        cleared_frames: clearedFrames,
        interrupted_reply: interruptedReply,
      },
      'caller barged in',
    );
  }

  private async watchdog(signal: AbortSignal): Promise<void> {
    const shortestMs = Math.min(this.settings.deadAirMs, this.settings.maxCallDurationMs);
    const pollMs = Math.max(10, Math.min(250, Math.floor(shortestMs / 4)));

    while (!signal.aborted) {
      await delay(pollMs, signal);
      if (signal.aborted) return;

      const overrun = this.monitor.checkDuration(this.now() - this.startedAtMs);
      if (overrun) {
        this.inputs.push({ kind: 'issue', issue: overrun });
        return;
      }

      if (!this.isQuiet()) continue;
      if (this.now() - this.lastActivityMs < this.settings.deadAirMs) continue;

      if (this.reprompts >= this.settings.deadAirMaxReprompts) {
        log.info(
          { ...this.logContext, event: 'dead_air_timeout', reprompts: this.reprompts },
          'no response from caller, ending call',
        );
        await this.teardown('dead_air', 'no_response');
        return;
      }

      this.reprompts += 1;
      this.repromptPending = true;
      this.lastActivityMs = this.now();
      log.info({ ...this.logContext, event: 'dead_air_reprompt', reprompt: this.reprompts }, 'dead air reprompt');
      this.inputs.push({ kind: 'reprompt' });
    }
  }

  private isQuiet(): boolean {
    return (
      this.turnState === 'listening' &&
      this.orchestrator.getState() === 'idle' &&
      !this.stt.isInUtterance() &&
      !this.repromptPending &&
      this.inputs.size === 0
    );
  }

  private setTurnState(next: TurnState): void {
    if (this.turnState === next) return;
    const previous = this.turnState;
    this.turnState = next;
    this.turnStateHistory.push(next);
    log.debug({ ...this.logContext, event: 'turn_state', from: previous, to: next }, 'turn state changed');
  }

  private recordCallerSegment(segment: TranscriptSegment): void {
    this.recordedSegments.add(segment.id);
    this.callerSpoke = true;
    this.reprompts = 0;
    this.appendTranscript('caller', segment.text);
  }

  private appendTranscript(role: TranscriptRole, text: string): void {
    this.transcript.push({ role, text, atMs: this.now() - this.startedAtMs });
  }

  private recordToolResult(result: ToolResult, durationMs: number): void {
    this.toolInvocations.push({
      callId: result.callId,
      name: result.name,
      status: result.status,
      message: result.message,
      durationMs,
    });
    this.appendTranscript('tool', `${result.name} (${result.status}): ${result.message}`);
  }

  private resolveOutcome(requested?: OutcomeCode): OutcomeCode {
    if (this.recordedOutcome) return this.recordedOutcome;
    if (requested) return requested;
    return this.callerSpoke ? 'disconnected' : 'no_answer';
  }

  /**
   * Waits up to `sttFlushTimeoutMs` for the utterance in progress and any pending recognitions,
   * then returns every segment that never reached the turn loop.
   */
  private async flushRecognition(): Promise<TranscriptSegment[]> {
    const unhandled: TranscriptSegment[] = [];
    for (let input = this.inputs.tryShift(); input !== undefined; input = this.inputs.tryShift()) {
      if (input.kind === 'segment') unhandled.push(input.segment);
    }

    const timer = new AbortController();
    const flushed = await Promise.race([
      this.stt.stop().then(() => true),
      delay(this.settings.sttFlushTimeoutMs, timer.signal).then(() => false),
    ]);
    timer.abort();
    if (!flushed) {
      log.warn(
        { ...this.logContext, event: 'stt_flush_timeout', timeout_ms: this.settings.sttFlushTimeoutMs },
        'final transcription did not finish in time',
      );
      this.stt.abort();
    }

    for (let segment = await this.stt.nextSegment(); segment; segment = await this.stt.nextSegment()) {
      unhandled.push(segment);
    }
    return unhandled;
  }

  private async performTeardown(reason: string, requested?: OutcomeCode): Promise<CallOutcomeRecord> {
    this.sessionController.abort();
    this.utteranceController?.abort();
    this.utteranceController = undefined;
    this.inputs.close();
    const shuttingDown = requested === 'shutdown';
    if (shuttingDown) this.stt.abort();
    this.orchestrator.terminate(reason);

    try {
      await this.transport.close(reason);
    } catch (error) {
      log.warn(
        { ...this.logContext, event: 'transport_close_failed', err: error },
        'transport close failed',
      );
    }

    if (!shuttingDown) {
      const late = (await this.flushRecognition()).filter(
        (segment) => !segment.degraded && segment.text !== '' && !this.recordedSegments.has(segment.id),
      );
      for (const segment of late) this.recordCallerSegment(segment);
      if (late.length > 0) {
        log.debug(
          { ...this.logContext, event: 'stt_flushed_segments', segments: late.length },
          'late caller speech added to transcript',
        );
      }
    }

    const endedAtMs = this.now();
    const durationMs = Math.max(0, endedAtMs - this.startedAtMs);
    const outcome = this.resolveOutcome(requested);
    const record: CallOutcomeRecord = {
      sessionId: this.id,
      callSid: this.callSid || null,
      streamSid: this.streamSid || null,
      from: this.from ?? null,
      to: this.to ?? null,
      direction: this.direction,
      leadId: this.leadId ?? null,
      campaignId: this.campaignId ?? null,
      outcome,
      reason,
      startedAt: new Date(this.startedAtMs).toISOString(),
      endedAt: new Date(endedAtMs).toISOString(),
      durationMs,
      turns: this.orchestrator.getTurnCount(),
      transcript: [...this.transcript],
      notes: [...this.notes],
      toolInvocations: [...this.toolInvocations],
    };

    try {
      await this.outcomeSink.record(record);
    } catch (error) {
      log.error(
        {
          ...this.logContext,
          event: 'outcome_record_failed',
          sink: this.outcomeSink.name,
          err: error,
          error_message: errorMessage(error),
        },
        'failed to record call outcome',
      );
    }

    recordCallMetrics({ outcome, durationMs, turns: record.turns });
    log.info(
      {
        ...this.logContext,
        event: 'call_session_teardown',
        reason,
        outcome,
        turns: record.turns,
        interrupted_turns: this.orchestrator.getInterruptedTurnCount(),
        monitor: this.monitor.summary(),
        session_duration_ms: durationMs,
        transport: this.transport.stats(),
      },
      'call session teardown',
    );

    this.resolveEnded(record);
    return record;
  }
}
