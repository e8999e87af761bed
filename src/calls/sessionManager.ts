import { lineForCall, release, type ReleaseParams } from '../limits/capacity';
import { log } from '../log';
import { setActiveCalls } from '../metrics';
import type { CallDirection, CallOutcomeRecord, OutcomeCode, OutcomeSink } from '../outcomes/types';
import type { MediaTransport, StreamStartInfo } from '../transport/types';
import { TERMINAL_CALL_STATUSES, type TwilioCallStatus } from '../twilio/types';
import type { CallSession } from './callSession';
import type { CallSessionId } from './types';

const DEFAULT_IDLE_TTL_MINUTES = 10;
const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

export type SessionFactory = (transport: MediaTransport, startInfo: StreamStartInfo) => CallSession;

export interface SessionLogContext {
  requestId?: string;
}

export interface CallStatusUpdate {
  callSid: string;
  status: TwilioCallStatus;
  from?: string;
  to?: string;
  direction?: CallDirection;
}

const STATUS_OUTCOMES: Partial<Record<TwilioCallStatus, OutcomeCode>> = {
  busy: 'busy',
  'no-answer': 'no_answer',
  canceled: 'no_answer',
  failed: 'failed',
};

export class SessionManager {
  private readonly sessions = new Map<CallSessionId, CallSession>();
  private readonly byCallSid = new Map<string, CallSession>();
  private readonly transports = new Map<string, CallSession>();
  private readonly pendingTransports = new Set<string>();
  private readonly inactiveCalls = new Map<string, number>();
  private readonly createSession: SessionFactory;
  private readonly outcomeSink: OutcomeSink;
  private readonly capacityRelease: (params: ReleaseParams) => Promise<void>;
  private readonly idleTtlMs: number;
  private readonly sweepTimer: NodeJS.Timeout;
  private readonly now: () => number;
  private shuttingDown = false;

  constructor(options: {
    createSession: SessionFactory;
    outcomeSink: OutcomeSink;
    capacityRelease?: (params: ReleaseParams) => Promise<void>;
    idleTtlMinutes?: number;
    sweepIntervalMs?: number;
    now?: () => number;
  }) {
    this.createSession = options.createSession;
    this.outcomeSink = options.outcomeSink;
    this.capacityRelease = options.capacityRelease ?? release;
    this.now = options.now ?? Date.now;

    const idleMinutes = options.idleTtlMinutes ?? DEFAULT_IDLE_TTL_MINUTES;
    this.idleTtlMs = Math.max(idleMinutes, 1) * 60_000;

    const sweepInterval = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.sweepTimer = setInterval(() => this.sweepIdleSessions(), sweepInterval);
    this.sweepTimer.unref?.();
  }

  /**
   * Hands a freshly accepted media stream to the manager. The session starts once the
   * stream's `start` message arrives; a stream that closes first never gets one.
   */
  public attachTransport(transport: MediaTransport, context: SessionLogContext = {}): Promise<CallSession | null> {
    if (this.transports.has(transport.id) || this.pendingTransports.has(transport.id)) {
      log.warn(
        { event: 'transport_already_attached', transport_id: transport.id, requestId: context.requestId },
        'transport already attached',
      );
      return Promise.resolve(this.transports.get(transport.id) ?? null);
    }

    const info = transport.getStartInfo();
    if (info) {
      return Promise.resolve(this.startSession(transport, info, context));
    }

    this.pendingTransports.add(transport.id);
    return new Promise<CallSession | null>((resolve) => {
      let settled = false;
      transport.onStart((startInfo) => {
        if (settled) return;
        settled = true;
        this.pendingTransports.delete(transport.id);
        resolve(this.startSession(transport, startInfo, context));
      });
      transport.onClose((reason) => {
        if (settled) return;
        settled = true;
        this.pendingTransports.delete(transport.id);
        log.info(
          { event: 'transport_closed_before_start', transport_id: transport.id, reason, requestId: context.requestId },
          'media stream closed before start',
        );
        resolve(null);
      });
    });
  }

  /** Creates and runs the session for a started stream. Refuses a second session per transport or call. */
  public startSession(
    transport: MediaTransport,
    startInfo: StreamStartInfo,
    context: SessionLogContext = {},
  ): CallSession | null {
    const attached = this.transports.get(transport.id);
    if (attached) {
      return attached;
    }

    if (this.shuttingDown) {
      void this.closeTransport(transport, 'shutting_down');
      return null;
    }

    const existing = startInfo.callSid ? this.byCallSid.get(startInfo.callSid) : undefined;
    if (existing?.isActive()) {
      log.warn(
        {
          event: 'call_session_exists',
          call_sid: startInfo.callSid,
          stream_sid: startInfo.streamSid,
          session_id: existing.id,
          requestId: context.requestId,
        },
        'call already has a live session, refusing second stream',
      );
      void this.closeTransport(transport, 'duplicate_stream');
      return null;
    }

    const session = this.createSession(transport, startInfo);
    this.sessions.set(session.id, session);
    this.transports.set(transport.id, session);
    if (session.callSid) {
      this.byCallSid.set(session.callSid, session);
      this.inactiveCalls.delete(session.callSid);
    }
    setActiveCalls(this.activeCount());

    log.info(
      {
        event: 'call_session_created',
        session_id: session.id,
        call_sid: session.callSid,
        stream_sid: session.streamSid,
        from: session.from,
        to: session.to,
        direction: session.direction,
        requestId: context.requestId,
      },
      'call session created',
    );

    void session.run().then(
      (record) => this.onSessionEnded(session, transport, record),
      (error: unknown) => {
        log.error(
          { event: 'call_session_run_failed', session_id: session.id, call_sid: session.callSid, err: error },
          'call session run failed',
        );
        this.onSessionEnded(session, transport);
      },
    );

    return session;
  }

  /** Twilio status callback. Terminal statuses end the call whether or not a stream ever connected. */
  public async onCallStatus(update: CallStatusUpdate, context: SessionLogContext = {}): Promise<void> {
    if (!TERMINAL_CALL_STATUSES.has(update.status)) {
      log.debug(
        { event: 'call_status', call_sid: update.callSid, status: update.status, requestId: context.requestId },
        'call status update',
      );
      return;
    }

    const outcome = STATUS_OUTCOMES[update.status];
    const session = this.byCallSid.get(update.callSid);
    if (session) {
      log.info(
        {
          event: 'call_session_hangup',
          session_id: session.id,
          call_sid: update.callSid,
          status: update.status,
          requestId: context.requestId,
        },
        'call session hangup',
      );
      await session.teardown(`call_${update.status}`, outcome);
      return;
    }

    if (this.inactiveCalls.has(update.callSid)) {
      log.debug(
        { event: 'call_status_after_teardown', call_sid: update.callSid, status: update.status },
        'status for a call already torn down',
      );
      return;
    }
    this.inactiveCalls.set(update.callSid, this.now());

    const line = lineForCall(update.direction ?? 'inbound', update.from, update.to);
    if (line) {
      await this.capacityRelease({ line, callSid: update.callSid, requestId: context.requestId });
    }

    const nowIso = new Date(this.now()).toISOString();
    const record: CallOutcomeRecord = {
      sessionId: update.callSid,
      callSid: update.callSid,
      streamSid: null,
      from: update.from ?? null,
      to: update.to ?? null,
      direction: update.direction ?? 'inbound',
      leadId: null,
      campaignId: null,
      outcome: outcome ?? 'no_answer',
      reason: `call_${update.status}`,
      startedAt: nowIso,
      endedAt: nowIso,
      durationMs: 0,
      turns: 0,
      transcript: [],
      notes: [],
      toolInvocations: [],
    };

    log.info(
      {
        event: 'call_session_hangup_missing',
        call_sid: update.callSid,
        status: update.status,
        outcome: record.outcome,
        requestId: context.requestId,
      },
      'call ended without a media session',
    );

    try {
      await this.outcomeSink.record(record);
    } catch (error) {
      log.error(
        { event: 'outcome_record_failed', call_sid: update.callSid, sink: this.outcomeSink.name, err: error },
        'failed to record call outcome',
      );
    }
  }

  public getByCallSid(callSid: string): CallSession | undefined {
    return this.byCallSid.get(callSid);
  }

  public isCallActive(callSid: string): boolean {
    if (this.inactiveCalls.has(callSid)) {
      return false;
    }
    const session = this.byCallSid.get(callSid);
    return session ? session.isActive() : true;
  }

  public activeCount(): number {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (session.isActive()) count += 1;
    }
    return count;
  }

  /** Tears down every live session with outcome `shutdown` and stops the idle sweep. */
  public async shutdown(reason = 'server_shutdown'): Promise<void> {
    this.shuttingDown = true;
    clearInterval(this.sweepTimer);
    const live = [...this.sessions.values()];
    log.info({ event: 'session_manager_shutdown', sessions: live.length, reason }, 'shutting down call sessions');
    await Promise.all(live.map((session) => session.teardown(reason, 'shutdown')));
  }

  private onSessionEnded(session: CallSession, transport: MediaTransport, record?: CallOutcomeRecord): void {
    this.sessions.delete(session.id);
    this.transports.delete(transport.id);
    if (session.callSid) {
      if (this.byCallSid.get(session.callSid) === session) {
        this.byCallSid.delete(session.callSid);
      }
      this.inactiveCalls.set(session.callSid, this.now());
    }
    setActiveCalls(this.activeCount());

    const line = lineForCall(session.direction, session.from, session.to);
    if (line && session.callSid) {
      void this.capacityRelease({ line, callSid: session.callSid });
    } else {
      log.warn(
        { event: 'capacity_release_skipped', session_id: session.id, call_sid: session.callSid },
        'capacity release skipped, no line or call sid',
      );
    }

    log.debug(
      { event: 'call_session_removed', session_id: session.id, outcome: record?.outcome },
      'call session removed',
    );
  }

  private async closeTransport(transport: MediaTransport, reason: string): Promise<void> {
    try {
      await transport.close(reason);
    } catch (error) {
      log.warn({ event: 'transport_close_failed', transport_id: transport.id, err: error }, 'transport close failed');
    }
  }

  private sweepIdleSessions(): void {
    const nowMs = this.now();

    for (const session of this.sessions.values()) {
      const idleMs = nowMs - session.getLastActivityAt();
      if (idleMs <= this.idleTtlMs) {
        continue;
      }
      log.warn(
        { event: 'call_session_idle_timeout', session_id: session.id, call_sid: session.callSid, idle_ms: idleMs },
        'call session idle, tearing down',
      );
      void session.teardown('idle_timeout');
    }

    for (const [callSid, endedAt] of this.inactiveCalls.entries()) {
      if (nowMs - endedAt > this.idleTtlMs) {
        this.inactiveCalls.delete(callSid);
      }
    }
  }
}
