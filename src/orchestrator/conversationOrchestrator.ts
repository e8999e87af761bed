import type { AgentContext, AgentRequest, AgentResponse, AgentService } from '../agent/types';
import { AgentServiceError, ToolError, errorMessage } from '../errors';
import { log } from '../log';
import type { OutcomeCode } from '../outcomes/types';
import type { TranscriptSegment } from '../stt/types';
import type { ToolRegistry } from '../tools/registry';
import type { ToolCall, ToolContext, ToolResult } from '../tools/types';

export type OrchestratorState = 'idle' | 'awaiting_agent' | 'executing' | 'speaking' | 'terminated';

const TRANSITIONS: Record<OrchestratorState, readonly OrchestratorState[]> = {
  idle: ['awaiting_agent', 'terminated'],
  awaiting_agent: ['executing', 'speaking', 'terminated'],
  executing: ['awaiting_agent', 'terminated'],
  speaking: ['idle', 'terminated'],
  terminated: [],
};

export class IllegalTransitionError extends Error {
  constructor(
    public readonly from: OrchestratorState,
    public readonly to: OrchestratorState,
  ) {
    super(`illegal orchestrator transition ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export interface StateTransition {
  from: OrchestratorState;
  to: OrchestratorState;
  reason: string;
  at: number;
}

export type TurnDecision =
  | { kind: 'speak'; segmentId: string; text: string; endAfterSpeaking: boolean; toolResults: ToolResult[] }
  | { kind: 'ignored'; segmentId: string; reason: 'not_idle' | 'duplicate' | 'empty' }
  | { kind: 'aborted'; segmentId: string };

export interface SpeechCompletion {
  terminated: boolean;
  outcome?: OutcomeCode;
}

export type ToolContextBase = Omit<ToolContext, 'signal' | 'requestEnd'>;

export interface ConversationOrchestratorOptions {
  sessionId: string;
  agent: AgentService;
  tools: ToolRegistry;
  maxToolRounds: number;
  apologyText: string;
  agentContext: () => Omit<AgentContext, 'turnIndex'>;
  toolContext: () => ToolContextBase;
  onToolResult?: (result: ToolResult, durationMs: number) => void;
  logContext?: Record<string, unknown>;
  now?: () => number;
}

/**
 * Per-call turn state machine between transcript segments and spoken replies. It never
 * touches audio: callers feed it segments and report when the reply has been spoken.
 */
export class ConversationOrchestrator {
  private readonly options: ConversationOrchestratorOptions;
  private readonly logContext: Record<string, unknown>;
  private readonly now: () => number;
  private readonly seenSegments = new Set<string>();
  private readonly history: StateTransition[] = [];
  private state: OrchestratorState = 'idle';
  private endRequested = false;
  private pendingOutcome?: OutcomeCode;
  private turnIndex = 0;
  private interruptedTurns = 0;

  constructor(options: ConversationOrchestratorOptions) {
    this.options = options;
    this.logContext = options.logContext ?? {};
    this.now = options.now ?? Date.now;
  }

  public getState(): OrchestratorState {
    return this.state;
  }

  public getHistory(): StateTransition[] {
    return [...this.history];
  }

  public getTurnCount(): number {
    return this.turnIndex;
  }

  public getInterruptedTurnCount(): number {
    return this.interruptedTurns;
  }

  public async handleSegment(segment: TranscriptSegment, signal: AbortSignal): Promise<TurnDecision> {
    if (this.seenSegments.has(segment.id)) {
      log.debug({ ...this.logContext, event: 'segment_duplicate', segment_id: segment.id }, 'duplicate segment ignored');
      return { kind: 'ignored', segmentId: segment.id, reason: 'duplicate' };
    }
    if (this.state !== 'idle') {
      log.debug(
        { ...this.logContext, event: 'segment_ignored', segment_id: segment.id, state: this.state },
        'segment ignored outside idle',
      );
      return { kind: 'ignored', segmentId: segment.id, reason: 'not_idle' };
    }
    this.seenSegments.add(segment.id);

    const transcript = segment.text.trim();
    if (transcript === '') {
      return { kind: 'ignored', segmentId: segment.id, reason: 'empty' };
    }

    this.turnIndex += 1;
    this.transition('awaiting_agent', `segment ${segment.id}`);

    const allResults: ToolResult[] = [];
    let response: AgentResponse;
    let spokenFallback = '';

    try {
      response = await this.options.agent.respond(this.buildRequest(transcript), signal);
      let rounds = 0;

      while (response.toolCalls.length > 0 && rounds < this.options.maxToolRounds) {
        if (signal.aborted) return this.abortTurn(segment.id);
        if (response.text !== '') spokenFallback = response.text;

        this.transition('executing', `${response.toolCalls.length} tool call(s)`);
        const results = await this.runTools(response.toolCalls, signal);
        allResults.push(...results);
        rounds += 1;

        if (signal.aborted) return this.abortTurn(segment.id);
        this.transition('awaiting_agent', 'tool results');
        response = await this.options.agent.respond(this.buildRequest(transcript, results), signal);
      }

      if (response.toolCalls.length > 0) {
        log.warn(
          {
            ...this.logContext,
            event: 'agent_tool_rounds_exhausted',
            max_rounds: this.options.maxToolRounds,
            dropped_calls: response.toolCalls.map((call) => call.name),
          },
          'tool round limit reached, ignoring further tool calls',
        );
      }
    } catch (error) {
      if (signal.aborted) return this.abortTurn(segment.id);
      if (!(error instanceof AgentServiceError)) throw error;

      log.error(
        { ...this.logContext, event: 'agent_unavailable', err: error, segment_id: segment.id },
        'agent unavailable, ending call after apology',
      );
      this.endRequested = true;
      this.pendingOutcome = 'agent_unavailable';
      this.transition('speaking', 'agent unavailable');
      return {
        kind: 'speak',
        segmentId: segment.id,
        text: this.options.apologyText,
        endAfterSpeaking: true,
        toolResults: allResults,
      };
    }

    if (signal.aborted) return this.abortTurn(segment.id);

    this.transition('speaking', 'agent replied');
    return {
      kind: 'speak',
      segmentId: segment.id,
      text: response.text !== '' ? response.text : spokenFallback,
      endAfterSpeaking: this.endRequested,
      toolResults: allResults,
    };
  }

  /** The reply finished playing. Ends the conversation if a tool asked for it. */
  public speechComplete(): SpeechCompletion {
    if (this.state !== 'speaking') {
      return { terminated: this.state === 'terminated', outcome: this.pendingOutcome };
    }
    this.transition('idle', 'speech complete');
    if (this.endRequested) {
      this.transition('terminated', 'end requested');
      return { terminated: true, outcome: this.pendingOutcome };
    }
    return { terminated: false };
  }

  /** Barge-in. Returns false when there was nothing playing to interrupt. */
  public interrupt(): boolean {
    if (this.state !== 'speaking') return false;
    this.interruptedTurns += 1;
    this.transition('idle', 'barge-in');
    if (this.endRequested) {
      this.transition('terminated', 'end requested');
    }
    return true;
  }

  public terminate(reason: string): void {
    if (this.state === 'terminated') return;
    this.transition('terminated', reason);
  }

  public isEndRequested(): boolean {
    return this.endRequested;
  }

  /** Outcome decided by the orchestrator itself, such as `agent_unavailable`. */
  public getPendingOutcome(): OutcomeCode | undefined {
    return this.pendingOutcome;
  }

  private abortTurn(segmentId: string): TurnDecision {
    this.terminate('turn aborted');
    return { kind: 'aborted', segmentId };
  }

  private buildRequest(transcript: string, toolResults?: ToolResult[]): AgentRequest {
    return {
      sessionId: this.options.sessionId,
      transcript,
      context: { ...this.options.agentContext(), turnIndex: this.turnIndex },
      ...(toolResults ? { toolResults } : {}),
    };
  }

  private async runTools(calls: ToolCall[], signal: AbortSignal): Promise<ToolResult[]> {
    const results: ToolResult[] = [];
    let failed = false;

    const context: ToolContext = {
      ...this.options.toolContext(),
      signal,
      requestEnd: () => {
        this.endRequested = true;
      },
    };

    for (const call of calls) {
      if (failed || signal.aborted) {
        const skipped: ToolResult = {
          callId: call.id,
          name: call.name,
          status: 'skipped',
          message: failed ? 'skipped after an earlier tool failed' : 'skipped, call ending',
        };
        results.push(skipped);
        this.options.onToolResult?.(skipped, 0);
        continue;
      }

      const startedAt = this.now();
      let result: ToolResult;
      try {
        const output = await this.options.tools.execute(call, context);
        result = { callId: call.id, name: call.name, status: 'ok', message: output.message, data: output.data };
      } catch (error) {
        failed = true;
        result = {
          callId: call.id,
          name: call.name,
          status: 'error',
          message: errorMessage(error),
          timedOut: error instanceof ToolError ? error.timedOut : false,
        };
      }
      results.push(result);
      this.options.onToolResult?.(result, this.now() - startedAt);
    }

    return results;
  }

  private transition(to: OrchestratorState, reason: string): void {
    const from = this.state;
    if (!TRANSITIONS[from].includes(to)) {
      throw new IllegalTransitionError(from, to);
    }
    this.state = to;
    this.history.push({ from, to, reason, at: this.now() });
    log.debug({ ...this.logContext, event: 'orchestrator_transition', from, to, reason }, 'orchestrator transition');
  }
}
