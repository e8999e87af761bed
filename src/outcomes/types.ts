/** Outcomes the agent may record through `end_call`. */
export const AGENT_OUTCOMES = [
  'meeting_booked',
  'interested',
  'callback_requested',
  'not_interested',
  'wrong_number',
  'gatekeeper',
  'voicemail',
  'hostile',
] as const;

export type AgentOutcome = (typeof AGENT_OUTCOMES)[number];

/** Outcomes the runtime assigns on its own. */
export type RuntimeOutcome =
  | 'transferred'
  | 'no_answer'
  | 'disconnected'
  | 'no_response'
  | 'agent_unavailable'
  | 'audio_issues'
  | 'call_too_long'
  | 'busy'
  | 'failed'
  | 'shutdown';

export type OutcomeCode = AgentOutcome | RuntimeOutcome;

export function normalizeAgentOutcome(value: string): AgentOutcome {
  const normalized = value.trim().toLowerCase();
  const match = AGENT_OUTCOMES.find((outcome) => outcome === normalized);
  return match ?? 'not_interested';
}

export type TranscriptRole = 'caller' | 'agent' | 'tool' | 'system';

export interface TranscriptEntry {
  role: TranscriptRole;
  text: string;
  /** Milliseconds since the session started. */
  atMs: number;
}

export interface ToolInvocationRecord {
  callId: string;
  name: string;
  status: 'ok' | 'error' | 'skipped';
  message: string;
  durationMs: number;
}

export type CallDirection = 'inbound' | 'outbound';

export interface CallOutcomeRecord {
  sessionId: string;
  callSid: string | null;
  streamSid: string | null;
  from: string | null;
  to: string | null;
  direction: CallDirection;
  leadId: string | null;
  campaignId: string | null;
  outcome: OutcomeCode;
  reason: string;
  startedAt: string;
  endedAt: string;
  durationMs: number;
  turns: number;
  transcript: TranscriptEntry[];
  notes: string[];
  toolInvocations: ToolInvocationRecord[];
}

export interface OutcomeSink {
  readonly name: string;
  record(outcome: CallOutcomeRecord): Promise<void>;
}
