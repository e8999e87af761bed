import { z } from 'zod';

import type { AgentOutcome, CallDirection } from '../outcomes/types';
import type { CalendarService } from './calendar';

export interface ToolArgsMap {
  check_availability: { day: string };
  book_meeting: { day: string; time: string; contactName: string; email?: string };
  request_callback: { day: string; time: string; reason?: string };
  send_sms: { body: string; to?: string };
  transfer_call: { to?: string };
  add_note: { note: string };
  end_call: { outcome: string; notes?: string };
}

export type ToolName = keyof ToolArgsMap;

export const toolArgSchemas: { [N in ToolName]: z.ZodType<ToolArgsMap[N], z.ZodTypeDef, unknown> } = {
  check_availability: z.object({ day: z.string().min(1).default('tomorrow') }),
  book_meeting: z.object({
    day: z.string().min(1),
    time: z.string().min(1),
    contactName: z.string().min(1),
    email: z.string().email().optional(),
  }),
  request_callback: z.object({
    day: z.string().min(1),
    time: z.string().min(1),
    reason: z.string().optional(),
  }),
  send_sms: z.object({ body: z.string().min(1).max(1600), to: z.string().min(1).optional() }),
  transfer_call: z.object({ to: z.string().min(1).optional() }),
  add_note: z.object({ note: z.string().min(1) }),
  end_call: z.object({ outcome: z.string().default('not_interested'), notes: z.string().optional() }),
};

export function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(toolArgSchemas, name);
}

/** A tool invocation as requested by the agent, before validation. */
export interface ToolCall {
  id: string;
  name: string;
  args: Record<string, unknown>;
}

export type ToolStatus = 'ok' | 'error' | 'skipped';

export interface ToolResult {
  callId: string;
  name: string;
  status: ToolStatus;
  message: string;
  data?: Record<string, unknown>;
  timedOut?: boolean;
}

export interface ToolOutput {
  message: string;
  data?: Record<string, unknown>;
}

/** Messaging and call control the tools may drive on the live call. */
export interface CallControl {
  sendSms(input: { to: string; body: string }, signal?: AbortSignal): Promise<{ sid: string }>;
  transferCall(callSid: string, to: string, signal?: AbortSignal): Promise<void>;
}

/** Everything a tool may know or touch about the call, passed explicitly per invocation. */
export interface ToolContext {
  sessionId: string;
  callSid?: string;
  callerNumber?: string;
  calleeNumber?: string;
  direction: CallDirection;
  contactName?: string;
  transferNumber?: string;
  calendar: CalendarService;
  callControl: CallControl;
  now: () => Date;
  signal: AbortSignal;
  logContext: Record<string, unknown>;
  recordOutcome(outcome: AgentOutcome | 'transferred', notes?: string): void;
  addNote(note: string): void;
  requestEnd(): void;
}

export type ToolHandler<N extends ToolName> = (args: ToolArgsMap[N], ctx: ToolContext) => Promise<ToolOutput>;

export type ToolHandlers = { [N in ToolName]: ToolHandler<N> };
