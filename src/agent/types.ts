import { z } from 'zod';

import type { CallDirection } from '../outcomes/types';
import type { ToolCall, ToolResult } from '../tools/types';

export interface AgentContext {
  callerNumber?: string;
  calleeNumber?: string;
  direction: CallDirection;
  leadId?: string;
  campaignId?: string;
  contactName?: string;
  previousOutcome: string | null;
  turnIndex: number;
}

export interface AgentRequest {
  /** Stable per call; the agent keys its conversation thread on it. */
  sessionId: string;
  transcript: string;
  context: AgentContext;
  toolResults?: ToolResult[];
}

export interface AgentResponse {
  text: string;
  toolCalls: ToolCall[];
}

const ToolCallSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  args: z.record(z.unknown()).default({}),
});

export const AgentResponseSchema = z
  .object({
    text: z.string().nullish(),
    toolCalls: z.array(ToolCallSchema).optional(),
    tool_calls: z.array(ToolCallSchema).optional(),
  })
  .transform(
    (value): AgentResponse => ({
      text: (value.text ?? '').trim(),
      toolCalls: (value.toolCalls ?? value.tool_calls ?? []).map((call, index) => ({
        id: call.id ?? `call_${index + 1}`,
        name: call.name,
        args: call.args,
      })),
    }),
  );

export interface AgentService {
  readonly id: string;
  respond(request: AgentRequest, signal?: AbortSignal): Promise<AgentResponse>;
}
