import type { ToolCall, ToolResult } from '../tools/types';
import type { AgentRequest, AgentResponse, AgentService } from './types';

const DAY_PATTERN = /\b(today|tomorrow|monday|tuesday|wednesday|thursday|friday|saturday|sunday)\b/;
const TIME_PATTERN = /\b(\d{1,2}(?::\d{2})?\s?(?:am|pm)?|morning|afternoon|evening)\b/;

function toolCall(name: string, args: Record<string, unknown>): ToolCall {
  return { id: `local_${name}`, name, args };
}

function replyToToolResults(results: ToolResult[]): AgentResponse {
  const failed = results.find((result) => result.status === 'error');
  if (failed) {
    return { text: "Sorry, I couldn't take care of that just now. Is there anything else I can help with?", toolCalls: [] };
  }

  const last = results[results.length - 1];
  if (!last) {
    return { text: 'Done. What else can I help you with?', toolCalls: [] };
  }
  switch (last.name) {
    case 'end_call':
      return { text: 'Thanks for your time. Goodbye!', toolCalls: [] };
    case 'check_availability': {
      const rawSlots = last.data?.slots;
      const slots = Array.isArray(rawSlots) ? rawSlots.slice(0, 3).map(String) : [];
      return slots.length > 0
        ? { text: `I have ${slots.join(', ')} open. Which works best for you?`, toolCalls: [] }
        : { text: 'That day is fully booked. Would another day work?', toolCalls: [] };
    }
    case 'book_meeting':
      return last.data?.booked === true
        ? { text: "You're all set. We'll see you then.", toolCalls: [] }
        : { text: 'That time was just taken. Could we try another time?', toolCalls: [] };
    case 'request_callback':
      return { text: "No problem, we'll call you back then.", toolCalls: [] };
    case 'transfer_call':
      return { text: 'Connecting you now, one moment please.', toolCalls: [] };
    default:
      return { text: 'Done. What else can I help you with?', toolCalls: [] };
  }
}

/**
 * Keyword agent used when no agent service is configured. Good enough to exercise every
 * tool path on a development line.
 */
export class LocalRuleAgent implements AgentService {
  public readonly id = 'agent_local_rules';

  public async respond(request: AgentRequest): Promise<AgentResponse> {
    if (request.toolResults && request.toolResults.length > 0) {
      return replyToToolResults(request.toolResults);
    }

    const text = request.transcript.trim().toLowerCase();
    const day = DAY_PATTERN.exec(text)?.[1] ?? 'tomorrow';

    if (text.includes('wrong number')) {
      return {
        text: 'Sorry about that, have a good day.',
        toolCalls: [toolCall('end_call', { outcome: 'wrong_number' })],
      };
    }
    if (text.includes('stop calling') || text.includes('not interested') || /\b(bye|goodbye)\b/.test(text)) {
      return {
        text: 'Understood. Thanks for your time, goodbye.',
        toolCalls: [toolCall('end_call', { outcome: 'not_interested' })],
      };
    }
    if (/\b(human|person|representative|operator)\b/.test(text)) {
      return { text: 'Let me transfer you.', toolCalls: [toolCall('transfer_call', {})] };
    }
    if (/call (me )?back/.test(text)) {
      const time = TIME_PATTERN.exec(text)?.[1] ?? 'afternoon';
      return { text: '', toolCalls: [toolCall('request_callback', { day, time })] };
    }
    if (/\b(book|appointment|meeting|available|availability)\b/.test(text)) {
      return { text: 'Let me check the calendar.', toolCalls: [toolCall('check_availability', { day })] };
    }
    if (text.includes('hours') || text.includes('open')) {
      return { text: 'We are open nine to five, Monday through Friday.', toolCalls: [] };
    }

    return { text: 'Got it. Would you like to book a time to talk with our team?', toolCalls: [] };
  }
}
