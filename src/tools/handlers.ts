import { ToolError } from '../errors';
import { normalizeAgentOutcome } from '../outcomes/types';
import { formatDate, formatTime, parseTimeOfDay, resolveDay } from './schedule';
import type { ToolHandlers } from './types';

const MAX_SLOTS_OFFERED = 6;

export const defaultToolHandlers: ToolHandlers = {
  async check_availability({ day }, ctx) {
    const date = formatDate(resolveDay(day, ctx.now()));
    const slots = await ctx.calendar.availableSlots(date, ctx.signal);
    if (slots.length === 0) {
      return { message: `No available slots on ${date}. Try another day.`, data: { date, slots } };
    }
    const offered = slots.slice(0, MAX_SLOTS_OFFERED);
    return { message: `Available on ${date}: ${offered.join(', ')}`, data: { date, slots: offered } };
  },

  async book_meeting({ day, time, contactName, email }, ctx) {
    const date = formatDate(resolveDay(day, ctx.now()));
    const slot = formatTime(parseTimeOfDay(time));
    const booking = await ctx.calendar.book(
      { date, time: slot, contactName, email, sessionId: ctx.sessionId },
      ctx.signal,
    );
    if (!booking) {
      const alternatives = (await ctx.calendar.availableSlots(date, ctx.signal)).slice(0, 3);
      return {
        message: `${slot} on ${date} is not available.`,
        data: { booked: false, date, time: slot, alternatives },
      };
    }
    ctx.recordOutcome('meeting_booked');
    ctx.addNote(`Meeting booked: ${date} ${slot} with ${contactName}${email ? ` (${email})` : ''}`);
    return {
      message: `Meeting booked for ${date} at ${slot} with ${contactName}.`,
      data: { booked: true, bookingId: booking.id, date, time: slot },
    };
  },

  async request_callback({ day, time, reason }, ctx) {
    const date = formatDate(resolveDay(day, ctx.now()));
    const slot = formatTime(parseTimeOfDay(time));
    ctx.recordOutcome('callback_requested');
    ctx.addNote(`Callback requested: ${date} ${slot}${reason ? ` - ${reason}` : ''}`);
    return { message: `Callback scheduled for ${date} at ${slot}.`, data: { date, time: slot } };
  },

  async send_sms({ body, to }, ctx) {
    const recipient = to ?? ctx.callerNumber;
    if (!recipient) {
      throw new ToolError('send_sms', 'no recipient number for this call');
    }
    const { sid } = await ctx.callControl.sendSms({ to: recipient, body }, ctx.signal);
    ctx.addNote(`SMS sent to ${recipient}`);
    return { message: `Text message sent to ${recipient}.`, data: { sid } };
  },

  async transfer_call({ to }, ctx) {
    const target = to ?? ctx.transferNumber;
    if (!target) {
      throw new ToolError('transfer_call', 'no transfer number configured');
    }
    if (!ctx.callSid) {
      throw new ToolError('transfer_call', 'call sid unknown');
    }
    await ctx.callControl.transferCall(ctx.callSid, target, ctx.signal);
    ctx.recordOutcome('transferred', `Transferred to ${target}`);
    ctx.requestEnd();
    return { message: `Transferring the call to ${target}.` };
  },

  async add_note({ note }, ctx) {
    ctx.addNote(note);
    return { message: 'Note recorded.' };
  },

  async end_call({ outcome, notes }, ctx) {
    const normalized = normalizeAgentOutcome(outcome);
    ctx.recordOutcome(normalized, notes);
    ctx.requestEnd();
    return { message: `Call ended with outcome: ${normalized}`, data: { outcome: normalized } };
  },
};
