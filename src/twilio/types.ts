import { z } from 'zod';

const numericString = z.union([z.string(), z.number()]).transform((value) => Number(value));

export const TwilioConnectedMessageSchema = z.object({
  event: z.literal('connected'),
  protocol: z.string().optional(),
  version: z.string().optional(),
});

export const TwilioStartMessageSchema = z.object({
  event: z.literal('start'),
  sequenceNumber: z.string().optional(),
  streamSid: z.string().optional(),
  start: z.object({
    streamSid: z.string().min(1),
    accountSid: z.string().default(''),
    callSid: z.string().default(''),
    tracks: z.array(z.string()).default(['inbound']),
    customParameters: z.record(z.string()).default({}),
    mediaFormat: z
      .object({
        encoding: z.string(),
        sampleRate: z.number(),
        channels: z.number(),
      })
      .optional(),
  }),
});

export const TwilioMediaMessageSchema = z.object({
  event: z.literal('media'),
  sequenceNumber: z.string().optional(),
  streamSid: z.string().optional(),
  media: z.object({
    track: z.string().default('inbound'),
    chunk: numericString.optional(),
    timestamp: numericString.optional(),
    payload: z.string(),
  }),
});

export const TwilioMarkMessageSchema = z.object({
  event: z.literal('mark'),
  streamSid: z.string().optional(),
  mark: z.object({ name: z.string() }),
});

export const TwilioDtmfMessageSchema = z.object({
  event: z.literal('dtmf'),
  streamSid: z.string().optional(),
  dtmf: z.object({ track: z.string().optional(), digit: z.string() }),
});

export const TwilioStopMessageSchema = z.object({
  event: z.literal('stop'),
  streamSid: z.string().optional(),
  stop: z
    .object({
      accountSid: z.string().optional(),
      callSid: z.string().optional(),
    })
    .optional(),
});

export const TwilioInboundMessageSchema = z.discriminatedUnion('event', [
  TwilioConnectedMessageSchema,
  TwilioStartMessageSchema,
  TwilioMediaMessageSchema,
  TwilioMarkMessageSchema,
  TwilioDtmfMessageSchema,
  TwilioStopMessageSchema,
]);

export type TwilioInboundMessage = z.infer<typeof TwilioInboundMessageSchema>;
export type TwilioStartMessage = z.infer<typeof TwilioStartMessageSchema>;
export type TwilioMediaMessage = z.infer<typeof TwilioMediaMessageSchema>;

export type TwilioOutboundMessage =
  | { event: 'media'; streamSid: string; media: { payload: string } }
  | { event: 'mark'; streamSid: string; mark: { name: string } }
  | { event: 'clear'; streamSid: string };

export const TERMINAL_CALL_STATUSES: ReadonlySet<string> = new Set([
  'completed',
  'busy',
  'no-answer',
  'canceled',
  'failed',
]);

export const TwilioCallStatusSchema = z.enum([
  'queued',
  'ringing',
  'in-progress',
  'completed',
  'busy',
  'no-answer',
  'canceled',
  'failed',
]);

export type TwilioCallStatus = z.infer<typeof TwilioCallStatusSchema>;

/** Twilio reports `inbound`, `outbound-api` or `outbound-dial`. */
export function parseTwilioDirection(value: string | undefined): 'inbound' | 'outbound' {
  return value?.startsWith('outbound') ? 'outbound' : 'inbound';
}
