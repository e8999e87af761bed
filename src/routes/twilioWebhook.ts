import { NextFunction, Request, Response, Router } from 'express';
import { z } from 'zod';
import type { SessionManager } from '../calls/sessionManager';
import { env } from '../env';
import { lineForCall, tryAcquire, type CapacityParams, type CapacityResult } from '../limits/capacity';
import { log } from '../log';
import { TwilioCallStatusSchema, parseTwilioDirection } from '../twilio/types';
import { verifyTwilioSignature, type TwilioSignatureCheck, type TwilioSignatureInput } from '../twilio/twilioVerify';

export const MEDIA_STREAM_PATH = '/v1/twilio/media';

export const BUSY_MESSAGE = 'We are sorry, all of our lines are busy right now. Please try again later.';

const PASSTHROUGH_QUERY_PARAMS = ['lead_id', 'campaign_id', 'contact_name', 'greeting'] as const;

const FormParamsSchema = z.record(z.union([z.string(), z.array(z.string())]));

const VoiceParamsSchema = z.object({
  CallSid: z.string().min(1),
  From: z.string().default(''),
  To: z.string().default(''),
  Direction: z.string().optional(),
});

const StatusParamsSchema = VoiceParamsSchema.extend({
  CallStatus: TwilioCallStatusSchema,
});

export interface TwilioWebhookDeps {
  sessionManager: Pick<SessionManager, 'onCallStatus'>;
  acquireCapacity?: (params: CapacityParams) => Promise<CapacityResult>;
  verifySignature?: (input: TwilioSignatureInput) => TwilioSignatureCheck;
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function buildMediaStreamUrl(baseUrl: string = env.PUBLIC_BASE_URL, token: string = env.MEDIA_STREAM_TOKEN): string {
  const trimmedBase = baseUrl.replace(/\/$/, '');
  let wsBase = trimmedBase;
  if (trimmedBase.startsWith('https://')) {
    wsBase = `wss://${trimmedBase.slice('https://'.length)}`;
  } else if (trimmedBase.startsWith('http://')) {
    wsBase = `ws://${trimmedBase.slice('http://'.length)}`;
  } else if (!trimmedBase.startsWith('ws://') && !trimmedBase.startsWith('wss://')) {
    wsBase = `wss://${trimmedBase}`;
  }
  return `${wsBase}${MEDIA_STREAM_PATH}?token=${encodeURIComponent(token)}`;
}

export function buildStreamTwiml(streamUrl: string, parameters: Record<string, string>): string {
  const params = Object.entries(parameters)
    .filter(([, value]) => value !== '')
    .map(([name, value]) => `<Parameter name="${escapeXml(name)}" value="${escapeXml(value)}"/>`)
    .join('');
  return (
    '<?xml version="1.0" encoding="UTF-8"?>' +
    `<Response><Connect><Stream url="${escapeXml(streamUrl)}">${params}</Stream></Connect></Response>`
  );
}

export function buildRejectTwiml(message: string = BUSY_MESSAGE): string {
  return `<?xml version="1.0" encoding="UTF-8"?><Response><Say>${escapeXml(message)}</Say><Hangup/></Response>`;
}

function flattenParams(body: unknown): Record<string, string> {
  const parsed = FormParamsSchema.safeParse(body ?? {});
  if (!parsed.success) {
    return {};
  }
  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed.data)) {
    params[key] = Array.isArray(value) ? value[0] ?? '' : value;
  }
  return params;
}

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function requestId(res: Response): string | undefined {
  const value: unknown = res.locals.requestId;
  return typeof value === 'string' ? value : undefined;
}

export function createTwilioWebhookRouter(deps: TwilioWebhookDeps): Router {
  const router = Router();
  const acquireCapacity = deps.acquireCapacity ?? tryAcquire;
  const verifySignature = deps.verifySignature ?? verifyTwilioSignature;

  function checkSignature(req: Request, res: Response, params: Record<string, string>): boolean {
    const url = `${env.PUBLIC_BASE_URL.replace(/\/$/, '')}${req.originalUrl}`;
    const check = verifySignature({ url, params, signature: req.header('x-twilio-signature') });
    if (!check.ok) {
      log.warn(
        { event: 'twilio_signature_invalid', path: req.path, requestId: requestId(res) },
        'rejecting webhook with invalid signature',
      );
      res.status(403).json({ error: 'invalid_signature' });
      return false;
    }
    return true;
  }

  async function handleVoice(req: Request, res: Response): Promise<void> {
    const params = flattenParams(req.body);
    if (!checkSignature(req, res, params)) {
      return;
    }

    const parsed = VoiceParamsSchema.safeParse(params);
    if (!parsed.success) {
      res.status(400).json({ error: 'invalid_payload' });
      return;
    }

    const { CallSid: callSid, From: from, To: to } = parsed.data;
    const direction = parseTwilioDirection(parsed.data.Direction);
    const reqId = requestId(res);
    const line = lineForCall(direction, from, to) ?? '';

    const capacity = await acquireCapacity({ line, callSid, requestId: reqId });
    if (!capacity.ok) {
      log.warn(
        { event: 'call_rejected_capacity', call_sid: callSid, reason: capacity.reason, requestId: reqId },
        'call rejected, no capacity',
      );
      res.status(200).type('text/xml').send(buildRejectTwiml());
      return;
    }

    const streamParams: Record<string, string> = {
      from_number: from,
      to_number: to,
      direction,
    };
    for (const name of PASSTHROUGH_QUERY_PARAMS) {
      const value = queryString(req, name);
      if (value !== undefined) {
        streamParams[name] = value;
      }
    }

    log.info(
      { event: 'call_stream_connect', call_sid: callSid, from, to, direction, requestId: reqId },
      'connecting call to media stream',
    );
    res.status(200).type('text/xml').send(buildStreamTwiml(buildMediaStreamUrl(), streamParams));
  }

  async function handleStatus(req: Request, res: Response): Promise<void> {
    const params = flattenParams(req.body);
    if (!checkSignature(req, res, params)) {
      return;
    }

    const parsed = StatusParamsSchema.safeParse(params);
    if (!parsed.success) {
      res.status(400).json({ error: 'invalid_payload' });
      return;
    }

    await deps.sessionManager.onCallStatus(
      {
        callSid: parsed.data.CallSid,
        status: parsed.data.CallStatus,
        from: parsed.data.From || undefined,
        to: parsed.data.To || undefined,
        direction: parseTwilioDirection(parsed.data.Direction),
      },
      { requestId: requestId(res) },
    );
    res.status(204).end();
  }

  router.post('/voice', (req: Request, res: Response, next: NextFunction) => {
    handleVoice(req, res).catch(next);
  });

  router.post('/status', (req: Request, res: Response, next: NextFunction) => {
    handleStatus(req, res).catch(next);
  });

  return router;
}
