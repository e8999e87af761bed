import { env } from '../env';
import { errorMessage, isAbortError } from '../errors';
import { log } from '../log';
import type { CallControl } from '../tools/types';

const TWILIO_TIMEOUT_MS = 8000;
const TWILIO_MAX_RETRIES = 2;

// Retry backoff tuning (keep small; call control is latency-sensitive)
const TWILIO_RETRY_BASE_MS = 250;
const TWILIO_RETRY_MAX_MS = 1500;

export class TwilioApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code?: number,
  ) {
    super(message);
    this.name = 'TwilioApiError';
  }
}

export interface TwilioClientOptions {
  accountSid: string;
  authToken: string;
  baseUrl: string;
  fromNumber?: string;
  timeoutMs?: number;
  maxRetries?: number;
  logContext?: Record<string, unknown>;
}

function shouldRetry(status: number): boolean {
  return status === 429 || status >= 500;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function backoffMs(attempt: number): number {
  const exp = Math.min(TWILIO_RETRY_MAX_MS, TWILIO_RETRY_BASE_MS * Math.pow(2, attempt));
  return exp + Math.floor(Math.random() * 120);
}

function truncateForLog(value: string, max = 800): string {
  return value.length <= max ? value : `${value.slice(0, max)}…(truncated)`;
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function readErrorCode(body: unknown): number | undefined {
  if (typeof body === 'object' && body !== null && 'code' in body && typeof body.code === 'number') {
    return body.code;
  }
  return undefined;
}

async function safeReadBody(response: Response): Promise<{ text: string; json: unknown }> {
  let text: string;
  try {
    text = await response.text();
  } catch (error) {
    return { text: `<<failed to read response body: ${errorMessage(error)}>>`, json: undefined };
  }
  try {
    return { text, json: JSON.parse(text) };
  } catch {
    return { text, json: undefined };
  }
}

/** Twilio REST (2010-04-01) for live call control and SMS. */
export class TwilioClient implements CallControl {
  private readonly options: Required<Omit<TwilioClientOptions, 'fromNumber' | 'logContext'>> & {
    fromNumber?: string;
  };
  private readonly logContext: Record<string, unknown>;

  constructor(options: TwilioClientOptions) {
    this.options = {
      accountSid: options.accountSid,
      authToken: options.authToken,
      baseUrl: options.baseUrl.replace(/\/$/, ''),
      fromNumber: options.fromNumber,
      timeoutMs: options.timeoutMs ?? TWILIO_TIMEOUT_MS,
      maxRetries: options.maxRetries ?? TWILIO_MAX_RETRIES,
    };
    this.logContext = options.logContext ?? {};
  }

  public async transferCall(callSid: string, to: string): Promise<void> {
    const twiml = `<Response><Dial>${escapeXml(to)}</Dial></Response>`;
    await this.updateCall(callSid, { Twiml: twiml });
    log.info({ event: 'twilio_transfer_call', call_sid: callSid, to, ...this.logContext }, 'twilio call transferred');
  }

  public async sendSms(input: { to: string; body: string }): Promise<{ sid: string }> {
    if (!this.options.fromNumber) {
      throw new TwilioApiError('TWILIO_PHONE_NUMBER is not set', 0);
    }
    const result = await this.request(`/Accounts/${this.options.accountSid}/Messages.json`, {
      To: input.to,
      From: this.options.fromNumber,
      Body: input.body,
    });
    const sid =
      typeof result === 'object' && result !== null && 'sid' in result && typeof result.sid === 'string'
        ? result.sid
        : '';
    log.info({ event: 'twilio_sms_sent', to: input.to, sid, ...this.logContext }, 'twilio sms sent');
    return { sid };
  }

  public updateCall(callSid: string, params: Record<string, string>): Promise<unknown> {
    return this.request(`/Accounts/${this.options.accountSid}/Calls/${callSid}.json`, params);
  }

  public async request(path: string, params: Record<string, string>, attempt = 0): Promise<unknown> {
    const url = `${this.options.baseUrl}${path}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const startedAt = Date.now();
    const auth = Buffer.from(`${this.options.accountSid}:${this.options.authToken}`).toString('base64');

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          Authorization: `Basic ${auth}`,
          Accept: 'application/json',
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: new URLSearchParams(params).toString(),
        signal: controller.signal,
      });

      const body = await safeReadBody(response);
      const durationMs = Date.now() - startedAt;

      if (!response.ok) {
        const logBody = truncateForLog(body.text);
        if (shouldRetry(response.status) && attempt < this.options.maxRetries) {
          const waitMs = backoffMs(attempt);
          log.warn(
            {
              event: 'twilio_request_retry',
              path,
              status: response.status,
              attempt,
              wait_ms: waitMs,
              duration_ms: durationMs,
              body: logBody,
              ...this.logContext,
            },
            'twilio request retry',
          );
          await sleep(waitMs);
          return this.request(path, params, attempt + 1);
        }

        log.error(
          { event: 'twilio_request_failed', path, status: response.status, body: logBody, ...this.logContext },
          'twilio request failed',
        );
        throw new TwilioApiError(
          `Twilio request failed: ${response.status} ${logBody}`,
          response.status,
          readErrorCode(body.json),
        );
      }

      log.debug(
        { event: 'twilio_request_completed', path, status: response.status, duration_ms: durationMs, ...this.logContext },
        'twilio request completed',
      );
      return body.json;
    } catch (error) {
      if (error instanceof TwilioApiError) throw error;

      if (!isAbortError(error) && attempt < this.options.maxRetries) {
        const waitMs = backoffMs(attempt);
        log.warn(
          { event: 'twilio_request_error_retry', path, attempt, wait_ms: waitMs, err: error, ...this.logContext },
          'twilio request error retry',
        );
        await sleep(waitMs);
        return this.request(path, params, attempt + 1);
      }

      log.error({ event: 'twilio_request_error', path, err: error, ...this.logContext }, 'twilio request error');
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}

export function createTwilioClient(logContext: Record<string, unknown> = {}): TwilioClient {
  return new TwilioClient({
    accountSid: env.TWILIO_ACCOUNT_SID,
    authToken: env.TWILIO_AUTH_TOKEN,
    baseUrl: env.TWILIO_API_BASE_URL,
    fromNumber: env.TWILIO_PHONE_NUMBER,
    logContext,
  });
}
