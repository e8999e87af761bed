import crypto from 'crypto';
import { env } from '../env';

export interface TwilioSignatureInput {
  /** Full URL Twilio requested, including the query string. */
  url: string;
  /** Form-encoded POST parameters. */
  params: Record<string, string>;
  signature: string | undefined;
  authToken?: string;
  skip?: boolean;
}

export interface TwilioSignatureCheck {
  ok: boolean;
  skipped: boolean;
}

/** HMAC-SHA1 of the URL followed by each POST parameter name and value in name order, base64. */
export function computeTwilioSignature(authToken: string, url: string, params: Record<string, string>): string {
  const payload = Object.keys(params)
    .sort()
    .reduce((acc, key) => acc + key + params[key], url);
  return crypto.createHmac('sha1', authToken).update(payload, 'utf8').digest('base64');
}

export function verifyTwilioSignature(input: TwilioSignatureInput): TwilioSignatureCheck {
  if (input.skip ?? env.TWILIO_SKIP_SIGNATURE) {
    return { ok: true, skipped: true };
  }
  if (!input.signature) {
    return { ok: false, skipped: false };
  }

  const expected = Buffer.from(
    computeTwilioSignature(input.authToken ?? env.TWILIO_AUTH_TOKEN, input.url, input.params),
  );
  const provided = Buffer.from(input.signature);
  if (expected.length !== provided.length) {
    return { ok: false, skipped: false };
  }
  return { ok: crypto.timingSafeEqual(expected, provided), skipped: false };
}
