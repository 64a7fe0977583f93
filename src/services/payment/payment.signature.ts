/**
 * Payment notification signatures
 *
 * HMAC-SHA256 over the raw request body, hex encoded, sent as
 * `X-Payment-Signature: sha256=<hex>` (bare hex is accepted too).
 */

import crypto from 'crypto';

export const SIGNATURE_HEADER = 'x-payment-signature';

const HEX_SHA256 = /^[0-9a-f]{64}$/i;

export function signPayload(rawBody: Buffer | string, secret: string): string {
  return crypto.createHmac('sha256', secret).update(rawBody).digest('hex');
}

/**
 * Constant-time check of a signature header against the raw body
 */
export function verifySignature(
  rawBody: Buffer,
  signatureHeader: string | undefined,
  secret: string
): boolean {
  if (!signatureHeader || !secret) {
    return false;
  }

  const provided = signatureHeader.startsWith('sha256=')
    ? signatureHeader.slice('sha256='.length)
    : signatureHeader;
  if (!HEX_SHA256.test(provided)) {
    return false;
  }

  const expected = Buffer.from(signPayload(rawBody, secret), 'hex');
  const actual = Buffer.from(provided, 'hex');
  return actual.length === expected.length && crypto.timingSafeEqual(actual, expected);
}
