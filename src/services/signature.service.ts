/**
 * Webhook Signature Service
 *
 * The provider signs every delivery with a hex-encoded HMAC-SHA1 of the raw
 * request body. Verification must run on the bytes exactly as received:
 * re-serializing parsed JSON changes whitespace and key order.
 */

import { createHmac, timingSafeEqual } from 'crypto';
import { AuthError } from '../models/errors/api-error';

export function computeSignature(rawBody: Buffer, secret: string): string {
  return createHmac('sha1', secret).update(rawBody).digest('hex');
}

/**
 * Throws AuthError when the signature is absent or does not match.
 */
export function verifySignature(rawBody: Buffer, signature: string | undefined, secret: string): void {
  const provided = signature?.trim().toLowerCase() ?? '';

  if (provided === '') {
    throw new AuthError('MissingSignature');
  }

  const expected = Buffer.from(computeSignature(rawBody, secret), 'utf8');
  const actual = Buffer.from(provided, 'utf8');

  if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
    throw new AuthError('InvalidSignature');
  }
}
