import * as crypto from 'crypto';

export const SQUARE_SIGNATURE_HEADER = 'x-square-hmacsha256-signature';

/**
 * Square signs the notification URL followed by the raw body, HMAC-SHA256,
 * base64 encoded.
 * @see https://developer.squareup.com/docs/webhooks/step3validate
 */
export function computeSquareSignature(
  signatureKey: string,
  notificationUrl: string,
  rawBody: Buffer | string,
): string {
  return crypto
    .createHmac('sha256', signatureKey)
    .update(notificationUrl)
    .update(rawBody)
    .digest('base64');
}

/**
 * Check a received signature against every key (supports key rotation)
 */
export function verifySquareSignature(
  rawBody: Buffer,
  headers: Record<string, string>,
  signatureKeys: string[],
  notificationUrl: string,
): boolean {
  const signature = headers[SQUARE_SIGNATURE_HEADER];
  if (!signature) {
    return false;
  }

  return signatureKeys.some((key) =>
    timingSafeEqual(computeSquareSignature(key, notificationUrl, rawBody), signature),
  );
}

/**
 * Timing-safe string comparison
 */
export function timingSafeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  // Byte lengths, not string lengths: non-ASCII input encodes wider
  if (left.length !== right.length) {
    return false;
  }

  return crypto.timingSafeEqual(left, right);
}
