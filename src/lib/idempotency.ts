import type { Request } from 'express';
import { validationFailed } from '../domains/fulfillment/errors';

export const MAX_IDEMPOTENCY_KEY_LENGTH = 255;

/**
 * Idempotency key for a shipment commit. The `Idempotency-Key` header wins over
 * a key sent in the body; when both are present they must agree.
 */
export function resolveIdempotencyKey(req: Request, bodyKey?: string | null): string | null {
  const header = req.header('Idempotency-Key')?.trim() || null;
  const body = bodyKey?.trim() || null;
  if (header && body && header !== body) {
    throw validationFailed('IDEMPOTENCY_KEY_MISMATCH', { header, body });
  }
  const key = header ?? body;
  if (key && key.length > MAX_IDEMPOTENCY_KEY_LENGTH) {
    throw validationFailed('IDEMPOTENCY_KEY_TOO_LONG', { length: key.length, max: MAX_IDEMPOTENCY_KEY_LENGTH });
  }
  return key;
}
