export const FULFILLMENT_ERROR = {
  CAPACITY_EXHAUSTED: 'CAPACITY_EXHAUSTED',
  OVER_ALLOCATION: 'OVER_ALLOCATION',
  OVER_COLLECTION: 'OVER_COLLECTION',
  ALREADY_POSTED: 'ALREADY_POSTED',
  ALREADY_DEPOSITED: 'ALREADY_DEPOSITED',
  INVALID_ENTRY: 'INVALID_ENTRY',
  NOT_FOUND: 'NOT_FOUND',
  CONCURRENCY_CONFLICT: 'CONCURRENCY_CONFLICT',
  INVALID_STATE: 'INVALID_STATE',
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  SYSTEM_RECORD_IMMUTABLE: 'SYSTEM_RECORD_IMMUTABLE'
} as const;

export type FulfillmentErrorCode = (typeof FULFILLMENT_ERROR)[keyof typeof FULFILLMENT_ERROR];

const HTTP_STATUS_BY_CODE: Record<FulfillmentErrorCode, number> = {
  CAPACITY_EXHAUSTED: 400,
  OVER_ALLOCATION: 409,
  OVER_COLLECTION: 409,
  ALREADY_POSTED: 409,
  ALREADY_DEPOSITED: 409,
  INVALID_ENTRY: 422,
  NOT_FOUND: 404,
  CONCURRENCY_CONFLICT: 409,
  INVALID_STATE: 409,
  VALIDATION_FAILED: 400,
  SYSTEM_RECORD_IMMUTABLE: 409
};

/**
 * Engine failure. `message` is the code so route error maps can key on it the
 * same way they key on plain service errors.
 */
export class FulfillmentError extends Error {
  readonly code: FulfillmentErrorCode;
  readonly status: number;
  readonly details: Record<string, unknown> | null;

  constructor(code: FulfillmentErrorCode, details?: Record<string, unknown>) {
    super(code);
    this.name = 'FulfillmentError';
    this.code = code;
    this.status = HTTP_STATUS_BY_CODE[code];
    this.details = details ?? null;
  }
}

export function isFulfillmentError(err: unknown, code?: FulfillmentErrorCode): err is FulfillmentError {
  if (!(err instanceof FulfillmentError)) return false;
  return code === undefined || err.code === code;
}

export type RecordKind = 'fulfillment' | 'shipment' | 'payment' | 'expense' | 'order_line';

export function notFound(entity: RecordKind, id: string): FulfillmentError {
  return new FulfillmentError(FULFILLMENT_ERROR.NOT_FOUND, { entity, id });
}

export function invalidState(reason: string, details: Record<string, unknown> = {}): FulfillmentError {
  return new FulfillmentError(FULFILLMENT_ERROR.INVALID_STATE, { reason, ...details });
}

export function validationFailed(reason: string, details: Record<string, unknown> = {}): FulfillmentError {
  return new FulfillmentError(FULFILLMENT_ERROR.VALIDATION_FAILED, { reason, ...details });
}
