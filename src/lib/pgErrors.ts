export type PgError = {
  code?: string;
  constraint?: string;
  detail?: string;
};

export type HttpErrorResponse = { status: number; body: Record<string, unknown> };

export type PgErrorMapping = {
  unique?: (err: PgError) => HttpErrorResponse | null;
  foreignKey?: (err: PgError) => HttpErrorResponse | null;
  check?: (err: PgError) => HttpErrorResponse | null;
  notNull?: (err: PgError) => HttpErrorResponse | null;
};

export const PG_ERROR = {
  UNIQUE_VIOLATION: '23505',
  FOREIGN_KEY_VIOLATION: '23503',
  CHECK_VIOLATION: '23514',
  NOT_NULL_VIOLATION: '23502',
  SERIALIZATION_FAILURE: '40001',
  DEADLOCK_DETECTED: '40P01',
  LOCK_NOT_AVAILABLE: '55P03'
} as const;

export function isPgError(err: unknown): err is PgError {
  return typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string';
}

export function hasPgCode(err: unknown, ...codes: string[]): boolean {
  return isPgError(err) && codes.includes(err.code ?? '');
}

/**
 * Serialization failures, deadlocks and lock timeouts: the transaction lost a
 * race and may succeed if replayed.
 */
export function isRetryablePgError(err: unknown): boolean {
  return hasPgCode(
    err,
    PG_ERROR.SERIALIZATION_FAILURE,
    PG_ERROR.DEADLOCK_DETECTED,
    PG_ERROR.LOCK_NOT_AVAILABLE
  );
}

/**
 * Maps Postgres errors to HTTP responses while preserving per-route semantics.
 *
 * This helper does NOT provide default messages. Callers supply message bodies
 * via the optional mapping callbacks.
 */
export function mapPgErrorToHttp(err: unknown, mapping: PgErrorMapping): HttpErrorResponse | null {
  if (!isPgError(err)) {
    return null;
  }
  switch (err.code) {
    case PG_ERROR.UNIQUE_VIOLATION:
      return mapping.unique?.(err) ?? null;
    case PG_ERROR.FOREIGN_KEY_VIOLATION:
      return mapping.foreignKey?.(err) ?? null;
    case PG_ERROR.CHECK_VIOLATION:
      return mapping.check?.(err) ?? null;
    case PG_ERROR.NOT_NULL_VIOLATION:
      return mapping.notNull?.(err) ?? null;
    default:
      return null;
  }
}
