import { Pool, types, type PoolClient, type QueryConfig, type QueryResult, type QueryResultRow } from 'pg';
import { isRetryablePgError } from './lib/pgErrors';
import { retryOnConflict } from './lib/retry';

// Keep DATE columns as "YYYY-MM-DD" strings so JSON output has no timezone shift.
types.setTypeParser(1082, (value) => value);

if (!process.env.DATABASE_URL) {
  throw new Error('DATABASE_URL must be set before starting the API');
}

export const pool = new Pool({
  connectionString: process.env.DATABASE_URL
});

export type { PoolClient };

export type IsolationLevel = 'READ COMMITTED' | 'REPEATABLE READ' | 'SERIALIZABLE';

export type TransactionRetryOptions = {
  isolationLevel?: IsolationLevel;
  retries?: number;
  baseDelayMs?: number;
  lockTimeoutMs?: number;
  onExhausted?: (err: unknown, attempts: number) => unknown;
};

export async function query<T extends QueryResultRow = QueryResultRow>(
  config: string | QueryConfig<unknown[]>,
  params?: unknown[]
): Promise<QueryResult<T>> {
  if (typeof config === 'string') {
    return pool.query<T>(config, params);
  }
  return pool.query<T>(config);
}

export async function withTransaction<T>(
  handler: (client: PoolClient) => Promise<T>,
  options: { isolationLevel?: IsolationLevel; lockTimeoutMs?: number } = {}
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query(options.isolationLevel ? `BEGIN ISOLATION LEVEL ${options.isolationLevel}` : 'BEGIN');
    if (options.lockTimeoutMs && options.lockTimeoutMs > 0) {
      await client.query(`SET LOCAL lock_timeout = ${Math.floor(options.lockTimeoutMs)}`);
    }
    const result = await handler(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

/**
 * Runs the handler in a fresh transaction per attempt, replaying it when
 * Postgres reports a serialization failure, deadlock or lock timeout.
 */
export async function withTransactionRetry<T>(
  handler: (client: PoolClient) => Promise<T>,
  options: TransactionRetryOptions = {}
): Promise<T> {
  return retryOnConflict(
    () => withTransaction(handler, { isolationLevel: options.isolationLevel, lockTimeoutMs: options.lockTimeoutMs }),
    {
      retries: options.retries ?? 2,
      baseDelayMs: options.baseDelayMs ?? 25,
      isRetryable: isRetryablePgError,
      onExhausted: options.onExhausted
    }
  );
}
