export type RetryOptions = {
  retries: number;
  baseDelayMs: number;
  isRetryable: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown) => void;
  onExhausted?: (err: unknown, attempts: number) => unknown;
  sleep?: (ms: number) => Promise<void>;
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `work` until it succeeds or fails with a non-retryable error. Retryable
 * failures back off exponentially (base, 2x base, 4x base ...) up to `retries`
 * extra attempts; the final failure goes through `onExhausted` when given.
 */
export async function retryOnConflict<T>(work: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  let attempt = 0;
  for (;;) {
    try {
      return await work(attempt);
    } catch (err) {
      if (!options.isRetryable(err)) {
        throw err;
      }
      if (attempt >= options.retries) {
        throw options.onExhausted ? options.onExhausted(err, attempt + 1) : err;
      }
      options.onRetry?.(attempt + 1, err);
      await sleep(options.baseDelayMs * 2 ** attempt);
      attempt += 1;
    }
  }
}
