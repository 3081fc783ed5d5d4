import { describe, expect, it, vi } from 'vitest';
import { retryOnConflict } from './retry';

class Conflict extends Error {}

describe('retryOnConflict', () => {
  it('retries retryable failures with exponential backoff', async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const work = vi
      .fn(async (_attempt: number): Promise<string> => 'done')
      .mockRejectedValueOnce(new Conflict('busy'))
      .mockRejectedValueOnce(new Conflict('busy'));

    const result = await retryOnConflict(work, {
      retries: 3,
      baseDelayMs: 10,
      isRetryable: (err) => err instanceof Conflict,
      sleep
    });

    expect(result).toBe('done');
    expect(work).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([10, 20]);
  });

  it('rethrows non-retryable failures immediately', async () => {
    const work = vi.fn(async () => {
      throw new Error('boom');
    });
    await expect(
      retryOnConflict(work, { retries: 3, baseDelayMs: 1, isRetryable: () => false, sleep: async () => undefined })
    ).rejects.toThrow('boom');
    expect(work).toHaveBeenCalledTimes(1);
  });

  it('maps the last failure through onExhausted', async () => {
    const onExhausted = vi.fn((_err: unknown, attempts: number) => new Error(`gave up after ${attempts}`));
    await expect(
      retryOnConflict(
        async () => {
          throw new Conflict('busy');
        },
        { retries: 2, baseDelayMs: 1, isRetryable: () => true, onExhausted, sleep: async () => undefined }
      )
    ).rejects.toThrow('gave up after 3');
  });
});
