import { describe, expect, it } from 'vitest';
import { Mutex } from './mutex';

describe('Mutex', () => {
  it('runs callers one at a time in arrival order', async () => {
    const mutex = new Mutex();
    const log: string[] = [];
    const task = (name: string, delayMs: number) =>
      mutex.runExclusive(async () => {
        log.push(`${name}:start`);
        await new Promise((resolve) => setTimeout(resolve, delayMs));
        log.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([task('a', 15), task('b', 0), task('c', 5)]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(log).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('releases the lock when the work fails', async () => {
    const mutex = new Mutex();
    await expect(
      mutex.runExclusive(async () => {
        throw new Error('failed');
      })
    ).rejects.toThrow('failed');
    await expect(mutex.runExclusive(async () => 'next')).resolves.toBe('next');
  });
});
