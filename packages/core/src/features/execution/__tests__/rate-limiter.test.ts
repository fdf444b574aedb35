import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RateLimiter } from '../rate-limiter.js';

describe('RateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs up to maxRequests tasks immediately', async () => {
    const limiter = new RateLimiter({ maxRequests: 2, intervalMs: 1000 });
    const ran: number[] = [];

    const tasks = [1, 2, 3].map((n) =>
      limiter.schedule(async () => {
        ran.push(n);
        return n;
      }),
    );
    await vi.advanceTimersByTimeAsync(0);

    expect(ran).toEqual([1, 2]);
    expect(limiter.pending()).toBe(1);

    await vi.advanceTimersByTimeAsync(1000);

    expect(ran).toEqual([1, 2, 3]);
    expect(limiter.pending()).toBe(0);
    await expect(Promise.all(tasks)).resolves.toEqual([1, 2, 3]);
  });

  it('preserves FIFO order across windows', async () => {
    const limiter = new RateLimiter({ maxRequests: 1, intervalMs: 100 });
    const ran: string[] = [];

    for (const id of ['a', 'b', 'c', 'd']) {
      void limiter.schedule(async () => {
        ran.push(id);
      });
    }

    await vi.advanceTimersByTimeAsync(0);
    expect(ran).toEqual(['a']);
    await vi.advanceTimersByTimeAsync(100);
    expect(ran).toEqual(['a', 'b']);
    await vi.advanceTimersByTimeAsync(200);
    expect(ran).toEqual(['a', 'b', 'c', 'd']);
  });

  it('propagates task failures to the caller', async () => {
    const limiter = new RateLimiter({ maxRequests: 5, intervalMs: 1000 });

    const result = limiter.schedule(async () => {
      throw new Error('boom');
    });

    await expect(result).rejects.toThrow('boom');
  });

  it('keeps queued tasks after dispose', async () => {
    const limiter = new RateLimiter({ maxRequests: 1, intervalMs: 1000 });
    void limiter.schedule(async () => undefined);
    void limiter.schedule(async () => undefined);

    limiter.dispose();
    await vi.advanceTimersByTimeAsync(5000);

    expect(limiter.pending()).toBe(1);
  });
});
