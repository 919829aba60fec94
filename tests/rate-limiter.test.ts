import { describe, it, expect, vi, afterEach } from 'vitest';
import { RateLimiter } from '../src/execution/rate-limiter.js';

describe('RateLimiter', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should allow immediate requests under limit', async () => {
    const limiter = new RateLimiter(10);
    const start = Date.now();

    // 10 requests should be instant
    for (let i = 0; i < 10; i++) {
      await limiter.acquire();
    }

    const elapsed = Date.now() - start;
    expect(elapsed).toBeLessThan(100); // should be near-instant
  });

  it('should spend tokens by request weight and refill over time', async () => {
    vi.useFakeTimers();
    let now = 0;
    const limiter = new RateLimiter(1000, () => now); // 1 token/ms

    await limiter.acquire(600);
    await limiter.acquire(300);
    now += 50; // 100 남음 + 50 충전
    await limiter.acquire(150);
    expect(vi.getTimerCount()).toBe(0);

    const settled = vi.fn();
    const waiting = limiter.acquire(40).then(settled);
    await vi.advanceTimersByTimeAsync(39);
    expect(settled).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await waiting;
    expect(settled).toHaveBeenCalledOnce();
  });

  it('should throttle when tokens exhausted', async () => {
    const limiter = new RateLimiter(100);
    await limiter.acquire(100);

    const start = Date.now();
    await limiter.acquire(5); // 5 tokens at 100/s → ~50ms
    const elapsed = Date.now() - start;

    expect(elapsed).toBeGreaterThanOrEqual(40);
  });
});
