import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RateLimiter } from '../rateLimiter';
import { silentLogger } from '../../__tests__/helpers/fakeHttp';

describe('RateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should space three calls one interval apart at 1 request per second', async () => {
    const limiter = new RateLimiter(1, silentLogger);
    const start = Date.now();
    const offsets: number[] = [];

    const all = Promise.all(
      [0, 1, 2].map(() => limiter.acquire().then(() => offsets.push(Date.now() - start)))
    );
    await vi.advanceTimersByTimeAsync(2000);
    await all;

    expect(offsets).toEqual([0, 1000, 2000]);
  });

  it('should not wait when the previous slot is old enough', async () => {
    const limiter = new RateLimiter(2, silentLogger);

    await limiter.acquire();
    vi.advanceTimersByTime(600);

    const before = Date.now();
    await limiter.acquire();

    expect(Date.now() - before).toBe(0);
  });

  it('should wait only for the remainder of the interval', async () => {
    const limiter = new RateLimiter(2, silentLogger);
    await limiter.acquire();
    vi.advanceTimersByTime(200);

    const before = Date.now();
    const second = limiter.acquire();
    await vi.advanceTimersByTimeAsync(300);
    await second;

    expect(Date.now() - before).toBe(300);
  });

  it('should reject a non-positive rate', () => {
    expect(() => new RateLimiter(0)).toThrow(RangeError);
    expect(() => new RateLimiter(-1)).toThrow(RangeError);
  });
});
