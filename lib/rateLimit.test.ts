import { describe, expect, test } from 'vitest';
import { createRateLimiter } from './rateLimit.js';

describe('createRateLimiter', () => {
  test('allows max requests per window, per key', () => {
    let now = 0;
    const limiter = createRateLimiter(2, 1000, () => now);

    expect(limiter.isRateLimited('a')).toBe(false);
    expect(limiter.isRateLimited('a')).toBe(false);
    expect(limiter.isRateLimited('a')).toBe(true);
    expect(limiter.isRateLimited('b')).toBe(false);

    now = 1001;
    expect(limiter.isRateLimited('a')).toBe(false);
  });
});
