import { describe, it, expect } from 'vitest';
import { RateLimiter, createRateWindow } from '../rate-limiter';

describe('RateLimiter', () => {
  it('allows up to the limit within one second', () => {
    const limiter = new RateLimiter(2, () => 1_000);
    const window = createRateWindow(1_000);

    expect(limiter.allow(window)).toBe(true);
    expect(limiter.allow(window)).toBe(true);
    expect(limiter.allow(window)).toBe(false);
  });

  it('starts a fresh window after a second has passed', () => {
    let now = 1_000;
    const limiter = new RateLimiter(1, () => now);
    const window = createRateWindow(now);

    expect(limiter.allow(window)).toBe(true);
    expect(limiter.allow(window)).toBe(false);

    now = 2_000;
    expect(limiter.allow(window)).toBe(true);
    expect(window).toEqual({ messageCount: 1, messageWindowStart: 2_000 });
  });
});
