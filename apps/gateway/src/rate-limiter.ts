export interface RateWindow {
  messageCount: number;
  messageWindowStart: number;
}

export function createRateWindow(now: number = Date.now()): RateWindow {
  return { messageCount: 0, messageWindowStart: now };
}

export class RateLimiter {
  private readonly maxPerSecond: number;
  private readonly now: () => number;

  constructor(maxPerSecond: number, now: () => number = Date.now) {
    this.maxPerSecond = maxPerSecond;
    this.now = now;
  }

  allow(state: RateWindow): boolean {
    const now = this.now();
    if (now - state.messageWindowStart >= 1000) {
      state.messageCount = 0;
      state.messageWindowStart = now;
    }
    state.messageCount++;
    return state.messageCount <= this.maxPerSecond;
  }
}
