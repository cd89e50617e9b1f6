export type RateLimiterState = {
  windowStart: number;
  count: number;
};

export type RateLimiterOptions = {
  windowMs?: number;
  maxRequests?: number;
};

/**
 * Fixed-window request quota shared by every caller of the generation
 * pipeline. The window is swept lazily: it only resets when a call arrives
 * more than `windowMs` after `windowStart`. Denied calls still count.
 *
 * Not safe for concurrent writers; one instance serves one logical caller.
 */
export class RateLimiter {
  readonly windowMs: number;
  readonly maxRequests: number;

  private state: RateLimiterState = { windowStart: 0, count: 0 };

  constructor({ windowMs = 60_000, maxRequests = 5 }: RateLimiterOptions = {}) {
    this.windowMs = windowMs;
    this.maxRequests = maxRequests;
  }

  tryAcquire(now: number) {
    if (now - this.state.windowStart > this.windowMs) {
      this.state = { windowStart: now, count: 0 };
    }

    this.state.count += 1;
    return this.state.count <= this.maxRequests;
  }

  retryAfterMs(now: number) {
    return Math.max(0, this.state.windowStart + this.windowMs - now);
  }

  snapshot(): RateLimiterState {
    return { ...this.state };
  }
}
