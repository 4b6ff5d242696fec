export type RateLimit = {
  /** Messages allowed per window. */
  limit: number;
  windowMs: number;
};

/** Provider flood limits, by account standing in the channel. */
export const RateClass = {
  regular: { limit: 20, windowMs: 30_000 },
  known: { limit: 50, windowMs: 30_000 },
  moderator: { limit: 100, windowMs: 30_000 },
  verified: { limit: 7500, windowMs: 30_000 }
} as const satisfies Record<string, RateLimit>;

export type RateClassName = keyof typeof RateClass;

/**
 * Rolling-window limiter: at most `limit` sends in any `windowMs` span.
 */
export class RateLimiter {
  private readonly sent: number[] = [];
  readonly limit: number;
  readonly windowMs: number;
  private readonly now: () => number;

  constructor(rate: RateLimit, now: () => number = () => Date.now()) {
    this.limit = rate.limit;
    this.windowMs = rate.windowMs;
    this.now = now;
  }

  private prune(now: number) {
    while (this.sent.length && this.sent[0] <= now - this.windowMs) this.sent.shift();
  }

  available(): number {
    this.prune(this.now());
    return this.limit - this.sent.length;
  }

  /** Takes one send from the budget; false (and nothing taken) when it is spent. */
  tryConsume(): boolean {
    if (this.available() <= 0) return false;
    this.sent.push(this.now());
    return true;
  }

  /** Milliseconds until the next send is allowed; 0 when one is allowed now. */
  delay(): number {
    const now = this.now();
    this.prune(now);
    if (this.sent.length < this.limit) return 0;
    return this.sent[0] + this.windowMs - now;
  }
}
