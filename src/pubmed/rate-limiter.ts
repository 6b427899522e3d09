export interface RateLimiterOptions {
  minIntervalMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Min-interval gate: successive acquire() calls are released at least
 * `minIntervalMs` apart, however many callers are waiting at once.
 */
export class RateLimiter {
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private nextSlotMs = 0;

  constructor(options: RateLimiterOptions) {
    this.minIntervalMs = Math.max(0, options.minIntervalMs);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async acquire(): Promise<void> {
    const now = this.now();
    // Reserve the slot synchronously so concurrent callers queue up behind it
    const slot = Math.max(now, this.nextSlotMs);
    this.nextSlotMs = slot + this.minIntervalMs;

    const waitMs = slot - now;
    if (waitMs > 0) {
      await this.sleep(waitMs);
    }
  }
}
