/**
 * Minimum-interval rate limiter.
 *
 * Callers reserve the next free slot before sleeping, so concurrent callers
 * are spaced `minIntervalMs` apart instead of all waking at once.
 */
export class RateLimiter {
  private nextSlot = 0;

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  /** Interval between calls in milliseconds. */
  get intervalMs(): number {
    return this.minIntervalMs;
  }

  async wait(): Promise<void> {
    if (this.minIntervalMs <= 0) return;

    const now = this.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.minIntervalMs;

    const delay = slot - now;
    if (delay > 0) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
