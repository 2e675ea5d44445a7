export const sleep = (ms: number): Promise<void> => new Promise((r) => setTimeout(r, ms));

/**
 * Spaces calls at least `minIntervalMs` apart. Each caller reserves the next
 * free slot before sleeping, so concurrent workers sharing one limiter still
 * stay under the sequential rate.
 */
export class RateLimiter {
  private nextSlot = 0;

  constructor(private readonly minIntervalMs = 150) {}

  async wait(): Promise<void> {
    const now = Date.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.minIntervalMs;
    if (slot > now) {
      await sleep(slot - now);
    }
  }
}
