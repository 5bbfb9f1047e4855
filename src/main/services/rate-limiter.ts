/**
 * Minimum-interval gate shared by every outbound request.
 * Grants are chained, so consecutive grants are at least intervalMs apart no matter
 * how many callers wait at once. Guarantees spacing, not burst smoothing.
 */

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

export class RateLimiter {
  private readonly intervalMs: number;
  private readonly now: () => number;
  private lastGrant = Number.NEGATIVE_INFINITY;
  private tail: Promise<void> = Promise.resolve();

  constructor(intervalMs: number, now: () => number = Date.now) {
    this.intervalMs = intervalMs;
    this.now = now;
  }

  /**
   * Resolve when the caller may send its request.
   */
  wait(): Promise<void> {
    const turn = this.tail.then(async () => {
      const delay = this.lastGrant + this.intervalMs - this.now();
      if (delay > 0) {
        await sleep(delay);
      }
      this.lastGrant = this.now();
    });
    this.tail = turn;
    return turn;
  }
}
