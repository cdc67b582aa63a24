/**
 * Token bucket shared by every caller of a registrar provider.
 * Acquisitions are served in arrival order.
 */
import { sleep } from './retry.js';

export interface RateLimiterOptions {
  /** Refill rate; 0 disables limiting */
  requestsPerSecond: number;
  /** Bucket capacity */
  burst: number;
}

export class RateLimiter {
  private readonly requestsPerSecond: number;
  private readonly burst: number;
  private tokens: number;
  private lastRefill: number;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions) {
    this.requestsPerSecond = options.requestsPerSecond;
    this.burst = Math.max(1, options.burst);
    this.tokens = this.burst;
    this.lastRefill = Date.now();
  }

  static unlimited(): RateLimiter {
    return new RateLimiter({ requestsPerSecond: 0, burst: 1 });
  }

  isEnabled(): boolean {
    return this.requestsPerSecond > 0;
  }

  /**
   * Wait for a token. Rejects with CancelledError if `signal` aborts while waiting.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (!this.isEnabled()) {
      return Promise.resolve();
    }

    const next = this.queue.then(() => this.take(signal));
    // A cancelled waiter must not block the ones queued behind it
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async take(signal?: AbortSignal): Promise<void> {
    for (;;) {
      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }
      const waitMs = Math.ceil(((1 - this.tokens) / this.requestsPerSecond) * 1000);
      await sleep(waitMs, signal);
    }
  }

  private refill(): void {
    const now = Date.now();
    const elapsedSeconds = (now - this.lastRefill) / 1000;
    this.lastRefill = now;
    this.tokens = Math.min(this.burst, this.tokens + elapsedSeconds * this.requestsPerSecond);
  }
}
