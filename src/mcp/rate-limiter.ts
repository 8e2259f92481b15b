/**
 * Token-bucket rate limiting for upstream servers
 *
 * One limiter is constructed per upstream and handed to its client, so each
 * server gets its own budget.
 */

import { createMutex, sleep as defaultSleep, type Mutex } from "../utils/async.js";

/**
 * Gate that resolves once a request may be sent
 */
export interface RateLimiter {
  acquire(): Promise<void>;
}

export interface TokenBucketOptions {
  /** Sustained request rate */
  requestsPerSecond: number;
  /** Bucket capacity; also the initial token count */
  burstSize: number;
  /** Milliseconds clock; injectable for tests */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Token bucket: starts full, refills continuously at `requestsPerSecond`,
 * never holds more than `burstSize` tokens.
 */
export class TokenBucketRateLimiter implements RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly mutex: Mutex = createMutex();
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: TokenBucketOptions) {
    this.now = options.now ?? (() => performance.now());
    this.sleep = options.sleep ?? defaultSleep;
    this.tokens = options.burstSize;
    this.lastRefill = this.now();
  }

  async acquire(): Promise<void> {
    await this.mutex.withLock(async () => {
      this.refill();

      if (this.tokens < 1) {
        const waitMs = ((1 - this.tokens) / this.options.requestsPerSecond) * 1000;
        await this.sleep(waitMs);
        this.refill();
      }

      this.tokens -= 1;
    });
  }

  /**
   * Tokens currently available (after refill)
   */
  available(): number {
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const current = this.now();
    const elapsedSeconds = (current - this.lastRefill) / 1000;
    this.tokens = Math.min(
      this.options.burstSize,
      this.tokens + elapsedSeconds * this.options.requestsPerSecond,
    );
    this.lastRefill = current;
  }
}
