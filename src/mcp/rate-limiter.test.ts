/**
 * Tests for the token-bucket rate limiter
 */

import { describe, it, expect } from "vitest";
import { TokenBucketRateLimiter } from "./rate-limiter.js";

function fakeClock() {
  let time = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => time,
    advance: (ms: number) => {
      time += ms;
    },
    sleep: async (ms: number) => {
      sleeps.push(ms);
      time += ms;
    },
  };
}

describe("TokenBucketRateLimiter", () => {
  it("should allow a burst without waiting", async () => {
    const clock = fakeClock();
    const limiter = new TokenBucketRateLimiter({
      requestsPerSecond: 1,
      burstSize: 2,
      now: clock.now,
      sleep: clock.sleep,
    });

    await limiter.acquire();
    await limiter.acquire();

    expect(clock.sleeps).toEqual([]);
    expect(limiter.available()).toBe(0);
  });

  it("should wait for a token once the bucket is empty", async () => {
    const clock = fakeClock();
    const limiter = new TokenBucketRateLimiter({
      requestsPerSecond: 1,
      burstSize: 2,
      now: clock.now,
      sleep: clock.sleep,
    });

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    expect(clock.sleeps).toEqual([1000]);
  });

  it("should wait only for the missing fraction of a token", async () => {
    const clock = fakeClock();
    const limiter = new TokenBucketRateLimiter({
      requestsPerSecond: 4,
      burstSize: 1,
      now: clock.now,
      sleep: clock.sleep,
    });

    await limiter.acquire();
    clock.advance(125);
    await limiter.acquire();

    expect(clock.sleeps).toEqual([125]);
  });

  it("should never refill above the burst size", async () => {
    const clock = fakeClock();
    const limiter = new TokenBucketRateLimiter({
      requestsPerSecond: 10,
      burstSize: 3,
      now: clock.now,
      sleep: clock.sleep,
    });

    clock.advance(60_000);

    expect(limiter.available()).toBe(3);
  });

  it("should serialise concurrent callers", async () => {
    const clock = fakeClock();
    const limiter = new TokenBucketRateLimiter({
      requestsPerSecond: 2,
      burstSize: 1,
      now: clock.now,
      sleep: clock.sleep,
    });

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);

    expect(clock.sleeps).toEqual([500, 500]);
  });
});
