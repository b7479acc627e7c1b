import { RateLimiter, refill, take, BucketPolicy } from "../src/services/rateLimiter";

const policy: BucketPolicy = { maxPerSec: 10, bucketSize: 20 };

describe("refill", () => {
  it("starts a missing bucket full", () => {
    expect(refill(undefined, 5000, policy)).toEqual({ tokens: 20, lastRefill: 5000 });
  });

  it("adds floor(elapsed seconds * maxPerSec) tokens", () => {
    expect(refill({ tokens: 0, lastRefill: 0 }, 250, policy)).toEqual({ tokens: 2, lastRefill: 250 });
  });

  it("caps at bucketSize", () => {
    expect(refill({ tokens: 18, lastRefill: 0 }, 10_000, policy)).toEqual({ tokens: 20, lastRefill: 10_000 });
  });

  it("leaves lastRefill alone when less than a token has accrued", () => {
    const bucket = { tokens: 5, lastRefill: 1000 };
    expect(refill(bucket, 1099, policy)).toBe(bucket);
  });
});

describe("take", () => {
  it("consumes one token", () => {
    expect(take({ tokens: 3, lastRefill: 7 })).toEqual({
      bucket: { tokens: 2, lastRefill: 7 },
      allowed: true,
    });
  });

  it("denies an empty bucket without changing it", () => {
    const bucket = { tokens: 0, lastRefill: 7 };
    expect(take(bucket)).toEqual({ bucket, allowed: false });
  });
});

describe("RateLimiter", () => {
  let now: number;
  let limiter: RateLimiter;

  beforeEach(() => {
    now = 0;
    limiter = new RateLimiter({ maxPerSec: 10, clock: () => now });
    jest.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    limiter.stop();
    jest.restoreAllMocks();
  });

  it("uses a burst of twice the rate", () => {
    expect(limiter.policy).toEqual({ maxPerSec: 10, bucketSize: 20 });
  });

  it("reports the decision for the first request", () => {
    expect(limiter.consume("alice")).toEqual({ allowed: true, remaining: 19, limit: 20 });
  });

  it("denies the 21st request inside one instant and never goes below zero", () => {
    for (let i = 0; i < 20; i++) {
      expect(limiter.allow("alice")).toBe(true);
    }
    expect(limiter.allow("alice")).toBe(false);
    expect(limiter.allow("alice")).toBe(false);
    expect(limiter.peek("alice")).toEqual({ tokens: 0, lastRefill: 0 });
  });

  it("keeps identities independent", () => {
    for (let i = 0; i < 20; i++) {
      limiter.allow("alice");
    }
    expect(limiter.allow("alice")).toBe(false);
    expect(limiter.allow("bob")).toBe(true);
  });

  it("accumulates sub-token intervals instead of resetting the refill clock", () => {
    for (let i = 0; i < 20; i++) {
      limiter.allow("alice");
    }

    now = 50;
    expect(limiter.allow("alice")).toBe(false);

    now = 100;
    expect(limiter.allow("alice")).toBe(true);
    expect(limiter.peek("alice")).toEqual({ tokens: 0, lastRefill: 100 });

    now = 150;
    expect(limiter.allow("alice")).toBe(false);
  });

  it("never refills past the bucket size", () => {
    limiter.allow("alice");
    now = 60_000;
    expect(limiter.consume("alice")).toEqual({ allowed: true, remaining: 19, limit: 20 });
  });

  it("rejects a non-positive rate", () => {
    expect(() => new RateLimiter({ maxPerSec: 0 })).toThrow(RangeError);
  });

  describe("sweep", () => {
    it("removes identities idle for more than an hour", () => {
      limiter.allow("alice");

      now = 60 * 60 * 1000;
      expect(limiter.sweep()).toBe(0);
      expect(limiter.size).toBe(1);

      now += 1;
      expect(limiter.sweep()).toBe(1);
      expect(limiter.size).toBe(0);
      expect(limiter.peek("alice")).toBeUndefined();
    });

    it("keeps recently active identities", () => {
      limiter.allow("alice");
      now = 50 * 60 * 1000;
      limiter.allow("bob");

      now = 60 * 60 * 1000 + 1;
      expect(limiter.sweep()).toBe(1);
      expect(limiter.peek("alice")).toBeUndefined();
      expect(limiter.peek("bob")).toEqual({ tokens: 19, lastRefill: 50 * 60 * 1000 });
    });

    it("gives a swept identity a fresh full bucket", () => {
      for (let i = 0; i < 20; i++) {
        limiter.allow("alice");
      }
      now = 2 * 60 * 60 * 1000;
      limiter.sweep();

      expect(limiter.consume("alice")).toEqual({ allowed: true, remaining: 19, limit: 20 });
      expect(limiter.peek("alice")).toEqual({ tokens: 19, lastRefill: now });
    });

    it("logs how many identities were removed", () => {
      limiter.allow("alice");
      now = 2 * 60 * 60 * 1000;
      limiter.sweep();

      expect(console.log).toHaveBeenCalledWith(
        "[RateLimiter] Cleanup removed 1 inactive identities, 0 remaining"
      );
    });
  });

  describe("scheduled cleanup", () => {
    beforeEach(() => {
      jest.useFakeTimers();
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    it("sweeps on every interval until stopped", () => {
      const scheduled = new RateLimiter({
        clock: () => now,
        cleanupIntervalMs: 1000,
        idleTtlMs: 500,
      });

      scheduled.allow("alice");
      scheduled.start();

      now = 2000;
      jest.advanceTimersByTime(1000);
      expect(scheduled.size).toBe(0);

      scheduled.stop();
      scheduled.allow("bob");
      now = 10_000;
      jest.advanceTimersByTime(5000);
      expect(scheduled.size).toBe(1);
    });

    it("does not schedule twice", () => {
      const scheduled = new RateLimiter({ clock: () => now, cleanupIntervalMs: 1000 });
      const sweep = jest.spyOn(scheduled, "sweep");

      scheduled.start();
      scheduled.start();
      jest.advanceTimersByTime(1000);
      scheduled.stop();

      expect(sweep).toHaveBeenCalledTimes(1);
    });
  });
});
