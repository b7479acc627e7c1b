/**
 * Rate Limiter
 *
 * Per-identity token bucket with lazy refill. Each identity may burst up to
 * bucketSize (2 × maxPerSec) sends, then sustains maxPerSec.
 *
 * Buckets live in process memory only. An idle sweep drops buckets that have
 * not refilled for idleTtlMs so the map does not grow with every caller
 * ever seen.
 *
 * Admission runs synchronously, so a check-and-consume cycle cannot
 * interleave with another request or with the sweep.
 */

export interface Bucket {
  tokens: number;
  /** Epoch ms of the last refill that added at least one token */
  lastRefill: number;
}

export interface BucketPolicy {
  maxPerSec: number;
  bucketSize: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  limit: number;
}

export type Clock = () => number;

export interface RateLimiterOptions {
  maxPerSec?: number;
  cleanupIntervalMs?: number;
  idleTtlMs?: number;
  clock?: Clock;
}

const DEFAULT_MAX_PER_SEC = 10;
const DEFAULT_CLEANUP_INTERVAL_MS = 30 * 60 * 1000;
const DEFAULT_IDLE_TTL_MS = 60 * 60 * 1000;

/**
 * Bring a bucket up to date at `now`. A missing bucket starts full.
 *
 * lastRefill only moves when whole tokens are added, so a stream of checks
 * spaced less than a token apart still accumulates elapsed time.
 */
export function refill(bucket: Bucket | undefined, now: number, policy: BucketPolicy): Bucket {
  if (!bucket) {
    return { tokens: policy.bucketSize, lastRefill: now };
  }

  const tokensToAdd = Math.floor(((now - bucket.lastRefill) * policy.maxPerSec) / 1000);
  if (tokensToAdd <= 0) {
    return bucket;
  }

  return {
    tokens: Math.min(bucket.tokens + tokensToAdd, policy.bucketSize),
    lastRefill: now,
  };
}

/** Take one token if there is one. */
export function take(bucket: Bucket): { bucket: Bucket; allowed: boolean } {
  if (bucket.tokens <= 0) {
    return { bucket, allowed: false };
  }
  return { bucket: { ...bucket, tokens: bucket.tokens - 1 }, allowed: true };
}

export class RateLimiter {
  readonly policy: BucketPolicy;
  private readonly buckets = new Map<string, Bucket>();
  private readonly clock: Clock;
  private readonly cleanupIntervalMs: number;
  private readonly idleTtlMs: number;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: RateLimiterOptions = {}) {
    const maxPerSec = options.maxPerSec ?? DEFAULT_MAX_PER_SEC;
    if (!Number.isInteger(maxPerSec) || maxPerSec <= 0) {
      throw new RangeError(`maxPerSec must be a positive integer, got ${maxPerSec}`);
    }

    this.policy = { maxPerSec, bucketSize: maxPerSec * 2 };
    this.clock = options.clock ?? Date.now;
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS;
    this.idleTtlMs = options.idleTtlMs ?? DEFAULT_IDLE_TTL_MS;
  }

  /**
   * Admission check for one send. Consumes a token when allowed.
   */
  consume(identity: string): RateLimitDecision {
    const current = refill(this.buckets.get(identity), this.clock(), this.policy);
    const { bucket, allowed } = take(current);
    this.buckets.set(identity, bucket);

    return { allowed, remaining: bucket.tokens, limit: this.policy.bucketSize };
  }

  allow(identity: string): boolean {
    return this.consume(identity).allowed;
  }

  /** Current bucket for an identity, without refilling or consuming. */
  peek(identity: string): Bucket | undefined {
    const bucket = this.buckets.get(identity);
    return bucket ? { ...bucket } : undefined;
  }

  get size(): number {
    return this.buckets.size;
  }

  /**
   * Drop buckets whose last refill is older than the idle TTL.
   * Returns the number removed.
   */
  sweep(): number {
    const threshold = this.clock() - this.idleTtlMs;
    let removed = 0;

    for (const [identity, bucket] of this.buckets) {
      if (bucket.lastRefill < threshold) {
        this.buckets.delete(identity);
        removed += 1;
      }
    }

    if (removed > 0) {
      console.log(
        `[RateLimiter] Cleanup removed ${removed} inactive identities, ${this.buckets.size} remaining`
      );
    }
    return removed;
  }

  /** Schedule the periodic sweep. Idempotent. */
  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => this.sweep(), this.cleanupIntervalMs);
    // The sweep alone must not keep the process alive
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
