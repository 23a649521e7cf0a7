// ============================================
// Token bucket arithmetic
// ============================================

import type { Bucket, RatePolicy } from "./types.js";

export function createBucket(policy: RatePolicy, now: number): Bucket {
  return {
    capacity: policy.capacity,
    refillRate: policy.refillRate,
    tokens: policy.capacity,
    lastRefill: now,
    consecutiveDenials: 0,
  };
}

/** Recompute tokens from elapsed time. A clock that goes backwards adds nothing. */
export function refill(bucket: Bucket, now: number): void {
  const elapsedSeconds = Math.max(0, now - bucket.lastRefill) / 1000;
  bucket.tokens = Math.min(bucket.capacity, bucket.tokens + elapsedSeconds * bucket.refillRate);
  bucket.lastRefill = Math.max(now, bucket.lastRefill);
}

export type TakeResult =
  | { allowed: true; remaining: number }
  | { allowed: false; remaining: number; retryAfterSeconds: number };

/**
 * Refill, then take one token if available.
 * Synchronous on purpose: the read-modify-write must not span an await.
 */
export function take(bucket: Bucket, now: number): TakeResult {
  refill(bucket, now);

  if (bucket.tokens >= 1) {
    bucket.tokens -= 1;
    bucket.consecutiveDenials = 0;
    return { allowed: true, remaining: Math.floor(bucket.tokens) };
  }

  bucket.consecutiveDenials += 1;
  return {
    allowed: false,
    remaining: 0,
    retryAfterSeconds: Math.max(1, Math.ceil((1 - bucket.tokens) / bucket.refillRate)),
  };
}

/** Tokens the bucket would hold at `now`, without mutating it */
export function projectedTokens(bucket: Bucket, now: number): number {
  const elapsedSeconds = Math.max(0, now - bucket.lastRefill) / 1000;
  return Math.min(bucket.capacity, bucket.tokens + elapsedSeconds * bucket.refillRate);
}
