// ============================================
// RateLimiter: one token bucket per (client key, endpoint class)
// In-memory, single process. Multiple instances need a shared store.
// ============================================

import { systemClock, type Clock } from "../lib/clock.js";
import { createBucket, projectedTokens, take } from "./tokenBucket.js";
import {
  DEFAULT_POLICIES,
  mapEndpointClasses,
  type AdmitDecision,
  type Bucket,
  type EndpointClass,
  type LimiterStats,
  type RatePolicies,
} from "./types.js";

export interface RateLimiterOptions {
  policies?: RatePolicies;
  clock?: Clock;
  /** Idle time after which a bucket that has fully refilled may be dropped */
  idleEvictMs?: number;
}

interface BucketEntry {
  endpointClass: EndpointClass;
  bucket: Bucket;
}

function bucketKey(clientKey: string, endpointClass: EndpointClass): string {
  return `${endpointClass}\u0000${clientKey}`;
}

export class RateLimiter {
  readonly policies: RatePolicies;
  private readonly clock: Clock;
  private readonly idleEvictMs: number;
  private readonly buckets = new Map<string, BucketEntry>();

  constructor(options: RateLimiterOptions = {}) {
    this.policies = options.policies ?? DEFAULT_POLICIES;
    this.clock = options.clock ?? systemClock;
    this.idleEvictMs = options.idleEvictMs ?? 10 * 60 * 1000;
  }

  /**
   * Admit or reject one request. Never throws.
   * Lookup, refill and decrement run without yielding, so concurrent
   * requests on the same key cannot consume the same token.
   */
  admit(clientKey: string, endpointClass: EndpointClass): AdmitDecision {
    const policy = this.policies[endpointClass];
    const now = this.clock.now();
    const key = bucketKey(clientKey, endpointClass);

    let entry = this.buckets.get(key);
    if (!entry) {
      entry = { endpointClass, bucket: createBucket(policy, now) };
      this.buckets.set(key, entry);
    }

    const result = take(entry.bucket, now);

    if (result.allowed) {
      return {
        allowed: true,
        limit: policy.capacity,
        remaining: result.remaining,
        consecutiveDenials: 0,
      };
    }

    return {
      allowed: false,
      limit: policy.capacity,
      remaining: 0,
      retryAfterSeconds: result.retryAfterSeconds,
      consecutiveDenials: entry.bucket.consecutiveDenials,
    };
  }

  /** Drop buckets idle for at least idleEvictMs that would be full again. Returns the count removed. */
  evictIdle(): number {
    const now = this.clock.now();
    let removed = 0;

    for (const [key, { bucket }] of this.buckets) {
      const idleFor = now - bucket.lastRefill;
      if (idleFor >= this.idleEvictMs && projectedTokens(bucket, now) >= bucket.capacity) {
        this.buckets.delete(key);
        removed++;
      }
    }

    return removed;
  }

  /**
   * Run evictIdle on an interval. The timer does not keep the process alive.
   * Returns a function that stops it.
   */
  startHousekeeping(intervalMs: number, onSweep?: (removed: number, remaining: number) => void): () => void {
    const timer = setInterval(() => {
      const removed = this.evictIdle();
      onSweep?.(removed, this.buckets.size);
    }, intervalMs);
    timer.unref();

    return () => clearInterval(timer);
  }

  get size(): number {
    return this.buckets.size;
  }

  stats(): LimiterStats {
    const bucketsByClass = mapEndpointClasses(() => 0);
    for (const { endpointClass } of this.buckets.values()) {
      bucketsByClass[endpointClass] += 1;
    }

    const limits = mapEndpointClasses((endpointClass) => {
      const policy = this.policies[endpointClass];
      return {
        perMinute: Math.round(policy.refillRate * 60),
        capacity: policy.capacity,
        refillRate: policy.refillRate,
      };
    });

    return { trackedBuckets: this.buckets.size, bucketsByClass, limits };
  }

  reset(): void {
    this.buckets.clear();
  }
}
