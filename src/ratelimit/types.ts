// ============================================
// Rate limiting types
// ============================================

export const ENDPOINT_CLASSES = ["default", "prediction", "ml-analysis", "report"] as const;

/** Named policy grouping of endpoints sharing one rate-limit configuration */
export type EndpointClass = (typeof ENDPOINT_CLASSES)[number];

export interface RatePolicy {
  /** Max tokens */
  capacity: number;
  /** Tokens per second */
  refillRate: number;
}

export type RatePolicies = Readonly<Record<EndpointClass, Readonly<RatePolicy>>>;

export interface Bucket {
  capacity: number;
  refillRate: number;
  tokens: number;
  /** Clock milliseconds of the last refill */
  lastRefill: number;
  consecutiveDenials: number;
}

export interface AdmitDecision {
  allowed: boolean;
  limit: number;
  /** floor(tokens) after this request */
  remaining: number;
  /** Whole seconds until one token is available; only on denial */
  retryAfterSeconds?: number;
  /** Denials in a row on this bucket, including this one */
  consecutiveDenials: number;
}

export interface LimiterStats {
  trackedBuckets: number;
  bucketsByClass: Record<EndpointClass, number>;
  limits: Record<EndpointClass, { perMinute: number; capacity: number; refillRate: number }>;
}

export function isEndpointClass(value: string): value is EndpointClass {
  return ENDPOINT_CLASSES.some((endpointClass) => endpointClass === value);
}

/** capacity = limit, refillRate = limit / 60 */
export function perMinute(limit: number): RatePolicy {
  return { capacity: limit, refillRate: limit / 60 };
}

export const DEFAULT_POLICIES: RatePolicies = Object.freeze({
  default: perMinute(100),
  prediction: perMinute(30),
  "ml-analysis": perMinute(20),
  report: perMinute(10),
});

/** Build a record with one entry per endpoint class */
export function mapEndpointClasses<T>(fn: (endpointClass: EndpointClass) => T): Record<EndpointClass, T> {
  return {
    default: fn("default"),
    prediction: fn("prediction"),
    "ml-analysis": fn("ml-analysis"),
    report: fn("report"),
  };
}
