export { RateLimiter, type RateLimiterOptions } from "./limiter.js";
export { deriveClientKey } from "./clientKey.js";
export { createBucket, refill, take, projectedTokens, type TakeResult } from "./tokenBucket.js";
export {
  DEFAULT_POLICIES,
  ENDPOINT_CLASSES,
  isEndpointClass,
  mapEndpointClasses,
  perMinute,
  type AdmitDecision,
  type Bucket,
  type EndpointClass,
  type LimiterStats,
  type RatePolicies,
  type RatePolicy,
} from "./types.js";
