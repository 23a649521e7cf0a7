// ============================================
// Clock: monotonic time source for rate limiting
// ============================================

import { performance } from "perf_hooks";

export interface Clock {
  /** Milliseconds on a monotonic timeline */
  now(): number;
}

export const systemClock: Clock = {
  now: () => performance.now(),
};
