// ============================================
// Request identifiers: correlate every record of one request
// ============================================

const UPSTREAM_ID_PATTERN = /^[A-Za-z0-9._:-]{1,64}$/;

export type RequestIdGenerator = (remoteAddr: string | undefined) => string;

/**
 * `<epoch-ms>-<sequence>-<address>`. The sequence makes ids unique within
 * a millisecond. Ids are always generated here, never taken from the caller.
 */
export function createRequestIdGenerator(now: () => number = Date.now): RequestIdGenerator {
  let sequence = 0;

  return (remoteAddr) => {
    sequence = (sequence + 1) % Number.MAX_SAFE_INTEGER;
    return `${now()}-${sequence.toString(36)}-${remoteAddr || "unknown"}`;
  };
}

/** A caller-supplied X-Request-Id, kept for the logs when well formed */
export function upstreamRequestId(header: string | undefined): string | undefined {
  return header && UPSTREAM_ID_PATTERN.test(header) ? header : undefined;
}
