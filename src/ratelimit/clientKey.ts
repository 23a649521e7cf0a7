import crypto from "crypto";

/**
 * Identity used for rate limiting. The network address alone by default;
 * with `byUserAgent`, a digest of address and user agent.
 */
export function deriveClientKey(
  remoteAddr: string | undefined,
  userAgent: string | undefined,
  options: { byUserAgent?: boolean } = {}
): string {
  const address = remoteAddr && remoteAddr.length > 0 ? remoteAddr : "unknown";
  if (!options.byUserAgent) {
    return address;
  }
  return crypto.createHash("sha256").update(`${address}:${userAgent ?? ""}`).digest("hex").slice(0, 32);
}
