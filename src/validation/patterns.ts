// ============================================
// Attack signatures
// Basic pattern checks, not a complete defense.
// ============================================

export interface Signature {
  name: string;
  pattern: RegExp;
}

export const XSS_SIGNATURES: readonly Signature[] = [
  { name: "script-tag", pattern: /<\s*script\b[^>]*>/i },
  { name: "javascript-uri", pattern: /javascript\s*:/i },
  { name: "event-handler", pattern: /\bon[a-z]+\s*=/i },
  { name: "iframe-tag", pattern: /<\s*iframe\b[^>]*>/i },
];

export const SQL_SIGNATURES: readonly Signature[] = [
  { name: "union-select", pattern: /\bUNION\s+(?:ALL\s+)?SELECT\b/i },
  { name: "drop-table", pattern: /\bDROP\s+TABLE\b/i },
  { name: "insert-into", pattern: /\bINSERT\s+INTO\b/i },
  { name: "delete-from", pattern: /\bDELETE\s+FROM\b/i },
];

export type ThreatCategory = "xss" | "sql-injection";

export interface ThreatMatch {
  category: ThreatCategory;
  signature: string;
}

export function detectThreat(
  input: string,
  options: { xss?: boolean; sql?: boolean } = {}
): ThreatMatch | null {
  const { xss = true, sql = true } = options;

  if (xss) {
    const hit = XSS_SIGNATURES.find((s) => s.pattern.test(input));
    if (hit) return { category: "xss", signature: hit.name };
  }

  if (sql) {
    const hit = SQL_SIGNATURES.find((s) => s.pattern.test(input));
    if (hit) return { category: "sql-injection", signature: hit.name };
  }

  return null;
}
