// ============================================
// Sanitization: strip characters significant to HTML
// sanitize(sanitize(x)) === sanitize(x)
// ============================================

export const DEFAULT_MAX_STRING_LENGTH = 1000;

const UNSAFE_CHARACTERS = /[<>"'`]/g;

export function sanitizeString(text: string, maxLength = DEFAULT_MAX_STRING_LENGTH): string {
  return text.replace(UNSAFE_CHARACTERS, "").slice(0, maxLength).trim();
}

/** Sanitize every string inside a JSON value; other scalars pass through */
export function sanitizeValue(value: unknown, maxLength = DEFAULT_MAX_STRING_LENGTH): unknown {
  if (typeof value === "string") {
    return sanitizeString(value, maxLength);
  }
  if (Array.isArray(value)) {
    return value.map((item) => sanitizeValue(item, maxLength));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = sanitizeValue(item, maxLength);
    }
    return out;
  }
  return value;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Every string inside a JSON value, depth first */
export function collectStrings(value: unknown, out: string[] = []): string[] {
  if (typeof value === "string") {
    out.push(value);
  } else if (Array.isArray(value)) {
    for (const item of value) collectStrings(item, out);
  } else if (isPlainObject(value)) {
    for (const item of Object.values(value)) collectStrings(item, out);
  }
  return out;
}
