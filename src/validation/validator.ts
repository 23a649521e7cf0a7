// ============================================
// InputValidator: shape, required fields, attack signatures, sanitization
// Stateless: the same payload and schema always give the same result.
// ============================================

import {
  err,
  malformedRequest,
  ok,
  securityViolation,
  validationError,
  type Result,
} from "../lib/errors.js";
import type { LogFields } from "../lib/logger.js";
import { detectThreat, type ThreatMatch } from "./patterns.js";
import {
  DEFAULT_MAX_STRING_LENGTH,
  collectStrings,
  isPlainObject,
  sanitizeString,
  sanitizeValue,
} from "./sanitize.js";

export interface ValidationSchema {
  /** Checked in order; the first missing or empty one is reported */
  required: readonly string[];
  optional?: readonly string[];
  /** Reject fields outside required and optional */
  rejectUnknown?: boolean;
}

export interface ValidatorOptions {
  xss?: boolean;
  sql?: boolean;
  maxStringLength?: number;
}

export type Payload = Record<string, unknown>;

/** Anything that can record a security event, such as a RequestLogger */
export interface SecurityEventLogger {
  logSecurityEvent(securityEvent: string, message: string, context?: LogFields): void;
}

const THREAT_LABEL: Record<ThreatMatch["category"], string> = {
  xss: "XSS attack",
  "sql-injection": "SQL injection",
};

function parseBody(body: unknown): Result<Payload> {
  let value = body;

  if (Buffer.isBuffer(value)) {
    value = value.toString("utf8");
  }

  if (value === undefined || value === null || (typeof value === "string" && value.trim() === "")) {
    return err(malformedRequest("Request body is empty"));
  }

  if (typeof value === "string") {
    try {
      value = JSON.parse(value);
    } catch (cause) {
      return err(malformedRequest("Request body must be valid JSON", cause));
    }
  }

  if (!isPlainObject(value)) {
    return err(malformedRequest("Request body must be a JSON object"));
  }

  return ok(value);
}

function isEmptyValue(value: unknown): boolean {
  if (typeof value === "string") return value.trim().length === 0;
  if (Array.isArray(value)) return value.length === 0;
  if (isPlainObject(value)) return Object.keys(value).length === 0;
  return false;
}

export class InputValidator {
  private readonly xss: boolean;
  private readonly sql: boolean;
  readonly maxStringLength: number;

  constructor(options: ValidatorOptions = {}) {
    this.xss = options.xss ?? true;
    this.sql = options.sql ?? true;
    this.maxStringLength = options.maxStringLength ?? DEFAULT_MAX_STRING_LENGTH;
  }

  /**
   * Validate and sanitize a request body against a schema.
   * A security violation is recorded on `security` before the failure is returned.
   */
  validate(body: unknown, schema: ValidationSchema, security?: SecurityEventLogger): Result<Payload> {
    const parsed = parseBody(body);
    if (!parsed.ok) return parsed;
    const payload = parsed.value;

    for (const field of schema.required) {
      const value = payload[field];
      if (value === undefined || value === null) {
        return err(validationError(`Missing required field: ${field}`, field));
      }
      if (isEmptyValue(value)) {
        return err(validationError(`Field "${field}" must not be empty`, field));
      }
    }

    if (schema.rejectUnknown) {
      const allowed = new Set([...schema.required, ...(schema.optional ?? [])]);
      const unknown = Object.keys(payload).find((field) => !allowed.has(field));
      if (unknown !== undefined) {
        return err(validationError(`Field "${unknown}" is not allowed`, unknown));
      }
    }

    for (const [field, value] of Object.entries(payload)) {
      for (const text of collectStrings(value)) {
        const threat = detectThreat(text, { xss: this.xss, sql: this.sql });
        if (!threat) continue;

        const message = `Potential ${THREAT_LABEL[threat.category]} detected in ${field}`;
        security?.logSecurityEvent(threat.category, message, {
          stage: "validation",
          field,
          signature: threat.signature,
        });
        return err(securityViolation(message, field));
      }
    }

    const cleaned: Payload = {};
    for (const [field, value] of Object.entries(payload)) {
      cleaned[field] = sanitizeValue(value, this.maxStringLength);
    }
    return ok(cleaned);
  }

  sanitize(text: string): string {
    return sanitizeString(text, this.maxStringLength);
  }
}
