// ============================================
// Error taxonomy: one kind per failure class, one status per kind
// ============================================

import { ZodError } from "zod";

export const ERROR_KINDS = [
  "ValidationError",
  "MalformedRequest",
  "SecurityViolation",
  "NotFoundError",
  "UnauthorizedError",
  "ForbiddenError",
  "RateLimitError",
  "PredictionError",
  "InternalError",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export const HTTP_STATUS: Readonly<Record<ErrorKind, number>> = Object.freeze({
  ValidationError: 400,
  MalformedRequest: 400,
  SecurityViolation: 400,
  NotFoundError: 404,
  UnauthorizedError: 401,
  ForbiddenError: 403,
  RateLimitError: 429,
  PredictionError: 500,
  InternalError: 500,
});

export const GENERIC_INTERNAL_MESSAGE = "An unexpected error occurred. Please try again later.";

export interface ErrorRecord {
  readonly kind: ErrorKind;
  readonly message: string;
  readonly field?: string;
  readonly httpStatus: number;
  readonly timestamp: string;
  readonly retryAfter?: number;
}

/** JSON body returned to API callers on any failure */
export interface ErrorEnvelope {
  error: ErrorKind;
  message: string;
  field?: string;
  retryAfter?: number;
  timestamp: string;
}

export class ApiError extends Error {
  readonly record: ErrorRecord;
  override cause?: unknown;
  /** Detail kept for the logs only, never sent to the caller */
  readonly detail?: string;

  constructor(record: ErrorRecord, options: { cause?: unknown; detail?: string } = {}) {
    super(record.message);
    this.name = record.kind;
    this.record = Object.freeze({ ...record });
    this.cause = options.cause;
    this.detail = options.detail;
  }

  get kind(): ErrorKind {
    return this.record.kind;
  }

  get status(): number {
    return this.record.httpStatus;
  }

  toJSON(): ErrorEnvelope {
    return toEnvelope(this.record);
  }
}

export function createErrorRecord(
  kind: ErrorKind,
  message: string,
  extra: { field?: string; retryAfter?: number } = {}
): ErrorRecord {
  return {
    kind,
    message,
    httpStatus: HTTP_STATUS[kind],
    timestamp: new Date().toISOString(),
    ...(extra.field !== undefined && { field: extra.field }),
    ...(extra.retryAfter !== undefined && { retryAfter: extra.retryAfter }),
  };
}

export function toEnvelope(record: ErrorRecord): ErrorEnvelope {
  return {
    error: record.kind,
    message: record.message,
    ...(record.field !== undefined && { field: record.field }),
    ...(record.retryAfter !== undefined && { retryAfter: record.retryAfter }),
    timestamp: record.timestamp,
  };
}

// ============================================
// Factories
// ============================================

export function validationError(message: string, field?: string, cause?: unknown): ApiError {
  return new ApiError(createErrorRecord("ValidationError", message, { field }), { cause });
}

export function malformedRequest(message: string, cause?: unknown): ApiError {
  return new ApiError(createErrorRecord("MalformedRequest", message), { cause });
}

export function securityViolation(message: string, field: string): ApiError {
  return new ApiError(createErrorRecord("SecurityViolation", message, { field }));
}

export function notFoundError(resource: string, resourceId?: string): ApiError {
  const message = resourceId ? `${resource} not found: ${resourceId}` : `${resource} not found`;
  return new ApiError(createErrorRecord("NotFoundError", message));
}

export function unauthorizedError(message = "Unauthorized access"): ApiError {
  return new ApiError(createErrorRecord("UnauthorizedError", message));
}

export function forbiddenError(message = "Access forbidden"): ApiError {
  return new ApiError(createErrorRecord("ForbiddenError", message));
}

export function rateLimitError(retryAfter: number): ApiError {
  return new ApiError(
    createErrorRecord("RateLimitError", `Rate limit exceeded. Try again in ${retryAfter} seconds.`, {
      retryAfter,
    })
  );
}

export function predictionError(message: string, cause?: unknown): ApiError {
  return new ApiError(createErrorRecord("PredictionError", message), { cause });
}

export function internalError(cause: unknown): ApiError {
  return new ApiError(createErrorRecord("InternalError", GENERIC_INTERNAL_MESSAGE), {
    cause,
    detail: describeError(cause),
  });
}

// ============================================
// Tagged results
// ============================================

export type Result<T> = { ok: true; value: T } | { ok: false; error: ApiError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(error: ApiError): Result<T> {
  return { ok: false, error };
}

// ============================================
// Classification of thrown values
// ============================================

/**
 * Map any thrown value onto the taxonomy.
 * Anything unrecognized becomes an InternalError with a generic message.
 */
export function classifyError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }

  if (error instanceof ZodError) {
    const issue = error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join(".") : undefined;
    return validationError(issue?.message ?? "Invalid request parameters", field, error);
  }

  return internalError(error);
}

/** One-line description of a thrown value, for logs */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
