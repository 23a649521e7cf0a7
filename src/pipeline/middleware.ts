// ============================================
// Pipeline stages: each exposes (ctx, next) => response
// ============================================

import type { Clock } from "../lib/clock.js";
import { rateLimitError, toEnvelope } from "../lib/errors.js";
import type { RateLimiter } from "../ratelimit/limiter.js";
import type { InputValidator, ValidationSchema } from "../validation/validator.js";
import type { ErrorHandler } from "./errorHandler.js";
import { upstreamRequestId } from "./requestId.js";
import type { Middleware, PipelineResponse } from "./types.js";

// ============================================
// Request lifecycle logging (outermost)
// ============================================

/**
 * Records one api-category event per request, whatever branch was taken.
 * Anything that escapes the inner stages is converted here.
 */
export function requestLog(clock: Clock, errorHandler: ErrorHandler): Middleware {
  return async (ctx, next) => {
    const startedAt = clock.now();
    const { method, path, remoteAddr, userAgent } = ctx.request;

    ctx.log.debug(`Request started: ${method} ${path}`, { stage: "api" });

    let response: PipelineResponse;
    try {
      response = await next();
    } catch (error) {
      response = errorHandler.handle(error, ctx);
    }

    response.headers["X-Request-Id"] = ctx.requestId;

    ctx.log.logApiRequest(
      {
        method,
        endpoint: path,
        statusCode: response.status,
        durationMs: clock.now() - startedAt,
      },
      {
        endpointClass: ctx.endpointClass,
        remoteAddr,
        userAgent: userAgent ? userAgent.slice(0, 200) : undefined,
        upstreamRequestId: upstreamRequestId(ctx.request.headers["x-request-id"]),
        aborted: ctx.request.signal?.aborted || undefined,
      }
    );

    return response;
  };
}

// ============================================
// Rate limiting
// ============================================

export interface RateLimitStageOptions {
  /** Consecutive denials on one bucket that trigger a security event; 0 disables */
  abuseThreshold?: number;
}

export function rateLimit(limiter: RateLimiter, options: RateLimitStageOptions = {}): Middleware {
  const abuseThreshold = options.abuseThreshold ?? 0;

  return async (ctx, next) => {
    const decision = limiter.admit(ctx.clientKey, ctx.endpointClass);
    const headers: Record<string, string> = {
      "X-RateLimit-Limit": String(decision.limit),
      "X-RateLimit-Remaining": String(decision.remaining),
    };

    if (!decision.allowed) {
      const retryAfter = decision.retryAfterSeconds ?? 1;
      const log = ctx.log.withStage("ratelimit");

      log.warn("Rate limit exceeded", {
        endpointClass: ctx.endpointClass,
        clientKey: ctx.clientKey,
        limit: decision.limit,
        retryAfter,
      });

      if (abuseThreshold > 0 && decision.consecutiveDenials === abuseThreshold) {
        log.logSecurityEvent(
          "rate-limit-abuse",
          `${decision.consecutiveDenials} consecutive rate limit denials`,
          { endpointClass: ctx.endpointClass, remoteAddr: ctx.request.remoteAddr }
        );
      }

      return {
        status: 429,
        headers: { ...headers, "Retry-After": String(retryAfter) },
        body: toEnvelope(rateLimitError(retryAfter).record),
      };
    }

    const response = await next();
    response.headers = { ...headers, ...response.headers };
    return response;
  };
}

// ============================================
// Validation
// ============================================

export function validate(
  validator: InputValidator,
  schema: ValidationSchema | undefined,
  errorHandler: ErrorHandler
): Middleware {
  return async (ctx, next) => {
    if (!schema) {
      return next();
    }

    const result = validator.validate(ctx.request.body, schema, ctx.log.withStage("validation"));
    if (!result.ok) {
      return errorHandler.respond(result.error, ctx);
    }

    ctx.payload = result.value;
    return next();
  };
}

// ============================================
// Handler boundary
// ============================================

export function errorBoundary(errorHandler: ErrorHandler): Middleware {
  return (ctx, next) => errorHandler.wrap(next, ctx);
}
