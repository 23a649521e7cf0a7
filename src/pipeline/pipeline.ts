// ============================================
// RequestPipeline: fixed composition around one endpoint handler:
// request log → rate limit → validation → handler (under the error boundary)
// Cheapest checks first, so abusive or malformed traffic costs little.
// ============================================

import { systemClock, type Clock } from "../lib/clock.js";
import { createRequestLogger, type StructuredLogger } from "../lib/logger.js";
import { deriveClientKey } from "../ratelimit/clientKey.js";
import type { RateLimiter } from "../ratelimit/limiter.js";
import type { InputValidator } from "../validation/validator.js";
import { ErrorHandler } from "./errorHandler.js";
import { errorBoundary, rateLimit, requestLog, validate } from "./middleware.js";
import { createRequestIdGenerator, type RequestIdGenerator } from "./requestId.js";
import type {
  EndpointDefinition,
  Handler,
  Middleware,
  PipelineRequest,
  PipelineResponse,
  RequestContext,
  RequestPipeline,
} from "./types.js";

export interface PipelineServices {
  limiter: RateLimiter;
  validator: InputValidator;
  logger: StructuredLogger;
  errorHandler?: ErrorHandler;
  requestIds?: RequestIdGenerator;
  clock?: Clock;
  /** Key clients by address and user agent instead of address alone */
  keyByUserAgent?: boolean;
  abuseThreshold?: number;
}

/** Status recorded when the caller aborted before a response was produced */
export const CLIENT_CLOSED_REQUEST = 499;

/** Chain middleware so each one's `next` runs the rest, ending in the handler */
export function compose(middleware: readonly Middleware[], handler: Handler): (ctx: RequestContext) => Promise<PipelineResponse> {
  return (ctx) => {
    let lastIndex = -1;

    const dispatch = async (index: number): Promise<PipelineResponse> => {
      if (index <= lastIndex) {
        throw new Error("next() called more than once");
      }
      lastIndex = index;

      if (index > 0 && ctx.request.signal?.aborted) {
        return { status: CLIENT_CLOSED_REQUEST, headers: {}, body: null };
      }

      const stage = middleware[index];
      if (!stage) {
        return handler(ctx);
      }
      return stage(ctx, () => dispatch(index + 1));
    };

    return dispatch(0);
  };
}

export function createPipeline(endpoint: EndpointDefinition, services: PipelineServices): RequestPipeline {
  const clock = services.clock ?? systemClock;
  const errorHandler = services.errorHandler ?? new ErrorHandler();
  const requestIds = services.requestIds ?? createRequestIdGenerator();

  const stages: Middleware[] = [
    requestLog(clock, errorHandler),
    rateLimit(services.limiter, { abuseThreshold: services.abuseThreshold }),
    validate(services.validator, endpoint.schema, errorHandler),
    errorBoundary(errorHandler),
  ];
  const run = compose(stages, endpoint.handler);

  return (request: PipelineRequest) => {
    const requestId = requestIds(request.remoteAddr);
    const ctx: RequestContext = {
      request,
      requestId,
      clientKey: deriveClientKey(request.remoteAddr, request.userAgent, {
        byUserAgent: services.keyByUserAgent,
      }),
      endpointClass: endpoint.endpointClass,
      log: createRequestLogger(services.logger, requestId, "pipeline"),
      payload: {},
    };
    return run(ctx);
  };
}
