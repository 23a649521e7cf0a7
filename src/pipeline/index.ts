export { createPipeline, compose, CLIENT_CLOSED_REQUEST, type PipelineServices } from "./pipeline.js";
export { ErrorHandler } from "./errorHandler.js";
export { errorBoundary, rateLimit, requestLog, validate, type RateLimitStageOptions } from "./middleware.js";
export { createRequestIdGenerator, upstreamRequestId, type RequestIdGenerator } from "./requestId.js";
export {
  json,
  type EndpointDefinition,
  type Handler,
  type Middleware,
  type Next,
  type PipelineRequest,
  type PipelineResponse,
  type RequestContext,
  type RequestPipeline,
} from "./types.js";
