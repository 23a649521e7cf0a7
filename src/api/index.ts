// ============================================
// API Module: HTTP surface of the request pipeline
// ============================================

export { createApp, mountPipeline, BODY_LIMIT, BODY_TYPES, type AppOptions } from "./app.js";
export { corsMiddleware } from "./middleware.js";
export {
  createEndpoints,
  API_VERSION,
  type HandlerDependencies,
  type HealthResponse,
  type LimitsResponse,
  type PosteriorResponse,
  type RecommendationResponse,
  type ReportResponse,
} from "./handler.js";
