// ============================================
// Library entry: request protection and observability pipeline
// ============================================

export * from "./lib/errors.js";
export * from "./lib/logger.js";
export { systemClock, type Clock } from "./lib/clock.js";
export * from "./ratelimit/index.js";
export * from "./validation/index.js";
export * from "./pipeline/index.js";
export * from "./api/index.js";
export { computePosterior, riskLevel, isTestResult, InvalidProbabilityError, type RiskLevel, type TestResult } from "./prediction/bayes.js";
export {
  OpenAIRecommendationService,
  type RecommendationInput,
  type RecommendationService,
} from "./prediction/recommendations.js";
export { buildConfig, loadConfig, parseEnv, ConfigError, type AppConfig, type Env } from "./config/env.js";
