import "dotenv/config";
import { createApp } from "./api/app.js";
import { loadConfig } from "./config/env.js";
import { StructuredLogger } from "./lib/logger.js";
import { createOpenAIClient } from "./llm/client.js";
import { OpenAIRecommendationService } from "./prediction/recommendations.js";
import { RateLimiter } from "./ratelimit/limiter.js";
import { InputValidator } from "./validation/validator.js";

// ============================================
// Startup
// ============================================

const config = loadConfig();

const logger = StructuredLogger.toFiles(config.logging.files, {
  level: config.logging.level,
  console: config.logging.console,
});

const limiter = new RateLimiter({
  policies: config.rateLimit.policies,
  idleEvictMs: config.rateLimit.idleEvictMs,
});

const stopHousekeeping = limiter.startHousekeeping(config.rateLimit.sweepIntervalMs, (removed, remaining) => {
  if (removed > 0) {
    logger.debug("Evicted idle rate limit buckets", { stage: "housekeeping", removed, remaining });
  }
});

const app = createApp({
  limiter,
  logger,
  validator: new InputValidator(config.validation),
  recommendations: new OpenAIRecommendationService({
    client: createOpenAIClient(config.recommendations.apiKey),
    model: config.recommendations.model,
    timeoutMs: config.recommendations.timeoutMs,
  }),
  keyByUserAgent: config.rateLimit.keyByUserAgent,
  abuseThreshold: config.rateLimit.abuseThreshold,
  allowedOrigins: config.allowedOrigins,
});

logger.info("Starting server", {
  stage: "startup",
  port: config.port,
  logLevel: config.logging.level,
  recommendationsConfigured: config.recommendations.isConfigured,
  predictionPerMinute: config.rateLimit.policies.prediction.capacity,
});

const server = app.listen(config.port, () => {
  logger.info("Server listening", { stage: "startup", port: config.port });
});

// ============================================
// Shutdown
// ============================================

let shuttingDown = false;

function shutdown(signal: NodeJS.Signals): void {
  if (shuttingDown) return;
  shuttingDown = true;

  logger.info("Shutting down", { stage: "shutdown", signal });
  stopHousekeeping();

  server.close((err) => {
    if (err) {
      logger.error("Server close failed", { stage: "shutdown", error: err });
    }
    logger
      .close()
      .then(() => process.exit(err ? 1 : 0))
      .catch((closeError: unknown) => {
        process.stderr.write(`failed to flush logs: ${String(closeError)}\n`);
        process.exit(1);
      });
  });
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
