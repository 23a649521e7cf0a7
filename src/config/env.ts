import { z } from "zod";
import { isLogLevel, type LogLevel } from "../lib/logger.js";
import { perMinute, type RatePolicies } from "../ratelimit/types.js";

// ============================================
// Environment configuration with validation
// Read once at process start; fails fast if invalid
// ============================================

const flag = (fallback: "true" | "false") =>
  z
    .string()
    .default(fallback)
    .transform((v) => v === "true" || v === "1");

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const nonNegativeInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().nonnegative());

const envSchema = z.object({
  // Server
  PORT: positiveInt("3000"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  API_ALLOWED_ORIGINS: z.string().default(""), // Comma-separated origins, or "*" for all

  // Rate limits, requests per minute per client and endpoint class
  RATE_LIMIT_DEFAULT_PER_MIN: positiveInt("100"),
  RATE_LIMIT_PREDICTION_PER_MIN: positiveInt("30"),
  RATE_LIMIT_ML_ANALYSIS_PER_MIN: positiveInt("20"),
  RATE_LIMIT_REPORT_PER_MIN: positiveInt("10"),
  RATE_LIMIT_IDLE_EVICT_MS: positiveInt("600000"),
  RATE_LIMIT_SWEEP_INTERVAL_MS: positiveInt("60000"),
  RATE_LIMIT_KEY_BY_USER_AGENT: flag("false"),
  RATE_LIMIT_ABUSE_THRESHOLD: nonNegativeInt("10"),

  // Validation
  VALIDATION_XSS_ENABLED: flag("true"),
  VALIDATION_SQL_ENABLED: flag("true"),
  VALIDATION_MAX_STRING_LENGTH: positiveInt("1000"),

  // Logging
  LOG_DIR: z.string().min(1).default("logs"),
  LOG_FILE_GENERAL: z.string().min(1).default("app.log"),
  LOG_FILE_ERROR: z.string().min(1).default("error.log"),
  LOG_FILE_API: z.string().min(1).default("api.log"),
  LOG_LEVEL: z
    .string()
    .optional()
    .refine((v) => v === undefined || isLogLevel(v), "LOG_LEVEL must be debug, info, warn, error or critical"),
  LOG_CONSOLE: flag("true"),

  // OpenAI (optional - recommendations answer with a PredictionError without it)
  OPENAI_API_KEY: z.string().optional(),
  RECOMMENDATION_MODEL: z.string().min(1).default("gpt-4o-mini"),
  RECOMMENDATION_TIMEOUT_MS: positiveInt("15000"),
});

export type Env = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid environment configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/** Parse an environment mapping. Throws ConfigError listing every issue. */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }

  return result.data;
}

/**
 * Parse allowed origins from environment variable.
 */
function parseAllowedOrigins(originsStr: string): string[] {
  if (!originsStr) return [];
  return originsStr
    .split(",")
    .map((o) => o.trim())
    .filter(Boolean);
}

function resolveLogLevel(env: Env): LogLevel {
  if (env.LOG_LEVEL && isLogLevel(env.LOG_LEVEL)) return env.LOG_LEVEL;
  return env.NODE_ENV === "development" ? "debug" : "info";
}

export function buildConfig(env: Env) {
  const rateLimits: RatePolicies = Object.freeze({
    default: Object.freeze(perMinute(env.RATE_LIMIT_DEFAULT_PER_MIN)),
    prediction: Object.freeze(perMinute(env.RATE_LIMIT_PREDICTION_PER_MIN)),
    "ml-analysis": Object.freeze(perMinute(env.RATE_LIMIT_ML_ANALYSIS_PER_MIN)),
    report: Object.freeze(perMinute(env.RATE_LIMIT_REPORT_PER_MIN)),
  });

  return Object.freeze({
    port: env.PORT,
    isDev: env.NODE_ENV === "development",
    isProd: env.NODE_ENV === "production",
    allowedOrigins: parseAllowedOrigins(env.API_ALLOWED_ORIGINS),

    rateLimit: {
      policies: rateLimits,
      idleEvictMs: env.RATE_LIMIT_IDLE_EVICT_MS,
      sweepIntervalMs: env.RATE_LIMIT_SWEEP_INTERVAL_MS,
      keyByUserAgent: env.RATE_LIMIT_KEY_BY_USER_AGENT,
      abuseThreshold: env.RATE_LIMIT_ABUSE_THRESHOLD,
    },

    validation: {
      xss: env.VALIDATION_XSS_ENABLED,
      sql: env.VALIDATION_SQL_ENABLED,
      maxStringLength: env.VALIDATION_MAX_STRING_LENGTH,
    },

    logging: {
      level: resolveLogLevel(env),
      console: env.LOG_CONSOLE,
      files: {
        directory: env.LOG_DIR,
        general: env.LOG_FILE_GENERAL,
        error: env.LOG_FILE_ERROR,
        api: env.LOG_FILE_API,
      },
    },

    recommendations: {
      apiKey: env.OPENAI_API_KEY,
      model: env.RECOMMENDATION_MODEL,
      timeoutMs: env.RECOMMENDATION_TIMEOUT_MS,
      isConfigured: Boolean(env.OPENAI_API_KEY),
    },
  } as const);
}

export type AppConfig = ReturnType<typeof buildConfig>;

/** Validate process.env; prints every issue and exits on failure */
export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  try {
    return buildConfig(parseEnv(source));
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error("❌ Invalid environment configuration:");
    for (const issue of err.issues) {
      console.error(`   ${issue}`);
    }
    process.exit(1);
  }
}
