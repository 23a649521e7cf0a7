// ============================================
// API Handlers: endpoint definitions for the pipeline
// ============================================

import { systemClock, type Clock } from "../lib/clock.js";
import { validationError } from "../lib/errors.js";
import { resolveLanguage } from "../llm/prompts.js";
import { InvalidProbabilityError, computePosterior, riskLevel, type RiskLevel, type TestResult } from "../prediction/bayes.js";
import type { RecommendationService } from "../prediction/recommendations.js";
import type { RateLimiter } from "../ratelimit/limiter.js";
import type { LimiterStats } from "../ratelimit/types.js";
import { json, type EndpointDefinition } from "../pipeline/types.js";
import {
  posteriorFields,
  posteriorRequestSchema,
  recommendationFields,
  recommendationRequestSchema,
  reportFields,
  reportRequestSchema,
} from "./schemas.js";

export const API_VERSION = "v1.0.0";

// ============================================
// Types
// ============================================

export interface PosteriorResponse {
  posterior: number;
  testResult: TestResult;
  prior: number;
  sensitivity: number;
  falsePositive: number;
  disease?: string;
  symptomsCount?: number;
}

export interface RecommendationResponse {
  success: true;
  recommendations: string;
  priorProbability: number;
  posteriorProbability: number;
  language: string;
}

export interface ReportResponse {
  disease: string;
  testResult: TestResult;
  prior: number;
  sensitivity: number;
  specificity: number;
  posterior: number;
  riskLevel: RiskLevel;
  recommendation?: string;
  generatedAt: string;
}

export interface HealthResponse {
  status: "ok";
  version: string;
  timestamp: string;
}

export type LimitsResponse = LimiterStats;

export interface HandlerDependencies {
  limiter: RateLimiter;
  recommendations: RecommendationService;
  clock?: Clock;
}

function round4(value: number): number {
  return Math.round(value * 10000) / 10000;
}

function assertProbabilityField(name: string, value: number): void {
  if (value < 0 || value > 1) {
    throw validationError(`${name} must be between 0 and 1`, name);
  }
}

/** Posterior for request inputs; inputs it cannot use are the caller's fault */
function posteriorFor(prior: number, sensitivity: number, falsePositive: number, testResult: TestResult): number {
  try {
    return computePosterior(prior, sensitivity, falsePositive, testResult);
  } catch (error) {
    if (error instanceof InvalidProbabilityError) {
      throw validationError(error.message, undefined, error);
    }
    throw error;
  }
}

// ============================================
// Endpoints
// ============================================

export function createEndpoints(deps: HandlerDependencies): EndpointDefinition[] {
  const clock = deps.clock ?? systemClock;

  return [
    {
      method: "GET",
      path: "/api/v1/health",
      endpointClass: "default",
      handler: () => {
        const response: HealthResponse = {
          status: "ok",
          version: API_VERSION,
          timestamp: new Date().toISOString(),
        };
        return json(response);
      },
    },

    {
      method: "GET",
      path: "/api/v1/limits",
      endpointClass: "default",
      handler: () => {
        const response: LimitsResponse = deps.limiter.stats();
        return json(response);
      },
    },

    {
      method: "POST",
      path: "/api/v1/posterior",
      endpointClass: "prediction",
      schema: posteriorFields,
      handler: (ctx) => {
        const started = clock.now();
        const body = posteriorRequestSchema.parse(ctx.payload);
        const testResult = body.testResult ?? "positive";
        const posterior = posteriorFor(body.prior, body.sensitivity, body.falsePositive, testResult);

        ctx.log.logPrediction({
          disease: body.disease,
          symptomsCount: body.symptoms?.length,
          probability: posterior,
          durationMs: clock.now() - started,
        });

        const response: PosteriorResponse = {
          posterior: round4(posterior),
          testResult,
          prior: body.prior,
          sensitivity: body.sensitivity,
          falsePositive: body.falsePositive,
          ...(body.disease !== undefined && { disease: body.disease }),
          ...(body.symptoms !== undefined && { symptomsCount: body.symptoms.length }),
        };
        return json(response);
      },
    },

    {
      method: "POST",
      path: "/api/v1/recommendations",
      endpointClass: "ml-analysis",
      schema: recommendationFields,
      handler: async (ctx) => {
        const body = recommendationRequestSchema.parse(ctx.payload);
        assertProbabilityField("priorProbability", body.priorProbability);
        assertProbabilityField("posteriorProbability", body.posteriorProbability);
        const language = resolveLanguage(body.language);

        const started = clock.now();
        const text = await deps.recommendations.generate(
          {
            diseaseName: body.diseaseName,
            prior: body.priorProbability,
            posterior: body.posteriorProbability,
            testResult: body.testResult ?? "positive",
            language,
          },
          ctx.request.signal
        );

        ctx.log.withStage("recommendation").info("Recommendations generated", {
          language,
          latencyMs: Math.round(clock.now() - started),
          length: text.length,
        });

        const response: RecommendationResponse = {
          success: true,
          recommendations: text,
          priorProbability: body.priorProbability,
          posteriorProbability: body.posteriorProbability,
          language,
        };
        return json(response);
      },
    },

    {
      method: "POST",
      path: "/api/v1/report",
      endpointClass: "report",
      schema: reportFields,
      handler: async (ctx) => {
        const started = clock.now();
        const body = reportRequestSchema.parse(ctx.payload);
        const testResult = body.testResult ?? "positive";
        const posterior = posteriorFor(body.prior, body.sensitivity, body.falsePositive, testResult);

        ctx.log.logPrediction({
          disease: body.disease,
          symptomsCount: body.symptoms?.length,
          probability: posterior,
          durationMs: clock.now() - started,
        });

        const response: ReportResponse = {
          disease: body.disease,
          testResult,
          prior: body.prior,
          sensitivity: body.sensitivity,
          specificity: round4(1 - body.falsePositive),
          posterior: round4(posterior),
          riskLevel: riskLevel(posterior),
          generatedAt: new Date().toISOString(),
        };

        if (body.includeRecommendation) {
          response.recommendation = await deps.recommendations.generate(
            {
              diseaseName: body.disease,
              prior: body.prior,
              posterior,
              testResult,
              language: resolveLanguage(body.language),
            },
            ctx.request.signal
          );
        }

        return json(response);
      },
    },
  ];
}
