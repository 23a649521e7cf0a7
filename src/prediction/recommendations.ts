// ============================================
// Recommendation service: opaque, slow, fallible text generation
// Every failure surfaces as a PredictionError.
// ============================================

import type OpenAI from "openai";
import { ApiError, predictionError } from "../lib/errors.js";
import { DEFAULT_MODEL, generateCompletion } from "../llm/client.js";
import {
  RECOMMENDATION_SYSTEM_PROMPT,
  buildRecommendationPrompt,
  type Language,
} from "../llm/prompts.js";
import type { TestResult } from "./bayes.js";

export interface RecommendationInput {
  diseaseName?: string;
  prior: number;
  posterior: number;
  testResult: TestResult;
  language: Language;
}

export interface RecommendationService {
  generate(input: RecommendationInput, signal?: AbortSignal): Promise<string>;
}

export interface OpenAIRecommendationOptions {
  client: OpenAI | null;
  model?: string;
  timeoutMs?: number;
}

export class OpenAIRecommendationService implements RecommendationService {
  private readonly client: OpenAI | null;
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(options: OpenAIRecommendationOptions) {
    this.client = options.client;
    this.model = options.model ?? DEFAULT_MODEL;
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  async generate(input: RecommendationInput, signal?: AbortSignal): Promise<string> {
    if (!this.client) {
      throw predictionError("Recommendation service is not configured");
    }

    let text: string;
    try {
      text = await generateCompletion(this.client, RECOMMENDATION_SYSTEM_PROMPT, buildRecommendationPrompt(input), {
        model: this.model,
        timeoutMs: this.timeoutMs,
        signal,
      });
    } catch (cause) {
      if (cause instanceof ApiError) throw cause;
      throw predictionError("Unable to generate recommendations. Please try again later.", cause);
    }

    const trimmed = text.trim();
    if (!trimmed) {
      throw predictionError("Recommendation service returned an empty response");
    }
    return trimmed;
  }
}
