// ============================================
// Request shapes per endpoint
// Field presence is checked by the validator; zod checks types.
// ============================================

import { z } from "zod";
import type { ValidationSchema } from "../validation/validator.js";

const probability = (name: string) =>
  z.coerce.number({ invalid_type_error: `${name} must be a number` });

const testResult = z
  .string()
  .transform((v) => v.toLowerCase())
  .pipe(z.enum(["positive", "negative"], { message: 'testResult must be either "positive" or "negative"' }))
  .optional();

const text = (max: number) => z.string().max(max);

export const MAX_SYMPTOMS = 50;
export const MAX_SYMPTOM_LENGTH = 100;

/** Letters, digits, whitespace, underscores and hyphens */
const DISEASE_NAME_PATTERN = /^[a-zA-Z0-9\s_-]+$/;

const diseaseName = z
  .string({ invalid_type_error: "Disease name must be a string" })
  .max(100, "Disease name too long")
  .regex(DISEASE_NAME_PATTERN, "Invalid disease name format");

const symptoms = z
  .array(
    z
      .string({ invalid_type_error: "Each symptom must be a string" })
      .max(MAX_SYMPTOM_LENGTH, `Symptom too long (maximum ${MAX_SYMPTOM_LENGTH} characters)`),
    { invalid_type_error: "Symptoms must be a list" }
  )
  .min(1, "At least one symptom is required")
  .max(MAX_SYMPTOMS, `Too many symptoms (maximum ${MAX_SYMPTOMS})`);

// ============================================
// /api/v1/posterior
// ============================================

export const posteriorFields: ValidationSchema = {
  required: ["prior", "sensitivity", "falsePositive"],
  optional: ["testResult", "disease", "symptoms"],
  rejectUnknown: true,
};

export const posteriorRequestSchema = z.object({
  prior: probability("prior"),
  sensitivity: probability("sensitivity"),
  falsePositive: probability("falsePositive"),
  testResult,
  disease: diseaseName.optional(),
  symptoms: symptoms.optional(),
});

export type PosteriorRequest = z.infer<typeof posteriorRequestSchema>;

// ============================================
// /api/v1/recommendations
// ============================================

export const recommendationFields: ValidationSchema = {
  required: ["priorProbability", "posteriorProbability"],
  optional: ["diseaseName", "testResult", "language"],
  rejectUnknown: true,
};

export const recommendationRequestSchema = z.object({
  priorProbability: probability("priorProbability"),
  posteriorProbability: probability("posteriorProbability"),
  diseaseName: diseaseName.optional(),
  testResult,
  language: text(20).optional(),
});

export type RecommendationRequest = z.infer<typeof recommendationRequestSchema>;

// ============================================
// /api/v1/report
// ============================================

export const reportFields: ValidationSchema = {
  required: ["disease", "prior", "sensitivity", "falsePositive"],
  optional: ["testResult", "language", "includeRecommendation", "symptoms"],
  rejectUnknown: true,
};

export const reportRequestSchema = z.object({
  disease: diseaseName,
  symptoms: symptoms.optional(),
  prior: probability("prior"),
  sensitivity: probability("sensitivity"),
  falsePositive: probability("falsePositive"),
  testResult,
  language: text(20).optional(),
  includeRecommendation: z.boolean().optional(),
});

export type ReportRequest = z.infer<typeof reportRequestSchema>;
