// ============================================
// LLM Prompts: recommendations after a Bayesian test interpretation
// ============================================

import type { TestResult } from "../prediction/bayes.js";

export const SUPPORTED_LANGUAGES = ["english", "hindi", "gujarati", "tamil"] as const;

export type Language = (typeof SUPPORTED_LANGUAGES)[number];

const LANGUAGE_INSTRUCTIONS: Record<Language, string> = {
  english: "Respond in English.",
  hindi: "Respond in Hindi. Use Devanagari script.",
  gujarati: "Respond in Gujarati. Use Gujarati script.",
  tamil: "Respond in Tamil. Use Tamil script.",
};

/** Unknown or missing languages fall back to English */
export function resolveLanguage(value: string | undefined): Language {
  const lower = value?.toLowerCase();
  return SUPPORTED_LANGUAGES.find((language) => language === lower) ?? "english";
}

export const RECOMMENDATION_SYSTEM_PROMPT = `You are a medical informatics assistant helping to interpret diagnostic test results.

Keep your response concise (under 200 words), professional and educational.
Emphasize that this is a probabilistic tool, not a definitive diagnosis.
Recommendations should be general guidance that would apply to most cases.`;

export interface RecommendationPromptInput {
  diseaseName?: string;
  prior: number;
  posterior: number;
  testResult: TestResult;
  language: Language;
}

function percent(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

export function buildRecommendationPrompt(input: RecommendationPromptInput): string {
  const condition = input.diseaseName ? `the disease '${input.diseaseName}'` : "a disease";

  return `IMPORTANT: ${LANGUAGE_INSTRUCTIONS[input.language]}

Context:
- Disease/Condition: ${condition}
- Test Result: ${input.testResult.toUpperCase()}
- Prior Probability (before test): ${percent(input.prior)}
- Posterior Probability (after test): ${percent(input.posterior)}

Based on these Bayesian probability results, provide clear, actionable recommendations for what to do next.
Structure your response in the following format:

**Interpretation:**
(Brief explanation of what these numbers mean in plain language)

**Recommended Next Steps:**
(2-4 specific, practical recommendations such as further testing, consultation with specialists, or monitoring)

**Important Notes:**
(Any critical considerations or disclaimers)`;
}
