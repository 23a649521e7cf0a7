// ============================================
// LLM Client: OpenAI API wrapper
// ============================================

import OpenAI from "openai";

/**
 * Model configuration.
 * Pin versions for reproducibility.
 */
export const DEFAULT_MODEL = "gpt-4o-mini";

export function createOpenAIClient(apiKey: string | undefined): OpenAI | null {
  if (!apiKey) return null;
  return new OpenAI({ apiKey, maxRetries: 0 });
}

/**
 * Generate a plain-text completion.
 * Failures propagate to the caller unchanged.
 */
export async function generateCompletion(
  client: OpenAI,
  systemPrompt: string,
  userMessage: string,
  options: {
    model?: string;
    temperature?: number;
    maxTokens?: number;
    timeoutMs?: number;
    signal?: AbortSignal;
  } = {}
): Promise<string> {
  const { model = DEFAULT_MODEL, temperature = 0.3, maxTokens = 600, timeoutMs, signal } = options;

  const response = await client.chat.completions.create(
    {
      model,
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: userMessage },
      ],
      temperature,
      max_tokens: maxTokens,
    },
    { timeout: timeoutMs, signal }
  );

  return response.choices[0]?.message?.content ?? "";
}
