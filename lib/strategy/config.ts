/**
 * Gateway configuration from environment variables.
 *
 * Every LLM-backed agent talks to one OpenAI-compatible endpoint
 * (OpenRouter by default) with its own model id.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors";

export const DEFAULT_BASE_URL = "https://openrouter.ai/api/v1";

const MISSING_KEY = "OPENROUTER_API_KEY environment variable is not set";

const EnvSchema = z.object({
  OPENROUTER_API_KEY: z
    .string({ required_error: MISSING_KEY })
    .trim()
    .min(1, MISSING_KEY),
  OPENROUTER_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  RETRIEVAL_MODEL: z.string().min(1).default("openai/gpt-4o-mini"),
  WEBSEARCH_MODEL: z.string().min(1).default("perplexity/sonar-pro"),
  FORECAST_MODEL: z.string().min(1).default("google/gemini-2.5-pro"),
  FINAL_STRATEGY_MODEL: z.string().min(1).default("openai/gpt-4o"),
});

export interface GatewayConfig {
  apiKey: string;
  baseURL: string;
  models: {
    retrieval: string;
    websearch: string;
    forecast: string;
    finalStrategy: string;
  };
}

/**
 * Validate and load gateway settings. Throws ConfigurationError when the
 * API key is missing or a value is malformed.
 */
export function loadGatewayConfig(
  env: Record<string, string | undefined> = process.env
): GatewayConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new ConfigurationError(details);
  }

  const vars = parsed.data;
  return {
    apiKey: vars.OPENROUTER_API_KEY,
    baseURL: vars.OPENROUTER_BASE_URL,
    models: {
      retrieval: vars.RETRIEVAL_MODEL,
      websearch: vars.WEBSEARCH_MODEL,
      forecast: vars.FORECAST_MODEL,
      finalStrategy: vars.FINAL_STRATEGY_MODEL,
    },
  };
}
