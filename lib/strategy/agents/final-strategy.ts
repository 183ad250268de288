/**
 * Final strategy agent — three scored strategies plus a hidden SWOT block.
 */

import type { OpenAIProvider } from "@ai-sdk/openai";
import type { FinalStrategyGateway } from "../gateways";
import { complete } from "../llm";
import { FINAL_STRATEGY_SYSTEM_PROMPT, buildFinalStrategyPrompt } from "./prompts";

export function createFinalStrategyGateway(
  provider: OpenAIProvider,
  model: string
): FinalStrategyGateway {
  return {
    async call(retrievalSummary, webSummary, webBullets, forecastText) {
      const result = await complete(provider, "finalStrategy", {
        model,
        system: FINAL_STRATEGY_SYSTEM_PROMPT,
        input: buildFinalStrategyPrompt({
          retrievalSummary,
          webSummary,
          webBullets,
          forecastText,
        }),
        temperature: 0.4,
      });
      return result.content;
    },
  };
}
