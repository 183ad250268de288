/**
 * LLM-backed gateways for all four agents, built from environment settings.
 */

import type { AgentGateways } from "../gateways";
import { loadGatewayConfig, type GatewayConfig } from "../config";
import { createChatProvider } from "../llm";
import { createFinalStrategyGateway } from "./final-strategy";
import { createForecastGateway } from "./forecast";
import { createRetrievalGateway, type DocumentIndex } from "./retrieval";
import { createWebsearchGateway } from "./websearch";

export { createFinalStrategyGateway } from "./final-strategy";
export {
  createForecastGateway,
  type ForecastAgentOptions,
  type ForecastGatewayWithHistory,
} from "./forecast";
export { createRetrievalGateway, type DocumentIndex } from "./retrieval";
export { createWebsearchGateway, extractWebSources } from "./websearch";

/**
 * Build every gateway. Throws ConfigurationError straight away when the API
 * key is missing; nothing is retried.
 */
export function createAgentGateways(
  index: DocumentIndex,
  config: GatewayConfig = loadGatewayConfig()
): AgentGateways {
  const provider = createChatProvider(config);

  return {
    retrieval: createRetrievalGateway(index, provider, { model: config.models.retrieval }),
    websearch: createWebsearchGateway(provider, config.models.websearch),
    forecast: createForecastGateway(provider, config.models.forecast),
    finalStrategy: createFinalStrategyGateway(provider, config.models.finalStrategy),
  };
}
