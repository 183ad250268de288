/**
 * Call contracts for the four agents.
 *
 * Every method may be slow and may throw; callers isolate failures per
 * agent kind. LLM-backed implementations live in ./agents.
 */

import type { RetrievedDocument, WebSource } from "./types";

export interface RetrievalGateway {
  /** Ordered documents for the query, possibly empty. */
  search(query: string, primaryHint: string): Promise<RetrievedDocument[]>;
  /** Answer text grounded in the given documents. */
  generate(originalQuery: string, documents: RetrievedDocument[]): Promise<string>;
}

export interface WebsearchReply {
  rawPayload: unknown;
  answerText: string;
  sources: WebSource[];
}

export interface WebsearchGateway {
  call(sessionId: string, query: string): Promise<WebsearchReply>;
}

export interface ForecastGateway {
  call(sessionId: string, query: string): Promise<{ answerText: string }>;
}

export interface FinalStrategyGateway {
  call(
    retrievalSummary: string,
    webSummary: string,
    webBullets: string[],
    forecastText: string
  ): Promise<string>;
}

export interface AgentGateways {
  retrieval: RetrievalGateway;
  websearch: WebsearchGateway;
  forecast: ForecastGateway;
  finalStrategy: FinalStrategyGateway;
}
