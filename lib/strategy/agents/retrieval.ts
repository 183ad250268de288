/**
 * Retrieval agent — document search through a host-supplied index, answer
 * generation through the chat provider.
 */

import type { OpenAIProvider } from "@ai-sdk/openai";
import type { RetrievalGateway } from "../gateways";
import { complete } from "../llm";
import { stripMarkup } from "../response-parser";
import type { RetrievedDocument } from "../types";
import { RETRIEVAL_SYSTEM_PROMPT, buildRetrievalPrompt } from "./prompts";

/** Search backend (BM25, vector store, ...). Relevance ranking is its concern. */
export interface DocumentIndex {
  search(
    query: string,
    options: { primaryHint: string; limit: number }
  ): Promise<RetrievedDocument[]>;
}

export interface RetrievalAgentOptions {
  model: string;
  /** Documents requested from the index. */
  limit?: number;
  /** Documents passed to the model as context. */
  contextSize?: number;
}

export function createRetrievalGateway(
  index: DocumentIndex,
  provider: OpenAIProvider,
  options: RetrievalAgentOptions
): RetrievalGateway {
  const limit = options.limit ?? 20;
  const contextSize = options.contextSize ?? 8;

  return {
    search(query, primaryHint) {
      return index.search(query, { primaryHint, limit });
    },

    async generate(originalQuery, documents) {
      const result = await complete(provider, "retrieval", {
        model: options.model,
        system: RETRIEVAL_SYSTEM_PROMPT,
        input: buildRetrievalPrompt(originalQuery, documents.slice(0, contextSize)),
        temperature: 0.2,
      });
      return stripMarkup(result.content);
    },
  };
}
