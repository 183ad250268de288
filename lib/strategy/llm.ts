/**
 * Chat-completion client — Vercel AI SDK pointed at an OpenAI-compatible
 * endpoint (OpenRouter by default).
 *
 * One API key reaches every model the agents use.
 */

import { createOpenAI, type OpenAIProvider } from "@ai-sdk/openai";
import { generateText } from "ai";
import type { GatewayConfig } from "./config";
import { ConfigurationError, GatewayFailure, describeError } from "./errors";
import type { AgentKind } from "./types";

export const DEFAULT_LLM_TIMEOUT_MS = 180_000;

export interface ChatMessage {
  role: "user" | "assistant";
  content: string;
}

export interface CompletionRequest {
  model: string;
  system?: string;
  /** Either a single prompt or a full message list. */
  input: string | ChatMessage[];
  temperature?: number;
  timeoutMs?: number;
}

export interface CompletionResult {
  content: string;
  responseTimeMs: number;
}

/**
 * Create a provider for the configured endpoint. Fails immediately when no
 * API key is present.
 */
export function createChatProvider(
  config: Pick<GatewayConfig, "apiKey" | "baseURL">
): OpenAIProvider {
  if (!config.apiKey.trim()) {
    throw new ConfigurationError("API key for the chat provider is empty");
  }

  return createOpenAI({
    baseURL: config.baseURL,
    apiKey: config.apiKey,
  });
}

/**
 * Run one completion. Errors are rethrown as GatewayFailure tagged with the
 * calling agent's kind.
 *
 * The request carries its own abort deadline (default 180s); this is the
 * provider-side timeout, independent of the orchestrator's tracking.
 */
export async function complete(
  provider: OpenAIProvider,
  agentKind: AgentKind,
  request: CompletionRequest
): Promise<CompletionResult> {
  const start = Date.now();
  const input =
    typeof request.input === "string" ? { prompt: request.input } : { messages: request.input };

  try {
    const result = await generateText({
      model: provider(request.model),
      system: request.system,
      ...input,
      temperature: request.temperature,
      abortSignal: AbortSignal.timeout(request.timeoutMs ?? DEFAULT_LLM_TIMEOUT_MS),
    });

    return {
      content: result.text.trim(),
      responseTimeMs: Date.now() - start,
    };
  } catch (error) {
    console.error(`[llm] Error querying ${request.model} for ${agentKind}:`, error);
    throw new GatewayFailure(agentKind, describeError(error), { cause: error });
  }
}
