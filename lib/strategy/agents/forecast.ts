/**
 * Forecast agent — development options for the next 1-3 years.
 *
 * Keeps a conversation per correlation id so repeated analyses in one
 * session build on the earlier exchange. Only the latest call for a session
 * may extend its history: a superseded call that finishes late is dropped.
 * The least recently used conversations are evicted past `maxSessions`.
 */

import type { OpenAIProvider } from "@ai-sdk/openai";
import type { ForecastGateway } from "../gateways";
import { complete, type ChatMessage } from "../llm";
import { stripMarkup } from "../response-parser";
import { FORECAST_SYSTEM_PROMPT } from "./prompts";

/** Earlier turns kept per session (user + assistant pairs). */
const MAX_HISTORY_TURNS = 3;

export const DEFAULT_MAX_SESSIONS = 1000;

export interface ForecastAgentOptions {
  /** Conversations kept before the least recently used is evicted. */
  maxSessions?: number;
}

export interface ForecastGatewayWithHistory extends ForecastGateway {
  history(sessionId: string): readonly ChatMessage[];
  forget(sessionId: string): void;
}

interface Conversation {
  messages: ChatMessage[];
  latestCall: number;
}

function buildMessagesWithHistory(history: ChatMessage[], currentPrompt: string): ChatMessage[] {
  return [...history, { role: "user", content: currentPrompt }];
}

export function createForecastGateway(
  provider: OpenAIProvider,
  model: string,
  options: ForecastAgentOptions = {}
): ForecastGatewayWithHistory {
  const maxSessions = Math.max(1, options.maxSessions ?? DEFAULT_MAX_SESSIONS);
  const conversations = new Map<string, Conversation>();
  let callCounter = 0;

  // Re-insert so Map order tracks recency, then evict from the front.
  function touch(sessionId: string): Conversation {
    const conversation = conversations.get(sessionId) ?? { messages: [], latestCall: 0 };
    conversations.delete(sessionId);
    conversations.set(sessionId, conversation);

    for (const oldest of conversations.keys()) {
      if (conversations.size <= maxSessions) break;
      conversations.delete(oldest);
    }
    return conversation;
  }

  return {
    async call(sessionId, query) {
      const conversation = touch(sessionId);
      const callId = ++callCounter;
      conversation.latestCall = callId;

      const result = await complete(provider, "forecast", {
        model,
        system: FORECAST_SYSTEM_PROMPT,
        input: buildMessagesWithHistory(conversation.messages, query),
        temperature: 0.7,
      });

      const current = conversations.get(sessionId);
      if (current && current.latestCall === callId) {
        current.messages = [
          ...current.messages,
          { role: "user" as const, content: query },
          { role: "assistant" as const, content: result.content },
        ].slice(-MAX_HISTORY_TURNS * 2);
      } else {
        console.info(`[forecast] ${sessionId}: superseded call finished; history unchanged`);
      }

      return { answerText: stripMarkup(result.content) };
    },

    history(sessionId) {
      return conversations.get(sessionId)?.messages ?? [];
    },

    forget(sessionId) {
      conversations.delete(sessionId);
    },
  };
}
