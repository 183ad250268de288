/**
 * Websearch agent — comparable external cases from a search-capable model.
 *
 * The model is asked for `{ summary, bullets, sources }` JSON. The text is
 * handed on untouched as `rawPayload`; only the source list is read here.
 */

import type { OpenAIProvider } from "@ai-sdk/openai";
import { z } from "zod";
import type { WebsearchGateway } from "../gateways";
import { complete } from "../llm";
import { stripCodeFence } from "../payload";
import type { WebSource } from "../types";
import { WEBSEARCH_SYSTEM_PROMPT, buildWebsearchPrompt } from "./prompts";

const WebSourceSchema = z.object({
  title: z.string().min(1).catch("Source"),
  url: z.string().optional().catch(undefined),
  date: z.string().optional().catch(undefined),
});

const SourcesSchema = z.object({
  sources: z.array(z.unknown()).catch([]),
});

/** Sources listed in a websearch reply; entries that are not objects are skipped. */
export function extractWebSources(text: string): WebSource[] {
  let decoded: unknown;
  try {
    decoded = JSON.parse(stripCodeFence(text));
  } catch {
    return [];
  }

  const envelope = SourcesSchema.safeParse(decoded);
  if (!envelope.success) return [];

  const sources: WebSource[] = [];
  for (const item of envelope.data.sources) {
    const source = WebSourceSchema.safeParse(item);
    if (!source.success) continue;
    const { title, url, date } = source.data;
    sources.push({
      title,
      ...(url ? { url } : {}),
      ...(date ? { date } : {}),
    });
  }
  return sources;
}

export function createWebsearchGateway(provider: OpenAIProvider, model: string): WebsearchGateway {
  return {
    async call(_sessionId, query) {
      const result = await complete(provider, "websearch", {
        model,
        system: WEBSEARCH_SYSTEM_PROMPT,
        input: buildWebsearchPrompt(query),
        temperature: 0.3,
      });

      return {
        rawPayload: result.content,
        answerText: result.content,
        sources: extractWebSources(result.content),
      };
    },
  };
}
