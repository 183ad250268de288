/**
 * Tolerant unwrapping of the websearch agent's structured payload.
 *
 * Providers hand back `{ summary, bullets }` in any of these shapes:
 *   - a plain object
 *   - a JSON string, optionally inside a ```json fence
 *   - JSON whose `summary` field itself holds (fenced) JSON
 *   - a JSON string that encodes another JSON string
 *
 * Nothing here throws; text that cannot be decoded is shown as-is.
 */

import { z } from "zod";

export const WebPayloadSchema = z.object({
  summary: z.string().catch(""),
  bullets: z.array(z.unknown()).catch([]),
});

type DecodedPayload = z.infer<typeof WebPayloadSchema>;

export interface WebPayload {
  summary: string;
  bullets: string[];
  format: "structured" | "plain" | "empty";
}

const MAX_DECODE_PASSES = 2;

/** Remove a surrounding code fence (with optional language tag) or stray fence markers. */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const fenced = /^```[\w-]*[^\S\n]*\n?([\s\S]*?)\n?```\s*$/.exec(trimmed);
  if (fenced) return fenced[1].trim();
  if (trimmed.includes("```")) return trimmed.replace(/```[\w-]*/g, "").trim();
  return trimmed;
}

function stripQuotes(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1).trim();
  }
  return trimmed;
}

function tryJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/** Decode up to two layers of JSON text into a `{ summary, bullets }` object. */
function decode(value: unknown): DecodedPayload | null {
  let current = value;
  for (let pass = 0; pass < MAX_DECODE_PASSES && typeof current === "string"; pass++) {
    const parsed = tryJson(stripCodeFence(current));
    if (!parsed.ok) return null;
    current = parsed.value;
  }

  const result = WebPayloadSchema.safeParse(current);
  return result.success ? result.data : null;
}

/** A summary field that holds encoded JSON replaces the outer payload. */
function unwrapNestedSummary(payload: DecodedPayload): DecodedPayload {
  const candidate = stripCodeFence(payload.summary);
  if (!candidate.startsWith("{")) return payload;

  const nested = decode(candidate);
  if (!nested) return payload;

  return {
    summary: nested.summary,
    bullets: nested.bullets.length > 0 ? nested.bullets : payload.bullets,
  };
}

function isBlank(payload: DecodedPayload): boolean {
  return !payload.summary.trim() && payload.bullets.length === 0;
}

function bulletText(bullet: unknown): string {
  const text = typeof bullet === "string" ? bullet : JSON.stringify(bullet) ?? "";
  return stripQuotes(text);
}

/**
 * Normalise a websearch payload.
 *
 * @param raw - The provider's raw payload (object or string)
 * @param fallbackText - The provider's plain answer text, tried as JSON when
 *   `raw` yields nothing
 */
export function unwrapPayload(raw: unknown, fallbackText = ""): WebPayload {
  let payload = decode(raw);
  if (payload) payload = unwrapNestedSummary(payload);

  if ((!payload || isBlank(payload)) && fallbackText.trim()) {
    const fromText = decode(fallbackText);
    if (fromText) {
      payload = {
        summary: fromText.summary || payload?.summary || "",
        bullets: fromText.bullets.length > 0 ? fromText.bullets : payload?.bullets ?? [],
      };
    }
  }

  if (payload) {
    const summary = stripQuotes(stripCodeFence(payload.summary));
    const bullets = payload.bullets.map(bulletText).filter((b) => b.length > 0);
    if (summary || bullets.length > 0) {
      return { summary, bullets, format: "structured" };
    }
    return { summary: "", bullets: [], format: "empty" };
  }

  const plain = typeof raw === "string" ? stripCodeFence(raw) : stripCodeFence(fallbackText);
  return plain
    ? { summary: plain, bullets: [], format: "plain" }
    : { summary: "", bullets: [], format: "empty" };
}
