/**
 * Prompt templates for the four agents.
 */

import type { FinalStrategyInputs, RetrievedDocument } from "../types";
import { SWOT_END_MARKER, SWOT_START_MARKER } from "../response-parser";

// ---------------------------------------------------------------------------
// Retrieval
// ---------------------------------------------------------------------------

export const RETRIEVAL_SYSTEM_PROMPT = `You are an internal analyst. Answer strictly from the documents provided.
Cite the source file in parentheses after each fact you use. If the documents do not
answer the question, say so plainly. Do not invent figures, names or dates.`;

export function buildRetrievalPrompt(query: string, documents: RetrievedDocument[]): string {
  const context = documents
    .map((doc, i) => {
      const header = doc.date ? `[${i + 1}] ${doc.file} (${doc.date})` : `[${i + 1}] ${doc.file}`;
      return `${header}\n${doc.text}`;
    })
    .join("\n\n");

  return `Documents:

${context}

Question: ${query}`;
}

// ---------------------------------------------------------------------------
// Websearch
// ---------------------------------------------------------------------------

export const WEBSEARCH_SYSTEM_PROMPT = `You research how comparable organisations handled similar situations.
Search the web and reply with ONLY a JSON object of this shape:

{"summary": "<3-6 sentence overview>",
 "bullets": ["<key fact>", "..."],
 "sources": [{"title": "<page title>", "url": "<url>", "date": "<publication date, optional>"}]}

No text outside the JSON object.`;

export function buildWebsearchPrompt(query: string): string {
  return `Find comparable cases and key facts for this request:

${query}`;
}

// ---------------------------------------------------------------------------
// Forecast
// ---------------------------------------------------------------------------

export const FORECAST_SYSTEM_PROMPT = `You are a foresight analyst. For the request, propose development options for
the next 1-3 years: name the trend each option relies on, the expected effect and the
main risk. Use short Markdown sections. Be concrete and avoid generic advice.`;

// ---------------------------------------------------------------------------
// Final strategy
// ---------------------------------------------------------------------------

export const FINAL_STRATEGY_SYSTEM_PROMPT = `You are the organisation's strategy agent.
From three sources (internal data, external cases, forecast ideas) produce exactly three
final strategies and, separately, a SWOT analysis for each.

Rules:
1) Use only the data provided; invent nothing.
2) Build the strategies on what the organisation already has (internal data).
3) Take the external cases and forecast ideas into account.
4) Score each strategy on five criteria from 0 to 10:
   - Cost (10 = very expensive)
   - Risk (10 = very risky)
   - Time (10 = slow to implement)
   - Effect (10 = maximum effect)
   - Optimality (overall assessment)
5) Rank the strategies by optimality (1 = most preferable).
6) Do NOT put the SWOT in the main block. Put it in a separate block between the markers.

Answer in clean Markdown with exactly this structure:

## Final strategies

For each strategy:
### Strategy 1: <title>
Short description (3-6 sentences).
Scores (0-10): Cost=X; Risk=Y; Time=Z; Effect=W; Optimality=O

### Strategy 2: ...
...

### Strategy 3: ...
...

${SWOT_START_MARKER}
## SWOT
### Strategy 1: <title>
S:
- 2-3 items, one per line, each starting with "- "
W:
- ...
O:
- ...
T:
- ...

### Strategy 2: ...
...

### Strategy 3: ...
...
${SWOT_END_MARKER}

Do not output JSON. Do not mention missing sources.`;

export function buildFinalStrategyPrompt(inputs: FinalStrategyInputs): string {
  const bullets = inputs.webBullets.length > 0 ? inputs.webBullets.join("; ") : "—";

  return `Data for the analysis:

1) Internal data (retrieval):
${inputs.retrievalSummary}

Weigh the internal data most heavily. The strategies must build on what the organisation already has.

2) External cases (websearch):
Overview:
${inputs.webSummary}
Key facts:
${bullets}

3) Forecast ideas:
${inputs.forecastText}
`;
}
