/**
 * Per-session result slots.
 *
 * Each agent kind owns one slot holding its latest terminal result or the
 * "unavailable" sentinel. Inspecting the FinalStrategy slot has a side
 * effect: when it is empty and Retrieval, Websearch and Forecast are all
 * ready at the same moment, the final strategist is called once and its
 * output committed. It is never re-triggered once populated.
 */

import type { FinalStrategyGateway } from "./gateways";
import { describeError } from "./errors";
import { unwrapPayload } from "./payload";
import { rankStrategies } from "./ranker";
import { parseStrategyResponse, splitSentinelBlocks } from "./response-parser";
import { resetSwotVisibility } from "./session";
import type {
  AgentKind,
  FinalStrategyInputs,
  FinalStrategyResult,
  ForecastResult,
  ResultSlots,
  RetrievalResult,
  SessionState,
  Slot,
  UnavailableReason,
  WebsearchResult,
} from "./types";

type UnavailableSlot = Extract<Slot<never>, { status: "unavailable" }>;

// ---------------------------------------------------------------------------
// Slot access
// ---------------------------------------------------------------------------

export function readSlot<K extends AgentKind>(session: SessionState, kind: K): ResultSlots[K] {
  return session.slots[kind];
}

export function commitResult(
  session: SessionState,
  result: RetrievalResult | WebsearchResult | ForecastResult,
  committedAt: number = Date.now()
): void {
  switch (result.kind) {
    case "retrieval":
      session.slots.retrieval = { status: "ready", value: result, committedAt };
      break;
    case "websearch":
      session.slots.websearch = { status: "ready", value: result, committedAt };
      break;
    case "forecast":
      session.slots.forecast = { status: "ready", value: result, committedAt };
      break;
  }
}

export function markUnavailable(
  session: SessionState,
  kind: AgentKind,
  reason: UnavailableReason,
  message: string
): void {
  const sentinel: UnavailableSlot = { status: "unavailable", reason, message };
  session.slots[kind] = sentinel;
}

/** Turn "unavailable" sentinels back into empty slots so agents can be retried. */
export function resetUnavailable(session: SessionState, kinds: readonly AgentKind[]): void {
  for (const kind of kinds) {
    if (session.slots[kind].status === "unavailable") {
      session.slots[kind] = { status: "empty" };
    }
  }
}

// ---------------------------------------------------------------------------
// Final strategy
// ---------------------------------------------------------------------------

interface ReadyUpstream {
  retrieval: RetrievalResult;
  websearch: WebsearchResult;
  forecast: ForecastResult;
}

function readyUpstream(session: SessionState): ReadyUpstream | null {
  const { retrieval, websearch, forecast } = session.slots;
  if (retrieval.status !== "ready" || websearch.status !== "ready" || forecast.status !== "ready") {
    return null;
  }
  return { retrieval: retrieval.value, websearch: websearch.value, forecast: forecast.value };
}

export function buildFinalStrategyInputs(upstream: ReadyUpstream): FinalStrategyInputs {
  const web = unwrapPayload(upstream.websearch.rawPayload, upstream.websearch.answerText);
  return {
    retrievalSummary: upstream.retrieval.answerText,
    webSummary: web.summary,
    webBullets: web.bullets,
    forecastText: upstream.forecast.answerText,
  };
}

export function buildFinalStrategyResult(
  text: string,
  inputs: FinalStrategyInputs
): FinalStrategyResult {
  const { mainText, swotText } = splitSentinelBlocks(text);
  const report = parseStrategyResponse(text);
  return {
    kind: "finalStrategy",
    mainText,
    swotText,
    report,
    ranked: rankStrategies(report.strategies),
    inputs,
  };
}

async function runFinalStrategy(
  session: SessionState,
  gateway: FinalStrategyGateway,
  inputs: FinalStrategyInputs
): Promise<Slot<FinalStrategyResult>> {
  const start = Date.now();
  try {
    const text = await gateway.call(
      inputs.retrievalSummary,
      inputs.webSummary,
      inputs.webBullets,
      inputs.forecastText
    );
    const result = buildFinalStrategyResult(text, inputs);
    session.slots.finalStrategy = { status: "ready", value: result, committedAt: Date.now() };
    resetSwotVisibility(session);

    console.info(
      `[result-store] final strategy ready in ${((Date.now() - start) / 1000).toFixed(2)} s`
    );
    if (!result.report.extractable) {
      console.warn("[result-store] final strategy text contained no recognisable strategies");
    }
  } catch (error) {
    console.error("[result-store] final strategy failed:", error);
    markUnavailable(session, "finalStrategy", "failed", describeError(error));
  }
  return session.slots.finalStrategy;
}

/**
 * Read the FinalStrategy slot, triggering the final strategist first when the
 * slot is empty and all three upstream slots are ready.
 *
 * A failed call leaves the "unavailable" sentinel, which only a fresh
 * analysis clears; there is no automatic retry. Concurrent inspections share
 * the same in-flight call.
 */
export async function inspectFinalStrategy(
  session: SessionState,
  gateway: FinalStrategyGateway
): Promise<Slot<FinalStrategyResult>> {
  if (session.slots.finalStrategy.status !== "empty") return session.slots.finalStrategy;
  if (session.finalStrategyInFlight) return session.finalStrategyInFlight;

  const upstream = readyUpstream(session);
  if (!upstream) return session.slots.finalStrategy;

  const run = runFinalStrategy(session, gateway, buildFinalStrategyInputs(upstream));
  session.finalStrategyInFlight = run;
  try {
    return await run;
  } finally {
    if (session.finalStrategyInFlight === run) session.finalStrategyInFlight = null;
  }
}
