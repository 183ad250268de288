/**
 * Task orchestrator — one user action, three agents.
 *
 *   Retrieval  — submitted and awaited inline, up to primaryTimeoutMs
 *   Websearch  — submitted, then tracked for reconciliation
 *   Forecast   — submitted, then tracked for reconciliation
 *
 * All three share a bounded worker pool created for the action. There is no
 * cancellation: calls that are no longer tracked keep running until they
 * settle on their own.
 */

import type {
  AgentGateways,
  ForecastGateway,
  RetrievalGateway,
  WebsearchGateway,
} from "./gateways";
import { GatewayFailure, describeError } from "./errors";
import { commitResult, resetUnavailable } from "./result-store";
import type { TaskHandle } from "./task-handle";
import { WorkerPool } from "./worker-pool";
import type {
  AgentKind,
  AgentTask,
  AnalysisConfig,
  AnalysisOutcome,
  AnalysisRequest,
  ForecastResult,
  RetrievalResult,
  RetrievedDocument,
  SessionState,
  SourceRef,
  WebsearchResult,
} from "./types";
import { BACKGROUND_AGENT_KINDS, DEFAULT_ANALYSIS_CONFIG } from "./types";

const TOP_SOURCES_LIMIT = 5;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Original query followed by the classified keywords. */
export function buildSearchQuery(request: AnalysisRequest): string {
  return [request.query, ...(request.keywords ?? [])]
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .join(" ");
}

/** Distinct source files in document order. */
export function collectTopSources(
  documents: RetrievedDocument[],
  limit: number = TOP_SOURCES_LIMIT
): SourceRef[] {
  const seen = new Set<string>();
  const sources: SourceRef[] = [];
  for (const doc of documents) {
    if (seen.has(doc.file)) continue;
    seen.add(doc.file);
    sources.push(doc.date ? { file: doc.file, date: doc.date } : { file: doc.file });
    if (sources.length >= limit) break;
  }
  return sources;
}

function elapsedSeconds(since: number): string {
  return ((Date.now() - since) / 1000).toFixed(2);
}

async function asGatewayCall<T>(agentKind: AgentKind, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof GatewayFailure) throw error;
    throw new GatewayFailure(agentKind, describeError(error), { cause: error });
  }
}

// ---------------------------------------------------------------------------
// Agent calls
// ---------------------------------------------------------------------------

/** Search then generate. Resolves to null when no documents match. */
export async function runRetrieval(
  gateway: RetrievalGateway,
  searchQuery: string,
  originalQuery: string
): Promise<RetrievalResult | null> {
  return asGatewayCall<RetrievalResult | null>("retrieval", async () => {
    const documents = await gateway.search(searchQuery, originalQuery);
    if (documents.length === 0) return null;

    const answerText = await gateway.generate(originalQuery, documents);
    return {
      kind: "retrieval",
      answerText,
      documents,
      topSources: collectTopSources(documents),
    };
  });
}

export async function runWebsearch(
  gateway: WebsearchGateway,
  sessionId: string,
  query: string
): Promise<WebsearchResult> {
  return asGatewayCall<WebsearchResult>("websearch", async () => {
    const reply = await gateway.call(sessionId, query);
    return { kind: "websearch", ...reply };
  });
}

export async function runForecast(
  gateway: ForecastGateway,
  sessionId: string,
  query: string
): Promise<ForecastResult> {
  return asGatewayCall<ForecastResult>("forecast", async () => {
    const reply = await gateway.call(sessionId, query);
    return { kind: "forecast", answerText: reply.answerText };
  });
}

// ---------------------------------------------------------------------------
// Tracking
// ---------------------------------------------------------------------------

/**
 * Track a background task, replacing any task of the same kind. The replaced
 * call is abandoned, not interrupted.
 */
export function trackTask(session: SessionState, task: AgentTask): void {
  const previous = session.tracked.get(task.agentKind);
  if (previous) {
    previous.handle.abandon();
    console.warn(`[orchestrator] ${task.agentKind}: superseded a pending call; it keeps running untracked`);
  }
  session.tracked.set(task.agentKind, task);
}

// ---------------------------------------------------------------------------
// startAnalysis
// ---------------------------------------------------------------------------

/**
 * Launch one analysis.
 *
 * @param session - Session state owned by the caller
 * @param request - Query, enriched query and optional keywords
 * @param gateways - Retrieval, Websearch and Forecast gateways
 * @param config - Timeouts and pool size
 * @returns "completed" with the retrieval result, "empty" when no documents
 *   matched, or "failed" when the primary call threw or missed its deadline.
 *   In the failed case the background calls are not tracked (they still run).
 */
export async function startAnalysis(
  session: SessionState,
  request: AnalysisRequest,
  gateways: Pick<AgentGateways, "retrieval" | "websearch" | "forecast">,
  config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG
): Promise<AnalysisOutcome> {
  const searchQuery = buildSearchQuery(request);
  const originalQuery = request.query.trim();
  const pool = new WorkerPool(config.poolSize);

  const primary = pool.submit("retrieval", () =>
    runRetrieval(gateways.retrieval, searchQuery, originalQuery)
  );
  const websearch: TaskHandle<WebsearchResult> = pool.submit("websearch", () =>
    runWebsearch(gateways.websearch, session.correlation.websearch, request.enrichedQuery)
  );
  const forecast: TaskHandle<ForecastResult> = pool.submit("forecast", () =>
    runForecast(gateways.forecast, session.correlation.forecast, request.enrichedQuery)
  );

  const start = Date.now();
  let retrieval: RetrievalResult | null;
  try {
    retrieval = await primary.result(config.primaryTimeoutMs);
    console.info(`[orchestrator] retrieval finished in ${elapsedSeconds(start)} s`);
  } catch (error) {
    console.error("[orchestrator] analysis failed:", error);
    websearch.abandon();
    forecast.abandon();
    return { status: "failed", message: describeError(error) };
  }

  resetUnavailable(session, [...BACKGROUND_AGENT_KINDS, "finalStrategy"]);

  const registeredAt = Date.now();
  trackTask(session, {
    agentKind: "websearch",
    sessionId: session.correlation.websearch,
    handle: websearch,
    startedAt: registeredAt,
    timeoutMs: config.websearchTimeoutMs,
    state: "pending",
  });
  trackTask(session, {
    agentKind: "forecast",
    sessionId: session.correlation.forecast,
    handle: forecast,
    startedAt: registeredAt,
    timeoutMs: config.forecastTimeoutMs,
    state: "pending",
  });

  session.pool?.shutdown();
  session.pool = pool;

  if (!retrieval) {
    console.info("[orchestrator] retrieval found no documents");
    return { status: "empty" };
  }

  commitResult(session, retrieval);
  return { status: "completed", retrieval };
}
