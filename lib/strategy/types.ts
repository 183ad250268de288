/**
 * Core type definitions for the strategy desk.
 *
 * One analysis request fans out to three agents:
 *   Retrieval  — internal documents + generated answer (awaited inline)
 *   Websearch  — external cases, backgrounded
 *   Forecast   — forward-looking ideas, backgrounded
 *
 * When all three hold results, the FinalStrategy agent turns them into
 * ranked strategies with a SWOT entry each.
 */

import type { TaskHandle } from "./task-handle";
import type { WorkerPool } from "./worker-pool";

// ---------------------------------------------------------------------------
// Agents
// ---------------------------------------------------------------------------

export type AgentKind = "retrieval" | "websearch" | "forecast" | "finalStrategy";

/** Agents whose calls run in the background and are observed by reconciliation. */
export type BackgroundAgentKind = "websearch" | "forecast";

export const BACKGROUND_AGENT_KINDS: readonly BackgroundAgentKind[] = [
  "websearch",
  "forecast",
] as const;

export type AgentTaskState = "pending" | "ready" | "timedOut" | "failed";

export interface AgentTask<K extends BackgroundAgentKind = BackgroundAgentKind> {
  agentKind: K;
  sessionId: string;
  handle: TaskHandle<AgentResultFor<K>>;
  startedAt: number;
  timeoutMs: number;
  state: AgentTaskState;
}

// ---------------------------------------------------------------------------
// Agent results
// ---------------------------------------------------------------------------

export interface RetrievedDocument {
  id: string;
  text: string;
  file: string;
  date?: string;
  score?: number;
}

export interface SourceRef {
  file: string;
  date?: string;
}

export interface WebSource {
  title: string;
  url?: string;
  date?: string;
}

export interface RetrievalResult {
  kind: "retrieval";
  answerText: string;
  documents: RetrievedDocument[];
  topSources: SourceRef[];
}

export interface WebsearchResult {
  kind: "websearch";
  /** Object, JSON string, fenced JSON or double-encoded JSON; see unwrapPayload. */
  rawPayload: unknown;
  answerText: string;
  sources: WebSource[];
}

export interface ForecastResult {
  kind: "forecast";
  answerText: string;
}

export interface FinalStrategyInputs {
  retrievalSummary: string;
  webSummary: string;
  webBullets: string[];
  forecastText: string;
}

export interface FinalStrategyResult {
  kind: "finalStrategy";
  mainText: string;
  swotText: string;
  report: StrategyReport;
  ranked: RankedStrategy[];
  inputs: FinalStrategyInputs;
}

export type AgentResult =
  | RetrievalResult
  | WebsearchResult
  | ForecastResult
  | FinalStrategyResult;

export type AgentResultFor<K extends AgentKind> = Extract<AgentResult, { kind: K }>;

// ---------------------------------------------------------------------------
// Slots
// ---------------------------------------------------------------------------

export type UnavailableReason = "timeout" | "failed";

export type Slot<T> =
  | { status: "empty" }
  | { status: "ready"; value: T; committedAt: number }
  | { status: "unavailable"; reason: UnavailableReason; message: string };

export interface ResultSlots {
  retrieval: Slot<RetrievalResult>;
  websearch: Slot<WebsearchResult>;
  forecast: Slot<ForecastResult>;
  finalStrategy: Slot<FinalStrategyResult>;
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

export interface CorrelationIds {
  websearch: string;
  forecast: string;
  finalStrategy: string;
}

export interface SessionState {
  /** Opaque per-agent ids, created once and reused across analyses. */
  correlation: CorrelationIds;
  slots: ResultSlots;
  /** SWOT visibility keyed by strategy emissionIndex, never by rank. */
  swotVisibility: Map<number, boolean>;
  tracked: Map<BackgroundAgentKind, AgentTask>;
  pool: WorkerPool | null;
  finalStrategyInFlight: Promise<Slot<FinalStrategyResult>> | null;
}

// ---------------------------------------------------------------------------
// Strategies
// ---------------------------------------------------------------------------

export type Criterion = "Cost" | "Risk" | "Time" | "Effect" | "Optimality";

export const CRITERIA: readonly Criterion[] = [
  "Cost",
  "Risk",
  "Time",
  "Effect",
  "Optimality",
] as const;

export type StrategyScores = Partial<Record<Criterion, number>>;

export interface Strategy {
  emissionIndex: number; // 1-based order of appearance
  title: string;
  description: string;
  scores: StrategyScores;
  rank: number | null;
}

export type StrategyTier = 1 | 2 | 3;

export interface RankedStrategy extends Strategy {
  rank: number;
  tier: StrategyTier | null;
}

export type SwotCategory = "S" | "W" | "O" | "T";

export const SWOT_CATEGORIES: readonly SwotCategory[] = ["S", "W", "O", "T"] as const;

export interface SwotEntry {
  strategyIndex: number;
  S: string[];
  W: string[];
  O: string[];
  T: string[];
}

export interface StrategyReport {
  preamble: string;
  strategies: Strategy[];
  swot: Map<number, SwotEntry>;
  /** False when no strategy could be recovered; render a fallback notice. */
  extractable: boolean;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface AnalysisConfig {
  primaryTimeoutMs: number;
  websearchTimeoutMs: number;
  forecastTimeoutMs: number;
  graceMs: number;
  pollIntervalMs: number;
  poolSize: number;
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  primaryTimeoutMs: 120_000,
  websearchTimeoutMs: 60_000,
  forecastTimeoutMs: 90_000,
  graceMs: 5_000,
  pollIntervalMs: 2_000,
  poolSize: 3,
};

export interface AnalysisRequest {
  /** The user's original query; also the primary hint for retrieval. */
  query: string;
  /** Enriched query sent to the background agents. */
  enrichedQuery: string;
  /** Keywords from classified parameters, appended to the search query. */
  keywords?: string[];
}

export type AnalysisOutcome =
  | { status: "completed"; retrieval: RetrievalResult }
  | { status: "empty" }
  | { status: "failed"; message: string };
