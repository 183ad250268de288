export * from "./types";
export * from "./errors";
export * from "./gateways";
export * from "./config";
export { createSession, isSwotVisible, toggleSwot, resetSwotVisibility } from "./session";
export { WorkerPool } from "./worker-pool";
export { TaskHandle, type HandleSnapshot } from "./task-handle";
export { startAnalysis, buildSearchQuery, collectTopSources } from "./orchestrator";
export {
  reconcile,
  runUntilSettled,
  type ReconcileReport,
  type ReconciledTask,
} from "./reconciliation";
export {
  inspectFinalStrategy,
  readSlot,
  buildFinalStrategyInputs,
  buildFinalStrategyResult,
} from "./result-store";
export {
  parseStrategyResponse,
  splitSentinelBlocks,
  extractScores,
  lookupSwot,
  stripMarkup,
  SWOT_START_MARKER,
  SWOT_END_MARKER,
} from "./response-parser";
export { unwrapPayload, stripCodeFence, type WebPayload } from "./payload";
export { rankStrategies, formatRankedTitle, TIER_MARKERS } from "./ranker";
export { agentStatus, sessionStatus, type AgentStatus } from "./status";
export { createAgentGateways, type DocumentIndex } from "./agents";
