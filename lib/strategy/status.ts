/**
 * Agent status as the presentation layer sees it.
 */

import type { AgentKind, SessionState } from "./types";

export type AgentStatus = "idle" | "running" | "ready" | "unavailable";

/**
 * A ready slot wins over a pending call: the previous result stays visible
 * while a newer call for the same agent is still running.
 */
export function agentStatus(session: SessionState, kind: AgentKind): AgentStatus {
  const slot = session.slots[kind];
  if (slot.status === "ready") return "ready";

  const running =
    kind === "finalStrategy"
      ? session.finalStrategyInFlight !== null
      : kind === "retrieval"
        ? false
        : session.tracked.has(kind);
  if (running) return "running";

  return slot.status === "unavailable" ? "unavailable" : "idle";
}

export function sessionStatus(session: SessionState): Record<AgentKind, AgentStatus> {
  return {
    retrieval: agentStatus(session, "retrieval"),
    websearch: agentStatus(session, "websearch"),
    forecast: agentStatus(session, "forecast"),
    finalStrategy: agentStatus(session, "finalStrategy"),
  };
}
