/**
 * Per-user session state.
 *
 * The host creates one SessionState per user session and passes it to every
 * operation; nothing is kept in module-level storage.
 */

import { randomUUID } from "node:crypto";
import type { SessionState } from "./types";

export function createSession(): SessionState {
  return {
    correlation: {
      websearch: randomUUID(),
      forecast: randomUUID(),
      finalStrategy: randomUUID(),
    },
    slots: {
      retrieval: { status: "empty" },
      websearch: { status: "empty" },
      forecast: { status: "empty" },
      finalStrategy: { status: "empty" },
    },
    swotVisibility: new Map(),
    tracked: new Map(),
    pool: null,
    finalStrategyInFlight: null,
  };
}

// ---------------------------------------------------------------------------
// SWOT visibility, keyed by emissionIndex so it survives re-ranking
// ---------------------------------------------------------------------------

export function isSwotVisible(session: SessionState, emissionIndex: number): boolean {
  return session.swotVisibility.get(emissionIndex) ?? false;
}

/** Flip visibility for one strategy and return the new value. */
export function toggleSwot(session: SessionState, emissionIndex: number): boolean {
  const next = !isSwotVisible(session, emissionIndex);
  session.swotVisibility.set(emissionIndex, next);
  return next;
}

export function resetSwotVisibility(session: SessionState): void {
  session.swotVisibility.clear();
}
