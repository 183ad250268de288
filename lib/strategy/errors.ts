/**
 * Error taxonomy.
 *
 * Secondary-agent timeouts are not errors: they are recorded as the
 * `timedOut` task state and an `unavailable` slot. Parse problems are never
 * thrown either.
 */

import type { AgentKind } from "./types";

export class StrategyDeskError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A call-level failure (network, auth, provider) isolated to one agent. */
export class GatewayFailure extends StrategyDeskError {
  readonly agentKind: AgentKind;

  constructor(agentKind: AgentKind, message: string, options?: { cause?: unknown }) {
    super(`${agentKind}: ${message}`, options);
    this.agentKind = agentKind;
  }
}

/** The inline wait on the primary call ran past its deadline. */
export class DeadlineExceeded extends StrategyDeskError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} did not finish within ${Math.round(timeoutMs / 1000)} s`);
    this.timeoutMs = timeoutMs;
  }
}

/** Missing or invalid credentials/settings at gateway construction. */
export class ConfigurationError extends StrategyDeskError {}

/** Extract a human-readable message from anything thrown. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return String(error);
}
