/**
 * Reconciliation loop — promotes tracked background tasks to a terminal state.
 *
 * `reconcile` is one synchronous, non-blocking sweep meant to be called from
 * the host's request/render cycle. `runUntilSettled` drives it for hosts
 * that can simply await: it wakes on whichever comes first, the poll
 * interval or a tracked call settling.
 */

import { describeError } from "./errors";
import { commitResult, markUnavailable } from "./result-store";
import type {
  AgentTaskState,
  AnalysisConfig,
  BackgroundAgentKind,
  SessionState,
} from "./types";
import { DEFAULT_ANALYSIS_CONFIG } from "./types";

export interface ReconciledTask {
  agentKind: BackgroundAgentKind;
  state: Exclude<AgentTaskState, "pending">;
  elapsedMs: number;
}

export interface ReconcileReport {
  settled: ReconciledTask[];
  pending: BackgroundAgentKind[];
  /** Call reconcile again after this many ms; null when nothing is pending. */
  retryAfterMs: number | null;
}

function releasePool(session: SessionState): void {
  if (!session.pool) return;
  session.pool.shutdown();
  session.pool = null;
}

/**
 * One reconciliation pass over the session's tracked tasks.
 *
 * Per task, in order: past timeout + grace → timedOut (slot becomes
 * unavailable); settled → ready or failed; otherwise left pending. Every
 * task leaves the tracked set the moment it reaches a terminal state, so a
 * second pass never touches it again.
 */
export function reconcile(
  session: SessionState,
  config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG,
  now: number = Date.now()
): ReconcileReport {
  const settled: ReconciledTask[] = [];
  const pending: BackgroundAgentKind[] = [];

  for (const [kind, task] of [...session.tracked]) {
    const elapsedMs = now - task.startedAt;

    if (elapsedMs > task.timeoutMs + config.graceMs) {
      task.state = "timedOut";
      task.handle.abandon();
      session.tracked.delete(kind);
      markUnavailable(
        session,
        kind,
        "timeout",
        `${kind} did not answer within ${Math.round(task.timeoutMs / 1000)} s`
      );
      settled.push({ agentKind: kind, state: "timedOut", elapsedMs });
      console.warn(`[reconcile] ${kind}: dropped after timeout (${(elapsedMs / 1000).toFixed(1)} s)`);
      continue;
    }

    const snapshot = task.handle.poll();
    if (snapshot.state === "pending") {
      pending.push(kind);
      continue;
    }

    session.tracked.delete(kind);
    if (snapshot.state === "fulfilled") {
      task.state = "ready";
      commitResult(session, snapshot.value, now);
      console.info(`[reconcile] ${kind}: ready after ${(elapsedMs / 1000).toFixed(1)} s`);
      settled.push({ agentKind: kind, state: "ready", elapsedMs });
    } else {
      task.state = "failed";
      markUnavailable(session, kind, "failed", describeError(snapshot.error));
      console.warn(`[reconcile] ${kind} failed:`, snapshot.error);
      settled.push({ agentKind: kind, state: "failed", elapsedMs });
    }
  }

  if (pending.length === 0) releasePool(session);

  return {
    settled,
    pending,
    retryAfterMs: pending.length > 0 ? config.pollIntervalMs : null,
  };
}

/** Resolve after `ms`, or earlier when any tracked call settles. */
async function nextWake(session: SessionState, ms: number): Promise<void> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const tick = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, ms);
  });
  const settles = [...session.tracked.values()].map((task) => task.handle.settled);

  try {
    await Promise.race([tick, ...settles]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Reconcile until nothing is tracked. Returns every task settled on the way,
 * in settlement order.
 */
export async function runUntilSettled(
  session: SessionState,
  config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG
): Promise<ReconciledTask[]> {
  const settled: ReconciledTask[] = [];
  for (;;) {
    const report = reconcile(session, config);
    settled.push(...report.settled);
    if (report.retryAfterMs === null) return settled;
    await nextWake(session, report.retryAfterMs);
  }
}
