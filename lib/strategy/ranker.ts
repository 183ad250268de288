/**
 * Ranker — orders parsed strategies by their Optimality score.
 *
 * Highest Optimality first; a strategy without one counts as 0. Ties keep
 * emission order. The top three get a medal tier. emissionIndex travels with
 * each record so SWOT lookups stay correct after reordering.
 */

import type { RankedStrategy, Strategy, StrategyTier } from "./types";

export const TIER_MARKERS: Record<StrategyTier, string> = {
  1: "\u{1F947}",
  2: "\u{1F948}",
  3: "\u{1F949}",
};

function optimalityOf(strategy: Strategy): number {
  return strategy.scores.Optimality ?? 0;
}

function tierFor(rank: number): StrategyTier | null {
  if (rank === 1 || rank === 2 || rank === 3) return rank;
  return null;
}

/**
 * Rank strategies. Returns new records; the input list is left untouched.
 */
export function rankStrategies(strategies: Strategy[]): RankedStrategy[] {
  const ordered = [...strategies].sort(
    (a, b) => optimalityOf(b) - optimalityOf(a) || a.emissionIndex - b.emissionIndex
  );

  return ordered.map((strategy, i) => ({
    ...strategy,
    rank: i + 1,
    tier: tierFor(i + 1),
  }));
}

/** Title with its medal prefix, e.g. "🥇 Expand online programmes". */
export function formatRankedTitle(strategy: RankedStrategy): string {
  return strategy.tier ? `${TIER_MARKERS[strategy.tier]} ${strategy.title}` : strategy.title;
}
