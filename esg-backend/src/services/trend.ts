// esg-backend/src/services/trend.ts
// Trend Analyzer: latest overall score vs recent history baseline

import type { TrendDirection } from "../types/assessment";

export const TREND_THRESHOLD = 2.0;
export const TREND_BASELINE_SIZE = 3;
const MIN_PRIOR_ENTRIES = 2;

export interface TrendAnalysis {
  trend: TrendDirection;
  delta: number | null;
  baseline: number | null;
}

/**
 * @param priorScores prior overall scores, most recent first
 */
export function analyzeTrend(latest: number, priorScores: number[]): TrendAnalysis {
  if (priorScores.length < MIN_PRIOR_ENTRIES) {
    return { trend: "insufficient_data", delta: null, baseline: null };
  }

  const window = priorScores.slice(0, TREND_BASELINE_SIZE);
  const baseline = window.reduce((a, b) => a + b, 0) / window.length;
  const delta = Math.round((latest - baseline) * 100) / 100;

  let trend: TrendDirection = "stable";
  if (delta >= TREND_THRESHOLD) trend = "improving";
  else if (delta <= -TREND_THRESHOLD) trend = "declining";

  return { trend, delta, baseline };
}
