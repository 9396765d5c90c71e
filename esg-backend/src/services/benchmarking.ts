// esg-backend/src/services/benchmarking.ts
// Benchmarking Engine: percentile against an industry peer distribution

import { BenchmarkProvider, GLOBAL_INDUSTRY } from "../catalog/benchmarks";
import { DegradedBenchmarkWarning } from "../errors";
import { CATEGORIES, CompanySize, IndustryBenchmark, ScoreResult } from "../types/assessment";

export interface BenchmarkOutcome {
  percentile: number | null;
  degraded: boolean;
  benchmark: IndustryBenchmark | null;
  warning: DegradedBenchmarkWarning | null;
}

/**
 * erf approximation (Abramowitz & Stegun 7.1.26, |error| < 1.5e-7)
 */
function erf(x: number): number {
  const sign = x < 0 ? -1 : 1;
  const ax = Math.abs(x);
  const t = 1 / (1 + 0.3275911 * ax);
  const poly =
    t * (0.254829592 + t * (-0.284496736 + t * (1.421413741 + t * (-1.453152027 + t * 1.061405429))));
  return sign * (1 - poly * Math.exp(-ax * ax));
}

export function normalCdf(z: number): number {
  return 0.5 * (1 + erf(z / Math.SQRT2));
}

/**
 * Φ((score − mean) / stddev) as a 0–100 percentile, one decimal.
 * A zero-width distribution puts the score at 0, 50 or 100.
 */
export function computePercentile(score: number, benchmark: IndustryBenchmark): number {
  if (benchmark.stddev <= 0) {
    if (score > benchmark.mean) return 100;
    if (score < benchmark.mean) return 0;
    return 50;
  }
  const raw = normalCdf((score - benchmark.mean) / benchmark.stddev) * 100;
  const clamped = Math.min(100, Math.max(0, raw));
  return Math.round(clamped * 10) / 10;
}

/**
 * Percentile of one score. Falls back to the global benchmark (degraded)
 * when the industry has none for the scope; never throws.
 */
export function benchmarkScore(
  score: number,
  industry: string,
  scope: string,
  provider: BenchmarkProvider
): BenchmarkOutcome {
  const direct = provider.lookup(industry, scope);
  if (direct) {
    return { percentile: computePercentile(score, direct), degraded: false, benchmark: direct, warning: null };
  }

  const warning = new DegradedBenchmarkWarning(industry, scope);
  const fallback = provider.lookup(GLOBAL_INDUSTRY, scope);
  if (!fallback) {
    return { percentile: null, degraded: true, benchmark: null, warning };
  }
  return { percentile: computePercentile(score, fallback), degraded: true, benchmark: fallback, warning };
}

export interface ScopeInsight {
  scope: string;
  score: number | null;
  percentile: number | null;
  mean: number | null;
  gap: number | null; // score − mean
  degraded: boolean;
}

export interface BenchmarkInsights {
  cohort: {
    industry: string;
    company_size: CompanySize | null;
    sample_size: number | null;
  };
  scopes: ScopeInsight[];
  degraded: boolean;
}

/**
 * Overall + per-category standing against the industry cohort
 */
export function benchmarkInsights(
  result: ScoreResult,
  industry: string,
  companySize: CompanySize | null,
  provider: BenchmarkProvider
): BenchmarkInsights {
  const entries: Array<{ scope: string; score: number | null }> = [
    { scope: "overall", score: result.overall_score },
    ...CATEGORIES.map((c) => ({ scope: c, score: result.category_scores[c] })),
  ];

  const scopes = entries.map(({ scope, score }): ScopeInsight => {
    if (score === null) {
      return { scope, score: null, percentile: null, mean: null, gap: null, degraded: false };
    }
    const outcome = benchmarkScore(score, industry, scope, provider);
    const mean = outcome.benchmark ? outcome.benchmark.mean : null;
    return {
      scope,
      score,
      percentile: outcome.percentile,
      mean,
      gap: mean === null ? null : Math.round((score - mean) * 10) / 10,
      degraded: outcome.degraded,
    };
  });

  const overall = provider.lookup(industry, "overall") ?? provider.lookup(GLOBAL_INDUSTRY, "overall");

  return {
    cohort: {
      industry,
      company_size: companySize,
      sample_size: overall ? overall.sample_size : null,
    },
    scopes,
    degraded: scopes.some((s) => s.degraded),
  };
}
