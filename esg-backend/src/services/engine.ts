// esg-backend/src/services/engine.ts
// Scoring Engine facade: normalize → score → benchmark → trend
// Pure and synchronous; the clock is injected.

import type { BenchmarkProvider } from "../catalog/benchmarks";
import type { ScoringConfig } from "../config";
import type { EngineWarning } from "../errors";
import type { Answer, QuestionCatalog, ScoreHistoryEntry, ScoreResult } from "../types/assessment";
import { benchmarkScore } from "./benchmarking";
import { normalizeAnswers } from "./normalizer";
import { aggregateScores } from "./scoring";
import { analyzeTrend } from "./trend";

export interface EngineContext {
  catalog: QuestionCatalog;
  benchmarks: BenchmarkProvider;
  config: ScoringConfig;
  now: Date;
}

export interface ScoreSubmission {
  answers: Answer[];
  industry: string;
  /** prior entries, most recent first */
  history: ScoreHistoryEntry[];
}

export interface ScoreOutcome {
  result: ScoreResult;
  warnings: EngineWarning[];
}

export function scoreSubmission(submission: ScoreSubmission, ctx: EngineContext): ScoreOutcome {
  const { metrics, warnings } = normalizeAnswers(submission.answers, ctx.catalog);
  const aggregated = aggregateScores(metrics, ctx.catalog, ctx.config);

  const benchmark = benchmarkScore(aggregated.overall_score, submission.industry, "overall", ctx.benchmarks);
  if (benchmark.warning) {
    warnings.push({ code: benchmark.warning.code, message: benchmark.warning.message });
  }

  const trend = analyzeTrend(
    aggregated.overall_score,
    submission.history.map((entry) => entry.result.overall_score)
  );

  const result: ScoreResult = {
    ...aggregated,
    industry_percentile: benchmark.percentile,
    benchmark_degraded: benchmark.degraded,
    trend: trend.trend,
    trend_delta: trend.delta,
    llm_suggested_questions: metrics
      .filter((m) => m.provenance === "llm_suggested")
      .map((m) => m.question_id),
    calculated_at: ctx.now.toISOString(),
  };

  return { result, warnings };
}
