// esg-backend/src/services/assessmentService.ts
// Per-user "read history → score → append" workflow

import type { BenchmarkProvider } from "../catalog/benchmarks";
import type { ScoringConfig } from "../config";
import type { EngineWarning } from "../errors";
import type { EsgRepository } from "../repositories/esgRepository";
import type { Answer, QuestionCatalog, ScoreHistoryEntry, ScoreResult } from "../types/assessment";
import type { KeyedLock } from "../utils/keyedLock";
import { logger } from "../utils/logger";
import { scoreSubmission } from "./engine";
import { TREND_BASELINE_SIZE } from "./trend";

export interface AssessmentServiceDeps {
  repository: EsgRepository;
  catalog: QuestionCatalog;
  benchmarks: BenchmarkProvider;
  config: ScoringConfig;
  lock: KeyedLock;
  clock?: () => Date;
}

export interface SubmitAssessmentInput {
  userId: string;
  industry: string;
  answers: Answer[];
}

export interface SubmitAssessmentResult {
  result: ScoreResult;
  warnings: EngineWarning[];
  historyId: string;
}

export class AssessmentService {
  private readonly deps: AssessmentServiceDeps;
  private readonly clock: () => Date;

  constructor(deps: AssessmentServiceDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Scores one submission and appends it to the user's history.
   * calculated_at is kept strictly after the previous entry.
   */
  async submit(input: SubmitAssessmentInput): Promise<SubmitAssessmentResult> {
    const { repository, catalog, benchmarks, config, lock } = this.deps;

    return lock.run(input.userId, async () => {
      const history = await repository.readHistory(input.userId, TREND_BASELINE_SIZE);

      let now = this.clock();
      const last = history[0];
      if (last) {
        const lastMs = Date.parse(last.result.calculated_at);
        if (now.getTime() <= lastMs) {
          now = new Date(lastMs + 1);
        }
      }

      const { result, warnings } = scoreSubmission(
        { answers: input.answers, industry: input.industry, history },
        { catalog, benchmarks, config, now }
      );
      const historyId = await repository.appendHistory(input.userId, input.industry, result);

      logger.info("[ASSESSMENT] Score recorded", {
        userId: input.userId,
        historyId,
        overall: result.overall_score,
        trend: result.trend,
        warnings: warnings.length,
      });

      return { result, warnings, historyId };
    });
  }

  history(userId: string, limit?: number): Promise<ScoreHistoryEntry[]> {
    return this.deps.repository.readHistory(userId, limit);
  }

  async latest(userId: string): Promise<ScoreHistoryEntry | null> {
    const [entry] = await this.deps.repository.readHistory(userId, 1);
    return entry ?? null;
  }
}
