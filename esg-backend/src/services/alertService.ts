// esg-backend/src/services/alertService.ts
// Alert lifecycle per user: generate, list, resolve; readiness views

import type { RegulatoryCalendarFeed } from "../catalog/regulatoryCalendar";
import { NotFoundError } from "../errors";
import type { EsgRepository } from "../repositories/esgRepository";
import type { ScoreHistoryEntry } from "../types/assessment";
import type { PredictiveAlert } from "../types/alerts";
import type { KeyedLock } from "../utils/keyedLock";
import { logger } from "../utils/logger";
import { AlertGenerationOutcome, generateAlerts } from "./predictive";
import { ReadinessIndex, readinessIndex } from "./readiness";
import {
  ProactiveRecommendation,
  proactiveRecommendations,
  Recommendations,
  recommendationsFor,
} from "./recommendations";
import {
  estimateRoi,
  PenaltyWarning,
  penaltyWarnings,
  RiskDashboard,
  riskDashboard,
  RoiEstimate,
} from "./riskAnalytics";

export interface AlertServiceDeps {
  repository: EsgRepository;
  calendar: RegulatoryCalendarFeed;
  lock: KeyedLock;
  clock?: () => Date;
}

export interface RecommendationSet extends Recommendations {
  proactive: ProactiveRecommendation[];
}

export class AlertService {
  private readonly deps: AlertServiceDeps;
  private readonly clock: () => Date;

  constructor(deps: AlertServiceDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? (() => new Date());
  }

  private async latestEntry(userId: string): Promise<ScoreHistoryEntry> {
    const [entry] = await this.deps.repository.readHistory(userId, 1);
    if (!entry) {
      throw new NotFoundError(`No assessment on record for user ${userId}`);
    }
    return entry;
  }

  /**
   * Evaluates the alert rules on the latest score and persists the
   * created/refreshed alerts. Records the trend for the next run; a rerun
   * over the same history entry reuses that entry's predecessor trend.
   */
  async generateForUser(userId: string): Promise<AlertGenerationOutcome> {
    const { repository, calendar, lock } = this.deps;

    return lock.run(`alerts:${userId}`, async () => {
      const now = this.clock();
      const latest = await this.latestEntry(userId);
      const previous = await repository.readLastEvaluation(userId);
      const existing = await repository.listAlerts(userId);
      const previousTrend =
        previous === null ? null : previous.entry_id === latest.id ? previous.previous_trend : previous.trend;

      const outcome = generateAlerts({
        userId,
        industry: latest.industry,
        result: latest.result,
        previousTrend,
        calendar: calendar.entriesFor(latest.industry, now),
        now,
        existing,
      });

      for (const alert of outcome.alerts) {
        await repository.upsertAlert(alert);
      }
      await repository.recordEvaluation({
        user_id: userId,
        entry_id: latest.id,
        evaluated_at: now.toISOString(),
        trend: latest.result.trend,
        previous_trend: previousTrend,
      });

      logger.info("[ALERTS] Generation completed", {
        userId,
        created: outcome.created.length,
        refreshed: outcome.refreshed.length,
        unchanged: outcome.unchanged.length,
      });

      return outcome;
    });
  }

  listActive(userId: string): Promise<PredictiveAlert[]> {
    return this.deps.repository.listActiveAlerts(userId, this.clock());
  }

  async resolve(userId: string, alertId: string): Promise<PredictiveAlert> {
    const alert = await this.deps.lock.run(`alerts:${userId}`, () =>
      this.deps.repository.resolveAlert(userId, alertId, this.clock())
    );
    if (!alert) {
      throw new NotFoundError(`Alert ${alertId} not found for user ${userId}`);
    }
    logger.info("[ALERTS] Alert resolved", { userId, alertId });
    return alert;
  }

  async readiness(userId: string): Promise<ReadinessIndex> {
    const latest = await this.latestEntry(userId);
    const now = this.clock();
    return readinessIndex(latest.result, this.deps.calendar.entriesFor(latest.industry, now), now);
  }

  async recommendations(userId: string): Promise<RecommendationSet> {
    const latest = await this.latestEntry(userId);
    return {
      ...recommendationsFor(latest.result.category_scores),
      proactive: proactiveRecommendations(latest.result),
    };
  }

  async penaltyWarnings(userId: string): Promise<PenaltyWarning[]> {
    const latest = await this.latestEntry(userId);
    const now = this.clock();
    return penaltyWarnings(latest.result, this.deps.calendar.entriesFor(latest.industry, now), now);
  }

  async roiEstimate(userId: string): Promise<RoiEstimate> {
    const latest = await this.latestEntry(userId);
    const now = this.clock();
    return estimateRoi(latest.result, this.deps.calendar.entriesFor(latest.industry, now), now);
  }

  async riskDashboard(userId: string): Promise<RiskDashboard> {
    const readiness = await this.readiness(userId);
    const active = await this.listActive(userId);
    return riskDashboard(active, readiness);
  }
}
