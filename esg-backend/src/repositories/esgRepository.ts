// esg-backend/src/repositories/esgRepository.ts
// Persistence contract for score history, alerts and batch checkpoints

import type { ScoreHistoryEntry, ScoreResult } from "../types/assessment";
import type { EvaluationRecord, PredictiveAlert } from "../types/alerts";

export const DEFAULT_HISTORY_LIMIT = 20;

export interface EsgRepository {
  /** Appends one result; returns the new history id */
  appendHistory(userId: string, industry: string, result: ScoreResult): Promise<string>;
  /** Most recent first (calculated_at, then sequence) */
  readHistory(userId: string, limit?: number): Promise<ScoreHistoryEntry[]>;

  upsertAlert(alert: PredictiveAlert): Promise<void>;
  getAlert(alertId: string): Promise<PredictiveAlert | null>;
  listAlerts(userId: string): Promise<PredictiveAlert[]>;
  /** Alerts with expires_at > now */
  listActiveAlerts(userId: string, now: Date): Promise<PredictiveAlert[]>;
  /** Null when the alert is unknown or belongs to another user */
  resolveAlert(userId: string, alertId: string, now: Date): Promise<PredictiveAlert | null>;

  recordEvaluation(record: EvaluationRecord): Promise<void>;
  readLastEvaluation(userId: string): Promise<EvaluationRecord | null>;

  saveCheckpoint(jobId: string, userId: string): Promise<void>;
  listCheckpoints(jobId: string): Promise<string[]>;

  /** Users with at least one history entry, sorted */
  listUsers(): Promise<string[]>;
}

export function byRecency(a: ScoreHistoryEntry, b: ScoreHistoryEntry): number {
  return b.result.calculated_at.localeCompare(a.result.calculated_at) || b.sequence - a.sequence;
}

export function byExpiry(a: PredictiveAlert, b: PredictiveAlert): number {
  return a.expires_at.localeCompare(b.expires_at) || a.id.localeCompare(b.id);
}
