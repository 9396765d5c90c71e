// esg-backend/src/repositories/inMemoryRepository.ts
// Process-local repository (default when DATABASE_PATH is unset; tests)

import { randomUUID } from "node:crypto";
import type { ScoreHistoryEntry, ScoreResult } from "../types/assessment";
import type { EvaluationRecord, PredictiveAlert } from "../types/alerts";
import { byExpiry, byRecency, DEFAULT_HISTORY_LIMIT, EsgRepository } from "./esgRepository";

export class InMemoryEsgRepository implements EsgRepository {
  private readonly history = new Map<string, ScoreHistoryEntry[]>();
  private readonly alerts = new Map<string, PredictiveAlert>();
  private readonly evaluations = new Map<string, EvaluationRecord>();
  private readonly checkpoints = new Map<string, Set<string>>();

  async appendHistory(userId: string, industry: string, result: ScoreResult): Promise<string> {
    const entries = this.history.get(userId) ?? [];
    const entry: ScoreHistoryEntry = {
      id: randomUUID(),
      user_id: userId,
      industry,
      sequence: entries.length + 1,
      result: structuredClone(result),
    };
    entries.push(entry);
    this.history.set(userId, entries);
    return entry.id;
  }

  async readHistory(userId: string, limit: number = DEFAULT_HISTORY_LIMIT): Promise<ScoreHistoryEntry[]> {
    const entries = this.history.get(userId) ?? [];
    return [...entries].sort(byRecency).slice(0, limit).map((e) => structuredClone(e));
  }

  async upsertAlert(alert: PredictiveAlert): Promise<void> {
    this.alerts.set(alert.id, structuredClone(alert));
  }

  async getAlert(alertId: string): Promise<PredictiveAlert | null> {
    const alert = this.alerts.get(alertId);
    return alert ? structuredClone(alert) : null;
  }

  async listAlerts(userId: string): Promise<PredictiveAlert[]> {
    return [...this.alerts.values()]
      .filter((a) => a.user_id === userId)
      .sort(byExpiry)
      .map((a) => structuredClone(a));
  }

  async listActiveAlerts(userId: string, now: Date): Promise<PredictiveAlert[]> {
    const all = await this.listAlerts(userId);
    return all.filter((a) => Date.parse(a.expires_at) > now.getTime());
  }

  async resolveAlert(userId: string, alertId: string, now: Date): Promise<PredictiveAlert | null> {
    const alert = this.alerts.get(alertId);
    if (!alert || alert.user_id !== userId) return null;
    if (!alert.is_resolved) {
      alert.is_resolved = true;
      alert.resolved_at = now.toISOString();
    }
    return structuredClone(alert);
  }

  async recordEvaluation(record: EvaluationRecord): Promise<void> {
    this.evaluations.set(record.user_id, { ...record });
  }

  async readLastEvaluation(userId: string): Promise<EvaluationRecord | null> {
    const record = this.evaluations.get(userId);
    return record ? { ...record } : null;
  }

  async saveCheckpoint(jobId: string, userId: string): Promise<void> {
    const done = this.checkpoints.get(jobId) ?? new Set<string>();
    done.add(userId);
    this.checkpoints.set(jobId, done);
  }

  async listCheckpoints(jobId: string): Promise<string[]> {
    return [...(this.checkpoints.get(jobId) ?? [])].sort();
  }

  async listUsers(): Promise<string[]> {
    return [...this.history.entries()]
      .filter(([, entries]) => entries.length > 0)
      .map(([userId]) => userId)
      .sort();
  }
}
