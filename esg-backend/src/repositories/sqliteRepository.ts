// esg-backend/src/repositories/sqliteRepository.ts
// better-sqlite3 repository (DATABASE_PATH set, ":memory:" in tests)

import fs from "node:fs";
import path from "node:path";
import { randomUUID } from "node:crypto";
import Database from "better-sqlite3";
import type { ScoreHistoryEntry, ScoreResult } from "../types/assessment";
import type { EvaluationRecord, PredictiveAlert } from "../types/alerts";
import { DEFAULT_HISTORY_LIMIT, EsgRepository } from "./esgRepository";
import { AlertRowSchema, EvaluationRowSchema, HistoryRowSchema, ScoreResultSchema } from "./recordSchemas";

const SCHEMA = `
  create table if not exists score_history (
    id text primary key,
    user_id text not null,
    industry text not null,
    sequence integer not null,
    calculated_at text not null,
    result_json text not null,
    unique (user_id, sequence)
  );
  create index if not exists idx_score_history_user
    on score_history (user_id, calculated_at desc, sequence desc);

  create table if not exists predictive_alerts (
    id text primary key,
    user_id text not null,
    alert_type text not null,
    risk_level text not null,
    title text not null,
    description text not null,
    predicted_impact text not null,
    recommended_actions text not null,
    timeline_days integer not null,
    confidence_score real not null,
    data_sources text not null,
    is_resolved integer not null default 0,
    created_at text not null,
    expires_at text not null,
    resolved_at text
  );
  create index if not exists idx_predictive_alerts_user
    on predictive_alerts (user_id, expires_at);

  create table if not exists alert_evaluations (
    user_id text primary key,
    entry_id text not null,
    evaluated_at text not null,
    trend text not null,
    previous_trend text
  );

  create table if not exists job_checkpoints (
    job_id text not null,
    user_id text not null,
    completed_at text not null,
    primary key (job_id, user_id)
  );
`;

const ALERT_COLUMNS =
  "id, user_id, alert_type, risk_level, title, description, predicted_impact, recommended_actions, " +
  "timeline_days, confidence_score, data_sources, is_resolved, created_at, expires_at, resolved_at";

function toHistoryEntry(row: unknown): ScoreHistoryEntry {
  const parsed = HistoryRowSchema.parse(row);
  return {
    id: parsed.id,
    user_id: parsed.user_id,
    industry: parsed.industry,
    sequence: parsed.sequence,
    result: ScoreResultSchema.parse(JSON.parse(parsed.result_json)),
  };
}

function toAlert(row: unknown): PredictiveAlert {
  return AlertRowSchema.parse(row);
}

export class SqliteEsgRepository implements EsgRepository {
  private readonly db: Database.Database;

  constructor(databasePath: string) {
    if (databasePath !== ":memory:") {
      fs.mkdirSync(path.dirname(path.resolve(databasePath)), { recursive: true });
    }
    this.db = new Database(databasePath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA);
  }

  close(): void {
    this.db.close();
  }

  async appendHistory(userId: string, industry: string, result: ScoreResult): Promise<string> {
    const id = randomUUID();
    const append = this.db.transaction(() => {
      const row = this.db
        .prepare<[string], { next: number }>(
          "select coalesce(max(sequence), 0) + 1 as next from score_history where user_id = ?"
        )
        .get(userId);
      this.db
        .prepare(
          "insert into score_history (id, user_id, industry, sequence, calculated_at, result_json) values (?, ?, ?, ?, ?, ?)"
        )
        .run(id, userId, industry, row ? row.next : 1, result.calculated_at, JSON.stringify(result));
    });
    append();
    return id;
  }

  async readHistory(userId: string, limit: number = DEFAULT_HISTORY_LIMIT): Promise<ScoreHistoryEntry[]> {
    const rows = this.db
      .prepare(
        "select id, user_id, industry, sequence, result_json from score_history where user_id = ? order by calculated_at desc, sequence desc limit ?"
      )
      .all(userId, limit);
    return rows.map(toHistoryEntry);
  }

  async upsertAlert(alert: PredictiveAlert): Promise<void> {
    this.db
      .prepare(
        `insert into predictive_alerts (${ALERT_COLUMNS}) values (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         on conflict(id) do update set
           risk_level = excluded.risk_level,
           title = excluded.title,
           description = excluded.description,
           predicted_impact = excluded.predicted_impact,
           recommended_actions = excluded.recommended_actions,
           timeline_days = excluded.timeline_days,
           confidence_score = excluded.confidence_score,
           data_sources = excluded.data_sources,
           is_resolved = excluded.is_resolved,
           created_at = excluded.created_at,
           expires_at = excluded.expires_at,
           resolved_at = excluded.resolved_at`
      )
      .run(
        alert.id,
        alert.user_id,
        alert.alert_type,
        alert.risk_level,
        alert.title,
        alert.description,
        alert.predicted_impact,
        JSON.stringify(alert.recommended_actions),
        alert.timeline_days,
        alert.confidence_score,
        JSON.stringify(alert.data_sources),
        alert.is_resolved ? 1 : 0,
        alert.created_at,
        alert.expires_at,
        alert.resolved_at
      );
  }

  async getAlert(alertId: string): Promise<PredictiveAlert | null> {
    const row = this.db.prepare(`select ${ALERT_COLUMNS} from predictive_alerts where id = ?`).get(alertId);
    return row === undefined ? null : toAlert(row);
  }

  async listAlerts(userId: string): Promise<PredictiveAlert[]> {
    const rows = this.db
      .prepare(`select ${ALERT_COLUMNS} from predictive_alerts where user_id = ? order by expires_at, id`)
      .all(userId);
    return rows.map(toAlert);
  }

  async listActiveAlerts(userId: string, now: Date): Promise<PredictiveAlert[]> {
    const rows = this.db
      .prepare(
        `select ${ALERT_COLUMNS} from predictive_alerts where user_id = ? and expires_at > ? order by expires_at, id`
      )
      .all(userId, now.toISOString());
    return rows.map(toAlert);
  }

  async resolveAlert(userId: string, alertId: string, now: Date): Promise<PredictiveAlert | null> {
    const result = this.db
      .prepare(
        "update predictive_alerts set is_resolved = 1, resolved_at = coalesce(resolved_at, ?) where id = ? and user_id = ?"
      )
      .run(now.toISOString(), alertId, userId);
    if (result.changes === 0) return null;
    return this.getAlert(alertId);
  }

  async recordEvaluation(record: EvaluationRecord): Promise<void> {
    this.db
      .prepare(
        `insert into alert_evaluations (user_id, entry_id, evaluated_at, trend, previous_trend)
         values (?, ?, ?, ?, ?)
         on conflict(user_id) do update set
           entry_id = excluded.entry_id,
           evaluated_at = excluded.evaluated_at,
           trend = excluded.trend,
           previous_trend = excluded.previous_trend`
      )
      .run(record.user_id, record.entry_id, record.evaluated_at, record.trend, record.previous_trend);
  }

  async readLastEvaluation(userId: string): Promise<EvaluationRecord | null> {
    const row = this.db
      .prepare("select user_id, entry_id, evaluated_at, trend, previous_trend from alert_evaluations where user_id = ?")
      .get(userId);
    return row === undefined ? null : EvaluationRowSchema.parse(row);
  }

  async saveCheckpoint(jobId: string, userId: string): Promise<void> {
    this.db
      .prepare("insert or ignore into job_checkpoints (job_id, user_id, completed_at) values (?, ?, ?)")
      .run(jobId, userId, new Date().toISOString());
  }

  async listCheckpoints(jobId: string): Promise<string[]> {
    const rows = this.db
      .prepare<[string], { user_id: string }>("select user_id from job_checkpoints where job_id = ? order by user_id")
      .all(jobId);
    return rows.map((r) => r.user_id);
  }

  async listUsers(): Promise<string[]> {
    const rows = this.db
      .prepare<[], { user_id: string }>("select distinct user_id from score_history order by user_id")
      .all();
    return rows.map((r) => r.user_id);
  }
}
