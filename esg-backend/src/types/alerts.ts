// esg-backend/src/types/alerts.ts
// Predictive Alert Schema v1

import type { TrendDirection } from "./assessment";

export type AlertType = "compliance_gap" | "regulatory_deadline" | "trend_decline";

export type RiskLevel = "low" | "medium" | "high" | "critical";

export type DataSource =
  | "esg_scoring"
  | "trend_analysis"
  | "industry_benchmarks"
  | "regulatory_calendar"
  | "readiness_score";

export interface PredictiveAlert {
  id: string;
  user_id: string;
  alert_type: AlertType;
  risk_level: RiskLevel;
  title: string;
  description: string;
  predicted_impact: string;
  recommended_actions: string[];
  timeline_days: number;
  confidence_score: number; // 0–1
  data_sources: DataSource[];
  is_resolved: boolean;
  created_at: string; // ISO8601
  expires_at: string; // ISO8601
  resolved_at: string | null;
}

export type PenaltySeverity = "low" | "medium" | "high";

/**
 * Component of a readiness score: any overall/category/subcategory score key
 */
export interface ReadinessComponent {
  metric: string;
  weight: number;
}

export interface RegulatoryCalendarEntry {
  id: string;
  regulation: string;
  industries: string[]; // "*" matches every industry
  deadline: string; // ISO date
  timeline_days: number;
  threshold: number; // 0–100
  readiness: ReadinessComponent[];
  penalty_severity: PenaltySeverity;
  typical_penalty: string;
}

/**
 * Trend seen by one alert-generation run, kept to detect consecutive declines.
 * `previous_trend` is the trend of the history entry before `entry_id`, so a
 * rerun over the same entry compares against the same predecessor.
 */
export interface EvaluationRecord {
  user_id: string;
  entry_id: string;
  evaluated_at: string;
  trend: TrendDirection;
  previous_trend: TrendDirection | null;
}
