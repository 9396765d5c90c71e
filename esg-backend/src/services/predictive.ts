// esg-backend/src/services/predictive.ts
// Predictive Alert Generator: rule evaluation + deterministic-id upsert

import { createHash } from "node:crypto";
import { CATEGORIES, Category, ScoreResult, TrendDirection } from "../types/assessment";
import {
  AlertType,
  DataSource,
  PredictiveAlert,
  RegulatoryCalendarEntry,
  RiskLevel,
} from "../types/alerts";
import { daysUntil, penaltyRisk, readinessFor } from "./readiness";
import { categoryActions } from "./recommendations";

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================
// RULE CONSTANTS
// ============================================================

const GAP_SCORE_FLOOR = 50;
const GAP_CRITICAL_BELOW = 35;
const GAP_TIMELINE_DAYS = 60;

const DECLINE_TIMELINE_DAYS = 45;
const DECLINE_HIGH_DELTA = -5;

const TREND_STABILITY: Record<TrendDirection, number> = {
  stable: 1.0,
  improving: 1.0,
  declining: 0.9,
  insufficient_data: 0.75,
};

export const RISK_ORDER: Record<RiskLevel, number> = {
  critical: 0,
  high: 1,
  medium: 2,
  low: 3,
};

export interface AlertGenerationInput {
  userId: string;
  industry: string;
  result: ScoreResult;
  /** trend of the history entry evaluated before this one, null when there is none */
  previousTrend: TrendDirection | null;
  calendar: RegulatoryCalendarEntry[];
  now: Date;
  /** alerts already stored for this user */
  existing: PredictiveAlert[];
}

export interface AlertGenerationOutcome {
  /** alerts to persist (new episodes and refreshed ones) */
  alerts: PredictiveAlert[];
  created: string[];
  refreshed: string[];
  unchanged: string[];
}

interface AlertDraft {
  alert_type: AlertType;
  window: string;
  risk_level: RiskLevel;
  title: string;
  description: string;
  predicted_impact: string;
  recommended_actions: string[];
  timeline_days: number;
  confidence_score: number;
  data_sources: DataSource[];
}

export function alertId(userId: string, alertType: AlertType, window: string): string {
  const digest = createHash("sha256").update(`${userId}|${alertType}|${window}`).digest("hex");
  return `alert_${digest.slice(0, 24)}`;
}

function confidence(value: number): number {
  return Math.round(Math.min(1, Math.max(0, value)) * 100) / 100;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

// ============================================================
// RULES
// ============================================================

function complianceGapDraft(category: Category, score: number, result: ScoreResult): AlertDraft {
  const critical = score < GAP_CRITICAL_BELOW;
  const label = capitalize(category);
  return {
    alert_type: "compliance_gap",
    window: category,
    risk_level: critical ? "critical" : "high",
    title: critical ? `Critical ${label} Performance Alert` : `${label} Compliance Gap`,
    description: `Your ${category} score of ${score} is below ${GAP_SCORE_FLOOR} and is not improving.`,
    predicted_impact: "Exposure to regulatory penalties, stakeholder concern and compliance violations",
    recommended_actions: [
      `Review ${category} practices now`,
      "Write an improvement action plan with owners and dates",
      ...categoryActions(category).slice(0, 2),
    ],
    timeline_days: GAP_TIMELINE_DAYS,
    confidence_score: confidence((0.4 + 0.6 * result.data_completeness) * TREND_STABILITY[result.trend]),
    data_sources: ["esg_scoring", "trend_analysis"],
  };
}

function complianceGapRule(result: ScoreResult): AlertDraft[] {
  if (result.trend === "improving") return [];
  const drafts: AlertDraft[] = [];
  for (const category of CATEGORIES) {
    const score = result.category_scores[category];
    if (score !== null && score < GAP_SCORE_FLOOR) {
      drafts.push(complianceGapDraft(category, score, result));
    }
  }
  return drafts;
}

function deadlineRiskLevel(gapRatio: number): RiskLevel {
  if (gapRatio >= 0.5) return "critical";
  if (gapRatio >= 0.25) return "high";
  return "medium";
}

function regulatoryDeadlineRule(
  result: ScoreResult,
  industry: string,
  calendar: RegulatoryCalendarEntry[],
  now: Date
): AlertDraft[] {
  const wanted = industry.trim().toLowerCase();
  const drafts: AlertDraft[] = [];

  for (const entry of calendar) {
    const applies = entry.industries.some((i) => i === "*" || i.toLowerCase() === wanted);
    if (!applies) continue;

    const days = daysUntil(entry.deadline, now);
    if (days < 0 || days > entry.timeline_days) continue;

    const readiness = readinessFor(entry, result);
    if (readiness >= entry.threshold) continue;

    const gapRatio = (entry.threshold - readiness) / entry.threshold;
    const risk = penaltyRisk(entry, readiness, days);

    drafts.push({
      alert_type: "regulatory_deadline",
      window: `${entry.id}:${entry.deadline}`,
      risk_level: deadlineRiskLevel(gapRatio),
      title: `Upcoming ${entry.regulation} Deadline`,
      description: `Deadline on ${entry.deadline} (${days} days) with readiness ${readiness}% against a target of ${entry.threshold}%.`,
      predicted_impact: `${Math.round(risk.miss_probability * 100)}% chance of missing the deadline; ${risk.penalty_severity} penalty exposure (${risk.typical_penalty})`,
      recommended_actions: [
        `Review the ${entry.regulation} requirements`,
        "Prepare the required documentation",
        "Consider professional assistance",
      ],
      timeline_days: Math.max(1, days),
      confidence_score: confidence(0.4 + 0.6 * result.data_completeness),
      data_sources: ["regulatory_calendar", "readiness_score", "esg_scoring"],
    });
  }

  return drafts;
}

function trendDeclineRule(result: ScoreResult, previousTrend: TrendDirection | null): AlertDraft[] {
  if (result.trend !== "declining" || previousTrend !== "declining") return [];
  const delta = result.trend_delta ?? 0;
  return [
    {
      alert_type: "trend_decline",
      window: "overall",
      risk_level: delta <= DECLINE_HIGH_DELTA ? "high" : "medium",
      title: "Declining ESG Performance",
      description: `Your overall score is ${Math.abs(delta)} points below its recent average for the second evaluation in a row.`,
      predicted_impact: "Continued decline may open compliance gaps and raise stakeholder concern",
      recommended_actions: [
        "Investigate the causes of the decline",
        "Put corrective measures in place",
        "Track progress at every assessment",
      ],
      timeline_days: DECLINE_TIMELINE_DAYS,
      confidence_score: confidence(0.4 + 0.6 * result.data_completeness),
      data_sources: ["trend_analysis", "esg_scoring"],
    },
  ];
}

export function evaluateRules(input: AlertGenerationInput): AlertDraft[] {
  return [
    ...complianceGapRule(input.result),
    ...regulatoryDeadlineRule(input.result, input.industry, input.calendar, input.now),
    ...trendDeclineRule(input.result, input.previousTrend),
  ];
}

// ============================================================
// UPSERT
// ============================================================

function isActive(alert: PredictiveAlert, now: Date): boolean {
  return Date.parse(alert.expires_at) > now.getTime();
}

function fromDraft(userId: string, draft: AlertDraft, createdAt: string, now: Date): PredictiveAlert {
  return {
    id: alertId(userId, draft.alert_type, draft.window),
    user_id: userId,
    alert_type: draft.alert_type,
    risk_level: draft.risk_level,
    title: draft.title,
    description: draft.description,
    predicted_impact: draft.predicted_impact,
    recommended_actions: draft.recommended_actions,
    timeline_days: draft.timeline_days,
    confidence_score: draft.confidence_score,
    data_sources: draft.data_sources,
    is_resolved: false,
    created_at: createdAt,
    expires_at: new Date(now.getTime() + draft.timeline_days * DAY_MS).toISOString(),
    resolved_at: null,
  };
}

/**
 * Evaluates every rule and merges the matches with stored alerts:
 * new id or expired → new episode; active unresolved → refreshed
 * (created_at kept); active resolved → left as is.
 */
export function generateAlerts(input: AlertGenerationInput): AlertGenerationOutcome {
  const { userId, now } = input;
  const stored = new Map(input.existing.map((a) => [a.id, a]));
  const outcome: AlertGenerationOutcome = { alerts: [], created: [], refreshed: [], unchanged: [] };

  for (const draft of evaluateRules(input)) {
    const id = alertId(userId, draft.alert_type, draft.window);
    const current = stored.get(id);

    if (!current || !isActive(current, now)) {
      outcome.alerts.push(fromDraft(userId, draft, now.toISOString(), now));
      outcome.created.push(id);
    } else if (current.is_resolved) {
      outcome.unchanged.push(id);
    } else {
      outcome.alerts.push(fromDraft(userId, draft, current.created_at, now));
      outcome.refreshed.push(id);
    }
  }

  outcome.alerts.sort(
    (a, b) => RISK_ORDER[a.risk_level] - RISK_ORDER[b.risk_level] || a.timeline_days - b.timeline_days
  );
  return outcome;
}
