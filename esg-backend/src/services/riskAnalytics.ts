// esg-backend/src/services/riskAnalytics.ts
// Penalty warnings, ROI estimate and risk dashboard on top of the readiness model

import type { ScoreResult } from "../types/assessment";
import type {
  AlertType,
  PenaltySeverity,
  PredictiveAlert,
  RegulatoryCalendarEntry,
  RiskLevel,
} from "../types/alerts";
import { RISK_ORDER } from "./predictive";
import { daysUntil, EscalationLevel, penaltyRisk, ReadinessIndex, readinessFor } from "./readiness";

// ============================================================
// CONSTANTS
// ============================================================

const WARNING_HORIZON_DAYS = 90;
const WARNING_MILESTONES = [3, 7, 14, 30, 60, 90] as const;

const ROI_HORIZON_DAYS = 60;
const OPERATIONAL_TARGET = 70;

/** Expected cost of a missed deadline per penalty severity (USD) */
const SEVERITY_AMOUNT: Record<PenaltySeverity, number> = {
  low: 2000,
  medium: 5000,
  high: 10000,
};

/** Savings per point of gap to the operational target (USD) */
const SAVINGS_PER_POINT = { energy: 30, waste: 20 } as const;

const NEXT_ACTIONS_LIMIT = 3;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

// ============================================================
// PENALTY WARNINGS
// ============================================================

export interface PenaltyWarning {
  track: string;
  regulation: string;
  deadline: string;
  days_until_deadline: number;
  /** smallest warning mark (90/60/30/14/7/3 days) the deadline falls within */
  milestone_days: number;
  escalation_level: EscalationLevel;
  risk_level: RiskLevel;
  readiness: number;
  miss_probability: number;
  penalty_severity: PenaltySeverity;
  title: string;
  description: string;
  predicted_impact: string;
  recommended_actions: string[];
  confidence_score: number;
}

function milestoneFor(days: number): number {
  return WARNING_MILESTONES.find((mark) => days <= mark) ?? WARNING_HORIZON_DAYS;
}

function warningRiskLevel(escalationLevel: EscalationLevel, missProbability: number): RiskLevel {
  if (escalationLevel === "critical" || missProbability >= 0.7) return "critical";
  if (escalationLevel === "high" || missProbability >= 0.5) return "high";
  return "medium";
}

/**
 * Early warnings for every deadline within 90 days, escalating as the
 * deadline crosses each warning mark. Most urgent first.
 */
export function penaltyWarnings(
  result: ScoreResult,
  entries: RegulatoryCalendarEntry[],
  now: Date
): PenaltyWarning[] {
  const warnings: PenaltyWarning[] = [];

  for (const entry of entries) {
    const days = daysUntil(entry.deadline, now);
    if (days < 0 || days > WARNING_HORIZON_DAYS) continue;

    const readiness = readinessFor(entry, result);
    const risk = penaltyRisk(entry, readiness, days);

    warnings.push({
      track: entry.id,
      regulation: entry.regulation,
      deadline: entry.deadline,
      days_until_deadline: days,
      milestone_days: milestoneFor(days),
      escalation_level: risk.escalation_level,
      risk_level: warningRiskLevel(risk.escalation_level, risk.miss_probability),
      readiness,
      miss_probability: risk.miss_probability,
      penalty_severity: risk.penalty_severity,
      title: `Penalty Risk: ${entry.regulation} in ${days} days`,
      description: `Readiness ${Math.round(readiness)}%. Estimated miss probability ${Math.round(risk.miss_probability * 100)}% with ${risk.penalty_severity} severity if missed.`,
      predicted_impact: risk.typical_penalty,
      recommended_actions: [
        `Assign an owner for ${entry.regulation}`,
        "Prepare required documentation and evidence",
        "Schedule an internal review within 7 days",
      ],
      confidence_score: round2(Math.max(0.5, 1 - Math.abs(readiness - 50) / 100)),
    });
  }

  return warnings.sort(
    (a, b) => RISK_ORDER[a.risk_level] - RISK_ORDER[b.risk_level] || a.days_until_deadline - b.days_until_deadline
  );
}

// ============================================================
// ROI ESTIMATE
// ============================================================

export interface RoiEstimate {
  avoided_penalties_estimate: number;
  operational_savings_estimate: number;
  total_potential_roi: number;
}

function savingsFor(score: number | null, perPoint: number): number {
  if (score === null) return 0;
  return Math.max(0, OPERATIONAL_TARGET - score) * perPoint;
}

/**
 * Expected penalties avoided over the next 60 days plus energy and waste
 * savings from closing the gap to 70. Unscored subcategories add nothing.
 */
export function estimateRoi(result: ScoreResult, entries: RegulatoryCalendarEntry[], now: Date): RoiEstimate {
  let avoided = 0;
  for (const entry of entries) {
    const days = daysUntil(entry.deadline, now);
    if (days < 0 || days > ROI_HORIZON_DAYS) continue;
    const risk = penaltyRisk(entry, readinessFor(entry, result), days);
    avoided += risk.miss_probability * SEVERITY_AMOUNT[risk.penalty_severity];
  }

  const savings =
    savingsFor(result.subcategory_scores.energy ?? null, SAVINGS_PER_POINT.energy) +
    savingsFor(result.subcategory_scores.waste ?? null, SAVINGS_PER_POINT.waste);

  return {
    avoided_penalties_estimate: round2(avoided),
    operational_savings_estimate: round2(savings),
    total_potential_roi: round2(avoided + savings),
  };
}

// ============================================================
// RISK DASHBOARD
// ============================================================

export interface RiskDashboard {
  risk_summary: {
    total_alerts: number;
    critical_alerts: number;
    high_risk_alerts: number;
    average_timeline_days: number;
  };
  alert_distribution: Record<AlertType, number>;
  next_actions: string[];
  compliance_readiness: {
    readiness_index: number | null;
    next_deadline_days: number | null;
    risk_level: RiskLevel;
  };
}

/**
 * Summary of the open (active, unresolved) alerts next to the readiness index.
 */
export function riskDashboard(active: PredictiveAlert[], readiness: ReadinessIndex): RiskDashboard {
  const open = active
    .filter((a) => !a.is_resolved)
    .sort((a, b) => RISK_ORDER[a.risk_level] - RISK_ORDER[b.risk_level] || a.timeline_days - b.timeline_days);

  const distribution: Record<AlertType, number> = {
    compliance_gap: 0,
    regulatory_deadline: 0,
    trend_decline: 0,
  };
  for (const alert of open) distribution[alert.alert_type] += 1;

  const totalTimeline = open.reduce((sum, a) => sum + a.timeline_days, 0);
  const deadlines = readiness.tracks.map((t) => t.days_until_deadline);

  return {
    risk_summary: {
      total_alerts: open.length,
      critical_alerts: open.filter((a) => a.risk_level === "critical").length,
      high_risk_alerts: open.filter((a) => a.risk_level === "high").length,
      average_timeline_days: open.length === 0 ? 0 : round1(totalTimeline / open.length),
    },
    alert_distribution: distribution,
    next_actions: open
      .slice(0, NEXT_ACTIONS_LIMIT)
      .flatMap((a) => (a.recommended_actions.length > 0 ? [a.recommended_actions[0]] : [])),
    compliance_readiness: {
      readiness_index: readiness.readiness_index,
      next_deadline_days: deadlines.length === 0 ? null : Math.min(...deadlines),
      risk_level: open.length === 0 ? "low" : open[0].risk_level,
    },
  };
}
