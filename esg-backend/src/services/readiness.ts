// esg-backend/src/services/readiness.ts
// Regulatory readiness: per-track readiness, penalty model, readiness index

import { CATEGORIES, Category, ScoreResult } from "../types/assessment";
import type { PenaltySeverity, RegulatoryCalendarEntry } from "../types/alerts";

const DAY_MS = 24 * 60 * 60 * 1000;

export type EscalationLevel = "normal" | "elevated" | "high" | "critical";

export interface PenaltyRisk {
  penalty_severity: PenaltySeverity;
  typical_penalty: string;
  escalation_level: EscalationLevel;
  miss_probability: number;
}

export interface ReadinessTrack {
  track: string;
  regulation: string;
  readiness: number;
  days_until_deadline: number;
  penalty_severity: PenaltySeverity;
  miss_probability: number;
}

export interface ReadinessIndex {
  readiness_index: number | null;
  tracks: ReadinessTrack[];
}

const SEVERITY_WEIGHT: Record<PenaltySeverity, number> = {
  low: 1.0,
  medium: 1.25,
  high: 1.5,
};

function isCategory(metric: string): metric is Category {
  return CATEGORIES.some((c) => c === metric);
}

/**
 * Whole calendar days from `now` to an ISO date (UTC). Negative once passed.
 */
export function daysUntil(deadline: string, now: Date): number {
  const target = Math.floor(Date.parse(deadline) / DAY_MS);
  const today = Math.floor(now.getTime() / DAY_MS);
  return target - today;
}

function metricValue(result: ScoreResult, metric: string): number | null {
  if (metric === "overall") return result.overall_score;
  if (isCategory(metric)) return result.category_scores[metric];
  return result.subcategory_scores[metric] ?? null;
}

/**
 * Weighted mean of the entry's readiness metrics, renormalized over
 * metrics that have a score. No scored metric → 0.
 */
export function readinessFor(entry: RegulatoryCalendarEntry, result: ScoreResult): number {
  let sum = 0;
  let total = 0;
  for (const { metric, weight } of entry.readiness) {
    const value = metricValue(result, metric);
    if (value === null) continue;
    sum += value * weight;
    total += weight;
  }
  if (total === 0) return 0;
  return Math.round((sum / total) * 10) / 10;
}

function timeFactor(days: number): number {
  if (days <= 7) return 0.25;
  if (days <= 14) return 0.2;
  if (days <= 30) return 0.15;
  if (days <= 60) return 0.1;
  if (days <= 90) return 0.05;
  return 0;
}

function escalation(days: number): EscalationLevel {
  if (days <= 7) return "critical";
  if (days <= 14) return "high";
  if (days <= 30) return "elevated";
  return "normal";
}

/**
 * Low readiness and a near deadline raise the miss probability
 * (bounded to [0.05, 0.95]).
 */
export function penaltyRisk(entry: RegulatoryCalendarEntry, readiness: number, days: number): PenaltyRisk {
  const base = Math.max(0, 0.7 - readiness / 100);
  const miss = Math.min(0.95, Math.max(0.05, base + timeFactor(days)));
  return {
    penalty_severity: entry.penalty_severity,
    typical_penalty: entry.typical_penalty,
    escalation_level: escalation(days),
    miss_probability: Math.round(miss * 100) / 100,
  };
}

function trackWeight(track: ReadinessTrack): number {
  const days = track.days_until_deadline;
  const timeWeight = days <= 30 ? 1.5 : days <= 60 ? 1.2 : 1.0;
  return SEVERITY_WEIGHT[track.penalty_severity] * timeWeight;
}

export function readinessIndex(
  result: ScoreResult,
  entries: RegulatoryCalendarEntry[],
  now: Date
): ReadinessIndex {
  const tracks: ReadinessTrack[] = [];

  for (const entry of entries) {
    const days = daysUntil(entry.deadline, now);
    if (days < 0) continue;
    const readiness = readinessFor(entry, result);
    const risk = penaltyRisk(entry, readiness, days);
    tracks.push({
      track: entry.id,
      regulation: entry.regulation,
      readiness,
      days_until_deadline: days,
      penalty_severity: risk.penalty_severity,
      miss_probability: risk.miss_probability,
    });
  }

  if (tracks.length === 0) {
    return { readiness_index: null, tracks };
  }

  const totalWeight = tracks.reduce((s, t) => s + trackWeight(t), 0);
  const index = tracks.reduce((s, t) => s + t.readiness * trackWeight(t), 0) / totalWeight;

  return { readiness_index: Math.round(index * 10) / 10, tracks };
}
