// esg-backend/src/services/presenter.ts
// Flat response shape for dashboards

import type { Badge, ScoreResult, TrendDirection } from "../types/assessment";
import { recommendationsFor } from "./recommendations";

export interface EnhancedScore {
  overall_score: number;
  environmental_score: number | null;
  social_score: number | null;
  governance_score: number | null;
  emissions_score: number | null;
  energy_score: number | null;
  waste_score: number | null;
  diversity_score: number | null;
  employee_score: number | null;
  community_score: number | null;
  ethics_score: number | null;
  transparency_score: number | null;
  badge: Badge;
  level: number;
  improvement_areas: string[];
  strengths: string[];
  industry_percentile: number | null;
  trend: TrendDirection;
  calculated_at: string;
  quick_wins: string[];
  long_term_goals: string[];
}

export function toEnhancedScore(result: ScoreResult): EnhancedScore {
  const sub = (name: string): number | null => result.subcategory_scores[name] ?? null;
  const { quick_wins, long_term_goals } = recommendationsFor(result.category_scores);

  return {
    overall_score: result.overall_score,
    environmental_score: result.category_scores.environmental,
    social_score: result.category_scores.social,
    governance_score: result.category_scores.governance,
    emissions_score: sub("emissions"),
    energy_score: sub("energy"),
    waste_score: sub("waste"),
    diversity_score: sub("diversity"),
    employee_score: sub("employee"),
    community_score: sub("community"),
    ethics_score: sub("ethics"),
    transparency_score: sub("transparency"),
    badge: result.badge,
    level: result.level,
    improvement_areas: result.improvement_areas,
    strengths: result.strengths,
    industry_percentile: result.industry_percentile,
    trend: result.trend,
    calculated_at: result.calculated_at,
    quick_wins,
    long_term_goals,
  };
}
