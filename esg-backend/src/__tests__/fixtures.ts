// esg-backend/src/__tests__/fixtures.ts
// Shared test data

import { loadDefaultCatalog } from "../catalog/questionCatalog";
import type { Answer, Provenance, ScoreResult } from "../types/assessment";

/**
 * One answer per catalog question. Scores with default weights:
 * environmental 57.7, social 65.6, governance 88, overall 69.2
 */
export const FULL_ANSWERS: Record<string, number | boolean> = {
  co2_emissions: 10,
  emissions_reduction_target: true,
  energy_consumption: 100000,
  renewable_energy_share: 40,
  packaging_recyclability: 50,
  recycling_program: false,
  diversity_percentage: 50,
  female_leadership: 40,
  employee_satisfaction: 8.2,
  training_hours: 20,
  community_engagement: true,
  data_privacy_compliance: true,
  ethics_training: 90,
  supplier_code: true,
  transparency_reporting: true,
  board_independence: 50,
};

export function answersFrom(
  values: Record<string, number | boolean | string | null>,
  provenance: Provenance = "user_input"
): Answer[] {
  const catalog = loadDefaultCatalog();
  return Object.entries(values).map(([question_id, raw_value]) => {
    const question = catalog.questions.find((q) => q.question_id === question_id);
    return {
      question_id,
      raw_value,
      value_type: question ? question.value_type : "numeric",
      provenance,
    };
  });
}

export function makeResult(overrides: Partial<ScoreResult> = {}): ScoreResult {
  return {
    overall_score: 69.2,
    category_scores: { environmental: 57.7, social: 65.6, governance: 88 },
    subcategory_scores: {
      emissions: 88,
      energy: 45,
      waste: 30,
      diversity: 46,
      employee: 68,
      community: 100,
      ethics: 96,
      transparency: 80,
    },
    badge: "Eco Improver",
    level: 7,
    industry_percentile: 63.7,
    benchmark_degraded: false,
    trend: "stable",
    trend_delta: 0.5,
    improvement_areas: ["waste", "energy", "diversity"],
    strengths: ["community", "ethics", "emissions", "transparency"],
    data_completeness: 1,
    llm_suggested_questions: [],
    calculated_at: "2026-10-01T09:00:00.000Z",
    ...overrides,
  };
}
