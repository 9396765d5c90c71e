// esg-backend/src/services/scoring.ts
// Deterministic Scoring Engine: category scorer + aggregator

import type { CategoryWeights, ScoringConfig } from "../config";
import { IncompleteAssessmentError } from "../errors";
import {
  Badge,
  CATEGORIES,
  Category,
  NormalizedMetric,
  QuestionCatalog,
} from "../types/assessment";
import { subcategoriesOf } from "../catalog/questionCatalog";

// ============================================================
// FORMULA VERSION & THRESHOLDS
// ============================================================

export const FORMULA_VERSION = "v2-renormalized-weighted-avg";

const MAX_LISTED_AREAS = 5;

/**
 * Badge step function (lower bound inclusive), highest first
 */
const BADGE_STEPS: ReadonlyArray<{ min: number; badge: Badge }> = [
  { min: 90, badge: "ESG Champion" },
  { min: 80, badge: "Green Leader" },
  { min: 70, badge: "Sustainability Star" },
  { min: 60, badge: "Eco Improver" },
  { min: 50, badge: "ESG Starter" },
  { min: 0, badge: "ESG Beginner" },
];

export function roundScore(value: number): number {
  return Math.round(value * 10) / 10;
}

function weightedMean(entries: Array<{ value: number; weight: number }>): number | null {
  if (entries.length === 0) return null;

  const totalWeight = entries.reduce((s, e) => s + e.weight, 0);
  if (totalWeight === 0) {
    // all weights zero: plain mean
    return entries.reduce((s, e) => s + e.value, 0) / entries.length;
  }
  return entries.reduce((s, e) => s + e.value * e.weight, 0) / totalWeight;
}

// ============================================================
// SCORING FUNCTIONS
// ============================================================

/**
 * Weighted mean (0–100) of the answered questions in each subcategory.
 * Weights are renormalized over answered questions only; a subcategory
 * with no answers is null.
 */
export function computeSubcategoryScores(
  metrics: NormalizedMetric[],
  catalog: QuestionCatalog
): Record<string, number | null> {
  const scores: Record<string, number | null> = {};

  for (const { subcategory } of subcategoriesOf(catalog)) {
    const answered = metrics
      .filter((m) => m.subcategory === subcategory)
      .map((m) => ({ value: m.value * 100, weight: m.weight }));
    scores[subcategory] = weightedMean(answered);
  }

  return scores;
}

/**
 * Weighted mean of non-null subcategories with the catalog's
 * category-internal weights. All subcategories null → null.
 */
export function computeCategoryScores(
  subcategoryScores: Record<string, number | null>,
  catalog: QuestionCatalog
): Record<Category, number | null> {
  const result: Record<Category, number | null> = {
    environmental: null,
    social: null,
    governance: null,
  };

  for (const category of CATEGORIES) {
    const present: Array<{ value: number; weight: number }> = [];
    for (const [subcategory, weight] of Object.entries(catalog.subcategory_weights[category])) {
      const score = subcategoryScores[subcategory];
      if (score !== null && score !== undefined) {
        present.push({ value: score, weight });
      }
    }
    result[category] = weightedMean(present);
  }

  return result;
}

/**
 * Overall score over non-null categories, weights renormalized to the
 * categories actually present. Null when no category is scored.
 */
export function computeOverallScore(
  categoryScores: Record<Category, number | null>,
  weights: CategoryWeights
): number | null {
  let weightedSum = 0;
  let totalWeight = 0;

  for (const category of CATEGORIES) {
    const score = categoryScores[category];
    if (score === null) continue;
    weightedSum += score * weights[category];
    totalWeight += weights[category];
  }

  if (totalWeight === 0) {
    return null;
  }

  return weightedSum / totalWeight;
}

export function determineBadge(score: number): Badge {
  for (const step of BADGE_STEPS) {
    if (score >= step.min) return step.badge;
  }
  return "ESG Beginner";
}

export function computeLevel(score: number): number {
  return Math.min(10, Math.floor(score / 10) + 1);
}

/**
 * Improvement areas: below threshold, worst first.
 * Strengths: at or above threshold, best first.
 * Ties are ordered by subcategory name.
 */
export function analyzePerformance(
  subcategoryScores: Record<string, number | null>,
  improvementThreshold: number,
  strengthThreshold: number
): { improvement_areas: string[]; strengths: string[] } {
  const scored = Object.entries(subcategoryScores).flatMap(([name, score]) =>
    score === null ? [] : [{ name, score }]
  );
  const byName = (a: { name: string }, b: { name: string }) => a.name.localeCompare(b.name);

  const improvement_areas = scored
    .filter((s) => s.score < improvementThreshold)
    .sort((a, b) => a.score - b.score || byName(a, b))
    .slice(0, MAX_LISTED_AREAS)
    .map((s) => s.name);

  const strengths = scored
    .filter((s) => s.score >= strengthThreshold)
    .sort((a, b) => b.score - a.score || byName(a, b))
    .slice(0, MAX_LISTED_AREAS)
    .map((s) => s.name);

  return { improvement_areas, strengths };
}

/**
 * Fraction of catalog questions with a valid answer
 */
export function computeCompleteness(metrics: NormalizedMetric[], catalog: QuestionCatalog): number {
  if (catalog.questions.length === 0) return 0;
  const answered = new Set(metrics.map((m) => m.question_id));
  return answered.size / catalog.questions.length;
}

// ============================================================
// MAIN BUILDER
// ============================================================

export interface AggregatedScore {
  overall_score: number;
  category_scores: Record<Category, number | null>;
  subcategory_scores: Record<string, number | null>;
  badge: Badge;
  level: number;
  improvement_areas: string[];
  strengths: string[];
  data_completeness: number;
}

function roundNullable(value: number | null): number | null {
  return value === null ? null : roundScore(value);
}

function roundSubcategories(scores: Record<string, number | null>): Record<string, number | null> {
  return Object.fromEntries(Object.entries(scores).map(([name, value]) => [name, roundNullable(value)]));
}

/**
 * Metrics → rounded category/subcategory/overall scores, badge and level.
 * Throws IncompleteAssessmentError below the completeness floor.
 */
export function aggregateScores(
  metrics: NormalizedMetric[],
  catalog: QuestionCatalog,
  config: ScoringConfig
): AggregatedScore {
  const completeness = computeCompleteness(metrics, catalog);
  if (completeness < config.minCompleteness) {
    throw new IncompleteAssessmentError(completeness, config.minCompleteness);
  }

  const rawSubcategories = computeSubcategoryScores(metrics, catalog);
  const rawCategories = computeCategoryScores(rawSubcategories, catalog);
  const rawOverall = computeOverallScore(rawCategories, config.categoryWeights);
  if (rawOverall === null) {
    throw new IncompleteAssessmentError(completeness, config.minCompleteness);
  }

  const overall_score = roundScore(rawOverall);
  const subcategory_scores = roundSubcategories(rawSubcategories);
  const { improvement_areas, strengths } = analyzePerformance(
    subcategory_scores,
    config.improvementThreshold,
    config.strengthThreshold
  );

  return {
    overall_score,
    category_scores: {
      environmental: roundNullable(rawCategories.environmental),
      social: roundNullable(rawCategories.social),
      governance: roundNullable(rawCategories.governance),
    },
    subcategory_scores,
    badge: determineBadge(overall_score),
    level: computeLevel(overall_score),
    improvement_areas,
    strengths,
    data_completeness: Math.round(completeness * 1000) / 1000,
  };
}
