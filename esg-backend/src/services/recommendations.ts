// esg-backend/src/services/recommendations.ts
// Template enrichment: quick wins, long-term goals, preventive actions.
// Not part of ScoreResult.

import { z } from "zod";
import templatesJson from "../data/action-templates.json";
import { CatalogValidationError } from "../errors";
import { CATEGORIES, Category, ScoreResult } from "../types/assessment";

const QUICK_WIN_BELOW = 60;
const LONG_TERM_BELOW = 70;
const MAX_ITEMS = 5;
const PREVENTIVE_MARGIN = 10;

/**
 * Per-category risk thresholds; above "medium" a category is out of risk
 */
export const RISK_THRESHOLDS: Record<Category, { critical: number; high: number; medium: number }> = {
  environmental: { critical: 30, high: 45, medium: 60 },
  social: { critical: 35, high: 50, medium: 65 },
  governance: { critical: 40, high: 55, medium: 70 },
};

const PerCategory = z.object({
  environmental: z.array(z.string()),
  social: z.array(z.string()),
  governance: z.array(z.string()),
});

const TemplatesSchema = z.object({
  quick_wins: PerCategory,
  long_term_goals: PerCategory,
  category_actions: PerCategory,
});

export type ActionTemplates = z.infer<typeof TemplatesSchema>;

let cached: ActionTemplates | null = null;

export function loadActionTemplates(): ActionTemplates {
  if (cached) return cached;
  const parsed = TemplatesSchema.safeParse(templatesJson);
  if (!parsed.success) {
    throw new CatalogValidationError(
      "action templates",
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  cached = parsed.data;
  return cached;
}

export interface Recommendations {
  quick_wins: string[];
  long_term_goals: string[];
}

export function recommendationsFor(categoryScores: Record<Category, number | null>): Recommendations {
  const templates = loadActionTemplates();
  const quick_wins: string[] = [];
  const long_term_goals: string[] = [];

  for (const category of CATEGORIES) {
    const score = categoryScores[category];
    if (score === null) continue;
    if (score < QUICK_WIN_BELOW) quick_wins.push(...templates.quick_wins[category]);
    if (score < LONG_TERM_BELOW) long_term_goals.push(...templates.long_term_goals[category]);
  }

  return {
    quick_wins: quick_wins.slice(0, MAX_ITEMS),
    long_term_goals: long_term_goals.slice(0, MAX_ITEMS),
  };
}

export function categoryActions(category: Category): string[] {
  return [...loadActionTemplates().category_actions[category]];
}

export interface ProactiveRecommendation {
  type: "preventive_action";
  category: Category;
  priority: "medium";
  title: string;
  description: string;
  actions: string[];
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * Categories sitting just above their medium-risk threshold
 * (medium < score ≤ medium + 10).
 */
export function proactiveRecommendations(result: ScoreResult): ProactiveRecommendation[] {
  const recommendations: ProactiveRecommendation[] = [];

  for (const category of CATEGORIES) {
    const score = result.category_scores[category];
    if (score === null) continue;
    const { medium } = RISK_THRESHOLDS[category];
    if (score > medium && score <= medium + PREVENTIVE_MARGIN) {
      recommendations.push({
        type: "preventive_action",
        category,
        priority: "medium",
        title: `Strengthen ${capitalize(category)} Performance`,
        description: `Your ${category} score of ${score} is close to the risk threshold of ${medium}. Act now to keep it out of the risk zone.`,
        actions: categoryActions(category),
      });
    }
  }

  return recommendations;
}
