// esg-backend/src/types/assessment.ts
// Assessment & Score Schema v1

export const CATEGORIES = ["environmental", "social", "governance"] as const;
export type Category = (typeof CATEGORIES)[number];

export type ValueType = "numeric" | "boolean" | "percentage";

/**
 * Where an answer came from
 * - user_input: typed by the user
 * - csv_import: bulk upload (values usually arrive as strings)
 * - llm_suggested: proposed by a suggestion provider, never authoritative
 */
export type Provenance = "user_input" | "llm_suggested" | "csv_import";

export type Direction = "higher_is_better" | "lower_is_better";

export interface Answer {
  question_id: string;
  raw_value: number | boolean | string | null;
  value_type: ValueType;
  provenance: Provenance;
}

export interface ValidRange {
  min: number;
  max: number;
}

export interface QuestionDefinition {
  question_id: string;
  category: Category;
  subcategory: string;
  prompt: string;
  value_type: ValueType;
  weight: number;
  valid_range: ValidRange;
  direction: Direction;
  industry_default: number | boolean;
  unit?: string;
}

/**
 * Immutable catalog: questions plus category-internal subcategory weights
 */
export interface QuestionCatalog {
  version: string;
  questions: ReadonlyArray<QuestionDefinition>;
  subcategory_weights: Readonly<Record<Category, Readonly<Record<string, number>>>>;
}

export interface NormalizedMetric {
  question_id: string;
  category: Category;
  subcategory: string;
  weight: number;
  value: number; // 0–1
  provenance: Provenance;
  clamped: boolean;
}

export type TrendDirection =
  | "improving"
  | "declining"
  | "stable"
  | "insufficient_data";

export const BADGES = [
  "ESG Beginner",
  "ESG Starter",
  "Eco Improver",
  "Sustainability Star",
  "Green Leader",
  "ESG Champion",
] as const;
export type Badge = (typeof BADGES)[number];

/**
 * Scoring engine output. Immutable, one per computation.
 */
export interface ScoreResult {
  overall_score: number;
  category_scores: Record<Category, number | null>;
  subcategory_scores: Record<string, number | null>;
  badge: Badge;
  level: number;
  industry_percentile: number | null;
  benchmark_degraded: boolean;
  trend: TrendDirection;
  trend_delta: number | null;
  improvement_areas: string[];
  strengths: string[];
  data_completeness: number; // 0–1
  llm_suggested_questions: string[];
  calculated_at: string; // ISO8601
}

export interface ScoreHistoryEntry {
  id: string;
  user_id: string;
  industry: string;
  sequence: number;
  result: ScoreResult;
}

export interface IndustryBenchmark {
  industry: string;
  scope: string; // "overall" | category | subcategory
  mean: number;
  stddev: number;
  sample_size: number;
}

export type CompanySize = "micro" | "small" | "medium" | "large";
