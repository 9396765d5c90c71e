// esg-backend/src/catalog/questionCatalog.ts
// Question catalog: loaded once, validated, frozen

import { z } from "zod";
import catalogJson from "../data/question-catalog.json";
import { CatalogValidationError } from "../errors";
import { CATEGORIES, Category, QuestionCatalog, QuestionDefinition } from "../types/assessment";

const WEIGHT_SUM_TOLERANCE = 1e-9;

const QuestionDefinitionSchema = z.object({
  question_id: z.string().min(1),
  category: z.enum(CATEGORIES),
  subcategory: z.string().min(1),
  prompt: z.string().min(1),
  value_type: z.enum(["numeric", "boolean", "percentage"]),
  unit: z.string().optional(),
  weight: z.number().min(0).max(1),
  valid_range: z.object({ min: z.number(), max: z.number() }),
  direction: z.enum(["higher_is_better", "lower_is_better"]),
  industry_default: z.union([z.number(), z.boolean()]),
});

const SubcategoryWeightsSchema = z.record(z.string(), z.number().min(0).max(1));

const CatalogSchema = z.object({
  version: z.string(),
  subcategory_weights: z.object({
    environmental: SubcategoryWeightsSchema,
    social: SubcategoryWeightsSchema,
    governance: SubcategoryWeightsSchema,
  }),
  questions: z.array(QuestionDefinitionSchema).min(1),
});

/**
 * Validates raw catalog data and returns a frozen catalog.
 * Throws CatalogValidationError listing every violated invariant.
 */
export function buildCatalog(raw: unknown): QuestionCatalog {
  const parsed = CatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CatalogValidationError(
      "question catalog",
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }

  const { version, subcategory_weights, questions } = parsed.data;
  const issues: string[] = [];

  for (const category of CATEGORIES) {
    const weights = Object.values(subcategory_weights[category]);
    const total = weights.reduce((a, b) => a + b, 0);
    if (weights.length === 0) {
      issues.push(`${category}: no subcategories defined`);
    } else if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
      issues.push(`${category}: subcategory weights sum to ${total}, expected 1.0`);
    }
  }

  const seen = new Set<string>();
  for (const q of questions) {
    if (seen.has(q.question_id)) {
      issues.push(`${q.question_id}: duplicate question_id`);
    }
    seen.add(q.question_id);

    if (!(q.subcategory in subcategory_weights[q.category])) {
      issues.push(`${q.question_id}: subcategory "${q.subcategory}" not defined for ${q.category}`);
    }
    if (q.valid_range.min >= q.valid_range.max) {
      issues.push(`${q.question_id}: valid_range.min must be below valid_range.max`);
    }
    if (q.value_type === "boolean" && typeof q.industry_default !== "boolean") {
      issues.push(`${q.question_id}: boolean question needs a boolean industry_default`);
    }
    if (q.value_type !== "boolean" && typeof q.industry_default !== "number") {
      issues.push(`${q.question_id}: ${q.value_type} question needs a numeric industry_default`);
    }
  }

  const subcategoryOwners = new Map<string, Category>();
  for (const category of CATEGORIES) {
    for (const sub of Object.keys(subcategory_weights[category])) {
      const owner = subcategoryOwners.get(sub);
      if (owner) {
        issues.push(`subcategory "${sub}" defined under both ${owner} and ${category}`);
      }
      subcategoryOwners.set(sub, category);
    }
  }

  if (issues.length > 0) {
    throw new CatalogValidationError("question catalog", issues);
  }

  const frozenQuestions: QuestionDefinition[] = questions.map((q) =>
    Object.freeze({ ...q, valid_range: Object.freeze({ ...q.valid_range }) })
  );

  return Object.freeze({
    version,
    questions: Object.freeze(frozenQuestions),
    subcategory_weights: Object.freeze({
      environmental: Object.freeze({ ...subcategory_weights.environmental }),
      social: Object.freeze({ ...subcategory_weights.social }),
      governance: Object.freeze({ ...subcategory_weights.governance }),
    }),
  });
}

let defaultCatalog: QuestionCatalog | null = null;

export function loadDefaultCatalog(): QuestionCatalog {
  if (!defaultCatalog) {
    defaultCatalog = buildCatalog(catalogJson);
  }
  return defaultCatalog;
}

export function questionIndex(catalog: QuestionCatalog): Map<string, QuestionDefinition> {
  return new Map(catalog.questions.map((q) => [q.question_id, q]));
}

/**
 * Subcategory names in catalog order (category by category)
 */
export function subcategoriesOf(catalog: QuestionCatalog): Array<{ category: Category; subcategory: string }> {
  return CATEGORIES.flatMap((category) =>
    Object.keys(catalog.subcategory_weights[category]).map((subcategory) => ({ category, subcategory }))
  );
}
