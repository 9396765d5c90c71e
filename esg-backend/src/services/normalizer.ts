// esg-backend/src/services/normalizer.ts
// Answer Normalizer: raw answers → metrics in [0,1]

import {
  DuplicateAnswerError,
  EngineWarning,
  MalformedAnswerError,
  UnknownQuestionError,
  ValidationError,
} from "../errors";
import type { Answer, NormalizedMetric, Provenance, QuestionCatalog, QuestionDefinition } from "../types/assessment";
import { questionIndex } from "../catalog/questionCatalog";

/**
 * A lower-ranked provenance never overrides a higher-ranked one
 */
const PROVENANCE_RANK: Record<Provenance, number> = {
  user_input: 3,
  csv_import: 2,
  llm_suggested: 1,
};

const TRUE_STRINGS = new Set(["true", "yes", "1"]);
const FALSE_STRINGS = new Set(["false", "no", "0"]);

export interface NormalizationResult {
  metrics: NormalizedMetric[];
  warnings: EngineWarning[];
}

function clamp01(value: number): { value: number; clamped: boolean } {
  if (value < 0) return { value: 0, clamped: true };
  if (value > 1) return { value: 1, clamped: true };
  return { value, clamped: false };
}

function toNumber(answer: Answer): number {
  const raw = answer.raw_value;
  let value: number;
  if (typeof raw === "number") {
    value = raw;
  } else if (typeof raw === "string" && raw.trim() !== "") {
    value = Number(raw.trim().replace(/%$/, ""));
  } else {
    throw new MalformedAnswerError(answer.question_id, `expected a number, got ${JSON.stringify(raw)}`);
  }
  if (!Number.isFinite(value)) {
    throw new MalformedAnswerError(answer.question_id, `"${String(raw)}" is not a finite number`);
  }
  return value;
}

function toBoolean(answer: Answer): boolean {
  const raw = answer.raw_value;
  if (typeof raw === "boolean") return raw;
  if (raw === 1 || raw === 0) return raw === 1;
  if (typeof raw === "string") {
    const token = raw.trim().toLowerCase();
    if (TRUE_STRINGS.has(token)) return true;
    if (FALSE_STRINGS.has(token)) return false;
  }
  throw new MalformedAnswerError(answer.question_id, `expected a boolean, got ${JSON.stringify(raw)}`);
}

function scale(answer: Answer, question: QuestionDefinition): { value: number; clamped: boolean } {
  switch (question.value_type) {
    case "boolean":
      return { value: toBoolean(answer) ? 1 : 0, clamped: false };
    case "percentage":
      return clamp01(toNumber(answer) / 100);
    case "numeric": {
      const { min, max } = question.valid_range;
      const linear = clamp01((toNumber(answer) - min) / (max - min));
      return question.direction === "lower_is_better"
        ? { value: 1 - linear.value, clamped: linear.clamped }
        : linear;
    }
  }
}

/**
 * Normalizes one answer against its question. Throws ValidationError.
 */
export function normalizeAnswer(answer: Answer, question: QuestionDefinition): NormalizedMetric {
  if (answer.value_type !== question.value_type) {
    throw new MalformedAnswerError(
      answer.question_id,
      `value_type "${answer.value_type}" does not match catalog type "${question.value_type}"`
    );
  }

  const scaled = scale(answer, question);

  return {
    question_id: question.question_id,
    category: question.category,
    subcategory: question.subcategory,
    weight: question.weight,
    value: scaled.value,
    provenance: answer.provenance,
    clamped: scaled.clamped,
  };
}

/**
 * Picks one metric per question_id by provenance rank.
 * Equal rank: the first one wins, later ones become duplicate warnings.
 */
function resolveProvenance(
  candidates: Array<{ answer: Answer; metric: NormalizedMetric }>,
  warnings: EngineWarning[]
): Array<{ answer: Answer; metric: NormalizedMetric }> {
  const chosen = new Map<string, { answer: Answer; metric: NormalizedMetric }>();
  for (const candidate of candidates) {
    const id = candidate.answer.question_id;
    const current = chosen.get(id);
    if (!current) {
      chosen.set(id, candidate);
      continue;
    }
    const incoming = PROVENANCE_RANK[candidate.answer.provenance];
    const existing = PROVENANCE_RANK[current.answer.provenance];
    if (incoming > existing) {
      chosen.set(id, candidate);
    } else if (incoming === existing) {
      warnings.push(new DuplicateAnswerError(id).toWarning());
    }
  }
  return [...chosen.values()];
}

export function normalizeAnswers(answers: Answer[], catalog: QuestionCatalog): NormalizationResult {
  const index = questionIndex(catalog);
  const warnings: EngineWarning[] = [];
  const candidates: Array<{ answer: Answer; metric: NormalizedMetric }> = [];

  for (const answer of answers) {
    const question = index.get(answer.question_id);
    if (!question) {
      warnings.push(new UnknownQuestionError(answer.question_id).toWarning());
      continue;
    }
    try {
      candidates.push({ answer, metric: normalizeAnswer(answer, question) });
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      warnings.push(err.toWarning());
    }
  }

  const metrics: NormalizedMetric[] = [];
  for (const { answer, metric } of resolveProvenance(candidates, warnings)) {
    if (metric.clamped) {
      warnings.push({
        code: "ANSWER_CLAMPED",
        message: `Value ${JSON.stringify(answer.raw_value)} for "${answer.question_id}" outside valid range, clamped`,
        question_id: answer.question_id,
      });
    }
    metrics.push(metric);
  }

  // catalog order keeps downstream sums independent of submission order
  const order = new Map(catalog.questions.map((q, i) => [q.question_id, i]));
  metrics.sort((a, b) => (order.get(a.question_id) ?? 0) - (order.get(b.question_id) ?? 0));

  return { metrics, warnings };
}
