// esg-backend/src/errors.ts

export type EsgErrorCode =
  | "UNKNOWN_QUESTION"
  | "MALFORMED_ANSWER"
  | "DUPLICATE_ANSWER"
  | "INCOMPLETE_ASSESSMENT"
  | "ALERT_GENERATION_FAILED"
  | "CATALOG_INVALID"
  | "SUGGESTION_UNAVAILABLE"
  | "CONFIG_INVALID"
  | "NOT_FOUND";

export type WarningCode =
  | "UNKNOWN_QUESTION"
  | "MALFORMED_ANSWER"
  | "DUPLICATE_ANSWER"
  | "ANSWER_CLAMPED"
  | "DEGRADED_BENCHMARK";

/**
 * Non-fatal issue returned next to a result
 */
export interface EngineWarning {
  code: WarningCode;
  message: string;
  question_id?: string;
}

export class EsgEngineError extends Error {
  readonly code: EsgErrorCode;

  constructor(code: EsgErrorCode, message: string) {
    super(message);
    this.name = "EsgEngineError";
    this.code = code;
  }
}

// ============================================================
// ANSWER VALIDATION (recovered locally: answer dropped)
// ============================================================

export class ValidationError extends EsgEngineError {
  readonly question_id: string;

  constructor(code: "UNKNOWN_QUESTION" | "MALFORMED_ANSWER" | "DUPLICATE_ANSWER", questionId: string, message: string) {
    super(code, message);
    this.name = "ValidationError";
    this.question_id = questionId;
  }

  toWarning(): EngineWarning {
    return {
      code: this.code === "UNKNOWN_QUESTION" || this.code === "DUPLICATE_ANSWER" ? this.code : "MALFORMED_ANSWER",
      message: this.message,
      question_id: this.question_id,
    };
  }
}

export class UnknownQuestionError extends ValidationError {
  constructor(questionId: string) {
    super("UNKNOWN_QUESTION", questionId, `Unknown question_id "${questionId}"`);
    this.name = "UnknownQuestionError";
  }
}

export class MalformedAnswerError extends ValidationError {
  constructor(questionId: string, reason: string) {
    super("MALFORMED_ANSWER", questionId, `Malformed answer for "${questionId}": ${reason}`);
    this.name = "MalformedAnswerError";
  }
}

export class DuplicateAnswerError extends ValidationError {
  constructor(questionId: string) {
    super("DUPLICATE_ANSWER", questionId, `Duplicate answer for "${questionId}" ignored`);
    this.name = "DuplicateAnswerError";
  }
}

// ============================================================
// ENGINE ERRORS
// ============================================================

export class IncompleteAssessmentError extends EsgEngineError {
  readonly completeness: number;
  readonly required: number;

  constructor(completeness: number, required: number) {
    super(
      "INCOMPLETE_ASSESSMENT",
      `Only ${Math.round(completeness * 100)}% of questions answered, at least ${Math.round(required * 100)}% required`
    );
    this.name = "IncompleteAssessmentError";
    this.completeness = completeness;
    this.required = required;
  }
}

export class DegradedBenchmarkWarning implements EngineWarning {
  readonly code = "DEGRADED_BENCHMARK" as const;
  readonly message: string;
  readonly industry: string;
  readonly scope: string;

  constructor(industry: string, scope: string) {
    this.industry = industry;
    this.scope = scope;
    this.message = `No benchmark for industry "${industry}" (${scope}), global benchmark used`;
  }
}

export class AlertGenerationError extends EsgEngineError {
  readonly user_id: string;

  constructor(userId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("ALERT_GENERATION_FAILED", `Alert generation failed for user ${userId}: ${reason}`);
    this.name = "AlertGenerationError";
    this.user_id = userId;
  }
}

export class CatalogValidationError extends EsgEngineError {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super("CATALOG_INVALID", `Invalid ${source}: ${issues.join("; ")}`);
    this.name = "CatalogValidationError";
    this.issues = issues;
  }
}

export class SuggestionUnavailableError extends EsgEngineError {
  readonly attempts: string[];

  constructor(attempts: string[]) {
    super("SUGGESTION_UNAVAILABLE", `No suggestion provider available (${attempts.join(", ") || "none configured"})`);
    this.name = "SuggestionUnavailableError";
    this.attempts = attempts;
  }
}

export class ConfigError extends EsgEngineError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
    this.name = "ConfigError";
  }
}

export class NotFoundError extends EsgEngineError {
  constructor(message: string) {
    super("NOT_FOUND", message);
    this.name = "NotFoundError";
  }
}

/**
 * HTTP status per error code
 */
export function statusForError(error: unknown): number {
  if (!(error instanceof EsgEngineError)) return 500;
  switch (error.code) {
    case "UNKNOWN_QUESTION":
    case "MALFORMED_ANSWER":
    case "DUPLICATE_ANSWER":
      return 400;
    case "INCOMPLETE_ASSESSMENT":
      return 422;
    case "NOT_FOUND":
      return 404;
    case "SUGGESTION_UNAVAILABLE":
      return 503;
    default:
      return 500;
  }
}
