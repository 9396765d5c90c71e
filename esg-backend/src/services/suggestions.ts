// esg-backend/src/services/suggestions.ts
// Answer Suggestion Chain: ordered providers, per-call timeout, circuit breaker.
// Suggestions never feed the scoring math directly; they come back as
// llm_suggested answers the user can accept.

import { SuggestionUnavailableError } from "../errors";
import type { Answer, CompanySize, QuestionCatalog, QuestionDefinition } from "../types/assessment";
import { logger } from "../utils/logger";

export interface SuggestionRequest {
  industry: string;
  companySize: CompanySize | null;
  answers: Answer[];
  catalog: QuestionCatalog;
}

export interface AnswerSuggestionProvider {
  readonly name: string;
  suggest(request: SuggestionRequest, signal: AbortSignal): Promise<Answer[]>;
}

export interface SuggestionResult {
  provider: string;
  suggestions: Answer[];
}

export interface SuggestionChainOptions {
  timeoutMs: number;
  failureThreshold?: number;
  cooldownMs?: number;
  now?: () => number;
}

/**
 * Catalog questions without a user_input or csv_import answer
 */
export function unansweredQuestions(request: SuggestionRequest): QuestionDefinition[] {
  const answered = new Set(
    request.answers.filter((a) => a.provenance !== "llm_suggested").map((a) => a.question_id)
  );
  return request.catalog.questions.filter((q) => !answered.has(q.question_id));
}

// ============================================================
// INDUSTRY DEFAULTS
// ============================================================

export class IndustryDefaultSuggestionProvider implements AnswerSuggestionProvider {
  readonly name = "industry_default";

  async suggest(request: SuggestionRequest): Promise<Answer[]> {
    return unansweredQuestions(request).map((q): Answer => ({
      question_id: q.question_id,
      raw_value: q.industry_default,
      value_type: q.value_type,
      provenance: "llm_suggested",
    }));
  }
}

// ============================================================
// CHAIN
// ============================================================

interface CircuitState {
  consecutiveFailures: number;
  openUntil: number;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class SuggestionChain {
  private readonly providers: AnswerSuggestionProvider[];
  private readonly timeoutMs: number;
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly now: () => number;
  private readonly circuits = new Map<string, CircuitState>();

  constructor(providers: AnswerSuggestionProvider[], options: SuggestionChainOptions) {
    this.providers = providers;
    this.timeoutMs = options.timeoutMs;
    this.failureThreshold = options.failureThreshold ?? 3;
    this.cooldownMs = options.cooldownMs ?? 60_000;
    this.now = options.now ?? Date.now;
  }

  isOpen(providerName: string): boolean {
    const state = this.circuits.get(providerName);
    return state !== undefined && state.openUntil > this.now();
  }

  private recordSuccess(name: string): void {
    this.circuits.delete(name);
  }

  private recordFailure(name: string): void {
    const state = this.circuits.get(name) ?? { consecutiveFailures: 0, openUntil: 0 };
    state.consecutiveFailures += 1;
    if (state.consecutiveFailures >= this.failureThreshold) {
      state.openUntil = this.now() + this.cooldownMs;
      state.consecutiveFailures = 0;
      logger.warn("[SUGGESTIONS] Circuit opened", { provider: name, cooldownMs: this.cooldownMs });
    }
    this.circuits.set(name, state);
  }

  private async callWithTimeout(
    provider: AnswerSuggestionProvider,
    request: SuggestionRequest
  ): Promise<Answer[]> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new Error(`timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([provider.suggest(request, controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * First provider that answers wins. Output is restricted to unanswered
   * catalog questions and forced to provenance llm_suggested.
   */
  async suggest(request: SuggestionRequest): Promise<SuggestionResult> {
    const open = new Map(unansweredQuestions(request).map((q) => [q.question_id, q]));
    const attempts: string[] = [];

    for (const provider of this.providers) {
      if (this.isOpen(provider.name)) {
        attempts.push(`${provider.name}: circuit open`);
        continue;
      }

      try {
        const raw = await this.callWithTimeout(provider, request);
        this.recordSuccess(provider.name);

        const seen = new Set<string>();
        const suggestions: Answer[] = [];
        for (const answer of raw) {
          const question = open.get(answer.question_id);
          if (!question || seen.has(answer.question_id)) continue;
          seen.add(answer.question_id);
          suggestions.push({
            question_id: answer.question_id,
            raw_value: answer.raw_value,
            value_type: question.value_type,
            provenance: "llm_suggested",
          });
        }

        logger.info("[SUGGESTIONS] Suggestions produced", {
          provider: provider.name,
          count: suggestions.length,
        });
        return { provider: provider.name, suggestions };
      } catch (err) {
        this.recordFailure(provider.name);
        attempts.push(`${provider.name}: ${errorMessage(err)}`);
        logger.warn("[SUGGESTIONS] Provider failed", { provider: provider.name, error: errorMessage(err) });
      }
    }

    throw new SuggestionUnavailableError(attempts);
  }
}
