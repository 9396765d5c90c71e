// esg-backend/src/services/anthropicClient.ts
// Anthropic-backed answer suggestions: rate-limited, 429-retrying, JSON-only output

import Anthropic from "@anthropic-ai/sdk";
import { z } from "zod";
import type { Answer } from "../types/assessment";
import { logger } from "../utils/logger";
import { AnswerSuggestionProvider, SuggestionRequest, unansweredQuestions } from "./suggestions";

export const DEFAULT_MAX_TOKENS = 2000;
export const DEFAULT_TEMPERATURE = 0.1;

// ============================================================
// SYSTEM PROMPT
// ============================================================

const SYSTEM_PROMPT_SUGGESTIONS = `You estimate missing ESG questionnaire answers for small and medium businesses.

RULES:
- Suggest a value only for the questions listed in the request
- Use typical values for the stated industry and company size
- Booleans are true/false; percentages are 0-100; numeric values stay inside the given range
- Never invent question ids

OUTPUT (valid JSON only, no extra text):
{
  "suggestions": [
    { "question_id": "question_id", "value": 42, "rationale": "short reason" }
  ]
}`;

const SuggestionOutputSchema = z.object({
  suggestions: z.array(
    z.object({
      question_id: z.string(),
      value: z.union([z.number(), z.boolean()]),
      rationale: z.string().optional(),
    })
  ),
});

// ============================================================
// SERVER-SIDE RATE LIMITING (in-memory, single instance)
// ============================================================

type RateRecord = { t: number; tokens: number };

const TOKEN_BUDGET_PER_MIN = 25_000;
const MIN_DELAY_MS = 2500;
const WINDOW_MS = 60_000;

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error("aborted"));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error("aborted"));
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export class TokenBudget {
  private history: RateRecord[] = [];
  private lastReqAt = 0;

  constructor(
    private readonly budgetPerMinute: number = TOKEN_BUDGET_PER_MIN,
    private readonly minDelayMs: number = MIN_DELAY_MS
  ) {}

  estimate(system: string, user: string, maxTokens: number): number {
    return Math.ceil((system.length + user.length) / 4) + maxTokens;
  }

  async acquire(estimatedTokens: number, signal?: AbortSignal): Promise<void> {
    if (estimatedTokens > this.budgetPerMinute) {
      throw new Error(`Request too large for token budget (${estimatedTokens} > ${this.budgetPerMinute})`);
    }

    const sinceLast = Date.now() - this.lastReqAt;
    if (sinceLast < this.minDelayMs) {
      await sleep(this.minDelayMs - sinceLast, signal);
    }

    for (;;) {
      const cutoff = Date.now() - WINDOW_MS;
      this.history = this.history.filter((r) => r.t > cutoff);
      const used = this.history.reduce((s, r) => s + r.tokens, 0);

      if (used + estimatedTokens <= this.budgetPerMinute) {
        this.lastReqAt = Date.now();
        this.history.push({ t: this.lastReqAt, tokens: estimatedTokens });
        return;
      }

      const oldest = this.history[0];
      const waitMs = oldest ? Math.max(1000, oldest.t + WINDOW_MS - Date.now()) : WINDOW_MS;
      logger.debug("[ANTHROPIC] Token budget exceeded, waiting", { used, estimatedTokens, waitMs });
      await sleep(waitMs, signal);
    }
  }
}

function isRateLimit(err: unknown): boolean {
  if (err instanceof Anthropic.RateLimitError) return true;
  if (err instanceof Anthropic.APIError && err.status === 429) return true;
  return err instanceof Error && /rate.?limit/i.test(err.message);
}

export async function callAnthropicWithRetry<T>(
  fn: () => Promise<T>,
  maxRetries = 4,
  initialDelayMs = 20_000,
  signal?: AbortSignal
): Promise<T> {
  let attempt = 0;
  let delay = initialDelayMs;

  for (;;) {
    try {
      return await fn();
    } catch (err) {
      if (!isRateLimit(err) || attempt >= maxRetries) {
        throw err;
      }
      attempt += 1;
      logger.warn(`[ANTHROPIC] 429 rate limit, retry ${attempt}/${maxRetries} in ${delay}ms`);
      await sleep(delay, signal);
      delay *= 2;
    }
  }
}

// ============================================================
// PROVIDER
// ============================================================

export interface CompletionPrompt {
  system: string;
  user: string;
}

/**
 * Prompt → model text. The default goes through the Anthropic SDK.
 */
export type CompletionFn = (prompt: CompletionPrompt, signal: AbortSignal) => Promise<string>;

export interface AnthropicProviderOptions {
  apiKey: string;
  model: string;
  complete?: CompletionFn;
  budget?: TokenBudget;
}

function extractText(response: Anthropic.Message): string {
  for (const block of response.content) {
    if (block.type === "text") {
      return block.text;
    }
  }
  return "";
}

/**
 * Strips a surrounding markdown code fence, then parses JSON
 */
export function parseSuggestionOutput(text: string): z.infer<typeof SuggestionOutputSchema> {
  let cleaned = text.trim();
  if (cleaned.startsWith("```json")) {
    cleaned = cleaned.slice(7);
  } else if (cleaned.startsWith("```")) {
    cleaned = cleaned.slice(3);
  }
  if (cleaned.endsWith("```")) {
    cleaned = cleaned.slice(0, -3);
  }

  const parsed = SuggestionOutputSchema.safeParse(JSON.parse(cleaned.trim()));
  if (!parsed.success) {
    throw new Error(`Invalid suggestion output: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }
  return parsed.data;
}

export class AnthropicSuggestionProvider implements AnswerSuggestionProvider {
  readonly name = "anthropic";
  private readonly complete: CompletionFn;

  constructor(options: AnthropicProviderOptions) {
    const budget = options.budget ?? new TokenBudget();
    this.complete = options.complete ?? AnthropicSuggestionProvider.sdkCompletion(options.apiKey, options.model, budget);
  }

  private static sdkCompletion(apiKey: string, model: string, budget: TokenBudget): CompletionFn {
    let client: Anthropic | null = null;

    return async (prompt, signal) => {
      if (!client) {
        client = new Anthropic({ apiKey });
      }
      const sdk = client;
      await budget.acquire(budget.estimate(prompt.system, prompt.user, DEFAULT_MAX_TOKENS), signal);
      const response = await callAnthropicWithRetry(
        () =>
          sdk.messages.create(
            {
              model,
              max_tokens: DEFAULT_MAX_TOKENS,
              temperature: DEFAULT_TEMPERATURE,
              system: prompt.system,
              messages: [{ role: "user", content: prompt.user }],
            },
            { signal }
          ),
        4,
        20_000,
        signal
      );
      return extractText(response);
    };
  }

  async suggest(request: SuggestionRequest, signal: AbortSignal): Promise<Answer[]> {
    const questions = unansweredQuestions(request);
    if (questions.length === 0) return [];

    const lines = questions.map(
      (q) =>
        `- ${q.question_id} (${q.value_type}, range ${q.valid_range.min}-${q.valid_range.max}${q.unit ? ` ${q.unit}` : ""}): ${q.prompt}`
    );
    const user = `Industry: ${request.industry}
Company size: ${request.companySize ?? "unknown"}

Questions:
${lines.join("\n")}`;

    const text = await this.complete({ system: SYSTEM_PROMPT_SUGGESTIONS, user }, signal);
    const output = parseSuggestionOutput(text);
    const byId = new Map(questions.map((q) => [q.question_id, q]));

    return output.suggestions.flatMap((s): Answer[] => {
      const question = byId.get(s.question_id);
      if (!question) return [];
      return [
        {
          question_id: s.question_id,
          raw_value: s.value,
          value_type: question.value_type,
          provenance: "llm_suggested",
        },
      ];
    });
  }
}
