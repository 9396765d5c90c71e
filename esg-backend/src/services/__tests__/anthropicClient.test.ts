import { describe, it, expect, vi } from "vitest";
import { loadDefaultCatalog } from "../../catalog/questionCatalog";
import { answersFrom, FULL_ANSWERS } from "../../__tests__/fixtures";
import {
  AnthropicSuggestionProvider,
  callAnthropicWithRetry,
  CompletionFn,
  parseSuggestionOutput,
  TokenBudget,
} from "../anthropicClient";
import type { SuggestionRequest } from "../suggestions";

const { training_hours, community_engagement, ...answered } = FULL_ANSWERS;

const request: SuggestionRequest = {
  industry: "retail",
  companySize: "small",
  answers: answersFrom(answered),
  catalog: loadDefaultCatalog(),
};

describe("parseSuggestionOutput", () => {
  it("accepts a fenced JSON reply", () => {
    const text = '```json\n{"suggestions":[{"question_id":"training_hours","value":14}]}\n```';
    expect(parseSuggestionOutput(text)).toEqual({ suggestions: [{ question_id: "training_hours", value: 14 }] });
  });

  it("rejects output that does not match the schema", () => {
    expect(() => parseSuggestionOutput('{"suggestions":[{"question_id":"x","value":"high"}]}')).toThrow(
      /^Invalid suggestion output/
    );
  });
});

describe("AnthropicSuggestionProvider", () => {
  it("asks only for open questions and maps the reply to suggested answers", async () => {
    const complete = vi.fn<CompletionFn>(async () =>
      JSON.stringify({
        suggestions: [
          { question_id: "training_hours", value: 14, rationale: "typical for small retail" },
          { question_id: "co2_emissions", value: 3 },
          { question_id: "community_engagement", value: true },
        ],
      })
    );
    const provider = new AnthropicSuggestionProvider({ apiKey: "test-secret", model: "test-model", complete });

    const answers = await provider.suggest(request, new AbortController().signal);
    expect(answers).toEqual([
      { question_id: "training_hours", raw_value: 14, value_type: "numeric", provenance: "llm_suggested" },
      { question_id: "community_engagement", raw_value: true, value_type: "boolean", provenance: "llm_suggested" },
    ]);

    const [prompt] = complete.mock.calls[0];
    expect(prompt.user).toBe(
      [
        "Industry: retail",
        "Company size: small",
        "",
        "Questions:",
        "- training_hours (numeric, range 0-40 hours): How many training hours does each employee receive per year?",
        "- community_engagement (boolean, range 0-1): Do you support a community engagement program?",
      ].join("\n")
    );
  });

  it("skips the model when nothing is open", async () => {
    const complete = vi.fn<CompletionFn>(async () => "{}");
    const provider = new AnthropicSuggestionProvider({ apiKey: "test-secret", model: "test-model", complete });
    const full = { ...request, answers: answersFrom({ ...answered, training_hours, community_engagement }) };

    expect(await provider.suggest(full, new AbortController().signal)).toEqual([]);
    expect(complete).not.toHaveBeenCalled();
  });
});

describe("callAnthropicWithRetry", () => {
  it("retries rate-limit errors with backoff", async () => {
    let calls = 0;
    const result = await callAnthropicWithRetry(
      async () => {
        calls += 1;
        if (calls < 3) throw new Error("429 rate limit exceeded");
        return "ok";
      },
      3,
      1
    );
    expect(result).toBe("ok");
    expect(calls).toBe(3);
  });

  it("rethrows other errors at once", async () => {
    const fn = vi.fn(async () => {
      throw new Error("invalid request");
    });
    await expect(callAnthropicWithRetry(fn, 3, 1)).rejects.toThrow("invalid request");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("gives up after the last retry", async () => {
    const fn = vi.fn(async () => {
      throw new Error("rate_limit_error");
    });
    await expect(callAnthropicWithRetry(fn, 1, 1)).rejects.toThrow("rate_limit_error");
    expect(fn).toHaveBeenCalledTimes(2);
  });
});

describe("TokenBudget", () => {
  it("refuses a request larger than the whole budget", async () => {
    const budget = new TokenBudget(100, 0);
    await expect(budget.acquire(101)).rejects.toThrow("Request too large for token budget (101 > 100)");
  });

  it("estimates from prompt length plus output tokens", () => {
    expect(new TokenBudget().estimate("abcd", "abcdefgh", 50)).toBe(53);
  });

  it("admits requests inside the budget", async () => {
    const budget = new TokenBudget(100, 0);
    await budget.acquire(60);
    await expect(budget.acquire(40)).resolves.toBeUndefined();
  });
});
