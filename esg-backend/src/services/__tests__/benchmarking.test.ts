import { describe, it, expect } from "vitest";
import { loadDefaultBenchmarks, StaticBenchmarkProvider } from "../../catalog/benchmarks";
import { DegradedBenchmarkWarning } from "../../errors";
import { makeResult } from "../../__tests__/fixtures";
import { benchmarkInsights, benchmarkScore, computePercentile, normalCdf } from "../benchmarking";

const retail = { industry: "retail", scope: "overall", mean: 65, stddev: 12, sample_size: 500 };

describe("normalCdf", () => {
  it("matches known values of the standard normal", () => {
    expect(normalCdf(0)).toBeCloseTo(0.5, 6);
    expect(normalCdf(1.96)).toBeCloseTo(0.975, 3);
    expect(normalCdf(-1)).toBeCloseTo(0.1587, 3);
  });
});

describe("computePercentile", () => {
  it("places 90 against mean 65 / stddev 12 at the 98.1th percentile", () => {
    expect(computePercentile(90, retail)).toBe(98.1);
  });

  it("puts the mean at 50", () => {
    expect(computePercentile(65, retail)).toBe(50);
  });

  it("is non-decreasing in score", () => {
    let previous = -1;
    for (let score = 0; score <= 100; score += 0.5) {
      const p = computePercentile(score, retail);
      expect(p).toBeGreaterThanOrEqual(previous);
      expect(p).toBeGreaterThanOrEqual(0);
      expect(p).toBeLessThanOrEqual(100);
      previous = p;
    }
  });

  it("handles a zero-width distribution", () => {
    const flat = { ...retail, stddev: 0 };
    expect(computePercentile(70, flat)).toBe(100);
    expect(computePercentile(60, flat)).toBe(0);
    expect(computePercentile(65, flat)).toBe(50);
  });
});

describe("benchmarkScore", () => {
  const provider = loadDefaultBenchmarks();

  it("uses the industry benchmark when present", () => {
    const outcome = benchmarkScore(69.2, "retail", "overall", provider);
    expect(outcome).toMatchObject({ percentile: 63.7, degraded: false, warning: null });
  });

  it("falls back to the global benchmark and flags degradation", () => {
    const outcome = benchmarkScore(69.2, "shipping", "overall", provider);
    expect(outcome.degraded).toBe(true);
    expect(outcome.percentile).toBe(69.6);
    expect(outcome.warning).toBeInstanceOf(DegradedBenchmarkWarning);
    expect(outcome.warning?.code).toBe("DEGRADED_BENCHMARK");
  });

  it("returns a null percentile when even the global benchmark is missing", () => {
    const empty = new StaticBenchmarkProvider([]);
    expect(benchmarkScore(50, "retail", "overall", empty)).toMatchObject({ percentile: null, degraded: true });
  });
});

describe("benchmarkInsights", () => {
  it("reports overall and category standing against the cohort", () => {
    const insights = benchmarkInsights(makeResult(), "retail", "small", loadDefaultBenchmarks());
    expect(insights.cohort).toEqual({ industry: "retail", company_size: "small", sample_size: 500 });
    expect(insights.degraded).toBe(false);
    expect(insights.scopes.map((s) => [s.scope, s.mean, s.gap])).toEqual([
      ["overall", 65, 4.2],
      ["environmental", 62, -4.3],
      ["social", 68, -2.4],
      ["governance", 66, 22],
    ]);
  });

  it("skips categories without a score", () => {
    const result = makeResult({ category_scores: { environmental: 57.7, social: null, governance: 88 } });
    const social = benchmarkInsights(result, "retail", null, loadDefaultBenchmarks()).scopes[2];
    expect(social).toEqual({ scope: "social", score: null, percentile: null, mean: null, gap: null, degraded: false });
  });
});
