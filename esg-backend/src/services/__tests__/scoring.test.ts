import { describe, it, expect } from "vitest";
import { loadDefaultCatalog } from "../../catalog/questionCatalog";
import { DEFAULT_SCORING_CONFIG } from "../../config";
import { IncompleteAssessmentError } from "../../errors";
import { BADGES } from "../../types/assessment";
import { answersFrom, FULL_ANSWERS } from "../../__tests__/fixtures";
import { normalizeAnswers } from "../normalizer";
import {
  aggregateScores,
  analyzePerformance,
  computeLevel,
  computeOverallScore,
  determineBadge,
  roundScore,
} from "../scoring";

const catalog = loadDefaultCatalog();

function aggregate(values: Record<string, number | boolean>) {
  const { metrics } = normalizeAnswers(answersFrom(values), catalog);
  return aggregateScores(metrics, catalog, DEFAULT_SCORING_CONFIG);
}

describe("computeOverallScore", () => {
  it("weights categories 0.4/0.3/0.3", () => {
    const overall = computeOverallScore(
      { environmental: 68, social: 75, governance: 74 },
      DEFAULT_SCORING_CONFIG.categoryWeights
    );
    expect(overall).not.toBeNull();
    expect(roundScore(overall ?? 0)).toBe(71.9);
    expect(determineBadge(71.9)).toBe("Sustainability Star");
    expect(computeLevel(71.9)).toBe(8);
  });

  it("renormalizes over the categories present", () => {
    const overall = computeOverallScore(
      { environmental: 60, social: 80, governance: null },
      DEFAULT_SCORING_CONFIG.categoryWeights
    );
    // (0.4·60 + 0.3·80) / 0.7
    expect(overall).toBeCloseTo(68.571, 3);
  });

  it("is null when no category is scored", () => {
    expect(
      computeOverallScore({ environmental: null, social: null, governance: null }, DEFAULT_SCORING_CONFIG.categoryWeights)
    ).toBeNull();
  });
});

describe("badge and level", () => {
  it("applies the step boundaries to the rounded score", () => {
    expect(determineBadge(0)).toBe("ESG Beginner");
    expect(determineBadge(49.9)).toBe("ESG Beginner");
    expect(determineBadge(50)).toBe("ESG Starter");
    expect(determineBadge(69.9)).toBe("Eco Improver");
    expect(determineBadge(80)).toBe("Green Leader");
    expect(determineBadge(90)).toBe("ESG Champion");
    expect(determineBadge(100)).toBe("ESG Champion");
  });

  it("never moves to a lower badge as the score rises", () => {
    let previous = 0;
    for (let tenths = 0; tenths <= 1000; tenths++) {
      const rank = BADGES.indexOf(determineBadge(tenths / 10));
      expect(rank).toBeGreaterThanOrEqual(previous);
      previous = rank;
    }
  });

  it("caps the level at 10", () => {
    expect(computeLevel(0)).toBe(1);
    expect(computeLevel(9.9)).toBe(1);
    expect(computeLevel(10)).toBe(2);
    expect(computeLevel(99.9)).toBe(10);
    expect(computeLevel(100)).toBe(10);
  });
});

describe("analyzePerformance", () => {
  it("orders by score then name and caps at five", () => {
    const { improvement_areas, strengths } = analyzePerformance(
      { a: 10, b: 10, c: 5, d: 50, e: 55, f: 59.9, g: 90, h: 85, i: 90, j: null },
      60,
      80
    );
    expect(improvement_areas).toEqual(["c", "a", "b", "d", "e"]);
    expect(strengths).toEqual(["g", "i", "h"]);
  });
});

describe("aggregateScores", () => {
  it("scores a complete submission", () => {
    const score = aggregate(FULL_ANSWERS);
    expect(score.subcategory_scores).toEqual({
      emissions: 88,
      energy: 45,
      waste: 30,
      diversity: 46,
      employee: 68,
      community: 100,
      ethics: 96,
      transparency: 80,
    });
    expect(score.category_scores).toEqual({ environmental: 57.7, social: 65.6, governance: 88 });
    expect(score.overall_score).toBe(69.2);
    expect(score.badge).toBe("Eco Improver");
    expect(score.level).toBe(7);
    expect(score.improvement_areas).toEqual(["waste", "energy", "diversity"]);
    expect(score.strengths).toEqual(["community", "ethics", "emissions", "transparency"]);
    expect(score.data_completeness).toBe(1);
  });

  it("does not count missing answers as zero", () => {
    const partial = { ...FULL_ANSWERS };
    delete partial.recycling_program;
    const score = aggregate(partial);
    // packaging_recyclability 50% alone
    expect(score.subcategory_scores.waste).toBe(50);
    expect(score.data_completeness).toBe(0.938);
  });

  it("throws below the completeness floor", () => {
    const few = {
      co2_emissions: 10,
      renewable_energy_share: 40,
      diversity_percentage: 50,
      training_hours: 20,
      ethics_training: 90,
      board_independence: 50,
      supplier_code: true,
    };
    expect(() => aggregate(few)).toThrow(IncompleteAssessmentError);
    try {
      aggregate(few);
    } catch (err) {
      expect(err).toBeInstanceOf(IncompleteAssessmentError);
      if (err instanceof IncompleteAssessmentError) {
        expect(err.completeness).toBeCloseTo(7 / 16, 10);
        expect(err.required).toBe(0.5);
      }
    }
  });

  it("keeps every score inside 0–100 at the extremes", () => {
    const worst = aggregate({
      ...FULL_ANSWERS,
      co2_emissions: 500,
      emissions_reduction_target: false,
      energy_consumption: 900000,
      renewable_energy_share: 0,
      packaging_recyclability: 0,
      diversity_percentage: 0,
      female_leadership: 0,
      employee_satisfaction: 1,
      training_hours: 0,
      community_engagement: false,
      data_privacy_compliance: false,
      ethics_training: 0,
      supplier_code: false,
      transparency_reporting: false,
      board_independence: 0,
    });
    expect(worst.overall_score).toBe(0);
    expect(worst.badge).toBe("ESG Beginner");
    expect(worst.level).toBe(1);
  });
});
