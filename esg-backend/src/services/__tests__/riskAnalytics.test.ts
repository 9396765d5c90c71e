import { describe, it, expect } from "vitest";
import { loadDefaultCalendar } from "../../catalog/regulatoryCalendar";
import type { PredictiveAlert, RegulatoryCalendarEntry } from "../../types/alerts";
import { makeResult } from "../../__tests__/fixtures";
import type { ReadinessIndex } from "../readiness";
import { estimateRoi, penaltyWarnings, riskDashboard } from "../riskAnalytics";

const NOW = new Date("2026-10-19T10:00:00.000Z");

function entry(overrides: Partial<RegulatoryCalendarEntry> = {}): RegulatoryCalendarEntry {
  return {
    id: "track",
    regulation: "Test Regulation",
    industries: ["*"],
    deadline: "2026-11-18",
    timeline_days: 60,
    threshold: 70,
    readiness: [{ metric: "overall", weight: 1 }],
    penalty_severity: "medium",
    typical_penalty: "Fines",
    ...overrides,
  };
}

function alert(overrides: Partial<PredictiveAlert>): PredictiveAlert {
  return {
    id: "alert_test",
    user_id: "user-1",
    alert_type: "compliance_gap",
    risk_level: "high",
    title: "Test alert",
    description: "",
    predicted_impact: "",
    recommended_actions: [],
    timeline_days: 60,
    confidence_score: 0.9,
    data_sources: ["esg_scoring"],
    is_resolved: false,
    created_at: "2026-10-19T10:00:00.000Z",
    expires_at: "2026-12-18T10:00:00.000Z",
    resolved_at: null,
    ...overrides,
  };
}

describe("penaltyWarnings", () => {
  it("warns about deadlines inside the 90 day horizon", () => {
    const warnings = penaltyWarnings(makeResult(), loadDefaultCalendar().entriesFor("retail", NOW), NOW);
    expect(warnings).toEqual([
      {
        track: "diversity_reporting",
        regulation: "Workforce diversity reporting",
        deadline: "2026-12-31",
        days_until_deadline: 73,
        milestone_days: 90,
        escalation_level: "normal",
        risk_level: "medium",
        readiness: 57.8,
        miss_probability: 0.17,
        penalty_severity: "low",
        title: "Penalty Risk: Workforce diversity reporting in 73 days",
        description: "Readiness 58%. Estimated miss probability 17% with low severity if missed.",
        predicted_impact: "Notices and improvement plans",
        recommended_actions: [
          "Assign an owner for Workforce diversity reporting",
          "Prepare required documentation and evidence",
          "Schedule an internal review within 7 days",
        ],
        confidence_score: 0.92,
      },
    ]);
  });

  it("escalates at each warning mark and orders by risk then urgency", () => {
    const result = makeResult({ subcategory_scores: { ...makeResult().subcategory_scores, waste: 20 } });
    const entries = [
      entry({ id: "waste_filing", deadline: "2026-12-18", readiness: [{ metric: "waste", weight: 1 }] }),
      entry({ id: "far_filing", deadline: "2027-02-01" }),
      entry({ id: "soon_filing", deadline: "2026-10-29" }),
      entry({ id: "passed_filing", deadline: "2026-10-01" }),
      entry({ id: "urgent_filing", deadline: "2026-10-22" }),
    ];

    const warnings = penaltyWarnings(result, entries, NOW);
    expect(
      warnings.map((w) => [w.track, w.days_until_deadline, w.milestone_days, w.escalation_level, w.risk_level])
    ).toEqual([
      ["urgent_filing", 3, 3, "critical", "critical"],
      ["soon_filing", 10, 14, "high", "high"],
      ["waste_filing", 60, 60, "normal", "high"],
    ]);
    expect(warnings.map((w) => w.miss_probability)).toEqual([0.26, 0.21, 0.6]);
  });
});

describe("estimateRoi", () => {
  it("adds expected penalties within 60 days to operational savings", () => {
    const entries = [
      entry({ id: "high_filing", deadline: "2026-11-18", penalty_severity: "high" }),
      entry({
        id: "low_filing",
        deadline: "2026-12-10",
        penalty_severity: "low",
        readiness: [{ metric: "environmental", weight: 1 }],
      }),
      entry({ id: "later_filing", deadline: "2027-01-31" }),
    ];
    // 0.16·10000 + 0.22·2000; (70 − 45)·30 + (70 − 30)·20
    expect(estimateRoi(makeResult(), entries, NOW)).toEqual({
      avoided_penalties_estimate: 2040,
      operational_savings_estimate: 1550,
      total_potential_roi: 3590,
    });
  });

  it("skips unscored subcategories and distant deadlines", () => {
    const result = makeResult({
      subcategory_scores: { ...makeResult().subcategory_scores, energy: null, waste: 65 },
    });
    expect(estimateRoi(result, loadDefaultCalendar().entriesFor("retail", NOW), NOW)).toEqual({
      avoided_penalties_estimate: 0,
      operational_savings_estimate: 100,
      total_potential_roi: 100,
    });
  });
});

describe("riskDashboard", () => {
  it("summarizes open alerts next to the readiness index", () => {
    const active = [
      alert({ id: "gap", recommended_actions: ["Review environmental practices now"] }),
      alert({
        id: "deadline",
        alert_type: "regulatory_deadline",
        risk_level: "critical",
        timeline_days: 30,
        recommended_actions: ["Review the Carbon Filing requirements"],
      }),
      alert({ id: "trend", alert_type: "trend_decline", risk_level: "medium", is_resolved: true }),
    ];
    const readiness: ReadinessIndex = {
      readiness_index: 57.7,
      tracks: [
        {
          track: "carbon_filing",
          regulation: "Carbon Filing",
          readiness: 57.7,
          days_until_deadline: 30,
          penalty_severity: "high",
          miss_probability: 0.27,
        },
        {
          track: "diversity_reporting",
          regulation: "Workforce diversity reporting",
          readiness: 57.8,
          days_until_deadline: 73,
          penalty_severity: "low",
          miss_probability: 0.17,
        },
      ],
    };

    expect(riskDashboard(active, readiness)).toEqual({
      risk_summary: { total_alerts: 2, critical_alerts: 1, high_risk_alerts: 1, average_timeline_days: 45 },
      alert_distribution: { compliance_gap: 1, regulatory_deadline: 1, trend_decline: 0 },
      next_actions: ["Review the Carbon Filing requirements", "Review environmental practices now"],
      compliance_readiness: { readiness_index: 57.7, next_deadline_days: 30, risk_level: "critical" },
    });
  });

  it("reports low risk without open alerts", () => {
    expect(riskDashboard([], { readiness_index: null, tracks: [] })).toEqual({
      risk_summary: { total_alerts: 0, critical_alerts: 0, high_risk_alerts: 0, average_timeline_days: 0 },
      alert_distribution: { compliance_gap: 0, regulatory_deadline: 0, trend_decline: 0 },
      next_actions: [],
      compliance_readiness: { readiness_index: null, next_deadline_days: null, risk_level: "low" },
    });
  });
});
