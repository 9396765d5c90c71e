import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type { PredictiveAlert } from "../../types/alerts";
import { makeResult } from "../../__tests__/fixtures";
import type { EsgRepository } from "../esgRepository";
import { InMemoryEsgRepository } from "../inMemoryRepository";
import { SqliteEsgRepository } from "../sqliteRepository";

const NOW = new Date("2026-10-19T10:00:00.000Z");

function alert(overrides: Partial<PredictiveAlert> = {}): PredictiveAlert {
  return {
    id: "alert_a",
    user_id: "user-1",
    alert_type: "compliance_gap",
    risk_level: "high",
    title: "Environmental Compliance Gap",
    description: "Your environmental score of 40 is below 50 and is not improving.",
    predicted_impact: "Exposure to regulatory penalties",
    recommended_actions: ["Review environmental practices now"],
    timeline_days: 60,
    confidence_score: 0.9,
    data_sources: ["esg_scoring", "trend_analysis"],
    is_resolved: false,
    created_at: "2026-10-19T10:00:00.000Z",
    expires_at: "2026-12-18T10:00:00.000Z",
    resolved_at: null,
    ...overrides,
  };
}

type Factory = () => { repo: EsgRepository; close: () => void };

const factories: [string, Factory][] = [
  ["in-memory", () => ({ repo: new InMemoryEsgRepository(), close: () => undefined })],
  [
    "sqlite",
    () => {
      const repo = new SqliteEsgRepository(":memory:");
      return { repo, close: () => repo.close() };
    },
  ],
];

describe.each(factories)("%s repository", (_name, factory) => {
  let repo: EsgRepository;
  let close: () => void;

  beforeEach(() => {
    ({ repo, close } = factory());
  });

  afterEach(() => {
    close();
  });

  describe("history", () => {
    it("reads most recent first and respects the limit", async () => {
      await repo.appendHistory("user-1", "retail", makeResult({ overall_score: 60, calculated_at: "2026-10-01T09:00:00.000Z" }));
      await repo.appendHistory("user-1", "retail", makeResult({ overall_score: 62, calculated_at: "2026-10-02T09:00:00.000Z" }));
      await repo.appendHistory("user-1", "retail", makeResult({ overall_score: 64, calculated_at: "2026-10-03T09:00:00.000Z" }));

      const history = await repo.readHistory("user-1", 2);
      expect(history.map((h) => h.result.overall_score)).toEqual([64, 62]);
      expect(history.map((h) => h.sequence)).toEqual([3, 2]);
      expect(history[0]).toMatchObject({ user_id: "user-1", industry: "retail" });
    });

    it("breaks calculated_at ties by sequence", async () => {
      const at = "2026-10-01T09:00:00.000Z";
      await repo.appendHistory("user-1", "retail", makeResult({ overall_score: 50, calculated_at: at }));
      await repo.appendHistory("user-1", "retail", makeResult({ overall_score: 51, calculated_at: at }));
      const history = await repo.readHistory("user-1");
      expect(history.map((h) => h.result.overall_score)).toEqual([51, 50]);
    });

    it("returns the stored result unchanged", async () => {
      const result = makeResult({ trend: "declining", trend_delta: -6.67, industry_percentile: null });
      const id = await repo.appendHistory("user-1", "retail", result);
      const [entry] = await repo.readHistory("user-1");
      expect(entry.id).toBe(id);
      expect(entry.result).toEqual(result);
    });

    it("keeps users apart and lists them sorted", async () => {
      await repo.appendHistory("user-b", "retail", makeResult());
      await repo.appendHistory("user-a", "finance", makeResult());
      expect(await repo.readHistory("user-c")).toEqual([]);
      expect(await repo.listUsers()).toEqual(["user-a", "user-b"]);
    });
  });

  describe("alerts", () => {
    it("upserts by id", async () => {
      await repo.upsertAlert(alert());
      await repo.upsertAlert(alert({ risk_level: "critical", expires_at: "2026-12-20T10:00:00.000Z" }));
      const stored = await repo.getAlert("alert_a");
      expect(stored).toEqual(alert({ risk_level: "critical", expires_at: "2026-12-20T10:00:00.000Z" }));
      expect(await repo.listAlerts("user-1")).toHaveLength(1);
    });

    it("lists active alerts by expiry", async () => {
      await repo.upsertAlert(alert({ id: "alert_late", expires_at: "2026-12-18T10:00:00.000Z" }));
      await repo.upsertAlert(alert({ id: "alert_soon", expires_at: "2026-11-01T10:00:00.000Z" }));
      await repo.upsertAlert(alert({ id: "alert_gone", expires_at: "2026-10-19T10:00:00.000Z" }));
      await repo.upsertAlert(alert({ id: "alert_other", user_id: "user-2" }));

      const active = await repo.listActiveAlerts("user-1", NOW);
      expect(active.map((a) => a.id)).toEqual(["alert_soon", "alert_late"]);
      expect((await repo.listAlerts("user-1")).map((a) => a.id)).toEqual(["alert_gone", "alert_soon", "alert_late"]);
    });

    it("resolves once and only for the owner", async () => {
      await repo.upsertAlert(alert());
      expect(await repo.resolveAlert("user-2", "alert_a", NOW)).toBeNull();
      expect(await repo.resolveAlert("user-1", "alert_missing", NOW)).toBeNull();

      const first = await repo.resolveAlert("user-1", "alert_a", NOW);
      expect(first).toMatchObject({ is_resolved: true, resolved_at: "2026-10-19T10:00:00.000Z" });

      const again = await repo.resolveAlert("user-1", "alert_a", new Date("2026-10-20T10:00:00.000Z"));
      expect(again?.resolved_at).toBe("2026-10-19T10:00:00.000Z");
    });

    it("returns null for an unknown alert", async () => {
      expect(await repo.getAlert("alert_none")).toBeNull();
    });
  });

  describe("evaluations and checkpoints", () => {
    it("keeps the last evaluation per user", async () => {
      expect(await repo.readLastEvaluation("user-1")).toBeNull();
      await repo.recordEvaluation({
        user_id: "user-1",
        entry_id: "entry-1",
        evaluated_at: "2026-10-18T10:00:00.000Z",
        trend: "stable",
        previous_trend: null,
      });
      await repo.recordEvaluation({
        user_id: "user-1",
        entry_id: "entry-2",
        evaluated_at: "2026-10-19T10:00:00.000Z",
        trend: "declining",
        previous_trend: "stable",
      });
      expect(await repo.readLastEvaluation("user-1")).toEqual({
        user_id: "user-1",
        entry_id: "entry-2",
        evaluated_at: "2026-10-19T10:00:00.000Z",
        trend: "declining",
        previous_trend: "stable",
      });
    });

    it("records checkpoints per job without duplicates", async () => {
      await repo.saveCheckpoint("job-1", "user-b");
      await repo.saveCheckpoint("job-1", "user-a");
      await repo.saveCheckpoint("job-1", "user-a");
      await repo.saveCheckpoint("job-2", "user-c");
      expect(await repo.listCheckpoints("job-1")).toEqual(["user-a", "user-b"]);
      expect(await repo.listCheckpoints("job-3")).toEqual([]);
    });
  });
});
