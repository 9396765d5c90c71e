import { beforeEach, describe, it, expect } from "vitest";
import { loadDefaultBenchmarks } from "../../catalog/benchmarks";
import { loadDefaultCatalog } from "../../catalog/questionCatalog";
import { DEFAULT_SCORING_CONFIG } from "../../config";
import { IncompleteAssessmentError } from "../../errors";
import { InMemoryEsgRepository } from "../../repositories/inMemoryRepository";
import { KeyedLock } from "../../utils/keyedLock";
import { answersFrom, FULL_ANSWERS } from "../../__tests__/fixtures";
import { AssessmentService } from "../assessmentService";

const NOW = new Date("2026-10-19T10:00:00.000Z");

describe("AssessmentService", () => {
  let repository: InMemoryEsgRepository;
  let service: AssessmentService;

  beforeEach(() => {
    repository = new InMemoryEsgRepository();
    service = new AssessmentService({
      repository,
      catalog: loadDefaultCatalog(),
      benchmarks: loadDefaultBenchmarks(),
      config: DEFAULT_SCORING_CONFIG,
      lock: new KeyedLock(),
      clock: () => NOW,
    });
  });

  const submit = (userId = "user-1") =>
    service.submit({ userId, industry: "retail", answers: answersFrom(FULL_ANSWERS) });

  it("scores and appends a submission", async () => {
    const { result, warnings, historyId } = await submit();
    expect(result.overall_score).toBe(69.2);
    expect(warnings).toEqual([]);

    const latest = await service.latest("user-1");
    expect(latest?.id).toBe(historyId);
    expect(latest?.result).toEqual(result);
  });

  it("keeps calculated_at strictly increasing under a frozen clock", async () => {
    await submit();
    await submit();
    await submit();
    const history = await service.history("user-1");
    expect(history.map((h) => h.result.calculated_at)).toEqual([
      "2026-10-19T10:00:00.002Z",
      "2026-10-19T10:00:00.001Z",
      "2026-10-19T10:00:00.000Z",
    ]);
  });

  it("serializes concurrent submissions for one user", async () => {
    await Promise.all([submit(), submit(), submit(), submit()]);
    const history = await service.history("user-1");
    expect(history.map((h) => h.sequence)).toEqual([4, 3, 2, 1]);
    expect(new Set(history.map((h) => h.result.calculated_at)).size).toBe(4);
  });

  it("derives the trend from prior submissions", async () => {
    const first = await submit();
    const second = await submit();
    const third = await submit();
    expect(first.result.trend).toBe("insufficient_data");
    expect(second.result.trend).toBe("insufficient_data");
    expect(third.result).toMatchObject({ trend: "stable", trend_delta: 0 });
  });

  it("appends nothing when the assessment is incomplete", async () => {
    await expect(
      service.submit({ userId: "user-1", industry: "retail", answers: answersFrom({ co2_emissions: 10 }) })
    ).rejects.toBeInstanceOf(IncompleteAssessmentError);
    expect(await service.latest("user-1")).toBeNull();
  });

  it("keeps histories of different users apart", async () => {
    await submit("user-1");
    await submit("user-2");
    expect(await service.history("user-1")).toHaveLength(1);
    expect(await repository.listUsers()).toEqual(["user-1", "user-2"]);
  });
});
