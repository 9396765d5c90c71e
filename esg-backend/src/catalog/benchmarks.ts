// esg-backend/src/catalog/benchmarks.ts
// Industry peer distributions (read-only reference data)

import { z } from "zod";
import benchmarksJson from "../data/industry-benchmarks.json";
import { CatalogValidationError } from "../errors";
import type { IndustryBenchmark } from "../types/assessment";

export const GLOBAL_INDUSTRY = "global";

const BenchmarkFileSchema = z.object({
  version: z.string(),
  benchmarks: z.array(
    z.object({
      industry: z.string().min(1),
      scope: z.string().min(1),
      mean: z.number().min(0).max(100),
      stddev: z.number().min(0),
      sample_size: z.number().int().nonnegative(),
    })
  ),
});

export interface BenchmarkProvider {
  lookup(industry: string, scope: string): IndustryBenchmark | undefined;
}

function key(industry: string, scope: string): string {
  return `${industry.trim().toLowerCase()}::${scope}`;
}

export class StaticBenchmarkProvider implements BenchmarkProvider {
  private readonly table = new Map<string, IndustryBenchmark>();

  constructor(benchmarks: IndustryBenchmark[]) {
    for (const b of benchmarks) {
      this.table.set(key(b.industry, b.scope), Object.freeze({ ...b }));
    }
  }

  lookup(industry: string, scope: string): IndustryBenchmark | undefined {
    return this.table.get(key(industry, scope));
  }
}

export function parseBenchmarks(raw: unknown): IndustryBenchmark[] {
  const parsed = BenchmarkFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CatalogValidationError(
      "industry benchmarks",
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  return parsed.data.benchmarks;
}

export function loadDefaultBenchmarks(): StaticBenchmarkProvider {
  return new StaticBenchmarkProvider(parseBenchmarks(benchmarksJson));
}
