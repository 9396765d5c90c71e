// esg-backend/src/routes/esgScore.ts

import { Router, Request, Response } from "express";
import { z } from "zod";
import type { BenchmarkProvider } from "../catalog/benchmarks";
import type { QuestionCatalog } from "../types/assessment";
import type { AssessmentService } from "../services/assessmentService";
import { benchmarkInsights, benchmarkScore } from "../services/benchmarking";
import { toEnhancedScore } from "../services/presenter";
import { proactiveRecommendations } from "../services/recommendations";
import type { SuggestionChain } from "../services/suggestions";
import { NotFoundError } from "../errors";
import { logDone, logStart, sendBadRequest, sendError, zodMessage } from "./respond";

export interface EsgRouterDeps {
  assessments: AssessmentService;
  catalog: QuestionCatalog;
  benchmarks: BenchmarkProvider;
  suggestions: SuggestionChain;
}

// ============================================================
// REQUEST SCHEMAS
// ============================================================

const CompanySizeSchema = z.enum(["micro", "small", "medium", "large"]);

const AnswerSchema = z.object({
  question_id: z.string().min(1),
  raw_value: z.union([z.number(), z.boolean(), z.string(), z.null()]),
  value_type: z.enum(["numeric", "boolean", "percentage"]),
  provenance: z.enum(["user_input", "llm_suggested", "csv_import"]).default("user_input"),
});

const ScoreRequestSchema = z.object({
  userId: z.string().min(1),
  industry: z.string().min(1),
  companySize: CompanySizeSchema.optional(),
  answers: z.array(AnswerSchema).min(1),
});

const HistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const BenchmarkRequestSchema = z.union([
  z.object({ userId: z.string().min(1), companySize: CompanySizeSchema.optional() }),
  z.object({
    industry: z.string().min(1),
    score: z.number().min(0).max(100),
    scope: z.string().min(1).default("overall"),
  }),
]);

const SuggestionRequestSchema = z.object({
  industry: z.string().min(1),
  companySize: CompanySizeSchema.optional(),
  answers: z.array(AnswerSchema).default([]),
});

// ============================================================
// ROUTER
// ============================================================

export function createEsgRouter(deps: EsgRouterDeps): Router {
  const router = Router();

  router.get("/questions", (_req: Request, res: Response) => {
    return res.json({
      ok: true,
      version: deps.catalog.version,
      subcategory_weights: deps.catalog.subcategory_weights,
      questions: deps.catalog.questions,
    });
  });

  router.post("/score", async (req: Request, res: Response) => {
    const route = "POST /api/esg/score";
    const startTime = logStart(route);

    const parsed = ScoreRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendBadRequest(res, route, zodMessage(parsed.error));
    }
    const { userId, industry, companySize, answers } = parsed.data;

    try {
      const { result, warnings, historyId } = await deps.assessments.submit({ userId, industry, answers });

      logDone(route, startTime);
      return res.json({
        ok: true,
        score: toEnhancedScore(result),
        result,
        warnings,
        historyId,
        enrichment: {
          benchmark: benchmarkInsights(result, industry, companySize ?? null, deps.benchmarks),
          proactive_recommendations: proactiveRecommendations(result),
        },
      });
    } catch (error) {
      return sendError(res, route, startTime, error);
    }
  });

  router.get("/history/:userId", async (req: Request, res: Response) => {
    const route = "GET /api/esg/history";
    const startTime = logStart(route);

    const query = HistoryQuerySchema.safeParse(req.query);
    if (!query.success) {
      return sendBadRequest(res, route, zodMessage(query.error));
    }

    try {
      const entries = await deps.assessments.history(req.params.userId, query.data.limit);
      logDone(route, startTime);
      return res.json({ ok: true, entries });
    } catch (error) {
      return sendError(res, route, startTime, error);
    }
  });

  router.post("/benchmark", async (req: Request, res: Response) => {
    const route = "POST /api/esg/benchmark";
    const startTime = logStart(route);

    const parsed = BenchmarkRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendBadRequest(res, route, zodMessage(parsed.error));
    }
    const body = parsed.data;

    try {
      if ("userId" in body) {
        const latest = await deps.assessments.latest(body.userId);
        if (!latest) {
          throw new NotFoundError(`No assessment on record for user ${body.userId}`);
        }
        const insights = benchmarkInsights(
          latest.result,
          latest.industry,
          body.companySize ?? null,
          deps.benchmarks
        );
        logDone(route, startTime);
        return res.json({ ok: true, insights });
      }

      const outcome = benchmarkScore(body.score, body.industry, body.scope, deps.benchmarks);
      logDone(route, startTime);
      return res.json({
        ok: true,
        benchmark: {
          industry: body.industry,
          scope: body.scope,
          score: body.score,
          percentile: outcome.percentile,
          degraded: outcome.degraded,
          mean: outcome.benchmark ? outcome.benchmark.mean : null,
          stddev: outcome.benchmark ? outcome.benchmark.stddev : null,
        },
        warnings: outcome.warning ? [{ code: outcome.warning.code, message: outcome.warning.message }] : [],
      });
    } catch (error) {
      return sendError(res, route, startTime, error);
    }
  });

  router.post("/suggestions", async (req: Request, res: Response) => {
    const route = "POST /api/esg/suggestions";
    const startTime = logStart(route);

    const parsed = SuggestionRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendBadRequest(res, route, zodMessage(parsed.error));
    }

    try {
      const { provider, suggestions } = await deps.suggestions.suggest({
        industry: parsed.data.industry,
        companySize: parsed.data.companySize ?? null,
        answers: parsed.data.answers,
        catalog: deps.catalog,
      });
      logDone(route, startTime);
      return res.json({ ok: true, provider, suggestions });
    } catch (error) {
      return sendError(res, route, startTime, error);
    }
  });

  return router;
}
