// esg-backend/src/repositories/recordSchemas.ts
// Schemas for rows read back from storage

import { z } from "zod";
import { BADGES } from "../types/assessment";

const TREND = z.enum(["improving", "declining", "stable", "insufficient_data"]);

export const ScoreResultSchema = z.object({
  overall_score: z.number(),
  category_scores: z.object({
    environmental: z.number().nullable(),
    social: z.number().nullable(),
    governance: z.number().nullable(),
  }),
  subcategory_scores: z.record(z.string(), z.number().nullable()),
  badge: z.enum(BADGES),
  level: z.number().int(),
  industry_percentile: z.number().nullable(),
  benchmark_degraded: z.boolean(),
  trend: TREND,
  trend_delta: z.number().nullable(),
  improvement_areas: z.array(z.string()),
  strengths: z.array(z.string()),
  data_completeness: z.number(),
  llm_suggested_questions: z.array(z.string()),
  calculated_at: z.string(),
});

export const HistoryRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  industry: z.string(),
  sequence: z.number().int(),
  result_json: z.string(),
});

const jsonArrayOf = <T extends z.ZodTypeAny>(item: T) =>
  z.string().transform((text, ctx) => {
    const parsed = z.array(item).safeParse(JSON.parse(text));
    if (!parsed.success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "invalid JSON array" });
      return z.NEVER;
    }
    return parsed.data;
  });

export const AlertRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  alert_type: z.enum(["compliance_gap", "regulatory_deadline", "trend_decline"]),
  risk_level: z.enum(["low", "medium", "high", "critical"]),
  title: z.string(),
  description: z.string(),
  predicted_impact: z.string(),
  recommended_actions: jsonArrayOf(z.string()),
  timeline_days: z.number().int(),
  confidence_score: z.number(),
  data_sources: jsonArrayOf(
    z.enum(["esg_scoring", "trend_analysis", "industry_benchmarks", "regulatory_calendar", "readiness_score"])
  ),
  is_resolved: z.number().transform((v) => v === 1),
  created_at: z.string(),
  expires_at: z.string(),
  resolved_at: z.string().nullable(),
});

export const EvaluationRowSchema = z.object({
  user_id: z.string(),
  entry_id: z.string(),
  evaluated_at: z.string(),
  trend: TREND,
  previous_trend: TREND.nullable(),
});
