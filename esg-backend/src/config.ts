// esg-backend/src/config.ts

import { z } from "zod";
import { ConfigError } from "./errors";
import { LogLevel, logger } from "./utils/logger";

export interface CategoryWeights {
  environmental: number;
  social: number;
  governance: number;
}

export interface ScoringConfig {
  categoryWeights: CategoryWeights;
  minCompleteness: number;
  improvementThreshold: number;
  strengthThreshold: number;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  allowedOrigins: string[];
  logLevel: LogLevel;
  scoring: ScoringConfig;
  databasePath: string | null;
  anthropicApiKey: string | null;
  anthropicModel: string;
  suggestionTimeoutMs: number;
}

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  categoryWeights: { environmental: 0.4, social: 0.3, governance: 0.3 },
  minCompleteness: 0.5,
  improvementThreshold: 60,
  strengthThreshold: 80,
};

const weight = z.coerce.number().min(0).max(1);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.string().default("development"),
  ALLOWED_ORIGINS: z.string().optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  ESG_WEIGHT_ENVIRONMENTAL: weight.default(0.4),
  ESG_WEIGHT_SOCIAL: weight.default(0.3),
  ESG_WEIGHT_GOVERNANCE: weight.default(0.3),
  ESG_MIN_COMPLETENESS: z.coerce.number().min(0).max(1).default(0.5),
  ESG_IMPROVEMENT_THRESHOLD: z.coerce.number().min(0).max(100).default(60),
  ESG_STRENGTH_THRESHOLD: z.coerce.number().min(0).max(100).default(80),
  DATABASE_PATH: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_MODEL: z.string().default("claude-sonnet-4-5-20250929"),
  SUGGESTION_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
});

/**
 * Category weights must sum to 1.0; a drift above 0.01 is renormalized.
 */
export function normalizeCategoryWeights(weights: CategoryWeights): CategoryWeights {
  const total = weights.environmental + weights.social + weights.governance;
  if (total <= 0) {
    throw new ConfigError("ESG category weights must not all be zero");
  }
  if (Math.abs(total - 1) <= 0.01) {
    return weights;
  }

  const adjusted = {
    environmental: weights.environmental / total,
    social: weights.social / total,
    governance: weights.governance / total,
  };
  logger.warn("[CONFIG] ESG weights do not sum to 1.0, auto-adjusted", {
    total,
    environmental: adjusted.environmental,
    social: adjusted.social,
    governance: adjusted.governance,
  });
  return adjusted;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join("; ")}`);
  }
  const e = parsed.data;

  const allowedOrigins = e.ALLOWED_ORIGINS
    ? e.ALLOWED_ORIGINS.split(",").map((origin) => origin.trim()).filter(Boolean)
    : ["http://localhost:3000"];

  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    allowedOrigins,
    logLevel: e.LOG_LEVEL,
    scoring: {
      categoryWeights: normalizeCategoryWeights({
        environmental: e.ESG_WEIGHT_ENVIRONMENTAL,
        social: e.ESG_WEIGHT_SOCIAL,
        governance: e.ESG_WEIGHT_GOVERNANCE,
      }),
      minCompleteness: e.ESG_MIN_COMPLETENESS,
      improvementThreshold: e.ESG_IMPROVEMENT_THRESHOLD,
      strengthThreshold: e.ESG_STRENGTH_THRESHOLD,
    },
    databasePath: e.DATABASE_PATH || null,
    anthropicApiKey: e.ANTHROPIC_API_KEY || null,
    anthropicModel: e.ANTHROPIC_MODEL,
    suggestionTimeoutMs: e.SUGGESTION_TIMEOUT_MS,
  };
}
