// esg-backend/src/app.ts
// Express app factory + service wiring

import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import { BenchmarkProvider, loadDefaultBenchmarks } from "./catalog/benchmarks";
import { loadDefaultCatalog } from "./catalog/questionCatalog";
import { loadDefaultCalendar, RegulatoryCalendarFeed } from "./catalog/regulatoryCalendar";
import type { AppConfig } from "./config";
import type { EsgRepository } from "./repositories/esgRepository";
import { InMemoryEsgRepository } from "./repositories/inMemoryRepository";
import { SqliteEsgRepository } from "./repositories/sqliteRepository";
import { AlertService } from "./services/alertService";
import { AnthropicSuggestionProvider } from "./services/anthropicClient";
import { AssessmentService } from "./services/assessmentService";
import { FORMULA_VERSION } from "./services/scoring";
import {
  AnswerSuggestionProvider,
  IndustryDefaultSuggestionProvider,
  SuggestionChain,
} from "./services/suggestions";
import type { QuestionCatalog } from "./types/assessment";
import { createAlertsRouter } from "./routes/alerts";
import { createEsgRouter } from "./routes/esgScore";
import { KeyedLock } from "./utils/keyedLock";
import { logger } from "./utils/logger";

export interface AppServices {
  repository: EsgRepository;
  catalog: QuestionCatalog;
  benchmarks: BenchmarkProvider;
  calendar: RegulatoryCalendarFeed;
  assessments: AssessmentService;
  alerts: AlertService;
  suggestions: SuggestionChain;
}

export interface ServiceOverrides {
  repository?: EsgRepository;
  calendar?: RegulatoryCalendarFeed;
  providers?: AnswerSuggestionProvider[];
  clock?: () => Date;
}

export function createRepository(config: AppConfig): EsgRepository {
  if (config.databasePath) {
    logger.info("[STORAGE] Using SQLite repository", { path: config.databasePath });
    return new SqliteEsgRepository(config.databasePath);
  }
  logger.info("[STORAGE] DATABASE_PATH not set, using in-memory repository");
  return new InMemoryEsgRepository();
}

function defaultProviders(config: AppConfig): AnswerSuggestionProvider[] {
  const providers: AnswerSuggestionProvider[] = [];
  if (config.anthropicApiKey) {
    providers.push(new AnthropicSuggestionProvider({ apiKey: config.anthropicApiKey, model: config.anthropicModel }));
  } else {
    logger.warn("[SUGGESTIONS] ANTHROPIC_API_KEY not set, Anthropic provider disabled");
  }
  providers.push(new IndustryDefaultSuggestionProvider());
  return providers;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): AppServices {
  const catalog = loadDefaultCatalog();
  const benchmarks = loadDefaultBenchmarks();
  const calendar = overrides.calendar ?? loadDefaultCalendar();
  const repository = overrides.repository ?? createRepository(config);
  const lock = new KeyedLock();

  return {
    repository,
    catalog,
    benchmarks,
    calendar,
    assessments: new AssessmentService({
      repository,
      catalog,
      benchmarks,
      config: config.scoring,
      lock,
      clock: overrides.clock,
    }),
    alerts: new AlertService({ repository, calendar, lock, clock: overrides.clock }),
    suggestions: new SuggestionChain(overrides.providers ?? defaultProviders(config), {
      timeoutMs: config.suggestionTimeoutMs,
    }),
  };
}

export function createApp(config: AppConfig, services: AppServices): express.Express {
  const app = express();

  app.use(
    cors({
      origin: (origin, callback) => {
        // requests without origin (curl, server-to-server)
        if (!origin) {
          return callback(null, true);
        }
        if (config.allowedOrigins.includes(origin)) {
          return callback(null, true);
        }
        logger.warn(`[CORS] Origin blocked: ${origin}`);
        return callback(new Error("Not allowed by CORS policy"), false);
      },
      credentials: true,
    })
  );

  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      service: "esg-backend",
      catalog_version: services.catalog.version,
      formula_version: FORMULA_VERSION,
      timestamp: new Date().toISOString(),
    });
  });

  app.use("/api/esg", createEsgRouter(services));
  app.use("/api/alerts", createAlertsRouter(services));

  app.use((_req, res) => {
    res.status(404).json({
      ok: false,
      error: "Endpoint not found",
    });
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ ok: false, error: "Malformed JSON body" });
      return;
    }
    if ("status" in err && err.status === 413) {
      res.status(413).json({ ok: false, error: "Request body too large" });
      return;
    }
    logger.error("Unhandled error", err);
    res.status(500).json({
      ok: false,
      error: "Internal server error",
    });
  });

  return app;
}
