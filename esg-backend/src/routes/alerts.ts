// esg-backend/src/routes/alerts.ts

import { Router, Request, Response } from "express";
import { z } from "zod";
import type { AlertService } from "../services/alertService";
import { logDone, logStart, sendBadRequest, sendError, zodMessage } from "./respond";

export interface AlertRouterDeps {
  alerts: AlertService;
}

const UserBodySchema = z.object({
  userId: z.string().min(1),
});

export function createAlertsRouter(deps: AlertRouterDeps): Router {
  const router = Router();

  router.post("/generate", async (req: Request, res: Response) => {
    const route = "POST /api/alerts/generate";
    const startTime = logStart(route);

    const parsed = UserBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return sendBadRequest(res, route, zodMessage(parsed.error));
    }

    try {
      const outcome = await deps.alerts.generateForUser(parsed.data.userId);
      logDone(route, startTime);
      return res.json({
        ok: true,
        alerts: outcome.alerts,
        created: outcome.created,
        refreshed: outcome.refreshed,
        unchanged: outcome.unchanged,
      });
    } catch (error) {
      return sendError(res, route, startTime, error);
    }
  });

  router.get("/active/:userId", async (req: Request, res: Response) => {
    const route = "GET /api/alerts/active";
    const startTime = logStart(route);

    try {
      const alerts = await deps.alerts.listActive(req.params.userId);
      logDone(route, startTime);
      return res.json({ ok: true, alerts });
    } catch (error) {
      return sendError(res, route, startTime, error);
    }
  });

  router.post("/:alertId/resolve", async (req: Request, res: Response) => {
    const route = "POST /api/alerts/resolve";
    const startTime = logStart(route);

    const parsed = UserBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return sendBadRequest(res, route, zodMessage(parsed.error));
    }

    try {
      const alert = await deps.alerts.resolve(parsed.data.userId, req.params.alertId);
      logDone(route, startTime);
      return res.json({ ok: true, alert });
    } catch (error) {
      return sendError(res, route, startTime, error);
    }
  });

  router.get("/readiness/:userId", async (req: Request, res: Response) => {
    const route = "GET /api/alerts/readiness";
    const startTime = logStart(route);

    try {
      const readiness = await deps.alerts.readiness(req.params.userId);
      logDone(route, startTime);
      return res.json({ ok: true, ...readiness });
    } catch (error) {
      return sendError(res, route, startTime, error);
    }
  });

  router.get("/recommendations/:userId", async (req: Request, res: Response) => {
    const route = "GET /api/alerts/recommendations";
    const startTime = logStart(route);

    try {
      const recommendations = await deps.alerts.recommendations(req.params.userId);
      logDone(route, startTime);
      return res.json({ ok: true, ...recommendations });
    } catch (error) {
      return sendError(res, route, startTime, error);
    }
  });

  router.get("/penalty-warnings/:userId", async (req: Request, res: Response) => {
    const route = "GET /api/alerts/penalty-warnings";
    const startTime = logStart(route);

    try {
      const warnings = await deps.alerts.penaltyWarnings(req.params.userId);
      logDone(route, startTime);
      return res.json({ ok: true, warnings });
    } catch (error) {
      return sendError(res, route, startTime, error);
    }
  });

  router.get("/roi/:userId", async (req: Request, res: Response) => {
    const route = "GET /api/alerts/roi";
    const startTime = logStart(route);

    try {
      const estimate = await deps.alerts.roiEstimate(req.params.userId);
      logDone(route, startTime);
      return res.json({ ok: true, ...estimate });
    } catch (error) {
      return sendError(res, route, startTime, error);
    }
  });

  router.get("/dashboard/:userId", async (req: Request, res: Response) => {
    const route = "GET /api/alerts/dashboard";
    const startTime = logStart(route);

    try {
      const dashboard = await deps.alerts.riskDashboard(req.params.userId);
      logDone(route, startTime);
      return res.json({ ok: true, ...dashboard });
    } catch (error) {
      return sendError(res, route, startTime, error);
    }
  });

  return router;
}
