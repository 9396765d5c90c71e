// esg-backend/src/routes/respond.ts
// Shared request logging and error responses for the routers

import { Response } from "express";
import { ZodError } from "zod";
import { EsgEngineError, IncompleteAssessmentError, statusForError } from "../errors";
import { logger } from "../utils/logger";

export function logStart(route: string): number {
  logger.info(`${route} - Request started`);
  return Date.now();
}

export function logDone(route: string, startTime: number): void {
  logger.info(`${route} - Completed in ${Date.now() - startTime}ms`);
}

export function zodMessage(error: ZodError): string {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}

export function sendBadRequest(res: Response, route: string, message: string): Response {
  logger.warn(`${route} - Invalid request: ${message}`);
  return res.status(400).json({ ok: false, error: message });
}

/**
 * Maps engine errors to their status; anything else is a logged 500.
 */
export function sendError(res: Response, route: string, startTime: number, error: unknown): Response {
  const duration = Date.now() - startTime;

  if (error instanceof ZodError) {
    return sendBadRequest(res, route, zodMessage(error));
  }

  const status = statusForError(error);
  if (status === 500 || !(error instanceof EsgEngineError)) {
    logger.error(`${route} - Failed after ${duration}ms`, error);
    return res.status(500).json({ ok: false, error: "Internal server error" });
  }

  logger.warn(`${route} - ${error.code} after ${duration}ms: ${error.message}`);
  const body: Record<string, unknown> = { ok: false, error: error.message, code: error.code };
  if (error instanceof IncompleteAssessmentError) {
    body.data_completeness = error.completeness;
    body.required_completeness = error.required;
  }
  return res.status(status).json(body);
}
