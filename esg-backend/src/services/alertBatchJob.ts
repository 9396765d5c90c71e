// esg-backend/src/services/alertBatchJob.ts
// Restartable alert generation over every user with history

import { AlertGenerationError } from "../errors";
import type { EsgRepository } from "../repositories/esgRepository";
import { logger } from "../utils/logger";
import type { AlertService } from "./alertService";

export interface AlertBatchResult {
  jobId: string;
  processed: string[];
  skipped: string[];
  failed: Array<{ userId: string; error: string }>;
  cancelled: boolean;
}

export interface AlertBatchDeps {
  repository: EsgRepository;
  alerts: Pick<AlertService, "generateForUser">;
}

/**
 * Processes users one at a time. Each finished user is checkpointed under
 * `jobId`; a rerun with the same id skips them. A user whose generation
 * fails is logged and left without a checkpoint. The signal is checked
 * between users.
 */
export async function runAlertBatch(
  jobId: string,
  deps: AlertBatchDeps,
  signal?: AbortSignal
): Promise<AlertBatchResult> {
  const startTime = Date.now();
  const result: AlertBatchResult = { jobId, processed: [], skipped: [], failed: [], cancelled: false };

  const users = await deps.repository.listUsers();
  const done = new Set(await deps.repository.listCheckpoints(jobId));

  logger.info("[BATCH] Alert batch started", { jobId, users: users.length, checkpointed: done.size });

  for (const userId of users) {
    if (signal?.aborted) {
      result.cancelled = true;
      logger.warn("[BATCH] Alert batch cancelled", { jobId, processed: result.processed.length });
      break;
    }
    if (done.has(userId)) {
      result.skipped.push(userId);
      continue;
    }

    try {
      await deps.alerts.generateForUser(userId);
    } catch (err) {
      const failure = err instanceof AlertGenerationError ? err : new AlertGenerationError(userId, err);
      logger.error("[BATCH] Alert generation failed", failure, { jobId, userId });
      result.failed.push({ userId, error: failure.message });
      continue;
    }

    await deps.repository.saveCheckpoint(jobId, userId);
    result.processed.push(userId);
  }

  logger.info("[BATCH] Alert batch finished", {
    jobId,
    processed: result.processed.length,
    skipped: result.skipped.length,
    failed: result.failed.length,
    cancelled: result.cancelled,
    durationMs: Date.now() - startTime,
  });

  return result;
}

// ============================================================
// DAILY SWEEP
// ============================================================

export function dailyJobId(now: Date): string {
  return `alerts-${now.toISOString().slice(0, 10)}`;
}

export interface DailySweep {
  /** resolves to null when a sweep is already running */
  run(): Promise<AlertBatchResult | null>;
}

/**
 * Runs the batch under one job id per UTC day, so a sweep started again on
 * the same day resumes from its checkpoints. At most one sweep runs at a time.
 */
export function createDailySweep(
  deps: AlertBatchDeps,
  signal?: AbortSignal,
  clock: () => Date = () => new Date()
): DailySweep {
  let inFlight: Promise<AlertBatchResult> | null = null;

  return {
    async run() {
      const jobId = dailyJobId(clock());
      if (inFlight !== null) {
        logger.warn("[BATCH] Alert sweep still running, skipped", { jobId });
        return null;
      }

      inFlight = runAlertBatch(jobId, deps, signal);
      try {
        return await inFlight;
      } finally {
        inFlight = null;
      }
    },
  };
}
