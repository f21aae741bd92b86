import cron, { ScheduledTask } from "node-cron";
import { Logger } from "winston";
import { SyncStatus } from "../utils/types/sync.types";

export type HealthState = "UP" | "DEGRADED";

export interface HealthReport {
  status: HealthState;
  reasons: string[];
}

/**
 * UP while the engine runs and has made progress (or had nothing to do)
 * within the stall threshold; DEGRADED otherwise. A paused engine is UP.
 */
export function evaluateHealth(
  status: SyncStatus,
  now: Date,
  stallThresholdMs: number
): HealthReport {
  const reasons: string[] = [];

  if (!status.isRunning) {
    reasons.push("sync engine is not running");
  }

  const behind =
    status.safeHead !== null &&
    status.lastIndexed !== null &&
    status.lastIndexed < status.safeHead;
  const lastProgress = status.lastProgressAt?.getTime();
  if (
    !status.isPaused &&
    behind &&
    (lastProgress === undefined || now.getTime() - lastProgress > stallThresholdMs)
  ) {
    reasons.push("no block indexed within the stall threshold");
  }

  return { status: reasons.length === 0 ? "UP" : "DEGRADED", reasons };
}

/**
 * Periodically logs the sync status and warns when it degrades.
 */
export function scheduleHealthCheck(
  expression: string,
  getStatus: () => SyncStatus,
  stallThresholdMs: number,
  logger: Logger
): ScheduledTask {
  const task = cron.schedule(expression, () => {
    const status = getStatus();
    const report = evaluateHealth(status, new Date(), stallThresholdMs);

    logger.debug("Sync status", {
      state: status.state,
      lastIndexed: status.lastIndexed,
      safeHead: status.safeHead,
      counters: status.counters,
    });

    if (report.status !== "UP") {
      logger.warn("Sync engine degraded", {
        reasons: report.reasons,
        lastIndexed: status.lastIndexed,
        safeHead: status.safeHead,
        lastError: status.lastError,
      });
    }
  });

  logger.info("Health check scheduled", { expression });
  return task;
}
