/**
 * Guild Wiki — src/lib/schedulerHealth.ts
 * WHAT: Health tracking for background jobs (currently the wiki maintenance cycle).
 * WHY: A failed cycle only logs and waits a full day, so repeated failures need a louder signal.
 * FLOWS:
 *  - recordSchedulerRun(name, success) → update state → error log once threshold is crossed
 *  - getSchedulerHealthByName(name) → copy of one job's state
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";

export interface SchedulerHealth {
  name: string;
  /** Epoch ms of the last attempt, null if never run */
  lastRunAt: number | null;
  lastSuccessAt: number | null;
  lastErrorAt: number | null;
  /** Failures since the last success */
  consecutiveFailures: number;
  totalRuns: number;
  totalFailures: number;
}

/** Consecutive failures before an error-level alert */
export const CONSECUTIVE_FAILURE_ALERT_THRESHOLD = 3;

const schedulerHealth = new Map<string, SchedulerHealth>();

/**
 * @example
 * try {
 *   runMaintenanceCycle(store);
 *   recordSchedulerRun("wikiMaintenance", true);
 * } catch (err) {
 *   recordSchedulerRun("wikiMaintenance", false);
 * }
 */
export function recordSchedulerRun(name: string, success: boolean): void {
  const now = Date.now();
  const health: SchedulerHealth = schedulerHealth.get(name) ?? {
    name,
    lastRunAt: null,
    lastSuccessAt: null,
    lastErrorAt: null,
    consecutiveFailures: 0,
    totalRuns: 0,
    totalFailures: 0,
  };

  health.lastRunAt = now;
  health.totalRuns++;

  if (success) {
    health.lastSuccessAt = now;
    health.consecutiveFailures = 0;
  } else {
    health.lastErrorAt = now;
    health.consecutiveFailures++;
    health.totalFailures++;
  }

  schedulerHealth.set(name, health);

  if (health.consecutiveFailures >= CONSECUTIVE_FAILURE_ALERT_THRESHOLD) {
    logger.error(
      {
        scheduler: name,
        consecutiveFailures: health.consecutiveFailures,
        totalFailures: health.totalFailures,
        totalRuns: health.totalRuns,
      },
      "[scheduler] Multiple consecutive failures - requires attention"
    );
  }
}

export function getSchedulerHealthByName(name: string): SchedulerHealth | undefined {
  const health = schedulerHealth.get(name);
  return health ? { ...health } : undefined;
}

/** Test helper: wipe all tracked jobs. */
export function _clearAllSchedulerHealth(): void {
  schedulerHealth.clear();
}
