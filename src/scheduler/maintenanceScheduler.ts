/**
 * Guild Wiki — src/scheduler/maintenanceScheduler.ts
 * WHAT: Recurring driver for the wiki maintenance cycle.
 * WHY: Snapshots, expiry and compaction have no user trigger; they run on a fixed cadence.
 * FLOWS:
 *  - start → tick now → run cycle → arm next tick 24h after this run finished → …
 *  - failure → classify + log + recordSchedulerRun(false) → wait for the next tick
 *  - stop → clear pending tick
 * DOCS:
 *  - setTimeout: https://nodejs.org/api/timers.html#settimeoutcallback-delay-args
 *
 * NOTE: A setTimeout chain, not setInterval: the next tick is armed only after the current
 * run returns, so two cycles can never overlap.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { WikiStore } from "../db/store.js";
import { runMaintenanceCycle } from "../features/wiki/maintenance.js";
import { isMaintenanceSchedulerDisabled } from "../lib/env.js";
import { classifyError, errorContext, shouldReportToSentry } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { recordSchedulerRun } from "../lib/schedulerHealth.js";

export const MAINTENANCE_INTERVAL_MS = 24 * 60 * 60 * 1000;

const SCHEDULER_NAME = "wikiMaintenance";

export interface MaintenanceSchedulerOptions {
  /** Gap between the end of one run and the start of the next. */
  intervalMs?: number;
  /** Delay before the first run. */
  initialDelayMs?: number;
}

interface ActiveSchedule {
  store: WikiStore;
  intervalMs: number;
  timer: NodeJS.Timeout | null;
  /** Epoch ms of the pending tick; null while a run is in progress */
  nextRunAtMs: number | null;
}

let _active: ActiveSchedule | null = null;

function runScheduledCycle(store: WikiStore): void {
  try {
    runMaintenanceCycle(store);
    recordSchedulerRun(SCHEDULER_NAME, true);
  } catch (err) {
    recordSchedulerRun(SCHEDULER_NAME, false);
    const classified = classifyError(err);
    const context = errorContext(classified, { scheduler: SCHEDULER_NAME });
    if (shouldReportToSentry(classified)) {
      logger.error({ err, ...context }, "[wiki:maintenance] cycle failed; retrying next tick");
    } else {
      logger.warn(context, "[wiki:maintenance] cycle failed; retrying next tick");
    }
  }
}

function arm(schedule: ActiveSchedule, delayMs: number): void {
  schedule.nextRunAtMs = Date.now() + delayMs;
  const timer = setTimeout(() => {
    schedule.timer = null;
    schedule.nextRunAtMs = null;

    runScheduledCycle(schedule.store);

    // Stopped (or restarted) while the run was in progress
    if (_active !== schedule) return;
    arm(schedule, schedule.intervalMs);
  }, delayMs);

  // Never keep the process alive just for maintenance
  timer.unref();
  schedule.timer = timer;
}

/**
 * @example
 * client.once(Events.ClientReady, () => startMaintenanceScheduler(store));
 * process.on("SIGTERM", () => stopMaintenanceScheduler());
 */
export function startMaintenanceScheduler(
  store: WikiStore,
  options: MaintenanceSchedulerOptions = {}
): void {
  if (isMaintenanceSchedulerDisabled()) {
    logger.debug("[wiki:maintenance] scheduler disabled via env flag");
    return;
  }
  if (_active) {
    logger.warn("[wiki:maintenance] scheduler already running; start ignored");
    return;
  }

  const intervalMs = options.intervalMs ?? MAINTENANCE_INTERVAL_MS;
  const schedule: ActiveSchedule = { store, intervalMs, timer: null, nextRunAtMs: null };
  _active = schedule;

  logger.info(
    { intervalHours: intervalMs / (60 * 60 * 1000) },
    "[wiki:maintenance] scheduler starting"
  );
  arm(schedule, options.initialDelayMs ?? 0);
}

export function stopMaintenanceScheduler(): void {
  if (!_active) return;
  if (_active.timer) clearTimeout(_active.timer);
  _active = null;
  logger.info("[wiki:maintenance] scheduler stopped");
}

export function isMaintenanceSchedulerRunning(): boolean {
  return _active !== null;
}

/** When the pending tick fires; null if stopped or mid-run. */
export function nextMaintenanceRunAt(): Date | null {
  if (!_active || _active.nextRunAtMs === null) return null;
  return new Date(_active.nextRunAtMs);
}

/**
 * Whole seconds until the next cycle, rounded up. Null when the scheduler is not started;
 * 0 while a cycle is running.
 */
export function timeUntilNextMaintenance(): number | null {
  if (!_active) return null;
  if (_active.nextRunAtMs === null) return 0;
  return Math.max(0, Math.ceil((_active.nextRunAtMs - Date.now()) / 1000));
}
