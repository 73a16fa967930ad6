/**
 * Guildwarden — src/scheduler/taskHealth.ts
 * WHAT: Per-task run health (last run, last success, consecutive failures).
 * WHY: /health shows it, and repeated failures get one loud log line.
 * FLOWS:
 *  - record(taskId, success) → update state → error log once the failure streak hits the threshold
 *  - all() / get(taskId) → copies for display
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Logger } from "../lib/logger.js";

export interface TaskRunHealth {
  taskId: string;
  /** Timestamp of last run attempt (success or failure), null if never run */
  lastRunAt: number | null;
  lastSuccessAt: number | null;
  lastErrorAt: number | null;
  /** Count of consecutive failures since last success */
  consecutiveFailures: number;
  totalRuns: number;
  totalFailures: number;
}

/** Consecutive failures before emitting an alert log */
export const CONSECUTIVE_FAILURE_ALERT_THRESHOLD = 3;

export class TaskHealthTracker {
  private readonly health = new Map<string, TaskRunHealth>();

  constructor(
    private readonly logger: Logger,
    private readonly clock: () => number = Date.now
  ) {}

  record(taskId: string, success: boolean): TaskRunHealth {
    const now = this.clock();
    const health: TaskRunHealth = this.health.get(taskId) ?? {
      taskId,
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

    this.health.set(taskId, health);

    if (health.consecutiveFailures === CONSECUTIVE_FAILURE_ALERT_THRESHOLD) {
      this.logger.error(
        {
          evt: "task_failing",
          taskId,
          consecutiveFailures: health.consecutiveFailures,
          totalFailures: health.totalFailures,
          totalRuns: health.totalRuns,
        },
        "[scheduler] Multiple consecutive failures - requires attention"
      );
    }
    return { ...health };
  }

  get(taskId: string): TaskRunHealth | undefined {
    const health = this.health.get(taskId);
    return health ? { ...health } : undefined;
  }

  all(): TaskRunHealth[] {
    return [...this.health.values()]
      .map((h) => ({ ...h }))
      .sort((a, b) => a.taskId.localeCompare(b.taskId));
  }

  forget(taskId: string): void {
    this.health.delete(taskId);
  }
}
