/**
 * Guildwarden — src/scheduler/taskScheduler.ts
 * WHAT: Persistent cron / interval / date task scheduler on top of scheduled_tasks.
 * WHY: Reminders and housekeeping must survive restarts and must not pile up after downtime.
 * FLOWS:
 *  - start() → verify store → misfire sweep (runDueTasks) → arm timer
 *  - timer → runDueTasks() → per due task: misfire check → busy check → advance next run → launch → re-arm
 *  - addTask / removeTask → write through to SQLite → re-arm
 *  - shutdown({ waitForRunning }) → clear timer → optionally await in-flight callables
 * DOCS:
 *  - setTimeout/unref: https://nodejs.org/api/timers.html#timeoutunref
 *
 * NOTE: at most one in-flight run per task id. Missed fires of a recurring task
 * collapse into one run.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Client } from "discord.js";
import type { SchedulerConfig } from "../config/appConfig.js";
import { SchedulerStartError, TaskDefinitionError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import { currentCtx } from "../lib/reqctx.js";
import type { GuildSettingsStore } from "../store/guildSettingsStore.js";
import { argsSchema, type SqliteJobStore, type StoredTask, type TaskArgs } from "./jobStore.js";
import type { TaskHealthTracker } from "./taskHealth.js";
import type { TaskCallable, TaskRegistry } from "./taskRegistry.js";
import {
  computeNextFireTime,
  describeTrigger,
  triggerSchema,
  type TriggerSpec,
} from "./triggers.js";

export interface TaskSchedulerDeps {
  store: SqliteJobStore;
  registry: TaskRegistry;
  health: TaskHealthTracker;
  settings: GuildSettingsStore;
  client: Client;
  logger: Logger;
  config: SchedulerConfig;
  /** Injected for tests */
  clock?: () => number;
}

export interface AddTaskOptions {
  misfireGraceSeconds?: number;
}

export interface RunSummary {
  fired: string[];
  misfired: string[];
  busy: string[];
}

export interface ScheduledTaskInfo {
  id: string;
  callable: string;
  trigger: TriggerSpec;
  description: string;
  args: TaskArgs;
  misfireGraceSeconds: number;
  nextRunAt: Date | null;
  running: boolean;
  /** False when this process has no callable registered under that name */
  registered: boolean;
}

type State = "stopped" | "running";

export class TaskScheduler {
  private state: State = "stopped";
  private timer: NodeJS.Timeout | null = null;
  private readonly inFlight = new Map<string, Promise<void>>();
  private readonly reportedUnregistered = new Set<string>();
  // Removed while a run was in flight; that run must not bring its health entry back
  private readonly removedWhileRunning = new Set<string>();
  private readonly clock: () => number;
  private readonly log: Logger;

  constructor(private readonly deps: TaskSchedulerDeps) {
    this.clock = deps.clock ?? Date.now;
    this.log = deps.logger;
  }

  get isRunning(): boolean {
    return this.state === "running";
  }

  async start(): Promise<void> {
    if (this.state === "running") {
      this.log.warn({ evt: "scheduler_start_twice" }, "[scheduler] start() called while running; ignoring");
      return;
    }

    try {
      this.deps.store.verify();
    } catch (err) {
      throw new SchedulerStartError("Could not read the scheduled_tasks table", { cause: err });
    }

    this.state = "running";
    const tasks = this.deps.store.list();
    this.log.info(
      { evt: "scheduler_start", tasks: tasks.length, timezone: this.deps.config.timezone },
      "[scheduler] started"
    );
    for (const task of tasks) this.reportIfUnregistered(task);

    await this.runDueTasks();
  }

  /** Idempotent. In-flight callables are only awaited when asked to. */
  async shutdown(options: { waitForRunning: boolean } = { waitForRunning: false }): Promise<void> {
    const wasRunning = this.state === "running";
    this.state = "stopped";
    this.disarm();

    if (wasRunning) {
      this.log.info(
        { evt: "scheduler_stop", inFlight: this.inFlight.size, wait: options.waitForRunning },
        "[scheduler] stopped"
      );
    }
    if (options.waitForRunning) {
      await this.waitForIdle();
    }
  }

  /** Resolves once every run launched so far has settled. */
  async waitForIdle(): Promise<void> {
    await Promise.allSettled([...this.inFlight.values()]);
  }

  addTask(
    id: string,
    callable: string,
    trigger: TriggerSpec,
    args: TaskArgs = {},
    options: AddTaskOptions = {}
  ): ScheduledTaskInfo {
    if (id.trim().length === 0) {
      throw new TaskDefinitionError(id, "task id must not be empty");
    }
    if (!this.deps.registry.has(callable)) {
      throw new TaskDefinitionError(id, `unknown callable "${callable}"`);
    }

    const misfireGraceSeconds = options.misfireGraceSeconds ?? this.deps.config.misfireGraceSeconds;
    if (!Number.isInteger(misfireGraceSeconds) || misfireGraceSeconds < 0) {
      throw new TaskDefinitionError(id, "misfireGraceSeconds must be a non-negative integer");
    }

    const now = this.clock();
    const parsed = triggerSchema.safeParse(trigger);
    if (!parsed.success) {
      throw new TaskDefinitionError(id, `invalid trigger: ${parsed.error.issues[0]?.message ?? "unknown"}`);
    }
    // Interval periods count from registration unless the caller pinned an anchor
    const normalized: TriggerSpec =
      parsed.data.type === "interval" && parsed.data.startAt === undefined
        ? { ...parsed.data, startAt: now }
        : parsed.data;

    let nextRunAt: number | null;
    try {
      // A date in the past is still stored; the misfire rule decides what happens to it
      nextRunAt =
        normalized.type === "date" ? normalized.runAt : this.nextFire(normalized, now);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new TaskDefinitionError(id, `invalid trigger: ${reason}`);
    }

    let storedArgs: TaskArgs;
    try {
      storedArgs = argsSchema.parse(JSON.parse(JSON.stringify(args)));
    } catch {
      throw new TaskDefinitionError(id, "args must be JSON-serializable");
    }

    const existing = this.deps.store.get(id);
    const task: StoredTask = {
      id,
      callable,
      trigger: normalized,
      args: storedArgs,
      misfireGraceSeconds,
      nextRunAt,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };
    this.deps.store.upsert(task);
    this.reportedUnregistered.delete(id);
    this.removedWhileRunning.delete(id);

    this.log.info(
      {
        evt: "task_added",
        taskId: id,
        callable,
        trigger: describeTrigger(normalized),
        nextRunAt: nextRunAt === null ? null : new Date(nextRunAt).toISOString(),
        replaced: existing !== null,
        traceId: currentCtx().traceId,
      },
      `[scheduler] task "${id}" scheduled`
    );

    this.rearm();
    return this.toInfo(task);
  }

  /** Missing ids are logged, never thrown. */
  removeTask(id: string): boolean {
    const removed = this.deps.store.delete(id);
    if (removed) {
      this.deps.health.forget(id);
      if (this.inFlight.has(id)) this.removedWhileRunning.add(id);
      this.log.info({ evt: "task_removed", taskId: id }, `[scheduler] task "${id}" removed`);
      this.rearm();
    } else {
      this.log.warn({ evt: "task_remove_missing", taskId: id }, `[scheduler] no task "${id}" to remove`);
    }
    return removed;
  }

  getTask(id: string): ScheduledTaskInfo | null {
    const task = this.deps.store.get(id);
    return task ? this.toInfo(task) : null;
  }

  listTasks(): ScheduledTaskInfo[] {
    return this.deps.store.list().map((task) => this.toInfo(task));
  }

  /**
   * One evaluation pass over stored tasks. Launches what is due without
   * awaiting it, then re-arms the timer when the scheduler is running.
   */
  async runDueTasks(): Promise<RunSummary> {
    const summary: RunSummary = { fired: [], misfired: [], busy: [] };
    const now = this.clock();

    for (const task of this.deps.store.list()) {
      if (task.nextRunAt === null || task.nextRunAt > now) continue;

      const callable = this.deps.registry.get(task.callable);
      if (!callable) {
        this.reportIfUnregistered(task);
        continue;
      }

      const dueAt = task.nextRunAt;
      const latenessMs = now - dueAt;
      this.advance(task, now);

      if (latenessMs > task.misfireGraceSeconds * 1000) {
        summary.misfired.push(task.id);
        this.log.warn(
          {
            evt: "task_misfire",
            taskId: task.id,
            dueAt: new Date(dueAt).toISOString(),
            lateBySeconds: Math.round(latenessMs / 1000),
            graceSeconds: task.misfireGraceSeconds,
          },
          `[scheduler] task "${task.id}" missed its run by more than the grace period; skipped`
        );
        continue;
      }

      if (this.inFlight.has(task.id)) {
        summary.busy.push(task.id);
        this.log.warn(
          { evt: "task_busy", taskId: task.id },
          `[scheduler] task "${task.id}" is still running; skipped this run`
        );
        continue;
      }

      summary.fired.push(task.id);
      this.launch(task, dueAt, callable);
    }

    this.rearm();
    return summary;
  }

  /** Recurring tasks move past `now`; one-shot tasks leave the store. */
  private advance(task: StoredTask, now: number): void {
    if (task.trigger.type === "date") {
      this.deps.store.delete(task.id);
      return;
    }
    let next: number | null;
    try {
      next = this.nextFire(task.trigger, now);
    } catch (err) {
      // Stored cron that no longer parses: stop it firing, keep the row for inspection
      this.log.error(
        { evt: "task_trigger_invalid", taskId: task.id, err },
        `[scheduler] task "${task.id}" has an invalid trigger; disabled`
      );
      next = null;
    }
    this.deps.store.setNextRunAt(task.id, next, now);
  }

  private launch(task: StoredTask, dueAt: number, callable: TaskCallable): void {
    const { settings, client } = this.deps;
    const taskLog = this.log.child({ taskId: task.id, callable: task.callable });

    const run = (async () => {
      const startedAt = this.clock();
      taskLog.info({ evt: "task_run_start" }, `[scheduler] running "${task.id}"`);
      try {
        await callable({
          taskId: task.id,
          scheduledFor: new Date(dueAt),
          args: task.args,
          settings,
          logger: taskLog,
          client,
        });
        this.recordRun(task, true);
        taskLog.info(
          { evt: "task_run_ok", ms: this.clock() - startedAt },
          `[scheduler] "${task.id}" finished`
        );
      } catch (err) {
        this.recordRun(task, false);
        taskLog.error({ evt: "task_run_error", err }, `[scheduler] "${task.id}" failed`);
      } finally {
        this.inFlight.delete(task.id);
      }
    })();

    this.inFlight.set(task.id, run);
  }

  /** Health is kept only for tasks still scheduled; one-shot runs leave no entry. */
  private recordRun(task: StoredTask, success: boolean): void {
    const removed = this.removedWhileRunning.delete(task.id);
    if (removed || task.trigger.type === "date") {
      this.deps.health.forget(task.id);
      return;
    }
    this.deps.health.record(task.id, success);
  }

  private nextFire(trigger: TriggerSpec, after: number): number | null {
    return computeNextFireTime(trigger, after, { defaultTimezone: this.deps.config.timezone });
  }

  private reportIfUnregistered(task: StoredTask): void {
    if (this.deps.registry.has(task.callable) || this.reportedUnregistered.has(task.id)) return;
    this.reportedUnregistered.add(task.id);
    this.log.warn(
      { evt: "task_unregistered", taskId: task.id, callable: task.callable },
      `[scheduler] task "${task.id}" refers to unregistered callable "${task.callable}"; left in store`
    );
  }

  private rearm(): void {
    if (this.state !== "running") return;
    this.disarm();

    const now = this.clock();
    const maxSleepMs = this.deps.config.maxSleepSeconds * 1000;
    let delay = maxSleepMs;
    for (const task of this.deps.store.list()) {
      if (task.nextRunAt === null || !this.deps.registry.has(task.callable)) continue;
      delay = Math.min(delay, Math.max(0, task.nextRunAt - now));
      break; // list() is ordered by next_run_at
    }

    this.timer = setTimeout(() => {
      this.timer = null;
      this.runDueTasks().catch((err: unknown) => {
        this.log.error({ evt: "scheduler_pass_error", err }, "[scheduler] evaluation pass failed");
        this.rearm();
      });
    }, delay);
    // unref() so a pending wake-up never holds the process open on shutdown
    this.timer.unref();
  }

  private disarm(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private toInfo(task: StoredTask): ScheduledTaskInfo {
    return {
      id: task.id,
      callable: task.callable,
      trigger: task.trigger,
      description: describeTrigger(task.trigger),
      args: task.args,
      misfireGraceSeconds: task.misfireGraceSeconds,
      nextRunAt: task.nextRunAt === null ? null : new Date(task.nextRunAt),
      running: this.inFlight.has(task.id),
      registered: this.deps.registry.has(task.callable),
    };
  }
}
