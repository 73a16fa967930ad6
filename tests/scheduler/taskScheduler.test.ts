/**
 * WHAT: Proves task registration rules, due-task evaluation (misfire, busy, coalescing), start/shutdown
 *       and unregistered-callable handling.
 * HOW: Injected clock, in-memory SQLite and callables recorded in arrays. Most tests drive runDueTasks()
 *      directly; the timer path runs under fake timers. waitForIdle() settles launched runs.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Client } from "discord.js";
import type { Db } from "../../src/db/db.js";
import { SchedulerStartError, TaskDefinitionError } from "../../src/lib/errors.js";
import { SqliteJobStore } from "../../src/scheduler/jobStore.js";
import { TaskHealthTracker } from "../../src/scheduler/taskHealth.js";
import { TaskRegistry, type TaskContext } from "../../src/scheduler/taskRegistry.js";
import { TaskScheduler } from "../../src/scheduler/taskScheduler.js";
import { GuildSettingsStore } from "../../src/store/guildSettingsStore.js";
import {
  captureLogger,
  createTestDb,
  findLog,
  findLogs,
  makeConfig,
  type LogRecord,
} from "../utils/dbFixtures.js";

const T0 = Date.UTC(2024, 0, 1, 12, 0, 0);
const MINUTE = 60_000;

let now: number;
let calls: TaskContext[];
let releaseSlow: () => void;
let records: LogRecord[];
let store: SqliteJobStore;
let health: TaskHealthTracker;
let scheduler: TaskScheduler;

function makeScheduler(db: Db = createTestDb()): TaskScheduler {
  const captured = captureLogger();
  records = captured.records;
  store = new SqliteJobStore(db, captured.logger);

  const registry = new TaskRegistry()
    .register("test.record", (ctx) => {
      calls.push(ctx);
    })
    .register("test.fail", () => {
      throw new Error("boom");
    })
    .register("test.slow", async (ctx) => {
      calls.push(ctx);
      await new Promise<void>((resolve) => {
        releaseSlow = resolve;
      });
    });

  health = new TaskHealthTracker(captured.logger, () => now);
  return new TaskScheduler({
    store,
    registry,
    health,
    settings: new GuildSettingsStore(db, makeConfig()),
    client: new Client({ intents: [] }),
    logger: captured.logger,
    config: { misfireGraceSeconds: 300, timezone: "UTC", maxSleepSeconds: 60 },
    clock: () => now,
  });
}

beforeEach(() => {
  now = T0;
  calls = [];
  releaseSlow = () => undefined;
  scheduler = makeScheduler();
});

afterEach(async () => {
  releaseSlow();
  await scheduler.shutdown({ waitForRunning: true });
});

describe("addTask", () => {
  it("rejects unknown callables", () => {
    expect(() => scheduler.addTask("t1", "nope", { type: "date", runAt: T0 })).toThrow(
      new TaskDefinitionError("t1", 'unknown callable "nope"')
    );
  });

  it("rejects an empty id", () => {
    expect(() => scheduler.addTask("  ", "test.record", { type: "date", runAt: T0 })).toThrow(
      TaskDefinitionError
    );
  });

  it("rejects invalid triggers", () => {
    expect(() => scheduler.addTask("t1", "test.record", { type: "interval" })).toThrow(/invalid trigger/);
    expect(() => scheduler.addTask("t1", "test.record", { type: "cron", hour: 99 })).toThrow(/invalid trigger/);
  });

  it("rejects a negative grace period", () => {
    expect(() =>
      scheduler.addTask("t1", "test.record", { type: "date", runAt: T0 }, {}, { misfireGraceSeconds: -1 })
    ).toThrow("misfireGraceSeconds must be a non-negative integer");
  });

  it("rejects args that are not JSON", () => {
    expect(() =>
      scheduler.addTask("t1", "test.record", { type: "date", runAt: T0 }, { count: BigInt(1) })
    ).toThrow("args must be JSON-serializable");
  });

  it("anchors an interval at registration time", () => {
    const info = scheduler.addTask("tick", "test.record", { type: "interval", seconds: 60 });

    expect(info.trigger).toEqual({ type: "interval", seconds: 60, startAt: T0 });
    expect(info.nextRunAt?.getTime()).toBe(T0 + MINUTE);
    expect(info.misfireGraceSeconds).toBe(300);
    expect(findLog(records, "task_added")).toMatchObject({ taskId: "tick", replaced: false });
  });

  it("computes the first cron fire", () => {
    now = T0 + 30_000;
    const info = scheduler.addTask("five", "test.record", { type: "cron", minute: "*/5" });
    expect(info.nextRunAt?.getTime()).toBe(T0 + 5 * MINUTE);
    expect(info.description).toBe("cron(0 */5 * * * *)");
  });

  it("replaces an interval with the newer definition", () => {
    scheduler.addTask("x", "test.record", { type: "interval", seconds: 10 });
    now += 1_000;
    scheduler.addTask("x", "test.record", { type: "interval", minutes: 5 });

    const tasks = scheduler.listTasks();
    expect(tasks).toHaveLength(1);
    expect(tasks[0].trigger).toEqual({ type: "interval", minutes: 5, startAt: T0 + 1_000 });
    expect(tasks[0].nextRunAt?.getTime()).toBe(T0 + 1_000 + 5 * MINUTE);
  });

  it("replaces an existing task but keeps its creation time", () => {
    scheduler.addTask("x", "test.record", { type: "date", runAt: T0 + MINUTE });
    now += 5_000;
    scheduler.addTask("x", "test.record", { type: "date", runAt: T0 + 2 * MINUTE });

    expect(store.get("x")).toMatchObject({ createdAt: T0, updatedAt: T0 + 5_000, nextRunAt: T0 + 2 * MINUTE });
    expect(findLogs(records, "task_added")[1]).toMatchObject({ replaced: true });
  });
});

describe("runDueTasks", () => {
  it("runs a due one-shot task once and removes it", async () => {
    scheduler.addTask("r1", "test.record", { type: "date", runAt: T0 + 1_000 }, { note: "hi" });
    now += 1_000;

    const summary = await scheduler.runDueTasks();
    await scheduler.waitForIdle();

    expect(summary).toEqual({ fired: ["r1"], misfired: [], busy: [] });
    expect(calls).toHaveLength(1);
    expect(calls[0].taskId).toBe("r1");
    expect(calls[0].args).toEqual({ note: "hi" });
    expect(calls[0].scheduledFor.getTime()).toBe(T0 + 1_000);
    expect(scheduler.getTask("r1")).toBeNull();
    expect(health.get("r1")).toBeUndefined();
  });

  it("keeps no run health for fired one-shot tasks", async () => {
    for (let i = 0; i < 20; i++) {
      scheduler.addTask(`once-${i}`, i % 2 === 0 ? "test.record" : "test.fail", { type: "date", runAt: T0 });
    }

    expect((await scheduler.runDueTasks()).fired).toHaveLength(20);
    await scheduler.waitForIdle();

    expect(scheduler.listTasks()).toEqual([]);
    expect(health.all()).toEqual([]);
  });

  it("leaves tasks that are not due yet alone", async () => {
    scheduler.addTask("later", "test.record", { type: "date", runAt: T0 + MINUTE });
    expect(await scheduler.runDueTasks()).toEqual({ fired: [], misfired: [], busy: [] });
    expect(scheduler.getTask("later")).not.toBeNull();
  });

  it("skips a run that is later than the grace period", async () => {
    scheduler.addTask("old", "test.record", { type: "date", runAt: T0 - 301_000 });

    const summary = await scheduler.runDueTasks();

    expect(summary.misfired).toEqual(["old"]);
    expect(calls).toHaveLength(0);
    expect(scheduler.getTask("old")).toBeNull();
    expect(findLog(records, "task_misfire")).toMatchObject({ taskId: "old", lateBySeconds: 301, graceSeconds: 300 });
  });

  it("still runs a late task within the grace period", async () => {
    scheduler.addTask("recent", "test.record", { type: "date", runAt: T0 - 10_000 });
    expect((await scheduler.runDueTasks()).fired).toEqual(["recent"]);
  });

  it("collapses missed fires of a recurring task into one run", async () => {
    scheduler.addTask("tick", "test.record", { type: "interval", minutes: 1 }, {}, { misfireGraceSeconds: 3600 });
    now += 10 * MINUTE;

    await scheduler.runDueTasks();
    await scheduler.waitForIdle();

    expect(calls).toHaveLength(1);
    expect(calls[0].scheduledFor.getTime()).toBe(T0 + MINUTE);
    expect(scheduler.getTask("tick")?.nextRunAt?.getTime()).toBe(T0 + 11 * MINUTE);
  });

  it("never overlaps runs of the same task", async () => {
    scheduler.addTask("slow", "test.slow", { type: "interval", seconds: 10 }, {}, { misfireGraceSeconds: 3600 });

    now += 10_000;
    expect((await scheduler.runDueTasks()).fired).toEqual(["slow"]);
    expect(scheduler.getTask("slow")?.running).toBe(true);

    now += 10_000;
    expect((await scheduler.runDueTasks()).busy).toEqual(["slow"]);
    expect(findLog(records, "task_busy")).toMatchObject({ taskId: "slow" });

    releaseSlow();
    await scheduler.waitForIdle();
    expect(scheduler.getTask("slow")?.running).toBe(false);

    now += 10_000;
    expect((await scheduler.runDueTasks()).fired).toEqual(["slow"]);
    expect(calls).toHaveLength(2);
  });

  it("logs a failing callable and keeps going", async () => {
    scheduler.addTask("bad", "test.fail", { type: "interval", seconds: 10 });
    scheduler.addTask("good", "test.record", { type: "interval", seconds: 10 });
    now += 10_000;

    const summary = await scheduler.runDueTasks();
    await scheduler.waitForIdle();

    expect(summary.fired.sort()).toEqual(["bad", "good"]);
    expect(calls).toHaveLength(1);
    expect(findLog(records, "task_run_error")).toMatchObject({ taskId: "bad", callable: "test.fail" });
    expect(health.get("bad")).toMatchObject({ consecutiveFailures: 1 });
    expect(scheduler.getTask("bad")?.nextRunAt?.getTime()).toBe(T0 + 20_000);
  });

  it("leaves tasks with unregistered callables in the store and reports them once", async () => {
    store.upsert({
      id: "orphan",
      callable: "gone.task",
      trigger: { type: "date", runAt: T0 - 1_000 },
      args: {},
      misfireGraceSeconds: 300,
      nextRunAt: T0 - 1_000,
      createdAt: T0,
      updatedAt: T0,
    });

    await scheduler.runDueTasks();
    await scheduler.runDueTasks();

    expect(calls).toHaveLength(0);
    expect(scheduler.getTask("orphan")).toMatchObject({ registered: false });
    expect(findLogs(records, "task_unregistered")).toHaveLength(1);
  });
});

describe("removeTask", () => {
  it("removes a stored task", () => {
    scheduler.addTask("x", "test.record", { type: "interval", minutes: 1 });
    expect(scheduler.removeTask("x")).toBe(true);
    expect(scheduler.listTasks()).toEqual([]);
  });

  it("drops run health when removed mid-run", async () => {
    scheduler.addTask("slow", "test.slow", { type: "interval", seconds: 10 }, {}, { misfireGraceSeconds: 3600 });
    now += 10_000;
    expect((await scheduler.runDueTasks()).fired).toEqual(["slow"]);

    expect(scheduler.removeTask("slow")).toBe(true);
    releaseSlow();
    await scheduler.waitForIdle();

    expect(health.get("slow")).toBeUndefined();
  });

  it("warns about a missing id", () => {
    expect(scheduler.removeTask("ghost")).toBe(false);
    expect(findLog(records, "task_remove_missing")).toMatchObject({ taskId: "ghost" });
  });
});

describe("start / shutdown", () => {
  it("runs tasks that came due while stopped", async () => {
    scheduler.addTask("r1", "test.record", { type: "date", runAt: T0 + 1_000 });
    now += 2_000;

    await scheduler.start();
    await scheduler.waitForIdle();

    expect(scheduler.isRunning).toBe(true);
    expect(calls).toHaveLength(1);
    expect(findLog(records, "scheduler_start")).toMatchObject({ tasks: 1, timezone: "UTC" });
  });

  it("ignores a second start", async () => {
    await scheduler.start();
    await scheduler.start();
    expect(findLogs(records, "scheduler_start")).toHaveLength(1);
    expect(findLog(records, "scheduler_start_twice")).toBeDefined();
  });

  it("fails to start when the job store is unusable", async () => {
    const db = createTestDb();
    const broken = makeScheduler(db);
    db.close();

    await expect(broken.start()).rejects.toBeInstanceOf(SchedulerStartError);
    expect(broken.isRunning).toBe(false);
  });

  it("accepts tasks on a fresh database before start and fires them after", async () => {
    const fresh = makeScheduler(createTestDb());
    fresh.addTask("early", "test.record", { type: "interval", seconds: 5 });
    expect(fresh.listTasks().map((task) => task.id)).toEqual(["early"]);

    now += 5_000;
    await fresh.start();
    await fresh.waitForIdle();
    await fresh.shutdown({ waitForRunning: true });

    expect(calls.map((ctx) => ctx.taskId)).toEqual(["early"]);
  });

  it("picks up persisted tasks after a restart", async () => {
    const db = createTestDb();
    const first = makeScheduler(db);
    first.addTask("tick", "test.record", { type: "interval", minutes: 1 }, { n: 1 });
    await first.start();
    await first.shutdown({ waitForRunning: true });
    expect(calls).toHaveLength(0);

    now += MINUTE;
    const second = makeScheduler(db);
    await second.start();
    await second.waitForIdle();
    await second.shutdown({ waitForRunning: true });

    expect(calls).toHaveLength(1);
    expect(calls[0]).toMatchObject({ taskId: "tick", args: { n: 1 } });
    expect(calls[0].scheduledFor.getTime()).toBe(T0 + MINUTE);
    expect(second.getTask("tick")?.nextRunAt?.getTime()).toBe(T0 + 2 * MINUTE);
  });

  it("skips a one-shot task that is past its grace period at start", async () => {
    scheduler.addTask("stale", "test.record", { type: "date", runAt: T0 - 301_000 });

    await scheduler.start();

    expect(calls).toHaveLength(0);
    expect(scheduler.getTask("stale")).toBeNull();
    expect(findLog(records, "task_misfire")).toMatchObject({ taskId: "stale", lateBySeconds: 301 });
  });

  it("fires due tasks from its own timer", async () => {
    vi.useFakeTimers();
    scheduler.addTask("tick", "test.record", { type: "interval", seconds: 30 });
    await scheduler.start();
    expect(calls).toHaveLength(0);

    now += 30_000;
    await vi.advanceTimersByTimeAsync(30_000);
    await scheduler.waitForIdle();

    expect(calls).toHaveLength(1);
    expect(calls[0].scheduledFor.getTime()).toBe(T0 + 30_000);
    expect(scheduler.getTask("tick")?.nextRunAt?.getTime()).toBe(T0 + 60_000);
  });

  it("returns from shutdown without waiting when not asked to", async () => {
    scheduler.addTask("slow", "test.slow", { type: "date", runAt: T0 });
    await scheduler.start();
    expect(calls).toHaveLength(1);

    await scheduler.shutdown({ waitForRunning: false });
    expect(scheduler.isRunning).toBe(false);

    let idle = false;
    const idling = scheduler.waitForIdle().then(() => {
      idle = true;
    });
    await new Promise((resolve) => setTimeout(resolve, 5));
    expect(idle).toBe(false);

    releaseSlow();
    await idling;
    expect(idle).toBe(true);
  });

  it("waits for running tasks only when asked to", async () => {
    scheduler.addTask("slow", "test.slow", { type: "date", runAt: T0 });
    await scheduler.start();

    let stopped = false;
    const stopping = scheduler.shutdown({ waitForRunning: true }).then(() => {
      stopped = true;
    });
    await new Promise((resolve) => setTimeout(resolve, 5));
    expect(stopped).toBe(false);

    releaseSlow();
    await stopping;
    expect(stopped).toBe(true);
    expect(scheduler.isRunning).toBe(false);
  });

  it("is safe to shut down twice", async () => {
    await scheduler.start();
    await scheduler.shutdown({ waitForRunning: false });
    await scheduler.shutdown({ waitForRunning: false });
    expect(findLogs(records, "scheduler_stop")).toHaveLength(1);
  });
});
