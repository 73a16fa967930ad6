/**
 * WHAT: Proves scheduled_tasks persistence: table created on construction, upsert keeps created_at, ordering,
 *       and skipping unreadable rows.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect, beforeEach } from "vitest";
import type { Db } from "../../src/db/db.js";
import { SqliteJobStore, type StoredTask } from "../../src/scheduler/jobStore.js";
import { captureLogger, createTestDb, findLog, type LogRecord } from "../utils/dbFixtures.js";

let db: Db;
let store: SqliteJobStore;
let records: LogRecord[];

function task(id: string, nextRunAt: number | null, overrides: Partial<StoredTask> = {}): StoredTask {
  return {
    id,
    callable: "test.noop",
    trigger: { type: "interval", minutes: 5, startAt: 0 },
    args: { channel: "1" },
    misfireGraceSeconds: 60,
    nextRunAt,
    createdAt: 100,
    updatedAt: 100,
    ...overrides,
  };
}

beforeEach(() => {
  db = createTestDb();
  const captured = captureLogger();
  records = captured.records;
  store = new SqliteJobStore(db, captured.logger);
});

describe("SqliteJobStore", () => {
  it("creates its table on construction", () => {
    expect(
      db.prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'scheduled_tasks'`).get()
    ).toEqual({ name: "scheduled_tasks" });
    expect(store.list()).toEqual([]);
    expect(() => store.verify()).not.toThrow();
  });

  it("fails verification on a closed handle", () => {
    db.close();
    expect(() => store.verify()).toThrow();
  });

  it("round-trips a task", () => {
    store.upsert(task("a", 300_000));
    expect(store.get("a")).toEqual(task("a", 300_000));
    expect(store.get("missing")).toBeNull();
  });

  it("keeps created_at when replacing", () => {
    store.upsert(task("a", 1));
    store.upsert(task("a", 2, { createdAt: 999, updatedAt: 500, callable: "test.other" }));

    expect(store.get("a")).toMatchObject({ nextRunAt: 2, createdAt: 100, updatedAt: 500, callable: "test.other" });
  });

  it("lists soonest first with exhausted tasks last", () => {
    store.upsert(task("late", 900));
    store.upsert(task("never", null));
    store.upsert(task("soon", 100));

    expect(store.list().map((t) => t.id)).toEqual(["soon", "late", "never"]);
  });

  it("updates next run and deletes", () => {
    store.upsert(task("a", 1));
    store.setNextRunAt("a", 42, 200);
    expect(store.get("a")).toMatchObject({ nextRunAt: 42, updatedAt: 200 });

    expect(store.delete("a")).toBe(true);
    expect(store.delete("a")).toBe(false);
  });

  it("skips rows it cannot decode and logs them", () => {
    store.upsert(task("good", 1));
    db.prepare(
      `INSERT INTO scheduled_tasks (id, callable, trigger_json, args_json, misfire_grace_s, next_run_at, created_at, updated_at)
       VALUES ('bad', 'test.noop', 'not json', '{}', 60, 1, 1, 1)`
    ).run();

    expect(store.list().map((t) => t.id)).toEqual(["good"]);
    expect(findLog(records, "task_row_invalid")).toMatchObject({ taskId: "bad" });
  });
});
