/**
 * Guildwarden — src/scheduler/jobStore.ts
 * WHAT: SQLite persistence for scheduled task definitions (scheduled_tasks).
 * WHY: Tasks survive restarts; the scheduler reloads them from here on every pass.
 * FLOWS:
 *  - constructor → ensureSchema() → CREATE TABLE IF NOT EXISTS
 *  - verify() → cheap read used by scheduler.start()
 *  - upsert(task) / get(id) / list() / delete(id) / setNextRunAt(id, ms)
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import type { Db } from "../db/db.js";
import type { Logger } from "../lib/logger.js";
import { triggerSchema, type TriggerSpec } from "./triggers.js";

export type TaskArgs = Record<string, unknown>;

export interface StoredTask {
  id: string;
  callable: string;
  trigger: TriggerSpec;
  args: TaskArgs;
  misfireGraceSeconds: number;
  /** Epoch ms; null once a task has nothing left to fire */
  nextRunAt: number | null;
  createdAt: number;
  updatedAt: number;
}

const rowSchema = z.object({
  id: z.string(),
  callable: z.string(),
  trigger_json: z.string(),
  args_json: z.string(),
  misfire_grace_s: z.number().int(),
  next_run_at: z.number().nullable(),
  created_at: z.number(),
  updated_at: z.number(),
});

export const argsSchema = z.record(z.string(), z.unknown());

export class SqliteJobStore {
  /** The table exists as soon as the store does, so tasks can be added before start(). */
  constructor(
    private readonly db: Db,
    private readonly logger: Logger
  ) {
    this.ensureSchema();
  }

  ensureSchema(): void {
    this.db
      .prepare(
        `
      CREATE TABLE IF NOT EXISTS scheduled_tasks (
        id TEXT PRIMARY KEY,
        callable TEXT NOT NULL,
        trigger_json TEXT NOT NULL,
        args_json TEXT NOT NULL DEFAULT '{}',
        misfire_grace_s INTEGER NOT NULL,
        next_run_at INTEGER,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      )
    `
      )
      .run();
    this.db
      .prepare(
        `CREATE INDEX IF NOT EXISTS idx_scheduled_tasks_next_run ON scheduled_tasks(next_run_at)`
      )
      .run();
  }

  /** Throws when the table cannot be read (closed handle, dropped table). */
  verify(): void {
    this.db.prepare(`SELECT COUNT(*) AS n FROM scheduled_tasks`).get();
  }

  /** Replace-existing by id. created_at survives a replace. */
  upsert(task: StoredTask): void {
    this.db
      .prepare(
        `INSERT INTO scheduled_tasks
           (id, callable, trigger_json, args_json, misfire_grace_s, next_run_at, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           callable = excluded.callable,
           trigger_json = excluded.trigger_json,
           args_json = excluded.args_json,
           misfire_grace_s = excluded.misfire_grace_s,
           next_run_at = excluded.next_run_at,
           updated_at = excluded.updated_at`
      )
      .run(
        task.id,
        task.callable,
        JSON.stringify(task.trigger),
        JSON.stringify(task.args),
        task.misfireGraceSeconds,
        task.nextRunAt,
        task.createdAt,
        task.updatedAt
      );
  }

  get(id: string): StoredTask | null {
    const row: unknown = this.db.prepare(`SELECT * FROM scheduled_tasks WHERE id = ?`).get(id);
    return row === undefined ? null : this.decode(row);
  }

  /** Every decodable task, soonest first; tasks with nothing to fire last. */
  list(): StoredTask[] {
    const rows: unknown[] = this.db
      .prepare(
        `SELECT * FROM scheduled_tasks ORDER BY next_run_at IS NULL, next_run_at, id`
      )
      .all();
    const tasks: StoredTask[] = [];
    for (const row of rows) {
      const task = this.decode(row);
      if (task) tasks.push(task);
    }
    return tasks;
  }

  delete(id: string): boolean {
    return this.db.prepare(`DELETE FROM scheduled_tasks WHERE id = ?`).run(id).changes > 0;
  }

  setNextRunAt(id: string, nextRunAt: number | null, now: number): void {
    this.db
      .prepare(`UPDATE scheduled_tasks SET next_run_at = ?, updated_at = ? WHERE id = ?`)
      .run(nextRunAt, now, id);
  }

  /**
   * A row that fails to decode stays in the table untouched; it is logged
   * and left out of the result.
   */
  private decode(row: unknown): StoredTask | null {
    const parsed = rowSchema.safeParse(row);
    if (!parsed.success) {
      this.logger.error(
        { evt: "task_row_invalid", issues: parsed.error.issues },
        "[scheduler] unreadable scheduled_tasks row"
      );
      return null;
    }
    const r = parsed.data;
    try {
      const trigger = triggerSchema.parse(JSON.parse(r.trigger_json));
      const args = argsSchema.parse(JSON.parse(r.args_json));
      return {
        id: r.id,
        callable: r.callable,
        trigger,
        args,
        misfireGraceSeconds: r.misfire_grace_s,
        nextRunAt: r.next_run_at,
        createdAt: r.created_at,
        updatedAt: r.updated_at,
      };
    } catch (err) {
      this.logger.error(
        { evt: "task_row_invalid", taskId: r.id, err },
        "[scheduler] scheduled task has an unreadable trigger or args"
      );
      return null;
    }
  }
}
