/**
 * Guildwarden — src/db/db.ts
 * WHAT: SQLite connection bootstrap (better-sqlite3) and the guild_settings schema.
 * WHY: One place sets PRAGMAs and creates tables; stores receive the handle explicitly.
 * FLOWS:
 *  - openDatabase({ dsn }) → mkdir parent → open → PRAGMAs
 *  - ensureSettingsSchema(db) → CREATE TABLE IF NOT EXISTS guild_settings
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite UPSERT: https://sqlite.org/lang_UPSERT.html
 *
 * NOTE: better-sqlite3 is synchronous by design; keep statements small and quick.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import type { Logger } from "../lib/logger.js";

export type Db = Database.Database;

const DB_BUSY_TIMEOUT_MS = 5000;

export interface OpenDatabaseOptions {
  /** File path, or ":memory:" */
  dsn: string;
  logger?: Logger;
}

export function openDatabase(options: OpenDatabaseOptions): Db {
  const { dsn } = options;
  const inMemory = dsn === ":memory:";
  if (!inMemory) {
    fs.mkdirSync(path.dirname(dsn), { recursive: true });
  }

  const db = new Database(dsn, { fileMustExist: false });
  // PRAGMAs: see https://sqlite.org/pragma.html
  // WAL lets the scheduler read while a command handler writes
  if (!inMemory) db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma("foreign_keys = ON");
  db.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);

  options.logger?.info({ evt: "db_open", dsn }, "[db] SQLite opened");
  return db;
}

/**
 * guild_settings: one row per (guild, key). Ids are snowflake strings.
 */
export function ensureSettingsSchema(db: Db): void {
  db.prepare(
    `
    CREATE TABLE IF NOT EXISTS guild_settings (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      guild_id TEXT NOT NULL,
      setting_key TEXT NOT NULL,
      setting_value TEXT NOT NULL,
      updated_at INTEGER NOT NULL,
      UNIQUE (guild_id, setting_key)
    )
  `
  ).run();
}

/**
 * Close without throwing; used on shutdown paths where the handle may
 * already be gone.
 */
export function closeDatabase(db: Db, logger?: Logger): void {
  if (!db.open) return;
  try {
    db.close();
    logger?.info({ evt: "db_close" }, "[db] SQLite closed");
  } catch (err) {
    logger?.error({ evt: "db_close_fail", err }, "[db] close failed");
  }
}
