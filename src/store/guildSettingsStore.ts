/**
 * Guildwarden — src/store/guildSettingsStore.ts
 * WHAT: Per-guild key/value settings persisted in SQLite (guild_settings).
 * WHY: Guild admins change settings at runtime via /settings; config.ini supplies the static fallback.
 * FLOWS:
 *  - setSetting(guildId, key, value) → single UPSERT
 *  - getSetting / deleteSetting / listSettings → single statement each
 *  - constructor → ensureSettingsSchema (the store owns its table)
 *  - resolveSetting / lookupSetting(guildId, key) → stored row → [Guild_<id>] → [BotSettings] → null
 * DOCS:
 *  - better-sqlite3 prepared statements: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite UPSERT: https://sqlite.org/lang_UPSERT.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type Database from "better-sqlite3";
import { ensureSettingsSchema, type Db } from "../db/db.js";
import { getStaticGuildSetting, type AppConfig } from "../config/appConfig.js";
import { UsageError } from "../lib/errors.js";

export const SETTING_KEY_MAX_LENGTH = 100;
export const SETTING_VALUE_MAX_LENGTH = 500;

export interface GuildSetting {
  key: string;
  value: string;
}

export interface ResolvedSetting {
  value: string;
  /** "config" when the value came from [Guild_<id>] or [BotSettings] */
  source: "stored" | "config";
}

type StaticSettings = Pick<AppConfig, "guildOverrides" | "botSettings">;

interface SettingRow {
  setting_key: string;
  setting_value: string;
}

function isSettingRow(row: unknown): row is SettingRow {
  return (
    typeof row === "object" &&
    row !== null &&
    typeof Reflect.get(row, "setting_key") === "string" &&
    typeof Reflect.get(row, "setting_value") === "string"
  );
}

function checkKey(key: string): string {
  const trimmed = key.trim();
  if (trimmed.length === 0) {
    throw new UsageError("Setting key must not be empty.", "key");
  }
  if (trimmed.length > SETTING_KEY_MAX_LENGTH) {
    throw new UsageError(
      `Setting key is longer than ${SETTING_KEY_MAX_LENGTH} characters.`,
      "key"
    );
  }
  return trimmed;
}

export class GuildSettingsStore {
  private readonly upsertStmt: Database.Statement<[string, string, string, number]>;
  private readonly getStmt: Database.Statement<[string, string]>;
  private readonly deleteStmt: Database.Statement<[string, string]>;
  private readonly listStmt: Database.Statement<[string]>;

  /**
   * Statements are prepared once per store. The store never outlives its
   * handle: the orchestrator closes the database only after everything that
   * holds a store has stopped.
   */
  constructor(
    db: Db,
    private readonly staticSettings: StaticSettings
  ) {
    ensureSettingsSchema(db);

    this.upsertStmt = db.prepare<[string, string, string, number]>(
      `INSERT INTO guild_settings (guild_id, setting_key, setting_value, updated_at)
       VALUES (?, ?, ?, ?)
       ON CONFLICT(guild_id, setting_key) DO UPDATE SET
         setting_value = excluded.setting_value,
         updated_at = excluded.updated_at`
    );
    this.getStmt = db.prepare<[string, string]>(
      `SELECT setting_key, setting_value FROM guild_settings
       WHERE guild_id = ? AND setting_key = ?`
    );
    this.deleteStmt = db.prepare<[string, string]>(
      `DELETE FROM guild_settings WHERE guild_id = ? AND setting_key = ?`
    );
    this.listStmt = db.prepare<[string]>(
      `SELECT setting_key, setting_value FROM guild_settings
       WHERE guild_id = ? ORDER BY setting_key`
    );
  }

  /** Create or overwrite. Last commit wins. */
  setSetting(guildId: string, key: string, value: string): void {
    const k = checkKey(key);
    if (value.length > SETTING_VALUE_MAX_LENGTH) {
      throw new UsageError(
        `Setting value is longer than ${SETTING_VALUE_MAX_LENGTH} characters.`,
        "value"
      );
    }
    this.upsertStmt.run(guildId, k, value, Date.now());
  }

  getSetting(guildId: string, key: string): string | null {
    const row: unknown = this.getStmt.get(guildId, key.trim());
    return isSettingRow(row) ? row.setting_value : null;
  }

  /** True when a row was removed. */
  deleteSetting(guildId: string, key: string): boolean {
    return this.deleteStmt.run(guildId, key.trim()).changes > 0;
  }

  listSettings(guildId: string): GuildSetting[] {
    const rows: unknown[] = this.listStmt.all(guildId);
    return rows
      .filter(isSettingRow)
      .map((row) => ({ key: row.setting_key, value: row.setting_value }));
  }

  /**
   * Effective value for a guild: runtime setting first, then the static
   * config.ini sections.
   */
  resolveSetting(guildId: string, key: string): string | null {
    return this.lookupSetting(guildId, key)?.value ?? null;
  }

  /** resolveSetting plus where the value came from. */
  lookupSetting(guildId: string, key: string): ResolvedSetting | null {
    const stored = this.getSetting(guildId, key);
    if (stored !== null) return { value: stored, source: "stored" };
    const fallback = getStaticGuildSetting(this.staticSettings, guildId, key);
    return fallback === null ? null : { value: fallback, source: "config" };
  }
}
