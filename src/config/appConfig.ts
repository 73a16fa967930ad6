/**
 * Guildwarden — src/config/appConfig.ts
 * WHAT: Loads config.ini (ini + zod) and .env (see lib/env.ts) into one immutable AppConfig.
 * WHY: Every tunable, permission list and feature grant is resolved once at startup and
 *      handed to consumers explicitly; nothing re-reads files at runtime.
 * FLOWS:
 *  - loadAppConfig({ configPath, envPath }) → parse INI → validate sections → build grants → freeze
 *  - getStaticGuildSetting(config, guildId, key) → [Guild_<id>] → [BotSettings] → null
 * DOCS:
 *  - ini: https://github.com/npm/ini
 *  - zod: https://zod.dev
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import fs from "node:fs";
import ini from "ini";
import { z } from "zod";
import { ConfigError } from "../lib/errors.js";
import { loadEnv, type BotEnv } from "../lib/env.js";
import { FEATURES, isFeatureName, type FeatureName } from "../lib/features.js";

export const DEFAULT_CONFIG_PATH = "config.ini";

export interface FeatureGrant {
  /** Section the grant came from, e.g. "Command_hr_tool" */
  section: string;
  allowedRoleNames: ReadonlySet<string>;
  allowedUserIds: ReadonlySet<string>;
}

export interface PermissionConfig {
  adminRoleNames: ReadonlySet<string>;
  adminUserIds: ReadonlySet<string>;
  features: ReadonlyMap<FeatureName, FeatureGrant>;
}

export interface LoggingConfig {
  level: string;
  file: string;
  maxBytes: number;
  backupCount: number;
  notifyUserOnError: boolean;
}

export interface DatabaseConfig {
  type: "sqlite";
  dsn: string;
}

export interface SchedulerConfig {
  misfireGraceSeconds: number;
  timezone: string;
  maxSleepSeconds: number;
}

export interface AppConfig {
  env: BotEnv;
  logging: LoggingConfig;
  database: DatabaseConfig;
  permissions: PermissionConfig;
  scheduler: SchedulerConfig;
  /** [BotSettings], option names lower-cased */
  botSettings: Readonly<Record<string, string>>;
  /** [Guild_<id>] sections keyed by guild id, option names lower-cased */
  guildOverrides: ReadonlyMap<string, Readonly<Record<string, string>>>;
  /** Non-fatal findings, logged by the caller once a logger exists */
  warnings: readonly string[];
}

/** Section → options, option names lower-cased like configparser does */
type Sections = Map<string, Record<string, string>>;

// configparser's getboolean vocabulary
const TRUE_WORDS = new Set(["1", "yes", "true", "on"]);
const FALSE_WORDS = new Set(["0", "no", "false", "off"]);

const boolish = z.string().transform((value, ctx) => {
  const word = value.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a boolean: "${value}"` });
  return z.NEVER;
});

const timezone = z.string().refine(
  (tz) => {
    try {
      new Intl.DateTimeFormat("en-US", { timeZone: tz });
      return true;
    } catch {
      return false;
    }
  },
  { message: "Unknown IANA timezone" }
);

const loggingSchema = z.object({
  loglevel: z.string().default("INFO"),
  logfile: z.string().default("logs/bot.log"),
  logmaxbytes: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  logbackupcount: z.coerce.number().int().min(0).default(5),
  notifyerrortodiscord: boolish.default("false"),
});

const databaseSchema = z.object({
  type: z
    .string()
    .default("sqlite")
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.literal("sqlite", { errorMap: () => ({ message: "Only Type = sqlite is supported" }) })),
  dsn: z.string().default("db/bot.db"),
});

const schedulerSchema = z.object({
  misfiregraceseconds: z.coerce.number().int().min(0).default(300),
  timezone: timezone.default("UTC"),
  maxsleepseconds: z.coerce.number().int().min(1).max(3600).default(60),
});

/**
 * Splits a comma list from the INI file, trimming and dropping empties.
 * "Admin, Moderator,," → ["Admin", "Moderator"]
 */
export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseUserIds(value: string | undefined, where: string, warnings: string[]): Set<string> {
  const ids = new Set<string>();
  for (const item of parseList(value)) {
    if (/^\d+$/.test(item)) {
      ids.add(item);
    } else {
      warnings.push(`[${where}] ignoring non-numeric user id "${item}"`);
    }
  }
  return ids;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * ini turns "true"/"false" into booleans and bare keys into `true`; we want
 * strings throughout and let each schema decide. Empty values count as unset.
 */
function readSections(text: string): Sections {
  const parsed: unknown = ini.parse(text);
  const sections: Sections = new Map();
  if (!isRecord(parsed)) return sections;

  for (const [name, body] of Object.entries(parsed)) {
    if (!isRecord(body)) continue; // keys above the first [section] header
    const options: Record<string, string> = {};
    for (const [key, value] of Object.entries(body)) {
      if (value === null || value === undefined || isRecord(value)) continue;
      const str = String(value).trim();
      if (str.length > 0) options[key.toLowerCase()] = str;
    }
    sections.set(name, options);
  }
  return sections;
}

function validateSection<T extends z.ZodTypeAny>(
  schema: T,
  sections: Sections,
  name: string
): z.infer<T> {
  const result = schema.safeParse(sections.get(name) ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue?.path.join(".") ?? "";
    throw new ConfigError(`[${name}] ${key}: ${issue?.message ?? "invalid value"}`, {
      key: `${name}.${key}`,
    });
  }
  return result.data;
}

const FEATURE_SECTION_RE = /^(Command|Feature)_(.+)$/;

/**
 * Build the typed feature map. A Command_ section wins over a Feature_ section
 * of the same name. Sections naming a feature the code never declares are a
 * startup error.
 */
function buildFeatureGrants(sections: Sections, warnings: string[]): Map<FeatureName, FeatureGrant> {
  const grants = new Map<FeatureName, FeatureGrant>();

  for (const [name, options] of sections) {
    const match = FEATURE_SECTION_RE.exec(name);
    if (!match) continue;
    const [, prefix, feature] = match;
    if (!isFeatureName(feature)) {
      throw new ConfigError(
        `[${name}] refers to unknown feature "${feature}" (known: ${FEATURES.join(", ")})`,
        { key: name }
      );
    }
    const existing = grants.get(feature);
    if (existing && prefix === "Feature") continue;

    grants.set(feature, {
      section: name,
      allowedRoleNames: new Set(parseList(options.allowedroles)),
      allowedUserIds: parseUserIds(options.allowedusers, name, warnings),
    });
  }

  for (const feature of FEATURES) {
    if (!grants.has(feature)) {
      warnings.push(`feature "${feature}" has no Command_/Feature_ section; bot admins only`);
    }
  }
  return grants;
}

export interface LoadConfigOptions {
  configPath?: string;
  envPath?: string;
  envSource?: NodeJS.ProcessEnv;
}

/**
 * Parse an INI document (already read) into AppConfig. Split from
 * loadAppConfig so tests can feed strings.
 */
export function parseAppConfig(text: string, env: BotEnv): AppConfig {
  const sections = readSections(text);
  const warnings: string[] = [];

  const logging = validateSection(loggingSchema, sections, "Logging");
  const database = validateSection(databaseSchema, sections, "Database");
  const scheduler = validateSection(schedulerSchema, sections, "Scheduler");

  const permissionSection = sections.get("Permissions") ?? {};
  const permissions: PermissionConfig = {
    adminRoleNames: new Set(parseList(permissionSection.adminroles)),
    adminUserIds: parseUserIds(permissionSection.adminusers, "Permissions", warnings),
    features: buildFeatureGrants(sections, warnings),
  };

  const guildOverrides = new Map<string, Readonly<Record<string, string>>>();
  for (const [name, options] of sections) {
    const match = /^Guild_(\d+)$/.exec(name);
    if (match) guildOverrides.set(match[1], Object.freeze({ ...options }));
  }

  return Object.freeze({
    env,
    logging: Object.freeze({
      level: logging.loglevel,
      file: logging.logfile,
      maxBytes: logging.logmaxbytes,
      backupCount: logging.logbackupcount,
      notifyUserOnError: logging.notifyerrortodiscord,
    }),
    database: Object.freeze({ type: database.type, dsn: database.dsn }),
    permissions: Object.freeze(permissions),
    scheduler: Object.freeze({
      misfireGraceSeconds: scheduler.misfiregraceseconds,
      timezone: scheduler.timezone,
      maxSleepSeconds: scheduler.maxsleepseconds,
    }),
    botSettings: Object.freeze({ ...(sections.get("BotSettings") ?? {}) }),
    guildOverrides,
    warnings: Object.freeze(warnings),
  });
}

/**
 * Read .env and config.ini from their default paths (or the given ones).
 * Throws ConfigError on anything missing or malformed.
 */
export function loadAppConfig(options: LoadConfigOptions = {}): AppConfig {
  const configPath = options.configPath ?? DEFAULT_CONFIG_PATH;
  const env = loadEnv({ envPath: options.envPath, source: options.envSource });

  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Config file '${configPath}' not found`, { key: configPath });
  }
  let text: string;
  try {
    text = fs.readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Could not read config file '${configPath}'`, { cause: err });
  }
  return parseAppConfig(text, env);
}

/**
 * Static per-guild lookup: [Guild_<id>] first, then the [BotSettings] default.
 * Option names are case-insensitive.
 */
export function getStaticGuildSetting(
  config: Pick<AppConfig, "guildOverrides" | "botSettings">,
  guildId: string,
  key: string
): string | null {
  const normalized = key.toLowerCase();
  const override = config.guildOverrides.get(guildId)?.[normalized];
  if (override !== undefined) return override;
  return config.botSettings[normalized] ?? null;
}
