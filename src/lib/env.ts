/**
 * Guildwarden — src/lib/env.ts
 * WHAT: Secret loading/validation via dotenv + zod.
 * WHY: Fail fast on a missing token before anything touches the network.
 * FLOWS: read .env (if present) → merge under process.env → safeParse → typed BotEnv or ConfigError
 * DOCS:
 *  - dotenv: https://github.com/motdotla/dotenv
 *  - zod: https://zod.dev
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import fs from "node:fs";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const DEFAULT_ENV_PATH = ".env";

/**
 * Schema defines what's required vs optional. The token is the only hard
 * requirement; everything else has a default or is feature-gated.
 */
const schema = z.object({
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  CLIENT_ID: z.string().optional(),
  // Only needed for guild-scoped command registration (instant updates during development)
  GUILD_ID: z
    .string()
    .regex(/^\d+$/, "GUILD_ID must be a numeric snowflake")
    .optional(),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Sentry is disabled unless a DSN is provided
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),
});

export type BotEnv = z.infer<typeof schema>;

export interface LoadEnvOptions {
  envPath?: string;
  /** Values that take precedence over the file. Defaults to process.env. */
  source?: NodeJS.ProcessEnv;
}

/**
 * Every variable gets trimmed and empty strings become undefined, so a
 * `SENTRY_DSN=` line behaves like an absent one.
 */
function clean(values: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    const trimmed = value?.trim();
    if (trimmed) out[key] = trimmed;
  }
  return out;
}

/**
 * Load and validate secrets. Existing environment variables win over the
 * file, matching dotenv's default (no override).
 *
 * A missing .env file is not an error by itself: the token may come from the
 * real environment. A missing token is.
 */
export function loadEnv(options: LoadEnvOptions = {}): BotEnv {
  const envPath = options.envPath ?? DEFAULT_ENV_PATH;
  const source = options.source ?? process.env;

  let fileValues: Record<string, string> = {};
  if (fs.existsSync(envPath)) {
    try {
      fileValues = dotenv.parse(fs.readFileSync(envPath));
    } catch (err) {
      throw new ConfigError(`Could not read env file '${envPath}'`, { cause: err });
    }
  }

  const parsed = schema.safeParse({ ...clean(fileValues), ...clean(source) });
  if (!parsed.success) {
    // safeParse collects every issue, so one run shows everything that needs fixing
    const issues = parsed.error.issues
      .map((i) => `- ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    const first = parsed.error.issues[0]?.path.join(".");
    throw new ConfigError(`Environment validation failed (${envPath}):\n${issues}`, { key: first });
  }
  return parsed.data;
}
