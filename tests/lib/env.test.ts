/**
 * WHAT: Proves loadEnv merges .env under the process environment and fails on a missing token.
 * HOW: Writes throwaway .env files into a temp directory; passes an explicit source instead of process.env.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { loadEnv } from "../../src/lib/env.js";
import { ConfigError } from "../../src/lib/errors.js";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "guildwarden-env-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function writeEnv(contents: string): string {
  const file = path.join(dir, ".env");
  fs.writeFileSync(file, contents);
  return file;
}

describe("loadEnv", () => {
  it("applies defaults when only the token is given", () => {
    const env = loadEnv({ envPath: path.join(dir, "missing.env"), source: { DISCORD_TOKEN: "test-token" } });
    expect(env).toEqual({
      DISCORD_TOKEN: "test-token",
      NODE_ENV: "development",
      SENTRY_TRACES_SAMPLE_RATE: 0.1,
    });
  });

  it("reads values from the .env file", () => {
    const envPath = writeEnv("DISCORD_TOKEN=file-token\nGUILD_ID=123456\n");
    const env = loadEnv({ envPath, source: {} });
    expect(env.DISCORD_TOKEN).toBe("file-token");
    expect(env.GUILD_ID).toBe("123456");
  });

  it("lets the process environment win over the file", () => {
    const envPath = writeEnv("DISCORD_TOKEN=file-token\n");
    expect(loadEnv({ envPath, source: { DISCORD_TOKEN: "env-token" } }).DISCORD_TOKEN).toBe("env-token");
  });

  it("treats empty values as unset", () => {
    const envPath = writeEnv("DISCORD_TOKEN=test-token\nSENTRY_DSN=\n");
    expect(loadEnv({ envPath, source: {} }).SENTRY_DSN).toBeUndefined();
  });

  it("throws ConfigError naming the missing token", () => {
    const envPath = writeEnv("CLIENT_ID=1\n");
    let caught: unknown;
    try {
      loadEnv({ envPath, source: {} });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ key: "DISCORD_TOKEN" });
  });

  it("rejects a non-numeric GUILD_ID", () => {
    expect(() =>
      loadEnv({ envPath: path.join(dir, "missing.env"), source: { DISCORD_TOKEN: "test-token", GUILD_ID: "abc" } })
    ).toThrow(/GUILD_ID must be a numeric snowflake/);
  });
});
