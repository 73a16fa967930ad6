/**
 * WHAT: Proves slash-command sync picks the guild or global route and reports failures without throwing.
 * HOW: Stand-in REST object with a spied put().
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect, vi } from "vitest";
import { ALL_COMMANDS, buildCommands } from "../../src/commands/buildCommands.js";
import { syncCommands } from "../../src/commands/sync.js";
import { captureLogger, findLog } from "../utils/dbFixtures.js";

function fakeRest() {
  return { put: vi.fn(async (_route: string, _options?: unknown) => undefined) };
}

describe("buildCommands", () => {
  it("serializes every command", () => {
    expect(buildCommands().map((c) => c.name).sort()).toEqual([
      "admin-test",
      "greet",
      "health",
      "hr-command",
      "ping",
      "remind",
      "settings",
      "tasks",
    ]);
    expect(ALL_COMMANDS).toHaveLength(8);
  });
});

describe("syncCommands", () => {
  const commands = buildCommands();

  it("overwrites guild commands when a guild is given", async () => {
    const rest = fakeRest();
    const { logger, records } = captureLogger();

    const ok = await syncCommands({ token: "test-token", applicationId: "123", guildId: "456" }, commands, logger, rest);

    expect(ok).toBe(true);
    expect(rest.put).toHaveBeenCalledWith("/applications/123/guilds/456/commands", { body: commands });
    expect(findLog(records, "cmd_sync")).toMatchObject({ scope: "guild", guildId: "456", count: 8 });
  });

  it("overwrites global commands otherwise", async () => {
    const rest = fakeRest();
    const { logger } = captureLogger();

    await syncCommands({ token: "test-token", applicationId: "123" }, commands, logger, rest);

    expect(rest.put).toHaveBeenCalledWith("/applications/123/commands", { body: commands });
  });

  it("returns false when Discord rejects the request", async () => {
    const rest = fakeRest();
    rest.put.mockRejectedValueOnce(new Error("401: Unauthorized"));
    const { logger, records } = captureLogger();

    const ok = await syncCommands({ token: "test-token", applicationId: "123" }, commands, logger, rest);

    expect(ok).toBe(false);
    expect(findLog(records, "cmd_sync_fail")).toMatchObject({ scope: "global" });
  });
});
