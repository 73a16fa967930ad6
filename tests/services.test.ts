/**
 * WHAT: Proves createServices wires one scheduler, settings store and resolver over a shared database.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect } from "vitest";
import { REMINDER_CALLABLE } from "../src/scheduler/tasks/reminder.js";
import { createTaskRegistry } from "../src/services.js";
import { createTestServices } from "./utils/dbFixtures.js";

describe("createServices", () => {
  it("stamps the start time from the clock", () => {
    const { services } = createTestServices({ clock: () => 1_234 });
    expect(services.startedAt).toBe(1_234);
    expect(services.scheduler.isRunning).toBe(false);
  });

  it("registers the built-in task callables", () => {
    expect(createTaskRegistry().names()).toEqual([REMINDER_CALLABLE]);

    const { services } = createTestServices({ clock: () => 0 });
    const info = services.scheduler.addTask("r", REMINDER_CALLABLE, { type: "date", runAt: 60_000 });
    expect(info.registered).toBe(true);
  });

  it("shares the database between the settings store and the static config", () => {
    const { services } = createTestServices();
    expect(services.settings.resolveSetting("111111111111111111", "welcome_channel")).toBe("lobby");
    services.settings.setSetting("111111111111111111", "welcome_channel", "hall");
    expect(services.settings.resolveSetting("111111111111111111", "welcome_channel")).toBe("hall");
  });
});
