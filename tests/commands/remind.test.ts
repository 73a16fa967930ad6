/**
 * WHAT: Proves /remind stores a one-shot reminder task and confirms with a relative timestamp.
 * HOW: Date.now pinned; the scheduler clock is the same fixed instant.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect, vi } from "vitest";
import { MessageFlags } from "discord.js";
import { ALL_COMMANDS } from "../../src/commands/buildCommands.js";
import { reminderTaskId } from "../../src/commands/remind.js";
import { createCommandDispatcher } from "../../src/lib/cmdWrap.js";
import { REMINDER_CALLABLE } from "../../src/scheduler/tasks/reminder.js";
import {
  createFakeInteraction,
  TEST_CHANNEL_ID,
  TEST_GUILD_ID,
  TEST_INTERACTION_ID,
  TEST_USER_ID,
} from "../utils/discordMocks.js";
import { createTestServices } from "../utils/dbFixtures.js";

const T0 = Date.UTC(2024, 0, 1, 12, 0, 0);

function setup() {
  vi.spyOn(Date, "now").mockReturnValue(T0);
  const { services } = createTestServices({ clock: () => T0 });
  return { services, dispatch: createCommandDispatcher(services, ALL_COMMANDS) };
}

describe("/remind", () => {
  it("schedules a reminder for the requesting user", async () => {
    const { services, dispatch } = setup();
    const { interaction, reply } = createFakeInteraction({
      commandName: "remind",
      roles: { "403": "Member" },
      integers: { in: 5 },
      strings: { message: "  stretch  " },
    });

    await dispatch(interaction);

    const runAt = T0 + 5 * 60_000;
    const task = services.scheduler.getTask(reminderTaskId(TEST_INTERACTION_ID));
    expect(task).toMatchObject({
      id: `reminder:${TEST_INTERACTION_ID}`,
      callable: REMINDER_CALLABLE,
      trigger: { type: "date", runAt },
      args: { guildId: TEST_GUILD_ID, channelId: TEST_CHANNEL_ID, userId: TEST_USER_ID, message: "stretch" },
    });
    expect(reply).toHaveBeenCalledWith({
      content: `Okay, I'll remind you <t:${runAt / 1000}:R>.`,
      flags: MessageFlags.Ephemeral,
    });
  });

  it("rejects a delay outside the allowed range", async () => {
    const { services, dispatch } = setup();
    const { interaction, reply } = createFakeInteraction({
      commandName: "remind",
      roles: { "403": "Member" },
      integers: { in: 0 },
      strings: { message: "stretch" },
    });

    await dispatch(interaction);

    expect(reply).toHaveBeenCalledWith({
      content: 'The command was used incorrectly.\n```\n"in" must be between 1 and 10080 minutes.\n```',
      flags: MessageFlags.Ephemeral,
    });
    expect(services.scheduler.listTasks()).toEqual([]);
  });

  it("requires the reminders feature", async () => {
    const { services, dispatch } = setup();
    const { interaction, reply } = createFakeInteraction({
      commandName: "remind",
      integers: { in: 5 },
      strings: { message: "stretch" },
    });

    await dispatch(interaction);

    expect(reply).toHaveBeenCalledWith({
      content: "You do not have permission to run this command. (requires `reminders`)",
      flags: MessageFlags.Ephemeral,
    });
    expect(services.scheduler.listTasks()).toEqual([]);
  });
});
