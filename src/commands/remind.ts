/**
 * Guildwarden — src/commands/remind.ts
 * WHAT: /remind in:<minutes> message:<text> — schedules a one-shot reminder in this channel.
 * WHY: Smallest real consumer of the persistent scheduler; reminders survive a restart.
 * FLOWS: validate → scheduler.addTask(date trigger, "reminder.post") → ephemeral confirmation with relative time
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder, TimestampStyles, time } from "discord.js";
import { replyOrEdit, type BotCommand, type CommandContext } from "../lib/cmdWrap.js";
import { UsageError } from "../lib/errors.js";
import { REMINDER_CALLABLE, type ReminderArgs } from "../scheduler/tasks/reminder.js";

export const MAX_REMINDER_MINUTES = 7 * 24 * 60;
export const MAX_REMINDER_LENGTH = 500;

export const data = new SlashCommandBuilder()
  .setName("remind")
  .setDescription("Post a reminder in this channel later.")
  .addIntegerOption((o) =>
    o
      .setName("in")
      .setDescription("Minutes from now")
      .setRequired(true)
      .setMinValue(1)
      .setMaxValue(MAX_REMINDER_MINUTES)
  )
  .addStringOption((o) =>
    o
      .setName("message")
      .setDescription("What to remind you about")
      .setRequired(true)
      .setMaxLength(MAX_REMINDER_LENGTH)
  );

export function reminderTaskId(interactionId: string): string {
  return `reminder:${interactionId}`;
}

export async function execute(ctx: CommandContext): Promise<void> {
  const { interaction, services, logger } = ctx;
  const minutes = interaction.options.getInteger("in", true);
  const message = interaction.options.getString("message", true).trim();

  // Discord enforces the option bounds, but commands can be invoked from stale registrations
  if (minutes < 1 || minutes > MAX_REMINDER_MINUTES) {
    throw new UsageError(`"in" must be between 1 and ${MAX_REMINDER_MINUTES} minutes.`, "in");
  }
  if (message.length === 0 || message.length > MAX_REMINDER_LENGTH) {
    throw new UsageError(`"message" must be 1 to ${MAX_REMINDER_LENGTH} characters.`, "message");
  }
  const channelId = interaction.channelId;
  if (!channelId) {
    throw new UsageError("Reminders need a channel to post in.");
  }

  const args: ReminderArgs = {
    guildId: interaction.guildId,
    channelId,
    userId: interaction.user.id,
    message,
  };
  const runAt = Date.now() + minutes * 60_000;

  ctx.step("schedule");
  const task = services.scheduler.addTask(
    reminderTaskId(interaction.id),
    REMINDER_CALLABLE,
    { type: "date", runAt },
    args
  );
  logger.info({ evt: "reminder_scheduled", taskId: task.id, runAt }, "[remind] reminder scheduled");

  await replyOrEdit(
    interaction,
    { content: `Okay, I'll remind you ${time(new Date(runAt), TimestampStyles.RelativeTime)}.` },
    logger
  );
}

export const remindCommand: BotCommand = {
  data,
  requirement: { kind: "feature", feature: "reminders" },
  execute,
};
