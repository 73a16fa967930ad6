/**
 * Guildwarden — src/commands/tasks.ts
 * WHAT: /tasks list|remove — scheduled task introspection for bot admins.
 * WHY: Stored tasks outlive deploys; admins need to see and prune them without opening the DB.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder, TimestampStyles, inlineCode, time } from "discord.js";
import { replyOrEdit, type BotCommand, type CommandContext } from "../lib/cmdWrap.js";
import { UsageError } from "../lib/errors.js";
import type { ScheduledTaskInfo } from "../scheduler/taskScheduler.js";

const MESSAGE_LIMIT = 2000;

export const data = new SlashCommandBuilder()
  .setName("tasks")
  .setDescription("Inspect scheduled tasks (bot admins).")
  .addSubcommand((sub) => sub.setName("list").setDescription("List scheduled tasks."))
  .addSubcommand((sub) =>
    sub
      .setName("remove")
      .setDescription("Remove a scheduled task.")
      .addStringOption((o) => o.setName("id").setDescription("Task id").setRequired(true))
  );

export function formatTaskLine(task: ScheduledTaskInfo): string {
  const next = task.nextRunAt ? time(task.nextRunAt, TimestampStyles.RelativeTime) : "never";
  const flags = [task.running ? "running" : null, task.registered ? null : "unregistered"]
    .filter((f): f is string => f !== null)
    .join(", ");
  return `${inlineCode(task.id)} ${task.description} next: ${next}${flags ? ` [${flags}]` : ""}`;
}

export async function execute(ctx: CommandContext): Promise<void> {
  const { interaction, services, logger } = ctx;
  const sub = interaction.options.getSubcommand();

  if (sub === "list") {
    const tasks = services.scheduler.listTasks();
    let content =
      tasks.length === 0 ? "No scheduled tasks." : tasks.map(formatTaskLine).join("\n");
    if (content.length > MESSAGE_LIMIT) {
      content = `${content.slice(0, MESSAGE_LIMIT - 20)}\n... (${tasks.length} total)`;
    }
    await replyOrEdit(interaction, { content }, logger);
    return;
  }

  if (sub === "remove") {
    const id = interaction.options.getString("id", true);
    const removed = services.scheduler.removeTask(id);
    await replyOrEdit(
      interaction,
      { content: removed ? `Removed ${inlineCode(id)}.` : `No task ${inlineCode(id)}.` },
      logger
    );
    return;
  }

  throw new UsageError(`Unknown subcommand: ${sub}`);
}

export const tasksCommand: BotCommand = {
  data,
  requirement: { kind: "admin" },
  execute,
};
