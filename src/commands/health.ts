/**
 * Guildwarden — src/commands/health.ts
 * WHAT: /health — uptime, gateway ping, scheduler state and per-task run health.
 * WHY: Quick "is it up, and are the background tasks healthy?" check without server access.
 * FLOWS: collect metrics → embed → reply (public)
 * DOCS:
 *  - EmbedBuilder: https://discord.js.org/#/docs/builders/main/class/EmbedBuilder
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder, SlashCommandBuilder } from "discord.js";
import type { BotCommand, CommandContext } from "../lib/cmdWrap.js";
import type { TaskRunHealth } from "../scheduler/taskHealth.js";

export const data = new SlashCommandBuilder()
  .setName("health")
  .setDescription("Bot health (uptime, latency, scheduled tasks).");

/** Always shows at least "0s". */
export function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (secs > 0 || parts.length === 0) parts.push(`${secs}s`);
  return parts.join(" ");
}

export function formatRelativeTime(timestamp: number | null, now: number): string {
  if (timestamp === null) return "never";
  const diffSec = Math.max(0, Math.floor((now - timestamp) / 1000));
  if (diffSec < 60) return `${diffSec}s ago`;
  if (diffSec < 3600) return `${Math.floor(diffSec / 60)}m ago`;
  if (diffSec < 86400) return `${Math.floor(diffSec / 3600)}h ago`;
  return `${Math.floor(diffSec / 86400)}d ago`;
}

export function formatTaskHealth(health: TaskRunHealth, now: number): string {
  const status =
    health.consecutiveFailures === 0 ? "OK" : `WARN (${health.consecutiveFailures} failures)`;
  return `**${health.taskId}**: ${status} - Last: ${formatRelativeTime(health.lastRunAt, now)}`;
}

export async function execute(ctx: CommandContext): Promise<void> {
  const { interaction, services } = ctx;
  const now = Date.now();

  ctx.step("collect_metrics");
  const uptimeSec = Math.floor((now - services.startedAt) / 1000);
  const ping = Math.round(interaction.client.ws.ping);
  const taskHealth = services.taskHealth.all();

  ctx.step("reply");
  const embed = new EmbedBuilder()
    .setTitle("Health Check")
    .setColor(0x57f287)
    .addFields(
      { name: "Status", value: "Healthy", inline: true },
      { name: "Uptime", value: formatUptime(uptimeSec), inline: true },
      { name: "WS Ping", value: ping < 0 ? "n/a" : `${ping}ms`, inline: true },
      {
        name: "Scheduler",
        value: `${services.scheduler.isRunning ? "running" : "stopped"}, ${services.scheduler.listTasks().length} task(s)`,
        inline: false,
      }
    );

  if (taskHealth.length > 0) {
    embed.addFields({
      name: "Task runs",
      value: taskHealth.map((h) => formatTaskHealth(h, now)).join("\n").slice(0, 1024),
      inline: false,
    });
  }
  embed.setTimestamp(now);

  await interaction.reply({ embeds: [embed] });
}

export const healthCommand: BotCommand = { data, execute };
