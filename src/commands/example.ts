/**
 * Guildwarden — src/commands/example.ts
 * WHAT: Starter commands: /greet, /ping, /admin-test, /hr-command.
 * WHY: One public command, one latency check, one per requirement kind, so the guard chain
 *      is exercised end to end on a fresh install.
 * DOCS:
 *  - SlashCommandBuilder: https://discord.js.org/#/docs/builders/main/class/SlashCommandBuilder
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { MessageFlags, SlashCommandBuilder } from "discord.js";
import type { BotCommand } from "../lib/cmdWrap.js";

export const greetCommand: BotCommand = {
  data: new SlashCommandBuilder().setName("greet").setDescription("Say hello."),
  async execute({ interaction }) {
    await interaction.reply({
      content: `Hello, ${interaction.user.displayName}!`,
      allowedMentions: { parse: [] },
    });
  },
};

export const pingCommand: BotCommand = {
  data: new SlashCommandBuilder().setName("ping").setDescription("Gateway latency."),
  async execute({ interaction }) {
    // ws.ping is -1 until the first heartbeat ACK
    const ping = Math.round(interaction.client.ws.ping);
    await interaction.reply({
      content: ping < 0 ? "Pong! (latency not measured yet)" : `Pong! ${ping}ms`,
      flags: MessageFlags.Ephemeral,
    });
  },
};

export const adminTestCommand: BotCommand = {
  data: new SlashCommandBuilder()
    .setName("admin-test")
    .setDescription("Check that you are a bot admin."),
  requirement: { kind: "admin" },
  async execute({ interaction }) {
    await interaction.reply({
      content: "You are a bot admin.",
      flags: MessageFlags.Ephemeral,
    });
  },
};

export const hrCommand: BotCommand = {
  data: new SlashCommandBuilder()
    .setName("hr-command")
    .setDescription("HR tooling (hr_tool feature)."),
  requirement: { kind: "feature", feature: "hr_tool" },
  async execute({ interaction }) {
    await interaction.reply({
      content: "HR tools are available to you.",
      flags: MessageFlags.Ephemeral,
    });
  },
};
