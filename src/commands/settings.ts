/**
 * Guildwarden — src/commands/settings.ts
 * WHAT: /settings get|set|delete|list for per-guild key/value settings.
 * WHY: Lets the people granted the "settings" feature change bot behaviour per server without a redeploy.
 * FLOWS:
 *  - get → lookupSetting (stored → [Guild_<id>] → [BotSettings]) → ephemeral reply
 *  - set / delete → GuildSettingsStore → ephemeral confirmation
 *  - list → stored rows only
 * DOCS:
 *  - Subcommands: https://discordjs.guide/slash-commands/advanced-creation.html#subcommands
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder, inlineCode } from "discord.js";
import { replyOrEdit, type BotCommand, type CommandContext } from "../lib/cmdWrap.js";
import { UsageError } from "../lib/errors.js";
import { redact } from "../lib/logger.js";
import {
  SETTING_KEY_MAX_LENGTH,
  SETTING_VALUE_MAX_LENGTH,
} from "../store/guildSettingsStore.js";

// Discord rejects message content over 2000 characters
const MESSAGE_LIMIT = 2000;

export const data = new SlashCommandBuilder()
  .setName("settings")
  .setDescription("View or change this server's bot settings.")
  .addSubcommand((sub) =>
    sub
      .setName("get")
      .setDescription("Show the effective value of a setting.")
      .addStringOption((o) =>
        o.setName("key").setDescription("Setting name").setRequired(true).setMaxLength(SETTING_KEY_MAX_LENGTH)
      )
  )
  .addSubcommand((sub) =>
    sub
      .setName("set")
      .setDescription("Store a value for this server.")
      .addStringOption((o) =>
        o.setName("key").setDescription("Setting name").setRequired(true).setMaxLength(SETTING_KEY_MAX_LENGTH)
      )
      .addStringOption((o) =>
        o.setName("value").setDescription("New value").setRequired(true).setMaxLength(SETTING_VALUE_MAX_LENGTH)
      )
  )
  .addSubcommand((sub) =>
    sub
      .setName("delete")
      .setDescription("Remove a stored value (falls back to the default).")
      .addStringOption((o) =>
        o.setName("key").setDescription("Setting name").setRequired(true).setMaxLength(SETTING_KEY_MAX_LENGTH)
      )
  )
  .addSubcommand((sub) => sub.setName("list").setDescription("List values stored for this server."));

/**
 * Inline code that survives backticks in the value: double-backtick
 * delimiters, padded, with runs of two or more backticks broken up.
 */
export function codeSpan(value: string): string {
  if (!value.includes("`")) return inlineCode(value);
  const safe = value.replace(/`{2,}/g, (run) => run.split("").join("\u200b"));
  return `\`\` ${safe} \`\``;
}

function requireGuildId(ctx: CommandContext): string {
  const guildId = ctx.interaction.guildId;
  if (!guildId) throw new UsageError("This command can only be used in a server.");
  return guildId;
}

export async function execute(ctx: CommandContext): Promise<void> {
  const { interaction, services, logger } = ctx;
  const guildId = requireGuildId(ctx);
  const sub = interaction.options.getSubcommand();

  switch (sub) {
    case "get": {
      const key = interaction.options.getString("key", true);
      const resolved = services.settings.lookupSetting(guildId, key);
      const content =
        resolved === null
          ? `${codeSpan(key)} is not set.`
          : `${codeSpan(key)} = ${codeSpan(resolved.value)}${resolved.source === "config" ? " (default)" : ""}`;
      await replyOrEdit(interaction, { content }, logger);
      return;
    }
    case "set": {
      const key = interaction.options.getString("key", true);
      const value = interaction.options.getString("value", true);
      ctx.step("db_write");
      services.settings.setSetting(guildId, key, value);
      logger.info({ evt: "setting_set", guildId, key, value: redact(value) }, "[settings] value stored");
      await replyOrEdit(interaction, { content: `Set ${codeSpan(key)} to ${codeSpan(value)}.` }, logger);
      return;
    }
    case "delete": {
      const key = interaction.options.getString("key", true);
      ctx.step("db_write");
      const removed = services.settings.deleteSetting(guildId, key);
      if (removed) logger.info({ evt: "setting_delete", guildId, key }, "[settings] value removed");
      await replyOrEdit(
        interaction,
        { content: removed ? `Deleted ${codeSpan(key)}.` : `${codeSpan(key)} was not set.` },
        logger
      );
      return;
    }
    case "list": {
      const rows = services.settings.listSettings(guildId);
      let content =
        rows.length === 0
          ? "No settings stored for this server."
          : rows.map((row) => `${codeSpan(row.key)} = ${codeSpan(row.value)}`).join("\n");
      if (content.length > MESSAGE_LIMIT) {
        content = `${content.slice(0, MESSAGE_LIMIT - 20)}\n... (${rows.length} total)`;
      }
      await replyOrEdit(interaction, { content }, logger);
      return;
    }
    default:
      throw new UsageError(`Unknown subcommand: ${sub}`);
  }
}

export const settingsCommand: BotCommand = {
  data,
  requirement: { kind: "feature", feature: "settings" },
  guildOnly: true,
  execute,
};
