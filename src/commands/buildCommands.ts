// SPDX-License-Identifier: LicenseRef-ANW-1.0

// Every slash command the bot serves. The dispatcher routes on these names and
// buildCommands() serializes them for Discord's bulk overwrite.
//
// GOTCHA: global commands can take up to an hour to propagate. Set GUILD_ID
// during development for instant guild-scoped updates.

import type { RESTPostAPIChatInputApplicationCommandsJSONBody } from "discord.js";
import type { BotCommand } from "../lib/cmdWrap.js";
import { adminTestCommand, greetCommand, hrCommand, pingCommand } from "./example.js";
import { healthCommand } from "./health.js";
import { remindCommand } from "./remind.js";
import { settingsCommand } from "./settings.js";
import { tasksCommand } from "./tasks.js";

export const ALL_COMMANDS: readonly BotCommand[] = [
  greetCommand,
  pingCommand,
  adminTestCommand,
  hrCommand,
  settingsCommand,
  remindCommand,
  tasksCommand,
  healthCommand,
];

export function buildCommands(
  commands: readonly BotCommand[] = ALL_COMMANDS
): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  return commands.map((command) => command.data.toJSON());
}
