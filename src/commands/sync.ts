/**
 * Guildwarden — src/commands/sync.ts
 * WHAT: Slash-command sync on ready: guild-scoped bulk overwrite when GUILD_ID is set, global otherwise.
 * WHY: Keeps Discord's registered commands identical to buildCommands() on every start.
 * DOCS:
 *  - Bulk overwrite (guild): https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-guild-application-commands
 *  - REST client: https://discord.js.org/#/docs/rest/main/class/REST
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { REST, Routes, type RESTPostAPIChatInputApplicationCommandsJSONBody } from "discord.js";
import type { Logger } from "../lib/logger.js";

export interface SyncTarget {
  token: string;
  applicationId: string;
  /** Guild-scoped when set */
  guildId?: string;
}

/**
 * PUT replaces the whole set in one call, so removed commands disappear too.
 * Failures are logged and returned as false; a failed sync should not take
 * the bot down.
 */
export async function syncCommands(
  target: SyncTarget,
  commands: RESTPostAPIChatInputApplicationCommandsJSONBody[],
  logger: Logger,
  rest: Pick<REST, "put"> = new REST({ version: "10" }).setToken(target.token)
): Promise<boolean> {
  const route = target.guildId
    ? Routes.applicationGuildCommands(target.applicationId, target.guildId)
    : Routes.applicationCommands(target.applicationId);
  const scope = target.guildId ? "guild" : "global";

  try {
    await rest.put(route, { body: commands });
    logger.info(
      { evt: "cmd_sync", scope, guildId: target.guildId, count: commands.length },
      "[cmdsync] synced commands"
    );
    return true;
  } catch (err) {
    logger.warn({ evt: "cmd_sync_fail", scope, guildId: target.guildId, err }, "[cmdsync] sync failed");
    return false;
  }
}
