/**
 * Guildwarden — src/lib/permissions.ts
 * WHAT: Bot-admin and per-feature permission checks against the static [Permissions] /
 *       [Command_<feature>] config.
 * WHY: Commands declare a requirement; the dispatcher's guard chain asks this resolver.
 * FLOWS:
 *  - resolveCaller(interaction) → guild (cache, else fetch) → Caller (member with role names, or DM user)
 *  - isBotAdmin(caller) → user list → (DM? no) → guild owner → admin role names
 *  - hasFeaturePermission(caller, feature) → admin → section? → user list → role names
 *  - authorize(caller, requirement) → Result, never throws
 * DOCS:
 *  - GuildMember roles: https://discord.js.org/#/docs/discord.js/main/class/GuildMemberRoleManager
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { GuildMember, type Client, type Guild, type Interaction } from "discord.js";
import type { PermissionConfig } from "../config/appConfig.js";
import { AuthorizationDeniedError } from "./errors.js";
import type { FeatureName } from "./features.js";
import type { Logger } from "./logger.js";

/** Who invoked a command. DMs carry no role context. */
export type Caller =
  | {
      kind: "member";
      id: string;
      guildId: string;
      roleNames: ReadonlySet<string>;
      isGuildOwner: boolean;
    }
  | { kind: "user"; id: string };

export type Requirement = { kind: "admin" } | { kind: "feature"; feature: FeatureName };

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function describeRequirement(requirement: Requirement): string {
  return requirement.kind === "admin" ? "bot admin" : `feature:${requirement.feature}`;
}

function intersects(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  for (const item of a) {
    if (b.has(item)) return true;
  }
  return false;
}

export class PermissionResolver {
  constructor(
    private readonly config: PermissionConfig,
    private readonly logger: Logger
  ) {}

  isBotAdmin(caller: Caller): boolean {
    if (this.config.adminUserIds.has(caller.id)) return true;
    if (caller.kind !== "member") return false;
    if (caller.isGuildOwner) return true;
    return intersects(caller.roleNames, this.config.adminRoleNames);
  }

  hasFeaturePermission(caller: Caller, feature: FeatureName): boolean {
    if (this.isBotAdmin(caller)) return true;

    const grant = this.config.features.get(feature);
    if (!grant) {
      // No section means nobody but bot admins
      this.logger.debug(
        { evt: "permission_no_section", feature, userId: caller.id },
        "[permissions] feature has no section; denying"
      );
      return false;
    }

    if (grant.allowedUserIds.has(caller.id)) return true;
    if (caller.kind === "member" && intersects(caller.roleNames, grant.allowedRoleNames)) {
      return true;
    }
    return false;
  }

  authorize(caller: Caller, requirement: Requirement): Result<void, AuthorizationDeniedError> {
    const allowed =
      requirement.kind === "admin"
        ? this.isBotAdmin(caller)
        : this.hasFeaturePermission(caller, requirement.feature);

    this.logger.debug(
      {
        evt: "permission_check",
        userId: caller.id,
        requirement: describeRequirement(requirement),
        result: allowed,
      },
      "[permissions] check"
    );

    if (allowed) return { ok: true, value: undefined };
    return {
      ok: false,
      error: new AuthorizationDeniedError(caller.id, describeRequirement(requirement)),
    };
  }
}

async function fetchGuild(client: Client, guildId: string, logger?: Logger): Promise<Guild | null> {
  try {
    return await client.guilds.fetch(guildId);
  } catch (err) {
    // Without the guild, owner and role checks fail closed
    logger?.warn(
      { evt: "guild_fetch_fail", guildId, err },
      "[permissions] guild not cached and fetch failed"
    );
    return null;
  }
}

/**
 * Build a Caller from an interaction. Cached members give role names
 * directly; raw API members only carry role ids, which we map through the
 * guild's role cache. An uncached guild is fetched so the owner check and
 * role names still resolve.
 */
export async function resolveCaller(interaction: Interaction, logger?: Logger): Promise<Caller> {
  const userId = interaction.user.id;
  if (!interaction.inGuild()) {
    return { kind: "user", id: userId };
  }

  const guild =
    interaction.guild ?? (await fetchGuild(interaction.client, interaction.guildId, logger));
  const member = interaction.member;
  const roleNames = new Set<string>();

  if (member instanceof GuildMember) {
    for (const role of member.roles.cache.values()) roleNames.add(role.name);
  } else {
    for (const roleId of member.roles) {
      const name = guild?.roles.cache.get(roleId)?.name;
      if (name) roleNames.add(name);
    }
  }

  return {
    kind: "member",
    id: userId,
    guildId: interaction.guildId,
    roleNames,
    isGuildOwner: guild?.ownerId === userId,
  };
}
