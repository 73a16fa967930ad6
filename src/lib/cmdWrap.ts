/**
 * Guildwarden — src/lib/cmdWrap.ts
 * WHAT: Slash-command dispatch: command lookup, trace context, guard chain, handler, central error handling.
 * WHY: Commands stay small; every invocation gets the same logging, permission checks and error replies.
 * FLOWS:
 *  - createCommandDispatcher(services, commands) → (interaction) handler for interactionCreate
 *  - dispatch: lookup → runWithCtx(traceId) → cmd_start → guards → execute → cmd_ok | errors.handle()
 *  - replyOrEdit(): reply / editReply / followUp by interaction state; ephemeral by default
 * DOCS:
 *  - discord.js v14 interactions: https://discord.js.org/#/docs/discord.js/main/class/ChatInputCommandInteraction
 *  - Interaction response rules (3-second window): https://discord.com/developers/docs/interactions/receiving-and-responding
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  MessageFlags,
  type ChatInputCommandInteraction,
  type Interaction,
  type InteractionReplyOptions,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from "discord.js";
import type { AppConfig } from "../config/appConfig.js";
import {
  interactionReplyTarget,
  type ErrorHandler,
} from "../features/errorHandler.js";
import type { TaskHealthTracker } from "../scheduler/taskHealth.js";
import type { TaskScheduler } from "../scheduler/taskScheduler.js";
import type { GuildSettingsStore } from "../store/guildSettingsStore.js";
import { CommandNotFoundError, UsageError } from "./errors.js";
import type { Logger } from "./logger.js";
import {
  resolveCaller,
  type Caller,
  type PermissionResolver,
  type Requirement,
  type Result,
} from "./permissions.js";
import { newTraceId, runWithCtx } from "./reqctx.js";
import { setTag } from "./sentry.js";

/** Everything a command handler may touch. Built once by the orchestrator. */
export interface CommandServices {
  config: AppConfig;
  logger: Logger;
  settings: GuildSettingsStore;
  permissions: PermissionResolver;
  errors: ErrorHandler;
  scheduler: TaskScheduler;
  taskHealth: TaskHealthTracker;
  /** Epoch ms the process finished startup */
  startedAt: number;
}

export interface CommandContext {
  interaction: ChatInputCommandInteraction;
  caller: Caller;
  services: CommandServices;
  traceId: string;
  /** Child logger bound to traceId and command name */
  logger: Logger;
  /** Mark the current phase; shows up in cmd_error records */
  step: (phase: string) => void;
}

export interface BotCommand {
  data: { name: string; toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody };
  requirement?: Requirement;
  /** DM invocations become a usage error before the handler runs */
  guildOnly?: boolean;
  execute(ctx: CommandContext): Promise<void>;
}

interface GuardInput {
  command: BotCommand;
  caller: Caller;
  permissions: PermissionResolver;
}

export type Guard = (input: GuardInput) => Result<void, Error>;

const OK: Result<void, Error> = { ok: true, value: undefined };

export const guildOnlyGuard: Guard = ({ command, caller }) =>
  command.guildOnly && caller.kind !== "member"
    ? { ok: false, error: new UsageError("This command can only be used in a server.") }
    : OK;

export const requirementGuard: Guard = ({ command, caller, permissions }) =>
  command.requirement ? permissions.authorize(caller, command.requirement) : OK;

/** Order matters: the first failing guard wins. */
export const DEFAULT_GUARDS: readonly Guard[] = [guildOnlyGuard, requirementGuard];

export function runGuards(guards: readonly Guard[], input: GuardInput): Result<void, Error> {
  for (const guard of guards) {
    const result = guard(input);
    if (!result.ok) return result;
  }
  return OK;
}

export function createCommandDispatcher(
  services: CommandServices,
  commands: readonly BotCommand[],
  guards: readonly Guard[] = DEFAULT_GUARDS
): (interaction: Interaction) => Promise<void> {
  const byName = new Map<string, BotCommand>();
  for (const command of commands) {
    if (byName.has(command.data.name)) {
      throw new Error(`Duplicate command name: ${command.data.name}`);
    }
    byName.set(command.data.name, command);
  }

  return async function dispatch(interaction: Interaction): Promise<void> {
    if (!interaction.isChatInputCommand()) return;

    const cmd = interaction.commandName;
    const traceId = newTraceId();
    const guildId = interaction.guildId;

    await runWithCtx({ traceId, cmd, userId: interaction.user.id, guildId }, async () => {
      const target = interactionReplyTarget(interaction);
      const command = byName.get(cmd);
      if (!command) {
        await services.errors.handle(target, new CommandNotFoundError(cmd), { traceId, cmd });
        return;
      }

      const log = services.logger.child({ traceId, cmd });
      const startedAt = Date.now();
      let phase = "enter";

      log.info(
        { evt: "cmd_start", userId: interaction.user.id, guildId: guildId ?? "dm" },
        "command start"
      );
      setTag("cmd", cmd);
      setTag("traceId", traceId);

      try {
        phase = "guards";
        const caller = await resolveCaller(interaction, log);
        const verdict = runGuards(guards, { command, caller, permissions: services.permissions });
        if (!verdict.ok) throw verdict.error;

        phase = "execute";
        await command.execute({
          interaction,
          caller,
          services,
          traceId,
          logger: log,
          step: (next) => {
            phase = next;
            log.debug({ evt: "cmd_step", phase }, "command step");
          },
        });
        log.info({ evt: "cmd_ok", ms: Date.now() - startedAt }, "command ok");
      } catch (err) {
        const policy = await services.errors.handle(target, err, { traceId, cmd, phase });
        if (!policy.log) {
          // Denials and other quiet outcomes still leave a trace line
          log.info({ evt: "cmd_denied", category: policy.category, phase }, "command refused");
        }
      }
    });
  };
}

/**
 * Reply with the right API for the interaction's state. Ephemeral unless the
 * payload says otherwise.
 *
 * 10062 (interaction expired) and 40060 (already acknowledged) are logged and
 * swallowed; anything else is rethrown for the dispatcher's error handler.
 */
export async function replyOrEdit(
  interaction: ChatInputCommandInteraction,
  payload: InteractionReplyOptions,
  logger: Logger
): Promise<void> {
  const withFlags = { ...payload, flags: payload.flags ?? MessageFlags.Ephemeral };
  try {
    if (interaction.deferred) {
      const { flags: _flags, ...editPayload } = withFlags;
      await interaction.editReply(editPayload);
      return;
    }
    if (interaction.replied) {
      await interaction.followUp(withFlags);
      return;
    }
    await interaction.reply(withFlags);
  } catch (err) {
    const code: unknown = err instanceof Error ? Reflect.get(err, "code") : undefined;
    if (code === 10062) {
      logger.warn({ evt: "cmd_reply_fail", code, err }, "reply/edit skipped; interaction expired");
      return;
    }
    if (code === 40060) {
      logger.warn({ evt: "cmd_reply_fail", code, err }, "reply/edit skipped; already acknowledged");
      return;
    }
    throw err;
  }
}
