/**
 * Guildwarden — src/features/errorHandler.ts
 * WHAT: Turns anything a command throws into one log record and at most one ephemeral reply.
 * WHY: Commands just throw; what the user sees and what the logs record is decided here.
 * FLOWS:
 *  - classify(err) → classifyError() union → ErrorPolicy { category, log?, notice? }
 *  - handle(target, err) → log per policy → sendReply / sendFollowup per interaction state
 * DOCS:
 *  - Interaction replies: https://discord.js.org/#/docs/discord.js/main/class/CommandInteraction
 *  - Ephemeral flag: https://discord.js.org/#/docs/discord.js/main/typedef/InteractionReplyOptions
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { MessageFlags, type RepliableInteraction } from "discord.js";
import { classifyError, errorContext, type ClassifiedError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";

export type ErrorCategory =
  | "silent"
  | "auth_denied"
  | "usage"
  | "rate_limit"
  | "platform_forbidden"
  | "external_dependency"
  | "unexpected";

export interface ErrorPolicy {
  category: ErrorCategory;
  log?: { level: "warn" | "error"; message: string; includeStack: boolean };
  notice?: { message: string; exposeDetails: boolean };
}

/**
 * The slice of an interaction the handler needs. Kept narrow so tests and
 * scheduled-task reporting can provide their own.
 */
export interface ReplyTarget {
  hasResponseAlreadyBeenSent(): boolean;
  sendReply(text: string, ephemeral: boolean): Promise<void>;
  sendFollowup(text: string, ephemeral: boolean): Promise<void>;
}

export const NOTICE_NO_PERMISSION = "You do not have permission to run this command.";
export const NOTICE_BOT_FORBIDDEN =
  "The bot lacks the Discord permissions needed for this. Please contact a server admin.";
export const NOTICE_UNEXPECTED =
  "An unexpected error occurred. The administrators have been notified.";

export interface ErrorHandlerOptions {
  logger: Logger;
  /** [Logging] NotifyErrorToDiscord */
  notifyUserOnError: boolean;
}

export interface ErrorHandler {
  classify(err: unknown): ErrorPolicy;
  handle(target: ReplyTarget, err: unknown, fields?: Record<string, unknown>): Promise<ErrorPolicy>;
}

function policyFor(classified: ClassifiedError, notifyUserOnError: boolean): ErrorPolicy {
  switch (classified.kind) {
    case "command_not_found":
      return { category: "silent" };

    case "auth_denied":
      return {
        category: "auth_denied",
        notice: {
          message: classified.requirement.startsWith("feature:")
            ? `${NOTICE_NO_PERMISSION} (requires \`${classified.requirement.slice("feature:".length)}\`)`
            : NOTICE_NO_PERMISSION,
          exposeDetails: false,
        },
      };

    case "usage":
      return {
        category: "usage",
        log: { level: "warn", message: `[errors] usage error: ${classified.message}`, includeStack: false },
        notice: {
          message: `The command was used incorrectly.\n\`\`\`\n${classified.message}\n\`\`\``,
          exposeDetails: true,
        },
      };

    case "rate_limit":
      return {
        category: "rate_limit",
        log: {
          level: "warn",
          message: `[errors] Discord rate limit hit; backing off ${(classified.retryAfterMs / 1000).toFixed(2)}s`,
          includeStack: false,
        },
      };

    case "platform_forbidden":
      return {
        category: "platform_forbidden",
        log: {
          level: "error",
          message: "[errors] Discord API 403 Forbidden: bot lacks required permissions",
          includeStack: false,
        },
        notice: { message: NOTICE_BOT_FORBIDDEN, exposeDetails: false },
      };

    case "external_dependency":
      return {
        category: "external_dependency",
        log: {
          level: "warn",
          message: `[errors] external dependency "${classified.dependency}" failed: ${classified.message}`,
          includeStack: false,
        },
        notice: {
          message: `Failed to reach an external service: ${classified.message}`,
          exposeDetails: true,
        },
      };

    default:
      return {
        category: "unexpected",
        log: {
          level: "error",
          message: "[errors] unexpected error while running command",
          includeStack: true,
        },
        notice: notifyUserOnError ? { message: NOTICE_UNEXPECTED, exposeDetails: false } : undefined,
      };
  }
}

export function createErrorHandler(options: ErrorHandlerOptions): ErrorHandler {
  const { logger, notifyUserOnError } = options;

  function classify(err: unknown): ErrorPolicy {
    return policyFor(classifyError(err), notifyUserOnError);
  }

  async function send(target: ReplyTarget, text: string): Promise<void> {
    try {
      if (target.hasResponseAlreadyBeenSent()) {
        await target.sendFollowup(text, true);
      } else {
        await target.sendReply(text, true);
      }
    } catch (sendErr) {
      const classified = classifyError(sendErr);
      if (classified.kind === "platform_forbidden") {
        logger.error(
          { evt: "error_notice_fail", ...errorContext(classified) },
          "[errors] could not send error notice: bot lacks permissions"
        );
      } else {
        logger.error(
          { evt: "error_notice_fail", ...errorContext(classified), err: sendErr },
          "[errors] could not send error notice"
        );
      }
    }
  }

  async function handle(
    target: ReplyTarget,
    err: unknown,
    fields: Record<string, unknown> = {}
  ): Promise<ErrorPolicy> {
    const classified = classifyError(err);
    const policy = policyFor(classified, notifyUserOnError);

    if (policy.log) {
      const payload: Record<string, unknown> = {
        evt: "cmd_error",
        category: policy.category,
        ...errorContext(classified, fields),
      };
      // Only the stack-bearing records carry `err`, which also routes them to Sentry
      if (policy.log.includeStack) payload.err = err;
      logger[policy.log.level](payload, policy.log.message);
    }

    if (policy.notice) {
      await send(target, policy.notice.message);
    }
    return policy;
  }

  return { classify, handle };
}

/**
 * Adapt a discord.js interaction. A deferred interaction counts as
 * responded: the next message has to be a follow-up.
 */
export function interactionReplyTarget(interaction: RepliableInteraction): ReplyTarget {
  const flags = (ephemeral: boolean) => (ephemeral ? MessageFlags.Ephemeral : undefined);
  return {
    hasResponseAlreadyBeenSent: () => interaction.replied || interaction.deferred,
    async sendReply(text, ephemeral) {
      await interaction.reply({ content: text, flags: flags(ephemeral) });
    },
    async sendFollowup(text, ephemeral) {
      await interaction.followUp({ content: text, flags: flags(ephemeral) });
    },
  };
}
