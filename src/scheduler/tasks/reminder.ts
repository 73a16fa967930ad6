/**
 * Guildwarden — src/scheduler/tasks/reminder.ts
 * WHAT: The "reminder.post" task callable used by /remind.
 * WHY: Posts a one-shot reminder in the channel it was requested from.
 * FLOWS: scheduler fires → validate args → fetch channel → send with a single allowed mention
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import { ExternalDependencyError } from "../../lib/errors.js";
import type { TaskContext } from "../taskRegistry.js";

export const REMINDER_CALLABLE = "reminder.post";

export const reminderArgsSchema = z.object({
  guildId: z.string().regex(/^\d+$/).nullable(),
  channelId: z.string().regex(/^\d+$/),
  userId: z.string().regex(/^\d+$/),
  message: z.string().min(1),
});

export type ReminderArgs = z.infer<typeof reminderArgsSchema>;

export function formatReminder(args: ReminderArgs): string {
  return `<@${args.userId}> Reminder: ${args.message}`;
}

export async function postReminder(ctx: TaskContext): Promise<void> {
  const args = reminderArgsSchema.parse(ctx.args);

  // A deleted channel rejects with a DiscordAPIError (10003) rather than resolving null
  const channel = await ctx.client.channels.fetch(args.channelId).catch((err: unknown) => {
    throw new ExternalDependencyError("discord", `Could not fetch channel ${args.channelId}`, { cause: err });
  });
  if (!channel || !channel.isSendable()) {
    throw new ExternalDependencyError("discord", `Channel ${args.channelId} is gone or not sendable`);
  }

  // Only ping the person who asked, whatever the message text contains
  await channel.send({
    content: formatReminder(args),
    allowedMentions: { users: [args.userId] },
  });
  ctx.logger.info(
    { evt: "reminder_sent", channelId: args.channelId, userId: args.userId },
    "[reminder] posted"
  );
}
