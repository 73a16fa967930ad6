/**
 * Guildwarden — src/scheduler/triggers.ts
 * WHAT: Trigger definitions (cron / interval / date), their zod schema, and next-fire computation.
 * WHY: Triggers are persisted as JSON, so they are plain data validated on the way in and out.
 * FLOWS:
 *  - triggerSchema.parse(json) → TriggerSpec
 *  - computeNextFireTime(trigger, afterMs, { defaultTimezone }) → epoch ms | null
 * DOCS:
 *  - cron-parser: https://github.com/harrisiirak/cron-parser
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { CronExpressionParser } from "cron-parser";
import { z } from "zod";

const cronField = z.union([z.string().trim().min(1), z.number().int().min(0)]);

export const cronTriggerSchema = z
  .object({
    type: z.literal("cron"),
    second: cronField.optional(),
    minute: cronField.optional(),
    hour: cronField.optional(),
    dayOfMonth: cronField.optional(),
    month: cronField.optional(),
    dayOfWeek: cronField.optional(),
    timezone: z.string().optional(),
  })
  .strict();

export const intervalTriggerSchema = z
  .object({
    type: z.literal("interval"),
    weeks: z.number().min(0).optional(),
    days: z.number().min(0).optional(),
    hours: z.number().min(0).optional(),
    minutes: z.number().min(0).optional(),
    seconds: z.number().min(0).optional(),
    /** Anchor for the period; filled in with the registration time when omitted */
    startAt: z.number().int().optional(),
  })
  .strict()
  .refine((t) => intervalMs(t) > 0, { message: "interval must be longer than zero" });

export const dateTriggerSchema = z
  .object({
    type: z.literal("date"),
    /** Epoch milliseconds */
    runAt: z.number().int(),
  })
  .strict();

export const triggerSchema = z.union([cronTriggerSchema, intervalTriggerSchema, dateTriggerSchema]);

export type CronTrigger = z.infer<typeof cronTriggerSchema>;
export type IntervalTrigger = z.infer<typeof intervalTriggerSchema>;
export type DateTrigger = z.infer<typeof dateTriggerSchema>;
export type TriggerSpec = z.infer<typeof triggerSchema>;

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;
const WEEK = 7 * DAY;

export function intervalMs(trigger: {
  weeks?: number;
  days?: number;
  hours?: number;
  minutes?: number;
  seconds?: number;
}): number {
  return Math.round(
    (trigger.weeks ?? 0) * WEEK +
      (trigger.days ?? 0) * DAY +
      (trigger.hours ?? 0) * HOUR +
      (trigger.minutes ?? 0) * MINUTE +
      (trigger.seconds ?? 0) * SECOND
  );
}

// Most significant first. Fields after the least significant one that was
// given fall back to their minimum; fields before it match anything.
// Day-of-week always matches anything unless given.
const CRON_FIELDS = [
  ["month", "1"],
  ["dayOfMonth", "1"],
  ["dayOfWeek", "*"],
  ["hour", "0"],
  ["minute", "0"],
  ["second", "0"],
] as const;

/**
 * Build a six-field expression ("sec min hour dom month dow").
 * { hour: 9 } → "0 0 9 * * *"; {} → "0 * * * * *" (every minute).
 */
export function toCronExpression(trigger: CronTrigger): string {
  let lastGiven = -1;
  CRON_FIELDS.forEach(([name], index) => {
    if (trigger[name] !== undefined) lastGiven = index;
  });

  const resolved = new Map<string, string>();
  CRON_FIELDS.forEach(([name, minimum], index) => {
    const given = trigger[name];
    if (given !== undefined) {
      resolved.set(name, String(given));
    } else if (index > lastGiven && lastGiven >= 0) {
      resolved.set(name, minimum);
    } else {
      resolved.set(name, "*");
    }
  });
  // With nothing given at all, fire once a minute rather than every second
  if (lastGiven < 0) resolved.set("second", "0");

  return [
    resolved.get("second"),
    resolved.get("minute"),
    resolved.get("hour"),
    resolved.get("dayOfMonth"),
    resolved.get("month"),
    resolved.get("dayOfWeek"),
  ].join(" ");
}

export interface NextFireOptions {
  /** [Scheduler] Timezone, used when a cron trigger names none */
  defaultTimezone: string;
}

/**
 * Next fire strictly after `afterMs`, or null when the trigger is exhausted.
 * Throws on an unparseable cron expression.
 */
export function computeNextFireTime(
  trigger: TriggerSpec,
  afterMs: number,
  options: NextFireOptions
): number | null {
  switch (trigger.type) {
    case "cron": {
      const expression = CronExpressionParser.parse(toCronExpression(trigger), {
        currentDate: new Date(afterMs),
        tz: trigger.timezone ?? options.defaultTimezone,
      });
      return expression.next().toDate().getTime();
    }
    case "interval": {
      const period = intervalMs(trigger);
      const anchor = trigger.startAt ?? afterMs;
      const periods = Math.max(1, Math.floor((afterMs - anchor) / period) + 1);
      return anchor + periods * period;
    }
    case "date":
      return trigger.runAt > afterMs ? trigger.runAt : null;
  }
}

/** Short human form for logs and /tasks list. */
export function describeTrigger(trigger: TriggerSpec): string {
  switch (trigger.type) {
    case "cron":
      return `cron(${toCronExpression(trigger)}${trigger.timezone ? ` ${trigger.timezone}` : ""})`;
    case "interval":
      return `interval(${intervalMs(trigger) / SECOND}s)`;
    case "date":
      return `date(${new Date(trigger.runAt).toISOString()})`;
  }
}
