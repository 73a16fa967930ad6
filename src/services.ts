/**
 * Guildwarden — src/services.ts
 * WHAT: Builds every long-lived collaborator from config + logger + database + client.
 * WHY: Construction order lives in one place, and everything is handed out explicitly;
 *      nothing hangs off the discord.js client.
 * FLOWS: settings store → permission resolver → error handler → task registry/store/health → scheduler
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { Client } from "discord.js";
import type { AppConfig } from "./config/appConfig.js";
import type { Db } from "./db/db.js";
import { createErrorHandler } from "./features/errorHandler.js";
import type { CommandServices } from "./lib/cmdWrap.js";
import type { Logger } from "./lib/logger.js";
import { PermissionResolver } from "./lib/permissions.js";
import { SqliteJobStore } from "./scheduler/jobStore.js";
import { TaskHealthTracker } from "./scheduler/taskHealth.js";
import { TaskRegistry } from "./scheduler/taskRegistry.js";
import { TaskScheduler } from "./scheduler/taskScheduler.js";
import { REMINDER_CALLABLE, postReminder } from "./scheduler/tasks/reminder.js";
import { GuildSettingsStore } from "./store/guildSettingsStore.js";

export interface ServiceDeps {
  config: AppConfig;
  logger: Logger;
  db: Db;
  client: Client;
  clock?: () => number;
}

/** Callables every process registers; stored tasks refer to these names. */
export function createTaskRegistry(): TaskRegistry {
  return new TaskRegistry().register(REMINDER_CALLABLE, postReminder);
}

export function createServices(deps: ServiceDeps): CommandServices {
  const { config, logger, db, client } = deps;
  const clock = deps.clock ?? Date.now;

  const settings = new GuildSettingsStore(db, config);
  const permissions = new PermissionResolver(config.permissions, logger);
  const errors = createErrorHandler({ logger, notifyUserOnError: config.logging.notifyUserOnError });
  const taskHealth = new TaskHealthTracker(logger, clock);
  const scheduler = new TaskScheduler({
    store: new SqliteJobStore(db, logger),
    registry: createTaskRegistry(),
    health: taskHealth,
    settings,
    client,
    logger,
    config: config.scheduler,
    clock,
  });

  return {
    config,
    logger,
    settings,
    permissions,
    errors,
    scheduler,
    taskHealth,
    startedAt: clock(),
  };
}
