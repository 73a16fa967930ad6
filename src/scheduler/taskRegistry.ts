/**
 * Guildwarden — src/scheduler/taskRegistry.ts
 * WHAT: Name → callable map for scheduled tasks, plus the context every callable receives.
 * WHY: Task definitions are persisted, so they refer to code by a stable name instead of a function.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Client } from "discord.js";
import type { GuildSettingsStore } from "../store/guildSettingsStore.js";
import { TaskDefinitionError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import type { TaskArgs } from "./jobStore.js";

export interface TaskContext {
  taskId: string;
  /** When this run was due, not when it started */
  scheduledFor: Date;
  args: TaskArgs;
  settings: GuildSettingsStore;
  logger: Logger;
  client: Client;
}

export type TaskCallable = (ctx: TaskContext) => Promise<void> | void;

export class TaskRegistry {
  private readonly callables = new Map<string, TaskCallable>();

  /** Registering the same name twice is a programming error. */
  register(name: string, callable: TaskCallable): this {
    if (this.callables.has(name)) {
      throw new TaskDefinitionError(name, "callable name already registered");
    }
    this.callables.set(name, callable);
    return this;
  }

  get(name: string): TaskCallable | undefined {
    return this.callables.get(name);
  }

  has(name: string): boolean {
    return this.callables.has(name);
  }

  names(): string[] {
    return [...this.callables.keys()].sort();
  }
}
