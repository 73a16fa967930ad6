/**
 * Guildwarden — src/lib/reqctx.ts
 * WHAT: AsyncLocalStorage context carrying a trace id through one command invocation.
 * WHY: Log lines written deep inside a handler (store, scheduler.addTask) still carry the trace id.
 * FLOWS: dispatcher → runWithCtx({ traceId, cmd, userId, guildId }, handler) → currentCtx() anywhere below
 * DOCS:
 *  - Node AsyncLocalStorage: https://nodejs.org/api/async_context.html#class-asynclocalstorage
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";

export interface ReqContext {
  traceId: string;
  cmd?: string;
  userId?: string;
  guildId?: string | null;
}

const storage = new AsyncLocalStorage<ReqContext>();

const BASE62 = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";
const TRACE_ID_LENGTH = 11;

/** 11 base62 chars. Uniqueness matters here, uniformity does not. */
export function newTraceId(): string {
  const bytes = randomBytes(TRACE_ID_LENGTH);
  let out = "";
  for (const byte of bytes) {
    out += BASE62[byte % BASE62.length];
  }
  return out;
}

/**
 * Run fn with a context merged over the current one. Event emitter callbacks
 * do not inherit it; the dispatcher opens a fresh one per interaction.
 */
export function runWithCtx<T>(meta: Partial<ReqContext>, fn: () => T): T {
  const parent = storage.getStore();
  return storage.run(
    {
      traceId: meta.traceId ?? parent?.traceId ?? newTraceId(),
      cmd: meta.cmd ?? parent?.cmd,
      userId: meta.userId ?? parent?.userId,
      guildId: meta.guildId ?? parent?.guildId ?? null,
    },
    fn
  );
}

/** Current context, or an empty object outside any invocation. */
export function currentCtx(): Partial<ReqContext> {
  return storage.getStore() ?? {};
}
