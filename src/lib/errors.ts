/**
 * Guildwarden — src/lib/errors.ts
 * WHAT: Domain error classes plus a discriminated-union classifier for anything thrown.
 * WHY: Handlers and schedulers throw; the error handler and logs need a precise `kind` to act on.
 * FLOWS:
 *  - throw new UsageError("...") / new AuthorizationDeniedError(...) in domain code
 *  - classifyError(err) → ClassifiedError union → errorContext() for structured logs
 * USAGE:
 *  import { classifyError, errorContext } from "./errors.js";
 *  const classified = classifyError(err);
 *  if (classified.kind === "rate_limit") { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Domain Error Classes =====

/**
 * Fatal configuration problem. Raised before any network connection is
 * attempted; the orchestrator prints it and exits non-zero.
 */
export class ConfigError extends Error {
  readonly key: string | undefined;

  constructor(message: string, options: { key?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "ConfigError";
    this.key = options.key;
  }
}

/**
 * A guard refused the caller. Expected control flow, never a bug.
 */
export class AuthorizationDeniedError extends Error {
  readonly requirement: string;
  readonly callerId: string;

  constructor(callerId: string, requirement: string) {
    super(`Caller ${callerId} does not satisfy requirement "${requirement}"`);
    this.name = "AuthorizationDeniedError";
    this.callerId = callerId;
    this.requirement = requirement;
  }
}

/**
 * Caller-side mistake: missing or malformed command argument, wrong context (DM vs guild).
 * The message is shown back to the user, so keep it human-readable.
 */
export class UsageError extends Error {
  readonly argument: string | undefined;

  constructor(message: string, argument?: string) {
    super(message);
    this.name = "UsageError";
    this.argument = argument;
  }
}

/** Interaction named a command nobody registered (stale registration, partial rollout). */
export class CommandNotFoundError extends Error {
  readonly commandName: string;

  constructor(commandName: string) {
    super(`No handler registered for command "${commandName}"`);
    this.name = "CommandNotFoundError";
    this.commandName = commandName;
  }
}

/**
 * A third-party service the bot calls (weather API, webhook, ...) failed.
 * Its message is safe to show to the user.
 */
export class ExternalDependencyError extends Error {
  readonly dependency: string;

  constructor(dependency: string, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "ExternalDependencyError";
    this.dependency = dependency;
  }
}

/** Invalid scheduled-task definition: unknown callable, bad trigger, bad grace value. */
export class TaskDefinitionError extends Error {
  readonly taskId: string;

  constructor(taskId: string, message: string) {
    super(`Task "${taskId}": ${message}`);
    this.name = "TaskDefinitionError";
    this.taskId = taskId;
  }
}

/** The job store could not be prepared. Aborts startup. */
export class SchedulerStartError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "SchedulerStartError";
  }
}

// ===== Classified Union =====

/**
 * Base shape for the discriminated union. `kind` is the discriminator, which
 * works across module boundaries where instanceof checks can break.
 */
export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

export interface CommandNotFoundKind extends AppError {
  kind: "command_not_found";
  commandName: string;
}

export interface AuthDeniedKind extends AppError {
  kind: "auth_denied";
  requirement: string;
}

export interface UsageKind extends AppError {
  kind: "usage";
  argument?: string;
}

/**
 * Discord 429. discord.js retries these itself; we only log the backoff.
 */
export interface RateLimitKind extends AppError {
  kind: "rate_limit";
  retryAfterMs: number;
  route?: string;
  global: boolean;
}

/**
 * Discord 403 / 50013 Missing Permissions / 50001 Missing Access.
 */
export interface PlatformForbiddenKind extends AppError {
  kind: "platform_forbidden";
  code?: number;
  method?: string;
  path?: string;
}

export interface ExternalDependencyKind extends AppError {
  kind: "external_dependency";
  dependency: string;
}

/**
 * SQLite errors. SQLITE_BUSY/LOCKED are transient; CONSTRAINT is a logic error.
 */
export interface DbErrorKind extends AppError {
  kind: "db_error";
  code: string;
}

/**
 * Node socket/DNS failures (libuv codes). Usually transient.
 */
export interface NetworkKind extends AppError {
  kind: "network";
  code: string;
  host?: string;
}

export interface ConfigKind extends AppError {
  kind: "config";
  key?: string;
}

export interface UnknownKind extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | CommandNotFoundKind
  | AuthDeniedKind
  | UsageKind
  | RateLimitKind
  | PlatformForbiddenKind
  | ExternalDependencyKind
  | DbErrorKind
  | NetworkKind
  | ConfigKind
  | UnknownKind;

// Discord JSON error codes that mean "the bot is not allowed to do this"
const MISSING_ACCESS = 50001;
const MISSING_PERMISSIONS = 50013;

// EAI_AGAIN is a transient DNS failure
const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

function readProp(source: object, key: string): unknown {
  return Reflect.get(source, key);
}

function asNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function asString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * Classify any caught value into the union.
 *
 * Ordered from most specific to least. Domain classes are matched with
 * instanceof; discord.js and SQLite errors are matched on their `name`/`code`
 * shape so that wrapped or re-thrown copies still classify.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (err === null || err === undefined) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }
  if (typeof err !== "object") {
    return { kind: "unknown", message: String(err) };
  }

  const cause = err instanceof Error ? err : undefined;
  const message = asString(readProp(err, "message")) ?? String(err);

  if (err instanceof CommandNotFoundError) {
    return { kind: "command_not_found", commandName: err.commandName, message, cause };
  }
  if (err instanceof AuthorizationDeniedError) {
    return { kind: "auth_denied", requirement: err.requirement, message, cause };
  }
  if (err instanceof UsageError) {
    return { kind: "usage", argument: err.argument, message, cause };
  }
  if (err instanceof ExternalDependencyError) {
    return { kind: "external_dependency", dependency: err.dependency, message, cause };
  }
  if (err instanceof ConfigError) {
    return { kind: "config", key: err.key, message, cause };
  }

  const name = asString(readProp(err, "name"));
  const code = readProp(err, "code");

  // @discordjs/rest RateLimitError carries retryAfter/timeToReset in ms
  if (name === "RateLimitError" || name === "RateLimitedError") {
    const retryAfterMs =
      asNumber(readProp(err, "retryAfter")) ?? asNumber(readProp(err, "timeToReset")) ?? 0;
    return {
      kind: "rate_limit",
      retryAfterMs,
      route: asString(readProp(err, "route")),
      global: readProp(err, "global") === true,
      message,
      cause,
    };
  }

  if (name === "DiscordAPIError" || (name?.includes("Discord") && typeof code === "number")) {
    const status = asNumber(readProp(err, "status")) ?? asNumber(readProp(err, "httpStatus"));
    if (status === 403 || code === MISSING_ACCESS || code === MISSING_PERMISSIONS) {
      return {
        kind: "platform_forbidden",
        code: asNumber(code),
        method: asString(readProp(err, "method")),
        path: asString(readProp(err, "url")) ?? asString(readProp(err, "path")),
        message,
        cause,
      };
    }
    if (status === 429) {
      return { kind: "rate_limit", retryAfterMs: 0, global: false, message, cause };
    }
  }

  if (typeof code === "string" && NETWORK_CODES.includes(code)) {
    return {
      kind: "network",
      code,
      host: asString(readProp(err, "hostname")) ?? asString(readProp(err, "host")),
      message,
      cause,
    };
  }

  if (name === "SqliteError" || (typeof code === "string" && code.startsWith("SQLITE_"))) {
    return { kind: "db_error", code: typeof code === "string" ? code : "UNKNOWN", message, cause };
  }

  return { kind: "unknown", message, cause };
}

/**
 * Flatten a classified error into log fields. Never includes the stack; the
 * caller decides whether to attach `err`.
 */
export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = { errorKind: err.kind, errorMessage: err.message, ...extra };

  switch (err.kind) {
    case "rate_limit":
      return { ...base, retryAfterMs: err.retryAfterMs, route: err.route, global: err.global };
    case "platform_forbidden":
      return { ...base, discordCode: err.code, method: err.method, path: err.path };
    case "external_dependency":
      return { ...base, dependency: err.dependency };
    case "db_error":
      return { ...base, sqlCode: err.code };
    case "network":
      return { ...base, networkCode: err.code, host: err.host };
    case "auth_denied":
      return { ...base, requirement: err.requirement };
    case "usage":
      return { ...base, argument: err.argument };
    default:
      return base;
  }
}

/**
 * Errors worth a Sentry event. Expected operational noise stays out.
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "unknown":
    case "db_error":
    case "config":
      return true;
    default:
      return false;
  }
}
