/**
 * Guildwarden — src/lib/logger.ts
 * WHAT: Pino logger factory with redaction, rotating file output and Sentry capture on error-level logs.
 * WHY: One place decides log format and destinations; everything else receives a Logger instance.
 * FLOWS: createLogger([Logging] section) → console (pretty/JSON) + pino-roll file → hook error logs to Sentry
 * DOCS:
 *  - pino transports: https://getpino.io/#/docs/transports
 *  - pino-roll: https://github.com/mcollina/pino-roll
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import pino from "pino";
import { classifyError, shouldReportToSentry } from "./errors.js";
import { captureException, isSentryEnabled } from "./sentry.js";

export type Logger = pino.Logger;

/**
 * Redaction patterns for common secrets that might leak into logs.
 *
 * Token pattern: Discord bot tokens are 3 base64-ish segments separated by dots.
 * DSN pattern: Sentry DSNs embed auth tokens in URLs. We keep the host, redact the secret.
 * Mention pattern: @everyone/@here in logs usually means user content leaked through.
 */
const tokenRe = /[A-Za-z0-9_-]{24,}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27,}/g;
const dsnRe = /(https?:\/\/)([^:@/]+):[^@]+@/gi;
const mentionRe = /@(everyone|here)/gi;

/**
 * Sanitizes strings before logging. Used on user-supplied text (setting values, reminder bodies).
 * Truncates at 300 chars to prevent log flooding.
 */
export function redact(value: string): string {
  if (!value) return "";
  let sanitized = value.replace(/\s+/g, " ").trim();
  sanitized = sanitized.replace(tokenRe, "[redacted_token]");
  sanitized = sanitized.replace(dsnRe, "$1$2:[redacted]@");
  sanitized = sanitized.replace(mentionRe, "@redacted");
  if (sanitized.length > 300) {
    sanitized = `${sanitized.slice(0, 300)}...`;
  }
  return sanitized;
}

/**
 * Level names accepted in config.ini, mapped onto pino levels.
 * CRITICAL has no pino equivalent by name; fatal is the closest.
 */
const LEVEL_MAP: Record<string, pino.Level> = {
  DEBUG: "debug",
  INFO: "info",
  WARN: "warn",
  WARNING: "warn",
  ERROR: "error",
  CRITICAL: "fatal",
};

export function toPinoLevel(name: string | undefined): pino.Level {
  if (!name) return "info";
  return LEVEL_MAP[name.trim().toUpperCase()] ?? "info";
}

export interface LoggerOptions {
  /** config.ini LogLevel name (DEBUG, INFO, ...) */
  level?: string;
  /** Rotating log file path; omit to log to stdout only */
  file?: string;
  /** Rotate once the active file reaches this many bytes */
  maxBytes?: number;
  /** Rotated files kept on disk */
  backupCount?: number;
}

const isVitest = !!process.env.VITEST_WORKER_ID;

function serializeErr(e: unknown) {
  if (!(e instanceof Error)) return e;
  return {
    name: e.name,
    code: Reflect.get(e, "code"),
    message: e.message,
    stack: e.stack,
  };
}

function buildTransport(options: LoggerOptions, level: pino.Level) {
  const targets: pino.TransportTargetOptions[] = [];

  // Pretty output is for humans at a terminal. Piped output stays JSON
  // so log aggregators can parse it.
  if (process.stdout.isTTY) {
    targets.push({
      target: "pino-pretty",
      level,
      options: {
        colorize: true,
        translateTime: "yyyy-mm-dd HH:MM:ss",
        ignore: "pid,hostname",
      },
    });
  } else {
    targets.push({ target: "pino/file", level, options: { destination: 1 } });
  }

  if (options.file) {
    // pino-roll reads plain numbers as megabytes; "k" keeps byte-level configs close.
    const sizeKb = Math.max(1, Math.ceil((options.maxBytes ?? 10 * 1024 * 1024) / 1024));
    targets.push({
      target: "pino-roll",
      level,
      options: {
        file: options.file,
        size: `${sizeKb}k`,
        limit: { count: options.backupCount ?? 5 },
        mkdir: true,
      },
    });
  }

  return pino.transport({ targets });
}

/**
 * Build the process logger. Under Vitest no transport worker is spawned;
 * tests get a plain synchronous logger they can spy on.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = toPinoLevel(options.level);

  const base: pino.LoggerOptions = {
    level,
    base: undefined, // omit pid/hostname
    serializers: { err: serializeErr },
    /**
     * Error-level logs that carry an Error go to Sentry when the error is
     * worth an event (see shouldReportToSentry). No-op when Sentry is not initialised.
     */
    hooks: {
      logMethod(args, method, levelValue) {
        if (levelValue >= pino.levels.values.error && isSentryEnabled()) {
          const first: unknown = args[0];
          const candidate =
            first instanceof Error
              ? first
              : first && typeof first === "object" && "err" in first
                ? Reflect.get(first, "err")
                : undefined;
          if (candidate instanceof Error && shouldReportToSentry(classifyError(candidate))) {
            const message = typeof args[1] === "string" ? args[1] : undefined;
            captureException(candidate, { message });
          }
        }
        return method.apply(this, args);
      },
    },
  };

  if (isVitest) {
    return pino(base);
  }
  return pino(base, buildTransport(options, level));
}
