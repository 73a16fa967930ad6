/**
 * Guildwarden — src/lib/sentry.ts
 * WHAT: Sentry bootstrap and small helpers for capture/flush.
 * WHY: Error tracking is optional; everything here is a no-op until initializeSentry() succeeds.
 * FLOWS: initializeSentry(dsn) → isSentryEnabled → captureException → flushSentry on shutdown
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import * as Sentry from "@sentry/node";

let sentryEnabled = false;

/**
 * Structure check only (no network): scheme, public key in the username slot,
 * project id in the path.
 */
export function hasValidDsn(dsn: string | undefined): dsn is string {
  if (!dsn) return false;
  try {
    const parsed = new URL(dsn);
    return (
      (parsed.protocol === "https:" || parsed.protocol === "http:") &&
      parsed.username.length > 0 &&
      parsed.pathname.length > 1
    );
  } catch {
    return false;
  }
}

export interface SentryOptions {
  dsn: string | undefined;
  environment: string;
  release: string;
  tracesSampleRate: number;
}

/**
 * Returns true when Sentry was initialised. Skipped under Vitest and when the
 * DSN is missing or malformed.
 */
export function initializeSentry(options: SentryOptions): boolean {
  if (process.env.VITEST_WORKER_ID) return false;
  if (!hasValidDsn(options.dsn)) return false;

  Sentry.init({
    dsn: options.dsn,
    environment: options.environment,
    release: options.release,
    tracesSampleRate: options.tracesSampleRate,
    // Strip the bot token if it ever ends up in a breadcrumb or message
    beforeSend(event) {
      if (event.message) {
        event.message = event.message.replace(
          /[A-Za-z0-9_-]{24,}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27,}/g,
          "[redacted_token]"
        );
      }
      return event;
    },
  });
  sentryEnabled = true;
  return true;
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

export function captureException(error: unknown, context: Record<string, unknown> = {}): void {
  if (!sentryEnabled) return;
  Sentry.withScope((scope) => {
    scope.setContext("details", context);
    Sentry.captureException(error);
  });
}

export function setTag(key: string, value: string): void {
  if (!sentryEnabled) return;
  Sentry.setTag(key, value);
}

/**
 * Flush queued events before exit. Bounded so shutdown never hangs on a dead network.
 */
export async function flushSentry(timeoutMs = 2000): Promise<boolean> {
  if (!sentryEnabled) return true;
  return Sentry.flush(timeoutMs);
}
