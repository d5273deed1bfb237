/**
 * Rotation Warden — src/lib/sentry.ts
 * WHAT: Sentry bootstrap and small helpers for capture and shutdown.
 * WHY: Optional error tracking; every helper is a no-op until initializeSentry succeeds.
 * FLOWS: initializeSentry(config) → isSentryEnabled → captureException → flushSentry on shutdown
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import * as Sentry from "@sentry/node";
import { consoleIntegration, onUnhandledRejectionIntegration } from "@sentry/node";
import { logger, redact } from "./logger.js";

let sentryEnabled = false;

export interface SentryOptions {
  dsn?: string;
  environment: string;
  release?: string;
}

/**
 * Sentry DSN format: https://{key}@{org}.ingest.sentry.io/{project}
 * Structure check only; no network round trip.
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

/**
 * Initialize Sentry error tracking.
 * Only activates when a DSN is configured and we're not running under vitest.
 */
export function initializeSentry(options: SentryOptions): void {
  if (process.env.VITEST_WORKER_ID) {
    return;
  }

  if (!hasValidDsn(options.dsn)) {
    logger.info("[sentry] DSN missing or invalid, error tracking disabled");
    return;
  }

  try {
    Sentry.init({
      dsn: options.dsn,
      environment: options.environment,
      release: options.release,
      tracesSampleRate: 0,
      integrations: [
        consoleIntegration({ levels: ["error", "warn"] }),
        onUnhandledRejectionIntegration({ mode: "warn" }),
      ],

      // Tokens and console passwords can ride along in channel error messages.
      beforeSend(event) {
        if (event.message) {
          event.message = redact(event.message);
        }
        for (const exception of event.exception?.values ?? []) {
          if (exception.value) {
            exception.value = redact(exception.value);
          }
        }
        return event;
      },

      // A game server being briefly unreachable is not an incident.
      ignoreErrors: ["AbortError", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED"],
    });

    sentryEnabled = true;
    logger.info({ environment: options.environment }, "[sentry] initialized");
  } catch (err) {
    logger.error({ err }, "[sentry] failed to initialize");
    sentryEnabled = false;
  }
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

/**
 * Capture an exception in Sentry. Returns the event id, or null when disabled.
 */
export function captureException(error: unknown, context?: Record<string, unknown>): string | null {
  if (!sentryEnabled) return null;

  return Sentry.captureException(error, {
    contexts: context ? { custom: context } : undefined,
  });
}

/**
 * Flush any pending events (use before shutdown)
 */
export async function flushSentry(timeout = 2000): Promise<boolean> {
  if (!sentryEnabled) return true;

  try {
    return await Sentry.close(timeout);
  } catch (err) {
    logger.warn({ err }, "[sentry] failed to flush events");
    return false;
  }
}
