/**
 * Rotation Warden — src/lib/logger.ts
 * WHAT: Pino logger with light redaction and Sentry capture on error-level logs.
 * WHY: Centralizes structured logging to keep the enforcement modules clean.
 * FLOWS: create logger → redact helpers → hook to captureException on error logs
 * DOCS:
 *  - Pino: https://getpino.io/#/docs/api
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import pino from "pino";

/**
 * Redaction patterns for secrets that might leak into logs.
 *
 * Bearer pattern: the CRCON token travels in an Authorization header and ends up in
 *                 error messages when someone logs a failed request verbatim.
 * DSN pattern: Sentry DSNs embed auth tokens in URLs. We keep the host, redact the secret.
 * Login pattern: the RCON handshake line carries the console password in clear text.
 */
const bearerRe = /Bearer\s+[A-Za-z0-9._~+/=-]+/gi;
const dsnRe = /(https?:\/\/)([^:@/\s]+):[^@\s]+@/gi;
const loginRe = /\blogin\s+\S+/gi;

const MAX_REDACTED_LENGTH = 300;

let sentryImportWarned = false;

/**
 * Sanitizes strings before logging. Use on anything that came back from the game
 * server or its HTTP API. Truncates long payloads so a giant map list can't flood logs.
 */
export function redact(value: string): string {
  if (!value) return "";
  let sanitized = value.replace(/\s+/g, " ").trim();
  sanitized = sanitized.replace(bearerRe, "Bearer [redacted]");
  sanitized = sanitized.replace(dsnRe, "$1$2:[redacted]@");
  sanitized = sanitized.replace(loginRe, "login [redacted]");
  if (sanitized.length > MAX_REDACTED_LENGTH) {
    sanitized = `${sanitized.slice(0, MAX_REDACTED_LENGTH)}...`;
  }
  return sanitized;
}

const LEVEL_ALIASES: Record<string, pino.LevelWithSilent> = {
  trace: "trace",
  debug: "debug",
  info: "info",
  warn: "warn",
  warning: "warn",
  error: "error",
  fatal: "fatal",
  silent: "silent",
};

/**
 * Maps a LOG_LEVEL value onto a pino level. Unknown values fall back to "info"
 * rather than refusing to start; a typo in LOG_LEVEL should never stop enforcement.
 */
export function normalizeLogLevel(raw: string | undefined): pino.LevelWithSilent {
  if (!raw) return "info";
  return LEVEL_ALIASES[raw.trim().toLowerCase()] ?? "info";
}

/**
 * Pino's own err serializer drags along every enumerable property. Channel errors
 * carry their operation and the underlying cause, which is what operators need.
 */
function serializeError(value: unknown): Record<string, unknown> {
  if (!(value instanceof Error)) {
    return { message: String(value) };
  }
  const record: Record<string, unknown> = {
    name: value.name,
    message: value.message,
    stack: value.stack,
  };
  for (const key of ["code", "operation", "transient", "key"] as const) {
    if (key in value) {
      record[key] = Reflect.get(value, key);
    }
  }
  if (value.cause !== undefined) {
    record.cause = value.cause instanceof Error ? value.cause.message : String(value.cause);
  }
  return record;
}

const logLevel = normalizeLogLevel(process.env.LOG_LEVEL);
const isVitest = !!process.env.VITEST_WORKER_ID;
const wantPretty = !isVitest && process.env.LOG_PRETTY === "true" && process.stdout.isTTY;

export const logger = pino({
  level: logLevel,
  // Newline-delimited JSON unless someone explicitly asked for pretty output.
  ...(wantPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
          },
        },
      }
    : process.env.LOG_FILE
      ? {
          transport: {
            target: "pino/file",
            options: { destination: process.env.LOG_FILE, mkdir: true },
          },
        }
      : {}),
  base: undefined,
  serializers: {
    err: serializeError,
  },
  /**
   * Intercepts error-level logs and forwards the attached Error to Sentry, so a
   * plain logger.error({ err }, ...) is enough to get a report.
   */
  hooks: {
    logMethod(args, method, level) {
      if (level >= pino.levels.values.error) {
        const firstArg: unknown = args[0];
        const errorCandidate =
          firstArg instanceof Error
            ? firstArg
            : firstArg && typeof firstArg === "object" && "err" in firstArg
              ? firstArg.err
              : undefined;

        if (errorCandidate instanceof Error) {
          const message = typeof args[1] === "string" ? args[1] : undefined;
          const label = pino.levels.labels[level] ?? "error";

          // Dynamic import avoids the logger ↔ sentry import cycle.
          import("./sentry.js")
            .then(({ captureException, isSentryEnabled }) => {
              if (isSentryEnabled()) {
                captureException(errorCandidate, { message, level: label });
              }
            })
            .catch((importErr: unknown) => {
              if (!sentryImportWarned) {
                sentryImportWarned = true;
                console.warn(
                  "[logger] Failed to import Sentry module:",
                  importErr instanceof Error ? importErr.message : importErr
                );
              }
            });
        }
      }

      return method.apply(this, args);
    },
  },
});
