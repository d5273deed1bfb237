/**
 * Rotation Warden — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail-fast on missing channel credentials; keep process.env access centralized.
 *      Core modules receive the resulting ServiceConfig and never read process.env.
 * FLOWS: load .env → parse/validate → freeze → ServiceConfig
 * DOCS:
 *  - zod: https://zod.dev
 *  - dotenv: https://github.com/motdotla/dotenv
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { isValidTimeZone, parseIsoDate } from "./time.js";

export const DEFAULT_SCHEDULE_PATH = "./weekly_rotation.json";

// "yes", "YES", "1", "true", "on"... people put all of these in .env files.
const truthyPattern = /^(1|true|yes|on)$/i;
const falsyPattern = /^(0|false|no|off)$/i;

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((val, ctx) => {
      if (val === undefined || val === "") return fallback;
      if (truthyPattern.test(val)) return true;
      if (falsyPattern.test(val)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${val}"` });
      return z.NEVER;
    });

const optionalString = z
  .string()
  .optional()
  .transform((val) => (val === undefined || val === "" ? undefined : val));

// Durations are configured in seconds (fractions allowed) and carried as milliseconds.
const seconds = (fallback: number) =>
  optionalString
    .pipe(z.coerce.number().positive().default(fallback))
    .transform((val) => Math.round(val * 1000));

/**
 * Schema over the raw, trimmed variables. Empty strings count as "not set" so a
 * blank line like `RCON_HOST=` in .env doesn't half-configure the fallback.
 */
const baseSchema = z.object({
  ROTATION_NAME: optionalString,
  ROTATION_CYCLE_ANCHOR: optionalString.refine((val) => !val || parseIsoDate(val) !== null, {
    message: "ROTATION_CYCLE_ANCHOR must be an ISO date (YYYY-MM-DD)",
  }),
  TIMEZONE: z
    .string()
    .optional()
    .transform((val) => val || "UTC")
    .refine((val) => isValidTimeZone(val), { message: "TIMEZONE is not a known IANA time zone" }),
  LOG_LEVEL: z
    .string()
    .optional()
    .transform((val) => val || "info"),
  WEEKLY_ROTATION_PATH: optionalString,
  CONFIG_PATH: optionalString,

  CRCON_HTTP_BASE_URL: z
    .string({ required_error: "Missing CRCON_HTTP_BASE_URL" })
    .min(1, "Missing CRCON_HTTP_BASE_URL")
    .url("CRCON_HTTP_BASE_URL must be an absolute URL"),
  CRCON_HTTP_BEARER_TOKEN: z
    .string({ required_error: "Missing CRCON_HTTP_BEARER_TOKEN" })
    .min(1, "Missing CRCON_HTTP_BEARER_TOKEN"),
  CRCON_HTTP_VERIFY: flag(false),
  CRCON_HTTP_TIMEOUT: seconds(10),
  CRCON_HTTP_API_ROOT: z
    .string()
    .optional()
    .transform((val) => val || "/api"),

  RCON_HOST: optionalString,
  RCON_PORT: optionalString.pipe(z.coerce.number().int().min(1).max(65535).optional()),
  RCON_PASSWORD: optionalString,
  RCON_TIMEOUT: seconds(5),

  ENFORCE_INTERVAL_SECONDS: seconds(300),
  ENFORCE_TICK_TIMEOUT_SECONDS: seconds(60),
  ENFORCE_ALIGN_TO_TRANSITIONS: flag(true),

  SENTRY_DSN: optionalString,
  SENTRY_ENVIRONMENT: optionalString,
  NODE_ENV: optionalString.pipe(z.enum(["development", "production", "test"]).default("development")),
});

const schema = baseSchema.superRefine((val, ctx) => {
  // The fallback channel is optional, but a partial configuration is a typo.
  const fallbackKeys = ["RCON_HOST", "RCON_PORT", "RCON_PASSWORD"] as const;
  const present = fallbackKeys.filter((key) => val[key] !== undefined);
  if (present.length > 0 && present.length < fallbackKeys.length) {
    for (const key of fallbackKeys) {
      if (val[key] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required when ${present.join(", ")} is set`,
        });
      }
    }
  }
});

export interface PrimaryChannelConfig {
  baseUrl: string;
  bearerToken: string;
  apiRoot: string;
  timeoutMs: number;
  verifyTls: boolean;
}

export interface FallbackChannelConfig {
  host: string;
  port: number;
  password: string;
  timeoutMs: number;
}

export interface EnforcerConfig {
  intervalMs: number;
  tickTimeoutMs: number;
  alignToTransitions: boolean;
}

export interface ServiceConfig {
  timeZone: string;
  logLevel: string;
  schedulePath: string;
  rotationName?: string;
  cycleAnchor?: string;
  enforcer: EnforcerConfig;
  primary: PrimaryChannelConfig;
  fallback?: FallbackChannelConfig;
  sentry: { dsn?: string; environment: string };
}

const KEYS = Object.keys(baseSchema.shape);

// Only what the resolver needs; lets tooling inspect a schedule without channel credentials.
const scheduleSettingsSchema = baseSchema.pick({
  ROTATION_NAME: true,
  ROTATION_CYCLE_ANCHOR: true,
  TIMEZONE: true,
  WEEKLY_ROTATION_PATH: true,
  CONFIG_PATH: true,
});

export type ScheduleSettings = Pick<ServiceConfig, "timeZone" | "schedulePath" | "rotationName" | "cycleAnchor">;

function trimKnown(source: Record<string, string | undefined>): Record<string, string | undefined> {
  const raw: Record<string, string | undefined> = {};
  for (const key of KEYS) {
    raw[key] = source[key]?.trim();
  }
  return raw;
}

function configErrorFrom(error: z.ZodError): ConfigError {
  const issues = error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
  const firstKey = error.issues[0]?.path.join(".") || "env";
  return new ConfigError(`Environment validation failed:\n${issues}`, firstKey);
}

/**
 * Parse a variable map (normally process.env) into an immutable ServiceConfig.
 * safeParse collects every issue so a bad .env is fixed in one pass, not one
 * restart per missing variable.
 *
 * @throws ConfigError naming the first offending key, with all issues in the message
 */
export function parseServiceConfig(source: Record<string, string | undefined>): ServiceConfig {
  const parsed = schema.safeParse(trimKnown(source));
  if (!parsed.success) {
    throw configErrorFrom(parsed.error);
  }

  const env = parsed.data;
  const fallback =
    env.RCON_HOST !== undefined && env.RCON_PORT !== undefined && env.RCON_PASSWORD !== undefined
      ? {
          host: env.RCON_HOST,
          port: env.RCON_PORT,
          password: env.RCON_PASSWORD,
          timeoutMs: env.RCON_TIMEOUT,
        }
      : undefined;

  const config: ServiceConfig = {
    timeZone: env.TIMEZONE,
    logLevel: env.LOG_LEVEL,
    schedulePath: env.WEEKLY_ROTATION_PATH ?? env.CONFIG_PATH ?? DEFAULT_SCHEDULE_PATH,
    rotationName: env.ROTATION_NAME,
    cycleAnchor: env.ROTATION_CYCLE_ANCHOR,
    enforcer: {
      intervalMs: env.ENFORCE_INTERVAL_SECONDS,
      tickTimeoutMs: env.ENFORCE_TICK_TIMEOUT_SECONDS,
      alignToTransitions: env.ENFORCE_ALIGN_TO_TRANSITIONS,
    },
    primary: {
      baseUrl: env.CRCON_HTTP_BASE_URL,
      bearerToken: env.CRCON_HTTP_BEARER_TOKEN,
      apiRoot: env.CRCON_HTTP_API_ROOT,
      timeoutMs: env.CRCON_HTTP_TIMEOUT,
      verifyTls: env.CRCON_HTTP_VERIFY,
    },
    fallback,
    sentry: {
      dsn: env.SENTRY_DSN,
      environment: env.SENTRY_ENVIRONMENT ?? env.NODE_ENV,
    },
  };

  return Object.freeze(config);
}

/**
 * Load .env from the working directory, then parse. Variables already present in
 * the real environment win over the file (dotenv's default, override: false).
 */
export function loadServiceConfig(cwd = process.cwd()): ServiceConfig {
  dotenv.config({ path: path.join(cwd, ".env"), override: false });
  return parseServiceConfig(process.env);
}

/**
 * The schedule-related subset of parseServiceConfig. Same defaults, same messages.
 *
 * @throws ConfigError
 */
export function parseScheduleSettings(source: Record<string, string | undefined>): ScheduleSettings {
  const parsed = scheduleSettingsSchema.safeParse(trimKnown(source));
  if (!parsed.success) {
    throw configErrorFrom(parsed.error);
  }
  const env = parsed.data;
  return Object.freeze({
    timeZone: env.TIMEZONE,
    schedulePath: env.WEEKLY_ROTATION_PATH ?? env.CONFIG_PATH ?? DEFAULT_SCHEDULE_PATH,
    rotationName: env.ROTATION_NAME,
    cycleAnchor: env.ROTATION_CYCLE_ANCHOR,
  });
}

export function loadScheduleSettings(cwd = process.cwd()): ScheduleSettings {
  dotenv.config({ path: path.join(cwd, ".env"), override: false });
  return parseScheduleSettings(process.env);
}
