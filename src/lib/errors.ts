/**
 * Rotation Warden — src/lib/errors.ts
 * WHAT: Error classes for each failure domain plus a discriminated-union classifier.
 * WHY: The enforcement loop needs to tell "fall back" from "skip this tick" from
 *      "refuse to start" without string matching.
 * FLOWS:
 *  - throw new PrimaryChannelError("list_rotation", msg, { cause }) in channel code
 *  - classifyError(err) → ClassifiedError union in catch blocks
 *  - tickFailureLevel(classified) → pino level for the tick failure log
 * USAGE:
 *  import { classifyError, errorContext } from "./errors.js";
 *  const classified = classifyError(err);
 *  logger[tickFailureLevel(classified)](errorContext(classified, { block }), "...");
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Error Classes =====

/**
 * ConfigError
 * Missing or invalid environment, or a schedule document that fails validation.
 * Only raised during startup; the entrypoint turns it into exit code 78.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly key: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export type ScheduleResolutionCode =
  | "UNRESOLVED_TIME_BLOCK"
  | "UNKNOWN_ROTATION"
  | "SCHEDULE_LOOKUP_MISS";

/**
 * ScheduleResolutionError
 * The resolver could not turn "now" into a desired map list. Tick-local: the loop
 * logs it and waits for the next interval.
 */
export class ScheduleResolutionError extends Error {
  constructor(
    public readonly code: ScheduleResolutionCode,
    message: string,
    public readonly context: Readonly<Record<string, string | number | null>> = {}
  ) {
    super(message);
    this.name = "ScheduleResolutionError";
  }
}

/**
 * Node.js system error codes that mean "the request never made it" or "the
 * connection dropped mid-flight". Same list the HTTP and TCP channels share.
 */
const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "ECONNREFUSED",
  "EPIPE",
  "EAI_AGAIN",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
]);

/**
 * Walks an error and its cause chain looking for a transient network signature.
 * undici wraps the socket error as `cause` of a generic "fetch failed" TypeError,
 * so the top-level error alone is rarely enough.
 */
export function isTransientCause(err: unknown): boolean {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && current; depth++) {
    if (current instanceof Error) {
      if (current.name === "TimeoutError") return true;
      const code: unknown = Reflect.get(current, "code");
      if (typeof code === "string" && TRANSIENT_CODES.has(code)) return true;
      current = current.cause;
    } else {
      return false;
    }
  }
  return false;
}

export type ChannelKind = "primary" | "fallback";

/**
 * Base class for both control channels. `transient` marks network-level failures
 * (timeouts, resets, refused connections); the reconciler does not branch
 * on it, but the logs do.
 */
export abstract class ChannelError extends Error {
  abstract readonly channel: ChannelKind;
  public readonly transient: boolean;

  constructor(
    public readonly operation: string,
    message: string,
    options?: { cause?: unknown; transient?: boolean }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.transient = options?.transient ?? isTransientCause(options?.cause);
  }
}

/** Primary (HTTP API) failure. Triggers fallback for the current tick. */
export class PrimaryChannelError extends ChannelError {
  readonly channel = "primary" as const;

  constructor(operation: string, message: string, options?: { cause?: unknown; transient?: boolean }) {
    super(operation, message, options);
    this.name = "PrimaryChannelError";
  }
}

/** Fallback (RCON v2) failure. Terminal for the current tick. */
export class FallbackChannelError extends ChannelError {
  readonly channel = "fallback" as const;

  constructor(operation: string, message: string, options?: { cause?: unknown; transient?: boolean }) {
    super(operation, message, options);
    this.name = "FallbackChannelError";
  }
}

/** True for errors raised because a tick was cancelled or timed out. */
export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

// ===== Classification =====

/**
 * Base shape for the discriminated union. `kind` is the discriminator; switch on
 * it instead of chaining instanceof checks in log code.
 */
export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

export interface ConfigErrorInfo extends AppError {
  kind: "config";
  key: string;
}

export interface ScheduleErrorInfo extends AppError {
  kind: "schedule";
  code: ScheduleResolutionCode;
  context: Readonly<Record<string, string | number | null>>;
}

export interface ChannelErrorInfo extends AppError {
  kind: "primary_channel" | "fallback_channel";
  operation: string;
  transient: boolean;
}

export interface AbortedErrorInfo extends AppError {
  kind: "aborted";
}

export interface UnknownErrorInfo extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | ConfigErrorInfo
  | ScheduleErrorInfo
  | ChannelErrorInfo
  | AbortedErrorInfo
  | UnknownErrorInfo;

/**
 * Classify any caught value. Order goes from most specific to least; anything we
 * don't recognize is "unknown" and gets the loudest log level.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (err === null || err === undefined) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  if (err instanceof ConfigError) {
    return { kind: "config", key: err.key, message: err.message, cause: err };
  }

  if (err instanceof ScheduleResolutionError) {
    return {
      kind: "schedule",
      code: err.code,
      context: err.context,
      message: err.message,
      cause: err,
    };
  }

  if (err instanceof ChannelError) {
    return {
      kind: err.channel === "primary" ? "primary_channel" : "fallback_channel",
      operation: err.operation,
      transient: err.transient,
      message: err.message,
      cause: err,
    };
  }

  if (isAbortError(err)) {
    return { kind: "aborted", message: err instanceof Error ? err.message : String(err) };
  }

  return {
    kind: "unknown",
    message: err instanceof Error ? err.message : String(err),
    cause: err instanceof Error ? err : undefined,
  };
}

/**
 * Log level for a failed tick. A primary failure on its own never reaches the loop
 * (the reconciler falls back), so seeing one here means it was logged on the way.
 */
export function tickFailureLevel(err: ClassifiedError): "warn" | "error" {
  switch (err.kind) {
    case "schedule":
    case "primary_channel":
    case "aborted":
      return "warn";
    default:
      return "error";
  }
}

/**
 * Structured log fields for a classified error.
 */
export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = {
    errorKind: err.kind,
    errorMessage: err.message,
    ...extra,
  };

  switch (err.kind) {
    case "config":
      return { ...base, configKey: err.key };
    case "schedule":
      return { ...base, resolutionCode: err.code, ...err.context };
    case "primary_channel":
    case "fallback_channel":
      return { ...base, operation: err.operation, transient: err.transient };
    default:
      return base;
  }
}
