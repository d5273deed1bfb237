/**
 * Rotation Warden — src/lib/constants.ts
 * WHAT: Process-level constants: exit codes and shutdown delays.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Exit Codes =====

/** sysexits.h EX_CONFIG: bad environment or schedule file. */
export const EXIT_CONFIG_ERROR = 78;

/** Startup failed for a reason other than configuration. */
export const EXIT_FAILURE = 1;

const SIGNAL_NUMBERS = {
  SIGINT: 2,
  SIGTERM: 15,
} as const;

export type ShutdownSignal = keyof typeof SIGNAL_NUMBERS;

export const SHUTDOWN_SIGNALS: readonly ShutdownSignal[] = ["SIGINT", "SIGTERM"];

/** Shell convention: 128 + signal number (SIGINT → 130, SIGTERM → 143). */
export function signalExitCode(signal: ShutdownSignal): number {
  return 128 + SIGNAL_NUMBERS[signal];
}

// ===== Timeouts & Delays =====

/** Grace period before exit on uncaught exception (for Sentry flush) */
export const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;

/** Upper bound on a graceful shutdown before we exit anyway. */
export const SHUTDOWN_TIMEOUT_MS = 15_000;
