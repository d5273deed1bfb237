/**
 * Rotation Warden — src/lib/tickHealth.ts
 * WHAT: In-process record of enforcement tick outcomes.
 * WHY: A loop that never crashes also never tells you it has been failing for an
 *      hour. This counts consecutive failures and how often the fallback carried a tick.
 * FLOWS:
 *  - recordTickSuccess(result) / recordTickFailure(kind) → update → alert at threshold
 *  - getTickHealth() → snapshot for logs and the shutdown summary
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import type { ChannelKind, ClassifiedError } from "./errors.js";

export interface TickHealth {
  lastRunAt: number | null;
  lastSuccessAt: number | null;
  lastErrorAt: number | null;
  /** Error kind of the most recent failure */
  lastErrorKind: ClassifiedError["kind"] | null;
  /** Channel that carried the most recent successful tick */
  lastChannel: ChannelKind | null;
  consecutiveFailures: number;
  totalRuns: number;
  totalFailures: number;
  /** Successful ticks that had to use the fallback channel */
  fallbackRuns: number;
  /** Successful ticks that issued zero commands */
  noopRuns: number;
}

/** Consecutive failures before an error-level alert. */
export const CONSECUTIVE_FAILURE_ALERT_THRESHOLD = 3;

function emptyHealth(): TickHealth {
  return {
    lastRunAt: null,
    lastSuccessAt: null,
    lastErrorAt: null,
    lastErrorKind: null,
    lastChannel: null,
    consecutiveFailures: 0,
    totalRuns: 0,
    totalFailures: 0,
    fallbackRuns: 0,
    noopRuns: 0,
  };
}

let health: TickHealth = emptyHealth();

export function recordTickSuccess(
  outcome: { channel: ChannelKind; noop: boolean },
  now: number = Date.now()
): void {
  if (health.consecutiveFailures >= CONSECUTIVE_FAILURE_ALERT_THRESHOLD) {
    logger.info(
      { consecutiveFailures: health.consecutiveFailures, channel: outcome.channel },
      "[health] enforcement recovered"
    );
  }

  health.lastRunAt = now;
  health.lastSuccessAt = now;
  health.lastChannel = outcome.channel;
  health.consecutiveFailures = 0;
  health.totalRuns++;
  if (outcome.channel === "fallback") health.fallbackRuns++;
  if (outcome.noop) health.noopRuns++;
}

export function recordTickFailure(kind: ClassifiedError["kind"], now: number = Date.now()): void {
  health.lastRunAt = now;
  health.lastErrorAt = now;
  health.lastErrorKind = kind;
  health.consecutiveFailures++;
  health.totalRuns++;
  health.totalFailures++;

  if (health.consecutiveFailures >= CONSECUTIVE_FAILURE_ALERT_THRESHOLD) {
    logger.error(
      {
        consecutiveFailures: health.consecutiveFailures,
        totalFailures: health.totalFailures,
        totalRuns: health.totalRuns,
        lastErrorKind: kind,
      },
      "[health] Multiple consecutive enforcement failures - requires attention"
    );
  }
}

/** Copy of the current record. */
export function getTickHealth(): TickHealth {
  return { ...health };
}

/** Testing hook: clean slate between tests. */
export function _resetTickHealth(): void {
  health = emptyHealth();
}
