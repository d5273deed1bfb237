/**
 * Rotation Warden — src/features/rotation/constants.ts
 * WHAT: Defaults for the schedule document.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { TimeBlock } from "./types.js";

/**
 * Default off-peak / peak windows. Minute-granular and inclusive on both ends, so
 * 14:30:xx is still off-peak and peak starts at 14:31:00. See timeBlocks.ts.
 */
export const DEFAULT_TIME_BLOCKS: readonly TimeBlock[] = Object.freeze([
  Object.freeze({ name: "off_peak", fromMinute: 0, toMinute: 14 * 60 + 30 }),
  Object.freeze({ name: "peak", fromMinute: 14 * 60 + 31, toMinute: 23 * 60 + 59 }),
]);

export const DEFAULT_CYCLE_ANCHOR = "2025-01-01";
export const DEFAULT_CYCLE_LENGTH_WEEKS = 1;

/** Rotation sections may be written "rotation_A" and referenced as "A". */
export const ROTATION_PREFIX = "rotation_";

/** Top-level document keys that are never rotation sections. */
export const RESERVED_KEYS: ReadonlySet<string> = new Set([
  "cycle_length_weeks",
  "cycle_anchor",
  "rotation_order",
  "time_blocks",
  "schedule",
]);
