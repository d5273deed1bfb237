/**
 * Rotation Warden — src/features/rotation/types.ts
 * WHAT: Types for the schedule document, resolved selections and enforcement results.
 * WHY: One place for the shapes that flow resolver → reconciler → loop.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ChannelKind } from "../../lib/errors.js";
import type { Weekday } from "../../lib/time.js";

/**
 * A named sub-day window, in whole minutes. `toMinute` is inclusive: the block
 * owns every second of its last minute. When `fromMinute > toMinute` the block
 * wraps past midnight.
 */
export interface TimeBlock {
  name: string;
  fromMinute: number;
  toMinute: number;
}

/** block name → ordered map identifiers */
export type DaySchedule = Readonly<Record<string, readonly string[]>>;

/** weekday → block name → ordered map identifiers */
export type WeekSchedule = Readonly<Partial<Record<Weekday, DaySchedule>>>;

/**
 * Validated, frozen schedule. Produced by the schedule store; the resolver only
 * ever sees this shape, never raw JSON.
 */
export interface ScheduleDocument {
  cycleLengthWeeks: number;
  /** Local day number of the cycle anchor (see lib/time.ts) */
  cycleAnchorDay: number;
  cycleAnchor: string;
  /** Rotation section keys in cycle order (already normalized, e.g. "rotation_A") */
  rotationOrder: readonly string[];
  rotations: Readonly<Record<string, WeekSchedule>>;
  timeBlocks: readonly TimeBlock[];
  /** True when the document omitted `time_blocks` */
  defaultTimeBlocks: boolean;
  /** Explicit `schedule` escape hatch; bypasses rotation selection when present */
  schedule?: WeekSchedule;
}

/**
 * Inputs that come from the environment rather than the document. Passed in
 * explicitly so the resolver stays pure.
 */
export interface ResolveOptions {
  timeZone: string;
  /** Forced rotation (ROTATION_NAME). "A" and "rotation_A" both work. */
  rotationName?: string;
  /** ISO date overriding the document's cycle anchor (ROTATION_CYCLE_ANCHOR) */
  cycleAnchor?: string;
}

/**
 * What the server should be running right now.
 * rotationName and weekInCycle are null in explicit-schedule mode.
 */
export interface ActiveSelection {
  readonly rotationName: string | null;
  readonly weekInCycle: number | null;
  readonly weekday: Weekday;
  readonly blockName: string;
  readonly desiredMaps: readonly string[];
}

/** Snapshot of the server's queued maps, in order. Never cached across ticks. */
export type LiveRotationState = readonly string[];

export interface RotationDiff {
  /** Live slots to remove, in live order */
  remove: string[];
  /** Desired maps to append, in desired order */
  add: string[];
  /** Number of leading desired maps already present in order */
  kept: number;
}

export interface EnforcementResult {
  channel: ChannelKind;
  live: LiveRotationState;
  removed: string[];
  added: string[];
  /** Live state already matched; zero commands were issued */
  noop: boolean;
  /** Message of the primary failure that caused a fallback, if any */
  primaryError?: string;
}
