/**
 * Rotation Warden — src/features/rotation/resolver.ts
 * WHAT: Pure schedule resolution: (now, document, options) → ActiveSelection.
 * WHY: "Which maps should be queued right now?" must have exactly one answer for a
 *      given instant, no matter how often or from where it is asked.
 * FLOWS:
 *  - local time → time block (timeBlocks.ts)
 *  - explicit `schedule`? → structural lookup only
 *  - else forced rotation, or anchor → week in cycle → rotation index
 *  - rotation[weekday][block] → desired maps (order preserved)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ConfigError, ScheduleResolutionError } from "../../lib/errors.js";
import { formatClock, parseIsoDate, zonedParts, type Weekday } from "../../lib/time.js";
import { ROTATION_PREFIX } from "./constants.js";
import { classifyMinute } from "./timeBlocks.js";
import type { ActiveSelection, ResolveOptions, ScheduleDocument, WeekSchedule } from "./types.js";

/**
 * Map a user-facing rotation name onto a declared section key. "A" finds
 * "rotation_A"; an exact key always wins. Returns null when nothing matches.
 */
export function normalizeRotationKey(name: string, rotationKeys: readonly string[]): string | null {
  const trimmed = name.trim();
  if (!trimmed) return null;
  if (rotationKeys.includes(trimmed)) return trimmed;
  const prefixed = trimmed.startsWith(ROTATION_PREFIX) ? trimmed : `${ROTATION_PREFIX}${trimmed}`;
  return rotationKeys.includes(prefixed) ? prefixed : null;
}

/**
 * Week position inside the cycle. Dates before the anchor wrap around instead of
 * going negative: floor division first, then a positive modulo.
 */
export function weekInCycle(dayNumber: number, anchorDay: number, cycleLengthWeeks: number): number {
  const weeksSinceAnchor = Math.floor((dayNumber - anchorDay) / 7);
  return ((weeksSinceAnchor % cycleLengthWeeks) + cycleLengthWeeks) % cycleLengthWeeks;
}

/**
 * Each rotation owns a contiguous, equal share of the cycle's weeks. Integer form
 * of weekInCycle / (L / N), so 4 weeks over 2 rotations gives {0,1} → 0, {2,3} → 1.
 * The schedule store only accepts cycles where L is a multiple of N.
 */
export function rotationIndexForWeek(week: number, cycleLengthWeeks: number, rotationCount: number): number {
  return Math.floor((week * rotationCount) / cycleLengthWeeks);
}

function lookupMaps(
  source: WeekSchedule,
  weekday: Weekday,
  blockName: string,
  sourceName: string
): readonly string[] {
  const day = source[weekday];
  if (!day) {
    throw new ScheduleResolutionError(
      "SCHEDULE_LOOKUP_MISS",
      `${sourceName} has no entry for ${weekday}`,
      { rotation: sourceName, weekday, missingKey: `${sourceName}.${weekday}` }
    );
  }
  if (!Object.hasOwn(day, blockName)) {
    throw new ScheduleResolutionError(
      "SCHEDULE_LOOKUP_MISS",
      `${sourceName}.${weekday} has no block "${blockName}"`,
      { rotation: sourceName, weekday, block: blockName, missingKey: `${sourceName}.${weekday}.${blockName}` }
    );
  }
  return day[blockName] ?? [];
}

function freezeSelection(selection: ActiveSelection): ActiveSelection {
  return Object.freeze({ ...selection, desiredMaps: Object.freeze([...selection.desiredMaps]) });
}

/**
 * Resolve the desired rotation for `now`.
 *
 * @throws ScheduleResolutionError UNRESOLVED_TIME_BLOCK | UNKNOWN_ROTATION | SCHEDULE_LOOKUP_MISS
 * @throws ConfigError when options.cycleAnchor is not an ISO date
 *
 * @example
 * const selection = resolveActiveSelection(new Date(), doc, { timeZone: "Europe/Berlin" });
 * // { rotationName: "rotation_A", weekday: "monday", blockName: "peak", desiredMaps: [...] }
 */
export function resolveActiveSelection(
  now: Date,
  doc: ScheduleDocument,
  options: ResolveOptions
): ActiveSelection {
  const local = zonedParts(now, options.timeZone);
  const block = classifyMinute(local.minuteOfDay, doc.timeBlocks);
  if (!block) {
    throw new ScheduleResolutionError(
      "UNRESOLVED_TIME_BLOCK",
      `No time block covers ${formatClock(local.minuteOfDay)} on ${local.weekday}`,
      { weekday: local.weekday, time: formatClock(local.minuteOfDay) }
    );
  }

  // Explicit schedule wins unconditionally, even next to cycle_length_weeks.
  if (doc.schedule) {
    return freezeSelection({
      rotationName: null,
      weekInCycle: null,
      weekday: local.weekday,
      blockName: block.name,
      desiredMaps: lookupMaps(doc.schedule, local.weekday, block.name, "schedule"),
    });
  }

  const anchorDay =
    options.cycleAnchor !== undefined ? parseIsoDate(options.cycleAnchor) : doc.cycleAnchorDay;
  if (anchorDay === null) {
    throw new ConfigError(
      `Cycle anchor override "${options.cycleAnchor}" is not an ISO date`,
      "ROTATION_CYCLE_ANCHOR"
    );
  }
  const week = weekInCycle(local.dayNumber, anchorDay, doc.cycleLengthWeeks);

  let rotationName: string;
  if (options.rotationName !== undefined) {
    const forced = normalizeRotationKey(options.rotationName, Object.keys(doc.rotations));
    if (!forced) {
      throw new ScheduleResolutionError(
        "UNKNOWN_ROTATION",
        `Rotation "${options.rotationName}" is not declared in the schedule`,
        { rotation: options.rotationName }
      );
    }
    rotationName = forced;
  } else {
    const index = rotationIndexForWeek(week, doc.cycleLengthWeeks, doc.rotationOrder.length);
    const picked = doc.rotationOrder[index];
    if (picked === undefined) {
      throw new ScheduleResolutionError(
        "UNKNOWN_ROTATION",
        `No rotation at index ${index} (week ${week} of ${doc.cycleLengthWeeks})`,
        { weekInCycle: week, index }
      );
    }
    rotationName = picked;
  }

  const rotation = doc.rotations[rotationName];
  if (!rotation) {
    throw new ScheduleResolutionError(
      "UNKNOWN_ROTATION",
      `Rotation "${rotationName}" has no schedule section`,
      { rotation: rotationName }
    );
  }

  return freezeSelection({
    rotationName,
    weekInCycle: week,
    weekday: local.weekday,
    blockName: block.name,
    desiredMaps: lookupMaps(rotation, local.weekday, block.name, rotationName),
  });
}
