/**
 * Rotation Warden — src/features/rotation/timeBlocks.ts
 * WHAT: Classify a local time of day into a named time block.
 * WHY: Block boundaries are written as "HH:MM" pairs; this is where "which block
 *      owns 14:30:45?" gets a single, tested answer.
 * FLOWS:
 *  - classifyMinute(minute, blocks) → TimeBlock | null
 *  - findOverlaps(blocks) → overlapping pairs (schedule validation)
 *  - msUntilNextBlockStart(now, blocks, tz) → delay for the enforcement loop
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { MINUTES_PER_DAY, zonedParts } from "../../lib/time.js";
import type { TimeBlock } from "./types.js";

/*
 * BOUNDARY RULE: classification happens on whole minutes. The instant is truncated
 * to its minute, and a block [from, to] owns from:00 through to:59. With the default
 * table (00:00–14:30, 14:31–23:59) the seconds between 14:30:00 and 14:31:00 belong
 * to off_peak, the block whose end boundary they touch. Every instant of the day is
 * covered; nothing depends on whether someone wrote < or <= somewhere.
 */

export function blockContains(block: TimeBlock, minuteOfDay: number): boolean {
  if (block.fromMinute <= block.toMinute) {
    return minuteOfDay >= block.fromMinute && minuteOfDay <= block.toMinute;
  }
  // Overnight block, e.g. 22:00–02:00
  return minuteOfDay >= block.fromMinute || minuteOfDay <= block.toMinute;
}

/**
 * First block (in declared order) containing the minute, or null. Validated tables
 * never overlap, so "first" only matters for documents that skipped validation.
 */
export function classifyMinute(minuteOfDay: number, blocks: readonly TimeBlock[]): TimeBlock | null {
  for (const block of blocks) {
    if (blockContains(block, minuteOfDay)) {
      return block;
    }
  }
  return null;
}

/**
 * Pairs of block names that share at least one minute. A day only has 1440 of
 * them, so brute force is fine.
 */
export function findOverlaps(blocks: readonly TimeBlock[]): Array<[string, string]> {
  const owner: Array<string | undefined> = new Array(MINUTES_PER_DAY);
  const overlaps: Array<[string, string]> = [];
  const seen = new Set<string>();

  for (const block of blocks) {
    for (let minute = 0; minute < MINUTES_PER_DAY; minute++) {
      if (!blockContains(block, minute)) continue;
      const previous = owner[minute];
      if (previous !== undefined) {
        const key = `${previous}\u0000${block.name}`;
        if (!seen.has(key)) {
          seen.add(key);
          overlaps.push([previous, block.name]);
        }
      } else {
        owner[minute] = block.name;
      }
    }
  }

  return overlaps;
}

/**
 * Milliseconds from `now` until the next minute at which any block starts, in the
 * given zone. Day changes count when a block starts at 00:00, which is also when
 * the weekday (and possibly the rotation) flips.
 *
 * DST shifts are ignored here; the loop caps this by its regular interval anyway.
 */
export function msUntilNextBlockStart(
  now: Date,
  blocks: readonly TimeBlock[],
  timeZone: string
): number {
  if (blocks.length === 0) {
    return Number.POSITIVE_INFINITY;
  }

  const { minuteOfDay, second } = zonedParts(now, timeZone);
  const starts = blocks.map((b) => b.fromMinute).sort((a, b) => a - b);
  const later = starts.find((start) => start > minuteOfDay);
  const nextStart = later ?? (starts[0] ?? 0) + MINUTES_PER_DAY;

  const deltaMs =
    (nextStart - minuteOfDay) * 60_000 - second * 1000 - now.getUTCMilliseconds();
  return Math.max(deltaMs, 1);
}
