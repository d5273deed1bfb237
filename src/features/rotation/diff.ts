/**
 * Rotation Warden — src/features/rotation/diff.ts
 * WHAT: Plan the removals and additions that turn the live rotation into the desired one.
 * WHY: Both channels can only delete by name and append at the end. The plan has to
 *      respect that and still land on the desired order.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { RotationDiff } from "./types.js";

/*
 * Since additions always append, the final queue is (surviving live maps, in live
 * order) followed by (added maps). That equals `desired` exactly when the survivors
 * are a prefix of `desired`.
 *
 * Removal is by name, and the server drops the earliest remaining copy. So for each
 * map the copies that survive are always its LAST ones in live. A prefix can only be
 * kept if those last copies already sit in desired order; otherwise we keep a shorter
 * prefix. Keeping zero (clear, then append everything) always works.
 *
 *   live [X, Y, Z], desired [Y, Z, W]  →  remove [X], add [W]
 *   live [Z, Y],    desired [Y, Z]     →  remove [Z], add [Z]
 *   live [Z, W, Z], desired [Z, W, X]  →  remove [Z, W], add [W, X]
 */

/** Length of the longest prefix of `desired` that is an in-order subsequence of `live`. */
function longestMatchedPrefix(live: readonly string[], desired: readonly string[]): number {
  let kept = 0;
  for (const map of live) {
    if (kept < desired.length && map === desired[kept]) kept++;
  }
  return kept;
}

/**
 * Live slots left standing for the first `count` desired maps once every other slot
 * is removed by name, or null when those slots would come out in the wrong order.
 */
function survivingSlots(live: readonly string[], desired: readonly string[], count: number): number[] | null {
  const prefix = desired.slice(0, count);

  const needed = new Map<string, number>();
  for (const map of prefix) {
    needed.set(map, (needed.get(map) ?? 0) + 1);
  }

  const slotsByName = new Map<string, number[]>();
  live.forEach((map, index) => {
    const slots = slotsByName.get(map) ?? [];
    slots.push(index);
    slotsByName.set(map, slots);
  });

  const used = new Map<string, number>();
  const result: number[] = [];
  let previous = -1;
  for (const map of prefix) {
    const slots = slotsByName.get(map) ?? [];
    const want = needed.get(map) ?? 0;
    const nth = used.get(map) ?? 0;
    const slot = slots[slots.length - want + nth];
    if (slot === undefined || slot <= previous) return null;
    used.set(map, nth + 1);
    result.push(slot);
    previous = slot;
  }
  return result;
}

/**
 * @example
 * planRotationDiff(["X", "Y", "Z"], ["Y", "Z", "W"])
 * // { remove: ["X"], add: ["W"], kept: 2 }
 */
export function planRotationDiff(live: readonly string[], desired: readonly string[]): RotationDiff {
  // Not monotone in the prefix length ([A, B, A] keeps [A, B, A] but not [A, B]), so
  // walk down from the unconstrained best.
  for (let kept = longestMatchedPrefix(live, desired); kept >= 0; kept--) {
    const slots = survivingSlots(live, desired, kept);
    if (!slots) continue;
    const keptSlots = new Set(slots);
    return {
      remove: live.filter((_, index) => !keptSlots.has(index)),
      add: desired.slice(kept),
      kept,
    };
  }
  // kept = 0 always succeeds above.
  return { remove: [...live], add: [...desired], kept: 0 };
}

/** True when applying the diff would issue no commands at all. */
export function isNoopDiff(diff: RotationDiff): boolean {
  return diff.remove.length === 0 && diff.add.length === 0;
}
