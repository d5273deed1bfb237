/**
 * Rotation Warden — scripts/show-schedule.ts
 * WHAT: Print what the enforcer would ask for at a given instant, without touching the server.
 * WHY: Checking a schedule edit or a ROTATION_CYCLE_ANCHOR change before deploying it.
 * USAGE: tsx scripts/show-schedule.ts [ISO instant]
 * FLOWS: .env → schedule settings → schedule file → resolveActiveSelection → print
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { loadScheduleDocument } from "../src/config/scheduleStore.js";
import { resolveActiveSelection } from "../src/features/rotation/resolver.js";
import { msUntilNextBlockStart } from "../src/features/rotation/timeBlocks.js";
import { loadScheduleSettings } from "../src/lib/env.js";
import { ConfigError, ScheduleResolutionError } from "../src/lib/errors.js";
import { formatClock, zonedParts } from "../src/lib/time.js";

async function main(): Promise<void> {
  const rawInstant = process.argv[2];
  const now = rawInstant ? new Date(rawInstant) : new Date();
  if (Number.isNaN(now.getTime())) {
    console.error(`[show-schedule] "${rawInstant ?? ""}" is not a date; try 2025-01-06T14:30:00Z`);
    process.exit(2);
  }

  const settings = loadScheduleSettings();
  const doc = await loadScheduleDocument(settings.schedulePath);
  const local = zonedParts(now, settings.timeZone);

  console.log(`Instant:    ${now.toISOString()}`);
  console.log(`Local:      ${local.isoDate} ${formatClock(local.minuteOfDay)} ${local.weekday} (${settings.timeZone})`);
  console.log(
    `Blocks:     ${doc.timeBlocks.map((b) => `${b.name} ${formatClock(b.fromMinute)}-${formatClock(b.toMinute)}`).join(", ")}${doc.defaultTimeBlocks ? " (default)" : ""}`
  );

  const selection = resolveActiveSelection(now, doc, settings);
  console.log(`Rotation:   ${selection.rotationName ?? "(explicit schedule)"}`);
  if (selection.weekInCycle !== null) {
    console.log(`Week:       ${selection.weekInCycle + 1} of ${doc.cycleLengthWeeks}`);
  }
  console.log(`Block:      ${selection.blockName}`);
  console.log(`Maps:       ${selection.desiredMaps.length === 0 ? "(none)" : ""}`);
  selection.desiredMaps.forEach((map, i) => console.log(`  ${String(i + 1).padStart(2)}. ${map}`));

  const untilNext = msUntilNextBlockStart(now, doc.timeBlocks, settings.timeZone);
  console.log(`Next block: in ${Math.ceil(untilNext / 60_000)} min`);
}

try {
  await main();
} catch (err) {
  if (err instanceof ConfigError || err instanceof ScheduleResolutionError) {
    console.error(`[show-schedule] ${err.message}`);
    process.exit(1);
  }
  throw err;
}
