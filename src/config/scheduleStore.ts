/**
 * Rotation Warden — src/config/scheduleStore.ts
 * WHAT: Load and validate the weekly rotation JSON into a frozen ScheduleDocument.
 * WHY: The resolver trusts its input. Everything that can be wrong with a
 *      hand-edited schedule file is caught here, once, at startup.
 * FLOWS:
 *  - loadScheduleDocument(path) → read → JSON.parse → parseScheduleDocument
 *  - parseScheduleDocument(raw) → zod shape check → cross-rotation checks → freeze
 * DOCS:
 *  - zod: https://zod.dev
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { formatClock, isWeekday, parseClock, parseIsoDate, WEEKDAYS, type Weekday } from "../lib/time.js";
import {
  DEFAULT_CYCLE_ANCHOR,
  DEFAULT_CYCLE_LENGTH_WEEKS,
  DEFAULT_TIME_BLOCKS,
  RESERVED_KEYS,
} from "../features/rotation/constants.js";
import { normalizeRotationKey } from "../features/rotation/resolver.js";
import { findOverlaps } from "../features/rotation/timeBlocks.js";
import type { ScheduleDocument, TimeBlock, WeekSchedule } from "../features/rotation/types.js";

// ===== Shape =====

const mapIdSchema = z
  .string()
  .transform((val) => val.trim())
  .pipe(z.string().min(1, "map identifier must be a non-empty string"));

const daySchema = z.record(z.string(), z.array(mapIdSchema));
const weekSchema = z.record(z.string(), daySchema);

const clockSchema = z.string().refine((val) => parseClock(val) !== null, { message: "expected HH:MM" });

const documentSchema = z
  .object({
    cycle_length_weeks: z
      .union([z.number(), z.string().regex(/^\s*\d+\s*$/).transform(Number)])
      .pipe(z.number().int().positive("cycle_length_weeks must be a positive integer"))
      .optional(),
    cycle_anchor: z
      .string()
      .refine((val) => parseIsoDate(val) !== null, { message: "cycle_anchor must be an ISO date (YYYY-MM-DD)" })
      .optional(),
    rotation_order: z.array(z.string()).optional(),
    time_blocks: z.record(z.string().min(1), z.object({ from: clockSchema, to: clockSchema })).optional(),
    schedule: weekSchema.optional(),
  })
  .passthrough();

type RawWeek = z.infer<typeof weekSchema>;

// ===== Helpers =====

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Lowercase weekday keys; report unknown names and case-insensitive duplicates. */
function normalizeWeek(raw: RawWeek, where: string, issues: string[]): WeekSchedule {
  const week: Partial<Record<Weekday, Record<string, readonly string[]>>> = {};
  for (const [dayKey, day] of Object.entries(raw)) {
    const weekday = dayKey.trim().toLowerCase();
    if (!isWeekday(weekday)) {
      issues.push(`${where}.${dayKey}: "${dayKey}" is not a weekday (expected one of ${WEEKDAYS.join(", ")})`);
      continue;
    }
    if (week[weekday]) {
      issues.push(`${where}.${dayKey}: ${weekday} is declared twice`);
      continue;
    }
    week[weekday] = day;
  }
  return week;
}

function describeWeek(week: WeekSchedule): Map<Weekday, string> {
  const shape = new Map<Weekday, string>();
  for (const weekday of WEEKDAYS) {
    const day = week[weekday];
    if (day) {
      shape.set(weekday, Object.keys(day).sort().join(","));
    }
  }
  return shape;
}

function buildTimeBlocks(
  raw: Record<string, { from: string; to: string }> | undefined
): TimeBlock[] | null {
  if (!raw) return null;
  return Object.entries(raw).map(([name, window]) => ({
    name,
    fromMinute: parseClock(window.from) ?? 0,
    toMinute: parseClock(window.to) ?? 0,
  }));
}

// ===== Parse =====

/**
 * Validate a parsed JSON value. `source` only shows up in error messages.
 *
 * @throws ConfigError listing every problem found
 */
export function parseScheduleDocument(raw: unknown, source = "schedule"): ScheduleDocument {
  const parsed = documentSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join(".") || "(root)"}: ${i.message}`).join("\n");
    throw new ConfigError(`Schedule ${source} is invalid:\n${issues}`, parsed.error.issues[0]?.path.join(".") || source);
  }

  const doc = parsed.data;
  const issues: string[] = [];

  // Rotation sections: every object-valued key that isn't reserved or a comment.
  const rotations: Record<string, WeekSchedule> = {};
  for (const [key, value] of Object.entries(doc)) {
    if (RESERVED_KEYS.has(key) || key.startsWith("$") || key.startsWith("_")) continue;
    if (!isPlainObject(value)) {
      logger.warn({ key, source }, "[schedule] ignoring non-object top-level key");
      continue;
    }
    const week = weekSchema.safeParse(value);
    if (!week.success) {
      for (const issue of week.error.issues) {
        issues.push(`${key}.${issue.path.join(".")}: ${issue.message}`);
      }
      continue;
    }
    rotations[key] = normalizeWeek(week.data, key, issues);
  }

  const schedule = doc.schedule ? normalizeWeek(doc.schedule, "schedule", issues) : undefined;
  const rotationKeys = Object.keys(rotations).sort();

  if (!schedule && rotationKeys.length === 0) {
    issues.push("document declares neither rotation sections nor a schedule");
  }

  // Same weekdays, and per weekday the same block names, in every rotation.
  const [firstKey, ...otherKeys] = rotationKeys;
  const firstRotation = firstKey !== undefined ? rotations[firstKey] : undefined;
  if (firstKey !== undefined && firstRotation) {
    const reference = describeWeek(firstRotation);
    for (const key of otherKeys) {
      const rotation = rotations[key];
      if (!rotation) continue;
      const shape = describeWeek(rotation);
      const days = [...shape.keys()].join(",");
      const referenceDays = [...reference.keys()].join(",");
      if (days !== referenceDays) {
        issues.push(`${key}: declares weekdays [${days}] but ${firstKey} declares [${referenceDays}]`);
        continue;
      }
      for (const [weekday, blocks] of shape) {
        if (blocks !== reference.get(weekday)) {
          issues.push(
            `${key}.${weekday}: declares blocks [${blocks}] but ${firstKey}.${weekday} declares [${reference.get(weekday) ?? ""}]`
          );
        }
      }
    }
  }

  const explicitBlocks = buildTimeBlocks(doc.time_blocks);
  const timeBlocks = explicitBlocks ?? DEFAULT_TIME_BLOCKS.map((block) => ({ ...block }));
  if (explicitBlocks) {
    for (const [a, b] of findOverlaps(explicitBlocks)) {
      issues.push(`time_blocks: "${a}" and "${b}" overlap`);
    }
  }

  // Every block a schedule refers to must exist in the block table.
  const blockNames = new Set(timeBlocks.map((block) => block.name));
  const sections: Array<[string, WeekSchedule]> = Object.entries(rotations);
  if (schedule) sections.push(["schedule", schedule]);
  for (const [key, week] of sections) {
    for (const weekday of WEEKDAYS) {
      for (const blockName of Object.keys(week[weekday] ?? {})) {
        if (!blockNames.has(blockName)) {
          issues.push(`${key}.${weekday}.${blockName}: no such time block (known: ${[...blockNames].join(", ")})`);
        }
      }
    }
  }

  if (issues.length > 0) {
    throw new ConfigError(`Schedule ${source} is invalid:\n${issues.map((i) => `- ${i}`).join("\n")}`, source);
  }

  // rotation_order: "A" finds rotation_A; unknown entries are skipped, not fatal.
  const rotationOrder: string[] = [];
  for (const entry of doc.rotation_order ?? []) {
    const key = normalizeRotationKey(entry, rotationKeys);
    if (key) {
      rotationOrder.push(key);
    } else {
      logger.warn({ entry, source }, "[schedule] rotation_order entry not recognized");
    }
  }
  if (rotationOrder.length === 0) {
    rotationOrder.push(...rotationKeys);
  }

  // Absent length: one week per rotation, so rotations alternate weekly.
  const cycleLengthWeeks = doc.cycle_length_weeks ?? (rotationOrder.length || DEFAULT_CYCLE_LENGTH_WEEKS);
  if (!schedule && cycleLengthWeeks % rotationOrder.length !== 0) {
    throw new ConfigError(
      `Schedule ${source} is invalid:\n- cycle_length_weeks: ${cycleLengthWeeks} weeks cannot be split evenly across ${rotationOrder.length} rotations`,
      source
    );
  }

  const cycleAnchor = doc.cycle_anchor?.trim() ?? DEFAULT_CYCLE_ANCHOR;
  const cycleAnchorDay = parseIsoDate(cycleAnchor) ?? 0;

  if (!explicitBlocks) {
    logger.info(
      {
        blocks: DEFAULT_TIME_BLOCKS.map((b) => `${b.name} ${formatClock(b.fromMinute)}-${formatClock(b.toMinute)}`),
      },
      "[schedule] using default time blocks"
    );
  }

  return deepFreeze<ScheduleDocument>({
    cycleLengthWeeks,
    cycleAnchor,
    cycleAnchorDay,
    rotationOrder,
    rotations,
    timeBlocks,
    defaultTimeBlocks: !explicitBlocks,
    ...(schedule ? { schedule } : {}),
  });
}

/**
 * Read and validate the schedule file.
 *
 * @throws ConfigError when the file is missing, not JSON, or invalid
 */
export async function loadScheduleDocument(filePath: string): Promise<ScheduleDocument> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read schedule file ${filePath}`, "WEEKLY_ROTATION_PATH", { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Schedule file ${filePath} is not valid JSON`, "WEEKLY_ROTATION_PATH", { cause: err });
  }

  const doc = parseScheduleDocument(raw, filePath);
  logger.info(
    {
      path: filePath,
      mode: doc.schedule ? "explicit" : "rotations",
      rotations: doc.rotationOrder,
      cycleLengthWeeks: doc.cycleLengthWeeks,
      cycleAnchor: doc.cycleAnchor,
    },
    "[schedule] loaded"
  );
  return doc;
}
