/**
 * Rotation Warden — src/lib/time.ts
 * WHAT: Calendar and wall-clock helpers for a configured IANA time zone.
 * WHY: The schedule is written in server-local terms ("monday", "14:31"), but the
 *      process clock is UTC. Everything zone-aware goes through here.
 * FLOWS:
 *  - zonedParts(now, tz) → local date, weekday, minute of day
 *  - parseIsoDate("2025-01-06") → day number for week arithmetic
 *  - parseClock("14:31") → minute of day
 * DOCS:
 *  - Intl.DateTimeFormat: https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Intl/DateTimeFormat
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export const WEEKDAYS = [
  "sunday",
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export const MINUTES_PER_DAY = 24 * 60;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function isWeekday(value: string): value is Weekday {
  return (WEEKDAYS as readonly string[]).includes(value);
}

/**
 * Local wall-clock view of an instant.
 * `dayNumber` counts days since 1970-01-01 in the local calendar, which makes
 * "weeks since anchor" plain integer arithmetic.
 */
export interface ZonedParts {
  isoDate: string;
  dayNumber: number;
  weekday: Weekday;
  minuteOfDay: number;
  second: number;
}

// One formatter per zone. Building an Intl.DateTimeFormat is the slow part.
const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-US", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

/** Days since the Unix epoch for a proleptic Gregorian calendar date. */
export function dayNumberOf(year: number, month: number, day: number): number {
  return Math.floor(Date.UTC(year, month - 1, day) / MS_PER_DAY);
}

/** 1970-01-01 was a Thursday. */
export function weekdayOfDayNumber(dayNumber: number): Weekday {
  const index = (((dayNumber + 4) % 7) + 7) % 7;
  return WEEKDAYS[index] ?? "sunday";
}

/**
 * Break an instant into local calendar parts for `timeZone`.
 *
 * @example
 * zonedParts(new Date("2025-03-10T13:45:10Z"), "Europe/Berlin")
 * // { isoDate: "2025-03-10", weekday: "monday", minuteOfDay: 885, second: 10, ... }
 */
export function zonedParts(now: Date, timeZone: string): ZonedParts {
  const values: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(now)) {
    if (part.type !== "literal") {
      values[part.type] = Number(part.value);
    }
  }

  const year = values.year ?? 1970;
  const month = values.month ?? 1;
  const day = values.day ?? 1;
  // Some ICU builds still print midnight as "24" even with h23.
  const hour = (values.hour ?? 0) % 24;
  const minute = values.minute ?? 0;
  const second = values.second ?? 0;

  const dayNumber = dayNumberOf(year, month, day);
  return {
    isoDate: `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`,
    dayNumber,
    weekday: weekdayOfDayNumber(dayNumber),
    minuteOfDay: hour * 60 + minute,
    second,
  };
}

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a strict ISO calendar date. Returns the local day number, or null when the
 * string is malformed or names a date that doesn't exist (2025-02-30).
 */
export function parseIsoDate(value: string): number | null {
  const match = ISO_DATE_RE.exec(value.trim());
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return null;
  }
  return dayNumberOf(year, month, day);
}

const CLOCK_RE = /^(\d{1,2}):(\d{2})$/;

/** "HH:MM" → minute of day, or null when out of range. */
export function parseClock(value: string): number | null {
  const match = CLOCK_RE.exec(value.trim());
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return null;
  return hours * 60 + minutes;
}

/** Minute of day → "HH:MM". */
export function formatClock(minuteOfDay: number): string {
  const normalized = ((minuteOfDay % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  const hours = Math.floor(normalized / 60);
  const minutes = normalized % 60;
  return `${String(hours).padStart(2, "0")}:${String(minutes).padStart(2, "0")}`;
}
