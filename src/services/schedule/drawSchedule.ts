/**
 * Draw Schedule Calculator
 * @module services/schedule/drawSchedule
 *
 * Schedules are comma-separated `Weekday HH:mm Area/Location` triples, e.g.
 * `Wed 20:30 America/Edmonton,Sat 20:30 America/Edmonton`. Every function
 * here is pure: the same date and schedule give the same UTC instant on any
 * host. Only the results-expected heuristic reads the host timezone.
 */

import { addDays, getISODay, startOfDay, subDays } from "date-fns";
import { fromZonedTime } from "date-fns-tz";
import type { DateKey, ScheduleEntry } from "../../types/models.js";
import { parseDateKey, toDateKey } from "../../lib/utils/dates.js";

const WEEKDAYS: Record<string, number> = {
  mon: 1,
  monday: 1,
  tue: 2,
  tuesday: 2,
  wed: 3,
  wednesday: 3,
  thu: 4,
  thursday: 4,
  fri: 5,
  friday: 5,
  sat: 6,
  saturday: 6,
  sun: 7,
  sunday: 7,
};

export const DEFAULT_RESULTS_HOUR = 12;

/**
 * Parse a schedule string. Malformed entries are skipped with a warning;
 * a second entry on an already scheduled weekday is rejected.
 * An empty list is a valid return value, never an exception.
 */
export function parseSchedule(text: string): ScheduleEntry[] {
  const entries: ScheduleEntry[] = [];

  for (const rawEntry of text.split(",")) {
    const raw = rawEntry.trim();
    if (!raw) continue;

    const tokens = raw.split(/\s+/);
    if (tokens.length !== 3) {
      console.warn(`⚠️ Skipping schedule entry "${raw}": expected 3 parts`);
      continue;
    }
    const [dayToken, timeToken, tzId] = tokens;

    const weekday = WEEKDAYS[dayToken.toLowerCase()];
    if (weekday === undefined) {
      console.warn(`⚠️ Skipping schedule entry "${raw}": unknown weekday`);
      continue;
    }

    const time = /^(\d{1,2}):(\d{2})$/.exec(timeToken);
    const hour = time ? Number(time[1]) : NaN;
    const minute = time ? Number(time[2]) : NaN;
    if (!time || hour > 23 || minute > 59) {
      console.warn(`⚠️ Skipping schedule entry "${raw}": invalid time`);
      continue;
    }

    if (!tzId.includes("/")) {
      console.warn(`⚠️ Skipping schedule entry "${raw}": invalid timezone id`);
      continue;
    }

    if (entries.some((entry) => entry.weekday === weekday)) {
      console.warn(
        `⚠️ Skipping schedule entry "${raw}": weekday already scheduled`,
      );
      continue;
    }

    entries.push({ weekday, hour, minute, tzId });
  }

  if (entries.length === 0) {
    console.warn(`⚠️ Schedule "${text}" has no usable entries`);
  }
  return entries;
}

function isKnownTimeZone(tzId: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tzId });
    return true;
  } catch {
    return false;
  }
}

function entryFor(
  date: DateKey,
  schedule: readonly ScheduleEntry[],
): { day: Date; entry: ScheduleEntry } | null {
  const day = parseDateKey(date);
  if (!day) return null;
  const weekday = getISODay(day);
  const entry = schedule.find((candidate) => candidate.weekday === weekday);
  return entry ? { day, entry } : null;
}

/**
 * Weekday of `date` when the schedule has a draw on it, otherwise null
 */
export function drawWeekday(
  date: DateKey,
  schedule: readonly ScheduleEntry[],
): number | null {
  return entryFor(date, schedule)?.entry.weekday ?? null;
}

/**
 * UTC instant of the draw held on `date`. Null when the date is malformed,
 * falls on an unscheduled weekday, or the timezone cannot be resolved.
 */
export function drawInstantUtc(
  date: DateKey,
  schedule: readonly ScheduleEntry[],
): Date | null {
  const match = entryFor(date, schedule);
  if (!match) return null;

  const { entry } = match;
  if (!isKnownTimeZone(entry.tzId)) {
    console.warn(`⚠️ Unknown timezone "${entry.tzId}" for draw on ${date}`);
    return null;
  }

  const hh = String(entry.hour).padStart(2, "0");
  const mm = String(entry.minute).padStart(2, "0");
  const instant = fromZonedTime(`${date}T${hh}:${mm}:00`, entry.tzId);
  return Number.isNaN(instant.getTime()) ? null : instant;
}

/**
 * Date of the draw preceding `nextDrawDate` in cyclic weekday order
 */
export function previousDrawDate(
  nextDrawDate: DateKey,
  schedule: readonly ScheduleEntry[],
): DateKey | null {
  if (schedule.length === 0) return null;

  const match = entryFor(nextDrawDate, schedule);
  if (!match) return null;

  const sorted = [...schedule].sort((a, b) => a.weekday - b.weekday);
  const index = sorted.findIndex(
    (entry) => entry.weekday === match.entry.weekday,
  );
  const previous = sorted[(index - 1 + sorted.length) % sorted.length];

  const delta = (match.entry.weekday - previous.weekday + 7) % 7 || 7;
  return toDateKey(subDays(match.day, delta));
}

export function cutoffInstantUtc(
  drawDate: DateKey,
  schedule: readonly ScheduleEntry[],
  leadTimeMs: number,
): Date | null {
  const instant = drawInstantUtc(drawDate, schedule);
  return instant ? new Date(instant.getTime() - leadTimeMs) : null;
}

/**
 * Results are assumed published overnight: expected at `hour` (host time)
 * on the calendar day after the draw
 */
export function resultsExpectedAt(
  drawDate: DateKey,
  schedule: readonly ScheduleEntry[],
  hour = DEFAULT_RESULTS_HOUR,
): Date | null {
  const instant = drawInstantUtc(drawDate, schedule);
  if (!instant) return null;
  const expected = startOfDay(addDays(instant, 1));
  expected.setHours(hour);
  return expected;
}

export function shouldPoll(
  lastDrawDate: DateKey,
  schedule: readonly ScheduleEntry[],
  now: Date = new Date(),
  hour = DEFAULT_RESULTS_HOUR,
): boolean {
  const expected = resultsExpectedAt(lastDrawDate, schedule, hour);
  return expected !== null && now.getTime() > expected.getTime();
}
