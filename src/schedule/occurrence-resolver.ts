/**
 * Occurrence Resolver
 *
 * All civil-time arithmetic lives here. Given a weekly EventDefinition and a
 * reference instant, computes the concrete occurrences whose reminder window
 * `[start - max(offsets), start + duration]` contains the reference.
 *
 * DST policy (applied by civilToInstant):
 * - nonexistent local time (spring-forward gap): shifted forward by the gap
 * - ambiguous local time (fall-back overlap): the first (earlier) instant
 */

import { DateTime, IANAZone } from 'luxon';
import { isWeekday } from './types.js';
import type { EventDefinition, Occurrence, TimeOfDay, Weekday } from './types.js';

const MINUTE_MS = 60_000;
const DAY_MS = 24 * 60 * MINUTE_MS;

/**
 * Calendar date without a zone.
 */
export interface CivilDate {
  year: number;
  month: number;
  day: number;
}

/**
 * Parse a stored `HH:MM` start time. Stored definitions are validated at the
 * command boundary, so a malformed value here is a programming error.
 */
export function parseTimeOfDay(value: string): TimeOfDay {
  const match = /^(\d{2}):(\d{2})$/.exec(value);
  if (!match) {
    throw new RangeError(`Invalid time of day: ${value}`);
  }
  return { hour: Number(match[1]), minute: Number(match[2]) };
}

function requireZone(zone: string): IANAZone {
  const ianaZone = IANAZone.create(zone);
  if (!ianaZone.isValid) {
    throw new RangeError(`Unknown time zone: ${zone}`);
  }
  return ianaZone;
}

/**
 * Convert a wall-clock date and time in `zone` to an instant.
 *
 * The zone's offsets a day before and a day after are tried; each offset that
 * maps the wall time back onto itself is a valid reading. Two valid readings
 * mean a fall-back overlap (take the earlier); none means a spring-forward gap
 * (read the wall time with the pre-transition offset, which lands `gap`
 * minutes later on the clock).
 */
export function civilToInstant(date: CivilDate, time: TimeOfDay, zone: string): Date {
  const ianaZone = requireZone(zone);
  const wall = Date.UTC(date.year, date.month - 1, date.day, time.hour, time.minute);

  const offsetBefore = ianaZone.offset(wall - DAY_MS);
  const offsetAfter = ianaZone.offset(wall + DAY_MS);

  const readings = [...new Set([offsetBefore, offsetAfter])]
    .map((offset) => ({ offset, instant: wall - offset * MINUTE_MS }))
    .filter(({ offset, instant }) => ianaZone.offset(instant) === offset)
    .map(({ instant }) => instant);

  if (readings.length > 0) {
    return new Date(Math.min(...readings));
  }

  return new Date(wall - offsetBefore * MINUTE_MS);
}

/**
 * Local calendar date and weekday (0 = Monday) of an instant in `zone`.
 */
export function localDateOf(instant: Date, zone: string): { date: CivilDate; weekday: Weekday } {
  requireZone(zone);
  const local = DateTime.fromJSDate(instant, { zone });
  return {
    date: { year: local.year, month: local.month, day: local.day },
    weekday: toWeekday(local.weekday - 1),
  };
}

function toWeekday(value: number): Weekday {
  const normalized = ((value % 7) + 7) % 7;
  if (!isWeekday(normalized)) {
    throw new RangeError(`Invalid weekday: ${String(value)}`);
  }
  return normalized;
}

function addDays(date: CivilDate, days: number): CivilDate {
  const shifted = DateTime.utc(date.year, date.month, date.day).plus({ days });
  return { year: shifted.year, month: shifted.month, day: shifted.day };
}

function toOccurrence(definition: EventDefinition, start: Date): Occurrence {
  return {
    definition,
    start,
    end: new Date(start.getTime() + definition.durationMinutes * MINUTE_MS),
  };
}

/**
 * Largest configured offset in minutes (0 when there are none).
 */
export function maxOffset(definition: EventDefinition): number {
  return Math.max(0, ...definition.offsets);
}

/**
 * All occurrences whose window `[start - max(offsets), start + duration]`
 * contains `reference`, sorted by start.
 *
 * Per weekday, the most recent start at or before the reference and the
 * immediate next one are checked, so windows that cross a weekday boundary
 * (late-night events, long lead offsets) are still found.
 */
export function resolveOccurrences(
  definition: EventDefinition,
  reference: Date,
  zone: string
): Occurrence[] {
  const time = parseTimeOfDay(definition.startTime);
  const { date: today, weekday: todayWeekday } = localDateOf(reference, zone);
  const referenceMs = reference.getTime();
  const leadMs = maxOffset(definition) * MINUTE_MS;
  const durationMs = definition.durationMinutes * MINUTE_MS;

  const found = new Map<number, Occurrence>();

  for (const weekday of definition.weekdays) {
    const daysBack = (todayWeekday - weekday + 7) % 7;
    const anchorDate = addDays(today, -daysBack);
    const anchorStart = civilToInstant(anchorDate, time, zone);

    // [most recent past-or-present start, immediate next start]
    const candidates =
      anchorStart.getTime() > referenceMs
        ? [civilToInstant(addDays(anchorDate, -7), time, zone), anchorStart]
        : [anchorStart, civilToInstant(addDays(anchorDate, 7), time, zone)];

    for (const start of candidates) {
      const startMs = start.getTime();
      if (startMs - leadMs <= referenceMs && referenceMs <= startMs + durationMs) {
        found.set(startMs, toOccurrence(definition, start));
      }
    }
  }

  return [...found.values()].sort((a, b) => a.start.getTime() - b.start.getTime());
}

/**
 * The earliest occurrence starting strictly after `reference`.
 */
export function nextOccurrence(
  definition: EventDefinition,
  reference: Date,
  zone: string
): Occurrence {
  const time = parseTimeOfDay(definition.startTime);
  const { date: today, weekday: todayWeekday } = localDateOf(reference, zone);
  const referenceMs = reference.getTime();

  let best: Date | null = null;
  for (const weekday of definition.weekdays) {
    const daysAhead = (weekday - todayWeekday + 7) % 7;
    const date = addDays(today, daysAhead);
    let start = civilToInstant(date, time, zone);
    if (start.getTime() <= referenceMs) {
      start = civilToInstant(addDays(date, 7), time, zone);
    }
    if (best === null || start.getTime() < best.getTime()) {
      best = start;
    }
  }

  if (best === null) {
    throw new RangeError(`Event "${definition.name}" has no weekdays`);
  }
  return toOccurrence(definition, best);
}

/**
 * Format an instant as `HH:MM` in `zone`.
 */
export function formatLocalTime(instant: Date, zone: string): string {
  return DateTime.fromJSDate(instant, { zone }).toFormat('HH:mm');
}

/**
 * Format an instant as `ccc dd.LL. HH:mm` (e.g. `Thu 15.10. 20:00`) in `zone`.
 */
export function formatLocalDateTime(instant: Date, zone: string): string {
  return DateTime.fromJSDate(instant, { zone }).setLocale('en-US').toFormat('ccc dd.LL. HH:mm');
}
