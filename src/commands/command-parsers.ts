import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { WEEKDAY_NAMES, isWeekday, type Weekday } from '../schedule/types.js';

/** Longest supported lead time: one week. */
export const MAX_PRE_REMINDER_MINUTES = 7 * 24 * 60;

const FULL_WEEKDAY_NAMES = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
] as const;

const WEEKDAY_ALIASES = new Map<string, Weekday>();
WEEKDAY_NAMES.forEach((short, index) => {
  if (!isWeekday(index)) return;
  WEEKDAY_ALIASES.set(short.toLowerCase(), index);
  WEEKDAY_ALIASES.set(FULL_WEEKDAY_NAMES[index], index);
  WEEKDAY_ALIASES.set(String(index), index);
});

const eventNameSchema = z
  .string()
  .trim()
  .min(1, 'Event name must not be empty.')
  .max(100, 'Event name must be at most 100 characters.');

const startTimeSchema = z
  .string()
  .trim()
  .regex(/^([01]?\d|2[0-3]):([0-5]\d)$/, "start_time must be 'HH:MM' (24h).");

const durationSchema = z
  .number()
  .int('duration_min must be a whole number of minutes.')
  .positive('duration_min must be positive.');

const preReminderSchema = z
  .string()
  .regex(/^-?\d+$/, 'Pre-reminders must be whole minutes, e.g. 30,10,5.')
  .transform(Number)
  .pipe(
    z
      .number()
      .positive('Pre-reminders must be greater than 0.')
      .max(MAX_PRE_REMINDER_MINUTES, 'Pre-reminders can be at most one week.')
  );

function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(result.error.issues[0]?.message ?? 'Invalid value.');
  }
  return result.data;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

export function parseEventName(value: string): string {
  return parseWith(eventNameSchema, value);
}

/**
 * Parse `Mon,Thu`, `monday,thursday` or `0,3` (0 = Monday) into sorted,
 * unique weekdays.
 */
export function parseWeekdays(value: string): Weekday[] {
  const days = new Set<Weekday>();
  for (const part of splitList(value)) {
    const day = WEEKDAY_ALIASES.get(part.toLowerCase());
    if (day === undefined) {
      throw new ConfigurationError(`Unknown weekday '${part}'. Use Mon..Sun or 0..6 (0=Mon).`);
    }
    days.add(day);
  }
  if (days.size === 0) {
    throw new ConfigurationError('No weekdays given.');
  }
  return [...days].sort((a, b) => a - b);
}

/**
 * Parse a 24h time, normalized to `HH:MM`.
 */
export function parseStartTime(value: string): string {
  const [hours = '', minutes = ''] = parseWith(startTimeSchema, value).split(':');
  return `${hours.padStart(2, '0')}:${minutes}`;
}

export function parseDuration(value: number): number {
  return parseWith(durationSchema, value);
}

/**
 * Parse a comma list of minutes before start. Empty input means none.
 */
export function parsePreReminders(value: string | null): number[] {
  if (value === null) {
    return [];
  }
  const minutes = splitList(value).map((part) => parseWith(preReminderSchema, part));
  return [...new Set(minutes)].sort((a, b) => b - a);
}

/**
 * Combine pre-reminders with the start announcement (offset 0).
 */
export function buildOffsets(preReminders: readonly number[], announceStart: boolean): number[] {
  const offsets = new Set(preReminders);
  if (announceStart) {
    offsets.add(0);
  }
  if (offsets.size === 0) {
    throw new ConfigurationError('Event needs at least one pre-reminder or the start announcement.');
  }
  return [...offsets].sort((a, b) => b - a);
}
