/**
 * Schedule domain types.
 *
 * Weekdays are 0..6 with 0 = Monday. Times of day are `HH:MM` in the single
 * configured zone; all instants are plain Dates (UTC under the hood).
 */

export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export const WEEKDAY_NAMES = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'] as const;

/**
 * Wall-clock time of day.
 */
export interface TimeOfDay {
  hour: number;
  minute: number;
}

/**
 * A recurring weekly event of one community.
 */
export interface EventDefinition {
  /** Lower-cased, trimmed name; identity within the community */
  key: string;
  /** Display name as the operator typed it */
  name: string;
  /** Non-empty, sorted, unique */
  weekdays: Weekday[];
  /** `HH:MM`, zero-padded */
  startTime: string;
  durationMinutes: number;
  /** Minutes before start; sorted descending, unique, each >= 0 (0 = at start) */
  offsets: number[];
  mentionRoleId: string | null;
}

/**
 * Per-community configuration.
 */
export interface CommunityConfig {
  communityId: string;
  announceChannelId: string | null;
  /** Keyed by EventDefinition.key */
  events: Record<string, EventDefinition>;
}

/**
 * Read-only view of all communities, taken at tick start.
 */
export type CommunitySnapshot = readonly CommunityConfig[];

/**
 * One concrete instance of a recurring event.
 */
export interface Occurrence {
  definition: EventDefinition;
  start: Date;
  end: Date;
}

/**
 * Identity of a sent (or claimed) reminder.
 */
export interface PostLogKey {
  communityId: string;
  eventKey: string;
  occurrenceStart: Date;
  offsetMinutes: number;
}

/**
 * A reminder that is due now and has been committed to the post-log.
 */
export interface DueReminder {
  communityId: string;
  channelId: string;
  roleId: string | null;
  eventKey: string;
  eventName: string;
  occurrenceStart: Date;
  occurrenceEnd: Date;
  offsetMinutes: number;
}

/**
 * Narrow a number to a Weekday.
 */
export function isWeekday(value: number): value is Weekday {
  return Number.isInteger(value) && value >= 0 && value <= 6;
}
