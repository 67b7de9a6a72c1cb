/**
 * Schedule module exports.
 */

export type {
  Weekday,
  TimeOfDay,
  EventDefinition,
  CommunityConfig,
  CommunitySnapshot,
  Occurrence,
  PostLogKey,
  DueReminder,
} from './types.js';
export { WEEKDAY_NAMES, isWeekday } from './types.js';
export type { CivilDate } from './occurrence-resolver.js';
export {
  civilToInstant,
  formatLocalDateTime,
  formatLocalTime,
  localDateOf,
  maxOffset,
  nextOccurrence,
  parseTimeOfDay,
  resolveOccurrences,
} from './occurrence-resolver.js';
export type { PostLogEntryRecord } from './post-log.js';
export { PostLog, formatPostLogKey } from './post-log.js';
export { CommunityStore, eventKeyOf } from './community-store.js';
export type { DueEvaluatorConfig, PostLogPersister } from './due-evaluator.js';
export { DueEvaluator, createDueEvaluator, isDue } from './due-evaluator.js';
