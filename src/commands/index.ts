export {
  MAX_PRE_REMINDER_MINUTES,
  buildOffsets,
  parseDuration,
  parseEventName,
  parsePreReminders,
  parseStartTime,
  parseWeekdays,
} from './command-parsers.js';

export {
  EventCommands,
  LIST_REPLY_LIMIT,
  createEventCommands,
  type AddEventInput,
  type CommandPersistence,
  type EventCommandsDeps,
} from './event-commands.js';

export { buildSlashCommands, createCommandHandler, isAdmin } from './slash-commands.js';
