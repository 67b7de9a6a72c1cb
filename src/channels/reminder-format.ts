import { formatLocalTime } from '../schedule/occurrence-resolver.js';
import type { DueReminder, EventDefinition } from '../schedule/types.js';

/**
 * Discord role mention markup.
 */
export function roleMention(roleId: string | null): string {
  return roleId ? `<@&${roleId}>` : '';
}

/**
 * Text of a scheduled reminder. Offset 0 is the start announcement.
 */
export function formatReminderMessage(reminder: DueReminder, timezone: string): string {
  const mention = roleMention(reminder.roleId);

  if (reminder.offsetMinutes === 0) {
    const until = formatLocalTime(reminder.occurrenceEnd, timezone);
    return `🚀 **${reminder.eventName}** is **live now**! Runs until ${until}. ${mention}`.trim();
  }

  const at = formatLocalTime(reminder.occurrenceStart, timezone);
  return `⏳ **${reminder.eventName}** starts in **${String(reminder.offsetMinutes)} min** (${at}). ${mention}`.trim();
}

/**
 * Text of a manual test ping.
 */
export function formatTestPing(definition: EventDefinition): string {
  return `🔔 **${definition.name}** test ping ${roleMention(definition.mentionRoleId)}`.trim();
}
