import type { DueReminder } from '../schedule/types.js';
import type { Channel, ReminderSender, SendOptions, SendResult } from './channel.js';
import { formatReminderMessage } from './reminder-format.js';

/**
 * Formats due reminders and delivers them through a chat channel.
 */
export class ChannelReminderSender implements ReminderSender {
  constructor(
    private readonly channel: Channel,
    private readonly timezone: string
  ) {}

  sendReminder(reminder: DueReminder): Promise<SendResult> {
    return this.channel.sendMessage(
      reminder.channelId,
      formatReminderMessage(reminder, this.timezone),
      { mentionRoleId: reminder.roleId }
    );
  }

  sendText(channelId: string, text: string, options?: SendOptions): Promise<SendResult> {
    return this.channel.sendMessage(channelId, text, options);
  }
}

export function createReminderSender(channel: Channel, timezone: string): ChannelReminderSender {
  return new ChannelReminderSender(channel, timezone);
}
