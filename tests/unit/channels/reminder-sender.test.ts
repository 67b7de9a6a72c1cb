import { describe, it, expect, vi } from 'vitest';
import type { Channel } from '../../../src/channels/channel.js';
import { createReminderSender } from '../../../src/channels/reminder-sender.js';

function createChannel(): Channel & { sendMessage: ReturnType<typeof vi.fn<Channel['sendMessage']>> } {
  return {
    name: 'fake',
    isAvailable: () => true,
    sendMessage: vi.fn<Channel['sendMessage']>(() =>
      Promise.resolve({ success: true, messageId: 'message-1' })
    ),
  };
}

describe('ChannelReminderSender', () => {
  it('formats the reminder in the configured zone and pings its role', async () => {
    const channel = createChannel();
    const sender = createReminderSender(channel, 'Europe/Berlin');

    const result = await sender.sendReminder({
      communityId: 'guild-1',
      channelId: 'channel-1',
      roleId: 'role-1',
      eventKey: 'siege',
      eventName: 'Siege',
      occurrenceStart: new Date('2026-07-04T16:00:00Z'),
      occurrenceEnd: new Date('2026-07-04T17:00:00Z'),
      offsetMinutes: 0,
    });

    expect(result).toEqual({ success: true, messageId: 'message-1' });
    expect(channel.sendMessage).toHaveBeenCalledWith(
      'channel-1',
      '🚀 **Siege** is **live now**! Runs until 19:00. <@&role-1>',
      { mentionRoleId: 'role-1' }
    );
  });

  it('passes plain text through', async () => {
    const channel = createChannel();
    const sender = createReminderSender(channel, 'Europe/Berlin');

    await sender.sendText('channel-2', 'hello');

    expect(channel.sendMessage).toHaveBeenCalledWith('channel-2', 'hello', undefined);
  });
});
