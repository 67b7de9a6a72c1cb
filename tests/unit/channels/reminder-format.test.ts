import { describe, it, expect } from 'vitest';
import {
  formatReminderMessage,
  formatTestPing,
  roleMention,
} from '../../../src/channels/reminder-format.js';
import type { DueReminder } from '../../../src/schedule/types.js';
import { createEventDefinition } from '../../helpers/factories.js';

const ZONE = 'Europe/Berlin';

function reminder(overrides: Partial<DueReminder> = {}): DueReminder {
  return {
    communityId: 'guild-1',
    channelId: 'channel-1',
    roleId: 'role-1',
    eventKey: 'raid night',
    eventName: 'Raid Night',
    occurrenceStart: new Date('2026-03-05T19:00:00Z'),
    occurrenceEnd: new Date('2026-03-05T20:30:00Z'),
    offsetMinutes: 30,
    ...overrides,
  };
}

describe('roleMention', () => {
  it('renders role markup or nothing', () => {
    expect(roleMention('123')).toBe('<@&123>');
    expect(roleMention(null)).toBe('');
  });
});

describe('formatReminderMessage', () => {
  it('announces a pre-reminder with the local start time', () => {
    expect(formatReminderMessage(reminder(), ZONE)).toBe(
      '⏳ **Raid Night** starts in **30 min** (20:00). <@&role-1>'
    );
  });

  it('announces the start with the local end time', () => {
    expect(formatReminderMessage(reminder({ offsetMinutes: 0 }), ZONE)).toBe(
      '🚀 **Raid Night** is **live now**! Runs until 21:30. <@&role-1>'
    );
  });

  it('drops the trailing space without a role', () => {
    expect(formatReminderMessage(reminder({ roleId: null, offsetMinutes: 10 }), ZONE)).toBe(
      '⏳ **Raid Night** starts in **10 min** (20:00).'
    );
  });
});

describe('formatTestPing', () => {
  it('mentions the role when set', () => {
    expect(formatTestPing(createEventDefinition({ mentionRoleId: '55' }))).toBe(
      '🔔 **Raid Night** test ping <@&55>'
    );
    expect(formatTestPing(createEventDefinition())).toBe('🔔 **Raid Night** test ping');
  });
});
