/**
 * Test factories for creating test data.
 */

import { vi } from 'vitest';
import type { Logger } from '../../src/types/logger.js';
import type { Storage } from '../../src/storage/storage.js';
import type { ReminderSender, SendOptions, SendResult } from '../../src/channels/channel.js';
import type {
  CommunityConfig,
  DueReminder,
  EventDefinition,
} from '../../src/schedule/types.js';

/**
 * Create a mock logger that captures all log calls.
 */
export function createMockLogger(): Logger & {
  calls: Record<string, unknown[][]>;
  reset: () => void;
} {
  const calls: Record<string, unknown[][]> = {
    trace: [],
    debug: [],
    info: [],
    warn: [],
    error: [],
    fatal: [],
  };

  const logger = {
    trace: vi.fn((...args: unknown[]) => calls.trace.push(args)),
    debug: vi.fn((...args: unknown[]) => calls.debug.push(args)),
    info: vi.fn((...args: unknown[]) => calls.info.push(args)),
    warn: vi.fn((...args: unknown[]) => calls.warn.push(args)),
    error: vi.fn((...args: unknown[]) => calls.error.push(args)),
    fatal: vi.fn((...args: unknown[]) => calls.fatal.push(args)),
    child: () => logger,
    calls,
    reset: () => {
      calls.trace = [];
      calls.debug = [];
      calls.info = [];
      calls.warn = [];
      calls.error = [];
      calls.fatal = [];
      vi.clearAllMocks();
    },
  };

  return logger as Logger & { calls: Record<string, unknown[][]>; reset: () => void };
}

/**
 * In-memory Storage. Documents round-trip through JSON like on disk.
 */
export class MemoryStorage implements Storage {
  readonly documents = new Map<string, string>();
  /** When set, every save rejects with this error */
  failSaves: Error | null = null;
  saveCount = 0;

  load(key: string): Promise<unknown> {
    const raw = this.documents.get(key);
    return Promise.resolve(raw === undefined ? null : JSON.parse(raw));
  }

  save(key: string, data: unknown): Promise<void> {
    if (this.failSaves) {
      return Promise.reject(this.failSaves);
    }
    this.saveCount++;
    this.documents.set(key, JSON.stringify(data));
    return Promise.resolve();
  }

  delete(key: string): Promise<boolean> {
    return Promise.resolve(this.documents.delete(key));
  }

  exists(key: string): Promise<boolean> {
    return Promise.resolve(this.documents.has(key));
  }
}

/**
 * Create an event definition with sensible defaults (Mon/Thu 20:00, 90 min,
 * reminders 30 and 10 minutes ahead plus the start).
 */
export function createEventDefinition(overrides: Partial<EventDefinition> = {}): EventDefinition {
  return {
    key: 'raid night',
    name: 'Raid Night',
    weekdays: [0, 3],
    startTime: '20:00',
    durationMinutes: 90,
    offsets: [30, 10, 0],
    mentionRoleId: null,
    ...overrides,
  };
}

/**
 * Create a community with one or more events.
 */
export function createCommunity(
  events: EventDefinition[] = [createEventDefinition()],
  overrides: Partial<Omit<CommunityConfig, 'events'>> = {}
): CommunityConfig {
  const byKey: Record<string, EventDefinition> = {};
  for (const event of events) {
    byKey[event.key] = event;
  }
  return {
    communityId: 'guild-1',
    announceChannelId: 'channel-1',
    events: byKey,
    ...overrides,
  };
}

/**
 * Reminder sender that records every call.
 */
export function createFakeSender(
  result: SendResult = { success: true, messageId: 'msg-1' }
): ReminderSender & {
  reminders: DueReminder[];
  texts: { channelId: string; text: string; options: SendOptions | undefined }[];
} {
  const reminders: DueReminder[] = [];
  const texts: { channelId: string; text: string; options: SendOptions | undefined }[] = [];

  return {
    reminders,
    texts,
    sendReminder: vi.fn((reminder: DueReminder) => {
      reminders.push(reminder);
      return Promise.resolve(result);
    }),
    sendText: vi.fn((channelId: string, text: string, options?: SendOptions) => {
      texts.push({ channelId, text, options });
      return Promise.resolve(result);
    }),
  };
}
