/**
 * Event configuration commands
 *
 * Platform-independent handlers behind the slash commands. Each returns the
 * reply text; operator mistakes surface as BotError subclasses whose message
 * is shown to the operator.
 */

import type { Logger } from '../types/logger.js';
import type { ReminderSender } from '../channels/channel.js';
import { formatTestPing, roleMention } from '../channels/reminder-format.js';
import {
  ChannelNotSetError,
  DeliveryError,
  EventNotFoundError,
  errorMessage,
} from '../core/errors.js';
import type { CommunityStore } from '../schedule/community-store.js';
import { eventKeyOf } from '../schedule/community-store.js';
import { formatLocalDateTime, nextOccurrence } from '../schedule/occurrence-resolver.js';
import type { PostLog } from '../schedule/post-log.js';
import { WEEKDAY_NAMES, type EventDefinition } from '../schedule/types.js';
import {
  buildOffsets,
  parseDuration,
  parseEventName,
  parsePreReminders,
  parseStartTime,
  parseWeekdays,
} from './command-parsers.js';

/** Discord rejects messages over 2000 characters. */
export const LIST_REPLY_LIMIT = 1900;

/**
 * Raw `/add_event` arguments.
 */
export interface AddEventInput {
  name: string;
  weekdays: string;
  startTime: string;
  durationMinutes: number;
  preReminders: string | null;
  mentionRoleId: string | null;
  announceStart: boolean;
}

/**
 * Persistence used by the commands.
 */
export interface CommandPersistence {
  saveCommunities(store: CommunityStore): Promise<void>;
  savePostLog(postLog: PostLog): Promise<void>;
}

export interface EventCommandsDeps {
  store: CommunityStore;
  postLog: PostLog;
  persistence: CommandPersistence;
  sender: ReminderSender;
  timezone: string;
  logger: Logger;
}

function describeOffsets(offsets: readonly number[]): string {
  if (offsets.length === 0) return '-';
  return offsets.map((offset) => (offset === 0 ? 'start' : String(offset))).join(', ');
}

function describeSchedule(definition: EventDefinition): string {
  const days = definition.weekdays.map((day) => WEEKDAY_NAMES[day]).join(',');
  return `${days} ${definition.startTime} (${String(definition.durationMinutes)} min)`;
}

export class EventCommands {
  private readonly store: CommunityStore;
  private readonly postLog: PostLog;
  private readonly persistence: CommandPersistence;
  private readonly sender: ReminderSender;
  private readonly timezone: string;
  private readonly logger: Logger;

  constructor(deps: EventCommandsDeps) {
    this.store = deps.store;
    this.postLog = deps.postLog;
    this.persistence = deps.persistence;
    this.sender = deps.sender;
    this.timezone = deps.timezone;
    this.logger = deps.logger.child({ component: 'event-commands' });
  }

  async setAnnounceChannel(communityId: string, channelId: string): Promise<string> {
    await this.store.commit(
      (store) => {
        store.setAnnounceChannel(communityId, channelId);
      },
      (store) => this.persistence.saveCommunities(store)
    );
    this.logger.info({ communityId, channelId }, 'Announce channel set');
    return `✅ Announce channel set to <#${channelId}>.`;
  }

  /**
   * Add an event, replacing one with the same name. Post-log entries are
   * kept, so re-adding an identical event does not repeat reminders.
   */
  async addEvent(communityId: string, input: AddEventInput): Promise<string> {
    const name = parseEventName(input.name);
    const definition: EventDefinition = {
      key: eventKeyOf(name),
      name,
      weekdays: parseWeekdays(input.weekdays),
      startTime: parseStartTime(input.startTime),
      durationMinutes: parseDuration(input.durationMinutes),
      offsets: buildOffsets(parsePreReminders(input.preReminders), input.announceStart),
      mentionRoleId: input.mentionRoleId,
    };

    const previous = await this.store.commit(
      (store) => store.upsertEvent(communityId, definition),
      (store) => this.persistence.saveCommunities(store)
    );

    this.logger.info(
      { communityId, eventKey: definition.key, replaced: previous !== undefined },
      'Event saved'
    );

    const verb = previous ? 'updated' : 'added';
    return (
      `✅ Event **${name}** ${verb}: ${describeSchedule(definition)}, ` +
      `reminders: ${describeOffsets(definition.offsets)}.`
    );
  }

  /**
   * One line per event, with its next start.
   */
  listEvents(communityId: string, now: Date = new Date()): string {
    const events = this.store.listEvents(communityId);
    if (events.length === 0) {
      return 'ℹ️ No events configured.';
    }

    const lines = events.map((definition) => {
      const next = nextOccurrence(definition, now, this.timezone);
      const role = roleMention(definition.mentionRoleId) || '-';
      return (
        `• **${definition.name}** ${describeSchedule(definition)}` +
        ` | reminders: ${describeOffsets(definition.offsets)}` +
        ` | role: ${role}` +
        ` | next: ${formatLocalDateTime(next.start, this.timezone)}`
      );
    });

    return lines.join('\n').slice(0, LIST_REPLY_LIMIT);
  }

  /**
   * Remove an event and forget its post-log entries.
   */
  async removeEvent(communityId: string, name: string): Promise<string> {
    if (!this.store.getEvent(communityId, name)) {
      throw new EventNotFoundError(name);
    }

    const removed = await this.store.commit(
      (store) => store.removeEvent(communityId, name),
      (store) => this.persistence.saveCommunities(store)
    );
    const eventKey = eventKeyOf(name);

    const forgotten = this.postLog.removeEvent(communityId, eventKey);
    if (forgotten > 0) {
      try {
        await this.persistence.savePostLog(this.postLog);
      } catch (error) {
        // Entries stay on disk until pruned; the event itself is gone.
        this.logger.warn(
          { communityId, eventKey, error: errorMessage(error) },
          'Failed to save post-log after event removal'
        );
      }
    }

    this.logger.info({ communityId, eventKey, postLogEntries: forgotten }, 'Event removed');
    return `✅ Event **${removed?.name ?? name}** removed.`;
  }

  /**
   * Forget a community the bot no longer belongs to: its configuration and
   * its post-log entries.
   */
  async forgetCommunity(communityId: string): Promise<void> {
    const existed = await this.store.commit(
      (store) => store.removeCommunity(communityId),
      (store) => this.persistence.saveCommunities(store)
    );

    const forgotten = this.postLog.removeCommunity(communityId);
    if (forgotten > 0) {
      try {
        await this.persistence.savePostLog(this.postLog);
      } catch (error) {
        this.logger.warn(
          { communityId, error: errorMessage(error) },
          'Failed to save post-log after community removal'
        );
      }
    }

    this.logger.info(
      { communityId, configured: existed, postLogEntries: forgotten },
      'Community forgotten'
    );
  }

  /**
   * Send a test message for an event, ignoring its schedule.
   */
  async testEventPing(communityId: string, name: string): Promise<string> {
    const definition = this.store.getEvent(communityId, name);
    if (!definition) {
      throw new EventNotFoundError(name);
    }

    const channelId = this.store.getCommunity(communityId)?.announceChannelId;
    if (!channelId) {
      throw new ChannelNotSetError(communityId);
    }

    const result = await this.sender.sendText(channelId, formatTestPing(definition), {
      mentionRoleId: definition.mentionRoleId,
    });
    if (!result.success) {
      throw new DeliveryError(channelId, `Test ping failed: ${result.error ?? 'unknown error'}`);
    }

    return '✅ Test ping sent.';
  }
}

export function createEventCommands(deps: EventCommandsDeps): EventCommands {
  return new EventCommands(deps);
}
