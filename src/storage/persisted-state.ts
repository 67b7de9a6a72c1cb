import { z } from 'zod';
import type { Logger } from '../types/logger.js';
import { isWeekday } from '../schedule/types.js';
import type { CommunityConfig, EventDefinition } from '../schedule/types.js';
import type { CommunityStore } from '../schedule/community-store.js';
import { PostLog } from '../schedule/post-log.js';
import type { PostLogEntryRecord } from '../schedule/post-log.js';

/**
 * Current schema version of both persisted documents.
 * Increment when making breaking changes.
 */
export const PERSISTED_STATE_VERSION = 1;

const HHMM = /^([01]\d|2[0-3]):[0-5]\d$/;

function isUnique(values: readonly number[]): boolean {
  return new Set(values).size === values.length;
}

export const eventDefinitionSchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  weekdays: z.array(z.number().refine(isWeekday)).min(1).refine(isUnique, 'duplicate weekdays'),
  startTime: z.string().regex(HHMM),
  durationMinutes: z.number().int().positive(),
  offsets: z.array(z.number().int().nonnegative()).refine(isUnique, 'duplicate offsets'),
  mentionRoleId: z.string().nullable(),
});

const communityHeaderSchema = z.object({
  communityId: z.string().min(1),
  announceChannelId: z.string().nullable(),
  events: z.record(z.string(), z.unknown()),
});

export const communitiesDocumentSchema = z.object({
  version: z.number().int(),
  savedAt: z.string().optional(),
  communities: z.record(z.string(), z.unknown()),
});

export const postLogEntrySchema = z.object({
  communityId: z.string().min(1),
  eventKey: z.string().min(1),
  occurrenceStart: z.string().datetime(),
  offsetMinutes: z.number().int().nonnegative(),
});

export const postLogDocumentSchema = z.object({
  version: z.number().int(),
  savedAt: z.string().optional(),
  entries: z.array(z.unknown()),
});

export type CommunitiesDocument = z.infer<typeof communitiesDocumentSchema>;
export type PostLogDocument = z.infer<typeof postLogDocumentSchema>;

/**
 * Thrown when a persisted document does not match its schema at all.
 * Individual invalid entries are dropped with a warning instead.
 */
export class StateFormatError extends Error {
  constructor(documentKey: string, detail: string) {
    super(`Persisted ${documentKey} document is invalid: ${detail}`);
    this.name = 'StateFormatError';
  }
}

export function serializeCommunities(
  store: CommunityStore,
  now: Date = new Date()
): CommunitiesDocument {
  return {
    version: PERSISTED_STATE_VERSION,
    savedAt: now.toISOString(),
    communities: store.toJSON(),
  };
}

/**
 * Parse the communities document. Invalid communities or events are skipped.
 */
export function deserializeCommunities(raw: unknown, logger: Logger): CommunityConfig[] {
  const parsed = communitiesDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StateFormatError('communities', parsed.error.message);
  }

  const result: CommunityConfig[] = [];
  for (const [id, value] of Object.entries(parsed.data.communities)) {
    const header = communityHeaderSchema.safeParse(value);
    if (!header.success) {
      logger.warn({ communityId: id, error: header.error.message }, 'Dropping invalid community');
      continue;
    }

    const events: Record<string, EventDefinition> = {};
    for (const [key, eventValue] of Object.entries(header.data.events)) {
      const event = eventDefinitionSchema.safeParse(eventValue);
      if (!event.success || event.data.key !== key) {
        const error = event.success ? 'key mismatch' : event.error.message;
        logger.warn({ communityId: id, eventKey: key, error }, 'Dropping invalid event definition');
        continue;
      }
      events[key] = {
        ...event.data,
        weekdays: [...event.data.weekdays].sort((a, b) => a - b),
        offsets: [...event.data.offsets].sort((a, b) => b - a),
      };
    }

    result.push({
      communityId: header.data.communityId,
      announceChannelId: header.data.announceChannelId,
      events,
    });
  }
  return result;
}

export function serializePostLog(log: PostLog, now: Date = new Date()): PostLogDocument {
  return {
    version: PERSISTED_STATE_VERSION,
    savedAt: now.toISOString(),
    entries: log.toJSON(),
  };
}

/**
 * Parse the post-log document. Invalid entries are skipped.
 */
export function deserializePostLog(raw: unknown, logger: Logger): PostLog {
  const parsed = postLogDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StateFormatError('post-log', parsed.error.message);
  }

  const records: PostLogEntryRecord[] = [];
  let dropped = 0;
  for (const value of parsed.data.entries) {
    const entry = postLogEntrySchema.safeParse(value);
    if (entry.success) {
      records.push(entry.data);
    } else {
      dropped++;
    }
  }
  if (dropped > 0) {
    logger.warn({ dropped }, 'Dropped invalid post-log entries');
  }

  return PostLog.fromJSON(records);
}
