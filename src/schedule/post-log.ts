/**
 * Post-log (dedup ledger)
 *
 * Records which (community, event, occurrence start, offset) reminders have
 * been committed for sending. `claim` is the single point of truth for
 * "already sent": it checks and records in one synchronous step, so two
 * overlapping evaluation passes can never both claim the same key.
 */

import type { PostLogKey } from './types.js';

/**
 * Serialized post-log entry.
 */
export interface PostLogEntryRecord {
  communityId: string;
  eventKey: string;
  /** ISO-8601 UTC */
  occurrenceStart: string;
  offsetMinutes: number;
}

/**
 * Composite string form of a key: `<community>:<event>:<startISO>:<offset>`.
 */
export function formatPostLogKey(key: PostLogKey): string {
  return `${key.communityId}:${key.eventKey}:${key.occurrenceStart.toISOString()}:${String(key.offsetMinutes)}`;
}

export class PostLog {
  private readonly entries = new Map<string, PostLogKey>();

  /**
   * Whether a reminder for this key has been recorded.
   */
  has(key: PostLogKey): boolean {
    return this.entries.has(formatPostLogKey(key));
  }

  /**
   * Record a key. Idempotent.
   * @returns true if the key was new
   */
  record(key: PostLogKey): boolean {
    const id = formatPostLogKey(key);
    if (this.entries.has(id)) {
      return false;
    }
    this.entries.set(id, {
      communityId: key.communityId,
      eventKey: key.eventKey,
      occurrenceStart: new Date(key.occurrenceStart.getTime()),
      offsetMinutes: key.offsetMinutes,
    });
    return true;
  }

  /**
   * has + record as one step.
   * @returns true if this caller now owns the key and may send
   */
  claim(key: PostLogKey): boolean {
    return this.record(key);
  }

  /**
   * Undo a claim whose persistence failed.
   */
  release(key: PostLogKey): boolean {
    return this.entries.delete(formatPostLogKey(key));
  }

  /**
   * Remove entries whose occurrence started before `olderThan`.
   * @returns number of removed entries
   */
  prune(olderThan: Date): number {
    const cutoff = olderThan.getTime();
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (entry.occurrenceStart.getTime() < cutoff) {
        this.entries.delete(id);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Remove every entry of one event (event deleted).
   */
  removeEvent(communityId: string, eventKey: string): number {
    return this.removeWhere((e) => e.communityId === communityId && e.eventKey === eventKey);
  }

  /**
   * Remove every entry of one community.
   */
  removeCommunity(communityId: string): number {
    return this.removeWhere((e) => e.communityId === communityId);
  }

  get size(): number {
    return this.entries.size;
  }

  toJSON(): PostLogEntryRecord[] {
    return [...this.entries.values()]
      .map((entry) => ({
        communityId: entry.communityId,
        eventKey: entry.eventKey,
        occurrenceStart: entry.occurrenceStart.toISOString(),
        offsetMinutes: entry.offsetMinutes,
      }))
      .sort((a, b) => formatRecord(a).localeCompare(formatRecord(b)));
  }

  static fromJSON(records: readonly PostLogEntryRecord[]): PostLog {
    const log = new PostLog();
    for (const record of records) {
      log.record({
        communityId: record.communityId,
        eventKey: record.eventKey,
        occurrenceStart: new Date(record.occurrenceStart),
        offsetMinutes: record.offsetMinutes,
      });
    }
    return log;
  }

  private removeWhere(predicate: (entry: PostLogKey) => boolean): number {
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (predicate(entry)) {
        this.entries.delete(id);
        removed++;
      }
    }
    return removed;
  }
}

function formatRecord(record: PostLogEntryRecord): string {
  return `${record.communityId}:${record.eventKey}:${record.occurrenceStart}:${String(record.offsetMinutes)}`;
}
