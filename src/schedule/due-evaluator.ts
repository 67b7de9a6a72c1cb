/**
 * Due-reminder evaluator
 *
 * For every community with an announce channel and every event definition,
 * resolves the occurrences overlapping `now` and yields each
 * (occurrence, offset) whose fire instant falls in `[fire, fire + pollPeriod)`
 * and whose post-log claim succeeds.
 *
 * Commit-then-notify: keys are claimed and the ledger persisted BEFORE the
 * reminders are returned. A crash between persist and send loses a reminder,
 * it never duplicates one.
 */

import type { Logger } from '../types/logger.js';
import { PersistenceError, errorMessage } from '../core/errors.js';
import { resolveOccurrences } from './occurrence-resolver.js';
import { formatPostLogKey, type PostLog } from './post-log.js';
import type { CommunitySnapshot, DueReminder, PostLogKey } from './types.js';

const MINUTE_MS = 60_000;

/**
 * Evaluator configuration.
 */
export interface DueEvaluatorConfig {
  /** IANA zone every event's start time is expressed in */
  timezone: string;
  /** Tolerance window; equals the poll cadence */
  pollPeriodMs: number;
}

/**
 * Persists the ledger. Awaited before due reminders are handed out.
 */
export type PostLogPersister = (log: PostLog) => Promise<void>;

/**
 * Whether a fire instant is due at `now` under a tolerance of one poll period.
 */
export function isDue(fireInstant: Date, now: Date, pollPeriodMs: number): boolean {
  const fireMs = fireInstant.getTime();
  const nowMs = now.getTime();
  return fireMs <= nowMs && nowMs < fireMs + pollPeriodMs;
}

export class DueEvaluator {
  private readonly logger: Logger;
  private readonly config: DueEvaluatorConfig;
  private readonly ledger: PostLog;
  private readonly persist: PostLogPersister;

  constructor(ledger: PostLog, persist: PostLogPersister, config: DueEvaluatorConfig, logger: Logger) {
    this.ledger = ledger;
    this.persist = persist;
    this.config = config;
    this.logger = logger.child({ component: 'due-evaluator' });
  }

  /**
   * Collect the reminders due at `now`, claiming each in the post-log.
   *
   * @throws PersistenceError if the claimed keys could not be persisted; the
   * claims of this pass are released and nothing is returned
   */
  async collectDue(snapshot: CommunitySnapshot, now: Date): Promise<DueReminder[]> {
    const due: DueReminder[] = [];
    const claimed: PostLogKey[] = [];

    for (const community of snapshot) {
      const channelId = community.announceChannelId;
      if (channelId === null) {
        continue;
      }

      for (const definition of Object.values(community.events)) {
        try {
          const occurrences = resolveOccurrences(definition, now, this.config.timezone);

          for (const occurrence of occurrences) {
            for (const offsetMinutes of definition.offsets) {
              const fireInstant = new Date(occurrence.start.getTime() - offsetMinutes * MINUTE_MS);
              if (!isDue(fireInstant, now, this.config.pollPeriodMs)) {
                continue;
              }

              const key: PostLogKey = {
                communityId: community.communityId,
                eventKey: definition.key,
                occurrenceStart: occurrence.start,
                offsetMinutes,
              };

              if (!this.ledger.claim(key)) {
                this.logger.trace({ key: formatPostLogKey(key) }, 'Reminder already posted, skipping');
                continue;
              }

              claimed.push(key);
              due.push({
                communityId: community.communityId,
                channelId,
                roleId: definition.mentionRoleId,
                eventKey: definition.key,
                eventName: definition.name,
                occurrenceStart: occurrence.start,
                occurrenceEnd: occurrence.end,
                offsetMinutes,
              });
            }
          }
        } catch (error) {
          this.logger.error(
            {
              communityId: community.communityId,
              eventKey: definition.key,
              error: errorMessage(error),
            },
            'Failed to evaluate event'
          );
        }
      }
    }

    if (claimed.length === 0) {
      return due;
    }

    try {
      await this.persist(this.ledger);
    } catch (error) {
      for (const key of claimed) {
        this.ledger.release(key);
      }
      throw error instanceof PersistenceError ? error : new PersistenceError('post-log', error);
    }

    this.logger.debug({ count: due.length }, 'Reminders committed to post-log');
    return due;
  }

  /**
   * Drop ledger entries for occurrences that started more than
   * `retentionMs` before `now`. Those can never be due again as long as the
   * retention exceeds one poll period.
   */
  async prune(now: Date, retentionMs: number): Promise<number> {
    const removed = this.ledger.prune(new Date(now.getTime() - retentionMs));
    if (removed > 0) {
      await this.persist(this.ledger);
      this.logger.debug({ removed, remaining: this.ledger.size }, 'Post-log pruned');
    }
    return removed;
  }
}

/**
 * Create a due-reminder evaluator.
 */
export function createDueEvaluator(
  ledger: PostLog,
  persist: PostLogPersister,
  config: DueEvaluatorConfig,
  logger: Logger
): DueEvaluator {
  return new DueEvaluator(ledger, persist, config, logger);
}
