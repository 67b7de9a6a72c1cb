import type { Logger } from '../types/logger.js';
import type { ReminderSender } from '../channels/channel.js';
import type { DueEvaluator } from '../schedule/due-evaluator.js';
import { formatPostLogKey } from '../schedule/post-log.js';
import type { CommunitySnapshot, DueReminder } from '../schedule/types.js';
import { PersistenceError, errorMessage } from './errors.js';
import { createChildContext, createTraceContext, withTraceContext } from './trace-context.js';

/**
 * Poll loop configuration.
 */
export interface PollLoopConfig {
  /** Tick cadence in ms; also the due tolerance window */
  pollIntervalMs: number;
  /** Post-log retention past occurrence start in ms */
  retentionMs: number;
  /** Prune the post-log every N ticks */
  pruneEveryTicks: number;
}

const DEFAULT_CONFIG: PollLoopConfig = {
  pollIntervalMs: 30_000,
  retentionMs: 48 * 60 * 60 * 1000,
  pruneEveryTicks: 120,
};

/**
 * Source of the configuration snapshot read at tick start.
 */
export interface SnapshotSource {
  snapshot(): CommunitySnapshot;
}

export interface PollLoopDeps {
  evaluator: DueEvaluator;
  store: SnapshotSource;
  sender: ReminderSender;
  logger: Logger;
  /** Clock, injectable for tests */
  now?: () => Date;
}

/**
 * Outcome of one pass.
 */
export interface TickResult {
  due: number;
  sent: number;
  failed: number;
}

function reminderKey(reminder: DueReminder): string {
  return formatPostLogKey({
    communityId: reminder.communityId,
    eventKey: reminder.eventKey,
    occurrenceStart: reminder.occurrenceStart,
    offsetMinutes: reminder.offsetMinutes,
  });
}

/**
 * PollLoop - the reminder heartbeat.
 *
 * Each tick:
 * - Prunes the post-log every `pruneEveryTicks` ticks (including the first)
 * - Takes a configuration snapshot
 * - Collects due reminders (claimed and persisted before returning)
 * - Sends them concurrently; a failed send is logged and not retried
 *
 * The next tick is scheduled only after the current one finishes, so ticks
 * never overlap.
 */
export class PollLoop {
  private readonly evaluator: DueEvaluator;
  private readonly store: SnapshotSource;
  private readonly sender: ReminderSender;
  private readonly logger: Logger;
  private readonly config: PollLoopConfig;
  private readonly now: () => Date;

  private running = false;
  private tickCount = 0;
  private tickTimeout: ReturnType<typeof setTimeout> | null = null;

  constructor(deps: PollLoopDeps, config: Partial<PollLoopConfig> = {}) {
    this.evaluator = deps.evaluator;
    this.store = deps.store;
    this.sender = deps.sender;
    this.logger = deps.logger.child({ component: 'poll-loop' });
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Start polling. The first tick runs immediately.
   */
  start(): void {
    if (this.running) {
      this.logger.warn('Poll loop already running');
      return;
    }

    this.running = true;
    this.logger.info({ pollIntervalMs: this.config.pollIntervalMs }, 'Poll loop started');
    this.scheduleTick(0);
  }

  /**
   * Stop polling. A tick in progress finishes; no further tick is scheduled.
   */
  stop(): void {
    if (!this.running) {
      return;
    }

    this.running = false;

    if (this.tickTimeout) {
      clearTimeout(this.tickTimeout);
      this.tickTimeout = null;
    }

    this.logger.info({ tickCount: this.tickCount }, 'Poll loop stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  getTickCount(): number {
    return this.tickCount;
  }

  /**
   * Evaluate and send everything due at `now`.
   *
   * @throws PersistenceError if the post-log could not be saved; nothing is
   * sent in that case
   */
  async runOnce(now: Date): Promise<TickResult> {
    const due = await this.evaluator.collectDue(this.store.snapshot(), now);
    if (due.length === 0) {
      return { due: 0, sent: 0, failed: 0 };
    }

    const outcomes = await Promise.all(
      due.map((reminder) =>
        withTraceContext(createChildContext(reminderKey(reminder)), () => this.send(reminder))
      )
    );

    const sent = outcomes.filter(Boolean).length;
    return { due: due.length, sent, failed: due.length - sent };
  }

  private scheduleTick(delay: number): void {
    if (!this.running) return;

    this.tickTimeout = setTimeout(() => {
      void this.tick();
    }, delay);
  }

  private async tick(): Promise<void> {
    if (!this.running) return;

    this.tickCount++;
    const tick = this.tickCount;
    const tickStart = Date.now();

    await withTraceContext(createTraceContext(`tick_${String(tick)}`), async () => {
      const now = this.now();

      if ((tick - 1) % this.config.pruneEveryTicks === 0) {
        await this.prune(now);
      }

      try {
        const result = await this.runOnce(now);
        const summary = { tick, ...result, duration: Date.now() - tickStart };
        if (result.due > 0) {
          this.logger.info(summary, 'Tick completed');
        } else {
          this.logger.trace(summary, 'Tick completed');
        }
      } catch (error) {
        if (error instanceof PersistenceError) {
          this.logger.error({ tick, error: error.message }, 'Post-log not saved, tick skipped');
        } else {
          this.logger.error({ tick, error: errorMessage(error) }, 'Tick failed');
        }
      }
    });

    const elapsed = Date.now() - tickStart;
    this.scheduleTick(Math.max(0, this.config.pollIntervalMs - elapsed));
  }

  private async prune(now: Date): Promise<void> {
    try {
      await this.evaluator.prune(now, this.config.retentionMs);
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Post-log prune failed');
    }
  }

  private async send(reminder: DueReminder): Promise<boolean> {
    const logContext = {
      communityId: reminder.communityId,
      channelId: reminder.channelId,
      eventKey: reminder.eventKey,
      offsetMinutes: reminder.offsetMinutes,
    };

    try {
      const result = await this.sender.sendReminder(reminder);
      if (!result.success) {
        this.logger.warn({ ...logContext, error: result.error }, 'Reminder not delivered');
        return false;
      }
      this.logger.info({ ...logContext, messageId: result.messageId }, 'Reminder sent');
      return true;
    } catch (error) {
      this.logger.error({ ...logContext, error: errorMessage(error) }, 'Reminder send failed');
      return false;
    }
  }
}

/**
 * Factory function for creating a poll loop.
 */
export function createPollLoop(deps: PollLoopDeps, config?: Partial<PollLoopConfig>): PollLoop {
  return new PollLoop(deps, config);
}
