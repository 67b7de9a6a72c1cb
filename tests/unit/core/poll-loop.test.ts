import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PollLoop } from '../../../src/core/poll-loop.js';
import { PersistenceError } from '../../../src/core/errors.js';
import { DueEvaluator } from '../../../src/schedule/due-evaluator.js';
import { PostLog } from '../../../src/schedule/post-log.js';
import type { CommunitySnapshot } from '../../../src/schedule/types.js';
import {
  createCommunity,
  createEventDefinition,
  createFakeSender,
  createMockLogger,
} from '../../helpers/factories.js';

const ZONE = 'Europe/Berlin';

// Thursday 2026-03-05; the 30 min reminder for 20:00 CET fires at 18:30Z
const PRE_REMINDER_TICK = new Date('2026-03-05T18:30:17Z');

describe('PollLoop', () => {
  let logger: ReturnType<typeof createMockLogger>;
  let persist: ReturnType<typeof vi.fn<(log: PostLog) => Promise<void>>>;
  let evaluator: DueEvaluator;
  let snapshot: CommunitySnapshot;
  let sender: ReturnType<typeof createFakeSender>;
  let loop: PollLoop;

  function createLoop(config: { pollIntervalMs?: number; pruneEveryTicks?: number } = {}): PollLoop {
    return new PollLoop(
      {
        evaluator,
        store: { snapshot: () => snapshot },
        sender,
        logger,
        now: () => PRE_REMINDER_TICK,
      },
      config
    );
  }

  beforeEach(() => {
    logger = createMockLogger();
    persist = vi.fn<(log: PostLog) => Promise<void>>(() => Promise.resolve());
    evaluator = new DueEvaluator(
      new PostLog(),
      persist,
      { timezone: ZONE, pollPeriodMs: 30_000 },
      logger
    );
    snapshot = [createCommunity([createEventDefinition({ mentionRoleId: 'role-1' })])];
    sender = createFakeSender();
    loop = createLoop();
  });

  afterEach(() => {
    loop.stop();
  });

  describe('runOnce', () => {
    it('sends each due reminder and reports the outcome', async () => {
      const result = await loop.runOnce(PRE_REMINDER_TICK);

      expect(result).toEqual({ due: 1, sent: 1, failed: 0 });
      expect(sender.reminders).toHaveLength(1);
      expect(sender.reminders[0]).toMatchObject({
        channelId: 'channel-1',
        roleId: 'role-1',
        eventName: 'Raid Night',
        offsetMinutes: 30,
      });
    });

    it('does nothing when no reminder is due', async () => {
      const result = await loop.runOnce(new Date('2026-03-05T18:31:00Z'));

      expect(result).toEqual({ due: 0, sent: 0, failed: 0 });
      expect(sender.sendReminder).not.toHaveBeenCalled();
    });

    it('counts a rejected delivery as failed and does not retry it', async () => {
      sender = createFakeSender({ success: false, error: 'Missing Access' });
      loop = createLoop();

      const first = await loop.runOnce(PRE_REMINDER_TICK);
      const second = await loop.runOnce(PRE_REMINDER_TICK);

      expect(first).toEqual({ due: 1, sent: 0, failed: 1 });
      expect(second).toEqual({ due: 0, sent: 0, failed: 0 });
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ eventKey: 'raid night', error: 'Missing Access' }),
        'Reminder not delivered'
      );
    });

    it('logs a send that throws', async () => {
      sender.sendReminder = vi.fn(() => Promise.reject(new Error('socket closed')));

      const result = await loop.runOnce(PRE_REMINDER_TICK);

      expect(result).toEqual({ due: 1, sent: 0, failed: 1 });
      expect(logger.error).toHaveBeenCalledWith(
        expect.objectContaining({ offsetMinutes: 30, error: 'socket closed' }),
        'Reminder send failed'
      );
    });

    it('sends nothing when the post-log cannot be saved', async () => {
      persist.mockRejectedValue(new Error('disk full'));

      await expect(loop.runOnce(PRE_REMINDER_TICK)).rejects.toBeInstanceOf(PersistenceError);
      expect(sender.sendReminder).not.toHaveBeenCalled();
    });
  });

  describe('start/stop', () => {
    it('ticks until stopped and sends a reminder only once', async () => {
      loop = createLoop({ pollIntervalMs: 5 });

      loop.start();
      expect(loop.isRunning()).toBe(true);
      await vi.waitFor(() => {
        expect(loop.getTickCount()).toBeGreaterThanOrEqual(3);
      });
      loop.stop();

      const ticks = loop.getTickCount();
      await new Promise((resolve) => setTimeout(resolve, 20));

      expect(loop.isRunning()).toBe(false);
      expect(loop.getTickCount()).toBe(ticks);
      expect(sender.reminders).toHaveLength(1);
    });

    it('ignores a second start', () => {
      loop.start();
      loop.start();

      expect(logger.warn).toHaveBeenCalledWith('Poll loop already running');
    });

    it('prunes the post-log on the first tick', async () => {
      const prune = vi.spyOn(evaluator, 'prune');
      loop = createLoop({ pollIntervalMs: 5 });

      loop.start();
      await vi.waitFor(() => {
        expect(prune).toHaveBeenCalledWith(PRE_REMINDER_TICK, 48 * 60 * 60 * 1000);
      });
    });

    it('still sends when pruning fails', async () => {
      vi.spyOn(evaluator, 'prune').mockRejectedValue(new Error('disk full'));
      loop = createLoop({ pollIntervalMs: 5 });

      loop.start();
      await vi.waitFor(() => {
        expect(sender.reminders).toHaveLength(1);
      });

      expect(logger.warn).toHaveBeenCalledWith({ error: 'disk full' }, 'Post-log prune failed');
    });

    it('keeps ticking after a post-log save failure', async () => {
      persist.mockRejectedValue(new Error('disk full'));
      loop = createLoop({ pollIntervalMs: 5 });

      loop.start();
      await vi.waitFor(() => {
        expect(loop.getTickCount()).toBeGreaterThanOrEqual(2);
      });

      expect(logger.error).toHaveBeenCalledWith(
        { tick: 1, error: 'Failed to persist post-log: disk full' },
        'Post-log not saved, tick skipped'
      );
      expect(sender.sendReminder).not.toHaveBeenCalled();
    });
  });
});
