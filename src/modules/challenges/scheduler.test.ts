/**
 * Tests for ChallengeScheduler
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createLogger } from '../../core/logger.js';
import type { Challenge } from '../../database/schema.js';
import { ChallengeScheduler, cronPatternFor, formatReminder } from './scheduler.js';

function makeChallenge(overrides: Partial<Challenge> = {}): Challenge {
  return {
    id: 1,
    name: 'Pushups',
    description: '50 pushups a day',
    creatorId: '100',
    members: ['100', '200'],
    frequency: 'daily',
    time: '21:00',
    hour: 21,
    minute: 0,
    timezone: 'UTC',
    day: null,
    channelId: 'channel-1',
    threadId: null,
    message: 'Time for your challenge!',
    createdAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

describe('cronPatternFor', () => {
  it('should fire daily at the stored hour and minute', () => {
    expect(cronPatternFor(makeChallenge({ hour: 7, minute: 5 }))).toBe('5 7 * * *');
  });

  it('should fire weekly on the stored day', () => {
    expect(cronPatternFor(makeChallenge({ frequency: 'weekly', day: 'sunday' }))).toBe('0 21 * * 0');
    expect(cronPatternFor(makeChallenge({ frequency: 'weekly', day: 'saturday' }))).toBe('0 21 * * 6');
  });

  it('should fall back to monday for weekly challenges without a day', () => {
    expect(cronPatternFor(makeChallenge({ frequency: 'weekly', day: null }))).toBe('0 21 * * 1');
  });
});

describe('formatReminder', () => {
  it('should mention every member before the message', () => {
    expect(formatReminder(makeChallenge())).toBe('<@100> <@200> Time for your challenge!');
  });

  it('should send just the message when nobody is left', () => {
    expect(formatReminder(makeChallenge({ members: [] }))).toBe('Time for your challenge!');
  });
});

describe('ChallengeScheduler', () => {
  let stored: Map<number, Challenge>;
  let sent: Array<{ channelId: string; content: string }>;
  let scheduler: ChallengeScheduler;

  beforeEach(() => {
    stored = new Map();
    sent = [];
    scheduler = new ChallengeScheduler({
      lookup: (id) => stored.get(id),
      send: async (channelId, content) => {
        sent.push({ channelId, content });
      },
      logger: createLogger('error', () => {}),
    });
  });

  afterEach(() => {
    scheduler.stop();
  });

  it('should compute the next daily run in UTC', () => {
    scheduler.schedule(makeChallenge());

    expect(scheduler.nextRun(1, new Date('2026-01-05T20:00:00Z'))?.toISOString()).toBe('2026-01-05T21:00:00.000Z');
  });

  it('should compute the next weekly run in the challenge timezone', () => {
    scheduler.schedule(makeChallenge({
      frequency: 'weekly',
      day: 'monday',
      hour: 9,
      minute: 0,
      timezone: 'America/St_Johns',
    }));

    expect(scheduler.nextRun(1, new Date('2026-01-06T00:00:00Z'))?.toISOString()).toBe('2026-01-12T12:30:00.000Z');
  });

  it('should replace the job when a challenge is scheduled again', () => {
    scheduler.schedule(makeChallenge());
    scheduler.schedule(makeChallenge({ hour: 6 }));

    expect(scheduler.nextRun(1, new Date('2026-01-05T05:00:00Z'))?.toISOString()).toBe('2026-01-05T06:00:00.000Z');
  });

  it('should track scheduled challenges', () => {
    scheduler.scheduleAll([makeChallenge({ id: 1 }), makeChallenge({ id: 2 })]);
    scheduler.unschedule(1);

    expect(scheduler.isScheduled(1)).toBe(false);
    expect(scheduler.isScheduled(2)).toBe(true);
    expect(scheduler.nextRun(1)).toBeNull();

    scheduler.stop();
    expect(scheduler.isScheduled(2)).toBe(false);
  });

  it('should send the current reminder to the thread when there is one', async () => {
    stored.set(1, makeChallenge({ threadId: 'thread-7', members: ['100', '300'], message: 'Go!' }));

    await expect(scheduler.remind(1)).resolves.toBe(true);
    expect(sent).toEqual([{ channelId: 'thread-7', content: '<@100> <@300> Go!' }]);
  });

  it('should cancel the job of a challenge that no longer exists', async () => {
    scheduler.schedule(makeChallenge());

    await expect(scheduler.remind(1)).resolves.toBe(false);
    expect(sent).toEqual([]);
    expect(scheduler.isScheduled(1)).toBe(false);
  });
});
