/**
 * Challenge Scheduler
 * One croner job per challenge, fired in the challenge's own timezone
 */

import { Cron } from 'croner';
import type { Challenge, Weekday } from '../../database/schema.js';
import { type Logger, toError } from '../../core/logger.js';
import { reminderTarget, type ChallengeScheduleListener } from './service.js';

/**
 * Posts a message into a channel or thread
 */
export type ReminderSender = (channelId: string, content: string) => Promise<void>;

export interface ChallengeSchedulerOptions {
  /** Current state of a challenge, or undefined once it has been removed */
  lookup: (challengeId: number) => Challenge | undefined;
  send: ReminderSender;
  logger: Logger;
}

const WEEKDAY_INDEX: Record<Weekday, number> = {
  sunday: 0,
  monday: 1,
  tuesday: 2,
  wednesday: 3,
  thursday: 4,
  friday: 5,
  saturday: 6,
};

type ScheduleFields = Pick<Challenge, 'frequency' | 'hour' | 'minute' | 'day'>;

/**
 * Five-field cron pattern for a challenge ("m h * * *" or "m h * * d")
 */
export function cronPatternFor(challenge: ScheduleFields): string {
  const base = `${challenge.minute} ${challenge.hour} * *`;
  if (challenge.frequency === 'weekly') {
    return `${base} ${WEEKDAY_INDEX[challenge.day ?? 'monday']}`;
  }
  return `${base} *`;
}

export function formatReminder(challenge: Pick<Challenge, 'members' | 'message'>): string {
  const mentions = challenge.members.map(id => `<@${id}>`).join(' ');
  return mentions ? `${mentions} ${challenge.message}` : challenge.message;
}

export class ChallengeScheduler implements ChallengeScheduleListener {
  private jobs: Map<number, Cron> = new Map();
  private lookup: ChallengeSchedulerOptions['lookup'];
  private send: ReminderSender;
  private logger: Logger;

  constructor(options: ChallengeSchedulerOptions) {
    this.lookup = options.lookup;
    this.send = options.send;
    this.logger = options.logger;
  }

  /**
   * Creates or replaces the job for a challenge
   */
  schedule(challenge: Challenge): void {
    this.unschedule(challenge.id);

    const pattern = cronPatternFor(challenge);
    const job = new Cron(pattern, { timezone: challenge.timezone }, () => {
      this.remind(challenge.id).catch((error: unknown) => {
        this.logger.error('Failed to send challenge reminder', toError(error), {
          challengeId: challenge.id,
        });
      });
    });

    this.jobs.set(challenge.id, job);
    this.logger.debug('Challenge scheduled', {
      challengeId: challenge.id,
      pattern,
      timezone: challenge.timezone,
      nextRun: job.nextRun()?.toISOString(),
    });
  }

  scheduleAll(list: readonly Challenge[]): void {
    for (const challenge of list) {
      this.schedule(challenge);
    }
    this.logger.info('Challenge reminders scheduled', { count: list.length });
  }

  unschedule(challengeId: number): void {
    const job = this.jobs.get(challengeId);
    if (job) {
      job.stop();
      this.jobs.delete(challengeId);
    }
  }

  isScheduled(challengeId: number): boolean {
    return this.jobs.has(challengeId);
  }

  /**
   * Next fire time after `from` (defaults to now), or null when not scheduled
   */
  nextRun(challengeId: number, from?: Date): Date | null {
    return this.jobs.get(challengeId)?.nextRun(from) ?? null;
  }

  /**
   * Sends the reminder for a challenge using its current members and message.
   * A challenge that no longer exists has its job cancelled instead.
   * @returns whether a reminder was sent
   */
  async remind(challengeId: number): Promise<boolean> {
    const challenge = this.lookup(challengeId);
    if (!challenge) {
      this.logger.warn('Reminder fired for a removed challenge', { challengeId });
      this.unschedule(challengeId);
      return false;
    }

    await this.send(reminderTarget(challenge), formatReminder(challenge));
    this.logger.info('Challenge reminder sent', { challengeId, name: challenge.name });
    return true;
  }

  stop(): void {
    for (const job of this.jobs.values()) {
      job.stop();
    }
    this.jobs.clear();
  }
}
