/**
 * Challenge Service
 * Creation, membership and editing of recurring challenges, persisted with drizzle
 */

import { asc, eq } from 'drizzle-orm';
import type { AppDatabase } from '../../database/connection.js';
import { challenges, type Challenge, type ChallengeFrequency, type Weekday } from '../../database/schema.js';
import {
  isFrequency,
  isWeekday,
  parseScheduleText,
  parseTimeWithTimezone,
  TimeParseError,
  type ScheduleText,
  type TimeOfDay,
} from './time.js';

export const DEFAULT_CHALLENGE_MESSAGE = 'Time for your challenge!';

export const MAX_AUTOCOMPLETE_CHOICES = 25;

/** Longest name or value an autocomplete choice may carry */
export const MAX_CHOICE_LENGTH = 100;

/**
 * A rule violation whose message is meant for the user who triggered it
 */
export class ChallengeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChallengeError';
  }
}

/**
 * Receives schedule changes so reminders follow the stored challenges
 */
export interface ChallengeScheduleListener {
  schedule(challenge: Challenge): void;
  unschedule(challengeId: number): void;
}

export interface CreateChallengeInput {
  name: string;
  description: string;
  time: string;
  frequency: string;
  day?: string | null;
  message?: string | null;
  creatorId: string;
  channelId: string;
  /** Set when the command was used inside a thread */
  threadId?: string | null;
}

export interface EditChallengeInput {
  name: string;
  description: string;
  /** "<time> <daily|weekly> [day]" */
  schedule: string;
  message: string;
  editorId: string;
  /** Channel the edit was submitted from; null keeps the current reminder target */
  channelId: string | null;
  threadId: string | null;
}

interface ResolvedSchedule {
  time: string;
  hour: number;
  minute: number;
  timezone: string;
  frequency: ChallengeFrequency;
  day: Weekday | null;
}

const MENTION_PATTERN = /^<@!?(\d+)>/;

/**
 * Pulls user ids out of whitespace-separated mentions, in order, without duplicates
 */
export function parseUserMentions(text: string): string[] {
  const ids: string[] = [];
  for (const token of text.split(/\s+/)) {
    const match = MENTION_PATTERN.exec(token.trim());
    if (match && !ids.includes(match[1])) {
      ids.push(match[1]);
    }
  }
  return ids;
}

/**
 * Channel or thread that receives the challenge's reminders
 */
export function reminderTarget(challenge: Pick<Challenge, 'channelId' | 'threadId'>): string {
  return challenge.threadId ?? challenge.channelId;
}

function resolveSchedule(time: string, frequency: string, day: string | null | undefined): ResolvedSchedule {
  let parsed: TimeOfDay;
  try {
    parsed = parseTimeWithTimezone(time);
  } catch (error) {
    if (error instanceof TimeParseError) {
      throw new ChallengeError(`Invalid time format: ${error.message}`);
    }
    throw error;
  }

  if (!isFrequency(frequency)) {
    throw new ChallengeError("Frequency must be 'daily' or 'weekly'.");
  }

  let weekday: Weekday | null = null;
  if (frequency === 'weekly') {
    if (!day) {
      throw new ChallengeError('Day must be specified for weekly challenges.');
    }
    const lowered = day.toLowerCase();
    if (!isWeekday(lowered)) {
      throw new ChallengeError("Invalid day. Use full day name like 'monday'.");
    }
    weekday = lowered;
  }

  return { time: time.trim(), ...parsed, frequency, day: weekday };
}

export class ChallengeService {
  private db: AppDatabase;
  private listener?: ChallengeScheduleListener;
  private now: () => Date;

  constructor(db: AppDatabase, listener?: ChallengeScheduleListener, now: () => Date = () => new Date()) {
    this.db = db;
    this.listener = listener;
    this.now = now;
  }

  setListener(listener: ChallengeScheduleListener): void {
    this.listener = listener;
  }

  findByName(name: string): Challenge | undefined {
    return this.db.select().from(challenges).where(eq(challenges.name, name)).get();
  }

  findById(id: number): Challenge | undefined {
    return this.db.select().from(challenges).where(eq(challenges.id, id)).get();
  }

  list(): Challenge[] {
    return this.db.select().from(challenges).orderBy(asc(challenges.id)).all();
  }

  /**
   * Names containing `query`, case-insensitively, for autocomplete.
   * Names too long to be offered as a choice are skipped.
   */
  searchNames(query: string, limit: number = MAX_AUTOCOMPLETE_CHOICES): string[] {
    const needle = query.toLowerCase();
    return this.list()
      .map(challenge => challenge.name)
      .filter(name => name.length <= MAX_CHOICE_LENGTH && name.toLowerCase().includes(needle))
      .slice(0, limit);
  }

  create(input: CreateChallengeInput): Challenge {
    if (this.findByName(input.name)) {
      throw new ChallengeError(`Challenge '${input.name}' already exists.`);
    }

    const schedule = resolveSchedule(input.time, input.frequency, input.day);

    const challenge = this.db.insert(challenges).values({
      name: input.name,
      description: input.description,
      creatorId: input.creatorId,
      members: [input.creatorId],
      ...schedule,
      channelId: input.channelId,
      threadId: input.threadId ?? null,
      message: input.message || DEFAULT_CHALLENGE_MESSAGE,
      createdAt: this.now(),
    }).returning().get();
    if (!challenge) {
      throw new Error(`Insert of challenge '${input.name}' returned no row`);
    }

    this.listener?.schedule(challenge);
    return challenge;
  }

  join(name: string, userId: string): Challenge {
    const challenge = this.require(name);
    if (challenge.members.includes(userId)) {
      throw new ChallengeError('You are already in this challenge.');
    }

    return this.saveMembers(challenge, [...challenge.members, userId]);
  }

  leave(name: string, userId: string): Challenge {
    const challenge = this.require(name);
    if (!challenge.members.includes(userId)) {
      throw new ChallengeError('You are not in this challenge.');
    }
    if (userId === challenge.creatorId && challenge.members.length === 1) {
      throw new ChallengeError('You cannot leave as the creator and only member. Remove the challenge instead.');
    }

    return this.saveMembers(challenge, challenge.members.filter(member => member !== userId));
  }

  /**
   * Works out who an invite would reach
   * @returns ids of mentioned users who are not yet members
   */
  invite(name: string, inviterId: string, mentions: string): { challenge: Challenge; invitees: string[] } {
    const challenge = this.require(name);
    if (!challenge.members.includes(inviterId)) {
      throw new ChallengeError('You must be a member of the challenge to invite others.');
    }

    const invitees = parseUserMentions(mentions).filter(id => !challenge.members.includes(id));
    if (invitees.length === 0) {
      throw new ChallengeError('No valid users to invite (they may already be in the challenge).');
    }

    return { challenge, invitees };
  }

  remove(name: string, userId: string): Challenge {
    const challenge = this.require(name);
    if (userId !== challenge.creatorId) {
      throw new ChallengeError('Only the creator can remove this challenge.');
    }

    this.db.delete(challenges).where(eq(challenges.id, challenge.id)).run();
    this.listener?.unschedule(challenge.id);
    return challenge;
  }

  /**
   * Looks up a challenge that `userId` is allowed to edit
   */
  requireEditable(name: string, userId: string): Challenge {
    const challenge = this.require(name);
    if (userId !== challenge.creatorId) {
      throw new ChallengeError('Only the creator can edit this challenge.');
    }
    return challenge;
  }

  edit(challengeId: number, input: EditChallengeInput): Challenge {
    const name = input.name.trim();
    const description = input.description.trim();
    const scheduleText = input.schedule.trim();
    const message = input.message.trim();

    if (!name || !description || !scheduleText || !message) {
      throw new ChallengeError('All fields are required.');
    }

    const current = this.findById(challengeId);
    if (!current) {
      throw new ChallengeError('This challenge no longer exists.');
    }
    if (input.editorId !== current.creatorId) {
      throw new ChallengeError('Only the creator can edit this challenge.');
    }

    let layout: ScheduleText;
    try {
      layout = parseScheduleText(scheduleText);
    } catch (error) {
      if (error instanceof TimeParseError) {
        throw new ChallengeError(error.message);
      }
      throw error;
    }

    if (name !== current.name && this.findByName(name)) {
      throw new ChallengeError(`Challenge '${name}' already exists.`);
    }

    const schedule = resolveSchedule(layout.time, layout.frequency, layout.day);

    const updated = this.db.update(challenges).set({
      name,
      description,
      ...schedule,
      ...(input.channelId !== null ? { channelId: input.channelId, threadId: input.threadId } : {}),
      message,
    }).where(eq(challenges.id, challengeId)).returning().get();
    if (!updated) {
      throw new ChallengeError('This challenge no longer exists.');
    }

    this.listener?.schedule(updated);
    return updated;
  }

  private require(name: string): Challenge {
    const challenge = this.findByName(name);
    if (!challenge) {
      throw new ChallengeError(`Challenge '${name}' not found.`);
    }
    return challenge;
  }

  private saveMembers(challenge: Challenge, members: string[]): Challenge {
    const updated = this.db.update(challenges)
      .set({ members })
      .where(eq(challenges.id, challenge.id))
      .returning()
      .get();
    if (!updated) {
      throw new ChallengeError(`Challenge '${challenge.name}' not found.`);
    }
    return updated;
  }
}
