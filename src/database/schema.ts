/**
 * Database Schema Definitions
 */

import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

export type ChallengeFrequency = 'daily' | 'weekly';

export type Weekday = 'monday' | 'tuesday' | 'wednesday' | 'thursday' | 'friday' | 'saturday' | 'sunday';

/**
 * Challenges table
 * Discord ids are snowflakes and are kept as text
 */
export const challenges = sqliteTable('challenges', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull().unique(),
  description: text('description').notNull(),
  creatorId: text('creator_id').notNull(),
  members: text('members', { mode: 'json' }).$type<string[]>().notNull(),
  frequency: text('frequency').$type<ChallengeFrequency>().notNull(),
  time: text('time').notNull(), // As typed by the user, e.g. "9:00 PM America/St_Johns"
  hour: integer('hour').notNull(),
  minute: integer('minute').notNull(),
  timezone: text('timezone').notNull().default('UTC'),
  day: text('day').$type<Weekday>(),
  channelId: text('channel_id').notNull(),
  threadId: text('thread_id'),
  message: text('message').notNull(),
  createdAt: integer('created_at', { mode: 'timestamp' }).notNull(),
});

export type Challenge = typeof challenges.$inferSelect;
export type NewChallenge = typeof challenges.$inferInsert;
