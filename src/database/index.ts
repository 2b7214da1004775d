/**
 * Database exports
 */

export {
  type AppDatabase,
  type DatabaseConnection,
  MEMORY_DATABASE,
  createDatabase,
} from './connection.js';

export {
  type ChallengeFrequency,
  type Weekday,
  type Challenge,
  type NewChallenge,
  challenges,
} from './schema.js';
