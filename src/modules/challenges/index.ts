/**
 * Challenges Module
 * Recurring group reminders managed with slash commands
 */

import type { AppDatabase } from '../../database/connection.js';
import type { Logger } from '../../core/logger.js';
import type { BotModule } from '../loader.js';
import { ChallengeService } from './service.js';
import { ChallengeScheduler, type ReminderSender } from './scheduler.js';
import { createChallengeCommands } from './commands.js';

export interface ChallengesModuleOptions {
  db: AppDatabase;
  send: ReminderSender;
  logger: Logger;
}

export interface ChallengesModule extends BotModule {
  service: ChallengeService;
  scheduler: ChallengeScheduler;
}

export function createChallengesModule(options: ChallengesModuleOptions): ChallengesModule {
  const logger = options.logger.child('challenges');
  const service = new ChallengeService(options.db);
  const scheduler = new ChallengeScheduler({
    lookup: (id) => service.findById(id),
    send: options.send,
    logger: logger.child('scheduler'),
  });
  service.setListener(scheduler);

  const { slashCommands, modals } = createChallengeCommands(service);

  return {
    name: 'challenges',
    enabled: true,
    commands: [],
    slashCommands,
    modals,
    service,
    scheduler,
    async onInit() {
      scheduler.scheduleAll(service.list());
    },
    async onShutdown() {
      scheduler.stop();
    },
  };
}

export { ChallengeService, ChallengeError, DEFAULT_CHALLENGE_MESSAGE } from './service.js';
export { ChallengeScheduler, cronPatternFor, formatReminder, type ReminderSender } from './scheduler.js';
export { parseTimeWithTimezone, parseScheduleText, TimeParseError } from './time.js';
