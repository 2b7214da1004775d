/**
 * Bot Factory
 * Creates and configures the bot with all dependencies
 */

import { loadConfigFromEnv, type BotConfig } from '../core/config.js';
import { createLogger, toError, type Logger } from '../core/logger.js';
import { createDatabase } from '../database/connection.js';
import { createErrorHandler } from '../services/index.js';
import { createCommandRegistry } from '../commands/registry.js';
import { createModuleLoader } from '../modules/loader.js';
import { DiscordBot, type BotDependencies, type BotOptions } from './bot.js';

export interface BotFactoryOptions {
  /** Custom config (defaults to loading from env) */
  config?: BotConfig;
  logger?: Logger;
  /** drizzle-kit migrations folder (defaults to ./drizzle) */
  migrationsFolder?: string;
  botOptions?: BotOptions;
}

/**
 * Creates bot dependencies without creating the bot itself
 */
export function createBotDependencies(options: BotFactoryOptions = {}): BotDependencies {
  const config = options.config ?? loadConfigFromEnv();
  const logger = options.logger ?? createLogger(config.logging.level);

  const database = createDatabase(config.database.path, options.migrationsFolder);

  try {
    database.migrate();
    logger.info('Database migrations applied successfully');
  } catch (error) {
    const migrationError = toError(error);
    logger.error('Database migration failed', migrationError);
    database.close();
    throw new Error(`Database migration failed: ${migrationError.message}`);
  }

  return {
    config,
    logger,
    database,
    errorHandler: createErrorHandler(logger.child('errors')),
    commandRegistry: createCommandRegistry(),
    moduleLoader: createModuleLoader(),
  };
}

/**
 * Creates a fully configured bot instance with all dependencies
 */
export function createBot(options: BotFactoryOptions = {}): DiscordBot {
  return new DiscordBot(createBotDependencies(options), options.botOptions);
}
