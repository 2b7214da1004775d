/**
 * Config System
 * Loads and validates configuration from environment variables
 */

import 'dotenv/config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface BotConfig {
  discord: {
    token: string;
    /** When set, slash commands are registered to this guild only */
    guildId?: string;
  };
  database: {
    path: string;
  };
  logging: {
    level: LogLevel;
  };
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const DEFAULT_DATABASE_PATH = 'data/bot.sqlite';

function isValidLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonBlank(value: string | undefined): string | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value.trim();
}

/**
 * Validates a raw config object against the BotConfig schema
 * Throws ConfigurationError if validation fails
 */
export function validateConfig(config: unknown): config is BotConfig {
  if (!isRecord(config)) {
    throw new ConfigurationError('Config must be an object');
  }

  const discord = config.discord;
  if (!isRecord(discord)) {
    throw new ConfigurationError('Missing required config section: discord');
  }

  if (typeof discord.token !== 'string' || discord.token.trim() === '') {
    throw new ConfigurationError('Missing required config: discord.token must be a non-empty string');
  }

  if (discord.guildId !== undefined && (typeof discord.guildId !== 'string' || !/^\d+$/.test(discord.guildId))) {
    throw new ConfigurationError('Invalid config: discord.guildId must be a numeric snowflake string');
  }

  const database = config.database;
  if (!isRecord(database)) {
    throw new ConfigurationError('Missing required config section: database');
  }

  if (typeof database.path !== 'string' || database.path.trim() === '') {
    throw new ConfigurationError('Missing required config: database.path must be a non-empty string');
  }

  const logging = config.logging;
  if (!isRecord(logging)) {
    throw new ConfigurationError('Missing required config section: logging');
  }

  if (typeof logging.level !== 'string' || !isValidLogLevel(logging.level)) {
    throw new ConfigurationError(
      `Invalid config: logging.level must be one of: ${LOG_LEVELS.join(', ')}`
    );
  }

  return true;
}

/**
 * Loads configuration from environment variables
 * The token is read from `discord_token`, falling back to `DISCORD_TOKEN`
 */
export function loadConfigFromEnv(env: Record<string, string | undefined> = process.env): BotConfig {
  const token = nonBlank(env.discord_token) ?? nonBlank(env.DISCORD_TOKEN);
  if (!token) {
    throw new ConfigurationError(
      'Missing required environment variable: discord_token. ' +
      "Create a .env file with discord_token=<your bot token>"
    );
  }

  const logLevel = nonBlank(env.LOG_LEVEL) ?? 'info';
  if (!isValidLogLevel(logLevel)) {
    throw new ConfigurationError(
      `Invalid LOG_LEVEL: "${logLevel}". Must be one of: ${LOG_LEVELS.join(', ')}`
    );
  }

  const guildId = nonBlank(env.DISCORD_GUILD_ID);
  if (guildId !== undefined && !/^\d+$/.test(guildId)) {
    throw new ConfigurationError(`Invalid DISCORD_GUILD_ID: "${guildId}" is not a snowflake`);
  }

  const config: BotConfig = {
    discord: {
      token,
      ...(guildId !== undefined ? { guildId } : {}),
    },
    database: {
      path: nonBlank(env.DATABASE_PATH) ?? DEFAULT_DATABASE_PATH,
    },
    logging: {
      level: logLevel,
    },
  };

  return config;
}
