/**
 * Discord Command Bot
 * Main entry point
 */

import 'dotenv/config';
import { createBot } from './bot/index.js';
import { ConfigurationError } from './core/index.js';
import { createGeneralModule, createChallengesModule } from './modules/index.js';

async function main(): Promise<void> {
  console.log('Discord Command Bot - Starting...');

  try {
    const bot = createBot();
    const { database, logger } = bot.getDependencies();

    bot.registerModule(createGeneralModule());
    bot.registerModule(
      createChallengesModule({
        db: database.db,
        send: (channelId, content) => bot.sendToChannel(channelId, content),
        logger,
      })
    );

    const shutdown = (signal: string) => {
      console.log(`\nReceived ${signal}, shutting down...`);
      bot
        .stop()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('Error during shutdown:', error);
          process.exit(1);
        });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    await bot.start();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`Configuration error: ${error.message}`);
    } else {
      console.error('Failed to start bot:', error);
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
