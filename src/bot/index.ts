/**
 * Bot module exports
 * Contains main bot class, message context, and factory
 */

export {
  type InboundMessage,
  type SendText,
  createMessageContext,
  quietMessage,
} from './context.js';

export {
  type AnswerableInteraction,
  type HandlerDependencies,
  type IncomingMessage,
  handleIncomingMessage,
  replyPrivately,
  reportError,
  runInteraction,
} from './handlers.js';

export {
  type BotDependencies,
  type BotOptions,
  DiscordBot,
} from './bot.js';

export {
  type BotFactoryOptions,
  createBot,
  createBotDependencies,
} from './factory.js';
