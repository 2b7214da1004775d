/**
 * Event handlers
 * The parts of message and interaction handling that do not need a live gateway
 */

import type { InteractionReplyOptions, MessageCreateOptions } from 'discord.js';
import { type Logger, toError } from '../core/logger.js';
import type { ErrorContext, ErrorHandler } from '../services/error-handler.js';
import type { CommandRegistry } from '../commands/registry.js';
import { dispatch } from '../commands/dispatcher.js';
import { createMessageContext, quietMessage, type InboundMessage, type SendText } from './context.js';

export interface HandlerDependencies {
  errorHandler: ErrorHandler;
  logger: Logger;
}

export interface IncomingMessage extends InboundMessage {
  authorIsBot: boolean;
  guildId: string | null;
  /** Posts into the message's channel; null when the bot cannot send there */
  post: ((options: MessageCreateOptions) => Promise<unknown>) | null;
}

export interface AnswerableInteraction {
  replied: boolean;
  deferred: boolean;
  reply(options: InteractionReplyOptions): Promise<unknown>;
  followUp(options: InteractionReplyOptions): Promise<unknown>;
}

/**
 * Logs through the error handler, then tries to tell the user
 */
export async function reportError(
  deps: HandlerDependencies,
  error: Error,
  ctx: ErrorContext,
  notify: SendText
): Promise<void> {
  await deps.errorHandler.handle(error, ctx);

  try {
    await notify(deps.errorHandler.getUserMessage());
  } catch (notifyError) {
    deps.logger.warn('Failed to send error message to user', {
      error: toError(notifyError).message,
    });
  }
}

export async function handleIncomingMessage(
  message: IncomingMessage,
  registry: CommandRegistry,
  deps: HandlerDependencies
): Promise<void> {
  const post = message.post;
  if (message.authorIsBot || !post) {
    return;
  }

  const send: SendText = (text) => post(quietMessage(text));
  const ctx = createMessageContext(message, send);

  try {
    const handled = await dispatch(registry, ctx);
    if (!handled) {
      deps.logger.debug('No command matched', { channelId: message.channelId });
    }
  } catch (error) {
    await reportError(
      deps,
      toError(error),
      { userId: message.authorId, channelId: message.channelId, guildId: message.guildId ?? undefined },
      send
    );
  }
}

/**
 * Ephemeral answer; a follow-up when the interaction was already answered or deferred
 */
export async function replyPrivately(interaction: AnswerableInteraction, content: string): Promise<void> {
  if (interaction.replied || interaction.deferred) {
    await interaction.followUp({ content, ephemeral: true });
  } else {
    await interaction.reply({ content, ephemeral: true });
  }
}

export async function runInteraction(
  interaction: AnswerableInteraction,
  ctx: ErrorContext,
  deps: HandlerDependencies,
  run: () => Promise<void>
): Promise<void> {
  try {
    await run();
  } catch (error) {
    await reportError(deps, toError(error), ctx, (text) => replyPrivately(interaction, text));
  }
}
