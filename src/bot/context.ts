/**
 * Message context construction
 * Turns the fields of an inbound Discord message into the command layer's MessageContext
 */

import type { MessageCreateOptions } from 'discord.js';
import type { MessageContext } from '../commands/registry.js';

export interface InboundMessage {
  authorId: string;
  authorName: string;
  content: string;
  channelId: string;
}

export type SendText = (text: string) => Promise<unknown>;

/**
 * Message-command replies are sent with mention parsing off
 */
export function quietMessage(content: string): MessageCreateOptions {
  return { content, allowedMentions: { parse: [] } };
}

export function createMessageContext(message: InboundMessage, send: SendText): MessageContext {
  return Object.freeze({
    author: Object.freeze({ id: message.authorId, username: message.authorName }),
    content: message.content,
    channelId: message.channelId,
    async reply(text: string): Promise<void> {
      await send(text);
    },
  });
}
