/**
 * Tests for message and interaction handling
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { InteractionReplyOptions, MessageCreateOptions } from 'discord.js';
import { createLogger, type LogEntry } from '../core/logger.js';
import { createErrorHandler, type ErrorHandler } from '../services/error-handler.js';
import { builtinCommands } from '../commands/builtin.js';
import { createCommandRegistry, type Command } from '../commands/registry.js';
import {
  handleIncomingMessage,
  replyPrivately,
  runInteraction,
  type AnswerableInteraction,
  type HandlerDependencies,
  type IncomingMessage,
} from './handlers.js';

const failingCommand: Command = {
  name: 'boom',
  description: 'Always fails',
  matches: (text) => text === '!boom',
  execute: async () => {
    throw new Error('kaput');
  },
};

const registry = createCommandRegistry([...builtinCommands, failingCommand]);

function incoming(content: string, overrides: Partial<IncomingMessage> = {}): IncomingMessage {
  return {
    authorId: '1001',
    authorName: 'tester',
    authorIsBot: false,
    content,
    channelId: '2002',
    guildId: '3003',
    post: null,
    ...overrides,
  };
}

class FakeInteraction implements AnswerableInteraction {
  replies: InteractionReplyOptions[] = [];
  followUps: InteractionReplyOptions[] = [];

  constructor(public replied: boolean = false, public deferred: boolean = false) {}

  async reply(options: InteractionReplyOptions): Promise<void> {
    this.replies.push(options);
  }

  async followUp(options: InteractionReplyOptions): Promise<void> {
    this.followUps.push(options);
  }
}

describe('handleIncomingMessage', () => {
  let entries: LogEntry[];
  let errorHandler: ErrorHandler;
  let deps: HandlerDependencies;
  let posted: MessageCreateOptions[];
  const post = async (options: MessageCreateOptions): Promise<void> => {
    posted.push(options);
  };

  beforeEach(() => {
    entries = [];
    const logger = createLogger('debug', (entry) => {
      entries.push(entry);
    });
    errorHandler = createErrorHandler(logger);
    deps = { errorHandler, logger };
    posted = [];
  });

  it('should answer commands with mention parsing disabled', async () => {
    await handleIncomingMessage(incoming('!ping', { post }), registry, deps);
    await handleIncomingMessage(incoming('!echo @everyone look', { post }), registry, deps);

    expect(posted).toEqual([
      { content: 'pong', allowedMentions: { parse: [] } },
      { content: '@everyone look', allowedMentions: { parse: [] } },
    ]);
  });

  it('should ignore messages from bots', async () => {
    await handleIncomingMessage(incoming('!ping', { post, authorIsBot: true }), registry, deps);

    expect(posted).toEqual([]);
  });

  it('should ignore channels the bot cannot send to', async () => {
    await handleIncomingMessage(incoming('!boom', { post: null }), registry, deps);

    expect(errorHandler.getLastLoggedError()).toBeNull();
  });

  it('should log unmatched messages at debug level', async () => {
    await handleIncomingMessage(incoming('hello there', { post }), registry, deps);

    expect(posted).toEqual([]);
    expect(entries.map(entry => [entry.level, entry.message, entry.context])).toEqual([
      ['debug', 'No command matched', { channelId: '2002' }],
    ]);
  });

  it('should route command failures to the error handler and tell the user', async () => {
    await handleIncomingMessage(incoming('!boom', { post }), registry, deps);

    expect(errorHandler.getLastLoggedError()).toMatchObject({
      errorMessage: 'kaput',
      userId: '1001',
      channelId: '2002',
    });
    expect(posted).toEqual([{ content: errorHandler.getUserMessage(), allowedMentions: { parse: [] } }]);
  });

  it('should warn when the user cannot be told about a failure', async () => {
    const refusing = async (): Promise<void> => {
      throw new Error('Missing Permissions');
    };

    await handleIncomingMessage(incoming('!ping', { post: refusing }), registry, deps);

    expect(errorHandler.getLastLoggedError()?.errorMessage).toBe('Missing Permissions');
    const warnings = entries.filter(entry => entry.level === 'warn');
    expect(warnings.map(entry => [entry.message, entry.context])).toEqual([
      ['Failed to send error message to user', { error: 'Missing Permissions' }],
    ]);
  });
});

describe('replyPrivately', () => {
  it('should reply to a fresh interaction', async () => {
    const interaction = new FakeInteraction();

    await replyPrivately(interaction, 'hi');

    expect(interaction.replies).toEqual([{ content: 'hi', ephemeral: true }]);
    expect(interaction.followUps).toEqual([]);
  });

  it('should follow up once the interaction was answered or deferred', async () => {
    const replied = new FakeInteraction(true, false);
    const deferred = new FakeInteraction(false, true);

    await replyPrivately(replied, 'hi');
    await replyPrivately(deferred, 'hi');

    expect(replied.replies).toEqual([]);
    expect(replied.followUps).toEqual([{ content: 'hi', ephemeral: true }]);
    expect(deferred.followUps).toEqual([{ content: 'hi', ephemeral: true }]);
  });
});

describe('runInteraction', () => {
  let errorHandler: ErrorHandler;
  let deps: HandlerDependencies;

  beforeEach(() => {
    const logger = createLogger('error', () => {});
    errorHandler = createErrorHandler(logger);
    deps = { errorHandler, logger };
  });

  it('should leave a successful handler alone', async () => {
    const interaction = new FakeInteraction();

    await runInteraction(interaction, { userId: '1001' }, deps, async () => {});

    expect(interaction.replies).toEqual([]);
    expect(errorHandler.getLastLoggedError()).toBeNull();
  });

  it('should report a failing handler with its context', async () => {
    const interaction = new FakeInteraction(true);

    await runInteraction(
      interaction,
      { userId: '1001', channelId: '2002', command: 'list_challenges' },
      deps,
      async () => {
        throw new Error('database is locked');
      }
    );

    expect(errorHandler.getLastLoggedError()).toMatchObject({
      errorMessage: 'database is locked',
      userId: '1001',
      channelId: '2002',
      command: 'list_challenges',
    });
    expect(interaction.followUps).toEqual([{ content: errorHandler.getUserMessage(), ephemeral: true }]);
  });
});
