/**
 * Built-in message commands
 */

import type { Command } from './registry.js';

const ECHO_PREFIX = '!echo ';

export const ECHO_USAGE = 'Usage: !echo <message>';

export const pingCommand: Command = {
  name: 'ping',
  description: 'Check that the bot is alive',
  usage: '!ping',
  matches: (text) => text.trim().toLowerCase() === '!ping',
  async execute(ctx) {
    await ctx.reply('pong');
  },
};

export const echoCommand: Command = {
  name: 'echo',
  description: 'Repeat a message back to the channel',
  usage: '!echo <message>',
  matches: (text) => text.toLowerCase().startsWith(ECHO_PREFIX),
  async execute(ctx) {
    const content = ctx.content.slice(ECHO_PREFIX.length).trim();
    await ctx.reply(content || ECHO_USAGE);
  },
};

export const builtinCommands: readonly Command[] = [pingCommand, echoCommand];
