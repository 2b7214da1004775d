import { describe, it, expect } from 'vitest';
import { pingCommand, echoCommand, ECHO_USAGE } from './builtin.js';
import type { MessageContext } from './registry.js';

function capture(content: string): { ctx: MessageContext; replies: string[] } {
  const replies: string[] = [];
  const ctx: MessageContext = {
    author: { id: '1001', username: 'tester' },
    content,
    channelId: '2002',
    reply: async (text) => {
      replies.push(text);
    },
  };
  return { ctx, replies };
}

describe('pingCommand', () => {
  it.each(['!ping', '!PING', '  !ping  ', '!Ping\n'])('should match %j', (text) => {
    expect(pingCommand.matches(text)).toBe(true);
  });

  it.each(['!ping now', '!pingpong', 'ping', '!pin', ''])('should not match %j', (text) => {
    expect(pingCommand.matches(text)).toBe(false);
  });

  it('should reply pong', async () => {
    const { ctx, replies } = capture('!ping');
    await pingCommand.execute(ctx);
    expect(replies).toEqual(['pong']);
  });
});

describe('echoCommand', () => {
  it.each(['!echo hi', '!ECHO hi', '!echo '])('should match %j', (text) => {
    expect(echoCommand.matches(text)).toBe(true);
  });

  it.each(['!echo', '!echohi', ' !echo hi', 'echo hi'])('should not match %j', (text) => {
    expect(echoCommand.matches(text)).toBe(false);
  });

  it('should keep the original casing of the echoed text', async () => {
    const { ctx, replies } = capture('!ECHO Hello There');
    await echoCommand.execute(ctx);
    expect(replies).toEqual(['Hello There']);
  });

  it('should trim surrounding whitespace from the echoed text', async () => {
    const { ctx, replies } = capture('!echo    spaced out   ');
    await echoCommand.execute(ctx);
    expect(replies).toEqual(['spaced out']);
  });

  it('should reply with usage when there is nothing to echo', async () => {
    const { ctx, replies } = capture('!echo    ');
    await echoCommand.execute(ctx);
    expect(replies).toEqual([ECHO_USAGE]);
    expect(ECHO_USAGE).toBe('Usage: !echo <message>');
  });
});
