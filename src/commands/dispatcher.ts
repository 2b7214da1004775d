/**
 * Dispatcher
 * Runs the first registered command that matches an inbound message
 */

import type { CommandRegistry, MessageContext } from './registry.js';

/**
 * Dispatches a message against the registry.
 * At most one command executes; registration order breaks ties.
 * Failures from the command's reply are not caught here.
 *
 * @returns true if a command handled the message, false otherwise
 */
export async function dispatch<T extends MessageContext>(
  registry: CommandRegistry<T>,
  ctx: T
): Promise<boolean> {
  const command = registry.find(ctx.content);
  if (!command) {
    return false;
  }

  await command.execute(ctx);
  return true;
}
