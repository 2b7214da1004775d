/**
 * Commands module exports
 * Contains command registry, dispatcher and built-in commands
 */

export {
  type MessageContext,
  type Command,
  type CommandRegistry,
  CommandValidationError,
  validateCommandName,
  CommandRegistryImpl,
  createCommandRegistry,
} from './registry.js';

export { dispatch } from './dispatcher.js';

export { pingCommand, echoCommand, builtinCommands, ECHO_USAGE } from './builtin.js';
