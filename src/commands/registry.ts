/**
 * Command Registry
 * Ordered registration and lookup of prefix message commands
 */

/**
 * Read-only view of an inbound chat message plus a way to answer it.
 * The bot builds one per message and only lends it out for a single dispatch.
 */
export interface MessageContext {
  readonly author: {
    readonly id: string;
    readonly username: string;
  };
  readonly content: string;
  readonly channelId: string;
  reply(text: string): Promise<void>;
}

export interface Command<T extends MessageContext = MessageContext> {
  readonly name: string;
  readonly description: string;
  readonly usage?: string;
  /** Pure predicate over the raw message text */
  matches(text: string): boolean;
  /** Sends exactly one reply */
  execute(ctx: T): Promise<void>;
}

export interface CommandRegistry<T extends MessageContext = MessageContext> {
  register(command: Command<T>): void;
  getCommand(name: string): Command<T> | undefined;
  /** Commands in registration order */
  getAllCommands(): readonly Command<T>[];
  /** First command whose predicate accepts the text */
  find(text: string): Command<T> | undefined;
  validateCommandName(name: string): boolean;
}

export class CommandValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandValidationError';
  }
}

/**
 * Command names must:
 * - Start with a lowercase letter
 * - Contain only lowercase letters, digits, and underscores
 * - Be 1-32 characters long
 */
const COMMAND_NAME_PATTERN = /^[a-z][a-z0-9_]{0,31}$/;

export function validateCommandName(name: string): boolean {
  return COMMAND_NAME_PATTERN.test(name);
}

export class CommandRegistryImpl<T extends MessageContext = MessageContext>
  implements CommandRegistry<T>
{
  private commands: Command<T>[] = [];

  register(command: Command<T>): void {
    if (!this.validateCommandName(command.name)) {
      throw new CommandValidationError(
        `Invalid command name "${command.name}". Command names must start with a lowercase letter, ` +
        `contain only lowercase letters, digits, and underscores, and be 1-32 characters long.`
      );
    }

    if (this.getCommand(command.name)) {
      throw new CommandValidationError(`Command "${command.name}" is already registered.`);
    }

    this.commands.push(command);
  }

  getCommand(name: string): Command<T> | undefined {
    return this.commands.find(command => command.name === name);
  }

  getAllCommands(): readonly Command<T>[] {
    return [...this.commands];
  }

  find(text: string): Command<T> | undefined {
    for (const command of this.commands) {
      if (command.matches(text)) {
        return command;
      }
    }
    return undefined;
  }

  validateCommandName(name: string): boolean {
    return validateCommandName(name);
  }
}

export function createCommandRegistry<T extends MessageContext = MessageContext>(
  commands: readonly Command<T>[] = []
): CommandRegistry<T> {
  const registry = new CommandRegistryImpl<T>();
  for (const command of commands) {
    registry.register(command);
  }
  return registry;
}
