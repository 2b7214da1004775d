/**
 * Module Loader
 * Provides module registration, validation, enable/disable, and interaction routing
 */

import type {
  AutocompleteInteraction,
  ChatInputCommandInteraction,
  ModalSubmitInteraction,
  RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import type { Command, MessageContext } from '../commands/registry.js';
import type { BotConfig } from '../core/config.js';
import type { Logger } from '../core/logger.js';

/**
 * Discord application (slash) command owned by a module
 */
export interface SlashCommand {
  data: {
    readonly name: string;
    toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody;
  };
  execute(interaction: ChatInputCommandInteraction): Promise<void>;
  autocomplete?(interaction: AutocompleteInteraction): Promise<void>;
}

/**
 * Handles modal submissions whose custom id is `<prefix>:<payload>`
 */
export interface ModalHandler {
  prefix: string;
  execute(interaction: ModalSubmitInteraction, payload: string): Promise<void>;
}

/**
 * Module context provided during initialization
 */
export interface ModuleContext {
  config: BotConfig;
  logger: Logger;
}

export interface BotModule<T extends MessageContext = MessageContext> {
  name: string;
  enabled: boolean;
  commands: Command<T>[];
  slashCommands?: SlashCommand[];
  modals?: ModalHandler[];
  onInit?(ctx: ModuleContext): Promise<void>;
  onShutdown?(): Promise<void>;
}

export interface RegisteredModule {
  name: string;
  enabled: boolean;
  commandCount: number;
  slashCommandCount: number;
}

export interface ModuleLoader<T extends MessageContext = MessageContext> {
  register(module: BotModule<T>): void;
  enable(moduleName: string): void;
  disable(moduleName: string): void;
  getModule(name: string): BotModule<T> | undefined;
  getAllModules(): BotModule<T>[];
  getEnabledModules(): BotModule<T>[];
  /** Message commands of enabled modules, in module then command order */
  getEnabledCommands(): Command<T>[];
  validateModule(module: unknown): module is BotModule<T>;
  getRegisteredModuleInfo(): RegisteredModule[];
  /** Slash command by name, searched across enabled modules */
  findSlashCommand(name: string): SlashCommand | undefined;
  /** Modal handler and payload for a custom id, searched across enabled modules */
  findModalHandler(customId: string): { handler: ModalHandler; payload: string } | undefined;
}

export class ModuleValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModuleValidationError';
  }
}

export const MODAL_ID_SEPARATOR = ':';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

function isFunction(value: unknown): value is (...args: never[]) => unknown {
  return typeof value === 'function';
}

function isOptionalArrayOf(value: unknown, check: (item: unknown) => boolean): boolean {
  return value === undefined || (Array.isArray(value) && value.every(check));
}

function isValidCommand(cmd: unknown): boolean {
  return (
    isRecord(cmd) &&
    isNonEmptyString(cmd.name) &&
    isNonEmptyString(cmd.description) &&
    isFunction(cmd.matches) &&
    isFunction(cmd.execute)
  );
}

function isValidSlashCommand(cmd: unknown): boolean {
  return (
    isRecord(cmd) &&
    isRecord(cmd.data) &&
    isNonEmptyString(cmd.data.name) &&
    isFunction(cmd.data.toJSON) &&
    isFunction(cmd.execute) &&
    (cmd.autocomplete === undefined || isFunction(cmd.autocomplete))
  );
}

function isValidModalHandler(handler: unknown): boolean {
  return (
    isRecord(handler) &&
    isNonEmptyString(handler.prefix) &&
    !handler.prefix.includes(MODAL_ID_SEPARATOR) &&
    isFunction(handler.execute)
  );
}

/**
 * Validates a module structure
 */
export function validateModule(module: unknown): module is BotModule {
  if (!isRecord(module)) {
    return false;
  }

  if (!isNonEmptyString(module.name)) return false;
  if (typeof module.enabled !== 'boolean') return false;
  if (!Array.isArray(module.commands) || !module.commands.every(isValidCommand)) return false;
  if (!isOptionalArrayOf(module.slashCommands, isValidSlashCommand)) return false;
  if (!isOptionalArrayOf(module.modals, isValidModalHandler)) return false;

  if (module.onInit !== undefined && !isFunction(module.onInit)) return false;
  if (module.onShutdown !== undefined && !isFunction(module.onShutdown)) return false;

  return true;
}

export class ModuleLoaderImpl<T extends MessageContext = MessageContext> implements ModuleLoader<T> {
  private modules: Map<string, BotModule<T>> = new Map();

  register(module: BotModule<T>): void {
    const candidate: unknown = module;
    if (!this.validateModule(candidate)) {
      const name = isRecord(candidate) && typeof candidate.name === 'string' ? candidate.name : 'unknown';
      throw new ModuleValidationError(
        `Invalid module structure for "${name}". ` +
        `Module must have: name (string), enabled (boolean), commands (array), ` +
        `and well-formed slashCommands and modals when present.`
      );
    }

    if (this.modules.has(module.name)) {
      throw new ModuleValidationError(`Module "${module.name}" is already registered.`);
    }

    for (const slash of module.slashCommands ?? []) {
      const owner = this.ownerOfSlashCommand(slash.data.name);
      if (owner) {
        throw new ModuleValidationError(
          `Slash command "/${slash.data.name}" is already provided by module "${owner}".`
        );
      }
    }

    for (const modal of module.modals ?? []) {
      const owner = this.ownerOfModalPrefix(modal.prefix);
      if (owner) {
        throw new ModuleValidationError(
          `Modal prefix "${modal.prefix}" is already provided by module "${owner}".`
        );
      }
    }

    this.modules.set(module.name, module);
  }

  enable(moduleName: string): void {
    const module = this.modules.get(moduleName);
    if (module) {
      module.enabled = true;
    }
  }

  disable(moduleName: string): void {
    const module = this.modules.get(moduleName);
    if (module) {
      module.enabled = false;
    }
  }

  getModule(name: string): BotModule<T> | undefined {
    return this.modules.get(name);
  }

  getAllModules(): BotModule<T>[] {
    return Array.from(this.modules.values());
  }

  getEnabledModules(): BotModule<T>[] {
    return this.getAllModules().filter(m => m.enabled);
  }

  getEnabledCommands(): Command<T>[] {
    return this.getEnabledModules().flatMap(m => m.commands);
  }

  validateModule(module: unknown): module is BotModule<T> {
    return validateModule(module);
  }

  getRegisteredModuleInfo(): RegisteredModule[] {
    return this.getAllModules().map(m => ({
      name: m.name,
      enabled: m.enabled,
      commandCount: m.commands.length,
      slashCommandCount: m.slashCommands?.length ?? 0,
    }));
  }

  findSlashCommand(name: string): SlashCommand | undefined {
    for (const module of this.getEnabledModules()) {
      const found = module.slashCommands?.find(cmd => cmd.data.name === name);
      if (found) {
        return found;
      }
    }
    return undefined;
  }

  findModalHandler(customId: string): { handler: ModalHandler; payload: string } | undefined {
    const separator = customId.indexOf(MODAL_ID_SEPARATOR);
    const prefix = separator === -1 ? customId : customId.slice(0, separator);
    const payload = separator === -1 ? '' : customId.slice(separator + 1);

    for (const module of this.getEnabledModules()) {
      const handler = module.modals?.find(m => m.prefix === prefix);
      if (handler) {
        return { handler, payload };
      }
    }
    return undefined;
  }

  private ownerOfSlashCommand(name: string): string | undefined {
    return this.getAllModules().find(m => m.slashCommands?.some(cmd => cmd.data.name === name))?.name;
  }

  private ownerOfModalPrefix(prefix: string): string | undefined {
    return this.getAllModules().find(m => m.modals?.some(modal => modal.prefix === prefix))?.name;
  }
}

export function createModuleLoader<T extends MessageContext = MessageContext>(): ModuleLoader<T> {
  return new ModuleLoaderImpl<T>();
}

/**
 * Builds a modal custom id that routes back to the handler registered under `prefix`
 */
export function modalCustomId(prefix: string, payload: string): string {
  return `${prefix}${MODAL_ID_SEPARATOR}${payload}`;
}
