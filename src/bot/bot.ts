/**
 * Main Bot Class
 * Integrates discord.js with the command dispatcher, modules and error handling
 */

import {
  Client,
  Events,
  GatewayIntentBits,
  type Interaction,
  type Message,
} from 'discord.js';
import type { BotConfig } from '../core/config.js';
import { type Logger, toError } from '../core/logger.js';
import type { DatabaseConnection } from '../database/connection.js';
import type { ErrorContext, ErrorHandler } from '../services/error-handler.js';
import { createCommandRegistry, type CommandRegistry } from '../commands/registry.js';
import type { BotModule, ModuleLoader } from '../modules/loader.js';
import {
  handleIncomingMessage,
  runInteraction,
  type HandlerDependencies,
  type IncomingMessage,
} from './handlers.js';

export interface BotDependencies {
  config: BotConfig;
  logger: Logger;
  database: DatabaseConnection;
  errorHandler: ErrorHandler;
  commandRegistry: CommandRegistry;
  moduleLoader: ModuleLoader;
}

export interface BotOptions {
  /** Whether to push slash command definitions to Discord once ready */
  registerSlashCommands?: boolean;
}

export class DiscordBot {
  private client: Client;
  private deps: BotDependencies;
  private options: Required<BotOptions>;
  private logger: Logger;
  private handlerDeps: HandlerDependencies;
  private isRunning: boolean = false;

  constructor(deps: BotDependencies, options: BotOptions = {}) {
    this.deps = deps;
    this.options = {
      registerSlashCommands: true,
      ...options,
    };
    this.logger = deps.logger.child('bot');
    this.handlerDeps = { errorHandler: deps.errorHandler, logger: this.logger };

    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
      ],
    });

    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    this.client.once(Events.ClientReady, (readyClient) => {
      this.logger.info(`Logged in as ${readyClient.user.tag}`);

      if (this.options.registerSlashCommands) {
        this.registerSlashCommands(readyClient).catch((error: unknown) => {
          this.logger.error('Failed to register slash commands', toError(error));
        });
      }
    });

    this.client.on(Events.MessageCreate, (message) => {
      this.handleMessage(message).catch((error: unknown) => {
        this.logger.error('Unhandled error in message handler', toError(error));
      });
    });

    this.client.on(Events.InteractionCreate, (interaction) => {
      this.handleInteraction(interaction).catch((error: unknown) => {
        this.logger.error('Unhandled error in interaction handler', toError(error));
      });
    });

    this.client.on(Events.Error, (error) => {
      this.logger.error('Discord client error', error);
    });
  }

  private async handleMessage(message: Message): Promise<void> {
    const channel = message.channel;

    await this.receiveMessage({
      authorId: message.author.id,
      authorName: message.author.username,
      authorIsBot: message.author.bot,
      content: message.content,
      channelId: message.channelId,
      guildId: message.guildId,
      post: channel.isSendable() ? (options) => channel.send(options) : null,
    });
  }

  /**
   * Dispatches a message over the commands of the modules that are enabled right now
   */
  async receiveMessage(message: IncomingMessage): Promise<void> {
    const registry = createCommandRegistry(this.deps.moduleLoader.getEnabledCommands());
    await handleIncomingMessage(message, registry, this.handlerDeps);
  }

  private async handleInteraction(interaction: Interaction): Promise<void> {
    const { moduleLoader } = this.deps;
    const errorContext: ErrorContext = {
      userId: interaction.user.id,
      channelId: interaction.channelId ?? undefined,
      guildId: interaction.guildId ?? undefined,
    };

    if (interaction.isChatInputCommand()) {
      const command = moduleLoader.findSlashCommand(interaction.commandName);
      if (!command) {
        this.logger.warn('Unknown slash command', { command: interaction.commandName });
        return;
      }

      await runInteraction(
        interaction,
        { ...errorContext, command: interaction.commandName },
        this.handlerDeps,
        () => command.execute(interaction)
      );
      return;
    }

    if (interaction.isAutocomplete()) {
      const command = moduleLoader.findSlashCommand(interaction.commandName);
      if (!command?.autocomplete) {
        return;
      }

      try {
        await command.autocomplete(interaction);
      } catch (error) {
        // Autocomplete has no message to answer with
        await this.deps.errorHandler.handle(toError(error), { ...errorContext, command: interaction.commandName });
      }
      return;
    }

    if (interaction.isModalSubmit()) {
      const route = moduleLoader.findModalHandler(interaction.customId);
      if (!route) {
        this.logger.warn('No handler for modal', { customId: interaction.customId });
        return;
      }

      await runInteraction(
        interaction,
        { ...errorContext, command: route.handler.prefix },
        this.handlerDeps,
        () => route.handler.execute(interaction, route.payload)
      );
    }
  }

  /**
   * Adds a module. Its message commands join the registry whether or not it is enabled;
   * dispatch only ever sees the commands of enabled modules.
   */
  registerModule(module: BotModule): void {
    const { moduleLoader, commandRegistry } = this.deps;

    // Rejects invalid or clashing command names before anything is registered
    createCommandRegistry([...commandRegistry.getAllCommands(), ...module.commands]);

    moduleLoader.register(module);
    for (const command of module.commands) {
      commandRegistry.register(command);
    }

    this.logger.info(`Module registered: ${module.name}`, {
      enabled: module.enabled,
      commands: module.commands.map(command => command.name),
      slashCommands: module.slashCommands?.length ?? 0,
      modals: module.modals?.length ?? 0,
    });
  }

  private async registerSlashCommands(client: Client<true>): Promise<void> {
    const { moduleLoader, config } = this.deps;

    const body = moduleLoader
      .getEnabledModules()
      .flatMap(module => module.slashCommands ?? [])
      .map(command => command.data.toJSON());

    const guildId = config.discord.guildId;
    if (guildId) {
      await client.application.commands.set(body, guildId);
    } else {
      await client.application.commands.set(body);
    }

    this.logger.info('Slash commands registered', { count: body.length, scope: guildId ?? 'global' });
  }

  async initializeModules(): Promise<void> {
    const { moduleLoader, config, logger } = this.deps;

    this.logger.info('Modules loaded', { modules: moduleLoader.getRegisteredModuleInfo() });

    for (const module of moduleLoader.getEnabledModules()) {
      if (module.onInit) {
        try {
          await module.onInit({ config, logger: logger.child(module.name) });
          this.logger.debug(`Module initialized: ${module.name}`);
        } catch (error) {
          this.logger.error(`Failed to initialize module: ${module.name}`, toError(error));
        }
      }
    }
  }

  /**
   * Posts into a channel or thread by id
   */
  async sendToChannel(channelId: string, content: string): Promise<void> {
    const channel = await this.client.channels.fetch(channelId);
    if (!channel || !channel.isSendable()) {
      throw new Error(`Channel ${channelId} is not a channel the bot can send to`);
    }
    await channel.send(content);
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      this.logger.warn('Bot is already running');
      return;
    }

    await this.initializeModules();

    this.isRunning = true;
    this.logger.info('Bot starting...');

    try {
      await this.client.login(this.deps.config.discord.token);
    } catch (error) {
      this.isRunning = false;
      throw error;
    }
  }

  async stop(): Promise<void> {
    const { moduleLoader, database } = this.deps;

    if (!this.isRunning) {
      return;
    }

    this.logger.info('Stopping bot...');

    for (const module of moduleLoader.getAllModules()) {
      if (module.onShutdown) {
        try {
          await module.onShutdown();
          this.logger.debug(`Module shutdown: ${module.name}`);
        } catch (error) {
          this.logger.warn(`Error shutting down module: ${module.name}`, {
            error: toError(error).message,
          });
        }
      }
    }

    await this.client.destroy();
    database.close();

    this.isRunning = false;
    this.logger.info('Bot stopped');
  }

  getClient(): Client {
    return this.client;
  }

  getDependencies(): BotDependencies {
    return this.deps;
  }

  getIsRunning(): boolean {
    return this.isRunning;
  }
}
