/**
 * Challenge slash commands
 * Thin discord.js adapters over ChallengeService
 */

import {
  ActionRowBuilder,
  ModalBuilder,
  SlashCommandBuilder,
  TextInputBuilder,
  TextInputStyle,
  type InteractionReplyOptions,
  type SlashCommandStringOption,
} from 'discord.js';
import type { Challenge } from '../../database/schema.js';
import { modalCustomId, type ModalHandler, type SlashCommand } from '../loader.js';
import { ChallengeError, type ChallengeService } from './service.js';
import { FREQUENCIES, WEEKDAYS, formatScheduleText } from './time.js';

export const EDIT_MODAL_PREFIX = 'edit_challenge';

export const DISCORD_MESSAGE_LIMIT = 2000;

const EDIT_FIELDS = {
  name: 'name',
  description: 'description',
  schedule: 'schedule',
  message: 'message',
} as const;

export function formatChallengeLine(challenge: Challenge): string {
  return (
    `- **${challenge.name}**: ${challenge.description} ` +
    `(${challenge.frequency} at ${challenge.time} (${challenge.timezone})) - ${challenge.members.length} members`
  );
}

export function formatInvite(challenge: Challenge, inviterMention: string, invitees: readonly string[]): string {
  const mentions = invitees.map(id => `<@${id}>`).join(', ');
  return (
    `${mentions} ${inviterMention} invites you to join the challenge **${challenge.name}**: ${challenge.description}\n` +
    `Use \`/join_challenge name:${challenge.name}\` to join!`
  );
}

/**
 * Packs lines into messages no longer than `limit`; a single oversized line is hard-split
 */
export function splitMessage(lines: readonly string[], limit: number = DISCORD_MESSAGE_LIMIT): string[] {
  const chunks: string[] = [];
  let current = '';

  for (const line of lines) {
    const pieces: string[] = [];
    for (let i = 0; i < line.length; i += limit) {
      pieces.push(line.slice(i, i + limit));
    }
    if (pieces.length === 0) {
      pieces.push('');
    }

    for (const piece of pieces) {
      const candidate = current ? `${current}\n${piece}` : piece;
      if (candidate.length > limit && current) {
        chunks.push(current);
        current = piece;
      } else {
        current = candidate;
      }
    }
  }

  if (current) {
    chunks.push(current);
  }
  return chunks;
}

interface Repliable {
  reply(options: InteractionReplyOptions): Promise<unknown>;
}

interface InChannel {
  channel: { id: string; isThread(): boolean } | null;
}

/**
 * The parts of a chat-input interaction the challenge commands use
 */
export interface SlashInteraction extends Repliable, InChannel {
  user: { id: string; toString(): string };
  channelId: string;
  options: {
    getString(name: string, required: true): string;
    getString(name: string, required?: boolean): string | null;
  };
  followUp(options: InteractionReplyOptions): Promise<unknown>;
  showModal(modal: ModalBuilder): Promise<unknown>;
}

export interface NameAutocompleteInteraction {
  options: { getFocused(): string };
  respond(choices: { name: string; value: string }[]): Promise<unknown>;
}

export interface EditModalInteraction extends Repliable, InChannel {
  user: { id: string };
  channelId: string | null;
  fields: { getTextInputValue(customId: string): string };
}

/**
 * Runs a service call and answers with its text; rule violations are answered with their message
 */
async function respond(interaction: Repliable, action: () => string): Promise<void> {
  let content: string;
  try {
    content = action();
  } catch (error) {
    if (error instanceof ChallengeError) {
      await interaction.reply({ content: error.message });
      return;
    }
    throw error;
  }

  await interaction.reply({ content });
}

function threadIdOf(interaction: InChannel): string | null {
  const channel = interaction.channel;
  return channel?.isThread() ? channel.id : null;
}

function nameOption(description: string) {
  return (option: SlashCommandStringOption) =>
    option.setName('name').setDescription(description).setRequired(true).setAutocomplete(true);
}

function buildEditModal(challenge: Challenge): ModalBuilder {
  const inputs = [
    new TextInputBuilder()
      .setCustomId(EDIT_FIELDS.name)
      .setLabel('Name')
      .setStyle(TextInputStyle.Short)
      .setValue(challenge.name)
      .setRequired(true),
    new TextInputBuilder()
      .setCustomId(EDIT_FIELDS.description)
      .setLabel('Description')
      .setStyle(TextInputStyle.Paragraph)
      .setValue(challenge.description)
      .setRequired(true),
    new TextInputBuilder()
      .setCustomId(EDIT_FIELDS.schedule)
      .setLabel('Time and Frequency')
      .setPlaceholder("e.g., '10:00 daily' or '9:00 PM America/St_Johns weekly monday'")
      .setStyle(TextInputStyle.Short)
      .setValue(formatScheduleText(challenge))
      .setRequired(true),
    new TextInputBuilder()
      .setCustomId(EDIT_FIELDS.message)
      .setLabel('Message')
      .setStyle(TextInputStyle.Paragraph)
      .setValue(challenge.message)
      .setRequired(true),
  ];

  return new ModalBuilder()
    .setCustomId(modalCustomId(EDIT_MODAL_PREFIX, String(challenge.id)))
    .setTitle('Edit Challenge')
    .addComponents(...inputs.map(input => new ActionRowBuilder<TextInputBuilder>().addComponents(input)));
}

export interface ChallengeHandlers {
  create(interaction: SlashInteraction): Promise<void>;
  join(interaction: SlashInteraction): Promise<void>;
  leave(interaction: SlashInteraction): Promise<void>;
  list(interaction: SlashInteraction): Promise<void>;
  invite(interaction: SlashInteraction): Promise<void>;
  remove(interaction: SlashInteraction): Promise<void>;
  edit(interaction: SlashInteraction): Promise<void>;
  autocompleteName(interaction: NameAutocompleteInteraction): Promise<void>;
  submitEdit(interaction: EditModalInteraction, payload: string): Promise<void>;
}

export function createChallengeHandlers(service: ChallengeService): ChallengeHandlers {
  return {
    async create(interaction) {
      await respond(interaction, () => {
        const challenge = service.create({
          name: interaction.options.getString('name', true),
          description: interaction.options.getString('description', true),
          time: interaction.options.getString('time', true),
          frequency: interaction.options.getString('frequency', true),
          day: interaction.options.getString('day'),
          message: interaction.options.getString('message'),
          creatorId: interaction.user.id,
          channelId: interaction.channelId,
          threadId: threadIdOf(interaction),
        });
        return `Challenge '${challenge.name}' created and you have joined it.`;
      });
    },

    async join(interaction) {
      await respond(interaction, () => {
        const challenge = service.join(interaction.options.getString('name', true), interaction.user.id);
        return `You have joined the challenge '${challenge.name}'.`;
      });
    },

    async leave(interaction) {
      await respond(interaction, () => {
        const challenge = service.leave(interaction.options.getString('name', true), interaction.user.id);
        return `You have left the challenge '${challenge.name}'.`;
      });
    },

    async list(interaction) {
      const all = service.list();
      if (all.length === 0) {
        await interaction.reply({ content: 'No challenges available.' });
        return;
      }

      const [first, ...rest] = splitMessage(all.map(formatChallengeLine));
      await interaction.reply({ content: first });
      for (const chunk of rest) {
        await interaction.followUp({ content: chunk });
      }
    },

    async invite(interaction) {
      await respond(interaction, () => {
        const { challenge, invitees } = service.invite(
          interaction.options.getString('name', true),
          interaction.user.id,
          interaction.options.getString('users', true)
        );
        return formatInvite(challenge, interaction.user.toString(), invitees);
      });
    },

    async remove(interaction) {
      await respond(interaction, () => {
        const challenge = service.remove(interaction.options.getString('name', true), interaction.user.id);
        return `Challenge '${challenge.name}' removed.`;
      });
    },

    async edit(interaction) {
      let challenge: Challenge;
      try {
        challenge = service.requireEditable(interaction.options.getString('name', true), interaction.user.id);
      } catch (error) {
        if (error instanceof ChallengeError) {
          await interaction.reply({ content: error.message });
          return;
        }
        throw error;
      }

      await interaction.showModal(buildEditModal(challenge));
    },

    async autocompleteName(interaction) {
      const query = interaction.options.getFocused();
      await interaction.respond(service.searchNames(query).map(name => ({ name, value: name })));
    },

    async submitEdit(interaction, payload) {
      await respond(interaction, () => {
        const challengeId = Number(payload);
        if (!payload || !Number.isInteger(challengeId)) {
          throw new ChallengeError('This challenge no longer exists.');
        }

        const challenge = service.edit(challengeId, {
          name: interaction.fields.getTextInputValue(EDIT_FIELDS.name),
          description: interaction.fields.getTextInputValue(EDIT_FIELDS.description),
          schedule: interaction.fields.getTextInputValue(EDIT_FIELDS.schedule),
          message: interaction.fields.getTextInputValue(EDIT_FIELDS.message),
          editorId: interaction.user.id,
          channelId: interaction.channelId,
          threadId: threadIdOf(interaction),
        });
        return `Challenge '${challenge.name}' updated.`;
      });
    },
  };
}

export function createChallengeCommands(service: ChallengeService): {
  slashCommands: SlashCommand[];
  modals: ModalHandler[];
} {
  const handlers = createChallengeHandlers(service);

  const create: SlashCommand = {
    data: new SlashCommandBuilder()
      .setName('create_challenge')
      .setDescription('Create a new challenge')
      .addStringOption(option =>
        option.setName('name').setDescription('Unique name for the challenge').setRequired(true))
      .addStringOption(option =>
        option.setName('description').setDescription('Description of the challenge').setRequired(true))
      .addStringOption(option =>
        option
          .setName('time')
          .setDescription("Time with optional timezone (e.g., '9:00 PM America/St_Johns' or '21:00 UTC')")
          .setRequired(true))
      .addStringOption(option =>
        option
          .setName('frequency')
          .setDescription('Frequency: daily or weekly')
          .setRequired(true)
          .addChoices(...FREQUENCIES.map(value => ({ name: value, value }))))
      .addStringOption(option =>
        option
          .setName('day')
          .setDescription('Day of week for weekly challenges')
          .addChoices(...WEEKDAYS.map(value => ({ name: value, value }))))
      .addStringOption(option =>
        option.setName('message').setDescription('The reminder message')),
    execute: handlers.create,
  };

  const join: SlashCommand = {
    data: new SlashCommandBuilder()
      .setName('join_challenge')
      .setDescription('Join an existing challenge')
      .addStringOption(nameOption('Name of the challenge to join')),
    execute: handlers.join,
    autocomplete: handlers.autocompleteName,
  };

  const leave: SlashCommand = {
    data: new SlashCommandBuilder()
      .setName('leave_challenge')
      .setDescription('Leave a challenge')
      .addStringOption(nameOption('Name of the challenge to leave')),
    execute: handlers.leave,
    autocomplete: handlers.autocompleteName,
  };

  const list: SlashCommand = {
    data: new SlashCommandBuilder()
      .setName('list_challenges')
      .setDescription('List all challenges'),
    execute: handlers.list,
  };

  const invite: SlashCommand = {
    data: new SlashCommandBuilder()
      .setName('invite_challenge')
      .setDescription('Invite users to join a challenge')
      .addStringOption(nameOption('Name of the challenge'))
      .addStringOption(option =>
        option.setName('users').setDescription('Users to invite (mention them)').setRequired(true)),
    execute: handlers.invite,
    autocomplete: handlers.autocompleteName,
  };

  const remove: SlashCommand = {
    data: new SlashCommandBuilder()
      .setName('remove_challenge')
      .setDescription('Remove a challenge (creator only)')
      .addStringOption(nameOption('Name of the challenge to remove')),
    execute: handlers.remove,
    autocomplete: handlers.autocompleteName,
  };

  const edit: SlashCommand = {
    data: new SlashCommandBuilder()
      .setName('edit_challenge')
      .setDescription('Edit a challenge (creator only)')
      .addStringOption(nameOption('Name of the challenge to edit')),
    execute: handlers.edit,
    autocomplete: handlers.autocompleteName,
  };

  const editModal: ModalHandler = {
    prefix: EDIT_MODAL_PREFIX,
    execute: handlers.submitEdit,
  };

  return {
    slashCommands: [create, join, leave, list, invite, remove, edit],
    modals: [editModal],
  };
}
