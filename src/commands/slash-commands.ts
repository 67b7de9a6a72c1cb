import type {
  ChatInputCommandInteraction,
  RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { ChannelType, PermissionFlagsBits, SlashCommandBuilder } from 'discord.js';
import type { Logger } from '../types/logger.js';
import type { CommandHandler } from '../channels/discord.js';
import { BotError, PersistenceError, errorMessage } from '../core/errors.js';
import { createTraceContext, withTraceContext } from '../core/trace-context.js';
import type { EventCommands } from './event-commands.js';

const ADMIN_COMMANDS = new Set(['set_announce_channel', 'add_event', 'remove_event']);

const NOT_ADMIN_REPLY = '❌ You need the Administrator or Manage Server permission.';
const GUILD_ONLY_REPLY = '❌ This command only works inside a server.';
const SAVE_FAILED_REPLY = '❌ The change could not be saved; nothing was modified.';

/**
 * Slash command definitions, registered on ready.
 */
export function buildSlashCommands(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  const adminOnly = PermissionFlagsBits.ManageGuild;

  return [
    new SlashCommandBuilder()
      .setName('set_announce_channel')
      .setDescription('Set the channel for event reminders.')
      .setDefaultMemberPermissions(adminOnly)
      .addChannelOption((option) =>
        option
          .setName('channel')
          .setDescription('Target text channel')
          .addChannelTypes(ChannelType.GuildText, ChannelType.GuildAnnouncement)
          .setRequired(true)
      )
      .toJSON(),

    new SlashCommandBuilder()
      .setName('add_event')
      .setDescription('Add or replace a recurring event.')
      .setDefaultMemberPermissions(adminOnly)
      .addStringOption((option) =>
        option.setName('name').setDescription('Event name, e.g. Siege').setRequired(true)
      )
      .addStringOption((option) =>
        option
          .setName('weekdays')
          .setDescription('Comma list: Mon,Wed,Sat or 0,2,5 (0=Mon..6=Sun)')
          .setRequired(true)
      )
      .addStringOption((option) =>
        option.setName('start_time').setDescription("Start 'HH:MM' (24h)").setRequired(true)
      )
      .addIntegerOption((option) =>
        option
          .setName('duration_min')
          .setDescription('Duration in minutes')
          .setMinValue(1)
          .setRequired(true)
      )
      .addStringOption((option) =>
        option
          .setName('pre_reminders')
          .setDescription('Minutes before start, comma list (e.g. 30,10,5)')
      )
      .addRoleOption((option) =>
        option.setName('mention_role').setDescription('Role to ping')
      )
      .addBooleanOption((option) =>
        option
          .setName('announce_start')
          .setDescription('Post a message when the event starts (default: true)')
      )
      .toJSON(),

    new SlashCommandBuilder()
      .setName('list_events')
      .setDescription('List all configured events.')
      .toJSON(),

    new SlashCommandBuilder()
      .setName('remove_event')
      .setDescription('Remove an event by name.')
      .setDefaultMemberPermissions(adminOnly)
      .addStringOption((option) =>
        option.setName('name').setDescription('Event name').setRequired(true)
      )
      .toJSON(),

    new SlashCommandBuilder()
      .setName('test_event_ping')
      .setDescription('Send a test ping for an event (no schedule check).')
      .addStringOption((option) =>
        option.setName('name').setDescription('Event name').setRequired(true)
      )
      .toJSON(),
  ];
}

/**
 * Administrator or Manage Server.
 */
export function isAdmin(interaction: ChatInputCommandInteraction): boolean {
  const permissions = interaction.memberPermissions;
  if (!permissions) return false;
  return permissions.any([PermissionFlagsBits.Administrator, PermissionFlagsBits.ManageGuild]);
}

async function dispatch(
  commands: EventCommands,
  interaction: ChatInputCommandInteraction,
  communityId: string
): Promise<string> {
  const { options } = interaction;

  switch (interaction.commandName) {
    case 'set_announce_channel':
      return commands.setAnnounceChannel(communityId, options.getChannel('channel', true).id);

    case 'add_event':
      return commands.addEvent(communityId, {
        name: options.getString('name', true),
        weekdays: options.getString('weekdays', true),
        startTime: options.getString('start_time', true),
        durationMinutes: options.getInteger('duration_min', true),
        preReminders: options.getString('pre_reminders'),
        mentionRoleId: options.getRole('mention_role')?.id ?? null,
        announceStart: options.getBoolean('announce_start') ?? true,
      });

    case 'list_events':
      return commands.listEvents(communityId);

    case 'remove_event':
      return commands.removeEvent(communityId, options.getString('name', true));

    case 'test_event_ping':
      return commands.testEventPing(communityId, options.getString('name', true));

    default:
      return `❌ Unknown command: ${interaction.commandName}`;
  }
}

/**
 * Route slash command interactions to the event commands. Every reply is
 * ephemeral.
 */
export function createCommandHandler(commands: EventCommands, logger: Logger): CommandHandler {
  const log = logger.child({ component: 'slash-commands' });

  return (interaction) =>
    withTraceContext(createTraceContext(`cmd_${interaction.id}`), async () => {
      const communityId = interaction.guildId;
      if (!communityId) {
        await interaction.reply({ content: GUILD_ONLY_REPLY, ephemeral: true });
        return;
      }

      if (ADMIN_COMMANDS.has(interaction.commandName) && !isAdmin(interaction)) {
        await interaction.reply({ content: NOT_ADMIN_REPLY, ephemeral: true });
        return;
      }

      log.debug({ command: interaction.commandName, communityId }, 'Command received');
      await interaction.deferReply({ ephemeral: true });

      let content: string;
      try {
        content = await dispatch(commands, interaction, communityId);
      } catch (error) {
        if (error instanceof PersistenceError) {
          log.error({ command: interaction.commandName, error: error.message }, 'Command not saved');
          content = SAVE_FAILED_REPLY;
        } else if (error instanceof BotError) {
          content = `❌ ${error.message}`;
        } else {
          log.error(
            { command: interaction.commandName, error: errorMessage(error) },
            'Command failed'
          );
          content = '❌ Something went wrong.';
        }
      }

      await interaction.editReply({ content });
    });
}
