import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  PermissionFlagsBits,
  PermissionsBitField,
  type ChatInputCommandInteraction,
} from 'discord.js';
import {
  buildSlashCommands,
  createCommandHandler,
  isAdmin,
} from '../../../src/commands/slash-commands.js';
import { EventCommands } from '../../../src/commands/event-commands.js';
import type { CommandHandler } from '../../../src/channels/discord.js';
import { CommunityStore } from '../../../src/schedule/community-store.js';
import { PostLog } from '../../../src/schedule/post-log.js';
import { createFakeSender, createMockLogger } from '../../helpers/factories.js';

type OptionValue = string | number | boolean | { id: string };

interface FakeInteractionInit {
  commandName: string;
  guildId?: string | null;
  permissions?: bigint | null;
  options?: Record<string, OptionValue>;
}

function createInteraction(init: FakeInteractionInit) {
  const values = init.options ?? {};
  const read = <T extends OptionValue>(name: string, guard: (value: OptionValue) => value is T) => {
    const value = values[name];
    return value !== undefined && guard(value) ? value : null;
  };
  const isString = (value: OptionValue): value is string => typeof value === 'string';
  const isNumber = (value: OptionValue): value is number => typeof value === 'number';
  const isBoolean = (value: OptionValue): value is boolean => typeof value === 'boolean';
  const isEntity = (value: OptionValue): value is { id: string } => typeof value === 'object';

  const permissions = init.permissions === undefined ? PermissionFlagsBits.ManageGuild : init.permissions;

  const fake = {
    id: 'interaction-1',
    commandName: init.commandName,
    guildId: init.guildId === undefined ? 'guild-1' : init.guildId,
    memberPermissions: permissions === null ? null : new PermissionsBitField(permissions),
    options: {
      getString: (name: string) => read(name, isString),
      getInteger: (name: string) => read(name, isNumber),
      getBoolean: (name: string) => read(name, isBoolean),
      getChannel: (name: string) => read(name, isEntity),
      getRole: (name: string) => read(name, isEntity),
    },
    reply: vi.fn(() => Promise.resolve()),
    deferReply: vi.fn(() => Promise.resolve()),
    editReply: vi.fn(() => Promise.resolve()),
  };

  return { fake, interaction: fake as unknown as ChatInputCommandInteraction };
}

describe('buildSlashCommands', () => {
  it('defines the five commands', () => {
    expect(buildSlashCommands().map((command) => command.name)).toEqual([
      'set_announce_channel',
      'add_event',
      'list_events',
      'remove_event',
      'test_event_ping',
    ]);
  });

  it('hides configuration commands from non-managers by default', () => {
    const manageGuild = String(PermissionFlagsBits.ManageGuild);
    const byName = new Map(buildSlashCommands().map((command) => [command.name, command]));

    expect(byName.get('set_announce_channel')?.default_member_permissions).toBe(manageGuild);
    expect(byName.get('add_event')?.default_member_permissions).toBe(manageGuild);
    expect(byName.get('remove_event')?.default_member_permissions).toBe(manageGuild);
  });
});

describe('isAdmin', () => {
  it('accepts Administrator or Manage Server', () => {
    expect(isAdmin(createInteraction({ commandName: 'x', permissions: PermissionFlagsBits.Administrator }).interaction)).toBe(true);
    expect(isAdmin(createInteraction({ commandName: 'x', permissions: PermissionFlagsBits.ManageGuild }).interaction)).toBe(true);
  });

  it('rejects other members and missing permissions', () => {
    expect(isAdmin(createInteraction({ commandName: 'x', permissions: PermissionFlagsBits.SendMessages }).interaction)).toBe(false);
    expect(isAdmin(createInteraction({ commandName: 'x', permissions: null }).interaction)).toBe(false);
  });
});

describe('createCommandHandler', () => {
  let store: CommunityStore;
  let persistence: {
    saveCommunities: ReturnType<typeof vi.fn<() => Promise<void>>>;
    savePostLog: ReturnType<typeof vi.fn<() => Promise<void>>>;
  };
  let logger: ReturnType<typeof createMockLogger>;
  let handle: CommandHandler;

  beforeEach(() => {
    store = new CommunityStore();
    persistence = {
      saveCommunities: vi.fn<() => Promise<void>>(() => Promise.resolve()),
      savePostLog: vi.fn<() => Promise<void>>(() => Promise.resolve()),
    };
    logger = createMockLogger();
    const commands = new EventCommands({
      store,
      postLog: new PostLog(),
      persistence,
      sender: createFakeSender(),
      timezone: 'Europe/Berlin',
      logger,
    });
    handle = createCommandHandler(commands, logger);
  });

  it('adds an event from the command options', async () => {
    const { fake, interaction } = createInteraction({
      commandName: 'add_event',
      options: {
        name: 'Siege',
        weekdays: 'Sat',
        start_time: '18:00',
        duration_min: 60,
        pre_reminders: '15',
        mention_role: { id: 'role-7' },
      },
    });

    await handle(interaction);

    expect(fake.deferReply).toHaveBeenCalledWith({ ephemeral: true });
    expect(fake.editReply).toHaveBeenCalledWith({
      content: '✅ Event **Siege** added: Sat 18:00 (60 min), reminders: 15, start.',
    });
    expect(store.getEvent('guild-1', 'siege')?.mentionRoleId).toBe('role-7');
  });

  it('sets the announce channel', async () => {
    const { fake, interaction } = createInteraction({
      commandName: 'set_announce_channel',
      options: { channel: { id: 'channel-5' } },
    });

    await handle(interaction);

    expect(fake.editReply).toHaveBeenCalledWith({
      content: '✅ Announce channel set to <#channel-5>.',
    });
  });

  it('refuses configuration commands from members without permission', async () => {
    const { fake, interaction } = createInteraction({
      commandName: 'remove_event',
      permissions: PermissionFlagsBits.SendMessages,
      options: { name: 'Siege' },
    });

    await handle(interaction);

    expect(fake.reply).toHaveBeenCalledWith({
      content: '❌ You need the Administrator or Manage Server permission.',
      ephemeral: true,
    });
    expect(fake.deferReply).not.toHaveBeenCalled();
  });

  it('lets any member list events', async () => {
    const { fake, interaction } = createInteraction({
      commandName: 'list_events',
      permissions: PermissionFlagsBits.SendMessages,
    });

    await handle(interaction);

    expect(fake.editReply).toHaveBeenCalledWith({ content: 'ℹ️ No events configured.' });
  });

  it('refuses commands outside a server', async () => {
    const { fake, interaction } = createInteraction({ commandName: 'list_events', guildId: null });

    await handle(interaction);

    expect(fake.reply).toHaveBeenCalledWith({
      content: '❌ This command only works inside a server.',
      ephemeral: true,
    });
  });

  it('shows operator errors as the reply', async () => {
    const { fake, interaction } = createInteraction({
      commandName: 'remove_event',
      options: { name: 'Siege' },
    });

    await handle(interaction);

    expect(fake.editReply).toHaveBeenCalledWith({ content: '❌ Event "Siege" not found.' });
  });

  it('reports a failed save without leaking details', async () => {
    persistence.saveCommunities.mockRejectedValue(new Error('disk full'));
    const { fake, interaction } = createInteraction({
      commandName: 'set_announce_channel',
      options: { channel: { id: 'channel-5' } },
    });

    await handle(interaction);

    expect(fake.editReply).toHaveBeenCalledWith({
      content: '❌ The change could not be saved; nothing was modified.',
    });
    expect(store.getCommunity('guild-1')).toBeUndefined();
  });
});
