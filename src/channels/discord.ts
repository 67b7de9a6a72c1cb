import type { ChatInputCommandInteraction } from 'discord.js';
import { Client, Events, GatewayIntentBits } from 'discord.js';
import type { Logger } from '../types/logger.js';
import type { CircuitBreaker } from '../core/circuit-breaker.js';
import { createCircuitBreaker } from '../core/circuit-breaker.js';
import { DeliveryError, errorMessage } from '../core/errors.js';
import type { Channel, CircuitStats, SendOptions, SendResult } from './channel.js';

/**
 * Discord channel configuration.
 */
export interface DiscordConfig {
  /** Bot token (required to start) */
  botToken: string | null;
  /** Per-send timeout in ms (default: 10000) */
  timeout?: number;
}

const DEFAULT_CONFIG = {
  timeout: 10_000,
};

/**
 * Called once the gateway session is ready.
 */
export type ReadyHook = (client: Client<true>) => Promise<void>;

/**
 * Receives every slash command interaction.
 */
export type CommandHandler = (interaction: ChatInputCommandInteraction) => Promise<void>;

/**
 * Called with the guild id when the bot is removed from a guild.
 */
export type GuildLeaveHandler = (guildId: string) => Promise<void>;

/**
 * Discord channel using discord.js.
 *
 * - Outbound: announce-channel messages through one circuit breaker per
 *   channel (3 failures → open, 60s reset, per-send timeout). No retries.
 *   A broken channel in one community never blocks another community.
 * - Inbound: slash command interactions handed to the command handler, and
 *   guild removals handed to the guild-leave handler.
 */
export class DiscordChannel implements Channel {
  readonly name = 'discord';

  private readonly config: typeof DEFAULT_CONFIG & DiscordConfig;
  private readonly logger: Logger;
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly client: Client;
  private readonly readyHooks: ReadyHook[] = [];
  private commandHandler: CommandHandler | null = null;
  private guildLeaveHandler: GuildLeaveHandler | null = null;
  private running = false;
  private ready = false;
  private readyWaiters: (() => void)[] = [];

  constructor(config: DiscordConfig, logger: Logger, client?: Client) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = logger.child({ component: 'discord' });
    this.client = client ?? new Client({ intents: [GatewayIntentBits.Guilds] });
  }

  /**
   * Check if channel is configured.
   */
  isAvailable(): boolean {
    return Boolean(this.config.botToken);
  }

  /**
   * Register a hook run on every ready event (e.g. command registration).
   */
  onReady(hook: ReadyHook): void {
    this.readyHooks.push(hook);
  }

  setCommandHandler(handler: CommandHandler): void {
    this.commandHandler = handler;
  }

  setGuildLeaveHandler(handler: GuildLeaveHandler): void {
    this.guildLeaveHandler = handler;
  }

  /**
   * Log in and attach gateway listeners.
   */
  async start(): Promise<void> {
    const token = this.config.botToken;
    if (!token) {
      this.logger.warn('Discord bot token not configured, skipping start');
      return;
    }

    if (this.running) {
      this.logger.warn('Discord channel already running');
      return;
    }

    this.client.on(Events.ClientReady, (readyClient) => {
      void this.onClientReady(readyClient);
    });

    this.client.on(Events.InteractionCreate, (interaction) => {
      if (!interaction.isChatInputCommand()) {
        return;
      }
      void this.onCommand(interaction);
    });

    this.client.on(Events.GuildDelete, (guild) => {
      void this.onGuildLeave(guild.id);
    });

    this.client.on(Events.Error, (error) => {
      this.logger.error({ error: error.message }, 'Discord client error');
    });

    this.running = true;
    await this.client.login(token);
    this.logger.info('Discord channel started');
  }

  /**
   * Resolves once the client has connected at least once.
   */
  waitUntilReady(): Promise<void> {
    if (this.ready) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.readyWaiters.push(resolve);
    });
  }

  /**
   * Destroy the client.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;
    await this.client.destroy();
    this.logger.info('Discord channel stopped');
  }

  /**
   * Send a message to a text channel.
   *
   * Only the given role is allowed to ping; other mentions in the text render
   * without notifying anyone.
   */
  async sendMessage(channelId: string, text: string, options?: SendOptions): Promise<SendResult> {
    const roleId = options?.mentionRoleId;

    try {
      const messageId = await this.breakerFor(channelId).execute(async () => {
        const channel = await this.client.channels.fetch(channelId);
        if (!channel?.isSendable()) {
          throw new DeliveryError(channelId, `Channel ${channelId} is not a sendable channel`);
        }
        const message = await channel.send({
          content: text,
          allowedMentions: { roles: roleId ? [roleId] : [] },
        });
        return message.id;
      });

      this.logger.debug({ channelId, messageId, textLength: text.length }, 'Message sent');
      return { success: true, messageId };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error({ channelId, error: message }, 'Failed to send message');
      return { success: false, error: message };
    }
  }

  /**
   * Get circuit breaker statistics.
   */
  getCircuitStats(channelId: string): CircuitStats {
    return this.breakerFor(channelId).getStats();
  }

  private breakerFor(channelId: string): CircuitBreaker {
    let breaker = this.breakers.get(channelId);
    if (!breaker) {
      breaker = createCircuitBreaker({
        name: `discord:${channelId}`,
        maxFailures: 3,
        resetTimeout: 60_000, // 1 minute
        timeout: this.config.timeout,
        logger: this.logger,
      });
      this.breakers.set(channelId, breaker);
    }
    return breaker;
  }

  private async onClientReady(readyClient: Client<true>): Promise<void> {
    this.logger.info(
      { user: readyClient.user.tag, guilds: readyClient.guilds.cache.size },
      'Discord client ready'
    );

    for (const hook of this.readyHooks) {
      try {
        await hook(readyClient);
      } catch (error) {
        this.logger.error({ error: errorMessage(error) }, 'Ready hook failed');
      }
    }

    this.ready = true;
    const waiters = this.readyWaiters;
    this.readyWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private async onGuildLeave(guildId: string): Promise<void> {
    this.logger.info({ guildId }, 'Removed from guild');
    if (!this.guildLeaveHandler) {
      return;
    }

    try {
      await this.guildLeaveHandler(guildId);
    } catch (error) {
      this.logger.error({ guildId, error: errorMessage(error) }, 'Guild leave handler failed');
    }
  }

  private async onCommand(interaction: ChatInputCommandInteraction): Promise<void> {
    if (!this.commandHandler) {
      this.logger.warn({ command: interaction.commandName }, 'No command handler registered');
      return;
    }

    try {
      await this.commandHandler(interaction);
    } catch (error) {
      this.logger.error(
        { command: interaction.commandName, error: errorMessage(error) },
        'Command handler failed'
      );
    }
  }
}

/**
 * Factory function for creating a Discord channel.
 */
export function createDiscordChannel(
  config: DiscordConfig,
  logger: Logger,
  client?: Client
): DiscordChannel {
  return new DiscordChannel(config, logger, client);
}
