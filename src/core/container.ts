import type { Client } from 'discord.js';
import type { Logger } from '../types/logger.js';
import { createLogger, type LoggerConfig } from './logger.js';
import { type PollLoop, createPollLoop } from './poll-loop.js';
import { errorMessage } from './errors.js';
import {
  type ChannelReminderSender,
  type DiscordChannel,
  createDiscordChannel,
  createReminderSender,
} from '../channels/index.js';
import {
  type EventCommands,
  buildSlashCommands,
  createCommandHandler,
  createEventCommands,
} from '../commands/index.js';
import {
  type CommunityStore,
  type DueEvaluator,
  type PostLog,
  createDueEvaluator,
} from '../schedule/index.js';
import {
  type Storage,
  type StateManager,
  createJSONStorage,
  createStateManager,
} from '../storage/index.js';
import { type MergedConfig, createConfigLoader } from '../config/index.js';

/**
 * Container holding all application dependencies.
 */
export interface Container {
  /** Application logger */
  logger: Logger;
  /** Loaded configuration */
  config: MergedConfig;
  /** Storage backend */
  storage: Storage;
  /** State manager for persistence */
  stateManager: StateManager;
  /** Per-community configuration */
  store: CommunityStore;
  /** Sent-reminder ledger */
  postLog: PostLog;
  evaluator: DueEvaluator;
  /** Discord channel */
  discordChannel: DiscordChannel;
  sender: ChannelReminderSender;
  commands: EventCommands;
  /** The poll loop (heartbeat) */
  pollLoop: PollLoop;
  /** Shutdown function */
  shutdown: () => Promise<void>;
}

/**
 * Overrides for tests and embedding.
 */
export interface ContainerOverrides {
  logger?: Logger;
  storage?: Storage;
  client?: Client;
}

/**
 * Wire all components around a loaded configuration.
 *
 * Restores state from storage; a state that cannot be read aborts startup.
 */
export async function createContainer(
  config: MergedConfig,
  overrides: ContainerOverrides = {}
): Promise<Container> {
  const logger = overrides.logger ?? createAppLogger(config);

  const storage =
    overrides.storage ?? createJSONStorage(config.paths.state, { logger });
  const stateManager = createStateManager(storage, logger);
  const { store, postLog } = await stateManager.load();

  const evaluator = createDueEvaluator(
    postLog,
    (log) => stateManager.savePostLog(log),
    { timezone: config.timezone, pollPeriodMs: config.scheduler.pollIntervalMs },
    logger
  );

  const discordChannel = createDiscordChannel(
    { botToken: config.discordBotToken, timeout: config.scheduler.sendTimeoutMs },
    logger,
    overrides.client
  );
  const sender = createReminderSender(discordChannel, config.timezone);

  const commands = createEventCommands({
    store,
    postLog,
    persistence: stateManager,
    sender,
    timezone: config.timezone,
    logger,
  });
  discordChannel.setCommandHandler(createCommandHandler(commands, logger));
  discordChannel.setGuildLeaveHandler((guildId) => commands.forgetCommunity(guildId));

  const guildId = config.discord.commandGuildId;
  discordChannel.onReady(async (client) => {
    const definitions = buildSlashCommands();
    const registered = guildId
      ? await client.application.commands.set(definitions, guildId)
      : await client.application.commands.set(definitions);
    logger.info({ count: registered.size, guildId }, 'Slash commands registered');
  });

  const pollLoop = createPollLoop(
    { evaluator, store, sender, logger },
    {
      pollIntervalMs: config.scheduler.pollIntervalMs,
      retentionMs: config.scheduler.retentionMs,
      pruneEveryTicks: config.scheduler.pruneEveryTicks,
    }
  );

  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down...');
    pollLoop.stop();

    // Every mutation is saved when it happens; this is a final flush.
    try {
      await stateManager.saveCommunities(store);
      await stateManager.savePostLog(postLog);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Final state save failed');
    }

    await discordChannel.stop();
    logger.info('Shutdown complete');
  };

  return {
    logger,
    config,
    storage,
    stateManager,
    store,
    postLog,
    evaluator,
    discordChannel,
    sender,
    commands,
    pollLoop,
    shutdown,
  };
}

function createAppLogger(config: MergedConfig): Logger {
  const loggerConfig: Partial<LoggerConfig> = {
    logDir: config.logging.logDir,
    maxFiles: config.logging.maxFiles,
    level: config.logging.level,
    pretty: config.logging.pretty,
    toFile: config.logging.toFile,
  };
  return createLogger(loggerConfig);
}

/**
 * Create the application container with async initialization.
 *
 * - Loads configuration from file and environment
 * - Initializes storage and restores state from disk
 */
export async function createContainerAsync(configPath?: string): Promise<Container> {
  const loader = createConfigLoader(configPath);
  const config = await loader.load();

  const container = await createContainer(config);
  for (const warning of loader.getWarnings()) {
    container.logger.warn(warning);
  }
  container.logger.info(
    { timezone: config.timezone, statePath: config.paths.state },
    'Loaded configuration'
  );

  return container;
}
