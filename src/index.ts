/**
 * Raidbell - recurring event reminders for Discord communities
 *
 * Entry point for the application.
 */

import 'dotenv/config';

import { createContainerAsync, type Container } from './core/container.js';
import { errorMessage } from './core/errors.js';

let container: Container | undefined;
let isShuttingDown = false;

async function main(): Promise<void> {
  // Loads config, initializes storage, and restores state
  container = await createContainerAsync();

  const { logger, discordChannel, pollLoop, store, postLog, config } = container;

  logger.info(
    {
      communities: store.snapshot().length,
      postLogEntries: postLog.size,
      pollIntervalMs: config.scheduler.pollIntervalMs,
    },
    'Raidbell starting...'
  );

  if (!discordChannel.isAvailable()) {
    throw new Error('Set the DISCORD_BOT_TOKEN environment variable.');
  }

  await discordChannel.start();
  await discordChannel.waitUntilReady();

  // Start the poll loop (heartbeat)
  pollLoop.start();
}

async function shutdown(exitCode = 0): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  try {
    await container?.shutdown();
  } finally {
    process.exit(exitCode);
  }
}

/**
 * Report a fatal error through the app logger once it exists.
 */
function reportFatal(message: string, error: unknown): void {
  if (container) {
    container.logger.fatal({ error: errorMessage(error) }, message);
  } else {
    // eslint-disable-next-line no-console
    console.error(`${message}:`, error);
  }
}

process.on('SIGINT', () => {
  void shutdown();
});

process.on('SIGTERM', () => {
  void shutdown();
});

process.on('uncaughtException', (error: unknown) => {
  reportFatal('Uncaught exception', error);
  void shutdown(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  reportFatal('Unhandled rejection', reason);
  void shutdown(1);
});

main().catch((error: unknown) => {
  reportFatal('Failed to start', error);
  void shutdown(1);
});
