import { z } from 'zod';
import type { LogLevel } from '../types/logger.js';

/**
 * Config file schema version.
 */
export const CONFIG_FILE_VERSION = 1;

const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

/**
 * Bot configuration file schema (data/config/bot.json).
 * All fields are optional - defaults are used for missing values.
 */
export const botConfigFileSchema = z.object({
  /** Schema version for migrations */
  version: z.number().int().optional(),

  /** IANA zone all event times are expressed in */
  timezone: z.string().optional(),

  scheduler: z
    .object({
      /** Poll cadence in ms; also the reminder tolerance window */
      pollIntervalMs: z.number().int().positive().optional(),
      /** Per-message send timeout in ms */
      sendTimeoutMs: z.number().int().positive().optional(),
      /** Post-log retention past occurrence start, in hours */
      retentionHours: z.number().positive().optional(),
      /** Prune the post-log every N ticks */
      pruneEveryTicks: z.number().int().positive().optional(),
    })
    .optional(),

  discord: z
    .object({
      /** Register slash commands in this guild only (instant, for development) */
      commandGuildId: z.string().optional(),
    })
    .optional(),

  logging: z
    .object({
      level: logLevelSchema.optional(),
      pretty: z.boolean().optional(),
      toFile: z.boolean().optional(),
      maxFiles: z.number().int().positive().optional(),
    })
    .optional(),
});

export type BotConfigFile = z.infer<typeof botConfigFileSchema>;

/**
 * Merged configuration (file + env + defaults).
 * This is what the application uses at runtime.
 */
export interface MergedConfig {
  /** Discord bot token (from env only) */
  discordBotToken: string | null;

  timezone: string;

  scheduler: {
    pollIntervalMs: number;
    sendTimeoutMs: number;
    retentionMs: number;
    pruneEveryTicks: number;
  };

  discord: {
    commandGuildId: string | null;
  };

  logging: {
    level: LogLevel;
    pretty: boolean;
    toFile: boolean;
    maxFiles: number;
    logDir: string;
  };

  paths: {
    data: string;
    config: string;
    state: string;
    logs: string;
  };
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: MergedConfig = {
  discordBotToken: null,

  timezone: 'Europe/Berlin',

  scheduler: {
    pollIntervalMs: 30_000,
    sendTimeoutMs: 10_000,
    retentionMs: 48 * 60 * 60 * 1000, // 48 hours
    pruneEveryTicks: 120, // hourly at the default cadence
  },

  discord: {
    commandGuildId: null,
  },

  logging: {
    level: 'info',
    pretty: process.env['NODE_ENV'] !== 'production',
    toFile: true,
    maxFiles: 10,
    logDir: 'data/logs',
  },

  paths: {
    data: 'data',
    config: 'data/config',
    state: 'data/state',
    logs: 'data/logs',
  },
};
