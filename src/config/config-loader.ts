import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { IANAZone } from 'luxon';
import type { BotConfigFile, MergedConfig } from './config-schema.js';
import { DEFAULT_CONFIG, CONFIG_FILE_VERSION, botConfigFileSchema } from './config-schema.js';
import type { LogLevel } from '../types/logger.js';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Thrown when the merged configuration cannot run the bot.
 */
export class InvalidConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidConfigError';
  }
}

/**
 * ConfigLoader - loads and merges configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Environment variables (for secrets)
 * 2. Config file (data/config/bot.json)
 * 3. Hardcoded defaults
 */
export class ConfigLoader {
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private loadedConfig: BotConfigFile | null = null;
  private warnings: string[] = [];

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    const dataPath = env['DATA_PATH'];
    const defaultPath = dataPath ? join(dataPath, 'config') : DEFAULT_CONFIG.paths.config;
    this.configPath = configPath ?? defaultPath;
    this.env = env;
  }

  /**
   * Load, merge and validate configuration from all sources.
   */
  async load(): Promise<MergedConfig> {
    this.warnings = [];
    this.loadedConfig = await this.loadConfigFile();

    const config = this.deepClone(DEFAULT_CONFIG);

    if (this.loadedConfig) {
      this.mergeConfigFile(config, this.loadedConfig);
    }

    this.mergeEnvironment(config);
    validateConfig(config);

    return config;
  }

  /**
   * Get the raw loaded config file (for debugging).
   */
  getLoadedConfigFile(): BotConfigFile | null {
    return this.loadedConfig;
  }

  /**
   * Non-fatal issues found during the last load (logged once a logger exists).
   */
  getWarnings(): readonly string[] {
    return this.warnings;
  }

  private async loadConfigFile(): Promise<BotConfigFile | null> {
    const filePath = join(this.configPath, 'bot.json');

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        // File doesn't exist - that's OK, use defaults
        return null;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new InvalidConfigError(`Failed to read config file: ${message}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new InvalidConfigError(`Config file is not valid JSON: ${message}`);
    }

    const parsed = botConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidConfigError(`Config file is invalid: ${parsed.error.message}`);
    }

    const version = parsed.data.version;
    if (version !== undefined && version > CONFIG_FILE_VERSION) {
      const supported = String(CONFIG_FILE_VERSION);
      this.warnings.push(
        `Config file version (${String(version)}) is newer than supported (${supported})`
      );
    }

    return parsed.data;
  }

  private mergeConfigFile(config: MergedConfig, file: BotConfigFile): void {
    if (file.timezone) {
      config.timezone = file.timezone;
    }

    if (file.scheduler) {
      const { pollIntervalMs, sendTimeoutMs, retentionHours, pruneEveryTicks } = file.scheduler;
      if (pollIntervalMs !== undefined) config.scheduler.pollIntervalMs = pollIntervalMs;
      if (sendTimeoutMs !== undefined) config.scheduler.sendTimeoutMs = sendTimeoutMs;
      if (retentionHours !== undefined) config.scheduler.retentionMs = retentionHours * 3_600_000;
      if (pruneEveryTicks !== undefined) config.scheduler.pruneEveryTicks = pruneEveryTicks;
    }

    if (file.discord?.commandGuildId) {
      config.discord.commandGuildId = file.discord.commandGuildId;
    }

    if (file.logging) {
      const { level, pretty, toFile, maxFiles } = file.logging;
      if (level !== undefined) config.logging.level = level;
      if (pretty !== undefined) config.logging.pretty = pretty;
      if (toFile !== undefined) config.logging.toFile = toFile;
      if (maxFiles !== undefined) config.logging.maxFiles = maxFiles;
    }
  }

  private mergeEnvironment(config: MergedConfig): void {
    // Secrets (always from env)
    const token = this.env['DISCORD_BOT_TOKEN'];
    if (token) {
      config.discordBotToken = token;
    }

    const timezone = this.env['BOT_TIMEZONE'];
    if (timezone) {
      config.timezone = timezone;
    }

    const pollInterval = this.env['POLL_INTERVAL_MS'];
    if (pollInterval) {
      const parsed = Number(pollInterval);
      if (Number.isInteger(parsed) && parsed > 0) {
        config.scheduler.pollIntervalMs = parsed;
      } else {
        this.warnings.push(`Ignoring invalid POLL_INTERVAL_MS: ${pollInterval}`);
      }
    }

    const commandGuildId = this.env['DISCORD_COMMAND_GUILD_ID'];
    if (commandGuildId) {
      config.discord.commandGuildId = commandGuildId;
    }

    const logLevel = this.env['LOG_LEVEL'];
    if (logLevel && isLogLevel(logLevel)) {
      config.logging.level = logLevel;
    }

    const dataPath = this.env['DATA_PATH'];
    if (dataPath) {
      config.paths.data = dataPath;
      config.paths.config = join(dataPath, 'config');
      config.paths.state = join(dataPath, 'state');
      config.paths.logs = join(dataPath, 'logs');
      config.logging.logDir = config.paths.logs;
    }
  }

  private deepClone<T>(obj: T): T {
    return JSON.parse(JSON.stringify(obj)) as T;
  }
}

/**
 * Check the merged configuration.
 * @throws InvalidConfigError
 */
export function validateConfig(config: MergedConfig): void {
  if (!IANAZone.isValidZone(config.timezone)) {
    throw new InvalidConfigError(`Unknown time zone: ${config.timezone}`);
  }
  const { pollIntervalMs, retentionMs, sendTimeoutMs } = config.scheduler;
  if (pollIntervalMs <= 0 || sendTimeoutMs <= 0) {
    throw new InvalidConfigError('Poll interval and send timeout must be positive');
  }
  if (retentionMs < pollIntervalMs) {
    throw new InvalidConfigError('Post-log retention must be at least one poll interval');
  }
}

/**
 * Factory function for creating a config loader.
 */
export function createConfigLoader(configPath?: string, env?: NodeJS.ProcessEnv): ConfigLoader {
  return new ConfigLoader(configPath, env);
}

/**
 * Load configuration from default paths.
 */
export async function loadConfig(configPath?: string): Promise<MergedConfig> {
  const loader = createConfigLoader(configPath);
  return loader.load();
}
