/**
 * Config module exports.
 */

export type { BotConfigFile, MergedConfig } from './config-schema.js';
export { DEFAULT_CONFIG, CONFIG_FILE_VERSION, botConfigFileSchema } from './config-schema.js';
export {
  ConfigLoader,
  InvalidConfigError,
  createConfigLoader,
  loadConfig,
  validateConfig,
} from './config-loader.js';
