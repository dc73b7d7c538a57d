/**
 * Configuration & Environment Management
 *
 * Separates server settings from code and builds the logger they describe.
 */

export {
  Config,
  ConfigError,
  DEFAULT_CONFIG,
  CONFIG_FILE_KEY,
  loadConfig,
  createLogger,
  parseConfigObject,
  parseEnv,
  parseArgs,
  type ServerConfig,
  type LoadConfigOptions,
} from './config.ts';
