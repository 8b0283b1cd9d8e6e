/**
 * @parley/core
 *
 * Shared configuration and logging for the parley packages.
 */

export { config, loadConfig, normalizeConfig, DEFAULT_CONFIG, LOG_LEVELS } from "./config.js";
export type {
  ParleyConfig,
  ParleyConfigInput,
  LogConfig,
  ChatConfig,
  LogLevel,
  LoadConfigOptions,
  LoadedConfig,
} from "./config.js";

export { createLogger, silentLogger } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";

export { ConfigError } from "./errors.js";
