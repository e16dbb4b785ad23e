/**
 * Configuration module for curator.toml parsing and validation.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export {
  ConfigParseError,
  getDefaultConfig,
  loadConfigFile,
  parseConfig,
  parseConfigObject,
} from './parser.js';
export type { Config, LoggingConfig, MetadataConfig, SelectorConfig } from './types.js';
export {
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILENAME,
  DEFAULT_LOGGING,
  DEFAULT_METADATA,
  DEFAULT_SELECTOR,
} from './defaults.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { loadConfig } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
