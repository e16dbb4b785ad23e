/**
 * Default configuration values for curator.toml.
 *
 * @packageDocumentation
 */

import type { Config, LoggingConfig, MetadataConfig, SelectorConfig } from './types.js';

/**
 * Default configuration file name, looked up in the working directory.
 */
export const DEFAULT_CONFIG_FILENAME = 'curator.toml';

export const DEFAULT_SELECTOR: SelectorConfig = {
  n_spikes_max: 100,
};

export const DEFAULT_METADATA: MetadataConfig = {
  default_group: 'unsorted',
};

export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  selector: DEFAULT_SELECTOR,
  metadata: DEFAULT_METADATA,
  logging: DEFAULT_LOGGING,
};
