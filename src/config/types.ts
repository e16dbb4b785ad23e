/**
 * Configuration types for curator.toml parsing.
 *
 * @packageDocumentation
 */

import type { ClusterGroup } from '../clustering/types.js';

/**
 * Selection subsampling settings.
 */
export interface SelectorConfig {
  /** Maximum number of spikes returned for the selected clusters (default: 100). */
  n_spikes_max: number;
}

/**
 * Cluster metadata settings.
 */
export interface MetadataConfig {
  /** Group reported for clusters that were never moved (default: "unsorted"). */
  default_group: ClusterGroup;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Whether debug-level entries are written. */
  debug: boolean;
}

/**
 * Complete configuration object parsed from curator.toml.
 */
export interface Config {
  selector: SelectorConfig;
  metadata: MetadataConfig;
  logging: LoggingConfig;
}
