/**
 * Resolves the effective configuration from file, environment and defaults.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { DEFAULT_CONFIG_FILENAME } from './defaults.js';
import { type EnvRecord, applyEnvOverrides } from './env.js';
import { loadConfigFile } from './parser.js';
import type { Config } from './types.js';

/**
 * Options for {@link loadConfig}.
 */
export interface LoadConfigOptions {
  /** Path to the TOML file (default: curator.toml in the working directory). */
  readonly filePath?: string;
  /** Environment to read overrides from (default: process.env). */
  readonly env?: EnvRecord;
}

/**
 * Loads the configuration with precedence env > config file > defaults.
 *
 * @param options - File path and environment.
 * @returns Validated configuration.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const filePath = options.filePath ?? path.join(process.cwd(), DEFAULT_CONFIG_FILENAME);
  const fromFile = await loadConfigFile(filePath);
  return applyEnvOverrides(fromFile, options.env ?? process.env);
}
