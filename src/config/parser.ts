/**
 * TOML configuration parser for curator.toml.
 *
 * @packageDocumentation
 */

import { readFile } from 'node:fs/promises';
import * as TOML from '@iarna/toml';
import { CLUSTER_GROUPS, type ClusterGroup, isClusterGroup } from '../clustering/types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import type { Config, LoggingConfig, MetadataConfig, SelectorConfig } from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

/**
 * Checks whether a value is a plain key/value table.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

function validatePositiveInteger(value: unknown, fieldPath: string): number {
  const num = validateNumber(value, fieldPath);
  if (!Number.isInteger(num) || num <= 0) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': must be a positive integer, got ${String(num)}`
    );
  }
  return num;
}

function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

function validateGroup(value: unknown, fieldPath: string): ClusterGroup {
  if (!isClusterGroup(value)) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': expected one of ${CLUSTER_GROUPS.map((g) => `'${g}'`).join(', ')}, got '${String(value)}'`
    );
  }
  return value;
}

/**
 * Extracts a section table, rejecting non-table values.
 */
function getSection(
  raw: Record<string, unknown>,
  name: string
): Record<string, unknown> | undefined {
  const section = raw[name];
  if (section === undefined) {
    return undefined;
  }
  if (!isRecord(section)) {
    throw new ConfigParseError(`Invalid type for '${name}': expected table, got ${typeof section}`);
  }
  return section;
}

function parseSelector(
  raw: Record<string, unknown> | undefined,
  base: SelectorConfig
): SelectorConfig {
  const result: SelectorConfig = { ...base };
  if (raw === undefined) {
    return result;
  }
  if ('n_spikes_max' in raw) {
    result.n_spikes_max = validatePositiveInteger(raw.n_spikes_max, 'selector.n_spikes_max');
  }
  return result;
}

function parseMetadata(
  raw: Record<string, unknown> | undefined,
  base: MetadataConfig
): MetadataConfig {
  const result: MetadataConfig = { ...base };
  if (raw === undefined) {
    return result;
  }
  if ('default_group' in raw) {
    result.default_group = validateGroup(raw.default_group, 'metadata.default_group');
  }
  return result;
}

function parseLogging(raw: Record<string, unknown> | undefined, base: LoggingConfig): LoggingConfig {
  const result: LoggingConfig = { ...base };
  if (raw === undefined) {
    return result;
  }
  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }
  return result;
}

/**
 * Validates a raw configuration table and merges it over a base configuration.
 *
 * Unknown sections and fields are ignored.
 *
 * @param raw - Parsed TOML table or override table.
 * @param base - Configuration the table is merged over.
 * @returns Validated configuration.
 * @throws ConfigParseError for invalid field values.
 */
export function parseConfigObject(
  raw: Record<string, unknown>,
  base: Config = DEFAULT_CONFIG
): Config {
  return {
    selector: parseSelector(getSection(raw, 'selector'), base.selector),
    metadata: parseMetadata(getSection(raw, 'metadata'), base.metadata),
    logging: parseLogging(getSection(raw, 'logging'), base.logging),
  };
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Validated configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [selector]
 * n_spikes_max = 250
 * `);
 * config.selector.n_spikes_max; // 250
 * config.metadata.default_group; // "unsorted"
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;
  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${cause.message}`, cause);
  }
  return parseConfigObject(parsed);
}

/**
 * Returns a copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return {
    selector: { ...DEFAULT_CONFIG.selector },
    metadata: { ...DEFAULT_CONFIG.metadata },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads and parses a configuration file. A missing file yields the defaults.
 *
 * @param filePath - Path to the TOML file.
 * @returns Validated configuration.
 * @throws ConfigParseError if the file cannot be read or is invalid.
 */
export async function loadConfigFile(filePath: string): Promise<Config> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return getDefaultConfig();
    }
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Cannot read config file '${filePath}': ${cause.message}`, cause);
  }
  return parseConfig(content);
}
