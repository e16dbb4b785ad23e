/**
 * CURATOR_* environment variable overrides.
 *
 * Precedence: env > config file > defaults. Values are coerced here and then
 * validated by the same rules as curator.toml.
 *
 * @packageDocumentation
 */

import { parseConfigObject } from './parser.js';
import type { Config } from './types.js';

/** Shape of `process.env`. */
export type EnvRecord = Record<string, string | undefined>;

type EnvValueType = 'string' | 'number' | 'boolean';

/**
 * Raised when a variable's text cannot be read as its field's type.
 */
export class EnvCoercionError extends Error {
  public readonly envVar: string;
  public readonly rawValue: string;
  public readonly expectedType: string;

  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    super(
      message ??
        `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`
    );
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

interface EnvMapping {
  readonly section: keyof Config;
  readonly field: string;
  readonly type: EnvValueType;
}

/**
 * Variable name to config path. Short aliases come first so that the
 * sectioned name wins when both are set.
 */
const ENV_VAR_MAPPINGS: ReadonlyMap<string, EnvMapping> = new Map<string, EnvMapping>([
  ['CURATOR_N_SPIKES_MAX', { section: 'selector', field: 'n_spikes_max', type: 'number' }],
  ['CURATOR_SELECTOR_N_SPIKES_MAX', { section: 'selector', field: 'n_spikes_max', type: 'number' }],
  ['CURATOR_DEFAULT_GROUP', { section: 'metadata', field: 'default_group', type: 'string' }],
  [
    'CURATOR_METADATA_DEFAULT_GROUP',
    { section: 'metadata', field: 'default_group', type: 'string' },
  ],
  ['CURATOR_DEBUG', { section: 'logging', field: 'debug', type: 'boolean' }],
  ['CURATOR_LOGGING_DEBUG', { section: 'logging', field: 'debug', type: 'boolean' }],
]);

/** Accepted boolean spellings, matched case-insensitively. */
const BOOLEAN_TOKENS: ReadonlyMap<string, boolean> = new Map([
  ['true', true],
  ['1', true],
  ['yes', true],
  ['on', true],
  ['false', false],
  ['0', false],
  ['no', false],
  ['off', false],
]);

type Coercer = (raw: string, envVar: string) => string | number | boolean;

const COERCERS: { readonly [T in EnvValueType]: Coercer } = {
  string: (raw) => raw.trim(),

  number: (raw, envVar) => {
    const text = raw.trim();
    if (text === '') {
      throw new EnvCoercionError(envVar, raw, 'number', `Empty value for '${envVar}'`);
    }
    const parsed = Number(text);
    if (Number.isNaN(parsed)) {
      throw new EnvCoercionError(envVar, raw, 'number');
    }
    return parsed;
  },

  boolean: (raw, envVar) => {
    const flag = BOOLEAN_TOKENS.get(raw.trim().toLowerCase());
    if (flag === undefined) {
      throw new EnvCoercionError(
        envVar,
        raw,
        'boolean',
        `Cannot coerce '${envVar}' value '${raw}' to boolean. Expected one of: ${[...BOOLEAN_TOKENS.keys()].join(', ')}`
      );
    }
    return flag;
  },
};

/**
 * Overrides read from the environment.
 */
export interface EnvOverrideResult {
  /** Table shaped like curator.toml. */
  overrides: Record<string, Record<string, unknown>>;
  /** Variables that contributed, in mapping order. */
  appliedVars: string[];
}

/**
 * Reads CURATOR_* variables into an override table. Unset and empty
 * variables are skipped.
 *
 * @throws EnvCoercionError if a value cannot be coerced to its field's type.
 *
 * @example
 * ```typescript
 * const { overrides } = readEnvOverrides({ CURATOR_N_SPIKES_MAX: '500' });
 * overrides; // { selector: { n_spikes_max: 500 } }
 * ```
 */
export function readEnvOverrides(env: EnvRecord = process.env): EnvOverrideResult {
  const result: EnvOverrideResult = { overrides: {}, appliedVars: [] };

  for (const [envVar, { section, field, type }] of ENV_VAR_MAPPINGS) {
    const raw = env[envVar];
    if (raw === undefined || raw === '') {
      continue;
    }
    const table = result.overrides[section] ?? {};
    table[field] = COERCERS[type](raw, envVar);
    result.overrides[section] = table;
    result.appliedVars.push(envVar);
  }

  return result;
}

/**
 * Returns `config` with the environment's overrides merged in.
 *
 * @throws EnvCoercionError if a value cannot be coerced.
 * @throws ConfigParseError if a coerced value is out of range.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  return parseConfigObject(readEnvOverrides(env).overrides, config);
}

/**
 * Lists supported environment variables with their config paths.
 */
export function getEnvVarDocumentation(): { envVar: string; configPath: string; type: string }[] {
  return [...ENV_VAR_MAPPINGS].map(([envVar, { section, field, type }]) => ({
    envVar,
    configPath: `${section}.${field}`,
    type,
  }));
}
