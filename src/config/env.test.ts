import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';
import {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  getEnvVarDocumentation,
} from './env.js';
import { ConfigParseError, DEFAULT_CONFIG, parseConfig } from './index.js';

function coercionError(env: Record<string, string>): EnvCoercionError {
  try {
    readEnvOverrides(env);
  } catch (error) {
    if (error instanceof EnvCoercionError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected readEnvOverrides to throw');
}

describe('Environment Variable Overrides', () => {
  describe('readEnvOverrides', () => {
    describe('CURATOR_* env vars override corresponding config values', () => {
      it('should read CURATOR_N_SPIKES_MAX as a number', () => {
        const result = readEnvOverrides({ CURATOR_N_SPIKES_MAX: '500' });

        expect(result.overrides).toEqual({ selector: { n_spikes_max: 500 } });
        expect(result.appliedVars).toEqual(['CURATOR_N_SPIKES_MAX']);
      });

      it('should read the default group trimmed', () => {
        const result = readEnvOverrides({ CURATOR_METADATA_DEFAULT_GROUP: ' good ' });

        expect(result.overrides.metadata?.default_group).toBe('good');
      });

      it('should let the sectioned name win over the short alias', () => {
        const result = readEnvOverrides({
          CURATOR_SELECTOR_N_SPIKES_MAX: '20',
          CURATOR_N_SPIKES_MAX: '10',
        });

        expect(result.overrides.selector?.n_spikes_max).toBe(20);
        expect(result.appliedVars).toEqual(['CURATOR_N_SPIKES_MAX', 'CURATOR_SELECTOR_N_SPIKES_MAX']);
      });

      it('should ignore unset, empty and unrelated variables', () => {
        const result = readEnvOverrides({
          CURATOR_DEBUG: '',
          CURATOR_DEFAULT_GROUP: undefined,
          HOME: '/home/test',
        });

        expect(result.overrides).toEqual({});
        expect(result.appliedVars).toEqual([]);
      });
    });

    describe('string env var to boolean', () => {
      it.each([
        { raw: 'true', expected: true },
        { raw: 'YES', expected: true },
        { raw: '1', expected: true },
        { raw: 'on', expected: true },
        { raw: 'false', expected: false },
        { raw: 'Off', expected: false },
        { raw: '0', expected: false },
        { raw: 'no', expected: false },
      ])('should coerce $raw to $expected', ({ raw, expected }) => {
        const result = readEnvOverrides({ CURATOR_DEBUG: raw });
        expect(result.overrides.logging?.debug).toBe(expected);
      });
    });

    describe('invalid env var value returns coercion error', () => {
      it('should throw EnvCoercionError for a non-numeric limit', () => {
        const error = coercionError({ CURATOR_N_SPIKES_MAX: 'lots' });

        expect(error.envVar).toBe('CURATOR_N_SPIKES_MAX');
        expect(error.rawValue).toBe('lots');
        expect(error.expectedType).toBe('number');
        expect(error.message).toBe(
          "Cannot coerce environment variable 'CURATOR_N_SPIKES_MAX' value 'lots' to number"
        );
      });

      it('should throw EnvCoercionError for a whitespace-only number', () => {
        expect(coercionError({ CURATOR_SELECTOR_N_SPIKES_MAX: '   ' }).message).toBe(
          "Empty value for 'CURATOR_SELECTOR_N_SPIKES_MAX'"
        );
      });

      it('should throw EnvCoercionError for an invalid boolean', () => {
        const error = coercionError({ CURATOR_LOGGING_DEBUG: 'maybe' });

        expect(error.envVar).toBe('CURATOR_LOGGING_DEBUG');
        expect(error.expectedType).toBe('boolean');
      });
    });
  });

  describe('applyEnvOverrides', () => {
    it('should demonstrate override precedence: env > config file', () => {
      const config = parseConfig(`
[selector]
n_spikes_max = 40

[metadata]
default_group = "mua"
`);
      const result = applyEnvOverrides(config, { CURATOR_N_SPIKES_MAX: '60' });

      expect(result.selector.n_spikes_max).toBe(60);
      expect(result.metadata.default_group).toBe('mua');
      expect(result.logging.debug).toBe(DEFAULT_CONFIG.logging.debug);
    });

    it('should validate coerced values like file values', () => {
      expect(() => applyEnvOverrides(DEFAULT_CONFIG, { CURATOR_N_SPIKES_MAX: '-3' })).toThrow(
        ConfigParseError
      );
      expect(() =>
        applyEnvOverrides(DEFAULT_CONFIG, { CURATOR_DEFAULT_GROUP: 'excellent' })
      ).toThrow(ConfigParseError);
    });

    it('should return an equal config when no variable is set', () => {
      expect(applyEnvOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
    });
  });

  describe('EnvCoercionError', () => {
    it('should preserve its fields', () => {
      const error = new EnvCoercionError('CURATOR_DEBUG', 'perhaps', 'boolean');

      expect(error.name).toBe('EnvCoercionError');
      expect(error).toBeInstanceOf(Error);
      expect(error.rawValue).toBe('perhaps');
    });
  });

  describe('getEnvVarDocumentation', () => {
    it('should list every variable with its config path', () => {
      const docs = getEnvVarDocumentation();

      expect(docs).toHaveLength(6);
      expect(docs[0]).toEqual({
        envVar: 'CURATOR_N_SPIKES_MAX',
        configPath: 'selector.n_spikes_max',
        type: 'number',
      });
      expect(docs.map((doc) => doc.configPath)).toEqual([
        'selector.n_spikes_max',
        'selector.n_spikes_max',
        'metadata.default_group',
        'metadata.default_group',
        'logging.debug',
        'logging.debug',
      ]);
    });
  });

  describe('property-based tests', () => {
    it('should coerce any positive integer string', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 10_000_000 }), (limit) => {
          const result = applyEnvOverrides(DEFAULT_CONFIG, {
            CURATOR_N_SPIKES_MAX: String(limit),
          });
          return result.selector.n_spikes_max === limit;
        }),
        { numRuns: 100 }
      );
    });
  });
});
