import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { Logger } from './logger.js';

describe('Logger', () => {
  let capturedOutput: string[] = [];

  beforeEach(() => {
    capturedOutput = [];
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      capturedOutput.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function getOutput(index: number): string {
    const output = capturedOutput[index];
    if (output === undefined) {
      throw new Error(`Expected output at index ${String(index)} but got undefined`);
    }
    return output;
  }

  function parseOutput(index: number): Record<string, unknown> {
    const parsed: unknown = JSON.parse(getOutput(index).trim());
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error(`Expected a JSON object at index ${String(index)}`);
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  describe('safe JSON.stringify', () => {
    it('should handle circular references without throwing', () => {
      const logger = new Logger({ component: 'TestLogger' });

      const circularObj: Record<string, unknown> = { name: 'test' };
      circularObj.self = circularObj;

      expect(() => {
        logger.info('circular_test', circularObj);
      }).not.toThrow();

      expect(capturedOutput.length).toBe(1);
      const parsed = parseOutput(0);

      expect(parsed.level).toBe('info');
      expect(parsed.component).toBe('TestLogger');
      expect(parsed.event).toBe('circular_test');
      expect(typeof parsed.serializationError).toBe('string');
      expect(parsed.originalData).toBe('[unserializable]');
      expect(parsed.data).toBeUndefined();
    });

    it('should handle BigInt values without throwing', () => {
      const logger = new Logger({ component: 'TestLogger' });

      logger.warn('bigint_test', { value: BigInt(9007199254740991) });

      const parsed = parseOutput(0);
      expect(parsed.level).toBe('warn');
      expect(parsed.originalData).toBe('[unserializable]');
    });

    it('should output a single JSON line even when serialization fails', () => {
      const logger = new Logger({ component: 'TestLogger' });

      const circularObj: Record<string, unknown> = {};
      circularObj.ref = circularObj;
      logger.error('error_with_circular', circularObj);

      const output = getOutput(0);
      expect(output.endsWith('\n')).toBe(true);
      expect(output.trim().split('\n').length).toBe(1);
      expect(parseOutput(0).timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
    });

    it('should handle arbitrary values without throwing (property-based)', () => {
      const logger = new Logger({ component: 'PropertyTest' });

      fc.assert(
        fc.property(fc.dictionary(fc.string(), fc.anything()), (arbitraryData) => {
          capturedOutput = [];

          expect(() => {
            logger.info('fuzz_test', arbitraryData);
          }).not.toThrow();

          expect(capturedOutput.length).toBe(1);
          const parsed = parseOutput(0);
          expect(parsed.component).toBe('PropertyTest');
          expect(parsed.event).toBe('fuzz_test');
          if (parsed.serializationError !== undefined) {
            expect(parsed.originalData).toBe('[unserializable]');
          }
        })
      );
    });
  });

  describe('normal logging', () => {
    it('should log info messages with their data', () => {
      const logger = new Logger({ component: 'Session' });

      logger.info('session_opened', { nSpikes: 4, nClusters: 2 });

      const parsed = parseOutput(0);
      expect(parsed.level).toBe('info');
      expect(parsed.component).toBe('Session');
      expect(parsed.event).toBe('session_opened');
      expect(parsed.data).toEqual({ nSpikes: 4, nClusters: 2 });
    });

    it('should omit data when none is given', () => {
      const logger = new Logger({ component: 'Session' });

      logger.warn('nothing_to_report');

      expect(Object.keys(parseOutput(0))).toEqual(['timestamp', 'level', 'component', 'event']);
    });

    it('should not log debug messages when debugMode is false', () => {
      const logger = new Logger({ component: 'TestLogger', debugMode: false });

      logger.debug('debug_event', { key: 'value' });

      expect(capturedOutput.length).toBe(0);
      expect(logger.isDebugEnabled).toBe(false);
    });

    it('should log debug messages when debugMode is true', () => {
      const logger = new Logger({ component: 'TestLogger', debugMode: true });

      logger.debug('debug_event', { key: 'value' });

      expect(parseOutput(0).level).toBe('debug');
      expect(logger.isDebugEnabled).toBe(true);
    });

    it('should log error messages correctly', () => {
      const logger = new Logger({ component: 'TestLogger' });

      logger.error('error_event', { code: 'UNKNOWN_CLUSTER' });

      const parsed = parseOutput(0);
      expect(parsed.level).toBe('error');
      expect(parsed.data).toEqual({ code: 'UNKNOWN_CLUSTER' });
    });
  });
});
