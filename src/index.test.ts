import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  VERSION,
  Session,
  SessionStateError,
  InvalidOperationError,
  isEmptyUpdate,
  startManualClustering,
} from './index.js';

describe('cluster-curator', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('VERSION', () => {
    it('should follow semver format', () => {
      expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
      expect(VERSION).toBe('0.1.0');
    });
  });

  describe('public entry point', () => {
    it('should expose a working session', () => {
      vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      const session = startManualClustering({ spikeClusters: [0, 0, 1] });

      expect(session).toBeInstanceOf(Session);
      expect(session.merge([0, 1]).added).toEqual([2]);
      expect(() => session.merge([2])).toThrow(InvalidOperationError);
      expect(() => new Session().undo()).toThrow(SessionStateError);
    });

    it('should report a move to the current group as an empty update', () => {
      vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      const session = startManualClustering({ spikeClusters: [4, 5] });

      expect(isEmptyUpdate(session.move([4], 'unsorted'))).toBe(true);
      expect(isEmptyUpdate(session.move([4], 'good'))).toBe(false);
    });
  });
});
