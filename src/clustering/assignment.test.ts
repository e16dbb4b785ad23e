import { describe, it, expect } from 'vitest';
import { ClusterAssignment, isValidClusterId } from './assignment.js';
import { InvalidOperationError } from './errors.js';

describe('ClusterAssignment', () => {
  describe('fromArray', () => {
    it('should copy the given cluster ids', () => {
      const source = [3, 1, 3, 2];
      const assignment = ClusterAssignment.fromArray(source);
      source[0] = 9;

      expect([...assignment.toArray()]).toEqual([3, 1, 3, 2]);
      expect(assignment.nSpikes).toBe(4);
    });

    it('should accept typed arrays', () => {
      const assignment = ClusterAssignment.fromArray(new Int32Array([0, 0, 4]));
      expect(assignment.clusterIds).toEqual([0, 4]);
    });

    it('should report every invalid spike', () => {
      try {
        ClusterAssignment.fromArray([1, -2, 0.5, 3]);
        expect.unreachable('fromArray should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidOperationError);
        if (error instanceof InvalidOperationError) {
          expect(error.code).toBe('INVALID_ASSIGNMENT');
          expect(error.ids).toEqual([1, 2]);
        }
      }
    });
  });

  describe('queries', () => {
    const assignment = ClusterAssignment.fromArray([5, 2, 5, 7, 2]);

    it('should list cluster ids in ascending order', () => {
      expect(assignment.clusterIds).toEqual([2, 5, 7]);
    });

    it('should find the spikes of several clusters', () => {
      expect(assignment.spikesIn([7, 2])).toEqual([1, 3, 4]);
      expect(assignment.spikesIn([])).toEqual([]);
      expect(assignment.spikesIn([99])).toEqual([]);
    });

    it('should count spikes per cluster', () => {
      expect([...assignment.spikeCounts()].sort((a, b) => a[0] - b[0])).toEqual([
        [2, 2],
        [5, 2],
        [7, 1],
      ]);
    });

    it('should look up the cluster of a spike', () => {
      expect(assignment.clusterOf(3)).toBe(7);
      expect(() => assignment.clusterOf(5)).toThrow(InvalidOperationError);
      expect(assignment.hasSpike(4)).toBe(true);
      expect(assignment.hasSpike(5)).toBe(false);
      expect(assignment.hasCluster(5)).toBe(true);
      expect(assignment.hasCluster(6)).toBe(false);
    });
  });

  describe('spikesByCluster', () => {
    it('should group spikes of the given clusters in one pass', () => {
      const assignment = ClusterAssignment.fromArray([5, 7, 5, 9, 7, 5]);
      const groups = assignment.spikesByCluster([5, 7, 8]);

      expect([...groups.keys()]).toEqual([5, 7]);
      expect(groups.get(5)).toEqual([0, 2, 5]);
      expect(groups.get(7)).toEqual([1, 4]);
      expect(groups.has(9)).toBe(false);
    });
  });

  describe('assign', () => {
    it('should relabel spikes and refresh cluster ids', () => {
      const assignment = ClusterAssignment.fromArray([1, 1, 2]);
      expect(assignment.clusterIds).toEqual([1, 2]);

      assignment.assign([0, 1], 4);

      expect([...assignment.toArray()]).toEqual([4, 4, 2]);
      expect(assignment.clusterIds).toEqual([2, 4]);
    });
  });

  describe('equals', () => {
    it('should compare element-wise', () => {
      const a = ClusterAssignment.fromArray([1, 2, 3]);
      expect(a.equals(ClusterAssignment.fromArray([1, 2, 3]))).toBe(true);
      expect(a.equals(ClusterAssignment.fromArray([1, 2, 4]))).toBe(false);
      expect(a.equals(ClusterAssignment.fromArray([1, 2]))).toBe(false);
    });
  });

  describe('isValidClusterId', () => {
    it('should accept non-negative 32-bit integers only', () => {
      expect(isValidClusterId(0)).toBe(true);
      expect(isValidClusterId(2 ** 31 - 1)).toBe(true);
      expect(isValidClusterId(2 ** 31)).toBe(false);
      expect(isValidClusterId(-1)).toBe(false);
      expect(isValidClusterId(Number.NaN)).toBe(false);
    });
  });
});
