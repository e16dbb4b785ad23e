/**
 * Spike-to-cluster assignment.
 *
 * The ground truth mutated by clustering operations: a total function from
 * SpikeId to ClusterId, stored as an Int32Array indexed by spike.
 *
 * @packageDocumentation
 */

import { InvalidOperationError } from './errors.js';
import type { ClusterId, SpikeId } from './types.js';

/** Largest id an Int32Array can store. */
export const MAX_CLUSTER_ID = 2 ** 31 - 1;

/**
 * Checks whether a value can be stored as a cluster id.
 */
export function isValidClusterId(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_CLUSTER_ID;
}

/**
 * Mapping from every spike of a dataset to exactly one cluster.
 *
 * @example
 * ```typescript
 * const assignment = ClusterAssignment.fromArray([1, 1, 2, 2]);
 * assignment.clusterIds; // [1, 2]
 * assignment.spikesIn([2]); // [2, 3]
 * ```
 */
export class ClusterAssignment {
  private readonly data: Int32Array;
  private counts: Map<ClusterId, number> | undefined;

  private constructor(data: Int32Array) {
    this.data = data;
    this.counts = undefined;
  }

  /**
   * Builds an assignment from an ordered sequence of cluster ids.
   *
   * @param spikeClusters - Cluster id of each spike, indexed by SpikeId.
   * @returns A new assignment owning a copy of the data.
   * @throws InvalidOperationError if any id is negative, non-integer or too large.
   */
  static fromArray(spikeClusters: ArrayLike<number>): ClusterAssignment {
    const data = new Int32Array(spikeClusters.length);
    const invalid: number[] = [];
    for (let spike = 0; spike < spikeClusters.length; spike++) {
      const cluster = spikeClusters[spike];
      if (cluster === undefined || !isValidClusterId(cluster)) {
        invalid.push(spike);
        continue;
      }
      data[spike] = cluster;
    }
    if (invalid.length > 0) {
      throw new InvalidOperationError(
        `Invalid cluster id for ${String(invalid.length)} spike(s), first at spike ${String(invalid[0])}`,
        'INVALID_ASSIGNMENT',
        invalid
      );
    }
    return new ClusterAssignment(data);
  }

  /** Number of spikes in the dataset. */
  get nSpikes(): number {
    return this.data.length;
  }

  /** Cluster ids in use, sorted ascending. */
  get clusterIds(): ClusterId[] {
    return [...this.spikeCounts().keys()].sort((a, b) => a - b);
  }

  /**
   * Checks whether a value is a SpikeId of this dataset.
   */
  hasSpike(spike: number): boolean {
    return Number.isInteger(spike) && spike >= 0 && spike < this.data.length;
  }

  /**
   * Checks whether at least one spike is assigned to the cluster.
   */
  hasCluster(cluster: ClusterId): boolean {
    return this.spikeCounts().has(cluster);
  }

  /**
   * Returns the cluster a spike belongs to.
   *
   * @throws InvalidOperationError if the spike is not part of the dataset.
   */
  clusterOf(spike: SpikeId): ClusterId {
    const cluster = this.hasSpike(spike) ? this.data[spike] : undefined;
    if (cluster === undefined) {
      throw new InvalidOperationError(`Unknown spike ${String(spike)}`, 'UNKNOWN_SPIKE', [spike]);
    }
    return cluster;
  }

  /**
   * Returns the spikes assigned to any of the given clusters, ascending.
   */
  spikesIn(clusterIds: Iterable<ClusterId>): SpikeId[] {
    const wanted = new Set(clusterIds);
    const spikes: SpikeId[] = [];
    if (wanted.size === 0) {
      return spikes;
    }
    for (const [spike, cluster] of this.data.entries()) {
      if (wanted.has(cluster)) {
        spikes.push(spike);
      }
    }
    return spikes;
  }

  /**
   * Groups the spikes of the given clusters by cluster in one pass.
   *
   * @returns Ascending spikes per requested cluster in use.
   */
  spikesByCluster(clusterIds: Iterable<ClusterId>): Map<ClusterId, SpikeId[]> {
    const groups = new Map<ClusterId, SpikeId[]>();
    for (const cluster of clusterIds) {
      groups.set(cluster, []);
    }
    for (const [spike, cluster] of this.data.entries()) {
      groups.get(cluster)?.push(spike);
    }
    for (const [cluster, spikes] of groups) {
      if (spikes.length === 0) {
        groups.delete(cluster);
      }
    }
    return groups;
  }

  /**
   * Returns the number of spikes in each cluster in use.
   */
  spikeCounts(): ReadonlyMap<ClusterId, number> {
    if (this.counts === undefined) {
      const counts = new Map<ClusterId, number>();
      for (const cluster of this.data) {
        counts.set(cluster, (counts.get(cluster) ?? 0) + 1);
      }
      this.counts = counts;
    }
    return this.counts;
  }

  /**
   * Relabels spikes into a cluster. Callers validate the spikes beforehand.
   */
  assign(spikes: Iterable<SpikeId>, cluster: ClusterId): void {
    for (const spike of spikes) {
      this.data[spike] = cluster;
    }
    this.counts = undefined;
  }

  /**
   * Returns a copy of the underlying data.
   */
  toArray(): Int32Array {
    return this.data.slice();
  }

  /**
   * Compares two assignments element-wise.
   */
  equals(other: ClusterAssignment): boolean {
    if (other.data.length !== this.data.length) {
      return false;
    }
    for (const [spike, cluster] of this.data.entries()) {
      if (other.data[spike] !== cluster) {
        return false;
      }
    }
    return true;
  }
}
