/**
 * Merge and split operations over a cluster assignment.
 *
 * @packageDocumentation
 */

import type { Checkpointable, HistoryDiff } from '../history/types.js';
import { ClusterAssignment, MAX_CLUSTER_ID } from './assignment.js';
import { InvalidOperationError } from './errors.js';
import {
  type ClusterId,
  type SpikeId,
  type UpdateDescriptor,
  createUpdateDescriptor,
  sortedUnique,
} from './types.js';

/**
 * Captured clustering state.
 */
export interface ClusteringSnapshot {
  /** Cluster id of each spike, indexed by SpikeId. */
  readonly spikeClusters: Int32Array;
}

function maxClusterId(spikeClusters: Int32Array): ClusterId {
  let max = -1;
  for (const cluster of spikeClusters) {
    if (cluster > max) {
      max = cluster;
    }
  }
  return max;
}

/**
 * Clustering state machine over one loaded dataset.
 *
 * Cluster ids are minted by a monotonic allocator: an id that has been
 * retired is never issued again by the same instance, including after
 * `restore`.
 *
 * @example
 * ```typescript
 * const clustering = new Clustering([1, 1, 2, 2]);
 * const up = clustering.merge([1, 2]);
 * up.added; // [3]
 * clustering.clusterIds; // [3]
 * ```
 */
export class Clustering implements Checkpointable<ClusteringSnapshot> {
  private assignment: ClusterAssignment;
  private nextId: ClusterId;

  /**
   * Creates a clustering from an initial assignment.
   *
   * @param spikeClusters - Cluster id of each spike, indexed by SpikeId.
   * @throws InvalidOperationError if the assignment contains invalid ids.
   */
  constructor(spikeClusters: ArrayLike<number>) {
    this.assignment = ClusterAssignment.fromArray(spikeClusters);
    this.nextId = maxClusterId(this.assignment.toArray()) + 1;
  }

  /** Cluster ids in use, sorted ascending. */
  get clusterIds(): ClusterId[] {
    return this.assignment.clusterIds;
  }

  /** Copy of the assignment, indexed by SpikeId. */
  get spikeClusters(): Int32Array {
    return this.assignment.toArray();
  }

  /** Number of spikes in the dataset. */
  get nSpikes(): number {
    return this.assignment.nSpikes;
  }

  /** Id the next mint will return. */
  get nextClusterId(): ClusterId {
    return this.nextId;
  }

  hasCluster(cluster: ClusterId): boolean {
    return this.assignment.hasCluster(cluster);
  }

  clusterOf(spike: SpikeId): ClusterId {
    return this.assignment.clusterOf(spike);
  }

  spikesIn(clusterIds: Iterable<ClusterId>): SpikeId[] {
    return this.assignment.spikesIn(clusterIds);
  }

  spikeCounts(): ReadonlyMap<ClusterId, number> {
    return this.assignment.spikeCounts();
  }

  /**
   * Merges clusters into one freshly minted cluster.
   *
   * @param clusterIds - At least two distinct clusters in use.
   * @returns Descriptor with the merged ids removed and the new id added and selected.
   * @throws InvalidOperationError if fewer than two distinct ids are given, any is not in
   * use, or the id space is exhausted.
   */
  merge(clusterIds: Iterable<ClusterId>): UpdateDescriptor {
    const merged = sortedUnique(clusterIds);
    if (merged.length < 2) {
      throw new InvalidOperationError(
        `Merge needs at least 2 distinct clusters, got ${String(merged.length)}`,
        'DEGENERATE_MERGE',
        merged
      );
    }
    this.assertClustersInUse(merged);
    this.reserve(1);

    const spikes = this.assignment.spikesIn(merged);
    const target = this.mint();
    this.assignment.assign(spikes, target);

    return createUpdateDescriptor({
      kind: 'merge',
      removed: merged,
      added: [target],
      selected: [target],
    });
  }

  /**
   * Peels spikes off their clusters into freshly minted clusters.
   *
   * Each donor cluster touched by the spikes gives its peeled spikes to one
   * new cluster. A donor that keeps some spikes is renumbered too, so that a
   * cluster id always denotes a single spike set; a donor that keeps none is
   * retired.
   *
   * @param spikeIds - Non-empty set of spikes of this dataset.
   * @returns Descriptor with every donor removed and every minted id added and selected.
   * @throws InvalidOperationError if the set is empty, references unknown spikes, or
   * needs more new ids than are left. State is unchanged in every case.
   */
  split(spikeIds: Iterable<SpikeId>): UpdateDescriptor {
    const spikes = sortedUnique(spikeIds);
    if (spikes.length === 0) {
      throw new InvalidOperationError('Split needs at least one spike', 'EMPTY_SPLIT');
    }
    const unknown = spikes.filter((spike) => !this.assignment.hasSpike(spike));
    if (unknown.length > 0) {
      throw new InvalidOperationError(
        `Unknown spike(s): ${unknown.join(', ')}`,
        'UNKNOWN_SPIKE',
        unknown
      );
    }

    const byDonor = new Map<ClusterId, SpikeId[]>();
    for (const spike of spikes) {
      const donor = this.assignment.clusterOf(spike);
      const peeled = byDonor.get(donor);
      if (peeled === undefined) {
        byDonor.set(donor, [spike]);
      } else {
        peeled.push(spike);
      }
    }

    const donors = [...byDonor.keys()].sort((a, b) => a - b);
    const splitSet = new Set(spikes);
    const remainingByDonor = new Map<ClusterId, SpikeId[]>();
    for (const [donor, members] of this.assignment.spikesByCluster(donors)) {
      const remaining = members.filter((spike) => !splitSet.has(spike));
      if (remaining.length > 0) {
        remainingByDonor.set(donor, remaining);
      }
    }
    this.reserve(donors.length + remainingByDonor.size);

    const added: ClusterId[] = [];
    for (const donor of donors) {
      const peeledId = this.mint();
      this.assignment.assign(byDonor.get(donor) ?? [], peeledId);
      added.push(peeledId);

      const remaining = remainingByDonor.get(donor);
      if (remaining !== undefined) {
        const remainingId = this.mint();
        this.assignment.assign(remaining, remainingId);
        added.push(remainingId);
      }
    }

    return createUpdateDescriptor({
      kind: 'split',
      removed: donors,
      added,
      selected: added,
    });
  }

  capture(): ClusteringSnapshot {
    return { spikeClusters: this.assignment.toArray() };
  }

  /**
   * Restores a captured assignment. The id allocator is never rewound.
   *
   * @throws InvalidOperationError if the snapshot has a different number of spikes.
   */
  restore(snapshot: ClusteringSnapshot): void {
    if (snapshot.spikeClusters.length !== this.assignment.nSpikes) {
      throw new InvalidOperationError(
        `Snapshot has ${String(snapshot.spikeClusters.length)} spikes, expected ${String(this.assignment.nSpikes)}`,
        'INVALID_ASSIGNMENT'
      );
    }
    this.assignment = ClusterAssignment.fromArray(snapshot.spikeClusters);
    this.nextId = Math.max(this.nextId, maxClusterId(snapshot.spikeClusters) + 1);
  }

  diff(from: ClusteringSnapshot, to: ClusteringSnapshot): HistoryDiff {
    const before = new Set(from.spikeClusters);
    const after = new Set(to.spikeClusters);
    return {
      removed: sortedUnique([...before].filter((cluster) => !after.has(cluster))),
      added: sortedUnique([...after].filter((cluster) => !before.has(cluster))),
    };
  }

  /**
   * @throws InvalidOperationError if fewer than `count` ids are left to mint.
   */
  private reserve(count: number): void {
    const available = MAX_CLUSTER_ID - this.nextId + 1;
    if (count > available) {
      throw new InvalidOperationError(
        `Cluster id space exhausted: need ${String(count)} new id(s), ${String(Math.max(available, 0))} left`,
        'ID_SPACE_EXHAUSTED'
      );
    }
  }

  /** Callers reserve ids first. */
  private mint(): ClusterId {
    const id = this.nextId;
    this.nextId += 1;
    return id;
  }

  private assertClustersInUse(clusterIds: readonly ClusterId[]): void {
    const unknown = clusterIds.filter((cluster) => !this.assignment.hasCluster(cluster));
    if (unknown.length > 0) {
      throw new InvalidOperationError(
        `Unknown cluster(s): ${unknown.join(', ')}`,
        'UNKNOWN_CLUSTER',
        unknown
      );
    }
  }
}
