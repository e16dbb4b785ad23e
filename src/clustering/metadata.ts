/**
 * Cluster metadata: curation groups attached to clusters.
 *
 * @packageDocumentation
 */

import { InvalidOperationError } from './errors.js';
import {
  type ClusterGroup,
  type ClusterId,
  type UpdateDescriptor,
  CLUSTER_GROUPS,
  createUpdateDescriptor,
  isClusterGroup,
  sortedUnique,
} from './types.js';

/**
 * Captured metadata state.
 */
export interface ClusterMetadataSnapshot {
  /** Explicitly assigned groups. Clusters absent from the map have the default group. */
  readonly groups: ReadonlyMap<ClusterId, ClusterGroup>;
  /** Group reported for clusters without an explicit group. */
  readonly defaultGroup: ClusterGroup;
}

/**
 * Queryable cluster metadata supplied by a data source.
 */
export interface ClusterMetadata {
  /** Returns the group of a cluster. */
  getGroup(cluster: ClusterId): ClusterGroup;
  /** Moves clusters to a group and describes which ones changed. */
  setGroup(clusterIds: Iterable<ClusterId>, group: ClusterGroup): UpdateDescriptor;
  capture(): ClusterMetadataSnapshot;
  restore(snapshot: ClusterMetadataSnapshot): void;
  /**
   * Drops the groups of retired clusters. Called after merges and splits;
   * earlier snapshots keep them for undo.
   */
  forget?(clusterIds: Iterable<ClusterId>): void;
}

/**
 * Lists the clusters whose effective group differs between two snapshots.
 *
 * @param from - Snapshot before the change.
 * @param to - Snapshot after the change.
 * @param clusters - Restricts the comparison to these clusters when given.
 * @returns Changed cluster ids, ascending.
 */
export function diffGroups(
  from: ClusterMetadataSnapshot,
  to: ClusterMetadataSnapshot,
  clusters?: Iterable<ClusterId>
): ClusterId[] {
  const candidates = clusters ?? [...from.groups.keys(), ...to.groups.keys()];
  const changed: ClusterId[] = [];
  for (const cluster of candidates) {
    const before = from.groups.get(cluster) ?? from.defaultGroup;
    const after = to.groups.get(cluster) ?? to.defaultGroup;
    if (before !== after) {
      changed.push(cluster);
    }
  }
  return sortedUnique(changed);
}

/**
 * In-memory {@link ClusterMetadata} implementation.
 *
 * @example
 * ```typescript
 * const metadata = new ClusterMetadataStore({ defaultGroup: 'unsorted' });
 * metadata.setGroup([3, 4], 'good').metadataChanged; // [3, 4]
 * metadata.getGroup(3); // 'good'
 * metadata.getGroup(5); // 'unsorted'
 * ```
 */
export class ClusterMetadataStore implements ClusterMetadata {
  private groups: Map<ClusterId, ClusterGroup>;
  private defaultGroup: ClusterGroup;

  /**
   * Creates a metadata store.
   *
   * @param options - Default group and initial explicit groups.
   */
  constructor(
    options: {
      defaultGroup?: ClusterGroup;
      groups?: Iterable<readonly [ClusterId, ClusterGroup]>;
    } = {}
  ) {
    this.defaultGroup = options.defaultGroup ?? 'unsorted';
    this.groups = new Map();
    for (const [cluster, group] of options.groups ?? []) {
      this.groups.set(cluster, group);
    }
  }

  getGroup(cluster: ClusterId): ClusterGroup {
    return this.groups.get(cluster) ?? this.defaultGroup;
  }

  /**
   * @throws InvalidOperationError if no clusters are given or the group is unknown.
   */
  setGroup(clusterIds: Iterable<ClusterId>, group: ClusterGroup): UpdateDescriptor {
    const clusters = sortedUnique(clusterIds);
    if (clusters.length === 0) {
      throw new InvalidOperationError('Move needs at least one cluster', 'EMPTY_MOVE');
    }
    if (!isClusterGroup(group)) {
      throw new InvalidOperationError(
        `Unknown group '${String(group)}', expected one of: ${CLUSTER_GROUPS.join(', ')}`,
        'INVALID_GROUP'
      );
    }

    const changed = clusters.filter((cluster) => this.getGroup(cluster) !== group);
    for (const cluster of clusters) {
      this.groups.set(cluster, group);
    }
    return createUpdateDescriptor({ kind: 'move', metadataChanged: changed });
  }

  capture(): ClusterMetadataSnapshot {
    return { groups: new Map(this.groups), defaultGroup: this.defaultGroup };
  }

  restore(snapshot: ClusterMetadataSnapshot): void {
    this.groups = new Map(snapshot.groups);
    this.defaultGroup = snapshot.defaultGroup;
  }

  forget(clusterIds: Iterable<ClusterId>): void {
    for (const cluster of clusterIds) {
      this.groups.delete(cluster);
    }
  }
}
