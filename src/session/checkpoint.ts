/**
 * History target capturing clustering and metadata together.
 *
 * @packageDocumentation
 */

import type { Clustering, ClusteringSnapshot } from '../clustering/clustering.js';
import {
  type ClusterMetadata,
  type ClusterMetadataSnapshot,
  diffGroups,
} from '../clustering/metadata.js';
import type { Checkpointable, HistoryDiff } from '../history/types.js';

/**
 * Captured session state.
 */
export interface SessionSnapshot {
  readonly clustering: ClusteringSnapshot;
  readonly metadata: ClusterMetadataSnapshot;
}

/**
 * Checkpoints one dataset's clustering and metadata as a unit, so undoing a
 * move restores groups and undoing a merge restores the assignment.
 */
export class SessionCheckpoint implements Checkpointable<SessionSnapshot> {
  private readonly clustering: Clustering;
  private readonly metadata: ClusterMetadata;

  constructor(clustering: Clustering, metadata: ClusterMetadata) {
    this.clustering = clustering;
    this.metadata = metadata;
  }

  capture(): SessionSnapshot {
    return { clustering: this.clustering.capture(), metadata: this.metadata.capture() };
  }

  restore(snapshot: SessionSnapshot): void {
    this.clustering.restore(snapshot.clustering);
    this.metadata.restore(snapshot.metadata);
  }

  /**
   * Reports cluster ids removed and added, and the clusters present in both
   * states whose group differs.
   */
  diff(from: SessionSnapshot, to: SessionSnapshot): HistoryDiff {
    const clusters = this.clustering.diff(from.clustering, to.clustering);
    const before = new Set(from.clustering.spikeClusters);
    const kept = [...new Set(to.clustering.spikeClusters)].filter((cluster) => before.has(cluster));
    return {
      removed: clusters.removed,
      added: clusters.added,
      metadataChanged: diffGroups(from.metadata, to.metadata, kept),
    };
  }
}
