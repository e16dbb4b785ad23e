/**
 * Core types for manual clustering.
 *
 * @packageDocumentation
 */

/**
 * Index of a spike in the loaded dataset. Stable for the lifetime of the dataset.
 */
export type SpikeId = number;

/**
 * Label assigned to a group of spikes. Not stable across merges and splits.
 */
export type ClusterId = number;

/**
 * All curation groups a cluster can be moved to.
 */
export const CLUSTER_GROUPS = ['noise', 'mua', 'good', 'unsorted'] as const;

/**
 * Curation label attached to a cluster.
 */
export type ClusterGroup = (typeof CLUSTER_GROUPS)[number];

/**
 * Checks whether a value names a known cluster group.
 *
 * @param value - Value to check.
 * @returns True if the value is a ClusterGroup.
 */
export function isClusterGroup(value: unknown): value is ClusterGroup {
  return CLUSTER_GROUPS.some((group) => group === value);
}

/**
 * Operation that produced an update.
 */
export type UpdateKind = 'merge' | 'split' | 'move' | 'undo' | 'redo';

/**
 * Effect of one mutation of the clustering state.
 *
 * Produced by every mutating operation and by history replay; consumed by
 * session observers.
 */
export interface UpdateDescriptor {
  /** Operation that produced this update. */
  readonly kind: UpdateKind;
  /** Cluster ids no longer in use, sorted ascending. */
  readonly removed: readonly ClusterId[];
  /** Cluster ids newly in use, sorted ascending. */
  readonly added: readonly ClusterId[];
  /** Subset of `added` that should become selected, sorted ascending. */
  readonly selected: readonly ClusterId[];
  /** Clusters whose group changed, sorted ascending. */
  readonly metadataChanged: readonly ClusterId[];
}

/**
 * Fields accepted by {@link createUpdateDescriptor}; omitted lists are empty.
 */
export interface UpdateDescriptorInput {
  readonly kind: UpdateKind;
  readonly removed?: Iterable<ClusterId>;
  readonly added?: Iterable<ClusterId>;
  readonly selected?: Iterable<ClusterId>;
  readonly metadataChanged?: Iterable<ClusterId>;
}

/**
 * Returns the distinct values of an iterable of ids, sorted ascending.
 */
export function sortedUnique(ids: Iterable<number>): number[] {
  return [...new Set(ids)].sort((a, b) => a - b);
}

/**
 * Creates an UpdateDescriptor with normalized (sorted, distinct) id lists.
 *
 * @param input - Descriptor fields.
 * @returns A frozen descriptor.
 */
export function createUpdateDescriptor(input: UpdateDescriptorInput): UpdateDescriptor {
  return Object.freeze({
    kind: input.kind,
    removed: Object.freeze(sortedUnique(input.removed ?? [])),
    added: Object.freeze(sortedUnique(input.added ?? [])),
    selected: Object.freeze(sortedUnique(input.selected ?? [])),
    metadataChanged: Object.freeze(sortedUnique(input.metadataChanged ?? [])),
  });
}

/**
 * Checks whether an update changed nothing at all.
 */
export function isEmptyUpdate(update: UpdateDescriptor): boolean {
  return (
    update.removed.length === 0 &&
    update.added.length === 0 &&
    update.metadataChanged.length === 0
  );
}
