/**
 * Clustering module: assignment, merge/split, metadata and selection.
 *
 * @packageDocumentation
 */

export { ClusterAssignment, isValidClusterId } from './assignment.js';
export { Clustering } from './clustering.js';
export type { ClusteringSnapshot } from './clustering.js';
export { InvalidOperationError } from './errors.js';
export type { InvalidOperationCode } from './errors.js';
export { ClusterMetadataStore, diffGroups } from './metadata.js';
export type { ClusterMetadata, ClusterMetadataSnapshot } from './metadata.js';
export { Selector, regularSubset } from './selector.js';
export type { SpikeSource } from './selector.js';
export {
  CLUSTER_GROUPS,
  createUpdateDescriptor,
  isClusterGroup,
  isEmptyUpdate,
  sortedUnique,
} from './types.js';
export type {
  ClusterGroup,
  ClusterId,
  SpikeId,
  UpdateDescriptor,
  UpdateDescriptorInput,
  UpdateKind,
} from './types.js';
