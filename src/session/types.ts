/**
 * Types for the session orchestrator and its collaborators.
 *
 * @packageDocumentation
 */

import type { ClusterMetadata } from '../clustering/metadata.js';
import type { UpdateDescriptor } from '../clustering/types.js';

/**
 * Dataset handed to `Session.open`.
 */
export interface DataSource {
  /** Initial cluster id of each spike, indexed by SpikeId. */
  readonly spikeClusters: ArrayLike<number>;
  /**
   * Cluster metadata used by `move`. A store with the configured default
   * group is created when omitted.
   */
  readonly clusterMetadata?: ClusterMetadata;
}

/**
 * Callbacks a view registers with `Session.connect`.
 *
 * Callbacks run synchronously in registration order. An error thrown by one
 * aborts delivery to the observers registered after it and propagates to the
 * caller of the operation.
 */
export interface SessionObserver {
  /** A dataset was opened. */
  onOpen?(): void;
  /**
   * The clustering changed.
   *
   * @param update - What changed.
   * @param recordable - False for undo/redo, which replay existing history.
   */
  onCluster?(update: UpdateDescriptor, recordable: boolean): void;
  /** The selection changed; read it back from the session. */
  onSelect?(): void;
}

/**
 * Session lifecycle state.
 */
export type SessionStatus = 'unopened' | 'opened';
