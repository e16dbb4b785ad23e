/**
 * Types for the undo/redo history.
 *
 * @packageDocumentation
 */

import type { ClusterId } from '../clustering/types.js';

/**
 * Net difference between two captured states of a target.
 */
export interface HistoryDiff {
  /** Ids present in the source state and absent from the destination state. */
  readonly removed: readonly ClusterId[];
  /** Ids absent from the source state and present in the destination state. */
  readonly added: readonly ClusterId[];
  /** Ids present in both states whose metadata differs. */
  readonly metadataChanged?: readonly ClusterId[];
}

/**
 * A stateful target whose state can be captured, restored and compared.
 *
 * @template S - Snapshot type produced by `capture`.
 */
export interface Checkpointable<S> {
  /** Captures an independent copy of the current state. */
  capture(): S;
  /** Replaces the current state with a previously captured one. */
  restore(snapshot: S): void;
  /** Describes what changes when moving from one snapshot to another. */
  diff(from: S, to: S): HistoryDiff;
}

/**
 * A captured state bound to the target it was captured from.
 */
export interface HistoryEntry<S> {
  readonly target: Checkpointable<S>;
  readonly snapshot: S;
}
