/**
 * Undo/redo log of checkpoints.
 *
 * A linear two-stack history: `action` pushes a post-mutation checkpoint,
 * `undo` restores the checkpoint below the top, `redo` re-applies the most
 * recently undone one. Nothing here is specific to clustering; any
 * {@link Checkpointable} target works.
 *
 * @packageDocumentation
 */

import { type UpdateDescriptor, createUpdateDescriptor } from '../clustering/types.js';
import type { Checkpointable, HistoryEntry } from './types.js';

/**
 * Checkpoint history shared by every target of one session.
 *
 * @template S - Snapshot type of the targets.
 *
 * @example
 * ```typescript
 * const history = new GlobalHistory<ClusteringSnapshot>();
 * history.action(clustering); // baseline
 * clustering.merge([1, 2]);
 * history.action(clustering);
 * history.undo(); // { kind: 'undo', removed: [3], added: [1, 2], ... }
 * ```
 */
export class GlobalHistory<S> {
  private readonly undoStack: HistoryEntry<S>[] = [];
  private readonly redoStack: HistoryEntry<S>[] = [];

  /** Number of checkpoints on the undo stack, baseline included. */
  get undoDepth(): number {
    return this.undoStack.length;
  }

  get redoDepth(): number {
    return this.redoStack.length;
  }

  get canUndo(): boolean {
    return this.undoStack.length > 1;
  }

  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  /**
   * Records the current state of a target and drops any redoable entries.
   *
   * Call once per undoable mutation, right after it has been applied.
   */
  action(target: Checkpointable<S>): void {
    this.undoStack.push({ target, snapshot: target.capture() });
    this.redoStack.length = 0;
  }

  /**
   * Restores the checkpoint below the top of the undo stack.
   *
   * @returns The change from the current state to the restored one, or `null`
   * when only the baseline is left.
   */
  undo(): UpdateDescriptor | null {
    const top = this.undoStack.at(-1);
    const below = this.undoStack.at(-2);
    if (top === undefined || below === undefined) {
      return null;
    }

    below.target.restore(below.snapshot);
    this.undoStack.pop();
    this.redoStack.push(top);

    const diff = below.target.diff(top.snapshot, below.snapshot);
    return createUpdateDescriptor({
      kind: 'undo',
      removed: diff.removed,
      added: diff.added,
      selected: diff.added,
      metadataChanged: diff.metadataChanged ?? [],
    });
  }

  /**
   * Re-applies the most recently undone checkpoint.
   *
   * @returns The change from the current state to the re-applied one, or
   * `null` when there is nothing to redo.
   */
  redo(): UpdateDescriptor | null {
    const entry = this.redoStack.at(-1);
    const current = this.undoStack.at(-1);
    if (entry === undefined || current === undefined) {
      return null;
    }

    entry.target.restore(entry.snapshot);
    this.redoStack.pop();
    this.undoStack.push(entry);

    const diff = entry.target.diff(current.snapshot, entry.snapshot);
    return createUpdateDescriptor({
      kind: 'redo',
      removed: diff.removed,
      added: diff.added,
      selected: diff.added,
      metadataChanged: diff.metadataChanged ?? [],
    });
  }

  /** Drops every checkpoint, baseline included. */
  clear(): void {
    this.undoStack.length = 0;
    this.redoStack.length = 0;
  }
}
