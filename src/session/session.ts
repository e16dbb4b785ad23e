/**
 * Manual clustering session.
 *
 * Owns one Clustering, metadata, Selector and GlobalHistory per opened
 * dataset, exposes the public operations, and notifies observers.
 *
 * @packageDocumentation
 */

import { Clustering } from '../clustering/clustering.js';
import { InvalidOperationError } from '../clustering/errors.js';
import { type ClusterMetadata, ClusterMetadataStore } from '../clustering/metadata.js';
import { Selector } from '../clustering/selector.js';
import {
  type ClusterGroup,
  type ClusterId,
  type SpikeId,
  type UpdateDescriptor,
  sortedUnique,
} from '../clustering/types.js';
import { getDefaultConfig } from '../config/parser.js';
import type { Config } from '../config/types.js';
import { GlobalHistory } from '../history/global-history.js';
import { Logger } from '../utils/logger.js';
import { SessionCheckpoint, type SessionSnapshot } from './checkpoint.js';
import {
  type ActionInfo,
  type CommandDefinition,
  type CommandName,
  COMMAND_NAMES,
  SESSION_COMMANDS,
  type SessionCommandArgs,
  type SessionCommandResults,
} from './commands.js';
import { SessionStateError } from './errors.js';
import type { DataSource, SessionObserver, SessionStatus } from './types.js';

/**
 * Sub-state of an opened dataset. Replaced wholesale on every open.
 */
interface OpenedState {
  readonly clustering: Clustering;
  readonly metadata: ClusterMetadata;
  readonly selector: Selector;
  readonly history: GlobalHistory<SessionSnapshot>;
  readonly checkpoint: SessionCheckpoint;
}

/**
 * Options for creating a Session.
 */
export interface SessionOptions {
  /** Configuration (default: built-in defaults). */
  readonly config?: Config;
  /** Logger (default: a "Session" logger honoring `config.logging.debug`). */
  readonly logger?: Logger;
}

/**
 * Interactive manual clustering session over one dataset at a time.
 *
 * @example
 * ```typescript
 * const session = new Session();
 * session.connect({
 *   onCluster: (update) => session.select(update.selected),
 * });
 * session.open({ spikeClusters: [1, 1, 2, 2] });
 * session.merge([1, 2]); // clusterIds: [3]
 * session.undo(); // clusterIds: [1, 2]
 * ```
 */
export class Session {
  private readonly config: Config;
  private readonly logger: Logger;
  private readonly observers: SessionObserver[] = [];
  private state: OpenedState | undefined;
  private notifying = 0;

  constructor(options: SessionOptions = {}) {
    this.config = options.config ?? getDefaultConfig();
    this.logger =
      options.logger ?? new Logger({ component: 'Session', debugMode: this.config.logging.debug });
    this.state = undefined;
  }

  get status(): SessionStatus {
    return this.state === undefined ? 'unopened' : 'opened';
  }

  get isOpen(): boolean {
    return this.state !== undefined;
  }

  /** Commands available on the session, in display order. */
  get actions(): readonly ActionInfo[] {
    return COMMAND_NAMES.map((name) => ({ name, title: SESSION_COMMANDS[name].title }));
  }

  /**
   * Registers an observer.
   *
   * @returns A function that unregisters it.
   */
  connect(observer: SessionObserver): () => void {
    this.observers.push(observer);
    return () => {
      const index = this.observers.indexOf(observer);
      if (index !== -1) {
        this.observers.splice(index, 1);
      }
    };
  }

  /**
   * Dispatches a command from the command table.
   */
  run<K extends CommandName>(name: K, ...args: SessionCommandArgs[K]): SessionCommandResults[K] {
    const command: CommandDefinition<K> = SESSION_COMMANDS[name];
    return command.handler(this, ...args);
  }

  /**
   * Loads a dataset, discarding any previously opened one.
   *
   * @throws InvalidOperationError if the initial assignment is invalid; the
   * previous dataset then stays open.
   */
  open(source: DataSource): void {
    this.assertNotNotifying('open');

    const clustering = new Clustering(source.spikeClusters);
    const metadata =
      source.clusterMetadata ??
      new ClusterMetadataStore({ defaultGroup: this.config.metadata.default_group });
    const selector = new Selector(clustering, { nSpikesMax: this.config.selector.n_spikes_max });
    const checkpoint = new SessionCheckpoint(clustering, metadata);
    const history = new GlobalHistory<SessionSnapshot>();
    history.action(checkpoint);

    this.state = { clustering, metadata, selector, history, checkpoint };
    this.logger.info('session_opened', {
      nSpikes: clustering.nSpikes,
      nClusters: clustering.clusterIds.length,
    });

    this.notify((observer) => observer.onOpen?.());
  }

  /**
   * Replaces the selected clusters. Allowed from inside notifications.
   */
  select(clusterIds: readonly ClusterId[]): void {
    const state = this.requireOpened('select');
    state.selector.selectedClusters = clusterIds;
    this.logger.debug('clusters_selected', { clusters: state.selector.selectedClusters });
    this.notify((observer) => observer.onSelect?.());
  }

  /**
   * Merges clusters into a new one.
   *
   * @throws InvalidOperationError if fewer than two distinct clusters in use are given.
   */
  merge(clusterIds: readonly ClusterId[]): UpdateDescriptor {
    return this.mutate('merge', (state) => state.clustering.merge(clusterIds));
  }

  /**
   * Splits spikes off into new clusters.
   *
   * @throws InvalidOperationError if no spikes or unknown spikes are given.
   */
  split(spikeIds: readonly SpikeId[]): UpdateDescriptor {
    return this.mutate('split', (state) => state.clustering.split(spikeIds));
  }

  /**
   * Moves clusters to a group.
   *
   * @throws InvalidOperationError if a cluster is not in use or the group is unknown.
   */
  move(clusterIds: readonly ClusterId[], group: ClusterGroup): UpdateDescriptor {
    return this.mutate('move', (state) => {
      const unknown = sortedUnique(clusterIds).filter(
        (cluster) => !state.clustering.hasCluster(cluster)
      );
      if (unknown.length > 0) {
        throw new InvalidOperationError(
          `Unknown cluster(s): ${unknown.join(', ')}`,
          'UNKNOWN_CLUSTER',
          unknown
        );
      }
      return state.metadata.setGroup(clusterIds, group);
    });
  }

  /**
   * Restores the previous checkpoint.
   *
   * @returns The change, or `null` (and no notification) when there is nothing to undo.
   */
  undo(): UpdateDescriptor | null {
    return this.replay('undo', (state) => state.history.undo());
  }

  /**
   * Re-applies the most recently undone checkpoint.
   *
   * @returns The change, or `null` (and no notification) when there is nothing to redo.
   */
  redo(): UpdateDescriptor | null {
    return this.replay('redo', (state) => state.history.redo());
  }

  /** Cluster ids in use, ascending. */
  get clusterIds(): ClusterId[] {
    return this.requireOpened('read clusterIds').clustering.clusterIds;
  }

  /** Copy of the current assignment, indexed by SpikeId. */
  get spikeClusters(): Int32Array {
    return this.requireOpened('read spikeClusters').clustering.spikeClusters;
  }

  get selectedClusters(): readonly ClusterId[] {
    return this.requireOpened('read selectedClusters').selector.selectedClusters;
  }

  /** Subsampled spikes of the selected clusters, ascending. */
  get selectedSpikes(): SpikeId[] {
    return this.requireOpened('read selectedSpikes').selector.selectedSpikes;
  }

  get canUndo(): boolean {
    return this.state?.history.canUndo ?? false;
  }

  get canRedo(): boolean {
    return this.state?.history.canRedo ?? false;
  }

  groupOf(cluster: ClusterId): ClusterGroup {
    return this.requireOpened('read groups').metadata.getGroup(cluster);
  }

  /** Spikes assigned to any of the given clusters, ascending. */
  spikesIn(clusterIds: readonly ClusterId[]): SpikeId[] {
    return this.requireOpened('read spikes').clustering.spikesIn(clusterIds);
  }

  /**
   * Spike count of every cluster in use.
   */
  spikeCounts(): ReadonlyMap<ClusterId, number> {
    return this.requireOpened('read spike counts').clustering.spikeCounts();
  }

  private mutate(
    operation: 'merge' | 'split' | 'move',
    apply: (state: OpenedState) => UpdateDescriptor
  ): UpdateDescriptor {
    this.assertNotNotifying(operation);
    const state = this.requireOpened(operation);

    let update: UpdateDescriptor;
    try {
      update = apply(state);
    } catch (error) {
      if (error instanceof InvalidOperationError) {
        this.logger.warn('operation_rejected', {
          operation,
          code: error.code,
          message: error.message,
        });
      }
      throw error;
    }

    if (update.removed.length > 0) {
      state.metadata.forget?.(update.removed);
    }
    state.history.action(state.checkpoint);
    this.logger.debug(`${operation}_applied`, {
      removed: update.removed,
      added: update.added,
      metadataChanged: update.metadataChanged,
    });

    this.notify((observer) => observer.onCluster?.(update, true));
    return update;
  }

  private replay(
    operation: 'undo' | 'redo',
    step: (state: OpenedState) => UpdateDescriptor | null
  ): UpdateDescriptor | null {
    this.assertNotNotifying(operation);
    const state = this.requireOpened(operation);

    const update = step(state);
    if (update === null) {
      this.logger.debug(`nothing_to_${operation}`);
      return null;
    }
    this.logger.debug(`history_${operation}`, {
      removed: update.removed,
      added: update.added,
      metadataChanged: update.metadataChanged,
    });

    this.notify((observer) => observer.onCluster?.(update, false));
    return update;
  }

  private notify(deliver: (observer: SessionObserver) => void): void {
    this.notifying += 1;
    try {
      for (const observer of [...this.observers]) {
        deliver(observer);
      }
    } finally {
      this.notifying -= 1;
    }
  }

  private requireOpened(operation: string): OpenedState {
    if (this.state === undefined) {
      throw new SessionStateError(operation, 'NOT_OPENED');
    }
    return this.state;
  }

  private assertNotNotifying(operation: string): void {
    if (this.notifying > 0) {
      throw new SessionStateError(operation, 'REENTRANT_CALL');
    }
  }
}

/**
 * Options for {@link startManualClustering}.
 */
export interface StartOptions extends SessionOptions {
  /** Existing session to open the dataset in. */
  readonly session?: Session;
}

/**
 * Opens a dataset in a new (or the given) session.
 *
 * @param source - Dataset to open.
 * @param options - Session or session options.
 * @returns The session with the dataset open.
 */
export function startManualClustering(source: DataSource, options: StartOptions = {}): Session {
  const session = options.session ?? new Session(options);
  session.open(source);
  return session;
}
