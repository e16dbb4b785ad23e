/**
 * Command table of the session's public operations.
 *
 * Built once; maps each operation name to its title and a typed handler so
 * that front ends can list and dispatch actions without string-keyed lookups
 * on the session itself.
 *
 * @packageDocumentation
 */

import type { ClusterGroup, ClusterId, SpikeId, UpdateDescriptor } from '../clustering/types.js';
import type { Session } from './session.js';
import type { DataSource } from './types.js';

/**
 * Argument list of each command.
 */
export interface SessionCommandArgs {
  open: [source: DataSource];
  select: [clusterIds: readonly ClusterId[]];
  merge: [clusterIds: readonly ClusterId[]];
  split: [spikeIds: readonly SpikeId[]];
  move: [clusterIds: readonly ClusterId[], group: ClusterGroup];
  undo: [];
  redo: [];
}

/**
 * Result of each command.
 */
export interface SessionCommandResults {
  open: void;
  select: void;
  merge: UpdateDescriptor;
  split: UpdateDescriptor;
  move: UpdateDescriptor;
  undo: UpdateDescriptor | null;
  redo: UpdateDescriptor | null;
}

export type CommandName = keyof SessionCommandArgs;

/**
 * A titled, typed command.
 */
export interface CommandDefinition<K extends CommandName> {
  /** Label shown by front ends. */
  readonly title: string;
  readonly handler: (session: Session, ...args: SessionCommandArgs[K]) => SessionCommandResults[K];
}

export type CommandTable = { readonly [K in CommandName]: CommandDefinition<K> };

/**
 * Command names in display order.
 */
export const COMMAND_NAMES: readonly CommandName[] = [
  'open',
  'select',
  'merge',
  'split',
  'move',
  'undo',
  'redo',
];

export const SESSION_COMMANDS: CommandTable = {
  open: { title: 'Open', handler: (session, source) => session.open(source) },
  select: { title: 'Select clusters', handler: (session, ids) => session.select(ids) },
  merge: { title: 'Merge', handler: (session, ids) => session.merge(ids) },
  split: { title: 'Split', handler: (session, spikes) => session.split(spikes) },
  move: {
    title: 'Move clusters to a group',
    handler: (session, ids, group) => session.move(ids, group),
  },
  undo: { title: 'Undo', handler: (session) => session.undo() },
  redo: { title: 'Redo', handler: (session) => session.redo() },
};

/**
 * Name and title of a command, as listed by `Session.actions`.
 */
export interface ActionInfo {
  readonly name: CommandName;
  readonly title: string;
}
