/**
 * Undo/redo history module.
 *
 * @packageDocumentation
 */

export { GlobalHistory } from './global-history.js';
export type { Checkpointable, HistoryDiff, HistoryEntry } from './types.js';
