/**
 * cluster-curator
 *
 * Headless manual clustering of spike-sorting data: merge, split and move
 * clusters with undo/redo, and subsample the spikes of a selection.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export * from './clustering/index.js';
export * from './history/index.js';
export * from './session/index.js';
export * from './config/index.js';
export { Logger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
