/**
 * Session module: the manual clustering orchestrator.
 *
 * @packageDocumentation
 */

export { Session, startManualClustering } from './session.js';
export type { SessionOptions, StartOptions } from './session.js';
export { SessionStateError } from './errors.js';
export type { SessionStateErrorCode } from './errors.js';
export { SessionCheckpoint } from './checkpoint.js';
export type { SessionSnapshot } from './checkpoint.js';
export { COMMAND_NAMES, SESSION_COMMANDS } from './commands.js';
export type {
  ActionInfo,
  CommandDefinition,
  CommandName,
  CommandTable,
  SessionCommandArgs,
  SessionCommandResults,
} from './commands.js';
export type { DataSource, SessionObserver, SessionStatus } from './types.js';
