/**
 * Errors raised by clustering operations.
 *
 * @packageDocumentation
 */

/**
 * Error codes for rejected clustering operations.
 */
export type InvalidOperationCode =
  | 'DEGENERATE_MERGE'
  | 'UNKNOWN_CLUSTER'
  | 'EMPTY_SPLIT'
  | 'UNKNOWN_SPIKE'
  | 'INVALID_ASSIGNMENT'
  | 'INVALID_GROUP'
  | 'EMPTY_MOVE'
  | 'ID_SPACE_EXHAUSTED';

/**
 * Raised synchronously when merge, split, move or assignment arguments are
 * malformed, or when no cluster id is left to mint. The operation that raised it has left state unchanged.
 */
export class InvalidOperationError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: InvalidOperationCode;
  /** Offending ids, when the error is about specific clusters or spikes. */
  public readonly ids: readonly number[];

  /**
   * Creates a new InvalidOperationError.
   *
   * @param message - Human-readable error message.
   * @param code - The error code.
   * @param ids - Offending cluster or spike ids.
   */
  constructor(message: string, code: InvalidOperationCode, ids: readonly number[] = []) {
    super(message);
    this.name = 'InvalidOperationError';
    this.code = code;
    this.ids = ids;
  }
}
