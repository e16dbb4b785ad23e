/**
 * Errors raised by the session orchestrator.
 *
 * @packageDocumentation
 */

/**
 * Error codes for operations invoked in the wrong session state.
 */
export type SessionStateErrorCode = 'NOT_OPENED' | 'REENTRANT_CALL';

/**
 * Raised when an operation needs an open dataset and none is open, or when a
 * mutating operation is invoked from inside a notification.
 */
export class SessionStateError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: SessionStateErrorCode;
  /** Name of the rejected operation. */
  public readonly operation: string;

  /**
   * Creates a new SessionStateError.
   *
   * @param operation - Name of the rejected operation.
   * @param code - The error code.
   */
  constructor(operation: string, code: SessionStateErrorCode) {
    super(
      code === 'NOT_OPENED'
        ? `Cannot ${operation}: no dataset is open`
        : `Cannot ${operation} while observers are being notified`
    );
    this.name = 'SessionStateError';
    this.code = code;
    this.operation = operation;
  }
}
