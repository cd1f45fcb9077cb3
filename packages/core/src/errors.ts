/**
 * Error taxonomy for reconciliation passes.
 *
 * An absent resource is not an error: `find` resolves to `undefined` and the
 * runner branches on that. Everything else aborts the current pass and is
 * propagated to whoever scheduled it.
 */

export enum ReconcileErrorType {
  /** A backend call failed. */
  BACKEND = "BACKEND",
  /** A change set field has no in-place update path. */
  UNSUPPORTED_CHANGE = "UNSUPPORTED_CHANGE",
  /** An async backend operation finished with errors. */
  OPERATION_FAILED = "OPERATION_FAILED",
  /** A resource URL or name spec could not be parsed. */
  MALFORMED_IDENTIFIER = "MALFORMED_IDENTIFIER",
  /** Desired state is missing a value the mapping needs. */
  INVALID_SPEC = "INVALID_SPEC",
  /** A referenced resource has not been materialized yet. */
  DEPENDENCY_NOT_READY = "DEPENDENCY_NOT_READY",
}

/**
 * Structured error for reconciliation failures
 */
export class ReconcileError extends Error {
  constructor(
    message: string,
    public readonly type: ReconcileErrorType,
    public readonly originalError?: unknown,
    public readonly details?: Record<string, unknown>
  ) {
    super(originalError === undefined ? message : `${message}: ${describeError(originalError)}`);
    this.name = "ReconcileError";
  }
}

/**
 * Wrap a backend failure with the context of the call that produced it.
 */
export function backendError(context: string, error: unknown): ReconcileError {
  return new ReconcileError(context, ReconcileErrorType.BACKEND, error);
}

export function isReconcileError(
  error: unknown,
  type?: ReconcileErrorType
): error is ReconcileError {
  return error instanceof ReconcileError && (type === undefined || error.type === type);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
